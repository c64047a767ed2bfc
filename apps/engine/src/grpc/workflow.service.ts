import * as grpc from '@grpc/grpc-js';
import { ServerUnaryCall, sendUnaryData } from '@grpc/grpc-js';
import { workflowStatus } from '../db/workflow.entity';
import { InvalidRequestError, TemplateInputError, WorkflowNotFoundError } from '../errors';
import type {
    ProactiveWorkflowService,
    StepSummary,
    WorkflowSummary,
} from '../services/proactive-workflow.service';
import { isRecord } from '../utils/dotPath';

interface StartWorkflowRequest {
    workflow_type: string;
    user_id: string;
    input: Buffer;
    name: string;
}

interface StartWorkflowResponse {
    workflow_id: string;
    status: string;
    message: string;
}

interface ContinueWorkflowRequest {
    workflow_id: string;
    user_id: string;
    response_data: Buffer;
}

interface ContinueWorkflowResponse {
    status: string;
    message: string;
    result: Buffer;
}

interface GetWorkflowStatusRequest {
    workflow_id: string;
    user_id: string;
}

interface WireWorkflowSummary {
    id: string;
    name: string;
    workflow_type: string;
    status: string;
    created_at: string;
    updated_at: string;
    completed_at: string;
}

interface WireStepSummary {
    step_number: number;
    name: string;
    step_type: string;
    status: string;
    output: Buffer;
    error_message: string;
    started_at: string;
    completed_at: string;
}

interface WorkflowStatusResponse {
    workflow: WireWorkflowSummary;
    description: string;
    input: Buffer;
    context: Buffer;
    timeout_at: string;
    retry_count: number;
    max_retries: number;
    error_message: string;
    steps: WireStepSummary[];
}

interface ListWorkflowsRequest {
    user_id: string;
    status: string;
    limit: number;
}

interface ListWorkflowsResponse {
    workflows: WireWorkflowSummary[];
}

interface CancelWorkflowRequest {
    workflow_id: string;
    user_id: string;
}

interface CancelWorkflowResponse {
    status: string;
    cancelled: boolean;
    message: string;
}

/** The part of a unary call the handlers read. */
type UnaryCall<Req, Res> = Pick<ServerUnaryCall<Req, Res>, 'request'>;

export type WorkflowOperations = Pick<
    ProactiveWorkflowService,
    'start' | 'continueFromResponse' | 'getStatus' | 'list' | 'cancel'
>;

const TAG = '[WorkflowService]';

function iso(date: Date | null): string {
    return date ? date.toISOString() : '';
}

function encodeJson(value: unknown): Buffer {
    return value === undefined ? Buffer.alloc(0) : Buffer.from(JSON.stringify(value), 'utf-8');
}

function decodeJsonObject(bytes: Buffer | undefined, field: string): Record<string, unknown> {
    if (!bytes || bytes.length === 0) return {};
    let parsed: unknown;
    try {
        parsed = JSON.parse(bytes.toString('utf-8'));
    } catch {
        throw new InvalidRequestError(`${field} is not valid JSON`);
    }
    if (!isRecord(parsed)) throw new InvalidRequestError(`${field} must be a JSON object`);
    return parsed;
}

function requireField(value: string, field: string): string {
    if (!value) throw new InvalidRequestError(`${field} is required`);
    return value;
}

function parseStatus(raw: string): workflowStatus | undefined {
    if (!raw) return undefined;
    const status = Object.values(workflowStatus).find((s) => s === raw);
    if (!status) throw new InvalidRequestError(`Unknown status filter: ${raw}`);
    return status;
}

function toWireSummary(wf: WorkflowSummary): WireWorkflowSummary {
    return {
        id: wf.id,
        name: wf.name,
        workflow_type: wf.workflow_type,
        status: wf.status,
        created_at: iso(wf.created_at),
        updated_at: iso(wf.updated_at),
        completed_at: iso(wf.completed_at),
    };
}

function toWireStep(step: StepSummary): WireStepSummary {
    return {
        step_number: step.step_number,
        name: step.name,
        step_type: step.step_type,
        status: step.status,
        output: encodeJson(step.output_data ?? undefined),
        error_message: step.error_message ?? '',
        started_at: iso(step.started_at),
        completed_at: iso(step.completed_at),
    };
}

export function toStatusObject(error: unknown): Partial<grpc.StatusObject> {
    if (error instanceof WorkflowNotFoundError) {
        return { code: grpc.status.NOT_FOUND, details: error.message };
    }
    if (error instanceof TemplateInputError || error instanceof InvalidRequestError) {
        return { code: grpc.status.INVALID_ARGUMENT, details: error.message };
    }
    return { code: grpc.status.INTERNAL, details: error instanceof Error ? error.message : 'Unknown error' };
}

/**
 * gRPC adapter over the workflow service.
 * Request bytes are JSON; domain errors map to NOT_FOUND / INVALID_ARGUMENT.
 */
export class WorkflowServiceImpl {
    constructor(private readonly workflows: WorkflowOperations) { }

    async startWorkflow(
        call: UnaryCall<StartWorkflowRequest, StartWorkflowResponse>,
        callback: sendUnaryData<StartWorkflowResponse>
    ) {
        try {
            const req = call.request;
            const result = await this.workflows.start(
                requireField(req.workflow_type, 'workflow_type'),
                requireField(req.user_id, 'user_id'),
                decodeJsonObject(req.input, 'input'),
                req.name || undefined,
            );
            callback(null, result);
        } catch (error) {
            this.fail('startWorkflow', error, callback);
        }
    }

    async continueWorkflow(
        call: UnaryCall<ContinueWorkflowRequest, ContinueWorkflowResponse>,
        callback: sendUnaryData<ContinueWorkflowResponse>
    ) {
        try {
            const req = call.request;
            const result = await this.workflows.continueFromResponse(
                requireField(req.workflow_id, 'workflow_id'),
                requireField(req.user_id, 'user_id'),
                decodeJsonObject(req.response_data, 'response_data'),
            );
            callback(null, { status: result.status, message: result.message, result: encodeJson(result.result) });
        } catch (error) {
            this.fail('continueWorkflow', error, callback);
        }
    }

    async getWorkflowStatus(
        call: UnaryCall<GetWorkflowStatusRequest, WorkflowStatusResponse>,
        callback: sendUnaryData<WorkflowStatusResponse>
    ) {
        try {
            const req = call.request;
            const view = await this.workflows.getStatus(
                requireField(req.workflow_id, 'workflow_id'),
                requireField(req.user_id, 'user_id'),
            );
            callback(null, {
                workflow: toWireSummary(view),
                description: view.description ?? '',
                input: encodeJson(view.input_data),
                context: encodeJson(view.context),
                timeout_at: iso(view.timeout_at),
                retry_count: view.retry_count,
                max_retries: view.max_retries,
                error_message: view.error_message ?? '',
                steps: view.steps.map(toWireStep),
            });
        } catch (error) {
            this.fail('getWorkflowStatus', error, callback);
        }
    }

    async listWorkflows(
        call: UnaryCall<ListWorkflowsRequest, ListWorkflowsResponse>,
        callback: sendUnaryData<ListWorkflowsResponse>
    ) {
        try {
            const req = call.request;
            const rows = await this.workflows.list(
                requireField(req.user_id, 'user_id'),
                parseStatus(req.status),
                req.limit > 0 ? req.limit : undefined,
            );
            callback(null, { workflows: rows.map(toWireSummary) });
        } catch (error) {
            this.fail('listWorkflows', error, callback);
        }
    }

    async cancelWorkflow(
        call: UnaryCall<CancelWorkflowRequest, CancelWorkflowResponse>,
        callback: sendUnaryData<CancelWorkflowResponse>
    ) {
        try {
            const req = call.request;
            const result = await this.workflows.cancel(
                requireField(req.workflow_id, 'workflow_id'),
                requireField(req.user_id, 'user_id'),
            );
            callback(null, result);
        } catch (error) {
            this.fail('cancelWorkflow', error, callback);
        }
    }

    private fail<T>(method: string, error: unknown, callback: sendUnaryData<T>): void {
        const status = toStatusObject(error);
        if (status.code === grpc.status.INTERNAL) {
            console.error(`${TAG} ${method} error:`, error);
        }
        callback(status, null);
    }
}
