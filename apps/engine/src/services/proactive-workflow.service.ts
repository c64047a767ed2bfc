import type { StepType } from '@proactive/sdk';
import { v7 as uuidv7 } from 'uuid';
import { WorkflowContext, WorkflowEntity, isTerminal, workflowStatus } from '../db/workflow.entity';
import { WorkflowStepEntity, stepStatus } from '../db/workflow_step.entity';
import type { DriverResult } from '../engine/driver';
import { TemplateRegistry, defaultTemplates, generateWorkflow } from '../engine/templates';
import { WorkflowNotFoundError } from '../errors';
import type { StepStore, WorkflowStore } from '../repositories/types';
import type { DispatchReceipt, TaskDispatcher } from './dispatcher';

const TAG = '[workflows]';

export const DEFAULT_LIST_LIMIT = 20;
export const MAX_LIST_LIMIT = 100;
export const DEFAULT_MAX_RETRIES = 2;

export interface StartResult {
    workflow_id: string;
    status: workflowStatus;
    message: string;
}

export interface ContinueResult {
    status: workflowStatus;
    message: string;
    result?: DriverResult;
}

export interface CancelResult {
    status: workflowStatus;
    cancelled: boolean;
    message: string;
}

export interface StepSummary {
    step_number: number;
    name: string;
    step_type: StepType;
    status: stepStatus;
    output_data: unknown;
    error_message: string | null;
    started_at: Date | null;
    completed_at: Date | null;
}

export interface WorkflowSummary {
    id: string;
    name: string;
    workflow_type: string;
    status: workflowStatus;
    created_at: Date;
    updated_at: Date;
    completed_at: Date | null;
}

export interface WorkflowStatusView extends WorkflowSummary {
    description: string | null;
    input_data: Record<string, unknown>;
    context: WorkflowContext;
    timeout_at: Date | null;
    retry_count: number;
    max_retries: number;
    error_message: string | null;
    steps: StepSummary[];
}

export interface ServiceOptions {
    templates?: TemplateRegistry;
    now?: () => Date;
    maxRetries?: number;
}

function toSummary(wf: WorkflowEntity): WorkflowSummary {
    return {
        id: wf.id,
        name: wf.name,
        workflow_type: wf.workflow_type,
        status: wf.status,
        created_at: wf.created_at,
        updated_at: wf.updated_at,
        completed_at: wf.completed_at,
    };
}

function toStepSummary(step: WorkflowStepEntity): StepSummary {
    return {
        step_number: step.step_number,
        name: step.name,
        step_type: step.step_type,
        status: step.status,
        output_data: step.output_data,
        error_message: step.error_message,
        started_at: step.started_at,
        completed_at: step.completed_at,
    };
}

function statusAfter(receipt: DispatchReceipt, fallback: workflowStatus): workflowStatus {
    return receipt.queued ? fallback : receipt.result.status ?? fallback;
}

/**
 * The engine's public surface: start, continue, inspect, cancel.
 * Every read and write is scoped to the calling user.
 */
export class ProactiveWorkflowService {
    private readonly templates: TemplateRegistry;
    private readonly now: () => Date;
    private readonly maxRetries: number;

    constructor(
        private readonly workflows: WorkflowStore,
        private readonly steps: StepStore,
        private readonly dispatcher: TaskDispatcher,
        opts: ServiceOptions = {},
    ) {
        this.templates = opts.templates ?? defaultTemplates;
        this.now = opts.now ?? (() => new Date());
        this.maxRetries = opts.maxRetries ?? DEFAULT_MAX_RETRIES;
    }

    async start(
        workflowType: string,
        userId: string,
        inputData: Record<string, unknown>,
        name?: string,
    ): Promise<StartResult> {
        const template = this.templates.resolve(workflowType);
        const generated = generateWorkflow(workflowType, inputData, { now: this.now() }, this.templates);

        const created = await this.workflows.createWithSteps({
            id: `wf_${uuidv7()}`,
            user_id: userId,
            workflow_type: workflowType,
            name: name ?? generated.name,
            description: template.description,
            input_data: generated.input,
            max_retries: this.maxRetries,
        }, generated.steps);

        console.log(`${TAG} created ${created.id} (${workflowType}, ${generated.steps.length} steps) for ${userId}`);
        const receipt = await this.dispatcher.dispatchRun(created.id);

        return {
            workflow_id: created.id,
            status: statusAfter(receipt, created.status),
            message: `Workflow started with ${generated.steps.length} steps`,
        };
    }

    async continueFromResponse(
        workflowId: string,
        userId: string,
        responseData: Record<string, unknown>,
    ): Promise<ContinueResult> {
        const wf = await this.requireOwned(workflowId, userId);

        if (wf.status !== workflowStatus.WAITING) {
            console.warn(`${TAG} response for ${workflowId} ignored (status: ${wf.status})`);
            return { status: wf.status, message: `Workflow is ${wf.status}, not waiting for a response` };
        }

        const suspended = (await this.steps.findByWorkflowId(workflowId)).find((s) => s.status === stepStatus.RUNNING);
        const receipt = await this.dispatcher.dispatchResume(workflowId, responseData, suspended?.step_number);
        if (receipt.queued) {
            return { status: wf.status, message: 'Response accepted, workflow will resume' };
        }
        return {
            status: statusAfter(receipt, wf.status),
            message: receipt.result.noop ? 'Workflow was already resumed' : 'Workflow resumed',
            result: receipt.result,
        };
    }

    async getStatus(workflowId: string, userId: string): Promise<WorkflowStatusView> {
        const wf = await this.requireOwned(workflowId, userId);
        const steps = await this.steps.findByWorkflowId(wf.id);

        return {
            ...toSummary(wf),
            description: wf.description,
            input_data: wf.input_data,
            context: wf.context,
            timeout_at: wf.timeout_at,
            retry_count: wf.retry_count,
            max_retries: wf.max_retries,
            error_message: wf.error_message,
            steps: steps.map(toStepSummary),
        };
    }

    async list(userId: string, statusFilter?: workflowStatus, limit = DEFAULT_LIST_LIMIT): Promise<WorkflowSummary[]> {
        const bounded = Math.min(Math.max(Math.trunc(limit) || DEFAULT_LIST_LIMIT, 1), MAX_LIST_LIMIT);
        const rows = await this.workflows.listForUser(userId, { status: statusFilter, limit: bounded });
        return rows.map(toSummary);
    }

    async cancel(workflowId: string, userId: string): Promise<CancelResult> {
        const wf = await this.requireOwned(workflowId, userId);
        if (isTerminal(wf.status)) {
            return { status: wf.status, cancelled: false, message: `Workflow is already ${wf.status}` };
        }

        const cancelled = await this.workflows.cancel(workflowId, userId);
        if (!cancelled) {
            // Finished between the read and the update.
            const current = await this.requireOwned(workflowId, userId);
            return { status: current.status, cancelled: false, message: `Workflow is already ${current.status}` };
        }

        console.log(`${TAG} cancelled ${workflowId}`);
        return { status: cancelled.status, cancelled: true, message: 'Workflow cancelled' };
    }

    private async requireOwned(workflowId: string, userId: string): Promise<WorkflowEntity> {
        const wf = await this.workflows.findForUser(workflowId, userId);
        if (!wf) throw new WorkflowNotFoundError(workflowId);
        return wf;
    }
}
