import * as grpc from '@grpc/grpc-js';
import type { sendUnaryData } from '@grpc/grpc-js';
import { ExecutionDriver } from '../../src/engine/driver';
import { HealthService } from '../../src/grpc/health.service';
import { WorkflowServiceImpl } from '../../src/grpc/workflow.service';
import { InlineDispatcher } from '../../src/services/dispatcher';
import { ProactiveWorkflowService } from '../../src/services/proactive-workflow.service';
import { fakeCollaborators } from '../helpers/collaborators';
import { NOW } from '../helpers/fixtures';
import { InMemoryWorkflowStore, TestClock } from '../helpers/memory';

interface Reply<T> {
    error: Partial<grpc.StatusObject> | null;
    value: T | null | undefined;
}

function invoke<Req, Res>(
    handler: (call: { request: Req }, callback: sendUnaryData<Res>) => Promise<void>,
    request: Req,
): Promise<Reply<Res>> {
    return new Promise((resolve, reject) => {
        handler({ request }, (error, value) => resolve({ error, value })).catch(reject);
    });
}

function json(value: unknown): Buffer {
    return Buffer.from(JSON.stringify(value), 'utf-8');
}

function parse(bytes: Buffer | undefined): unknown {
    return bytes && bytes.length > 0 ? JSON.parse(bytes.toString('utf-8')) : undefined;
}

describe('WorkflowServiceImpl', () => {
    let service: ProactiveWorkflowService;
    let impl: WorkflowServiceImpl;

    async function startSchedule(): Promise<string> {
        const reply = await invoke(impl.startWorkflow.bind(impl), {
            workflow_type: 'schedule_appointment',
            user_id: 'user-1',
            input: json({ contact_name: 'Dana Reyes' }),
            name: '',
        });
        if (!reply.value) throw new Error(`start failed: ${reply.error?.details}`);
        return reply.value.workflow_id;
    }

    beforeEach(() => {
        jest.spyOn(console, 'log').mockImplementation(() => undefined);
        jest.spyOn(console, 'warn').mockImplementation(() => undefined);
        const clock = new TestClock(NOW);
        const store = new InMemoryWorkflowStore(clock.now);
        const driver = new ExecutionDriver(store, store.stepStore, fakeCollaborators(), { now: clock.now });
        service = new ProactiveWorkflowService(store, store.stepStore, new InlineDispatcher(driver), { now: clock.now });
        impl = new WorkflowServiceImpl(service);
    });

    afterEach(() => {
        jest.restoreAllMocks();
    });

    describe('StartWorkflow', () => {
        it('starts a workflow from JSON input', async () => {
            const reply = await invoke(impl.startWorkflow.bind(impl), {
                workflow_type: 'schedule_appointment',
                user_id: 'user-1',
                input: json({ contact_name: 'Dana Reyes' }),
                name: '',
            });

            expect(reply.error).toBeNull();
            expect(reply.value?.status).toBe('waiting');
            expect(reply.value?.message).toBe('Workflow started with 8 steps');
        });

        it('rejects input that is not a JSON object', async () => {
            const bad = await invoke(impl.startWorkflow.bind(impl), {
                workflow_type: 'schedule_appointment',
                user_id: 'user-1',
                input: Buffer.from('{oops', 'utf-8'),
                name: '',
            });
            expect(bad.error).toEqual({ code: grpc.status.INVALID_ARGUMENT, details: 'input is not valid JSON' });

            const array = await invoke(impl.startWorkflow.bind(impl), {
                workflow_type: 'schedule_appointment',
                user_id: 'user-1',
                input: json([1, 2]),
                name: '',
            });
            expect(array.error).toEqual({ code: grpc.status.INVALID_ARGUMENT, details: 'input must be a JSON object' });
        });

        it('requires a user', async () => {
            const reply = await invoke(impl.startWorkflow.bind(impl), {
                workflow_type: 'follow_up_email',
                user_id: '',
                input: json({ contact_email: 'dana@example.com' }),
                name: '',
            });
            expect(reply.error).toEqual({ code: grpc.status.INVALID_ARGUMENT, details: 'user_id is required' });
        });

        it('maps template input errors to INVALID_ARGUMENT', async () => {
            const reply = await invoke(impl.startWorkflow.bind(impl), {
                workflow_type: 'follow_up_email',
                user_id: 'user-1',
                input: Buffer.alloc(0),
                name: '',
            });
            expect(reply.error).toEqual({
                code: grpc.status.INVALID_ARGUMENT,
                details: 'Invalid input for follow_up_email: contact_email: Required',
            });
        });
    });

    describe('GetWorkflowStatus', () => {
        it('returns the workflow with its steps', async () => {
            const id = await startSchedule();

            const reply = await invoke(impl.getWorkflowStatus.bind(impl), { workflow_id: id, user_id: 'user-1' });

            const view = reply.value;
            if (!view) throw new Error('no status');
            expect(view.workflow.id).toBe(id);
            expect(view.workflow.status).toBe('waiting');
            expect(view.workflow.completed_at).toBe('');
            expect(view.timeout_at).toBe('2024-07-02T09:00:00.000Z');
            expect(view.steps).toHaveLength(8);
            expect(view.steps[4]?.status).toBe('running');
            expect(parse(view.steps[4]?.output)).toEqual({
                waiting_for: 'email_response',
                timeout_at: '2024-07-02T09:00:00.000Z',
                expected_responses: ['time_selection', 'alternative_times', 'decline'],
            });
            expect(view.steps[5]?.output).toHaveLength(0);
            expect(parse(view.input)).toEqual({
                contact_name: 'Dana Reyes',
                user_request: 'Schedule a 60-minute meeting with Dana Reyes',
            });
        });

        it('answers NOT_FOUND for another user', async () => {
            const id = await startSchedule();

            const reply = await invoke(impl.getWorkflowStatus.bind(impl), { workflow_id: id, user_id: 'user-2' });

            expect(reply.value).toBeNull();
            expect(reply.error).toEqual({ code: grpc.status.NOT_FOUND, details: `Workflow ${id} not found` });
        });
    });

    describe('ContinueWorkflow', () => {
        it('resumes with the reply and reports the pass', async () => {
            const id = await startSchedule();

            const reply = await invoke(impl.continueWorkflow.bind(impl), {
                workflow_id: id,
                user_id: 'user-1',
                response_data: json({ body: 'Tuesday works' }),
            });

            expect(reply.value?.status).toBe('completed');
            expect(reply.value?.message).toBe('Workflow resumed');
            expect(parse(reply.value?.result)).toEqual({
                workflowId: id,
                status: 'completed',
                stepsExecuted: 3,
                noop: false,
            });
        });

        it('returns empty result bytes when nothing ran', async () => {
            const id = await startSchedule();
            await service.cancel(id, 'user-1');

            const reply = await invoke(impl.continueWorkflow.bind(impl), {
                workflow_id: id,
                user_id: 'user-1',
                response_data: Buffer.alloc(0),
            });

            expect(reply.value?.message).toBe('Workflow is cancelled, not waiting for a response');
            expect(reply.value?.result).toHaveLength(0);
        });
    });

    describe('ListWorkflows', () => {
        it('lists the user\'s workflows', async () => {
            const id = await startSchedule();

            const all = await invoke(impl.listWorkflows.bind(impl), { user_id: 'user-1', status: '', limit: 0 });
            expect(all.value?.workflows.map((w) => w.id)).toEqual([id]);

            const completed = await invoke(impl.listWorkflows.bind(impl), { user_id: 'user-1', status: 'completed', limit: 5 });
            expect(completed.value?.workflows).toEqual([]);
        });

        it('rejects an unknown status filter', async () => {
            const reply = await invoke(impl.listWorkflows.bind(impl), { user_id: 'user-1', status: 'paused', limit: 0 });
            expect(reply.error).toEqual({ code: grpc.status.INVALID_ARGUMENT, details: 'Unknown status filter: paused' });
        });

        it('reports unexpected failures as INTERNAL', async () => {
            const error = jest.spyOn(console, 'error').mockImplementation(() => undefined);
            jest.spyOn(service, 'list').mockRejectedValue(new Error('db down'));

            const reply = await invoke(impl.listWorkflows.bind(impl), { user_id: 'user-1', status: '', limit: 0 });

            expect(reply.error).toEqual({ code: grpc.status.INTERNAL, details: 'db down' });
            expect(error).toHaveBeenCalledTimes(1);
        });
    });

    describe('CancelWorkflow', () => {
        it('cancels a waiting workflow', async () => {
            const id = await startSchedule();

            const reply = await invoke(impl.cancelWorkflow.bind(impl), { workflow_id: id, user_id: 'user-1' });

            expect(reply.value).toEqual({ status: 'cancelled', cancelled: true, message: 'Workflow cancelled' });
        });
    });
});

describe('HealthService', () => {
    beforeEach(() => {
        jest.spyOn(console, 'error').mockImplementation(() => undefined);
    });

    afterEach(() => {
        jest.restoreAllMocks();
    });

    it('serves while both stores answer', async () => {
        const health = new HealthService({ query: async () => ({}) }, { ping: async () => 'PONG' });
        const reply = await invoke(health.check.bind(health), { service: '' });
        expect(reply.value).toEqual({ status: 'SERVING' });
    });

    it('stops serving when redis is down', async () => {
        const health = new HealthService({ query: async () => ({}) }, {
            ping: async () => {
                throw new Error('ECONNREFUSED');
            },
        });
        expect(await health.status()).toBe('NOT_SERVING');
    });
});
