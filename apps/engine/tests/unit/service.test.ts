import type { ReminderOutcome, ReminderRequest } from '@proactive/sdk';
import { jobKind, jobStatus } from '../../src/db/engine_job.entity';
import { workflowStatus } from '../../src/db/workflow.entity';
import { stepStatus } from '../../src/db/workflow_step.entity';
import { ExecutionDriver } from '../../src/engine/driver';
import { TemplateInputError, WorkflowNotFoundError } from '../../src/errors';
import { JobRunner } from '../../src/job-runner';
import { InlineDispatcher, QueueDispatcher } from '../../src/services/dispatcher';
import { HeartbeatService } from '../../src/services/heartbeat.service';
import { ProactiveWorkflowService } from '../../src/services/proactive-workflow.service';
import { FakeCollaborators, fakeCollaborators } from '../helpers/collaborators';
import { NOW } from '../helpers/fixtures';
import { InMemoryJobQueue, InMemoryWorkflowStore, TestClock } from '../helpers/memory';

describe('ProactiveWorkflowService', () => {
    let clock: TestClock;
    let store: InMemoryWorkflowStore;

    beforeEach(() => {
        jest.spyOn(console, 'log').mockImplementation(() => undefined);
        jest.spyOn(console, 'warn').mockImplementation(() => undefined);
        clock = new TestClock(NOW);
        store = new InMemoryWorkflowStore(clock.now);
    });

    afterEach(() => {
        jest.restoreAllMocks();
    });

    describe('with queued dispatch', () => {
        let jobs: InMemoryJobQueue;
        let service: ProactiveWorkflowService;

        beforeEach(() => {
            jobs = new InMemoryJobQueue(clock.now);
            service = new ProactiveWorkflowService(store, store.stepStore, new QueueDispatcher(jobs), { now: clock.now });
        });

        it('persists the generated steps and enqueues a run', async () => {
            const started = await service.start('follow_up_email', 'user-1', { contact_email: 'dana@example.com' });

            expect(started.workflow_id).toMatch(/^wf_[0-9a-f-]{36}$/);
            expect(started.status).toBe(workflowStatus.PENDING);
            expect(started.message).toBe('Workflow started with 4 steps');

            const wf = store.get(started.workflow_id);
            expect(wf.name).toBe('Follow up with dana@example.com');
            expect(wf.description).toBe('Looks up past correspondence, drafts and sends a follow-up, logs it in the CRM');
            expect(wf.max_retries).toBe(2);
            expect(wf.input_data.user_request).toBe('Send a follow-up e-mail to dana@example.com');
            expect(store.stepsOf(started.workflow_id)).toHaveLength(4);

            expect(jobs.ofKind(jobKind.RUN_WORKFLOW).map((j) => j.workflow_id)).toEqual([started.workflow_id]);
        });

        it('uses a caller-supplied name', async () => {
            const started = await service.start('follow_up_email', 'user-1', { contact_email: 'dana@example.com' }, 'Ping Dana');
            expect(store.get(started.workflow_id).name).toBe('Ping Dana');
        });

        it('rejects invalid template input without storing anything', async () => {
            await expect(service.start('follow_up_email', 'user-1', {})).rejects.toThrow(TemplateInputError);
            expect(store.workflows.size).toBe(0);
            expect(jobs.jobs).toHaveLength(0);
        });

        it('enqueues a resume for a waiting workflow', async () => {
            const started = await service.start('schedule_appointment', 'user-1', { contact_name: 'Dana Reyes' });
            store.patch(started.workflow_id, { status: workflowStatus.WAITING });

            const res = await service.continueFromResponse(started.workflow_id, 'user-1', { body: 'Tuesday' });

            expect(res).toEqual({ status: workflowStatus.WAITING, message: 'Response accepted, workflow will resume' });
            const [resume] = jobs.ofKind(jobKind.RESUME_WORKFLOW);
            expect(resume?.payload).toEqual({ response_data: { body: 'Tuesday' } });
        });

        it('refuses a response when the workflow is not waiting', async () => {
            const started = await service.start('schedule_appointment', 'user-1', { contact_name: 'Dana Reyes' });

            const res = await service.continueFromResponse(started.workflow_id, 'user-1', { body: 'Tuesday' });

            expect(res).toEqual({ status: workflowStatus.PENDING, message: 'Workflow is pending, not waiting for a response' });
            expect(jobs.ofKind(jobKind.RESUME_WORKFLOW)).toHaveLength(0);
        });

        it('hides other users\' workflows', async () => {
            const started = await service.start('follow_up_email', 'user-1', { contact_email: 'dana@example.com' });

            await expect(service.getStatus(started.workflow_id, 'user-2')).rejects.toThrow(WorkflowNotFoundError);
            await expect(service.continueFromResponse(started.workflow_id, 'user-2', {})).rejects.toThrow(
                `Workflow ${started.workflow_id} not found`,
            );
            await expect(service.cancel(started.workflow_id, 'user-2')).rejects.toThrow(WorkflowNotFoundError);
        });

        it('lists a user\'s workflows newest first with an optional filter', async () => {
            const a = await service.start('follow_up_email', 'user-1', { contact_email: 'a@example.com' });
            const b = await service.start('follow_up_email', 'user-1', { contact_email: 'b@example.com' });
            await service.start('follow_up_email', 'user-2', { contact_email: 'c@example.com' });
            store.patch(a.workflow_id, { status: workflowStatus.COMPLETED });

            expect((await service.list('user-1')).map((w) => w.id)).toEqual([b.workflow_id, a.workflow_id]);
            expect((await service.list('user-1', workflowStatus.COMPLETED)).map((w) => w.id)).toEqual([a.workflow_id]);
            expect(await service.list('user-1', undefined, 1)).toHaveLength(1);
        });

        it('clamps the list limit', async () => {
            const spy = jest.spyOn(store, 'listForUser');

            await service.list('user-1', undefined, 500);
            await service.list('user-1', undefined, -3);
            await service.list('user-1', undefined, 0);

            expect(spy.mock.calls.map(([, opts]) => opts.limit)).toEqual([100, 1, 20]);
        });

        it('cancels once', async () => {
            const started = await service.start('follow_up_email', 'user-1', { contact_email: 'dana@example.com' });

            expect(await service.cancel(started.workflow_id, 'user-1')).toEqual({
                status: workflowStatus.CANCELLED,
                cancelled: true,
                message: 'Workflow cancelled',
            });
            expect(await service.cancel(started.workflow_id, 'user-1')).toEqual({
                status: workflowStatus.CANCELLED,
                cancelled: false,
                message: 'Workflow is already cancelled',
            });
        });
    });

    describe('with inline dispatch', () => {
        let service: ProactiveWorkflowService;

        beforeEach(() => {
            const driver = new ExecutionDriver(store, store.stepStore, fakeCollaborators(), { now: clock.now });
            service = new ProactiveWorkflowService(store, store.stepStore, new InlineDispatcher(driver), { now: clock.now });
        });

        it('runs a scheduling workflow until it waits, then resumes it to completion', async () => {
            const started = await service.start('schedule_appointment', 'user-1', { contact_name: 'Dana Reyes' });
            expect(started.status).toBe(workflowStatus.WAITING);
            expect(started.message).toBe('Workflow started with 8 steps');

            const view = await service.getStatus(started.workflow_id, 'user-1');
            expect(view.status).toBe(workflowStatus.WAITING);
            expect(view.timeout_at).toEqual(new Date('2024-07-02T09:00:00.000Z'));
            expect(view.steps.map((s) => s.status)).toEqual([
                stepStatus.COMPLETED,
                stepStatus.COMPLETED,
                stepStatus.COMPLETED,
                stepStatus.COMPLETED,
                stepStatus.RUNNING,
                stepStatus.PENDING,
                stepStatus.PENDING,
                stepStatus.PENDING,
            ]);
            expect(view.steps[4]?.name).toBe('Wait for reply');

            const res = await service.continueFromResponse(started.workflow_id, 'user-1', { body: 'Tuesday 10am works' });
            expect(res.status).toBe(workflowStatus.COMPLETED);
            expect(res.message).toBe('Workflow resumed');
            expect(res.result?.stepsExecuted).toBe(3);

            const again = await service.continueFromResponse(started.workflow_id, 'user-1', { body: 'late' });
            expect(again).toEqual({
                status: workflowStatus.COMPLETED,
                message: 'Workflow is completed, not waiting for a response',
            });
        });

        it('settles the wait step when a waiting workflow is cancelled', async () => {
            const started = await service.start('schedule_appointment', 'user-1', { contact_name: 'Dana Reyes' });

            const res = await service.cancel(started.workflow_id, 'user-1');

            expect(res.cancelled).toBe(true);
            const view = await service.getStatus(started.workflow_id, 'user-1');
            expect(view.status).toBe(workflowStatus.CANCELLED);
            expect(view.timeout_at).toBeNull();
            expect(view.steps.map((s) => s.status)).toEqual([
                stepStatus.COMPLETED,
                stepStatus.COMPLETED,
                stepStatus.COMPLETED,
                stepStatus.COMPLETED,
                stepStatus.FAILED,
                stepStatus.PENDING,
                stepStatus.PENDING,
                stepStatus.PENDING,
            ]);
            expect(view.steps[4]?.error_message).toBe('cancelled while waiting for response');
            expect(view.steps[4]?.completed_at).toEqual(NOW);
        });

        it('reports a cancel of a finished workflow as a no-op', async () => {
            const started = await service.start('follow_up_email', 'user-1', { contact_email: 'dana@example.com' });
            expect(started.status).toBe(workflowStatus.COMPLETED);

            expect(await service.cancel(started.workflow_id, 'user-1')).toEqual({
                status: workflowStatus.COMPLETED,
                cancelled: false,
                message: 'Workflow is already completed',
            });
        });
    });

    describe('with a worker draining the queue', () => {
        let jobs: InMemoryJobQueue;
        let services: FakeCollaborators;
        let heartbeat: HeartbeatService;
        let runner: JobRunner;
        let service: ProactiveWorkflowService;

        const SELECTION = { time_selection: '2024-07-08T10:00:00Z' };

        async function drain(): Promise<void> {
            for (;;) {
                const batch = await jobs.dequeue(10, 'worker-a');
                if (batch.length === 0) return;
                for (const job of batch) await runner.run(job);
            }
        }

        beforeEach(() => {
            jobs = new InMemoryJobQueue(clock.now);
            services = fakeCollaborators();
            services.tools.on('check_calendar_slot', () => ({ success: true, result: { available: false } }));
            heartbeat = new HeartbeatService(60_000);
            const driver = new ExecutionDriver(store, store.stepStore, services, { now: clock.now });
            const sendReminder = jest.fn<Promise<ReminderOutcome>, [ReminderRequest]>()
                .mockResolvedValue({ delivered: false, reason: 'unused' });
            runner = new JobRunner(driver, store, jobs, heartbeat, { sendReminder });
            service = new ProactiveWorkflowService(store, store.stepStore, new QueueDispatcher(jobs), { now: clock.now });
        });

        afterEach(() => {
            heartbeat.stopAll();
        });

        it('lets a duplicate reply answer only the wait it was sent for', async () => {
            const { workflow_id: id } = await service.start('schedule_appointment', 'user-1', { contact_name: 'Dana Reyes' });
            await drain();
            expect(store.get(id).status).toBe(workflowStatus.WAITING);

            services.decisions.queueDecision({
                narrative: 'Checking the slot.',
                tool_calls: [{ id: 'c1', name: 'check_calendar_slot', arguments: { start: '2024-07-08T10:00:00Z' } }],
            });
            const first = await service.continueFromResponse(id, 'user-1', SELECTION);
            const second = await service.continueFromResponse(id, 'user-1', SELECTION);
            expect(first.message).toBe('Response accepted, workflow will resume');
            expect(second.message).toBe('Response accepted, workflow will resume');
            expect(jobs.ofKind(jobKind.RESUME_WORKFLOW).map((j) => j.payload)).toEqual([
                { response_data: SELECTION, awaiting_step: 5 },
                { response_data: SELECTION, awaiting_step: 5 },
            ]);

            await drain();

            const wf = store.get(id);
            expect(wf.status).toBe(workflowStatus.WAITING);
            expect(wf.context.slot_available).toBe(false);
            expect(wf.context.response_history).toEqual([{ ...SELECTION, received_at: NOW.toISOString() }]);
            expect(store.stepsOf(id).map((s) => s.status)).toEqual([
                stepStatus.COMPLETED,
                stepStatus.COMPLETED,
                stepStatus.COMPLETED,
                stepStatus.COMPLETED,
                stepStatus.COMPLETED,
                stepStatus.COMPLETED,
                stepStatus.RUNNING,
                stepStatus.PENDING,
            ]);
            expect(jobs.ofKind(jobKind.RESUME_WORKFLOW).map((j) => j.status)).toEqual([jobStatus.COMPLETED, jobStatus.COMPLETED]);
        });

        it('accepts a fresh reply for the negotiation wait', async () => {
            const { workflow_id: id } = await service.start('schedule_appointment', 'user-1', { contact_name: 'Dana Reyes' });
            await drain();
            services.decisions.queueDecision({
                narrative: 'Checking the slot.',
                tool_calls: [{ id: 'c1', name: 'check_calendar_slot', arguments: {} }],
            });
            await service.continueFromResponse(id, 'user-1', SELECTION);
            await drain();

            await service.continueFromResponse(id, 'user-1', { body: 'Wednesday 2pm then' });
            expect(jobs.ofKind(jobKind.RESUME_WORKFLOW)[1]?.payload).toEqual({
                response_data: { body: 'Wednesday 2pm then' },
                awaiting_step: 7,
            });
            await drain();

            const wf = store.get(id);
            expect(wf.status).toBe(workflowStatus.COMPLETED);
            expect(wf.context.response_history).toEqual([
                { ...SELECTION, received_at: NOW.toISOString() },
                { body: 'Wednesday 2pm then', received_at: NOW.toISOString() },
            ]);
        });
    });
});
