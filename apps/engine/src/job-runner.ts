import type { ReminderDispatch } from '@proactive/sdk';
import { EngineJobEntity, jobKind } from './db/engine_job.entity';
import { workflowStatus } from './db/workflow.entity';
import type { DriverResult, ExecutionDriver } from './engine/driver';
import { toRecord } from './engine/context';
import type { JobLifecycle, WorkflowStore } from './repositories/types';
import { HeartbeatService } from './services/heartbeat.service';
import { BackoffPolicy, DEFAULT_BACKOFF, calculateBackOff } from './utils/backoff';

const TAG = '[engine]';

/** Lease id for every pass a job drives; stable across its retries. */
export function runnerIdFor(job: EngineJobEntity): string {
    return `job-${job.id}`;
}

export class JobRunner {
    constructor(
        private readonly driver: ExecutionDriver,
        private readonly workflows: WorkflowStore,
        private readonly jobs: JobLifecycle,
        private readonly heartbeat: HeartbeatService,
        private readonly reminders: ReminderDispatch,
        private readonly backoff: BackoffPolicy = DEFAULT_BACKOFF,
    ) { }

    async run(job: EngineJobEntity): Promise<void> {
        const runnerId = runnerIdFor(job);
        console.log(`${TAG} processing job ${job.id} (${job.kind} ${job.workflow_id}, attempt ${job.attempt})`);

        this.heartbeat.start(job.id, async () => {
            await this.jobs.updateHeartbeat(job.id);
            await this.workflows.heartbeat(job.workflow_id, runnerId);
        });

        try {
            await this.dispatch(job, runnerId);
            await this.jobs.complete(job.id);
            console.log(`${TAG} completed job ${job.id}`);
        } catch (err) {
            await this.handleFailure(job, err);
        } finally {
            this.heartbeat.stop(job.id);
        }
    }

    private async dispatch(job: EngineJobEntity, runnerId: string): Promise<void> {
        switch (job.kind) {
            case jobKind.RUN_WORKFLOW:
                this.logResult(await this.driver.runWorkflow(job.workflow_id, runnerId));
                return;
            case jobKind.RESUME_WORKFLOW:
                this.logResult(await this.resume(job, runnerId));
                return;
            case jobKind.SEND_REMINDER:
                await this.sendReminder(job);
                return;
        }
    }

    // A retried resume may find its own earlier claim; carry on from there.
    private async resume(job: EngineJobEntity, runnerId: string): Promise<DriverResult> {
        if (job.attempt > 1) {
            const current = await this.workflows.findById(job.workflow_id);
            if (current?.status === workflowStatus.RUNNING && current.runner_id === runnerId) {
                return this.driver.runWorkflow(job.workflow_id, runnerId);
            }
        }
        const awaiting = job.payload.awaiting_step;
        return this.driver.resumeWorkflow(
            job.workflow_id,
            toRecord(job.payload.response_data),
            runnerId,
            typeof awaiting === 'number' ? awaiting : undefined,
        );
    }

    private async sendReminder(job: EngineJobEntity): Promise<void> {
        const workflow = await this.workflows.findById(job.workflow_id);
        if (!workflow || workflow.status !== workflowStatus.WAITING) {
            console.warn(`${TAG} reminder for ${job.workflow_id} skipped (status: ${workflow?.status ?? 'missing'})`);
            return;
        }

        await this.reminders.sendReminder({
            workflowId: workflow.id,
            userId: workflow.user_id,
            attempt: workflow.retry_count,
            context: workflow.context,
        });
    }

    private async handleFailure(job: EngineJobEntity, err: unknown): Promise<void> {
        if (job.attempt <= job.max_retries) {
            const delay = calculateBackOff(job.attempt, this.backoff);
            console.warn(`${TAG} job ${job.id} failed, retry in ${delay}ms:`, err);
            await this.jobs.scheduleRetry(job.id, delay, err);
            return;
        }

        console.error(`${TAG} job ${job.id} failed after ${job.attempt} attempts:`, err);
        await this.jobs.fail(job.id, err);
    }

    private logResult(result: DriverResult): void {
        console.log(`${TAG} ${result.workflowId} → ${result.status ?? 'missing'} (${result.stepsExecuted} steps${result.noop ? ', no-op' : ''})`);
    }
}
