import { jobKind } from '../db/engine_job.entity';
import type { JobQueue, WorkflowStore } from '../repositories/types';
import type { LockClient } from './leaderelector';
import { PeriodicJob } from './periodic-job';

export const TIMEOUT_ERROR_MESSAGE = 'timed out waiting for response';

export interface TimedOutWorkflow {
    id: string;
    action: 'reminded' | 'failed';
    retry_count: number;
}

export interface TimeoutMonitorOptions {
    intervalMs?: number;
    extensionHours?: number;
    leaderTtlSeconds?: number;
    workerId?: string;
}

// Waiting workflows past their deadline get a reminder and a new deadline
// until the budget runs out, then fail. Step rows are never touched.
export class TimeoutMonitor extends PeriodicJob<TimedOutWorkflow> {
    protected readonly tag = '[timeout-monitor]';
    private readonly extensionHours: number;

    constructor(
        private readonly workflows: WorkflowStore,
        private readonly jobs: JobQueue,
        redis: LockClient,
        opts: TimeoutMonitorOptions = {},
    ) {
        super(redis, {
            intervalMs: opts.intervalMs ?? 300_000,
            leaderKey: 'proactive:timeout-monitor:leader',
            leaderTtlSeconds: opts.leaderTtlSeconds,
            workerId: opts.workerId,
        });
        this.extensionHours = opts.extensionHours ?? 24;
    }

    protected async execute(): Promise<TimedOutWorkflow[]> {
        const handled: TimedOutWorkflow[] = [];

        const reminded = await this.workflows.remindExpired(this.extensionHours);
        for (const wf of reminded) {
            try {
                await this.jobs.enqueue(jobKind.SEND_REMINDER, wf.id, { payload: { retry_count: wf.retry_count } });
            } catch (err) {
                // Deadline already moved; the reminder is lost but the budget still counts.
                console.error(`${this.tag} could not queue reminder for ${wf.id}:`, err);
            }
            handled.push({ id: wf.id, action: 'reminded', retry_count: wf.retry_count });
        }

        const failed = await this.workflows.failExpired(TIMEOUT_ERROR_MESSAGE);
        for (const wf of failed) {
            handled.push({ id: wf.id, action: 'failed', retry_count: wf.retry_count });
        }

        if (handled.length > 0) {
            console.log(`${this.tag} handled ${handled.length} workflows: ${handled.map(w => `${w.id}(${w.action})`).join(', ')}`);
        }
        return handled;
    }
}
