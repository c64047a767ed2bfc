import type { WorkflowActivity } from '../db/workflow.entity';
import type { WorkflowStore } from '../repositories/types';
import type { LockClient } from './leaderelector';
import { PeriodicJob } from './periodic-job';

export interface MetricsCollectorOptions {
    intervalMs?: number;
    windowHours?: number;
    leaderTtlSeconds?: number;
    workerId?: string;
}

/** Logs workflow counts per status and the last window's throughput. */
export class MetricsCollector extends PeriodicJob<WorkflowActivity> {
    protected readonly tag = '[metrics]';
    private readonly windowHours: number;
    private last: WorkflowActivity | null = null;

    constructor(
        private readonly workflows: Pick<WorkflowStore, 'activity'>,
        redis: LockClient,
        opts: MetricsCollectorOptions = {},
    ) {
        super(redis, {
            intervalMs: opts.intervalMs ?? 300_000,
            leaderKey: 'proactive:metrics:leader',
            leaderTtlSeconds: opts.leaderTtlSeconds,
            workerId: opts.workerId,
        });
        this.windowHours = opts.windowHours ?? 24;
    }

    /** Most recent snapshot taken on this instance. */
    get latest(): WorkflowActivity | null {
        return this.last;
    }

    protected async execute(): Promise<WorkflowActivity[]> {
        const activity = await this.workflows.activity(this.windowHours);
        this.last = activity;

        const counts = Object.entries(activity.by_status).map(([status, n]) => `${status}=${n}`).join(' ');
        console.log(
            `${this.tag} ${counts}; last ${activity.window_hours}h: ` +
            `${activity.created_recent} created, ${activity.completed_recent} completed`,
        );
        return [activity];
    }
}
