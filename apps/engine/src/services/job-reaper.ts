import type { ReapedJob, StaleJobRecovery } from '../repositories/types';
import type { LockClient } from './leaderelector';
import { PeriodicJob } from './periodic-job';

export interface JobReaperOptions {
    intervalMs?: number;
    staleSeconds?: number;
    leaderTtlSeconds?: number;
    workerId?: string;
}

// Recovers jobs from dead workers. A requeued job keeps its id, so the next
// pass re-enters the workflow under the same lease.
export class JobReaper extends PeriodicJob<ReapedJob> {
    protected readonly tag = '[job-reaper]';
    private readonly staleSeconds: number;

    constructor(
        private readonly jobs: StaleJobRecovery,
        redis: LockClient,
        opts: JobReaperOptions = {},
    ) {
        super(redis, {
            intervalMs: opts.intervalMs ?? 10_000,
            leaderKey: 'proactive:job-reaper:leader',
            leaderTtlSeconds: opts.leaderTtlSeconds,
            workerId: opts.workerId,
        });
        this.staleSeconds = opts.staleSeconds ?? 300;
    }

    protected async execute(): Promise<ReapedJob[]> {
        const reaped = await this.jobs.requeueStale(this.staleSeconds);
        if (reaped.length > 0) {
            console.log(`${this.tag} reaped ${reaped.length} jobs: ${reaped.map(j => `${j.id}(${j.action})`).join(', ')}`);
        }
        return reaped;
    }
}
