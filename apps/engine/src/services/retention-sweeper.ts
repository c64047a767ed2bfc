import type { WorkflowStore } from '../repositories/types';
import type { LockClient } from './leaderelector';
import { PeriodicJob } from './periodic-job';

export interface FinishedJobPurger {
    purgeFinished(retentionDays: number): Promise<number>;
}

export interface RetentionSweeperOptions {
    intervalMs?: number;
    retentionDays?: number;
    leaderTtlSeconds?: number;
    workerId?: string;
}

export class RetentionSweeper extends PeriodicJob<string> {
    protected readonly tag = '[retention-sweeper]';
    private readonly retentionDays: number;

    constructor(
        private readonly workflows: WorkflowStore,
        private readonly jobs: FinishedJobPurger,
        redis: LockClient,
        opts: RetentionSweeperOptions = {},
    ) {
        super(redis, {
            intervalMs: opts.intervalMs ?? 3_600_000,
            leaderKey: 'proactive:retention-sweeper:leader',
            leaderTtlSeconds: opts.leaderTtlSeconds,
            workerId: opts.workerId,
        });
        this.retentionDays = opts.retentionDays ?? 30;
    }

    /** Returns the ids of the purged workflows. */
    protected async execute(): Promise<string[]> {
        const purged = await this.workflows.purgeTerminal(this.retentionDays);
        const jobs = await this.jobs.purgeFinished(this.retentionDays);

        if (purged.length > 0 || jobs > 0) {
            console.log(`${this.tag} purged ${purged.length} workflows and ${jobs} jobs older than ${this.retentionDays} days`);
        }
        return purged;
    }
}
