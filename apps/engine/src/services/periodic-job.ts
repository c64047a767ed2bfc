import { LeaderElector, LockClient } from './leaderelector';

export interface PeriodicJobOptions {
    intervalMs: number;
    leaderKey: string;
    leaderTtlSeconds?: number;
    workerId?: string;
}

/**
 * Interval job that runs on one instance at a time via Redis leader
 * election. Leadership is re-checked on every tick, so a standby takes
 * over once the leader's lock expires. Overlapping ticks are skipped.
 */
export abstract class PeriodicJob<R> {
    protected abstract readonly tag: string;
    private readonly intervalMs: number;
    private readonly leaderElector: LeaderElector;
    private intervalHandle: NodeJS.Timeout | null = null;
    private running = false;
    private busy = false;

    constructor(redis: LockClient, opts: PeriodicJobOptions) {
        this.intervalMs = opts.intervalMs;
        this.leaderElector = new LeaderElector(redis, {
            key: opts.leaderKey,
            ttlSeconds: opts.leaderTtlSeconds,
            workerId: opts.workerId,
        });
    }

    /** One pass of the job's work. */
    protected abstract execute(): Promise<R[]>;

    start(): void {
        if (this.running) {
            console.warn(`${this.tag} already running`);
            return;
        }

        this.running = true;
        console.log(`${this.tag} started (interval: ${this.intervalMs}ms)`);

        // Fire immediately, then on schedule
        void this.tick();
        this.intervalHandle = setInterval(() => void this.tick(), this.intervalMs);
    }

    async stop(): Promise<void> {
        this.running = false;
        if (this.intervalHandle) {
            clearInterval(this.intervalHandle);
            this.intervalHandle = null;
        }
        await this.leaderElector.releaseLeadership();
        console.log(`${this.tag} stopped`);
    }

    isRunning(): boolean {
        return this.running;
    }

    /** Runs a pass now, unless one is already in flight. */
    async runOnce(): Promise<R[]> {
        if (this.busy) return [];
        this.busy = true;
        try {
            return await this.execute();
        } finally {
            this.busy = false;
        }
    }

    private async tick(): Promise<void> {
        try {
            const isLeader = await this.leaderElector.tryBecomeLeader();
            if (!isLeader) return;
            await this.runOnce();
        } catch (err) {
            console.error(`${this.tag} error during cycle:`, err);
        }
    }
}
