/** The slice of an ioredis client the lock needs. */
export interface LockClient {
    set(key: string, value: string, expiryMode: 'EX', time: number, setMode: 'NX'): Promise<'OK' | null>;
    get(key: string): Promise<string | null>;
    eval(script: string, numkeys: number, ...args: (string | number)[]): Promise<unknown>;
}

const RELEASE_SCRIPT = `
    if redis.call("get", KEYS[1]) == ARGV[1] then
        return redis.call("del", KEYS[1])
    else
        return 0
    end
`;

const RENEW_SCRIPT = `
    if redis.call("get", KEYS[1]) == ARGV[1] then
        return redis.call("expire", KEYS[1], ARGV[2])
    else
        return 0
    end
`;

export interface LeaderElectorOptions {
    /** Redis key of the lock; one per periodic job. */
    key: string;
    ttlSeconds?: number;
    workerId?: string;
}

export class LeaderElector {
    private readonly key: string;
    private readonly ttlSeconds: number;
    private readonly workerId: string;
    private renewalInterval: NodeJS.Timeout | null = null;

    constructor(
        private redis: LockClient,
        opts: LeaderElectorOptions
    ) {
        this.key = opts.key;
        this.ttlSeconds = opts.ttlSeconds ?? 30;
        this.workerId = opts.workerId || `worker-${process.pid}-${Date.now()}`;
    }

    get lockKey(): string {
        return this.key;
    }

    async tryBecomeLeader(): Promise<boolean> {
        // SET NX with TTL - atomic
        const result = await this.redis.set(this.key, this.workerId, 'EX', this.ttlSeconds, 'NX');

        if (result === 'OK') {
            this.startRenewal();
            return true;
        }

        // Already ours (previous win, or re-election after restart)
        const currentLeader = await this.redis.get(this.key);
        if (currentLeader === this.workerId) {
            this.startRenewal();
            return true;
        }
        return false;
    }

    async releaseLeadership(): Promise<void> {
        this.stopRenewal();
        await this.redis.eval(RELEASE_SCRIPT, 1, this.key, this.workerId);
    }

    async isLeader(): Promise<boolean> {
        const currentLeader = await this.redis.get(this.key);
        return currentLeader === this.workerId;
    }

    private startRenewal(): void {
        if (this.renewalInterval) return;

        // Renew at half the TTL
        const renewalMs = (this.ttlSeconds * 1000) / 2;

        this.renewalInterval = setInterval(() => {
            this.renewLock()
                .then((stillLeader) => {
                    if (!stillLeader) this.stopRenewal();
                })
                .catch((error: unknown) => console.error(`[leader] renewal of ${this.key} failed:`, error));
        }, renewalMs);
    }

    private stopRenewal(): void {
        if (this.renewalInterval) {
            clearInterval(this.renewalInterval);
            this.renewalInterval = null;
        }
    }

    private async renewLock(): Promise<boolean> {
        const result = await this.redis.eval(RENEW_SCRIPT, 1, this.key, this.workerId, this.ttlSeconds);
        return result === 1;
    }
}
