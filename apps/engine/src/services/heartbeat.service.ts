const TAG = '[heartbeat]';

export type Beat = () => Promise<void>;

/**
 * Keeps leases alive while work is in flight: one interval per key,
 * each refreshing whatever rows that key owns (job row, workflow lease).
 */
export class HeartbeatService {
    private readonly intervalMs: number;
    private readonly handles = new Map<string, NodeJS.Timeout>();

    constructor(intervalMs: number = 5000) {
        this.intervalMs = intervalMs;
    }

    start(key: string, beat: Beat): void {
        if (this.handles.has(key)) {
            console.warn(`${TAG} already running for ${key}, restarting`);
            this.stop(key);
        }

        console.log(`${TAG} started for ${key} (interval: ${this.intervalMs}ms)`);
        void this.tick(key, beat);
        this.handles.set(key, setInterval(() => void this.tick(key, beat), this.intervalMs));
    }

    stop(key: string): void {
        const handle = this.handles.get(key);
        if (!handle) return;
        clearInterval(handle);
        this.handles.delete(key);
        console.log(`${TAG} stopped for ${key}`);
    }

    stopAll(): void {
        for (const key of Array.from(this.handles.keys())) {
            this.stop(key);
        }
    }

    isRunning(key: string): boolean {
        return this.handles.has(key);
    }

    get activeCount(): number {
        return this.handles.size;
    }

    private async tick(key: string, beat: Beat): Promise<void> {
        try {
            await beat();
        } catch (err) {
            console.error(`${TAG} failed to update for ${key}:`, err);
        }
    }
}
