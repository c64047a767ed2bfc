import type { EngineJobEntity } from '../db/engine_job.entity';
import type { JobSource } from '../repositories/types';

const TAG = '[poller]';

export interface PollerConfig {
    workerId: string;
    onJobReceived: (job: EngineJobEntity) => Promise<void>;
    batchSize?: number;
    checkBackpressure?: () => boolean;
}

export class Poller {
    private interval = 100;
    private readonly minInterval = 100;
    private readonly maxInterval = 500;
    private readonly backpressureDelay = 1000;
    private readonly batchSize: number;
    private running = false;
    private currentTimeout: NodeJS.Timeout | null = null;
    private readonly workerId: string;
    private readonly onJobReceived: (job: EngineJobEntity) => Promise<void>;
    private readonly checkBackpressure?: () => boolean;

    constructor(
        private readonly source: JobSource,
        config: PollerConfig,
    ) {
        this.workerId = config.workerId;
        this.onJobReceived = config.onJobReceived;
        this.batchSize = config.batchSize || 10;
        this.checkBackpressure = config.checkBackpressure;
    }

    get currentInterval(): number {
        return this.interval;
    }

    start(): void {
        if (this.running) {
            console.warn(`${TAG} already running`);
            return;
        }
        this.running = true;
        console.log(`${TAG} started (worker: ${this.workerId})`);
        void this.poll();
    }

    async stop(): Promise<void> {
        this.running = false;
        if (this.currentTimeout) {
            clearTimeout(this.currentTimeout);
            this.currentTimeout = null;
        }
        console.log(`${TAG} stopped`);
    }

    /** One dequeue round; returns how many jobs were handed off. */
    async pollOnce(): Promise<number> {
        if (this.checkBackpressure && this.checkBackpressure()) {
            console.warn(`${TAG} backpressure detected, skipping poll`);
            return -1;
        }

        try {
            const jobs = await this.source.dequeue(this.batchSize, this.workerId);

            if (jobs.length > 0) {
                this.interval = this.minInterval;
                for (const job of jobs) {
                    this.onJobReceived(job).catch(
                        err => console.error(`${TAG} job ${job.id} callback error:`, err),
                    );
                }
            } else {
                // 100 -> 200 -> 400 -> 500ms cap
                this.interval = Math.min(this.interval * 2, this.maxInterval);
            }
            return jobs.length;
        } catch (err) {
            console.error(`${TAG} dequeue error:`, err);
            this.interval = this.maxInterval;
            return 0;
        }
    }

    private async poll(): Promise<void> {
        if (!this.running) return;

        const handed = await this.pollOnce();
        const delay = handed < 0 ? this.backpressureDelay : this.interval;

        if (this.running) {
            this.currentTimeout = setTimeout(() => void this.poll(), delay);
        }
    }
}
