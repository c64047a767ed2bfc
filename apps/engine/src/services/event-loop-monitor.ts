import { monitorEventLoopDelay } from 'perf_hooks';

export class EventLoopMonitor {
    private monitor: ReturnType<typeof monitorEventLoopDelay>;

    constructor(resolution: number = 10) {
        this.monitor = monitorEventLoopDelay({ resolution });
        this.monitor.enable();
    }

    /** p99 delay in ms */
    get lag(): number {
        return this.monitor.percentile(99) / 1_000_000;
    }

    isLagging(maxLagMs: number): boolean {
        return this.lag > maxLagMs;
    }

    disable(): void {
        this.monitor.disable();
    }
}
