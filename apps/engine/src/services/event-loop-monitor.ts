import { monitorEventLoopDelay } from 'perf_hooks';

const TAG = '[backpressure]';

export class EventLoopMonitor {
    private monitor: ReturnType<typeof monitorEventLoopDelay>;

    constructor(resolution: number = 10) {
        this.monitor = monitorEventLoopDelay({ resolution });
        this.monitor.enable();
    }

    get lag(): number {
        return this.monitor.percentile(99) / 1000000;
    }

    disable(): void {
        this.monitor.disable();
    }
}

export interface BackpressureLimits {
    maxQueueSize: number;
    maxEventLoopLag: number;
}

/** True while the checker queue or the event-loop lag is over its limit. */
export function createBackpressureCheck(
    queueSize: () => number,
    lag: () => number,
    limits: BackpressureLimits,
): () => boolean {
    return () => {
        const size = queueSize();
        if (size >= limits.maxQueueSize) {
            console.warn(`${TAG} checker queue ${size} >= ${limits.maxQueueSize}`);
            return true;
        }
        const currentLag = lag();
        if (currentLag >= limits.maxEventLoopLag) {
            console.warn(`${TAG} event loop lag ${currentLag.toFixed(2)}ms >= ${limits.maxEventLoopLag}ms`);
            return true;
        }
        return false;
    };
}
