import { ExecutionRequestEntity } from '../db/execution-request.entity';
import { WorkQueue } from '../repositories/types';

const TAG = '[poller]';

export interface PollerConfig {
    workerId: string;
    onRequestReceived: (request: ExecutionRequestEntity) => Promise<unknown>;
    visibilityMs: number;
    batchSize?: number;
    maxConcurrent?: number;
    checkBackpressure?: () => boolean;
}

export class Poller {
    private interval = 100;
    private readonly minInterval = 100;
    private readonly maxInterval = 500;
    private readonly batchSize: number;
    private readonly maxConcurrent: number;
    private readonly visibilityMs: number;
    private running = false;
    private inFlight = 0;
    private currentTimeout: NodeJS.Timeout | null = null;
    private readonly workerId: string;
    private readonly onRequestReceived: (request: ExecutionRequestEntity) => Promise<unknown>;
    private readonly checkBackpressure?: () => boolean;

    constructor(
        private readonly queue: WorkQueue,
        config: PollerConfig,
    ) {
        this.workerId = config.workerId;
        this.onRequestReceived = config.onRequestReceived;
        this.visibilityMs = config.visibilityMs;
        this.batchSize = config.batchSize ?? 10;
        this.maxConcurrent = config.maxConcurrent ?? this.batchSize;
        this.checkBackpressure = config.checkBackpressure;
    }

    get activeCount(): number {
        return this.inFlight;
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

    /** One claim round; returns how many requests were handed out. */
    async pollOnce(): Promise<number> {
        const capacity = Math.min(this.batchSize, this.maxConcurrent - this.inFlight);
        if (capacity <= 0) return 0;

        const requests = await this.queue.claim(capacity, this.workerId, this.visibilityMs);
        for (const request of requests) {
            this.inFlight++;
            this.onRequestReceived(request)
                .catch((err) => console.error(`${TAG} request ${request.id} callback error:`, err))
                .finally(() => {
                    this.inFlight--;
                });
        }
        return requests.length;
    }

    private async poll(): Promise<void> {
        if (!this.running) return;

        if (this.checkBackpressure && this.checkBackpressure()) {
            console.warn(`${TAG} backpressure detected, skipping poll`);
            this.schedule(1000);
            return;
        }

        try {
            const claimed = await this.pollOnce();
            if (claimed > 0) {
                this.interval = this.minInterval;
            } else {
                // backoff: 100 -> 200 -> 400 -> 500ms cap
                this.interval = Math.min(this.interval * 2, this.maxInterval);
            }
        } catch (err) {
            console.error(`${TAG} claim error:`, err);
            this.interval = this.maxInterval;
        }

        this.schedule(this.interval);
    }

    private schedule(delayMs: number): void {
        if (!this.running) return;
        this.currentTimeout = setTimeout(() => void this.poll(), delayMs);
    }
}
