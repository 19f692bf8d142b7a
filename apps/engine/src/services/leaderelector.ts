import type { Redis } from 'ioredis';

const TAG = '[leader]';

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
    key: string;
    ttlSeconds: number;
    holderId?: string;
}

export class LeaderElector {
    readonly holderId: string;
    private readonly key: string;
    private readonly ttlSeconds: number;
    private renewalInterval: NodeJS.Timeout | null = null;

    constructor(
        private readonly redis: Pick<Redis, 'set' | 'get' | 'eval'>,
        options: LeaderElectorOptions,
    ) {
        this.key = options.key;
        this.ttlSeconds = options.ttlSeconds;
        this.holderId = options.holderId ?? `instance-${process.pid}-${Date.now()}`;
    }

    async tryBecomeLeader(): Promise<boolean> {
        // SET NX with TTL is atomic
        const result = await this.redis.set(this.key, this.holderId, 'EX', this.ttlSeconds, 'NX');

        if (result === 'OK') {
            this.startRenewal();
            return true;
        }

        // still ours from an earlier election
        const currentLeader = await this.redis.get(this.key);
        return currentLeader === this.holderId;
    }

    async releaseLeadership(): Promise<void> {
        this.stopRenewal();
        await this.redis.eval(RELEASE_SCRIPT, 1, this.key, this.holderId);
    }

    async isLeader(): Promise<boolean> {
        const currentLeader = await this.redis.get(this.key);
        return currentLeader === this.holderId;
    }

    private startRenewal(): void {
        if (this.renewalInterval) return;
        const renewalMs = (this.ttlSeconds * 1000) / 2;

        this.renewalInterval = setInterval(() => {
            this.renewLock()
                .then((stillLeader) => {
                    if (!stillLeader) {
                        console.warn(`${TAG} lost leadership of ${this.key}`);
                        this.stopRenewal();
                    }
                })
                .catch((err) => console.error(`${TAG} lock renewal failed:`, err));
        }, renewalMs);
    }

    private stopRenewal(): void {
        if (this.renewalInterval) {
            clearInterval(this.renewalInterval);
            this.renewalInterval = null;
        }
    }

    private async renewLock(): Promise<boolean> {
        const result = await this.redis.eval(RENEW_SCRIPT, 1, this.key, this.holderId, this.ttlSeconds);
        return result === 1;
    }
}
