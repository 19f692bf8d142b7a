import type { Redis } from 'ioredis';
import { TerminalStatus } from '../db/execution.entity';

const TAG = '[notifier]';

export interface ExecutionNotification {
    tenantId: string;
    executionId: string;
    status: TerminalStatus;
}

/** Delivers an execution's terminal status to its tenant. */
export interface Notifier {
    notify(tenantId: string, executionId: string, status: TerminalStatus): Promise<void>;
}

/** Publishes on a Redis channel; the tenant-facing layer subscribes. */
export class RedisNotifier implements Notifier {
    constructor(
        private readonly redis: Pick<Redis, 'publish'>,
        private readonly channel: string,
    ) { }

    async notify(tenantId: string, executionId: string, status: TerminalStatus): Promise<void> {
        const message: ExecutionNotification = { tenantId, executionId, status };
        await this.redis.publish(this.channel, JSON.stringify(message));
    }
}

export class LogNotifier implements Notifier {
    async notify(tenantId: string, executionId: string, status: TerminalStatus): Promise<void> {
        console.log(`${TAG} tenant ${tenantId}: execution ${executionId} ${status}`);
    }
}

/**
 * Fire-and-forget: the execution's terminal state is already committed, so
 * a delivery failure is logged and nothing is rolled back or retried.
 */
export function notifyInBackground(notifier: Notifier, tenantId: string, executionId: string, status: TerminalStatus): void {
    notifier
        .notify(tenantId, executionId, status)
        .catch((err) => console.error(`${TAG} failed to notify tenant ${tenantId} about ${executionId}:`, err));
}
