import type { ConnectionPool } from '../db';
import { TransactionManager } from '../db/transaction.manager';
import { ExecutionEntity, executionStatus } from '../db/execution.entity';
import { ExecutionRequestEntity } from '../db/execution-request.entity';
import { EnqueueResult, NewExecutionRequest, WorkQueue } from './types';

const TAG = '[queue]';

/**
 * Postgres-backed work queue. Delivery is at-least-once: a claim is only a
 * visibility window, and a request whose window lapses without an ack is
 * claimable again.
 */
export class QueueRepository implements WorkQueue {
    private readonly tx: TransactionManager;

    constructor(private readonly pool: ConnectionPool) {
        this.tx = new TransactionManager(pool);
    }

    async enqueue(request: NewExecutionRequest): Promise<EnqueueResult> {
        try {
            return await this.tx.run(async (client) => {
                const execution = await client.query<ExecutionEntity>(
                    `INSERT INTO executions (id, task_id, tenant_id, trigger, status, queued_at)
                     VALUES ($1, $2, $3, $4, $5, NOW())
                     RETURNING *`,
                    [request.executionId, request.taskId, request.tenantId, request.trigger, executionStatus.QUEUED],
                );
                const queued = await client.query<ExecutionRequestEntity>(
                    `INSERT INTO execution_queue (execution_id, task_id, tenant_id, trigger, enqueued_at)
                     VALUES ($1, $2, $3, $4, NOW())
                     RETURNING *`,
                    [request.executionId, request.taskId, request.tenantId, request.trigger],
                );
                if (request.triggeredAt) {
                    await client.query('UPDATE task_definitions SET last_triggered_at = $1 WHERE id = $2', [
                        request.triggeredAt,
                        request.taskId,
                    ]);
                }
                return { ok: true, execution: execution.rows[0], request: queued.rows[0] } as const;
            });
        } catch (error) {
            console.error(`${TAG} enqueue failed for task ${request.taskId}:`, error);
            return { ok: false, error };
        }
    }

    async claim(batchSize: number, workerId: string, visibilityMs: number): Promise<ExecutionRequestEntity[]> {
        const query = `
            WITH next_requests AS (
                SELECT id FROM execution_queue
                WHERE claimed_until IS NULL OR claimed_until < NOW()
                ORDER BY enqueued_at ASC, id ASC
                LIMIT $1
                FOR UPDATE SKIP LOCKED
            )
            UPDATE execution_queue
            SET
                claimed_by = $2,
                claimed_until = NOW() + ($3 || ' milliseconds')::INTERVAL,
                delivery_count = execution_queue.delivery_count + 1
            FROM next_requests
            WHERE execution_queue.id = next_requests.id
            RETURNING execution_queue.*
        `;
        const res = await this.pool.query<ExecutionRequestEntity>(query, [batchSize, workerId, visibilityMs]);
        return res.rows;
    }

    async ack(requestId: string): Promise<void> {
        await this.pool.query('DELETE FROM execution_queue WHERE id = $1', [requestId]);
    }

    async depth(): Promise<number> {
        const res = await this.pool.query<{ depth: number }>('SELECT COUNT(*)::int AS depth FROM execution_queue');
        return res.rows[0]?.depth ?? 0;
    }
}
