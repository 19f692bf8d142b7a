import { PoolClient } from 'pg';
import type { ConnectionPool } from '../db';
import type { EncodedPayload } from '@vigil/sdk';
import { TransactionManager } from '../db/transaction.manager';
import {
    ExecutionEntity,
    ExecutionFailure,
    ExecutionResultEntity,
    executionStatus,
} from '../db/execution.entity';
import { LeaseEntity } from '../db/lease.entity';
import { ACQUIRE_LEASE_SQL } from './lease.repository';
import { ExecutionCursor, ExecutionStore, StartOutcome } from './types';

export class InvalidTransitionError extends Error {
    constructor(executionId: string, from: string | undefined, to: executionStatus) {
        super(`Execution ${executionId} cannot move from ${from ?? 'missing'} to ${to}`);
        this.name = 'InvalidTransitionError';
    }
}

export class ExecutionRepository implements ExecutionStore {
    private readonly tx: TransactionManager;

    constructor(private readonly pool: ConnectionPool) {
        this.tx = new TransactionManager(pool);
    }

    async findById(executionId: string): Promise<ExecutionEntity | null> {
        const res = await this.pool.query<ExecutionEntity>('SELECT * FROM executions WHERE id = $1', [executionId]);
        return res.rows[0] ?? null;
    }

    async findForTenant(tenantId: string, executionId: string): Promise<ExecutionEntity | null> {
        const res = await this.pool.query<ExecutionEntity>(
            `SELECT e.* FROM executions e
             JOIN task_definitions t ON t.id = e.task_id
             WHERE e.id = $1 AND e.tenant_id = $2 AND t.deleted_at IS NULL`,
            [executionId, tenantId],
        );
        return res.rows[0] ?? null;
    }

    async start(executionId: string, taskId: string, holder: string, leaseTtlMs: number): Promise<StartOutcome> {
        return this.tx.run(async (client) => {
            // Row lock first: two deliveries of the same request serialize here.
            const current = await client.query<ExecutionEntity>(
                'SELECT * FROM executions WHERE id = $1 FOR UPDATE',
                [executionId],
            );
            const execution = current.rows[0];
            if (!execution || execution.status !== executionStatus.QUEUED) {
                return { started: false, reason: 'not_queued', execution: execution ?? null } as const;
            }

            const acquired = await client.query<LeaseEntity>(ACQUIRE_LEASE_SQL, [taskId, executionId, holder, leaseTtlMs]);
            const lease = acquired.rows[0];
            if (!lease) {
                const held = await client.query<LeaseEntity>('SELECT * FROM task_leases WHERE task_id = $1', [taskId]);
                return { started: false, reason: 'lease_held', lease: held.rows[0] ?? null } as const;
            }

            const updated = await client.query<ExecutionEntity>(
                `UPDATE executions
                 SET status = $1, started_at = NOW(), worker_id = $2
                 WHERE id = $3
                 RETURNING *`,
                [executionStatus.RUNNING, holder, executionId],
            );
            return { started: true, execution: updated.rows[0], lease } as const;
        });
    }

    async succeed(executionId: string, payload: EncodedPayload): Promise<ExecutionEntity> {
        return this.tx.run(async (client) => {
            const updated = await this.finish(client, executionId, executionStatus.SUCCEEDED, [executionStatus.RUNNING], null);
            await client.query(
                'INSERT INTO execution_results (execution_id, payload, produced_at) VALUES ($1, $2, NOW())',
                [executionId, JSON.stringify(payload)],
            );
            await client.query('DELETE FROM task_leases WHERE execution_id = $1', [executionId]);
            return updated;
        });
    }

    async fail(executionId: string, failure: ExecutionFailure): Promise<ExecutionEntity> {
        return this.tx.run(async (client) => {
            const updated = await this.finish(
                client,
                executionId,
                executionStatus.FAILED,
                [executionStatus.QUEUED, executionStatus.RUNNING],
                failure,
            );
            await client.query('DELETE FROM task_leases WHERE execution_id = $1', [executionId]);
            return updated;
        });
    }

    async findResult(executionId: string): Promise<ExecutionResultEntity | null> {
        const res = await this.pool.query<ExecutionResultEntity>(
            'SELECT * FROM execution_results WHERE execution_id = $1',
            [executionId],
        );
        return res.rows[0] ?? null;
    }

    async listByTask(taskId: string, limit: number, before?: ExecutionCursor): Promise<ExecutionEntity[]> {
        if (!before) {
            const res = await this.pool.query<ExecutionEntity>(
                'SELECT * FROM executions WHERE task_id = $1 ORDER BY queued_at DESC, id DESC LIMIT $2',
                [taskId, limit],
            );
            return res.rows;
        }

        const res = await this.pool.query<ExecutionEntity>(
            `SELECT * FROM executions
             WHERE task_id = $1 AND (queued_at, id) < ($2, $3)
             ORDER BY queued_at DESC, id DESC
             LIMIT $4`,
            [taskId, before.queuedAt, before.id, limit],
        );
        return res.rows;
    }

    async listStale(tenantId: string): Promise<ExecutionEntity[]> {
        const res = await this.pool.query<ExecutionEntity>(
            `SELECT * FROM executions
             WHERE tenant_id = $1 AND status = $2 AND stale_at IS NOT NULL
             ORDER BY stale_at DESC`,
            [tenantId, executionStatus.RUNNING],
        );
        return res.rows;
    }

    // Terminal states are final: the WHERE clause only matches allowed origins.
    private async finish(
        client: PoolClient,
        executionId: string,
        to: executionStatus.SUCCEEDED | executionStatus.FAILED,
        from: executionStatus[],
        failure: ExecutionFailure | null,
    ): Promise<ExecutionEntity> {
        const res = await client.query<ExecutionEntity>(
            `UPDATE executions
             SET status = $1, finished_at = NOW(), error_classification = $2, error_detail = $3
             WHERE id = $4 AND status = ANY($5::text[])
             RETURNING *`,
            [to, failure?.classification ?? null, failure ? JSON.stringify(failure.detail) : null, executionId, from],
        );

        const updated = res.rows[0];
        if (!updated) {
            const current = await client.query<ExecutionEntity>('SELECT status FROM executions WHERE id = $1', [executionId]);
            throw new InvalidTransitionError(executionId, current.rows[0]?.status, to);
        }
        return updated;
    }
}
