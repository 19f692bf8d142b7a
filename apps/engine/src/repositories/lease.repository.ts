import type { Queryable } from '../db';
import { executionStatus } from '../db/execution.entity';
import { LeaseEntity } from '../db/lease.entity';
import { LeaseStore, OrphanedExecution } from './types';

/**
 * Takes the lease when the task has none, when the current one has expired,
 * or when it already belongs to the same execution (scheduler → worker hand-off).
 * Returns no row when another execution holds a live lease.
 * $1 task_id, $2 execution_id, $3 holder, $4 ttl in ms
 */
export const ACQUIRE_LEASE_SQL = `
    INSERT INTO task_leases (task_id, execution_id, holder, acquired_at, expires_at)
    VALUES ($1, $2, $3, NOW(), NOW() + ($4 || ' milliseconds')::INTERVAL)
    ON CONFLICT (task_id) DO UPDATE
    SET execution_id = EXCLUDED.execution_id,
        holder = EXCLUDED.holder,
        acquired_at = EXCLUDED.acquired_at,
        expires_at = EXCLUDED.expires_at
    WHERE task_leases.expires_at <= NOW()
       OR task_leases.execution_id = EXCLUDED.execution_id
    RETURNING *
`;

export const RELEASE_LEASE_SQL = 'DELETE FROM task_leases WHERE task_id = $1 AND execution_id = $2';

export class LeaseRepository implements LeaseStore {
    constructor(private readonly pool: Queryable) { }

    async acquire(taskId: string, executionId: string, holder: string, ttlMs: number): Promise<LeaseEntity | null> {
        const res = await this.pool.query<LeaseEntity>(ACQUIRE_LEASE_SQL, [taskId, executionId, holder, ttlMs]);
        return res.rows[0] ?? null;
    }

    async release(taskId: string, executionId: string): Promise<boolean> {
        const res = await this.pool.query(RELEASE_LEASE_SQL, [taskId, executionId]);
        return (res.rowCount ?? 0) > 0;
    }

    async findByTask(taskId: string): Promise<LeaseEntity | null> {
        const res = await this.pool.query<LeaseEntity>('SELECT * FROM task_leases WHERE task_id = $1', [taskId]);
        return res.rows[0] ?? null;
    }

    async flagOrphans(): Promise<OrphanedExecution[]> {
        // A running execution with no live lease lost its worker. It stays
        // running; the stale flag makes it visible to operators.
        const res = await this.pool.query<OrphanedExecution>(
            `WITH orphans AS (
                UPDATE executions e
                SET stale_at = NOW()
                WHERE e.status = $1
                  AND e.stale_at IS NULL
                  AND NOT EXISTS (
                      SELECT 1 FROM task_leases l
                      WHERE l.execution_id = e.id AND l.expires_at > NOW()
                  )
                RETURNING e.id AS execution_id, e.task_id, e.tenant_id, e.stale_at
            ),
            dropped AS (
                DELETE FROM task_leases l
                USING orphans o
                WHERE l.execution_id = o.execution_id
            )
            SELECT * FROM orphans`,
            [executionStatus.RUNNING],
        );
        return res.rows;
    }

    async purgeExpired(): Promise<number> {
        const res = await this.pool.query('DELETE FROM task_leases WHERE expires_at <= NOW()');
        return res.rowCount ?? 0;
    }
}
