import type { Queryable } from '../db';
import { TaskDefinitionEntity } from '../db/task-definition.entity';
import { NewTaskDefinition, TaskDefinitionPatch, TaskDefinitionStore } from './types';

// Columns a tenant may change through updateTaskDefinition.
const PATCHABLE_COLUMNS = [
    'name',
    'description',
    'service_category',
    'operation',
    'config',
    'frequency',
    'is_active',
    'credential_id',
] as const;

export class TaskDefinitionRepository implements TaskDefinitionStore {
    constructor(private readonly pool: Queryable) { }

    async create(task: NewTaskDefinition): Promise<TaskDefinitionEntity> {
        const res = await this.pool.query<TaskDefinitionEntity>(
            `INSERT INTO task_definitions
                (id, tenant_id, name, description, service_category, operation, config, frequency, is_active, credential_id)
             VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10)
             RETURNING *`,
            [
                task.id,
                task.tenant_id,
                task.name,
                task.description,
                task.service_category,
                task.operation,
                JSON.stringify(task.config),
                task.frequency,
                task.is_active,
                task.credential_id,
            ],
        );
        return res.rows[0];
    }

    async findById(taskId: string): Promise<TaskDefinitionEntity | null> {
        const res = await this.pool.query<TaskDefinitionEntity>(
            'SELECT * FROM task_definitions WHERE id = $1 AND deleted_at IS NULL',
            [taskId],
        );
        return res.rows[0] ?? null;
    }

    async findForTenant(tenantId: string, taskId: string): Promise<TaskDefinitionEntity | null> {
        const res = await this.pool.query<TaskDefinitionEntity>(
            'SELECT * FROM task_definitions WHERE id = $1 AND tenant_id = $2 AND deleted_at IS NULL',
            [taskId, tenantId],
        );
        return res.rows[0] ?? null;
    }

    async update(tenantId: string, taskId: string, patch: TaskDefinitionPatch): Promise<TaskDefinitionEntity | null> {
        const sets: string[] = [];
        const values: unknown[] = [taskId, tenantId];

        for (const column of PATCHABLE_COLUMNS) {
            const value = patch[column];
            if (value === undefined) continue;
            values.push(column === 'config' ? JSON.stringify(value) : value);
            sets.push(`${column} = $${values.length}`);
        }

        if (sets.length === 0) return this.findForTenant(tenantId, taskId);

        const res = await this.pool.query<TaskDefinitionEntity>(
            `UPDATE task_definitions
             SET ${sets.join(', ')}, updated_at = NOW()
             WHERE id = $1 AND tenant_id = $2 AND deleted_at IS NULL
             RETURNING *`,
            values,
        );
        return res.rows[0] ?? null;
    }

    async softDelete(tenantId: string, taskId: string): Promise<boolean> {
        const res = await this.pool.query(
            `UPDATE task_definitions
             SET deleted_at = NOW(), is_active = FALSE, credential_id = NULL, updated_at = NOW()
             WHERE id = $1 AND tenant_id = $2 AND deleted_at IS NULL`,
            [taskId, tenantId],
        );
        return (res.rowCount ?? 0) > 0;
    }

    async findSchedulable(): Promise<TaskDefinitionEntity[]> {
        const res = await this.pool.query<TaskDefinitionEntity>(
            `SELECT * FROM task_definitions
             WHERE is_active AND deleted_at IS NULL AND frequency <> 'on_demand'
             ORDER BY COALESCE(last_triggered_at, created_at) ASC`,
        );
        return res.rows;
    }
}
