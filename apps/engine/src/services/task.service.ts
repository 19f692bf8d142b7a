import { v7 as uuid } from 'uuid';
import { z } from 'zod';
import { CheckerRegistry, ConfigurationError, decodePayload } from '@vigil/sdk';
import { ExecutionEntity } from '../db/execution.entity';
import { FREQUENCIES, TaskDefinitionEntity } from '../db/task-definition.entity';
import { EnqueueFailedError, NotFoundError, TaskInactiveError, ValidationError } from '../errors/api.errors';
import {
    CredentialStore,
    ExecutionCursor,
    ExecutionStore,
    TaskDefinitionPatch,
    TaskDefinitionStore,
    WorkQueue,
} from '../repositories/types';
import { decodeCursor, encodeCursor } from '../utils/cursor';

const TAG = '[tasks]';

const DEFAULT_PAGE_SIZE = 50;
const MAX_PAGE_SIZE = 500;

const nameSchema = z.string().regex(/^[a-z0-9_-]+$/).max(64);

const createSchema = z.object({
    name: z.string().trim().min(1).max(200),
    description: z.string().max(2000).nullable().default(null),
    serviceCategory: nameSchema,
    operation: nameSchema,
    config: z.record(z.unknown()).default({}),
    frequency: z.enum(FREQUENCIES),
    isActive: z.boolean().default(true),
    credentialId: z.string().uuid().nullable().default(null),
});

const updateSchema = z
    .object({
        name: z.string().trim().min(1).max(200),
        description: z.string().max(2000).nullable(),
        serviceCategory: nameSchema,
        operation: nameSchema,
        config: z.record(z.unknown()),
        frequency: z.enum(FREQUENCIES),
        isActive: z.boolean(),
        credentialId: z.string().uuid().nullable(),
    })
    .partial();

const pageSchema = z.object({
    pageSize: z.number().int().min(1).max(MAX_PAGE_SIZE).default(DEFAULT_PAGE_SIZE),
    cursor: z.string().min(1).optional(),
});

export type CreateTaskDefinitionInput = z.input<typeof createSchema>;
export type UpdateTaskDefinitionInput = z.input<typeof updateSchema>;
export type PageInput = z.input<typeof pageSchema>;

export interface ExecutionPage {
    items: ExecutionEntity[];
    nextCursor: string | null;
}

export interface ExecutionResultView {
    executionId: string;
    producedAt: Date;
    output: unknown;
}

function issuesOf(err: ConfigurationError): Array<{ path: string; message: string }> {
    const issues = err.detail.issues;
    if (!Array.isArray(issues)) return [];
    return issues.flatMap((issue: unknown) =>
        typeof issue === 'object' && issue !== null && 'path' in issue && 'message' in issue
            ? [{ path: String(issue.path), message: String(issue.message) }]
            : [],
    );
}

/**
 * Tenant-facing operations: task definition CRUD, manual triggers and
 * execution history. Every call is scoped to the calling tenant; rows of
 * other tenants read as not found.
 */
export class TaskService {
    constructor(
        private readonly tasks: TaskDefinitionStore,
        private readonly executions: ExecutionStore,
        private readonly queue: WorkQueue,
        private readonly credentials: CredentialStore,
        private readonly registry: CheckerRegistry,
    ) { }

    async createTaskDefinition(tenantId: string, input: CreateTaskDefinitionInput): Promise<TaskDefinitionEntity> {
        const parsed = createSchema.safeParse(input);
        if (!parsed.success) throw ValidationError.fromZod('Invalid task definition', parsed.error.issues);
        const data = parsed.data;

        this.assertRunnable(data.serviceCategory, data.operation, data.config);
        await this.assertCredential(tenantId, data.credentialId);

        const task = await this.tasks.create({
            id: uuid(),
            tenant_id: tenantId,
            name: data.name,
            description: data.description,
            service_category: data.serviceCategory,
            operation: data.operation,
            config: data.config,
            frequency: data.frequency,
            is_active: data.isActive,
            credential_id: data.credentialId,
        });
        console.log(`${TAG} created task ${task.id} (${task.service_category}:${task.operation}, ${task.frequency})`);
        return task;
    }

    async getTaskDefinition(tenantId: string, taskId: string): Promise<TaskDefinitionEntity> {
        const task = await this.tasks.findForTenant(tenantId, taskId);
        if (!task) throw new NotFoundError('Task definition', taskId);
        return task;
    }

    async updateTaskDefinition(tenantId: string, taskId: string, input: UpdateTaskDefinitionInput): Promise<TaskDefinitionEntity> {
        const parsed = updateSchema.safeParse(input);
        if (!parsed.success) throw ValidationError.fromZod('Invalid task definition', parsed.error.issues);
        const data = parsed.data;

        const current = await this.getTaskDefinition(tenantId, taskId);
        if (data.serviceCategory !== undefined || data.operation !== undefined || data.config !== undefined) {
            this.assertRunnable(
                data.serviceCategory ?? current.service_category,
                data.operation ?? current.operation,
                data.config ?? current.config,
            );
        }
        if (data.credentialId !== undefined) await this.assertCredential(tenantId, data.credentialId);

        const patch: TaskDefinitionPatch = {
            name: data.name,
            description: data.description,
            service_category: data.serviceCategory,
            operation: data.operation,
            config: data.config,
            frequency: data.frequency,
            is_active: data.isActive,
            credential_id: data.credentialId,
        };
        const updated = await this.tasks.update(tenantId, taskId, patch);
        if (!updated) throw new NotFoundError('Task definition', taskId);
        return updated;
    }

    /** Soft delete: the task never runs again and its executions drop out of view. */
    async deleteTaskDefinition(tenantId: string, taskId: string): Promise<void> {
        const deleted = await this.tasks.softDelete(tenantId, taskId);
        if (!deleted) throw new NotFoundError('Task definition', taskId);
        console.log(`${TAG} deleted task ${taskId}`);
    }

    /**
     * Queues an out-of-band execution and returns its id. The lease is not
     * taken here: a manual run that collides with a running one fails with
     * ConcurrencyConflict when a worker picks it up.
     */
    async triggerExecution(tenantId: string, taskId: string): Promise<string> {
        const task = await this.getTaskDefinition(tenantId, taskId);
        if (!task.is_active) throw new TaskInactiveError(taskId);

        const executionId = uuid();
        const result = await this.queue.enqueue({ executionId, taskId, tenantId, trigger: 'manual' });
        if (!result.ok) throw new EnqueueFailedError(taskId, result.error);

        console.log(`${TAG} manual execution ${executionId} queued for task ${taskId}`);
        return executionId;
    }

    async getExecution(tenantId: string, executionId: string): Promise<ExecutionEntity> {
        const execution = await this.executions.findForTenant(tenantId, executionId);
        if (!execution) throw new NotFoundError('Execution', executionId);
        return execution;
    }

    /** The decoded checker output, or null while the execution has none. */
    async getExecutionResult(tenantId: string, executionId: string): Promise<ExecutionResultView | null> {
        await this.getExecution(tenantId, executionId);
        const result = await this.executions.findResult(executionId);
        if (!result) return null;
        return {
            executionId,
            producedAt: result.produced_at,
            output: decodePayload<unknown>(result.payload),
        };
    }

    async listExecutionsPage(tenantId: string, taskId: string, input: PageInput = {}): Promise<ExecutionPage> {
        const parsed = pageSchema.safeParse(input);
        if (!parsed.success) throw ValidationError.fromZod('Invalid page request', parsed.error.issues);

        await this.getTaskDefinition(tenantId, taskId);
        const before = parsed.data.cursor ? decodeCursor(parsed.data.cursor) : undefined;
        return this.fetchPage(taskId, parsed.data.pageSize, before);
    }

    /**
     * Newest first, fetched a page at a time as the caller iterates.
     * Pass a cursor from `listExecutionsPage` to resume part way through.
     */
    async *listExecutions(tenantId: string, taskId: string, input: PageInput = {}): AsyncGenerator<ExecutionEntity> {
        let page = await this.listExecutionsPage(tenantId, taskId, input);
        const pageSize = input.pageSize ?? DEFAULT_PAGE_SIZE;

        while (true) {
            yield* page.items;
            if (!page.nextCursor) return;
            page = await this.fetchPage(taskId, pageSize, decodeCursor(page.nextCursor));
        }
    }

    /** Running executions the reconciler flagged because their lease died. */
    async listStaleExecutions(tenantId: string): Promise<ExecutionEntity[]> {
        return this.executions.listStale(tenantId);
    }

    private async fetchPage(taskId: string, pageSize: number, before?: ExecutionCursor): Promise<ExecutionPage> {
        // one extra row tells whether another page exists
        const rows = await this.executions.listByTask(taskId, pageSize + 1, before);
        const items = rows.slice(0, pageSize);
        const last = items[items.length - 1];
        const nextCursor = rows.length > pageSize && last ? encodeCursor({ queuedAt: last.queued_at, id: last.id }) : null;
        return { items, nextCursor };
    }

    private assertRunnable(category: string, operation: string, config: Record<string, unknown>): void {
        const checker = this.registry.get(category, operation);
        if (!checker) {
            throw new ValidationError(`Unsupported operation ${CheckerRegistry.key(category, operation)}`);
        }
        try {
            checker.validateConfig(config);
        } catch (err) {
            if (err instanceof ConfigurationError) throw new ValidationError(err.message, issuesOf(err));
            throw err;
        }
    }

    private async assertCredential(tenantId: string, credentialId: string | null): Promise<void> {
        if (credentialId === null) return;
        const credential = await this.credentials.findForTenant(tenantId, credentialId);
        if (!credential) throw new NotFoundError('Credential', credentialId);
    }
}
