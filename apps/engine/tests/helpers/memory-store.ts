import type { EncodedPayload } from '@vigil/sdk';
import { CredentialEntity } from '../../src/db/credential.entity';
import {
    ExecutionEntity,
    ExecutionFailure,
    ExecutionResultEntity,
    executionStatus,
} from '../../src/db/execution.entity';
import { ExecutionRequestEntity } from '../../src/db/execution-request.entity';
import { LeaseEntity } from '../../src/db/lease.entity';
import { TaskDefinitionEntity } from '../../src/db/task-definition.entity';
import { CredentialInUseError } from '../../src/errors/api.errors';
import { InvalidTransitionError } from '../../src/repositories/execution.repository';
import {
    CredentialStore,
    EnqueueResult,
    ExecutionCursor,
    ExecutionStore,
    LeaseStore,
    NewCredential,
    NewExecutionRequest,
    NewTaskDefinition,
    OrphanedExecution,
    StartOutcome,
    TaskDefinitionPatch,
    TaskDefinitionStore,
    WorkQueue,
} from '../../src/repositories/types';

// In-process stand-ins for the Postgres repositories. Same contracts, one
// shared state object, and a clock the test moves by hand.

export class FakeClock {
    private current: number;

    constructor(start = '2026-01-01T00:00:00.000Z') {
        this.current = new Date(start).getTime();
    }

    now = (): Date => new Date(this.current);

    advance(ms: number): void {
        this.current += ms;
    }
}

export class MemoryState {
    readonly tasks = new Map<string, TaskDefinitionEntity>();
    readonly executions = new Map<string, ExecutionEntity>();
    readonly results = new Map<string, ExecutionResultEntity>();
    readonly leases = new Map<string, LeaseEntity>();
    readonly queue = new Map<string, ExecutionRequestEntity>();
    readonly credentials = new Map<string, CredentialEntity>();
    nextRequestId = 1;

    constructor(readonly clock: FakeClock) { }

    now(): Date {
        return this.clock.now();
    }

    isLive(lease: LeaseEntity | undefined): lease is LeaseEntity {
        return lease !== undefined && lease.expires_at.getTime() > this.now().getTime();
    }
}

export class MemoryTaskStore implements TaskDefinitionStore {
    constructor(private readonly state: MemoryState) { }

    async create(task: NewTaskDefinition): Promise<TaskDefinitionEntity> {
        const now = this.state.now();
        const row: TaskDefinitionEntity = {
            ...task,
            last_triggered_at: null,
            created_at: now,
            updated_at: now,
            deleted_at: null,
        };
        this.state.tasks.set(row.id, row);
        return { ...row };
    }

    async findById(taskId: string): Promise<TaskDefinitionEntity | null> {
        const task = this.state.tasks.get(taskId);
        return task && !task.deleted_at ? { ...task } : null;
    }

    async findForTenant(tenantId: string, taskId: string): Promise<TaskDefinitionEntity | null> {
        const task = await this.findById(taskId);
        return task && task.tenant_id === tenantId ? task : null;
    }

    async update(tenantId: string, taskId: string, patch: TaskDefinitionPatch): Promise<TaskDefinitionEntity | null> {
        const task = this.state.tasks.get(taskId);
        if (!task || task.deleted_at || task.tenant_id !== tenantId) return null;

        const updated: TaskDefinitionEntity = {
            ...task,
            name: patch.name ?? task.name,
            description: patch.description !== undefined ? patch.description : task.description,
            service_category: patch.service_category ?? task.service_category,
            operation: patch.operation ?? task.operation,
            config: patch.config ?? task.config,
            frequency: patch.frequency ?? task.frequency,
            is_active: patch.is_active ?? task.is_active,
            credential_id: patch.credential_id !== undefined ? patch.credential_id : task.credential_id,
            updated_at: this.state.now(),
        };
        this.state.tasks.set(taskId, updated);
        return { ...updated };
    }

    async softDelete(tenantId: string, taskId: string): Promise<boolean> {
        const task = this.state.tasks.get(taskId);
        if (!task || task.deleted_at || task.tenant_id !== tenantId) return false;

        const now = this.state.now();
        this.state.tasks.set(taskId, { ...task, deleted_at: now, is_active: false, credential_id: null, updated_at: now });
        return true;
    }

    async findSchedulable(): Promise<TaskDefinitionEntity[]> {
        const anchor = (t: TaskDefinitionEntity) => (t.last_triggered_at ?? t.created_at).getTime();
        return [...this.state.tasks.values()]
            .filter((t) => t.is_active && !t.deleted_at && t.frequency !== 'on_demand')
            .sort((a, b) => anchor(a) - anchor(b))
            .map((t) => ({ ...t }));
    }
}

export class MemoryLeaseStore implements LeaseStore {
    constructor(private readonly state: MemoryState) { }

    async acquire(taskId: string, executionId: string, holder: string, ttlMs: number): Promise<LeaseEntity | null> {
        const current = this.state.leases.get(taskId);
        if (this.state.isLive(current) && current.execution_id !== executionId) return null;

        const now = this.state.now();
        const lease: LeaseEntity = {
            task_id: taskId,
            execution_id: executionId,
            holder,
            acquired_at: now,
            expires_at: new Date(now.getTime() + ttlMs),
        };
        this.state.leases.set(taskId, lease);
        return { ...lease };
    }

    async release(taskId: string, executionId: string): Promise<boolean> {
        const current = this.state.leases.get(taskId);
        if (!current || current.execution_id !== executionId) return false;
        this.state.leases.delete(taskId);
        return true;
    }

    async findByTask(taskId: string): Promise<LeaseEntity | null> {
        const lease = this.state.leases.get(taskId);
        return lease ? { ...lease } : null;
    }

    async flagOrphans(): Promise<OrphanedExecution[]> {
        const now = this.state.now();
        const orphans: OrphanedExecution[] = [];

        for (const execution of this.state.executions.values()) {
            if (execution.status !== executionStatus.RUNNING || execution.stale_at) continue;
            const lease = this.state.leases.get(execution.task_id);
            const held = this.state.isLive(lease) && lease.execution_id === execution.id;
            if (held) continue;

            this.state.executions.set(execution.id, { ...execution, stale_at: now });
            if (lease && lease.execution_id === execution.id) this.state.leases.delete(execution.task_id);
            orphans.push({
                execution_id: execution.id,
                task_id: execution.task_id,
                tenant_id: execution.tenant_id,
                stale_at: now,
            });
        }
        return orphans;
    }

    async purgeExpired(): Promise<number> {
        let purged = 0;
        for (const [taskId, lease] of this.state.leases) {
            if (!this.state.isLive(lease)) {
                this.state.leases.delete(taskId);
                purged++;
            }
        }
        return purged;
    }
}

export class MemoryQueue implements WorkQueue {
    constructor(private readonly state: MemoryState) { }

    async enqueue(request: NewExecutionRequest): Promise<EnqueueResult> {
        if (this.state.executions.has(request.executionId)) {
            return { ok: false, error: new Error(`duplicate execution id ${request.executionId}`) };
        }

        const now = this.state.now();
        const execution: ExecutionEntity = {
            id: request.executionId,
            task_id: request.taskId,
            tenant_id: request.tenantId,
            trigger: request.trigger,
            status: executionStatus.QUEUED,
            attempt: 1,
            worker_id: null,
            error_classification: null,
            error_detail: null,
            queued_at: now,
            started_at: null,
            finished_at: null,
            stale_at: null,
        };
        const queued: ExecutionRequestEntity = {
            id: String(this.state.nextRequestId++),
            execution_id: request.executionId,
            task_id: request.taskId,
            tenant_id: request.tenantId,
            trigger: request.trigger,
            enqueued_at: now,
            claimed_by: null,
            claimed_until: null,
            delivery_count: 0,
        };
        this.state.executions.set(execution.id, execution);
        this.state.queue.set(queued.id, queued);
        const task = this.state.tasks.get(request.taskId);
        if (request.triggeredAt && task) {
            this.state.tasks.set(task.id, { ...task, last_triggered_at: request.triggeredAt });
        }
        return { ok: true, execution: { ...execution }, request: { ...queued } };
    }

    async claim(batchSize: number, workerId: string, visibilityMs: number): Promise<ExecutionRequestEntity[]> {
        const now = this.state.now();
        const claimable = [...this.state.queue.values()]
            .filter((r) => !r.claimed_until || r.claimed_until.getTime() < now.getTime())
            .sort((a, b) => a.enqueued_at.getTime() - b.enqueued_at.getTime() || Number(a.id) - Number(b.id))
            .slice(0, batchSize);

        return claimable.map((request) => {
            const claimed: ExecutionRequestEntity = {
                ...request,
                claimed_by: workerId,
                claimed_until: new Date(now.getTime() + visibilityMs),
                delivery_count: request.delivery_count + 1,
            };
            this.state.queue.set(claimed.id, claimed);
            return { ...claimed };
        });
    }

    async ack(requestId: string): Promise<void> {
        this.state.queue.delete(requestId);
    }

    async depth(): Promise<number> {
        return this.state.queue.size;
    }
}

export class MemoryExecutionStore implements ExecutionStore {
    private readonly leases: MemoryLeaseStore;

    constructor(private readonly state: MemoryState) {
        this.leases = new MemoryLeaseStore(state);
    }

    async findById(executionId: string): Promise<ExecutionEntity | null> {
        const execution = this.state.executions.get(executionId);
        return execution ? { ...execution } : null;
    }

    async findForTenant(tenantId: string, executionId: string): Promise<ExecutionEntity | null> {
        const execution = this.state.executions.get(executionId);
        if (!execution || execution.tenant_id !== tenantId) return null;
        const task = this.state.tasks.get(execution.task_id);
        return task && !task.deleted_at ? { ...execution } : null;
    }

    async start(executionId: string, taskId: string, holder: string, leaseTtlMs: number): Promise<StartOutcome> {
        const execution = this.state.executions.get(executionId);
        if (!execution || execution.status !== executionStatus.QUEUED) {
            return { started: false, reason: 'not_queued', execution: execution ? { ...execution } : null };
        }

        const lease = await this.leases.acquire(taskId, executionId, holder, leaseTtlMs);
        if (!lease) {
            return { started: false, reason: 'lease_held', lease: await this.leases.findByTask(taskId) };
        }

        const running: ExecutionEntity = {
            ...execution,
            status: executionStatus.RUNNING,
            started_at: this.state.now(),
            worker_id: holder,
        };
        this.state.executions.set(executionId, running);
        return { started: true, execution: { ...running }, lease };
    }

    async succeed(executionId: string, payload: EncodedPayload): Promise<ExecutionEntity> {
        const updated = this.finish(executionId, executionStatus.SUCCEEDED, [executionStatus.RUNNING], null);
        this.state.results.set(executionId, { execution_id: executionId, payload, produced_at: this.state.now() });
        return updated;
    }

    async fail(executionId: string, failure: ExecutionFailure): Promise<ExecutionEntity> {
        return this.finish(executionId, executionStatus.FAILED, [executionStatus.QUEUED, executionStatus.RUNNING], failure);
    }

    async findResult(executionId: string): Promise<ExecutionResultEntity | null> {
        const result = this.state.results.get(executionId);
        return result ? { ...result } : null;
    }

    async listByTask(taskId: string, limit: number, before?: ExecutionCursor): Promise<ExecutionEntity[]> {
        const isBefore = (e: ExecutionEntity) =>
            !before ||
            e.queued_at.getTime() < before.queuedAt.getTime() ||
            (e.queued_at.getTime() === before.queuedAt.getTime() && e.id < before.id);

        return [...this.state.executions.values()]
            .filter((e) => e.task_id === taskId && isBefore(e))
            .sort((a, b) => b.queued_at.getTime() - a.queued_at.getTime() || (a.id < b.id ? 1 : a.id > b.id ? -1 : 0))
            .slice(0, limit)
            .map((e) => ({ ...e }));
    }

    async listStale(tenantId: string): Promise<ExecutionEntity[]> {
        return [...this.state.executions.values()]
            .filter((e) => e.tenant_id === tenantId && e.status === executionStatus.RUNNING && e.stale_at)
            .map((e) => ({ ...e }));
    }

    private finish(
        executionId: string,
        to: executionStatus.SUCCEEDED | executionStatus.FAILED,
        from: executionStatus[],
        failure: ExecutionFailure | null,
    ): ExecutionEntity {
        const execution = this.state.executions.get(executionId);
        if (!execution || !from.includes(execution.status)) {
            throw new InvalidTransitionError(executionId, execution?.status, to);
        }

        const finished: ExecutionEntity = {
            ...execution,
            status: to,
            finished_at: this.state.now(),
            error_classification: failure?.classification ?? null,
            error_detail: failure?.detail ?? null,
        };
        this.state.executions.set(executionId, finished);

        const lease = this.state.leases.get(execution.task_id);
        if (lease && lease.execution_id === executionId) this.state.leases.delete(execution.task_id);
        return { ...finished };
    }
}

export class MemoryCredentialStore implements CredentialStore {
    constructor(private readonly state: MemoryState) { }

    async create(credential: NewCredential): Promise<CredentialEntity> {
        if (credential.is_default) this.clearDefault(credential.tenant_id);
        const row: CredentialEntity = { ...credential, created_at: this.state.now() };
        this.state.credentials.set(row.id, row);
        return { ...row };
    }

    async findForTenant(tenantId: string, credentialId: string): Promise<CredentialEntity | null> {
        const credential = this.state.credentials.get(credentialId);
        return credential && credential.tenant_id === tenantId ? { ...credential } : null;
    }

    async findDefault(tenantId: string): Promise<CredentialEntity | null> {
        const credential = [...this.state.credentials.values()].find((c) => c.tenant_id === tenantId && c.is_default);
        return credential ? { ...credential } : null;
    }

    async setDefault(tenantId: string, credentialId: string): Promise<boolean> {
        const credential = this.state.credentials.get(credentialId);
        if (!credential || credential.tenant_id !== tenantId) return false;
        this.clearDefault(tenantId);
        this.state.credentials.set(credentialId, { ...credential, is_default: true });
        return true;
    }

    async findReferencingTasks(tenantId: string, credentialId: string): Promise<string[]> {
        return [...this.state.tasks.values()]
            .filter((t) => t.tenant_id === tenantId && !t.deleted_at && t.credential_id === credentialId)
            .map((t) => t.id);
    }

    async delete(tenantId: string, credentialId: string): Promise<boolean> {
        const credential = this.state.credentials.get(credentialId);
        if (!credential || credential.tenant_id !== tenantId) return false;

        const referencing = await this.findReferencingTasks(tenantId, credentialId);
        if (referencing.length > 0) throw new CredentialInUseError(credentialId, referencing);

        this.state.credentials.delete(credentialId);
        return true;
    }

    async reassign(tenantId: string, fromCredentialId: string, toCredentialId: string | null): Promise<number> {
        const ids = await this.findReferencingTasks(tenantId, fromCredentialId);
        for (const id of ids) {
            const task = this.state.tasks.get(id);
            if (task) this.state.tasks.set(id, { ...task, credential_id: toCredentialId, updated_at: this.state.now() });
        }
        return ids.length;
    }

    private clearDefault(tenantId: string): void {
        for (const [id, credential] of this.state.credentials) {
            if (credential.tenant_id === tenantId && credential.is_default) {
                this.state.credentials.set(id, { ...credential, is_default: false });
            }
        }
    }
}

export interface MemoryStores {
    clock: FakeClock;
    state: MemoryState;
    tasks: MemoryTaskStore;
    leases: MemoryLeaseStore;
    queue: MemoryQueue;
    executions: MemoryExecutionStore;
    credentials: MemoryCredentialStore;
}

export function createMemoryStores(clock = new FakeClock()): MemoryStores {
    const state = new MemoryState(clock);
    return {
        clock,
        state,
        tasks: new MemoryTaskStore(state),
        leases: new MemoryLeaseStore(state),
        queue: new MemoryQueue(state),
        executions: new MemoryExecutionStore(state),
        credentials: new MemoryCredentialStore(state),
    };
}
