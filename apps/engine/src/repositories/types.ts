import type { CredentialEntity } from '../db/credential.entity';
import type {
    ExecutionEntity,
    ExecutionFailure,
    ExecutionResultEntity,
    TriggerReason,
} from '../db/execution.entity';
import type { ExecutionRequestEntity } from '../db/execution-request.entity';
import type { LeaseEntity } from '../db/lease.entity';
import type { Frequency, TaskDefinitionEntity } from '../db/task-definition.entity';
import type { EncodedPayload, SecretScope } from '@vigil/sdk';

// Seams between the engine services and Postgres. The pg repositories are
// the production implementations; tests run the services against fakes.

export interface NewTaskDefinition {
    id: string;
    tenant_id: string;
    name: string;
    description: string | null;
    service_category: string;
    operation: string;
    config: Record<string, unknown>;
    frequency: Frequency;
    is_active: boolean;
    credential_id: string | null;
}

export type TaskDefinitionPatch = Partial<
    Pick<
        TaskDefinitionEntity,
        'name' | 'description' | 'service_category' | 'operation' | 'config' | 'frequency' | 'is_active' | 'credential_id'
    >
>;

export interface TaskDefinitionStore {
    create(task: NewTaskDefinition): Promise<TaskDefinitionEntity>;
    /** Live (not deleted) task by id, regardless of tenant. */
    findById(taskId: string): Promise<TaskDefinitionEntity | null>;
    findForTenant(tenantId: string, taskId: string): Promise<TaskDefinitionEntity | null>;
    update(tenantId: string, taskId: string, patch: TaskDefinitionPatch): Promise<TaskDefinitionEntity | null>;
    /** Soft delete; also drops the credential binding. */
    softDelete(tenantId: string, taskId: string): Promise<boolean>;
    /** Active, live tasks whose frequency is time based. */
    findSchedulable(): Promise<TaskDefinitionEntity[]>;
}

export interface NewExecutionRequest {
    executionId: string;
    taskId: string;
    tenantId: string;
    trigger: TriggerReason;
    /** Set by the scheduler: stamps the task's last_triggered_at in the same transaction. */
    triggeredAt?: Date;
}

export type EnqueueResult =
    | { ok: true; execution: ExecutionEntity; request: ExecutionRequestEntity }
    | { ok: false; error: unknown };

export interface WorkQueue {
    /** Creates the queued execution and its queue row together. */
    enqueue(request: NewExecutionRequest): Promise<EnqueueResult>;
    /** Claims unclaimed or visibility-expired requests for one worker. */
    claim(batchSize: number, workerId: string, visibilityMs: number): Promise<ExecutionRequestEntity[]>;
    ack(requestId: string): Promise<void>;
    depth(): Promise<number>;
}

export type StartOutcome =
    | { started: true; execution: ExecutionEntity; lease: LeaseEntity }
    | { started: false; reason: 'lease_held'; lease: LeaseEntity | null }
    | { started: false; reason: 'not_queued'; execution: ExecutionEntity | null };

export interface ExecutionCursor {
    queuedAt: Date;
    id: string;
}

export interface ExecutionStore {
    findById(executionId: string): Promise<ExecutionEntity | null>;
    findForTenant(tenantId: string, executionId: string): Promise<ExecutionEntity | null>;
    /** Acquires the task lease and moves the execution from queued to running, atomically. */
    start(executionId: string, taskId: string, holder: string, leaseTtlMs: number): Promise<StartOutcome>;
    /** Writes the result, marks the execution succeeded and drops its lease, atomically. */
    succeed(executionId: string, payload: EncodedPayload): Promise<ExecutionEntity>;
    /** Records the failure, marks the execution failed and drops its lease, atomically. */
    fail(executionId: string, failure: ExecutionFailure): Promise<ExecutionEntity>;
    findResult(executionId: string): Promise<ExecutionResultEntity | null>;
    /** Newest first; `before` continues after the last row of a previous page. */
    listByTask(taskId: string, limit: number, before?: ExecutionCursor): Promise<ExecutionEntity[]>;
    listStale(tenantId: string): Promise<ExecutionEntity[]>;
}

export interface OrphanedExecution {
    execution_id: string;
    task_id: string;
    tenant_id: string;
    stale_at: Date;
}

export interface LeaseStore {
    /** Succeeds when the task has no live lease, or the live lease is this execution's. */
    acquire(taskId: string, executionId: string, holder: string, ttlMs: number): Promise<LeaseEntity | null>;
    release(taskId: string, executionId: string): Promise<boolean>;
    findByTask(taskId: string): Promise<LeaseEntity | null>;
    /** Flags running executions whose lease is gone or expired, and drops those leases. */
    flagOrphans(): Promise<OrphanedExecution[]>;
    purgeExpired(): Promise<number>;
}

export interface NewCredential {
    id: string;
    tenant_id: string;
    name: string;
    encrypted_secret: string;
    scope: SecretScope;
    is_default: boolean;
}

export interface CredentialStore {
    create(credential: NewCredential): Promise<CredentialEntity>;
    findForTenant(tenantId: string, credentialId: string): Promise<CredentialEntity | null>;
    findDefault(tenantId: string): Promise<CredentialEntity | null>;
    setDefault(tenantId: string, credentialId: string): Promise<boolean>;
    /** Ids of live task definitions bound to the credential. */
    findReferencingTasks(tenantId: string, credentialId: string): Promise<string[]>;
    /** Rejects with CredentialInUseError while a live task references it. */
    delete(tenantId: string, credentialId: string): Promise<boolean>;
    /** Rebinds every live task from one credential to another; returns how many moved. */
    reassign(tenantId: string, fromCredentialId: string, toCredentialId: string | null): Promise<number>;
}
