import {
    AuthenticationError,
    CheckerOutput,
    CheckerRegistry,
    ClassifiedError,
    ConcurrencyConflictError,
    ConfigurationError,
    EncodedPayload,
    ScopedSecret,
    ServiceError,
    SerializationError,
    classify,
    encodePayload,
} from '@vigil/sdk';
import { ExecutionEntity, ExecutionFailure, TerminalStatus, executionStatus } from '../db/execution.entity';
import { ExecutionRequestEntity } from '../db/execution-request.entity';
import { TaskDefinitionEntity } from '../db/task-definition.entity';
import { ExecutionStore, LeaseStore, TaskDefinitionStore, WorkQueue } from '../repositories/types';
import { CheckerRunner } from './checker-runner';
import { CredentialVault } from './credential-vault';
import { Notifier, notifyInBackground } from './notifier';

const TAG = '[worker]';

export interface ExecutionWorkerDeps {
    queue: WorkQueue;
    executions: ExecutionStore;
    tasks: TaskDefinitionStore;
    leases: LeaseStore;
    vault: CredentialVault;
    registry: CheckerRegistry;
    runner: CheckerRunner;
    notifier: Notifier;
}

export interface ExecutionWorkerOptions {
    workerId: string;
    leaseTtlMs: number;
    checkerTimeoutMs: number;
}

export type ProcessOutcome =
    | { outcome: 'dropped'; reason: 'missing' | 'not_queued' }
    | { outcome: TerminalStatus; execution: ExecutionEntity };

type CheckOutcome = { ok: true; output: CheckerOutput } | { ok: false; error: ClassifiedError };

/**
 * Carries one execution request from `queued` to a terminal state.
 * Every failure is terminal: nothing is retried, and the request is
 * acknowledged once the outcome is recorded.
 */
export class ExecutionWorker {
    constructor(
        private readonly deps: ExecutionWorkerDeps,
        private readonly options: ExecutionWorkerOptions,
    ) { }

    async process(request: ExecutionRequestEntity): Promise<ProcessOutcome> {
        const outcome = await this.execute(request);
        await this.deps.queue.ack(request.id);
        return outcome;
    }

    private async execute(request: ExecutionRequestEntity): Promise<ProcessOutcome> {
        const execution = await this.deps.executions.findById(request.execution_id);
        if (!execution) {
            console.warn(`${TAG} execution ${request.execution_id} does not exist, dropping request ${request.id}`);
            return { outcome: 'dropped', reason: 'missing' };
        }
        if (execution.status !== executionStatus.QUEUED) {
            console.log(`${TAG} execution ${execution.id} is already ${execution.status}, dropping redelivery`);
            return { outcome: 'dropped', reason: 'not_queued' };
        }

        const task = await this.deps.tasks.findById(execution.task_id);
        if (!task) {
            return this.finish(execution, null, {
                ok: false,
                error: new ConfigurationError(`Task definition ${execution.task_id} no longer exists`, {
                    taskId: execution.task_id,
                }),
            });
        }

        const started = await this.deps.executions.start(
            execution.id,
            task.id,
            this.options.workerId,
            this.options.leaseTtlMs,
        );
        if (!started.started) {
            if (started.reason === 'not_queued') {
                console.log(`${TAG} execution ${execution.id} was started elsewhere, dropping redelivery`);
                return { outcome: 'dropped', reason: 'not_queued' };
            }
            return this.finish(execution, null, {
                ok: false,
                error: new ConcurrencyConflictError(`Task ${task.id} is already being executed`, {
                    taskId: task.id,
                    heldBy: started.lease?.execution_id ?? null,
                }),
            });
        }

        console.log(`${TAG} execution ${execution.id} running (${task.service_category}:${task.operation})`);
        return this.finish(started.execution, task, await this.check(task, started.execution));
    }

    private async check(task: TaskDefinitionEntity, execution: ExecutionEntity): Promise<CheckOutcome> {
        try {
            return await this.deps.vault.withSecret(task.tenant_id, task.credential_id, (secret) =>
                this.invoke(task, execution, secret),
            );
        } catch (err) {
            // invoke() never rejects, so this is the vault failing to produce a secret
            const reason = err instanceof Error ? err.message : String(err);
            return {
                ok: false,
                error: new AuthenticationError(`Credential could not be resolved: ${reason}`, {
                    credentialId: task.credential_id,
                    cause: err instanceof Error ? err.name : 'unknown',
                }),
            };
        }
    }

    private async invoke(task: TaskDefinitionEntity, execution: ExecutionEntity, secret: ScopedSecret): Promise<CheckOutcome> {
        const { service_category: category, operation } = task;
        const checker = this.deps.registry.get(category, operation);
        if (!checker) {
            return {
                ok: false,
                error: new ServiceError(`Unsupported operation ${CheckerRegistry.key(category, operation)}`, {
                    category,
                    operation,
                }),
            };
        }

        try {
            checker.validateConfig(task.config);
            const output = await this.deps.runner.run({
                category,
                operation,
                config: task.config,
                secret,
                executionId: execution.id,
                tenantId: task.tenant_id,
                timeoutMs: this.options.checkerTimeoutMs,
            });
            return { ok: true, output };
        } catch (err) {
            return { ok: false, error: classify(err) };
        }
    }

    /**
     * Records the terminal state. The store writes the outcome and drops the
     * lease in one transaction; should that write fail, the lease is released
     * here so the task does not stay blocked until expiry.
     */
    private async finish(
        execution: ExecutionEntity,
        task: TaskDefinitionEntity | null,
        outcome: CheckOutcome,
    ): Promise<ProcessOutcome> {
        let recorded: ExecutionEntity;
        try {
            recorded = await this.record(execution.id, outcome);
        } catch (err) {
            if (task) {
                await this.deps.leases
                    .release(task.id, execution.id)
                    .catch((releaseErr) => console.error(`${TAG} failed to release lease of task ${task.id}:`, releaseErr));
            }
            throw err;
        }

        const status: TerminalStatus =
            recorded.status === executionStatus.SUCCEEDED ? executionStatus.SUCCEEDED : executionStatus.FAILED;
        if (status === executionStatus.SUCCEEDED) {
            console.log(`${TAG} execution ${recorded.id} succeeded`);
        } else {
            console.warn(`${TAG} execution ${recorded.id} failed: ${recorded.error_classification ?? 'unknown'}`);
        }

        notifyInBackground(this.deps.notifier, recorded.tenant_id, recorded.id, status);
        return { outcome: status, execution: recorded };
    }

    private async record(executionId: string, outcome: CheckOutcome): Promise<ExecutionEntity> {
        if (!outcome.ok) return this.deps.executions.fail(executionId, failureOf(outcome.error));

        const encoded = this.encode(outcome.output);
        return encoded.ok
            ? this.deps.executions.succeed(executionId, encoded.payload)
            : this.deps.executions.fail(executionId, failureOf(encoded.error));
    }

    private encode(output: CheckerOutput): { ok: true; payload: EncodedPayload } | { ok: false; error: ClassifiedError } {
        try {
            return { ok: true, payload: encodePayload(output) };
        } catch (err) {
            const message = err instanceof SerializationError ? err.message : `Result could not be serialized: ${String(err)}`;
            return { ok: false, error: new ServiceError(message, { capability: output.capability }) };
        }
    }
}

function failureOf(error: ClassifiedError): ExecutionFailure {
    return { classification: error.classification, detail: error.toJSON() };
}
