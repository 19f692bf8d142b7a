import type { Classification, EncodedPayload, ErrorDetail } from '@vigil/sdk';

/**
 * Lifecycle states for one run of a task definition.
 * Executions progress: QUEUED → RUNNING → SUCCEEDED/FAILED
 */
export enum executionStatus {
    QUEUED = 'queued',
    RUNNING = 'running',
    SUCCEEDED = 'succeeded',
    FAILED = 'failed',
}

export type TerminalStatus = executionStatus.SUCCEEDED | executionStatus.FAILED;

export type TriggerReason = 'scheduled' | 'manual';

export interface ExecutionEntity {
    id: string;
    task_id: string;
    tenant_id: string;
    trigger: TriggerReason;
    status: executionStatus;
    attempt: number; // always 1: failed runs are never retried in place
    worker_id: string | null;
    error_classification: Classification | null;
    error_detail: ErrorDetail | null;
    queued_at: Date;
    started_at: Date | null;
    finished_at: Date | null;
    stale_at: Date | null; // set by the reconciler when the lease died under a running execution
}

export interface ExecutionResultEntity {
    execution_id: string;
    payload: EncodedPayload;
    produced_at: Date;
}

export interface ExecutionFailure {
    classification: Classification;
    detail: ErrorDetail;
}

export function isTerminal(status: executionStatus): status is TerminalStatus {
    return status === executionStatus.SUCCEEDED || status === executionStatus.FAILED;
}
