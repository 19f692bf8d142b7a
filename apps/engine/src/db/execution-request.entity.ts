import type { TriggerReason } from './execution.entity';

/** A row of the durable work queue between the scheduler and the workers. */
export interface ExecutionRequestEntity {
    id: string;
    execution_id: string;
    task_id: string;
    tenant_id: string;
    trigger: TriggerReason;
    enqueued_at: Date;
    claimed_by: string | null;
    claimed_until: Date | null;
    delivery_count: number;
}
