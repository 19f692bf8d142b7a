/**
 * Short-lived claim on a task: at most one execution per task may hold it.
 * Expiry only exists to recover from a crashed holder.
 */
export interface LeaseEntity {
    task_id: string;
    execution_id: string;
    holder: string;
    acquired_at: Date;
    expires_at: Date;
}
