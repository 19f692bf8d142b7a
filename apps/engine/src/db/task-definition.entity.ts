export const FREQUENCIES = ['daily', 'weekly', 'monthly', 'on_demand'] as const;

export type Frequency = (typeof FREQUENCIES)[number];

/**
 * A tenant's declared recurring inspection job.
 * `credential_id` null means "use the tenant's default credential".
 */
export interface TaskDefinitionEntity {
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
    last_triggered_at: Date | null;
    created_at: Date;
    updated_at: Date;
    deleted_at: Date | null;
}
