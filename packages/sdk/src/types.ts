import type { ZodType, ZodTypeDef } from 'zod';
import type { SecretMaterial } from './secret';

export const CAPABILITIES = ['health_check', 'resource_list', 'custom_operation'] as const;

export type Capability = (typeof CAPABILITIES)[number];

export interface HealthReport {
    healthy: boolean;
    latencyMs?: number;
    checks?: Array<{ name: string; healthy: boolean; message?: string }>;
    [key: string]: unknown;
}

export interface ResourceListing {
    resources: Array<{ id: string; type?: string; attributes?: Record<string, unknown> }>;
    truncated?: boolean;
    [key: string]: unknown;
}

export interface CapabilityOutputs {
    health_check: HealthReport;
    resource_list: ResourceListing;
    custom_operation: Record<string, unknown>;
}

export interface CheckerContext {
    /** Aborted when the engine gives up waiting for the remote call. */
    signal: AbortSignal;
    executionId: string;
    tenantId: string;
    timeoutMs: number;
}

export interface CheckerSpec<C extends Capability, TConfig> {
    capability: C;
    description?: string;
    configSchema: ZodType<TConfig, ZodTypeDef, unknown>;
    execute(secret: SecretMaterial, config: TConfig, ctx: CheckerContext): Promise<CapabilityOutputs[C]>;
}

export interface CheckerOutput {
    capability: Capability;
    data: CapabilityOutputs[Capability];
}

/**
 * Type-erased checker as stored in the registry. The configuration is
 * validated (and narrowed) inside `execute`; `validateConfig` lets the engine
 * reject malformed configuration before anything is dispatched.
 */
export interface Checker {
    readonly category: string;
    readonly operation: string;
    readonly capability: Capability;
    readonly description?: string;
    validateConfig(config: Record<string, unknown>): void;
    execute(secret: SecretMaterial, config: Record<string, unknown>, ctx: CheckerContext): Promise<CheckerOutput>;
}
