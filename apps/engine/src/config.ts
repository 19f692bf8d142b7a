import { z } from 'zod';
import { v7 as uuid } from 'uuid';
import { CHECKER_ABORT_HEADROOM_MS } from './services/checker-runner';

export const ENGINE_ROLES = ['api', 'scheduler', 'worker', 'reconciler'] as const;

export type EngineRole = (typeof ENGINE_ROLES)[number];

// Lease time a run needs beyond CHECKER_TIMEOUT_MS: the thread pool's abort
// headroom plus decrypting before the call and the terminal write after it.
export const LEASE_MARGIN_MS = CHECKER_ABORT_HEADROOM_MS + 4_000;

const csv = z
    .string()
    .default('')
    .transform((value) => value.split(',').map((part) => part.trim()).filter(Boolean));

const envSchema = z
    .object({
        PORT: z.coerce.number().int().positive().default(50051),
        DATABASE_URL: z.string().min(1, 'DATABASE_URL is required'),
        REDIS_URL: z.string().default('redis://localhost:6379'),
        CREDENTIAL_ENCRYPTION_KEY: z.string().min(1, 'CREDENTIAL_ENCRYPTION_KEY is required'),
        ENGINE_ROLES: z
            .string()
            .default(ENGINE_ROLES.join(','))
            .transform((value) => value.split(',').map((part) => part.trim()).filter(Boolean))
            .pipe(z.array(z.enum(ENGINE_ROLES)).min(1)),
        WORKER_ID: z.string().optional(),

        SCHEDULER_TICK_MS: z.coerce.number().int().positive().default(60_000),
        DISPATCH_LEASE_TTL_MS: z.coerce.number().int().positive().optional(),
        LEASE_TTL_MS: z.coerce.number().int().positive().default(120_000),
        CHECKER_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
        QUEUE_VISIBILITY_MS: z.coerce.number().int().positive().default(150_000),
        POLL_BATCH_SIZE: z.coerce.number().int().positive().default(10),
        MAX_CONCURRENT_EXECUTIONS: z.coerce.number().int().positive().default(10),
        MAX_EVENT_LOOP_LAG: z.coerce.number().positive().default(100),
        CHECKER_THREADS: z.coerce.number().int().min(0).default(0),
        CHECKER_MODULES: csv,

        RECONCILER_INTERVAL_MS: z.coerce.number().int().positive().default(30_000),
        LEADER_TTL_SECONDS: z.coerce.number().int().positive().default(30),
        NOTIFY_CHANNEL: z.string().default('vigil:executions'),
    })
    .superRefine((env, ctx) => {
        if (env.LEASE_TTL_MS < env.CHECKER_TIMEOUT_MS + LEASE_MARGIN_MS) {
            ctx.addIssue({
                code: z.ZodIssueCode.custom,
                path: ['LEASE_TTL_MS'],
                message: `must be at least CHECKER_TIMEOUT_MS + ${LEASE_MARGIN_MS}ms so a live execution never loses its lease`,
            });
        }
        if (env.QUEUE_VISIBILITY_MS < env.LEASE_TTL_MS) {
            ctx.addIssue({
                code: z.ZodIssueCode.custom,
                path: ['QUEUE_VISIBILITY_MS'],
                message: 'must be at least LEASE_TTL_MS',
            });
        }
    });

export interface EngineConfig {
    port: number;
    databaseUrl: string;
    redisUrl: string;
    encryptionKey: string;
    roles: EngineRole[];
    workerId: string;
    scheduler: { tickIntervalMs: number; dispatchLeaseTtlMs: number };
    worker: {
        leaseTtlMs: number;
        checkerTimeoutMs: number;
        visibilityMs: number;
        batchSize: number;
        maxConcurrent: number;
        maxEventLoopLag: number;
        checkerThreads: number;
        checkerModules: string[];
    };
    reconciler: { intervalMs: number; leaderTtlSeconds: number };
    notifyChannel: string;
}

export class ConfigError extends Error {
    constructor(issues: z.ZodIssue[]) {
        super(`Invalid configuration: ${issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ')}`);
        this.name = 'ConfigError';
    }
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): EngineConfig {
    const parsed = envSchema.safeParse(env);
    if (!parsed.success) throw new ConfigError(parsed.error.issues);
    const e = parsed.data;

    return {
        port: e.PORT,
        databaseUrl: e.DATABASE_URL,
        redisUrl: e.REDIS_URL,
        encryptionKey: e.CREDENTIAL_ENCRYPTION_KEY,
        roles: e.ENGINE_ROLES,
        workerId: e.WORKER_ID ?? `worker-${uuid().slice(0, 8)}`,
        scheduler: {
            tickIntervalMs: e.SCHEDULER_TICK_MS,
            dispatchLeaseTtlMs: e.DISPATCH_LEASE_TTL_MS ?? e.LEASE_TTL_MS,
        },
        worker: {
            leaseTtlMs: e.LEASE_TTL_MS,
            checkerTimeoutMs: e.CHECKER_TIMEOUT_MS,
            visibilityMs: e.QUEUE_VISIBILITY_MS,
            batchSize: e.POLL_BATCH_SIZE,
            maxConcurrent: e.MAX_CONCURRENT_EXECUTIONS,
            maxEventLoopLag: e.MAX_EVENT_LOOP_LAG,
            checkerThreads: e.CHECKER_THREADS,
            checkerModules: e.CHECKER_MODULES,
        },
        reconciler: {
            intervalMs: e.RECONCILER_INTERVAL_MS,
            leaderTtlSeconds: e.LEADER_TTL_SECONDS,
        },
        notifyChannel: e.NOTIFY_CHANNEL,
    };
}
