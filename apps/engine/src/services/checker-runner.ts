import path from 'path';
import Piscina from 'piscina';
import {
    CAPABILITIES,
    CheckerOutput,
    CheckerRegistry,
    ScopedSecret,
    SecretMaterial,
    ServiceError,
    ServiceLimitError,
    TransferableSecret,
    classify,
    fromClassifiedPayload,
    isClassifiedPayload,
} from '@vigil/sdk';

const TAG = '[checker-runner]';

/** How long past its own deadline a pooled call may run before the thread is aborted. */
export const CHECKER_ABORT_HEADROOM_MS = 1000;

export interface CheckerInvocation {
    category: string;
    operation: string;
    config: Record<string, unknown>;
    secret: ScopedSecret;
    executionId: string;
    tenantId: string;
    timeoutMs: number;
}

/** Message handed to a checker thread; the secret travels as raw bytes. */
export interface CheckerTask extends Omit<CheckerInvocation, 'secret'> {
    secret: TransferableSecret;
}

/**
 * Runs one checker call. Rejects only with a ClassifiedError; a call that
 * outlives `timeoutMs` rejects with ServiceLimitError.
 */
export interface CheckerRunner {
    run(invocation: CheckerInvocation): Promise<CheckerOutput>;
    readonly queueSize: number;
    destroy(): Promise<void>;
}

function timeoutError(category: string, operation: string, timeoutMs: number): ServiceLimitError {
    return new ServiceLimitError(`Checker ${CheckerRegistry.key(category, operation)} timed out after ${timeoutMs}ms`, {
        timeoutMs,
    });
}

/**
 * Looks up and executes a checker with a deadline. The checker's signal is
 * aborted when the deadline passes; the call is abandoned either way.
 */
export async function executeChecker(
    registry: CheckerRegistry,
    invocation: Omit<CheckerInvocation, 'secret'> & { secret: SecretMaterial },
): Promise<CheckerOutput> {
    const { category, operation, timeoutMs } = invocation;
    const checker = registry.get(category, operation);
    if (!checker) {
        throw new ServiceError(`Unsupported operation ${CheckerRegistry.key(category, operation)}`, {
            category,
            operation,
        });
    }

    const controller = new AbortController();
    let timer: NodeJS.Timeout | undefined;
    const deadline = new Promise<never>((_, reject) => {
        timer = setTimeout(() => {
            controller.abort();
            reject(timeoutError(category, operation, timeoutMs));
        }, timeoutMs);
    });

    try {
        return await Promise.race([
            checker.execute(invocation.secret, invocation.config, {
                signal: controller.signal,
                executionId: invocation.executionId,
                tenantId: invocation.tenantId,
                timeoutMs,
            }),
            deadline,
        ]);
    } catch (err) {
        throw classify(err);
    } finally {
        clearTimeout(timer);
    }
}

export class InlineCheckerRunner implements CheckerRunner {
    private inFlight = 0;

    constructor(private readonly registry: CheckerRegistry) { }

    get queueSize(): number {
        return this.inFlight;
    }

    async run(invocation: CheckerInvocation): Promise<CheckerOutput> {
        this.inFlight++;
        try {
            return await executeChecker(this.registry, invocation);
        } finally {
            this.inFlight--;
        }
    }

    async destroy(): Promise<void> { }
}

function isCheckerOutput(value: unknown): value is CheckerOutput {
    return (
        typeof value === 'object' &&
        value !== null &&
        'capability' in value &&
        CAPABILITIES.some((capability) => capability === value.capability) &&
        'data' in value &&
        typeof value.data === 'object' &&
        value.data !== null
    );
}

function isAbortError(err: unknown): boolean {
    return err instanceof Error && err.name === 'AbortError';
}

export interface ThreadedCheckerRunnerOptions {
    threads: number;
    checkerModules: string[];
    maxQueue?: number;
}

/**
 * Runs checkers on a piscina pool so a CPU-heavy or misbehaving checker
 * cannot stall the engine's event loop. A call past its deadline is
 * aborted, which terminates the thread running it.
 */
export class ThreadedCheckerRunner implements CheckerRunner {
    private readonly pool: Piscina;

    constructor(options: ThreadedCheckerRunnerOptions) {
        this.pool = ThreadedCheckerRunner.createPool(options);
    }

    private static createPool(options: ThreadedCheckerRunnerOptions): Piscina {
        const isTs = path.extname(__filename) === '.ts';
        const workerPath = path.resolve(__dirname, `../workers/checker.worker${isTs ? '.ts' : '.js'}`);

        const pool = new Piscina({
            filename: workerPath,
            execArgv: isTs ? ['--import', 'tsx'] : [],
            maxThreads: options.threads,
            minThreads: 1,
            maxQueue: options.maxQueue ?? 1000,
            idleTimeout: 30000,
            env: {
                ...process.env,
                CHECKER_MODULES: options.checkerModules.join(','),
            },
        });

        console.log(`${TAG} piscina pool: ${options.threads} threads`);
        return pool;
    }

    get queueSize(): number {
        return this.pool.queueSize;
    }

    async run(invocation: CheckerInvocation): Promise<CheckerOutput> {
        const { secret, ...rest } = invocation;
        const task: CheckerTask = { ...rest, secret: secret.toTransferable() };
        // Headroom over the in-thread deadline so the thread reports its own timeout first.
        const signal = AbortSignal.timeout(invocation.timeoutMs + CHECKER_ABORT_HEADROOM_MS);

        try {
            const output: unknown = await this.pool.run(task, { signal });
            if (!isCheckerOutput(output)) {
                throw new ServiceError(`Checker ${CheckerRegistry.key(rest.category, rest.operation)} returned a malformed result`);
            }
            return output;
        } catch (err) {
            if (isClassifiedPayload(err)) throw fromClassifiedPayload(err);
            if (isAbortError(err)) throw timeoutError(rest.category, rest.operation, rest.timeoutMs);
            throw classify(err);
        } finally {
            for (const bytes of Object.values(task.secret.fields)) bytes.fill(0);
        }
    }

    async destroy(): Promise<void> {
        await this.pool.destroy();
    }
}

export interface CheckerRunnerOptions {
    threads: number;
    checkerModules: string[];
}

export function createCheckerRunner(registry: CheckerRegistry, options: CheckerRunnerOptions): CheckerRunner {
    if (options.threads > 0) return new ThreadedCheckerRunner(options);
    return new InlineCheckerRunner(registry);
}
