import { z } from 'zod';
import {
    CheckerContext,
    CheckerRegistry,
    HealthReport,
    ScopedSecret,
    ServiceError,
    ServiceLimitError,
    defineChecker,
} from '@vigil/sdk';
import { createCheckerRunner, executeChecker, InlineCheckerRunner } from '../../src/services/checker-runner';
import { registerFakeCheckers } from '../helpers/checkers';

describe('checker runner', () => {
    let registry: CheckerRegistry;
    let secret: ScopedSecret;

    beforeEach(() => {
        registry = new CheckerRegistry();
        secret = new ScopedSecret('cred-1', { region: 'eu-west-1' }, { token: Buffer.from('test-secret') });
    });

    function invocation(operation: string, timeoutMs = 1000) {
        return {
            category: 'fake',
            operation,
            config: { target: 'db-1' },
            secret,
            executionId: 'exec-1',
            tenantId: 'tenant-a',
            timeoutMs,
        };
    }

    it('returns the checker output tagged with its capability', async () => {
        registerFakeCheckers(registry);

        expect(await executeChecker(registry, invocation('ping'))).toEqual({
            capability: 'health_check',
            data: { healthy: true, target: 'db-1', region: 'eu-west-1' },
        });
    });

    it('rejects an operation that is not registered as ServiceError', async () => {
        const err = await executeChecker(registry, invocation('nope')).catch((e: unknown) => e);

        expect(err).toBeInstanceOf(ServiceError);
        expect(err).toHaveProperty('message', 'Unsupported operation fake:nope');
        expect(err).toHaveProperty('detail', { category: 'fake', operation: 'nope' });
    });

    it('times out a checker that never settles and aborts its signal', async () => {
        let seen: CheckerContext | undefined;
        registry.register(
            defineChecker('fake', 'stuck', {
                capability: 'health_check',
                configSchema: z.object({ target: z.string() }),
                execute(_secret, _config, ctx) {
                    seen = ctx;
                    return new Promise<HealthReport>(() => undefined);
                },
            }),
        );

        const err = await executeChecker(registry, invocation('stuck', 20)).catch((e: unknown) => e);

        expect(err).toBeInstanceOf(ServiceLimitError);
        expect(err).toHaveProperty('message', 'Checker fake:stuck timed out after 20ms');
        expect(err).toHaveProperty('detail', { timeoutMs: 20 });
        expect(seen?.signal.aborted).toBe(true);
        expect(seen?.executionId).toBe('exec-1');
    });

    it('classifies plain errors as ServiceError', async () => {
        registerFakeCheckers(registry);

        const err = await executeChecker(registry, invocation('crash')).catch((e: unknown) => e);
        expect(err).toBeInstanceOf(ServiceError);
        expect(err).toHaveProperty('message', 'socket hang up');
    });

    it('passes classified errors through', async () => {
        registerFakeCheckers(registry);

        await expect(executeChecker(registry, invocation('throttled'))).rejects.toBeInstanceOf(ServiceLimitError);
    });

    it('counts in-flight calls as its queue size', async () => {
        const fakes = registerFakeCheckers(registry);
        const runner = new InlineCheckerRunner(registry);

        const pending = runner.run(invocation('gated'));
        expect(runner.queueSize).toBe(1);

        fakes.gate.open();
        await pending;
        expect(runner.queueSize).toBe(0);
    });

    it('runs inline when no threads are configured', () => {
        expect(createCheckerRunner(registry, { threads: 0, checkerModules: [] })).toBeInstanceOf(InlineCheckerRunner);
    });
});
