import path from 'path';
import {
    CheckerRegistry,
    PermissionError,
    ScopedSecret,
    ServiceError,
    ServiceLimitError,
    TransferableSecret,
} from '@vigil/sdk';
import { CheckerInvocation, createCheckerRunner, ThreadedCheckerRunner } from '../../src/services/checker-runner';

// Spawns a real worker thread; the checkers come from the echo fixture module.
const ECHO_MODULE = path.join(__dirname, '../fixtures/echo.checker.ts');

jest.setTimeout(20_000);

describe('ThreadedCheckerRunner', () => {
    let runner: ThreadedCheckerRunner;

    beforeAll(() => {
        runner = new ThreadedCheckerRunner({ threads: 1, checkerModules: [ECHO_MODULE] });
    });

    afterAll(async () => {
        await runner.destroy();
    });

    function invocation(operation: string, secret: ScopedSecret, timeoutMs = 2_000): CheckerInvocation {
        return {
            category: 'echo',
            operation,
            config: { text: 'db-1' },
            secret,
            executionId: 'exec-1',
            tenantId: 'tenant-a',
            timeoutMs,
        };
    }

    function testSecret(): ScopedSecret {
        return new ScopedSecret('cred-1', { region: 'eu-west-1' }, { token: Buffer.from('test-secret') });
    }

    it('runs a checker on the pool and returns its tagged output', async () => {
        expect(await runner.run(invocation('say', testSecret()))).toEqual({
            capability: 'custom_operation',
            data: { text: 'db-1' },
        });
    });

    it('hands the secret to the thread and wipes the copy it sent', async () => {
        const secret = testSecret();
        const toTransferable = secret.toTransferable.bind(secret);
        const sent: TransferableSecret[] = [];
        jest.spyOn(secret, 'toTransferable').mockImplementation(() => {
            const transferable = toTransferable();
            sent.push(transferable);
            return transferable;
        });

        const output = await runner.run(invocation('whoami', secret));

        expect(output.data).toEqual({ credentialId: 'cred-1', token: 'test-secret', region: 'eu-west-1' });
        expect(sent).toHaveLength(1);
        expect([...(sent[0]?.fields.token ?? [])]).toEqual(new Array(11).fill(0));
        expect(secret.field('token')).toBe('test-secret');
    });

    it('rebuilds a classified error thrown inside the thread', async () => {
        const err = await runner.run(invocation('deny', testSecret())).catch((e: unknown) => e);

        expect(err).toBeInstanceOf(PermissionError);
        expect(err).toHaveProperty('message', 'Access denied to db-1');
        expect(err).toHaveProperty('detail', { target: 'db-1' });
    });

    it('reports a checker past its deadline as ServiceLimitError', async () => {
        const err = await runner.run(invocation('stall', testSecret(), 100)).catch((e: unknown) => e);

        expect(err).toBeInstanceOf(ServiceLimitError);
        expect(err).toHaveProperty('message', 'Checker echo:stall timed out after 100ms');
    });

    it('classifies an operation the thread does not know as ServiceError', async () => {
        const err = await runner
            .run({ ...invocation('say', testSecret()), category: 'nope', operation: 'x' })
            .catch((e: unknown) => e);

        expect(err).toBeInstanceOf(ServiceError);
        expect(err).toHaveProperty('message', 'Unsupported operation nope:x');
    });
});

describe('createCheckerRunner', () => {
    it('builds a thread pool when threads are configured', async () => {
        const runner = createCheckerRunner(new CheckerRegistry(), { threads: 1, checkerModules: [] });
        try {
            expect(runner).toBeInstanceOf(ThreadedCheckerRunner);
        } finally {
            await runner.destroy();
        }
    });
});
