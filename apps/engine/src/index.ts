import 'dotenv/config';
import { globalRegistry } from '@vigil/sdk';
import { loadCheckerModules, registerBuiltinCheckers } from './checkers';
import { ConfigError, EngineConfig, loadConfig } from './config';
import { createPool, createRedis } from './db';
import { createGrpcServer, startGrpcServer, stopGrpcServer } from './grpc/server';
import { InspectionServiceImpl } from './grpc/inspection.service';
import { CredentialRepository } from './repositories/credential.repository';
import { ExecutionRepository } from './repositories/execution.repository';
import { LeaseRepository } from './repositories/lease.repository';
import { QueueRepository } from './repositories/queue.repository';
import { TaskDefinitionRepository } from './repositories/task-definition.repository';
import {
    CredentialService,
    CredentialVault,
    EventLoopMonitor,
    ExecutionWorker,
    LeaderElector,
    Poller,
    Reconciler,
    RedisNotifier,
    Scheduler,
    TaskService,
    createBackpressureCheck,
    createCheckerRunner,
} from './services';
import { SecretCipher } from './utils/secret-cipher';

const TAG = '[vigil]';

function readConfig(): EngineConfig {
    try {
        return loadConfig();
    } catch (err) {
        if (err instanceof ConfigError) {
            console.error(`${TAG} ${err.message}`);
            process.exit(1);
        }
        throw err;
    }
}

const config = readConfig();

// Wiring
const pool = createPool(config.databaseUrl);
const redis = createRedis(config.redisUrl);
const cipher = new SecretCipher(config.encryptionKey);

const taskRepo = new TaskDefinitionRepository(pool);
const executionRepo = new ExecutionRepository(pool);
const queueRepo = new QueueRepository(pool);
const leaseRepo = new LeaseRepository(pool);
const credentialRepo = new CredentialRepository(pool);

registerBuiltinCheckers(globalRegistry);
loadCheckerModules(config.worker.checkerModules);

const vault = new CredentialVault(credentialRepo, cipher);
const runner = createCheckerRunner(globalRegistry, {
    threads: config.worker.checkerThreads,
    checkerModules: config.worker.checkerModules,
});

// Components
const stops: Array<() => Promise<void> | void> = [];

async function main() {
    console.log(`${TAG} starting engine... (id: ${config.workerId}, roles: ${config.roles.join(',')})`);
    console.log(`${TAG} checkers: [${globalRegistry.list().join(', ')}]`);

    // Health checks
    await pool.query('SELECT 1');
    console.log(`${TAG} postgres connected`);

    await redis.ping();
    console.log(`${TAG} redis connected`);

    if (config.roles.includes('api')) {
        const tasks = new TaskService(taskRepo, executionRepo, queueRepo, credentialRepo, globalRegistry);
        const credentials = new CredentialService(credentialRepo, vault);
        const server = createGrpcServer(new InspectionServiceImpl(tasks, credentials), [
            { name: 'postgres', check: () => pool.query('SELECT 1') },
            { name: 'redis', check: () => redis.ping() },
        ]);
        await startGrpcServer(server, config.port);
        stops.push(() => stopGrpcServer(server));
    }

    if (config.roles.includes('reconciler')) {
        const elector = new LeaderElector(redis, {
            key: 'vigil:reconciler:leader',
            ttlSeconds: config.reconciler.leaderTtlSeconds,
            holderId: config.workerId,
        });
        const reconciler = new Reconciler(leaseRepo, elector, config.reconciler.intervalMs);
        reconciler.start();
        stops.push(() => reconciler.stop());
    }

    if (config.roles.includes('scheduler')) {
        const scheduler = new Scheduler(taskRepo, leaseRepo, queueRepo, {
            schedulerId: `scheduler-${config.workerId}`,
            tickIntervalMs: config.scheduler.tickIntervalMs,
            dispatchLeaseTtlMs: config.scheduler.dispatchLeaseTtlMs,
        });
        scheduler.start();
        stops.push(() => scheduler.stop());
    }

    if (config.roles.includes('worker')) {
        const worker = new ExecutionWorker(
            {
                queue: queueRepo,
                executions: executionRepo,
                tasks: taskRepo,
                leases: leaseRepo,
                vault,
                registry: globalRegistry,
                runner,
                notifier: new RedisNotifier(redis, config.notifyChannel),
            },
            {
                workerId: config.workerId,
                leaseTtlMs: config.worker.leaseTtlMs,
                checkerTimeoutMs: config.worker.checkerTimeoutMs,
            },
        );

        // Backpressure
        const monitor = new EventLoopMonitor();
        const poller = new Poller(queueRepo, {
            workerId: config.workerId,
            visibilityMs: config.worker.visibilityMs,
            batchSize: config.worker.batchSize,
            maxConcurrent: config.worker.maxConcurrent,
            checkBackpressure: createBackpressureCheck(() => runner.queueSize, () => monitor.lag, {
                maxQueueSize: config.worker.maxConcurrent * 2,
                maxEventLoopLag: config.worker.maxEventLoopLag,
            }),
            onRequestReceived: (request) => worker.process(request),
        });
        poller.start();
        stops.push(async () => {
            await poller.stop();
            monitor.disable();
        });
    }

    console.log(`${TAG} engine ready`);
}

async function shutdown(signal: string) {
    console.log(`${TAG} ${signal} received, shutting down...`);

    for (const stop of stops.reverse()) {
        await stop();
    }
    await runner.destroy();

    await pool.end();
    await redis.quit();
    console.log(`${TAG} shutdown complete`);
    process.exit(0);
}

function onSignal(signal: string) {
    shutdown(signal).catch((err) => {
        console.error(`${TAG} shutdown failed:`, err);
        process.exit(1);
    });
}

process.on('SIGTERM', () => onSignal('SIGTERM'));
process.on('SIGINT', () => onSignal('SIGINT'));
process.on('SIGUSR2', () => onSignal('SIGUSR2'));

main().catch((err) => {
    console.error(`${TAG} fatal:`, err);
    process.exit(1);
});
