import { v7 as uuid } from 'uuid';
import { TaskDefinitionEntity } from '../db/task-definition.entity';
import { LeaseStore, TaskDefinitionStore, WorkQueue } from '../repositories/types';
import { isDue } from '../utils/frequency';

const TAG = '[scheduler]';

export interface SchedulerConfig {
    schedulerId: string;
    tickIntervalMs: number;
    dispatchLeaseTtlMs: number;
    clock?: () => Date;
}

export interface TickReport {
    /** Execution ids enqueued this tick. */
    enqueued: string[];
    /** Task ids skipped because a previous execution still holds the lease. */
    skipped: string[];
    /** Task ids whose dispatch failed; they are picked up again next tick. */
    failed: string[];
}

// Finds due tasks and hands them to the queue. Any number of schedulers may
// run; they race on the task lease, so a task is enqueued at most once per
// period no matter how many instances see it as due.
export class Scheduler {
    private readonly schedulerId: string;
    private readonly tickIntervalMs: number;
    private readonly dispatchLeaseTtlMs: number;
    private readonly clock: () => Date;
    private intervalHandle: NodeJS.Timeout | null = null;
    private isTicking = false;

    constructor(
        private readonly tasks: TaskDefinitionStore,
        private readonly leases: LeaseStore,
        private readonly queue: WorkQueue,
        config: SchedulerConfig,
    ) {
        this.schedulerId = config.schedulerId;
        this.tickIntervalMs = config.tickIntervalMs;
        this.dispatchLeaseTtlMs = config.dispatchLeaseTtlMs;
        this.clock = config.clock ?? (() => new Date());
    }

    start(): void {
        if (this.intervalHandle) {
            console.warn(`${TAG} already running`);
            return;
        }
        console.log(`${TAG} started (id: ${this.schedulerId}, tick: ${this.tickIntervalMs}ms)`);

        this.runTick();
        this.intervalHandle = setInterval(() => this.runTick(), this.tickIntervalMs);
    }

    stop(): void {
        if (this.intervalHandle) {
            clearInterval(this.intervalHandle);
            this.intervalHandle = null;
        }
        console.log(`${TAG} stopped`);
    }

    isRunning(): boolean {
        return this.intervalHandle !== null;
    }

    async tick(): Promise<TickReport> {
        const report: TickReport = { enqueued: [], skipped: [], failed: [] };
        if (this.isTicking) {
            console.warn(`${TAG} previous tick still in progress, skipping`);
            return report;
        }
        this.isTicking = true;

        try {
            const now = this.clock();
            const candidates = await this.tasks.findSchedulable();
            for (const task of candidates) {
                if (!isDue(task, now)) continue;
                await this.dispatch(task, now, report);
            }

            if (report.enqueued.length + report.skipped.length + report.failed.length > 0) {
                console.log(
                    `${TAG} tick: ${report.enqueued.length} enqueued, ${report.skipped.length} skipped, ${report.failed.length} failed`,
                );
            }
            return report;
        } finally {
            this.isTicking = false;
        }
    }

    private runTick(): void {
        this.tick().catch((err) => console.error(`${TAG} tick failed:`, err));
    }

    private async dispatch(task: TaskDefinitionEntity, now: Date, report: TickReport): Promise<void> {
        const executionId = uuid();

        try {
            const lease = await this.leases.acquire(task.id, executionId, this.schedulerId, this.dispatchLeaseTtlMs);
            if (!lease) {
                console.log(`${TAG} task ${task.id} skipped, previous execution still running`);
                report.skipped.push(task.id);
                return;
            }

            const result = await this.queue.enqueue({
                executionId,
                taskId: task.id,
                tenantId: task.tenant_id,
                trigger: 'scheduled',
                triggeredAt: now,
            });
            if (!result.ok) {
                await this.leases.release(task.id, executionId);
                console.error(`${TAG} failed to enqueue task ${task.id}:`, result.error);
                report.failed.push(task.id);
                return;
            }

            report.enqueued.push(executionId);
        } catch (err) {
            console.error(`${TAG} failed to dispatch task ${task.id}:`, err);
            report.failed.push(task.id);
        }
    }
}
