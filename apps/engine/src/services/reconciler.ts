import { LeaseStore, OrphanedExecution } from '../repositories/types';
import { LeaderElector } from './leaderelector';

const TAG = '[reconciler]';

export interface ReconcileReport {
    flagged: OrphanedExecution[];
    purgedLeases: number;
}

// Finds executions whose worker died mid-run. Runs on only one instance at a
// time via Redis leader election. Orphans are flagged with stale_at for an
// operator; their status is never changed and nothing is re-run.
export class Reconciler {
    private intervalHandle: NodeJS.Timeout | null = null;
    private running = false;
    private isReconciling = false;

    constructor(
        private readonly leases: LeaseStore,
        private readonly leaderElector: LeaderElector,
        private readonly intervalMs = 30_000,
    ) { }

    start(): void {
        if (this.running) {
            console.warn(`${TAG} already running`);
            return;
        }
        this.running = true;
        console.log(`${TAG} started (interval: ${this.intervalMs}ms)`);

        // Fire immediately, then on schedule
        this.runCycle();
        this.intervalHandle = setInterval(() => this.runCycle(), this.intervalMs);
    }

    async stop(): Promise<void> {
        this.running = false;
        if (this.intervalHandle) {
            clearInterval(this.intervalHandle);
            this.intervalHandle = null;
        }
        await this.leaderElector.releaseLeadership();
        console.log(`${TAG} stopped`);
    }

    isRunning(): boolean {
        return this.running;
    }

    /** One cycle on the leader; followers return null without touching anything. */
    async reconcile(): Promise<ReconcileReport | null> {
        if (this.isReconciling) return null;
        this.isReconciling = true;

        try {
            if (!(await this.leaderElector.tryBecomeLeader())) return null;

            const flagged = await this.leases.flagOrphans();
            const purgedLeases = await this.leases.purgeExpired();

            if (flagged.length > 0) {
                console.warn(
                    `${TAG} flagged ${flagged.length} stale executions: ${flagged.map((o) => `${o.execution_id}(task ${o.task_id})`).join(', ')}`,
                );
            }
            if (purgedLeases > 0) {
                console.log(`${TAG} purged ${purgedLeases} expired leases`);
            }
            return { flagged, purgedLeases };
        } finally {
            this.isReconciling = false;
        }
    }

    private runCycle(): void {
        this.reconcile().catch((err) => console.error(`${TAG} error during reconcile cycle:`, err));
    }
}
