import { Frequency } from '../db/task-definition.entity';

const HOUR_MS = 60 * 60 * 1000;
const DAY_MS = 24 * HOUR_MS;

// on_demand has no period: it only runs when triggered by hand.
export const FREQUENCY_PERIOD_MS: Record<Exclude<Frequency, 'on_demand'>, number> = {
    daily: DAY_MS,
    weekly: 7 * DAY_MS,
    monthly: 30 * DAY_MS,
};

export interface SchedulableTask {
    frequency: Frequency;
    is_active: boolean;
    last_triggered_at: Date | null;
    created_at: Date;
}

/** When the task next becomes due, or null if the time-based sweep never picks it. */
export function nextDueAt(task: SchedulableTask): Date | null {
    if (task.frequency === 'on_demand' || !task.is_active) return null;
    const anchor = task.last_triggered_at ?? task.created_at;
    return new Date(anchor.getTime() + FREQUENCY_PERIOD_MS[task.frequency]);
}

export function isDue(task: SchedulableTask, now: Date): boolean {
    const due = nextDueAt(task);
    return due !== null && now.getTime() >= due.getTime();
}
