/**
 * Stale Detector: open tasks with no activity inside the threshold window.
 * Read-only; archiving is left to the caller.
 */

import { DAY_MS } from '../dates.js';
import type { Task } from '../../types/task.js';

export const DEFAULT_STALE_THRESHOLD_DAYS = 30;

/** Whole days since the task's last recorded activity. */
export function idleDays(task: Task, now: Date): number {
  return Math.floor((now.getTime() - Date.parse(task.lastActivityAt)) / DAY_MS);
}

/**
 * Incomplete tasks whose last activity is strictly more than
 * `thresholdDays` before `now`, longest idle first.
 */
export function findStale(
  tasks: readonly Task[],
  now: Date,
  thresholdDays: number = DEFAULT_STALE_THRESHOLD_DAYS,
): Task[] {
  const cutoff = now.getTime() - thresholdDays * DAY_MS;
  return tasks
    .filter((t) => !t.completed && Date.parse(t.lastActivityAt) < cutoff)
    .sort((a, b) => {
      if (a.lastActivityAt !== b.lastActivityAt) return a.lastActivityAt < b.lastActivityAt ? -1 : 1;
      return a.id < b.id ? -1 : a.id > b.id ? 1 : 0;
    });
}
