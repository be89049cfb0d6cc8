/**
 * Scorer: the Attention Tax.
 *
 *   score = priorityWeight(priority) x energyMultiplier(energy) x deadlineMultiplier(dueAt, now)
 *
 * The tables are policy and can be replaced through configuration; the
 * contract is the multiplicative composition and a deadline multiplier
 * that never increases as the due date moves further away.
 */

import { calendarDaysBetween } from '../dates.js';
import type { Level, Priority, Task } from '../../types/task.js';

/** Deadline multiplier steps, keyed on calendar days until due. */
export interface DeadlineSteps {
  /** Due before today. */
  overdue: number;
  /** Due today. */
  dueToday: number;
  /** Due within `weekDays` days (excluding today). */
  dueThisWeek: number;
  /** Due later than that. */
  later: number;
  /** Horizon for dueThisWeek, in days. */
  weekDays: number;
}

export interface ScoringPolicy {
  priorityWeights: Record<Priority, number>;
  energyMultipliers: Record<Level, number>;
  deadline: DeadlineSteps;
}

export const DEFAULT_SCORING_POLICY: ScoringPolicy = {
  priorityWeights: { P1: 4, P2: 3, P3: 2, P4: 1 },
  energyMultipliers: { high: 1.5, medium: 1.0, low: 0.75 },
  deadline: {
    overdue: 2.0,
    dueToday: 1.5,
    dueThisWeek: 1.2,
    later: 1.0,
    weekDays: 7,
  },
};

/** Deadline multiplier applied when a task has no due date. */
export const NO_DEADLINE_MULTIPLIER = 1.0;

/** Step function over calendar days until due. */
export function deadlineMultiplier(
  dueAt: string | null,
  now: Date,
  steps: DeadlineSteps = DEFAULT_SCORING_POLICY.deadline,
): number {
  if (dueAt === null) return NO_DEADLINE_MULTIPLIER;
  const due = new Date(dueAt);
  if (Number.isNaN(due.getTime())) return NO_DEADLINE_MULTIPLIER;

  const days = calendarDaysBetween(now, due);
  if (days < 0) return steps.overdue;
  if (days === 0) return steps.dueToday;
  if (days <= steps.weekDays) return steps.dueThisWeek;
  return steps.later;
}

/** True when the steps never increase as time-to-due grows. */
export function isMonotonicDeadline(steps: DeadlineSteps): boolean {
  return steps.overdue >= steps.dueToday
    && steps.dueToday >= steps.dueThisWeek
    && steps.dueThisWeek >= steps.later;
}

/** Compute the Attention Tax. Pure function of the task, `now` and the policy. */
export function score(task: Task, now: Date, policy: ScoringPolicy = DEFAULT_SCORING_POLICY): number {
  return policy.priorityWeights[task.priority]
    * policy.energyMultipliers[task.energy]
    * deadlineMultiplier(task.dueAt, now, policy.deadline);
}

/** Return copies of the tasks with `score` filled in. */
export function scoreAll(
  tasks: readonly Task[],
  now: Date,
  policy: ScoringPolicy = DEFAULT_SCORING_POLICY,
): Task[] {
  return tasks.map((t) => ({ ...t, score: score(t, now, policy) }));
}
