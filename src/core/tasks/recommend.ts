/**
 * Recommender: capacity-bounded selection of what to work on today.
 */

import { levelRank, type Capacity, type Task } from '../../types/task.js';
import { DEFAULT_SCORING_POLICY, scoreAll, type ScoringPolicy } from './score.js';

export const DEFAULT_MAX_TASKS = 5;

export interface RecommendOptions {
  maxTasks?: number;
  now?: Date;
  policy?: ScoringPolicy;
}

/** A task fits when neither requirement exceeds today's capacity. */
export function fitsCapacity(task: Task, capacity: Capacity): boolean {
  return levelRank(task.energy) <= levelRank(capacity.energy)
    && levelRank(task.attention) <= levelRank(capacity.attention);
}

/**
 * Ranking order: score descending, then earlier due date (tasks without
 * one last), then older creation, then id.
 */
export function compareRanked(a: Task, b: Task): number {
  const sa = a.score ?? 0;
  const sb = b.score ?? 0;
  if (sa !== sb) return sb - sa;

  if (a.dueAt !== b.dueAt) {
    if (a.dueAt === null) return 1;
    if (b.dueAt === null) return -1;
    return a.dueAt < b.dueAt ? -1 : 1;
  }

  if (a.createdAt !== b.createdAt) return a.createdAt < b.createdAt ? -1 : 1;
  return a.id < b.id ? -1 : a.id > b.id ? 1 : 0;
}

/**
 * Recommend up to `maxTasks` open tasks that fit today's capacity, best
 * first. Returns an empty array when nothing fits.
 */
export function recommend(
  tasks: readonly Task[],
  capacity: Capacity,
  options: RecommendOptions = {},
): Task[] {
  const maxTasks = Math.max(0, Math.floor(options.maxTasks ?? DEFAULT_MAX_TASKS));
  const now = options.now ?? new Date();

  const candidates = tasks.filter((t) => !t.completed && fitsCapacity(t, capacity));
  return scoreAll(candidates, now, options.policy ?? DEFAULT_SCORING_POLICY)
    .sort(compareRanked)
    .slice(0, maxTasks);
}
