/**
 * Task listing with filters over the unified set.
 */

import { priorityRank, type Priority, type Task } from '../../types/task.js';
import { compareRanked } from './recommend.js';
import { DEFAULT_SCORING_POLICY, scoreAll, type ScoringPolicy } from './score.js';

/** Compact task representation for list output. */
export interface CompactTask {
  id: string;
  title: string;
  priority: Priority;
  energy: Task['energy'];
  attention: Task['attention'];
  dueAt: string | null;
  score: number;
  completed: boolean;
  sources: string[];
}

/** Convert a full Task to compact representation. */
export function toCompact(task: Task): CompactTask {
  return {
    id: task.id,
    title: task.title,
    priority: task.priority,
    energy: task.energy,
    attention: task.attention,
    dueAt: task.dueAt,
    score: task.score ?? 0,
    completed: task.completed,
    sources: Object.keys(task.provenance).sort(),
  };
}

/** Filter options for listing tasks. */
export interface ListTasksOptions {
  /** Only tasks with a record in this source. */
  source?: string;
  priority?: Priority;
  /** Include completed tasks. */
  all?: boolean;
  now?: Date;
  policy?: ScoringPolicy;
}

/** Result of listing tasks. */
export interface ListTasksResult {
  tasks: Task[];
  total: number;
  filtered: number;
}

/**
 * Filter and order unified tasks: priority first, then the ranking order
 * the Recommender uses.
 */
export function listTasks(tasks: readonly Task[], options: ListTasksOptions = {}): ListTasksResult {
  let filtered = tasks.filter((t) => options.all || !t.completed);

  if (options.source) {
    const source = options.source;
    filtered = filtered.filter((t) => source in t.provenance);
  }

  if (options.priority) {
    filtered = filtered.filter((t) => t.priority === options.priority);
  }

  const ordered = scoreAll(filtered, options.now ?? new Date(), options.policy ?? DEFAULT_SCORING_POLICY)
    .sort((a, b) => priorityRank(a.priority) - priorityRank(b.priority) || compareRanked(a, b));

  return {
    tasks: ordered,
    total: tasks.length,
    filtered: ordered.length,
  };
}

/**
 * Resolve a task by exact id or unique id prefix.
 * Returns every candidate when the prefix is ambiguous.
 */
export function findTaskById(tasks: readonly Task[], idOrPrefix: string): Task[] {
  const wanted = idOrPrefix.trim();
  if (!wanted) return [];
  const exact = tasks.find((t) => t.id === wanted);
  if (exact) return [exact];
  return tasks.filter((t) => t.id.startsWith(wanted));
}
