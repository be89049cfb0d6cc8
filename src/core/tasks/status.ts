/**
 * Status summary: inventory, capacity, deadline alerts and source health
 * for one aggregation run.
 */

import { calendarDaysBetween } from '../dates.js';
import { PRIORITIES, type Capacity, type Priority, type Task } from '../../types/task.js';
import type { AggregateResult, SourceReport } from './aggregate.js';

/** Overdue tasks listed in the summary. */
export const OVERDUE_LIST_SIZE = 5;

export interface DeadlineAlert {
  id: string;
  title: string;
  priority: Priority;
  dueAt: string;
  /** Calendar days until due; negative when overdue. */
  daysUntilDue: number;
}

export interface StatusSummary {
  inventory: {
    /** Normalized records before deduplication. */
    raw: number;
    unified: number;
    duplicatesMerged: number;
    skipped: number;
    open: number;
    completed: number;
  };
  /** Open tasks with a record in each source. */
  bySource: Record<string, number>;
  byPriority: Record<Priority, number>;
  capacity: Capacity;
  overdue: { count: number; tasks: DeadlineAlert[] };
  critical: { count: number; tasks: DeadlineAlert[] };
  sources: SourceReport[];
}

export interface StatusOptions {
  now?: Date;
  /** Open tasks due within this many days are critical. */
  criticalWithinDays?: number;
}

function toAlert(task: Task, dueAt: string, now: Date): DeadlineAlert {
  return {
    id: task.id,
    title: task.title,
    priority: task.priority,
    dueAt,
    daysUntilDue: calendarDaysBetween(now, new Date(dueAt)),
  };
}

function byDueThenId(a: DeadlineAlert, b: DeadlineAlert): number {
  if (a.dueAt !== b.dueAt) return a.dueAt < b.dueAt ? -1 : 1;
  return a.id < b.id ? -1 : a.id > b.id ? 1 : 0;
}

/**
 * Summarize an aggregation run.
 * A task is critical when it is due within `criticalWithinDays` days
 * (overdue included), or when it is P1 and has any due date.
 */
export function summarize(
  result: AggregateResult,
  capacity: Capacity,
  options: StatusOptions = {},
): StatusSummary {
  const now = options.now ?? new Date();
  const criticalWithin = options.criticalWithinDays ?? 2;

  const open = result.tasks.filter((t) => !t.completed);
  const bySource: Record<string, number> = {};
  const byPriority: Record<Priority, number> = { P1: 0, P2: 0, P3: 0, P4: 0 };
  const overdue: DeadlineAlert[] = [];
  const critical: DeadlineAlert[] = [];

  for (const task of open) {
    for (const system of Object.keys(task.provenance)) {
      bySource[system] = (bySource[system] ?? 0) + 1;
    }
    byPriority[task.priority] += 1;

    if (task.dueAt === null) continue;
    const alert = toAlert(task, task.dueAt, now);
    if (alert.daysUntilDue < 0) overdue.push(alert);
    if (alert.daysUntilDue <= criticalWithin || task.priority === 'P1') critical.push(alert);
  }

  overdue.sort(byDueThenId);
  critical.sort((a, b) =>
    PRIORITIES.indexOf(a.priority) - PRIORITIES.indexOf(b.priority) || byDueThenId(a, b));

  return {
    inventory: {
      raw: result.rawCount,
      unified: result.tasks.length,
      duplicatesMerged: result.rawCount - result.tasks.length,
      skipped: result.skipped.length,
      open: open.length,
      completed: result.tasks.length - open.length,
    },
    bySource,
    byPriority,
    capacity,
    overdue: { count: overdue.length, tasks: overdue.slice(0, OVERDUE_LIST_SIZE) },
    critical: { count: critical.length, tasks: critical },
    sources: result.sources,
  };
}
