/**
 * Human-readable renderers for the task commands.
 *
 * Each renderer takes the same data shape that would be passed to
 * formatSuccess() and returns a string suitable for terminal display.
 */

import type { SourceReport } from '../../core/tasks/aggregate.js';
import type { SystemFailure, SystemSuccess, CompletionResult } from '../../core/tasks/complete.js';
import type { CompactTask } from '../../core/tasks/list.js';
import type { DeadlineAlert, StatusSummary } from '../../core/tasks/status.js';
import { PRIORITIES, type Capacity } from '../../types/task.js';
import {
  BOX, hRule, palette,
  doneSymbol, prioritySymbol, priorityColor, shortDate,
} from './colors.js';

// ---------------------------------------------------------------------------
// Result shapes
// ---------------------------------------------------------------------------

export interface RecommendView {
  capacity: Capacity;
  recommendations: CompactTask[];
  /** Open tasks before the capacity filter. */
  openTasks: number;
  sources: SourceReport[];
}

export interface ListView {
  tasks: CompactTask[];
  total: number;
  filtered: number;
}

export interface CompleteView {
  taskId: string;
  title: string;
  state: CompletionResult['state'];
  dispatched: string[];
  succeeded: SystemSuccess[];
  failed: SystemFailure[];
}

export interface StaleTask extends CompactTask {
  lastActivityAt: string;
  idleDays: number;
}

export interface CleanupView {
  thresholdDays: number;
  stale: StaleTask[];
  openTasks: number;
}

export type StatusView = StatusSummary;

// ---------------------------------------------------------------------------
// shared lines
// ---------------------------------------------------------------------------

function taskLine(t: CompactTask): string {
  const { BOLD, DIM, NC } = palette();
  const pCol = priorityColor(t.priority);
  const due = t.dueAt ? ` ${DIM}due ${shortDate(t.dueAt)}${NC}` : '';
  return `  ${BOLD}${t.id}${NC} ${doneSymbol(t.completed)} ${pCol}[${t.priority}]${NC} ${t.title}${due}`;
}

function detailLine(t: CompactTask): string {
  const { DIM, NC } = palette();
  return `      ${DIM}energy ${t.energy}, attention ${t.attention}, score ${t.score.toFixed(2)} | ${t.sources.join(', ')}${NC}`;
}

function sourceLines(sources: readonly SourceReport[]): string[] {
  const { GREEN, RED, YELLOW, NC } = palette();
  return sources.map((s) => {
    if (s.status === 'ok') {
      return `  ${GREEN}${s.name}${NC}: ${s.normalized}/${s.fetched} records`;
    }
    const col = s.status === 'timeout' ? YELLOW : RED;
    return `  ${col}${s.name}${NC}: ${s.status}${s.error ? ` (${s.error})` : ''}`;
  });
}

// ---------------------------------------------------------------------------
// recommend
// ---------------------------------------------------------------------------

export function renderRecommend(data: RecommendView, quiet: boolean): string {
  const { BOLD, DIM, NC } = palette();
  if (quiet) return data.recommendations.map((t) => `${t.id} ${t.title}`).join('\n');

  const lines: string[] = [];
  lines.push(`${BOLD}Capacity:${NC} energy ${data.capacity.energy}, attention ${data.capacity.attention}`);
  lines.push('');

  if (data.recommendations.length === 0) {
    lines.push(`No open task fits today's capacity (${data.openTasks} open).`);
    return lines.join('\n');
  }

  data.recommendations.forEach((t, i) => {
    lines.push(`${BOLD}${i + 1}.${NC}${taskLine(t)}`);
    lines.push(detailLine(t));
  });
  lines.push('');
  lines.push(`${DIM}${hRule(40)}${NC}`);
  lines.push(`${data.recommendations.length} of ${data.openTasks} open tasks`);
  return lines.join('\n');
}

// ---------------------------------------------------------------------------
// list
// ---------------------------------------------------------------------------

/** Render a list of tasks grouped by priority. */
export function renderList(data: ListView, quiet: boolean): string {
  const { DIM, NC } = palette();
  if (data.tasks.length === 0) {
    return quiet ? '' : 'No tasks found.';
  }
  if (quiet) {
    return data.tasks.map((t) => `${t.id} ${doneSymbol(t.completed)} ${t.title}`).join('\n');
  }

  const lines: string[] = [];
  for (const prio of PRIORITIES) {
    const group = data.tasks.filter((t) => t.priority === prio);
    if (group.length === 0) continue;

    lines.push('');
    lines.push(`${priorityColor(prio)}${prioritySymbol(prio)} ${prio} (${group.length})${NC}`);
    for (const t of group) {
      lines.push(taskLine(t));
      lines.push(detailLine(t));
    }
  }

  lines.push('');
  lines.push(`${DIM}${hRule(40)}${NC}`);
  lines.push(`Showing ${data.filtered} of ${data.total} tasks`);
  return lines.join('\n');
}

// ---------------------------------------------------------------------------
// complete
// ---------------------------------------------------------------------------

export function renderComplete(data: CompleteView, quiet: boolean): string {
  const { BOLD, GREEN, RED, YELLOW, DIM, NC } = palette();
  if (quiet) return `${data.taskId} ${data.state}`;

  const lines: string[] = [];
  const stateCol = data.state === 'settled' ? GREEN : YELLOW;
  lines.push(`${stateCol}${data.state === 'settled' ? 'Completed' : 'Partially completed'}:${NC} ${BOLD}${data.taskId}${NC} ${data.title}`);

  for (const s of data.succeeded) {
    const note = s.previously ? ` ${DIM}(earlier run)${NC}` : '';
    lines.push(`  ${GREEN}${s.system}${NC}: ${s.outcome}${note}`);
  }
  for (const f of data.failed) {
    lines.push(`  ${RED}${f.system}${NC}: ${f.reason}`);
  }
  if (data.failed.length > 0) {
    lines.push('');
    lines.push(`Run ${BOLD}complete ${data.taskId}${NC} again to retry the failed systems.`);
  }
  return lines.join('\n');
}

// ---------------------------------------------------------------------------
// cleanup
// ---------------------------------------------------------------------------

export function renderCleanup(data: CleanupView, quiet: boolean): string {
  const { BOLD, DIM, NC, YELLOW } = palette();
  if (quiet) return data.stale.map((t) => `${t.id} ${t.idleDays}`).join('\n');

  if (data.stale.length === 0) {
    return `No stale tasks (threshold ${data.thresholdDays} days).`;
  }

  const lines: string[] = [];
  lines.push(`${BOLD}Stale tasks${NC} (no activity for more than ${data.thresholdDays} days)`);
  lines.push('');
  for (const t of data.stale) {
    lines.push(taskLine(t));
    lines.push(`      ${YELLOW}${t.idleDays} days idle${NC} ${DIM}since ${shortDate(t.lastActivityAt)}${NC}`);
  }
  lines.push('');
  lines.push(`${DIM}${hRule(40)}${NC}`);
  lines.push(`${data.stale.length} of ${data.openTasks} open tasks are stale`);
  return lines.join('\n');
}

// ---------------------------------------------------------------------------
// status
// ---------------------------------------------------------------------------

function alertLine(a: DeadlineAlert): string {
  const { BOLD, RED, NC } = palette();
  const when = a.daysUntilDue < 0
    ? `${RED}${-a.daysUntilDue}d overdue${NC}`
    : a.daysUntilDue === 0 ? `${RED}due today${NC}` : `due in ${a.daysUntilDue}d`;
  return `  ${BOLD}${a.id}${NC} ${priorityColor(a.priority)}[${a.priority}]${NC} ${a.title} (${when})`;
}

export function renderStatus(data: StatusView, quiet: boolean): string {
  const { BOLD, NC } = palette();
  const inv = data.inventory;
  if (quiet) {
    return `${inv.open} open, ${data.overdue.count} overdue, ${data.critical.count} critical`;
  }

  const w = 50;
  const hr = hRule(w);
  const lines: string[] = [];
  lines.push(`${BOX.tl}${hr}${BOX.tr}`);
  lines.push(`${BOX.v}  ${BOLD}Tasks${NC}: ${inv.open} open, ${inv.completed} completed`);
  lines.push(`${BOX.v}  Records: ${inv.raw} -> ${inv.unified} unified (${inv.duplicatesMerged} merged, ${inv.skipped} skipped)`);
  lines.push(`${BOX.v}  Capacity: energy ${data.capacity.energy}, attention ${data.capacity.attention}`);
  lines.push(`${BOX.ml}${hr}${BOX.mr}`);
  lines.push(`${BOX.v}  ${PRIORITIES.map((p) => `${p}: ${data.byPriority[p]}`).join('  ')}`);
  lines.push(`${BOX.v}  ${Object.entries(data.bySource).map(([s, n]) => `${s}: ${n}`).join('  ') || 'no open tasks'}`);
  lines.push(`${BOX.bl}${hr}${BOX.br}`);

  if (data.overdue.count > 0) {
    lines.push('');
    lines.push(`${BOLD}Overdue${NC} (${data.overdue.count})`);
    lines.push(...data.overdue.tasks.map(alertLine));
  }
  if (data.critical.count > 0) {
    lines.push('');
    lines.push(`${BOLD}Critical${NC} (${data.critical.count})`);
    lines.push(...data.critical.tasks.map(alertLine));
  }

  lines.push('');
  lines.push(`${BOLD}Sources${NC}`);
  lines.push(...sourceLines(data.sources));
  return lines.join('\n');
}
