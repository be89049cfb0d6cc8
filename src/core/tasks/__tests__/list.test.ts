/**
 * Tests for task listing and id lookup.
 */

import { describe, it, expect } from 'vitest';
import type { Task } from '../../../types/task.js';
import { findTaskById, listTasks, toCompact } from '../list.js';

const now = new Date(2026, 9, 19, 9, 0);

function makeTask(id: string, overrides: Partial<Task> = {}): Task {
  return {
    id,
    title: `Task ${id}`,
    normalizedKey: `task ${id}`,
    priority: 'P3',
    energy: 'medium',
    attention: 'medium',
    dueAt: null,
    createdAt: '2026-10-01T09:00:00.000Z',
    lastActivityAt: '2026-10-01T09:00:00.000Z',
    completed: false,
    provenance: { todoist: id },
    labels: [],
    ...overrides,
  };
}

const TASKS = [
  makeTask('t100', { priority: 'P3', energy: 'high' }),
  makeTask('t200', { priority: 'P1', provenance: { vault: 'Tasks.md#a' } }),
  makeTask('t300', { priority: 'P3', completed: true }),
  makeTask('t400', { priority: 'P3', provenance: { todoist: '4', vault: 'Tasks.md#b' } }),
];

describe('listTasks', () => {
  it('lists open tasks by priority, then score', () => {
    const result = listTasks(TASKS, { now });
    expect(result.tasks.map((t) => t.id)).toEqual(['t200', 't100', 't400']);
    expect(result.tasks.map((t) => t.score)).toEqual([4, 3, 2]);
    expect(result.total).toBe(4);
    expect(result.filtered).toBe(3);
  });

  it('includes completed tasks with all', () => {
    expect(listTasks(TASKS, { now, all: true }).filtered).toBe(4);
  });

  it('filters by source and priority', () => {
    expect(listTasks(TASKS, { now, source: 'vault' }).tasks.map((t) => t.id)).toEqual(['t200', 't400']);
    expect(listTasks(TASKS, { now, priority: 'P1' }).tasks.map((t) => t.id)).toEqual(['t200']);
    expect(listTasks(TASKS, { now, source: 'daily-note' }).filtered).toBe(0);
  });
});

describe('findTaskById', () => {
  it('matches an exact id', () => {
    expect(findTaskById(TASKS, 't100').map((t) => t.id)).toEqual(['t100']);
  });

  it('matches a unique prefix', () => {
    expect(findTaskById(TASKS, 't2').map((t) => t.id)).toEqual(['t200']);
  });

  it('returns every candidate for an ambiguous prefix', () => {
    expect(findTaskById(TASKS, 't')).toHaveLength(4);
  });

  it('returns nothing for an unknown or blank id', () => {
    expect(findTaskById(TASKS, 'x9')).toEqual([]);
    expect(findTaskById(TASKS, '  ')).toEqual([]);
  });
});

describe('toCompact', () => {
  it('keeps display fields and sorted source names', () => {
    expect(toCompact(makeTask('t400', { provenance: { vault: 'b', todoist: '4' }, score: 2 }))).toEqual({
      id: 't400',
      title: 'Task t400',
      priority: 'P3',
      energy: 'medium',
      attention: 'medium',
      dueAt: null,
      score: 2,
      completed: false,
      sources: ['todoist', 'vault'],
    });
  });
});
