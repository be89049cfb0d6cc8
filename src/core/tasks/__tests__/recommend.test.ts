/**
 * Tests for the Recommender.
 */

import { describe, it, expect } from 'vitest';
import type { Task } from '../../../types/task.js';
import { compareRanked, fitsCapacity, recommend } from '../recommend.js';

const now = new Date(2026, 9, 19, 9, 0);

function localDay(offsetDays: number): string {
  return new Date(2026, 9, 19 + offsetDays).toISOString();
}

function makeTask(id: string, overrides: Partial<Task> = {}): Task {
  return {
    id,
    title: `Task ${id}`,
    normalizedKey: `task ${id}`,
    priority: 'P4',
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

describe('fitsCapacity', () => {
  it('requires both requirements to be within capacity', () => {
    const task = makeTask('a', { energy: 'high', attention: 'low' });
    expect(fitsCapacity(task, { energy: 'high', attention: 'low' })).toBe(true);
    expect(fitsCapacity(task, { energy: 'medium', attention: 'high' })).toBe(false);
  });
});

describe('recommend', () => {
  const capacity = { energy: 'high', attention: 'high' } as const;

  it('ranks by score, breaking ties on the earlier due date', () => {
    // 9, 9 and 6
    const a = makeTask('a', { priority: 'P2', energy: 'high', dueAt: localDay(-1) });
    const b = makeTask('b', { priority: 'P2', energy: 'high', dueAt: localDay(-2) });
    const c = makeTask('c', { priority: 'P3', energy: 'high', dueAt: localDay(-1) });

    const picked = recommend([a, c, b], capacity, { now });
    expect(picked.map((t) => t.id)).toEqual(['b', 'a', 'c']);
    expect(picked.map((t) => t.score)).toEqual([9, 9, 6]);
  });

  it('ranks a task due today ahead of one due tomorrow and an undated one', () => {
    const none = makeTask('none', { priority: 'P1' });
    const tomorrow = makeTask('tomorrow', { priority: 'P1', dueAt: localDay(1) });
    const today = makeTask('today', { priority: 'P1', dueAt: localDay(0) });

    const picked = recommend([none, tomorrow, today], capacity, { now });
    expect(picked.map((t) => t.id)).toEqual(['today', 'tomorrow', 'none']);
    expect(picked.map((t) => t.score)).toEqual([6, 4.8, 4]);
  });

  it('puts undated tasks after dated ones with the same score', () => {
    // both score 4: P1 x medium x (no date | due in 30 days)
    const undated = makeTask('a', { priority: 'P1' });
    const later = makeTask('b', { priority: 'P1', dueAt: localDay(30) });
    expect(recommend([undated, later], capacity, { now }).map((t) => t.id)).toEqual(['b', 'a']);
  });

  it('falls back to creation time, then id', () => {
    const older = makeTask('z', { createdAt: '2026-09-01T00:00:00.000Z' });
    const newer = makeTask('a', { createdAt: '2026-10-01T00:00:00.000Z' });
    const twin = makeTask('b', { createdAt: '2026-10-01T00:00:00.000Z' });
    expect(recommend([twin, newer, older], capacity, { now }).map((t) => t.id)).toEqual(['z', 'a', 'b']);
  });

  it('filters tasks above capacity and completed tasks', () => {
    const heavy = makeTask('heavy', { priority: 'P1', energy: 'high' });
    const focused = makeTask('focused', { priority: 'P1', attention: 'high' });
    const done = makeTask('done', { priority: 'P1', completed: true });
    const light = makeTask('light', { energy: 'low', attention: 'low' });

    const picked = recommend([heavy, focused, done, light], { energy: 'medium', attention: 'medium' }, { now });
    expect(picked.map((t) => t.id)).toEqual(['light']);
  });

  it('returns an empty list when nothing fits', () => {
    const heavy = makeTask('heavy', { energy: 'high' });
    expect(recommend([heavy], { energy: 'low', attention: 'low' }, { now })).toEqual([]);
  });

  it('caps the list at maxTasks, defaulting to five', () => {
    const tasks = ['a', 'b', 'c', 'd', 'e', 'f', 'g'].map((id) => makeTask(id));
    expect(recommend(tasks, capacity, { now })).toHaveLength(5);
    expect(recommend(tasks, capacity, { now, maxTasks: 2 }).map((t) => t.id)).toEqual(['a', 'b']);
  });
});

describe('compareRanked', () => {
  it('orders higher scores first', () => {
    const low = makeTask('a', { score: 1 });
    const high = makeTask('b', { score: 2 });
    expect([low, high].sort(compareRanked).map((t) => t.id)).toEqual(['b', 'a']);
  });
});
