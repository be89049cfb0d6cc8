/**
 * Tests for the Deduplicator.
 */

import { describe, it, expect } from 'vitest';
import type { RawRecord } from '../../sources/provider.js';
import { combine, merge, provenanceRef } from '../dedupe.js';
import { deriveTaskId } from '../identity.js';
import { normalize } from '../normalize.js';

const observedAt = new Date('2026-10-19T00:00:00.000Z');

function rec(source: string, raw: RawRecord) {
  return normalize(source, raw, { observedAt });
}

describe('merge', () => {
  it('merges the same task captured in two systems', () => {
    const todoist = rec('todoist', {
      nativeId: '101',
      title: 'Write report',
      priority: 4,
      created: '2026-10-10T09:00:00.000Z',
    });
    const vault = rec('vault', {
      nativeId: 'Tasks.md#abc',
      title: 'write report.',
      priority: 'P2',
      energy: 'high',
      created: '2026-10-12T09:00:00.000Z',
    });

    const [task, ...rest] = merge([vault, todoist]);
    expect(rest).toHaveLength(0);
    expect(task?.title).toBe('Write report');
    expect(task?.id).toBe(deriveTaskId('write report', '2026-10-10T09:00:00.000Z'));
    expect(task?.priority).toBe('P1');
    expect(task?.energy).toBe('high');
    expect(task?.provenance).toEqual({ todoist: '101', vault: 'Tasks.md#abc' });
  });

  it('merges near-identical titles at the similarity threshold', () => {
    const a = rec('todoist', { nativeId: '1', title: 'Book flights to the conference', created: '2026-10-10T09:00:00.000Z' });
    const b = rec('vault', { nativeId: 'v1', title: 'Book flights to conference', created: '2026-10-11T09:00:00.000Z' });
    // 4 shared tokens of 5
    expect(merge([a, b])).toHaveLength(1);
  });

  it('keeps dissimilar titles apart', () => {
    const a = rec('todoist', { nativeId: '1', title: 'Write quarterly report', created: '2026-10-10T09:00:00.000Z' });
    const b = rec('vault', { nativeId: 'v1', title: 'Write the quarterly report', created: '2026-10-10T09:00:00.000Z' });
    expect(merge([a, b])).toHaveLength(2);
  });

  it('keeps equal titles created outside the window apart', () => {
    const a = rec('todoist', { nativeId: '1', title: 'Follow up', created: '2026-09-01T09:00:00.000Z' });
    const b = rec('vault', { nativeId: 'v1', title: 'Follow up', created: '2026-10-01T09:00:00.000Z' });
    expect(merge([a, b])).toHaveLength(2);
    expect(merge([a, b], { windowDays: 60 })).toHaveLength(1);
  });

  it('never merges two records of the same system', () => {
    const a = rec('todoist', { nativeId: '1', title: 'Pay rent', created: '2026-10-10T09:00:00.000Z' });
    const b = rec('todoist', { nativeId: '2', title: 'Pay rent', created: '2026-10-10T10:00:00.000Z' });
    expect(merge([a, b])).toHaveLength(2);
  });

  it('refuses a chain that would give one system two ids', () => {
    const t1 = rec('todoist', { nativeId: '1', title: 'Pay rent', created: '2026-10-10T09:00:00.000Z' });
    const v = rec('vault', { nativeId: 'v1', title: 'Pay rent', created: '2026-10-10T09:30:00.000Z' });
    const t2 = rec('todoist', { nativeId: '2', title: 'Pay rent', created: '2026-10-10T10:30:00.000Z' });

    const merged = merge([t1, v, t2]);
    expect(merged).toHaveLength(2);
    const provenances = merged.map((t) => provenanceRef(t.provenance)).sort();
    // the closest pair wins
    expect(provenances).toEqual(['todoist:1|vault:v1', 'todoist:2']);
  });

  it('does not chain records that are only close to their neighbours', () => {
    const todoist = rec('todoist', { nativeId: '1', title: 'Follow up', created: '2026-10-01T09:00:00.000Z' });
    const vault = rec('vault', { nativeId: 'v1', title: 'Follow up', created: '2026-10-07T09:00:00.000Z' });
    const daily = rec('daily-note', { nativeId: 'd1', title: 'Follow up', created: '2026-10-13T09:00:00.000Z' });

    const merged = merge([todoist, vault, daily]);
    expect(merged).toHaveLength(2);
    const provenances = merged.map((t) => provenanceRef(t.provenance)).sort();
    expect(provenances).toEqual(['daily-note:d1|vault:v1', 'todoist:1']);
  });

  it('collapses the same record seen twice', () => {
    const a = rec('todoist', { nativeId: '1', title: 'Pay rent', created: '2026-10-10T09:00:00.000Z' });
    expect(merge([a, { ...a }])).toHaveLength(1);
  });

  it('does not depend on input order', () => {
    const records = [
      rec('todoist', { nativeId: '1', title: 'Write report', created: '2026-10-10T09:00:00.000Z' }),
      rec('vault', { nativeId: 'v1', title: 'Write report', created: '2026-10-11T09:00:00.000Z' }),
      rec('daily-note', { nativeId: 'd1', title: 'Write report', created: '2026-10-12T09:00:00.000Z' }),
      rec('vault', { nativeId: 'v2', title: 'Call the bank', created: '2026-10-12T09:00:00.000Z' }),
    ];
    const forward = merge(records);
    const backward = merge([...records].reverse());
    expect(backward).toEqual(forward);
    expect(forward.map((t) => t.title)).toEqual(['Write report', 'Call the bank']);
  });
});

describe('combine', () => {
  const base = rec('todoist', {
    nativeId: '1',
    title: 'Write report',
    priority: 2,
    energy: 'low',
    attention: 'high',
    due: '2026-10-20T00:00:00.000Z',
    created: '2026-10-10T09:00:00.000Z',
    labels: ['work'],
  });
  const other = rec('vault', {
    nativeId: 'v1',
    title: 'Write report',
    priority: 'P1',
    energy: 'medium',
    attention: 'low',
    due: '2026-10-18T00:00:00.000Z',
    created: '2026-10-11T09:00:00.000Z',
    modified: '2026-10-15T09:00:00.000Z',
    labels: ['q4'],
    completed: true,
  });

  it('keeps the most conservative value of every field', () => {
    const c = combine(base, other);
    expect(c.priority).toBe('P1');
    expect(c.energy).toBe('medium');
    expect(c.attention).toBe('high');
    expect(c.dueAt).toBe('2026-10-18T00:00:00.000Z');
    expect(c.createdAt).toBe('2026-10-10T09:00:00.000Z');
    expect(c.lastActivityAt).toBe('2026-10-15T09:00:00.000Z');
    expect(c.labels).toEqual(['q4', 'work']);
  });

  it('is completed only when every record is', () => {
    expect(combine(base, other).completed).toBe(false);
    expect(combine({ ...base, completed: true }, other).completed).toBe(true);
  });

  it('keeps a due date when only one record has one', () => {
    expect(combine({ ...base, dueAt: null }, other).dueAt).toBe('2026-10-18T00:00:00.000Z');
  });
});
