/**
 * Deduplicator: merges normalized tasks from every source into one set.
 *
 * Matching is two-stage. Records with equal matching keys are candidates
 * outright; records with differing keys must reach the token-set similarity
 * threshold. Either way the two creation times must fall inside the window,
 * so generic titles ("Follow up") captured weeks apart stay separate. Last
 * activity stands in for a creation time no source recorded.
 *
 * Grouping is a union over candidate pairs taken in a fixed order
 * (strongest match first, ties by record reference), so the result does
 * not depend on input order. Two groups join only when every record of one
 * is a candidate for every record of the other, so a chain of records each
 * within the window of the next never collapses into one task. A union that
 * would give one system two native ids is refused: when in doubt, it is
 * not a duplicate.
 */

import { DAY_MS } from '../dates.js';
import {
  levelRank,
  priorityRank,
  type Provenance,
  type Task,
} from '../../types/task.js';
import { deriveTaskId, tokenSimilarity } from './identity.js';
import { hasUnknownCreation } from './normalize.js';

export interface MergeOptions {
  /** Minimum token-set overlap for differing keys (default 0.8). */
  similarityThreshold?: number;
  /** Maximum distance between creation times, in days (default 7). */
  windowDays?: number;
}

export const DEFAULT_SIMILARITY_THRESHOLD = 0.8;
export const DEFAULT_WINDOW_DAYS = 7;

interface CandidatePair {
  a: number;
  b: number;
  /** Same record seen twice: always merged. */
  sameRecord: boolean;
  similarity: number;
  gapMs: number;
  ref: string;
}

/** Stable reference for a task: its provenance entries, sorted. */
export function provenanceRef(provenance: Provenance): string {
  return Object.entries(provenance)
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([system, id]) => `${system}:${id}`)
    .join('|');
}

function sharesRecord(a: Provenance, b: Provenance): boolean {
  return Object.entries(a).some(([system, id]) => b[system] === id);
}

/** False when both maps name the same system with different native ids. */
function compatible(a: Provenance, b: Provenance): boolean {
  return Object.entries(a).every(([system, id]) => b[system] === undefined || b[system] === id);
}

/** Creation time for the window check; last activity when creation is unknown. */
function windowTime(task: Task): number {
  return Date.parse(hasUnknownCreation(task) ? task.lastActivityAt : task.createdAt);
}

function byRef(a: { ref: string }, b: { ref: string }): number {
  return a.ref < b.ref ? -1 : a.ref > b.ref ? 1 : 0;
}

function minIso(a: string, b: string): string {
  return a <= b ? a : b;
}

function maxIso(a: string, b: string): string {
  return a >= b ? a : b;
}

/**
 * Combine two records of the same logical task.
 * Most urgent priority and most demanding requirements win; earliest due
 * date; min created; max activity; completed only if both are.
 * Commutative and associative. Title and id are settled by the caller.
 */
export function combine(a: Task, b: Task): Task {
  return {
    ...a,
    priority: priorityRank(a.priority) <= priorityRank(b.priority) ? a.priority : b.priority,
    energy: levelRank(a.energy) >= levelRank(b.energy) ? a.energy : b.energy,
    attention: levelRank(a.attention) >= levelRank(b.attention) ? a.attention : b.attention,
    dueAt: a.dueAt === null ? b.dueAt : b.dueAt === null ? a.dueAt : minIso(a.dueAt, b.dueAt),
    createdAt: minIso(a.createdAt, b.createdAt),
    lastActivityAt: maxIso(a.lastActivityAt, b.lastActivityAt),
    completed: a.completed && b.completed,
    provenance: { ...a.provenance, ...b.provenance },
    labels: [...new Set([...a.labels, ...b.labels])].sort(),
  };
}

function findRoot(parent: number[], i: number): number {
  let root = i;
  while (parent[root] !== root) root = parent[root];
  // path compression
  let cur = i;
  while (parent[cur] !== root) {
    const next = parent[cur];
    parent[cur] = root;
    cur = next;
  }
  return root;
}

/**
 * Merge tasks from all sources into the unified set.
 * Deterministic and order-independent; output is sorted by creation time,
 * then id.
 */
export function merge(tasks: readonly Task[], options: MergeOptions = {}): Task[] {
  const threshold = options.similarityThreshold ?? DEFAULT_SIMILARITY_THRESHOLD;
  const windowMs = (options.windowDays ?? DEFAULT_WINDOW_DAYS) * DAY_MS;

  const members = tasks
    .map((task) => ({ task, ref: provenanceRef(task.provenance) }))
    .sort(byRef);

  const pairs: CandidatePair[] = [];
  for (let i = 0; i < members.length; i++) {
    for (let j = i + 1; j < members.length; j++) {
      const a = members[i];
      const b = members[j];
      const ref = `${a.ref}>${b.ref}`;

      if (sharesRecord(a.task.provenance, b.task.provenance)) {
        pairs.push({ a: i, b: j, sameRecord: true, similarity: 1, gapMs: 0, ref });
        continue;
      }
      if (!compatible(a.task.provenance, b.task.provenance)) continue;

      const gapMs = Math.abs(windowTime(a.task) - windowTime(b.task));
      if (gapMs > windowMs) continue;

      const similarity = a.task.normalizedKey === b.task.normalizedKey
        ? 1
        : tokenSimilarity(a.task.normalizedKey, b.task.normalizedKey);
      if (similarity < threshold) continue;

      pairs.push({ a: i, b: j, sameRecord: false, similarity, gapMs, ref });
    }
  }

  pairs.sort((x, y) => {
    if (x.sameRecord !== y.sameRecord) return x.sameRecord ? -1 : 1;
    if (x.similarity !== y.similarity) return y.similarity - x.similarity;
    if (x.gapMs !== y.gapMs) return x.gapMs - y.gapMs;
    return x.ref < y.ref ? -1 : x.ref > y.ref ? 1 : 0;
  });

  const linked = new Set(pairs.map((pair) => `${pair.a}:${pair.b}`));
  const isLinked = (x: number, y: number): boolean =>
    linked.has(x < y ? `${x}:${y}` : `${y}:${x}`);

  const parent = members.map((_, i) => i);
  const groupProvenance = members.map((m) => ({ ...m.task.provenance }));
  const groupMembers = members.map((_, i) => [i]);

  for (const pair of pairs) {
    const ra = findRoot(parent, pair.a);
    const rb = findRoot(parent, pair.b);
    if (ra === rb) continue;
    const pa = groupProvenance[ra];
    const pb = groupProvenance[rb];
    if (!compatible(pa, pb)) continue;
    const ma = groupMembers[ra];
    const mb = groupMembers[rb];
    if (!ma.every((x) => mb.every((y) => isLinked(x, y)))) continue;

    const [keep, drop] = ra < rb ? [ra, rb] : [rb, ra];
    parent[drop] = keep;
    groupProvenance[keep] = { ...pa, ...pb };
    groupMembers[keep] = [...ma, ...mb];
  }

  const groups = new Map<number, Array<{ task: Task; ref: string }>>();
  for (let i = 0; i < members.length; i++) {
    const root = findRoot(parent, i);
    const group = groups.get(root) ?? [];
    group.push(members[i]);
    groups.set(root, group);
  }

  const unified: Task[] = [];
  for (const group of groups.values()) {
    unified.push(unify(group));
  }

  return unified.sort((a, b) => {
    if (a.createdAt !== b.createdAt) return a.createdAt < b.createdAt ? -1 : 1;
    return a.id < b.id ? -1 : a.id > b.id ? 1 : 0;
  });
}

/** Fold a group into one task, taking title and id from its earliest record. */
function unify(group: Array<{ task: Task; ref: string }>): Task {
  const ordered = [...group].sort((x, y) => {
    if (x.task.createdAt !== y.task.createdAt) return x.task.createdAt < y.task.createdAt ? -1 : 1;
    return byRef(x, y);
  });
  const canonical = ordered[0].task;
  const combined = ordered.slice(1).reduce((acc, m) => combine(acc, m.task), canonical);

  const { score: _stale, ...fields } = combined;
  return {
    ...fields,
    id: deriveTaskId(canonical.normalizedKey, combined.createdAt),
    title: canonical.title,
    normalizedKey: canonical.normalizedKey,
  };
}
