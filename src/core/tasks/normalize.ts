/**
 * Normalizer: maps one source's raw record onto the unified Task shape.
 *
 * Vocabulary tables are fixed and documented here. Fields a source omits
 * or cannot express fall back to P4 / medium / medium.
 */

import { MalformedRecordError } from '../errors.js';
import { toIso } from '../dates.js';
import type { RawRecord } from '../sources/provider.js';
import { isLevel, type Level, type Priority, type Task } from '../../types/task.js';
import { deriveTaskId, normalizedKey } from './identity.js';

/**
 * How a source numbers its priorities.
 * - inverse: the highest native number is the most urgent (4 -> P1 .. 1 -> P4)
 * - direct: 1 is the most urgent (1 -> P1 .. 4 -> P4)
 */
export type PriorityScale = 'inverse' | 'direct';

/** Documented priority scale per known source. Unknown sources are direct. */
export const PRIORITY_SCALES: Readonly<Record<string, PriorityScale>> = {
  todoist: 'inverse',
  vault: 'direct',
  'daily-note': 'direct',
};

const INVERSE_MAP: Record<number, Priority> = { 4: 'P1', 3: 'P2', 2: 'P3', 1: 'P4' };
const DIRECT_MAP: Record<number, Priority> = { 1: 'P1', 2: 'P2', 3: 'P3', 4: 'P4' };

export const DEFAULT_PRIORITY: Priority = 'P4';
export const DEFAULT_LEVEL: Level = 'medium';

const PRIORITY_LABEL = /^#?p([1-4])$/i;

export interface NormalizeOptions {
  /** Override the documented scale for this source. */
  priorityScale?: PriorityScale;
  /** Last activity of records that carry neither created nor modified. */
  observedAt?: Date;
}

/**
 * Creation time of a record that does not say when it was created.
 * Fixed, so the task id of such a record depends on its title alone.
 */
export const UNKNOWN_CREATED_AT = '1970-01-01T00:00:00.000Z';

/** Whether the task's creation time was never recorded by any source. */
export function hasUnknownCreation(task: Pick<Task, 'createdAt'>): boolean {
  return task.createdAt === UNKNOWN_CREATED_AT;
}

/**
 * Map a native priority value to the unified ordinal.
 * Strings 'P1'..'P4' map directly on every scale; numbers and numeric
 * strings follow the source's scale; anything else is P4.
 */
export function mapPriority(
  value: number | string | null | undefined,
  scale: PriorityScale,
): Priority {
  if (value === null || value === undefined) return DEFAULT_PRIORITY;

  if (typeof value === 'string') {
    const trimmed = value.trim();
    const tagged = PRIORITY_LABEL.exec(trimmed);
    if (tagged) return DIRECT_MAP[Number(tagged[1])] ?? DEFAULT_PRIORITY;
    if (!/^\d+$/.test(trimmed)) return DEFAULT_PRIORITY;
    return mapPriority(Number(trimmed), scale);
  }

  const table = scale === 'inverse' ? INVERSE_MAP : DIRECT_MAP;
  return table[value] ?? DEFAULT_PRIORITY;
}

/**
 * Resolve an energy or attention requirement.
 * Explicit values win; otherwise labels such as `energy-high` or
 * `attention/low` are read; otherwise medium.
 */
export function mapLevel(
  category: 'energy' | 'attention',
  explicit: string | null | undefined,
  labels: readonly string[],
): Level {
  const direct = explicit?.trim().toLowerCase();
  if (isLevel(direct)) return direct;

  const pattern = new RegExp(`^#?${category}[-/](low|medium|high)$`, 'i');
  for (const label of labels) {
    const m = pattern.exec(label.trim());
    const level = m?.[1]?.toLowerCase();
    if (isLevel(level)) return level;
  }
  return DEFAULT_LEVEL;
}

function requireNativeId(source: string, raw: RawRecord): string {
  const id = raw.nativeId;
  if (typeof id === 'number' && Number.isFinite(id)) return String(id);
  if (typeof id === 'string' && id.trim()) return id.trim();
  throw new MalformedRecordError(source, 'record has no native id');
}

function requireTitle(source: string, nativeId: string, raw: RawRecord): string {
  const title = typeof raw.title === 'string' ? raw.title.trim() : '';
  if (!title) {
    throw new MalformedRecordError(source, `record ${nativeId} has no title`);
  }
  return title;
}

/**
 * Normalize one raw record into a single-source Task.
 * Side-effect free. Throws MalformedRecordError when the native id or
 * title is missing; the caller skips the record.
 */
export function normalize(source: string, raw: RawRecord, options: NormalizeOptions = {}): Task {
  const nativeId = requireNativeId(source, raw);
  const title = requireTitle(source, nativeId, raw);
  const scale = options.priorityScale ?? PRIORITY_SCALES[source] ?? 'direct';
  const labels = [...new Set((raw.labels ?? []).map((l) => l.trim()).filter(Boolean))].sort();

  const priorityInput = raw.priority ?? labels.find((l) => PRIORITY_LABEL.test(l)) ?? null;

  const created = toIso(raw.created);
  const modified = toIso(raw.modified);
  const createdAt = created ?? UNKNOWN_CREATED_AT;
  let lastActivityAt = created ?? modified ?? (options.observedAt ?? new Date()).toISOString();
  if (modified && modified > lastActivityAt) lastActivityAt = modified;

  const key = normalizedKey(title);

  return {
    id: deriveTaskId(key, createdAt),
    title,
    normalizedKey: key,
    priority: mapPriority(priorityInput, scale),
    energy: mapLevel('energy', raw.energy, labels),
    attention: mapLevel('attention', raw.attention, labels),
    dueAt: toIso(raw.due),
    createdAt,
    lastActivityAt,
    completed: raw.completed === true,
    provenance: { [source]: nativeId },
    labels,
  };
}
