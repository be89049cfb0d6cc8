/**
 * Unified task types shared by the reconciliation engine, the source
 * providers and the CLI.
 */

/** Priority ordinal. P1 is the most urgent. */
export type Priority = 'P1' | 'P2' | 'P3' | 'P4';

/** Energy / attention ordinal. */
export type Level = 'low' | 'medium' | 'high';

/** Valid priorities, most urgent first. */
export const PRIORITIES: readonly Priority[] = ['P1', 'P2', 'P3', 'P4'] as const;

/** Valid levels, lowest first. */
export const LEVELS: readonly Level[] = ['low', 'medium', 'high'] as const;

/** Ordinal rank of a priority: P1 = 0 (most urgent) .. P4 = 3. */
export function priorityRank(priority: Priority): number {
  return PRIORITIES.indexOf(priority);
}

/** Ordinal rank of a level: low = 0 .. high = 2. */
export function levelRank(level: Level): number {
  return LEVELS.indexOf(level);
}

export function isPriority(value: unknown): value is Priority {
  return typeof value === 'string' && (PRIORITIES as readonly string[]).includes(value);
}

export function isLevel(value: unknown): value is Level {
  return typeof value === 'string' && (LEVELS as readonly string[]).includes(value);
}

/** Source-system name -> that system's native record id. */
export type Provenance = Record<string, string>;

/** A task in the engine's unified model. Rebuilt from source snapshots every run. */
export interface Task {
  /** Stable id derived from the normalized title and earliest creation time. */
  id: string;
  /** Display title (trimmed, case preserved). */
  title: string;
  /** Matching key: lower-cased, punctuation stripped, whitespace collapsed. */
  normalizedKey: string;
  priority: Priority;
  /** Energy required to execute. */
  energy: Level;
  /** Focus required to execute. */
  attention: Level;
  /** ISO timestamp, or null when no source declares a due date. */
  dueAt: string | null;
  /** ISO timestamp: minimum across contributing records. */
  createdAt: string;
  /** ISO timestamp: maximum across contributing records and reconciliation touches. */
  lastActivityAt: string;
  /** True only when every contributing record reports completed. */
  completed: boolean;
  provenance: Provenance;
  labels: string[];
  /** Last computed Attention Tax. Derived, never a source of truth. */
  score?: number;
}

/** Today's self-reported energy and attention. Never cached across runs. */
export interface Capacity {
  energy: Level;
  attention: Level;
}

/** Capacity used when no explicit signal exists for today. */
export const DEFAULT_CAPACITY: Capacity = { energy: 'medium', attention: 'medium' };
