/**
 * Source Provider contract.
 *
 * One provider per integrated system. Providers own their storage and its
 * concurrency rules; the engine only reads snapshots through fetchAll() and
 * writes completions through markComplete().
 */

/** A raw record as a provider hands it to the Normalizer. */
export interface RawRecord {
  nativeId?: string | number | null;
  title?: string | null;
  /** Native priority: a number on the source's own scale, or 'P1'..'P4'. */
  priority?: number | string | null;
  energy?: string | null;
  attention?: string | null;
  labels?: string[];
  /** Due date: ISO timestamp or date-only (YYYY-MM-DD, local midnight). */
  due?: string | null;
  created?: string | null;
  modified?: string | null;
  completed?: boolean;
}

/** Outcome of a native "mark complete" call. */
export type MarkCompleteOutcome = 'success' | 'already_complete' | 'not_found';

/** Write side of a provider, used by the Completion Reconciler. */
export interface CompletionSink {
  readonly name: string;
  /** Idempotent: completing an already-completed record reports already_complete. */
  markComplete(nativeId: string): Promise<MarkCompleteOutcome>;
}

/** Read and write sides of one integrated system. */
export interface SourceProvider extends CompletionSink {
  /**
   * Return every record the system holds, completed ones included.
   * Throws SourceUnavailableError when the system cannot be read this run.
   */
  fetchAll(): Promise<RawRecord[]>;
}

/** Index sinks by name for completion fan-out. */
export function sinksByName(sinks: readonly CompletionSink[]): Map<string, CompletionSink> {
  return new Map(sinks.map((s) => [s.name, s]));
}
