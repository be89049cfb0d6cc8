/**
 * Aggregation: fetch every source concurrently, normalize, and merge.
 *
 * Each fetch is bounded by a per-source timeout and returns an independent
 * snapshot; nothing is combined until all fetches have settled. A failing
 * source is absent for the run, a malformed record is skipped and counted.
 * Only a run in which every source fails is an error.
 */

import { TaskweaveError, describeError, MalformedRecordError } from '../errors.js';
import { getLogger } from '../logger.js';
import { TimeoutError, withTimeout } from '../timeout.js';
import type { RawRecord, SourceProvider } from '../sources/provider.js';
import { ExitCode } from '../../types/exit-codes.js';
import type { Task } from '../../types/task.js';
import { merge, type MergeOptions } from './dedupe.js';
import { normalize } from './normalize.js';

export const DEFAULT_FETCH_TIMEOUT_MS = 10_000;

export type SourceStatus = 'ok' | 'unavailable' | 'timeout';

/** Per-source outcome of one run. */
export interface SourceReport {
  name: string;
  status: SourceStatus;
  /** Records fetched (0 when the source was absent). */
  fetched: number;
  /** Records normalized into tasks. */
  normalized: number;
  error?: string;
}

/** A record the Normalizer rejected. */
export interface SkippedRecord {
  source: string;
  reason: string;
}

export interface AggregateResult {
  /** Unified, deduplicated tasks. */
  tasks: Task[];
  /** Normalized tasks before deduplication. */
  rawCount: number;
  skipped: SkippedRecord[];
  sources: SourceReport[];
}

export interface AggregateOptions {
  timeoutMs?: number;
  /** Run time; the last activity of records that carry no timestamp at all. */
  now?: Date;
  merge?: MergeOptions;
}

type FetchOutcome =
  | { provider: SourceProvider; records: RawRecord[] }
  | { provider: SourceProvider; status: Exclude<SourceStatus, 'ok'>; error: string };

async function fetchOne(provider: SourceProvider, timeoutMs: number): Promise<FetchOutcome> {
  try {
    const records = await withTimeout(provider.fetchAll(), timeoutMs, `fetch ${provider.name}`);
    return { provider, records };
  } catch (err) {
    return {
      provider,
      status: err instanceof TimeoutError ? 'timeout' : 'unavailable',
      error: describeError(err),
    };
  }
}

/**
 * Normalize one source's records, collecting malformed ones instead of
 * failing the source.
 */
export function normalizeAll(
  source: string,
  records: readonly RawRecord[],
  observedAt: Date,
): { tasks: Task[]; skipped: SkippedRecord[] } {
  const tasks: Task[] = [];
  const skipped: SkippedRecord[] = [];
  for (const record of records) {
    try {
      tasks.push(normalize(source, record, { observedAt }));
    } catch (err) {
      if (!(err instanceof MalformedRecordError)) throw err;
      skipped.push({ source, reason: err.message });
    }
  }
  return { tasks, skipped };
}

/**
 * Fetch, normalize and merge tasks from every provider.
 * Throws NO_SOURCES when no provider is configured or none responded.
 */
export async function aggregate(
  providers: readonly SourceProvider[],
  options: AggregateOptions = {},
): Promise<AggregateResult> {
  const log = getLogger('aggregate');
  const now = options.now ?? new Date();
  const timeoutMs = options.timeoutMs ?? DEFAULT_FETCH_TIMEOUT_MS;

  if (providers.length === 0) {
    throw new TaskweaveError(ExitCode.NO_SOURCES, 'No task sources are configured', {
      fix: 'Enable sources.todoist or sources.vault in config.json',
    });
  }

  const outcomes = await Promise.all(providers.map((p) => fetchOne(p, timeoutMs)));
  outcomes.sort((a, b) => (a.provider.name < b.provider.name ? -1 : a.provider.name > b.provider.name ? 1 : 0));

  const normalized: Task[] = [];
  const skipped: SkippedRecord[] = [];
  const sources: SourceReport[] = [];

  for (const outcome of outcomes) {
    const name = outcome.provider.name;
    if (!('records' in outcome)) {
      log.warn({ source: name, status: outcome.status, error: outcome.error }, 'source absent for this run');
      sources.push({ name, status: outcome.status, fetched: 0, normalized: 0, error: outcome.error });
      continue;
    }

    const result = normalizeAll(name, outcome.records, now);
    for (const s of result.skipped) {
      log.warn({ source: s.source, reason: s.reason }, 'skipped malformed record');
    }
    normalized.push(...result.tasks);
    skipped.push(...result.skipped);
    sources.push({
      name,
      status: 'ok',
      fetched: outcome.records.length,
      normalized: result.tasks.length,
    });
  }

  if (sources.every((s) => s.status !== 'ok')) {
    throw new TaskweaveError(
      ExitCode.NO_SOURCES,
      `No task source responded (${sources.map((s) => `${s.name}: ${s.error ?? s.status}`).join('; ')})`,
      { fix: 'Check source paths in config.json and that cached snapshots exist' },
    );
  }

  const tasks = merge(normalized, options.merge);
  log.info(
    { raw: normalized.length, unified: tasks.length, skipped: skipped.length },
    'aggregated tasks',
  );

  return { tasks, rawCount: normalized.length, skipped, sources };
}
