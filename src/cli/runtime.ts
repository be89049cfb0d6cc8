/**
 * Per-invocation CLI runtime: resolved config and the collaborators built
 * from it. Loaded once in the preAction hook.
 */

import { loadConfig } from '../core/config.js';
import { pushWarning } from '../core/output.js';
import { buildCapacityReader, buildProviders } from '../core/sources/index.js';
import type { SourceProvider } from '../core/sources/provider.js';
import type { CapacityReader } from '../core/capacity.js';
import { aggregate, type AggregateResult } from '../core/tasks/aggregate.js';
import type { TaskweaveConfig } from '../types/config.js';

export interface Runtime {
  config: TaskweaveConfig;
  cwd: string;
  now: () => Date;
  providers: SourceProvider[];
  capacityReader: CapacityReader;
}

let current: Runtime | null = null;

/** Load config and build providers for this invocation. */
export async function initRuntime(cwd: string = process.cwd(), now: () => Date = () => new Date()): Promise<Runtime> {
  const config = await loadConfig(cwd);
  current = {
    config,
    cwd,
    now,
    providers: buildProviders(config, { cwd, now }),
    capacityReader: buildCapacityReader(config, { cwd, now }),
  };
  return current;
}

/** Install a runtime directly. */
export function setRuntime(runtime: Runtime | null): void {
  current = runtime;
}

/** The runtime of this invocation, loading it on first use. */
export async function getRuntime(): Promise<Runtime> {
  return current ?? initRuntime();
}

/**
 * Aggregate every enabled source. Absent sources and skipped records are
 * surfaced as warnings on the command's output.
 */
export async function loadTasks(runtime: Runtime): Promise<AggregateResult> {
  const result = await aggregate(runtime.providers, {
    timeoutMs: runtime.config.fetch.timeoutMs,
    now: runtime.now(),
    merge: runtime.config.dedupe,
  });

  for (const source of result.sources) {
    if (source.status !== 'ok') {
      pushWarning({
        code: source.status === 'timeout' ? 'W_SOURCE_TIMEOUT' : 'W_SOURCE_UNAVAILABLE',
        message: `${source.name} skipped: ${source.error ?? source.status}`,
      });
    }
  }
  if (result.skipped.length > 0) {
    pushWarning({
      code: 'W_MALFORMED_RECORDS',
      message: `${result.skipped.length} malformed record(s) skipped`,
    });
  }
  return result;
}
