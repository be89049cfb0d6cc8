/**
 * Completion Reconciler: propagate one completion to every source a task
 * came from.
 *
 *   pending -> dispatching -> settled | partially_settled
 *
 * Every provenance system gets an independent, concurrent "mark complete"
 * call. already_complete counts as success. Failures are recorded per
 * system and only the failed subset is dispatched again on a later call.
 * A system that succeeded is never rolled back.
 */

import { CompletionDispatchError, TaskweaveError, describeError } from '../errors.js';
import { getLogger } from '../logger.js';
import { TimeoutError, withTimeout } from '../timeout.js';
import type { CompletionSink, MarkCompleteOutcome } from '../sources/provider.js';
import {
  MemoryCompletionLedger,
  type CompletionLedger,
  type FailedSystem,
  type LedgerEntry,
  type SettledSystem,
} from '../../store/completion-ledger.js';
import { ExitCode } from '../../types/exit-codes.js';
import type { Task } from '../../types/task.js';

export const DEFAULT_DISPATCH_TIMEOUT_MS = 10_000;

export type CompletionState = 'pending' | 'dispatching' | 'settled' | 'partially_settled';

/** A system that acknowledged the completion. */
export interface SystemSuccess {
  system: string;
  nativeId: string;
  outcome: Exclude<MarkCompleteOutcome, 'not_found'>;
  /** Settled by an earlier invocation; not dispatched this time. */
  previously: boolean;
}

/** A system whose dispatch failed. */
export interface SystemFailure {
  system: string;
  nativeId: string;
  reason: string;
  code: ExitCode;
}

export interface CompletionResult {
  taskId: string;
  state: Extract<CompletionState, 'settled' | 'partially_settled'>;
  /** The task as this run sees it after dispatch. */
  task: Task;
  /** Systems called during this invocation. */
  dispatched: string[];
  succeeded: SystemSuccess[];
  failed: SystemFailure[];
}

export interface ReconcilerOptions {
  ledger?: CompletionLedger;
  /** Bound on each native call; a call that overruns is a failure. */
  dispatchTimeoutMs?: number;
  now?: () => Date;
}

type DispatchOutcome =
  | { ok: true; system: string; nativeId: string; outcome: SystemSuccess['outcome'] }
  | { ok: false; system: string; nativeId: string; error: CompletionDispatchError };

function toSinkMap(sinks: ReadonlyMap<string, CompletionSink> | readonly CompletionSink[]): ReadonlyMap<string, CompletionSink> {
  if (sinks instanceof Map) return sinks;
  return new Map([...sinks].map((s) => [s.name, s]));
}

export class CompletionReconciler {
  private readonly ledger: CompletionLedger;
  private readonly dispatchTimeoutMs: number;
  private readonly now: () => Date;
  /** Tail of the in-process queue per task id. */
  private readonly queues = new Map<string, Promise<unknown>>();
  private readonly log = getLogger('complete');

  constructor(options: ReconcilerOptions = {}) {
    this.ledger = options.ledger ?? new MemoryCompletionLedger();
    this.dispatchTimeoutMs = options.dispatchTimeoutMs ?? DEFAULT_DISPATCH_TIMEOUT_MS;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Complete a task in every system listed in its provenance.
   * Calls for the same task are serialized, in process and through the
   * ledger's exclusive section across processes.
   */
  async complete(
    task: Task,
    sinks: ReadonlyMap<string, CompletionSink> | readonly CompletionSink[],
  ): Promise<CompletionResult> {
    if (Object.keys(task.provenance).length === 0) {
      throw new TaskweaveError(ExitCode.VALIDATION_ERROR, `Task ${task.id} has no provenance`);
    }

    const sinkMap = toSinkMap(sinks);
    const previous = this.queues.get(task.id) ?? Promise.resolve();
    const run = previous
      .catch(() => undefined)
      .then(() => this.ledger.exclusive(() => this.reconcile(task, sinkMap)));

    this.queues.set(task.id, run);
    try {
      return await run;
    } finally {
      if (this.queues.get(task.id) === run) this.queues.delete(task.id);
    }
  }

  private async reconcile(task: Task, sinks: ReadonlyMap<string, CompletionSink>): Promise<CompletionResult> {
    const at = this.now().toISOString();
    const prior = await this.ledger.get(task.id);

    const settled: Record<string, SettledSystem> = { ...prior?.settled };
    const isSettled = ([system, nativeId]: [string, string]): boolean =>
      settled[system]?.nativeId === nativeId;
    const current = Object.entries(task.provenance);

    if (prior?.state === 'settled' && current.every(isSettled)) {
      this.log.info({ taskId: task.id }, 'already settled; nothing dispatched');
      return this.result(task, prior, [], at);
    }

    if (task.completed && !prior) {
      // every source already reports completed
      for (const [system, nativeId] of Object.entries(task.provenance)) {
        settled[system] = { nativeId, outcome: 'already_complete', at };
      }
      const entry = this.entry(task, 'settled', settled, {}, 0, at);
      await this.ledger.put(entry);
      return this.result(task, entry, [], at);
    }

    // a source that joined the task after it settled is dispatched too
    const pending = current
      .filter((ref) => !isSettled(ref))
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
    const attempts = (prior?.attempts ?? 0) + 1;

    await this.ledger.put(this.entry(task, 'dispatching', settled, prior?.failed ?? {}, attempts, at));

    const outcomes = await Promise.all(
      pending.map(([system, nativeId]) => this.dispatch(task.id, system, nativeId, sinks.get(system))),
    );

    const failed: Record<string, FailedSystem> = {};
    for (const outcome of outcomes) {
      if (outcome.ok) {
        settled[outcome.system] = { nativeId: outcome.nativeId, outcome: outcome.outcome, at };
      } else {
        failed[outcome.system] = {
          nativeId: outcome.nativeId,
          reason: outcome.error.message,
          code: outcome.error.code,
          at,
        };
        this.log.warn(
          { taskId: task.id, system: outcome.system, code: outcome.error.code, err: outcome.error },
          'completion dispatch failed',
        );
      }
    }

    const state = Object.keys(failed).length === 0 ? 'settled' : 'partially_settled';
    const entry = this.entry(task, state, settled, failed, attempts, at);
    await this.ledger.put(entry);

    this.log.info(
      { taskId: task.id, state, dispatched: pending.length, failed: Object.keys(failed) },
      'completion dispatched',
    );
    return this.result(task, entry, pending.map(([system]) => system), at);
  }

  private async dispatch(
    taskId: string,
    system: string,
    nativeId: string,
    sink: CompletionSink | undefined,
  ): Promise<DispatchOutcome> {
    if (!sink) {
      return {
        ok: false,
        system,
        nativeId,
        error: new CompletionDispatchError(taskId, system, `No completion sink configured for ${system}`),
      };
    }

    try {
      const outcome = await withTimeout(
        sink.markComplete(nativeId),
        this.dispatchTimeoutMs,
        `mark complete in ${system}`,
      );
      if (outcome === 'not_found') {
        return {
          ok: false,
          system,
          nativeId,
          error: new CompletionDispatchError(taskId, system, `${system} has no record ${nativeId}`, {
            code: ExitCode.NOT_FOUND,
          }),
        };
      }
      return { ok: true, system, nativeId, outcome };
    } catch (err) {
      const code = err instanceof TimeoutError ? ExitCode.DISPATCH_TIMEOUT : ExitCode.DISPATCH_FAILED;
      return {
        ok: false,
        system,
        nativeId,
        error: new CompletionDispatchError(taskId, system, describeError(err), { code, cause: err }),
      };
    }
  }

  private entry(
    task: Task,
    state: LedgerEntry['state'],
    settled: Record<string, SettledSystem>,
    failed: Record<string, FailedSystem>,
    attempts: number,
    at: string,
  ): LedgerEntry {
    return { taskId: task.id, title: task.title, state, settled, failed, attempts, updatedAt: at };
  }

  private result(task: Task, entry: LedgerEntry, dispatched: string[], at: string): CompletionResult {
    const dispatchedSet = new Set(dispatched);
    const succeeded: SystemSuccess[] = Object.entries(entry.settled)
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
      .map(([system, s]) => ({
        system,
        nativeId: s.nativeId,
        outcome: s.outcome,
        previously: !dispatchedSet.has(system),
      }));
    const failed: SystemFailure[] = Object.entries(entry.failed)
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
      .map(([system, f]) => ({ system, nativeId: f.nativeId, reason: f.reason, code: f.code }));

    const state = entry.state === 'settled' ? 'settled' : 'partially_settled';
    return {
      taskId: task.id,
      state,
      task: {
        ...task,
        completed: state === 'settled' ? true : task.completed,
        lastActivityAt: at > task.lastActivityAt ? at : task.lastActivityAt,
      },
      dispatched,
      succeeded,
      failed,
    };
  }
}

/** One-shot completion with a fresh reconciler. */
export async function complete(
  task: Task,
  sinks: ReadonlyMap<string, CompletionSink> | readonly CompletionSink[],
  options: ReconcilerOptions = {},
): Promise<CompletionResult> {
  return new CompletionReconciler(options).complete(task, sinks);
}
