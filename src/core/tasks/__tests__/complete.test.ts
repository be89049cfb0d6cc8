/**
 * Tests for the Completion Reconciler.
 */

import { describe, it, expect } from 'vitest';
import { TaskweaveError } from '../../errors.js';
import type { CompletionSink, MarkCompleteOutcome } from '../../sources/provider.js';
import { MemoryCompletionLedger } from '../../../store/completion-ledger.js';
import { ExitCode } from '../../../types/exit-codes.js';
import type { Task } from '../../../types/task.js';
import { CompletionReconciler, complete } from '../complete.js';

const now = () => new Date('2026-10-19T09:00:00.000Z');

/** Sink whose behaviour can be swapped between calls. */
class FakeSink implements CompletionSink {
  calls: string[] = [];

  constructor(
    readonly name: string,
    public behaviour: () => Promise<MarkCompleteOutcome> = async () => 'success',
  ) {}

  async markComplete(nativeId: string): Promise<MarkCompleteOutcome> {
    this.calls.push(nativeId);
    return this.behaviour();
  }
}

function makeTask(overrides: Partial<Task> = {}): Task {
  return {
    id: 'tabc123def456',
    title: 'Write report',
    normalizedKey: 'write report',
    priority: 'P1',
    energy: 'high',
    attention: 'medium',
    dueAt: null,
    createdAt: '2026-10-10T09:00:00.000Z',
    lastActivityAt: '2026-10-12T09:00:00.000Z',
    completed: false,
    provenance: { todoist: '101', vault: 'Tasks.md#abc' },
    labels: [],
    ...overrides,
  };
}

describe('CompletionReconciler', () => {
  it('settles when every system succeeds', async () => {
    const todoist = new FakeSink('todoist');
    const vault = new FakeSink('vault', async () => 'already_complete');
    const reconciler = new CompletionReconciler({ now });

    const result = await reconciler.complete(makeTask(), [todoist, vault]);

    expect(result.state).toBe('settled');
    expect(result.dispatched).toEqual(['todoist', 'vault']);
    expect(result.succeeded).toEqual([
      { system: 'todoist', nativeId: '101', outcome: 'success', previously: false },
      { system: 'vault', nativeId: 'Tasks.md#abc', outcome: 'already_complete', previously: false },
    ]);
    expect(result.failed).toEqual([]);
    expect(result.task.completed).toBe(true);
    expect(result.task.lastActivityAt).toBe('2026-10-19T09:00:00.000Z');
    expect(todoist.calls).toEqual(['101']);
    expect(vault.calls).toEqual(['Tasks.md#abc']);
  });

  it('records a partial settlement and retries only the failed system', async () => {
    const todoist = new FakeSink('todoist');
    const vault = new FakeSink('vault', async () => {
      throw new Error('vault is read-only');
    });
    const reconciler = new CompletionReconciler({ ledger: new MemoryCompletionLedger(), now });

    const first = await reconciler.complete(makeTask(), [todoist, vault]);
    expect(first.state).toBe('partially_settled');
    expect(first.failed).toEqual([
      { system: 'vault', nativeId: 'Tasks.md#abc', reason: 'vault is read-only', code: ExitCode.DISPATCH_FAILED },
    ]);
    expect(first.task.completed).toBe(false);

    vault.behaviour = async () => 'success';
    const second = await reconciler.complete(makeTask(), [todoist, vault]);

    expect(second.state).toBe('settled');
    expect(second.dispatched).toEqual(['vault']);
    expect(second.succeeded.map((s) => [s.system, s.previously])).toEqual([
      ['todoist', true],
      ['vault', false],
    ]);
    expect(todoist.calls).toHaveLength(1);
    expect(vault.calls).toHaveLength(2);
  });

  it('does nothing for a task that is already settled', async () => {
    const todoist = new FakeSink('todoist');
    const vault = new FakeSink('vault');
    const reconciler = new CompletionReconciler({ now });

    await reconciler.complete(makeTask(), [todoist, vault]);
    const again = await reconciler.complete(makeTask(), [todoist, vault]);

    expect(again.state).toBe('settled');
    expect(again.dispatched).toEqual([]);
    expect(again.succeeded.every((s) => s.previously)).toBe(true);
    expect(todoist.calls).toHaveLength(1);
    expect(vault.calls).toHaveLength(1);
  });

  it('completes a source that joined the task after it settled', async () => {
    const todoist = new FakeSink('todoist');
    const vault = new FakeSink('vault');
    const daily = new FakeSink('daily-note');
    const reconciler = new CompletionReconciler({ now });

    await reconciler.complete(makeTask(), [todoist, vault, daily]);
    const grown = makeTask({ provenance: { todoist: '101', vault: 'Tasks.md#abc', 'daily-note': 'note#x' } });
    const second = await reconciler.complete(grown, [todoist, vault, daily]);

    expect(second.state).toBe('settled');
    expect(second.dispatched).toEqual(['daily-note']);
    expect(second.succeeded.map((s) => [s.system, s.previously])).toEqual([
      ['daily-note', false],
      ['todoist', true],
      ['vault', true],
    ]);
    expect(daily.calls).toEqual(['note#x']);
    expect(todoist.calls).toHaveLength(1);
    expect(vault.calls).toHaveLength(1);
  });

  it('serializes concurrent calls for the same task', async () => {
    const todoist = new FakeSink('todoist');
    const vault = new FakeSink('vault');
    const reconciler = new CompletionReconciler({ now });

    const [a, b] = await Promise.all([
      reconciler.complete(makeTask(), [todoist, vault]),
      reconciler.complete(makeTask(), [todoist, vault]),
    ]);

    expect(a.dispatched).toEqual(['todoist', 'vault']);
    expect(b.dispatched).toEqual([]);
    expect(todoist.calls).toHaveLength(1);
  });

  it('fails a system whose call overruns the timeout', async () => {
    const todoist = new FakeSink('todoist');
    const vault = new FakeSink('vault', () => new Promise<MarkCompleteOutcome>(() => undefined));
    const reconciler = new CompletionReconciler({ now, dispatchTimeoutMs: 20 });

    const result = await reconciler.complete(makeTask(), [todoist, vault]);

    expect(result.state).toBe('partially_settled');
    expect(result.failed.map((f) => [f.system, f.code])).toEqual([['vault', ExitCode.DISPATCH_TIMEOUT]]);
    expect(result.succeeded.map((s) => s.system)).toEqual(['todoist']);
  });

  it('fails a system that no longer has the record', async () => {
    const todoist = new FakeSink('todoist', async () => 'not_found');
    const reconciler = new CompletionReconciler({ now });

    const result = await reconciler.complete(makeTask({ provenance: { todoist: '101' } }), [todoist]);

    expect(result.state).toBe('partially_settled');
    expect(result.failed).toEqual([
      { system: 'todoist', nativeId: '101', reason: 'todoist has no record 101', code: ExitCode.NOT_FOUND },
    ]);
  });

  it('fails a system without a configured sink', async () => {
    const todoist = new FakeSink('todoist');
    const result = await complete(makeTask(), [todoist], { now });

    expect(result.state).toBe('partially_settled');
    expect(result.failed).toEqual([{
      system: 'vault',
      nativeId: 'Tasks.md#abc',
      reason: 'No completion sink configured for vault',
      code: ExitCode.DISPATCH_FAILED,
    }]);
  });

  it('settles a task every source already reports completed without dispatching', async () => {
    const todoist = new FakeSink('todoist');
    const vault = new FakeSink('vault');

    const result = await complete(makeTask({ completed: true }), [todoist, vault], { now });

    expect(result.state).toBe('settled');
    expect(result.dispatched).toEqual([]);
    expect(result.succeeded.map((s) => s.outcome)).toEqual(['already_complete', 'already_complete']);
    expect(todoist.calls).toEqual([]);
  });

  it('rejects a task without provenance', async () => {
    const promise = complete(makeTask({ provenance: {} }), [], { now });
    await expect(promise).rejects.toBeInstanceOf(TaskweaveError);
    await expect(promise).rejects.toMatchObject({ code: ExitCode.VALIDATION_ERROR });
  });

  it('accepts sinks keyed by name', async () => {
    const todoist = new FakeSink('todoist');
    const result = await complete(
      makeTask({ provenance: { todoist: '101' } }),
      new Map([['todoist', todoist]]),
      { now },
    );
    expect(result.state).toBe('settled');
  });
});
