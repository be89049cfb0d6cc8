/**
 * CLI complete command: mark a unified task done in every source it came from.
 */

import { Command } from 'commander';
import { TaskweaveError } from '../../core/errors.js';
import { getLedgerPath } from '../../core/paths.js';
import { sinksByName } from '../../core/sources/index.js';
import { CompletionReconciler } from '../../core/tasks/complete.js';
import { findTaskById } from '../../core/tasks/list.js';
import { FileCompletionLedger } from '../../store/completion-ledger.js';
import { ExitCode } from '../../types/exit-codes.js';
import type { Task } from '../../types/task.js';
import { cliOutput, exitOnError } from '../renderers/index.js';
import { getRuntime, loadTasks } from '../runtime.js';

/** Resolve an id or unique prefix to exactly one task. */
export function resolveTask(tasks: readonly Task[], taskId: string): Task {
  const matches = findTaskById(tasks, taskId);
  const [only] = matches;
  if (matches.length === 1 && only) return only;
  if (matches.length === 0) {
    throw new TaskweaveError(ExitCode.NOT_FOUND, `Task not found: ${taskId}`, {
      fix: 'Run `taskweave list --all` to see task ids',
    });
  }
  throw new TaskweaveError(
    ExitCode.AMBIGUOUS_TASK_ID,
    `Task id prefix ${taskId} matches ${matches.length} tasks: ${matches.map((t) => t.id).join(', ')}`,
    { fix: 'Use a longer prefix or the full task id' },
  );
}

export function registerCompleteCommand(program: Command): void {
  program
    .command('complete <taskId>')
    .alias('done')
    .description('Mark a task complete in every source system it came from')
    .action(async (taskId: string) => {
      try {
        const runtime = await getRuntime();
        const result = await loadTasks(runtime);
        const task = resolveTask(result.tasks, taskId);

        const reconciler = new CompletionReconciler({
          ledger: new FileCompletionLedger(getLedgerPath(runtime.cwd), {
            retainSettledDays: runtime.config.cleanup.staleThresholdDays,
            now: runtime.now,
          }),
          dispatchTimeoutMs: runtime.config.completion.dispatchTimeoutMs,
          now: runtime.now,
        });
        const outcome = await reconciler.complete(task, sinksByName(runtime.providers));

        cliOutput({
          taskId: outcome.taskId,
          title: outcome.task.title,
          state: outcome.state,
          dispatched: outcome.dispatched,
          succeeded: outcome.succeeded,
          failed: outcome.failed,
        }, {
          command: 'complete',
          operation: 'tasks.complete',
          message: outcome.state === 'settled'
            ? `Task ${outcome.taskId} completed`
            : `Task ${outcome.taskId} partially completed; ${outcome.failed.length} system(s) failed`,
        });
      } catch (err) {
        exitOnError(err, 'tasks.complete');
      }
    });
}
