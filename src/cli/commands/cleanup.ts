/**
 * CLI cleanup command: report open tasks with no recent activity.
 * Read-only; nothing is archived or deleted.
 */

import { Command } from 'commander';
import { toCompact } from '../../core/tasks/list.js';
import { findStale, idleDays } from '../../core/tasks/stale.js';
import { parsePositiveInt } from '../options.js';
import { cliOutput, exitOnError } from '../renderers/index.js';
import { getRuntime, loadTasks } from '../runtime.js';

export function registerCleanupCommand(program: Command): void {
  program
    .command('cleanup')
    .alias('stale')
    .description('List open tasks idle for longer than the stale threshold')
    .option('-t, --threshold <days>', 'Idle days before a task counts as stale', parsePositiveInt)
    .action(async (opts: { threshold?: number }) => {
      try {
        const runtime = await getRuntime();
        const result = await loadTasks(runtime);
        const now = runtime.now();
        const thresholdDays = opts.threshold ?? runtime.config.cleanup.staleThresholdDays;

        const stale = findStale(result.tasks, now, thresholdDays).map((t) => ({
          ...toCompact(t),
          lastActivityAt: t.lastActivityAt,
          idleDays: idleDays(t, now),
        }));

        cliOutput({
          thresholdDays,
          stale,
          openTasks: result.tasks.filter((t) => !t.completed).length,
        }, {
          command: 'cleanup',
          operation: 'tasks.cleanup',
          message: `${stale.length} stale task(s)`,
        });
      } catch (err) {
        exitOnError(err, 'tasks.cleanup');
      }
    });
}
