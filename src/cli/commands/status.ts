/**
 * CLI status command: inventory, deadlines and source health in one view.
 */

import { Command } from 'commander';
import { summarize } from '../../core/tasks/status.js';
import { cliOutput, exitOnError } from '../renderers/index.js';
import { getRuntime, loadTasks } from '../runtime.js';

export function registerStatusCommand(program: Command): void {
  program
    .command('status')
    .alias('dash')
    .description('Show task inventory, overdue and critical deadlines, and source health')
    .action(async () => {
      try {
        const runtime = await getRuntime();
        const [result, capacity] = await Promise.all([
          loadTasks(runtime),
          runtime.capacityReader.readToday(),
        ]);

        cliOutput(summarize(result, capacity, {
          now: runtime.now(),
          criticalWithinDays: runtime.config.status.criticalWithinDays,
        }), { command: 'status', operation: 'tasks.status' });
      } catch (err) {
        exitOnError(err, 'tasks.status');
      }
    });
}
