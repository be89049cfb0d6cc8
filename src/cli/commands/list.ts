/**
 * CLI list command.
 */

import { Command } from 'commander';
import { listTasks, toCompact } from '../../core/tasks/list.js';
import type { Priority } from '../../types/task.js';
import { parsePriority } from '../options.js';
import { cliOutput, exitOnError } from '../renderers/index.js';
import { getRuntime, loadTasks } from '../runtime.js';

interface ListOpts {
  source?: string;
  priority?: Priority;
  all?: boolean;
}

/**
 * Register the list command.
 */
export function registerListCommand(program: Command): void {
  program
    .command('list')
    .alias('ls')
    .description('List unified tasks, most urgent first')
    .option('--source <name>', 'Only tasks present in this source')
    .option('--priority <priority>', 'Filter by priority (P1-P4)', parsePriority)
    .option('--all', 'Include completed tasks')
    .action(async (opts: ListOpts) => {
      try {
        const runtime = await getRuntime();
        const result = await loadTasks(runtime);
        const listed = listTasks(result.tasks, {
          source: opts.source,
          priority: opts.priority,
          all: opts.all === true,
          now: runtime.now(),
          policy: runtime.config.scoring,
        });

        cliOutput({
          tasks: listed.tasks.map(toCompact),
          total: listed.total,
          filtered: listed.filtered,
        }, {
          command: 'list',
          operation: 'tasks.list',
          ...(listed.filtered === 0 && { message: 'No tasks found' }),
        });
      } catch (err) {
        exitOnError(err, 'tasks.list');
      }
    });
}
