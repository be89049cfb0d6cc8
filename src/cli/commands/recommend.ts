/**
 * CLI recommend command: what to work on today.
 */

import { Command } from 'commander';
import { OverrideCapacityReader } from '../../core/capacity.js';
import { recommend } from '../../core/tasks/recommend.js';
import { toCompact } from '../../core/tasks/list.js';
import type { Level } from '../../types/task.js';
import { parseLevel, parsePositiveInt } from '../options.js';
import { cliOutput, exitOnError } from '../renderers/index.js';
import { getRuntime, loadTasks } from '../runtime.js';

interface RecommendOpts {
  maxTasks?: number;
  energy?: Level;
  attention?: Level;
}

export function registerRecommendCommand(program: Command): void {
  program
    .command('recommend')
    .alias('next')
    .description('Recommend open tasks that fit today\'s energy and attention')
    .option('-n, --max-tasks <n>', 'Maximum number of tasks to recommend', parsePositiveInt)
    .option('--energy <level>', 'Override today\'s energy (low|medium|high)', parseLevel)
    .option('--attention <level>', 'Override today\'s attention (low|medium|high)', parseLevel)
    .action(async (opts: RecommendOpts) => {
      try {
        const runtime = await getRuntime();
        const reader = new OverrideCapacityReader(runtime.capacityReader, {
          energy: opts.energy,
          attention: opts.attention,
        });
        const [result, capacity] = await Promise.all([loadTasks(runtime), reader.readToday()]);

        const picked = recommend(result.tasks, capacity, {
          maxTasks: opts.maxTasks ?? runtime.config.recommend.maxTasks,
          now: runtime.now(),
          policy: runtime.config.scoring,
        });

        cliOutput({
          capacity,
          recommendations: picked.map(toCompact),
          openTasks: result.tasks.filter((t) => !t.completed).length,
          sources: result.sources,
        }, {
          command: 'recommend',
          operation: 'tasks.recommend',
          ...(picked.length === 0 && { message: 'No open task fits today\'s capacity' }),
        });
      } catch (err) {
        exitOnError(err, 'tasks.recommend');
      }
    });
}
