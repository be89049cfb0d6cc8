/**
 * Command tree for the taskweave CLI.
 *
 * Built by a factory so tests can drive the program without the bin
 * entry's side effects.
 */

import { Command } from 'commander';
import { readFileSync } from 'node:fs';
import { z } from 'zod';
import { describeError } from '../core/errors.js';
import { getLogger, initLogger } from '../core/logger.js';
import { getDataDir } from '../core/paths.js';
import { registerCleanupCommand } from './commands/cleanup.js';
import { registerCompleteCommand } from './commands/complete.js';
import { registerListCommand } from './commands/list.js';
import { registerRecommendCommand } from './commands/recommend.js';
import { registerStatusCommand } from './commands/status.js';
import { resetFormatContext, setFormatContext } from './format-context.js';
import { resolveFormat } from './middleware/output-format.js';
import { configureColors } from './renderers/colors.js';
import { cliOutput, exitOnError } from './renderers/index.js';
import { initRuntime, setRuntime, type Runtime } from './runtime.js';

const PackageSchema = z.object({ version: z.string() });

/** Read version from package.json (single source of truth). */
export function getPackageVersion(): string {
  try {
    // src/cli/program.ts and dist/cli/program.js both sit two levels below the root
    const raw = readFileSync(new URL('../../package.json', import.meta.url), 'utf-8');
    return PackageSchema.parse(JSON.parse(raw)).version;
  } catch (err) {
    getLogger('cli').debug({ reason: describeError(err) }, 'package.json unreadable');
    return '0.0.0';
  }
}

/** Commands that run without loading config or sources. */
const SKIP_RUNTIME = new Set(['version', 'help']);

export interface ProgramOptions {
  /** Write the rotating log file. Off in tests. */
  logging?: boolean;
  /** Use this runtime instead of loading config from the working directory. */
  runtime?: Runtime;
  cwd?: string;
}

export function createProgram(options: ProgramOptions = {}): Command {
  const version = getPackageVersion();
  const program = new Command();

  program
    .name('taskweave')
    .description('Unify tasks across sources and recommend what to work on today')
    .version(version)
    .option('--json', 'Output in JSON format (default)')
    .option('--human', 'Output in human-readable format')
    .option('--quiet', 'Suppress non-essential output for scripting');

  program
    .command('version')
    .description('Display taskweave version')
    .action(() => {
      cliOutput({ version }, { command: 'version' });
    });

  registerRecommendCommand(program);
  registerListCommand(program);
  registerCompleteCommand(program);
  registerCleanupCommand(program);
  registerStatusCommand(program);

  // Resolve config, logging and output format once, before any command.
  program.hook('preAction', async (_thisCommand, actionCommand) => {
    const opts = actionCommand.optsWithGlobals<Record<string, unknown>>();
    resetFormatContext();
    try {
      if (SKIP_RUNTIME.has(actionCommand.name())) {
        setFormatContext(resolveFormat(opts));
        return;
      }

      let runtime = options.runtime;
      if (runtime) {
        setRuntime(runtime);
      } else {
        runtime = await initRuntime(options.cwd ?? process.cwd());
      }
      const { config } = runtime;

      if (options.logging !== false) {
        initLogger(getDataDir(runtime.cwd), config.logging, { command: actionCommand.name() });
      }
      configureColors(config.output.showColor);
      setFormatContext(resolveFormat(opts, config.output.defaultFormat));
    } catch (err) {
      exitOnError(err, 'cli.init');
    }
  });

  return program;
}
