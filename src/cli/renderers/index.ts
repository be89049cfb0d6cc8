/**
 * Central output dispatch for CLI commands.
 *
 * cliOutput() checks the resolved format (JSON/human/quiet) and writes
 * either the JSON envelope (formatSuccess) or a human-readable rendering.
 *
 * Commands call:
 *   cliOutput(data, { command: 'list', message, operation })
 */

import { getFormatContext } from '../format-context.js';
import { formatError, formatSuccess, drainWarnings } from '../../core/output.js';
import { TaskweaveError } from '../../core/errors.js';
import { getLogger } from '../../core/logger.js';
import { palette } from './colors.js';
import {
  renderCleanup, renderComplete, renderList, renderRecommend, renderStatus,
  type CleanupView, type CompleteView, type ListView, type RecommendView, type StatusView,
} from './tasks.js';

// ---------------------------------------------------------------------------
// Renderer registry: maps command name to its result shape and renderer
// ---------------------------------------------------------------------------

export interface VersionView {
  version: string;
}

/** Result shape of every command. */
export interface CommandViews {
  recommend: RecommendView;
  list: ListView;
  complete: CompleteView;
  cleanup: CleanupView;
  status: StatusView;
  version: VersionView;
}

export type CommandName = keyof CommandViews;

type Renderers = { [K in CommandName]: (data: CommandViews[K], quiet: boolean) => string };

function renderVersion(data: VersionView, quiet: boolean): string {
  return quiet ? data.version : `taskweave v${data.version}`;
}

const renderers: Renderers = {
  recommend: renderRecommend,
  list: renderList,
  complete: renderComplete,
  cleanup: renderCleanup,
  status: renderStatus,
  version: renderVersion,
};

// ---------------------------------------------------------------------------
// Options for cliOutput
// ---------------------------------------------------------------------------

export interface CliOutputOptions<K extends CommandName> {
  /** Command name (used to pick the human renderer). */
  command: K;
  /** Optional success message for the JSON envelope. */
  message?: string;
  /** Operation name for _meta. */
  operation?: string;
}

// ---------------------------------------------------------------------------
// Main output function
// ---------------------------------------------------------------------------

/**
 * Output data to stdout in the resolved format (JSON or human-readable).
 * Pending warnings go into the envelope's _meta, or to stderr for humans.
 */
export function cliOutput<K extends CommandName>(data: CommandViews[K], opts: CliOutputOptions<K>): void {
  const ctx = getFormatContext();

  if (ctx.format === 'human') {
    const { YELLOW, NC } = palette();
    const warnings = drainWarnings() ?? [];
    if (!ctx.quiet) {
      for (const w of warnings) console.error(`${YELLOW}Warning:${NC} ${w.message}`);
    }
    const renderer: (data: CommandViews[K], quiet: boolean) => string = renderers[opts.command];
    const text = renderer(data, ctx.quiet);
    if (text) {
      console.log(text);
    }
    return;
  }

  console.log(formatSuccess(data, opts.message, opts.operation));
}

/**
 * Output an error in the resolved format on stderr.
 * For JSON: the error envelope. For human: a plain message and the fix.
 */
export function cliError(error: TaskweaveError, operation?: string): void {
  const ctx = getFormatContext();

  if (ctx.format === 'human') {
    const { RED, DIM, NC } = palette();
    console.error(`${RED}Error:${NC} ${error.message} (${error.code})`);
    if (error.fix) console.error(`${DIM}Fix: ${error.fix}${NC}`);
    return;
  }

  console.error(formatError(error, operation));
}

/**
 * Shared catch block for command actions: report a TaskweaveError and
 * exit with its code; anything else propagates.
 */
export function exitOnError(err: unknown, operation: string): never {
  if (err instanceof TaskweaveError) {
    getLogger('cli').error({ err, operation }, 'command failed');
    cliError(err, operation);
    process.exit(err.code);
  }
  throw err;
}
