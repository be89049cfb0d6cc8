/**
 * Shared CLI middleware for resolving output format from --human/--json/--quiet flags.
 *
 * Precedence: explicit flag, then the configured default, then JSON.
 */

import { TaskweaveError } from '../../core/errors.js';
import type { OutputFormat } from '../../types/config.js';
import { ExitCode } from '../../types/exit-codes.js';

/** Where the resolved format came from. */
export type FormatSource = 'flag' | 'config' | 'default';

export interface FormatResolution {
  format: OutputFormat;
  source: FormatSource;
  quiet: boolean;
}

/**
 * Resolve output format from Commander.js option values.
 *
 * @param opts - Commander.js parsed options object
 * @param configDefault - `output.defaultFormat` from the resolved config
 * @throws TaskweaveError when --json and --human are both given
 */
export function resolveFormat(
  opts: Record<string, unknown>,
  configDefault?: OutputFormat,
): FormatResolution {
  const json = opts['json'] === true;
  const human = opts['human'] === true;
  const quiet = opts['quiet'] === true;

  if (json && human) {
    throw new TaskweaveError(ExitCode.INVALID_INPUT, 'Cannot combine --json and --human', {
      fix: 'Pass only one of --json or --human',
    });
  }
  if (json) return { format: 'json', source: 'flag', quiet };
  if (human) return { format: 'human', source: 'flag', quiet };
  if (configDefault) return { format: configDefault, source: 'config', quiet };
  return { format: 'json', source: 'default', quiet };
}
