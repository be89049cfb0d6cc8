/**
 * Output format of the running command.
 *
 * Set by the preAction hook before any action runs and read by cliOutput()
 * and cliError(). Until then, output is JSON so an early failure still
 * prints a parseable envelope.
 */

import type { FormatResolution } from './middleware/output-format.js';

const JSON_DEFAULT: FormatResolution = { format: 'json', source: 'default', quiet: false };

let current: FormatResolution = JSON_DEFAULT;

export function setFormatContext(resolution: FormatResolution): void {
  current = resolution;
}

export function getFormatContext(): FormatResolution {
  return current;
}

/** Back to the JSON default, for a fresh invocation. */
export function resetFormatContext(): void {
  current = JSON_DEFAULT;
}
