/**
 * pino logging for every run.
 *
 * stdout carries command output, so diagnostics go to a rotating file under
 * the data directory (pino-roll, size and daily rotation). Before
 * initLogger() has run, and in tests, a shared stderr logger at `warn`
 * stands in. Engine modules ask for `getLogger('<subsystem>')` children and
 * never see which one they got.
 */

import pino from 'pino';
import { mkdirSync } from 'node:fs';
import { dirname, join } from 'node:path';
import type { LoggingConfig } from '../types/config.js';

const formatters = {
  level: (label: string) => ({ level: label.toUpperCase() }),
};

let rootLogger: pino.Logger | null = null;
let fallbackLogger: pino.Logger | null = null;

/** Size string in the unit pino-roll takes ('10m', '1g', '500k'). */
export function bytesToSizeString(bytes: number): string {
  const units: Array<[number, string]> = [[1024 ** 3, 'g'], [1024 ** 2, 'm'], [1024, 'k']];
  for (const [size, suffix] of units) {
    if (bytes >= size) return `${Math.floor(bytes / size)}${suffix}`;
  }
  return `${bytes}`;
}

/** Fields bound to every line of one run. */
export interface RunContext {
  command: string;
}

/**
 * Open the log file for this run. Called once, from the CLI preAction hook.
 *
 * @param dataDir - Absolute project data directory; `config.filePath` is relative to it
 */
export function initLogger(dataDir: string, config: LoggingConfig, context?: RunContext): pino.Logger {
  const dest = join(dataDir, config.filePath);
  mkdirSync(dirname(dest), { recursive: true });

  // runs in a worker thread
  const transport = pino.transport({
    target: 'pino-roll',
    options: {
      file: dest,
      size: bytesToSizeString(config.maxFileSize),
      frequency: 'daily',
      mkdir: true,
      limit: { count: config.maxFiles },
    },
  });

  rootLogger = pino(
    {
      level: config.level,
      formatters,
      timestamp: pino.stdTimeFunctions.isoTime,
      base: { pid: process.pid, ...context },
    },
    transport,
  );
  return rootLogger;
}

function fallback(): pino.Logger {
  fallbackLogger ??= pino({ level: 'warn', formatters }, pino.destination(2));
  return fallbackLogger;
}

/** Child logger tagged with `subsystem`. */
export function getLogger(subsystem: string): pino.Logger {
  return (rootLogger ?? fallback()).child({ subsystem });
}

/** Flush the log file and drop the root logger. */
export function closeLogger(): void {
  rootLogger?.flush();
  rootLogger = null;
}
