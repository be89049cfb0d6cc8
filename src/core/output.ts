/**
 * JSON envelope formatter for CLI output.
 *
 * Every command prints exactly one envelope on stdout in JSON mode:
 *   { success, result, _meta: { operation, timestamp, warnings? } }
 * Errors carry `error` instead of a result.
 */

import { TaskweaveError } from './errors.js';
import { getExitCodeName } from '../types/exit-codes.js';

/** A non-fatal condition worth surfacing next to the result. */
export interface Warning {
  code: string;
  message: string;
}

export interface EnvelopeMeta {
  operation: string;
  timestamp: string;
  warnings?: Warning[];
}

export interface SuccessEnvelope<T> {
  success: true;
  result: T;
  message?: string;
  _meta: EnvelopeMeta;
}

export interface ErrorEnvelope {
  success: false;
  result: null;
  error: {
    code: number;
    name: string;
    message: string;
    retryable: boolean;
    fix?: string;
  };
  _meta: EnvelopeMeta;
}

/**
 * Accumulated warnings for the current command.
 * Drained by the next formatSuccess/formatError call.
 */
const pendingWarnings: Warning[] = [];

/**
 * Push a warning into the next envelope.
 */
export function pushWarning(warning: Warning): void {
  pendingWarnings.push(warning);
}

/** Return and clear the pending warnings. */
export function drainWarnings(): Warning[] | undefined {
  if (pendingWarnings.length === 0) return undefined;
  const drained = [...pendingWarnings];
  pendingWarnings.length = 0;
  return drained;
}

function createMeta(operation: string): EnvelopeMeta {
  const warnings = drainWarnings();
  return {
    operation,
    timestamp: new Date().toISOString(),
    ...(warnings && { warnings }),
  };
}

/**
 * Build a success envelope.
 * When operation is omitted, defaults to 'cli.output'.
 */
export function successEnvelope<T>(data: T, operation = 'cli.output', message?: string): SuccessEnvelope<T> {
  return {
    success: true,
    result: data,
    ...(message && { message }),
    _meta: createMeta(operation),
  };
}

/** Format a successful result as a JSON envelope string. */
export function formatSuccess<T>(data: T, message?: string, operation?: string): string {
  return JSON.stringify(successEnvelope(data, operation, message));
}

/** Build an error envelope. */
export function errorEnvelope(error: TaskweaveError, operation = 'cli.output'): ErrorEnvelope {
  return {
    success: false,
    result: null,
    error: {
      code: error.code,
      name: getExitCodeName(error.code),
      message: error.message,
      retryable: error.retryable,
      ...(error.fix && { fix: error.fix }),
    },
    _meta: createMeta(operation),
  };
}

/** Format an error as a JSON envelope string. */
export function formatError(error: TaskweaveError, operation?: string): string {
  return JSON.stringify(errorEnvelope(error, operation));
}
