/**
 * taskweave exit codes.
 * Ranges: 0 = success, 1-99 = errors, 100+ = special (non-error) states.
 */

export enum ExitCode {
  // === SUCCESS (0) ===
  SUCCESS = 0,

  // === GENERAL ERRORS (1-9) ===
  GENERAL_ERROR = 1,
  INVALID_INPUT = 2,
  FILE_ERROR = 3,
  NOT_FOUND = 4,
  VALIDATION_ERROR = 6,
  LOCK_TIMEOUT = 7,
  CONFIG_ERROR = 8,

  // === CONCURRENCY ERRORS (20-29) ===
  CONCURRENT_MODIFICATION = 21,
  DISPATCH_TIMEOUT = 22,

  // === SOURCE / RECONCILIATION ERRORS (30-39) ===
  SOURCE_UNAVAILABLE = 30,
  NO_SOURCES = 31,
  MALFORMED_RECORD = 32,
  DISPATCH_FAILED = 33,
  AMBIGUOUS_TASK_ID = 34,

  // === SPECIAL CODES (100+) - NOT errors ===
  NO_DATA = 100,
  ALREADY_COMPLETE = 101,
  NO_CHANGE = 102,
}

/** Check if an exit code represents an error (1-99). */
export function isErrorCode(code: ExitCode): boolean {
  return code >= 1 && code < 100;
}

/** Check if an exit code represents success (0 or 100+). */
export function isSuccessCode(code: ExitCode): boolean {
  return code === 0 || code >= 100;
}

/** Check if an exit code is recoverable (retry may succeed). */
export function isRecoverableCode(code: ExitCode): boolean {
  const nonRecoverable = new Set<ExitCode>([
    ExitCode.INVALID_INPUT,
    ExitCode.FILE_ERROR,
    ExitCode.CONFIG_ERROR,
    ExitCode.MALFORMED_RECORD,
    ExitCode.AMBIGUOUS_TASK_ID,
  ]);

  if (!isErrorCode(code)) return false;
  return !nonRecoverable.has(code);
}

/** Human-readable name for an exit code. */
export function getExitCodeName(code: ExitCode): string {
  return ExitCode[code] ?? 'UNKNOWN';
}
