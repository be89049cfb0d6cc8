/**
 * taskweave error types with exit code integration.
 *
 * Failures are scoped to the smallest unit that produced them: one record
 * (MalformedRecordError), one source (SourceUnavailableError) or one
 * system dispatch (CompletionDispatchError). Only ConfigurationError and
 * a run where every source failed abort a command.
 */

import { ExitCode, getExitCodeName, isRecoverableCode } from '../types/exit-codes.js';

/** Options accepted by every taskweave error. */
export interface TaskweaveErrorOptions {
  fix?: string;
  cause?: unknown;
}

/**
 * Structured error class for taskweave operations.
 * Carries an exit code, human-readable message, and optional fix suggestion.
 */
export class TaskweaveError extends Error {
  readonly code: ExitCode;
  readonly fix?: string;

  constructor(code: ExitCode, message: string, options?: TaskweaveErrorOptions) {
    super(message, { cause: options?.cause });
    this.name = 'TaskweaveError';
    this.code = code;
    this.fix = options?.fix;
  }

  /** Whether retrying the same operation later may succeed. */
  get retryable(): boolean {
    return isRecoverableCode(this.code);
  }

  /** Structured JSON representation for CLI output. */
  toJSON(): Record<string, unknown> {
    return {
      success: false,
      error: {
        code: this.code,
        name: getExitCodeName(this.code),
        message: this.message,
        retryable: this.retryable,
        ...(this.fix && { fix: this.fix }),
      },
    };
  }
}

/** A source record lacks a required identity field (native id or title). */
export class MalformedRecordError extends TaskweaveError {
  readonly source: string;

  constructor(source: string, message: string, options?: TaskweaveErrorOptions) {
    super(ExitCode.MALFORMED_RECORD, `${source}: ${message}`, options);
    this.name = 'MalformedRecordError';
    this.source = source;
  }
}

/** A whole source could not be read for this run. */
export class SourceUnavailableError extends TaskweaveError {
  readonly source: string;

  constructor(source: string, message: string, options?: TaskweaveErrorOptions) {
    super(ExitCode.SOURCE_UNAVAILABLE, `${source}: ${message}`, options);
    this.name = 'SourceUnavailableError';
    this.source = source;
  }
}

/** Marking one task complete in one system failed. */
export class CompletionDispatchError extends TaskweaveError {
  readonly system: string;
  readonly taskId: string;

  constructor(
    taskId: string,
    system: string,
    message: string,
    options?: TaskweaveErrorOptions & { code?: ExitCode },
  ) {
    super(options?.code ?? ExitCode.DISPATCH_FAILED, message, options);
    this.name = 'CompletionDispatchError';
    this.taskId = taskId;
    this.system = system;
  }
}

/** Configuration is missing or invalid; the run cannot start. */
export class ConfigurationError extends TaskweaveError {
  constructor(message: string, options?: TaskweaveErrorOptions) {
    super(ExitCode.CONFIG_ERROR, message, options);
    this.name = 'ConfigurationError';
  }
}

/** Render any thrown value as a one-line reason. */
export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
