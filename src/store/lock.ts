/**
 * Cross-process exclusive sections over a data file, on proper-lockfile.
 *
 * The lock is a `<target>.lock` directory beside the target. Neither the
 * target nor its parent directory has to exist yet.
 */

import lockfile from 'proper-lockfile';
import { mkdir } from 'node:fs/promises';
import { dirname } from 'node:path';
import { TaskweaveError } from '../core/errors.js';
import { getLogger } from '../core/logger.js';
import { ExitCode } from '../types/exit-codes.js';

export type ReleaseFn = () => Promise<void>;

export interface LockOptions {
  /** Age after which another holder's lock is taken over (ms, min 2000). */
  staleMs?: number;
  /** Attempts after the first one before giving up. */
  retries?: number;
  /** Called if the lock is taken over or removed while held. */
  onCompromised?: (err: Error) => void;
}

const DEFAULT_STALE_MS = 10_000;
const DEFAULT_RETRIES = 3;

function lockTimeout(filePath: string, cause: unknown): TaskweaveError {
  return new TaskweaveError(ExitCode.LOCK_TIMEOUT, `Failed to acquire lock: ${filePath}`, {
    fix: 'Another taskweave run may be updating this file. Wait and retry.',
    cause,
  });
}

/**
 * Acquire an exclusive lock on a file.
 * The returned function releases it and must be called exactly once.
 */
export async function acquireLock(filePath: string, options: LockOptions = {}): Promise<ReleaseFn> {
  const log = getLogger('lock');
  await mkdir(dirname(filePath), { recursive: true });

  try {
    const release = await lockfile.lock(filePath, {
      realpath: false,
      stale: options.staleMs ?? DEFAULT_STALE_MS,
      retries: {
        retries: options.retries ?? DEFAULT_RETRIES,
        minTimeout: 100,
        maxTimeout: 1000,
        factor: 2,
      },
      onCompromised: (err) => {
        log.error({ err, filePath }, 'lock compromised');
        options.onCompromised?.(err);
      },
    });
    log.debug({ filePath }, 'lock acquired');
    return release;
  } catch (err) {
    throw lockTimeout(filePath, err);
  }
}

/**
 * Run `fn` while holding the lock on `filePath`.
 * Released when `fn` settles. A lock lost midway fails the call even when
 * `fn` itself succeeded, since its writes may have raced another holder.
 */
export async function withLock<T>(
  filePath: string,
  fn: () => Promise<T>,
  options: LockOptions = {},
): Promise<T> {
  const lost: { error?: Error } = {};
  const release = await acquireLock(filePath, {
    ...options,
    onCompromised: (err) => {
      lost.error = err;
      options.onCompromised?.(err);
    },
  });

  let result: T;
  try {
    result = await fn();
  } finally {
    if (!lost.error) await release();
  }

  if (lost.error) {
    throw new TaskweaveError(ExitCode.LOCK_TIMEOUT, `Lock on ${filePath} was lost while held`, {
      cause: lost.error,
    });
  }
  return result;
}
