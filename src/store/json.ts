/**
 * JSON read and read-modify-write under a lock.
 * The data access layer for provider caches and the completion ledger.
 */

import { atomicWriteJson, safeReadFile } from './atomic.js';
import { withLock } from './lock.js';
import { TaskweaveError } from '../core/errors.js';
import { ExitCode } from '../types/exit-codes.js';

/**
 * Read and parse a JSON file.
 * Returns null if the file does not exist.
 */
export async function readJson(filePath: string): Promise<unknown> {
  const content = await safeReadFile(filePath);
  if (content === null) return null;

  try {
    return JSON.parse(content);
  } catch (err) {
    throw new TaskweaveError(
      ExitCode.VALIDATION_ERROR,
      `Invalid JSON in: ${filePath}`,
      { cause: err },
    );
  }
}

/**
 * Read-modify-write a JSON file under one lock.
 * `parse` receives null when the file does not exist. When `mutate`
 * returns no `next` value nothing is written.
 */
export async function updateJson<T, R>(
  filePath: string,
  parse: (raw: unknown) => T,
  mutate: (current: T) => { next?: T; result: R },
): Promise<R> {
  return withLock(filePath, async () => {
    const current = parse(await readJson(filePath));
    const { next, result } = mutate(current);
    if (next !== undefined) {
      await atomicWriteJson(filePath, next);
    }
    return result;
  });
}
