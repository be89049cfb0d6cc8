/**
 * Crash-safe file writes on write-file-atomic (temp file, then rename),
 * and reads that treat a missing file as empty.
 *
 * Markdown sources and JSON caches are both rewritten through here, so a
 * reader in another process sees either the old content or the new, never
 * a torn file.
 */

import writeFileAtomic from 'write-file-atomic';
import { readFile, mkdir } from 'node:fs/promises';
import { dirname } from 'node:path';
import { TaskweaveError } from '../core/errors.js';
import { ExitCode } from '../types/exit-codes.js';

function fileError(action: 'read' | 'write', filePath: string, cause: unknown): TaskweaveError {
  return new TaskweaveError(ExitCode.FILE_ERROR, `Failed to ${action} ${filePath}`, { cause });
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

/** Replace a file's content atomically, creating its directory first. */
export async function atomicWrite(filePath: string, content: string): Promise<void> {
  try {
    await mkdir(dirname(filePath), { recursive: true });
    await writeFileAtomic(filePath, content, { encoding: 'utf8' });
  } catch (err) {
    throw fileError('write', filePath, err);
  }
}

/** File content as UTF-8, or null when the file does not exist. */
export async function safeReadFile(filePath: string): Promise<string | null> {
  try {
    return await readFile(filePath, 'utf8');
  } catch (err) {
    if (isMissingFile(err)) return null;
    throw fileError('read', filePath, err);
  }
}

/** Serialize `data` with a trailing newline and write it atomically. */
export async function atomicWriteJson(filePath: string, data: unknown, indent = 2): Promise<void> {
  await atomicWrite(filePath, `${JSON.stringify(data, null, indent)}\n`);
}
