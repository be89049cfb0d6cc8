/**
 * Tests for atomic writes and safe reads.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, rm } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { ExitCode } from '../../types/exit-codes.js';
import { atomicWrite, atomicWriteJson, safeReadFile } from '../atomic.js';

describe('atomic file helpers', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await mkdtemp(join(tmpdir(), 'taskweave-test-'));
  });

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  it('creates parent directories and replaces content', async () => {
    const filePath = join(tempDir, 'a', 'b', 'note.md');
    await atomicWrite(filePath, 'first');
    await atomicWrite(filePath, 'second');
    expect(await readFile(filePath, 'utf8')).toBe('second');
  });

  it('writes JSON with the requested indent', async () => {
    const filePath = join(tempDir, 'data.json');
    await atomicWriteJson(filePath, [1], 0);
    expect(await readFile(filePath, 'utf8')).toBe('[1]\n');
  });

  it('returns null for a missing file', async () => {
    expect(await safeReadFile(join(tempDir, 'missing.md'))).toBeNull();
  });

  it('reports other read failures as FILE_ERROR', async () => {
    await expect(safeReadFile(tempDir)).rejects.toMatchObject({ code: ExitCode.FILE_ERROR });
  });
});
