/**
 * Tests for the vault task-database provider.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, rm, utimes, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { SourceUnavailableError } from '../../errors.js';
import { titleHash } from '../../tasks/identity.js';
import { VaultProvider } from '../vault.js';

describe('VaultProvider', () => {
  let vaultPath: string;
  let provider: VaultProvider;
  const now = () => new Date(2026, 9, 19, 9, 0);

  beforeEach(async () => {
    vaultPath = await mkdtemp(join(tmpdir(), 'taskweave-vault-'));
    provider = new VaultProvider({ vaultPath, file: 'Tasks.md', now });
  });

  afterEach(async () => {
    await rm(vaultPath, { recursive: true, force: true });
  });

  it('fetches every checkbox task, completed ones included', async () => {
    const file = join(vaultPath, 'Tasks.md');
    await writeFile(file, '- [ ] Write report #P2\n- [x] Pay rent\n- [x] Send invoice ✅ 2026-10-12\n');
    const written = new Date(2026, 9, 18, 20, 0);
    await utimes(file, written, written);

    const records = await provider.fetchAll();

    expect(records).toEqual([
      {
        nativeId: `Tasks.md#${titleHash('Write report')}`,
        title: 'Write report',
        labels: ['P2'],
        due: null,
        created: null,
        modified: written.toISOString(),
        completed: false,
      },
      {
        nativeId: `Tasks.md#${titleHash('Pay rent')}`,
        title: 'Pay rent',
        labels: [],
        due: null,
        created: null,
        modified: written.toISOString(),
        completed: true,
      },
      {
        nativeId: `Tasks.md#${titleHash('Send invoice')}`,
        title: 'Send invoice',
        labels: [],
        due: null,
        created: null,
        modified: '2026-10-12',
        completed: true,
      },
    ]);
  });

  it('is unavailable when the file is missing', async () => {
    await expect(provider.fetchAll()).rejects.toBeInstanceOf(SourceUnavailableError);
  });

  it('marks a task complete in the file', async () => {
    const file = join(vaultPath, 'Tasks.md');
    await writeFile(file, '- [ ] Write report #P2\n- [ ] Pay rent\n');

    const outcome = await provider.markComplete(`Tasks.md#${titleHash('Pay rent')}`);

    expect(outcome).toBe('success');
    expect(await readFile(file, 'utf8')).toBe('- [ ] Write report #P2\n- [x] Pay rent ✅ 2026-10-19\n');
  });

  it('is idempotent', async () => {
    await writeFile(join(vaultPath, 'Tasks.md'), '- [ ] Pay rent\n');
    const id = `Tasks.md#${titleHash('Pay rent')}`;

    expect(await provider.markComplete(id)).toBe('success');
    expect(await provider.markComplete(id)).toBe('already_complete');
  });

  it('rejects an id from another file', async () => {
    await writeFile(join(vaultPath, 'Tasks.md'), '- [ ] Pay rent\n');
    await expect(provider.markComplete(`Other.md#${titleHash('Pay rent')}`))
      .rejects.toThrow(`vault: Other.md#${titleHash('Pay rent')} is not a task of this source`);
  });

  it('reports not_found for an unknown record', async () => {
    await writeFile(join(vaultPath, 'Tasks.md'), '- [ ] Pay rent\n');
    expect(await provider.markComplete('Tasks.md#unknown')).toBe('not_found');
  });
});
