/**
 * Tests for capacity readers.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import {
  DailyNoteCapacityReader,
  FixedCapacityReader,
  OverrideCapacityReader,
  parseCapacity,
} from '../capacity.js';

describe('parseCapacity', () => {
  it('reads frontmatter levels', () => {
    const note = '---\nenergy: High\nattention: low\n---\n# Monday\n';
    expect(parseCapacity(note)).toEqual({ energy: 'high', attention: 'low' });
  });

  it('falls back to tags', () => {
    expect(parseCapacity('# Monday\nFeeling slow #energy/low\n')).toEqual({ energy: 'low', attention: 'medium' });
  });

  it('prefers frontmatter over tags', () => {
    const note = '---\nattention: high\n---\n#attention/low\n';
    expect(parseCapacity(note).attention).toBe('high');
  });

  it('ignores unknown levels and broken frontmatter', () => {
    expect(parseCapacity('---\nenergy: extreme\n---\n')).toEqual({ energy: 'medium', attention: 'medium' });
    expect(parseCapacity('---\nenergy: [unclosed\n---\n')).toEqual({ energy: 'medium', attention: 'medium' });
  });

  it('uses the given fallback', () => {
    expect(parseCapacity('', { energy: 'low', attention: 'high' })).toEqual({ energy: 'low', attention: 'high' });
  });
});

describe('DailyNoteCapacityReader', () => {
  let vaultPath: string;
  const now = () => new Date(2026, 9, 19, 9, 0);

  beforeEach(async () => {
    vaultPath = await mkdtemp(join(tmpdir(), 'taskweave-vault-'));
  });

  afterEach(async () => {
    await rm(vaultPath, { recursive: true, force: true });
  });

  it('reads today\'s note', async () => {
    await mkdir(join(vaultPath, 'Daily Notes'));
    await writeFile(join(vaultPath, 'Daily Notes', '2026-10-19.md'), '---\nenergy: low\n---\n');

    const reader = new DailyNoteCapacityReader({ vaultPath, directory: 'Daily Notes', format: 'YYYY-MM-DD', now });
    expect(await reader.readToday()).toEqual({ energy: 'low', attention: 'medium' });
  });

  it('defaults to medium when there is no note for today', async () => {
    const reader = new DailyNoteCapacityReader({ vaultPath, directory: 'Daily Notes', format: 'YYYY-MM-DD', now });
    expect(await reader.readToday()).toEqual({ energy: 'medium', attention: 'medium' });
  });
});

describe('OverrideCapacityReader', () => {
  const base = new FixedCapacityReader({ energy: 'low', attention: 'high' });

  it('overrides either level on its own', async () => {
    expect(await new OverrideCapacityReader(base, { energy: 'high' }).readToday())
      .toEqual({ energy: 'high', attention: 'high' });
    expect(await new OverrideCapacityReader(base, {}).readToday())
      .toEqual({ energy: 'low', attention: 'high' });
  });

  it('does not consult the base when both are given', async () => {
    const failing = { readToday: () => Promise.reject(new Error('unreadable')) };
    expect(await new OverrideCapacityReader(failing, { energy: 'low', attention: 'low' }).readToday())
      .toEqual({ energy: 'low', attention: 'low' });
  });
});
