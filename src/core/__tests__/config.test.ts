/**
 * Tests for the config engine.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { ConfigurationError } from '../errors.js';
import { deepMerge, loadConfig, parseEnvValue } from '../config.js';

const ENV_KEYS = [
  'TASKWEAVE_HOME',
  'TASKWEAVE_DIR',
  'TASKWEAVE_FORMAT',
  'TASKWEAVE_MAX_TASKS',
  'TASKWEAVE_VAULT_ENABLED',
  'TASKWEAVE_VAULT_PATH',
  'TASKWEAVE_TODOIST_CACHE_DIR',
] as const;

describe('loadConfig', () => {
  let tempDir: string;
  let projectDir: string;
  let dataDir: string;
  const saved = new Map<string, string | undefined>();

  beforeEach(async () => {
    for (const key of ENV_KEYS) saved.set(key, process.env[key]);
    tempDir = await mkdtemp(join(tmpdir(), 'taskweave-config-test-'));
    projectDir = join(tempDir, 'project');
    dataDir = join(projectDir, '.taskweave');
    await mkdir(dataDir, { recursive: true });
    // Point to a non-existent global config
    process.env['TASKWEAVE_HOME'] = join(tempDir, 'global');
    process.env['TASKWEAVE_DIR'] = dataDir;
  });

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true });
    for (const key of ENV_KEYS) {
      const value = saved.get(key);
      if (value !== undefined) process.env[key] = value;
      else delete process.env[key];
    }
  });

  async function writeProjectConfig(data: unknown): Promise<void> {
    await writeFile(join(dataDir, 'config.json'), JSON.stringify(data));
  }

  it('returns defaults when no config files exist', async () => {
    const config = await loadConfig(projectDir);
    expect(config.output.defaultFormat).toBe('json');
    expect(config.sources.todoist).toEqual({ enabled: true, cacheDir: 'cache' });
    expect(config.sources.vault.enabled).toBe(false);
    expect(config.recommend.maxTasks).toBe(5);
    expect(config.cleanup.staleThresholdDays).toBe(30);
    expect(config.scoring.priorityWeights).toEqual({ P1: 4, P2: 3, P3: 2, P4: 1 });
  });

  it('merges project config over global config over defaults', async () => {
    await mkdir(join(tempDir, 'global'), { recursive: true });
    await writeFile(join(tempDir, 'global', 'config.json'), JSON.stringify({
      output: { defaultFormat: 'human' },
      recommend: { maxTasks: 3 },
    }));
    await writeProjectConfig({ recommend: { maxTasks: 8 } });

    const config = await loadConfig(projectDir);
    expect(config.output.defaultFormat).toBe('human');
    expect(config.recommend.maxTasks).toBe(8);
    // Other defaults preserved
    expect(config.output.showColor).toBe(true);
  });

  it('environment variables override config files', async () => {
    await writeProjectConfig({ output: { defaultFormat: 'human' }, recommend: { maxTasks: 8 } });
    process.env['TASKWEAVE_FORMAT'] = 'json';
    process.env['TASKWEAVE_MAX_TASKS'] = '2';

    const config = await loadConfig(projectDir);
    expect(config.output.defaultFormat).toBe('json');
    expect(config.recommend.maxTasks).toBe(2);
  });

  it('keeps path variables as strings', async () => {
    process.env['TASKWEAVE_TODOIST_CACHE_DIR'] = '2026';
    const config = await loadConfig(projectDir);
    expect(config.sources.todoist.cacheDir).toBe('2026');
  });

  it('enables the vault from the environment', async () => {
    process.env['TASKWEAVE_VAULT_ENABLED'] = 'true';
    process.env['TASKWEAVE_VAULT_PATH'] = '/notes';
    const config = await loadConfig(projectDir);
    expect(config.sources.vault.enabled).toBe(true);
    expect(config.sources.vault.path).toBe('/notes');
    expect(config.sources.vault.dailyNotes.section).toBe('Action Items');
  });

  it('requires a vault path when the vault is enabled', async () => {
    await writeProjectConfig({ sources: { vault: { enabled: true } } });
    await expect(loadConfig(projectDir)).rejects.toThrow('sources.vault.path');
  });

  it('rejects deadline multipliers that grow with distance', async () => {
    await writeProjectConfig({ scoring: { deadline: { later: 5 } } });
    await expect(loadConfig(projectDir)).rejects.toBeInstanceOf(ConfigurationError);
  });

  it('rejects invalid values', async () => {
    await writeProjectConfig({ recommend: { maxTasks: 0 } });
    await expect(loadConfig(projectDir)).rejects.toThrow('recommend.maxTasks');
  });

  it('rejects unreadable config files', async () => {
    await writeFile(join(dataDir, 'config.json'), '{broken');
    await expect(loadConfig(projectDir)).rejects.toMatchObject({ code: 8 });
  });

  it('rejects a config file that is not an object', async () => {
    await writeProjectConfig([1, 2]);
    await expect(loadConfig(projectDir)).rejects.toThrow('must contain a JSON object');
  });
});

describe('deepMerge', () => {
  it('merges nested objects and replaces arrays', () => {
    expect(deepMerge({ a: { b: 1, c: [1, 2] } }, { a: { c: [3] } })).toEqual({ a: { b: 1, c: [3] } });
  });
});

describe('parseEnvValue', () => {
  it('converts booleans and numbers', () => {
    expect(parseEnvValue('true')).toBe(true);
    expect(parseEnvValue('false')).toBe(false);
    expect(parseEnvValue('42')).toBe(42);
    expect(parseEnvValue('human')).toBe('human');
    expect(parseEnvValue(' ')).toBe(' ');
  });
});
