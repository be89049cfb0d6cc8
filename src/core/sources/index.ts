/**
 * Build the enabled source providers and capacity reader from config.
 */

import type { TaskweaveConfig } from '../../types/config.js';
import { DailyNoteCapacityReader, FixedCapacityReader, type CapacityReader } from '../capacity.js';
import { resolveProjectPath } from '../paths.js';
import { DailyNoteProvider } from './daily-note.js';
import type { SourceProvider } from './provider.js';
import { TodoistCacheProvider } from './todoist-cache.js';
import { VaultProvider } from './vault.js';

export type { RawRecord, SourceProvider, CompletionSink, MarkCompleteOutcome } from './provider.js';
export { sinksByName } from './provider.js';

export interface BuildOptions {
  cwd?: string;
  now?: () => Date;
}

/** Providers for every enabled source, in a fixed order. */
export function buildProviders(config: TaskweaveConfig, options: BuildOptions = {}): SourceProvider[] {
  const { todoist, vault } = config.sources;
  const providers: SourceProvider[] = [];

  if (todoist.enabled) {
    providers.push(new TodoistCacheProvider({
      cacheDir: resolveProjectPath(todoist.cacheDir, options.cwd),
      now: options.now,
    }));
  }

  if (vault.enabled) {
    const vaultPath = resolveProjectPath(vault.path, options.cwd);
    providers.push(new VaultProvider({ vaultPath, file: vault.taskDatabase, now: options.now }));
    if (vault.dailyNotes.enabled) {
      providers.push(new DailyNoteProvider({
        vaultPath,
        directory: vault.dailyNotes.directory,
        format: vault.dailyNotes.format,
        section: vault.dailyNotes.section,
        now: options.now,
      }));
    }
  }

  return providers;
}

/** Today's capacity comes from the daily note when the vault is enabled. */
export function buildCapacityReader(config: TaskweaveConfig, options: BuildOptions = {}): CapacityReader {
  const { vault } = config.sources;
  if (!vault.enabled) return new FixedCapacityReader();
  return new DailyNoteCapacityReader({
    vaultPath: resolveProjectPath(vault.path, options.cwd),
    directory: vault.dailyNotes.directory,
    format: vault.dailyNotes.format,
    now: options.now,
  });
}

