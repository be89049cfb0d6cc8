/**
 * Vault task database provider: checkbox lines of one markdown file.
 */

import { stat } from 'node:fs/promises';
import { join } from 'node:path';
import { atomicWrite, safeReadFile } from '../../store/atomic.js';
import { withLock } from '../../store/lock.js';
import { ExitCode } from '../../types/exit-codes.js';
import { formatLocalDate } from '../dates.js';
import { SourceUnavailableError, TaskweaveError } from '../errors.js';
import { getLogger } from '../logger.js';
import { completeTaskLine, parseTaskLines, type ParseOptions } from './markdown-tasks.js';
import type { MarkCompleteOutcome, RawRecord, SourceProvider } from './provider.js';

export interface MarkdownFileProviderOptions {
  /** Absolute vault root. */
  vaultPath: string;
  /** Task file, relative to the vault root. */
  file: string;
  now?: () => Date;
}

/**
 * Shared read/complete logic for providers backed by one markdown file.
 * Subclasses choose the file and the part of it that holds tasks.
 */
export abstract class MarkdownFileProvider implements SourceProvider {
  abstract readonly name: string;
  protected readonly vaultPath: string;
  protected readonly now: () => Date;

  constructor(options: Omit<MarkdownFileProviderOptions, 'file'>) {
    this.vaultPath = options.vaultPath;
    this.now = options.now ?? (() => new Date());
  }

  /** Vault-relative path of the file for today. */
  protected abstract relativeFile(): string;

  protected parseOptions(): ParseOptions {
    return {};
  }

  protected get absoluteFile(): string {
    return join(this.vaultPath, this.relativeFile());
  }

  /**
   * Vault-relative file that holds `nativeId`, or null when the id cannot
   * belong to this source.
   */
  protected fileFor(nativeId: string): string | null {
    const file = this.relativeFile();
    return nativeId.startsWith(`${file}#`) ? file : null;
  }

  /**
   * Every checkbox task of the file. A line without its own ✅ date takes
   * the file's modification time as its last activity.
   */
  async fetchAll(): Promise<RawRecord[]> {
    const file = this.relativeFile();
    const content = await safeReadFile(this.absoluteFile);
    if (content === null) {
      throw new SourceUnavailableError(this.name, `file not found: ${this.absoluteFile}`);
    }
    const { mtime } = await stat(this.absoluteFile);
    const tasks = parseTaskLines(content, file, this.parseOptions());
    getLogger(`sources.${this.name}`).debug({ file, count: tasks.length }, 'parsed markdown tasks');
    return tasks.map((t) => ({
      ...t.record,
      nativeId: t.nativeId,
      modified: t.record.modified ?? mtime.toISOString(),
    }));
  }

  async markComplete(nativeId: string): Promise<MarkCompleteOutcome> {
    const file = this.fileFor(nativeId);
    if (file === null) {
      throw new TaskweaveError(ExitCode.INVALID_INPUT, `${this.name}: ${nativeId} is not a task of this source`);
    }
    const path = join(this.vaultPath, file);
    const log = getLogger(`sources.${this.name}`);

    return withLock(path, async () => {
      const content = await safeReadFile(path);
      if (content === null) {
        throw new SourceUnavailableError(this.name, `file not found: ${path}`);
      }
      const result = completeTaskLine(content, file, nativeId, formatLocalDate(this.now()), this.parseOptions());
      if (result.outcome === 'success') {
        await atomicWrite(path, result.content);
      }
      log.info({ nativeId, outcome: result.outcome }, 'mark complete');
      return result.outcome;
    });
  }
}

/** The vault's task database file. */
export class VaultProvider extends MarkdownFileProvider {
  readonly name = 'vault';
  private readonly file: string;

  constructor(options: MarkdownFileProviderOptions) {
    super(options);
    this.file = options.file;
  }

  protected relativeFile(): string {
    return this.file;
  }
}
