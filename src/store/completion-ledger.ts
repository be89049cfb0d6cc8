/**
 * Completion ledger: what each completion dispatch achieved, per system.
 *
 * The ledger lets a later invocation retry only the systems that failed,
 * and lets a settled task short-circuit without touching any source.
 * Tasks themselves are never persisted; only dispatch bookkeeping is.
 */

import { z } from 'zod';
import { DAY_MS } from '../core/dates.js';
import { TaskweaveError } from '../core/errors.js';
import { ExitCode } from '../types/exit-codes.js';
import { readJson, updateJson } from './json.js';
import { withLock } from './lock.js';

export const LedgerStateSchema = z.enum(['dispatching', 'settled', 'partially_settled']);
export type LedgerState = z.infer<typeof LedgerStateSchema>;

export const SettledSystemSchema = z.object({
  nativeId: z.string(),
  outcome: z.enum(['success', 'already_complete']),
  at: z.string(),
});
export type SettledSystem = z.infer<typeof SettledSystemSchema>;

export const FailedSystemSchema = z.object({
  nativeId: z.string(),
  reason: z.string(),
  code: z.number().int(),
  at: z.string(),
});
export type FailedSystem = z.infer<typeof FailedSystemSchema>;

export const LedgerEntrySchema = z.object({
  taskId: z.string().min(1),
  title: z.string(),
  state: LedgerStateSchema,
  settled: z.record(z.string(), SettledSystemSchema),
  failed: z.record(z.string(), FailedSystemSchema),
  attempts: z.number().int().min(0),
  updatedAt: z.string(),
});
export type LedgerEntry = z.infer<typeof LedgerEntrySchema>;

export const LedgerFileSchema = z.object({
  version: z.literal(1),
  entries: z.record(z.string(), LedgerEntrySchema),
});
export type LedgerFile = z.infer<typeof LedgerFileSchema>;

/** Storage for completion bookkeeping. */
export interface CompletionLedger {
  get(taskId: string): Promise<LedgerEntry | null>;
  put(entry: LedgerEntry): Promise<void>;
  /** All entries, most recently updated first. */
  list(): Promise<LedgerEntry[]>;
  /**
   * Run `fn` with exclusive access to dispatching for this ledger.
   * Ledgers shared between processes serialize here.
   */
  exclusive<T>(fn: () => Promise<T>): Promise<T>;
}

function byUpdatedDesc(a: LedgerEntry, b: LedgerEntry): number {
  return a.updatedAt < b.updatedAt ? 1 : a.updatedAt > b.updatedAt ? -1 : 0;
}

/** In-process ledger. Entries are copied in and out. */
export class MemoryCompletionLedger implements CompletionLedger {
  private readonly entries = new Map<string, LedgerEntry>();

  async get(taskId: string): Promise<LedgerEntry | null> {
    const entry = this.entries.get(taskId);
    return entry ? structuredClone(entry) : null;
  }

  async put(entry: LedgerEntry): Promise<void> {
    this.entries.set(entry.taskId, structuredClone(entry));
  }

  async list(): Promise<LedgerEntry[]> {
    return [...this.entries.values()].map((e) => structuredClone(e)).sort(byUpdatedDesc);
  }

  async exclusive<T>(fn: () => Promise<T>): Promise<T> {
    return fn();
  }
}

function parseLedgerFile(filePath: string, raw: unknown): LedgerFile {
  if (raw === null) return { version: 1, entries: {} };
  const parsed = LedgerFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new TaskweaveError(
      ExitCode.VALIDATION_ERROR,
      `Completion ledger is corrupt: ${filePath}`,
      { fix: `Inspect or remove ${filePath}`, cause: parsed.error },
    );
  }
  return parsed.data;
}

/** Days a settled entry is kept after its last update (default 30). */
export const DEFAULT_RETAIN_SETTLED_DAYS = 30;

export interface FileLedgerOptions {
  /** Settled entries not updated for longer than this are dropped on write. */
  retainSettledDays?: number;
  now?: () => Date;
}

/**
 * Entries to keep: everything still owed a retry, and settled entries
 * updated inside the retention window.
 */
export function pruneSettled(
  entries: Record<string, LedgerEntry>,
  cutoff: string,
): Record<string, LedgerEntry> {
  return Object.fromEntries(
    Object.entries(entries).filter(([, e]) => e.state !== 'settled' || e.updatedAt >= cutoff),
  );
}

/**
 * JSON-file ledger shared by every invocation in a project.
 * Every put() also drops settled entries past the retention window, so the
 * file does not grow with every task ever completed.
 */
export class FileCompletionLedger implements CompletionLedger {
  private readonly retainSettledDays: number;
  private readonly now: () => Date;

  constructor(readonly filePath: string, options: FileLedgerOptions = {}) {
    this.retainSettledDays = options.retainSettledDays ?? DEFAULT_RETAIN_SETTLED_DAYS;
    this.now = options.now ?? (() => new Date());
  }

  private async load(): Promise<LedgerFile> {
    return parseLedgerFile(this.filePath, await readJson(this.filePath));
  }

  async get(taskId: string): Promise<LedgerEntry | null> {
    const file = await this.load();
    return file.entries[taskId] ?? null;
  }

  async put(entry: LedgerEntry): Promise<void> {
    const cutoff = new Date(this.now().getTime() - this.retainSettledDays * DAY_MS).toISOString();
    await updateJson(
      this.filePath,
      (raw) => parseLedgerFile(this.filePath, raw),
      (file) => ({
        next: { ...file, entries: { ...pruneSettled(file.entries, cutoff), [entry.taskId]: entry } },
        result: undefined,
      }),
    );
  }

  async list(): Promise<LedgerEntry[]> {
    const file = await this.load();
    return Object.values(file.entries).sort(byUpdatedDesc);
  }

  async exclusive<T>(fn: () => Promise<T>): Promise<T> {
    // separate lock target: put() locks the ledger file itself
    return withLock(`${this.filePath}.dispatch`, fn, { staleMs: 60_000, retries: 10 });
  }
}
