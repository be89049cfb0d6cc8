/**
 * Cloud to-do service provider, read from its persisted snapshot.
 *
 * A separate sync step keeps `<cacheDir>/todoist_tasks.json` current and
 * drains `<cacheDir>/todoist_completions.json`. This provider never talks
 * to the network: completions are queued for that sync step and mirrored
 * into the snapshot so the next run already sees them.
 *
 * The snapshot holds either the engine's own record format
 * (`native_id`, `title`, ...) or the service's task shape
 * (`id`, `content`, `due.date`, `is_completed`, ...).
 */

import { join } from 'node:path';
import { z } from 'zod';
import { atomicWriteJson } from '../../store/atomic.js';
import { readJson, updateJson } from '../../store/json.js';
import { withLock } from '../../store/lock.js';
import { SourceUnavailableError, describeError } from '../errors.js';
import { getLogger } from '../logger.js';
import type { MarkCompleteOutcome, RawRecord, SourceProvider } from './provider.js';

export const TASKS_FILE = 'todoist_tasks.json';
export const COMPLETIONS_FILE = 'todoist_completions.json';

const id = z.union([z.string(), z.number()]);
const text = z.string().nullish();

/** The service's own task shape. */
export const NativeTaskSchema = z.object({
  id,
  content: z.string(),
  priority: z.number().int().nullish(),
  due: z.object({
    date: text,
    datetime: text,
  }).nullish(),
  labels: z.array(z.string()).optional(),
  is_completed: z.boolean().optional(),
  created_at: text,
  updated_at: text,
});
export type NativeTask = z.infer<typeof NativeTaskSchema>;

/** The engine's persisted snapshot format. */
export const SnapshotRecordSchema = z.object({
  native_id: id.nullish(),
  title: text,
  priority: z.union([z.number(), z.string()]).nullish(),
  energy: text,
  attention: text,
  due: text,
  labels: z.array(z.string()).optional(),
  completed: z.boolean().optional(),
  created: text,
  modified: text,
});
export type SnapshotRecord = z.infer<typeof SnapshotRecordSchema>;

export const CompletionRequestSchema = z.object({
  task_id: z.string(),
  requested_at: z.string(),
  status: z.string(),
});
export type CompletionRequest = z.infer<typeof CompletionRequestSchema>;

const CompletionQueueSchema = z.array(CompletionRequestSchema);

function fromNative(task: NativeTask): RawRecord {
  return {
    nativeId: task.id,
    title: task.content,
    priority: task.priority ?? null,
    labels: task.labels ?? [],
    due: task.due?.datetime ?? task.due?.date ?? null,
    completed: task.is_completed === true,
    created: task.created_at ?? null,
    modified: task.updated_at ?? null,
  };
}

function fromSnapshot(record: SnapshotRecord): RawRecord {
  return {
    nativeId: record.native_id ?? null,
    title: record.title ?? null,
    priority: record.priority ?? null,
    energy: record.energy ?? null,
    attention: record.attention ?? null,
    labels: record.labels ?? [],
    due: record.due ?? null,
    completed: record.completed === true,
    created: record.created ?? null,
    modified: record.modified ?? null,
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Convert one snapshot element. Elements matching neither shape come back
 * without a title so the Normalizer rejects them as malformed.
 */
export function toRawRecord(element: unknown): RawRecord {
  const native = NativeTaskSchema.safeParse(element);
  if (native.success) return fromNative(native.data);
  const snapshot = SnapshotRecordSchema.safeParse(element);
  if (snapshot.success && (snapshot.data.native_id != null || snapshot.data.title != null)) {
    return fromSnapshot(snapshot.data);
  }

  const nativeId = isRecord(element) ? element['id'] ?? element['native_id'] : undefined;
  return {
    nativeId: typeof nativeId === 'string' || typeof nativeId === 'number' ? nativeId : null,
    title: null,
  };
}

function elementId(element: unknown): string | null {
  if (!isRecord(element)) return null;
  const value = element['id'] ?? element['native_id'];
  return typeof value === 'string' || typeof value === 'number' ? String(value) : null;
}

export interface TodoistCacheProviderOptions {
  /** Absolute cache directory. */
  cacheDir: string;
  now?: () => Date;
}

export class TodoistCacheProvider implements SourceProvider {
  readonly name = 'todoist';
  readonly tasksPath: string;
  readonly completionsPath: string;
  private readonly now: () => Date;

  constructor(options: TodoistCacheProviderOptions) {
    this.tasksPath = join(options.cacheDir, TASKS_FILE);
    this.completionsPath = join(options.cacheDir, COMPLETIONS_FILE);
    this.now = options.now ?? (() => new Date());
  }

  private async readSnapshot(): Promise<unknown[]> {
    let raw: unknown;
    try {
      raw = await readJson(this.tasksPath);
    } catch (err) {
      throw new SourceUnavailableError(this.name, `cache is not valid JSON: ${describeError(err)}`, { cause: err });
    }
    if (raw === null) {
      throw new SourceUnavailableError(this.name, `cache not found: ${this.tasksPath}`, {
        fix: 'Run the sync step that writes the todoist cache',
      });
    }
    if (!Array.isArray(raw)) {
      throw new SourceUnavailableError(this.name, `cache must be a JSON array: ${this.tasksPath}`);
    }
    return raw;
  }

  async fetchAll(): Promise<RawRecord[]> {
    const elements = await this.readSnapshot();
    getLogger('sources.todoist').debug({ count: elements.length }, 'read todoist cache');
    return elements.map(toRawRecord);
  }

  /** Pending completion requests. */
  async pendingCompletions(): Promise<CompletionRequest[]> {
    const queue = await this.readQueue();
    return queue.filter((r) => r.status === 'pending');
  }

  private async readQueue(): Promise<CompletionRequest[]> {
    return this.parseQueue(await readJson(this.completionsPath));
  }

  private parseQueue(raw: unknown): CompletionRequest[] {
    if (raw === null) return [];
    const parsed = CompletionQueueSchema.safeParse(raw);
    if (!parsed.success) {
      throw new SourceUnavailableError(this.name, `completion queue is corrupt: ${this.completionsPath}`, {
        cause: parsed.error,
      });
    }
    return parsed.data;
  }

  async markComplete(nativeId: string): Promise<MarkCompleteOutcome> {
    const log = getLogger('sources.todoist');

    return withLock<MarkCompleteOutcome>(this.tasksPath, async () => {
      const elements = await this.readSnapshot();
      const index = elements.findIndex((e) => elementId(e) === nativeId);
      const element = elements[index];
      if (index === -1 || !isRecord(element)) {
        return 'not_found';
      }

      const record = toRawRecord(element);
      const queued = await updateJson(
        this.completionsPath,
        (raw) => this.parseQueue(raw),
        (queue) => {
          if (record.completed || queue.some((r) => r.task_id === nativeId)) {
            return { result: false };
          }
          const request: CompletionRequest = {
            task_id: nativeId,
            requested_at: this.now().toISOString(),
            status: 'pending',
          };
          return { next: [...queue, request], result: true };
        },
      );

      if (!queued) {
        log.info({ nativeId }, 'already complete or queued');
        return 'already_complete';
      }

      const flag = 'content' in element ? 'is_completed' : 'completed';
      elements[index] = { ...element, [flag]: true };
      // the snapshot lock is already held
      await atomicWriteJson(this.tasksPath, elements);

      log.info({ nativeId }, 'completion request queued');
      return 'success';
    });
  }
}
