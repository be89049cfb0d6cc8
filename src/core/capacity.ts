/**
 * Capacity readers: today's self-reported energy and attention.
 *
 * Read fresh on every run; a missing signal means medium/medium.
 */

import { join } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { safeReadFile } from '../store/atomic.js';
import { describeError } from './errors.js';
import { getLogger } from './logger.js';
import { dailyNoteFile } from './sources/daily-note.js';
import { DEFAULT_CAPACITY, isLevel, type Capacity, type Level } from '../types/task.js';

export interface CapacityReader {
  readToday(): Promise<Capacity>;
}

/** A capacity fixed up front, e.g. from CLI flags. */
export class FixedCapacityReader implements CapacityReader {
  constructor(private readonly capacity: Capacity = DEFAULT_CAPACITY) {}

  async readToday(): Promise<Capacity> {
    return { ...this.capacity };
  }
}

const FRONTMATTER = /^---\r?\n([\s\S]*?)\r?\n---(?:\r?\n|$)/;

function frontmatterLevels(content: string): Partial<Capacity> {
  const m = FRONTMATTER.exec(content);
  if (!m?.[1]) return {};

  let data: unknown;
  try {
    data = parseYaml(m[1]);
  } catch (err) {
    getLogger('capacity').warn({ reason: describeError(err) }, 'unreadable daily-note frontmatter');
    return {};
  }
  if (data === null || typeof data !== 'object' || Array.isArray(data)) return {};

  const levels: Partial<Capacity> = {};
  for (const key of ['energy', 'attention'] as const) {
    const value: unknown = Reflect.get(data, key);
    const level = typeof value === 'string' ? value.trim().toLowerCase() : undefined;
    if (isLevel(level)) levels[key] = level;
  }
  return levels;
}

function tagLevel(content: string, category: keyof Capacity): Level | undefined {
  const m = new RegExp(`#${category}/(low|medium|high)\\b`, 'i').exec(content);
  const level = m?.[1]?.toLowerCase();
  return isLevel(level) ? level : undefined;
}

/**
 * Parse a daily note: frontmatter `energy` / `attention` keys first, then
 * `#energy/<level>` and `#attention/<level>` tags, then the default.
 */
export function parseCapacity(content: string, fallback: Capacity = DEFAULT_CAPACITY): Capacity {
  const front = frontmatterLevels(content);
  return {
    energy: front.energy ?? tagLevel(content, 'energy') ?? fallback.energy,
    attention: front.attention ?? tagLevel(content, 'attention') ?? fallback.attention,
  };
}

export interface DailyNoteCapacityOptions {
  vaultPath: string;
  directory: string;
  format: string;
  now?: () => Date;
}

/** Reads capacity from today's daily note in the vault. */
export class DailyNoteCapacityReader implements CapacityReader {
  private readonly now: () => Date;

  constructor(private readonly options: DailyNoteCapacityOptions) {
    this.now = options.now ?? (() => new Date());
  }

  async readToday(): Promise<Capacity> {
    const { vaultPath, directory, format } = this.options;
    const path = join(vaultPath, dailyNoteFile(directory, format, this.now()));
    const content = await safeReadFile(path);
    if (content === null) {
      getLogger('capacity').info({ path }, 'no daily note; using default capacity');
      return { ...DEFAULT_CAPACITY };
    }
    return parseCapacity(content);
  }
}

/**
 * Apply CLI overrides on top of another reader. Either level may be
 * overridden on its own.
 */
export class OverrideCapacityReader implements CapacityReader {
  constructor(
    private readonly base: CapacityReader,
    private readonly overrides: Partial<Capacity>,
  ) {}

  async readToday(): Promise<Capacity> {
    const { energy, attention } = this.overrides;
    if (energy && attention) return { energy, attention };
    const today = await this.base.readToday();
    return { energy: energy ?? today.energy, attention: attention ?? today.attention };
  }
}
