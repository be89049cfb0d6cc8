/**
 * Markdown checkbox tasks, as kept in a note vault.
 *
 *   - [ ] Draft the budget #P1 #energy/high 📅 2026-10-19 ➕ 2026-10-01
 *   - [x] Send invoice #P3 ✅ 2026-10-12
 *
 * Tags become labels (without the '#'); the Normalizer reads priority,
 * energy and attention from them. Native ids are `<file>#<title hash>`,
 * with a `~n` suffix for repeated titles in the same file.
 */

import type { MarkCompleteOutcome, RawRecord } from './provider.js';
import { titleHash } from '../tasks/identity.js';

/** A parsed checkbox line. */
export interface MarkdownTask {
  /** Zero-based line index in the file. */
  line: number;
  nativeId: string;
  record: RawRecord;
}

export interface ParseOptions {
  /** Only read lines under this heading (case-insensitive). */
  section?: string;
  /** Creation date for lines that carry no ➕ marker. */
  defaultCreated?: string;
}

const CHECKBOX = /^(\s*[-*+]\s+\[)([ xX])(\]\s+)(.*)$/;
const HEADING = /^(#{1,6})\s+(.*?)\s*#*\s*$/;
const TAG = /(^|\s)#([\p{L}\p{N}_/-]+)/gu;
const MARKER = /(📅|➕|✅)\s*(\d{4}-\d{2}-\d{2})/gu;

/**
 * Line range [start, end) of the section under `heading`, or null when the
 * heading is absent. The section ends at the next heading of the same or a
 * higher level.
 */
export function sectionRange(lines: readonly string[], heading: string): [number, number] | null {
  const wanted = heading.trim().toLowerCase();
  let start = -1;
  let level = 0;

  for (let i = 0; i < lines.length; i++) {
    const m = HEADING.exec(lines[i] ?? '');
    if (!m) continue;
    const depth = m[1]?.length ?? 0;
    if (start === -1) {
      if ((m[2] ?? '').toLowerCase() === wanted) {
        start = i + 1;
        level = depth;
      }
    } else if (depth <= level) {
      return [start, i];
    }
  }
  return start === -1 ? null : [start, lines.length];
}

/** Parse the text after the checkbox into a raw record body. */
export function parseTaskText(text: string): Omit<RawRecord, 'nativeId' | 'completed'> {
  const labels: string[] = [];
  let due: string | null = null;
  let created: string | null = null;
  let done: string | null = null;

  for (const m of text.matchAll(MARKER)) {
    const [, marker, date] = m;
    if (marker === '📅') due = date ?? null;
    else if (marker === '➕') created = date ?? null;
    else done = date ?? null;
  }
  for (const m of text.matchAll(TAG)) {
    if (m[2]) labels.push(m[2]);
  }

  const title = text
    .replace(MARKER, ' ')
    .replace(TAG, ' ')
    .replace(/\s+/g, ' ')
    .trim();

  return { title, labels, due, created, modified: done };
}

function splitLines(content: string): string[] {
  return content.split('\n');
}

/**
 * Parse every checkbox line in `content`.
 *
 * @param file - Path recorded in native ids, relative to the vault
 */
export function parseTaskLines(content: string, file: string, options: ParseOptions = {}): MarkdownTask[] {
  const lines = splitLines(content);
  let range: [number, number] = [0, lines.length];
  if (options.section !== undefined) {
    const found = sectionRange(lines, options.section);
    if (!found) return [];
    range = found;
  }

  const seen = new Map<string, number>();
  const tasks: MarkdownTask[] = [];

  for (let i = range[0]; i < range[1]; i++) {
    const m = CHECKBOX.exec((lines[i] ?? '').replace(/\r$/, ''));
    if (!m) continue;

    const body = parseTaskText(m[4] ?? '');
    if (!body.title) continue;

    const base = `${file}#${titleHash(body.title)}`;
    const count = (seen.get(base) ?? 0) + 1;
    seen.set(base, count);

    tasks.push({
      line: i,
      nativeId: count === 1 ? base : `${base}~${count}`,
      record: {
        ...body,
        created: body.created ?? options.defaultCreated ?? null,
        completed: m[2] !== ' ',
      },
    });
  }
  return tasks;
}

/**
 * Tick the checkbox of `nativeId` and stamp it with `✅ <date>`.
 * Returns the new content, unchanged when the task is already ticked or
 * missing.
 */
export function completeTaskLine(
  content: string,
  file: string,
  nativeId: string,
  date: string,
  options: ParseOptions = {},
): { content: string; outcome: MarkCompleteOutcome } {
  const task = parseTaskLines(content, file, options).find((t) => t.nativeId === nativeId);
  if (!task) return { content, outcome: 'not_found' };
  if (task.record.completed) return { content, outcome: 'already_complete' };

  const lines = splitLines(content);
  const original = lines[task.line] ?? '';
  const eol = original.endsWith('\r') ? '\r' : '';
  const line = eol ? original.slice(0, -1) : original;

  const ticked = line.replace(CHECKBOX, (_all, open: string, _mark: string, close: string, rest: string) =>
    `${open}x${close}${rest.trimEnd()} ✅ ${date}`);
  lines[task.line] = ticked + eol;

  return { content: lines.join('\n'), outcome: 'success' };
}
