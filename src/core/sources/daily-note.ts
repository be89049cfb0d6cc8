/**
 * Daily-note provider: action items in today's daily note.
 *
 * Reads only today's note, but completes an item in whichever note its
 * native id names, as long as that note lies under the daily-notes
 * directory.
 */

import { isAbsolute, join, normalize, relative, sep } from 'node:path';
import { formatLocalDate } from '../dates.js';
import { MarkdownFileProvider } from './vault.js';
import type { ParseOptions } from './markdown-tasks.js';

/**
 * Render a daily-note file name from a YYYY / MM / DD pattern.
 * Other characters pass through.
 */
export function formatNoteName(format: string, date: Date): string {
  const [y = '', m = '', d = ''] = formatLocalDate(date).split('-');
  return format.replace(/YYYY/g, y).replace(/MM/g, m).replace(/DD/g, d);
}

/** Vault-relative path of the daily note for `date`. */
export function dailyNoteFile(directory: string, format: string, date: Date): string {
  const name = `${formatNoteName(format, date)}.md`;
  return directory ? join(directory, name) : name;
}

export interface DailyNoteProviderOptions {
  vaultPath: string;
  directory: string;
  format: string;
  section: string;
  now?: () => Date;
}

export class DailyNoteProvider extends MarkdownFileProvider {
  readonly name = 'daily-note';
  private readonly directory: string;
  private readonly format: string;
  private readonly section: string;

  constructor(options: DailyNoteProviderOptions) {
    super(options);
    this.directory = options.directory;
    this.format = options.format;
    this.section = options.section;
  }

  protected relativeFile(): string {
    return dailyNoteFile(this.directory, this.format, this.now());
  }

  protected fileFor(nativeId: string): string | null {
    const cut = nativeId.lastIndexOf('#');
    if (cut <= 0) return null;
    const file = normalize(nativeId.slice(0, cut));
    if (isAbsolute(file) || !file.endsWith('.md')) return null;
    const inside = relative(this.directory || '.', file);
    const outside = inside === '..' || inside.startsWith(`..${sep}`) || isAbsolute(inside);
    return outside ? null : file;
  }

  protected parseOptions(): ParseOptions {
    // an action item was captured no later than the day of its note
    return { section: this.section, defaultCreated: formatLocalDate(this.now()) };
  }
}
