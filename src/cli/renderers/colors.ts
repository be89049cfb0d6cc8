/**
 * Terminal color and symbol utilities for human-readable CLI output.
 *
 * Respects NO_COLOR (https://no-color.org) and FORCE_COLOR env vars, and
 * `output.showColor` from config. Falls back to plain ASCII when color is
 * not supported.
 */

import { formatLocalDate, parseTimestamp } from '../../core/dates.js';
import type { Priority } from '../../types/task.js';

let configuredColor = true;

/** Apply `output.showColor`. Environment variables still take precedence. */
export function configureColors(showColor: boolean): void {
  configuredColor = showColor;
}

/** Whether ANSI color escape codes should be used. */
export function colorsEnabled(): boolean {
  if (process.env['NO_COLOR'] !== undefined) return false;
  if (process.env['FORCE_COLOR'] !== undefined) return true;
  return configuredColor && process.stdout.isTTY === true;
}

/** Whether Unicode box-drawing and emoji are supported. */
const unicodeEnabled: boolean = (() => {
  const lang = process.env['LANG'] ?? '';
  if (lang === 'C' || lang === 'POSIX') return false;
  return lang.includes('UTF') || process.platform === 'darwin';
})();

// ---------------------------------------------------------------------------
// ANSI escape helpers
// ---------------------------------------------------------------------------

export interface Palette {
  BOLD: string;
  DIM: string;
  NC: string;
  RED: string;
  GREEN: string;
  YELLOW: string;
  BLUE: string;
  CYAN: string;
}

const ANSI: Palette = {
  BOLD: '\x1b[1m',
  DIM: '\x1b[2m',
  NC: '\x1b[0m',
  RED: '\x1b[0;31m',
  GREEN: '\x1b[0;32m',
  YELLOW: '\x1b[1;33m',
  BLUE: '\x1b[0;34m',
  CYAN: '\x1b[0;36m',
};

const PLAIN: Palette = {
  BOLD: '', DIM: '', NC: '', RED: '', GREEN: '', YELLOW: '', BLUE: '', CYAN: '',
};

/** Escape codes for the current terminal, or empty strings. */
export function palette(): Palette {
  return colorsEnabled() ? ANSI : PLAIN;
}

// ---------------------------------------------------------------------------
// Priority and completion symbols
// ---------------------------------------------------------------------------

/** Map task priority to a display symbol. */
export function prioritySymbol(priority: Priority): string {
  if (unicodeEnabled) {
    switch (priority) {
      case 'P1': return '🔴';  // red circle emoji
      case 'P2': return '🟡';  // yellow circle emoji
      case 'P3': return '🔵';  // blue circle emoji
      case 'P4': return '⚪';        // white circle emoji
    }
  }
  switch (priority) {
    case 'P1': return '!';
    case 'P2': return 'H';
    case 'P3': return 'M';
    case 'P4': return 'L';
  }
}

/** Map task priority to a color escape. */
export function priorityColor(priority: Priority): string {
  const p = palette();
  switch (priority) {
    case 'P1': return p.RED;
    case 'P2': return p.YELLOW;
    case 'P3': return p.BLUE;
    case 'P4': return p.DIM;
  }
}

/** Checkbox for a task's completion state. */
export function doneSymbol(completed: boolean): string {
  if (unicodeEnabled) return completed ? '✓' : '○';
  return completed ? 'x' : 'o';
}

// ---------------------------------------------------------------------------
// Box drawing
// ---------------------------------------------------------------------------

export const BOX = unicodeEnabled
  ? { tl: '╭', tr: '╮', bl: '╰', br: '╯', h: '─', v: '│', ml: '├', mr: '┤' }
  : { tl: '+', tr: '+', bl: '+', br: '+', h: '-', v: '|', ml: '+', mr: '+' };

/** Create a horizontal rule with box-drawing characters. */
export function hRule(width: number = 65): string {
  return BOX.h.repeat(width);
}

/** Format an ISO timestamp as local YYYY-MM-DD. */
export function shortDate(isoDate: string | null | undefined): string {
  const date = parseTimestamp(isoDate);
  return date ? formatLocalDate(date) : '';
}
