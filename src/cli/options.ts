/**
 * Commander argument parsers shared by the commands.
 */

import { InvalidArgumentError } from 'commander';
import { isLevel, isPriority, type Level, type Priority } from '../types/task.js';

/** Parse a whole number >= 1. */
export function parsePositiveInt(value: string): number {
  const n = Number(value);
  if (!/^\d+$/.test(value.trim()) || !Number.isSafeInteger(n) || n < 1) {
    throw new InvalidArgumentError('Expected a positive whole number.');
  }
  return n;
}

/** Parse low | medium | high. */
export function parseLevel(value: string): Level {
  const level = value.trim().toLowerCase();
  if (!isLevel(level)) {
    throw new InvalidArgumentError('Expected low, medium or high.');
  }
  return level;
}

/** Parse P1..P4 (case-insensitive). */
export function parsePriority(value: string): Priority {
  const priority = value.trim().toUpperCase();
  if (!isPriority(priority)) {
    throw new InvalidArgumentError('Expected P1, P2, P3 or P4.');
  }
  return priority;
}
