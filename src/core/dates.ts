/**
 * Date helpers shared by the normalizer, scorer and providers.
 *
 * All engine timestamps are ISO strings produced by Date#toISOString(), so
 * they compare correctly as strings. Calendar-day arithmetic uses local time.
 */

export const DAY_MS = 24 * 60 * 60 * 1000;

const DATE_ONLY = /^(\d{4})-(\d{2})-(\d{2})$/;

/**
 * Parse a timestamp into a Date.
 * Date-only strings (YYYY-MM-DD) are read as local midnight, not UTC.
 * Returns null for missing or unparsable input.
 */
export function parseTimestamp(value: string | Date | null | undefined): Date | null {
  if (value === null || value === undefined) return null;
  if (value instanceof Date) return Number.isNaN(value.getTime()) ? null : value;

  const trimmed = value.trim();
  if (!trimmed) return null;

  const m = DATE_ONLY.exec(trimmed);
  if (m) {
    const d = new Date(Number(m[1]), Number(m[2]) - 1, Number(m[3]));
    return Number.isNaN(d.getTime()) ? null : d;
  }

  const d = new Date(trimmed);
  return Number.isNaN(d.getTime()) ? null : d;
}

/** Parse and re-serialize as ISO, or null. */
export function toIso(value: string | Date | null | undefined): string | null {
  return parseTimestamp(value)?.toISOString() ?? null;
}

/** Local midnight of the given instant. */
export function startOfLocalDay(date: Date): Date {
  return new Date(date.getFullYear(), date.getMonth(), date.getDate());
}

/**
 * Whole calendar days from `from` to `to` in local time.
 * Negative when `to` is on an earlier day.
 */
export function calendarDaysBetween(from: Date, to: Date): number {
  const diff = startOfLocalDay(to).getTime() - startOfLocalDay(from).getTime();
  // DST days are 23 or 25 hours long
  return Math.round(diff / DAY_MS);
}

/** Format a Date as local YYYY-MM-DD. */
export function formatLocalDate(date: Date): string {
  const y = String(date.getFullYear()).padStart(4, '0');
  const m = String(date.getMonth() + 1).padStart(2, '0');
  const d = String(date.getDate()).padStart(2, '0');
  return `${y}-${m}-${d}`;
}
