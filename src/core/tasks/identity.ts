/**
 * Task identity: matching keys, title similarity and stable id derivation.
 */

import { createHash } from 'node:crypto';

/**
 * Build the matching key for a title.
 * Lower-cased, punctuation stripped, whitespace collapsed.
 */
export function normalizedKey(title: string): string {
  return title
    .toLowerCase()
    .replace(/[^\p{L}\p{N}\s]/gu, '')
    .replace(/\s+/g, ' ')
    .trim();
}

/** Distinct tokens of a matching key. */
export function tokenSet(key: string): Set<string> {
  return new Set(key.split(' ').filter(Boolean));
}

/**
 * Token-set overlap ratio (Jaccard index) between two matching keys.
 * Equal keys score 1; two empty keys score 0.
 */
export function tokenSimilarity(a: string, b: string): number {
  if (a === b) return a ? 1 : 0;
  const ta = tokenSet(a);
  const tb = tokenSet(b);
  if (ta.size === 0 || tb.size === 0) return 0;

  let shared = 0;
  for (const t of ta) {
    if (tb.has(t)) shared++;
  }
  return shared / (ta.size + tb.size - shared);
}

/**
 * Derive a unified task id from its matching key and earliest creation time.
 * Native ids are never used: one task may live in several systems.
 */
export function deriveTaskId(key: string, createdAt: string): string {
  const hash = createHash('sha256').update(`${key}|${createdAt}`).digest('hex');
  return `t${hash.substring(0, 12)}`;
}

/** Short hash of a title, used for providers without native ids. */
export function titleHash(title: string): string {
  return createHash('sha1').update(title.trim()).digest('hex').substring(0, 10);
}
