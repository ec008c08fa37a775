/**
 * @fileoverview Query normalization and cache keys
 *
 * Normalization is the only canonicalization applied before hashing:
 * Unicode compatibility folding, trimming, whitespace collapsing and
 * lower-casing. Punctuation is left alone.
 */

import { createHash } from 'node:crypto';

export interface NormalizedQuery {
  normalized: string;
  /** Hex-encoded SHA-256 of `normalized` (64 characters) */
  hashKey: string;
}

export function normalizeQueryText(raw: string): string {
  return raw.normalize('NFKC').trim().replace(/\s+/g, ' ').toLowerCase();
}

export function computeQueryHash(normalized: string): string {
  return createHash('sha256').update(normalized, 'utf-8').digest('hex');
}

export function normalizeQuery(raw: string): NormalizedQuery {
  const normalized = normalizeQueryText(raw);
  return { normalized, hashKey: computeQueryHash(normalized) };
}
