import { createHash } from 'node:crypto';

export function canonicalKeywords(keywords: readonly string[]): string[] {
  const trimmed = keywords.map((keyword) => keyword.trim()).filter((keyword) => keyword.length > 0);
  return [...new Set(trimmed)].sort();
}

/** Order-independent key for a keyword set: SHA-256 hex of the sorted, de-duplicated keywords. */
export function createCacheKey(keywords: readonly string[]): string {
  return createHash('sha256').update(JSON.stringify(canonicalKeywords(keywords))).digest('hex');
}
