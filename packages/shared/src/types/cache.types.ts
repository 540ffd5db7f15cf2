import type { SearchResult } from './decision.types.js';

export interface CachedSearch {
  readonly key: string;
  readonly keywords: readonly string[];
  readonly maxResults: number;
  readonly result: SearchResult;
  readonly createdAt: Date;
  readonly ttlMs: number;
  readonly hitCount: number;
  readonly lastUsedAt: Date;
}

export interface NewCachedSearch {
  readonly keywords: readonly string[];
  readonly maxResults: number;
  readonly result: SearchResult;
}

export type CachePutOutcome = 'accepted' | 'rejected_capacity';

export interface SearchCacheStats {
  readonly entries: number;
  readonly activeEntries: number;
  readonly totalHits: number;
  readonly capacity: number;
}

export function isExpired(entry: Pick<CachedSearch, 'createdAt' | 'ttlMs'>, now: number): boolean {
  return now - entry.createdAt.getTime() > entry.ttlMs;
}
