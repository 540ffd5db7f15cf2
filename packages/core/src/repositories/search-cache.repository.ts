import type {
  CachedSearch,
  CachePutOutcome,
  NewCachedSearch,
  SearchCacheStats,
} from '@docket/shared/src/types/cache.types.js';

export interface SearchCacheRepository {
  /** Live entry for `key`, counting the hit. Expired entries read as a miss and are removed. */
  get(key: string): Promise<CachedSearch | null>;
  /** Overwrites an existing key; a new key is refused while the store is full of live entries. */
  put(key: string, entry: NewCachedSearch): Promise<CachePutOutcome>;
  stats(): Promise<SearchCacheStats>;
  /** Deletes expired entries and returns how many were removed. */
  purgeExpired(): Promise<number>;
}
