import type {
  CachedSearch,
  CachePutOutcome,
  NewCachedSearch,
  SearchCacheStats,
} from '@docket/shared/src/types/cache.types.js';
import { isExpired } from '@docket/shared/src/types/cache.types.js';
import { createChildLogger } from '@docket/shared/src/logger.js';
import type { SearchCacheRepository } from './search-cache.repository.js';

const log = createChildLogger('cache:memory');

const DEFAULT_TTL_MS = 24 * 60 * 60 * 1000; // 24 hours
const DEFAULT_CAPACITY = 100;

export interface InMemorySearchCacheOptions {
  readonly ttlMs?: number;
  readonly capacity?: number;
}

export function createInMemorySearchCacheRepository(
  options: InMemorySearchCacheOptions = {},
): SearchCacheRepository {
  const ttlMs = options.ttlMs ?? DEFAULT_TTL_MS;
  const capacity = options.capacity ?? DEFAULT_CAPACITY;
  const cache = new Map<string, CachedSearch>();

  function sweep(now: number): number {
    let removed = 0;
    for (const [key, entry] of cache) {
      if (isExpired(entry, now)) {
        cache.delete(key);
        removed++;
      }
    }
    return removed;
  }

  return {
    get(key: string): Promise<CachedSearch | null> {
      const entry = cache.get(key);
      if (!entry) {
        return Promise.resolve(null);
      }

      const now = Date.now();
      if (isExpired(entry, now)) {
        cache.delete(key);
        log.debug({ key }, 'Cache entry expired');
        return Promise.resolve(null);
      }

      const hit: CachedSearch = { ...entry, hitCount: entry.hitCount + 1, lastUsedAt: new Date(now) };
      cache.set(key, hit);
      return Promise.resolve(hit);
    },

    put(key: string, entry: NewCachedSearch): Promise<CachePutOutcome> {
      const now = Date.now();
      if (!cache.has(key) && cache.size >= capacity && sweep(now) === 0) {
        log.debug({ key, capacity }, 'Cache full, write rejected');
        return Promise.resolve('rejected_capacity');
      }

      cache.set(key, {
        key,
        keywords: [...entry.keywords],
        maxResults: entry.maxResults,
        result: entry.result,
        createdAt: new Date(now),
        ttlMs,
        hitCount: 0,
        lastUsedAt: new Date(now),
      });
      return Promise.resolve('accepted');
    },

    stats(): Promise<SearchCacheStats> {
      const now = Date.now();
      let activeEntries = 0;
      let totalHits = 0;
      for (const entry of cache.values()) {
        if (!isExpired(entry, now)) {
          activeEntries++;
        }
        totalHits += entry.hitCount;
      }
      return Promise.resolve({ entries: cache.size, activeEntries, totalHits, capacity });
    },

    purgeExpired(): Promise<number> {
      const removed = sweep(Date.now());
      if (removed > 0) {
        log.info({ removed }, 'Purged expired cache entries');
      }
      return Promise.resolve(removed);
    },
  };
}
