import type { Firestore } from '@google-cloud/firestore';
import { FieldValue, Timestamp } from '@google-cloud/firestore';
import type {
  CachedSearch,
  CachePutOutcome,
  NewCachedSearch,
  SearchCacheStats,
} from '@docket/shared/src/types/cache.types.js';
import { isExpired } from '@docket/shared/src/types/cache.types.js';
import type { SearchResult } from '@docket/shared/src/types/decision.types.js';
import { createChildLogger } from '@docket/shared/src/logger.js';
import { PersistenceError, toError } from '@docket/shared/src/utils/errors.js';
import type { SearchCacheRepository } from '../repositories/search-cache.repository.js';

const log = createChildLogger('cache:firestore');

const COLLECTION = 'search-cache';
const BATCH_LIMIT = 500;

export interface FirestoreSearchCacheOptions {
  readonly ttlMs: number;
  readonly capacity: number;
}

interface CacheDocument {
  keywords: string[];
  maxResults: number;
  result: SearchResult;
  createdAt: Timestamp;
  expiresAt: Timestamp;
  ttlMs: number;
  hitCount: number;
  lastUsedAt: Timestamp;
}

function fromDoc(key: string, data: CacheDocument): CachedSearch {
  return {
    key,
    keywords: data.keywords,
    maxResults: data.maxResults,
    result: data.result,
    createdAt: data.createdAt.toDate(),
    ttlMs: data.ttlMs,
    hitCount: data.hitCount,
    lastUsedAt: data.lastUsedAt.toDate(),
  };
}

async function persist<T>(operation: string, run: () => Promise<T>): Promise<T> {
  try {
    return await run();
  } catch (error) {
    const cause = toError(error);
    throw new PersistenceError(`Search cache ${operation} failed: ${cause.message}`, cause);
  }
}

export function createFirestoreSearchCacheRepository(
  db: Firestore,
  options: FirestoreSearchCacheOptions,
): SearchCacheRepository {
  const collectionRef = db.collection(COLLECTION);

  return {
    get(key: string): Promise<CachedSearch | null> {
      return persist('read', async () => {
        const docRef = collectionRef.doc(key);
        const doc = await docRef.get();
        if (!doc.exists) {
          return null;
        }

        const entry = fromDoc(doc.id, doc.data() as CacheDocument);
        const now = Timestamp.now();
        if (isExpired(entry, now.toMillis())) {
          log.debug({ key }, 'Cache entry expired');
          await docRef.delete();
          return null;
        }

        await docRef.update({ hitCount: FieldValue.increment(1), lastUsedAt: now });
        return { ...entry, hitCount: entry.hitCount + 1, lastUsedAt: now.toDate() };
      });
    },

    put(key: string, entry: NewCachedSearch): Promise<CachePutOutcome> {
      return persist('write', () =>
        db.runTransaction(async (tx): Promise<CachePutOutcome> => {
          const docRef = collectionRef.doc(key);
          const now = Timestamp.now();

          const existing = await tx.get(docRef);
          if (!existing.exists) {
            const live = await tx.get(collectionRef.where('expiresAt', '>', now));
            if (live.size >= options.capacity) {
              log.debug({ key, capacity: options.capacity }, 'Cache full, write rejected');
              return 'rejected_capacity';
            }
          }

          const docData: CacheDocument = {
            keywords: [...entry.keywords],
            maxResults: entry.maxResults,
            result: entry.result,
            createdAt: now,
            expiresAt: Timestamp.fromMillis(now.toMillis() + options.ttlMs),
            ttlMs: options.ttlMs,
            hitCount: 0,
            lastUsedAt: now,
          };
          tx.set(docRef, docData);
          return 'accepted';
        }),
      );
    },

    stats(): Promise<SearchCacheStats> {
      return persist('stats', async () => {
        const snapshot = await collectionRef.get();
        const now = Date.now();
        let activeEntries = 0;
        let totalHits = 0;
        for (const doc of snapshot.docs) {
          const entry = fromDoc(doc.id, doc.data() as CacheDocument);
          if (!isExpired(entry, now)) {
            activeEntries++;
          }
          totalHits += entry.hitCount;
        }
        return { entries: snapshot.size, activeEntries, totalHits, capacity: options.capacity };
      });
    },

    purgeExpired(): Promise<number> {
      return persist('purge', async () => {
        const snapshot = await collectionRef.where('expiresAt', '<=', Timestamp.now()).get();
        const refs = snapshot.docs.map((doc) => doc.ref);

        for (let offset = 0; offset < refs.length; offset += BATCH_LIMIT) {
          const batch = db.batch();
          for (const ref of refs.slice(offset, offset + BATCH_LIMIT)) {
            batch.delete(ref);
          }
          await batch.commit();
        }

        if (refs.length > 0) {
          log.info({ removed: refs.length }, 'Purged expired cache entries');
        }
        return refs.length;
      });
    },
  };
}
