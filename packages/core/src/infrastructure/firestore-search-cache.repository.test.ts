import { describe, it, expect, vi, afterEach } from 'vitest';
import type { Firestore } from '@google-cloud/firestore';
import { FieldValue, Timestamp } from '@google-cloud/firestore';
import type { SearchResult } from '@docket/shared/src/types/decision.types.js';
import { PersistenceError } from '@docket/shared/src/utils/errors.js';
import { createFirestoreSearchCacheRepository } from './firestore-search-cache.repository.js';

type Data = Record<string, unknown>;

/** In-process stand-in for the slice of the Firestore API the repository uses. */
class FakeDocRef {
  constructor(
    private readonly store: Map<string, Data>,
    readonly id: string,
  ) {}

  snapshot(): { id: string; exists: boolean; ref: FakeDocRef; data: () => Data | undefined } {
    const data = this.store.get(this.id);
    return { id: this.id, exists: data !== undefined, ref: this, data: () => data };
  }

  get(): Promise<ReturnType<FakeDocRef['snapshot']>> {
    return Promise.resolve(this.snapshot());
  }

  set(data: Data): Promise<void> {
    this.store.set(this.id, { ...data });
    return Promise.resolve();
  }

  update(changes: Data): Promise<void> {
    const current = this.store.get(this.id) ?? {};
    const next: Data = { ...current };
    for (const [field, value] of Object.entries(changes)) {
      if (value instanceof FieldValue && value.isEqual(FieldValue.increment(1))) {
        const previous = current[field];
        next[field] = (typeof previous === 'number' ? previous : 0) + 1;
      } else {
        next[field] = value;
      }
    }
    this.store.set(this.id, next);
    return Promise.resolve();
  }

  delete(): Promise<void> {
    this.store.delete(this.id);
    return Promise.resolve();
  }
}

class FakeQuery {
  constructor(
    private readonly store: Map<string, Data>,
    private readonly field: string,
    private readonly op: '>' | '<=',
    private readonly value: Timestamp,
  ) {}

  snapshot(): { size: number; docs: ReturnType<FakeDocRef['snapshot']>[] } {
    const docs = [...this.store.entries()]
      .filter(([, data]) => {
        const fieldValue = data[this.field];
        if (!(fieldValue instanceof Timestamp)) {
          return false;
        }
        return this.op === '>'
          ? fieldValue.toMillis() > this.value.toMillis()
          : fieldValue.toMillis() <= this.value.toMillis();
      })
      .map(([id]) => new FakeDocRef(this.store, id).snapshot());
    return { size: docs.length, docs };
  }

  get(): Promise<ReturnType<FakeQuery['snapshot']>> {
    return Promise.resolve(this.snapshot());
  }
}

class FakeCollection {
  constructor(private readonly store: Map<string, Data>) {}

  doc(id: string): FakeDocRef {
    return new FakeDocRef(this.store, id);
  }

  where(field: string, op: '>' | '<=', value: Timestamp): FakeQuery {
    return new FakeQuery(this.store, field, op, value);
  }

  get(): Promise<{ size: number; docs: ReturnType<FakeDocRef['snapshot']>[] }> {
    const docs = [...this.store.keys()].map((id) => this.doc(id).snapshot());
    return Promise.resolve({ size: docs.length, docs });
  }
}

function createFakeFirestore() {
  const store = new Map<string, Data>();
  const collection = new FakeCollection(store);
  const batchCommits: number[] = [];

  const db = {
    collection: (_name: string) => collection,
    runTransaction: async <T>(
      update: (tx: {
        get: (target: FakeDocRef | FakeQuery) => Promise<unknown>;
        set: (ref: FakeDocRef, data: Data) => void;
      }) => Promise<T>,
    ): Promise<T> => {
      const writes: Array<[FakeDocRef, Data]> = [];
      const result = await update({
        get: (target) => Promise.resolve(target.snapshot()),
        set: (ref, data) => {
          writes.push([ref, data]);
        },
      });
      for (const [ref, data] of writes) {
        await ref.set(data);
      }
      return result;
    },
    batch: () => {
      const deletes: FakeDocRef[] = [];
      return {
        delete: (ref: FakeDocRef) => {
          deletes.push(ref);
        },
        commit: async () => {
          batchCommits.push(deletes.length);
          for (const ref of deletes) {
            await ref.delete();
          }
        },
      };
    },
  };

  return { db: db as unknown as Firestore, store, batchCommits };
}

function searchResult(uniqueResults: number): SearchResult {
  return {
    results: [],
    success: true,
    message: `Processed 1 keywords, found ${String(uniqueResults)} unique results`,
    searchDetails: { kira: { success: true, count: uniqueResults, message: 'stored' } },
    processingTime: 3.2,
    totalKeywords: 1,
    uniqueResults,
  };
}

describe('FirestoreSearchCacheRepository', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should return null for cache miss', async () => {
    const { db } = createFakeFirestore();
    const repo = createFirestoreSearchCacheRepository(db, { ttlMs: 60_000, capacity: 10 });

    expect(await repo.get('missing')).toBeNull();
  });

  it('should store an entry and count hits', async () => {
    const { db, store } = createFakeFirestore();
    const repo = createFirestoreSearchCacheRepository(db, { ttlMs: 60_000, capacity: 10 });

    expect(await repo.put('k1', { keywords: ['kira'], maxResults: 5, result: searchResult(2) })).toBe(
      'accepted',
    );
    const cached = await repo.get('k1');

    expect(cached?.keywords).toEqual(['kira']);
    expect(cached?.result.uniqueResults).toBe(2);
    expect(cached?.hitCount).toBe(1);
    expect(store.get('k1')?.['hitCount']).toBe(1);
  });

  it('should delete an expired entry on read', async () => {
    const { db, store } = createFakeFirestore();
    const repo = createFirestoreSearchCacheRepository(db, { ttlMs: 1000, capacity: 10 });
    const now = Date.now();
    await repo.put('k1', { keywords: ['kira'], maxResults: 5, result: searchResult(1) });

    vi.spyOn(Date, 'now').mockReturnValue(now + 5000);

    expect(await repo.get('k1')).toBeNull();
    expect(store.has('k1')).toBe(false);
  });

  it('should reject a new key when the live entries fill the capacity', async () => {
    const { db } = createFakeFirestore();
    const repo = createFirestoreSearchCacheRepository(db, { ttlMs: 60_000, capacity: 1 });
    const entry = { keywords: ['kira'], maxResults: 5, result: searchResult(1) };

    expect(await repo.put('k1', entry)).toBe('accepted');
    expect(await repo.put('k2', entry)).toBe('rejected_capacity');
    expect(await repo.put('k1', { ...entry, result: searchResult(4) })).toBe('accepted');
    expect((await repo.get('k1'))?.result.uniqueResults).toBe(4);
  });

  it('should purge expired entries in batches and report stats', async () => {
    const { db, batchCommits } = createFakeFirestore();
    const repo = createFirestoreSearchCacheRepository(db, { ttlMs: 1000, capacity: 10 });
    const entry = { keywords: ['kira'], maxResults: 5, result: searchResult(1) };
    const now = Date.now();
    await repo.put('k1', entry);
    await repo.put('k2', entry);

    vi.spyOn(Date, 'now').mockReturnValue(now + 5000);

    expect(await repo.stats()).toEqual({ entries: 2, activeEntries: 0, totalHits: 0, capacity: 10 });
    expect(await repo.purgeExpired()).toBe(2);
    expect(batchCommits).toEqual([2]);
    expect((await repo.stats()).entries).toBe(0);
  });

  it('should wrap store failures in a PersistenceError', async () => {
    const failing = {
      collection: () => ({
        doc: () => ({ get: () => Promise.reject(new Error('unavailable')) }),
      }),
    };
    const repo = createFirestoreSearchCacheRepository(failing as unknown as Firestore, {
      ttlMs: 1000,
      capacity: 10,
    });

    await expect(repo.get('k1')).rejects.toBeInstanceOf(PersistenceError);
    await expect(repo.get('k1')).rejects.toThrow('Search cache read failed: unavailable');
  });
});
