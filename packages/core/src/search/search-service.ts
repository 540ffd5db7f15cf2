import type { SearchRequestInput, ValidSearchRequest } from '@docket/schemas/src/search-request.schema.js';
import { validateSearchRequest } from '@docket/schemas/src/validators.js';
import type { CachedSearch } from '@docket/shared/src/types/cache.types.js';
import type { SearchResult } from '@docket/shared/src/types/decision.types.js';
import { createChildLogger } from '@docket/shared/src/logger.js';
import { toError } from '@docket/shared/src/utils/errors.js';
import type { SearchCacheRepository } from '../repositories/search-cache.repository.js';
import { createCacheKey } from './cache-key.js';
import type { KeywordDispatcher } from './keyword-dispatcher.js';
import { raceAbort } from './abort.js';
import { aggregateResults } from './result-aggregator.js';

const log = createChildLogger('search:service');

export interface DecisionSearchServiceDeps {
  readonly dispatcher: KeywordDispatcher;
  readonly cache: SearchCacheRepository;
}

export interface SearchCallOptions {
  /**
   * Ends this caller's wait. A search shared by identical concurrent requests
   * is cancelled only once every caller has aborted.
   */
  readonly signal?: AbortSignal;
}

export interface DecisionSearchService {
  /**
   * Validates the request, then serves it from the cache or by scraping.
   * Rejects on invalid requests, and with a SessionAbortedError when the
   * caller's signal aborts first.
   */
  search(request: SearchRequestInput, options?: SearchCallOptions): Promise<SearchResult>;
}

interface Flight {
  readonly promise: Promise<SearchResult>;
  readonly controller: AbortController;
  /** Callers still waiting; a caller without a signal never leaves. */
  waiting: number;
}

export function createDecisionSearchService(deps: DecisionSearchServiceDeps): DecisionSearchService {
  const inFlight = new Map<string, Flight>();

  /** Later identical requests start a new search instead of joining a cancelled one. */
  function forget(flightKey: string, controller: AbortController): void {
    if (inFlight.get(flightKey)?.controller === controller) {
      inFlight.delete(flightKey);
    }
  }

  function join(flightKey: string, flight: Flight, signal: AbortSignal | undefined): Promise<SearchResult> {
    flight.waiting += 1;
    if (!signal) {
      return flight.promise;
    }

    const leave = (): void => {
      flight.waiting -= 1;
      if (flight.waiting === 0) {
        log.info({ flightKey }, 'Every caller left, cancelling search');
        forget(flightKey, flight.controller);
        flight.controller.abort(signal.reason);
      }
    };
    if (signal.aborted) {
      leave();
    } else {
      signal.addEventListener('abort', leave, { once: true });
      void flight.promise
        .finally(() => {
          signal.removeEventListener('abort', leave);
        })
        .catch((error: unknown) => {
          log.debug({ flightKey, error: toError(error).message }, 'Shared search failed');
        });
    }
    return raceAbort(flight.promise, signal);
  }

  async function readCache(key: string): Promise<CachedSearch | null> {
    try {
      return await deps.cache.get(key);
    } catch (error) {
      log.warn({ key, error: toError(error).message }, 'Cache read failed, searching instead');
      return null;
    }
  }

  async function writeCache(key: string, request: ValidSearchRequest, result: SearchResult): Promise<void> {
    try {
      const outcome = await deps.cache.put(key, {
        keywords: request.keywords,
        maxResults: request.maxResults,
        result,
      });
      if (outcome === 'rejected_capacity') {
        log.debug({ key }, 'Search cache is full, result not stored');
      }
    } catch (error) {
      log.warn({ key, error: toError(error).message }, 'Cache write failed');
    }
  }

  async function execute(
    key: string,
    request: ValidSearchRequest,
    signal: AbortSignal,
  ): Promise<SearchResult> {
    const cached = request.useCache ? await readCache(key) : null;
    if (cached && cached.maxResults === request.maxResults) {
      log.info({ key, hitCount: cached.hitCount }, 'Serving search from cache');
      return { ...cached.result, processingTime: 0 };
    }

    const report = await deps.dispatcher.dispatch(request.keywords, {
      maxResults: request.maxResults,
      signal,
    });
    const result = aggregateResults(report, request.keywords);

    if (report.sessions.every((session) => session.outcome.success)) {
      await writeCache(key, request, result);
    } else {
      log.info({ key }, 'Not caching search with failed keywords');
    }

    log.info(
      {
        keywords: result.totalKeywords,
        uniqueResults: result.uniqueResults,
        processingTime: result.processingTime,
      },
      'Search completed',
    );
    return result;
  }

  return {
    async search(input: SearchRequestInput, options: SearchCallOptions = {}): Promise<SearchResult> {
      const request = validateSearchRequest(input);
      const key = createCacheKey(request.keywords);
      const flightKey = `${key}:${String(request.maxResults)}${request.useCache ? '' : ':fresh'}`;

      const pending = inFlight.get(flightKey);
      if (pending) {
        log.debug({ key }, 'Joining in-flight search');
        return join(flightKey, pending, options.signal);
      }

      const controller = new AbortController();
      const flight: Flight = {
        promise: execute(key, request, controller.signal).finally(() => {
          forget(flightKey, controller);
        }),
        controller,
        waiting: 0,
      };
      inFlight.set(flightKey, flight);
      return join(flightKey, flight, options.signal);
    },
  };
}
