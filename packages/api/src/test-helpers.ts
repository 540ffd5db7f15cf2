import type { OpenAPIHono } from '@hono/zod-openapi';
import { defaultScraperConfig } from '@docket/schemas/src/scraper-config.schema.js';
import { createMockPageDriverFactory } from '@docket/core/src/driver/mock-page-driver.js';
import type { MockPageDriverFactory, MockPortal } from '@docket/core/src/driver/mock-page-driver.js';
import { createInMemorySearchCacheRepository } from '@docket/core/src/repositories/in-memory-search-cache.repository.js';
import type { SearchCacheRepository } from '@docket/core/src/repositories/search-cache.repository.js';
import { createRetryPolicy } from '@docket/core/src/retry/retry-policy.js';
import { createKeywordDispatcher } from '@docket/core/src/search/keyword-dispatcher.js';
import { createSearchSessionRunner } from '@docket/core/src/search/search-session.js';
import { createDecisionSearchService } from '@docket/core/src/search/search-service.js';
import { createApp } from './app.js';
import type { AppEnv } from './types.js';

export interface TestAppOptions {
  readonly portal?: MockPortal;
  readonly searchCache?: SearchCacheRepository;
  readonly apiKey?: string;
}

export interface TestApp {
  readonly app: OpenAPIHono<AppEnv>;
  readonly driverFactory: MockPageDriverFactory;
  readonly searchCache: SearchCacheRepository;
}

/**
 * Builds the real app over the mock portal driver and an in-memory cache.
 * For use in unit tests only.
 */
export function createTestApp(options: TestAppOptions = {}): TestApp {
  const config = defaultScraperConfig();
  const limits = { ...config.search, waitTimeoutMs: 50 };
  const driverFactory = createMockPageDriverFactory(options.portal);
  const searchCache = options.searchCache ?? createInMemorySearchCacheRepository();

  const runner = createSearchSessionRunner(
    { driverFactory, retryPolicy: createRetryPolicy({ attempts: 1, delayMs: 0 }) },
    { portal: config.portal, limits },
  );
  const searchService = createDecisionSearchService({
    dispatcher: createKeywordDispatcher(runner, limits),
    cache: searchCache,
  });

  const app = createApp({
    searchService,
    searchCache,
    cacheBackend: 'memory',
    apiKey: options.apiKey,
  });

  return { app, driverFactory, searchCache };
}

export function jsonPost(body: unknown, headers: Record<string, string> = {}): RequestInit {
  return {
    method: 'POST',
    headers: { 'Content-Type': 'application/json', ...headers },
    body: JSON.stringify(body),
  };
}
