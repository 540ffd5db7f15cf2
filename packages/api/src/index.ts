import { serve } from '@hono/node-server';
import { loadScraperConfig } from '@docket/schemas/src/config-loader.js';
import type { ScraperConfig } from '@docket/schemas/src/scraper-config.schema.js';
import { createMockPageDriverFactory } from '@docket/core/src/driver/mock-page-driver.js';
import type { PageDriverFactory } from '@docket/core/src/driver/page-driver.js';
import { createPlaywrightDriverFactory } from '@docket/core/src/driver/playwright-page-driver.js';
import { createFirestoreClient } from '@docket/core/src/infrastructure/firestore-client.js';
import { createFirestoreSearchCacheRepository } from '@docket/core/src/infrastructure/firestore-search-cache.repository.js';
import { createInMemorySearchCacheRepository } from '@docket/core/src/repositories/in-memory-search-cache.repository.js';
import type { SearchCacheRepository } from '@docket/core/src/repositories/search-cache.repository.js';
import { createRetryPolicy } from '@docket/core/src/retry/retry-policy.js';
import { createKeywordDispatcher } from '@docket/core/src/search/keyword-dispatcher.js';
import { createSearchSessionRunner } from '@docket/core/src/search/search-session.js';
import { createDecisionSearchService } from '@docket/core/src/search/search-service.js';
import { createChildLogger } from '@docket/shared/src/logger.js';
import { ConfigurationError } from '@docket/shared/src/utils/errors.js';
import { createApp } from './app.js';

const log = createChildLogger('api:main');

function createDriverFactory(config: ScraperConfig): PageDriverFactory {
  if (process.env['DOCKET_MOCK_DRIVER'] === 'true') {
    return createMockPageDriverFactory({}, config.portal.selectors);
  }

  const wsEndpoint = process.env['BROWSER_WS_ENDPOINT'];
  if (!wsEndpoint) {
    throw new ConfigurationError('BROWSER_WS_ENDPOINT is required unless DOCKET_MOCK_DRIVER=true');
  }
  return createPlaywrightDriverFactory({ wsEndpoint, defaultTimeoutMs: config.search.waitTimeoutMs });
}

function createSearchCache(config: ScraperConfig): SearchCacheRepository {
  const { backend, ttlMs, capacity } = config.cache;
  if (backend === 'firestore') {
    return createFirestoreSearchCacheRepository(createFirestoreClient(), { ttlMs, capacity });
  }
  return createInMemorySearchCacheRepository({ ttlMs, capacity });
}

async function main(): Promise<void> {
  const port = parseInt(process.env['PORT'] ?? '3000', 10);
  const config = await loadScraperConfig(process.env['DOCKET_CONFIG'] ?? 'config/scraper.json');

  const searchCache = createSearchCache(config);
  const runner = createSearchSessionRunner(
    {
      driverFactory: createDriverFactory(config),
      retryPolicy: createRetryPolicy({ ...config.retry, name: 'portal-load' }),
    },
    { portal: config.portal, limits: config.search },
  );
  const searchService = createDecisionSearchService({
    dispatcher: createKeywordDispatcher(runner, config.search),
    cache: searchCache,
  });

  const app = createApp({
    searchService,
    searchCache,
    cacheBackend: config.cache.backend,
    apiKey: process.env['DOCKET_API_KEY'] || undefined,
  });

  log.info(
    { port, cacheBackend: config.cache.backend, maxConcurrency: config.search.maxConcurrency },
    'Starting Docket API server',
  );

  serve({ fetch: app.fetch, port }, (info) => {
    log.info({ port: info.port }, 'Docket API server running');
  });
}

main().catch((error: unknown) => {
  log.error(
    { error: error instanceof Error ? error.message : String(error) },
    'Failed to start API server',
  );
  process.exit(1);
});
