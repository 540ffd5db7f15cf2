import { resolve } from 'node:path';
import { parseArgs } from 'node:util';
import { loadScraperConfig } from '@docket/schemas/src/config-loader.js';
import { createMockPageDriverFactory } from '@docket/core/src/driver/mock-page-driver.js';
import type { PageDriverFactory } from '@docket/core/src/driver/page-driver.js';
import { createPlaywrightDriverFactory } from '@docket/core/src/driver/playwright-page-driver.js';
import { createInMemorySearchCacheRepository } from '@docket/core/src/repositories/in-memory-search-cache.repository.js';
import { createRetryPolicy } from '@docket/core/src/retry/retry-policy.js';
import { createKeywordDispatcher } from '@docket/core/src/search/keyword-dispatcher.js';
import { createSearchSessionRunner } from '@docket/core/src/search/search-session.js';
import { createDecisionSearchService } from '@docket/core/src/search/search-service.js';
import type { SearchResult } from '@docket/shared/src/types/decision.types.js';

function renderResult(result: SearchResult): void {
  console.log(`\n${result.message} in ${result.processingTime.toFixed(1)}s`);

  console.log('\nPer keyword:');
  for (const [keyword, outcome] of Object.entries(result.searchDetails)) {
    const mark = outcome.success ? 'ok ' : 'ERR';
    console.log(`  [${mark}] ${keyword}: ${outcome.message}`);
  }

  for (const [index, record] of result.results.entries()) {
    console.log(`\n--- ${String(index + 1)}. ${record.chamber} ${record.caseNumber} / ${record.decisionNumber} ---`);
    console.log(`  Date: ${record.decisionDate}`);
    console.log(`  Keyword: ${record.matchedKeyword}`);
    console.log(`  ${record.decisionText.slice(0, 300)}${record.decisionText.length > 300 ? '...' : ''}`);
  }
}

async function main(): Promise<void> {
  const { values, positionals } = parseArgs({
    allowPositionals: true,
    options: {
      'max-results': { type: 'string', short: 'n' },
      config: { type: 'string', short: 'c' },
      fresh: { type: 'boolean', short: 'f' },
    },
  });

  if (positionals.length === 0) {
    console.log('Usage: run-search [-n maxResults] [-c config.json] [--fresh] <keyword> [keyword...]');
    process.exitCode = 1;
    return;
  }

  const configPath = values.config ?? resolve(process.cwd(), 'config/scraper.json');
  const config = await loadScraperConfig(configPath);
  const wsEndpoint = process.env['BROWSER_WS_ENDPOINT'];

  const driverFactory: PageDriverFactory = wsEndpoint
    ? createPlaywrightDriverFactory({ wsEndpoint, defaultTimeoutMs: config.search.waitTimeoutMs })
    : createMockPageDriverFactory({}, config.portal.selectors);

  console.log('=== Docket Search ===\n');
  console.log(`Config: ${configPath}`);
  console.log(`Driver: ${wsEndpoint ? `remote browser (${wsEndpoint})` : 'mock portal'}`);
  console.log(`Keywords: ${positionals.join(', ')}`);

  const runner = createSearchSessionRunner(
    { driverFactory, retryPolicy: createRetryPolicy({ ...config.retry, name: 'portal-load' }) },
    { portal: config.portal, limits: config.search },
  );
  const searchService = createDecisionSearchService({
    dispatcher: createKeywordDispatcher(runner, config.search),
    cache: createInMemorySearchCacheRepository(config.cache),
  });

  const maxResults = values['max-results'] === undefined ? undefined : Number(values['max-results']);
  const result = await searchService.search({
    keywords: positionals,
    maxResults,
    useCache: values.fresh !== true,
  });
  renderResult(result);
}

main().catch((error: unknown) => {
  console.error('Search failed:', error);
  process.exit(1);
});
