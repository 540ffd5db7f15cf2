import { createApp } from '../packages/api/src/app.js';
import { API_VERSION } from '../packages/api/src/routes/health.js';
import { createInMemorySearchCacheRepository } from '../packages/core/src/repositories/in-memory-search-cache.repository.js';
import type { DecisionSearchService } from '../packages/core/src/search/search-service.js';

const unavailable: DecisionSearchService = {
  search: () => Promise.reject(new Error('Search is not available while generating the OpenAPI document')),
};

const app = createApp({
  searchService: unavailable,
  searchCache: createInMemorySearchCacheRepository(),
  cacheBackend: 'memory',
});

const doc = app.getOpenAPI31Document({
  openapi: '3.1.0',
  info: {
    title: 'Docket API',
    version: API_VERSION,
    description: 'Keyword search over court decisions with a result cache',
  },
  servers: [
    { url: 'http://localhost:3000', description: 'Local development' },
  ],
  security: [{ ApiKey: [] }],
});

doc.components = {
  ...doc.components,
  securitySchemes: {
    ApiKey: {
      type: 'apiKey',
      in: 'header',
      name: 'X-API-Key',
    },
  },
};

process.stdout.write(JSON.stringify(doc, null, 2));
process.stdout.write('\n');
