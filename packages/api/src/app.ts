import type { OpenAPIHono } from '@hono/zod-openapi';
import { cors } from 'hono/cors';
import type { SearchCacheRepository } from '@docket/core/src/repositories/search-cache.repository.js';
import type { DecisionSearchService } from '@docket/core/src/search/search-service.js';
import { createChildLogger } from '@docket/shared/src/logger.js';
import { createRouter, type AppEnv } from './types.js';
import { requestId } from './middleware/request-id.js';
import { errorHandler } from './middleware/error-handler.js';
import { createApiKeyMiddleware } from './middleware/api-key.js';
import type { CacheConfig } from '@docket/schemas/src/scraper-config.schema.js';
import { API_VERSION, createHealthRoutes } from './routes/health.js';
import { createSearchRoutes } from './routes/search.js';
import { createCacheRoutes } from './routes/cache.js';

const log = createChildLogger('api:server');

export interface AppConfig {
  readonly searchService: DecisionSearchService;
  readonly searchCache: SearchCacheRepository;
  readonly cacheBackend: CacheConfig['backend'];
  /** When set, every route except health and the OpenAPI document requires it in `X-API-Key`. */
  readonly apiKey?: string;
}

export function createApp(config: AppConfig): OpenAPIHono<AppEnv> {
  const app = createRouter();

  app.use('*', cors());
  app.use('*', requestId);

  // Request logging
  app.use('*', async (c, next) => {
    const start = Date.now();
    await next();
    const duration = Date.now() - start;
    log.info(
      {
        method: c.req.method,
        path: c.req.path,
        status: c.res.status,
        duration,
        requestId: c.get('requestId'),
      },
      'Request completed',
    );
  });

  app.onError(errorHandler);

  // Open routes
  app.route('/health', createHealthRoutes(config.cacheBackend));

  app.get('/openapi.json', (c) => {
    const spec = app.getOpenAPI31Document({
      openapi: '3.1.0',
      info: {
        title: 'Docket API',
        version: API_VERSION,
        description: 'Keyword search over court decisions with a result cache',
      },
      security: config.apiKey ? [{ ApiKey: [] }] : [],
    });
    spec.components = {
      ...spec.components,
      securitySchemes: {
        ApiKey: {
          type: 'apiKey',
          in: 'header',
          name: 'X-API-Key',
        },
      },
    };
    return c.json(spec);
  });

  // Everything below requires the API key when one is configured
  app.use('*', createApiKeyMiddleware(config.apiKey));

  app.route('/search', createSearchRoutes(config.searchService));
  app.route('/cache', createCacheRoutes(config.searchCache));

  return app;
}
