import { createRoute } from '@hono/zod-openapi';
import type { OpenAPIHono } from '@hono/zod-openapi';
import type { SearchCacheRepository } from '@docket/core/src/repositories/search-cache.repository.js';
import { createRouter, type AppEnv } from '../types.js';
import { CachePurgeResponseSchema, CacheStatsResponseSchema } from '../schemas/responses.js';

const statsRoute = createRoute({
  method: 'get',
  path: '/stats',
  tags: ['Cache'],
  summary: 'Search cache usage',
  responses: {
    200: {
      description: 'Entry counts and hits',
      content: {
        'application/json': {
          schema: CacheStatsResponseSchema,
        },
      },
    },
  },
});

const purgeRoute = createRoute({
  method: 'post',
  path: '/purge',
  tags: ['Cache'],
  summary: 'Delete expired search cache entries',
  responses: {
    200: {
      description: 'Number of entries removed',
      content: {
        'application/json': {
          schema: CachePurgeResponseSchema,
        },
      },
    },
  },
});

export function createCacheRoutes(cache: SearchCacheRepository): OpenAPIHono<AppEnv> {
  const routes = createRouter();

  routes.openapi(statsRoute, async (c) => {
    const stats = await cache.stats();
    return c.json({ ...stats }, 200);
  });

  routes.openapi(purgeRoute, async (c) => {
    const removed = await cache.purgeExpired();
    return c.json({ removed }, 200);
  });

  return routes;
}
