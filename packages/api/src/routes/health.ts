import { createRoute } from '@hono/zod-openapi';
import type { OpenAPIHono } from '@hono/zod-openapi';
import type { CacheConfig } from '@docket/schemas/src/scraper-config.schema.js';
import { createRouter, type AppEnv } from '../types.js';
import { HealthResponseSchema } from '../schemas/responses.js';

export const API_VERSION = '0.1.0';

const healthRoute = createRoute({
  method: 'get',
  path: '/',
  tags: ['Health'],
  summary: 'Liveness and cache backend',
  security: [],
  responses: {
    200: {
      description: 'Service is up',
      content: {
        'application/json': {
          schema: HealthResponseSchema,
        },
      },
    },
  },
});

export function createHealthRoutes(cacheBackend: CacheConfig['backend']): OpenAPIHono<AppEnv> {
  const routes = createRouter();

  routes.openapi(healthRoute, (c) => {
    return c.json({ status: 'ok', version: API_VERSION, cacheBackend }, 200);
  });

  return routes;
}
