import { createRoute } from '@hono/zod-openapi';
import type { OpenAPIHono } from '@hono/zod-openapi';
import type { DecisionSearchService } from '@docket/core/src/search/search-service.js';
import { createRouter, type AppEnv } from '../types.js';
import { SearchRequestBodySchema } from '../schemas/requests.js';
import { ErrorResponseSchema, SearchResultSchema } from '../schemas/responses.js';

const searchRoute = createRoute({
  method: 'post',
  path: '/',
  tags: ['Search'],
  summary: 'Search decisions for a set of keywords',
  request: {
    body: {
      content: {
        'application/json': {
          schema: SearchRequestBodySchema,
        },
      },
    },
  },
  responses: {
    200: {
      description: 'Aggregated decisions with per-keyword outcomes',
      content: {
        'application/json': {
          schema: SearchResultSchema,
        },
      },
    },
    400: {
      description: 'Validation error',
      content: {
        'application/json': {
          schema: ErrorResponseSchema,
        },
      },
    },
    503: {
      description: 'The client aborted before the search finished',
      content: {
        'application/json': {
          schema: ErrorResponseSchema,
        },
      },
    },
  },
});

export function createSearchRoutes(searchService: DecisionSearchService): OpenAPIHono<AppEnv> {
  const routes = createRouter();

  routes.openapi(searchRoute, async (c) => {
    const body = c.req.valid('json');
    const result = await searchService.search(body, { signal: c.req.raw.signal });

    return c.json(
      {
        ...result,
        results: result.results.map((record) => ({ ...record })),
        searchDetails: { ...result.searchDetails },
      },
      200,
    );
  });

  return routes;
}
