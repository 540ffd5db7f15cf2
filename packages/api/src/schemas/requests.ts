import { z } from '@hono/zod-openapi';
import { MAX_RESULTS_LIMIT } from '@docket/schemas/src/search-request.schema.js';

export const SearchRequestBodySchema = z
  .object({
    keywords: z
      .array(z.string())
      .min(1)
      .openapi({ example: ['kira tespit', 'tahliye'] }),
    maxResults: z
      .number()
      .int()
      .min(1)
      .max(MAX_RESULTS_LIMIT)
      .optional()
      .openapi({ example: 5 }),
    useCache: z.boolean().optional().openapi({ example: true }),
  })
  .openapi('SearchRequest');

export type SearchRequestBody = z.infer<typeof SearchRequestBodySchema>;
