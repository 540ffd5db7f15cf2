import type { ZodError } from 'zod';
import { SchemaValidationError, SearchValidationError } from '@docket/shared/src/utils/errors.js';
import { ScraperConfigSchema } from './scraper-config.schema.js';
import type { ScraperConfig } from './scraper-config.schema.js';
import { SearchRequestSchema } from './search-request.schema.js';
import type { ValidSearchRequest } from './search-request.schema.js';

export function formatZodErrors(error: ZodError): readonly string[] {
  return error.errors.map((e) => `${e.path.join('.')}: ${e.message}`);
}

export function validateScraperConfig(data: unknown): ScraperConfig {
  const result = ScraperConfigSchema.safeParse(data);

  if (!result.success) {
    throw new SchemaValidationError('Invalid scraper configuration', formatZodErrors(result.error));
  }

  return result.data;
}

export function validateSearchRequest(data: unknown): ValidSearchRequest {
  const result = SearchRequestSchema.safeParse(data);

  if (!result.success) {
    throw new SearchValidationError('Invalid search request', formatZodErrors(result.error));
  }

  return result.data;
}
