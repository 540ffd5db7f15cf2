import { z } from 'zod';

const SelectorsSchema = z.object({
  searchInput: z.string().min(1).default('#aranan'),
  submitButton: z.string().min(1).default("xpath=//button[normalize-space()='Ara']"),
  resultsContainer: z.string().min(1).default('#detayAramaSonuclar'),
  resultRows: z.string().min(1).default('#detayAramaSonuclar tbody tr'),
  rowCells: z.string().min(1).default('td'),
  detailPane: z.string().min(1).default('#kararAlani'),
  nextPage: z.string().min(1).default('a.paginate_button.next'),
});

const PortalSchema = z.object({
  url: z.string().url().default('https://karararama.yargitay.gov.tr'),
  selectors: SelectorsSchema.default({}),
});

const SearchLimitsSchema = z.object({
  targetResultsPerKeyword: z.number().int().min(1).default(3),
  maxPagesToSearch: z.number().int().min(1).default(5),
  maxConcurrency: z.number().int().min(1).max(10).default(10),
  waitTimeoutMs: z.number().int().positive().default(20_000),
  resultsTimeoutMs: z.number().int().positive().default(20_000),
  detailTimeoutMs: z.number().int().positive().default(20_000),
  sessionTimeoutMs: z.number().int().positive().default(300_000),
  dispatchTimeoutMs: z.number().int().positive().default(600_000),
});

const RetrySchema = z.object({
  attempts: z.number().int().min(1).default(3),
  delayMs: z.number().int().min(0).default(2_000),
});

const CacheSchema = z.object({
  backend: z.enum(['memory', 'firestore']).default('memory'),
  ttlMs: z.number().int().positive().default(24 * 60 * 60 * 1000),
  capacity: z.number().int().min(1).default(100),
});

export const ScraperConfigSchema = z.object({
  $schema: z.string().optional(),
  portal: PortalSchema.default({}),
  search: SearchLimitsSchema.default({}),
  retry: RetrySchema.default({}),
  cache: CacheSchema.default({}),
});

export type ScraperConfig = z.infer<typeof ScraperConfigSchema>;
export type PortalConfig = z.infer<typeof PortalSchema>;
export type PortalSelectors = z.infer<typeof SelectorsSchema>;
export type SearchLimits = z.infer<typeof SearchLimitsSchema>;
export type RetryConfig = z.infer<typeof RetrySchema>;
export type CacheConfig = z.infer<typeof CacheSchema>;

export function defaultScraperConfig(): ScraperConfig {
  return ScraperConfigSchema.parse({});
}
