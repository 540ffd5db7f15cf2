import { z } from 'zod';

export const MAX_KEYWORDS = 10;
export const MAX_RESULTS_LIMIT = 20;
export const DEFAULT_MAX_RESULTS = 5;

function normalizeKeywords(keywords: readonly string[]): string[] {
  const seen = new Set<string>();
  const normalized: string[] = [];
  for (const keyword of keywords) {
    const trimmed = keyword.trim();
    if (trimmed.length === 0 || seen.has(trimmed)) {
      continue;
    }
    seen.add(trimmed);
    normalized.push(trimmed);
  }
  return normalized;
}

export const SearchRequestSchema = z.object({
  keywords: z
    .array(z.string())
    .transform(normalizeKeywords)
    .pipe(
      z
        .array(z.string())
        .min(1, 'At least one non-empty keyword is required')
        .max(MAX_KEYWORDS, `At most ${String(MAX_KEYWORDS)} distinct keywords are allowed`),
    ),
  maxResults: z.number().int().min(1).max(MAX_RESULTS_LIMIT).default(DEFAULT_MAX_RESULTS),
  /** `false` skips the cache read; a fresh result is still stored. */
  useCache: z.boolean().default(true),
});

export type SearchRequestInput = z.input<typeof SearchRequestSchema>;
export type ValidSearchRequest = z.output<typeof SearchRequestSchema>;
