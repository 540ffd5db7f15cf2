import { z } from '@hono/zod-openapi';

export const ErrorResponseSchema = z
  .object({
    error: z.string(),
    code: z.string(),
    requestId: z.string(),
    details: z.array(z.string()).optional(),
  })
  .openapi('ErrorResponse');

// Health
export const HealthResponseSchema = z
  .object({
    status: z.string(),
    version: z.string(),
    cacheBackend: z.enum(['memory', 'firestore']),
  })
  .openapi('HealthResponse');

// Search
export const DecisionRecordSchema = z
  .object({
    chamber: z.string(),
    caseNumber: z.string(),
    decisionNumber: z.string(),
    decisionDate: z.string(),
    decisionText: z.string(),
    matchedKeyword: z.string(),
  })
  .openapi('DecisionRecord');

export const SearchOutcomeSchema = z
  .object({
    success: z.boolean(),
    count: z.number().int(),
    message: z.string(),
  })
  .openapi('SearchOutcome');

export const SearchResultSchema = z
  .object({
    results: z.array(DecisionRecordSchema),
    success: z.boolean(),
    message: z.string(),
    searchDetails: z.record(z.string(), SearchOutcomeSchema),
    processingTime: z.number().openapi({ description: 'Seconds' }),
    totalKeywords: z.number().int(),
    uniqueResults: z.number().int(),
  })
  .openapi('SearchResult');

// Cache
export const CacheStatsResponseSchema = z
  .object({
    entries: z.number().int(),
    activeEntries: z.number().int(),
    totalHits: z.number().int(),
    capacity: z.number().int(),
  })
  .openapi('CacheStatsResponse');

export const CachePurgeResponseSchema = z
  .object({
    removed: z.number().int(),
  })
  .openapi('CachePurgeResponse');
