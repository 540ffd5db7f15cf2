import { describe, it, expect, vi, beforeEach } from 'vitest';
import { applyEnvOverrides, loadScraperConfig } from './config-loader.js';
import { ConfigurationError } from '@docket/shared/src/utils/errors.js';
import { SchemaValidationError } from '@docket/shared/src/utils/errors.js';

vi.mock('node:fs/promises', () => ({
  readFile: vi.fn(),
}));

const fileConfig = {
  portal: { url: 'https://portal.example.test' },
  search: { targetResultsPerKeyword: 4, maxPagesToSearch: 2 },
};

describe('loadScraperConfig', () => {
  beforeEach(() => {
    vi.resetAllMocks();
  });

  it('should load and validate the configuration file', async () => {
    const { readFile } = await import('node:fs/promises');
    vi.mocked(readFile).mockResolvedValue(JSON.stringify(fileConfig));

    const config = await loadScraperConfig('/test/scraper.json', {});
    expect(config.portal.url).toBe('https://portal.example.test');
    expect(config.search.targetResultsPerKeyword).toBe(4);
    expect(config.search.maxPagesToSearch).toBe(2);
    expect(config.retry.attempts).toBe(3);
  });

  it('should let environment variables override file values', async () => {
    const { readFile } = await import('node:fs/promises');
    vi.mocked(readFile).mockResolvedValue(JSON.stringify(fileConfig));

    const config = await loadScraperConfig('/test/scraper.json', {
      TARGET_RESULTS_PER_KEYWORD: '6',
      CACHE_BACKEND: 'firestore',
      CACHE_CAPACITY: '',
    });
    expect(config.search.targetResultsPerKeyword).toBe(6);
    expect(config.search.maxPagesToSearch).toBe(2);
    expect(config.cache.backend).toBe('firestore');
    expect(config.cache.capacity).toBe(100);
  });

  it('should throw ConfigurationError for missing files', async () => {
    const { readFile } = await import('node:fs/promises');
    const error = new Error('File not found') as NodeJS.ErrnoException;
    error.code = 'ENOENT';
    vi.mocked(readFile).mockRejectedValue(error);

    await expect(loadScraperConfig('/nonexistent.json', {})).rejects.toThrow(ConfigurationError);
  });

  it('should throw ConfigurationError for invalid JSON', async () => {
    const { readFile } = await import('node:fs/promises');
    vi.mocked(readFile).mockResolvedValue('not valid json{{{');

    await expect(loadScraperConfig('/test/scraper.json', {})).rejects.toThrow(ConfigurationError);
  });

  it('should throw SchemaValidationError for a non-numeric override', async () => {
    const { readFile } = await import('node:fs/promises');
    vi.mocked(readFile).mockResolvedValue(JSON.stringify(fileConfig));

    await expect(
      loadScraperConfig('/test/scraper.json', { MAX_PAGES_TO_SEARCH: 'many' }),
    ).rejects.toThrow(SchemaValidationError);
  });
});

describe('applyEnvOverrides', () => {
  it('should create missing sections', () => {
    expect(applyEnvOverrides({}, { MAX_CONCURRENCY: '4' })).toEqual({
      search: { maxConcurrency: 4 },
    });
  });

  it('should leave non-object input untouched', () => {
    expect(applyEnvOverrides('text', { MAX_CONCURRENCY: '4' })).toBe('text');
  });
});
