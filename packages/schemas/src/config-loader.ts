import { readFile } from 'node:fs/promises';
import { ConfigurationError } from '@docket/shared/src/utils/errors.js';
import { validateScraperConfig } from './validators.js';
import type { ScraperConfig } from './scraper-config.schema.js';

type EnvOverride = readonly [envName: string, section: string, field: string, kind: 'number' | 'string'];

const ENV_OVERRIDES: readonly EnvOverride[] = [
  ['PORTAL_URL', 'portal', 'url', 'string'],
  ['TARGET_RESULTS_PER_KEYWORD', 'search', 'targetResultsPerKeyword', 'number'],
  ['MAX_PAGES_TO_SEARCH', 'search', 'maxPagesToSearch', 'number'],
  ['MAX_CONCURRENCY', 'search', 'maxConcurrency', 'number'],
  ['CACHE_BACKEND', 'cache', 'backend', 'string'],
  ['CACHE_TTL_MS', 'cache', 'ttlMs', 'number'],
  ['CACHE_CAPACITY', 'cache', 'capacity', 'number'],
];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

async function readJsonFile(filePath: string): Promise<unknown> {
  try {
    const content = await readFile(filePath, 'utf-8');
    return JSON.parse(content) as unknown;
  } catch (error) {
    if (error instanceof SyntaxError) {
      throw new ConfigurationError(`Invalid JSON in ${filePath}: ${error.message}`);
    }
    const nodeError = error as NodeJS.ErrnoException;
    if (nodeError.code === 'ENOENT') {
      throw new ConfigurationError(`Configuration file not found: ${filePath}`);
    }
    throw new ConfigurationError(
      `Failed to read configuration file ${filePath}: ${nodeError.message}`,
    );
  }
}

export function applyEnvOverrides(raw: unknown, env: NodeJS.ProcessEnv): unknown {
  if (!isRecord(raw)) {
    return raw;
  }

  const merged: Record<string, unknown> = { ...raw };
  for (const [envName, section, field, kind] of ENV_OVERRIDES) {
    const value = env[envName];
    if (value === undefined || value === '') {
      continue;
    }
    const current = merged[section];
    const sectionValue = isRecord(current) ? { ...current } : {};
    sectionValue[field] = kind === 'number' ? Number(value) : value;
    merged[section] = sectionValue;
  }
  return merged;
}

export async function loadScraperConfig(
  filePath: string,
  env: NodeJS.ProcessEnv = process.env,
): Promise<ScraperConfig> {
  const raw = await readJsonFile(filePath);
  return validateScraperConfig(applyEnvOverrides(raw, env));
}
