import { describe, it, expect } from 'vitest';
import { canonicalKeywords, createCacheKey } from './cache-key.js';

describe('canonicalKeywords', () => {
  it('should trim, drop empties, de-duplicate and sort', () => {
    expect(canonicalKeywords([' tahliye', 'kira', '', 'kira ', '  '])).toEqual(['kira', 'tahliye']);
  });
});

describe('createCacheKey', () => {
  it('should ignore keyword order and duplicates', () => {
    expect(createCacheKey(['tahliye', 'kira'])).toBe(createCacheKey(['kira', 'tahliye', 'kira']));
  });

  it('should produce a sha256 hex digest', () => {
    expect(createCacheKey(['kira'])).toMatch(/^[0-9a-f]{64}$/);
  });

  it('should distinguish different keyword sets', () => {
    expect(createCacheKey(['kira'])).not.toBe(createCacheKey(['kira', 'tahliye']));
  });
});
