import { createHash, timingSafeEqual } from 'node:crypto';
import { createMiddleware } from 'hono/factory';
import type { AppEnv } from '../types.js';

function digest(value: string): Buffer {
  return createHash('sha256').update(value).digest();
}

/** Requires a matching `X-API-Key` header when a key is configured; open otherwise. */
export function createApiKeyMiddleware(
  apiKey: string | undefined,
): ReturnType<typeof createMiddleware<AppEnv>> {
  const expected = apiKey ? digest(apiKey) : undefined;

  return createMiddleware<AppEnv>(async (c, next) => {
    if (expected) {
      const provided = c.req.header('X-API-Key');
      if (!provided || !timingSafeEqual(digest(provided), expected)) {
        return c.json(
          { error: 'Missing or invalid API key', code: 'UNAUTHORIZED', requestId: c.get('requestId') },
          401,
        );
      }
    }
    await next();
  });
}
