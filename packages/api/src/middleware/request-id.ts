import { randomUUID } from 'node:crypto';
import { createMiddleware } from 'hono/factory';
import type { AppEnv } from '../types.js';

const HEADER = 'X-Request-Id';

export const requestId = createMiddleware<AppEnv>(async (c, next) => {
  const id = c.req.header(HEADER) ?? randomUUID();
  c.set('requestId', id);
  c.header(HEADER, id);
  await next();
});
