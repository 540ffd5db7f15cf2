import type { Context } from 'hono';
import { HTTPException } from 'hono/http-exception';
import { ZodError } from 'zod';
import { formatZodErrors } from '@docket/schemas/src/validators.js';
import {
  PersistenceError,
  SearchValidationError,
  SessionAbortedError,
} from '@docket/shared/src/utils/errors.js';
import { createChildLogger } from '@docket/shared/src/logger.js';
import { validationErrorBody } from '../types.js';
import type { AppEnv, ErrorBody } from '../types.js';

const log = createChildLogger('api:error-handler');

export function errorHandler(err: Error, c: Context<AppEnv>): Response {
  const requestId = c.get('requestId');

  if (err instanceof ZodError) {
    return c.json(validationErrorBody(requestId, formatZodErrors(err)), 400);
  }

  if (err instanceof SearchValidationError) {
    return c.json(validationErrorBody(requestId, err.validationErrors), 400);
  }

  if (err instanceof HTTPException) {
    const body: ErrorBody = {
      error: err.message,
      code: 'BAD_REQUEST',
      requestId,
    };
    return c.json(body, err.status);
  }

  // The client is usually gone by now; the body is for proxies that still listen.
  if (err instanceof SessionAbortedError) {
    log.info({ requestId, reason: err.message }, 'Search abandoned by client');
    const body: ErrorBody = {
      error: err.message,
      code: 'REQUEST_ABORTED',
      requestId,
    };
    return c.json(body, 503);
  }

  if (err instanceof PersistenceError) {
    log.error({ requestId, error: err.message }, 'Persistence error');
    const body: ErrorBody = {
      error: 'Internal server error',
      code: 'INTERNAL_ERROR',
      requestId,
    };
    return c.json(body, 500);
  }

  log.error({ requestId, error: err.message }, 'Unhandled error');
  const body: ErrorBody = {
    error: 'Internal server error',
    code: 'INTERNAL_ERROR',
    requestId,
  };
  return c.json(body, 500);
}
