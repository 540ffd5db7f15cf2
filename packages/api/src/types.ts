import { OpenAPIHono } from '@hono/zod-openapi';
import { formatZodErrors } from '@docket/schemas/src/validators.js';

export interface AppEnv {
  Variables: {
    requestId: string;
  };
}

/** Body of every non-2xx JSON response. */
export interface ErrorBody {
  readonly error: string;
  readonly code: string;
  readonly requestId: string;
  readonly details?: readonly string[];
}

export function validationErrorBody(requestId: string, details: readonly string[]): ErrorBody {
  return { error: 'Validation failed', code: 'VALIDATION_ERROR', requestId, details };
}

/** Router whose request validation failures use the shared error body. */
export function createRouter(): OpenAPIHono<AppEnv> {
  return new OpenAPIHono<AppEnv>({
    defaultHook: (result, c): Response | undefined => {
      if (result.success) {
        return undefined;
      }
      return c.json(validationErrorBody(c.get('requestId'), formatZodErrors(result.error)), 400);
    },
  });
}
