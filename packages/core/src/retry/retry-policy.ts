import { setTimeout as delay } from 'node:timers/promises';
import { createChildLogger } from '@docket/shared/src/logger.js';
import { toError } from '@docket/shared/src/utils/errors.js';

const log = createChildLogger('retry:policy');

export interface RetryPolicyOptions {
  readonly attempts: number;
  readonly delayMs: number;
  /** Decides whether a failed attempt may be repeated. Defaults to always. */
  readonly shouldRetry?: (error: Error) => boolean;
  readonly name?: string;
}

export interface RetryPolicy {
  readonly attempts: number;
  /**
   * Runs `operation` until it succeeds or the attempts are used up, waiting a
   * fixed delay between attempts. The last error is rethrown unchanged.
   */
  execute<T>(operation: (attempt: number) => Promise<T>, signal?: AbortSignal): Promise<T>;
}

export function createRetryPolicy(options: RetryPolicyOptions): RetryPolicy {
  const attempts = Math.max(1, Math.floor(options.attempts));
  const delayMs = Math.max(0, options.delayMs);
  const shouldRetry = options.shouldRetry ?? ((): boolean => true);
  const name = options.name ?? 'operation';

  return {
    attempts,

    async execute<T>(operation: (attempt: number) => Promise<T>, signal?: AbortSignal): Promise<T> {
      let lastError: Error | undefined;

      for (let attempt = 1; attempt <= attempts; attempt++) {
        signal?.throwIfAborted();
        try {
          return await operation(attempt);
        } catch (error) {
          lastError = toError(error);

          if (attempt === attempts || !shouldRetry(lastError) || signal?.aborted) {
            break;
          }

          log.warn(
            { name, attempt, maxAttempts: attempts, delayMs, error: lastError.message },
            'Attempt failed, retrying',
          );
          await delay(delayMs, undefined, { signal });
        }
      }

      throw lastError ?? new Error(`${name} failed without an error`);
    },
  };
}
