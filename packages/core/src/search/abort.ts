import { createChildLogger } from '@docket/shared/src/logger.js';
import { SessionAbortedError } from '@docket/shared/src/utils/errors.js';

const log = createChildLogger('search:abort');

export function describeAbortReason(signal: AbortSignal): string {
  const reason: unknown = signal.reason;
  if (reason instanceof Error) {
    return reason.message;
  }
  return reason === undefined ? 'aborted' : String(reason);
}

export function abortedError(signal: AbortSignal): SessionAbortedError {
  const reason: unknown = signal.reason;
  return new SessionAbortedError(
    `Session aborted: ${describeAbortReason(signal)}`,
    reason instanceof Error ? reason : undefined,
  );
}

export function throwIfAborted(signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw abortedError(signal);
  }
}

/** Settles with `promise`, or rejects with a SessionAbortedError as soon as `signal` aborts. */
export function raceAbort<T>(promise: Promise<T>, signal?: AbortSignal): Promise<T> {
  if (!signal) {
    return promise;
  }
  if (signal.aborted) {
    promise.catch((error: unknown) => {
      log.debug({ error: String(error) }, 'Operation settled after abort');
    });
    return Promise.reject(abortedError(signal));
  }

  return new Promise<T>((resolve, reject) => {
    const onAbort = (): void => {
      reject(abortedError(signal));
    };
    signal.addEventListener('abort', onAbort, { once: true });
    promise.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      },
    );
  });
}

/** Combines an optional caller signal with a deadline. */
export function withDeadline(timeoutMs: number, signal?: AbortSignal): AbortSignal {
  const deadline = AbortSignal.timeout(timeoutMs);
  return signal ? AbortSignal.any([signal, deadline]) : deadline;
}
