import { RecordSourceError, StoreUnavailableError } from '../errors.js';

/** Internal: sleep for ms milliseconds */
export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export interface RetryPolicy {
  maxRetries: number;
  retryDelayMs: number;
  onRetry?: (operation: string, attempt: number, error: unknown, nextDelayMs: number) => void;
}

/** The token store or the record store could not be reached. */
export function isTransientStoreError(err: unknown): boolean {
  return err instanceof StoreUnavailableError || err instanceof RecordSourceError;
}

/**
 * Retries `fn` while `isRetryable` accepts the error, with linear backoff, up
 * to maxRetries. Any other error, or the last retryable one, propagates unchanged.
 */
export async function withRetry<T>(
  operation: string,
  policy: RetryPolicy,
  fn: () => Promise<T>,
  isRetryable: (err: unknown) => boolean,
): Promise<T> {
  let attempt = 0;
  while (true) {
    try {
      return await fn();
    } catch (err) {
      if (!isRetryable(err) || attempt >= policy.maxRetries) throw err;
      attempt++;
      const nextDelayMs = policy.retryDelayMs * attempt;
      try { policy.onRetry?.(operation, attempt, err, nextDelayMs); } catch { /* swallow */ }
      await sleep(nextDelayMs);
    }
  }
}

/** withRetry for store round trips: retries StoreUnavailableError and RecordSourceError. */
export function withStoreRetry<T>(operation: string, policy: RetryPolicy, fn: () => Promise<T>): Promise<T> {
  return withRetry(operation, policy, fn, isTransientStoreError);
}
