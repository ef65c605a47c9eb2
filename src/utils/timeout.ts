import { StoreTimeoutError } from './errors.js';

/**
 * Race a store call against a deadline.
 *
 * The timer is always cleared, so nothing is left scheduled once the call
 * settles. A timed-out call is reported as failed, never as committed.
 */
export function withTimeout<T>(promise: Promise<T>, ms: number, operation: string): Promise<T> {
  let timeoutId: ReturnType<typeof setTimeout> | undefined;

  const timeoutPromise = new Promise<never>((_, reject) => {
    timeoutId = setTimeout(() => reject(new StoreTimeoutError(operation, ms)), ms);
  });

  return Promise.race([promise, timeoutPromise]).finally(() => {
    if (timeoutId) clearTimeout(timeoutId);
  });
}
