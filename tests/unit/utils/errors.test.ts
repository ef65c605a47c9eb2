/**
 * Error Handling Tests
 */

import { describe, it, expect, vi } from 'vitest';
import {
  DuplicateIdError,
  InvalidStateError,
  NotFoundError,
  RateLimitExceededError,
  StaleStateError,
  StoreTimeoutError,
  ValidationError,
  formatApiError,
  isRetryableError,
  withRetry,
} from '../../../src/utils/errors.js';

const noDelay = { initialDelayMs: 0 };

describe('errors', () => {
  describe('formatApiError', () => {
    it('should answer unknown and malformed identifiers alike', () => {
      expect(formatApiError(new NotFoundError())).toEqual({
        status: 404,
        body: { error: 'This code is not ready yet.', code: 'NOT_READY' },
      });
    });

    it('should carry retryAfter for rate limits', () => {
      expect(formatApiError(new RateLimitExceededError(120))).toEqual({
        status: 429,
        body: {
          error: 'Update limit reached for this packet. Please try again later.',
          code: 'RATE_LIMITED',
          retryAfter: 120,
        },
      });
    });

    it('should map state and validation errors to client errors', () => {
      expect(formatApiError(new InvalidStateError('CONFIGURED')).status).toBe(409);
      expect(formatApiError(new ValidationError('Enter a valid phone number or URL'))).toEqual({
        status: 400,
        body: { error: 'Enter a valid phone number or URL', code: 'VALIDATION_ERROR' },
      });
      expect(formatApiError(new StaleStateError(4))).toEqual({
        status: 503,
        body: { error: 'Please try again in a moment.', code: 'STALE_STATE' },
      });
    });

    it('should hide internal detail', () => {
      expect(formatApiError(new StoreTimeoutError('compareAndSet', 2000))).toEqual({
        status: 503,
        body: { error: 'Please try again in a moment.', code: 'STORE_TIMEOUT' },
      });
      expect(formatApiError(new DuplicateIdError())).toEqual({
        status: 500,
        body: { error: 'Internal server error', code: 'DUPLICATE_ID' },
      });
      expect(formatApiError(new Error('disk on fire'))).toEqual({
        status: 500,
        body: { error: 'Internal server error', code: 'INTERNAL_ERROR' },
      });
    });
  });

  describe('isRetryableError', () => {
    it('should only retry transient store failures', () => {
      expect(isRetryableError(new StaleStateError(1))).toBe(true);
      expect(isRetryableError(new StoreTimeoutError('get', 10))).toBe(true);
      expect(isRetryableError(new RateLimitExceededError(1))).toBe(false);
      expect(isRetryableError(new InvalidStateError('CONFIGURED'))).toBe(false);
    });
  });

  describe('withRetry', () => {
    it('should retry stale writes until one succeeds', async () => {
      const fn = vi
        .fn<(attempt: number) => Promise<string>>()
        .mockRejectedValueOnce(new StaleStateError(1))
        .mockRejectedValueOnce(new StaleStateError(2))
        .mockResolvedValue('committed');

      await expect(withRetry(fn, { ...noDelay, maxAttempts: 3 })).resolves.toBe('committed');
      expect(fn).toHaveBeenCalledTimes(3);
      expect(fn).toHaveBeenLastCalledWith(3);
    });

    it('should surface the last error once attempts run out', async () => {
      const fn = vi.fn<(attempt: number) => Promise<string>>().mockRejectedValue(new StaleStateError(7));

      await expect(withRetry(fn, { ...noDelay, maxAttempts: 2 })).rejects.toBeInstanceOf(StaleStateError);
      expect(fn).toHaveBeenCalledTimes(2);
    });

    it('should not retry permanent failures', async () => {
      const fn = vi
        .fn<(attempt: number) => Promise<string>>()
        .mockRejectedValue(new InvalidStateError('CONFIGURED'));

      await expect(withRetry(fn, noDelay)).rejects.toBeInstanceOf(InvalidStateError);
      expect(fn).toHaveBeenCalledTimes(1);
    });

    it('should honor a custom retry condition', async () => {
      const fn = vi
        .fn<(attempt: number) => Promise<number>>()
        .mockRejectedValueOnce(new DuplicateIdError())
        .mockResolvedValue(2);

      const result = await withRetry(fn, {
        ...noDelay,
        shouldRetry: (error) => error instanceof DuplicateIdError,
      });

      expect(result).toBe(2);
    });
  });
});
