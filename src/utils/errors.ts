/**
 * Error Handling Utilities
 *
 * Typed application errors for the packet lifecycle and retry logic for
 * transient failures (optimistic-concurrency conflicts, store timeouts).
 */

import { logger } from './logger.js';

/**
 * Base application error class
 */
export class AppError extends Error {
  public readonly code: string;
  public readonly statusCode: number;
  public readonly isOperational: boolean;

  constructor(
    message: string,
    code: string,
    statusCode: number = 500,
    isOperational: boolean = true
  ) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.statusCode = statusCode;
    this.isOperational = isOperational;
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Identifier does not resolve to a live packet.
 *
 * The message is deliberately the same for unknown, tombstoned and
 * malformed identifiers so the id space cannot be enumerated.
 */
export class NotFoundError extends AppError {
  constructor() {
    super('This code is not ready yet.', 'NOT_READY', 404);
  }
}

/**
 * Transition attempted from a state that does not permit it
 */
export class InvalidStateError extends AppError {
  /** Lifecycle event that was rejected (for operator-facing messages) */
  public readonly event: string;

  constructor(event: string, message: string = 'This code is not ready yet.') {
    super(message, 'INVALID_STATE', 409);
    this.event = event;
  }
}

/**
 * Malformed destination, artifact or request payload
 */
export class ValidationError extends AppError {
  public readonly field: string | undefined;

  constructor(message: string, field?: string) {
    super(message, 'VALIDATION_ERROR', 400);
    this.field = field;
  }
}

/**
 * Management-path update ceiling reached
 */
export class RateLimitExceededError extends AppError {
  /** Seconds until the next update is accepted */
  public readonly retryAfter: number;

  constructor(retryAfter: number) {
    super(
      'Update limit reached for this packet. Please try again later.',
      'RATE_LIMITED',
      429
    );
    this.retryAfter = retryAfter;
  }
}

/**
 * Optimistic concurrency conflict: the record changed between read and write
 */
export class StaleStateError extends AppError {
  public readonly expectedVersion: number;

  constructor(expectedVersion: number) {
    super('Please try again in a moment.', 'STALE_STATE', 503);
    this.expectedVersion = expectedVersion;
  }
}

/**
 * Identifier collision at creation
 */
export class DuplicateIdError extends AppError {
  constructor() {
    super('Identifier collision', 'DUPLICATE_ID', 500);
  }
}

/**
 * Store call did not complete within its deadline; not assumed committed
 */
export class StoreTimeoutError extends AppError {
  constructor(operation: string, timeoutMs: number) {
    super(`Store operation ${operation} timed out after ${timeoutMs}ms`, 'STORE_TIMEOUT', 503);
  }
}

/**
 * Unauthorized error
 */
export class UnauthorizedError extends AppError {
  constructor(message: string = 'API key required') {
    super(message, 'UNAUTHORIZED', 401);
  }
}

/**
 * Forbidden error
 */
export class ForbiddenError extends AppError {
  constructor(message: string = 'Invalid API key') {
    super(message, 'FORBIDDEN', 403);
  }
}

/**
 * Configuration for retry logic
 */
export interface RetryConfig {
  /** Maximum number of attempts */
  maxAttempts: number;
  /** Initial delay in milliseconds */
  initialDelayMs: number;
  /** Maximum delay in milliseconds */
  maxDelayMs: number;
  /** Multiplier for exponential backoff */
  backoffMultiplier: number;
  /** Optional custom retry condition */
  shouldRetry?: (error: unknown) => boolean;
}

/**
 * Default retry configuration
 */
export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxAttempts: 3,
  initialDelayMs: 25,
  maxDelayMs: 500,
  backoffMultiplier: 2,
};

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Check if an error is retryable (transient)
 */
export function isRetryableError(error: unknown): boolean {
  return error instanceof StaleStateError || error instanceof StoreTimeoutError;
}

/**
 * Execute a function with retry logic for transient failures
 */
export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  config: Partial<RetryConfig> = {},
  context?: string
): Promise<T> {
  const cfg = { ...DEFAULT_RETRY_CONFIG, ...config };
  const shouldRetry = cfg.shouldRetry ?? isRetryableError;

  let lastError: unknown;
  let delay = cfg.initialDelayMs;

  for (let attempt = 1; attempt <= cfg.maxAttempts; attempt++) {
    try {
      return await fn(attempt);
    } catch (error) {
      lastError = error;

      if (attempt === cfg.maxAttempts || !shouldRetry(error)) {
        throw error;
      }

      logger.warn(
        {
          attempt,
          maxAttempts: cfg.maxAttempts,
          delay,
          context,
          error: error instanceof Error ? error.message : String(error),
        },
        'Retrying after transient error'
      );

      if (delay > 0) {
        await sleep(delay);
      }
      delay = Math.min(delay * cfg.backoffMultiplier, cfg.maxDelayMs);
    }
  }

  throw lastError;
}

/**
 * Format error for API response
 */
export function formatApiError(error: unknown): {
  status: number;
  body: { error: string; code: string; retryAfter?: number };
} {
  if (error instanceof RateLimitExceededError) {
    return {
      status: 429,
      body: {
        error: error.message,
        code: error.code,
        retryAfter: error.retryAfter,
      },
    };
  }

  // Internal failures keep their code but never their detail
  if (error instanceof DuplicateIdError || error instanceof StoreTimeoutError) {
    return {
      status: error.statusCode,
      body: {
        error: error instanceof StoreTimeoutError ? 'Please try again in a moment.' : 'Internal server error',
        code: error.code,
      },
    };
  }

  if (error instanceof AppError) {
    return {
      status: error.statusCode,
      body: {
        error: error.message,
        code: error.code,
      },
    };
  }

  return {
    status: 500,
    body: {
      error: 'Internal server error',
      code: 'INTERNAL_ERROR',
    },
  };
}
