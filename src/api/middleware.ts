import { randomUUID } from 'crypto';
import type { Request, Response, NextFunction, ErrorRequestHandler, RequestHandler } from 'express';
import rateLimit from 'express-rate-limit';
import { z } from 'zod';
import { logger } from '../utils/logger.js';
import {
  AppError,
  ForbiddenError,
  RateLimitExceededError,
  UnauthorizedError,
  ValidationError,
  formatApiError,
} from '../utils/errors.js';

/**
 * Extended Request type with admin context
 */
export interface AuthenticatedRequest extends Request {
  adminName?: string;
}

/**
 * Resolves an admin API key to the operator's name
 */
export type ApiKeyValidator = (apiKey: string) => string | undefined;

export interface RateLimitOptions {
  /** Requests per minute per client IP on scan routes */
  publicPerMinute: number;
  /** Requests per minute per API key on admin routes */
  adminPerMinute: number;
}

export const DEFAULT_RATE_LIMITS: RateLimitOptions = {
  publicPerMinute: 100,
  adminPerMinute: 30,
};

/**
 * Rate limiter for public scan endpoints, per client IP
 */
export function createPublicRateLimiter(limit: number): RequestHandler {
  return rateLimit({
    windowMs: 60 * 1000, // 1 minute
    limit,
    standardHeaders: true,
    legacyHeaders: false,
    message: { error: 'Too many requests, please try again later', code: 'TOO_MANY_REQUESTS' },
  });
}

/**
 * Rate limiter for admin endpoints, per API key
 */
export function createAdminRateLimiter(limit: number): RequestHandler {
  return rateLimit({
    windowMs: 60 * 1000, // 1 minute
    limit,
    standardHeaders: true,
    legacyHeaders: false,
    message: { error: 'Too many admin requests, please try again later', code: 'TOO_MANY_REQUESTS' },
    keyGenerator: (req) => {
      const apiKey = req.headers['x-api-key'];
      if (typeof apiKey === 'string') {
        return `admin:${apiKey}`;
      }
      return `admin:${req.ip ?? 'unknown'}`;
    },
  });
}

/**
 * API key authentication middleware for admin endpoints
 */
export function requireApiKey(validateApiKey: ApiKeyValidator) {
  return (req: AuthenticatedRequest, _res: Response, next: NextFunction): void => {
    const apiKey = req.headers['x-api-key'];

    if (!apiKey || typeof apiKey !== 'string') {
      next(new UnauthorizedError());
      return;
    }

    const adminName = validateApiKey(apiKey);
    if (!adminName) {
      logger.warn({ apiKeyPrefix: apiKey.substring(0, 4) + '...' }, 'Invalid API key attempt');
      next(new ForbiddenError());
      return;
    }

    // Attach admin name to request for audit logging
    req.adminName = adminName;
    next();
  };
}

/**
 * Parse a request body or query with a zod schema, raising ValidationError
 */
export function parseRequest<T extends z.ZodTypeAny>(schema: T, input: unknown): z.infer<T> {
  const result = schema.safeParse(input);
  if (!result.success) {
    const issue = result.error.issues[0];
    const field = issue?.path.join('.') || undefined;
    throw new ValidationError(
      issue ? `${field ? `${field}: ` : ''}${issue.message}` : 'Invalid request',
      field
    );
  }
  return result.data;
}

/**
 * body-parser failures carry a `type` tag instead of a class
 */
function fromBodyParser(err: unknown): AppError | null {
  if (typeof err !== 'object' || err === null || !('type' in err)) {
    return null;
  }
  if (err.type === 'entity.parse.failed') {
    return new ValidationError('Malformed JSON body');
  }
  if (err.type === 'entity.too.large') {
    return new AppError('Request body too large', 'PAYLOAD_TOO_LARGE', 413);
  }
  return null;
}

/**
 * Global error handler middleware
 */
export const errorHandler: ErrorRequestHandler = (error: unknown, req, res, _next) => {
  const err = fromBodyParser(error) ?? error;
  const operational = err instanceof AppError && err.isOperational && err.statusCode < 500;

  if (operational) {
    logger.debug(
      { code: err.code, path: req.path, method: req.method },
      'Request rejected'
    );
  } else {
    logger.error(
      {
        error: err instanceof Error ? err.message : String(err),
        stack: err instanceof Error ? err.stack : undefined,
        path: req.path,
        method: req.method,
      },
      'Request error'
    );
  }

  const { status, body } = formatApiError(err);
  if (err instanceof RateLimitExceededError) {
    res.setHeader('Retry-After', String(err.retryAfter));
  }
  res.status(status).json(body);
};

/**
 * 404 handler for unmatched routes
 */
export function notFoundHandler(_req: Request, res: Response): void {
  res.status(404).json({ error: 'Not found', code: 'NOT_FOUND' });
}

/**
 * Request ID middleware for tracing
 */
export function requestIdMiddleware(req: Request, res: Response, next: NextFunction): void {
  const header = req.headers['x-request-id'];
  const requestId = typeof header === 'string' && header !== '' ? header : randomUUID();
  res.setHeader('X-Request-ID', requestId);
  next();
}
