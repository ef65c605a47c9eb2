import pino from 'pino';

const LOG_LEVEL = process.env.LOG_LEVEL ?? 'info';

/**
 * Structured logger using pino
 *
 * Configuration:
 * - LOG_LEVEL environment variable controls verbosity (trace, debug, info, warn, error, fatal, silent)
 * - ISO timestamps for consistent time formatting
 * - JSON format for structured logging
 * - Management identifiers and buyer contact details must never be logged in clear
 */
export const logger = pino({
  level: LOG_LEVEL,
  formatters: {
    level: (label) => ({ level: label }),
  },
  timestamp: pino.stdTimeFunctions.isoTime,
  redact: {
    paths: [
      '*.password',
      '*.token',
      '*.secret',
      '*.apiKey',
      '*.managementId',
      '*.buyerEmail',
    ],
    censor: '[REDACTED]',
  },
});

export type Logger = pino.Logger;

/**
 * Create a child logger with additional context
 */
export function createChildLogger(bindings: Record<string, unknown>): Logger {
  return logger.child(bindings);
}

/**
 * Shorten an identifier for log lines (first 4 characters)
 */
export function maskIdentifier(identifier: string): string {
  return identifier.length <= 4 ? '****' : `${identifier.slice(0, 4)}…`;
}
