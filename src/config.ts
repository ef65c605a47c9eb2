import { z } from 'zod';
import { config as dotenvConfig } from 'dotenv';
import { logger } from './utils/logger.js';

// Load environment variables from .env.local for development
dotenvConfig({ path: '.env.local' });
dotenvConfig(); // Fallback to .env

/**
 * Admin API key schema: "key:name,key:name"
 */
const adminApiKeysSchema = z
  .string()
  .transform((val) => {
    const keys = new Map<string, string>();
    for (const pair of val.split(',')) {
      const [key, name] = pair.split(':');
      if (key && name) {
        keys.set(key.trim(), name.trim());
      }
    }
    return keys;
  });

/**
 * Configuration schema with Zod validation
 */
const configSchema = z.object({
  // API Configuration
  api: z.object({
    port: z.coerce.number().int().min(1).max(65535).default(3000),
    host: z.string().default('0.0.0.0'),
    adminApiKeys: adminApiKeysSchema,
    /** Base of the URLs encoded into printed codes */
    publicBaseUrl: z
      .string()
      .url()
      .transform((url) => url.replace(/\/+$/, '')),
  }),

  // Database Configuration
  database: z.object({
    path: z.string().min(1),
  }),

  // Logging Configuration
  logging: z.object({
    level: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('info'),
  }),

  // Management-path update ceiling
  rateLimit: z.object({
    managementUpdateCeiling: z.coerce.number().int().min(1).default(3),
    managementUpdateWindowHours: z.coerce.number().positive().default(24),
  }),

  // Store access bounds
  store: z.object({
    timeoutMs: z.coerce.number().int().min(1).default(2000),
    staleRetryAttempts: z.coerce.number().int().min(1).max(10).default(3),
  }),

  identifiers: z.object({
    createMaxAttempts: z.coerce.number().int().min(1).max(20).default(5),
  }),

  // Contact destination normalization
  contact: z.object({
    defaultCountryCode: z.string().regex(/^\d{1,3}$/, 'Country code must be 1-3 digits').default('91'),
    uriBase: z.string().url().default('https://wa.me/'),
  }),

  artifact: z.object({
    maxBytes: z.coerce.number().int().min(1).default(5 * 1024 * 1024),
  }),
});

/**
 * Parse and validate configuration
 */
function parseConfig() {
  const rawConfig = {
    api: {
      port: process.env.API_PORT ?? '3000',
      host: process.env.API_HOST ?? '0.0.0.0',
      adminApiKeys: process.env.ADMIN_API_KEYS ?? '',
      publicBaseUrl: process.env.PUBLIC_BASE_URL ?? 'http://localhost:3000',
    },
    database: {
      path: process.env.DATABASE_PATH ?? './data/packets.db',
    },
    logging: {
      level: process.env.LOG_LEVEL ?? 'info',
    },
    rateLimit: {
      managementUpdateCeiling: process.env.MANAGEMENT_UPDATE_CEILING ?? '3',
      managementUpdateWindowHours: process.env.MANAGEMENT_UPDATE_WINDOW_HOURS ?? '24',
    },
    store: {
      timeoutMs: process.env.STORE_TIMEOUT_MS ?? '2000',
      staleRetryAttempts: process.env.STALE_RETRY_ATTEMPTS ?? '3',
    },
    identifiers: {
      createMaxAttempts: process.env.ID_CREATE_MAX_ATTEMPTS ?? '5',
    },
    contact: {
      defaultCountryCode: process.env.DEFAULT_COUNTRY_CODE ?? '91',
      uriBase: process.env.CONTACT_URI_BASE ?? 'https://wa.me/',
    },
    artifact: {
      maxBytes: process.env.ARTIFACT_MAX_BYTES ?? String(5 * 1024 * 1024),
    },
  };

  const result = configSchema.safeParse(rawConfig);

  if (!result.success) {
    const errors = result.error.issues.map(
      (issue) => `  - ${issue.path.join('.')}: ${issue.message}`
    );
    logger.fatal({ errors: result.error.issues }, 'Configuration validation failed');
    throw new Error(`Configuration validation failed:\n${errors.join('\n')}`);
  }

  return result.data;
}

/**
 * Typed configuration object
 */
export type Config = z.infer<typeof configSchema>;

/**
 * Validated and typed configuration
 */
export const config: Config = parseConfig();

// The logger is built before dotenv runs; apply the validated level now
logger.level = config.logging.level;

/**
 * Validate an admin API key
 * @returns Admin name if valid, undefined if invalid
 */
export function validateApiKey(apiKey: string): string | undefined {
  return config.api.adminApiKeys.get(apiKey);
}
