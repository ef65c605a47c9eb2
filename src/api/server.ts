import express, { type Application } from 'express';
import { pinoHttp } from 'pino-http';
import type { IncomingMessage, ServerResponse } from 'http';
import { config, validateApiKey } from '../config.js';
import { logger } from '../utils/logger.js';
import { initDatabase, closeDatabase } from '../db/connection.js';
import { SqlitePacketStore } from '../packages/adapters/storage/SqlitePacketStore.js';
import { SqliteActivityLog } from '../packages/adapters/activity/SqliteActivityLog.js';
import { SharpArtifactValidator } from '../packages/adapters/artifact/SharpArtifactValidator.js';
import { createPacketCore, type PacketCore } from '../services/index.js';
import { createScanRouter } from './routes/scan.routes.js';
import { createAdminRouter } from './routes/admin.routes.js';
import {
  DEFAULT_RATE_LIMITS,
  createAdminRateLimiter,
  createPublicRateLimiter,
  errorHandler,
  notFoundHandler,
  requestIdMiddleware,
  requireApiKey,
  type ApiKeyValidator,
  type RateLimitOptions,
} from './middleware.js';

export interface AppOptions {
  validateApiKey: ApiKeyValidator;
  publicBaseUrl: string;
  staleRetryAttempts: number;
  artifactMaxBytes: number;
  rateLimits?: RateLimitOptions;
}

/**
 * HTTP server instance
 */
let server: ReturnType<Application['listen']> | null = null;

/**
 * Create and configure the Express application
 */
export function createApp(core: PacketCore, options: AppOptions): Application {
  const expressApp = express();
  const rateLimits = options.rateLimits ?? DEFAULT_RATE_LIMITS;

  // Trust proxy for X-Forwarded-For headers (needed for rate limiting behind nginx)
  expressApp.set('trust proxy', 1);

  // Request ID middleware
  expressApp.use(requestIdMiddleware);

  // Request logging via pino-http
  const httpLogger = pinoHttp({
    logger,
    // Don't log health checks to reduce noise
    autoLogging: {
      ignore: (req: IncomingMessage) => req.url === '/health',
    },
    // Management ids live in the URL; log the path prefix only
    serializers: {
      req: (req: IncomingMessage) => ({
        method: req.method,
        url: req.url?.startsWith('/m/') ? '/m/[REDACTED]' : req.url,
      }),
      res: (res: ServerResponse) => ({
        statusCode: res.statusCode,
      }),
    },
  });

  expressApp.use(httpLogger);

  // JSON body parsing
  expressApp.use(express.json({ limit: '10kb' }));

  expressApp.get('/health', (_req, res) => {
    res.json({ status: 'healthy' });
  });

  // Scan routes (public)
  expressApp.use(
    ['/p', '/m'],
    createPublicRateLimiter(rateLimits.publicPerMinute)
  );
  expressApp.use('/', createScanRouter(core, { staleRetryAttempts: options.staleRetryAttempts }));

  // Admin routes (under /admin prefix)
  expressApp.use(
    '/admin',
    createAdminRateLimiter(rateLimits.adminPerMinute),
    requireApiKey(options.validateApiKey),
    createAdminRouter(core, {
      publicBaseUrl: options.publicBaseUrl,
      artifactMaxBytes: options.artifactMaxBytes,
    })
  );

  // 404 handler
  expressApp.use(notFoundHandler);

  // Global error handler
  expressApp.use(errorHandler);

  return expressApp;
}

/**
 * Build the packet core over the configured SQLite database
 */
function createCoreFromConfig(): PacketCore {
  const db = initDatabase(config.database.path, config.store.timeoutMs);

  return createPacketCore({
    store: new SqlitePacketStore(db),
    activityLog: new SqliteActivityLog(db),
    artifactValidator: new SharpArtifactValidator({ maxBytes: config.artifact.maxBytes }),
    options: {
      managementUpdateCeiling: config.rateLimit.managementUpdateCeiling,
      managementUpdateWindowMs: config.rateLimit.managementUpdateWindowHours * 60 * 60 * 1000,
      storeTimeoutMs: config.store.timeoutMs,
      createMaxAttempts: config.identifiers.createMaxAttempts,
      destinationRules: {
        defaultCountryCode: config.contact.defaultCountryCode,
        contactUriBase: config.contact.uriBase,
      },
    },
  });
}

/**
 * Start the Express server
 */
export async function startServer(): Promise<void> {
  const app = createApp(createCoreFromConfig(), {
    validateApiKey,
    publicBaseUrl: config.api.publicBaseUrl,
    staleRetryAttempts: config.store.staleRetryAttempts,
    artifactMaxBytes: config.artifact.maxBytes,
  });

  // Start listening
  const { port, host } = config.api;

  await new Promise<void>((resolve, reject) => {
    const listening = app.listen(port, host, () => {
      logger.info({ port, host }, 'API server started');
      resolve();
    });
    server = listening;

    listening.on('error', (error: NodeJS.ErrnoException) => {
      if (error.code === 'EADDRINUSE') {
        logger.fatal({ port }, 'Port already in use');
      } else {
        logger.fatal({ error }, 'Failed to start server');
      }
      reject(error);
    });
  });

  // Set up graceful shutdown
  setupGracefulShutdown();
}

/**
 * Stop the Express server
 */
export async function stopServer(): Promise<void> {
  const current = server;
  if (!current) {
    return;
  }

  logger.info('Stopping API server...');

  await new Promise<void>((resolve) => {
    // Force close after timeout
    const forceTimer = setTimeout(() => {
      logger.warn('Forcing server shutdown after timeout');
      resolve();
    }, 10000);

    current.close(() => {
      clearTimeout(forceTimer);
      logger.info('API server stopped');
      resolve();
    });
  });

  // Close database connection
  closeDatabase();

  server = null;
}

/**
 * Set up graceful shutdown handlers
 */
function setupGracefulShutdown(): void {
  let shuttingDown = false;

  const shutdown = async (signal: string) => {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;

    logger.info({ signal }, 'Received shutdown signal');

    try {
      await stopServer();
      process.exit(0);
    } catch (error) {
      logger.error({ error }, 'Error during shutdown');
      process.exit(1);
    }
  };

  // Handle termination signals
  process.on('SIGTERM', () => void shutdown('SIGTERM'));
  process.on('SIGINT', () => void shutdown('SIGINT'));

  // Handle unhandled rejections
  process.on('unhandledRejection', (reason) => {
    logger.error({ reason }, 'Unhandled rejection');
  });
}
