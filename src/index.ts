/**
 * Packet Redirect Service Entry Point
 *
 * Printed QR packets resolve through two identifiers: the public code
 * redirects customers once configured, the secret code lets the buyer set
 * and change the destination.
 */

import { config } from './config.js';
import { logger } from './utils/logger.js';
import { startServer } from './api/server.js';

async function main() {
  logger.info({ config: { port: config.api.port, host: config.api.host } }, 'Starting packet redirect service');

  // Opens the database and applies migrations before listening
  await startServer();

  logger.info('Packet redirect service started successfully');
}

main().catch((error: unknown) => {
  logger.fatal({ error }, 'Failed to start packet redirect service');
  process.exit(1);
});
