/**
 * =============================================================================
 * GEO BACKEND - MAIN SERVER
 * =============================================================================
 *
 * Country, city, weather and exchange-rate lookups backed by third-party
 * REST APIs. Every lookup is stored, so repeated questions are answered from
 * the database.
 *
 * Start: `npm run dev` (ts-node) or `npm start` after `npm run build`.
 * =============================================================================
 */

import { createServer } from 'http';
import { config } from './config/environment';
import { logger, logError } from './shared/services/logger.service';
import { db } from './shared/database/db';
import { createApp, API_PREFIX } from './app';

const SHUTDOWN_TIMEOUT_MS = 30000;

const app = createApp();
const server = createServer(app);

server.listen(config.port, config.host, () => {
  // Stalled requests must not pile up behind a slow provider
  server.timeout = config.providers.requestTimeoutMs * 3;
  server.keepAliveTimeout = 65000;
  server.headersTimeout = 66000;

  logger.info(`🌍 Geo backend listening on http://${config.host}:${config.port}`, {
    environment: config.nodeEnv,
    database: config.database.driver,
    api: API_PREFIX
  });
});

// Handle uncaught errors
process.on('uncaughtException', (error) => {
  logError('Uncaught exception', error);
  process.exit(1);
});

process.on('unhandledRejection', (reason) => {
  logError('Unhandled rejection', reason);
  process.exit(1);
});

// =============================================================================
// GRACEFUL SHUTDOWN
// =============================================================================

let shuttingDown = false;

const gracefulShutdown = (signal: string): void => {
  if (shuttingDown) return;
  shuttingDown = true;
  logger.info(`${signal} received. Starting graceful shutdown...`);

  server.close(async (closeError) => {
    if (closeError) {
      logError('Error closing HTTP server', closeError);
    } else {
      logger.info('HTTP server closed');
    }

    try {
      await db.close();
      logger.info('Database connection closed');
    } catch (err) {
      logError('Error closing database connection', err);
    }

    logger.info('Graceful shutdown complete');
    process.exit(0);
  });

  // Force shutdown after 30 seconds
  setTimeout(() => {
    logger.error('Forced shutdown after timeout');
    process.exit(1);
  }, SHUTDOWN_TIMEOUT_MS).unref();
};

process.on('SIGTERM', () => gracefulShutdown('SIGTERM'));
process.on('SIGINT', () => gracefulShutdown('SIGINT'));
