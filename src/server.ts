/**
 * =============================================================================
 * DELIVERY ROUTE OPTIMIZER - SERVER ENTRY POINT
 * =============================================================================
 *
 * Validates the environment, starts the HTTP server and handles graceful
 * shutdown. The application itself is assembled in app.ts.
 * =============================================================================
 */

import { createServer } from 'http';
import { buildApp, API_PREFIX } from './app';
import { config } from './config/environment';
import { validateAndLogEnvironment } from './core/config/env.validation';
import { logger } from './shared/services/logger.service';

validateAndLogEnvironment();

const app = buildApp();
const server = createServer(app);

// =============================================================================
// START SERVER
// =============================================================================

server.listen(config.port, config.host, () => {
  server.timeout = config.requestTimeoutMs;
  server.keepAliveTimeout = 65000;
  server.headersTimeout = 66000;    // must exceed keepAliveTimeout

  logger.info(`Server started on ${config.host}:${config.port}`, {
    environment: config.nodeEnv,
    requestTimeoutMs: config.requestTimeoutMs,
    api: API_PREFIX,
    geocoderPreference: config.geocoding.preference,
    googleGeocoding: config.googleMaps.enabled,
    maxWaypointsPerSegment: config.optimizer.maxWaypointsPerSegment,
  });
});

// Handle uncaught errors
process.on('uncaughtException', (error) => {
  logger.error('Uncaught exception', error);
  process.exit(1);
});

process.on('unhandledRejection', (reason) => {
  logger.error('Unhandled rejection', { reason: reason instanceof Error ? reason.message : String(reason) });
  process.exit(1);
});

// =============================================================================
// GRACEFUL SHUTDOWN
// =============================================================================

const gracefulShutdown = (signal: string): void => {
  logger.info(`${signal} received. Starting graceful shutdown...`);

  server.close(() => {
    logger.info('HTTP server closed');
    process.exit(0);
  });

  // Force shutdown after 30 seconds
  setTimeout(() => {
    logger.error('Forced shutdown after timeout');
    process.exit(1);
  }, 30000).unref();
};

process.on('SIGTERM', () => gracefulShutdown('SIGTERM'));
process.on('SIGINT', () => gracefulShutdown('SIGINT'));
