/**
 * =============================================================================
 * EXPRESS APPLICATION
 * =============================================================================
 *
 * buildApp() wires middleware and routes without listening, so tests can
 * drive it with supertest and server.ts can own the process lifecycle.
 *
 * ROUTES:
 * - /health, /health/live, /health/ready
 * - /api/v1/routes     - route optimization
 * - /api/v1/geocoding  - address resolution, provider status
 * =============================================================================
 */

import express, { Express } from 'express';
import compression from 'compression';
import cors from 'cors';
import { config } from './config/environment';
import { createGeocodingRouter, geocodingService, GeocodingService } from './modules/geocoding';
import { createRoutingRouter, RoutingService } from './modules/routing';
import { errorHandler, notFoundHandler } from './shared/middleware/error.middleware';
import { rateLimiter } from './shared/middleware/rate-limiter.middleware';
import { requestLogger } from './shared/middleware/request-logger.middleware';
import {
  blockSuspiciousRequests,
  requestIdMiddleware,
  securityHeaders,
} from './shared/middleware/security.middleware';
import { healthRoutes } from './shared/routes/health.routes';

export const API_PREFIX = '/api/v1';

export interface AppDependencies {
  geocodingService?: GeocodingService;
  routingService?: RoutingService;
}

export function buildApp(deps: AppDependencies = {}): Express {
  const geocoder = deps.geocodingService ?? geocodingService;
  const router = deps.routingService ?? new RoutingService(geocoder);

  const app = express();

  // req.ip is the client behind one reverse proxy (rate limiter keys on it)
  app.set('trust proxy', 1);

  // =============================================================================
  // MIDDLEWARE - Security & Performance
  // =============================================================================

  // Request ID for tracking (must be first)
  app.use(requestIdMiddleware);

  app.use(compression({
    threshold: 1024, // Only compress responses > 1KB
  }));

  if (config.security.enableHeaders) {
    app.use(securityHeaders);
  }

  app.use(cors({
    origin: config.cors.origin,
    methods: ['GET', 'POST'],
    allowedHeaders: ['Content-Type', 'X-Request-ID'],
    maxAge: 86400 // 24 hours preflight cache
  }));

  app.use(express.json({ limit: '1mb' }));

  app.use(blockSuspiciousRequests);

  if (config.security.enableRequestLogging) {
    app.use(requestLogger);
  }

  // =============================================================================
  // ROUTES
  // =============================================================================

  app.use('/', healthRoutes);

  app.use(API_PREFIX, rateLimiter);
  app.use(`${API_PREFIX}/routes`, createRoutingRouter(router));
  app.use(`${API_PREFIX}/geocoding`, createGeocodingRouter(geocoder));

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}
