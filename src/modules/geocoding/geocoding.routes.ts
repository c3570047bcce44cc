/**
 * =============================================================================
 * GEOCODING ROUTES
 * =============================================================================
 *
 * - POST /resolve - one address line (or "lat, lng") → coordinates
 * - GET  /status  - provider order, enabled providers, circuit states
 *
 * Lookups spend Nominatim/Google quota, so /resolve sits behind the
 * geocoding rate limiter.
 * =============================================================================
 */

import { Router, Request, Response } from 'express';
import { ApiResponse } from '../../core/responses/ApiResponse';
import { asyncHandler } from '../../shared/middleware/error.middleware';
import { geocodingRateLimiter } from '../../shared/middleware/rate-limiter.middleware';
import { validateSchema } from '../../shared/utils/validation.utils';
import { geocodingService, GeocodingService } from './geocoding.service';
import { resolveAddressSchema } from './geocoding.schema';

export function createGeocodingRouter(service: GeocodingService = geocodingService): Router {
  const router = Router();

  router.post('/resolve', geocodingRateLimiter, asyncHandler(async (req: Request, res: Response) => {
    const { address, cityHint } = validateSchema(resolveAddressSchema, req.body);
    const resolved = await service.resolve(address, cityHint);

    ApiResponse.success(res, {
      address,
      latitude: resolved.point.latitude,
      longitude: resolved.point.longitude,
      source: resolved.source,
      query: resolved.query,
      cached: resolved.cached,
      ...(resolved.displayName !== undefined && { displayName: resolved.displayName })
    });
  }));

  router.get('/status', (_req: Request, res: Response) => {
    ApiResponse.success(res, service.getStatus());
  });

  return router;
}
