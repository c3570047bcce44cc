/**
 * =============================================================================
 * ROUTING ROUTES
 * =============================================================================
 *
 * POST /optimize
 *   body: { origin, stops?, text?, cityHint? }  (see routing.schema.ts)
 *   200:  RoutePlan - ordered stops, segments with Google Maps links, totals
 *   400:  malformed body or a location that is neither coordinates nor an
 *         address (VAL_2001, field "stops.<i>"); numeric coordinate out of
 *         range (ROUTE_3001, details.stopIndex)
 *   404:  an address could not be geocoded (GEO_4001)
 *   429:  geocoding providers are rate limiting (GEO_4002)
 *
 * Only bodies with an address or `text` count against the geocoding limiter.
 * Closing the connection stops any remaining lookups.
 * =============================================================================
 */

import { Router, Request, Response, NextFunction } from 'express';
import { ApiResponse } from '../../core/responses/ApiResponse';
import { asyncHandler } from '../../shared/middleware/error.middleware';
import { geocodingRateLimiter } from '../../shared/middleware/rate-limiter.middleware';
import { validateSchema } from '../../shared/utils/validation.utils';
import { optimizeRouteSchema, requiresGeocoding } from './routing.schema';
import { routingService, RoutingService } from './routing.service';

function limitGeocodingRequests(req: Request, res: Response, next: NextFunction): void {
  if (!requiresGeocoding(req.body)) {
    next();
    return;
  }
  void geocodingRateLimiter(req, res, next);
}

export function createRoutingRouter(service: RoutingService = routingService): Router {
  const router = Router();

  router.post('/optimize', limitGeocodingRequests, asyncHandler(async (req: Request, res: Response) => {
    const input = validateSchema(optimizeRouteSchema, req.body);

    const controller = new AbortController();
    res.on('close', () => {
      if (!res.writableEnded) {
        controller.abort();
      }
    });

    const plan = await service.planRoute(input, controller.signal);

    ApiResponse.success(res, plan, 'Route optimized');
  }));

  return router;
}
