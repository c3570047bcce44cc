/**
 * =============================================================================
 * HEALTH CHECK ROUTES
 * =============================================================================
 *
 * ENDPOINTS:
 * - GET /health       - Quick health check (for load balancers)
 * - GET /health/live  - Liveness probe (is the process running?)
 * - GET /health/ready - Readiness probe (cache usable; geocoder circuits reported)
 *
 * An open geocoder circuit does not make the service unready: requests with
 * coordinates never touch a provider, and the other provider may still answer.
 * =============================================================================
 */

import { Router, Request, Response } from 'express';
import { circuitBreakerRegistry, CircuitState } from '../resilience/circuit-breaker';
import { cacheService } from '../services/cache.service';
import { logger } from '../services/logger.service';
import { HTTP_STATUS } from '../../core/constants';

const router = Router();

// Track server start time
const startTime = Date.now();

/**
 * Basic health check - for load balancers
 */
router.get('/health', (_req: Request, res: Response) => {
  res.status(HTTP_STATUS.OK).json({
    status: 'healthy',
    timestamp: new Date().toISOString()
  });
});

/**
 * Liveness probe - is the process alive?
 */
router.get('/health/live', (_req: Request, res: Response) => {
  res.status(HTTP_STATUS.OK).json({
    status: 'alive',
    pid: process.pid,
    uptime: Math.floor((Date.now() - startTime) / 1000)
  });
});

/**
 * Readiness probe - can the service accept traffic?
 */
router.get('/health/ready', async (_req: Request, res: Response) => {
  let cacheReady: boolean;
  try {
    await cacheService.set('health_check', 'ok', 10);
    cacheReady = (await cacheService.get('health_check')) === 'ok';
  } catch (error) {
    logger.error('Readiness cache check failed', {
      error: error instanceof Error ? error.message : String(error)
    });
    cacheReady = false;
  }

  const openCircuits = circuitBreakerRegistry
    .getAllStats()
    .filter(cb => cb.state === CircuitState.OPEN)
    .map(cb => cb.name);

  res.status(cacheReady ? HTTP_STATUS.OK : HTTP_STATUS.SERVICE_UNAVAILABLE).json({
    status: cacheReady ? 'ready' : 'not_ready',
    checks: {
      cache: cacheReady,
      circuits: openCircuits.length === 0
    },
    openCircuits,
    timestamp: new Date().toISOString()
  });
});

export { router as healthRoutes };
