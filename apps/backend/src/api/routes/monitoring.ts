/**
 * Monitoring Routes
 * Health checks and metrics endpoints
 */

import type { Request, Response } from 'express';
import { Router } from 'express';
import type { HealthCheckService, HealthStatus } from '../../monitoring/HealthCheckService';
import { register } from '../../monitoring/metrics';

async function respondWithHealth(res: Response, check: () => Promise<HealthStatus>): Promise<void> {
  try {
    const health = await check();
    // Degraded still serves alerts from Redis state; only unhealthy fails the health check
    res.status(health.status === 'unhealthy' ? 503 : 200).json(health);
  } catch (error) {
    res.status(503).json({
      status: 'unhealthy',
      timestamp: new Date().toISOString(),
      error: error instanceof Error ? error.message : 'Unknown error',
    });
  }
}

export function createMonitoringRoutes(healthCheckService: HealthCheckService): Router {
  const router = Router();

  /**
   * GET /health
   * Redis and (when configured) database status
   */
  router.get('/health', (_req: Request, res: Response): void => {
    void respondWithHealth(res, () => healthCheckService.checkHealth());
  });

  /**
   * GET /health/detailed
   * Health plus evaluation queue counts
   */
  router.get('/health/detailed', (_req: Request, res: Response): void => {
    void respondWithHealth(res, () => healthCheckService.checkDetailedHealth());
  });

  /**
   * GET /metrics
   * Prometheus metrics endpoint
   */
  router.get('/metrics', (_req: Request, res: Response): void => {
    void (async (): Promise<void> => {
      try {
        const metrics = await register.metrics();
        res.set('Content-Type', register.contentType);
        res.send(metrics);
      } catch (error) {
        res.status(500).json({
          error: 'METRICS_UNAVAILABLE',
          message: error instanceof Error ? error.message : 'Unknown error',
        });
      }
    })();
  });

  return router;
}
