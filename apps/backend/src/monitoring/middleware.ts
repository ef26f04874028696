/**
 * Metrics Middleware
 * Tracks HTTP request metrics
 */

import type { NextFunction, Request, Response } from 'express';
import { httpRequestCounter, httpRequestDuration } from './metrics';

/**
 * Label requests by their mounted route pattern so path parameters
 * (symbols, timeframes) do not explode label cardinality
 */
function routeLabel(req: Request): string {
  const pattern: unknown = req.route?.path;
  if (typeof pattern === 'string') {
    return `${req.baseUrl}${pattern}`;
  }
  return 'unmatched';
}

export function metricsMiddleware(req: Request, res: Response, next: NextFunction): void {
  const stopTimer = httpRequestDuration.startTimer({ method: req.method });

  res.on('finish', () => {
    const route = routeLabel(req);

    httpRequestCounter.inc({
      method: req.method,
      route,
      status_code: res.statusCode.toString(),
    });
    stopTimer({ route });
  });

  next();
}
