/**
 * Express Application
 * HTTP surface for health, metrics, engine config, signal state and replay
 */

import express, { type Express } from 'express';
import { metricsMiddleware } from '../monitoring';
import { config } from './config';
import {
  createRateLimiters,
  errorHandler,
  notFoundHandler,
  validateContentType,
  type RateLimitSettings,
} from './middleware';
import { createRoutes, type ApiServices } from './routes';

/**
 * Create and configure Express application
 */
export function createApp(services: ApiServices, rateLimits: RateLimitSettings = config.rateLimit): Express {
  const app = express();

  // Trust proxy (for rate limiting by IP when behind reverse proxy)
  app.set('trust proxy', 1);

  // Request metrics
  app.use(metricsMiddleware);

  // Global middleware
  const limiters = createRateLimiters(rateLimits);
  app.use(limiters.global);
  app.use(limiters.write);

  // Content type is checked before the body is parsed
  app.use(validateContentType);
  app.use(express.json());

  // API routes under /api/v1
  app.use(config.apiPrefix, createRoutes(services));

  // Error handlers (must be last)
  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}
