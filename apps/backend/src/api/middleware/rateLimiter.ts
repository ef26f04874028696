/**
 * Rate Limiting Middleware
 * Per-IP limits; evaluation and replay requests each fetch candles upstream
 */

import rateLimit, { type RateLimitRequestHandler } from 'express-rate-limit';

export interface RateLimitSettings {
  windowMs: number;
  /** Requests per window per IP, any method */
  max: number;
  /** POST/PUT requests per window per IP */
  writeMax: number;
}

export interface RateLimiters {
  global: RateLimitRequestHandler;
  write: RateLimitRequestHandler;
}

/**
 * Fresh limiters with their own in-memory counters
 */
export function createRateLimiters(settings: RateLimitSettings): RateLimiters {
  const retryAfterSeconds = Math.ceil(settings.windowMs / 1000);

  const global = rateLimit({
    windowMs: settings.windowMs,
    limit: settings.max,
    standardHeaders: true,
    legacyHeaders: false,
    handler: (_req, res) => {
      res.status(429).json({
        error: 'RATE_LIMITED',
        message: 'Too many requests. Please try again later.',
        retry_after_seconds: retryAfterSeconds,
      });
    },
  });

  const write = rateLimit({
    windowMs: settings.windowMs,
    limit: settings.writeMax,
    standardHeaders: true,
    legacyHeaders: false,
    handler: (_req, res) => {
      res.status(429).json({
        error: 'RATE_LIMITED',
        message: 'Evaluation rate limit exceeded. Please reduce request frequency.',
        retry_after_seconds: retryAfterSeconds,
      });
    },
    skip: (req) => req.method !== 'POST' && req.method !== 'PUT',
  });

  return { global, write };
}
