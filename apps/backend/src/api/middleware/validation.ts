/**
 * Request Validation Middleware
 * Request format checks and the error type route handlers raise for bad input
 */

import { isTimeframe, TIMEFRAME_MS } from '@trend-alert/shared';
import type { NextFunction, Request, Response } from 'express';
import type { WatchPair } from '../../evaluation';
import { isSymbol } from '../config';

/**
 * Malformed path parameters or body; rendered as 400 INVALID_REQUEST
 */
export class RequestValidationError extends Error {
  public readonly code = 'INVALID_REQUEST';
  public readonly statusCode = 400;

  constructor(
    message: string,
    public readonly issues: string[] = [],
  ) {
    super(message);
    this.name = 'RequestValidationError';
    Object.setPrototypeOf(this, RequestValidationError.prototype);
  }
}

/**
 * Validate JSON content type for POST/PUT requests that carry a body
 */
export function validateContentType(req: Request, res: Response, next: NextFunction): void {
  const hasBody = Number(req.headers['content-length'] ?? 0) > 0 || req.headers['transfer-encoding'] !== undefined;

  if ((req.method === 'POST' || req.method === 'PUT') && hasBody) {
    const contentType = req.headers['content-type'];

    if (!contentType || !contentType.includes('application/json')) {
      res.status(415).json({
        error: 'UNSUPPORTED_MEDIA_TYPE',
        message: 'Content-Type must be application/json for POST/PUT requests',
      });
      return;
    }
  }

  next();
}

/**
 * Validate a symbol/timeframe pair from path parameters or a request body
 *
 * @throws {RequestValidationError}
 */
export function parseWatchPair(symbol: unknown, timeframe: unknown): WatchPair {
  const validSymbol = typeof symbol === 'string' && isSymbol(symbol) ? symbol.toUpperCase() : null;
  const validTimeframe = typeof timeframe === 'string' && isTimeframe(timeframe) ? timeframe : null;

  if (validSymbol === null || validTimeframe === null) {
    const issues: string[] = [];
    if (validSymbol === null) {
      issues.push('symbol must be 2-20 letters or digits');
    }
    if (validTimeframe === null) {
      issues.push(`timeframe must be one of ${Object.keys(TIMEFRAME_MS).join(', ')}`);
    }
    throw new RequestValidationError('Invalid symbol or timeframe', issues);
  }

  return { symbol: validSymbol, timeframe: validTimeframe };
}
