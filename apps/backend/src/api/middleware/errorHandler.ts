/**
 * Error Handling Middleware
 * Maps errors to the { error, message, issues? } response format
 */

import type { ApiError } from '@trend-alert/shared';
import type { NextFunction, Request, Response } from 'express';
import { InsufficientDataError, InvalidConfigError } from '../../signals/errors';
import { RequestValidationError } from './validation';

/**
 * Not Found Handler
 */
export function notFoundHandler(req: Request, res: Response): void {
  res.status(404).json({
    error: 'NOT_FOUND',
    message: `Route ${req.method} ${req.path} not found`,
  } satisfies ApiError);
}

/**
 * express.json() flags unparseable bodies with type 'entity.parse.failed'
 */
function isBodyParseError(err: Error): boolean {
  return 'type' in err && err.type === 'entity.parse.failed';
}

/**
 * Global Error Handler
 * Catches all unhandled errors
 */
export function errorHandler(err: Error, _req: Request, res: Response, next: NextFunction): void {
  // Avoid sending headers twice
  if (res.headersSent) {
    next(err);
    return;
  }

  if (err instanceof InvalidConfigError || err instanceof RequestValidationError) {
    const body: ApiError = { error: err.code, message: err.message };
    if (err.issues.length > 0) {
      body.issues = err.issues;
    }
    res.status(err.statusCode).json(body);
    return;
  }

  if (err instanceof InsufficientDataError) {
    res.status(err.statusCode).json({ error: err.code, message: err.message } satisfies ApiError);
    return;
  }

  if (isBodyParseError(err)) {
    res.status(400).json({
      error: 'INVALID_REQUEST',
      message: 'Request body is not valid JSON',
    } satisfies ApiError);
    return;
  }

  console.error('[API] Unhandled error:', err);
  res.status(500).json({
    error: 'INTERNAL_SERVER_ERROR',
    message: 'An unexpected error occurred',
  } satisfies ApiError);
}
