/**
 * Middleware Exports
 */

export * from './validation';
export * from './errorHandler';
export * from './rateLimiter';
