/**
 * Prometheus Metrics
 * Collects and exposes evaluation, delivery and HTTP metrics
 */

import { collectDefaultMetrics, Counter, Gauge, Histogram, Registry } from 'prom-client';

// Create a Registry to register metrics
export const register = new Registry();

// Default labels for all metrics
register.setDefaultLabels({
  app: 'trend-alert',
});

// ============================================================================
// Evaluation Metrics
// ============================================================================

export const evaluationCounter = new Counter({
  name: 'signal_evaluations_total',
  help: 'Total number of completed evaluations',
  labelNames: ['timeframe', 'verdict'],
  registers: [register],
});

export const evaluationFailureCounter = new Counter({
  name: 'signal_evaluation_failures_total',
  help: 'Total number of evaluations that produced no decision',
  labelNames: ['reason'],
  registers: [register],
});

export const abandonedCycleCounter = new Counter({
  name: 'signal_cycles_abandoned_total',
  help: 'Total number of cycles abandoned before the state step (cancelled or stale data)',
  registers: [register],
});

export const evaluationDuration = new Histogram({
  name: 'signal_evaluation_duration_seconds',
  help: 'Duration of one fetch-evaluate-notify cycle in seconds',
  labelNames: ['timeframe'],
  buckets: [0.05, 0.1, 0.25, 0.5, 1, 2, 5, 10],
  registers: [register],
});

// ============================================================================
// Notification Metrics
// ============================================================================

export const notificationCounter = new Counter({
  name: 'signal_notifications_total',
  help: 'Total number of alert decisions by outcome',
  labelNames: ['outcome'],
  registers: [register],
});

// ============================================================================
// System Metrics
// ============================================================================

export const databaseConnectionGauge = new Gauge({
  name: 'database_connection_status',
  help: 'Database connection status (1 = up, 0 = down)',
  registers: [register],
});

export const redisConnectionGauge = new Gauge({
  name: 'redis_connection_status',
  help: 'Redis connection status (1 = up, 0 = down)',
  registers: [register],
});

// ============================================================================
// HTTP Metrics
// ============================================================================

export const httpRequestCounter = new Counter({
  name: 'http_requests_total',
  help: 'Total number of HTTP requests',
  labelNames: ['method', 'route', 'status_code'],
  registers: [register],
});

export const httpRequestDuration = new Histogram({
  name: 'http_request_duration_seconds',
  help: 'HTTP request duration in seconds',
  labelNames: ['method', 'route'],
  buckets: [0.01, 0.05, 0.1, 0.5, 1, 2, 5],
  registers: [register],
});

/**
 * Collect default Node.js metrics
 */
collectDefaultMetrics({ register });
