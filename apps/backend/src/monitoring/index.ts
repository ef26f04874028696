/**
 * Monitoring Module
 * Exports monitoring components
 */

export * from './metrics';
export { HealthCheckService } from './HealthCheckService';
export type { HealthStatus, ServiceHealth } from './HealthCheckService';
export { metricsMiddleware } from './middleware';
