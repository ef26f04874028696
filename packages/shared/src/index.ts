/**
 * @trend-alert/shared
 * Shared types and infrastructure for the trend alert services
 */

export * from './infrastructure';
export * from './types/api';
export * from './types/domain';
