/**
 * Indicator Library
 * Pure functions over ordered series; outputs are aligned to the input bars
 */

export * from './series';
export * from './trend';
export * from './momentum';
export * from './volatility';
export * from './volume';
export * from './levels';
export * from './snapshot';
