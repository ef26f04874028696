/**
 * Signal Engine Module
 * Indicators, signal extraction, decision aggregation and alert state
 */

export * from './errors';
export * from './catalog';
export * from './config';
export * from './indicators';
export * from './extraction/extractSignals';
export * from './decision/aggregate';
export * from './codec/decisionCodec';
export * from './state/SymbolStateStore';
export { RedisSymbolStateStore } from './state/RedisSymbolStateStore';
export * from './state/StateTracker';
export * from './services/SignalEngine';
