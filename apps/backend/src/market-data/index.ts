/**
 * Market Data Module
 */

export type { CandleSource } from './CandleSource';
export { CandleRepository } from './repositories/CandleRepository';
export { BinanceKlineClient } from './adapters/binance/BinanceKlineClient';
export type { BinanceKlineClientConfig } from './adapters/binance/BinanceKlineClient';
export { closeDatabasePool, createDatabasePool } from './database';
