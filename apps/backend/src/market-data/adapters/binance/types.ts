/**
 * Binance Market Data Types
 */

export interface BinanceKlineQuery {
  symbol: string;
  interval: string;
  limit: number;
}
