/**
 * Binance Kline Client
 * Closed candles from the public Spot REST API (no credentials needed)
 */

import { TIMEFRAME_MS, type Candle, type Series, type Timeframe } from '@trend-alert/shared';
import { StaleDataError } from '../../../signals/errors';
import type { CandleSource } from '../../CandleSource';
import type { BinanceKlineQuery } from './types';

/** Binance caps a klines page at 1000 rows */
const MAX_LIMIT = 1000;

export interface BinanceKlineClientConfig {
  baseUrl?: string;
  timeout?: number;
  now?: () => number;
}

interface ParsedKline {
  candle: Candle;
  closeTime: number;
}

/**
 * Kline rows are [openTime, open, high, low, close, volume, closeTime, ...]
 * with prices as decimal strings
 */
function parseKline(row: unknown): ParsedKline {
  if (!Array.isArray(row) || row.length < 7) {
    throw new Error('Binance API error: malformed kline row');
  }
  const [openTime, open, high, low, close, volume, closeTime] = row;
  if (typeof openTime !== 'number' || typeof closeTime !== 'number') {
    throw new Error('Binance API error: malformed kline timestamps');
  }

  const prices = [open, high, low, close, volume].map((value) => parseFloat(String(value)));
  if (prices.some((value) => !Number.isFinite(value))) {
    throw new Error('Binance API error: malformed kline prices');
  }

  return {
    candle: {
      openTime: new Date(openTime),
      open: prices[0],
      high: prices[1],
      low: prices[2],
      close: prices[3],
      volume: prices[4],
    },
    closeTime,
  };
}

export class BinanceKlineClient implements CandleSource {
  private readonly baseUrl: string;
  private readonly timeout: number;
  private readonly now: () => number;

  constructor(config: BinanceKlineClientConfig = {}) {
    this.baseUrl = config.baseUrl || 'https://api.binance.com';
    this.timeout = config.timeout || 10000; // 10s default
    this.now = config.now ?? Date.now;
  }

  /**
   * The still-open kline is dropped; a series whose newest closed bar is more
   * than two intervals old is rejected as stale.
   */
  async getSeries(symbol: string, timeframe: Timeframe, lookback: number, signal?: AbortSignal): Promise<Series> {
    const upper = symbol.toUpperCase();
    const rows = await this.request('/api/v3/klines', {
      symbol: upper,
      interval: timeframe,
      limit: Math.min(lookback + 1, MAX_LIMIT),
    }, signal);

    const now = this.now();
    const candles = rows
      .map(parseKline)
      .filter((kline) => kline.closeTime < now)
      .map((kline) => kline.candle)
      .slice(-lookback);

    const latest = candles.length > 0 ? candles[candles.length - 1].openTime : null;
    const interval = TIMEFRAME_MS[timeframe];
    if (latest === null || now - latest.getTime() > 2 * interval) {
      throw new StaleDataError(
        `No closed ${timeframe} candle for ${upper} within the last two intervals`,
        upper,
        latest,
      );
    }

    return { symbol: upper, timeframe, candles };
  }

  private async request(endpoint: string, query: BinanceKlineQuery, signal?: AbortSignal): Promise<unknown[]> {
    const queryString = Object.entries(query)
      .map(([key, value]) => `${key}=${encodeURIComponent(String(value))}`)
      .join('&');
    const url = `${this.baseUrl}${endpoint}?${queryString}`;

    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeout);
    const forwardAbort = () => controller.abort();
    signal?.addEventListener('abort', forwardAbort, { once: true });

    try {
      const response = await fetch(url, { method: 'GET', signal: controller.signal });

      if (!response.ok) {
        const errorText = await response.text();
        throw new Error(`Binance API error: ${response.status} - ${errorText}`);
      }

      const body: unknown = await response.json();
      if (!Array.isArray(body)) {
        throw new Error('Binance API error: expected an array of klines');
      }
      return body;
    } catch (error) {
      // Caller cancellations propagate untouched; only our own timer maps to a timeout
      if (error instanceof Error && error.name === 'AbortError' && !signal?.aborted) {
        throw new Error('Binance API timeout');
      }
      throw error;
    } finally {
      clearTimeout(timeoutId);
      signal?.removeEventListener('abort', forwardAbort);
    }
  }
}
