/**
 * Candle Repository
 * Data access layer for candles (TimescaleDB hypertable)
 */

import type { Candle, Series, Timeframe } from '@trend-alert/shared';
import type { Pool } from 'pg';
import type { CandleSource } from '../CandleSource';

interface CandleRow {
  timestamp: Date;
  open: string;
  high: string;
  low: string;
  close: string;
  volume: string;
}

function toCandle(row: CandleRow): Candle {
  return {
    openTime: row.timestamp,
    open: parseFloat(row.open),
    high: parseFloat(row.high),
    low: parseFloat(row.low),
    close: parseFloat(row.close),
    volume: parseFloat(row.volume),
  };
}

export class CandleRepository implements CandleSource {
  constructor(private readonly pool: Pool) {}

  /**
   * Latest N candles for a symbol/timeframe, returned oldest first
   */
  async getSeries(symbol: string, timeframe: Timeframe, lookback: number): Promise<Series> {
    const result = await this.pool.query<CandleRow>(
      `
        SELECT timestamp, open, high, low, close, volume
        FROM candles
        WHERE symbol = $1 AND timeframe = $2
        ORDER BY timestamp DESC
        LIMIT $3
      `,
      [symbol.toUpperCase(), timeframe, lookback],
    );

    return {
      symbol: symbol.toUpperCase(),
      timeframe,
      candles: result.rows.map(toCandle).reverse(),
    };
  }
}
