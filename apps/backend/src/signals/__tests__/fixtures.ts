/**
 * Synthetic series shared by the signal engine tests
 */

import type { Candle, Series, Timeframe } from '@trend-alert/shared';
import { resolveEngineConfig, type EngineConfig } from '../config/EngineConfig';

export const BASE_TIME = Date.UTC(2024, 0, 1);
export const HOUR_MS = 3_600_000;

export function barTime(index: number): Date {
  return new Date(BASE_TIME + index * HOUR_MS);
}

/**
 * Candles whose open is the previous close, with fixed wicks
 */
export function candlesFromCloses(
  closes: readonly number[],
  volumes: readonly number[] = closes.map(() => 1000),
  wick: (index: number) => { up: number; down: number } = () => ({ up: 0.5, down: 0.5 }),
): Candle[] {
  return closes.map((close, i) => {
    const open = i === 0 ? close : closes[i - 1];
    const { up, down } = wick(i);
    return {
      openTime: barTime(i),
      open,
      high: Math.max(open, close) + up,
      low: Math.min(open, close) - down,
      close,
      volume: volumes[i],
    };
  });
}

/**
 * 300 bars: +0.5 per bar up to bar 229, a 15-bar pullback of -1 per bar,
 * then +2 per bar. EMA7 crosses back above EMA21 at bar 250, where volume
 * is 3x the flat 1000 baseline.
 */
export function uptrendWithPullback(): Candle[] {
  const closes: number[] = [];
  for (let i = 0; i < 300; i++) {
    if (i < 230) {
      closes.push(100 + 0.5 * i);
    } else if (i < 245) {
      closes.push(closes[i - 1] - 1);
    } else {
      closes.push(closes[i - 1] + 2);
    }
  }
  const volumes = closes.map((_close, i) => (i === 250 ? 3000 : 1000));
  return candlesFromCloses(closes, volumes);
}

/**
 * 100 directionless bars oscillating around 100 (ADX stays far below 15)
 */
export function choppyCandles(): Candle[] {
  const closes = Array.from({ length: 100 }, (_v, i) => 100 + 1.5 * Math.sin(2.9 * i));
  const volumes = closes.map((_close, i) => (i % 4 === 0 ? 1250 : 1000));
  return candlesFromCloses(closes, volumes, (i) => ({ up: 0.3 + 0.2 * (i % 3), down: 0.3 + 0.2 * ((i + 1) % 3) }));
}

export const CHOPPY_CONFIG: EngineConfig = resolveEngineConfig({
  seriesWindow: 100,
  emaPeriods: [5, 10, 20],
  priceCrossPeriods: [10, 20],
  levels: { lookback: 30, pivotWidth: 3 },
});

export function toSeries(candles: readonly Candle[], symbol = 'BTCUSDT', timeframe: Timeframe = '1h'): Series {
  return { symbol, timeframe, candles };
}
