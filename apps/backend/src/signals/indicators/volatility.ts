/**
 * Volatility Indicators
 */

import { ATR, BollingerBands, Highest } from 'technicalindicators';
import type { Candle } from '@trend-alert/shared';
import { finiteOrNull, padLeft, requireBars, requirePeriod } from './series';

/**
 * Average true range (Wilder smoothing), first value at index n
 */
export function atr(candles: readonly Candle[], period: number): Array<number | null> {
  requirePeriod('atr', 'period', period);
  requireBars(`atr(${period})`, period + 1, candles.length);

  const output = ATR.calculate({
    period,
    high: candles.map((c) => c.high),
    low: candles.map((c) => c.low),
    close: candles.map((c) => c.close),
  });
  return padLeft(candles.length, output).map(finiteOrNull);
}

export interface WvixPoint {
  value: number;
  lower: number;
  upper: number;
}

/**
 * Williams VIX Fix: how far the close sits below the highest high of the
 * last `period` bars, in percent of that high, with a Bollinger band of
 * `bandPeriod` values around it. The band uses the population deviation.
 */
export function williamsVixFix(
  candles: readonly Candle[],
  period: number,
  bandPeriod: number,
  bandMultiplier: number,
): Array<WvixPoint | null> {
  requirePeriod('wvix', 'period', period);
  requirePeriod('wvix', 'bandPeriod', bandPeriod, 2);
  requireBars(`wvix(${period}, ${bandPeriod})`, period + bandPeriod - 1, candles.length);

  const highest = Highest.calculate({ period, values: candles.map((c) => c.high) });
  const fix = highest.map((high, j) => ((high - candles[period - 1 + j].close) / high) * 100);
  const bands = BollingerBands.calculate({ period: bandPeriod, values: fix, stdDev: bandMultiplier });

  const values = padLeft(candles.length, fix).map(finiteOrNull);
  return padLeft(candles.length, bands).map((band, i) => {
    const value = values[i];
    if (band === null || value === null || !Number.isFinite(band.lower) || !Number.isFinite(band.upper)) {
      return null;
    }
    return { value, lower: band.lower, upper: band.upper };
  });
}
