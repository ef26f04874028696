/**
 * Trend Indicators
 * EMA, MACD and ADX over technicalindicators, aligned to the input bars
 */

import { ADX, EMA, MACD } from 'technicalindicators';
import type { Candle } from '@trend-alert/shared';
import { InvalidConfigError } from '../errors';
import { finiteOrNull, padLeft, requireBars, requirePeriod } from './series';

export interface MacdPoint {
  line: number;
  signal: number;
  histogram: number;
}

export interface AdxPoint {
  adx: number;
  plusDi: number;
  minusDi: number;
}

/**
 * Exponential moving average, k = 2 / (n + 1).
 * Seeded with the simple average of the first n values, so the first value
 * appears at index n - 1.
 */
export function ema(values: readonly number[], period: number): Array<number | null> {
  requirePeriod('ema', 'period', period);
  requireBars(`ema(${period})`, period, values.length);

  const output = EMA.calculate({ period, values: [...values] });
  return padLeft(values.length, output).map(finiteOrNull);
}

/**
 * MACD line = EMA(fast) - EMA(slow); signal = EMA(signal) of the line.
 * Points are null until the signal line exists.
 */
export function macd(
  values: readonly number[],
  fast: number,
  slow: number,
  signal: number,
): Array<MacdPoint | null> {
  requirePeriod('macd', 'fast', fast);
  requirePeriod('macd', 'slow', slow);
  requirePeriod('macd', 'signal', signal);
  if (fast >= slow) {
    throw new InvalidConfigError([`macd fast (${fast}) must be less than slow (${slow})`]);
  }
  requireBars('macd', slow + signal - 1, values.length);

  const output = MACD.calculate({
    values: [...values],
    fastPeriod: fast,
    slowPeriod: slow,
    signalPeriod: signal,
    SimpleMAOscillator: false,
    SimpleMASignal: false,
  });

  return padLeft(values.length, output).map((point) => {
    if (!point) {
      return null;
    }
    const line = finiteOrNull(point.MACD);
    const signalLine = finiteOrNull(point.signal);
    const histogram = finiteOrNull(point.histogram);
    if (line === null || signalLine === null || histogram === null) {
      return null;
    }
    return { line, signal: signalLine, histogram };
  });
}

/**
 * Average directional index with +DI / -DI (Wilder smoothing).
 * Needs 2n bars: n to smooth directional movement, n more to smooth DX.
 */
export function adx(candles: readonly Candle[], period: number): Array<AdxPoint | null> {
  requirePeriod('adx', 'period', period);
  requireBars(`adx(${period})`, 2 * period, candles.length);

  const output = ADX.calculate({
    period,
    high: candles.map((c) => c.high),
    low: candles.map((c) => c.low),
    close: candles.map((c) => c.close),
  });

  return padLeft(candles.length, output).map((point) => {
    if (!point) {
      return null;
    }
    const value = finiteOrNull(point.adx);
    const plusDi = finiteOrNull(point.pdi);
    const minusDi = finiteOrNull(point.mdi);
    if (value === null || plusDi === null || minusDi === null) {
      return null;
    }
    return { adx: value, plusDi, minusDi };
  });
}
