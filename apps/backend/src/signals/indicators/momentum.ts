/**
 * Momentum Indicators
 */

import { AverageGain, AverageLoss, SMA, Stochastic } from 'technicalindicators';
import type { Candle } from '@trend-alert/shared';
import { finiteOrNull, padLeft, requireBars, requirePeriod } from './series';

/**
 * Relative strength index with Wilder-smoothed average gain and loss.
 * RSI is 100 whenever the average loss is exactly 0 (including a flat series).
 */
export function rsi(values: readonly number[], period: number): Array<number | null> {
  requirePeriod('rsi', 'period', period, 2);
  requireBars(`rsi(${period})`, period + 1, values.length);

  const input = { period, values: [...values] };
  const gains = padLeft(values.length, AverageGain.calculate(input));
  const losses = padLeft(values.length, AverageLoss.calculate(input));

  return gains.map((gain, i) => {
    const loss = losses[i];
    if (gain === null || loss === null || !Number.isFinite(gain) || !Number.isFinite(loss)) {
      return null;
    }
    if (loss === 0) {
      return 100;
    }
    return 100 - 100 / (1 + gain / loss);
  });
}

export interface StochasticPoint {
  /** Smoothed %K */
  k: number;
  /** SMA of the smoothed %K */
  d: number;
}

/**
 * Slow stochastic. Raw %K compares the close with the `period` high-low
 * range (0 when the range is empty); %K is its `smoothing` SMA and %D the
 * `signalPeriod` SMA of %K.
 */
export function slowStochastic(
  candles: readonly Candle[],
  period: number,
  smoothing: number,
  signalPeriod: number,
): Array<StochasticPoint | null> {
  requirePeriod('stochastic', 'period', period);
  requirePeriod('stochastic', 'smoothing', smoothing);
  requirePeriod('stochastic', 'signalPeriod', signalPeriod);
  requireBars(`stochastic(${period})`, period + smoothing + signalPeriod - 2, candles.length);

  // The library's d line is the smoothing SMA of raw %K, i.e. the slow %K
  const raw = Stochastic.calculate({
    period,
    signalPeriod: smoothing,
    high: candles.map((c) => c.high),
    low: candles.map((c) => c.low),
    close: candles.map((c) => c.close),
  });
  const k = padLeft(candles.length, raw.map((point) => point.d)).map(finiteOrNull);

  const first = period + smoothing - 2;
  const smoothed = k.slice(first).filter((value): value is number => value !== null);
  const d = padLeft(candles.length, SMA.calculate({ period: signalPeriod, values: smoothed })).map(finiteOrNull);

  return d.map((signal, i) => {
    const line = k[i];
    return line === null || signal === null ? null : { k: line, d: signal };
  });
}
