/**
 * Indicator Snapshot
 * Every configured indicator read at the latest bar and the bar before it
 */

import type { Candle } from '@trend-alert/shared';
import type { EngineConfig } from '../config/EngineConfig';
import { InsufficientDataError } from '../errors';
import { levelsAt } from './levels';
import { rsi, slowStochastic, type StochasticPoint } from './momentum';
import { adx, ema, macd, type MacdPoint } from './trend';
import { atr, williamsVixFix, type WvixPoint } from './volatility';
import { volumeAverage } from './volume';

export interface IndicatorSnapshot {
  openTime: Date;
  close: number;
  volume: number;
  ema: Record<number, number | null>;
  rsi: number | null;
  adx: number | null;
  plusDi: number | null;
  minusDi: number | null;
  macd: MacdPoint | null;
  atr: number | null;
  volumeMa: number | null;
  support: number | null;
  resistance: number | null;
  wvix: WvixPoint | null;
  stochastic: StochasticPoint | null;
}

export interface SnapshotPair {
  current: IndicatorSnapshot;
  previous: IndicatorSnapshot;
}

/**
 * Bars needed for every configured indicator to have a value at both the
 * latest and the previous bar
 */
export function minimumBars(config: EngineConfig): number {
  const maxEma = Math.max(...config.emaPeriods);
  return Math.max(
    maxEma + 1,
    config.rsi.period + 2,
    2 * config.adx.period + 1,
    config.macd.slow + config.macd.signal,
    config.atr.period + 2,
    config.volume.period + 2,
  );
}

/**
 * The WVIX and stochastic readings only feed the bottom signal; a window too
 * short for them leaves them null instead of failing the evaluation.
 */
function optionalBars(config: EngineConfig): { wvix: number; stochastic: number } {
  const { wvix, stochastic } = config;
  return {
    wvix: wvix.period + wvix.bandPeriod - 1,
    stochastic: stochastic.period + stochastic.smoothing + stochastic.signalPeriod - 2,
  };
}

/**
 * Compute the latest and previous snapshots of a series.
 *
 * @throws {InsufficientDataError} when the series is shorter than minimumBars(config)
 */
export function computeSnapshots(candles: readonly Candle[], config: EngineConfig): SnapshotPair {
  const required = minimumBars(config);
  if (candles.length < required) {
    throw new InsufficientDataError('series', required, candles.length);
  }

  const closes = candles.map((c) => c.close);
  const volumes = candles.map((c) => c.volume);

  const emaSeries = new Map<number, Array<number | null>>();
  for (const period of config.emaPeriods) {
    emaSeries.set(period, ema(closes, period));
  }
  const rsiSeries = rsi(closes, config.rsi.period);
  const adxSeries = adx(candles, config.adx.period);
  const macdSeries = macd(closes, config.macd.fast, config.macd.slow, config.macd.signal);
  const atrSeries = atr(candles, config.atr.period);
  const volumeMaSeries = volumeAverage(volumes, config.volume.period);

  const optional = optionalBars(config);
  const { wvix, stochastic } = config;
  const wvixSeries =
    candles.length >= optional.wvix
      ? williamsVixFix(candles, wvix.period, wvix.bandPeriod, wvix.bandMultiplier)
      : [];
  const stochasticSeries =
    candles.length >= optional.stochastic
      ? slowStochastic(candles, stochastic.period, stochastic.smoothing, stochastic.signalPeriod)
      : [];

  const snapshotAt = (index: number): IndicatorSnapshot => {
    const candle = candles[index];
    const emaValues: Record<number, number | null> = {};
    for (const [period, values] of emaSeries) {
      emaValues[period] = values[index] ?? null;
    }
    const trend = adxSeries[index];
    const levels = levelsAt(candles, index, config.levels);

    return {
      openTime: candle.openTime,
      close: candle.close,
      volume: candle.volume,
      ema: emaValues,
      rsi: rsiSeries[index],
      adx: trend?.adx ?? null,
      plusDi: trend?.plusDi ?? null,
      minusDi: trend?.minusDi ?? null,
      macd: macdSeries[index],
      atr: atrSeries[index],
      volumeMa: volumeMaSeries[index],
      support: levels.support,
      resistance: levels.resistance,
      wvix: wvixSeries[index] ?? null,
      stochastic: stochasticSeries[index] ?? null,
    };
  };

  const last = candles.length - 1;
  return {
    current: snapshotAt(last),
    previous: snapshotAt(last - 1),
  };
}
