/**
 * Signal Extraction
 * Latest and previous indicator snapshots -> set of named signals.
 *
 * Crossovers need a strict sign change between the two bars; an exact
 * equality on either bar never fires. Level signals (RSI, ADX, volume,
 * MACD side, WVIX bottom) fire on every bar the condition holds.
 */

import type { Candle, SignalName, SignalSet, TrendAlignment } from '@trend-alert/shared';
import { emaCrossSignal, priceCrossSignal, type CrossDirection } from '../catalog';
import type { EngineConfig } from '../config/EngineConfig';
import type { IndicatorSnapshot } from '../indicators/snapshot';

/**
 * Direction of a zero crossing of (fast - slow) between two bars
 */
export function crossDirection(previous: number | null, current: number | null): CrossDirection | null {
  if (previous === null || current === null) {
    return null;
  }
  if (previous < 0 && current > 0) {
    return 'ABOVE';
  }
  if (previous > 0 && current < 0) {
    return 'BELOW';
  }
  return null;
}

function difference(a: number | null | undefined, b: number | null | undefined): number | null {
  return a === null || a === undefined || b === null || b === undefined ? null : a - b;
}

/**
 * UP when every shorter EMA is strictly above the next longer one,
 * DOWN when strictly below, NONE otherwise (or when any EMA is missing)
 */
export function trendAlignment(snapshot: IndicatorSnapshot, emaPeriods: readonly number[]): TrendAlignment {
  const values: number[] = [];
  for (const period of [...emaPeriods].sort((a, b) => a - b)) {
    const value = snapshot.ema[period];
    if (value === null || value === undefined) {
      return 'NONE';
    }
    values.push(value);
  }

  let up = values.length > 1;
  let down = values.length > 1;
  for (let i = 1; i < values.length; i++) {
    up = up && values[i - 1] > values[i];
    down = down && values[i - 1] < values[i];
  }
  return up ? 'UP' : down ? 'DOWN' : 'NONE';
}

/**
 * Alignment of an established trend: ADX at or above the weak threshold
 * (MODERATE or STRONG regime), NONE otherwise
 */
export function establishedTrend(snapshot: IndicatorSnapshot, config: EngineConfig): TrendAlignment {
  if (snapshot.adx === null || snapshot.adx < config.adx.weakThreshold) {
    return 'NONE';
  }
  return trendAlignment(snapshot, config.emaPeriods);
}

export function extractSignals(
  current: IndicatorSnapshot,
  previous: IndicatorSnapshot,
  candle: Candle,
  config: EngineConfig,
): SignalSet {
  const signals = new Set<SignalName>();
  const periods = [...config.emaPeriods].sort((a, b) => a - b);

  // EMA crossovers, one per pair of consecutive periods
  for (let i = 0; i + 1 < periods.length; i++) {
    const fast = periods[i];
    const slow = periods[i + 1];
    const direction = crossDirection(
      difference(previous.ema[fast], previous.ema[slow]),
      difference(current.ema[fast], current.ema[slow]),
    );
    if (direction) {
      signals.add(emaCrossSignal(fast, slow, direction));
    }
  }

  // Close vs EMA
  for (const period of config.priceCrossPeriods) {
    const direction = crossDirection(
      difference(previous.close, previous.ema[period]),
      difference(candle.close, current.ema[period]),
    );
    if (direction) {
      signals.add(priceCrossSignal(period, direction));
    }
  }

  // MACD
  const histogram = current.macd?.histogram ?? null;
  const macdCross = crossDirection(previous.macd?.histogram ?? null, histogram);
  if (macdCross === 'ABOVE') {
    signals.add('MACD_CROSS_ABOVE_SIGNAL');
  } else if (macdCross === 'BELOW') {
    signals.add('MACD_CROSS_BELOW_SIGNAL');
  }
  if (histogram !== null && histogram > 0) {
    signals.add('MACD_BULLISH');
  } else if (histogram !== null && histogram < 0) {
    signals.add('MACD_BEARISH');
  }

  // RSI; dips in an uptrend and bounces in a downtrend use the trend thresholds
  if (current.rsi !== null) {
    const trend = establishedTrend(current, config);
    const oversold = trend === 'UP' ? config.rsi.trendOversold : config.rsi.oversold;
    const overbought = trend === 'DOWN' ? config.rsi.trendOverbought : config.rsi.overbought;
    if (current.rsi < oversold) {
      signals.add('RSI_OVERSOLD');
    } else if (current.rsi > overbought) {
      signals.add('RSI_OVERBOUGHT');
    }
  }

  // Trend strength
  if (current.adx !== null) {
    if (current.adx > config.adx.strongThreshold) {
      signals.add('ADX_STRONG');
      const alignment = trendAlignment(current, config.emaPeriods);
      if (alignment === 'UP') {
        signals.add('TREND_STRONG_UP');
      } else if (alignment === 'DOWN') {
        signals.add('TREND_STRONG_DOWN');
      }
    } else if (current.adx < config.adx.weakThreshold) {
      signals.add('ADX_WEAK');
    }
  }

  // Volume; no average (or a zero one) means no surge
  const { volumeMa } = current;
  if (volumeMa !== null && volumeMa > 0 && candle.volume > config.volume.multiplier * volumeMa) {
    signals.add('VOLUME_SURGE');
  }

  // Potential bottom: WVIX under its lower band while both stochastic lines are oversold
  const { wvix, stochastic } = current;
  if (
    wvix !== null &&
    stochastic !== null &&
    wvix.value < wvix.lower &&
    stochastic.k < config.stochastic.oversold &&
    stochastic.d < config.stochastic.oversold
  ) {
    signals.add('WVIX_STOCH_BOTTOM');
  }

  // Breakouts: clear the level by the configured percentage, and by the ATR margin when known
  const margin = config.levels.breakoutPercentage / 100;
  const atrMargin = current.atr === null ? null : config.atr.multiplier * current.atr;

  if (current.resistance !== null) {
    const clearance = candle.close - current.resistance;
    if (
      candle.close > current.resistance * (1 + margin) &&
      (atrMargin === null || clearance > atrMargin)
    ) {
      signals.add('PRICE_BROKE_RESISTANCE');
    }
  }
  if (current.support !== null) {
    const clearance = current.support - candle.close;
    if (
      candle.close < current.support * (1 - margin) &&
      (atrMargin === null || clearance > atrMargin)
    ) {
      signals.add('PRICE_BROKE_SUPPORT');
    }
  }

  return signals;
}
