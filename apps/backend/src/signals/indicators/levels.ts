/**
 * Support / Resistance
 * Pivot-based levels from the trailing window before a bar.
 *
 * Bar i is a pivot high when its high is strictly above the `width` highs
 * before it and at least the `width` highs after it (pivot low mirrors this
 * on lows). A pivot is broken once a later close goes beyond it.
 */

import type { Candle } from '@trend-alert/shared';
import { requireBars, requirePeriod } from './series';

export interface LevelOptions {
  lookback: number;
  pivotWidth: number;
}

export interface Levels {
  support: number | null;
  resistance: number | null;
}

function isPivotHigh(candles: readonly Candle[], i: number, width: number): boolean {
  const high = candles[i].high;
  for (let k = 1; k <= width; k++) {
    if (candles[i - k].high >= high || candles[i + k].high > high) {
      return false;
    }
  }
  return true;
}

function isPivotLow(candles: readonly Candle[], i: number, width: number): boolean {
  const low = candles[i].low;
  for (let k = 1; k <= width; k++) {
    if (candles[i - k].low <= low || candles[i + k].low < low) {
      return false;
    }
  }
  return true;
}

/**
 * Levels in force at bar `index`, derived only from bars before it.
 * Resistance is the most recent unbroken pivot high above the prior close,
 * support the most recent unbroken pivot low below it.
 */
export function levelsAt(candles: readonly Candle[], index: number, options: LevelOptions): Levels {
  const { lookback, pivotWidth: width } = options;
  const last = index - 1;
  const windowStart = Math.max(0, index - lookback);

  if (last < 0 || index >= candles.length) {
    return { support: null, resistance: null };
  }

  const priorClose = candles[last].close;
  let resistance: number | null = null;
  let support: number | null = null;
  // Running extremes of the closes after the candidate pivot, up to the prior bar
  let maxCloseAfter = -Infinity;
  let minCloseAfter = Infinity;

  for (let i = last; i >= windowStart; i--) {
    const pivotCandidate = i - width >= windowStart && i + width <= last;

    if (pivotCandidate) {
      if (resistance === null && isPivotHigh(candles, i, width)) {
        const high = candles[i].high;
        if (maxCloseAfter <= high && high > priorClose) {
          resistance = high;
        }
      }
      if (support === null && isPivotLow(candles, i, width)) {
        const low = candles[i].low;
        if (minCloseAfter >= low && low < priorClose) {
          support = low;
        }
      }
    }

    if (resistance !== null && support !== null) {
      break;
    }
    maxCloseAfter = Math.max(maxCloseAfter, candles[i].close);
    minCloseAfter = Math.min(minCloseAfter, candles[i].close);
  }

  return { support, resistance };
}

/**
 * Levels for every bar, aligned to the input (null before a pivot can exist)
 */
export function supportResistance(candles: readonly Candle[], options: LevelOptions): Array<Levels | null> {
  requirePeriod('supportResistance', 'pivotWidth', options.pivotWidth);
  requirePeriod('supportResistance', 'lookback', options.lookback, 2 * options.pivotWidth + 1);
  requireBars('supportResistance', 2 * options.pivotWidth + 2, candles.length);

  const firstIndex = 2 * options.pivotWidth + 1;
  return candles.map((_candle, index) => (index < firstIndex ? null : levelsAt(candles, index, options)));
}
