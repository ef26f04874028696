/**
 * Signal Extraction Tests
 */

import type { Candle } from '@trend-alert/shared';
import { DEFAULT_ENGINE_CONFIG } from '../../config/EngineConfig';
import type { IndicatorSnapshot } from '../../indicators/snapshot';
import { barTime } from '../../__tests__/fixtures';
import { crossDirection, extractSignals, trendAlignment } from '../extractSignals';

const config = DEFAULT_ENGINE_CONFIG;

function snapshot(overrides: Partial<IndicatorSnapshot> = {}): IndicatorSnapshot {
  return {
    openTime: barTime(0),
    close: 100,
    volume: 1000,
    ema: { 7: 100, 21: 100, 50: 100, 100: 100, 200: 100 },
    rsi: 50,
    adx: 22,
    plusDi: 20,
    minusDi: 20,
    macd: null,
    atr: null,
    volumeMa: 1000,
    support: null,
    resistance: null,
    wvix: null,
    stochastic: null,
    ...overrides,
  };
}

function candleFor(current: IndicatorSnapshot): Candle {
  return {
    openTime: current.openTime,
    open: current.close,
    high: current.close,
    low: current.close,
    close: current.close,
    volume: current.volume,
  };
}

function extract(current: IndicatorSnapshot, previous: IndicatorSnapshot = snapshot()): string[] {
  return [...extractSignals(current, previous, candleFor(current), config)].sort();
}

describe('extractSignals', () => {
  describe('crossDirection', () => {
    it('should need a strict sign change', () => {
      expect(crossDirection(-1, 1)).toBe('ABOVE');
      expect(crossDirection(1, -1)).toBe('BELOW');
      expect(crossDirection(0, 1)).toBeNull();
      expect(crossDirection(-1, 0)).toBeNull();
      expect(crossDirection(1, 2)).toBeNull();
      expect(crossDirection(null, 1)).toBeNull();
    });
  });

  describe('trendAlignment', () => {
    it('should be UP when shorter EMAs sit above longer ones', () => {
      const current = snapshot({ ema: { 7: 105, 21: 104, 50: 103, 100: 102, 200: 101 } });
      expect(trendAlignment(current, config.emaPeriods)).toBe('UP');
    });

    it('should be DOWN when the stack is reversed', () => {
      const current = snapshot({ ema: { 7: 101, 21: 102, 50: 103, 100: 104, 200: 105 } });
      expect(trendAlignment(current, config.emaPeriods)).toBe('DOWN');
    });

    it('should be NONE when the stack is mixed or incomplete', () => {
      expect(trendAlignment(snapshot({ ema: { 7: 105, 21: 106, 50: 103, 100: 102, 200: 101 } }), config.emaPeriods)).toBe(
        'NONE',
      );
      expect(trendAlignment(snapshot({ ema: { 7: 105, 21: 104, 50: 103, 100: 102, 200: null } }), config.emaPeriods)).toBe(
        'NONE',
      );
    });
  });

  it('should emit nothing directional for a quiet bar', () => {
    expect(extract(snapshot())).toEqual([]);
  });

  it('should emit EMA crossovers for consecutive period pairs', () => {
    const previous = snapshot({ close: 150, ema: { 7: 99, 21: 100, 50: 100, 100: 99, 200: 100 } });
    const current = snapshot({ close: 150, ema: { 7: 101, 21: 100, 50: 100, 100: 101, 200: 100 } });

    expect(extract(current, previous)).toEqual([
      'EMA100_CROSS_ABOVE_EMA200',
      'EMA50_CROSS_BELOW_EMA100',
      'EMA7_CROSS_ABOVE_EMA21',
    ]);
  });

  it('should not fire a crossover when the fast EMA only touches the slow one', () => {
    const previous = snapshot({ ema: { 7: 99, 21: 100, 50: 100, 100: 100, 200: 100 } });
    const current = snapshot({ ema: { 7: 100, 21: 100, 50: 100, 100: 100, 200: 100 } });

    expect(extract(current, previous)).toEqual([]);
  });

  it('should emit price crossovers against the configured EMAs only', () => {
    const previous = snapshot({ close: 99 });
    const current = snapshot({ close: 101 });

    // EMA7 and EMA21 are not price-cross periods
    expect(extract(current, previous)).toEqual([
      'PRICE_CROSS_ABOVE_EMA100',
      'PRICE_CROSS_ABOVE_EMA200',
      'PRICE_CROSS_ABOVE_EMA50',
    ]);
  });

  it('should emit MACD cross and level signals', () => {
    const previous = snapshot({ macd: { line: 1, signal: 1.2, histogram: -0.2 } });
    const current = snapshot({ macd: { line: 1.5, signal: 1.2, histogram: 0.3 } });

    expect(extract(current, previous)).toEqual(['MACD_BULLISH', 'MACD_CROSS_ABOVE_SIGNAL']);
    expect(extract(snapshot({ macd: { line: 0, signal: 0.1, histogram: -0.1 } }))).toEqual(['MACD_BEARISH']);
  });

  it('should emit RSI signals beyond the thresholds only', () => {
    expect(extract(snapshot({ rsi: 29.9 }))).toEqual(['RSI_OVERSOLD']);
    expect(extract(snapshot({ rsi: 70.1 }))).toEqual(['RSI_OVERBOUGHT']);
    expect(extract(snapshot({ rsi: 30 }))).toEqual([]);
    expect(extract(snapshot({ rsi: 70 }))).toEqual([]);
  });

  describe('RSI in an established trend', () => {
    const stackedUp = { 7: 105, 21: 104, 50: 103, 100: 102, 200: 101 };
    const stackedDown = { 7: 101, 21: 102, 50: 103, 100: 104, 200: 105 };

    it('should treat a dip below the trend threshold as oversold in an uptrend', () => {
      const previous = snapshot({ ema: stackedUp, close: 106 });

      expect(extract(snapshot({ rsi: 35, ema: stackedUp, close: 106 }), previous)).toEqual(['RSI_OVERSOLD']);
      expect(extract(snapshot({ rsi: 40, ema: stackedUp, close: 106 }), previous)).toEqual([]);
    });

    it('should treat a bounce above the trend threshold as overbought in a downtrend', () => {
      const previous = snapshot({ ema: stackedDown, close: 100 });

      expect(extract(snapshot({ rsi: 65, ema: stackedDown, close: 100 }), previous)).toEqual(['RSI_OVERBOUGHT']);
    });

    it('should keep the plain thresholds without a trend', () => {
      const previous = snapshot({ ema: stackedUp, close: 106 });

      // ADX below the weak threshold: no established trend despite the stack
      expect(extract(snapshot({ rsi: 35, adx: 15, ema: stackedUp, close: 106 }), previous)).toEqual(['ADX_WEAK']);
      expect(extract(snapshot({ rsi: 65 }))).toEqual([]);
    });
  });

  it('should emit trend strength signals', () => {
    const stackedUp = { 7: 105, 21: 104, 50: 103, 100: 102, 200: 101 };
    expect(extract(snapshot({ adx: 30, ema: stackedUp, close: 106 }), snapshot({ ema: stackedUp, close: 106 }))).toEqual([
      'ADX_STRONG',
      'TREND_STRONG_UP',
    ]);
    expect(extract(snapshot({ adx: 30 }))).toEqual(['ADX_STRONG']);
    expect(extract(snapshot({ adx: 15 }))).toEqual(['ADX_WEAK']);
  });

  it('should emit a volume surge strictly above the multiplier', () => {
    expect(extract(snapshot({ volume: 1600 }))).toEqual(['VOLUME_SURGE']);
    expect(extract(snapshot({ volume: 1500 }))).toEqual([]);
  });

  it('should not emit a volume surge without a positive average', () => {
    expect(extract(snapshot({ volume: 1600, volumeMa: 0 }))).toEqual([]);
    expect(extract(snapshot({ volume: 1600, volumeMa: null }))).toEqual([]);
  });

  describe('WVIX bottom', () => {
    const wvix = { value: 1, lower: 1.5, upper: 4 };

    it('should fire when WVIX is under its lower band and both stochastic lines are oversold', () => {
      expect(extract(snapshot({ wvix, stochastic: { k: 12, d: 15 } }))).toEqual(['WVIX_STOCH_BOTTOM']);
    });

    it('should need both conditions strictly', () => {
      expect(extract(snapshot({ wvix, stochastic: { k: 12, d: 20 } }))).toEqual([]);
      expect(extract(snapshot({ wvix: { ...wvix, value: 1.5 }, stochastic: { k: 12, d: 15 } }))).toEqual([]);
      expect(extract(snapshot({ wvix: null, stochastic: { k: 12, d: 15 } }))).toEqual([]);
    });
  });

  describe('breakouts', () => {
    it('should fire when the close clears resistance by the percentage and the ATR margin', () => {
      const current = snapshot({ close: 101, resistance: 100, atr: 1 });
      expect(extract(current, snapshot({ close: 101 }))).toEqual(['PRICE_BROKE_RESISTANCE']);
    });

    it('should not fire inside the percentage margin', () => {
      const current = snapshot({ close: 100.4, resistance: 100, atr: 0.1 });
      expect(extract(current, snapshot({ close: 100.4 }))).toEqual([]);
    });

    it('should not fire inside the ATR margin', () => {
      // 0.5 * ATR 4 = 2 > clearance of 1
      const current = snapshot({ close: 101, resistance: 100, atr: 4 });
      expect(extract(current, snapshot({ close: 101 }))).toEqual([]);
    });

    it('should mirror the rule below support', () => {
      const current = snapshot({ close: 99, support: 100, atr: 1 });
      expect(extract(current, snapshot({ close: 99 }))).toEqual(['PRICE_BROKE_SUPPORT']);
    });
  });
});
