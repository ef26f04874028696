/**
 * SignalEngine Tests
 * End-to-end evaluations over synthetic series
 */

import { DEFAULT_ENGINE_CONFIG, resolveEngineConfig } from '../../config/EngineConfig';
import { InsufficientDataError, InvalidConfigError } from '../../errors';
import {
  barTime,
  candlesFromCloses,
  CHOPPY_CONFIG,
  choppyCandles,
  toSeries,
  uptrendWithPullback,
} from '../../__tests__/fixtures';
import { SignalEngine } from '../SignalEngine';

describe('SignalEngine', () => {
  const engine = new SignalEngine();
  const uptrend = uptrendWithPullback();

  describe('pullback resumption', () => {
    const series = toSeries(uptrend.slice(0, 251));

    it('should issue BUY when EMA7 crosses back above EMA21 on heavy volume', () => {
      const decision = engine.evaluate(series, DEFAULT_ENGINE_CONFIG);

      expect(decision.symbol).toBe('BTCUSDT');
      expect(decision.timeframe).toBe('1h');
      expect(decision.verdict).toBe('BUY');
      expect(decision.regime).toBe('STRONG');
      expect(decision.volume).toBe('HIGH');
      expect(decision.score).toBeGreaterThanOrEqual(80);
      expect(decision.score).toBeLessThanOrEqual(100);
      expect(decision.timestamp).toEqual(barTime(250));
      expect(decision.signals).toEqual([
        'ADX_STRONG',
        'EMA7_CROSS_ABOVE_EMA21',
        'MACD_BULLISH',
        'TREND_STRONG_UP',
        'VOLUME_SURGE',
      ]);
      expect(decision.doubleDown).toBe(true);
    });

    it('should explain the verdict in display order', () => {
      const { reasons } = engine.evaluate(series, DEFAULT_ENGINE_CONFIG);

      expect(reasons).toHaveLength(4);
      expect(reasons[0]).toBe('EMA7 crossed above EMA21');
      expect(reasons[1]).toMatch(/^Strong uptrend \(ADX \d+\.\d, EMAs stacked bullish\)$/);
      expect(reasons[2]).toBe('MACD histogram positive');
      expect(reasons[3]).toBe('Volume surge (3.00x average)');
    });

    it('should expose the indicator readings behind the decision', () => {
      const { current, trend } = engine.analyze(series, DEFAULT_ENGINE_CONFIG);

      expect(trend.alignment).toBe('UP');
      expect(trend.volumeRatio).toBeCloseTo(3, 10);
      expect(current.close).toBe(211.5);
      expect(current.volumeMa).toBe(1000);
      expect(current.support).toBe(199);
      expect(current.resistance).toBe(215);
    });

    it('should be deterministic', () => {
      expect(engine.evaluate(series, DEFAULT_ENGINE_CONFIG)).toEqual(engine.evaluate(series, DEFAULT_ENGINE_CONFIG));
    });
  });

  it('should fire the EMA7/EMA21 bullish crossover once across the replay', () => {
    const crossBars: number[] = [];
    for (let bar = 200; bar < 300; bar++) {
      const { signals } = engine.analyze(toSeries(uptrend.slice(0, bar + 1)), DEFAULT_ENGINE_CONFIG);
      if (signals.has('EMA7_CROSS_ABOVE_EMA21')) {
        crossBars.push(bar);
      }
    }

    expect(crossBars).toEqual([250]);
  });

  it('should flag a potential bottom when a long decline stalls', () => {
    // 250 bars falling 0.5 per bar, then three flat closes
    const closes = Array.from({ length: 253 }, (_v, i) => 300 - 0.5 * Math.min(i, 249));
    const { decision, current } = engine.analyze(toSeries(candlesFromCloses(closes)), DEFAULT_ENGINE_CONFIG);

    expect(current.wvix?.value).toBeLessThan(current.wvix?.lower ?? 0);
    expect(current.stochastic?.k).toBeLessThan(20);
    expect(decision.signals).toEqual([
      'ADX_STRONG',
      'MACD_BULLISH',
      'RSI_OVERSOLD',
      'TREND_STRONG_DOWN',
      'WVIX_STOCH_BOTTOM',
    ]);
    expect(decision.verdict).toBe('BUY');
    expect(decision.doubleDown).toBe(false);
  });

  it('should only read the trailing window', () => {
    const lead = (offset: number) => candlesFromCloses(Array.from({ length: 20 }, (_v, i) => offset + i));
    const first = toSeries([...lead(10), ...uptrend]);
    const second = toSeries([...lead(5000), ...uptrend]);

    const expected = engine.evaluate(toSeries(uptrend), DEFAULT_ENGINE_CONFIG);
    expect(engine.evaluate(first, DEFAULT_ENGINE_CONFIG)).toEqual(expected);
    expect(engine.evaluate(second, DEFAULT_ENGINE_CONFIG)).toEqual(expected);
  });

  it('should hold throughout a directionless market', () => {
    const candles = choppyCandles();
    let crossovers = 0;

    for (let bar = 34; bar < candles.length; bar++) {
      const { decision, signals, trend } = engine.analyze(toSeries(candles.slice(0, bar + 1)), CHOPPY_CONFIG);

      expect(decision.verdict).toBe('HOLD');
      expect(decision.regime).toBe('WEAK');
      expect(trend.adx).toBeLessThan(15);
      crossovers += [...signals].filter((signal) => signal.includes('_CROSS_')).length;
    }

    expect(crossovers).toBeGreaterThan(0);
  });

  it('should reject a series shorter than the configured lookbacks', () => {
    const series = toSeries(uptrend.slice(0, 200));

    expect(() => engine.evaluate(series, DEFAULT_ENGINE_CONFIG)).toThrow(InsufficientDataError);
  });

  it('should reject an invalid configuration before computing anything', () => {
    const config = resolveEngineConfig({ macd: { fast: 30 } });

    expect(() => engine.evaluate(toSeries(uptrend), config)).toThrow(InvalidConfigError);
  });
});
