/**
 * SignalReplayService Tests
 */

import type { CandleSource } from '../../../market-data';
import { ConfigStore } from '../../../signals/config/ConfigStore';
import { resolveEngineConfig } from '../../../signals/config/EngineConfig';
import { InsufficientDataError } from '../../../signals/errors';
import { SignalEngine } from '../../../signals/services/SignalEngine';
import {
  barTime,
  CHOPPY_CONFIG,
  choppyCandles,
  toSeries,
  uptrendWithPullback,
} from '../../../signals/__tests__/fixtures';
import { SignalReplayService } from '../SignalReplayService';

// A 201-bar window lets the 300-bar fixture hold 100 fully warmed-up bars
const config = resolveEngineConfig({ seriesWindow: 201 });

describe('SignalReplayService', () => {
  const engine = new SignalEngine();
  const uptrend = toSeries(uptrendWithPullback());
  let getSeries: jest.Mock;
  let service: SignalReplayService;

  beforeEach(() => {
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
    jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    getSeries = jest.fn().mockResolvedValue(uptrend);
    const candles: CandleSource = { getSeries };
    service = new SignalReplayService(candles, engine, new ConfigStore(config));
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('should fetch a full window of history before the replayed bars', async () => {
    await service.replay({ symbol: 'BTCUSDT', timeframe: '1h', limit: 100 });

    expect(getSeries).toHaveBeenCalledWith('BTCUSDT', '1h', 300);
  });

  it('should evaluate each replayed bar in order', async () => {
    const result = await service.replay({ symbol: 'BTCUSDT', timeframe: '1h', limit: 100 });

    expect(result.requested).toBe(100);
    expect(result.barsEvaluated).toBe(100);
    expect(result.steps[0].decision.timestamp).toEqual(barTime(200));
    expect(result.steps[99].decision.timestamp).toEqual(barTime(299));
    expect(result.verdictCounts.BUY + result.verdictCounts.SELL + result.verdictCounts.HOLD).toBe(100);
    expect(result.alerts).toBe(result.steps.filter((step) => step.notified).length);
    expect(console.warn).not.toHaveBeenCalled();
  });

  it('should alert on the first bar and on the pullback resumption', async () => {
    const result = await service.replay({ symbol: 'BTCUSDT', timeframe: '1h', limit: 100 });
    const resumption = result.steps[50];

    expect(result.steps[0].notified).toBe(true);
    expect(resumption.decision.verdict).toBe('BUY');
    expect(resumption.decision.signals).toContain('EMA7_CROSS_ABOVE_EMA21');
    expect(resumption.notified).toBe(true);
  });

  it('should match a live evaluation of the same bar', async () => {
    const result = await service.replay({ symbol: 'BTCUSDT', timeframe: '1h', limit: 100 });
    const live = engine.evaluate(toSeries(uptrend.candles.slice(0, 251)), config);

    expect(result.steps[50].decision).toEqual(live);
  });

  describe('with a source that returns fewer bars than requested', () => {
    it('should replay the bars it can fill and report both counts', async () => {
      // As if the source capped the request at 250 bars
      getSeries.mockResolvedValue(toSeries(uptrend.candles.slice(50)));

      const result = await service.replay({ symbol: 'BTCUSDT', timeframe: '1h', limit: 100 });

      expect(result.requested).toBe(100);
      expect(result.barsEvaluated).toBe(50);
      expect(result.steps[0].decision.timestamp).toEqual(barTime(250));
      expect(result.steps[49].decision.timestamp).toEqual(barTime(299));
      expect(console.warn).toHaveBeenCalledWith(
        '[Replay] BTCUSDT:1h source returned 250 of 300 bars, replaying 50 of 100',
      );
    });

    it('should give every step the same window a live cycle would see', async () => {
      getSeries.mockResolvedValue(toSeries(uptrend.candles.slice(50)));

      const result = await service.replay({ symbol: 'BTCUSDT', timeframe: '1h', limit: 100 });

      for (const [i, step] of result.steps.entries()) {
        const live = engine.evaluate(toSeries(uptrend.candles.slice(0, 251 + i)), config);
        expect(step.decision).toEqual(live);
      }
      expect(result.steps[0].decision.verdict).toBe('BUY');
    });

    it('should start at the first bar with a full window', async () => {
      getSeries.mockResolvedValue(toSeries(uptrend.candles.slice(0, 210)));

      const result = await service.replay({ symbol: 'BTCUSDT', timeframe: '1h', limit: 100 });

      expect(result.barsEvaluated).toBe(10);
      expect(result.steps[0].decision.timestamp).toEqual(barTime(200));
    });

    it('should fail when not even one window is available', async () => {
      getSeries.mockResolvedValue(toSeries(uptrend.candles.slice(0, 150)));

      const replay = service.replay({ symbol: 'BTCUSDT', timeframe: '1h', limit: 100 });

      await expect(replay).rejects.toThrow(InsufficientDataError);
      await expect(replay).rejects.toThrow('replay requires at least 201 bars, got 150');
    });
  });

  it('should reject an out-of-range limit', async () => {
    await expect(service.replay({ symbol: 'BTCUSDT', timeframe: '1h', limit: 0 })).rejects.toThrow(RangeError);
    await expect(service.replay({ symbol: 'BTCUSDT', timeframe: '1h', limit: 5000 })).rejects.toThrow(
      'limit must be an integer between 1 and 1000',
    );
  });

  it('should hold on every bar of a directionless market', async () => {
    const choppy = resolveEngineConfig({ seriesWindow: 35 }, CHOPPY_CONFIG);
    const result = await service.replaySeries(toSeries(choppyCandles()), choppy);

    expect(result.requested).toBe(100);
    expect(result.barsEvaluated).toBe(66);
    expect(result.verdictCounts).toEqual({ BUY: 0, SELL: 0, HOLD: 66 });
  });
});
