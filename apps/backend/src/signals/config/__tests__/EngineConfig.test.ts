/**
 * Engine Configuration Tests
 */

import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { InvalidConfigError } from '../../errors';
import { ConfigStore } from '../ConfigStore';
import {
  collectConfigIssues,
  DEFAULT_ENGINE_CONFIG,
  parseEngineConfigOverrides,
  resolveEngineConfig,
  validateEngineConfig,
} from '../EngineConfig';
import { loadEngineConfig } from '../loadEngineConfig';

describe('EngineConfig', () => {
  describe('validation', () => {
    it('should accept the defaults', () => {
      expect(collectConfigIssues(DEFAULT_ENGINE_CONFIG)).toEqual([]);
    });

    it('should report every issue at once', () => {
      const config = resolveEngineConfig({
        macd: { fast: 26, slow: 12 },
        minAlignedSignals: 1,
        priceCrossPeriods: [30],
      });

      expect(collectConfigIssues(config)).toEqual([
        'priceCrossPeriods entry 30 is not one of emaPeriods',
        'macd.fast (26) must be less than macd.slow (12)',
        'minAlignedSignals must be an integer >= 2',
      ]);
    });

    it('should require a window that covers the longest lookback', () => {
      const config = resolveEngineConfig({ seriesWindow: 150 });

      expect(() => validateEngineConfig(config)).toThrow(InvalidConfigError);
      expect(collectConfigIssues(config)).toEqual(['seriesWindow must be an integer >= 201 for the configured periods']);
    });

    it('should reject inverted thresholds', () => {
      expect(collectConfigIssues(resolveEngineConfig({ rsi: { oversold: 80 } }))).toEqual([
        'rsi thresholds must satisfy 0 < oversold < overbought < 100',
      ]);
      expect(collectConfigIssues(resolveEngineConfig({ adx: { weakThreshold: 30 } }))).toEqual([
        'adx thresholds must satisfy 0 <= weakThreshold <= strongThreshold <= 100',
      ]);
    });

    it('should keep the trend RSI thresholds inside the plain ones', () => {
      expect(collectConfigIssues(resolveEngineConfig({ rsi: { trendOversold: 25 } }))).toEqual([
        'rsi trend thresholds must satisfy oversold <= trendOversold < trendOverbought <= overbought',
      ]);
      expect(collectConfigIssues(resolveEngineConfig({ rsi: { trendOversold: 55, trendOverbought: 50 } }))).toEqual([
        'rsi trend thresholds must satisfy oversold <= trendOversold < trendOverbought <= overbought',
      ]);
      expect(collectConfigIssues(resolveEngineConfig({ rsi: { trendOversold: 30, trendOverbought: 70 } }))).toEqual([]);
    });

    it('should check the WVIX and stochastic options', () => {
      expect(
        collectConfigIssues(resolveEngineConfig({ wvix: { bandPeriod: 1 }, stochastic: { smoothing: 0, oversold: 100 } })),
      ).toEqual([
        'wvix.period must be a positive integer and wvix.bandPeriod an integer >= 2',
        'stochastic periods must be positive integers',
        'stochastic.oversold must be between 0 and 100',
      ]);
    });
  });

  describe('resolveEngineConfig', () => {
    it('should merge group fields one by one', () => {
      const config = resolveEngineConfig({ rsi: { period: 21 }, volume: { multiplier: 2 } });

      expect(config.rsi).toEqual({ period: 21, oversold: 30, overbought: 70, trendOversold: 40, trendOverbought: 60 });
      expect(config.volume).toEqual({ period: 20, multiplier: 2 });
      expect(config.emaPeriods).toEqual([7, 21, 50, 100, 200]);
      expect(config.emaPeriods).not.toBe(DEFAULT_ENGINE_CONFIG.emaPeriods);
    });
  });

  describe('parseEngineConfigOverrides', () => {
    it('should accept a partial document', () => {
      expect(parseEngineConfigOverrides({ adx: { strongThreshold: 30 }, signalDiffThreshold: 2 })).toEqual({
        adx: { strongThreshold: 30 },
        signalDiffThreshold: 2,
      });
    });

    it('should reject unknown keys and wrong types', () => {
      try {
        parseEngineConfigOverrides({ emaPeriods: [7, '21'], rsi: { length: 14 }, leverage: 10 });
        throw new Error('expected InvalidConfigError');
      } catch (error) {
        expect(error).toBeInstanceOf(InvalidConfigError);
        if (error instanceof InvalidConfigError) {
          expect(error.issues).toEqual([
            'leverage is not a recognized option',
            'emaPeriods must be an array of numbers',
            'rsi.length is not a recognized option',
          ]);
        }
      }
    });

    it('should read the WVIX and stochastic groups', () => {
      expect(parseEngineConfigOverrides({ wvix: { period: 30 }, stochastic: { oversold: 15 } })).toEqual({
        wvix: { period: 30 },
        stochastic: { oversold: 15 },
      });
    });

    it('should reject a non-object document', () => {
      expect(() => parseEngineConfigOverrides([1, 2])).toThrow('configuration must be a JSON object');
    });
  });

  describe('ConfigStore', () => {
    let store: ConfigStore;

    beforeEach(() => {
      jest.spyOn(console, 'log').mockImplementation(() => undefined);
      store = new ConfigStore();
    });

    afterEach(() => {
      jest.restoreAllMocks();
    });

    it('should swap in a valid update', () => {
      const before = store.current();
      const after = store.update({ adx: { strongThreshold: 30 } });

      expect(after.adx.strongThreshold).toBe(30);
      expect(store.current()).toBe(after);
      expect(before.adx.strongThreshold).toBe(25);
    });

    it('should keep the current configuration when an update is invalid', () => {
      store.update({ signalDiffThreshold: 2 });

      expect(() => store.update({ macd: { fast: 40 } })).toThrow(InvalidConfigError);
      expect(store.current().macd.fast).toBe(12);
      expect(store.current().signalDiffThreshold).toBe(2);
    });

    it('should hand out frozen snapshots', () => {
      expect(Object.isFrozen(store.current())).toBe(true);
      expect(Object.isFrozen(store.current().rsi)).toBe(true);
    });

    it('should reset to the defaults', () => {
      store.update({ minAlignedSignals: 3 });
      expect(store.reset()).toEqual(DEFAULT_ENGINE_CONFIG);
    });
  });

  describe('loadEngineConfig', () => {
    let dir: string;

    beforeEach(() => {
      jest.spyOn(console, 'log').mockImplementation(() => undefined);
      dir = mkdtempSync(join(tmpdir(), 'engine-config-'));
    });

    afterEach(() => {
      jest.restoreAllMocks();
      rmSync(dir, { recursive: true, force: true });
    });

    it('should return the defaults without a path', () => {
      expect(loadEngineConfig(undefined)).toEqual(DEFAULT_ENGINE_CONFIG);
    });

    it('should apply overrides from a JSON file', () => {
      const path = join(dir, 'engine.json');
      writeFileSync(path, JSON.stringify({ minAlignedSignals: 3, levels: { breakoutPercentage: 1 } }));

      const config = loadEngineConfig(path);
      expect(config.minAlignedSignals).toBe(3);
      expect(config.levels).toEqual({ lookback: 100, pivotWidth: 5, breakoutPercentage: 1 });
    });

    it('should reject a file that is not JSON', () => {
      const path = join(dir, 'engine.json');
      writeFileSync(path, 'minAlignedSignals: 3');

      expect(() => loadEngineConfig(path)).toThrow(InvalidConfigError);
    });
  });
});
