/**
 * Signal Engine
 * One synchronous evaluation: indicators -> signals -> decision.
 * Deterministic: the same series and configuration always yield the same decision.
 */

import type { Decision, Series, SignalSet } from '@trend-alert/shared';
import { validateEngineConfig, type EngineConfig } from '../config/EngineConfig';
import { aggregate, trendInputsFrom, type TrendInputs } from '../decision/aggregate';
import { extractSignals } from '../extraction/extractSignals';
import { computeSnapshots, type IndicatorSnapshot } from '../indicators/snapshot';

export interface SignalAnalysis {
  decision: Decision;
  signals: SignalSet;
  trend: TrendInputs;
  current: IndicatorSnapshot;
  previous: IndicatorSnapshot;
}

export class SignalEngine {
  /**
   * Full evaluation with intermediate values.
   * Only the trailing config.seriesWindow bars are read.
   *
   * @throws {InvalidConfigError} if the configuration is invalid
   * @throws {InsufficientDataError} if the window is shorter than minimumBars(config)
   */
  analyze(series: Series, config: EngineConfig): SignalAnalysis {
    validateEngineConfig(config);

    const candles = series.candles.slice(-config.seriesWindow);
    const { current, previous } = computeSnapshots(candles, config);
    const latest = candles[candles.length - 1];

    const signals = extractSignals(current, previous, latest, config);
    const trend = trendInputsFrom(current, config);
    const decision = aggregate(signals, trend, config, {
      symbol: series.symbol,
      timeframe: series.timeframe,
      timestamp: latest.openTime,
    });

    return { decision, signals, trend, current, previous };
  }

  evaluate(series: Series, config: EngineConfig): Decision {
    return this.analyze(series, config).decision;
  }
}
