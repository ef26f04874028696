/**
 * Signal Replay Service
 * Replays a candle history bar by bar through the live engine and a fresh,
 * private state tracker to show which bars would have alerted.
 * No balances, orders or trades are simulated.
 */

import type { Decision, Series, Timeframe, Verdict } from '@trend-alert/shared';
import type { CandleSource } from '../../market-data';
import type { EngineConfig } from '../../signals/config/EngineConfig';
import { InsufficientDataError } from '../../signals/errors';
import type { SignalEngine } from '../../signals/services/SignalEngine';
import { StateTracker, type ConfigSource } from '../../signals/state/StateTracker';
import { InMemorySymbolStateStore } from '../../signals/state/SymbolStateStore';

export const DEFAULT_REPLAY_BARS = 200;
export const MAX_REPLAY_BARS = 1000;

export interface ReplayParams {
  symbol: string;
  timeframe: Timeframe;
  limit?: number;
}

export interface ReplayStepResult {
  decision: Decision;
  notified: boolean;
}

export interface ReplayResult {
  symbol: string;
  timeframe: Timeframe;
  /** Bars asked for; more than barsEvaluated when the source held too little history */
  requested: number;
  barsEvaluated: number;
  alerts: number;
  verdictCounts: Record<Verdict, number>;
  steps: ReplayStepResult[];
}

export class SignalReplayService {
  constructor(
    private readonly candles: CandleSource,
    private readonly engine: SignalEngine,
    private readonly config: ConfigSource,
  ) {}

  /**
   * Fetch `limit` bars plus enough history for a full window before the
   * first one, then replay them. A source that returns fewer bars (the
   * Binance client caps a request at 1000) shortens the replay from the
   * front; the result reports both counts.
   *
   * @throws {RangeError} if limit is out of range
   * @throws {InsufficientDataError} if the source cannot fill a single window
   */
  async replay(params: ReplayParams): Promise<ReplayResult> {
    const limit = params.limit ?? DEFAULT_REPLAY_BARS;
    if (!Number.isInteger(limit) || limit < 1 || limit > MAX_REPLAY_BARS) {
      throw new RangeError(`limit must be an integer between 1 and ${MAX_REPLAY_BARS}`);
    }

    const config = this.config.current();
    const needed = limit + config.seriesWindow - 1;
    const series = await this.candles.getSeries(params.symbol, params.timeframe, needed);
    const available = series.candles.length;
    if (available < config.seriesWindow) {
      throw new InsufficientDataError('replay', config.seriesWindow, available);
    }
    if (available < needed) {
      console.warn(
        `[Replay] ${series.symbol}:${series.timeframe} source returned ${available} of ${needed} bars, ` +
          `replaying ${available - config.seriesWindow + 1} of ${limit}`,
      );
    }

    const result = await this.replaySeries(series, config, limit);

    console.log(
      `[Replay] ${result.symbol}:${result.timeframe} replayed ${result.barsEvaluated} bars, ${result.alerts} alerts`,
    );
    return result;
  }

  /**
   * Evaluate each of the last `limit` bars that has a full window of history
   * behind it, in order. Every step sees exactly the bars a live cycle at
   * that bar would see.
   */
  async replaySeries(series: Series, config: EngineConfig, limit = series.candles.length): Promise<ReplayResult> {
    const { candles } = series;
    const store = new InMemorySymbolStateStore();
    const fixedConfig: ConfigSource = { current: () => config };
    let clock = new Date(0);
    const tracker = new StateTracker(store, fixedConfig, () => clock);

    const first = Math.max(config.seriesWindow - 1, candles.length - limit);
    const steps: ReplayStepResult[] = [];
    const verdictCounts: Record<Verdict, number> = { BUY: 0, SELL: 0, HOLD: 0 };

    for (let bar = first; bar < candles.length; bar++) {
      const { decision, signals } = this.engine.analyze({ ...series, candles: candles.slice(0, bar + 1) }, config);
      clock = decision.timestamp;
      const { notify } = await tracker.shouldNotify(series.symbol, series.timeframe, decision, signals);

      steps.push({ decision, notified: notify });
      verdictCounts[decision.verdict]++;
    }

    return {
      symbol: series.symbol,
      timeframe: series.timeframe,
      requested: limit,
      barsEvaluated: steps.length,
      alerts: steps.filter((step) => step.notified).length,
      verdictCounts,
      steps,
    };
  }
}
