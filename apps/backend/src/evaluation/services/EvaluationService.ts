/**
 * Evaluation Service
 * One alert cycle per (symbol, timeframe): fetch -> evaluate -> track -> deliver.
 *
 * A cycle cancelled by its caller, or fed stale candles, is abandoned before
 * the state step so the stored history is untouched. A series that is too
 * short still produces a HOLD decision, which goes through the tracker like
 * any other so the "data incomplete" alert fires once.
 */

import type {
  ChangeSummary,
  CycleOutcome,
  Decision,
  Series,
  SignalSet,
  Timeframe,
} from '@trend-alert/shared';
import type { CandleSource } from '../../market-data';
import {
  abandonedCycleCounter,
  evaluationCounter,
  evaluationDuration,
  evaluationFailureCounter,
  notificationCounter,
} from '../../monitoring/metrics';
import type { NotificationSink } from '../../notifications';
import type { EngineConfig } from '../../signals/config/EngineConfig';
import { InsufficientDataError, InvalidConfigError, StaleDataError } from '../../signals/errors';
import type { SignalEngine } from '../../signals/services/SignalEngine';
import type { ConfigSource, StateTracker } from '../../signals/state/StateTracker';

export interface WatchPair {
  symbol: string;
  timeframe: Timeframe;
}

export interface CycleResult {
  outcome: CycleOutcome;
  decision: Decision | null;
  changes: ChangeSummary | null;
  reason?: string;
}

export interface PairOutcome {
  pair: WatchPair;
  result: CycleResult | null;
  error?: string;
}

export interface EvaluationServiceDeps {
  candles: CandleSource;
  engine: SignalEngine;
  tracker: StateTracker;
  config: ConfigSource;
  sinks: NotificationSink[];
  now?: () => Date;
}

function pairKey(symbol: string, timeframe: Timeframe): string {
  return `${symbol}:${timeframe}`;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class EvaluationService {
  private readonly now: () => Date;

  constructor(private readonly deps: EvaluationServiceDeps) {
    this.now = deps.now ?? (() => new Date());
  }

  /**
   * Run one cycle. Fetch and engine failures other than the recoverable ones
   * are counted and rethrown; delivery failures never are.
   */
  async runCycle(symbol: string, timeframe: Timeframe, signal?: AbortSignal): Promise<CycleResult> {
    const upper = symbol.toUpperCase();
    const key = pairKey(upper, timeframe);
    const stopTimer = evaluationDuration.startTimer({ timeframe });
    // One configuration snapshot for the whole cycle
    const config = this.deps.config.current();

    try {
      let series: Series;
      try {
        series = await this.deps.candles.getSeries(upper, timeframe, config.seriesWindow, signal);
      } catch (error) {
        if (signal?.aborted || error instanceof StaleDataError) {
          return this.abandon(key, errorMessage(error));
        }
        evaluationFailureCounter.inc({ reason: 'fetch' });
        throw error;
      }

      if (signal?.aborted) {
        return this.abandon(key, 'Cancelled');
      }

      const { decision, signals } = this.decide(series, upper, timeframe, config);
      evaluationCounter.inc({ timeframe, verdict: decision.verdict });

      const { notify, changes } = await this.deps.tracker.shouldNotify(upper, timeframe, decision, signals);
      if (!notify) {
        notificationCounter.inc({ outcome: 'suppressed' });
        return { outcome: 'SUPPRESSED', decision, changes };
      }

      const delivered = await this.deliver(key, decision, changes);
      return { outcome: delivered ? 'NOTIFIED' : 'DELIVERY_FAILED', decision, changes };
    } finally {
      stopTimer();
    }
  }

  /**
   * Run a cycle for every pair concurrently; one pair failing never stops the others
   */
  async runAll(pairs: readonly WatchPair[], signal?: AbortSignal): Promise<PairOutcome[]> {
    const settled = await Promise.allSettled(
      pairs.map((pair) => this.runCycle(pair.symbol, pair.timeframe, signal)),
    );

    return settled.map((outcome, i) => {
      const pair = pairs[i];
      if (outcome.status === 'fulfilled') {
        return { pair, result: outcome.value };
      }
      const message = errorMessage(outcome.reason);
      console.error(`[Evaluation] Cycle failed for ${pairKey(pair.symbol.toUpperCase(), pair.timeframe)}:`, message);
      return { pair, result: null, error: message };
    });
  }

  private decide(
    series: Series,
    symbol: string,
    timeframe: Timeframe,
    config: EngineConfig,
  ): { decision: Decision; signals: SignalSet } {
    try {
      const { decision, signals } = this.deps.engine.analyze({ ...series, symbol, timeframe }, config);
      return { decision, signals };
    } catch (error) {
      if (error instanceof InsufficientDataError) {
        evaluationFailureCounter.inc({ reason: 'insufficient_data' });
        return { decision: this.incompleteDecision(series, symbol, timeframe, error), signals: new Set() };
      }
      evaluationFailureCounter.inc({ reason: error instanceof InvalidConfigError ? 'invalid_config' : 'engine' });
      throw error;
    }
  }

  private incompleteDecision(
    series: Series,
    symbol: string,
    timeframe: Timeframe,
    error: InsufficientDataError,
  ): Decision {
    const latest = series.candles[series.candles.length - 1];
    return {
      symbol,
      timeframe,
      verdict: 'HOLD',
      score: 0,
      reasons: [`Data incomplete: ${error.message}`],
      timestamp: latest ? latest.openTime : this.now(),
      regime: 'WEAK',
      volume: 'NORMAL',
      signals: [],
      doubleDown: false,
    };
  }

  /**
   * @returns true when at least one sink accepted the alert (or none is configured)
   */
  private async deliver(key: string, decision: Decision, changes: ChangeSummary): Promise<boolean> {
    const { sinks } = this.deps;
    const results = await Promise.allSettled(sinks.map((sink) => sink.send(decision, changes)));

    let failures = 0;
    results.forEach((result, i) => {
      if (result.status === 'rejected') {
        failures++;
        notificationCounter.inc({ outcome: 'failed' });
        console.error(`[Evaluation] ${sinks[i].name} delivery failed for ${key}:`, errorMessage(result.reason));
      }
    });

    if (failures < sinks.length || sinks.length === 0) {
      notificationCounter.inc({ outcome: 'sent' });
      console.log(`[Evaluation] ${key} ${decision.verdict} (score ${decision.score}) alert sent`);
      return true;
    }
    return false;
  }

  private abandon(key: string, reason: string): CycleResult {
    abandonedCycleCounter.inc();
    console.log(`[Evaluation] Cycle abandoned for ${key}: ${reason}`);
    return { outcome: 'ABANDONED', decision: null, changes: null, reason };
  }
}
