/**
 * State Tracker
 * Per-(symbol, timeframe) memory deciding whether an evaluation is worth an alert.
 *
 * UNSEEN -> TRACKED on the first evaluation, which always notifies.
 * Afterwards: notify iff the verdict changed or enough signals were added
 * or removed. The stored state is overwritten on every call, so each
 * comparison is against the immediately preceding evaluation.
 *
 * Calls for the same pair run one after another within a process, so two
 * concurrent evaluations cannot both read the old state and both notify.
 */

import type {
  ChangeSummary,
  Decision,
  NotifyResult,
  SignalName,
  SignalSet,
  SymbolState,
  Timeframe,
  TrackerStatus,
} from '@trend-alert/shared';
import type { EngineConfig } from '../config/EngineConfig';
import { stateKey, type SymbolStateStore } from './SymbolStateStore';

/**
 * Live configuration; read on every call so hot swaps apply to stored history
 */
export interface ConfigSource {
  current(): EngineConfig;
}

export function diffSignals(
  previous: readonly SignalName[],
  current: readonly SignalName[],
): { added: SignalName[]; removed: SignalName[] } {
  const before = new Set(previous);
  const after = new Set(current);
  return {
    added: current.filter((signal) => !before.has(signal)),
    removed: previous.filter((signal) => !after.has(signal)),
  };
}

export class StateTracker {
  private readonly pending = new Map<string, Promise<void>>();

  constructor(
    private readonly store: SymbolStateStore,
    private readonly config: ConfigSource,
    private readonly now: () => Date = () => new Date(),
  ) {}

  async getStatus(symbol: string, timeframe: Timeframe): Promise<TrackerStatus> {
    const state = await this.store.get(symbol, timeframe);
    return state ? 'TRACKED' : 'UNSEEN';
  }

  async getState(symbol: string, timeframe: Timeframe): Promise<SymbolState | null> {
    return this.store.get(symbol, timeframe);
  }

  async shouldNotify(
    symbol: string,
    timeframe: Timeframe,
    decision: Decision,
    signals: SignalSet,
  ): Promise<NotifyResult> {
    const key = stateKey(symbol, timeframe);
    const before = this.pending.get(key) ?? Promise.resolve();
    const run = before.then(() => this.compareAndStore(symbol, timeframe, decision, signals));
    // The chain only orders calls; each caller still gets its own rejection
    const tail = run.then(
      () => undefined,
      () => undefined,
    );
    this.pending.set(key, tail);

    try {
      return await run;
    } finally {
      if (this.pending.get(key) === tail) {
        this.pending.delete(key);
      }
    }
  }

  private async compareAndStore(
    symbol: string,
    timeframe: Timeframe,
    decision: Decision,
    signals: SignalSet,
  ): Promise<NotifyResult> {
    const previous = await this.store.get(symbol, timeframe);
    const currentSignals = [...signals].sort();
    const { signalDiffThreshold } = this.config.current();

    let changes: ChangeSummary;
    let notify: boolean;

    if (!previous) {
      changes = {
        firstEvaluation: true,
        previousVerdict: null,
        verdictChanged: false,
        added: currentSignals,
        removed: [],
        scoreDelta: null,
      };
      notify = true;
    } else {
      const { added, removed } = diffSignals(previous.lastSignals, currentSignals);
      const previousVerdict = previous.lastDecision.verdict;
      const verdictChanged = previousVerdict !== decision.verdict;

      changes = {
        firstEvaluation: false,
        previousVerdict,
        verdictChanged,
        added,
        removed,
        scoreDelta: decision.score - previous.lastDecision.score,
      };
      notify = verdictChanged || added.length + removed.length >= signalDiffThreshold;
    }

    const timestamp = this.now();
    await this.store.set({
      symbol,
      timeframe,
      lastDecision: decision,
      lastSignals: currentSignals,
      lastNotifiedAt: notify ? timestamp : (previous?.lastNotifiedAt ?? null),
      updatedAt: timestamp,
    });

    return { notify, changes };
  }
}
