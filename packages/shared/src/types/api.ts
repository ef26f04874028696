/**
 * API Types
 * Request/Response types for the REST API and the persisted decision format.
 */

import type { ChangeSummary, Timeframe, TrackerStatus, TrendRegime, Verdict, VolumeClass } from './domain';

// ============================================================================
// Common API Structures
// ============================================================================

export interface ApiError {
  error: string;
  message: string;
  issues?: string[];
}

// ============================================================================
// Wire Formats
// ============================================================================

/**
 * JSON form of a Decision (dates as ISO 8601 strings)
 */
export interface SerializedDecision {
  symbol: string;
  timeframe: Timeframe;
  verdict: Verdict;
  score: number;
  reasons: string[];
  timestamp: string;
  regime: TrendRegime;
  volume: VolumeClass;
  signals: string[];
  doubleDown: boolean;
}

export interface SerializedSymbolState {
  symbol: string;
  timeframe: Timeframe;
  lastDecision: SerializedDecision;
  lastSignals: string[];
  lastNotifiedAt: string | null;
  updatedAt: string;
}

// ============================================================================
// Signals API
// ============================================================================

export interface GetSignalStateResponse {
  status: TrackerStatus;
  state: SerializedSymbolState;
}

export type CycleOutcome = 'NOTIFIED' | 'SUPPRESSED' | 'DELIVERY_FAILED' | 'ABANDONED';

export interface EvaluateSignalsResponse {
  outcome: CycleOutcome;
  decision: SerializedDecision | null;
  changes: ChangeSummary | null;
  reason?: string;
}

// ============================================================================
// Replay API
// ============================================================================

export interface ReplayRequest {
  symbol: string;
  timeframe: Timeframe;
  limit?: number;
}

export interface ReplayStep {
  decision: SerializedDecision;
  notified: boolean;
}

export interface ReplayResponse {
  symbol: string;
  timeframe: Timeframe;
  requested: number;
  barsEvaluated: number;
  alerts: number;
  verdictCounts: Record<Verdict, number>;
  steps: ReplayStep[];
}
