/**
 * Domain Types
 * Source of truth for market data, signals and decisions across services.
 */

// ============================================================================
// Market Data Domain
// ============================================================================

export type Timeframe = '1m' | '3m' | '5m' | '15m' | '30m' | '1h' | '2h' | '4h' | '6h' | '12h' | '1d' | '1w';

/**
 * Bar length of each timeframe in milliseconds
 */
export const TIMEFRAME_MS: Record<Timeframe, number> = {
  '1m': 60_000,
  '3m': 3 * 60_000,
  '5m': 5 * 60_000,
  '15m': 15 * 60_000,
  '30m': 30 * 60_000,
  '1h': 3_600_000,
  '2h': 2 * 3_600_000,
  '4h': 4 * 3_600_000,
  '6h': 6 * 3_600_000,
  '12h': 12 * 3_600_000,
  '1d': 86_400_000,
  '1w': 7 * 86_400_000,
};

export function isTimeframe(value: string): value is Timeframe {
  return Object.prototype.hasOwnProperty.call(TIMEFRAME_MS, value);
}

/**
 * A closed OHLCV bar. Series are ordered by openTime ascending.
 */
export interface Candle {
  openTime: Date;
  open: number;
  high: number;
  low: number;
  close: number;
  volume: number;
}

export interface Series {
  symbol: string;
  timeframe: Timeframe;
  candles: readonly Candle[];
}

// ============================================================================
// Signal Domain
// ============================================================================

export type EmaCrossSignal = `EMA${number}_CROSS_ABOVE_EMA${number}` | `EMA${number}_CROSS_BELOW_EMA${number}`;

export type PriceCrossSignal = `PRICE_CROSS_ABOVE_EMA${number}` | `PRICE_CROSS_BELOW_EMA${number}`;

export type FixedSignal =
  | 'MACD_CROSS_ABOVE_SIGNAL'
  | 'MACD_CROSS_BELOW_SIGNAL'
  | 'MACD_BULLISH'
  | 'MACD_BEARISH'
  | 'RSI_OVERSOLD'
  | 'RSI_OVERBOUGHT'
  | 'TREND_STRONG_UP'
  | 'TREND_STRONG_DOWN'
  | 'ADX_STRONG'
  | 'ADX_WEAK'
  | 'VOLUME_SURGE'
  | 'PRICE_BROKE_RESISTANCE'
  | 'PRICE_BROKE_SUPPORT'
  | 'WVIX_STOCH_BOTTOM';

export type SignalName = EmaCrossSignal | PriceCrossSignal | FixedSignal;

export type SignalSet = ReadonlySet<SignalName>;

export type Polarity = 'BUY' | 'SELL' | 'NEUTRAL';

// ============================================================================
// Decision Domain
// ============================================================================

export type Verdict = 'BUY' | 'SELL' | 'HOLD';

export type TrendRegime = 'STRONG' | 'MODERATE' | 'WEAK';

export type VolumeClass = 'HIGH' | 'NORMAL';

export type TrendAlignment = 'UP' | 'DOWN' | 'NONE';

export interface Decision {
  symbol: string;
  timeframe: Timeframe;
  verdict: Verdict;
  score: number; // integer 0-100
  reasons: readonly string[];
  timestamp: Date; // open time of the evaluated bar
  regime: TrendRegime;
  volume: VolumeClass;
  signals: readonly SignalName[];
  /** BUY inside a strong, bullish-stacked trend on heavy volume */
  doubleDown: boolean;
}

// ============================================================================
// Alert State Domain
// ============================================================================

export type TrackerStatus = 'UNSEEN' | 'TRACKED';

export interface SymbolState {
  symbol: string;
  timeframe: Timeframe;
  lastDecision: Decision;
  lastSignals: readonly SignalName[];
  lastNotifiedAt: Date | null;
  updatedAt: Date;
}

export interface ChangeSummary {
  firstEvaluation: boolean;
  previousVerdict: Verdict | null;
  verdictChanged: boolean;
  added: readonly SignalName[];
  removed: readonly SignalName[];
  scoreDelta: number | null;
}

export interface NotifyResult {
  notify: boolean;
  changes: ChangeSummary;
}
