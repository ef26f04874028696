/**
 * Decision Aggregation
 * SignalSet + trend inputs -> verdict, score, regime and ordered reasons
 */

import type {
  Decision,
  SignalName,
  SignalSet,
  Timeframe,
  TrendAlignment,
  TrendRegime,
  Verdict,
  VolumeClass,
} from '@trend-alert/shared';
import { compareByReasonRank, describeSignal, polarityOf } from '../catalog';
import type { EngineConfig } from '../config/EngineConfig';
import { trendAlignment } from '../extraction/extractSignals';
import type { IndicatorSnapshot } from '../indicators/snapshot';

export interface TrendInputs {
  alignment: TrendAlignment;
  adx: number | null;
  rsi: number | null;
  /** Latest volume divided by its trailing average */
  volumeRatio: number | null;
}

export interface DecisionContext {
  symbol: string;
  timeframe: Timeframe;
  timestamp: Date;
}

export function trendInputsFrom(snapshot: IndicatorSnapshot, config: EngineConfig): TrendInputs {
  const { volumeMa } = snapshot;
  return {
    alignment: trendAlignment(snapshot, config.emaPeriods),
    adx: snapshot.adx,
    rsi: snapshot.rsi,
    volumeRatio: volumeMa !== null && volumeMa > 0 ? snapshot.volume / volumeMa : null,
  };
}

/**
 * Unknown ADX counts as WEAK so missing data biases toward HOLD
 */
export function classifyRegime(trend: TrendInputs, config: EngineConfig): TrendRegime {
  const { adx } = trend;
  if (adx === null) {
    return 'WEAK';
  }
  if (adx > config.adx.strongThreshold) {
    return trend.alignment === 'NONE' ? 'MODERATE' : 'STRONG';
  }
  return adx >= config.adx.weakThreshold ? 'MODERATE' : 'WEAK';
}

export function classifyVolume(volumeRatio: number | null, config: EngineConfig): VolumeClass {
  return volumeRatio !== null && volumeRatio > config.volume.multiplier ? 'HIGH' : 'NORMAL';
}

/**
 * 0-60 from agreement and indicator strength, +20 STRONG regime, +20 HIGH volume
 */
export function computeScore(
  leadingCount: number,
  trend: TrendInputs,
  regime: TrendRegime,
  volume: VolumeClass,
): number {
  const agreement = Math.min(leadingCount, 4) * 10;
  const momentum = trend.rsi === null ? 0 : Math.min(10, Math.abs(trend.rsi - 50) / 2);
  const strength = trend.adx === null ? 0 : Math.min(10, Math.max(0, trend.adx) / 5);

  let score = agreement + momentum + strength;
  if (regime === 'STRONG') {
    score += 20;
  }
  if (volume === 'HIGH') {
    score += 20;
  }
  return Math.min(100, Math.max(0, Math.round(score)));
}

/**
 * Add-to-position hint: BUY with ADX above the strong threshold, EMAs
 * stacked bullish and HIGH volume
 */
export function isDoubleDown(verdict: Verdict, trend: TrendInputs, volume: VolumeClass, config: EngineConfig): boolean {
  return (
    verdict === 'BUY' &&
    trend.alignment === 'UP' &&
    trend.adx !== null &&
    trend.adx > config.adx.strongThreshold &&
    volume === 'HIGH'
  );
}

/**
 * Confirmations the leading side needs in a given regime and volume class
 */
export function requiredConfirmations(regime: TrendRegime, volume: VolumeClass, config: EngineConfig): number | null {
  if (regime === 'WEAK') {
    return null;
  }
  if (regime === 'STRONG' || volume === 'HIGH') {
    return config.minAlignedSignals;
  }
  return config.minAlignedSignals + 1;
}

function formatReading(value: number): string {
  return value.toFixed(1);
}

function holdReason(
  trend: TrendInputs,
  regime: TrendRegime,
  buyCount: number,
  sellCount: number,
  required: number | null,
  config: EngineConfig,
): string {
  if (trend.adx === null) {
    return 'ADX unavailable: trend strength unknown';
  }
  if (regime === 'WEAK' || required === null) {
    return `Weak trend (ADX ${formatReading(trend.adx)} below ${config.adx.weakThreshold})`;
  }
  if (buyCount === sellCount) {
    return buyCount === 0
      ? 'No directional signals'
      : `Conflicting signals (${buyCount} bullish vs ${sellCount} bearish)`;
  }
  const side = buyCount > sellCount ? 'bullish' : 'bearish';
  return `Insufficient confirmation (${Math.max(buyCount, sellCount)} ${side}, ${required} required in a ${regime.toLowerCase()} trend)`;
}

export function aggregate(
  signals: SignalSet,
  trend: TrendInputs,
  config: EngineConfig,
  context: DecisionContext,
): Decision {
  const sorted = [...signals].sort();
  const buy: SignalName[] = [];
  const sell: SignalName[] = [];
  for (const signal of sorted) {
    const polarity = polarityOf(signal);
    if (polarity === 'BUY') {
      buy.push(signal);
    } else if (polarity === 'SELL') {
      sell.push(signal);
    }
  }

  const leading: 'BUY' | 'SELL' | null = buy.length > sell.length ? 'BUY' : sell.length > buy.length ? 'SELL' : null;
  const leadingCount = Math.max(buy.length, sell.length);

  const regime = classifyRegime(trend, config);
  const volume = classifyVolume(trend.volumeRatio, config);
  const required = requiredConfirmations(regime, volume, config);

  const verdict: Verdict =
    leading !== null && required !== null && leadingCount >= required ? leading : 'HOLD';

  let reasons: string[];
  if (verdict === 'HOLD') {
    reasons = [holdReason(trend, regime, buy.length, sell.length, required, config)];
  } else {
    const winning = verdict === 'BUY' ? buy : sell;
    const supporting = signals.has('VOLUME_SURGE') ? [...winning, 'VOLUME_SURGE' as const] : winning;
    reasons = [...supporting].sort(compareByReasonRank).map((signal) => describeSignal(signal, trend));
  }

  return {
    symbol: context.symbol,
    timeframe: context.timeframe,
    verdict,
    score: computeScore(leadingCount, trend, regime, volume),
    reasons,
    timestamp: context.timestamp,
    regime,
    volume,
    signals: sorted,
    doubleDown: isDoubleDown(verdict, trend, volume, config),
  };
}
