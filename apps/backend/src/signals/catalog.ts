/**
 * Signal Catalogue
 * Names, fixed polarity and reason ordering of every signal the extractor emits
 */

import type {
  EmaCrossSignal,
  FixedSignal,
  Polarity,
  PriceCrossSignal,
  SignalName,
} from '@trend-alert/shared';

export type CrossDirection = 'ABOVE' | 'BELOW';

const FIXED_SIGNALS: ReadonlyArray<string> = [
  'MACD_CROSS_ABOVE_SIGNAL',
  'MACD_CROSS_BELOW_SIGNAL',
  'MACD_BULLISH',
  'MACD_BEARISH',
  'RSI_OVERSOLD',
  'RSI_OVERBOUGHT',
  'TREND_STRONG_UP',
  'TREND_STRONG_DOWN',
  'ADX_STRONG',
  'ADX_WEAK',
  'VOLUME_SURGE',
  'PRICE_BROKE_RESISTANCE',
  'PRICE_BROKE_SUPPORT',
  'WVIX_STOCH_BOTTOM',
] satisfies FixedSignal[];

const FIXED_POLARITY: Record<FixedSignal, Polarity> = {
  MACD_CROSS_ABOVE_SIGNAL: 'BUY',
  MACD_CROSS_BELOW_SIGNAL: 'SELL',
  MACD_BULLISH: 'BUY',
  MACD_BEARISH: 'SELL',
  RSI_OVERSOLD: 'BUY',
  RSI_OVERBOUGHT: 'SELL',
  TREND_STRONG_UP: 'BUY',
  TREND_STRONG_DOWN: 'SELL',
  ADX_STRONG: 'NEUTRAL',
  ADX_WEAK: 'NEUTRAL',
  VOLUME_SURGE: 'NEUTRAL',
  PRICE_BROKE_RESISTANCE: 'BUY',
  PRICE_BROKE_SUPPORT: 'SELL',
  WVIX_STOCH_BOTTOM: 'BUY',
};

const EMA_CROSS_PATTERN = /^EMA(\d+)_CROSS_(ABOVE|BELOW)_EMA(\d+)$/;
const PRICE_CROSS_PATTERN = /^PRICE_CROSS_(ABOVE|BELOW)_EMA(\d+)$/;

export function emaCrossSignal(fast: number, slow: number, direction: CrossDirection): EmaCrossSignal {
  return `EMA${fast}_CROSS_${direction}_EMA${slow}`;
}

export function priceCrossSignal(period: number, direction: CrossDirection): PriceCrossSignal {
  return `PRICE_CROSS_${direction}_EMA${period}`;
}

function isFixedSignal(value: string): value is FixedSignal {
  return FIXED_SIGNALS.includes(value);
}

export function isSignalName(value: string): value is SignalName {
  return isFixedSignal(value) || EMA_CROSS_PATTERN.test(value) || PRICE_CROSS_PATTERN.test(value);
}

export function polarityOf(signal: SignalName): Polarity {
  if (isFixedSignal(signal)) {
    return FIXED_POLARITY[signal];
  }
  return signal.includes('_CROSS_ABOVE_') ? 'BUY' : 'SELL';
}

/**
 * Sort key for reasons: lower group first, then larger period first.
 * EMA crosses, price/EMA crosses, trend, MACD cross, MACD level, RSI,
 * volume surge, breakouts, WVIX bottom.
 */
export function reasonRank(signal: SignalName): [group: number, period: number] {
  const emaCross = EMA_CROSS_PATTERN.exec(signal);
  if (emaCross) {
    return [0, -Number(emaCross[3])];
  }
  const priceCross = PRICE_CROSS_PATTERN.exec(signal);
  if (priceCross) {
    return [1, -Number(priceCross[2])];
  }

  switch (signal) {
    case 'TREND_STRONG_UP':
    case 'TREND_STRONG_DOWN':
      return [2, 0];
    case 'MACD_CROSS_ABOVE_SIGNAL':
    case 'MACD_CROSS_BELOW_SIGNAL':
      return [3, 0];
    case 'MACD_BULLISH':
    case 'MACD_BEARISH':
      return [4, 0];
    case 'RSI_OVERSOLD':
    case 'RSI_OVERBOUGHT':
      return [5, 0];
    case 'VOLUME_SURGE':
      return [6, 0];
    case 'PRICE_BROKE_RESISTANCE':
    case 'PRICE_BROKE_SUPPORT':
      return [7, 0];
    case 'WVIX_STOCH_BOTTOM':
      return [8, 0];
    default:
      return [9, 0];
  }
}

export function compareByReasonRank(a: SignalName, b: SignalName): number {
  const [groupA, periodA] = reasonRank(a);
  const [groupB, periodB] = reasonRank(b);
  return groupA - groupB || periodA - periodB || a.localeCompare(b);
}

export interface DescribeContext {
  rsi: number | null;
  adx: number | null;
  volumeRatio: number | null;
}

function formatValue(value: number | null, digits = 1): string {
  return value === null ? 'n/a' : value.toFixed(digits);
}

/**
 * Human-readable reason line for a signal
 */
export function describeSignal(signal: SignalName, context: DescribeContext): string {
  const emaCross = EMA_CROSS_PATTERN.exec(signal);
  if (emaCross) {
    const [, fast, direction, slow] = emaCross;
    return `EMA${fast} crossed ${direction.toLowerCase()} EMA${slow}`;
  }
  const priceCross = PRICE_CROSS_PATTERN.exec(signal);
  if (priceCross) {
    const [, direction, period] = priceCross;
    return `Price crossed ${direction.toLowerCase()} EMA${period}`;
  }

  switch (signal) {
    case 'MACD_CROSS_ABOVE_SIGNAL':
      return 'MACD crossed above its signal line';
    case 'MACD_CROSS_BELOW_SIGNAL':
      return 'MACD crossed below its signal line';
    case 'MACD_BULLISH':
      return 'MACD histogram positive';
    case 'MACD_BEARISH':
      return 'MACD histogram negative';
    case 'RSI_OVERSOLD':
      return `RSI oversold (${formatValue(context.rsi)})`;
    case 'RSI_OVERBOUGHT':
      return `RSI overbought (${formatValue(context.rsi)})`;
    case 'TREND_STRONG_UP':
      return `Strong uptrend (ADX ${formatValue(context.adx)}, EMAs stacked bullish)`;
    case 'TREND_STRONG_DOWN':
      return `Strong downtrend (ADX ${formatValue(context.adx)}, EMAs stacked bearish)`;
    case 'ADX_STRONG':
      return `ADX strong (${formatValue(context.adx)})`;
    case 'ADX_WEAK':
      return `ADX weak (${formatValue(context.adx)})`;
    case 'VOLUME_SURGE':
      return `Volume surge (${formatValue(context.volumeRatio, 2)}x average)`;
    case 'PRICE_BROKE_RESISTANCE':
      return 'Price broke above resistance';
    case 'PRICE_BROKE_SUPPORT':
      return 'Price broke below support';
    case 'WVIX_STOCH_BOTTOM':
      return 'Potential bottom (WVIX below its lower band, stochastic oversold)';
    default:
      return signal;
  }
}
