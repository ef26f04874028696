/**
 * Engine Configuration
 * Every recognized indicator, signal and alerting option with its default.
 * Validated once when it enters the system (startup file, PUT /config).
 */

import { InvalidConfigError } from '../errors';
import { minimumBars } from '../indicators/snapshot';

export interface RsiConfig {
  period: number;
  oversold: number;
  overbought: number;
  /** Oversold threshold while the trend is up (ADX >= weak, EMAs stacked bullish) */
  trendOversold: number;
  /** Overbought threshold while the trend is down */
  trendOverbought: number;
}

export interface AdxConfig {
  period: number;
  strongThreshold: number;
  weakThreshold: number;
}

export interface MacdConfig {
  fast: number;
  slow: number;
  signal: number;
}

export interface AtrConfig {
  period: number;
  /** Breakouts must clear the level by more than multiplier x ATR */
  multiplier: number;
}

export interface VolumeConfig {
  period: number;
  /** VOLUME_SURGE and HIGH volume when volume > multiplier x average */
  multiplier: number;
}

/**
 * Williams VIX Fix and its Bollinger band
 */
export interface WvixConfig {
  /** Highest-high lookback */
  period: number;
  bandPeriod: number;
  bandMultiplier: number;
}

/**
 * Slow stochastic: %K over `period`, smoothed by `smoothing`, %D = SMA(signalPeriod) of smoothed %K
 */
export interface StochasticConfig {
  period: number;
  smoothing: number;
  signalPeriod: number;
  /** WVIX_STOCH_BOTTOM needs both %K and %D below this */
  oversold: number;
}

export interface LevelsConfig {
  lookback: number;
  pivotWidth: number;
  /** Minimum close distance beyond a level, in percent of the level */
  breakoutPercentage: number;
}

export interface EngineConfig {
  /** Trailing bars evaluated; older bars never influence a decision */
  seriesWindow: number;
  emaPeriods: number[];
  /** EMA periods checked for close/EMA crosses (subset of emaPeriods) */
  priceCrossPeriods: number[];
  rsi: RsiConfig;
  adx: AdxConfig;
  macd: MacdConfig;
  atr: AtrConfig;
  volume: VolumeConfig;
  levels: LevelsConfig;
  wvix: WvixConfig;
  stochastic: StochasticConfig;
  minAlignedSignals: number;
  /** Added + removed signals needed to re-alert on an unchanged verdict */
  signalDiffThreshold: number;
}

type GroupKey = 'rsi' | 'adx' | 'macd' | 'atr' | 'volume' | 'levels' | 'wvix' | 'stochastic';

export type EngineConfigOverrides = {
  [K in keyof EngineConfig]?: K extends GroupKey ? Partial<EngineConfig[K]> : EngineConfig[K];
};

export const DEFAULT_ENGINE_CONFIG: EngineConfig = {
  seriesWindow: 300,
  emaPeriods: [7, 21, 50, 100, 200],
  priceCrossPeriods: [50, 100, 200],
  rsi: { period: 14, oversold: 30, overbought: 70, trendOversold: 40, trendOverbought: 60 },
  adx: { period: 14, strongThreshold: 25, weakThreshold: 20 },
  macd: { fast: 12, slow: 26, signal: 9 },
  atr: { period: 14, multiplier: 0.5 },
  volume: { period: 20, multiplier: 1.5 },
  levels: { lookback: 100, pivotWidth: 5, breakoutPercentage: 0.5 },
  wvix: { period: 22, bandPeriod: 20, bandMultiplier: 2 },
  stochastic: { period: 14, smoothing: 3, signalPeriod: 3, oversold: 20 },
  minAlignedSignals: 2,
  signalDiffThreshold: 1,
};

const RSI_FIELDS = [
  'period',
  'oversold',
  'overbought',
  'trendOversold',
  'trendOverbought',
] as const satisfies ReadonlyArray<keyof RsiConfig>;
const ADX_FIELDS = ['period', 'strongThreshold', 'weakThreshold'] as const satisfies ReadonlyArray<keyof AdxConfig>;
const MACD_FIELDS = ['fast', 'slow', 'signal'] as const satisfies ReadonlyArray<keyof MacdConfig>;
const ATR_FIELDS = ['period', 'multiplier'] as const satisfies ReadonlyArray<keyof AtrConfig>;
const VOLUME_FIELDS = ['period', 'multiplier'] as const satisfies ReadonlyArray<keyof VolumeConfig>;
const LEVELS_FIELDS = ['lookback', 'pivotWidth', 'breakoutPercentage'] as const satisfies ReadonlyArray<keyof LevelsConfig>;
const WVIX_FIELDS = ['period', 'bandPeriod', 'bandMultiplier'] as const satisfies ReadonlyArray<keyof WvixConfig>;
const STOCHASTIC_FIELDS = [
  'period',
  'smoothing',
  'signalPeriod',
  'oversold',
] as const satisfies ReadonlyArray<keyof StochasticConfig>;

/**
 * Merge overrides onto a base configuration (defaults unless given).
 * Does not validate; see validateEngineConfig.
 */
export function resolveEngineConfig(
  overrides: EngineConfigOverrides = {},
  base: EngineConfig = DEFAULT_ENGINE_CONFIG,
): EngineConfig {
  const { rsi, adx, macd, atr, volume, levels, wvix, stochastic } = overrides;

  return {
    seriesWindow: overrides.seriesWindow ?? base.seriesWindow,
    emaPeriods: [...(overrides.emaPeriods ?? base.emaPeriods)],
    priceCrossPeriods: [...(overrides.priceCrossPeriods ?? base.priceCrossPeriods)],
    rsi: {
      period: rsi?.period ?? base.rsi.period,
      oversold: rsi?.oversold ?? base.rsi.oversold,
      overbought: rsi?.overbought ?? base.rsi.overbought,
      trendOversold: rsi?.trendOversold ?? base.rsi.trendOversold,
      trendOverbought: rsi?.trendOverbought ?? base.rsi.trendOverbought,
    },
    adx: {
      period: adx?.period ?? base.adx.period,
      strongThreshold: adx?.strongThreshold ?? base.adx.strongThreshold,
      weakThreshold: adx?.weakThreshold ?? base.adx.weakThreshold,
    },
    macd: {
      fast: macd?.fast ?? base.macd.fast,
      slow: macd?.slow ?? base.macd.slow,
      signal: macd?.signal ?? base.macd.signal,
    },
    atr: {
      period: atr?.period ?? base.atr.period,
      multiplier: atr?.multiplier ?? base.atr.multiplier,
    },
    volume: {
      period: volume?.period ?? base.volume.period,
      multiplier: volume?.multiplier ?? base.volume.multiplier,
    },
    levels: {
      lookback: levels?.lookback ?? base.levels.lookback,
      pivotWidth: levels?.pivotWidth ?? base.levels.pivotWidth,
      breakoutPercentage: levels?.breakoutPercentage ?? base.levels.breakoutPercentage,
    },
    wvix: {
      period: wvix?.period ?? base.wvix.period,
      bandPeriod: wvix?.bandPeriod ?? base.wvix.bandPeriod,
      bandMultiplier: wvix?.bandMultiplier ?? base.wvix.bandMultiplier,
    },
    stochastic: {
      period: stochastic?.period ?? base.stochastic.period,
      smoothing: stochastic?.smoothing ?? base.stochastic.smoothing,
      signalPeriod: stochastic?.signalPeriod ?? base.stochastic.signalPeriod,
      oversold: stochastic?.oversold ?? base.stochastic.oversold,
    },
    minAlignedSignals: overrides.minAlignedSignals ?? base.minAlignedSignals,
    signalDiffThreshold: overrides.signalDiffThreshold ?? base.signalDiffThreshold,
  };
}

function isPositiveInteger(value: number, min = 1): boolean {
  return Number.isInteger(value) && value >= min;
}

/**
 * List every problem with a resolved configuration (empty when valid)
 */
export function collectConfigIssues(config: EngineConfig): string[] {
  const issues: string[] = [];

  if (config.emaPeriods.length < 2) {
    issues.push('emaPeriods must list at least two periods');
  }
  for (const period of config.emaPeriods) {
    if (!isPositiveInteger(period, 2)) {
      issues.push(`emaPeriods entry ${period} must be an integer >= 2`);
    }
  }
  if (new Set(config.emaPeriods).size !== config.emaPeriods.length) {
    issues.push('emaPeriods must not contain duplicates');
  }
  for (const period of config.priceCrossPeriods) {
    if (!config.emaPeriods.includes(period)) {
      issues.push(`priceCrossPeriods entry ${period} is not one of emaPeriods`);
    }
  }

  const { rsi, adx, macd, atr, volume, levels, wvix, stochastic } = config;

  if (!isPositiveInteger(rsi.period, 2)) {
    issues.push('rsi.period must be an integer >= 2');
  }
  if (!(rsi.oversold > 0 && rsi.oversold < rsi.overbought && rsi.overbought < 100)) {
    issues.push('rsi thresholds must satisfy 0 < oversold < overbought < 100');
  } else if (
    !(rsi.oversold <= rsi.trendOversold && rsi.trendOversold < rsi.trendOverbought && rsi.trendOverbought <= rsi.overbought)
  ) {
    issues.push('rsi trend thresholds must satisfy oversold <= trendOversold < trendOverbought <= overbought');
  }

  if (!isPositiveInteger(adx.period)) {
    issues.push('adx.period must be a positive integer');
  }
  if (!(adx.weakThreshold >= 0 && adx.weakThreshold <= adx.strongThreshold && adx.strongThreshold <= 100)) {
    issues.push('adx thresholds must satisfy 0 <= weakThreshold <= strongThreshold <= 100');
  }

  if (!isPositiveInteger(macd.fast) || !isPositiveInteger(macd.slow) || !isPositiveInteger(macd.signal)) {
    issues.push('macd periods must be positive integers');
  } else if (macd.fast >= macd.slow) {
    issues.push(`macd.fast (${macd.fast}) must be less than macd.slow (${macd.slow})`);
  }

  if (!isPositiveInteger(atr.period)) {
    issues.push('atr.period must be a positive integer');
  }
  if (!(atr.multiplier >= 0)) {
    issues.push('atr.multiplier must be >= 0');
  }

  if (!isPositiveInteger(volume.period)) {
    issues.push('volume.period must be a positive integer');
  }
  if (!(volume.multiplier > 0)) {
    issues.push('volume.multiplier must be > 0');
  }

  if (!isPositiveInteger(levels.pivotWidth)) {
    issues.push('levels.pivotWidth must be a positive integer');
  } else if (!isPositiveInteger(levels.lookback, 2 * levels.pivotWidth + 1)) {
    issues.push(`levels.lookback must be an integer >= ${2 * levels.pivotWidth + 1}`);
  }
  if (!(levels.breakoutPercentage >= 0)) {
    issues.push('levels.breakoutPercentage must be >= 0');
  }

  if (!isPositiveInteger(wvix.period) || !isPositiveInteger(wvix.bandPeriod, 2)) {
    issues.push('wvix.period must be a positive integer and wvix.bandPeriod an integer >= 2');
  }
  if (!(wvix.bandMultiplier > 0)) {
    issues.push('wvix.bandMultiplier must be > 0');
  }

  if (
    !isPositiveInteger(stochastic.period) ||
    !isPositiveInteger(stochastic.smoothing) ||
    !isPositiveInteger(stochastic.signalPeriod)
  ) {
    issues.push('stochastic periods must be positive integers');
  }
  if (!(stochastic.oversold > 0 && stochastic.oversold < 100)) {
    issues.push('stochastic.oversold must be between 0 and 100');
  }

  if (!isPositiveInteger(config.minAlignedSignals, 2)) {
    issues.push('minAlignedSignals must be an integer >= 2');
  }
  if (!isPositiveInteger(config.signalDiffThreshold)) {
    issues.push('signalDiffThreshold must be a positive integer');
  }

  // Only meaningful once the periods themselves are sane
  if (issues.length === 0) {
    const required = minimumBars(config);
    if (!isPositiveInteger(config.seriesWindow, required)) {
      issues.push(`seriesWindow must be an integer >= ${required} for the configured periods`);
    }
  } else if (!isPositiveInteger(config.seriesWindow)) {
    issues.push('seriesWindow must be a positive integer');
  }

  return issues;
}

/**
 * @throws {InvalidConfigError} listing every issue found
 */
export function validateEngineConfig(config: EngineConfig): EngineConfig {
  const issues = collectConfigIssues(config);
  if (issues.length > 0) {
    throw new InvalidConfigError(issues);
  }
  return config;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readNumber(source: Record<string, unknown>, key: string, path: string, issues: string[]): number | undefined {
  const value = source[key];
  if (value === undefined) {
    return undefined;
  }
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    issues.push(`${path} must be a finite number`);
    return undefined;
  }
  return value;
}

function readNumberList(source: Record<string, unknown>, key: string, issues: string[]): number[] | undefined {
  const value = source[key];
  if (value === undefined) {
    return undefined;
  }
  if (!Array.isArray(value)) {
    issues.push(`${key} must be an array of numbers`);
    return undefined;
  }
  const numbers: number[] = [];
  for (const entry of value) {
    if (typeof entry !== 'number' || !Number.isFinite(entry)) {
      issues.push(`${key} must be an array of numbers`);
      return undefined;
    }
    numbers.push(entry);
  }
  return numbers;
}

function readGroup<F extends string>(
  source: Record<string, unknown>,
  key: GroupKey,
  fields: readonly F[],
  issues: string[],
): Partial<Record<F, number>> | undefined {
  const value = source[key];
  if (value === undefined) {
    return undefined;
  }
  if (!isRecord(value)) {
    issues.push(`${key} must be an object`);
    return undefined;
  }

  const known: ReadonlyArray<string> = fields;
  for (const field of Object.keys(value)) {
    if (!known.includes(field)) {
      issues.push(`${key}.${field} is not a recognized option`);
    }
  }

  const group: Partial<Record<F, number>> = {};
  for (const field of fields) {
    const parsed = readNumber(value, field, `${key}.${field}`, issues);
    if (parsed !== undefined) {
      group[field] = parsed;
    }
  }
  return group;
}

const TOP_LEVEL_KEYS: ReadonlyArray<keyof EngineConfig> = [
  'seriesWindow',
  'emaPeriods',
  'priceCrossPeriods',
  'rsi',
  'adx',
  'macd',
  'atr',
  'volume',
  'levels',
  'wvix',
  'stochastic',
  'minAlignedSignals',
  'signalDiffThreshold',
];

/**
 * Turn untrusted JSON (request body, config file) into typed overrides.
 *
 * @throws {InvalidConfigError} on unknown keys or wrongly typed values
 */
export function parseEngineConfigOverrides(input: unknown): EngineConfigOverrides {
  if (!isRecord(input)) {
    throw new InvalidConfigError(['configuration must be a JSON object']);
  }

  const issues: string[] = [];
  const known: ReadonlyArray<string> = TOP_LEVEL_KEYS;
  for (const key of Object.keys(input)) {
    if (!known.includes(key)) {
      issues.push(`${key} is not a recognized option`);
    }
  }

  const overrides: EngineConfigOverrides = {
    seriesWindow: readNumber(input, 'seriesWindow', 'seriesWindow', issues),
    emaPeriods: readNumberList(input, 'emaPeriods', issues),
    priceCrossPeriods: readNumberList(input, 'priceCrossPeriods', issues),
    rsi: readGroup(input, 'rsi', RSI_FIELDS, issues),
    adx: readGroup(input, 'adx', ADX_FIELDS, issues),
    macd: readGroup(input, 'macd', MACD_FIELDS, issues),
    atr: readGroup(input, 'atr', ATR_FIELDS, issues),
    volume: readGroup(input, 'volume', VOLUME_FIELDS, issues),
    levels: readGroup(input, 'levels', LEVELS_FIELDS, issues),
    wvix: readGroup(input, 'wvix', WVIX_FIELDS, issues),
    stochastic: readGroup(input, 'stochastic', STOCHASTIC_FIELDS, issues),
    minAlignedSignals: readNumber(input, 'minAlignedSignals', 'minAlignedSignals', issues),
    signalDiffThreshold: readNumber(input, 'signalDiffThreshold', 'signalDiffThreshold', issues),
  };

  if (issues.length > 0) {
    throw new InvalidConfigError(issues);
  }
  return overrides;
}
