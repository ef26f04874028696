/**
 * Decision Codec
 * JSON wire format for decisions and per-symbol state (Redis, HTTP).
 * Decoding validates every field; malformed input never yields a partial Decision.
 */

import {
  isTimeframe,
  type Decision,
  type SerializedDecision,
  type SerializedSymbolState,
  type SignalName,
  type SymbolState,
  type Timeframe,
  type TrendRegime,
  type Verdict,
  type VolumeClass,
} from '@trend-alert/shared';
import { isSignalName } from '../catalog';

export class DecisionDecodeError extends Error {
  public readonly code = 'INVALID_DECISION';

  constructor(message: string) {
    super(message);
    this.name = 'DecisionDecodeError';
    Object.setPrototypeOf(this, DecisionDecodeError.prototype);
  }
}

const VERDICTS: ReadonlyArray<string> = ['BUY', 'SELL', 'HOLD'] satisfies Verdict[];
const REGIMES: ReadonlyArray<string> = ['STRONG', 'MODERATE', 'WEAK'] satisfies TrendRegime[];
const VOLUME_CLASSES: ReadonlyArray<string> = ['HIGH', 'NORMAL'] satisfies VolumeClass[];

function isVerdict(value: string): value is Verdict {
  return VERDICTS.includes(value);
}

function isRegime(value: string): value is TrendRegime {
  return REGIMES.includes(value);
}

function isVolumeClass(value: string): value is VolumeClass {
  return VOLUME_CLASSES.includes(value);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readString(source: Record<string, unknown>, key: string): string {
  const value = source[key];
  if (typeof value !== 'string') {
    throw new DecisionDecodeError(`${key} must be a string`);
  }
  return value;
}

function readDate(source: Record<string, unknown>, key: string): Date {
  const date = new Date(readString(source, key));
  if (Number.isNaN(date.getTime())) {
    throw new DecisionDecodeError(`${key} must be an ISO 8601 date`);
  }
  return date;
}

function readTimeframe(source: Record<string, unknown>): Timeframe {
  const value = readString(source, 'timeframe');
  if (!isTimeframe(value)) {
    throw new DecisionDecodeError(`Unknown timeframe: ${value}`);
  }
  return value;
}

function readStringList(source: Record<string, unknown>, key: string): string[] {
  const value = source[key];
  if (!Array.isArray(value)) {
    throw new DecisionDecodeError(`${key} must be an array of strings`);
  }
  return value.map((entry) => {
    if (typeof entry !== 'string') {
      throw new DecisionDecodeError(`${key} must be an array of strings`);
    }
    return entry;
  });
}

function readSignals(source: Record<string, unknown>, key: string): SignalName[] {
  return readStringList(source, key).map((entry) => {
    if (!isSignalName(entry)) {
      throw new DecisionDecodeError(`Unknown signal: ${entry}`);
    }
    return entry;
  });
}

export function serializeDecision(decision: Decision): SerializedDecision {
  return {
    symbol: decision.symbol,
    timeframe: decision.timeframe,
    verdict: decision.verdict,
    score: decision.score,
    reasons: [...decision.reasons],
    timestamp: decision.timestamp.toISOString(),
    regime: decision.regime,
    volume: decision.volume,
    signals: [...decision.signals],
    doubleDown: decision.doubleDown,
  };
}

export function deserializeDecision(input: unknown): Decision {
  if (!isRecord(input)) {
    throw new DecisionDecodeError('Decision must be an object');
  }

  const verdict = readString(input, 'verdict');
  if (!isVerdict(verdict)) {
    throw new DecisionDecodeError(`Unknown verdict: ${verdict}`);
  }
  const regime = readString(input, 'regime');
  if (!isRegime(regime)) {
    throw new DecisionDecodeError(`Unknown regime: ${regime}`);
  }
  const volume = readString(input, 'volume');
  if (!isVolumeClass(volume)) {
    throw new DecisionDecodeError(`Unknown volume class: ${volume}`);
  }
  const score = input.score;
  if (typeof score !== 'number' || !Number.isInteger(score) || score < 0 || score > 100) {
    throw new DecisionDecodeError('score must be an integer between 0 and 100');
  }
  // Absent in state written before the flag existed
  const doubleDown = input.doubleDown ?? false;
  if (typeof doubleDown !== 'boolean') {
    throw new DecisionDecodeError('doubleDown must be a boolean');
  }

  return {
    symbol: readString(input, 'symbol'),
    timeframe: readTimeframe(input),
    verdict,
    score,
    reasons: readStringList(input, 'reasons'),
    timestamp: readDate(input, 'timestamp'),
    regime,
    volume,
    signals: readSignals(input, 'signals'),
    doubleDown,
  };
}

export function serializeSymbolState(state: SymbolState): SerializedSymbolState {
  return {
    symbol: state.symbol,
    timeframe: state.timeframe,
    lastDecision: serializeDecision(state.lastDecision),
    lastSignals: [...state.lastSignals],
    lastNotifiedAt: state.lastNotifiedAt ? state.lastNotifiedAt.toISOString() : null,
    updatedAt: state.updatedAt.toISOString(),
  };
}

export function deserializeSymbolState(input: unknown): SymbolState {
  if (!isRecord(input)) {
    throw new DecisionDecodeError('Symbol state must be an object');
  }

  return {
    symbol: readString(input, 'symbol'),
    timeframe: readTimeframe(input),
    lastDecision: deserializeDecision(input.lastDecision),
    lastSignals: readSignals(input, 'lastSignals'),
    lastNotifiedAt: input.lastNotifiedAt === null ? null : readDate(input, 'lastNotifiedAt'),
    updatedAt: readDate(input, 'updatedAt'),
  };
}

export function encodeDecision(decision: Decision): string {
  return JSON.stringify(serializeDecision(decision));
}

/**
 * @throws {DecisionDecodeError} on malformed JSON or fields
 */
export function decodeDecision(text: string): Decision {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    throw new DecisionDecodeError(`Malformed decision JSON: ${error instanceof Error ? error.message : String(error)}`);
  }
  return deserializeDecision(parsed);
}
