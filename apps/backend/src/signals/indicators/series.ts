/**
 * Series helpers shared by every indicator
 */

import { InsufficientDataError, InvalidConfigError } from '../errors';

/**
 * Align a library output (which starts at the first computable bar) to the
 * input bars, padding the front with null
 */
export function padLeft<T>(fullLength: number, values: ReadonlyArray<T | null | undefined>): Array<T | null> {
  const pad: Array<T | null> = new Array<T | null>(Math.max(0, fullLength - values.length)).fill(null);
  return pad.concat(values.map((value) => value ?? null));
}

export function finiteOrNull(value: number | null | undefined): number | null {
  return value !== null && value !== undefined && Number.isFinite(value) ? value : null;
}

/**
 * @throws {InvalidConfigError} when the period is not an integer >= min
 */
export function requirePeriod(indicator: string, name: string, period: number, min = 1): void {
  if (!Number.isInteger(period) || period < min) {
    throw new InvalidConfigError([`${indicator} ${name} must be an integer >= ${min}, got ${period}`]);
  }
}

/**
 * @throws {InsufficientDataError} when fewer than required bars are available
 */
export function requireBars(indicator: string, required: number, actual: number): void {
  if (actual < required) {
    throw new InsufficientDataError(indicator, required, actual);
  }
}
