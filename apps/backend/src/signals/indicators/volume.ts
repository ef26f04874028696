/**
 * Volume Indicators
 */

import { SMA } from 'technicalindicators';
import { finiteOrNull, padLeft, requireBars, requirePeriod } from './series';

/**
 * Simple average of the n volumes before each bar; the bar itself is excluded
 */
export function volumeAverage(volumes: readonly number[], period: number): Array<number | null> {
  requirePeriod('volumeAverage', 'period', period);
  requireBars(`volumeAverage(${period})`, period + 1, volumes.length);

  const trailing = padLeft(volumes.length, SMA.calculate({ period, values: [...volumes] })).map(finiteOrNull);
  return [null, ...trailing.slice(0, -1)];
}
