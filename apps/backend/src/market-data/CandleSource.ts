/**
 * Candle Source
 * Port the evaluation cycle pulls closed candles through
 */

import type { Series, Timeframe } from '@trend-alert/shared';

export interface CandleSource {
  /**
   * Up to `lookback` most recent closed candles, oldest first.
   *
   * @throws {StaleDataError} when the newest available bar is too old to evaluate
   */
  getSeries(symbol: string, timeframe: Timeframe, lookback: number, signal?: AbortSignal): Promise<Series>;
}
