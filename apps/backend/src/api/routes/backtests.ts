/**
 * Backtest API Routes
 * POST /backtests/replay
 */

import type { ReplayResponse } from '@trend-alert/shared';
import type { NextFunction, Request, Response } from 'express';
import { Router } from 'express';
import { MAX_REPLAY_BARS, type SignalReplayService } from '../../backtest/services/SignalReplayService';
import { serializeDecision } from '../../signals/codec/decisionCodec';
import { parseWatchPair, RequestValidationError } from '../middleware';

export function createBacktestRoutes(replayService: SignalReplayService): Router {
  const router = Router();

  /**
   * POST /backtests/replay
   * Replay recent candles through the engine and report which bars would have alerted
   */
  router.post('/replay', (req: Request, res: Response, next: NextFunction): void => {
    handleReplay(req, res, next, replayService);
  });

  return router;
}

function readLimit(body: Record<string, unknown>): number | undefined {
  const { limit } = body;
  if (limit === undefined) {
    return undefined;
  }
  if (typeof limit !== 'number' || !Number.isInteger(limit) || limit < 1 || limit > MAX_REPLAY_BARS) {
    throw new RequestValidationError('Invalid replay request', [
      `limit must be an integer between 1 and ${MAX_REPLAY_BARS}`,
    ]);
  }
  return limit;
}

/**
 * Handle POST /backtests/replay
 */
function handleReplay(req: Request, res: Response, next: NextFunction, replayService: SignalReplayService): void {
  void (async (): Promise<void> => {
    try {
      const body: unknown = req.body;
      if (typeof body !== 'object' || body === null || Array.isArray(body)) {
        throw new RequestValidationError('Request body must be a JSON object');
      }

      const fields: Record<string, unknown> = { ...body };
      const { symbol, timeframe } = parseWatchPair(fields.symbol, fields.timeframe);
      const limit = readLimit(fields);

      const result = await replayService.replay({ symbol, timeframe, limit });

      const response: ReplayResponse = {
        symbol: result.symbol,
        timeframe: result.timeframe,
        requested: result.requested,
        barsEvaluated: result.barsEvaluated,
        alerts: result.alerts,
        verdictCounts: result.verdictCounts,
        steps: result.steps.map((step) => ({
          decision: serializeDecision(step.decision),
          notified: step.notified,
        })),
      };
      res.json(response);
    } catch (error) {
      next(error);
    }
  })();
}
