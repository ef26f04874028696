/**
 * Signal Routes
 * GET /signals/:symbol/:timeframe, POST /signals/:symbol/:timeframe/evaluate
 */

import type { EvaluateSignalsResponse, GetSignalStateResponse } from '@trend-alert/shared';
import type { NextFunction, Request, Response } from 'express';
import { Router } from 'express';
import type { EvaluationService } from '../../evaluation';
import { serializeDecision, serializeSymbolState } from '../../signals/codec/decisionCodec';
import type { StateTracker } from '../../signals/state/StateTracker';
import { parseWatchPair } from '../middleware';

export function createSignalRoutes(tracker: StateTracker, evaluationService: EvaluationService): Router {
  const router = Router();

  /**
   * GET /signals/:symbol/:timeframe
   * Last stored decision for a pair
   */
  router.get('/:symbol/:timeframe', (req: Request, res: Response, next: NextFunction): void => {
    handleGetState(req, res, next, tracker);
  });

  /**
   * POST /signals/:symbol/:timeframe/evaluate
   * Run one alert cycle now
   */
  router.post('/:symbol/:timeframe/evaluate', (req: Request, res: Response, next: NextFunction): void => {
    handleEvaluate(req, res, next, evaluationService);
  });

  return router;
}

/**
 * Handle GET /signals/:symbol/:timeframe
 */
function handleGetState(req: Request, res: Response, next: NextFunction, tracker: StateTracker): void {
  void (async (): Promise<void> => {
    try {
      const { symbol, timeframe } = parseWatchPair(req.params.symbol, req.params.timeframe);
      const state = await tracker.getState(symbol, timeframe);

      if (!state) {
        res.status(404).json({
          error: 'NOT_FOUND',
          message: `No signal state for ${symbol}:${timeframe}`,
        });
        return;
      }

      const response: GetSignalStateResponse = {
        status: 'TRACKED',
        state: serializeSymbolState(state),
      };
      res.json(response);
    } catch (error) {
      next(error);
    }
  })();
}

/**
 * Handle POST /signals/:symbol/:timeframe/evaluate
 */
function handleEvaluate(
  req: Request,
  res: Response,
  next: NextFunction,
  evaluationService: EvaluationService,
): void {
  void (async (): Promise<void> => {
    try {
      const { symbol, timeframe } = parseWatchPair(req.params.symbol, req.params.timeframe);
      const result = await evaluationService.runCycle(symbol, timeframe);

      const response: EvaluateSignalsResponse = {
        outcome: result.outcome,
        decision: result.decision ? serializeDecision(result.decision) : null,
        changes: result.changes,
      };
      if (result.reason !== undefined) {
        response.reason = result.reason;
      }
      res.json(response);
    } catch (error) {
      next(error);
    }
  })();
}
