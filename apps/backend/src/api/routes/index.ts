/**
 * API Routes
 * Mounts every route group on one router
 */

import { Router } from 'express';
import type { SignalReplayService } from '../../backtest/services/SignalReplayService';
import type { EvaluationService } from '../../evaluation';
import type { HealthCheckService } from '../../monitoring/HealthCheckService';
import type { ConfigStore } from '../../signals/config/ConfigStore';
import type { StateTracker } from '../../signals/state/StateTracker';
import { createBacktestRoutes } from './backtests';
import { createConfigRoutes } from './config';
import { createMonitoringRoutes } from './monitoring';
import { createSignalRoutes } from './signals';

export interface ApiServices {
  healthCheckService: HealthCheckService;
  configStore: ConfigStore;
  tracker: StateTracker;
  evaluationService: EvaluationService;
  replayService: SignalReplayService;
}

export function createRoutes(services: ApiServices): Router {
  const router = Router();

  // Monitoring routes (health, metrics)
  router.use('/', createMonitoringRoutes(services.healthCheckService));

  router.use('/config', createConfigRoutes(services.configStore));
  router.use('/signals', createSignalRoutes(services.tracker, services.evaluationService));
  router.use('/backtests', createBacktestRoutes(services.replayService));

  return router;
}
