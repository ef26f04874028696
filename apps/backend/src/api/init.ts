/**
 * Service Initialization
 * Creates and wires the engine, state, data sources, delivery and worker
 */

import { closeQueues, closeRedis, getRedisClient, waitForRedis } from '@trend-alert/shared';
import type { Pool } from 'pg';
import { SignalReplayService } from '../backtest';
import { EvaluationService, startEvaluationWorker } from '../evaluation';
import {
  BinanceKlineClient,
  CandleRepository,
  closeDatabasePool,
  createDatabasePool,
  type CandleSource,
} from '../market-data';
import { HealthCheckService } from '../monitoring';
import { ConsoleNotifier, TelegramNotifier, type NotificationSink } from '../notifications';
import {
  ConfigStore,
  loadEngineConfig,
  RedisSymbolStateStore,
  SignalEngine,
  StateTracker,
} from '../signals';
import type { ServiceConfig } from './config';
import type { ApiServices } from './routes';

export interface InitializedServices {
  services: ApiServices;
  cleanup: () => Promise<void>;
}

function createSinks(config: ServiceConfig): NotificationSink[] {
  const { botToken, chatId } = config.telegram;
  if (botToken && chatId) {
    return [new TelegramNotifier({ botToken, chatId })];
  }
  console.log('[Init] Telegram not configured, alerts go to stdout');
  return [new ConsoleNotifier()];
}

/**
 * Initialize all services
 * Must be called before starting the server
 */
export async function initializeServices(config: ServiceConfig): Promise<InitializedServices> {
  console.log('Initializing services...');

  // Engine configuration (file overrides on top of defaults)
  const configStore = new ConfigStore(loadEngineConfig(config.engineConfigFile));

  // Redis holds per-pair alert state and the evaluation queue
  const redis = getRedisClient(config.redisUrl);
  await waitForRedis(redis);

  // Candle source
  let pool: Pool | undefined;
  let candles: CandleSource;
  if (config.candleSource === 'database' && config.databaseUrl) {
    pool = createDatabasePool(config.databaseUrl);
    candles = new CandleRepository(pool);
  } else {
    candles = new BinanceKlineClient({ baseUrl: config.binanceBaseUrl });
  }
  console.log(`[Init] Candle source: ${config.candleSource}`);

  const engine = new SignalEngine();
  const tracker = new StateTracker(new RedisSymbolStateStore(redis, config.stateTtlSeconds), configStore);

  const evaluationService = new EvaluationService({
    candles,
    engine,
    tracker,
    config: configStore,
    sinks: createSinks(config),
  });
  const replayService = new SignalReplayService(candles, engine, configStore);
  const healthCheckService = new HealthCheckService(pool);

  // Consumes evaluation jobs enqueued by an external scheduler
  startEvaluationWorker(evaluationService, config.workerConcurrency);

  console.log('Services initialized successfully');

  return {
    services: { healthCheckService, configStore, tracker, evaluationService, replayService },
    cleanup: async (): Promise<void> => {
      console.log('Cleaning up services...');
      // Queues and workers before the Redis connection they share
      await closeQueues();
      await closeRedis();
      if (pool) {
        await closeDatabasePool(pool);
      }
      console.log('Services cleaned up');
    },
  };
}
