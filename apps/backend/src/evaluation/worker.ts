/**
 * Evaluation Worker
 * BullMQ consumer for evaluation cycles. Jobs are enqueued by an external
 * scheduler; this process only consumes them.
 */

import {
  createWorker,
  QueueName,
  type JobProcessor,
  type SignalEvaluationJob,
} from '@trend-alert/shared';
import type { Worker } from 'bullmq';
import type { EvaluationService } from './services/EvaluationService';

export function createEvaluationProcessor(service: EvaluationService): JobProcessor<SignalEvaluationJob> {
  return async (job) => {
    const { symbol, timeframe } = job.data;
    const result = await service.runCycle(symbol, timeframe);
    console.log(`[Worker] ${symbol}:${timeframe} -> ${result.outcome}`);
  };
}

export function startEvaluationWorker(service: EvaluationService, concurrency?: number): Worker<SignalEvaluationJob> {
  return createWorker<SignalEvaluationJob>(
    QueueName.SIGNAL_EVALUATION,
    createEvaluationProcessor(service),
    concurrency,
  );
}
