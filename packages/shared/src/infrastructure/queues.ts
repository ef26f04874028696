/**
 * Job Queue Configuration
 * BullMQ queues for per-(symbol, timeframe) evaluation cycles
 */

import { Job, Queue, QueueOptions, Worker, WorkerOptions } from 'bullmq';
import type { Timeframe } from '../types/domain';
import { parseRedisUrl } from './redis';

/**
 * Queue Names (BullMQ rejects ':' in queue names)
 */
export const QueueName = {
  SIGNAL_EVALUATION: 'signal-evaluation',
} as const;

export type QueueNameType = (typeof QueueName)[keyof typeof QueueName];

/**
 * Payload of one evaluation cycle
 */
export interface SignalEvaluationJob {
  symbol: string;
  timeframe: Timeframe;
}

/**
 * Get Redis connection config.
 * Workers use blocking commands, so retries per request must be unlimited.
 */
function getRedisConnection(): QueueOptions['connection'] {
  const redisUrl = process.env.REDIS_URL || 'redis://localhost:6379';
  return {
    ...parseRedisUrl(redisUrl),
    connectionName: 'trend-alert-queue',
    maxRetriesPerRequest: null,
  };
}

function queueOptionsFor(name: QueueNameType): QueueOptions {
  switch (name) {
    case QueueName.SIGNAL_EVALUATION:
      return {
        connection: getRedisConnection(),
        defaultJobOptions: {
          // A stale cycle is worthless; the next tick brings fresh candles
          attempts: 2,
          backoff: {
            type: 'fixed',
            delay: 2000,
          },
          removeOnComplete: {
            count: 200,
            age: 24 * 3600,
          },
          removeOnFail: {
            count: 500,
          },
        },
      };
  }
}

function workerOptionsFor(name: QueueNameType, concurrency?: number): WorkerOptions {
  switch (name) {
    case QueueName.SIGNAL_EVALUATION:
      return {
        connection: getRedisConnection(),
        concurrency: concurrency ?? 8,
        autorun: true,
      };
  }
}

/**
 * Queue Registry
 */
const queues = new Map<QueueNameType, Queue>();

/**
 * Create or get queue instance
 */
export function getQueue(name: QueueNameType): Queue {
  const existing = queues.get(name);
  if (existing) {
    return existing;
  }

  const queue = new Queue(name, queueOptionsFor(name));
  queues.set(name, queue);
  return queue;
}

/**
 * Worker Registry
 */
const workers = new Map<string, Worker>();

/**
 * Job Processor Function Type
 */
export type JobProcessor<T = unknown> = (job: Job<T>) => Promise<void>;

/**
 * Create worker for queue
 */
export function createWorker<T = unknown>(
  name: QueueNameType,
  processor: JobProcessor<T>,
  concurrency?: number
): Worker<T> {
  const workerId = `${name}-worker`;

  if (workers.has(workerId)) {
    throw new Error(`Worker already exists for queue: ${name}`);
  }

  const worker = new Worker<T>(name, processor, workerOptionsFor(name, concurrency));

  worker.on('failed', (job, err) => {
    console.error(`[Queue] Job ${job?.id} failed in queue ${name}:`, err);
  });

  worker.on('error', (err) => {
    console.error(`[Queue] Worker error in queue ${name}:`, err);
  });

  workers.set(workerId, worker);
  return worker;
}

/**
 * Close all queues and workers
 */
export async function closeQueues(): Promise<void> {
  const closePromises: Promise<void>[] = [];

  for (const worker of workers.values()) {
    closePromises.push(worker.close());
  }

  for (const queue of queues.values()) {
    closePromises.push(queue.close());
  }

  await Promise.all(closePromises);

  workers.clear();
  queues.clear();
}

/**
 * Queue Health Check
 */
export interface QueueHealth {
  name: QueueNameType;
  waiting: number;
  active: number;
  completed: number;
  failed: number;
  delayed: number;
}

export async function getQueueHealth(name: QueueNameType): Promise<QueueHealth> {
  const queue = getQueue(name);
  const [waiting, active, completed, failed, delayed] = await Promise.all([
    queue.getWaitingCount(),
    queue.getActiveCount(),
    queue.getCompletedCount(),
    queue.getFailedCount(),
    queue.getDelayedCount(),
  ]);

  return {
    name,
    waiting,
    active,
    completed,
    failed,
    delayed,
  };
}

/**
 * Get health for all queues
 */
export async function getAllQueuesHealth(): Promise<QueueHealth[]> {
  const queueNames = Object.values(QueueName);
  return Promise.all(queueNames.map((name) => getQueueHealth(name)));
}
