/**
 * Redis Connection Configuration
 * Single Redis instance for evaluation jobs and per-symbol alert state
 */

import Redis from 'ioredis';

export interface RedisConfig {
  host: string;
  port: number;
  password?: string;
  db?: number;
  connectionName?: string;
  maxRetriesPerRequest: number | null;
  retryStrategy?: (times: number) => number | null;
}

/**
 * Parse Redis URL from environment
 */
export function parseRedisUrl(url: string): RedisConfig {
  const parsed = new URL(url);
  const dbSegment = parsed.pathname.replace(/^\//, '');

  return {
    host: parsed.hostname,
    port: parseInt(parsed.port || '6379', 10),
    password: parsed.password || undefined,
    db: dbSegment ? parseInt(dbSegment, 10) : 0,
    connectionName: 'trend-alert',
    maxRetriesPerRequest: 3,
    retryStrategy: (times: number): number | null => {
      if (times > 10) {
        return null; // Stop retrying
      }
      return Math.min(times * 100, 3000); // Linear backoff, max 3s
    },
  };
}

/**
 * Create Redis client
 */
export function createRedisClient(config: RedisConfig): Redis {
  const client = new Redis(config);

  client.on('error', (err) => {
    console.error('[Redis] Client error:', err);
  });

  return client;
}

/**
 * Singleton Redis instance
 */
let redisClient: Redis | null = null;

/**
 * Shared client; the URL only applies to the call that creates it
 */
export function getRedisClient(url: string = process.env.REDIS_URL || 'redis://localhost:6379'): Redis {
  if (!redisClient) {
    redisClient = createRedisClient(parseRedisUrl(url));
  }
  return redisClient;
}

/**
 * Resolve once the client can serve commands; reject on the first connection error
 */
export function waitForRedis(client: Redis): Promise<void> {
  if (client.status === 'ready') {
    return Promise.resolve();
  }

  return new Promise<void>((resolve, reject) => {
    const onReady = (): void => {
      client.off('error', onError);
      resolve();
    };
    const onError = (err: Error): void => {
      client.off('ready', onReady);
      reject(err);
    };
    client.once('ready', onReady);
    client.once('error', onError);
  });
}

/**
 * Close Redis connection
 */
export async function closeRedis(): Promise<void> {
  if (redisClient) {
    await redisClient.quit();
    redisClient = null;
  }
}

/**
 * Export Redis type for type safety in consumers
 */
export type { Redis };
