/**
 * Health Check Service
 * Provides comprehensive system health status
 */

import { getAllQueuesHealth, getRedisClient, type QueueHealth } from '@trend-alert/shared';
import type { Pool } from 'pg';
import { databaseConnectionGauge, redisConnectionGauge } from './metrics';

export interface HealthStatus {
  status: 'healthy' | 'degraded' | 'unhealthy';
  timestamp: string;
  uptime: number;
  services: {
    database: ServiceHealth;
    redis: ServiceHealth;
  };
  metrics?: {
    queues?: QueueHealth[];
  };
}

export interface ServiceHealth {
  status: 'up' | 'down' | 'disabled';
  responseTime?: number;
  error?: string;
}

export class HealthCheckService {
  private startTime: number;

  /**
   * @param pool - only present when candles are read from the database
   */
  constructor(private readonly pool?: Pool) {
    this.startTime = Date.now();
  }

  /**
   * Perform basic health check
   */
  async checkHealth(): Promise<HealthStatus> {
    const [dbHealth, redisHealth] = await Promise.all([this.checkDatabase(), this.checkRedis()]);

    if (dbHealth.status !== 'disabled') {
      databaseConnectionGauge.set(dbHealth.status === 'up' ? 1 : 0);
    }
    redisConnectionGauge.set(redisHealth.status === 'up' ? 1 : 0);

    return {
      status: this.determineOverallStatus(dbHealth, redisHealth),
      timestamp: new Date().toISOString(),
      uptime: Math.floor((Date.now() - this.startTime) / 1000),
      services: {
        database: dbHealth,
        redis: redisHealth,
      },
    };
  }

  /**
   * Perform detailed health check with queue depths
   */
  async checkDetailedHealth(): Promise<HealthStatus> {
    const basicHealth = await this.checkHealth();

    if (basicHealth.services.redis.status !== 'up') {
      return { ...basicHealth, metrics: {} };
    }

    try {
      const queues = await getAllQueuesHealth();
      return { ...basicHealth, metrics: { queues } };
    } catch (error) {
      console.error('[Health] Failed to read queue health:', error instanceof Error ? error.message : error);
      return { ...basicHealth, metrics: {} };
    }
  }

  /**
   * Check database connection
   */
  private async checkDatabase(): Promise<ServiceHealth> {
    if (!this.pool) {
      return { status: 'disabled' };
    }

    const start = Date.now();

    try {
      await this.pool.query('SELECT 1');
      return {
        status: 'up',
        responseTime: Date.now() - start,
      };
    } catch (error) {
      return {
        status: 'down',
        responseTime: Date.now() - start,
        error: error instanceof Error ? error.message : 'Unknown error',
      };
    }
  }

  /**
   * Check Redis connection
   */
  private async checkRedis(): Promise<ServiceHealth> {
    const start = Date.now();

    try {
      const redis = getRedisClient();
      const result = await redis.ping();
      const responseTime = Date.now() - start;

      if (result === 'PONG') {
        return {
          status: 'up',
          responseTime,
        };
      }

      return {
        status: 'down',
        responseTime,
        error: 'Unexpected ping response',
      };
    } catch (error) {
      return {
        status: 'down',
        responseTime: Date.now() - start,
        error: error instanceof Error ? error.message : 'Unknown error',
      };
    }
  }

  /**
   * Redis holds alert state, so without it nothing is healthy.
   * A missing database only degrades (replays and DB-backed candles fail).
   */
  private determineOverallStatus(
    dbHealth: ServiceHealth,
    redisHealth: ServiceHealth,
  ): 'healthy' | 'degraded' | 'unhealthy' {
    if (redisHealth.status !== 'up') {
      return dbHealth.status === 'up' ? 'degraded' : 'unhealthy';
    }
    return dbHealth.status === 'down' ? 'degraded' : 'healthy';
  }
}
