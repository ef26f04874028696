/**
 * Service Configuration
 * Centralized configuration for the HTTP server, data sources and alert delivery
 */

export type CandleSourceKind = 'binance' | 'database';

const SYMBOL_PATTERN = /^[A-Z0-9]{2,20}$/;

export function isSymbol(value: string): boolean {
  return SYMBOL_PATTERN.test(value.toUpperCase());
}

function candleSourceFrom(value: string | undefined): CandleSourceKind {
  return value === 'database' ? 'database' : 'binance';
}

export const config = {
  port: parseInt(process.env.PORT || '3000', 10),
  apiPrefix: '/api/v1',
  nodeEnv: process.env.NODE_ENV || 'development',

  databaseUrl: process.env.DATABASE_URL || undefined,
  redisUrl: process.env.REDIS_URL || 'redis://localhost:6379',

  // Candle data
  candleSource: candleSourceFrom(process.env.CANDLE_SOURCE),
  binanceBaseUrl: process.env.BINANCE_BASE_URL || 'https://api.binance.com',

  // Alert delivery; console output when Telegram is not configured
  telegram: {
    botToken: process.env.TELEGRAM_BOT_TOKEN || undefined,
    chatId: process.env.TELEGRAM_CHAT_ID || undefined,
  },

  // Evaluation
  workerConcurrency: parseInt(process.env.WORKER_CONCURRENCY || '4', 10),
  stateTtlSeconds: parseInt(process.env.STATE_TTL_SECONDS || String(7 * 24 * 60 * 60), 10), // 7 days
  engineConfigFile: process.env.ENGINE_CONFIG_FILE || undefined,

  // Rate Limiting
  rateLimit: {
    windowMs: 60 * 1000, // 1 minute
    max: parseInt(process.env.RATE_LIMIT_MAX || '100', 10),
    writeMax: parseInt(process.env.RATE_LIMIT_WRITE_MAX || '20', 10),
  },
};

export type ServiceConfig = typeof config;
