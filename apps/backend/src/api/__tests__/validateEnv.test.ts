/**
 * Environment Validation Tests
 */

import { validateEnvironment } from '../validateEnv';

describe('validateEnvironment', () => {
  it('should accept a minimal environment', () => {
    expect(() => validateEnvironment({ REDIS_URL: 'redis://localhost:6379' })).not.toThrow();
  });

  it('should require REDIS_URL', () => {
    expect(() => validateEnvironment({})).toThrow(
      'Environment validation failed. Fix the following issues:\n\n' +
        '  - REDIS_URL: Required but not set\n\n' +
        'See .env.example for available variables.',
    );
  });

  it('should list every problem in one error', () => {
    expect(() =>
      validateEnvironment({
        REDIS_URL: 'redis://localhost:6379',
        PORT: 'abc',
        CANDLE_SOURCE: 'database',
        TELEGRAM_BOT_TOKEN: 'test-token',
      }),
    ).toThrow(
      'Environment validation failed. Fix the following issues:\n\n' +
        '  - PORT: Must be a positive integer\n' +
        '  - DATABASE_URL: Required but not set\n' +
        '  - TELEGRAM_CHAT_ID: TELEGRAM_BOT_TOKEN and TELEGRAM_CHAT_ID must be set together\n\n' +
        'See .env.example for available variables.',
    );
  });

  it('should reject an unknown candle source', () => {
    expect(() => validateEnvironment({ REDIS_URL: 'redis://localhost:6379', CANDLE_SOURCE: 'kraken' })).toThrow(
      'CANDLE_SOURCE: Must be "binance" or "database"',
    );
  });
});
