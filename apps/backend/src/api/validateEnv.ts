/**
 * Environment Variable Validation
 * Validates env vars on startup and reports every problem at once
 */

interface EnvValidationError {
  variable: string;
  issue: string;
}

type Env = Record<string, string | undefined>;

/**
 * Validate environment variables
 * Throws one error listing every missing or invalid value
 */
export function validateEnvironment(env: Env = process.env): void {
  const errors: EnvValidationError[] = [];

  validateRequired('REDIS_URL', env, errors);
  validatePositiveInteger('PORT', env, errors);
  validatePositiveInteger('STATE_TTL_SECONDS', env, errors);
  validatePositiveInteger('WORKER_CONCURRENCY', env, errors);
  validatePositiveInteger('RATE_LIMIT_MAX', env, errors);
  validatePositiveInteger('RATE_LIMIT_WRITE_MAX', env, errors);

  const candleSource = env.CANDLE_SOURCE;
  if (candleSource && candleSource !== 'binance' && candleSource !== 'database') {
    errors.push({ variable: 'CANDLE_SOURCE', issue: 'Must be "binance" or "database"' });
  }
  if (candleSource === 'database') {
    validateRequired('DATABASE_URL', env, errors);
  }

  // Telegram needs both values or neither
  if (Boolean(env.TELEGRAM_BOT_TOKEN) !== Boolean(env.TELEGRAM_CHAT_ID)) {
    errors.push({
      variable: env.TELEGRAM_BOT_TOKEN ? 'TELEGRAM_CHAT_ID' : 'TELEGRAM_BOT_TOKEN',
      issue: 'TELEGRAM_BOT_TOKEN and TELEGRAM_CHAT_ID must be set together',
    });
  }

  if (errors.length > 0) {
    const errorMessages = errors.map((err) => `  - ${err.variable}: ${err.issue}`).join('\n');

    throw new Error(
      `Environment validation failed. Fix the following issues:\n\n${errorMessages}\n\n` +
        `See .env.example for available variables.`,
    );
  }
}

function validateRequired(name: string, env: Env, errors: EnvValidationError[]): void {
  const value = env[name];

  if (!value || value.trim() === '') {
    errors.push({
      variable: name,
      issue: 'Required but not set',
    });
  }
}

function validatePositiveInteger(name: string, env: Env, errors: EnvValidationError[]): void {
  const value = env[name];

  if (value !== undefined && value !== '' && !/^[1-9]\d*$/.test(value.trim())) {
    errors.push({
      variable: name,
      issue: 'Must be a positive integer',
    });
  }
}
