/**
 * Signal Engine Errors
 * Failure taxonomy shared by indicators, configuration and candle sources
 */

/**
 * Series too short for an indicator lookback.
 * Recoverable: the next cycle may bring enough history.
 */
export class InsufficientDataError extends Error {
  public readonly code = 'INSUFFICIENT_DATA';
  public readonly statusCode = 422;

  constructor(
    public readonly indicator: string,
    public readonly required: number,
    public readonly actual: number,
  ) {
    super(`${indicator} requires at least ${required} bars, got ${actual}`);
    this.name = 'InsufficientDataError';
    Object.setPrototypeOf(this, InsufficientDataError.prototype);
  }
}

/**
 * Engine configuration rejected by validation.
 * Fatal for the evaluation that received it; no partial decision is produced.
 */
export class InvalidConfigError extends Error {
  public readonly code = 'INVALID_CONFIG';
  public readonly statusCode = 400;

  constructor(public readonly issues: string[]) {
    super(`Invalid engine configuration: ${issues.join('; ')}`);
    this.name = 'InvalidConfigError';
    Object.setPrototypeOf(this, InvalidConfigError.prototype);
  }
}

/**
 * Candle source could not supply fresh-enough data; the cycle is abandoned
 */
export class StaleDataError extends Error {
  public readonly code = 'STALE_DATA';

  constructor(
    message: string,
    public readonly symbol: string,
    public readonly latestOpenTime: Date | null,
  ) {
    super(message);
    this.name = 'StaleDataError';
    Object.setPrototypeOf(this, StaleDataError.prototype);
  }
}
