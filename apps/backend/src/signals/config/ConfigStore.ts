/**
 * Config Store
 * Holds the live engine configuration; updates are validated and swapped atomically
 */

import type { ConfigSource } from '../state/StateTracker';
import {
  DEFAULT_ENGINE_CONFIG,
  resolveEngineConfig,
  validateEngineConfig,
  type EngineConfig,
  type EngineConfigOverrides,
} from './EngineConfig';

function freezeConfig(config: EngineConfig): Readonly<EngineConfig> {
  Object.freeze(config.emaPeriods);
  Object.freeze(config.priceCrossPeriods);
  Object.freeze(config.rsi);
  Object.freeze(config.adx);
  Object.freeze(config.macd);
  Object.freeze(config.atr);
  Object.freeze(config.volume);
  Object.freeze(config.levels);
  Object.freeze(config.wvix);
  Object.freeze(config.stochastic);
  return Object.freeze(config);
}

export class ConfigStore implements ConfigSource {
  private snapshot: Readonly<EngineConfig>;

  /**
   * @throws {InvalidConfigError} if the initial configuration is invalid
   */
  constructor(initial: EngineConfig = DEFAULT_ENGINE_CONFIG) {
    this.snapshot = freezeConfig(validateEngineConfig(resolveEngineConfig({}, initial)));
  }

  /**
   * Current configuration. Callers keep the returned object for a whole
   * cycle; later updates never mutate it.
   */
  current(): EngineConfig {
    return this.snapshot;
  }

  /**
   * Merge overrides onto the current configuration and swap it in.
   * On validation failure the current configuration stays in force.
   *
   * @throws {InvalidConfigError}
   */
  update(overrides: EngineConfigOverrides): EngineConfig {
    const next = validateEngineConfig(resolveEngineConfig(overrides, this.snapshot));
    this.snapshot = freezeConfig(next);
    console.log('[Config] Engine configuration updated');
    return this.snapshot;
  }

  /**
   * Back to defaults
   */
  reset(): EngineConfig {
    this.snapshot = freezeConfig(resolveEngineConfig());
    return this.snapshot;
  }
}
