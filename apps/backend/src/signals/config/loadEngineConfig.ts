/**
 * Engine Config File Loader
 * Optional JSON file of overrides applied on top of the defaults at startup
 */

import { readFileSync } from 'fs';
import { InvalidConfigError } from '../errors';
import {
  parseEngineConfigOverrides,
  resolveEngineConfig,
  validateEngineConfig,
  type EngineConfig,
} from './EngineConfig';

/**
 * @throws {InvalidConfigError} if the file is not valid JSON or holds invalid options
 */
export function loadEngineConfig(path: string | undefined): EngineConfig {
  if (!path) {
    return resolveEngineConfig();
  }

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, 'utf8'));
  } catch (error) {
    const message = error instanceof Error ? error.message : 'Unknown error';
    throw new InvalidConfigError([`Cannot read engine config file ${path}: ${message}`]);
  }

  const config = validateEngineConfig(resolveEngineConfig(parseEngineConfigOverrides(raw)));
  console.log(`[Config] Loaded engine configuration from ${path}`);
  return config;
}
