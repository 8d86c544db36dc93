/**
 * Loads the effective configuration: xi.toml, then XI_* overrides, then
 * semantic validation.
 *
 * @packageDocumentation
 */

import { safeExists, safeReadFile } from '../utils/safe-fs.js';
import { CONFIG_FILE_NAME } from './defaults.js';
import { applyEnvOverrides, type EnvRecord } from './env.js';
import { ConfigParseError, getDefaultConfig, parseConfig } from './parser.js';
import type { Config } from './types.js';
import { assertConfigValid } from './validator.js';

/**
 * Options for {@link loadConfig}.
 */
export interface LoadConfigOptions {
  /**
   * Explicit config file. When given, the file must exist; otherwise
   * xi.toml in the working directory is read if present.
   */
  configPath?: string;
  /** Environment to read overrides from (defaults to process.env). */
  env?: EnvRecord;
}

/**
 * Loads and validates the configuration.
 *
 * @param options - File and environment sources.
 * @returns The validated configuration.
 * @throws ConfigParseError if an explicit file is missing or the TOML is invalid.
 * @throws EnvCoercionError if an XI_* variable cannot be coerced.
 * @throws ConfigValidationError if the merged values are out of range.
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<Config> {
  const { configPath, env = process.env } = options;
  const filePath = configPath ?? CONFIG_FILE_NAME;

  let config: Config;
  if (await safeExists(filePath)) {
    config = parseConfig(await safeReadFile(filePath));
  } else if (configPath !== undefined) {
    throw new ConfigParseError(`Config file not found: ${configPath}`);
  } else {
    config = getDefaultConfig();
  }

  const merged = applyEnvOverrides(config, env);
  assertConfigValid(merged);
  return merged;
}
