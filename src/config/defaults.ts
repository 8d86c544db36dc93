/**
 * Default configuration values for xi.toml.
 *
 * @packageDocumentation
 */

import { DEFAULT_RULES } from '../algebra/index.js';
import { DEFAULT_DEPTH_CEILING } from '../closure/index.js';
import type { ClosureConfig, Config, LoggingConfig, OscillatorConfig } from './types.js';

/**
 * Name of the configuration file looked up in the working directory.
 */
export const CONFIG_FILE_NAME = 'xi.toml';

/**
 * Default closure settings.
 */
export const DEFAULT_CLOSURE: ClosureConfig = {
  max_depth: 3,
  max_set_size: 10000,
  depth_ceiling: DEFAULT_DEPTH_CEILING,
  rules: DEFAULT_RULES,
};

/**
 * Default oscillator settings.
 */
export const DEFAULT_OSCILLATOR: OscillatorConfig = {
  steps: 10,
  initial: true,
};

/**
 * Default logging settings (debug off).
 */
export const DEFAULT_LOGGING: LoggingConfig = {
  debug: false,
};

/**
 * Complete default configuration.
 */
export const DEFAULT_CONFIG: Config = {
  closure: DEFAULT_CLOSURE,
  oscillator: DEFAULT_OSCILLATOR,
  logging: DEFAULT_LOGGING,
};
