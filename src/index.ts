/**
 * xi-attractor
 *
 * Bounded closure attractors over AND / OR / NOT, a period-2 oscillator and
 * the validators that check both.
 *
 * @packageDocumentation
 */

export { VERSION } from './version.js';

export * from './algebra/index.js';
export * from './closure/index.js';
export * from './oscillator/index.js';
export * from './validator/index.js';

export {
  ConfigParseError,
  ConfigValidationError,
  EnvCoercionError,
  DEFAULT_CONFIG,
  loadConfig,
  parseConfig,
  validateConfig,
} from './config/index.js';
export type { Config, LoadConfigOptions, PartialConfig } from './config/index.js';

export { Logger } from './utils/logger.js';
export type { LogEntry, LogLevel, LoggerOptions } from './utils/logger.js';
