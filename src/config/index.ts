/**
 * Configuration module for xi.toml parsing, XI_* overrides and validation.
 *
 * @packageDocumentation
 */

export { ConfigParseError, getDefaultConfig, parseConfig, validateRules } from './parser.js';
export type {
  ClosureConfig,
  Config,
  LoggingConfig,
  OscillatorConfig,
  PartialConfig,
} from './types.js';
export {
  CONFIG_FILE_NAME,
  DEFAULT_CLOSURE,
  DEFAULT_CONFIG,
  DEFAULT_LOGGING,
  DEFAULT_OSCILLATOR,
} from './defaults.js';
export { assertConfigValid, ConfigValidationError, validateConfig } from './validator.js';
export type { ValidationError, ValidationResult } from './validator.js';
export {
  applyEnvOverrides,
  EnvCoercionError,
  getEnvVarDocumentation,
  mergeConfig,
  readEnvOverrides,
} from './env.js';
export type { EnvOverrideResult, EnvRecord } from './env.js';
export { loadConfig } from './loader.js';
export type { LoadConfigOptions } from './loader.js';
