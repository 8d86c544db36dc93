/**
 * TOML configuration parser for xi.toml.
 *
 * @packageDocumentation
 */

import * as TOML from '@iarna/toml';
import { SIMPLIFICATION_RULES, type SimplificationRules } from '../algebra/index.js';
import {
  DEFAULT_CLOSURE,
  DEFAULT_CONFIG,
  DEFAULT_LOGGING,
  DEFAULT_OSCILLATOR,
} from './defaults.js';
import type { ClosureConfig, Config, LoggingConfig, OscillatorConfig } from './types.js';

/**
 * Error class for configuration parsing errors.
 */
export class ConfigParseError extends Error {
  /** The original error that caused the parse failure, if any. */
  public readonly cause: Error | undefined;

  /**
   * Creates a new ConfigParseError.
   *
   * @param message - Descriptive error message.
   * @param cause - The underlying error, if any.
   */
  constructor(message: string, cause?: Error) {
    super(message);
    this.name = 'ConfigParseError';
    this.cause = cause;
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Reads an optional table from parsed TOML.
 *
 * @param parsed - Parsed TOML document.
 * @param name - Table name.
 * @returns The table, or undefined when absent.
 * @throws ConfigParseError if the key holds something other than a table.
 */
function readSection(
  parsed: Record<string, unknown>,
  name: string
): Record<string, unknown> | undefined {
  // eslint-disable-next-line security/detect-object-injection -- safe: name is one of the known section literals
  const section = parsed[name];
  if (section === undefined) {
    return undefined;
  }
  if (!isRecord(section)) {
    throw new ConfigParseError(`Invalid type for '${name}': expected a table`);
  }
  return section;
}

/**
 * Validates that a value is an integer.
 *
 * @param value - Value to validate.
 * @param fieldPath - Path to the field for error messages.
 * @returns The validated number.
 * @throws ConfigParseError if value is not an integer.
 */
function validateInteger(value: unknown, fieldPath: string): number {
  if (typeof value !== 'number' || !Number.isInteger(value)) {
    throw new ConfigParseError(
      `Invalid type for '${fieldPath}': expected integer, got ${typeof value === 'number' ? String(value) : typeof value}`
    );
  }
  return value;
}

/**
 * Validates that a value is a boolean.
 *
 * @param value - Value to validate.
 * @param fieldPath - Path to the field for error messages.
 * @returns The validated boolean.
 * @throws ConfigParseError if value is not a boolean.
 */
function validateBoolean(value: unknown, fieldPath: string): boolean {
  if (typeof value !== 'boolean') {
    throw new ConfigParseError(
      `Invalid type for '${fieldPath}': expected boolean, got ${typeof value}`
    );
  }
  return value;
}

/**
 * Validates that a value names a simplification rule set.
 *
 * @param value - Value to validate.
 * @param fieldPath - Path to the field for error messages.
 * @returns The rule set.
 * @throws ConfigParseError if value is not a recognized rule set.
 */
export function validateRules(value: unknown, fieldPath: string): SimplificationRules {
  const match = SIMPLIFICATION_RULES.find((rules) => rules === value);
  if (match === undefined) {
    throw new ConfigParseError(
      `Invalid value for '${fieldPath}': expected ${SIMPLIFICATION_RULES.map((r) => `'${r}'`).join(' or ')}, got ${typeof value === 'string' ? `'${value}'` : typeof value}`
    );
  }
  return match;
}

/**
 * Parses the closure table.
 *
 * @param raw - Raw TOML table.
 * @returns Closure settings merged with defaults.
 */
function parseClosure(raw: Record<string, unknown> | undefined): ClosureConfig {
  const result: ClosureConfig = { ...DEFAULT_CLOSURE };
  if (raw === undefined) {
    return result;
  }

  if ('max_depth' in raw) {
    result.max_depth = validateInteger(raw.max_depth, 'closure.max_depth');
  }
  if ('max_set_size' in raw) {
    result.max_set_size = validateInteger(raw.max_set_size, 'closure.max_set_size');
  }
  if ('depth_ceiling' in raw) {
    result.depth_ceiling = validateInteger(raw.depth_ceiling, 'closure.depth_ceiling');
  }
  if ('rules' in raw) {
    result.rules = validateRules(raw.rules, 'closure.rules');
  }

  return result;
}

/**
 * Parses the oscillator table.
 *
 * @param raw - Raw TOML table.
 * @returns Oscillator settings merged with defaults.
 */
function parseOscillator(raw: Record<string, unknown> | undefined): OscillatorConfig {
  const result: OscillatorConfig = { ...DEFAULT_OSCILLATOR };
  if (raw === undefined) {
    return result;
  }

  if ('steps' in raw) {
    result.steps = validateInteger(raw.steps, 'oscillator.steps');
  }
  if ('initial' in raw) {
    result.initial = validateBoolean(raw.initial, 'oscillator.initial');
  }

  return result;
}

/**
 * Parses the logging table.
 *
 * @param raw - Raw TOML table.
 * @returns Logging settings merged with defaults.
 */
function parseLogging(raw: Record<string, unknown> | undefined): LoggingConfig {
  const result: LoggingConfig = { ...DEFAULT_LOGGING };
  if (raw === undefined) {
    return result;
  }

  if ('debug' in raw) {
    result.debug = validateBoolean(raw.debug, 'logging.debug');
  }

  return result;
}

/**
 * Parses a TOML string into a Config, filling missing fields from defaults.
 *
 * @param tomlContent - Raw TOML content.
 * @returns The configuration.
 * @throws ConfigParseError for invalid TOML syntax or invalid field types.
 *
 * @example
 * ```typescript
 * const config = parseConfig(`
 * [closure]
 * max_depth = 5
 * rules = "reduced"
 * `);
 * config.closure.max_depth; // 5
 * ```
 */
export function parseConfig(tomlContent: string): Config {
  let parsed: Record<string, unknown>;

  try {
    parsed = TOML.parse(tomlContent);
  } catch (error) {
    const tomlError = error instanceof Error ? error : new Error(String(error));
    throw new ConfigParseError(`Invalid TOML syntax: ${tomlError.message}`, tomlError);
  }

  return {
    closure: parseClosure(readSection(parsed, 'closure')),
    oscillator: parseOscillator(readSection(parsed, 'oscillator')),
    logging: parseLogging(readSection(parsed, 'logging')),
  };
}

/**
 * Returns a fresh copy of the default configuration.
 *
 * @returns Default configuration object.
 */
export function getDefaultConfig(): Config {
  return {
    closure: { ...DEFAULT_CONFIG.closure },
    oscillator: { ...DEFAULT_CONFIG.oscillator },
    logging: { ...DEFAULT_CONFIG.logging },
  };
}
