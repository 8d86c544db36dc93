/**
 * Environment variable overrides for configuration.
 *
 * XI_<SECTION>_<FIELD> variables override the matching xi.toml value.
 * Override precedence: env > config file > defaults
 *
 * @packageDocumentation
 */

import { SIMPLIFICATION_RULES, type SimplificationRules } from '../algebra/index.js';
import type { Config, PartialConfig } from './types.js';

/**
 * Type for environment record (matching process.env structure).
 */
export type EnvRecord = Record<string, string | undefined>;

/**
 * Error class for environment variable coercion errors.
 */
export class EnvCoercionError extends Error {
  /** The environment variable name that failed coercion. */
  public readonly envVar: string;
  /** The raw value from the environment variable. */
  public readonly rawValue: string;
  /** The expected type for the value. */
  public readonly expectedType: string;

  /**
   * Creates a new EnvCoercionError.
   *
   * @param envVar - The environment variable name.
   * @param rawValue - The raw string value from the environment.
   * @param expectedType - The type the value should be coerced to.
   * @param message - Optional detailed error message.
   */
  constructor(envVar: string, rawValue: string, expectedType: string, message?: string) {
    const defaultMessage = `Cannot coerce environment variable '${envVar}' value '${rawValue}' to ${expectedType}`;
    super(message ?? defaultMessage);
    this.name = 'EnvCoercionError';
    this.envVar = envVar;
    this.rawValue = rawValue;
    this.expectedType = expectedType;
  }
}

type EnvValueType = 'number' | 'boolean' | 'rules';

interface EnvMapping {
  type: EnvValueType;
  description: string;
  /** Writes a coerced value into the overrides. */
  apply: (overrides: PartialConfig, value: number | boolean | SimplificationRules) => void;
}

function closureNumber(field: 'max_depth' | 'max_set_size' | 'depth_ceiling') {
  return (overrides: PartialConfig, value: number | boolean | SimplificationRules): void => {
    if (typeof value !== 'number') {
      return;
    }
    const closure = { ...overrides.closure };
    switch (field) {
      case 'max_depth':
        closure.max_depth = value;
        break;
      case 'max_set_size':
        closure.max_set_size = value;
        break;
      case 'depth_ceiling':
        closure.depth_ceiling = value;
        break;
    }
    overrides.closure = closure;
  };
}

/**
 * Supported variables. Shortcuts come first so the full names win when both are set.
 */
const ENV_VAR_MAPPINGS: Readonly<Record<string, EnvMapping>> = {
  XI_DEPTH: {
    type: 'number',
    description: 'Override the default depth bound (shortcut for XI_CLOSURE_MAX_DEPTH)',
    apply: closureNumber('max_depth'),
  },
  XI_DEBUG: {
    type: 'boolean',
    description: 'Enable debug logging (shortcut for XI_LOGGING_DEBUG)',
    apply: (overrides, value) => {
      if (typeof value === 'boolean') {
        overrides.logging = { ...overrides.logging, debug: value };
      }
    },
  },
  XI_CLOSURE_MAX_DEPTH: {
    type: 'number',
    description: 'Override the default depth bound',
    apply: closureNumber('max_depth'),
  },
  XI_CLOSURE_MAX_SET_SIZE: {
    type: 'number',
    description: 'Override the default closure size bound',
    apply: closureNumber('max_set_size'),
  },
  XI_CLOSURE_DEPTH_CEILING: {
    type: 'number',
    description: 'Override the largest depth a request may ask for',
    apply: closureNumber('depth_ceiling'),
  },
  XI_CLOSURE_RULES: {
    type: 'rules',
    description: 'Override the simplification rules (structural, reduced)',
    apply: (overrides, value) => {
      if (typeof value === 'string') {
        overrides.closure = { ...overrides.closure, rules: value };
      }
    },
  },
  XI_OSCILLATOR_STEPS: {
    type: 'number',
    description: 'Override the default oscillator length',
    apply: (overrides, value) => {
      if (typeof value === 'number') {
        overrides.oscillator = { ...overrides.oscillator, steps: value };
      }
    },
  },
  XI_OSCILLATOR_INITIAL: {
    type: 'boolean',
    description: 'Override the oscillator initial state (true/false)',
    apply: (overrides, value) => {
      if (typeof value === 'boolean') {
        overrides.oscillator = { ...overrides.oscillator, initial: value };
      }
    },
  },
  XI_LOGGING_DEBUG: {
    type: 'boolean',
    description: 'Enable or disable debug logging (true/false)',
    apply: (overrides, value) => {
      if (typeof value === 'boolean') {
        overrides.logging = { ...overrides.logging, debug: value };
      }
    },
  },
};

/**
 * Coerces a string value to a number.
 *
 * @param value - The string value to coerce.
 * @param envVar - The environment variable name for error reporting.
 * @returns The coerced number value.
 * @throws EnvCoercionError if the value cannot be converted to a valid number.
 */
function coerceToNumber(value: string, envVar: string): number {
  const trimmed = value.trim();

  if (trimmed === '') {
    throw new EnvCoercionError(envVar, value, 'number', `Empty value for '${envVar}'`);
  }

  const num = Number(trimmed);

  if (Number.isNaN(num)) {
    throw new EnvCoercionError(envVar, value, 'number');
  }

  return num;
}

/**
 * Coerces a string value to a boolean.
 *
 * Accepts: 'true', '1', 'yes', 'on' for true
 * Accepts: 'false', '0', 'no', 'off' for false
 * Case-insensitive.
 *
 * @param value - The string value to coerce.
 * @param envVar - The environment variable name for error reporting.
 * @returns The coerced boolean value.
 * @throws EnvCoercionError if the value cannot be converted to a boolean.
 */
function coerceToBoolean(value: string, envVar: string): boolean {
  const trimmed = value.trim().toLowerCase();

  const truthy = ['true', '1', 'yes', 'on'];
  const falsy = ['false', '0', 'no', 'off'];

  if (truthy.includes(trimmed)) {
    return true;
  }

  if (falsy.includes(trimmed)) {
    return false;
  }

  throw new EnvCoercionError(
    envVar,
    value,
    'boolean',
    `Cannot coerce '${envVar}' value '${value}' to boolean. Expected one of: ${[...truthy, ...falsy].join(', ')}`
  );
}

function coerceToRules(value: string, envVar: string): SimplificationRules {
  const trimmed = value.trim().toLowerCase();
  const match = SIMPLIFICATION_RULES.find((rules) => rules === trimmed);
  if (match === undefined) {
    throw new EnvCoercionError(
      envVar,
      value,
      'rules',
      `Cannot coerce '${envVar}' value '${value}' to rules. Expected one of: ${SIMPLIFICATION_RULES.join(', ')}`
    );
  }
  return match;
}

function coerceValue(
  value: string,
  type: EnvValueType,
  envVar: string
): number | boolean | SimplificationRules {
  switch (type) {
    case 'number':
      return coerceToNumber(value, envVar);
    case 'boolean':
      return coerceToBoolean(value, envVar);
    case 'rules':
      return coerceToRules(value, envVar);
  }
}

/**
 * Result of reading environment variable overrides.
 */
export interface EnvOverrideResult {
  /** Partial configuration with values from environment variables. */
  overrides: PartialConfig;
  /** List of environment variables that were applied. */
  appliedVars: string[];
  /** List of any coercion errors encountered. */
  errors: EnvCoercionError[];
}

/**
 * Reads XI_* environment variables into configuration overrides.
 *
 * @param env - The environment object to read from (defaults to process.env).
 * @param options - Set `collectErrors` to gather coercion errors instead of throwing.
 * @returns Result containing overrides and any errors.
 *
 * @example
 * ```typescript
 * const result = readEnvOverrides({ XI_DEPTH: '5' });
 * result.overrides.closure?.max_depth; // 5
 * ```
 */
export function readEnvOverrides(
  env: EnvRecord = process.env,
  options: { collectErrors?: boolean } = {}
): EnvOverrideResult {
  const { collectErrors = false } = options;

  const overrides: PartialConfig = {};
  const appliedVars: string[] = [];
  const errors: EnvCoercionError[] = [];

  for (const [envVar, mapping] of Object.entries(ENV_VAR_MAPPINGS)) {
    // eslint-disable-next-line security/detect-object-injection -- safe: envVar comes from Object.entries iteration over controlled ENV_VAR_MAPPINGS
    const value = env[envVar];

    if (value === undefined || value === '') {
      continue;
    }

    try {
      mapping.apply(overrides, coerceValue(value, mapping.type, envVar));
      appliedVars.push(envVar);
    } catch (error) {
      if (error instanceof EnvCoercionError && collectErrors) {
        errors.push(error);
      } else {
        throw error;
      }
    }
  }

  return { overrides, appliedVars, errors };
}

/**
 * Merges a partial configuration into a full configuration.
 *
 * @param base - The base configuration.
 * @param partial - The partial configuration to merge.
 * @returns A new configuration with partial values merged in.
 */
export function mergeConfig(base: Config, partial: PartialConfig): Config {
  return {
    closure: { ...base.closure, ...partial.closure },
    oscillator: { ...base.oscillator, ...partial.oscillator },
    logging: { ...base.logging, ...partial.logging },
  };
}

/**
 * Applies environment variable overrides to a configuration.
 *
 * @param config - The base configuration to override.
 * @param env - The environment object to read from (defaults to process.env).
 * @returns The configuration with environment overrides applied.
 * @throws EnvCoercionError if an environment variable cannot be coerced.
 */
export function applyEnvOverrides(config: Config, env: EnvRecord = process.env): Config {
  const { overrides } = readEnvOverrides(env);

  return mergeConfig(config, overrides);
}

/**
 * Gets documentation for all supported environment variables.
 *
 * @returns Documentation object mapping env var names to descriptions.
 */
export function getEnvVarDocumentation(): Record<string, { description: string; type: string }> {
  const docs: Record<string, { description: string; type: string }> = {};
  for (const [envVar, mapping] of Object.entries(ENV_VAR_MAPPINGS)) {
    // eslint-disable-next-line security/detect-object-injection -- safe: envVar comes from controlled ENV_VAR_MAPPINGS
    docs[envVar] = { description: mapping.description, type: mapping.type };
  }
  return docs;
}
