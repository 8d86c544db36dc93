/**
 * Semantic validation for configuration values.
 *
 * Checks what the parser's type checks cannot: bound ranges and the
 * relation between the default depth and the depth ceiling.
 *
 * @packageDocumentation
 */

import type { Config } from './types.js';

/**
 * Error class for semantic validation errors.
 */
export class ConfigValidationError extends Error {
  /** Array of validation failure details. */
  public readonly errors: ValidationError[];

  /**
   * Creates a new ConfigValidationError.
   *
   * @param message - Summary error message.
   * @param errors - Array of specific validation errors.
   */
  constructor(message: string, errors: ValidationError[]) {
    super(message);
    this.name = 'ConfigValidationError';
    this.errors = errors;
  }
}

/**
 * Individual validation error details.
 */
export interface ValidationError {
  /** The field path that failed validation. */
  field: string;
  /** The invalid value that was provided. */
  value: unknown;
  /** Human-readable description of the validation failure. */
  message: string;
}

/**
 * Result of a validation operation.
 */
export interface ValidationResult {
  /** Whether validation passed. */
  valid: boolean;
  /** Array of validation errors (empty if valid). */
  errors: ValidationError[];
}

function validateNonNegativeInteger(
  value: number,
  fieldPath: string,
  errors: ValidationError[]
): void {
  if (!Number.isInteger(value) || value < 0) {
    errors.push({
      field: fieldPath,
      value,
      message: `Must be a non-negative integer, got ${String(value)}`,
    });
  }
}

function validatePositiveInteger(
  value: number,
  fieldPath: string,
  errors: ValidationError[]
): void {
  if (!Number.isInteger(value) || value <= 0) {
    errors.push({
      field: fieldPath,
      value,
      message: `Must be a positive integer, got ${String(value)}`,
    });
  }
}

/**
 * Validates a parsed configuration.
 *
 * @param config - The configuration to validate.
 * @returns Validation result with every error found.
 *
 * @example
 * ```typescript
 * const result = validateConfig(parseConfig(tomlContent));
 * if (!result.valid) {
 *   for (const error of result.errors) {
 *     console.error(`${error.field}: ${error.message}`);
 *   }
 * }
 * ```
 */
export function validateConfig(config: Config): ValidationResult {
  const errors: ValidationError[] = [];
  const { closure, oscillator } = config;

  validateNonNegativeInteger(closure.max_depth, 'closure.max_depth', errors);
  validatePositiveInteger(closure.max_set_size, 'closure.max_set_size', errors);
  validateNonNegativeInteger(closure.depth_ceiling, 'closure.depth_ceiling', errors);
  validateNonNegativeInteger(oscillator.steps, 'oscillator.steps', errors);

  if (closure.max_depth > closure.depth_ceiling) {
    errors.push({
      field: 'closure.max_depth',
      value: closure.max_depth,
      message: `Must not exceed closure.depth_ceiling (${String(closure.depth_ceiling)}), got ${String(closure.max_depth)}`,
    });
  }

  return {
    valid: errors.length === 0,
    errors,
  };
}

/**
 * Validates configuration and throws if invalid.
 *
 * @param config - The configuration to validate.
 * @throws ConfigValidationError if validation fails.
 */
export function assertConfigValid(config: Config): void {
  const result = validateConfig(config);

  if (!result.valid) {
    const errorMessages = result.errors.map((e) => `  - ${e.field}: ${e.message}`).join('\n');
    throw new ConfigValidationError(
      `Configuration validation failed with ${String(result.errors.length)} error(s):\n${errorMessages}`,
      result.errors
    );
  }
}
