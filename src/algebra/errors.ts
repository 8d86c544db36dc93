/**
 * Error taxonomy shared by the algebra, closure and validator modules.
 *
 * Validation errors surface at the boundary (bad predicate names, malformed
 * counts). Resource-exhaustion errors live in the closure module. Invariant
 * violations are never thrown; the validator records them in its reports.
 *
 * @packageDocumentation
 */

/**
 * Error codes for programmatic handling.
 */
export type XiErrorCode =
  | 'invalid_predicate'
  | 'invalid_argument'
  | 'invalid_expression'
  | 'depth_limit';

/**
 * Base class for every error raised by the attractor core.
 */
export class XiError extends Error {
  /** The error code for programmatic handling. */
  public readonly code: XiErrorCode;

  /**
   * Creates a new XiError.
   *
   * @param message - Human-readable error message.
   * @param code - The error code.
   */
  constructor(message: string, code: XiErrorCode) {
    super(message);
    this.name = 'XiError';
    this.code = code;
  }
}

/**
 * Why a predicate name was rejected.
 */
export type InvalidPredicateReason = 'not_a_string' | 'empty' | 'invalid_identifier' | 'reserved';

/**
 * Raised when a predicate name fails the identifier grammar.
 */
export class InvalidPredicateError extends XiError {
  /** The offending name, stringified when it was not a string. */
  public readonly predicateName: string;
  /** Which rule rejected the name. */
  public readonly reason: InvalidPredicateReason;

  /**
   * Creates a new InvalidPredicateError.
   *
   * @param message - Human-readable error message.
   * @param predicateName - The rejected name.
   * @param reason - Which rule rejected the name.
   */
  constructor(message: string, predicateName: string, reason: InvalidPredicateReason) {
    super(message, 'invalid_predicate');
    this.name = 'InvalidPredicateError';
    this.predicateName = predicateName;
    this.reason = reason;
  }
}

/**
 * Raised for malformed numeric or boolean inputs (negative step counts,
 * non-integer bounds, non-boolean oscillator states).
 */
export class InvalidArgumentError extends XiError {
  /** Name of the offending argument. */
  public readonly argument: string;
  /** The value that was supplied. */
  public readonly value: unknown;

  /**
   * Creates a new InvalidArgumentError.
   *
   * @param message - Human-readable error message.
   * @param argument - Name of the offending argument.
   * @param value - The value that was supplied.
   */
  constructor(message: string, argument: string, value: unknown) {
    super(message, 'invalid_argument');
    this.name = 'InvalidArgumentError';
    this.argument = argument;
    this.value = value;
  }
}

/**
 * Describes a value for error messages without throwing on exotic inputs.
 *
 * @param value - Any value.
 * @returns A short description such as `number 1.5` or `null`.
 */
export function describeValue(value: unknown): string {
  if (value === null) {
    return 'null';
  }
  if (typeof value === 'number' || typeof value === 'boolean' || typeof value === 'bigint') {
    return `${typeof value} ${String(value)}`;
  }
  if (typeof value === 'string') {
    return `string '${value}'`;
  }
  return typeof value;
}

/**
 * Asserts that a value is a non-negative safe integer.
 *
 * @param value - The value to check.
 * @param argument - Argument name used in the error.
 * @returns The value, narrowed to number.
 * @throws InvalidArgumentError if the value is not a non-negative integer.
 */
export function assertNonNegativeInteger(value: unknown, argument: string): number {
  if (typeof value !== 'number' || !Number.isSafeInteger(value)) {
    throw new InvalidArgumentError(
      `${argument} must be an integer, got ${describeValue(value)}`,
      argument,
      value
    );
  }
  if (value < 0) {
    throw new InvalidArgumentError(
      `${argument} must be non-negative, got ${String(value)}`,
      argument,
      value
    );
  }
  return value;
}

/**
 * Asserts that a value is a positive safe integer.
 *
 * @param value - The value to check.
 * @param argument - Argument name used in the error.
 * @returns The value, narrowed to number.
 * @throws InvalidArgumentError if the value is not a positive integer.
 */
export function assertPositiveInteger(value: unknown, argument: string): number {
  const checked = assertNonNegativeInteger(value, argument);
  if (checked === 0) {
    throw new InvalidArgumentError(`${argument} must be positive, got 0`, argument, value);
  }
  return checked;
}
