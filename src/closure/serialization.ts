/**
 * JSON serialization of attractors.
 *
 * The JSON form carries every field of {@link AttractorResult}, so a round
 * trip preserves the final-set ordering, the generation snapshots and the
 * convergence flag exactly.
 *
 * @packageDocumentation
 */

import { SIMPLIFICATION_RULES, type SimplificationRules } from '../algebra/index.js';
import type { AttractorResult } from './types.js';

/**
 * Version of the JSON format written by {@link serializeAttractor}. Readers
 * accept any version with the same major number.
 */
export const ATTRACTOR_FORMAT_VERSION = '1.0.0';

const VERSION_PATTERN = /^(\d+)\.\d+\.\d+$/;

/**
 * Error type for serialization operations.
 */
export type AttractorSerializationErrorType = 'parse_error' | 'schema_error';

/**
 * Error class for attractor serialization/deserialization errors.
 */
export class AttractorSerializationError extends Error {
  /** The type of serialization error. */
  public readonly errorType: AttractorSerializationErrorType;
  /** Additional details about the error. */
  public readonly details: string | undefined;

  /**
   * Creates a new AttractorSerializationError.
   *
   * @param message - Human-readable error message.
   * @param errorType - The type of serialization error.
   * @param details - Additional details about the error.
   */
  constructor(message: string, errorType: AttractorSerializationErrorType, details?: string) {
    super(message);
    this.name = 'AttractorSerializationError';
    this.errorType = errorType;
    this.details = details;
  }
}

/**
 * Options for serializing an attractor.
 */
export interface SerializeAttractorOptions {
  /** Pretty-print the JSON with indentation. Default is true. */
  pretty?: boolean;
  /** Indentation level for pretty-printing. Default is 2. */
  indent?: number;
}

/**
 * Serializes an attractor to JSON.
 *
 * @param attractor - The attractor to serialize.
 * @param options - Serialization options.
 * @returns JSON text.
 */
export function serializeAttractor(
  attractor: AttractorResult,
  options?: SerializeAttractorOptions
): string {
  const data = {
    version: ATTRACTOR_FORMAT_VERSION,
    seed: attractor.seed,
    maxDepth: attractor.maxDepth,
    maxSetSize: attractor.maxSetSize,
    rules: attractor.rules,
    generations: attractor.generations,
    finalSet: attractor.finalSet,
    converged: attractor.converged,
    convergedAtGeneration: attractor.convergedAtGeneration,
  };
  const pretty = options?.pretty !== false;
  return pretty ? JSON.stringify(data, null, options?.indent ?? 2) : JSON.stringify(data);
}

function schemaError(message: string, details?: string): AttractorSerializationError {
  return new AttractorSerializationError(
    `Invalid attractor format: ${message}`,
    'schema_error',
    details
  );
}

function readInteger(obj: Record<string, unknown>, field: string, min: number): number {
  const value = obj[field];
  if (typeof value !== 'number' || !Number.isSafeInteger(value) || value < min) {
    throw schemaError(`"${field}" must be an integer >= ${String(min)}`);
  }
  return value;
}

function readKeyList(value: unknown, field: string): readonly string[] {
  if (!Array.isArray(value)) {
    throw schemaError(`"${field}" must be an array of strings`);
  }
  const keys: string[] = [];
  for (const entry of value) {
    if (typeof entry !== 'string' || entry.length === 0) {
      throw schemaError(`"${field}" must contain only non-empty strings`);
    }
    keys.push(entry);
  }
  return Object.freeze(keys);
}

function checkVersion(value: unknown): void {
  if (typeof value !== 'string') {
    throw schemaError('"version" must be a string');
  }
  const match = VERSION_PATTERN.exec(value);
  if (match === null) {
    throw schemaError(`"version" "${value}" does not match semver pattern`);
  }
  const supported = ATTRACTOR_FORMAT_VERSION.split('.')[0];
  if (match[1] !== supported) {
    throw schemaError(
      `unsupported version "${value}"`,
      `This reader understands version ${ATTRACTOR_FORMAT_VERSION} and its minor revisions`
    );
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

function isRules(value: unknown): value is SimplificationRules {
  return SIMPLIFICATION_RULES.some((rules) => rules === value);
}

/**
 * Restores an attractor from JSON produced by {@link serializeAttractor}.
 *
 * @param json - JSON text.
 * @returns The attractor.
 * @throws AttractorSerializationError if the text is not JSON, carries an
 * unsupported format version or does not describe an attractor.
 */
export function deserializeAttractor(json: string): AttractorResult {
  let data: unknown;
  try {
    data = JSON.parse(json);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new AttractorSerializationError(
      `Failed to parse attractor JSON: ${message}`,
      'parse_error',
      'The input does not contain valid JSON'
    );
  }

  if (!isRecord(data)) {
    throw schemaError('expected an object');
  }
  const obj = data;

  checkVersion(obj.version);
  if (typeof obj.seed !== 'string' || obj.seed.length === 0) {
    throw schemaError('"seed" must be a non-empty string');
  }
  const maxDepth = readInteger(obj, 'maxDepth', 0);
  const maxSetSize = readInteger(obj, 'maxSetSize', 1);

  if (!isRules(obj.rules)) {
    throw schemaError(
      '"rules" is not a recognized rule set',
      `Expected one of: ${SIMPLIFICATION_RULES.join(', ')}`
    );
  }

  if (!Array.isArray(obj.generations) || obj.generations.length === 0) {
    throw schemaError('"generations" must be a non-empty array');
  }
  const generations = Object.freeze(
    obj.generations.map((generation: unknown, index) =>
      readKeyList(generation, `generations[${String(index)}]`)
    )
  );
  const finalSet = readKeyList(obj.finalSet, 'finalSet');

  if (typeof obj.converged !== 'boolean') {
    throw schemaError('"converged" must be a boolean');
  }
  let convergedAtGeneration: number | null = null;
  if (obj.convergedAtGeneration !== null) {
    if (
      typeof obj.convergedAtGeneration !== 'number' ||
      !Number.isSafeInteger(obj.convergedAtGeneration)
    ) {
      throw schemaError('"convergedAtGeneration" must be an integer or null');
    }
    convergedAtGeneration = obj.convergedAtGeneration;
  }
  if ((convergedAtGeneration !== null) !== obj.converged) {
    throw schemaError('"convergedAtGeneration" must be set exactly when "converged" is true');
  }

  return Object.freeze({
    seed: obj.seed,
    maxDepth,
    maxSetSize,
    rules: obj.rules,
    generations,
    finalSet,
    converged: obj.converged,
    convergedAtGeneration,
  });
}
