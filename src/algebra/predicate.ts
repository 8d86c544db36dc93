/**
 * Atomic named propositions.
 *
 * A predicate is validated once, at construction, so that no expression or
 * closure work ever starts from a bad name.
 *
 * @packageDocumentation
 */

import { InvalidPredicateError } from './errors.js';

/**
 * Identifier grammar for predicate names.
 */
export const PREDICATE_NAME_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/;

/**
 * Names that read as keywords or constants and are therefore refused.
 */
export const RESERVED_PREDICATE_NAMES: ReadonlySet<string> = new Set([
  'True',
  'False',
  'None',
  'and',
  'or',
  'not',
  'xor',
  'implies',
  'iff',
]);

/**
 * Checks a candidate predicate name.
 *
 * @param name - The candidate name.
 * @returns The name, narrowed to string.
 * @throws InvalidPredicateError if the name is not a string, is empty, breaks
 * the identifier grammar or is reserved.
 */
export function assertPredicateName(name: unknown): string {
  if (typeof name !== 'string') {
    throw new InvalidPredicateError(
      `Predicate name must be a string, got ${name === null ? 'null' : typeof name}`,
      String(name),
      'not_a_string'
    );
  }
  if (name.length === 0) {
    throw new InvalidPredicateError('Predicate name cannot be empty', name, 'empty');
  }
  if (!PREDICATE_NAME_PATTERN.test(name)) {
    throw new InvalidPredicateError(
      `'${name}' is not a valid identifier`,
      name,
      'invalid_identifier'
    );
  }
  if (RESERVED_PREDICATE_NAMES.has(name)) {
    throw new InvalidPredicateError(`'${name}' is a reserved name`, name, 'reserved');
  }
  return name;
}

/**
 * An immutable named proposition.
 *
 * Two predicates with the same name are interchangeable.
 *
 * @example
 * ```typescript
 * const p = new Predicate('X');
 * p.equals(createPredicate('X')); // true
 * ```
 */
export class Predicate {
  /** The validated identifier. */
  public readonly name: string;

  /**
   * Creates a new Predicate.
   *
   * @param name - Identifier for the proposition.
   * @throws InvalidPredicateError if the name is invalid.
   */
  constructor(name: string) {
    this.name = assertPredicateName(name);
    Object.freeze(this);
  }

  /**
   * Value equality by name.
   *
   * @param other - Predicate to compare with.
   * @returns True when both predicates carry the same name.
   */
  equals(other: Predicate): boolean {
    return this.name === other.name;
  }

  toString(): string {
    return this.name;
  }
}

/**
 * Creates a predicate, accepting an existing one unchanged.
 *
 * @param seed - A name or a predicate.
 * @returns The predicate.
 * @throws InvalidPredicateError if a name is given and it is invalid.
 */
export function createPredicate(seed: string | Predicate): Predicate {
  return seed instanceof Predicate ? seed : new Predicate(seed);
}
