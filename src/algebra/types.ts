/**
 * Expression types for the contradiction algebra.
 *
 * @packageDocumentation
 */

import type { Predicate } from './predicate.js';

/**
 * How much the expression constructors reduce their results.
 *
 * - `structural`: commutative children are ordered by key and double
 *   negation collapses. Nothing else is rewritten.
 * - `reduced`: additionally idempotence, absorption and De Morgan. The
 *   contradiction and tautology of a predicate stay distinct elements.
 */
export type SimplificationRules = 'structural' | 'reduced';

/**
 * Every recognized rule set.
 */
export const SIMPLIFICATION_RULES: readonly SimplificationRules[] = ['structural', 'reduced'];

/**
 * Rule set used when none is given.
 */
export const DEFAULT_RULES: SimplificationRules = 'structural';

/**
 * Tags of the binary operators.
 */
export type JunctionTag = 'and' | 'or';

/**
 * Tag of any expression node.
 */
export type ExpressionTag = 'atom' | 'not' | JunctionTag;

/**
 * A predicate in asserted or negated polarity.
 *
 * Atoms are canonical under every rule set.
 */
export interface Atom {
  readonly tag: 'atom';
  readonly predicate: Predicate;
  readonly negated: boolean;
  readonly key: string;
}

/**
 * Negation of a compound expression.
 */
export interface Negation {
  readonly tag: 'not';
  readonly operand: Expression;
  readonly key: string;
  /** Rule set the node is canonical under, or null for a raw node. */
  readonly rules: SimplificationRules | null;
}

/**
 * Conjunction or disjunction of exactly two children.
 *
 * Canonical junctions keep their children ordered by key.
 */
export interface Junction {
  readonly tag: JunctionTag;
  readonly children: readonly [Expression, Expression];
  readonly key: string;
  /** Rule set the node is canonical under, or null for a raw node. */
  readonly rules: SimplificationRules | null;
}

/**
 * Any expression node. Nodes are frozen and shared freely.
 */
export type Expression = Atom | Negation | Junction;

/**
 * Options accepted by the canonicalizing constructors.
 */
export interface CanonicalOptions {
  /**
   * Rule set to canonicalize under.
   * @defaultValue 'structural'
   */
  readonly rules?: SimplificationRules;

  /**
   * Memo of canonical forms, keyed by node identity.
   */
  readonly cache?: KeyCacheLike;
}

/**
 * Lookup surface the canonicalizer needs from a cache.
 *
 * `get`/`set` memoize the canonical form of a node. `getResult`/`setResult`
 * memoize constructor results under an operation signature built from
 * operand keys, so canonical inputs that are rebuilt each time still hit.
 */
export interface KeyCacheLike {
  get(expression: Expression, rules: SimplificationRules): Expression | undefined;
  set(expression: Expression, rules: SimplificationRules, canonical: Expression): void;
  getResult(signature: string, rules: SimplificationRules): Expression | undefined;
  setResult(signature: string, rules: SimplificationRules, result: Expression): void;
}
