/**
 * Canonicalizing constructors for AND / OR / NOT expressions.
 *
 * Every node returned by {@link literal}, {@link negate}, {@link conjoin},
 * {@link disjoin} or {@link canonicalize} is canonical under the requested
 * rule set, so two expressions are the same set element exactly when their
 * keys are equal. The {@link raw} builders skip canonicalization and exist to
 * describe arbitrary trees (parsed keys, test inputs).
 *
 * @packageDocumentation
 */

import type { Predicate } from './predicate.js';
import {
  DEFAULT_RULES,
  type Atom,
  type CanonicalOptions,
  type Expression,
  type Junction,
  type JunctionTag,
  type KeyCacheLike,
  type Negation,
  type SimplificationRules,
} from './types.js';

/**
 * Symbol prefixed to negated keys.
 */
export const NEGATION_SYMBOL = '¬';

/**
 * Infix symbols of the binary operators.
 */
export const JUNCTION_SYMBOLS: Readonly<Record<JunctionTag, string>> = {
  and: '∧',
  or: '∨',
};

function dualOf(tag: JunctionTag): JunctionTag {
  return tag === 'and' ? 'or' : 'and';
}

function junctionKey(tag: JunctionTag, left: Expression, right: Expression): string {
  return `(${left.key}${JUNCTION_SYMBOLS[tag]}${right.key})`;
}

/**
 * Builds a literal for a predicate.
 *
 * @param predicate - The proposition.
 * @param negated - Polarity; `true` gives `¬P`.
 * @returns The atom, canonical under every rule set.
 */
export function literal(predicate: Predicate, negated = false): Atom {
  return Object.freeze({
    tag: 'atom',
    predicate,
    negated,
    key: negated ? `${NEGATION_SYMBOL}${predicate.name}` : predicate.name,
  });
}

/**
 * Non-canonicalizing builders. Children keep the order they are given in.
 */
export const raw = {
  atom: literal,

  not(operand: Expression): Negation {
    return Object.freeze({
      tag: 'not',
      operand,
      key: `${NEGATION_SYMBOL}${operand.key}`,
      rules: null,
    });
  },

  and(left: Expression, right: Expression): Junction {
    return rawJunction('and', left, right);
  },

  or(left: Expression, right: Expression): Junction {
    return rawJunction('or', left, right);
  },
} as const;

function rawJunction(tag: JunctionTag, left: Expression, right: Expression): Junction {
  return Object.freeze({
    tag,
    children: Object.freeze([left, right] as const),
    key: junctionKey(tag, left, right),
    rules: null,
  });
}

/**
 * Reports whether a node is already canonical under a rule set.
 *
 * @param expression - The node to inspect.
 * @param rules - The rule set.
 * @returns True for atoms and for nodes built canonically under `rules`.
 */
export function isCanonical(expression: Expression, rules: SimplificationRules): boolean {
  return expression.tag === 'atom' || expression.rules === rules;
}

function hasDirectChild(expression: Expression, tag: JunctionTag, key: string): boolean {
  if (expression.tag !== 'and' && expression.tag !== 'or') {
    return false;
  }
  if (expression.tag !== tag) {
    return false;
  }
  return expression.children[0].key === key || expression.children[1].key === key;
}

/**
 * Serves a constructor result from the cache, building it on a miss.
 */
function memoized(
  cache: KeyCacheLike | undefined,
  signature: string,
  rules: SimplificationRules,
  build: () => Expression
): Expression {
  if (cache === undefined) {
    return build();
  }
  const cached = cache.getResult(signature, rules);
  if (cached !== undefined) {
    return cached;
  }
  const result = build();
  cache.setResult(signature, rules, result);
  return result;
}

/**
 * Combines two canonical operands.
 */
function combine(
  tag: JunctionTag,
  a: Expression,
  b: Expression,
  rules: SimplificationRules,
  cache?: KeyCacheLike
): Expression {
  return memoized(cache, `${tag}|${a.key}|${b.key}`, rules, () =>
    combineUncached(tag, a, b, rules)
  );
}

function combineUncached(
  tag: JunctionTag,
  a: Expression,
  b: Expression,
  rules: SimplificationRules
): Expression {
  if (rules === 'reduced') {
    const dual = dualOf(tag);
    // idempotence
    if (a.key === b.key) {
      return a;
    }
    // absorption: a ∧ (a ∨ x) = a, a ∨ (a ∧ x) = a
    if (hasDirectChild(b, dual, a.key)) {
      return a;
    }
    if (hasDirectChild(a, dual, b.key)) {
      return b;
    }
    // (a ∧ x) ∧ a = a ∧ x
    if (hasDirectChild(b, tag, a.key)) {
      return b;
    }
    if (hasDirectChild(a, tag, b.key)) {
      return a;
    }
  }

  const [left, right] = a.key <= b.key ? [a, b] : [b, a];
  return Object.freeze({
    tag,
    children: Object.freeze([left, right] as const),
    key: junctionKey(tag, left, right),
    rules,
  });
}

/**
 * Negates a canonical operand.
 */
function negateCanonical(
  expression: Expression,
  rules: SimplificationRules,
  cache?: KeyCacheLike
): Expression {
  switch (expression.tag) {
    case 'atom':
      return literal(expression.predicate, !expression.negated);
    case 'not':
      return expression.operand;
    case 'and':
    case 'or': {
      const junction = expression;
      return memoized(cache, `not|${junction.key}`, rules, () => {
        if (rules === 'reduced') {
          return combine(
            dualOf(junction.tag),
            negateCanonical(junction.children[0], rules, cache),
            negateCanonical(junction.children[1], rules, cache),
            rules,
            cache
          );
        }
        const negation: Negation = Object.freeze({
          tag: 'not',
          operand: junction,
          key: `${NEGATION_SYMBOL}${junction.key}`,
          rules,
        });
        return negation;
      });
    }
  }
}

/**
 * Rebuilds an expression bottom-up through the canonicalizing constructors.
 *
 * Idempotent: canonical input is returned as is.
 *
 * @param expression - Any expression, raw or canonical.
 * @param options - Rule set and optional cache.
 * @returns The canonical form.
 */
export function canonicalize(expression: Expression, options: CanonicalOptions = {}): Expression {
  const rules = options.rules ?? DEFAULT_RULES;
  if (isCanonical(expression, rules)) {
    return expression;
  }

  const cached = options.cache?.get(expression, rules);
  if (cached !== undefined) {
    return cached;
  }

  let result: Expression;
  switch (expression.tag) {
    case 'atom':
      return expression;
    case 'not':
      result = negateCanonical(canonicalize(expression.operand, options), rules, options.cache);
      break;
    case 'and':
    case 'or':
      result = combine(
        expression.tag,
        canonicalize(expression.children[0], options),
        canonicalize(expression.children[1], options),
        rules,
        options.cache
      );
      break;
  }

  options.cache?.set(expression, rules, result);
  return result;
}

/**
 * Key of an expression's canonical form; equal keys mean equal set elements.
 *
 * @param expression - Any expression.
 * @param options - Rule set and optional cache.
 * @returns The canonical key.
 */
export function canonicalKey(expression: Expression, options: CanonicalOptions = {}): string {
  return canonicalize(expression, options).key;
}

/**
 * Logical negation in canonical form. `negate(negate(e))` is `canonicalize(e)`.
 *
 * @param expression - The expression to negate.
 * @param options - Rule set and optional cache.
 * @returns The canonical negation.
 */
export function negate(expression: Expression, options: CanonicalOptions = {}): Expression {
  const rules = options.rules ?? DEFAULT_RULES;
  return negateCanonical(canonicalize(expression, options), rules, options.cache);
}

/**
 * Canonical conjunction; `conjoin(a, b)` and `conjoin(b, a)` share a key.
 *
 * @param a - First operand.
 * @param b - Second operand.
 * @param options - Rule set and optional cache.
 * @returns The canonical conjunction.
 */
export function conjoin(a: Expression, b: Expression, options: CanonicalOptions = {}): Expression {
  const rules = options.rules ?? DEFAULT_RULES;
  return combine('and', canonicalize(a, options), canonicalize(b, options), rules, options.cache);
}

/**
 * Canonical disjunction; `disjoin(a, b)` and `disjoin(b, a)` share a key.
 *
 * @param a - First operand.
 * @param b - Second operand.
 * @param options - Rule set and optional cache.
 * @returns The canonical disjunction.
 */
export function disjoin(a: Expression, b: Expression, options: CanonicalOptions = {}): Expression {
  const rules = options.rules ?? DEFAULT_RULES;
  return combine('or', canonicalize(a, options), canonicalize(b, options), rules, options.cache);
}

/**
 * The base set `[P, ¬P]` of a predicate.
 *
 * @param predicate - The seed predicate.
 * @returns The asserted and negated literals, in that order.
 */
export function baseSet(predicate: Predicate): readonly [Atom, Atom] {
  return [literal(predicate), literal(predicate, true)];
}

/**
 * The contradiction `P ∧ ¬P`.
 *
 * @param predicate - The seed predicate.
 * @param options - Rule set and optional cache.
 * @returns The canonical contradiction.
 */
export function contradiction(predicate: Predicate, options: CanonicalOptions = {}): Expression {
  const p = literal(predicate);
  return conjoin(p, negate(p, options), options);
}

/**
 * The tautology `P ∨ ¬P`.
 *
 * @param predicate - The seed predicate.
 * @param options - Rule set and optional cache.
 * @returns The canonical tautology.
 */
export function tautology(predicate: Predicate, options: CanonicalOptions = {}): Expression {
  const p = literal(predicate);
  return disjoin(p, negate(p, options), options);
}

/**
 * Number of nodes in an expression tree.
 */
export function size(expression: Expression): number {
  switch (expression.tag) {
    case 'atom':
      return 1;
    case 'not':
      return 1 + size(expression.operand);
    case 'and':
    case 'or':
      return 1 + size(expression.children[0]) + size(expression.children[1]);
  }
}

/**
 * Height of an expression tree; an atom has depth 0.
 */
export function depth(expression: Expression): number {
  switch (expression.tag) {
    case 'atom':
      return 0;
    case 'not':
      return 1 + depth(expression.operand);
    case 'and':
    case 'or':
      return 1 + Math.max(depth(expression.children[0]), depth(expression.children[1]));
  }
}
