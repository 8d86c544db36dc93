/**
 * Expression algebra module.
 *
 * Predicates, canonicalizing AND / OR / NOT constructors, the key parser and
 * the error taxonomy shared by the rest of the core.
 *
 * @packageDocumentation
 */

export {
  XiError,
  InvalidPredicateError,
  InvalidArgumentError,
  assertNonNegativeInteger,
  assertPositiveInteger,
  describeValue,
} from './errors.js';
export type { XiErrorCode, InvalidPredicateReason } from './errors.js';

export {
  Predicate,
  createPredicate,
  assertPredicateName,
  PREDICATE_NAME_PATTERN,
  RESERVED_PREDICATE_NAMES,
} from './predicate.js';

export type {
  Atom,
  CanonicalOptions,
  Expression,
  ExpressionTag,
  Junction,
  JunctionTag,
  KeyCacheLike,
  Negation,
  SimplificationRules,
} from './types.js';
export { DEFAULT_RULES, SIMPLIFICATION_RULES } from './types.js';

export {
  baseSet,
  canonicalize,
  canonicalKey,
  conjoin,
  contradiction,
  depth,
  disjoin,
  isCanonical,
  JUNCTION_SYMBOLS,
  literal,
  negate,
  NEGATION_SYMBOL,
  raw,
  size,
  tautology,
} from './expression.js';

export { KeyCache } from './cache.js';

export { ExpressionSyntaxError, parseExpression, parseRawExpression } from './parser.js';
