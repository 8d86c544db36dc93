/**
 * Closure engine.
 *
 * Expands `{P, ¬P}` one generation at a time: every element of the current
 * snapshot is conjoined and disjoined with each base literal and negated.
 * Candidates are canonicalized and admitted only under a new key. The build
 * stops at the first step that admits nothing (a fixed point) or after
 * `maxDepth` steps, and aborts as soon as the set would outgrow `maxSetSize`.
 *
 * Generations depend on each other, so the loop is sequential; within a step
 * the candidate order is fixed by the snapshot order, which makes every build
 * reproducible.
 *
 * @packageDocumentation
 */

import {
  assertNonNegativeInteger,
  assertPositiveInteger,
  baseSet,
  conjoin,
  createPredicate,
  DEFAULT_RULES,
  disjoin,
  negate,
  type CanonicalOptions,
  type Expression,
  type Predicate,
} from '../algebra/index.js';
import { DepthLimitError } from './errors.js';
import type { AttractorResult, BuildAttractorOptions } from './types.js';

/**
 * Largest depth accepted when no ceiling is configured.
 */
export const DEFAULT_DEPTH_CEILING = 64;

/**
 * Yields the candidates of one expansion step, in deterministic order.
 *
 * For each element `e` of `current`: `e ∧ b` and `e ∨ b` for every `b` in
 * `base`, then `¬e`. Candidates are canonical but not deduplicated.
 *
 * @param current - Snapshot being expanded.
 * @param base - The base literals `[P, ¬P]`.
 * @param options - Rule set and optional cache.
 */
export function* expandGeneration(
  current: readonly Expression[],
  base: readonly Expression[],
  options: CanonicalOptions = {}
): Generator<Expression, void, undefined> {
  for (const element of current) {
    for (const literal of base) {
      yield conjoin(element, literal, options);
      yield disjoin(element, literal, options);
    }
    yield negate(element, options);
  }
}

/**
 * Insertion-ordered, key-deduplicated, size-bounded working set.
 */
class BoundedExpressionSet {
  private readonly keys = new Set<string>();
  private readonly members: Expression[] = [];

  constructor(
    private readonly seed: string,
    private readonly maxSetSize: number,
    private readonly onExceeded: (error: DepthLimitError) => void
  ) {}

  get size(): number {
    return this.members.length;
  }

  /**
   * Adds an expression under a new key.
   *
   * @returns Whether the expression was new.
   * @throws DepthLimitError if the set would exceed its bound.
   */
  admit(expression: Expression, generation: number): boolean {
    if (this.keys.has(expression.key)) {
      return false;
    }
    if (this.members.length + 1 > this.maxSetSize) {
      const error = new DepthLimitError('set_size', {
        seed: this.seed,
        attempted: this.members.length + 1,
        limit: this.maxSetSize,
        generation,
      });
      this.onExceeded(error);
      throw error;
    }
    this.keys.add(expression.key);
    this.members.push(expression);
    return true;
  }

  snapshot(): readonly Expression[] {
    return this.members.slice();
  }

  keySnapshot(): readonly string[] {
    return Object.freeze(this.members.map((member) => member.key));
  }
}

/**
 * Builds the closure set of a seed predicate.
 *
 * @param seed - Predicate name or predicate.
 * @param maxDepth - Number of expansion steps allowed (≥ 0).
 * @param maxSetSize - Largest set size allowed (> 0).
 * @param options - Rules, cache, depth ceiling and logger.
 * @returns The attractor.
 * @throws InvalidPredicateError if the seed name is invalid; no work is done.
 * @throws InvalidArgumentError if a bound is not an integer in range.
 * @throws DepthLimitError if `maxDepth` exceeds the ceiling or the set would
 * exceed `maxSetSize`.
 *
 * @example
 * ```typescript
 * const attractor = buildAttractor('X', 1, 100);
 * attractor.finalSet.includes('(X∧¬X)'); // true
 * ```
 */
export function buildAttractor(
  seed: string | Predicate,
  maxDepth: number,
  maxSetSize: number,
  options: BuildAttractorOptions = {}
): AttractorResult {
  const predicate = createPredicate(seed);
  assertNonNegativeInteger(maxDepth, 'maxDepth');
  assertPositiveInteger(maxSetSize, 'maxSetSize');
  const depthCeiling = assertNonNegativeInteger(
    options.depthCeiling ?? DEFAULT_DEPTH_CEILING,
    'depthCeiling'
  );

  const { logger } = options;
  const rules = options.rules ?? DEFAULT_RULES;
  const canonical: CanonicalOptions =
    options.cache === undefined ? { rules } : { rules, cache: options.cache };

  if (maxDepth > depthCeiling) {
    throw new DepthLimitError('depth_ceiling', {
      seed: predicate.name,
      attempted: maxDepth,
      limit: depthCeiling,
      generation: 0,
    });
  }

  logger?.info('attractor_build_started', {
    seed: predicate.name,
    maxDepth,
    maxSetSize,
    rules,
  });

  const set = new BoundedExpressionSet(predicate.name, maxSetSize, (error) => {
    logger?.warn('attractor_bound_exceeded', {
      seed: error.seed,
      attempted: error.attempted,
      limit: error.limit,
      generation: error.generation,
    });
  });

  const base = baseSet(predicate);
  for (const literal of base) {
    set.admit(literal, 0);
  }

  const generations: (readonly string[])[] = [set.keySnapshot()];
  let convergedAtGeneration: number | null = null;

  for (let generation = 1; generation <= maxDepth; generation++) {
    let added = 0;
    for (const candidate of expandGeneration(set.snapshot(), base, canonical)) {
      if (set.admit(candidate, generation)) {
        added++;
      }
    }
    generations.push(set.keySnapshot());

    logger?.debug('generation_expanded', {
      seed: predicate.name,
      generation,
      added,
      size: set.size,
    });

    if (added === 0) {
      convergedAtGeneration = generation;
      break;
    }
  }

  const finalSet = generations[generations.length - 1] ?? [];
  const converged = convergedAtGeneration !== null;

  if (converged) {
    logger?.info('attractor_converged', {
      seed: predicate.name,
      generation: convergedAtGeneration,
      size: finalSet.length,
    });
  } else {
    logger?.info('attractor_depth_exhausted', {
      seed: predicate.name,
      maxDepth,
      size: finalSet.length,
    });
  }

  return Object.freeze({
    seed: predicate.name,
    maxDepth,
    maxSetSize,
    rules,
    generations: Object.freeze(generations),
    finalSet,
    converged,
    convergedAtGeneration,
  });
}
