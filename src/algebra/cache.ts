/**
 * Explicit memo of canonical forms.
 *
 * Expressions are frozen value objects, so a canonical form never goes stale
 * and one cache may be handed to any number of closure builds. Nothing shares
 * a cache implicitly: callers pass it in through `CanonicalOptions.cache`.
 *
 * @packageDocumentation
 */

import type { Expression, KeyCacheLike, SimplificationRules } from './types.js';

/**
 * Memo of canonical forms, one table per rule set.
 *
 * Raw nodes are keyed by identity. Constructor results (`a ∧ b`, `a ∨ b`,
 * `¬a` over canonical operands) are keyed by an operation signature made of
 * the operand keys; that is the table a closure build hits.
 *
 * @example
 * ```typescript
 * const cache = new KeyCache();
 * buildAttractor('X', 3, 1000, { cache });
 * buildAttractor('X', 3, 1000, { cache }); // every constructor call hits
 * ```
 */
export class KeyCache implements KeyCacheLike {
  private readonly nodes = new Map<SimplificationRules, WeakMap<Expression, Expression>>();
  private readonly results = new Map<SimplificationRules, Map<string, Expression>>();
  private hitCount = 0;
  private missCount = 0;

  /** Lookups answered from the cache. */
  get hits(): number {
    return this.hitCount;
  }

  /** Lookups that found nothing. */
  get misses(): number {
    return this.missCount;
  }

  /** Number of memoized constructor results across rule sets. */
  get size(): number {
    let total = 0;
    for (const table of this.results.values()) {
      total += table.size;
    }
    return total;
  }

  get(expression: Expression, rules: SimplificationRules): Expression | undefined {
    return this.count(this.nodes.get(rules)?.get(expression));
  }

  set(expression: Expression, rules: SimplificationRules, canonical: Expression): void {
    let forRules = this.nodes.get(rules);
    if (forRules === undefined) {
      forRules = new WeakMap();
      this.nodes.set(rules, forRules);
    }
    forRules.set(expression, canonical);
  }

  getResult(signature: string, rules: SimplificationRules): Expression | undefined {
    return this.count(this.results.get(rules)?.get(signature));
  }

  setResult(signature: string, rules: SimplificationRules, result: Expression): void {
    let forRules = this.results.get(rules);
    if (forRules === undefined) {
      forRules = new Map();
      this.results.set(rules, forRules);
    }
    forRules.set(signature, result);
  }

  private count(found: Expression | undefined): Expression | undefined {
    if (found === undefined) {
      this.missCount++;
    } else {
      this.hitCount++;
    }
    return found;
  }
}
