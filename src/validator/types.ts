/**
 * Report types for attractor and oscillation validation.
 *
 * @packageDocumentation
 */

import type { SimplificationRules } from '../algebra/index.js';

/**
 * Names of the invariant checks.
 */
export type ValidationCheck =
  | 'seed_mismatch'
  | 'base_elements_present'
  | 'canonical_keys'
  | 'unique_keys'
  | 'monotone_growth'
  | 'contradiction_present'
  | 'convergence_consistent'
  | 'fixed_point'
  | 'entropy_conserved'
  | 'period_mismatch';

/**
 * A violated invariant. Failures are collected, never thrown.
 */
export interface CheckFailure {
  /** Which check failed. */
  readonly check: ValidationCheck;
  /** Human-readable description. */
  readonly message: string;
  /** Values needed to reproduce the finding. */
  readonly details?: Readonly<Record<string, unknown>>;
}

/**
 * Parameters of the validated attractor, kept for reproducibility.
 */
export interface ValidationParameters {
  readonly seed: string;
  readonly maxDepth: number;
  readonly maxSetSize: number;
  readonly rules: SimplificationRules;
  readonly generationCount: number;
}

/**
 * Result of validating an attractor.
 */
export interface ValidationReport {
  /** The contradiction `P ∧ ¬P` is in the final set. */
  readonly contradictionPresent: boolean;
  /** The tautology `P ∨ ¬P` is in the final set. */
  readonly tautologyPresent: boolean;
  /** `P` is in the final set. */
  readonly basePredicatePresent: boolean;
  /** `¬P` is in the final set. */
  readonly baseNegationPresent: boolean;
  /** Number of keys in the final set. */
  readonly totalExpressions: number;
  /** Number of distinct canonical keys in the final set. */
  readonly uniqueExpressions: number;
  /** The engine's convergence flag. */
  readonly converged: boolean;
  /** The engine's flag agrees with comparing the last two snapshots. */
  readonly convergedConsistent: boolean;
  /**
   * Re-expanding the final set adds no key. Null when the attractor does not
   * claim convergence.
   */
  readonly fixedPointVerified: boolean | null;
  /** Shannon entropy, in bits, of the base distribution at generation 0. */
  readonly entropyBits: number;
  /** The same measure for every generation. */
  readonly entropyByGeneration: readonly number[];
  /** Every generation has the entropy of generation 0. */
  readonly entropyConserved: boolean;
  /** Violated invariants. */
  readonly failures: readonly CheckFailure[];
  /** No invariant was violated. */
  readonly passed: boolean;
  /** Parameters of the validated attractor. */
  readonly parameters: ValidationParameters;
}

/**
 * Periodicity classification of an oscillation sequence.
 */
export type PeriodicityClassification = 'periodic' | 'insufficient-data';

/**
 * Result of validating an oscillation sequence.
 */
export interface OscillationReport {
  /** Sequence length. */
  readonly length: number;
  /** Smallest period, or null with fewer than two states. */
  readonly period: number | null;
  /** Periodicity classification. */
  readonly classification: PeriodicityClassification;
  /** Shannon entropy, in bits, of the true/false frequencies. */
  readonly entropyBits: number;
  /** Violated invariants. */
  readonly failures: readonly CheckFailure[];
  /** No invariant was violated. */
  readonly passed: boolean;
}
