/**
 * Types for closure sets (attractors).
 *
 * @packageDocumentation
 */

import type { KeyCache, SimplificationRules } from '../algebra/index.js';
import type { Logger } from '../utils/logger.js';

/**
 * A closure set reachable from a seed predicate within the requested bounds.
 *
 * Only canonical keys are kept, so the result serializes losslessly; the
 * expressions themselves can be recovered with `parseExpression`.
 */
export interface AttractorResult {
  /** Name of the seed predicate. */
  readonly seed: string;
  /** Depth bound the build ran with. */
  readonly maxDepth: number;
  /** Size bound the build ran with. */
  readonly maxSetSize: number;
  /** Simplification rules the keys are canonical under. */
  readonly rules: SimplificationRules;
  /**
   * Cumulative snapshots. Generation 0 is `[P, ¬P]`; each later snapshot
   * extends the previous one in insertion order.
   */
  readonly generations: readonly (readonly string[])[];
  /** Keys of the final set, in insertion order. */
  readonly finalSet: readonly string[];
  /** Whether an expansion step added nothing before the depth bound ran out. */
  readonly converged: boolean;
  /** The step that added nothing, or null when not converged. */
  readonly convergedAtGeneration: number | null;
}

/**
 * Options for building an attractor.
 */
export interface BuildAttractorOptions {
  /**
   * Simplification rules for every candidate.
   * @defaultValue 'structural'
   */
  readonly rules?: SimplificationRules;

  /**
   * Memo of constructor results; may be shared between builds.
   */
  readonly cache?: KeyCache;

  /**
   * Largest `maxDepth` accepted.
   * @defaultValue 64
   */
  readonly depthCeiling?: number;

  /**
   * Receives build progress. Nothing is logged when omitted.
   */
  readonly logger?: Logger | undefined;
}
