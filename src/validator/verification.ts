/**
 * Verification suite.
 *
 * Runs the standing claims about attractors and oscillators end to end:
 * reduced attractors reach a fixed point, expansion always produces the
 * contradiction, the oscillator keeps period 2, and its state distribution
 * carries one bit.
 *
 * @packageDocumentation
 */

import { assertNonNegativeInteger, assertPositiveInteger } from '../algebra/index.js';
import { buildAttractor } from '../closure/index.js';
import { iterate } from '../oscillator/index.js';
import type { Logger } from '../utils/logger.js';
import { validate, validateOscillation } from './validator.js';

/**
 * Options for {@link runVerificationSuite}.
 */
export interface VerificationOptions {
  /**
   * Seed predicate name.
   * @defaultValue 'X'
   */
  readonly predicate?: string;
  /**
   * Deepest reduced attractor built while looking for convergence.
   * @defaultValue 5
   */
  readonly maxDepth?: number;
  /**
   * Size bound for every build.
   * @defaultValue 10000
   */
  readonly maxSetSize?: number;
  /**
   * Oscillator states used for the entropy measure.
   * @defaultValue 1000
   */
  readonly entropySteps?: number;
  /** Receives a summary of the outcome. */
  readonly logger?: Logger | undefined;
}

/**
 * Unique expression count of a reduced attractor at one depth.
 */
export interface DepthProfile {
  readonly depth: number;
  readonly uniqueExpressions: number;
  readonly converged: boolean;
}

/**
 * Outcome of the verification suite.
 */
export interface VerificationResult {
  readonly predicate: string;
  /** Per-depth counts, up to the first depth that repeats its predecessor. */
  readonly convergenceProfile: readonly DepthProfile[];
  /** First depth whose count equals the previous depth's, if any. */
  readonly convergenceDepth: number | null;
  /** A depth-3 structural attractor contains the contradiction. */
  readonly contradictionPreserved: boolean;
  /** A 100-state oscillation has period 2. */
  readonly periodVerified: boolean;
  /** Entropy, in bits, of an oscillation of `entropySteps` states. */
  readonly oscillationEntropyBits: number;
  /** Every claim held. */
  readonly passed: boolean;
}

/** Depth used for the contradiction check. */
const CONTRADICTION_DEPTH = 3;

/** Length of the sequence used for the period check. */
const PERIOD_SEQUENCE_LENGTH = 100;

/**
 * Runs the verification suite.
 *
 * @param options - Seed, bounds and logger.
 * @returns The verification result.
 * @throws InvalidPredicateError if the predicate name is invalid.
 * @throws DepthLimitError if a build outgrows `maxSetSize`.
 */
export function runVerificationSuite(options: VerificationOptions = {}): VerificationResult {
  const predicate = options.predicate ?? 'X';
  const maxDepth = assertPositiveInteger(options.maxDepth ?? 5, 'maxDepth');
  const maxSetSize = assertPositiveInteger(options.maxSetSize ?? 10000, 'maxSetSize');
  const entropySteps = assertNonNegativeInteger(options.entropySteps ?? 1000, 'entropySteps');

  const convergenceProfile: DepthProfile[] = [];
  let convergenceDepth: number | null = null;
  for (let depth = 1; depth <= maxDepth; depth++) {
    const attractor = buildAttractor(predicate, depth, maxSetSize, { rules: 'reduced' });
    const uniqueExpressions = new Set(attractor.finalSet).size;
    const previous = convergenceProfile[convergenceProfile.length - 1];
    convergenceProfile.push({ depth, uniqueExpressions, converged: attractor.converged });
    if (previous !== undefined && previous.uniqueExpressions === uniqueExpressions) {
      convergenceDepth = depth;
      break;
    }
  }

  const contradictionPreserved = validate(
    buildAttractor(predicate, CONTRADICTION_DEPTH, maxSetSize),
    predicate
  ).contradictionPresent;

  const periodVerified =
    validateOscillation(iterate(true, PERIOD_SEQUENCE_LENGTH)).period === 2;

  const oscillationEntropyBits = validateOscillation(iterate(true, entropySteps)).entropyBits;

  const passed =
    convergenceDepth !== null &&
    contradictionPreserved &&
    periodVerified &&
    Math.abs(oscillationEntropyBits - 1) < 1e-9;

  options.logger?.info('verification_completed', {
    predicate,
    convergenceDepth,
    contradictionPreserved,
    periodVerified,
    oscillationEntropyBits,
    passed,
  });

  return Object.freeze({
    predicate,
    convergenceProfile: Object.freeze(convergenceProfile),
    convergenceDepth,
    contradictionPreserved,
    periodVerified,
    oscillationEntropyBits,
    passed,
  });
}
