/**
 * Structural validator for attractors and oscillation sequences.
 *
 * A violated invariant is a finding about the input, so it becomes a
 * {@link CheckFailure} in the report and the remaining checks still run.
 * Only malformed inputs throw.
 *
 * @packageDocumentation
 */

import {
  baseSet,
  contradiction,
  createPredicate,
  describeValue,
  InvalidArgumentError,
  parseExpression,
  tautology,
  XiError,
  type CanonicalOptions,
  type Expression,
  type KeyCache,
  type Predicate,
} from '../algebra/index.js';
import { expandGeneration, type AttractorResult } from '../closure/index.js';
import type { Logger } from '../utils/logger.js';
import { baseEntropy, sequenceEntropy } from './entropy.js';
import type { CheckFailure, OscillationReport, ValidationReport } from './types.js';

/**
 * Options for {@link validate}.
 */
export interface ValidateOptions {
  /** Memo used when re-deriving the fixed point. */
  readonly cache?: KeyCache;
  /** Receives a summary of the outcome. */
  readonly logger?: Logger | undefined;
}

function assertAttractorShape(attractor: AttractorResult): void {
  const candidate: unknown = attractor;
  if (candidate === null || typeof candidate !== 'object') {
    throw new InvalidArgumentError(
      `attractor must be an object, got ${describeValue(candidate)}`,
      'attractor',
      candidate
    );
  }
  if (!Array.isArray(attractor.finalSet) || !Array.isArray(attractor.generations)) {
    throw new InvalidArgumentError(
      'attractor must carry finalSet and generations arrays',
      'attractor',
      candidate
    );
  }
  if (attractor.generations.some((generation) => !Array.isArray(generation))) {
    throw new InvalidArgumentError(
      'attractor generations must be arrays of keys',
      'attractor',
      candidate
    );
  }
}

function sameKeys(a: readonly string[], b: readonly string[]): boolean {
  if (a.length !== b.length) {
    return false;
  }
  const keys = new Set(a);
  return b.every((key) => keys.has(key));
}

/**
 * Final-set keys read back through the parser.
 */
interface KeyInspection {
  /** Parsed canonical forms of every key that parses. */
  readonly members: readonly Expression[];
  /** Canonical key of each entry, or the entry itself when it does not parse. */
  readonly canonicalKeys: readonly string[];
  /** Entries whose canonical key differs from the stored one. */
  readonly rewritten: readonly { key: string; canonical: string }[];
  /** First entry that does not parse. */
  readonly unparsable: { key: string; message: string } | null;
}

function inspectKeys(keys: readonly string[], options: CanonicalOptions): KeyInspection {
  const members: Expression[] = [];
  const canonicalKeys: string[] = [];
  const rewritten: { key: string; canonical: string }[] = [];
  let unparsable: { key: string; message: string } | null = null;

  for (const key of keys) {
    try {
      const parsed = parseExpression(key, options);
      members.push(parsed);
      canonicalKeys.push(parsed.key);
      if (parsed.key !== key) {
        rewritten.push({ key, canonical: parsed.key });
      }
    } catch (error) {
      if (!(error instanceof XiError)) {
        throw error;
      }
      if (unparsable === null) {
        unparsable = { key, message: error.message };
      }
      canonicalKeys.push(key);
    }
  }
  return { members, canonicalKeys, rewritten, unparsable };
}

/**
 * Re-expands the final set once and reports the first key it would add.
 */
function findEscapingKey(
  members: readonly Expression[],
  memberKeys: ReadonlySet<string>,
  predicate: Predicate,
  options: CanonicalOptions
): string | null {
  for (const candidate of expandGeneration(members, baseSet(predicate), options)) {
    if (!memberKeys.has(candidate.key)) {
      return candidate.key;
    }
  }
  return null;
}

/**
 * Validates an attractor against its seed.
 *
 * @param attractor - The attractor to inspect.
 * @param seed - The seed predicate or its name.
 * @param options - Cache and logger.
 * @returns The validation report.
 * @throws InvalidPredicateError if the seed name is invalid.
 * @throws InvalidArgumentError if the attractor is malformed.
 *
 * @example
 * ```typescript
 * const report = validate(buildAttractor('X', 1, 100), 'X');
 * report.contradictionPresent; // true
 * report.entropyBits; // 1
 * ```
 */
export function validate(
  attractor: AttractorResult,
  seed: string | Predicate,
  options: ValidateOptions = {}
): ValidationReport {
  const predicate = createPredicate(seed);
  assertAttractorShape(attractor);

  const failures: CheckFailure[] = [];
  const canonical: CanonicalOptions =
    options.cache === undefined
      ? { rules: attractor.rules }
      : { rules: attractor.rules, cache: options.cache };
  const finalKeys = new Set(attractor.finalSet);
  const [predicateLiteral, negationLiteral] = baseSet(predicate);
  const baseKeys = [predicateLiteral.key, negationLiteral.key];

  if (attractor.seed !== predicate.name) {
    failures.push({
      check: 'seed_mismatch',
      message: `Attractor was built from '${attractor.seed}', not '${predicate.name}'`,
      details: { attractorSeed: attractor.seed, seed: predicate.name },
    });
  }

  const basePredicatePresent = finalKeys.has(predicateLiteral.key);
  const baseNegationPresent = finalKeys.has(negationLiteral.key);
  const generationZero = attractor.generations[0] ?? [];
  if (!basePredicatePresent || !baseNegationPresent || !sameKeys(generationZero, baseKeys)) {
    failures.push({
      check: 'base_elements_present',
      message: `Generation 0 must be exactly {${baseKeys.join(', ')}} and both must survive`,
      details: { generationZero, basePredicatePresent, baseNegationPresent },
    });
  }

  const inspection = inspectKeys(attractor.finalSet, canonical);
  const firstRewritten = inspection.rewritten[0];
  if (inspection.unparsable !== null) {
    failures.push({
      check: 'canonical_keys',
      message: `Final set key '${inspection.unparsable.key}' does not parse: ${inspection.unparsable.message}`,
      details: { key: inspection.unparsable.key },
    });
  } else if (firstRewritten !== undefined) {
    failures.push({
      check: 'canonical_keys',
      message: `Final set key '${firstRewritten.key}' is not canonical; ${attractor.rules} rules give '${firstRewritten.canonical}'`,
      details: { ...firstRewritten, count: inspection.rewritten.length },
    });
  }

  const uniqueKeys = new Set(inspection.canonicalKeys);
  if (uniqueKeys.size !== attractor.finalSet.length) {
    failures.push({
      check: 'unique_keys',
      message: 'Final set contains duplicate keys',
      details: { total: attractor.finalSet.length, unique: uniqueKeys.size },
    });
  }

  for (let i = 1; i < attractor.generations.length; i++) {
    const previous = attractor.generations[i - 1] ?? [];
    const current = new Set(attractor.generations[i]);
    const lost = previous.find((key) => !current.has(key));
    if (lost !== undefined) {
      failures.push({
        check: 'monotone_growth',
        message: `Generation ${String(i)} dropped '${lost}' from generation ${String(i - 1)}`,
        details: { generation: i, key: lost },
      });
      break;
    }
  }

  const contradictionKey = contradiction(predicate, canonical).key;
  const contradictionPresent = finalKeys.has(contradictionKey);
  if (!contradictionPresent && attractor.generations.length > 1) {
    failures.push({
      check: 'contradiction_present',
      message: `Contradiction '${contradictionKey}' is missing after expansion`,
      details: { key: contradictionKey },
    });
  }
  const tautologyPresent = finalKeys.has(tautology(predicate, canonical).key);

  const last = attractor.generations[attractor.generations.length - 1];
  const secondLast = attractor.generations[attractor.generations.length - 2];
  const recomputedConverged =
    last !== undefined && secondLast !== undefined && sameKeys(last, secondLast);
  const convergedConsistent = recomputedConverged === attractor.converged;
  if (!convergedConsistent) {
    failures.push({
      check: 'convergence_consistent',
      message: `Engine reports converged=${String(attractor.converged)} but the last two generations say ${String(recomputedConverged)}`,
      details: { reported: attractor.converged, recomputed: recomputedConverged },
    });
  }

  let fixedPointVerified: boolean | null = null;
  if (attractor.converged) {
    if (inspection.unparsable !== null) {
      fixedPointVerified = false;
      failures.push({
        check: 'fixed_point',
        message: `Final set could not be re-expanded: ${inspection.unparsable.message}`,
      });
    } else {
      const escaped = findEscapingKey(inspection.members, uniqueKeys, predicate, canonical);
      fixedPointVerified = escaped === null;
      if (escaped !== null) {
        failures.push({
          check: 'fixed_point',
          message: `Re-expanding the final set adds '${escaped}'`,
          details: { key: escaped },
        });
      }
    }
  }

  const entropyByGeneration = attractor.generations.map((generation) =>
    baseEntropy(generation, baseKeys)
  );
  const entropyBits = entropyByGeneration[0] ?? 0;
  const driftAt = entropyByGeneration.findIndex((value) => value !== entropyBits);
  const entropyConserved = driftAt === -1;
  if (!entropyConserved) {
    failures.push({
      check: 'entropy_conserved',
      message: `Base entropy changed from ${String(entropyBits)} to ${String(entropyByGeneration[driftAt])} at generation ${String(driftAt)}`,
      details: { generation: driftAt, entropyByGeneration },
    });
  }

  const passed = failures.length === 0;
  if (passed) {
    options.logger?.info('attractor_validation_passed', { seed: predicate.name });
  } else {
    options.logger?.warn('attractor_validation_failed', {
      seed: predicate.name,
      checks: failures.map((failure) => failure.check),
    });
  }

  const report: ValidationReport = {
    contradictionPresent,
    tautologyPresent,
    basePredicatePresent,
    baseNegationPresent,
    totalExpressions: attractor.finalSet.length,
    uniqueExpressions: uniqueKeys.size,
    converged: attractor.converged,
    convergedConsistent,
    fixedPointVerified,
    entropyBits,
    entropyByGeneration: Object.freeze(entropyByGeneration),
    entropyConserved,
    failures: Object.freeze(failures),
    passed,
    parameters: Object.freeze({
      seed: attractor.seed,
      maxDepth: attractor.maxDepth,
      maxSetSize: attractor.maxSetSize,
      rules: attractor.rules,
      generationCount: attractor.generations.length,
    }),
  };
  return Object.freeze(report);
}

/**
 * Smallest `p` in `[1, n]` with `sequence[i] === sequence[i - p]` for all
 * `i ≥ p`. `n` always qualifies.
 *
 * The smallest period is `n` minus the longest proper border, read off the
 * prefix function in linear time.
 */
function minimalPeriod(sequence: readonly boolean[]): number {
  const border = new Array<number>(sequence.length).fill(0);
  for (let i = 1; i < sequence.length; i++) {
    let k = border[i - 1] ?? 0;
    while (k > 0 && sequence[i] !== sequence[k]) {
      k = border[k - 1] ?? 0;
    }
    if (sequence[i] === sequence[k]) {
      k++;
    }
    border[i] = k;
  }
  return sequence.length - (border[sequence.length - 1] ?? 0);
}

/**
 * Classifies the periodicity of an oscillation sequence.
 *
 * @param sequence - Oscillator states.
 * @returns The report; a period other than 2 is recorded as a failure.
 * @throws InvalidArgumentError if the input is not an array of booleans.
 *
 * @example
 * ```typescript
 * validateOscillation(iterate(false, 6)); // period 2, 'periodic'
 * ```
 */
export function validateOscillation(sequence: readonly boolean[]): OscillationReport {
  const candidate: unknown = sequence;
  if (!Array.isArray(candidate)) {
    throw new InvalidArgumentError(
      `sequence must be an array, got ${describeValue(candidate)}`,
      'sequence',
      candidate
    );
  }
  const badIndex = sequence.findIndex((state: unknown) => typeof state !== 'boolean');
  if (badIndex !== -1) {
    throw new InvalidArgumentError(
      `sequence[${String(badIndex)}] must be a boolean, got ${describeValue(sequence[badIndex])}`,
      'sequence',
      candidate
    );
  }

  const entropyBits = sequenceEntropy(sequence);
  if (sequence.length < 2) {
    const report: OscillationReport = {
      length: sequence.length,
      period: null,
      classification: 'insufficient-data',
      entropyBits,
      failures: Object.freeze([]),
      passed: true,
    };
    return Object.freeze(report);
  }

  const period = minimalPeriod(sequence);
  const failures: CheckFailure[] = [];
  if (period !== 2) {
    failures.push({
      check: 'period_mismatch',
      message: `Expected period 2, found ${String(period)}`,
      details: { period, length: sequence.length },
    });
  }

  const report: OscillationReport = {
    length: sequence.length,
    period,
    classification: 'periodic',
    entropyBits,
    failures: Object.freeze(failures),
    passed: failures.length === 0,
  };
  return Object.freeze(report);
}
