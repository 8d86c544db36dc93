/**
 * Shannon entropy measures.
 *
 * @packageDocumentation
 */

/**
 * Shannon entropy, in bits, of a distribution given by outcome counts.
 *
 * @param counts - Non-negative outcome counts.
 * @returns The entropy; 0 when every count is 0.
 *
 * @example
 * ```typescript
 * shannonEntropy([1, 1]); // 1
 * shannonEntropy([3, 2]); // ≈ 0.971
 * ```
 */
export function shannonEntropy(counts: readonly number[]): number {
  const total = counts.reduce((sum, count) => sum + count, 0);
  if (total === 0) {
    return 0;
  }

  let entropy = 0;
  for (const count of counts) {
    if (count > 0) {
      const p = count / total;
      entropy -= p * Math.log2(p);
    }
  }
  return entropy;
}

/**
 * Entropy of the uniform distribution over the base literals present in a
 * snapshot.
 *
 * The measure is defined over the base `{P, ¬P}` only: elements added by
 * expansion do not enter it, so a well-formed attractor scores 1 bit at every
 * generation.
 *
 * @param snapshot - Keys of one generation.
 * @param baseKeys - Keys of the base literals.
 */
export function baseEntropy(snapshot: readonly string[], baseKeys: readonly string[]): number {
  const present = new Set(snapshot);
  return shannonEntropy(baseKeys.map((key) => (present.has(key) ? 1 : 0)));
}

/**
 * Entropy of the true/false frequencies of a boolean sequence.
 *
 * @param sequence - Oscillator states.
 */
export function sequenceEntropy(sequence: readonly boolean[]): number {
  const trueCount = sequence.filter((state) => state).length;
  return shannonEntropy([trueCount, sequence.length - trueCount]);
}
