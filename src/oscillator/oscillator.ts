/**
 * Two-state oscillator.
 *
 * A predicate that never settles: its truth value flips on every step.
 * The sequence is a pure function of the initial value and the step count.
 *
 * @packageDocumentation
 */

import {
  assertNonNegativeInteger,
  describeValue,
  InvalidArgumentError,
} from '../algebra/index.js';

/**
 * Period of every oscillator sequence.
 */
export const OSCILLATOR_PERIOD = 2;

/**
 * Fewest states {@link isStable} inspects: two full periods.
 */
export const MIN_STABILITY_STEPS = 2 * OSCILLATOR_PERIOD;

function assertBoolean(value: unknown, argument: string): boolean {
  if (typeof value !== 'boolean') {
    throw new InvalidArgumentError(
      `${argument} must be a boolean, got ${describeValue(value)}`,
      argument,
      value
    );
  }
  return value;
}

/**
 * Generates the oscillation sequence.
 *
 * @param initial - State at index 0.
 * @param steps - Number of states to produce (≥ 0).
 * @returns `steps` states; index `i` equals `initial` when `i` is even.
 * @throws InvalidArgumentError if `initial` is not a boolean or `steps` is
 * not a non-negative integer.
 *
 * @example
 * ```typescript
 * iterate(true, 5); // [true, false, true, false, true]
 * ```
 */
export function iterate(initial: boolean, steps: number): boolean[] {
  assertBoolean(initial, 'initial');
  assertNonNegativeInteger(steps, 'steps');

  const history: boolean[] = [];
  let current = initial;
  for (let i = 0; i < steps; i++) {
    history.push(current);
    current = !current;
  }
  return history;
}

/**
 * Checks that an oscillation keeps its period over a number of steps.
 *
 * Fewer than {@link MIN_STABILITY_STEPS} steps are raised to that minimum.
 *
 * @param initial - State at index 0.
 * @param steps - Number of states to inspect.
 * @returns True when every state equals the one a period earlier.
 */
export function isStable(initial: boolean, steps = 10): boolean {
  const count = Math.max(assertNonNegativeInteger(steps, 'steps'), MIN_STABILITY_STEPS);
  const sequence = iterate(initial, count);
  for (let i = OSCILLATOR_PERIOD; i < sequence.length; i++) {
    if (sequence[i] !== sequence[i - OSCILLATOR_PERIOD]) {
      return false;
    }
  }
  return true;
}
