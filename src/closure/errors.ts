/**
 * Resource-exhaustion errors for the closure engine.
 *
 * @packageDocumentation
 */

import { XiError } from '../algebra/index.js';

/**
 * Which bound was exceeded.
 *
 * - `set_size`: the set would grow past `maxSetSize`
 * - `depth_ceiling`: `maxDepth` is above the configured ceiling
 */
export type DepthLimitKind = 'set_size' | 'depth_ceiling';

/**
 * Raised when a build would exceed one of its bounds. The build is abandoned
 * and no partial generations are returned.
 */
export class DepthLimitError extends XiError {
  /** Which bound was exceeded. */
  public readonly kind: DepthLimitKind;
  /** Name of the seed predicate. */
  public readonly seed: string;
  /** The set size or depth that was attempted. */
  public readonly attempted: number;
  /** The bound that was exceeded. */
  public readonly limit: number;
  /** Generation being built when the bound tripped (0 before expansion). */
  public readonly generation: number;

  /**
   * Creates a new DepthLimitError.
   *
   * @param kind - Which bound was exceeded.
   * @param context - Seed, attempted value, bound and generation.
   */
  constructor(
    kind: DepthLimitKind,
    context: { seed: string; attempted: number; limit: number; generation: number }
  ) {
    super(DepthLimitError.describe(kind, context), 'depth_limit');
    this.name = 'DepthLimitError';
    this.kind = kind;
    this.seed = context.seed;
    this.attempted = context.attempted;
    this.limit = context.limit;
    this.generation = context.generation;
  }

  private static describe(
    kind: DepthLimitKind,
    context: { seed: string; attempted: number; limit: number; generation: number }
  ): string {
    if (kind === 'depth_ceiling') {
      return `Depth ${String(context.attempted)} for '${context.seed}' exceeds the depth ceiling ${String(context.limit)}`;
    }
    return (
      `Attractor for '${context.seed}' would grow to ${String(context.attempted)} expressions ` +
      `at generation ${String(context.generation)}, exceeding maxSetSize ${String(context.limit)}`
    );
  }
}
