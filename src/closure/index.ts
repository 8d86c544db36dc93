/**
 * Closure engine module.
 *
 * Builds bounded attractors and serializes them.
 *
 * @packageDocumentation
 */

export type { AttractorResult, BuildAttractorOptions } from './types.js';
export { DepthLimitError } from './errors.js';
export type { DepthLimitKind } from './errors.js';
export { buildAttractor, expandGeneration, DEFAULT_DEPTH_CEILING } from './engine.js';
export {
  ATTRACTOR_FORMAT_VERSION,
  AttractorSerializationError,
  serializeAttractor,
  deserializeAttractor,
} from './serialization.js';
export type {
  AttractorSerializationErrorType,
  SerializeAttractorOptions,
} from './serialization.js';
