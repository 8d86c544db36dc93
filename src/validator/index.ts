/**
 * Validator module.
 *
 * Invariant checks over attractors and oscillation sequences, entropy
 * measures and the verification suite.
 *
 * @packageDocumentation
 */

export type {
  CheckFailure,
  OscillationReport,
  PeriodicityClassification,
  ValidationCheck,
  ValidationParameters,
  ValidationReport,
} from './types.js';
export { validate, validateOscillation } from './validator.js';
export type { ValidateOptions } from './validator.js';
export { shannonEntropy, baseEntropy, sequenceEntropy } from './entropy.js';
export { runVerificationSuite } from './verification.js';
export type { DepthProfile, VerificationOptions, VerificationResult } from './verification.js';
