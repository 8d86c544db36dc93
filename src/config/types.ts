/**
 * Configuration types for xi.toml parsing.
 *
 * @packageDocumentation
 */

import type { SimplificationRules } from '../algebra/index.js';

/**
 * Bounds and rules for attractor builds.
 */
export interface ClosureConfig {
  /** Default depth bound (expansion steps). */
  max_depth: number;
  /** Default size bound for the closure set. */
  max_set_size: number;
  /** Largest depth any request may ask for. */
  depth_ceiling: number;
  /** Simplification rules applied to candidates. */
  rules: SimplificationRules;
}

/**
 * Defaults for oscillator runs.
 */
export interface OscillatorConfig {
  /** Number of states to generate. */
  steps: number;
  /** State at index 0. */
  initial: boolean;
}

/**
 * Logging configuration.
 */
export interface LoggingConfig {
  /** Whether debug entries are written. */
  debug: boolean;
}

/**
 * Complete configuration.
 */
export interface Config {
  closure: ClosureConfig;
  oscillator: OscillatorConfig;
  logging: LoggingConfig;
}

/**
 * Partial configuration used for overrides.
 */
export interface PartialConfig {
  closure?: Partial<ClosureConfig>;
  oscillator?: Partial<OscillatorConfig>;
  logging?: Partial<LoggingConfig>;
}
