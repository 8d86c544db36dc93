/**
 * Oscillator module.
 *
 * @packageDocumentation
 */

export { iterate, isStable, OSCILLATOR_PERIOD, MIN_STABILITY_STEPS } from './oscillator.js';
