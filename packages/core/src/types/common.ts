/**
 * Common types used across Drover
 */

import type { DroverError } from '../errors.js';

/**
 * Result of an operation that reports failure as a value instead of throwing
 */
export type Outcome<T, E = DroverError> =
  | { success: true; value: T }
  | { success: false; error: E };

/**
 * Build a successful outcome
 */
export function ok<T>(value: T): Outcome<T, never> {
  return { success: true, value };
}

/**
 * Build a failed outcome
 */
export function fail<E = DroverError>(error: E): Outcome<never, E> {
  return { success: false, error };
}
