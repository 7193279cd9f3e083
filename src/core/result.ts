/**
 * Result type for pipeline steps.
 *
 * Parsing and resolution never throw for user-caused problems; they return a
 * failed Result and let the caller decide whether to terminate.
 */

import type { XzoptError } from './errors.js';

export type Result<T, E = XzoptError> = { success: true; value: T } | { success: false; error: E };

export function ok<T>(value: T): Result<T, never> {
  return { success: true, value };
}

export function fail<E = XzoptError>(error: E): Result<never, E> {
  return { success: false, error };
}
