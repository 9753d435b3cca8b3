/**
 * modgate Kernel — Result Types
 *
 * Two result shapes live here:
 *
 * - DependencyValidationResult: the outcome of a dependency graph
 *   validation run. Fail-fast, so a failure carries exactly one
 *   ValidationFailure.
 * - ValidationResult<T>: the generic aggregated result used for structural
 *   validation of untyped input (bundle descriptors). A failure carries
 *   every problem found.
 */

import type { ValidationFailure } from './failure.js';
import type { EdgeRelation } from './relation.js';

/**
 * Outcome of validateModuleDependencies().
 *
 * On success the frozen edge relation is returned so callers can inspect the
 * graph that was certified without rebuilding it.
 */
export type DependencyValidationResult =
  | { readonly ok: true; readonly relation: EdgeRelation }
  | { readonly ok: false; readonly failure: ValidationFailure };

/**
 * A single structural validation problem.
 */
export interface ValidationError {
  readonly message: string;
  readonly context?: string | undefined;
}

/**
 * Generic validation result type.
 *
 * - `ValidationResult<void>`: success has no value (structural validation only)
 * - `ValidationResult<T>`: success carries a typed value
 */
export type ValidationResult<T = void> =
  | (T extends void ? { readonly ok: true } : { readonly ok: true; readonly value: T })
  | { readonly ok: false; readonly errors: ReadonlyArray<ValidationError> };
