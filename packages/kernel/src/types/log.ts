/**
 * modgate Kernel — Validation Log Types
 *
 * Every validation run performed through ModuleDependencyValidator produces
 * exactly one ValidationLog entry, whatever its outcome.
 */

import type { FailureKind } from './failure.js';

/**
 * Outcome of a logged validation run.
 */
export enum ValidationOutcome {
  /** The module set was certified valid. */
  Valid = 'Valid',
  /** A validation failure was diagnosed. */
  Invalid = 'Invalid',
}

/**
 * A structured log entry for a single validation run.
 */
export interface ValidationLog {
  /** Label of the validated bundle, or null when the caller supplied none. */
  readonly bundle: string | null;
  readonly outcome: ValidationOutcome;
  /** Failure kind, or null on success. */
  readonly failure_kind: FailureKind | null;
  /** Failure message, or null on success. */
  readonly message: string | null;
  /** Number of modules in the validated set. */
  readonly module_count: number;
  /** ISO 8601 timestamp of the run. */
  readonly timestamp: string;
}
