/**
 * modgate Kernel — Validation Logger
 *
 * Records one entry per validation run performed through
 * ModuleDependencyValidator, whatever the outcome.
 *
 * The logger accepts an injected LogSink for persistence. If no sink is
 * injected (e.g., in tests), record() is a no-op.
 */

import type { ValidationLog } from '../types/log.js';
import type { LogSink } from './log-sink.js';

export class ValidationLogger {
  constructor(private readonly sink?: LogSink) {}

  /**
   * Record a validation log entry.
   * Forwarded to the sink if one is injected; otherwise dropped.
   */
  record(entry: ValidationLog): void {
    this.sink?.append(entry);
  }
}
