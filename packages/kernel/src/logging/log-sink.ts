/**
 * modgate Kernel — Log Sink Interface
 *
 * Defines the injection point for validation log persistence.
 *
 * The kernel owns the contract (this interface) and the ValidationLogger
 * class. Concrete implementations live in the runtime host layer and are
 * injected at construction time; the kernel never writes to disk directly.
 */

import type { ValidationLog } from '../types/log.js';

/**
 * A sink that receives and persists validation log entries.
 *
 * append() must complete before the validator returns its result.
 * Implementations must not silently discard entries.
 */
export interface LogSink {
  append(entry: ValidationLog): void;
}
