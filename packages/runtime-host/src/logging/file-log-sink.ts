/**
 * modgate Runtime Host — File-backed Validation Log Sink
 *
 * Implements the LogSink interface from @modgate/kernel by appending one
 * JSONL line per validation run to `validations.jsonl` via the injected
 * LogStore.
 *
 * This sink is synchronous: the write completes before the call returns.
 */

import type { LogSink, ValidationLog } from '@modgate/kernel';
import type { LogStore } from '../state/log-store.js';
import { ulid } from './ulid.js';

/** Log file every validation run is appended to. */
export const VALIDATION_LOG_FILE = 'validations.jsonl';

export class FileLogSink implements LogSink {
  constructor(
    private readonly store: LogStore,
    private readonly newEventId: () => string = ulid,
  ) {}

  append(entry: ValidationLog): void {
    const line = JSON.stringify({
      event_id: this.newEventId(),
      timestamp: entry.timestamp,
      bundle: entry.bundle,
      outcome: entry.outcome,
      failure_kind: entry.failure_kind,
      message: entry.message,
      module_count: entry.module_count,
    });
    this.store.appendLine(VALIDATION_LOG_FILE, line);
  }
}
