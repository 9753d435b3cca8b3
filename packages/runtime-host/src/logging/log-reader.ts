/**
 * modgate Runtime Host — Validation Log Reader
 *
 * Pure function for reading the JSONL validation log with dedupe-on-read.
 * Accepts raw JSONL text and returns the structured entries.
 *
 * Guarantees:
 *   - lines that are not JSON, or lack a string event_id, are dropped and
 *     counted in parseErrors
 *   - events are deduplicated by event_id; the first occurrence wins
 *   - content not ending in '\n' has its last line dropped as a partial write
 *   - output is sorted by (timestamp asc, event_id asc)
 *
 * No I/O. Callers obtain raw content via LogStore.readLogRaw().
 */

import { FailureKind, ValidationOutcome } from '@modgate/kernel';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** One validation log line, as written by FileLogSink. */
export interface ValidationLogEvent {
  /** 26-character ULID; the deduplication key. */
  readonly event_id: string;
  /** ISO 8601 timestamp, or '' when the line carries none. */
  readonly timestamp: string;
  readonly bundle: string | null;
  /** null when the line carries no recognised outcome. */
  readonly outcome: ValidationOutcome | null;
  readonly failure_kind: FailureKind | null;
  readonly message: string | null;
  readonly module_count: number | null;
}

export interface LogReadStats {
  /** Non-empty lines processed. */
  totalLines: number;
  /** Events kept after deduplication. */
  parsedEvents: number;
  /** Events dropped because their event_id was already seen. */
  duplicates: number;
  /** Lines dropped as unparseable or missing event_id. */
  parseErrors: number;
  /** True if the content did not end with '\n'; the last line was dropped. */
  partialTrailingLine: boolean;
}

export interface LogReadResult {
  events: ReadonlyArray<ValidationLogEvent>;
  stats: LogReadStats;
}

// ---------------------------------------------------------------------------
// Field narrowing
// ---------------------------------------------------------------------------

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function stringOrNull(value: unknown): string | null {
  return typeof value === 'string' ? value : null;
}

function toOutcome(value: unknown): ValidationOutcome | null {
  return Object.values(ValidationOutcome).find((outcome) => outcome === value) ?? null;
}

function toFailureKind(value: unknown): FailureKind | null {
  return Object.values(FailureKind).find((kind) => kind === value) ?? null;
}

function toEvent(record: unknown): ValidationLogEvent | null {
  if (!isRecord(record)) return null;
  const eventId = record['event_id'];
  if (typeof eventId !== 'string') return null;

  const moduleCount = record['module_count'];
  return {
    event_id: eventId,
    timestamp: stringOrNull(record['timestamp']) ?? '',
    bundle: stringOrNull(record['bundle']),
    outcome: toOutcome(record['outcome']),
    failure_kind: toFailureKind(record['failure_kind']),
    message: stringOrNull(record['message']),
    module_count: typeof moduleCount === 'number' ? moduleCount : null,
  };
}

// ---------------------------------------------------------------------------
// Implementation
// ---------------------------------------------------------------------------

/**
 * Parse, deduplicate and sort the validation log given its raw content.
 */
export function readLog(rawContent: string): LogReadResult {
  if (rawContent.length === 0) {
    return {
      events: [],
      stats: {
        totalLines: 0,
        parsedEvents: 0,
        duplicates: 0,
        parseErrors: 0,
        partialTrailingLine: false,
      },
    };
  }

  const partialTrailingLine = !rawContent.endsWith('\n');
  const rawLines = rawContent.split('\n');
  const lineList = (partialTrailingLine ? rawLines.slice(0, -1) : rawLines).filter(
    (l) => l.length > 0,
  );

  let duplicates = 0;
  let parseErrors = 0;
  const seen = new Map<string, ValidationLogEvent>();

  for (const line of lineList) {
    let parsed: unknown;
    try {
      parsed = JSON.parse(line);
    } catch {
      parseErrors++;
      continue;
    }

    const event = toEvent(parsed);
    if (event === null) {
      parseErrors++;
    } else if (seen.has(event.event_id)) {
      duplicates++;
    } else {
      seen.set(event.event_id, event);
    }
  }

  const sorted = [...seen.values()].sort((a, b) => {
    if (a.timestamp < b.timestamp) return -1;
    if (a.timestamp > b.timestamp) return 1;
    if (a.event_id < b.event_id) return -1;
    if (a.event_id > b.event_id) return 1;
    return 0;
  });

  return {
    events: sorted,
    stats: {
      totalLines: lineList.length,
      parsedEvents: sorted.length,
      duplicates,
      parseErrors,
      partialTrailingLine,
    },
  };
}
