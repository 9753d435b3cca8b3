/**
 * modgate Runtime Host — FileLogSink and ULID Tests
 *
 *   LOG-U1: validations.jsonl line carries every ValidationLog field plus event_id
 *   LOG-U2: two appended entries have distinct event_ids
 *   LOG-U3: sink output reads back through readLog()
 *   ULID-U1: time and random parts are Crockford-encoded at fixed width
 *
 * Isolation: uses MemoryLogStore — no filesystem I/O.
 */

import { describe, it, expect } from 'vitest';
import { FailureKind, ValidationOutcome } from '@modgate/kernel';
import type { ValidationLog } from '@modgate/kernel';
import { FileLogSink, VALIDATION_LOG_FILE } from '../src/logging/file-log-sink.js';
import { readLog } from '../src/logging/log-reader.js';
import { ulid } from '../src/logging/ulid.js';
import { MemoryLogStore } from '../src/state/log-store.js';

// ---------------------------------------------------------------------------
// Fixtures
// ---------------------------------------------------------------------------

const ULID_PATTERN = /^[0-9ABCDEFGHJKMNPQRSTVWXYZ]{26}$/;

function makeEntry(overrides?: Partial<ValidationLog>): ValidationLog {
  return {
    bundle: 'shop',
    outcome: ValidationOutcome.Invalid,
    failure_kind: FailureKind.SelfDependency,
    message: "Module 'camera' depends on itself.",
    module_count: 4,
    timestamp: '2026-02-10T08:30:00.000Z',
    ...overrides,
  };
}

// ---------------------------------------------------------------------------
// FileLogSink
// ---------------------------------------------------------------------------

describe('FileLogSink', () => {
  it('LOG-U1: writes one JSON line with event_id and every entry field', () => {
    const store = new MemoryLogStore();
    const sink = new FileLogSink(store, () => '01HX0000000000000000000001');

    sink.append(makeEntry());

    const lines = store.readLines(VALIDATION_LOG_FILE);
    expect(lines).toEqual([
      JSON.stringify({
        event_id: '01HX0000000000000000000001',
        timestamp: '2026-02-10T08:30:00.000Z',
        bundle: 'shop',
        outcome: 'Invalid',
        failure_kind: 'SelfDependency',
        message: "Module 'camera' depends on itself.",
        module_count: 4,
      }),
    ]);
  });

  it('LOG-U2: two appended entries have distinct 26-char ULID event_ids', () => {
    const store = new MemoryLogStore();
    const sink = new FileLogSink(store);

    sink.append(makeEntry());
    sink.append(makeEntry());

    const ids = store.readLines(VALIDATION_LOG_FILE).map((line) => {
      const parsed: unknown = JSON.parse(line);
      return typeof parsed === 'object' && parsed !== null && 'event_id' in parsed
        ? parsed.event_id
        : undefined;
    });
    expect(ids).toHaveLength(2);
    for (const id of ids) {
      expect(id).toMatch(ULID_PATTERN);
    }
    expect(ids[0]).not.toBe(ids[1]);
  });

  it('LOG-U3: sink output reads back through readLog()', () => {
    const store = new MemoryLogStore();
    let n = 0;
    const sink = new FileLogSink(store, () => `01HX000000000000000000000${++n}`);

    sink.append(makeEntry({ timestamp: '2026-02-10T08:31:00.000Z' }));
    sink.append(
      makeEntry({
        outcome: ValidationOutcome.Valid,
        failure_kind: null,
        message: null,
        timestamp: '2026-02-10T08:30:00.000Z',
      }),
    );

    const { events, stats } = readLog(store.readLogRaw(VALIDATION_LOG_FILE));

    expect(stats.parsedEvents).toBe(2);
    expect(events.map((e) => [e.event_id, e.outcome])).toEqual([
      ['01HX0000000000000000000002', ValidationOutcome.Valid],
      ['01HX0000000000000000000001', ValidationOutcome.Invalid],
    ]);
  });
});

// ---------------------------------------------------------------------------
// ulid
// ---------------------------------------------------------------------------

describe('ulid', () => {
  it('ULID-U1: encodes the timestamp in 10 chars and 80 random bits in 16', () => {
    const zeros = (size: number): Uint8Array => new Uint8Array(size);
    const ones = (size: number): Uint8Array => new Uint8Array(size).fill(0xff);

    expect(ulid(0, zeros)).toBe('0'.repeat(26));
    expect(ulid(1, zeros)).toBe('0000000001' + '0'.repeat(16));
    expect(ulid(32, ones)).toBe('0000000010' + 'Z'.repeat(16));
  });

  it('ULID-U1b: later timestamps sort after earlier ones', () => {
    expect(ulid(1_700_000_000_000) < ulid(1_700_000_000_001)).toBe(true);
  });
});
