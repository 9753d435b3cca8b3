/**
 * modgate Runtime Host — LogStore Interface
 *
 * An injectable I/O abstraction for appending to and reading back JSONL log
 * files under a single logs directory.
 *
 * Two implementations are provided:
 *   - FileLogStore   — durable file I/O under `<home>/logs/`
 *   - MemoryLogStore — in-memory I/O for tests and embedded (non-persistent) use
 */

import { appendFileSync, mkdirSync, readFileSync } from 'node:fs';
import { join } from 'node:path';

// ---------------------------------------------------------------------------
// LogStore Interface
// ---------------------------------------------------------------------------

/**
 * Append-only line storage addressed by log filename.
 *
 * All file names are relative (e.g. 'validations.jsonl'); the implementation
 * resolves them. Callers never construct absolute paths directly.
 */
export interface LogStore {
  /**
   * Append a line to a log file.
   *
   * A newline character is appended after the line content.
   *
   * @param logfilename - Log filename (e.g. 'validations.jsonl')
   * @param line - Line content, without trailing newline
   */
  appendLine(logfilename: string, line: string): void;

  /**
   * Return the raw text content of a log file, or '' if it does not exist.
   */
  readLogRaw(logfilename: string): string;
}

// ---------------------------------------------------------------------------
// FileLogStore
// ---------------------------------------------------------------------------

/**
 * File-system LogStore writing to `<homeDir>/logs/<logfilename>`.
 *
 * The logs directory is created on first append.
 * ENOENT on read is recoverable (empty log); other I/O errors are rethrown.
 */
export class FileLogStore implements LogStore {
  constructor(private readonly homeDir: string) {}

  appendLine(logfilename: string, line: string): void {
    const logsDir = join(this.homeDir, 'logs');
    mkdirSync(logsDir, { recursive: true });
    appendFileSync(join(logsDir, logfilename), line + '\n', 'utf-8');
  }

  readLogRaw(logfilename: string): string {
    const logPath = join(this.homeDir, 'logs', logfilename);
    try {
      return readFileSync(logPath, 'utf-8');
    } catch (err: unknown) {
      if (isNodeError(err, 'ENOENT')) {
        return '';
      }
      throw err;
    }
  }
}

// ---------------------------------------------------------------------------
// MemoryLogStore
// ---------------------------------------------------------------------------

/**
 * In-memory LogStore. Instances are isolated from each other.
 */
export class MemoryLogStore implements LogStore {
  private readonly logs: Map<string, string[]> = new Map();

  appendLine(logfilename: string, line: string): void {
    const lines = this.logs.get(logfilename) ?? [];
    lines.push(line);
    this.logs.set(logfilename, lines);
  }

  /**
   * Return all lines appended to a log file.
   * Specific to MemoryLogStore; not part of the LogStore interface.
   */
  readLines(logfilename: string): ReadonlyArray<string> {
    return this.logs.get(logfilename) ?? [];
  }

  readLogRaw(logfilename: string): string {
    const lines = this.logs.get(logfilename) ?? [];
    if (lines.length === 0) return '';
    // Match FileLogStore: each appendLine call adds 'line\n'.
    return lines.join('\n') + '\n';
  }
}

// ---------------------------------------------------------------------------
// Internal helpers
// ---------------------------------------------------------------------------

/** Narrow an unknown error to a Node.js errno exception with a specific code. */
export function isNodeError(err: unknown, code: string): boolean {
  return (
    err !== null &&
    typeof err === 'object' &&
    'code' in err &&
    err.code === code
  );
}
