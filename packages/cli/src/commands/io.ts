/**
 * commands/io.ts — line-oriented output channels for command handlers.
 *
 * Handlers write through a CommandIO instead of the console so that tests
 * can capture stdout and stderr separately.
 */

import { resolveModgateHome } from '@modgate/runtime-host';
import { t } from '../theme.js';

export interface CommandIO {
  readonly out: (line: string) => void;
  readonly err: (line: string) => void;
}

export const consoleIO: CommandIO = {
  out: (line) => { process.stdout.write(line + '\n'); },
  err: (line) => { process.stderr.write(line + '\n'); },
};

/** Process exit codes shared by every command. */
export const ExitCode = {
  /** The command completed; for `validate`, the graph is valid. */
  Ok: 0,
  /** The dependency graph failed validation. */
  Invalid: 1,
  /** The descriptor, the home directory or an option could not be used. */
  Usage: 2,
} as const;

export type ExitCode = (typeof ExitCode)[keyof typeof ExitCode];

/**
 * Resolve MODGATE_HOME for a command.
 *
 * An unreadable OS config file or an uncreatable home directory is an
 * operator error: it is reported on io.err and null is returned.
 */
export function resolveHomeFor(home: string | undefined, io: CommandIO): string | null {
  try {
    return resolveModgateHome({ home });
  } catch (err: unknown) {
    if (!(err instanceof Error)) throw err;
    io.err(`${t.red('✗')} ${err.message}`);
    return null;
  }
}
