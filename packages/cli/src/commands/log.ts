/**
 * modgate log — Query the validation log
 *
 * Prints the most recent validation runs recorded under
 * <MODGATE_HOME>/logs/validations.jsonl, deduplicated by event_id and
 * sorted by time.
 */

import { Command } from 'commander';
import { FileLogStore, VALIDATION_LOG_FILE, readLog } from '@modgate/runtime-host';
import { ExitCode, consoleIO, resolveHomeFor, type CommandIO } from './io.js';
import { renderLogEvents } from '../output/log.js';

export interface LogOptions {
  readonly limit: string;
  readonly json?: boolean | undefined;
  readonly home?: string | undefined;
}

export const DEFAULT_LOG_LIMIT = '20';

/**
 * Print the last `options.limit` logged validation runs.
 *
 * @returns The process exit code
 */
export function runLog(options: LogOptions, io: CommandIO = consoleIO): ExitCode {
  const limit = /^\d+$/.test(options.limit) ? Number(options.limit) : 0;
  if (limit < 1) {
    io.err(`--limit must be a positive integer, got "${options.limit}".`);
    return ExitCode.Usage;
  }

  const home = resolveHomeFor(options.home, io);
  if (home === null) return ExitCode.Usage;

  const store = new FileLogStore(home);
  const { events, stats } = readLog(store.readLogRaw(VALIDATION_LOG_FILE));
  const recent = events.slice(-limit);

  if (options.json === true) {
    io.out(JSON.stringify({ events: recent, stats }, null, 2));
    return ExitCode.Ok;
  }

  for (const line of renderLogEvents(recent, stats)) io.out(line);
  return ExitCode.Ok;
}

export const logCommand = new Command('log')
  .description('Show recent validation runs')
  .option('--limit <n>', 'Maximum number of entries to show', DEFAULT_LOG_LIMIT)
  .option('--json', 'Output as JSON')
  .option('--home <dir>', 'modgate home directory (overrides MODGATE_HOME)')
  .action((options: { limit: string; json?: boolean; home?: string }) => {
    process.exitCode = runLog(options);
  });
