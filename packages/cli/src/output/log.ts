import type { LogReadStats, ValidationLogEvent } from '@modgate/runtime-host';
import { outcomeColor, outcomeMark, t } from '../theme.js';

/**
 * renderLogEvents — one line per logged validation run, oldest first,
 * followed by a note when malformed lines were skipped.
 */
export function renderLogEvents(
  events: ReadonlyArray<ValidationLogEvent>,
  stats: LogReadStats,
): string[] {
  const lines: string[] = [];

  if (events.length === 0) {
    lines.push('  ' + t.muted('(no validation runs logged)'));
  }

  for (const e of events) {
    const outcome = e.outcome ?? 'Unknown';
    const bundle = e.bundle ?? '(unnamed)';
    const count = e.module_count === null ? '' : t.dim(`  ${e.module_count} modules`);
    let line = (
      '  ' +
      outcomeMark(outcome) + ' ' +
      t.muted(e.timestamp) + '  ' +
      outcomeColor(outcome)(outcome.padEnd(8)) +
      t.white(bundle) +
      count
    );
    if (e.failure_kind !== null) {
      line += '  ' + t.amber(e.failure_kind);
    }
    lines.push(line);
    if (e.message !== null) {
      lines.push('      ' + t.text(e.message));
    }
  }

  const skipped = stats.parseErrors + (stats.partialTrailingLine ? 1 : 0);
  if (skipped > 0) {
    lines.push('');
    lines.push('  ' + t.amber(`${skipped} malformed log line${skipped === 1 ? '' : 's'} skipped`));
  }

  return lines;
}
