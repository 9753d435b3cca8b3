import type { DependencyValidationResult } from '@modgate/kernel';
import { t } from '../theme.js';

/**
 * Modules of the cycle proper, closed back at its first module.
 * The traversal path may begin with modules that only lead into the cycle.
 */
function cycleLoop(path: ReadonlyArray<string>, closing: string | undefined): string[] {
  const start = closing === undefined ? -1 : path.indexOf(closing);
  const loop = start < 0 ? [...path] : path.slice(start);
  const first = loop[0];
  return first === undefined ? [] : [...loop, first];
}

/**
 * renderValidationReport — human-readable outcome of one `validate` run.
 *
 * Success is a single line. A failure prints the message verbatim, then the
 * failure kind and the modules it cites; a cycle is drawn as a loop back to
 * the module the traversal re-entered.
 */
export function renderValidationReport(
  label: string,
  moduleCount: number,
  result: DependencyValidationResult,
): string[] {
  const count = moduleCount === 1 ? '1 module' : `${moduleCount} modules`;

  if (result.ok) {
    return [`${t.green('✓')} ${t.white(label)}  ${t.muted(count + ', dependency graph is valid')}`];
  }

  const { kind, message, modules, cycle, closing } = result.failure;
  const lines = [
    `${t.red('✗')} ${message}`,
    `    ${t.muted('kind')}     ${t.amber(kind)}`,
  ];
  const loop = cycle === undefined ? [] : cycleLoop(cycle, closing);
  if (loop.length > 0) {
    lines.push(`    ${t.muted('cycle')}    ${loop.map((m) => t.text(m)).join(t.dim(' → '))}`);
  } else if (modules.length > 0) {
    lines.push(`    ${t.muted('modules')}  ${modules.map((m) => t.text(m)).join(t.dim(', '))}`);
  }
  lines.push(`    ${t.muted('bundle')}   ${t.text(label)}  ${t.dim(count)}`);
  return lines;
}

/** renderValidationJson — machine-readable outcome, uncoloured. */
export function renderValidationJson(
  bundle: string | null,
  moduleCount: number,
  result: DependencyValidationResult,
): string {
  return JSON.stringify(
    result.ok
      ? { bundle, valid: true, module_count: moduleCount }
      : { bundle, valid: false, module_count: moduleCount, failure: result.failure },
    null,
    2,
  );
}
