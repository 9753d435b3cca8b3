import type { EdgeRelationRow } from '@modgate/kernel';
import { t } from '../theme.js';

/** A described edge relation row, annotated from the module registry. */
export interface GraphRow extends EdgeRelationRow {
  readonly on_demand: boolean;
  readonly dependents: ReadonlyArray<string>;
}

/**
 * renderGraph — one block per module, in descriptor order:
 *
 *   checkout                install-time
 *     → payments, base
 *     ← (none)
 */
export function renderGraph(
  label: string,
  rootName: string,
  rows: ReadonlyArray<GraphRow>,
): string[] {
  const lines = [`${t.white(label)}  ${t.muted('root:')} ${t.blue(rootName)}`, ''];

  for (const row of rows) {
    // Fixed-width module name column: 24 chars
    const namePad = ' '.repeat(Math.max(1, 24 - row.module.length));
    const name = row.module === rootName ? t.blue(row.module) : t.white(row.module);
    const delivery = row.on_demand ? t.amber('on-demand') : t.muted('install-time');
    lines.push('  ' + name + namePad + delivery);

    const deps = row.dependencies
      .map((d) => (d === rootName ? t.dim(d) : t.text(d)))
      .join(t.dim(', '));
    lines.push('    ' + t.dim('→ ') + deps);

    const dependents = row.dependents.length === 0
      ? t.dim('(none)')
      : row.dependents.map((d) => t.text(d)).join(t.dim(', '));
    lines.push('    ' + t.dim('← ') + dependents);
  }

  return lines;
}

/** renderGraphJson — machine-readable edge relation, uncoloured. */
export function renderGraphJson(
  bundle: string | null,
  rootName: string,
  rows: ReadonlyArray<GraphRow>,
): string {
  return JSON.stringify({ bundle, root: rootName, modules: rows }, null, 2);
}
