/**
 * modgate graph — Print a bundle's edge relation
 *
 * Lists every module with its edges in declared order, including the
 * implicit edge to the root module, and the modules that depend on it.
 * Only the root check and the relation builder run; use `validate` for the
 * full set of checks.
 */

import { Command } from 'commander';
import {
  ModuleValidationError,
  buildEdgeRelation,
  checkHasRootModule,
  describeEdgeRelation,
} from '@modgate/kernel';
import { loadBundleFile } from './bundle.js';
import { ExitCode, consoleIO, type CommandIO } from './io.js';
import { renderGraph, renderGraphJson, type GraphRow } from '../output/graph.js';
import { t } from '../theme.js';

/**
 * Print the edge relation of the descriptor at `bundlePath`.
 *
 * @returns The process exit code
 */
export function runGraph(
  bundlePath: string,
  options: { readonly json?: boolean | undefined },
  io: CommandIO = consoleIO,
): ExitCode {
  const loaded = loadBundleFile(bundlePath, io);
  if (loaded === null) return ExitCode.Usage;

  const { registry } = loaded;
  const modules = registry.list();

  let rootName: string;
  let rows: GraphRow[];
  try {
    rootName = checkHasRootModule(modules).module_name;
    rows = describeEdgeRelation(buildEdgeRelation(modules, rootName)).map((row) => ({
      ...row,
      on_demand: registry.get(row.module)?.on_demand ?? false,
      dependents: registry.dependentsOf(row.module),
    }));
  } catch (err: unknown) {
    if (!(err instanceof ModuleValidationError)) throw err;
    io.err(`${t.red('✗')} ${err.message}`);
    return ExitCode.Invalid;
  }

  if (options.json === true) {
    io.out(renderGraphJson(loaded.bundle, rootName, rows));
  } else {
    for (const line of renderGraph(loaded.label, rootName, rows)) io.out(line);
  }
  return ExitCode.Ok;
}

export const graphCommand = new Command('graph')
  .description('Print the edge relation of a bundle descriptor, implicit root edges included')
  .argument('<bundle-file>', 'Path to the bundle descriptor (JSON)')
  .option('--json', 'Output as JSON')
  .action((bundleFile: string, options: { json?: boolean }) => {
    process.exitCode = runGraph(bundleFile, options);
  });
