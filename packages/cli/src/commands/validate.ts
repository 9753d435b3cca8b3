/**
 * modgate validate — Validate a bundle's module dependency graph
 *
 * Exit codes:
 *   0  the dependency graph is valid
 *   1  the dependency graph failed validation
 *   2  the descriptor could not be read or loaded, or MODGATE_HOME could not
 *      be resolved
 *
 * Unless --no-log is given, every run that reaches the validator is appended
 * to <MODGATE_HOME>/logs/validations.jsonl.
 */

import { Command } from 'commander';
import { ModuleDependencyValidator, ValidationLogger } from '@modgate/kernel';
import { FileLogSink, FileLogStore } from '@modgate/runtime-host';
import { loadBundleFile } from './bundle.js';
import { ExitCode, consoleIO, resolveHomeFor, type CommandIO } from './io.js';
import { renderValidationJson, renderValidationReport } from '../output/validation.js';

export interface ValidateOptions {
  readonly json?: boolean | undefined;
  /** False when --no-log is given. */
  readonly log: boolean;
  readonly home?: string | undefined;
}

/**
 * Validate the descriptor at `bundlePath` and report the outcome.
 *
 * @returns The process exit code
 */
export function runValidate(
  bundlePath: string,
  options: ValidateOptions,
  io: CommandIO = consoleIO,
): ExitCode {
  const loaded = loadBundleFile(bundlePath, io);
  if (loaded === null) return ExitCode.Usage;

  let logger: ValidationLogger | undefined;
  if (options.log) {
    const home = resolveHomeFor(options.home, io);
    if (home === null) return ExitCode.Usage;
    logger = new ValidationLogger(new FileLogSink(new FileLogStore(home)));
  }
  const validator = new ModuleDependencyValidator({ logger });

  const modules = loaded.registry.list();
  const result = validator.validate(modules, { bundle: loaded.bundle ?? undefined });

  if (options.json === true) {
    io.out(renderValidationJson(loaded.bundle, modules.length, result));
  } else {
    const report = renderValidationReport(loaded.label, modules.length, result);
    for (const line of report) {
      if (result.ok) io.out(line);
      else io.err(line);
    }
  }

  return result.ok ? ExitCode.Ok : ExitCode.Invalid;
}

export const validateCommand = new Command('validate')
  .description('Validate the module dependency graph of a bundle descriptor')
  .argument('<bundle-file>', 'Path to the bundle descriptor (JSON)')
  .option('--json', 'Output as JSON')
  .option('--no-log', 'Do not append this run to the validation log')
  .option('--home <dir>', 'modgate home directory (overrides MODGATE_HOME)')
  .action((bundleFile: string, options: { json?: boolean; log: boolean; home?: string }) => {
    process.exitCode = runValidate(bundleFile, options);
  });
