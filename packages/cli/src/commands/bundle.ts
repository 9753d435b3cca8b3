/**
 * commands/bundle.ts — shared descriptor loading for `validate` and `graph`.
 *
 * Reads the descriptor file and runs it through the module loader. Every
 * problem is reported on stderr; the caller only decides the exit code.
 */

import { ModuleLoader, formatValidationError, type ModuleRegistry } from '@modgate/module-loader';
import { readBundleFile } from '@modgate/runtime-host';
import type { CommandIO } from './io.js';
import { t } from '../theme.js';

export interface LoadedBundleFile {
  /** Descriptor label, or the file path when the descriptor has none. */
  readonly label: string;
  readonly bundle: string | null;
  readonly registry: ModuleRegistry;
}

/**
 * Read and load a bundle descriptor file.
 *
 * @returns The loaded bundle, or null after reporting every problem to io.err
 */
export function loadBundleFile(path: string, io: CommandIO): LoadedBundleFile | null {
  const file = readBundleFile(path);
  if (!file.ok) {
    io.err(`${t.red('✗')} ${file.reason}`);
    return null;
  }

  const loaded = new ModuleLoader().load(file.descriptor);
  if (!loaded.ok) {
    io.err(`${t.red('✗')} ${loaded.reason}: ${path}`);
    for (const error of loaded.errors) {
      io.err('    ' + formatValidationError(error));
    }
    return null;
  }

  return {
    label: loaded.bundle ?? path,
    bundle: loaded.bundle,
    registry: loaded.registry,
  };
}
