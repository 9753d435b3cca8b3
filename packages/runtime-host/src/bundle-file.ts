/**
 * modgate Runtime Host — Bundle Descriptor File Reader
 *
 * Reads a bundle descriptor file from disk and parses it as JSON. The
 * parsed value is untyped; the module loader validates its structure.
 */

import { readFileSync } from 'node:fs';
import { isNodeError } from './state/log-store.js';

/**
 * Result of reading a descriptor file.
 * Missing files and invalid JSON are reported as values, not thrown.
 */
export type BundleFileResult =
  | { readonly ok: true; readonly descriptor: unknown }
  | { readonly ok: false; readonly reason: string };

/**
 * Read and parse a bundle descriptor file.
 *
 * @throws {Error} On I/O errors other than a missing file
 */
export function readBundleFile(path: string): BundleFileResult {
  let content: string;
  try {
    content = readFileSync(path, 'utf-8');
  } catch (err: unknown) {
    if (isNodeError(err, 'ENOENT')) {
      return { ok: false, reason: `Bundle descriptor not found: ${path}` };
    }
    throw err;
  }

  try {
    const descriptor: unknown = JSON.parse(content);
    return { ok: true, descriptor };
  } catch (err: unknown) {
    const msg = err instanceof Error ? err.message : String(err);
    return { ok: false, reason: `${path}: invalid JSON — ${msg}` };
  }
}
