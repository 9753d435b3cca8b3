/**
 * modgate Runtime Host — MODGATE_HOME Resolution
 *
 * Resolves the modgate home directory using the following precedence:
 *
 *   1. Explicit `home` option (e.g. from the --home CLI flag)
 *   2. MODGATE_HOME environment variable
 *   3. OS application config file (`modgateHome` entry)
 *   4. Default: ~/.modgate
 *
 * Layout under the resolved home:
 *
 *   <MODGATE_HOME>/
 *     logs/
 *       validations.jsonl
 */

import { existsSync, mkdirSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import { homedir, platform } from 'node:os';
import { isNodeError } from './state/log-store.js';

// ---------------------------------------------------------------------------
// OS Config File
// ---------------------------------------------------------------------------

/**
 * Returns the platform-specific path to the modgate application config file.
 *
 * Locations:
 *   macOS:   ~/Library/Preferences/modgate/config.json
 *   Windows: %APPDATA%\modgate\config.json (fallback: ~/AppData/Roaming/modgate/config.json)
 *   Linux:   $XDG_CONFIG_HOME/modgate/config.json (fallback: ~/.config/modgate/config.json)
 */
export function getOsConfigPath(): string {
  const home = homedir();
  switch (platform()) {
    case 'darwin':
      return join(home, 'Library', 'Preferences', 'modgate', 'config.json');
    case 'win32': {
      const appData = process.env['APPDATA'] ?? join(home, 'AppData', 'Roaming');
      return join(appData, 'modgate', 'config.json');
    }
    default: {
      const xdg = process.env['XDG_CONFIG_HOME'];
      const configRoot = xdg !== undefined && xdg !== '' ? xdg : join(home, '.config');
      return join(configRoot, 'modgate', 'config.json');
    }
  }
}

/**
 * Read the `modgateHome` entry of the OS application config file.
 *
 * Returns null if the file does not exist or has no non-empty `modgateHome`
 * string. A file that exists but is not valid JSON is an operator error and
 * is reported rather than ignored.
 *
 * @param configPath - Config file to read (defaults to getOsConfigPath())
 * @throws {Error} If the config file exists but cannot be parsed
 */
export function readHomeFromConfig(configPath: string = getOsConfigPath()): string | null {
  let raw: string;
  try {
    raw = readFileSync(configPath, 'utf-8');
  } catch (err: unknown) {
    if (isNodeError(err, 'ENOENT')) return null;
    throw err;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err: unknown) {
    const msg = err instanceof Error ? err.message : String(err);
    throw new Error(`${configPath}: invalid JSON — ${msg}`);
  }

  if (typeof parsed !== 'object' || parsed === null || !('modgateHome' in parsed)) {
    return null;
  }
  const value: unknown = parsed.modgateHome;
  return typeof value === 'string' && value !== '' ? value : null;
}

// ---------------------------------------------------------------------------
// Primary Resolution Function
// ---------------------------------------------------------------------------

export interface ResolveHomeOptions {
  /** Explicit override — highest precedence. Typically the --home CLI flag. */
  readonly home?: string | undefined;
  /** Config file consulted at step 3. Defaults to getOsConfigPath(). */
  readonly configPath?: string | undefined;
}

/**
 * Resolve the modgate home directory, creating it if it does not exist.
 *
 * @returns Path of the resolved home directory
 */
export function resolveModgateHome(opts?: ResolveHomeOptions): string {
  let modgateHome: string;

  const envHome = process.env['MODGATE_HOME'];
  if (typeof opts?.home === 'string' && opts.home !== '') {
    modgateHome = opts.home;
  } else if (typeof envHome === 'string' && envHome !== '') {
    modgateHome = envHome;
  } else {
    modgateHome = readHomeFromConfig(opts?.configPath) ?? join(homedir(), '.modgate');
  }

  if (!existsSync(modgateHome)) {
    mkdirSync(modgateHome, { recursive: true });
  }

  return modgateHome;
}
