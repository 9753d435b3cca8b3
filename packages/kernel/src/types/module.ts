/**
 * modgate Kernel — Module Types
 *
 * Defines the bundle module model the validator operates on.
 *
 * A module is a named unit of an application bundle. Exactly one module is
 * the root ("base") module; every other module implicitly depends on it.
 * Modules are either installed with the bundle (install-time) or fetched
 * after installation (on-demand).
 *
 * Modules are produced by the module loader from a bundle descriptor and are
 * immutable afterwards. The kernel never mutates a module.
 */

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

/**
 * Conventional name of the root module.
 *
 * The loader flags a module as root when its descriptor omits `root` and its
 * name equals this constant. Diagnostics refer to the root by this name when
 * no root module exists to take the name from.
 */
export const BASE_MODULE_NAME = 'base';

// ---------------------------------------------------------------------------
// Bundle Module
// ---------------------------------------------------------------------------

/**
 * A single module of an application bundle, as seen by the validator.
 */
export interface BundleModule {
  /** Module name. Unique within a module set. */
  readonly module_name: string;
  /** True for the root ("base") module. */
  readonly is_root: boolean;
  /**
   * True when the module is installed on demand after the initial install.
   * Install-time modules may not depend on on-demand modules.
   */
  readonly on_demand: boolean;
  /**
   * Self-identifier declared by the module's manifest, if any.
   * Must be absent for the root and equal to `module_name` otherwise.
   */
  readonly declared_id?: string | undefined;
  /** Names of the modules this module declares a dependency on, in manifest order. */
  readonly dependencies: ReadonlyArray<string>;
}

/**
 * The full collection of modules validated together for one bundle.
 */
export type ModuleSet = ReadonlyArray<BundleModule>;
