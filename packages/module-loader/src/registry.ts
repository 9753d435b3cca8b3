/**
 * modgate Module Loader — Module Registry
 *
 * The ModuleRegistry holds the modules of one loaded bundle, in descriptor
 * order, and answers lookups over them.
 *
 * Registry invariants:
 * - Module names are unique (register() rejects a repeated name)
 * - Registration order is preserved by list(); it is the order the
 *   dependency validator sees
 */

import type { BundleModule, ModuleSet } from '@modgate/kernel';

export class ModuleRegistry {
  private readonly entries: Map<string, BundleModule> = new Map();

  /**
   * Register a module.
   *
   * @throws {Error} If a module with the same name is already registered
   */
  register(module: BundleModule): void {
    if (this.entries.has(module.module_name)) {
      throw new Error(
        `Module already registered: ${module.module_name}. ` +
          `Duplicate module names are not permitted.`,
      );
    }
    this.entries.set(module.module_name, module);
  }

  get(moduleName: string): BundleModule | undefined {
    return this.entries.get(moduleName);
  }

  /** All registered modules, in registration order. */
  list(): ModuleSet {
    return Array.from(this.entries.values());
  }

  /** The root module, if one is registered. */
  getRoot(): BundleModule | undefined {
    return this.list().find((m) => m.is_root);
  }

  listOnDemand(): ModuleSet {
    return this.list().filter((m) => m.on_demand);
  }

  /**
   * Names of the modules that explicitly declare a dependency on `moduleName`,
   * in registration order. Implicit root dependencies are not included.
   */
  dependentsOf(moduleName: string): ReadonlyArray<string> {
    return this.list()
      .filter((m) => m.dependencies.includes(moduleName))
      .map((m) => m.module_name);
  }
}
