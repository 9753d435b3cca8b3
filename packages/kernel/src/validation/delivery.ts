/**
 * modgate Kernel — Delivery Ordering Check
 *
 * An install-time module must be fully usable right after the initial
 * install, so it may not depend on a module that is only fetched on demand.
 */

import type { BundleModule } from '../types/module.js';
import type { EdgeRelation } from '../types/relation.js';
import { FailureKind, ModuleValidationError } from '../types/failure.js';

/**
 * Checks that no install-time module depends on an on-demand module.
 *
 * Runs over every edge, the implicit root edges included. Requires that
 * checkReferencedModulesExist() has already passed.
 *
 * @throws {ModuleValidationError} InvalidDeliveryOrdering
 */
export function checkNoInstallTimeToOnDemandDependencies(
  modules: ReadonlyArray<BundleModule>,
  relation: EdgeRelation,
): void {
  const modulesByName = new Map(modules.map((m) => [m.module_name, m] as const));

  for (const [moduleName, dependencies] of relation) {
    const module = modulesByName.get(moduleName);
    if (module === undefined || module.on_demand) continue;

    for (const dependency of dependencies) {
      if (modulesByName.get(dependency)?.on_demand === true) {
        throw new ModuleValidationError(
          FailureKind.InvalidDeliveryOrdering,
          `Install-time module '${moduleName}' declares dependency on on-demand module '${dependency}'.`,
          [moduleName, dependency],
        );
      }
    }
  }
}
