/**
 * modgate Kernel — Module Set Checks
 *
 * Checks that run over the module set before the edge relation is built:
 * presence of the root module and consistency of declared self-identifiers.
 */

import { BASE_MODULE_NAME, type BundleModule } from '../types/module.js';
import { FailureKind, ModuleValidationError } from '../types/failure.js';

/**
 * Check that the set contains a root module and return it.
 *
 * Only absence is checked. A set with several roots cannot be produced by the
 * module loader; the first root in input order is returned.
 *
 * @throws {ModuleValidationError} MissingRootModule
 */
export function checkHasRootModule(modules: ReadonlyArray<BundleModule>): BundleModule {
  const root = modules.find((m) => m.is_root);
  if (root === undefined) {
    throw new ModuleValidationError(
      FailureKind.MissingRootModule,
      `Mandatory '${BASE_MODULE_NAME}' module is missing.`,
      [BASE_MODULE_NAME],
    );
  }
  return root;
}

/**
 * Check declared self-identifiers against module names.
 *
 * The root module's identifier is conventionally empty, so it must not
 * declare one. Any other module may omit it or declare its own name.
 *
 * @throws {ModuleValidationError} IdentifierMismatch
 */
export function checkDeclaredIds(modules: ReadonlyArray<BundleModule>): void {
  for (const module of modules) {
    const declaredId = module.declared_id;
    if (declaredId === undefined) continue;

    if (module.is_root) {
      throw new ModuleValidationError(
        FailureKind.IdentifierMismatch,
        `The ${module.module_name} module should not declare split ID in the manifest, ` +
          `but it is set to '${declaredId}'.`,
        [module.module_name, declaredId],
      );
    }

    if (declaredId !== module.module_name) {
      throw new ModuleValidationError(
        FailureKind.IdentifierMismatch,
        `Module '${module.module_name}' declares in its manifest that the split ID is ` +
          `'${declaredId}'. It needs to be either absent or equal to the module name.`,
        [module.module_name, declaredId],
      );
    }
  }
}
