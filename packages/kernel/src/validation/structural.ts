/**
 * modgate Kernel — Structural Checks
 *
 * Checks over the frozen edge relation. Each raises its own failure kind on
 * the first violation found. The validator runs them in the order they are
 * declared here.
 */

import type { EdgeRelation } from '../types/relation.js';
import { FailureKind, ModuleValidationError } from '../types/failure.js';

/**
 * Checks that no module other than the root depends on itself.
 * The root's self-edge is the implicit root dependency.
 */
export function checkNoReflexiveDependencies(relation: EdgeRelation, rootName: string): void {
  for (const [moduleName, dependencies] of relation) {
    if (moduleName === rootName) continue;
    if (dependencies.includes(moduleName)) {
      throw new ModuleValidationError(
        FailureKind.SelfDependency,
        `Module '${moduleName}' depends on itself.`,
        [moduleName],
      );
    }
  }
}

/** Checks that no module declares a dependency on another module more than once. */
export function checkUniqueDependencies(relation: EdgeRelation): void {
  for (const [moduleName, dependencies] of relation) {
    const alreadyReferenced = new Set<string>();
    for (const dependency of dependencies) {
      if (alreadyReferenced.has(dependency)) {
        throw new ModuleValidationError(
          FailureKind.DuplicateDependencyDeclaration,
          `Module '${moduleName}' declares dependency on module '${dependency}' multiple times.`,
          [moduleName, dependency],
        );
      }
      alreadyReferenced.add(dependency);
    }
  }
}

/** Checks that every dependency target is a module of the set. */
export function checkReferencedModulesExist(relation: EdgeRelation): void {
  for (const dependencies of relation.values()) {
    for (const referenced of dependencies) {
      if (!relation.has(referenced)) {
        throw new ModuleValidationError(
          FailureKind.UnknownModuleReference,
          `Module '${referenced}' is referenced as a dependency but does not exist.`,
          [referenced],
        );
      }
    }
  }
}
