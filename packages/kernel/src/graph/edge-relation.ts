/**
 * modgate Kernel — Edge Relation Builder
 *
 * Builds the directed dependency graph of a module set from the modules'
 * declared dependencies.
 *
 * Every module implicitly depends on the root module. The builder appends
 * that edge to every module, the root included, so the root carries a
 * self-edge. Later checks exempt the root's self-edge explicitly.
 */

import type { BundleModule } from '../types/module.js';
import type { EdgeRelation, EdgeRelationRow } from '../types/relation.js';
import {
  FailureKind,
  ModuleSetContractError,
  ModuleValidationError,
} from '../types/failure.js';

/**
 * Build the edge relation of a module set.
 *
 * If module "a" declares a dependency on "b", the relation maps "a" to a list
 * containing "b". Every key also maps to `rootName`, after the declared
 * dependencies.
 *
 * @param modules - The module set, in input order
 * @param rootName - Name of the root module (see checkHasRootModule)
 * @returns Frozen relation keyed in input order
 *
 * @throws {ModuleSetContractError} If a module name appears twice in the set
 * @throws {ModuleValidationError} ExplicitRootDependency if a module lists the root
 */
export function buildEdgeRelation(
  modules: ReadonlyArray<BundleModule>,
  rootName: string,
): EdgeRelation {
  const relation = new Map<string, ReadonlyArray<string>>();

  for (const module of modules) {
    const moduleName = module.module_name;

    if (relation.has(moduleName)) {
      throw new ModuleSetContractError(moduleName);
    }

    const edges = [...module.dependencies];

    // The root dependency is implicit. Declaring it is redundant and rejected.
    if (edges.includes(rootName)) {
      throw new ModuleValidationError(
        FailureKind.ExplicitRootDependency,
        `Module '${moduleName}' declares dependency on the '${rootName}' module, which is implicit.`,
        [moduleName, rootName],
      );
    }

    // Also guarantees every module is a key of the relation.
    edges.push(rootName);
    relation.set(moduleName, Object.freeze(edges));
  }

  return relation;
}

/**
 * List the relation as rows in key order, for diagnostics and display.
 */
export function describeEdgeRelation(relation: EdgeRelation): ReadonlyArray<EdgeRelationRow> {
  return Array.from(relation, ([module, dependencies]) => ({ module, dependencies }));
}
