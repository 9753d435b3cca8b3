/**
 * modgate Kernel — Module Dependency Validator
 *
 * Validates the module dependency graph of a bundle. The checks run in a
 * fixed order and the first violation ends the run:
 *
 *   1. Root module present            (checkHasRootModule)
 *   2. Declared self-identifiers      (checkDeclaredIds)
 *   3. Edge relation construction     (buildEdgeRelation)
 *   4. No self-dependencies           (checkNoReflexiveDependencies)
 *   5. No repeated dependencies       (checkUniqueDependencies)
 *   6. No dangling references         (checkReferencedModulesExist)
 *   7. No cycles                      (checkNoCycles)
 *   8. No install-time → on-demand    (checkNoInstallTimeToOnDemandDependencies)
 *
 * All working state (edge relation, safe set, processing set) is local to a
 * call. Validating the same module set twice yields identical results.
 */

import type { ModuleSet } from '../types/module.js';
import type { EdgeRelation } from '../types/relation.js';
import type { DependencyValidationResult } from '../types/result.js';
import { ModuleSetContractError, ModuleValidationError } from '../types/failure.js';
import { ValidationOutcome, type ValidationLog } from '../types/log.js';
import { buildEdgeRelation } from '../graph/edge-relation.js';
import { checkNoCycles } from '../graph/cycles.js';
import { checkDeclaredIds, checkHasRootModule } from './module-checks.js';
import {
  checkNoReflexiveDependencies,
  checkReferencedModulesExist,
  checkUniqueDependencies,
} from './structural.js';
import { checkNoInstallTimeToOnDemandDependencies } from './delivery.js';
import { ValidationLogger } from '../logging/validation-log.js';

// ---------------------------------------------------------------------------
// Functional entry point
// ---------------------------------------------------------------------------

/**
 * Run every check and return the certified edge relation.
 *
 * @throws {ModuleValidationError} On the first violation found
 */
function runChecks(modules: ModuleSet): EdgeRelation {
  const root = checkHasRootModule(modules);
  checkDeclaredIds(modules);

  const relation = buildEdgeRelation(modules, root.module_name);

  checkNoReflexiveDependencies(relation, root.module_name);
  checkUniqueDependencies(relation);
  checkReferencedModulesExist(relation);
  checkNoCycles(relation);
  checkNoInstallTimeToOnDemandDependencies(modules, relation);

  return relation;
}

/**
 * Validate the dependency graph of a module set.
 *
 * @param modules - The module set of one bundle
 * @returns `{ ok: true, relation }` when the graph is well-formed,
 *   `{ ok: false, failure }` with the first diagnosed failure otherwise
 *
 * @throws {ModuleSetContractError} If a module name appears twice in the set.
 *   This is a caller contract violation and is not reported as a result.
 */
export function validateModuleDependencies(modules: ModuleSet): DependencyValidationResult {
  try {
    return { ok: true, relation: runChecks(modules) };
  } catch (err: unknown) {
    if (err instanceof ModuleValidationError && !(err instanceof ModuleSetContractError)) {
      return { ok: false, failure: err.toFailure() };
    }
    throw err;
  }
}

// ---------------------------------------------------------------------------
// Validator class
// ---------------------------------------------------------------------------

/** Options for ModuleDependencyValidator. */
export interface ModuleDependencyValidatorOptions {
  /** Receives one entry per validate() call. Defaults to a sink-less logger. */
  readonly logger?: ValidationLogger | undefined;
  /** Clock used for log timestamps. Defaults to the system clock. */
  readonly now?: (() => Date) | undefined;
}

/** Per-call context recorded in the validation log. */
export interface ValidationContext {
  /** Bundle label for the log entry. */
  readonly bundle?: string | undefined;
}

/**
 * Validates module sets and records every run in the validation log.
 */
export class ModuleDependencyValidator {
  private readonly logger: ValidationLogger;
  private readonly now: () => Date;

  constructor(options: ModuleDependencyValidatorOptions = {}) {
    this.logger = options.logger ?? new ValidationLogger();
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Validate a module set and log the outcome.
   *
   * Contract violations propagate without a log entry: they describe the
   * caller, not the bundle.
   */
  validate(modules: ModuleSet, context: ValidationContext = {}): DependencyValidationResult {
    const result = validateModuleDependencies(modules);

    const entry: ValidationLog = {
      bundle: context.bundle ?? null,
      outcome: result.ok ? ValidationOutcome.Valid : ValidationOutcome.Invalid,
      failure_kind: result.ok ? null : result.failure.kind,
      message: result.ok ? null : result.failure.message,
      module_count: modules.length,
      timestamp: this.now().toISOString(),
    };
    this.logger.record(entry);

    return result;
  }

  /**
   * Validate a module set, throwing on failure.
   *
   * For pipelines that halt on the first failure and surface its message.
   *
   * @throws {ModuleValidationError} The diagnosed failure
   */
  validateAllModules(modules: ModuleSet, context: ValidationContext = {}): EdgeRelation {
    const result = this.validate(modules, context);
    if (!result.ok) {
      const { kind, message, modules: cited, cycle, closing } = result.failure;
      throw new ModuleValidationError(kind, message, cited, cycle, closing);
    }
    return result.relation;
  }
}
