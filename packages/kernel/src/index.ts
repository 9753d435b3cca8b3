/**
 * @modgate/kernel
 *
 * modgate validation kernel — module model, failure taxonomy, edge relation
 * builder, structural checks, cycle detector, delivery ordering check and
 * the validator entry points.
 *
 * This package is side-effect free. It contains no imports of node:fs,
 * node:child_process, node:net, fetch, or any other I/O API.
 *
 * Log persistence lives in @modgate/runtime-host.
 */

// Types
export type { BundleModule, ModuleSet } from './types/module.js';
export { BASE_MODULE_NAME } from './types/module.js';

export type { ValidationFailure } from './types/failure.js';
export {
  FailureKind,
  ModuleSetContractError,
  ModuleValidationError,
} from './types/failure.js';

export type { EdgeRelation, EdgeRelationRow } from './types/relation.js';

export type {
  DependencyValidationResult,
  ValidationError,
  ValidationResult,
} from './types/result.js';

export type { ValidationLog } from './types/log.js';
export { ValidationOutcome } from './types/log.js';

// Log sink interface (implementation lives in runtime-host)
export type { LogSink } from './logging/log-sink.js';
export { ValidationLogger } from './logging/validation-log.js';

// Graph
export { buildEdgeRelation, describeEdgeRelation } from './graph/edge-relation.js';
export { checkNoCycles } from './graph/cycles.js';

// Checks
export { checkDeclaredIds, checkHasRootModule } from './validation/module-checks.js';
export {
  checkNoReflexiveDependencies,
  checkReferencedModulesExist,
  checkUniqueDependencies,
} from './validation/structural.js';
export { checkNoInstallTimeToOnDemandDependencies } from './validation/delivery.js';

// Validator
export type {
  ModuleDependencyValidatorOptions,
  ValidationContext,
} from './validation/validator.js';
export {
  ModuleDependencyValidator,
  validateModuleDependencies,
} from './validation/validator.js';
