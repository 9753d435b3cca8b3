/**
 * modgate Kernel — Validation Failure Types
 *
 * Defines the failure taxonomy of module dependency validation and the
 * error classes the checks raise.
 *
 * Every failure is terminal: the first violation found ends the run and no
 * further checks execute. Failures are never aggregated.
 */

// ---------------------------------------------------------------------------
// Failure Kind
// ---------------------------------------------------------------------------

/**
 * The kinds of failure a module dependency validation can produce.
 */
export enum FailureKind {
  /** No module is flagged as root. */
  MissingRootModule = 'MissingRootModule',
  /** A declared self-identifier breaks the root/non-root naming rule. */
  IdentifierMismatch = 'IdentifierMismatch',
  /**
   * The same module name was supplied twice.
   * A caller contract violation; raised as ModuleSetContractError.
   */
  DuplicateModuleEntry = 'DuplicateModuleEntry',
  /** A module explicitly lists the implicit root dependency. */
  ExplicitRootDependency = 'ExplicitRootDependency',
  /** A non-root module depends on itself. */
  SelfDependency = 'SelfDependency',
  /** A module lists the same dependency more than once. */
  DuplicateDependencyDeclaration = 'DuplicateDependencyDeclaration',
  /** A dependency names a module that is not in the set. */
  UnknownModuleReference = 'UnknownModuleReference',
  /** A dependency path returns to a module already on the current path. */
  CyclicDependency = 'CyclicDependency',
  /** An install-time module depends on an on-demand module. */
  InvalidDeliveryOrdering = 'InvalidDeliveryOrdering',
}

// ---------------------------------------------------------------------------
// Validation Failure
// ---------------------------------------------------------------------------

/**
 * A diagnosed validation failure, as returned to callers.
 */
export interface ValidationFailure {
  readonly kind: FailureKind;
  /** Human-readable message with the offending module names interpolated. */
  readonly message: string;
  /** The offending module names, in the order the message cites them. */
  readonly modules: ReadonlyArray<string>;
  /** For CyclicDependency: the traversal path on which the cycle was found. */
  readonly cycle?: ReadonlyArray<string> | undefined;
  /**
   * For CyclicDependency: the module the path re-entered. The cycle itself
   * runs from this module to the end of `cycle`.
   */
  readonly closing?: string | undefined;
}

// ---------------------------------------------------------------------------
// Error Types
// ---------------------------------------------------------------------------

/**
 * Raised by the individual checks on the first violation they find.
 *
 * The validator entry point catches this error and converts it to a
 * ValidationFailure value via toFailure().
 */
export class ModuleValidationError extends Error {
  readonly kind: FailureKind;
  readonly modules: ReadonlyArray<string>;
  readonly cycle: ReadonlyArray<string> | undefined;
  readonly closing: string | undefined;

  constructor(
    kind: FailureKind,
    message: string,
    modules: ReadonlyArray<string>,
    cycle?: ReadonlyArray<string>,
    closing?: string,
  ) {
    super(message);
    this.name = 'ModuleValidationError';
    this.kind = kind;
    this.modules = Object.freeze([...modules]);
    this.cycle = cycle === undefined ? undefined : Object.freeze([...cycle]);
    this.closing = closing;
  }

  toFailure(): ValidationFailure {
    const failure: ValidationFailure = {
      kind: this.kind,
      message: this.message,
      modules: this.modules,
    };
    if (this.cycle === undefined) return failure;
    return this.closing === undefined
      ? { ...failure, cycle: this.cycle }
      : { ...failure, cycle: this.cycle, closing: this.closing };
  }
}

/**
 * Raised when the module set itself breaks the caller contract
 * (a module name supplied more than once).
 *
 * This is a programming error upstream, not a property of the bundle.
 * The validator entry point does not convert it; it propagates to the caller.
 */
export class ModuleSetContractError extends ModuleValidationError {
  constructor(moduleName: string) {
    super(
      FailureKind.DuplicateModuleEntry,
      `Module named '${moduleName}' was passed in multiple times.`,
      [moduleName],
    );
    this.name = 'ModuleSetContractError';
  }
}
