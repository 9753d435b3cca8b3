/**
 * modgate Module Loader — Module Loader
 *
 * The ModuleLoader turns a parsed bundle descriptor into a module set ready
 * for dependency validation.
 *
 * Loading is a two-step process:
 * 1. Validate the descriptor structure (DescriptorValidator.validateDescriptor)
 * 2. Register every module in a fresh ModuleRegistry
 *
 * The loader does not validate the dependency graph. That is the kernel's
 * job; a loaded bundle may still fail ModuleDependencyValidator.
 */

import type { ValidationError } from '@modgate/kernel';
import { DescriptorValidator } from './validator.js';
import { ModuleRegistry } from './registry.js';

// ---------------------------------------------------------------------------
// Load Result
// ---------------------------------------------------------------------------

/**
 * The result of a load attempt.
 * A discriminated union: either the loaded bundle, or a failure with a
 * summary reason and every descriptor problem found.
 */
export type LoadResult =
  | { readonly ok: true; readonly bundle: string | null; readonly registry: ModuleRegistry }
  | {
      readonly ok: false;
      readonly reason: string;
      readonly details: string;
      readonly errors: ReadonlyArray<ValidationError>;
    };

// ---------------------------------------------------------------------------
// Module Loader
// ---------------------------------------------------------------------------

export class ModuleLoader {
  private readonly validator: DescriptorValidator;

  constructor() {
    this.validator = new DescriptorValidator();
  }

  /**
   * Load a parsed bundle descriptor.
   *
   * @param descriptor - Parsed descriptor content (e.g. from JSON.parse)
   * @returns LoadResult — the registry of loaded modules, or the descriptor problems
   */
  load(descriptor: unknown): LoadResult {
    const validation = this.validator.validateDescriptor(descriptor);
    if (!validation.ok) {
      return {
        ok: false,
        reason: 'Bundle descriptor validation failed',
        details: validation.errors.map(formatValidationError).join('; '),
        errors: validation.errors,
      };
    }

    const registry = new ModuleRegistry();
    for (const module of validation.value.modules) {
      registry.register(module);
    }
    return { ok: true, bundle: validation.value.bundle, registry };
  }
}

/** Render a descriptor problem as `context: message`, or the bare message. */
export function formatValidationError(error: ValidationError): string {
  return error.context === undefined ? error.message : `${error.context}: ${error.message}`;
}
