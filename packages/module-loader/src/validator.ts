/**
 * modgate Module Loader — Bundle Descriptor Validator
 *
 * Validates an untyped bundle descriptor (parsed JSON) and converts it into
 * an immutable module set.
 *
 * Descriptor validation is structural and aggregated: every problem found is
 * reported, unlike dependency graph validation, which stops at the first
 * failure. The validator also upholds the kernel's module set contract:
 * a descriptor that names a module twice is rejected here.
 *
 * Descriptor format:
 *
 *   {
 *     "bundle": "shop-app",                       (optional label)
 *     "modules": [
 *       { "name": "base" },                       (root by convention)
 *       { "name": "checkout", "uses": ["payments"] },
 *       { "name": "payments", "split": "payments" },
 *       { "name": "camera", "delivery": "on-demand" }
 *     ]
 *   }
 */

import {
  BASE_MODULE_NAME,
  type BundleModule,
  type ValidationError,
  type ValidationResult,
} from '@modgate/kernel';

// ---------------------------------------------------------------------------
// Descriptor vocabulary
// ---------------------------------------------------------------------------

const BUNDLE_KEYS = new Set(['bundle', 'modules']);
const MODULE_KEYS = new Set(['name', 'root', 'delivery', 'split', 'uses']);

/** Delivery values accepted in a module entry. */
export const DELIVERY_MODES = ['install-time', 'on-demand'] as const;
export type DeliveryMode = (typeof DELIVERY_MODES)[number];

/** A bundle descriptor after successful validation. */
export interface LoadedBundle {
  /** The descriptor's `bundle` label, or null if absent. */
  readonly bundle: string | null;
  readonly modules: ReadonlyArray<BundleModule>;
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isDeliveryMode(value: unknown): value is DeliveryMode {
  return DELIVERY_MODES.some((mode) => mode === value);
}

// ---------------------------------------------------------------------------
// Descriptor Validator
// ---------------------------------------------------------------------------

/**
 * Validates bundle descriptors.
 */
export class DescriptorValidator {
  /**
   * Validate an unknown value as a bundle descriptor.
   *
   * Checks performed:
   * - the descriptor is an object with only `bundle` and `modules` keys
   * - `bundle`, if present, is a non-empty string
   * - `modules` is a non-empty array of valid module entries
   * - module names are unique
   * - at most one module is root, and the root is installed at install time
   *
   * @param descriptor - Parsed descriptor content
   * @returns The loaded bundle on success, every problem found on failure
   */
  validateDescriptor(descriptor: unknown): ValidationResult<LoadedBundle> {
    if (!isRecord(descriptor)) {
      return {
        ok: false,
        errors: [{ message: 'Bundle descriptor must be a JSON object.' }],
      };
    }

    const errors: ValidationError[] = [];

    for (const key of Object.keys(descriptor)) {
      if (!BUNDLE_KEYS.has(key)) {
        errors.push({ message: `Unknown key "${key}" in bundle descriptor.` });
      }
    }

    let bundle: string | null = null;
    const rawBundle = descriptor['bundle'];
    if (rawBundle !== undefined) {
      if (typeof rawBundle === 'string' && rawBundle !== '') {
        bundle = rawBundle;
      } else {
        errors.push({ message: '"bundle" must be a non-empty string.' });
      }
    }

    const rawModules = descriptor['modules'];
    if (!Array.isArray(rawModules) || rawModules.length === 0) {
      errors.push({ message: '"modules" must be a non-empty array.' });
      return { ok: false, errors };
    }

    const modules: BundleModule[] = [];
    rawModules.forEach((entry: unknown, index: number) => {
      const module = this.validateModuleEntry(entry, `modules[${index}]`, errors);
      if (module !== null) {
        modules.push(module);
      }
    });

    this.validateModuleSet(modules, errors);

    if (errors.length > 0) {
      return { ok: false, errors };
    }
    return { ok: true, value: { bundle, modules } };
  }

  /**
   * Validate one entry of the `modules` array.
   * Appends problems to `errors`; returns null if the entry is unusable.
   */
  private validateModuleEntry(
    entry: unknown,
    context: string,
    errors: ValidationError[],
  ): BundleModule | null {
    if (!isRecord(entry)) {
      errors.push({ message: 'Module entry must be an object.', context });
      return null;
    }

    const before = errors.length;

    for (const key of Object.keys(entry)) {
      if (!MODULE_KEYS.has(key)) {
        errors.push({ message: `Unknown key "${key}" in module entry.`, context });
      }
    }

    const name = entry['name'];
    if (typeof name !== 'string' || name === '') {
      errors.push({ message: '"name" must be a non-empty string.', context });
    }

    const root = entry['root'];
    if (root !== undefined && typeof root !== 'boolean') {
      errors.push({ message: '"root" must be a boolean.', context });
    }

    const delivery = entry['delivery'];
    if (delivery !== undefined && !isDeliveryMode(delivery)) {
      errors.push({
        message: `"delivery" must be one of: ${DELIVERY_MODES.join(', ')}.`,
        context,
      });
    }

    const split = entry['split'];
    if (split !== undefined && typeof split !== 'string') {
      errors.push({ message: '"split" must be a string.', context });
    }

    const uses = entry['uses'];
    const dependencies: string[] = [];
    if (uses !== undefined) {
      if (!Array.isArray(uses)) {
        errors.push({ message: '"uses" must be an array of module names.', context });
      } else {
        uses.forEach((dep: unknown, i: number) => {
          if (typeof dep === 'string' && dep !== '') {
            dependencies.push(dep);
          } else {
            errors.push({ message: `"uses[${i}]" must be a non-empty string.`, context });
          }
        });
      }
    }

    if (errors.length > before || typeof name !== 'string') {
      return null;
    }

    const module: BundleModule = {
      module_name: name,
      is_root: typeof root === 'boolean' ? root : name === BASE_MODULE_NAME,
      on_demand: delivery === 'on-demand',
      dependencies: Object.freeze(dependencies),
    };
    return Object.freeze(typeof split === 'string' ? { ...module, declared_id: split } : module);
  }

  /**
   * Checks spanning several entries: unique names and a single install-time root.
   */
  private validateModuleSet(modules: ReadonlyArray<BundleModule>, errors: ValidationError[]): void {
    const seen = new Set<string>();
    for (const module of modules) {
      if (seen.has(module.module_name)) {
        errors.push({ message: `Module name "${module.module_name}" is declared more than once.` });
      }
      seen.add(module.module_name);
    }

    const roots = modules.filter((m) => m.is_root);
    if (roots.length > 1) {
      errors.push({
        message: `Bundle declares more than one root module: ${roots.map((m) => m.module_name).join(', ')}.`,
      });
    }
    for (const root of roots) {
      if (root.on_demand) {
        errors.push({ message: `Root module "${root.module_name}" cannot be delivered on demand.` });
      }
    }
  }
}
