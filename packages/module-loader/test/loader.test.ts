/**
 * modgate Module Loader — Loader and Descriptor Tests
 *
 *   ML-U1: a minimal descriptor loads; "base" is root by convention
 *   ML-U2: delivery, split and uses map onto the module fields
 *   ML-U3: an explicit "root" flag overrides the naming convention
 *   ML-U4: structural problems are all reported, with context
 *   ML-U5: repeated module names are rejected before the kernel sees them
 *   ML-U6: root constraints (single root, install-time root)
 *   ML-U7: a loaded bundle feeds the dependency validator
 *   ML-U8: registry lookups
 */

import { describe, it, expect } from 'vitest';
import { FailureKind, validateModuleDependencies } from '@modgate/kernel';
import { ModuleLoader, formatValidationError } from '../src/loader.js';
import type { LoadResult } from '../src/loader.js';
import type { ModuleRegistry } from '../src/registry.js';

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

const loader = new ModuleLoader();

function loadOk(descriptor: unknown): { bundle: string | null; registry: ModuleRegistry } {
  const result = loader.load(descriptor);
  if (!result.ok) {
    throw new Error(`expected descriptor to load: ${result.details}`);
  }
  return result;
}

function loadErrors(descriptor: unknown): ReadonlyArray<string> {
  const result: LoadResult = loader.load(descriptor);
  if (result.ok) {
    throw new Error('expected descriptor to be rejected');
  }
  return result.errors.map(formatValidationError);
}

// ---------------------------------------------------------------------------
// Loading
// ---------------------------------------------------------------------------

describe('ModuleLoader.load', () => {
  it('ML-U1: a minimal descriptor loads and "base" is root by convention', () => {
    const { bundle, registry } = loadOk({ modules: [{ name: 'base' }, { name: 'feature' }] });

    expect(bundle).toBeNull();
    expect(registry.list()).toEqual([
      { module_name: 'base', is_root: true, on_demand: false, dependencies: [] },
      { module_name: 'feature', is_root: false, on_demand: false, dependencies: [] },
    ]);
  });

  it('ML-U2: delivery, split and uses map onto the module fields', () => {
    const { bundle, registry } = loadOk({
      bundle: 'shop-app',
      modules: [
        { name: 'base' },
        { name: 'camera', delivery: 'on-demand', split: 'camera', uses: ['gallery'] },
        { name: 'gallery', delivery: 'install-time' },
      ],
    });

    expect(bundle).toBe('shop-app');
    expect(registry.get('camera')).toEqual({
      module_name: 'camera',
      is_root: false,
      on_demand: true,
      dependencies: ['gallery'],
      declared_id: 'camera',
    });
    expect(registry.get('gallery')?.on_demand).toBe(false);
  });

  it('ML-U3: an explicit root flag overrides the naming convention', () => {
    const { registry } = loadOk({
      modules: [{ name: 'app', root: true }, { name: 'base', root: false }],
    });

    expect(registry.getRoot()?.module_name).toBe('app');
    expect(registry.get('base')?.is_root).toBe(false);
  });

  it('ML-U1b: a descriptor without any root still loads (the kernel reports it)', () => {
    const { registry } = loadOk({ modules: [{ name: 'feature' }] });
    expect(registry.getRoot()).toBeUndefined();
  });
});

// ---------------------------------------------------------------------------
// Descriptor problems
// ---------------------------------------------------------------------------

describe('descriptor validation', () => {
  it('ML-U4: rejects a non-object descriptor', () => {
    expect(loadErrors([])).toEqual(['Bundle descriptor must be a JSON object.']);
    expect(loadErrors(null)).toEqual(['Bundle descriptor must be a JSON object.']);
  });

  it('ML-U4b: rejects a missing or empty modules array', () => {
    expect(loadErrors({ bundle: 'x' })).toEqual(['"modules" must be a non-empty array.']);
    expect(loadErrors({ modules: [] })).toEqual(['"modules" must be a non-empty array.']);
  });

  it('ML-U4c: reports every entry problem with its context', () => {
    const errors = loadErrors({
      bundle: '',
      extra: 1,
      modules: [
        { name: 'base' },
        { name: '', delivery: 'later' },
        'camera',
        { name: 'maps', uses: ['base', 3], color: 'red' },
      ],
    });

    expect(errors).toEqual([
      'Unknown key "extra" in bundle descriptor.',
      '"bundle" must be a non-empty string.',
      'modules[1]: "name" must be a non-empty string.',
      'modules[1]: "delivery" must be one of: install-time, on-demand.',
      'modules[2]: Module entry must be an object.',
      'modules[3]: Unknown key "color" in module entry.',
      'modules[3]: "uses[1]" must be a non-empty string.',
    ]);
  });

  it('ML-U4d: the failure summary joins every problem', () => {
    const result = loader.load({ modules: [{ name: 'base', root: 'yes', split: 4 }] });

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.reason).toBe('Bundle descriptor validation failed');
    expect(result.details).toBe(
      'modules[0]: "root" must be a boolean.; modules[0]: "split" must be a string.',
    );
  });

  it('ML-U5: rejects a module name declared twice', () => {
    expect(loadErrors({ modules: [{ name: 'base' }, { name: 'maps' }, { name: 'maps' }] })).toEqual([
      'Module name "maps" is declared more than once.',
    ]);
  });

  it('ML-U6: rejects more than one root', () => {
    expect(loadErrors({ modules: [{ name: 'base' }, { name: 'app', root: true }] })).toEqual([
      'Bundle declares more than one root module: base, app.',
    ]);
  });

  it('ML-U6b: rejects an on-demand root', () => {
    expect(loadErrors({ modules: [{ name: 'base', delivery: 'on-demand' }] })).toEqual([
      'Root module "base" cannot be delivered on demand.',
    ]);
  });
});

// ---------------------------------------------------------------------------
// Loader → kernel
// ---------------------------------------------------------------------------

describe('loaded bundles', () => {
  it('ML-U7: a loaded bundle is validated by the kernel', () => {
    const { registry } = loadOk({
      modules: [{ name: 'base' }, { name: 'a', uses: ['b'] }, { name: 'b', delivery: 'on-demand' }],
    });

    const result = validateModuleDependencies(registry.list());

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.failure.kind).toBe(FailureKind.InvalidDeliveryOrdering);
    expect(result.failure.modules).toEqual(['a', 'b']);
  });

  it('ML-U7b: a declared split id reaches the identity check', () => {
    const { registry } = loadOk({ modules: [{ name: 'base', split: 'base' }] });

    const result = validateModuleDependencies(registry.list());

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.failure.kind).toBe(FailureKind.IdentifierMismatch);
  });
});

// ---------------------------------------------------------------------------
// Registry
// ---------------------------------------------------------------------------

describe('ModuleRegistry', () => {
  const { registry } = loadOk({
    modules: [
      { name: 'base' },
      { name: 'checkout', uses: ['payments', 'catalog'] },
      { name: 'catalog' },
      { name: 'payments', uses: ['catalog'] },
      { name: 'ar-viewer', delivery: 'on-demand', uses: ['catalog'] },
    ],
  });

  it('ML-U8: dependentsOf lists explicit dependents in registration order', () => {
    expect(registry.dependentsOf('catalog')).toEqual(['checkout', 'payments', 'ar-viewer']);
    expect(registry.dependentsOf('base')).toEqual([]);
  });

  it('ML-U8b: listOnDemand returns on-demand modules only', () => {
    expect(registry.listOnDemand().map((m) => m.module_name)).toEqual(['ar-viewer']);
  });

  it('ML-U8c: register rejects a repeated name', () => {
    const base = registry.get('base');
    expect(base).toBeDefined();
    if (base === undefined) return;
    expect(() => registry.register(base)).toThrow('Module already registered: base.');
  });
});
