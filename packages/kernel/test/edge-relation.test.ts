/**
 * modgate Kernel — Edge Relation and Cycle Detector Tests
 *
 *   ER-U1: every module is a key; every module's edges end with the root
 *   ER-U2: declared edge order is preserved
 *   ER-U3: edge lists are frozen
 *   ER-U4: describeEdgeRelation lists rows in key order
 *   CY-U1: checkNoCycles accepts the root self-edge
 *   CY-U2: deep chains are traversed without exhausting the call stack
 *   CY-U3: densely shared dependencies are explored once per traversal
 */

import { describe, it, expect } from 'vitest';
import { buildEdgeRelation, describeEdgeRelation } from '../src/graph/edge-relation.js';
import { checkNoCycles } from '../src/graph/cycles.js';
import { ModuleValidationError, FailureKind } from '../src/types/failure.js';
import type { BundleModule } from '../src/types/module.js';
import type { EdgeRelation } from '../src/types/relation.js';

// ---------------------------------------------------------------------------
// Fixtures
// ---------------------------------------------------------------------------

function mod(name: string, dependencies: ReadonlyArray<string> = [], isRoot = false): BundleModule {
  return { module_name: name, is_root: isRoot, on_demand: false, dependencies };
}

/** Relation of a chain m0 -> m1 -> ... -> m(n-1), each also depending on base. */
function chain(length: number, closeLoop: boolean): EdgeRelation {
  const relation = new Map<string, ReadonlyArray<string>>([['base', ['base']]]);
  for (let i = 0; i < length; i++) {
    const next = i + 1 < length ? `m${i + 1}` : closeLoop ? 'm0' : null;
    relation.set(`m${i}`, next === null ? ['base'] : [next, 'base']);
  }
  return relation;
}

// ---------------------------------------------------------------------------
// buildEdgeRelation
// ---------------------------------------------------------------------------

describe('buildEdgeRelation', () => {
  it('ER-U1: every module is a key and every edge list ends with the root', () => {
    const relation = buildEdgeRelation(
      [mod('base', [], true), mod('a', ['b']), mod('b')],
      'base',
    );

    expect([...relation.keys()]).toEqual(['base', 'a', 'b']);
    for (const edges of relation.values()) {
      expect(edges[edges.length - 1]).toBe('base');
    }
  });

  it('ER-U2: preserves declared dependency order, repeats included', () => {
    const relation = buildEdgeRelation(
      [mod('base', [], true), mod('a', ['c', 'b', 'c'])],
      'base',
    );

    expect(relation.get('a')).toEqual(['c', 'b', 'c', 'base']);
  });

  it('ER-U3: edge lists are frozen', () => {
    const relation = buildEdgeRelation([mod('base', [], true), mod('a')], 'base');
    expect(Object.isFrozen(relation.get('a'))).toBe(true);
  });

  it('ER-U4: describeEdgeRelation lists rows in key order', () => {
    const relation = buildEdgeRelation(
      [mod('base', [], true), mod('search', ['catalog']), mod('catalog')],
      'base',
    );

    expect(describeEdgeRelation(relation)).toEqual([
      { module: 'base', dependencies: ['base'] },
      { module: 'search', dependencies: ['catalog', 'base'] },
      { module: 'catalog', dependencies: ['base'] },
    ]);
  });
});

// ---------------------------------------------------------------------------
// checkNoCycles
// ---------------------------------------------------------------------------

describe('checkNoCycles', () => {
  it('CY-U1: the root self-edge is not a cycle', () => {
    expect(() => checkNoCycles(new Map([['base', ['base']]]))).not.toThrow();
  });

  it('CY-U2: a chain of 20000 modules is traversed iteratively', () => {
    expect(() => checkNoCycles(chain(20_000, false))).not.toThrow();
  });

  it('CY-U2b: a loop closing a chain of 20000 modules is reported with the full path', () => {
    let caught: unknown;
    try {
      checkNoCycles(chain(20_000, true));
    } catch (err: unknown) {
      caught = err;
    }

    expect(caught).toBeInstanceOf(ModuleValidationError);
    const error = caught as ModuleValidationError;
    expect(error.kind).toBe(FailureKind.CyclicDependency);
    expect(error.cycle).toHaveLength(20_000);
    expect(error.cycle?.[0]).toBe('m0');
    expect(error.cycle?.[19_999]).toBe('m19999');
  });

  it('CY-U3: layers that all depend on the whole next layer are explored once', () => {
    // 40 layers of 3 modules: the number of distinct paths is 3^40.
    const relation = new Map<string, ReadonlyArray<string>>([['base', ['base']]]);
    const layers = 40;
    for (let layer = 0; layer < layers; layer++) {
      const next =
        layer + 1 < layers ? [0, 1, 2].map((i) => `l${layer + 1}-${i}`) : [];
      for (let i = 0; i < 3; i++) {
        relation.set(`l${layer}-${i}`, [...next, 'base']);
      }
    }

    expect(() => checkNoCycles(relation)).not.toThrow();
  });
});
