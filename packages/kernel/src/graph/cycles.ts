/**
 * modgate Kernel — Cycle Detector
 *
 * Verifies that the edge relation, viewed as a directed graph, is acyclic.
 * The root's implicit self-edge is the only permitted loop and is skipped
 * during traversal.
 *
 * Two sets keep the total work linear in the size of the graph:
 *
 * - safe: modules already known not to take part in any cycle. A traversal
 *   never descends into them again.
 * - visited: modules touched by the traversal from one start module. When
 *   that traversal completes without finding a cycle, every visited module
 *   is added to `safe`.
 *
 * Within one traversal, a module whose dependencies have all been explored
 * is not explored again when another path reaches it.
 *
 * The traversal keeps its own frame stack instead of recursing, so a long
 * dependency chain cannot exhaust the call stack.
 */

import type { EdgeRelation } from '../types/relation.js';
import { FailureKind, ModuleValidationError } from '../types/failure.js';

/** One entry of the explicit DFS stack. */
interface TraversalFrame {
  readonly moduleName: string;
  readonly remaining: Iterator<string>;
}

/**
 * Check that the relation contains no dependency cycle.
 *
 * Start modules are taken in relation key order and outgoing edges in
 * relation edge order, so the reported cycle path is reproducible.
 *
 * @throws {ModuleValidationError} CyclicDependency, carrying the current
 *   traversal path (in visiting order) as `cycle` and the re-entered
 *   module as `closing`
 */
export function checkNoCycles(relation: EdgeRelation): void {
  const safe = new Set<string>();

  for (const moduleName of relation.keys()) {
    if (safe.has(moduleName)) continue;

    const visited = new Set<string>();
    traverseFrom(moduleName, relation, visited, safe);

    for (const name of visited) {
      safe.add(name);
    }
  }
}

/**
 * Depth-first traversal from a single start module.
 *
 * `processing` is insertion-ordered and holds exactly the modules of the
 * current path; a module leaves it once all of its dependencies are done.
 */
function traverseFrom(
  start: string,
  relation: EdgeRelation,
  visited: Set<string>,
  safe: ReadonlySet<string>,
): void {
  const processing = new Set<string>();
  const finished = new Set<string>();
  const stack: TraversalFrame[] = [];

  const enter = (moduleName: string): void => {
    if (safe.has(moduleName) || finished.has(moduleName)) return;

    if (processing.has(moduleName)) {
      const path = [...processing];
      throw new ModuleValidationError(
        FailureKind.CyclicDependency,
        `Found cyclic dependency between modules: [${path.join(', ')}]`,
        path,
        path,
        moduleName,
      );
    }

    visited.add(moduleName);
    processing.add(moduleName);
    stack.push({
      moduleName,
      remaining: (relation.get(moduleName) ?? [])[Symbol.iterator](),
    });
  };

  enter(start);

  while (stack.length > 0) {
    const frame = stack[stack.length - 1];
    if (frame === undefined) break;

    const next = frame.remaining.next();
    if (next.done === true) {
      processing.delete(frame.moduleName);
      finished.add(frame.moduleName);
      stack.pop();
      continue;
    }

    // Skip the reflexive root dependency (base -> base).
    if (next.value !== frame.moduleName) {
      enter(next.value);
    }
  }
}
