/**
 * modgate Kernel — Edge Relation Types
 */

/**
 * Directed dependency graph of a module set.
 *
 * Maps each module name to the ordered multiset of module names it depends
 * on, including the implicit edge to the root. Key order is the module set's
 * input order; edge order is manifest order followed by the root edge.
 *
 * Built once per validation run by buildEdgeRelation() and read-only after.
 */
export type EdgeRelation = ReadonlyMap<string, ReadonlyArray<string>>;

/** One row of a described edge relation. */
export interface EdgeRelationRow {
  readonly module: string;
  readonly dependencies: ReadonlyArray<string>;
}
