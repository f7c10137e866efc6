// CHANGE: Resolve the non-optional transitive dependency closure with an explicit worklist.
// WHY: Catalog graphs may contain cycles; traversal must terminate without recursion.

import { Catalog } from "./catalog.js";
import { NotFoundError } from "./errors.js";
import { DependencyRef } from "./types.js";

/**
 * Read side of the catalog needed for resolution.
 */
export type DependencyGraph = Pick<Catalog, "has" | "dependenciesOf">;

/**
 * Compute every identifier reachable from `rootId` through required edges.
 *
 * Unknown dependency targets are kept as leaves. The root is never part of its own result,
 * even when a cycle leads back to it.
 *
 * @param graph - Loaded catalog.
 * @param rootId - Requested plugin.
 * @returns Duplicate-free identifiers in first-discovery order.
 * @throws NotFoundError if `rootId` is absent from the catalog.
 */
export function resolveDependencies(graph: DependencyGraph, rootId: string): string[] {
  if (!graph.has(rootId)) {
    throw new NotFoundError(rootId);
  }
  const visited = new Set<string>([rootId]);
  const resolved: string[] = [];
  const stack: DependencyRef[] = [...graph.dependenciesOf(rootId)].reverse();

  for (let edge = stack.pop(); edge !== undefined; edge = stack.pop()) {
    if (edge.optional || visited.has(edge.name)) {
      continue;
    }
    visited.add(edge.name);
    resolved.push(edge.name);
    // Reverse so the first declared dependency is explored first.
    stack.push(...[...graph.dependenciesOf(edge.name)].reverse());
  }
  return resolved;
}
