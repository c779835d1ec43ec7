/**
 * Frontier Reducer
 *
 * Decides how much of an ancestor or descendant chain to keep. Ancestor
 * walks stop at frontier terms (the caller's boundary) and at the class-root
 * sentinel; descendant walks either keep everything or only the leaves.
 *
 * All walks are iterative with a visited set, so cyclic or self-referential
 * edges terminate. Neighbours are visited in sorted order, which makes every
 * result deterministic for a given closure.
 *
 * @module
 */

import type { TermId } from "../../types/index.js";
import { CLASS_ROOT } from "../vocabulary.js";
import { type AdjacencyMap, neighboursOf } from "./closure.js";

/**
 * The first ancestors of `term` that are either frontier members or top
 * ancestors (no asserted parent, or only the class-root sentinel above them).
 *
 * A term with no real parent is its own top ancestor, so for a root the
 * result is `{term}` whatever the frontier. Every asserted parent is
 * followed: multiple inheritance yields several stopping points.
 *
 * @param closure - child -> parents
 */
export function nearestFrontierAncestors(
  closure: AdjacencyMap,
  term: TermId,
  frontier: ReadonlySet<TermId>
): Set<TermId> {
  const found = new Set<TermId>();
  const visited = new Set<TermId>([term]);
  const stack: TermId[] = [term];

  while (stack.length > 0) {
    const node = stack.pop();
    if (node === undefined) break;

    const parents = neighboursOf(closure, node);
    if (parents.length === 0) {
      found.add(node);
      continue;
    }

    for (const parent of parents) {
      if (parent === CLASS_ROOT) {
        found.add(node);
      } else if (frontier.has(parent)) {
        found.add(parent);
      } else if (!visited.has(parent)) {
        visited.add(parent);
        stack.push(parent);
      }
    }
  }

  return found;
}

/**
 * Every ancestor of `term` up to and including the frontier members that
 * bound each lineage. Lineages without a frontier member run to their top
 * ancestor. The class-root sentinel is never included.
 *
 * @param closure - child -> parents
 */
export function cappedAncestors(
  closure: AdjacencyMap,
  frontier: ReadonlySet<TermId>,
  term: TermId
): Set<TermId> {
  const found = new Set<TermId>();
  const visited = new Set<TermId>([term]);
  const stack: TermId[] = [term];

  while (stack.length > 0) {
    const node = stack.pop();
    if (node === undefined) break;

    for (const parent of neighboursOf(closure, node)) {
      if (parent === CLASS_ROOT) continue;
      found.add(parent);
      if (frontier.has(parent)) continue;
      if (!visited.has(parent)) {
        visited.add(parent);
        stack.push(parent);
      }
    }
  }

  return found;
}

/**
 * Leaf descendants of `term`: reachable nodes with no children of their own.
 * A term without children is its own (only) leaf.
 *
 * @param closure - parent -> children
 */
export function bottomDescendants(closure: AdjacencyMap, term: TermId): Set<TermId> {
  const found = new Set<TermId>();
  const visited = new Set<TermId>([term]);
  const stack: TermId[] = [term];

  while (stack.length > 0) {
    const node = stack.pop();
    if (node === undefined) break;

    const children = neighboursOf(closure, node);
    if (children.length === 0) {
      found.add(node);
      continue;
    }

    for (const child of children) {
      if (!visited.has(child)) {
        visited.add(child);
        stack.push(child);
      }
    }
  }

  return found;
}

/**
 * Every node reachable below `term`, intermediates included
 *
 * @param closure - parent -> children
 */
export function allDescendants(closure: AdjacencyMap, term: TermId): Set<TermId> {
  const found = new Set<TermId>();
  const visited = new Set<TermId>([term]);
  const stack: TermId[] = [term];

  while (stack.length > 0) {
    const node = stack.pop();
    if (node === undefined) break;

    for (const child of neighboursOf(closure, node)) {
      found.add(child);
      if (!visited.has(child)) {
        visited.add(child);
        stack.push(child);
      }
    }
  }

  return found;
}
