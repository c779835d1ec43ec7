/**
 * Closure adjacency maps
 *
 * Pure builders turning the edge rows of a closure query into lookup maps.
 * Every builder returns a fresh structure; nothing is accumulated across
 * calls unless a map is passed to {@link mergeAdjacency} explicitly.
 *
 * @module
 */

import type { HierarchyEdge, TermId } from "../../types/index.js";
import { CLASS_ROOT, UNIVERSAL_ROOTS } from "../vocabulary.js";

/**
 * term -> set of neighbours. For an ancestor closure the neighbours are
 * parents; for a descendant closure they are children.
 */
export type AdjacencyMap = Map<TermId, Set<TermId>>;

function addEdge(map: AdjacencyMap, from: TermId, to: TermId): void {
  let neighbours = map.get(from);
  if (!neighbours) {
    neighbours = new Set();
    map.set(from, neighbours);
  }
  neighbours.add(to);
}

/**
 * child -> parents. Universal-root parents become {@link CLASS_ROOT}.
 */
export function buildAncestorMap(edges: Iterable<HierarchyEdge>): AdjacencyMap {
  const map: AdjacencyMap = new Map();
  for (const { child, parent } of edges) {
    addEdge(map, child, UNIVERSAL_ROOTS.has(parent) ? CLASS_ROOT : parent);
  }
  return map;
}

/**
 * parent -> children
 */
export function buildDescendantMap(edges: Iterable<HierarchyEdge>): AdjacencyMap {
  const map: AdjacencyMap = new Map();
  for (const { child, parent } of edges) {
    addEdge(map, parent, child);
  }
  return map;
}

/**
 * Adds every edge of `source` into `target` and returns `target`
 */
export function mergeAdjacency(target: AdjacencyMap, source: AdjacencyMap): AdjacencyMap {
  for (const [from, neighbours] of source) {
    for (const to of neighbours) {
      addEdge(target, from, to);
    }
  }
  return target;
}

/**
 * Neighbours of a term in stable (sorted) order; absent terms have none
 */
export function neighboursOf(map: AdjacencyMap, term: TermId): TermId[] {
  const neighbours = map.get(term);
  if (!neighbours) return [];
  return [...neighbours].sort();
}

/**
 * Total number of edges held by a map
 */
export function edgeCount(map: AdjacencyMap): number {
  let count = 0;
  for (const neighbours of map.values()) {
    count += neighbours.size;
  }
  return count;
}
