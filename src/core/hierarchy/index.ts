/**
 * Hierarchy Module
 *
 * Closures over subclass/subproperty edges and the frontier reductions
 * applied to them.
 *
 * @module
 */

export {
  type AdjacencyMap,
  buildAncestorMap,
  buildDescendantMap,
  mergeAdjacency,
  neighboursOf,
  edgeCount,
} from "./closure.js";

export {
  nearestFrontierAncestors,
  cappedAncestors,
  bottomDescendants,
  allDescendants,
} from "./frontier.js";

export { HierarchyResolver, type ResolverStats } from "./resolver.js";
