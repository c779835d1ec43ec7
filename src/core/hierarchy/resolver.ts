/**
 * Hierarchy Resolver
 *
 * Batched transitive closures over the hierarchy edges of a fact store.
 * One resolver lives for one extraction run: closures fetched for expansion
 * are reused for parent assignment, and only terms not yet covered reach the
 * store.
 *
 * @module
 */

import type { IFactStore } from "../interfaces/IFactStore.js";
import type { TermId } from "../../types/index.js";
import { createLogger } from "../../utils/logger.js";
import {
  type AdjacencyMap,
  buildAncestorMap,
  buildDescendantMap,
  edgeCount,
  mergeAdjacency,
} from "./closure.js";

const logger = createLogger("hierarchy-resolver");

interface DirectionCache {
  closure: AdjacencyMap;
  /** Terms whose closure has been fetched, seeds and everything reached */
  covered: Set<TermId>;
  queries: number;
}

function emptyCache(): DirectionCache {
  return { closure: new Map(), covered: new Set(), queries: 0 };
}

export interface ResolverStats {
  ancestorQueries: number;
  descendantQueries: number;
  ancestorEdges: number;
  descendantEdges: number;
}

export class HierarchyResolver {
  private up = emptyCache();
  private down = emptyCache();

  constructor(private readonly store: IFactStore) {}

  /**
   * child -> parents for every term reachable upward from `seeds`.
   * The universal top node appears as the class-root sentinel.
   */
  async ancestorsOf(seeds: Iterable<TermId>): Promise<AdjacencyMap> {
    const missing = this.uncovered(this.up, seeds);
    if (missing.length > 0) {
      const edges = await this.store.ancestorEdges(missing);
      this.up.queries++;
      this.absorb(this.up, missing, buildAncestorMap(edges));
      logger.debug({ seeds: missing.length, edges: edges.length }, "Fetched ancestor closure");
    }
    return this.up.closure;
  }

  /**
   * parent -> children for every term reachable downward from `seeds`
   */
  async descendantsOf(seeds: Iterable<TermId>): Promise<AdjacencyMap> {
    const missing = this.uncovered(this.down, seeds);
    if (missing.length > 0) {
      const edges = await this.store.descendantEdges(missing);
      this.down.queries++;
      this.absorb(this.down, missing, buildDescendantMap(edges));
      logger.debug({ seeds: missing.length, edges: edges.length }, "Fetched descendant closure");
    }
    return this.down.closure;
  }

  getStats(): ResolverStats {
    return {
      ancestorQueries: this.up.queries,
      descendantQueries: this.down.queries,
      ancestorEdges: edgeCount(this.up.closure),
      descendantEdges: edgeCount(this.down.closure),
    };
  }

  /**
   * Drop both cached closures
   */
  release(): void {
    this.up = emptyCache();
    this.down = emptyCache();
  }

  private uncovered(cache: DirectionCache, seeds: Iterable<TermId>): TermId[] {
    const missing = new Set<TermId>();
    for (const seed of seeds) {
      if (!cache.covered.has(seed)) missing.add(seed);
    }
    return [...missing].sort();
  }

  private absorb(cache: DirectionCache, seeds: TermId[], fetched: AdjacencyMap): void {
    mergeAdjacency(cache.closure, fetched);
    // a closure query returns every edge below or above the seeds, so every
    // node it mentions is covered as well
    for (const seed of seeds) cache.covered.add(seed);
    for (const [from, neighbours] of fetched) {
      cache.covered.add(from);
      for (const to of neighbours) cache.covered.add(to);
    }
  }
}
