/**
 * IFactStore - Abstract fact table interface
 *
 * Read access to a subject-predicate-object statement table and write access
 * to named output modules. Hierarchy edges are only ever derived from the
 * subclass and subproperty predicates.
 *
 * @module
 */

import type { Fact, HierarchyEdge, IdKind, IdResolution, TermId } from "../../types/index.js";
import type { PrefixRegistry } from "../store/prefixes.js";

/**
 * Fact store interface - abstracts over the SQLite implementation.
 *
 * @example
 * ```typescript
 * const store = new SqliteFactStore({ path: "./ontology.db" });
 * await store.initialize();
 *
 * const [seed] = await store.resolveIds(["assay"], "subject");
 * const edges = await store.ancestorEdges(seed.ids);
 *
 * await store.replaceModule("extract", facts);
 * await store.close();
 * ```
 */
export interface IFactStore {
  /**
   * Open the database and check the statement table exists
   */
  initialize(): Promise<void>;

  /**
   * Close database connection
   */
  close(): Promise<void>;

  /**
   * Resolve identifiers or labels. One entry per input, in input order.
   * An input that is an existing identifier is returned as is; otherwise
   * every subject carrying it as an rdfs:label is a candidate.
   */
  resolveIds(inputs: readonly string[], kind: IdKind): Promise<IdResolution[]>;

  /**
   * Every edge of the transitive upward closure of `seeds`
   */
  ancestorEdges(seeds: readonly TermId[]): Promise<HierarchyEdge[]>;

  /**
   * Every edge of the transitive downward closure of `seeds`
   */
  descendantEdges(seeds: readonly TermId[]): Promise<HierarchyEdge[]>;

  /**
   * Direct parents only
   */
  parentsOf(id: TermId): Promise<TermId[]>;

  /**
   * Direct children only
   */
  childrenOf(id: TermId): Promise<TermId[]>;

  /**
   * Distinct predicates in the statement table, minus `exclude`
   */
  listPredicates(exclude?: readonly TermId[]): Promise<TermId[]>;

  /**
   * Facts about `subjects`, optionally restricted to `predicates`
   */
  rawFactsFiltered(
    subjects: readonly TermId[],
    predicates?: readonly TermId[]
  ): Promise<Fact[]>;

  /**
   * Atomically replace the named output module with `facts`
   */
  replaceModule(name: string, facts: readonly Fact[]): Promise<void>;

  /**
   * Read back a module written by {@link replaceModule}
   */
  readModule(name: string): Promise<Fact[]>;

  moduleExists(name: string): Promise<boolean>;

  /**
   * Registered prefixes; empty when the database has no prefix table
   */
  getPrefixes(): Promise<PrefixRegistry>;

  /**
   * Whether the store is initialized and ready
   */
  readonly isReady: boolean;
}

/**
 * Configuration for creating a fact store.
 */
export interface FactStoreConfig {
  /** Path to the SQLite database, or ":memory:" */
  path: string;
  /** Name of the input statement table (default "statement") */
  statementTable?: string;
  /** Maximum bound parameters per query; IN lists are chunked to fit */
  maxSqlVars?: number;
  /** Open read-only; replaceModule then fails */
  readonly?: boolean;
  /** Create the statement and prefix tables when missing */
  create?: boolean;
}
