/**
 * SqliteFactStore - better-sqlite3 implementation of IFactStore
 *
 * Reads an LDTab-style `statement` table and writes output modules as sibling
 * tables with the same eight columns. Closure queries are recursive CTEs
 * combined with UNION, which discards repeated rows and so terminates on
 * cyclic hierarchies.
 *
 * @module
 */

import Database, { type Database as DatabaseType } from "better-sqlite3";
import type { FactStoreConfig, IFactStore } from "../interfaces/IFactStore.js";
import type {
  Fact,
  HierarchyEdge,
  IdKind,
  IdResolution,
  TermId,
} from "../../types/index.js";
import { ErrorCode, StoreError, wrapStoreError } from "../errors.js";
import { createLogger } from "../../utils/logger.js";
import { chunk } from "../../utils/index.js";
import { RDFS_LABEL } from "../vocabulary.js";
import { type PrefixEntry, PrefixRegistry } from "./prefixes.js";
import {
  FACT_COLUMNS,
  FACT_COLUMN_LIST,
  HIERARCHY_PREDICATE_LIST,
  PREFIX_TABLE,
  PREFIX_TABLE_DDL,
  factTableDdl,
  factTableIndexesDdl,
  placeholders,
  quoteTable,
} from "./schema.js";

const logger = createLogger("fact-store");

const DEFAULT_MAX_SQL_VARS = 999;

// =============================================================================
// Row Types
// =============================================================================

interface FactRow {
  assertion: number;
  retraction: number;
  graph: string;
  subject: string;
  predicate: string;
  object: string;
  datatype: string;
  annotation: string | null;
}

interface EdgeRow {
  child: string;
  parent: string;
}

interface IdRow {
  id: string;
}

interface LabelRow {
  label: string;
  id: string;
}

// =============================================================================
// Row Conversion
// =============================================================================

function rowToFact(row: FactRow): Fact {
  return {
    assertion: row.assertion,
    retraction: row.retraction,
    graph: row.graph,
    subject: row.subject,
    predicate: row.predicate,
    object: row.object,
    datatype: row.datatype,
    annotation: row.annotation,
  };
}

function edgeKey(edge: HierarchyEdge): string {
  return `${edge.child}\u0000${edge.parent}`;
}

function compareEdges(a: HierarchyEdge, b: HierarchyEdge): number {
  if (a.child !== b.child) return a.child < b.child ? -1 : 1;
  if (a.parent !== b.parent) return a.parent < b.parent ? -1 : 1;
  return 0;
}

// =============================================================================
// Store
// =============================================================================

export class SqliteFactStore implements IFactStore {
  private db: DatabaseType | null = null;
  private readonly config: FactStoreConfig;
  private readonly statementTable: string;
  private readonly maxSqlVars: number;
  private initialized = false;

  constructor(config: FactStoreConfig) {
    this.config = config;
    this.statementTable = config.statementTable ?? "statement";
    this.maxSqlVars = config.maxSqlVars ?? DEFAULT_MAX_SQL_VARS;
    // fails before anything is opened
    quoteTable(this.statementTable);
  }

  get isReady(): boolean {
    return this.initialized;
  }

  async initialize(): Promise<void> {
    if (this.initialized) return;

    const { path, readonly = false, create = false } = this.config;
    const inMemory = path === ":memory:";

    try {
      this.db = new Database(path, {
        readonly,
        fileMustExist: !inMemory && !create,
      });
      if (!inMemory && !readonly) {
        this.db.pragma("journal_mode = WAL");
        this.db.pragma("synchronous = NORMAL");
      }
      this.db.pragma("busy_timeout = 5000");
    } catch (error) {
      this.db = null;
      throw wrapStoreError(error, `Cannot open database ${path}`, undefined, ErrorCode.STORE_CONNECTION_FAILED);
    }

    if (!this.tableExists(this.statementTable)) {
      if (!create) {
        await this.close();
        throw new StoreError(
          `Statement table '${this.statementTable}' does not exist in ${path}`,
          ErrorCode.STORE_NOT_INITIALIZED
        );
      }
      this.exec(factTableDdl(this.statementTable));
      this.exec(factTableIndexesDdl(this.statementTable));
      this.exec(PREFIX_TABLE_DDL);
    }

    this.initialized = true;
    logger.debug({ path, statementTable: this.statementTable }, "Fact store opened");
  }

  async close(): Promise<void> {
    if (this.db) {
      this.db.close();
      this.db = null;
    }
    this.initialized = false;
  }

  // ===========================================================================
  // Identifier Resolution
  // ===========================================================================

  async resolveIds(inputs: readonly string[], kind: IdKind): Promise<IdResolution[]> {
    const table = quoteTable(this.statementTable);
    const distinct = [...new Set(inputs)];
    const existing = new Set<string>();
    const byLabel = new Map<string, string[]>();

    const column = kind === "predicate" ? "predicate" : "subject";
    for (const slice of chunk(distinct, this.maxSqlVars)) {
      const idSql = `SELECT DISTINCT ${column} AS id FROM ${table}
        WHERE ${column} IN (${placeholders(slice.length)})`;
      for (const row of this.all<IdRow>(idSql, slice)) {
        existing.add(row.id);
      }
    }

    const labels = distinct.filter((input) => !existing.has(input));
    for (const slice of chunk(labels, this.maxSqlVars - 1)) {
      const labelSql = `SELECT DISTINCT object AS label, subject AS id FROM ${table}
        WHERE predicate = ? AND object IN (${placeholders(slice.length)})
        ORDER BY subject`;
      for (const row of this.all<LabelRow>(labelSql, [RDFS_LABEL, ...slice])) {
        const ids = byLabel.get(row.label) ?? [];
        ids.push(row.id);
        byLabel.set(row.label, ids);
      }
    }

    return inputs.map((input) =>
      existing.has(input)
        ? { input, ids: [input], viaLabel: false }
        : { input, ids: byLabel.get(input) ?? [], viaLabel: true }
    );
  }

  // ===========================================================================
  // Hierarchy
  // ===========================================================================

  async ancestorEdges(seeds: readonly TermId[]): Promise<HierarchyEdge[]> {
    const table = quoteTable(this.statementTable);
    return this.closureEdges(seeds, (count) => `WITH RECURSIVE ancestors(child, parent) AS (
        SELECT subject, object FROM ${table}
        WHERE subject IN (${placeholders(count)})
          AND predicate IN (${HIERARCHY_PREDICATE_LIST})
          AND datatype = '_IRI'
        UNION
        SELECT s.subject, s.object FROM ${table} AS s
        JOIN ancestors AS a ON s.subject = a.parent
        WHERE s.predicate IN (${HIERARCHY_PREDICATE_LIST})
          AND s.datatype = '_IRI'
      )
      SELECT child, parent FROM ancestors ORDER BY child, parent`);
  }

  async descendantEdges(seeds: readonly TermId[]): Promise<HierarchyEdge[]> {
    const table = quoteTable(this.statementTable);
    return this.closureEdges(seeds, (count) => `WITH RECURSIVE descendants(child, parent) AS (
        SELECT subject, object FROM ${table}
        WHERE object IN (${placeholders(count)})
          AND predicate IN (${HIERARCHY_PREDICATE_LIST})
          AND datatype = '_IRI'
        UNION
        SELECT s.subject, s.object FROM ${table} AS s
        JOIN descendants AS d ON s.object = d.child
        WHERE s.predicate IN (${HIERARCHY_PREDICATE_LIST})
          AND s.datatype = '_IRI'
      )
      SELECT child, parent FROM descendants ORDER BY child, parent`);
  }

  async parentsOf(id: TermId): Promise<TermId[]> {
    const sql = `SELECT DISTINCT object AS id FROM ${quoteTable(this.statementTable)}
      WHERE subject = ? AND predicate IN (${HIERARCHY_PREDICATE_LIST}) AND datatype = '_IRI'
      ORDER BY id`;
    return this.all<IdRow>(sql, [id]).map((row) => row.id);
  }

  async childrenOf(id: TermId): Promise<TermId[]> {
    const sql = `SELECT DISTINCT subject AS id FROM ${quoteTable(this.statementTable)}
      WHERE object = ? AND predicate IN (${HIERARCHY_PREDICATE_LIST}) AND datatype = '_IRI'
      ORDER BY id`;
    return this.all<IdRow>(sql, [id]).map((row) => row.id);
  }

  // ===========================================================================
  // Facts
  // ===========================================================================

  async listPredicates(exclude: readonly TermId[] = []): Promise<TermId[]> {
    const sql = `SELECT DISTINCT predicate AS id FROM ${quoteTable(this.statementTable)} ORDER BY id`;
    const skip = new Set(exclude);
    return this.all<IdRow>(sql, []).map((row) => row.id).filter((id) => !skip.has(id));
  }

  async rawFactsFiltered(
    subjects: readonly TermId[],
    predicates?: readonly TermId[]
  ): Promise<Fact[]> {
    if (subjects.length === 0 || predicates?.length === 0) return [];
    const table = quoteTable(this.statementTable);
    const distinct = [...new Set(subjects)].sort();
    // the predicate list binds as a single JSON parameter
    const predicateClause = predicates ? "AND predicate IN (SELECT value FROM json_each(?))" : "";
    const extra = predicates ? [JSON.stringify([...new Set(predicates)])] : [];
    const size = this.maxSqlVars - extra.length;

    const facts: Fact[] = [];
    for (const slice of chunk(distinct, size)) {
      const sql = `SELECT ${FACT_COLUMN_LIST}
        FROM ${table}
        WHERE subject IN (${placeholders(slice.length)}) ${predicateClause}
        ORDER BY subject, predicate, object, datatype, graph, assertion, retraction, annotation`;
      for (const row of this.all<FactRow>(sql, [...slice, ...extra])) {
        facts.push(rowToFact(row));
      }
    }
    return facts;
  }

  /**
   * Append facts to the statement table. Used to load fixtures and small
   * databases; extraction itself never writes here.
   */
  async insertFacts(facts: readonly Fact[]): Promise<void> {
    const db = this.ensureDb();
    const sql = `INSERT INTO ${quoteTable(this.statementTable)}
      (${FACT_COLUMN_LIST})
      VALUES (${placeholders(FACT_COLUMNS.length)})`;
    try {
      const stmt = db.prepare<unknown[]>(sql);
      const insertMany = db.transaction((rows: readonly Fact[]) => {
        for (const fact of rows) {
          stmt.run(...factParams(fact));
        }
      });
      insertMany(facts);
    } catch (error) {
      throw wrapStoreError(error, "Failed to insert facts", sql, ErrorCode.STORE_WRITE_FAILED);
    }
  }

  // ===========================================================================
  // Modules
  // ===========================================================================

  async replaceModule(name: string, facts: readonly Fact[]): Promise<void> {
    const table = quoteTable(name);
    if (name === this.statementTable) {
      throw new StoreError(
        `Refusing to overwrite the statement table '${name}'`,
        ErrorCode.STORE_WRITE_FAILED
      );
    }
    const db = this.ensureDb();
    const insertSql = `INSERT INTO ${table}
      (${FACT_COLUMN_LIST})
      VALUES (${placeholders(FACT_COLUMNS.length)})`;

    try {
      const replace = db.transaction((rows: readonly Fact[]) => {
        db.exec(`DROP TABLE IF EXISTS ${table}`);
        db.exec(factTableDdl(name));
        const stmt = db.prepare<unknown[]>(insertSql);
        for (const fact of rows) {
          stmt.run(...factParams(fact));
        }
      });
      replace(facts);
    } catch (error) {
      throw wrapStoreError(error, `Failed to write module '${name}'`, insertSql, ErrorCode.STORE_WRITE_FAILED);
    }
    logger.debug({ module: name, facts: facts.length }, "Module written");
  }

  async readModule(name: string): Promise<Fact[]> {
    const sql = `SELECT ${FACT_COLUMN_LIST}
      FROM ${quoteTable(name)} ORDER BY rowid`;
    return this.all<FactRow>(sql, []).map(rowToFact);
  }

  async moduleExists(name: string): Promise<boolean> {
    quoteTable(name);
    return this.tableExists(name);
  }

  // ===========================================================================
  // Prefixes
  // ===========================================================================

  async getPrefixes(): Promise<PrefixRegistry> {
    if (!this.tableExists(PREFIX_TABLE)) return new PrefixRegistry();
    const sql = `SELECT prefix, base FROM ${PREFIX_TABLE} ORDER BY length(base) DESC, prefix`;
    return new PrefixRegistry(this.all<PrefixEntry>(sql, []));
  }

  async insertPrefixes(entries: readonly PrefixEntry[]): Promise<void> {
    const db = this.ensureDb();
    const sql = `INSERT OR REPLACE INTO ${PREFIX_TABLE} (prefix, base) VALUES (?, ?)`;
    try {
      db.exec(PREFIX_TABLE_DDL);
      const stmt = db.prepare<[string, string]>(sql);
      db.transaction((rows: readonly PrefixEntry[]) => {
        for (const { prefix, base } of rows) stmt.run(prefix, base);
      })(entries);
    } catch (error) {
      throw wrapStoreError(error, "Failed to insert prefixes", sql, ErrorCode.STORE_WRITE_FAILED);
    }
  }

  // ===========================================================================
  // Internals
  // ===========================================================================

  private ensureDb(): DatabaseType {
    if (!this.db) {
      throw new StoreError(
        "SqliteFactStore not initialized. Call initialize() first.",
        ErrorCode.STORE_NOT_INITIALIZED
      );
    }
    return this.db;
  }

  private tableExists(name: string): boolean {
    const sql = "SELECT name AS id FROM sqlite_master WHERE type = 'table' AND name = ?";
    return this.all<IdRow>(sql, [name]).length > 0;
  }

  private exec(sql: string): void {
    try {
      this.ensureDb().exec(sql);
    } catch (error) {
      throw wrapStoreError(error, "Schema statement failed", sql, ErrorCode.STORE_WRITE_FAILED);
    }
  }

  private all<Row>(sql: string, params: readonly string[]): Row[] {
    const db = this.ensureDb();
    try {
      return db.prepare<string[], Row>(sql).all(...params);
    } catch (error) {
      throw wrapStoreError(error, "Query failed", sql);
    }
  }

  private async closureEdges(
    seeds: readonly TermId[],
    buildSql: (count: number) => string
  ): Promise<HierarchyEdge[]> {
    const distinct = [...new Set(seeds)].sort();
    const seen = new Set<string>();
    const edges: HierarchyEdge[] = [];

    for (const slice of chunk(distinct, this.maxSqlVars)) {
      for (const edge of this.all<EdgeRow>(buildSql(slice.length), slice)) {
        const key = edgeKey(edge);
        if (seen.has(key)) continue;
        seen.add(key);
        edges.push({ child: edge.child, parent: edge.parent });
      }
    }

    return edges.sort(compareEdges);
  }
}

function factParams(fact: Fact): unknown[] {
  return [
    fact.assertion,
    fact.retraction,
    fact.graph,
    fact.subject,
    fact.predicate,
    fact.object,
    fact.datatype,
    fact.annotation,
  ];
}
