/**
 * Statement Table Schema
 *
 * DDL for the 8-column fact tables (input statements and output modules) and
 * the prefix table.
 *
 * @module
 */

import { ConfigError, ErrorCode } from "../errors.js";
import { isValidTableName } from "../../utils/validation.js";
import { HIERARCHY_PREDICATES } from "../vocabulary.js";

export const PREFIX_TABLE = "prefix";

export const FACT_COLUMNS = [
  "assertion",
  "retraction",
  "graph",
  "subject",
  "predicate",
  "object",
  "datatype",
  "annotation",
] as const;

export const FACT_COLUMN_LIST = FACT_COLUMNS.join(", ");

/**
 * Double-quoted table name
 *
 * @throws {ConfigError} unless `name` is a plain identifier
 */
export function quoteTable(name: string): string {
  if (!isValidTableName(name)) {
    throw new ConfigError(
      `Invalid table name '${name}': use letters, digits and underscores only`,
      ErrorCode.CONFIG_INVALID_TABLE_NAME,
      { table: name }
    );
  }
  return `"${name}"`;
}

export function factTableDdl(name: string): string {
  return `CREATE TABLE ${quoteTable(name)} (
    assertion INTEGER NOT NULL,
    retraction INTEGER NOT NULL DEFAULT 0,
    graph TEXT NOT NULL,
    subject TEXT NOT NULL,
    predicate TEXT NOT NULL,
    object TEXT NOT NULL,
    datatype TEXT NOT NULL,
    annotation TEXT
  )`;
}

/**
 * Indexes the closure and resolution queries lean on
 */
export function factTableIndexesDdl(name: string): string {
  const table = quoteTable(name);
  return `
    CREATE INDEX IF NOT EXISTS "idx_${name}_subject" ON ${table}(subject, predicate);
    CREATE INDEX IF NOT EXISTS "idx_${name}_object" ON ${table}(object, predicate);
    CREATE INDEX IF NOT EXISTS "idx_${name}_predicate" ON ${table}(predicate);
  `;
}

export const PREFIX_TABLE_DDL = `CREATE TABLE IF NOT EXISTS ${PREFIX_TABLE} (
  prefix TEXT PRIMARY KEY,
  base TEXT NOT NULL
)`;

/** `'rdfs:subClassOf', 'rdfs:subPropertyOf'` for inlining into IN lists */
export const HIERARCHY_PREDICATE_LIST = HIERARCHY_PREDICATES.map((p) => `'${p}'`).join(", ");

export function placeholders(count: number): string {
  return new Array<string>(count).fill("?").join(", ");
}
