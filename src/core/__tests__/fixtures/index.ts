/**
 * Test fixtures: a small made-up ontology loaded into an in-memory store
 */

import * as fs from "node:fs";
import { fileURLToPath } from "node:url";
import { SqliteFactStore } from "../../store/sqlite-fact-store.js";
import type { PrefixEntry } from "../../store/prefixes.js";
import type { Fact } from "../../../types/index.js";

interface OntologyFixture {
  prefixes: PrefixEntry[];
  statements: [string, string, string, string][];
}

function isOntologyFixture(value: unknown): value is OntologyFixture {
  if (typeof value !== "object" || value === null) return false;
  return "prefixes" in value && "statements" in value && Array.isArray(value.statements);
}

export function readOntologyFixture(): OntologyFixture {
  const file = fileURLToPath(new URL("./ontology.json", import.meta.url));
  const parsed: unknown = JSON.parse(fs.readFileSync(file, "utf-8"));
  if (!isOntologyFixture(parsed)) {
    throw new Error(`Unexpected fixture shape in ${file}`);
  }
  return parsed;
}

/**
 * A statement row as loaded from a database
 */
export function fact(
  subject: string,
  predicate: string,
  object: string,
  datatype = "_IRI",
  annotation: string | null = null
): Fact {
  return { assertion: 1, retraction: 0, graph: "graph", subject, predicate, object, datatype, annotation };
}

/**
 * In-memory store holding `statements` (the fixture ontology by default)
 */
export async function createTestStore(
  statements?: readonly Fact[],
  options: { maxSqlVars?: number; withPrefixes?: boolean } = {}
): Promise<SqliteFactStore> {
  const store = new SqliteFactStore({
    path: ":memory:",
    create: true,
    maxSqlVars: options.maxSqlVars,
  });
  await store.initialize();

  const fixture = readOntologyFixture();
  const rows = statements ?? fixture.statements.map(([s, p, o, d]) => fact(s, p, o, d));
  await store.insertFacts(rows);
  if (options.withPrefixes ?? statements === undefined) {
    await store.insertPrefixes(fixture.prefixes);
  }
  return store;
}
