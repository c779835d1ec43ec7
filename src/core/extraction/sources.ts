/**
 * Import and source configuration files
 *
 * An import file lists the terms of one or more modules:
 *
 *   ID        Parent ID   Related     Source
 *   EX:0001               ancestors   ex
 *   EX:0002   EX:0001                 ex
 *
 * A source configuration file holds per-source options:
 *
 *   Source   Intermediates   Predicates                 IRI
 *   ex       none            rdfs:label IAO:0000115     http://example.org/ex.owl
 *
 * Both are tab-separated, or comma-separated when the name ends in .csv.
 *
 * @module
 */

import { ConfigError, ErrorCode } from "../errors.js";
import { readDelimitedFile } from "../../utils/fs.js";
import type { SeedInput } from "../../utils/validation.js";
import type { DelimitedRow } from "../../utils/delimited.js";

export interface SourceOptions {
  source: string;
  /** Raw intermediates cell; undefined when blank */
  intermediates?: string;
  predicates: string[];
  /** Ontology IRI stamped as imported-from; undefined when blank */
  importedFrom?: string;
}

function requireColumns(
  rows: DelimitedRow[],
  columns: readonly string[],
  filePath: string
): void {
  const first = rows[0];
  if (!first) return;
  const missing = columns.filter((column) => !(column in first));
  if (missing.length > 0) {
    throw new ConfigError(
      `${filePath} is missing required column(s): ${missing.join(", ")}`,
      ErrorCode.CONFIG_FILE_INVALID,
      { filePath, missing }
    );
  }
}

function cell(row: DelimitedRow, column: string): string | undefined {
  const value = row[column]?.trim();
  return value ? value : undefined;
}

/**
 * Seeds listed in an import file. Rows without an ID are skipped. With a
 * `source`, only rows whose Source matches are kept; a file without a Source
 * column applies to every source.
 */
export async function loadImportTerms(filePath: string, source?: string): Promise<SeedInput[]> {
  const rows = await readDelimitedFile(filePath);
  requireColumns(rows, ["ID"], filePath);
  const hasSource = rows[0] !== undefined && "Source" in rows[0];

  const seeds: SeedInput[] = [];
  for (const row of rows) {
    const id = cell(row, "ID");
    if (!id) continue;
    if (source && hasSource && cell(row, "Source") !== source) continue;
    seeds.push({ id, parent: cell(row, "Parent ID"), related: cell(row, "Related") });
  }
  return seeds;
}

/**
 * Options for `source` from a source configuration file
 *
 * @throws {ConfigError} when the file has no row for `source`
 */
export async function loadSourceOptions(filePath: string, source: string): Promise<SourceOptions> {
  const rows = await readDelimitedFile(filePath);
  requireColumns(rows, ["Source"], filePath);

  const row = rows.find((candidate) => cell(candidate, "Source") === source);
  if (!row) {
    throw new ConfigError(
      `Source '${source}' does not exist in config file: ${filePath}`,
      ErrorCode.CONFIG_SOURCE_NOT_FOUND,
      { filePath, source }
    );
  }

  return {
    source,
    intermediates: cell(row, "Intermediates"),
    predicates: cell(row, "Predicates")?.split(/\s+/) ?? [],
    importedFrom: cell(row, "IRI"),
  };
}
