#!/usr/bin/env node

/**
 * ontomod CLI
 * Extract modules from an ontology database
 */

import { Command } from "commander";
import chalk from "chalk";
import { extractCommand } from "./commands/extract.js";
import { attributesCommand } from "./commands/attributes.js";
import { wrapError } from "../core/errors.js";
import { DEFAULT_IMPORTED_FROM_PREDICATE } from "../core/vocabulary.js";
import { DEFAULT_EXTRACT_TABLE } from "../core/extraction/orchestrator.js";
import { createLogger } from "../utils/logger.js";

const logger = createLogger("cli");

/**
 * Accumulate a repeatable option
 */
function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

// Create the main program
const program = new Command();

program
  .name("ontomod")
  .description("Extract self-contained modules from an ontology fact table")
  .version("0.1.0")
  .configureOutput({
    writeErr: (str) => process.stderr.write(chalk.red(str)),
  });

// =============================================================================
// Commands
// =============================================================================

program
  .command("extract")
  .description("Extract terms and their hierarchy into a module table")
  .requiredOption("-d, --database <path>", "SQLite database containing the statement table")
  .option("-e, --extract-table <name>", "Table to write the module to", DEFAULT_EXTRACT_TABLE)
  .option("-S, --statement <name>", "Statement table to extract from (default: statement)")
  .option("-t, --term <id>", "Term ID or label to extract (repeatable)", collect, [])
  .option("-T, --terms <file>", "File of term IDs or labels, one per line")
  .option("-p, --predicate <id>", "Predicate ID or label to include (repeatable)", collect, [])
  .option("-P, --predicates <file>", "File of predicate IDs or labels, one per line")
  .option("-C, --copy <from-to...>", "Copy values of one predicate to another: --copy <from> <to>", [])
  .option("-i, --imports <file>", "TSV or CSV file of terms to import")
  .option("-c, --config <file>", "TSV or CSV file of per-source options")
  .option("-s, --source <name>", "Source to select from --imports and --config")
  .option("-I, --intermediates <policy>", "Intermediate terms to keep: all or none", "all")
  .option("-m, --imported-from <iri>", "IRI of the ontology the terms are imported from")
  .option(
    "-M, --imported-from-property <id>",
    "Predicate for the imported-from annotation",
    DEFAULT_IMPORTED_FROM_PREDICATE
  )
  .option("-n, --no-hierarchy", "Do not assert parents, except override parents")
  .option("--json", "Print the result as JSON")
  .action(extractCommand);

program
  .command("attributes")
  .description("Print predicate values for terms as a table")
  .requiredOption("-d, --database <path>", "SQLite database containing the statement table")
  .option("-S, --statement <name>", "Statement table to read (default: statement)")
  .option("-t, --term <id>", "Term ID (repeatable)", collect, [])
  .option("-T, --terms <file>", "File of term IDs, one per line")
  .option("-p, --predicate <id>", "Predicate ID (repeatable, default: rdfs:label)", collect, [])
  .option("-P, --predicates <file>", "File of predicate IDs, one per line")
  .option("--json", "Print the table as JSON")
  .action(attributesCommand);

// =============================================================================
// Global Error Handling
// =============================================================================

function handleError(error: unknown): void {
  const wrapped = wrapError(error);
  logger.error({ err: wrapped }, "CLI error occurred");
  console.error(chalk.red(`\nError [${wrapped.code}]: ${wrapped.message}`));
  if (process.env.DEBUG) {
    console.error(chalk.dim(wrapped.stack));
  }
  process.exit(1);
}

process.on("unhandledRejection", (reason) => {
  logger.error({ reason }, "Unhandled promise rejection");
  handleError(reason);
});

// =============================================================================
// Parse and Execute
// =============================================================================

program.parseAsync(process.argv).catch(handleError);
