/**
 * extract command - Build a module from seed terms and write it to a table
 */

import chalk from "chalk";
import ora from "ora";
import { ConfigError, ErrorCode } from "../../core/errors.js";
import type { IFactStore } from "../../core/interfaces/IFactStore.js";
import { createFactStore } from "../../core/store/index.js";
import {
  ExtractionOrchestrator,
  type ExtractionPhase,
  type ExtractionResult,
} from "../../core/extraction/orchestrator.js";
import { loadImportTerms, loadSourceOptions } from "../../core/extraction/sources.js";
import { DEFAULT_IMPORTED_FROM_PREDICATE } from "../../core/vocabulary.js";
import {
  type ModuleSpecInput,
  type SeedInput,
  buildModuleSpec,
} from "../../utils/validation.js";
import { createLogger, loadEngineSettings, readTermsFile } from "../../utils/index.js";

const logger = createLogger("extract");

export interface ExtractCommandOptions {
  database: string;
  extractTable: string;
  statement?: string;
  term: string[];
  terms?: string;
  predicate: string[];
  predicates?: string;
  /** Flattened from/to pairs */
  copy: string[];
  imports?: string;
  config?: string;
  source?: string;
  intermediates: string;
  importedFrom?: string;
  importedFromProperty: string;
  /** False with --no-hierarchy */
  hierarchy: boolean;
  json?: boolean;
}

const PHASE_TEXT: Record<ExtractionPhase, string> = {
  Idle: "Starting...",
  ResolvingSeeds: "Resolving seed terms...",
  ExpandingRelated: "Expanding related terms...",
  AssigningParents: "Assigning parents...",
  SynthesizingStatements: "Writing module...",
  Done: "Finishing...",
  CleaningUp: "Cleaning up...",
};

/**
 * Pair up the values of repeated `--copy <from> <to>` options
 */
export function parseCopyPairs(values: readonly string[]): { from: string; to: string }[] {
  if (values.length % 2 !== 0) {
    throw new ConfigError(
      `--copy takes a 'from' and a 'to' predicate, got: ${values.join(" ")}`,
      ErrorCode.CONFIG_INVALID
    );
  }
  const pairs: { from: string; to: string }[] = [];
  for (let i = 0; i < values.length; i += 2) {
    const from = values[i];
    const to = values[i + 1];
    if (from !== undefined && to !== undefined) pairs.push({ from, to });
  }
  return pairs;
}

/**
 * Gather terms, predicates and per-source options into module input.
 * Terms named with --term/--terms take the "ancestors" directive unless the
 * hierarchy is suppressed, and replace import rows with the same id.
 */
export async function buildExtractInput(options: ExtractCommandOptions): Promise<ModuleSpecInput> {
  const seeds: SeedInput[] = options.imports
    ? await loadImportTerms(options.imports, options.source)
    : [];

  const terms = [...options.term, ...(options.terms ? await readTermsFile(options.terms) : [])];
  for (const id of terms) {
    seeds.push({ id, related: options.hierarchy ? "ancestors" : null });
  }
  if (seeds.length === 0) {
    throw new ConfigError(
      "One or more term(s) must be specified with --term, --terms, or --imports",
      ErrorCode.CONFIG_EMPTY_SEEDS
    );
  }

  const predicates = [
    ...options.predicate,
    ...(options.predicates ? await readTermsFile(options.predicates) : []),
  ];
  let intermediates = options.intermediates;
  let importedFrom = options.importedFrom;

  if (options.config) {
    if (!options.source) {
      throw new ConfigError(
        "A --source is required when using the --config option",
        ErrorCode.CONFIG_SOURCE_NOT_FOUND
      );
    }
    const sourceOptions = await loadSourceOptions(options.config, options.source);
    intermediates = sourceOptions.intermediates ?? "all";
    predicates.push(...sourceOptions.predicates);
    importedFrom = sourceOptions.importedFrom;
  }

  return {
    seeds,
    predicates: predicates.length > 0 ? predicates : undefined,
    intermediates,
    noHierarchy: !options.hierarchy,
    copy: parseCopyPairs(options.copy),
    importedFrom,
    importedFromPredicate: options.importedFromProperty || DEFAULT_IMPORTED_FROM_PREDICATE,
  };
}

function printSummary(result: ExtractionResult): void {
  console.log();
  console.log(chalk.white.bold("Module"));
  console.log(`  Table:        ${chalk.cyan(result.extractTable)}`);
  console.log(`  Terms:        ${result.terms.length}`);
  console.log(`  Predicates:   ${result.predicates.length}`);
  console.log(`  Edges:        ${result.edges}`);
  console.log(`  Facts:        ${result.facts}`);
  console.log(`  Duration:     ${(result.durationMs / 1000).toFixed(2)}s`);

  const dropped = [...result.unresolved.seeds, ...result.unresolved.predicates];
  if (dropped.length > 0) {
    console.log();
    console.log(chalk.yellow.bold(`Not found (${dropped.length})`));
    for (const input of dropped.slice(0, 10)) {
      console.log(`  ${chalk.yellow("!")} ${input}`);
    }
    if (dropped.length > 10) {
      console.log(chalk.dim(`  ... and ${dropped.length - 10} more`));
    }
  }
  console.log();
}

/**
 * Extract a module into the output table
 */
export async function extractCommand(options: ExtractCommandOptions): Promise<void> {
  logger.debug({ options }, "Running extract");

  const settings = loadEngineSettings();
  const spec = buildModuleSpec(await buildExtractInput(options));

  const spinner = ora({ text: "Opening database...", isSilent: options.json === true }).start();
  let store: IFactStore | undefined;

  try {
    store = await createFactStore({
      path: options.database,
      statementTable: options.statement ?? settings.statementTable,
      maxSqlVars: settings.maxSqlVars,
    });
    const orchestrator = new ExtractionOrchestrator(store);
    const result = await orchestrator.extract(spec, {
      extractTable: options.extractTable,
      onPhase: (phase) => {
        spinner.text = PHASE_TEXT[phase];
      },
    });
    spinner.succeed(chalk.green(`Extracted ${result.terms.length} terms`));

    if (options.json) {
      console.log(JSON.stringify(result, null, 2));
    } else {
      printSummary(result);
    }
  } catch (error) {
    spinner.fail(chalk.red("Extraction failed"));
    throw error;
  } finally {
    await store?.close();
  }
}
