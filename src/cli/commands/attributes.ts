/**
 * attributes command - Tabulate predicate values for a list of terms
 */

import chalk from "chalk";
import { ConfigError, ErrorCode } from "../../core/errors.js";
import type { IFactStore } from "../../core/interfaces/IFactStore.js";
import { createFactStore } from "../../core/store/index.js";
import { HierarchyResolver } from "../../core/hierarchy/resolver.js";
import { type AttributeTable, ModuleSynthesizer } from "../../core/extraction/synthesizer.js";
import { RDFS_LABEL } from "../../core/vocabulary.js";
import { createLogger, loadEngineSettings, readTermsFile } from "../../utils/index.js";

const logger = createLogger("attributes");

export interface AttributesCommandOptions {
  database: string;
  statement?: string;
  term: string[];
  terms?: string;
  predicate: string[];
  predicates?: string;
  json?: boolean;
}

/**
 * Tab-separated rendering: one row per term, one column per predicate,
 * multiple values joined with "|"
 */
export function formatAttributeTable(table: AttributeTable, predicates: readonly string[]): string {
  const lines = [["ID", ...predicates].join("\t")];
  for (const [term, values] of table) {
    const cells = predicates.map((predicate) =>
      (values.get(predicate) ?? []).map((value) => value.object).join("|")
    );
    lines.push([term, ...cells].join("\t"));
  }
  return lines.join("\n");
}

export async function attributesCommand(options: AttributesCommandOptions): Promise<void> {
  const terms = [...options.term, ...(options.terms ? await readTermsFile(options.terms) : [])];
  if (terms.length === 0) {
    throw new ConfigError(
      "One or more term(s) must be specified with --term or --terms",
      ErrorCode.CONFIG_EMPTY_SEEDS
    );
  }
  const requested = [
    ...options.predicate,
    ...(options.predicates ? await readTermsFile(options.predicates) : []),
  ];
  const predicates = requested.length > 0 ? requested : [RDFS_LABEL];

  const settings = loadEngineSettings();
  let store: IFactStore | undefined;
  try {
    store = await createFactStore({
      path: options.database,
      statementTable: options.statement ?? settings.statementTable,
      maxSqlVars: settings.maxSqlVars,
      readonly: true,
    });
    const synthesizer = new ModuleSynthesizer(store, new HierarchyResolver(store));
    const table = await synthesizer.tabulateAttributes(terms, predicates);
    logger.debug({ terms: table.size, predicates: predicates.length }, "Attributes tabulated");

    if (options.json) {
      const plain = Object.fromEntries(
        [...table].map(([term, values]) => [term, Object.fromEntries(values)])
      );
      console.log(JSON.stringify(plain, null, 2));
    } else {
      console.log(formatAttributeTable(table, predicates));
    }
  } catch (error) {
    console.error(chalk.red("Failed to read attributes"));
    throw error;
  } finally {
    await store?.close();
  }
}
