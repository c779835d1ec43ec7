/**
 * ontomod - extract self-contained modules from an ontology fact table
 *
 * @example
 * ```typescript
 * import { ExtractionOrchestrator, buildModuleSpec, createFactStore } from "ontomod";
 *
 * const store = await createFactStore({ path: "ontology.db" });
 * const spec = buildModuleSpec({ seeds: [{ id: "EX:0001", related: "ancestors" }] });
 * const result = await new ExtractionOrchestrator(store).extract(spec);
 * await store.close();
 * ```
 *
 * @module
 */

export * from "./core/index.js";
export {
  buildModuleSpec,
  parseRelatedDirectives,
  parseIntermediates,
  ModuleSpecInputSchema,
  EngineSettingsSchema,
  type ModuleSpecInput,
  type SeedInput,
  type EngineSettings,
} from "./utils/validation.js";
export { loadEngineSettings, readTermsFile, parseTermLines, createLogger } from "./utils/index.js";
