/**
 * Module Extraction
 *
 * Expansion of seeds into a working set, parent assignment and synthesis of
 * the output module, sequenced by the orchestrator.
 *
 * @module
 */

export { WorkingTermSet, PredicateSet } from "./working-set.js";
export { RelatedEntityExpander } from "./expander.js";
export {
  ModuleSynthesizer,
  referencedIris,
  type SynthesisInput,
  type AttributeValue,
  type AttributeTable,
} from "./synthesizer.js";
export {
  ExtractionOrchestrator,
  DEFAULT_EXTRACT_TABLE,
  type ExtractionPhase,
  type ExtractOptions,
  type ExtractionResult,
  type UnresolvedInputs,
} from "./orchestrator.js";
export { loadImportTerms, loadSourceOptions, type SourceOptions } from "./sources.js";
