/**
 * Extraction Orchestrator
 *
 * Runs one extraction from a ModuleSpec to a written module:
 *
 *   Idle -> ResolvingSeeds -> ExpandingRelated -> AssigningParents
 *        -> SynthesizingStatements -> Done -> CleaningUp
 *
 * CleaningUp is entered from whatever phase is current when a run fails.
 * All working state belongs to the run, so concurrent runs against separate
 * output tables do not interfere.
 *
 * @module
 */

import { randomUUID } from "node:crypto";
import type { IFactStore } from "../interfaces/IFactStore.js";
import type { IdKind, ModuleSpec, SeedTerm, TermId } from "../../types/index.js";
import { ErrorCode, LookupError } from "../errors.js";
import { type Result, err, ok, partition } from "../../types/result.js";
import { HierarchyResolver } from "../hierarchy/resolver.js";
import { STRUCTURAL_PREDICATES } from "../vocabulary.js";
import type { PrefixRegistry } from "../store/prefixes.js";
import { quoteTable } from "../store/schema.js";
import { type Logger, createChildLogger, createLogger } from "../../utils/logger.js";
import { RelatedEntityExpander } from "./expander.js";
import { ModuleSynthesizer } from "./synthesizer.js";
import { PredicateSet, WorkingTermSet } from "./working-set.js";

const logger = createLogger("extraction");

// =============================================================================
// Types
// =============================================================================

export type ExtractionPhase =
  | "Idle"
  | "ResolvingSeeds"
  | "ExpandingRelated"
  | "AssigningParents"
  | "SynthesizingStatements"
  | "Done"
  | "CleaningUp";

export interface ExtractOptions {
  /** Output table; replaced in full (default "extract") */
  extractTable?: string;
  /** Called on every phase transition */
  onPhase?: (phase: ExtractionPhase) => void;
}

export interface UnresolvedInputs {
  seeds: string[];
  predicates: string[];
}

export interface ExtractionResult {
  runId: string;
  extractTable: string;
  /** Working terms, sorted */
  terms: TermId[];
  /** Content predicates, in caller order */
  predicates: TermId[];
  /** Number of facts written */
  facts: number;
  /** Hierarchy edges asserted */
  edges: number;
  unresolved: UnresolvedInputs;
  /** Phases entered, in order */
  phases: ExtractionPhase[];
  durationMs: number;
}

export const DEFAULT_EXTRACT_TABLE = "extract";

// =============================================================================
// Run
// =============================================================================

/**
 * State of one run. Discarded when the run ends.
 */
class ExtractionRun {
  readonly id = randomUUID();
  readonly terms = new WorkingTermSet();
  readonly predicates = new PredicateSet();
  readonly phases: ExtractionPhase[] = [];
  readonly unresolved: UnresolvedInputs = { seeds: [], predicates: [] };
  readonly resolver: HierarchyResolver;
  readonly log: Logger;
  phase: ExtractionPhase = "Idle";

  constructor(
    store: IFactStore,
    readonly extractTable: string,
    private readonly onPhase?: (phase: ExtractionPhase) => void
  ) {
    this.resolver = new HierarchyResolver(store);
    this.log = createChildLogger(logger, { runId: this.id, extractTable });
  }

  enter(phase: ExtractionPhase): void {
    this.log.debug({ from: this.phase, to: phase }, "Phase transition");
    this.phase = phase;
    this.phases.push(phase);
    this.onPhase?.(phase);
  }

  release(): void {
    this.terms.clear();
    this.predicates.clear();
    this.resolver.release();
  }
}

// =============================================================================
// Orchestrator
// =============================================================================

/**
 * Sequences seed resolution, expansion, parent assignment and synthesis
 * against one fact store.
 *
 * @example
 * ```typescript
 * const orchestrator = new ExtractionOrchestrator(store);
 * const spec = buildModuleSpec({ seeds: [{ id: "EX:0001", related: "ancestors" }] });
 * const result = await orchestrator.extract(spec, { extractTable: "assay_module" });
 * console.log(`${result.facts} facts for ${result.terms.length} terms`);
 * ```
 */
export class ExtractionOrchestrator {
  constructor(private readonly store: IFactStore) {}

  /**
   * @throws {ConfigError} on an invalid table name or an unknown directive
   * @throws {LookupError} when no seed (or no filtered predicate) resolves,
   *   or a label is ambiguous
   * @throws {StoreError} on any store failure
   */
  async extract(spec: ModuleSpec, options: ExtractOptions = {}): Promise<ExtractionResult> {
    const extractTable = options.extractTable ?? DEFAULT_EXTRACT_TABLE;
    quoteTable(extractTable);

    const startTime = Date.now();
    const run = new ExtractionRun(this.store, extractTable, options.onPhase);
    const expander = new RelatedEntityExpander(this.store, run.resolver, run.log);
    const synthesizer = new ModuleSynthesizer(this.store, run.resolver, run.log);

    try {
      run.enter("ResolvingSeeds");
      const prefixes = await this.store.getPrefixes();
      const seeds = await this.resolveSeeds(spec, prefixes, run);
      run.terms.merge([...seeds.keys()]);
      await this.resolvePredicates(spec, prefixes, run);

      run.enter("ExpandingRelated");
      const added = run.terms.merge(await expander.expand(seeds, spec.intermediates));
      run.log.debug({ seeds: seeds.size, added }, "Working set expanded");

      run.enter("AssigningParents");
      const edges = await synthesizer.assignParents(run.terms, seeds, spec.suppressHierarchy);

      run.enter("SynthesizingStatements");
      const facts = await synthesizer.synthesize({
        terms: run.terms,
        edges,
        predicates: run.predicates,
        spec,
      });
      await this.store.replaceModule(extractTable, facts);

      run.enter("Done");
      const result: ExtractionResult = {
        runId: run.id,
        extractTable,
        terms: run.terms.sorted(),
        predicates: run.predicates.toArray(),
        facts: facts.length,
        edges: edges.length,
        unresolved: run.unresolved,
        phases: run.phases,
        durationMs: Date.now() - startTime,
      };
      run.log.info(
        {
          terms: result.terms.length,
          facts: result.facts,
          edges: result.edges,
          ...run.resolver.getStats(),
          durationMs: result.durationMs,
        },
        "Extraction complete"
      );
      return result;
    } catch (error) {
      run.log.error({ err: error, phase: run.phase }, "Extraction failed");
      throw error;
    } finally {
      run.enter("CleaningUp");
      run.release();
    }
  }

  /**
   * Resolved id -> seed. Unresolved inputs are dropped and reported.
   */
  private async resolveSeeds(
    spec: ModuleSpec,
    prefixes: PrefixRegistry,
    run: ExtractionRun
  ): Promise<Map<TermId, SeedTerm>> {
    const inputs = [...spec.seeds.keys()];
    const resolved = await this.resolve(inputs, "subject", prefixes);

    const seeds = new Map<TermId, SeedTerm>();
    inputs.forEach((input, index) => {
      const seed = spec.seeds.get(input);
      const outcome = resolved[index];
      if (seed === undefined || outcome === undefined) return;
      if (!outcome.ok) {
        run.unresolved.seeds.push(outcome.error);
        return;
      }
      const term: SeedTerm = { id: outcome.value, related: seed.related };
      if (seed.overrideParent !== undefined) {
        term.overrideParent = this.normalize(seed.overrideParent, prefixes);
      }
      seeds.set(outcome.value, term);
    });

    if (run.unresolved.seeds.length > 0) {
      run.log.warn({ unresolved: run.unresolved.seeds }, "Dropping seeds that do not resolve");
    }
    if (seeds.size === 0) {
      throw new LookupError(
        `None of the seed terms could be found: ${inputs.join(", ")}`,
        ErrorCode.LOOKUP_NO_SEEDS_RESOLVED,
        { inputs }
      );
    }
    return seeds;
  }

  private async resolvePredicates(
    spec: ModuleSpec,
    prefixes: PrefixRegistry,
    run: ExtractionRun
  ): Promise<void> {
    if (spec.predicates === undefined) {
      for (const predicate of await this.store.listPredicates(STRUCTURAL_PREDICATES)) {
        run.predicates.add(predicate);
      }
      return;
    }

    const inputs = [...spec.predicates];
    const { oks, errs } = partition(await this.resolve(inputs, "predicate", prefixes));
    for (const id of oks) run.predicates.add(id);
    run.unresolved.predicates.push(...errs);

    if (run.unresolved.predicates.length > 0) {
      run.log.warn(
        { unresolved: run.unresolved.predicates },
        "Dropping predicates that do not resolve"
      );
    }
    if (run.predicates.size === 0) {
      throw new LookupError(
        `None of the predicates could be found: ${inputs.join(", ")}`,
        ErrorCode.LOOKUP_NO_PREDICATES_RESOLVED,
        { inputs }
      );
    }
  }

  /**
   * One outcome per input: the resolved id, or the input itself when nothing
   * matches
   *
   * @throws {LookupError} when a label names more than one term
   */
  private async resolve(
    inputs: readonly string[],
    kind: IdKind,
    prefixes: PrefixRegistry
  ): Promise<Result<TermId, string>[]> {
    const normalized = inputs.map((input) => this.normalize(input, prefixes));
    const resolutions = await this.store.resolveIds(normalized, kind);

    return resolutions.map((resolution, index) => {
      const input = inputs[index] ?? resolution.input;
      const [first, ...rest] = resolution.ids;
      if (first === undefined) return err(input);
      if (resolution.viaLabel && rest.length > 0) {
        throw new LookupError(
          `Label '${input}' matches more than one term: ${resolution.ids.join(", ")}`,
          ErrorCode.LOOKUP_AMBIGUOUS_LABEL,
          { inputs: [input], candidates: resolution.ids }
        );
      }
      return ok(first);
    });
  }

  /**
   * Bracketed absolute IRIs are compacted when a registered prefix covers them
   */
  private normalize(input: string, prefixes: PrefixRegistry): string {
    if (prefixes.size === 0 || !input.startsWith("<") || !input.endsWith(">")) return input;
    return prefixes.compact(input);
  }
}
