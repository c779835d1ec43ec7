/**
 * Module Synthesizer
 *
 * Assigns parent edges to the working terms and emits the module's facts.
 *
 * Emission runs in a fixed rule order:
 * 1. entity type declarations of working terms
 * 2. rdfs:subPropertyOf edges for property children
 * 3. rdfs:subClassOf edges for class children
 * 4. rdf:type edges for every other child (instances)
 * 5. literal values on filtered predicates
 * 6. IRI and structured values whose references stay inside the module
 * 7. IRI values on declared annotation properties
 * 8. imported-from stamps
 * 9. predicate copies
 *
 * Within a rule rows are sorted; a row identical to one already emitted is
 * skipped.
 *
 * @module
 */

import type { IFactStore } from "../interfaces/IFactStore.js";
import type {
  Fact,
  HierarchyEdge,
  ModuleSpec,
  SeedTerm,
  TermId,
} from "../../types/index.js";
import type { HierarchyResolver } from "../hierarchy/resolver.js";
import { nearestFrontierAncestors } from "../hierarchy/frontier.js";
import type { AdjacencyMap } from "../hierarchy/closure.js";
import {
  DATATYPE_IRI,
  DATATYPE_JSON,
  ENTITY_TYPES,
  MODULE_GRAPH,
  OWL_ANNOTATION_PROPERTY,
  OWL_CLASS,
  PROPERTY_TYPES,
  RDFS_SUBCLASS_OF,
  RDFS_SUBPROPERTY_OF,
  RDF_TYPE,
  isBuiltinTerm,
} from "../vocabulary.js";
import type { PredicateSet, WorkingTermSet } from "./working-set.js";
import { type Logger, createLogger } from "../../utils/logger.js";

// =============================================================================
// Types
// =============================================================================

export interface SynthesisInput {
  terms: WorkingTermSet;
  edges: readonly HierarchyEdge[];
  predicates: PredicateSet;
  spec: Pick<ModuleSpec, "copyPredicates" | "importedFrom" | "importedFromPredicate">;
}

/**
 * One value of one predicate, as shown in an attribute table
 */
export interface AttributeValue {
  object: string;
  datatype: string;
}

/**
 * term -> predicate -> values. Every requested predicate is a key for every
 * term, with an empty list when the term has no value for it.
 */
export type AttributeTable = Map<TermId, Map<TermId, AttributeValue[]>>;

// =============================================================================
// Helpers
// =============================================================================

function factKey(fact: Fact): string {
  return JSON.stringify([
    fact.assertion,
    fact.retraction,
    fact.graph,
    fact.subject,
    fact.predicate,
    fact.object,
    fact.datatype,
    fact.annotation,
  ]);
}

function compareFacts(a: Fact, b: Fact): number {
  return (
    compareText(a.subject, b.subject) ||
    compareText(a.predicate, b.predicate) ||
    compareText(a.object, b.object) ||
    compareText(a.datatype, b.datatype)
  );
}

function compareText(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * A row the synthesizer creates rather than copies
 */
function iriFact(subject: TermId, predicate: TermId, object: string): Fact {
  return {
    assertion: 1,
    retraction: 0,
    graph: MODULE_GRAPH,
    subject,
    predicate,
    object,
    datatype: DATATYPE_IRI,
    annotation: null,
  };
}

/**
 * IRIs referenced inside a structured (_JSON) object: every `object` whose
 * sibling `datatype` is `_IRI`, at any depth. Null when the text is not JSON.
 */
export function referencedIris(json: string): string[] | null {
  let value: unknown;
  try {
    value = JSON.parse(json);
  } catch {
    return null;
  }
  const found: string[] = [];
  const visit = (node: unknown): void => {
    if (Array.isArray(node)) {
      node.forEach(visit);
      return;
    }
    if (typeof node !== "object" || node === null) return;
    const entries = Object.entries(node);
    const datatype = entries.find(([key]) => key === "datatype")?.[1];
    const object = entries.find(([key]) => key === "object")?.[1];
    if (datatype === DATATYPE_IRI && typeof object === "string") {
      found.push(object);
    }
    for (const [, child] of entries) visit(child);
  };
  visit(value);
  return found;
}

/**
 * Accumulates rows rule by rule, keeping the first copy of any exact duplicate
 */
class FactAccumulator {
  readonly facts: Fact[] = [];
  private readonly seen = new Set<string>();
  readonly counts: number[] = [];

  emitRule(rows: Fact[]): void {
    let emitted = 0;
    for (const fact of [...rows].sort(compareFacts)) {
      const key = factKey(fact);
      if (this.seen.has(key)) continue;
      this.seen.add(key);
      this.facts.push(fact);
      emitted++;
    }
    this.counts.push(emitted);
  }
}

// =============================================================================
// Synthesizer
// =============================================================================

export class ModuleSynthesizer {
  private readonly logger: Logger;

  constructor(
    private readonly store: IFactStore,
    private readonly resolver: HierarchyResolver,
    logger?: Logger
  ) {
    this.logger = logger ?? createLogger("synthesizer");
  }

  /**
   * Parent edges for every working term. An override parent is asserted as
   * the only parent, even when the hierarchy is suppressed. Otherwise the
   * nearest working-set ancestors become the parents, skipping any that do
   * not survive the intersection. Self edges are never returned.
   */
  async assignParents(
    terms: WorkingTermSet,
    seeds: ReadonlyMap<TermId, SeedTerm>,
    suppressHierarchy: boolean
  ): Promise<HierarchyEdge[]> {
    const ordered = terms.sorted();
    const computed = suppressHierarchy
      ? []
      : ordered.filter((term) => seeds.get(term)?.overrideParent === undefined);

    const closure: AdjacencyMap =
      computed.length > 0 ? await this.resolver.ancestorsOf(computed) : new Map();
    const frontier = terms.asSet();
    const edges: HierarchyEdge[] = [];

    for (const term of ordered) {
      const override = seeds.get(term)?.overrideParent;
      if (override !== undefined) {
        if (override !== term) edges.push({ child: term, parent: override });
        continue;
      }
      if (suppressHierarchy) continue;

      const parents = [...nearestFrontierAncestors(closure, term, frontier)]
        .filter((parent) => parent !== term && frontier.has(parent))
        .sort();
      for (const parent of parents) {
        edges.push({ child: term, parent });
      }
    }

    this.logger.debug({ terms: ordered.length, edges: edges.length }, "Parents assigned");
    return edges;
  }

  /**
   * Emit the module's facts in rule order
   */
  async synthesize(input: SynthesisInput): Promise<Fact[]> {
    const { terms, edges, predicates, spec } = input;
    const subjects = terms.sorted();
    const out = new FactAccumulator();

    // 1. type declarations
    const typeFacts = await this.store.rawFactsFiltered(subjects, [RDF_TYPE]);
    const classes = new Set<TermId>();
    const properties = new Set<TermId>();
    for (const fact of typeFacts) {
      if (fact.object === OWL_CLASS) classes.add(fact.subject);
      if (PROPERTY_TYPES.has(fact.object)) properties.add(fact.subject);
    }
    out.emitRule(typeFacts.filter((fact) => ENTITY_TYPES.has(fact.object)));

    // 2-4. hierarchy
    out.emitRule(
      edges
        .filter((edge) => properties.has(edge.child))
        .map((edge) => iriFact(edge.child, RDFS_SUBPROPERTY_OF, edge.parent))
    );
    out.emitRule(
      edges
        .filter((edge) => classes.has(edge.child))
        .map((edge) => iriFact(edge.child, RDFS_SUBCLASS_OF, edge.parent))
    );
    out.emitRule(
      edges
        .filter((edge) => !classes.has(edge.child) && !properties.has(edge.child))
        .map((edge) => iriFact(edge.child, RDF_TYPE, edge.parent))
    );

    // 5-7. content on filtered predicates
    const content =
      predicates.size > 0 ? await this.store.rawFactsFiltered(subjects, predicates.toArray()) : [];

    out.emitRule(
      content.filter((fact) => fact.datatype !== DATATYPE_IRI && fact.datatype !== DATATYPE_JSON)
    );
    out.emitRule(content.filter((fact) => this.staysInside(fact, terms)));

    const iriValued = content.filter((fact) => fact.datatype === DATATYPE_IRI);
    const annotationProperties = await this.annotationProperties(iriValued);
    out.emitRule(
      iriValued
        .filter((fact) => annotationProperties.has(fact.predicate))
        .map((fact) => iriFact(fact.subject, fact.predicate, fact.object))
    );

    // 8. imported-from
    if (spec.importedFrom) {
      const source = spec.importedFrom.startsWith("<")
        ? spec.importedFrom
        : `<${spec.importedFrom}>`;
      out.emitRule(subjects.map((term) => iriFact(term, spec.importedFromPredicate, source)));
    } else {
      out.emitRule([]);
    }

    // 9. predicate copies, in caller order
    for (const { from, to } of spec.copyPredicates) {
      const values = await this.store.rawFactsFiltered(subjects, [from]);
      out.emitRule(
        values.map((fact) => ({
          assertion: fact.assertion,
          retraction: 0,
          graph: fact.graph,
          subject: fact.subject,
          predicate: to,
          object: fact.object,
          datatype: fact.datatype,
          annotation: null,
        }))
      );
    }

    this.logger.debug({ rules: out.counts, facts: out.facts.length }, "Module synthesized");
    return out.facts;
  }

  /**
   * term -> predicate -> values for the given predicates
   */
  async tabulateAttributes(
    terms: readonly TermId[],
    predicates: readonly TermId[]
  ): Promise<AttributeTable> {
    const table: AttributeTable = new Map();
    const ordered = [...new Set(terms)].sort();
    for (const term of ordered) {
      table.set(
        term,
        new Map(predicates.map((predicate): [TermId, AttributeValue[]] => [predicate, []]))
      );
    }
    if (ordered.length === 0 || predicates.length === 0) return table;

    for (const fact of await this.store.rawFactsFiltered(ordered, predicates)) {
      table.get(fact.subject)?.get(fact.predicate)?.push({
        object: fact.object,
        datatype: fact.datatype,
      });
    }
    return table;
  }

  /**
   * Rule 6: an IRI value must be a working term; a structured value must only
   * reference working terms or built-in vocabulary
   */
  private staysInside(fact: Fact, terms: WorkingTermSet): boolean {
    if (fact.datatype === DATATYPE_IRI) return terms.has(fact.object);
    if (fact.datatype !== DATATYPE_JSON) return false;

    const iris = referencedIris(fact.object);
    if (iris === null) {
      this.logger.debug(
        { subject: fact.subject, predicate: fact.predicate },
        "Unparseable structured value skipped"
      );
      return false;
    }
    return iris.every((iri) => isBuiltinTerm(iri) || terms.has(iri));
  }

  private async annotationProperties(facts: readonly Fact[]): Promise<Set<TermId>> {
    const candidates = [...new Set(facts.map((fact) => fact.predicate))];
    const declared = new Set<TermId>();
    if (candidates.length === 0) return declared;
    for (const fact of await this.store.rawFactsFiltered(candidates, [RDF_TYPE])) {
      if (fact.object === OWL_ANNOTATION_PROPERTY) declared.add(fact.subject);
    }
    return declared;
  }
}
