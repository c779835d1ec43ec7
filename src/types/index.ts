/**
 * Shared types for ontomod
 */

// =============================================================================
// Facts
// =============================================================================

/**
 * Compact term identifier: "prefix:local" or a bracketed absolute "<iri>"
 */
export type TermId = string;

/**
 * One row of a statement table (the 8-field fact schema).
 *
 * `datatype` discriminates the object: `_IRI` for an identifier, `_JSON` for a
 * nested structure, anything else (`_plain`, `@en`, `xsd:string`, ...) for a
 * literal. `annotation` holds the JSON text of the reified qualifiers exactly
 * as stored; it is copied, never parsed.
 */
export interface Fact {
  assertion: number;
  retraction: number;
  graph: string;
  subject: TermId;
  predicate: TermId;
  object: string;
  datatype: string;
  annotation: string | null;
}

/**
 * A single hierarchy edge taken from rdfs:subClassOf / rdfs:subPropertyOf
 */
export interface HierarchyEdge {
  child: TermId;
  parent: TermId;
}

// =============================================================================
// Module Specification
// =============================================================================

/**
 * Extra terms to pull in around a seed
 */
export type RelatedDirective = "ancestors" | "descendants" | "parents" | "children";

/**
 * How much of an ancestor/descendant chain to keep
 */
export type IntermediatesPolicy = "all" | "none";

/**
 * A caller-selected term
 */
export interface SeedTerm {
  id: TermId;
  /** Asserted as the only parent; skips hierarchy computation */
  overrideParent?: TermId;
  /** Empty when the seed pulls in nothing else */
  related: RelatedDirective[];
}

/**
 * (from, to) pair: duplicate every `from` value under `to`
 */
export interface PredicateCopy {
  from: TermId;
  to: TermId;
}

/**
 * Immutable description of one extraction run
 */
export interface ModuleSpec {
  /** Keyed by the caller-supplied identifier or label */
  readonly seeds: ReadonlyMap<string, SeedTerm>;
  /** Undefined means every predicate except the structural ones */
  readonly predicates?: readonly string[];
  readonly intermediates: IntermediatesPolicy;
  readonly suppressHierarchy: boolean;
  readonly copyPredicates: readonly PredicateCopy[];
  readonly importedFrom?: string;
  readonly importedFromPredicate: TermId;
}

// =============================================================================
// Identifier Resolution
// =============================================================================

/**
 * What an identifier-or-label is resolved against
 */
export type IdKind = "subject" | "predicate";

/**
 * Candidates found for one caller input, in store order
 */
export interface IdResolution {
  input: string;
  ids: TermId[];
  /** True when the candidates came from a label match */
  viaLabel: boolean;
}
