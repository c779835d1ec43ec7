/**
 * RDF/OWL vocabulary used by extraction
 *
 * @module
 */

export const RDF_TYPE = "rdf:type";
export const RDFS_LABEL = "rdfs:label";
export const RDFS_SUBCLASS_OF = "rdfs:subClassOf";
export const RDFS_SUBPROPERTY_OF = "rdfs:subPropertyOf";

/** The only predicates hierarchy edges are read from */
export const HIERARCHY_PREDICATES = [RDFS_SUBCLASS_OF, RDFS_SUBPROPERTY_OF] as const;

/** Never offered as content predicates when no filter is given */
export const STRUCTURAL_PREDICATES = [RDFS_SUBCLASS_OF, RDFS_SUBPROPERTY_OF, RDF_TYPE] as const;

export const OWL_THING = "owl:Thing";
export const OWL_CLASS = "owl:Class";
export const OWL_ANNOTATION_PROPERTY = "owl:AnnotationProperty";
export const OWL_DATATYPE_PROPERTY = "owl:DatatypeProperty";
export const OWL_OBJECT_PROPERTY = "owl:ObjectProperty";
export const OWL_NAMED_INDIVIDUAL = "owl:NamedIndividual";

/**
 * Sentinel every universal-root parent is remapped to. A term whose only
 * parent is the sentinel is its own top ancestor.
 */
export const CLASS_ROOT = OWL_CLASS;

/** Parents remapped to {@link CLASS_ROOT} when a closure is built */
export const UNIVERSAL_ROOTS: ReadonlySet<string> = new Set([OWL_THING]);

/**
 * Property entity types. "owl:DataProperty" is a non-standard spelling found
 * in some databases and is accepted alongside owl:DatatypeProperty.
 */
export const PROPERTY_TYPES: ReadonlySet<string> = new Set([
  OWL_ANNOTATION_PROPERTY,
  OWL_DATATYPE_PROPERTY,
  "owl:DataProperty",
  OWL_OBJECT_PROPERTY,
]);

/** rdf:type objects copied as declarations into a module */
export const ENTITY_TYPES: ReadonlySet<string> = new Set([
  OWL_CLASS,
  ...PROPERTY_TYPES,
  OWL_NAMED_INDIVIDUAL,
]);

export const DATATYPE_IRI = "_IRI";
export const DATATYPE_JSON = "_JSON";

/** Prefixes whose terms are never expected inside a module */
export const BUILTIN_PREFIXES: ReadonlySet<string> = new Set(["owl", "rdf", "rdfs", "xsd"]);

export const DEFAULT_IMPORTED_FROM_PREDICATE = "IAO:0000412";

/** Graph name on rows the synthesizer creates rather than copies */
export const MODULE_GRAPH = "graph";

/**
 * Prefix of a compact identifier, or null for bracketed IRIs
 */
export function prefixOf(id: string): string | null {
  if (id.startsWith("<")) return null;
  const colon = id.indexOf(":");
  return colon > 0 ? id.slice(0, colon) : null;
}

export function isBuiltinTerm(id: string): boolean {
  const prefix = prefixOf(id);
  return prefix !== null && BUILTIN_PREFIXES.has(prefix);
}
