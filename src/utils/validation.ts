/**
 * Runtime Validation Schemas
 *
 * Zod schemas for caller input and engine settings. Caller-facing failures
 * surface as ConfigError.
 *
 * @module
 */

import { z } from "zod";
import { ConfigError, ErrorCode } from "../core/errors.js";
import { DEFAULT_IMPORTED_FROM_PREDICATE } from "../core/vocabulary.js";
import type {
  IntermediatesPolicy,
  ModuleSpec,
  RelatedDirective,
  SeedTerm,
} from "../types/index.js";

// =============================================================================
// Identifiers
// =============================================================================

/**
 * Plain SQL identifier; anything else would need quoting rules we don't trust
 * user input with
 */
export const TABLE_NAME_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/;

export const TableNameSchema = z
  .string()
  .regex(TABLE_NAME_PATTERN, "must be a plain identifier (letters, digits, underscore)");

export function isValidTableName(name: string): boolean {
  return TABLE_NAME_PATTERN.test(name);
}

// =============================================================================
// Directives & Policies
// =============================================================================

export const RelatedDirectiveSchema = z.enum(["ancestors", "descendants", "parents", "children"]);

export const IntermediatesSchema = z.enum(["all", "none"]);

/**
 * Split a related cell into directives. Several keywords may be given,
 * separated by whitespace; blank or missing means none.
 *
 * @throws {ConfigError} on an unknown keyword
 */
export function parseRelatedDirectives(value: string | null | undefined): RelatedDirective[] {
  if (!value) return [];
  const directives: RelatedDirective[] = [];
  for (const word of value.trim().split(/\s+/)) {
    if (word === "") continue;
    const parsed = RelatedDirectiveSchema.safeParse(word.toLowerCase());
    if (!parsed.success) {
      throw new ConfigError(
        `Unknown 'related' keyword for term: '${word}'`,
        ErrorCode.CONFIG_UNKNOWN_DIRECTIVE,
        { value }
      );
    }
    if (!directives.includes(parsed.data)) directives.push(parsed.data);
  }
  return directives;
}

/**
 * Case-insensitive intermediates policy
 *
 * @throws {ConfigError} when neither "all" nor "none"
 */
export function parseIntermediates(value: string | null | undefined): IntermediatesPolicy {
  if (value === null || value === undefined || value.trim() === "") return "all";
  const parsed = IntermediatesSchema.safeParse(value.trim().toLowerCase());
  if (!parsed.success) {
    throw new ConfigError(
      `Unknown 'intermediates' option: '${value}'`,
      ErrorCode.CONFIG_UNKNOWN_INTERMEDIATES,
      { value }
    );
  }
  return parsed.data;
}

// =============================================================================
// Module Specification
// =============================================================================

/**
 * One seed as a caller supplies it: directives still a raw string
 */
export const SeedInputSchema = z.object({
  id: z.string().trim().min(1),
  /** Override parent */
  parent: z.string().trim().nullish(),
  /** Whitespace-separated related directives */
  related: z.string().nullish(),
});

export type SeedInput = z.infer<typeof SeedInputSchema>;

export const PredicateCopySchema = z.object({
  from: z.string().trim().min(1),
  to: z.string().trim().min(1),
});

export const ModuleSpecInputSchema = z.object({
  seeds: z.array(SeedInputSchema),
  predicates: z.array(z.string().trim().min(1)).optional(),
  intermediates: z.string().optional(),
  noHierarchy: z.boolean().default(false),
  copy: z.array(PredicateCopySchema).default([]),
  importedFrom: z.string().trim().min(1).optional(),
  importedFromPredicate: z.string().trim().min(1).default(DEFAULT_IMPORTED_FROM_PREDICATE),
});

export type ModuleSpecInput = z.input<typeof ModuleSpecInputSchema>;

/**
 * Validate caller input and freeze it into a ModuleSpec.
 * Later seeds with the same id replace earlier ones. An empty predicate
 * list means no filter.
 *
 * @throws {ConfigError} on malformed input, unknown keywords or no seeds
 */
export function buildModuleSpec(input: unknown): ModuleSpec {
  const parsed = ModuleSpecInputSchema.safeParse(input);
  if (!parsed.success) {
    throw new ConfigError(
      `Invalid module specification: ${formatZodError(parsed.error).join("; ")}`,
      ErrorCode.CONFIG_INVALID
    );
  }
  const data = parsed.data;

  const seeds = new Map<string, SeedTerm>();
  for (const seed of data.seeds) {
    const term: SeedTerm = { id: seed.id, related: parseRelatedDirectives(seed.related) };
    if (seed.parent) term.overrideParent = seed.parent;
    seeds.set(seed.id, term);
  }
  if (seeds.size === 0) {
    throw new ConfigError("No seed terms given", ErrorCode.CONFIG_EMPTY_SEEDS);
  }

  const predicates =
    data.predicates && data.predicates.length > 0 ? [...new Set(data.predicates)] : undefined;

  return Object.freeze({
    seeds,
    predicates,
    intermediates: parseIntermediates(data.intermediates),
    suppressHierarchy: data.noHierarchy,
    copyPredicates: data.copy,
    importedFrom: data.importedFrom,
    importedFromPredicate: data.importedFromPredicate,
  });
}

// =============================================================================
// Engine Settings
// =============================================================================

export const EngineSettingsSchema = z.object({
  /** Bound parameters per statement; IN lists are chunked below this */
  maxSqlVars: z.coerce.number().int().min(2).default(999),
  statementTable: TableNameSchema.default("statement"),
});

export type EngineSettings = z.infer<typeof EngineSettingsSchema>;

// =============================================================================
// Validation Utilities
// =============================================================================

/**
 * Format Zod errors into readable messages
 */
export function formatZodError(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.join(".");
    return path ? `${path}: ${issue.message}` : issue.message;
  });
}
