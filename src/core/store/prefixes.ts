/**
 * Prefix Registry
 *
 * Compacts absolute IRIs to "prefix:local" identifiers using the rows of a
 * `prefix` table.
 *
 * @module
 */

import type { TermId } from "../../types/index.js";

export interface PrefixEntry {
  prefix: string;
  base: string;
}

export class PrefixRegistry {
  private readonly byPrefix = new Map<string, string>();
  /** Longest base first, so the most specific namespace wins */
  private readonly byBase: PrefixEntry[];

  constructor(entries: Iterable<PrefixEntry> = []) {
    for (const { prefix, base } of entries) {
      this.byPrefix.set(prefix, base);
    }
    this.byBase = [...this.byPrefix]
      .map(([prefix, base]) => ({ prefix, base }))
      .sort((a, b) => b.base.length - a.base.length || a.prefix.localeCompare(b.prefix));
  }

  get size(): number {
    return this.byPrefix.size;
  }

  /**
   * Compact form of an IRI (bracketed or bare). Falls back to `<iri>` when no
   * base matches.
   */
  compact(iri: string): TermId {
    const bare = iri.startsWith("<") && iri.endsWith(">") ? iri.slice(1, -1) : iri;
    for (const { prefix, base } of this.byBase) {
      if (bare.startsWith(base) && bare.length > base.length) {
        return `${prefix}:${bare.slice(base.length)}`;
      }
    }
    return `<${bare}>`;
  }
}
