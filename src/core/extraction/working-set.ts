/**
 * Run-scoped term and predicate sets
 *
 * Each extraction run owns one of each; nothing is shared between runs.
 *
 * @module
 */

import type { TermId } from "../../types/index.js";

/**
 * Terms slated for the output module. Grows monotonically during a run and
 * remembers insertion order; `sorted()` gives the order used for emission.
 */
export class WorkingTermSet implements Iterable<TermId> {
  private readonly terms = new Set<TermId>();

  constructor(initial: Iterable<TermId> = []) {
    this.merge(initial);
  }

  get size(): number {
    return this.terms.size;
  }

  has(term: TermId): boolean {
    return this.terms.has(term);
  }

  add(term: TermId): boolean {
    if (this.terms.has(term)) return false;
    this.terms.add(term);
    return true;
  }

  /**
   * Add every term; returns how many were new. Merging the same terms twice
   * is a no-op.
   */
  merge(terms: Iterable<TermId>): number {
    let added = 0;
    for (const term of terms) {
      if (this.add(term)) added++;
    }
    return added;
  }

  sorted(): TermId[] {
    return [...this.terms].sort();
  }

  /**
   * Read-only view for frontier checks
   */
  asSet(): ReadonlySet<TermId> {
    return this.terms;
  }

  clear(): void {
    this.terms.clear();
  }

  [Symbol.iterator](): Iterator<TermId> {
    return this.terms[Symbol.iterator]();
  }
}

/**
 * Predicates whose values are copied into the module, in caller order
 */
export class PredicateSet implements Iterable<TermId> {
  private readonly predicates: TermId[] = [];
  private readonly index = new Set<TermId>();

  constructor(initial: Iterable<TermId> = []) {
    for (const predicate of initial) this.add(predicate);
  }

  get size(): number {
    return this.predicates.length;
  }

  has(predicate: TermId): boolean {
    return this.index.has(predicate);
  }

  add(predicate: TermId): void {
    if (this.index.has(predicate)) return;
    this.index.add(predicate);
    this.predicates.push(predicate);
  }

  toArray(): TermId[] {
    return [...this.predicates];
  }

  clear(): void {
    this.predicates.length = 0;
    this.index.clear();
  }

  [Symbol.iterator](): Iterator<TermId> {
    return this.predicates[Symbol.iterator]();
  }
}
