/**
 * Result Type for Functional Error Handling
 *
 * Used where one item failing is expected and reported (identifier
 * resolution) rather than thrown.
 *
 * @module
 */

/**
 * Result type representing either success (Ok) or failure (Err)
 */
export type Result<T, E = Error> =
  | { ok: true; value: T }
  | { ok: false; error: E };

/**
 * Creates a successful Result containing a value
 */
export function ok<T>(value: T): Result<T, never> {
  return { ok: true, value };
}

/**
 * Creates a failed Result containing an error
 */
export function err<E>(error: E): Result<never, E> {
  return { ok: false, error };
}

/**
 * Partitions an array of Results into Ok values and Err values
 */
export function partition<T, E>(results: Result<T, E>[]): { oks: T[]; errs: E[] } {
  const oks: T[] = [];
  const errs: E[] = [];
  for (const result of results) {
    if (result.ok) {
      oks.push(result.value);
    } else {
      errs.push(result.error);
    }
  }
  return { oks, errs };
}
