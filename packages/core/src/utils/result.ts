/**
 * Result type for explicit error handling.
 *
 * Used where a failure is an expected outcome the caller must branch on
 * (a source command that exits non-zero, an unreadable input file)
 * rather than a broken invariant.
 *
 * @example
 * ```typescript
 * const listing = await readListing({ kind: 'file', path: 'deps.txt' });
 * if (isErr(listing)) {
 *   logger.error(listing.error.message);
 *   return;
 * }
 * const graph = buildDependencyGraph(parseDependencyListing(listing.value));
 * ```
 */

export type Result<T, E = Error> = { ok: true; value: T } | { ok: false; error: E };

export function Ok<T>(value: T): Result<T, never> {
  return { ok: true, value };
}

export function Err<E>(error: E): Result<never, E> {
  return { ok: false, error };
}

export function isOk<T, E>(result: Result<T, E>): result is { ok: true; value: T } {
  return result.ok;
}

export function isErr<T, E>(result: Result<T, E>): result is { ok: false; error: E } {
  return !result.ok;
}

/**
 * Unwraps a Result, throwing the contained error if it is an Err
 */
export function unwrap<T, E>(result: Result<T, E>): T {
  if (isOk(result)) {
    return result.value;
  }
  throw result.error;
}
