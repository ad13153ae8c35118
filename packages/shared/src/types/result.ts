/**
 * Result type for business logic: failures are values, not exceptions.
 *
 * Usage:
 *   const table = extractTable(grid, layout);
 *   if (!table.ok) {
 *     logger.fatal(table.error.message, { error: table.error.toDTO() });
 *     return table;
 *   }
 *   toLongFormat(table.value);
 */

export interface Ok<T> {
  readonly ok: true;
  readonly value: T;
}

export interface Err<E> {
  readonly ok: false;
  readonly error: E;
}

export type Result<T, E> = Ok<T> | Err<E>;

export function ok<T>(value: T): Ok<T> {
  return { ok: true, value };
}

export function err<E>(error: E): Err<E> {
  return { ok: false, error };
}

export function isOk<T, E>(result: Result<T, E>): result is Ok<T> {
  return result.ok;
}

export function isErr<T, E>(result: Result<T, E>): result is Err<E> {
  return !result.ok;
}

/**
 * Collects every value in order, stopping at the first Err.
 */
export function collectResults<T, E>(results: Iterable<Result<T, E>>): Result<T[], E> {
  const values: T[] = [];
  for (const result of results) {
    if (!result.ok) {
      return result;
    }
    values.push(result.value);
  }
  return ok(values);
}

/**
 * Unwrap a Result, throwing on Err. Use only in tests or at top-level boundaries.
 */
export function unwrap<T, E>(result: Result<T, E>): T {
  if (result.ok) {
    return result.value;
  }
  throw new Error(`Attempted to unwrap an Err: ${String(result.error)}`);
}
