/**
 * Result Type Module
 *
 * A discriminated union for operations that can fail without throwing.
 * Used by loaders and parsers where the caller decides how to surface the
 * failure.
 *
 * @module @cachet/shared/types/result
 */

/**
 * Successful result carrying a value.
 */
export interface OkResult<T> {
  readonly ok: true;
  readonly value: T;
}

/**
 * Failed result carrying an error.
 */
export interface ErrResult<E> {
  readonly ok: false;
  readonly error: E;
}

export type Result<T, E = Error> = OkResult<T> | ErrResult<E>;

/**
 * Create a successful result.
 */
export function Ok<T>(value: T): OkResult<T> {
  return { ok: true, value };
}

/**
 * Create a failed result.
 */
export function Err<E>(error: E): ErrResult<E> {
  return { ok: false, error };
}
