/**
 * Result Type
 *
 * Discriminated union for operations that can fail with an expected,
 * typed outcome instead of throwing.
 *
 * @module @treescan/shared/types/result
 */

/**
 * Successful branch of a Result.
 */
export interface OkResult<T> {
  readonly ok: true;
  readonly value: T;
}

/**
 * Failed branch of a Result.
 */
export interface ErrResult<E> {
  readonly ok: false;
  readonly error: E;
}

export type Result<T, E = Error> = OkResult<T> | ErrResult<E>;

/**
 * Create a successful Result.
 */
export function Ok<T>(value: T): OkResult<T> {
  return { ok: true, value };
}

/**
 * Create a failed Result.
 */
export function Err<E>(error: E): ErrResult<E> {
  return { ok: false, error };
}
