/**
 * Result Type Module
 *
 * Explicit success/failure values for operations whose failures are
 * expected outcomes rather than exceptions (e.g. a missing config file).
 *
 * @module result
 */

/** Successful outcome carrying a value */
export interface OkResult<T> {
  readonly ok: true;
  readonly value: T;
}

/** Failed outcome carrying an error */
export interface ErrResult<E> {
  readonly ok: false;
  readonly error: E;
}

export type Result<T, E = Error> = OkResult<T> | ErrResult<E>;

export function Ok<T>(value: T): OkResult<T> {
  return { ok: true, value };
}

export function Err<E>(error: E): ErrResult<E> {
  return { ok: false, error };
}
