import type { AppError } from "../errors/app-error.js";

/**
 * Result type — expected failures travel as values, not exceptions.
 * The CORS chains use it for continue / abort, config parsing for
 * validation errors.
 */
export type Result<T, E = AppError> = Ok<T> | Err<E>;

export interface Ok<T> {
  readonly ok: true;
  readonly value: T;
}

export interface Err<E> {
  readonly ok: false;
  readonly error: E;
}

export const ok = <T>(value: T): Ok<T> => ({ ok: true, value });
export const err = <E>(error: E): Err<E> => ({ ok: false, error });

/** FlatMap / chain — stops at the first Err */
export const flatMap = <T, U, E>(result: Result<T, E>, fn: (v: T) => Result<U, E>): Result<U, E> =>
  result.ok ? fn(result.value) : result;
