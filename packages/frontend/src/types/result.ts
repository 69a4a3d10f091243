/**
 * Outcome of a fallible step: a value, or the error describing the failure
 */

export type Result<T, E> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: E };

export const ok = <T, E>(value: T): Result<T, E> => ({ ok: true, value });

export const error = <T, E>(error: E): Result<T, E> => ({ ok: false, error });

export const map = <T, U, E>(
  result: Result<T, E>,
  fn: (value: T) => U
): Result<U, E> => (result.ok ? ok(fn(result.value)) : result);

export const mapError = <T, E, F>(
  result: Result<T, E>,
  fn: (error: E) => F
): Result<T, F> => (result.ok ? result : error(fn(result.error)));

/**
 * Concatenate the error lists of every failed result, in order
 */
export const collectErrors = <E>(
  results: readonly Result<unknown, readonly E[]>[]
): readonly E[] => results.flatMap((r) => (r.ok ? [] : r.error));
