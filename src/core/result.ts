/**
 * Two-variant outcome used for every expected failure (network errors,
 * instrument rejections, timeouts). Exceptions are reserved for bugs.
 */
export type Result<T, E = string> = { readonly ok: true; readonly value: T } | { readonly ok: false; readonly error: E };

export function ok<T>(value: T): Result<T, never> {
  return { ok: true, value };
}

export function err<E>(error: E): Result<never, E> {
  return { ok: false, error };
}
