// backend/services/location/src/domain/result.ts

/**
 * Tagged outcome of a service operation. Transport code pattern-matches on
 * `ok` and, for failures, on `error.kind`.
 */
export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E };

export function ok<T>(value: T): { ok: true; value: T } {
  return { ok: true, value };
}

export function fail<E>(error: E): { ok: false; error: E } {
  return { ok: false, error };
}
