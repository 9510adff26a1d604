/**
 * Tagged-union result type for service outcomes.
 *
 * Services that can fail in expected ways (a URL that is not allowed, a page
 * that returns 404) return a Result instead of throwing, so callers have to
 * handle both branches. Exceptions are reserved for failures the caller is
 * expected to propagate, such as a transient network timeout.
 */

export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E };

export function ok<T>(value: T): { ok: true; value: T } {
  return { ok: true, value };
}

export function err<E>(error: E): { ok: false; error: E } {
  return { ok: false, error };
}
