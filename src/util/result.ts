/**
 * Result type for calls to external systems.
 *
 * Fetch and publish report failure as a value so the notifier decides
 * what a failure means; nothing is thrown across that boundary.
 */

export type Result<T, E extends Error = Error> =
  | { ok: true; value: T }
  | { ok: false; error: E };

export function ok<T>(value: T): { ok: true; value: T } {
  return { ok: true, value };
}

export function err<E extends Error>(error: E): { ok: false; error: E } {
  return { ok: false, error };
}
