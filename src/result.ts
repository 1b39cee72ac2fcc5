/**
 * Result Type
 *
 * Discriminated success/failure value for operations that can fail without
 * throwing (parsing, lookups).
 */

export type Result<T, E = Error> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: E }

export function Ok<T>(value: T): { readonly ok: true; readonly value: T } {
  return { ok: true, value }
}

export function Err<E>(error: E): { readonly ok: false; readonly error: E } {
  return { ok: false, error }
}
