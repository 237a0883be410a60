/**
 * Result type for fallible operations that report failure as a value.
 */

import { DateTimeError } from './errors'

export type Result<T, E> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: E }

export function Ok<T>(value: T): Result<T, never> {
  return { ok: true, value }
}

export function Err<E>(error: E): Result<never, E> {
  return { ok: false, error }
}

/** Returns the value, or throws the carried error. */
export function unwrap<T, E>(result: Result<T, E>): T {
  if (result.ok) return result.value
  throw result.error
}

/**
 * Runs a throwing computation and captures any DateTimeError as an Err.
 * Errors of other types are rethrown.
 */
export function attempt<T>(fn: () => T): Result<T, DateTimeError> {
  try {
    return Ok(fn())
  } catch (e) {
    if (e instanceof DateTimeError) return Err(e)
    throw e
  }
}
