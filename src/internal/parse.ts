/**
 * Shared plumbing for the text parsers of the value types.
 */

import { DateTimeError, ParseError } from '../errors'
import { type Result, Ok, Err } from '../result'

export function parseFailure(text: string, index = 0): ParseError {
  return new ParseError(`Text '${text}' could not be parsed at index ${index}`, text, index)
}

/**
 * Builds a value from matched text. A DateTimeError raised while building
 * is reported as a ParseError naming the text.
 */
export function resolveParsed<T>(text: string, build: () => T): Result<T, ParseError> {
  try {
    return Ok(build())
  } catch (e) {
    if (e instanceof ParseError) return Err(e)
    if (e instanceof DateTimeError) {
      return Err(new ParseError(`Text '${text}' could not be parsed: ${e.message}`, text, 0))
    }
    throw e
  }
}

/** Parses a run of ASCII digits that the caller's pattern already matched. */
export function digits(text: string | undefined): number {
  return text === undefined || text === '' ? 0 : parseInt(text, 10)
}
