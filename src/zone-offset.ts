/**
 * Zone Offset
 *
 * A fixed amount of time ahead of or behind UTC, from -18:00 to +18:00.
 * Offsets that are a whole number of quarter hours are interned, so the
 * common ones are shared between values.
 */

import type { ZoneOffset } from './types'
import { DateTimeRangeError, ParseError, requireNonNull, type DateTimeError } from './errors'
import { type Result, Ok, Err } from './result'
import { pad2 } from './internal/helpers'

const MAX_SECONDS = 18 * 3600

const interned = new Map<number, ZoneOffset>()

function buildId(totalSeconds: number): string {
  if (totalSeconds === 0) return 'Z'
  const abs = Math.abs(totalSeconds)
  const hours = Math.floor(abs / 3600)
  const minutes = Math.floor(abs / 60) % 60
  const seconds = abs % 60
  let id = (totalSeconds < 0 ? '-' : '+') + pad2(hours) + ':' + pad2(minutes)
  if (seconds !== 0) id += ':' + pad2(seconds)
  return id
}

// ============================================================================
// Construction
// ============================================================================

export function offsetOfTotalSeconds(totalSeconds: number): ZoneOffset {
  if (!Number.isInteger(totalSeconds) || Math.abs(totalSeconds) > MAX_SECONDS) {
    throw new DateTimeRangeError('Zone offset not in valid range: -18:00 to +18:00')
  }
  if (totalSeconds % 900 === 0) {
    const cached = interned.get(totalSeconds)
    if (cached) return cached
    const offset: ZoneOffset = Object.freeze({ kind: 'ZoneOffset', totalSeconds: totalSeconds + 0, id: buildId(totalSeconds) })
    interned.set(totalSeconds, offset)
    return offset
  }
  return Object.freeze({ kind: 'ZoneOffset', totalSeconds, id: buildId(totalSeconds) })
}

function validate(hours: number, minutes: number, seconds: number): void {
  if (!Number.isInteger(hours) || !Number.isInteger(minutes) || !Number.isInteger(seconds)) {
    throw new DateTimeRangeError(`Zone offset fields must be whole numbers: ${hours}, ${minutes}, ${seconds}`)
  }
  if (hours < -18 || hours > 18) {
    throw new DateTimeRangeError(`Zone offset hours not in valid range: value ${hours} is not in the range -18 to 18`)
  }
  if (hours > 0) {
    if (minutes < 0 || seconds < 0) {
      throw new DateTimeRangeError('Zone offset minutes and seconds must be positive because hours is positive')
    }
  } else if (hours < 0) {
    if (minutes > 0 || seconds > 0) {
      throw new DateTimeRangeError('Zone offset minutes and seconds must be negative because hours is negative')
    }
  } else if ((minutes > 0 && seconds < 0) || (minutes < 0 && seconds > 0)) {
    throw new DateTimeRangeError('Zone offset minutes and seconds must have the same sign')
  }
  if (Math.abs(minutes) > 59) {
    throw new DateTimeRangeError(`Zone offset minutes not in valid range: abs(value) ${Math.abs(minutes)} is not in the range 0 to 59`)
  }
  if (Math.abs(seconds) > 59) {
    throw new DateTimeRangeError(`Zone offset seconds not in valid range: abs(value) ${Math.abs(seconds)} is not in the range 0 to 59`)
  }
  if (Math.abs(hours) === 18 && (minutes !== 0 || seconds !== 0)) {
    throw new DateTimeRangeError('Zone offset not in valid range: -18:00 to +18:00')
  }
}

export function offsetOfHoursMinutesSeconds(hours: number, minutes: number, seconds: number): ZoneOffset {
  validate(hours, minutes, seconds)
  return offsetOfTotalSeconds(hours * 3600 + minutes * 60 + seconds)
}

export function offsetOfHoursMinutes(hours: number, minutes: number): ZoneOffset {
  return offsetOfHoursMinutesSeconds(hours, minutes, 0)
}

export function offsetOfHours(hours: number): ZoneOffset {
  return offsetOfHoursMinutesSeconds(hours, 0, 0)
}

export const UTC: ZoneOffset = offsetOfTotalSeconds(0)
export const OFFSET_MIN: ZoneOffset = offsetOfTotalSeconds(-MAX_SECONDS)
export const OFFSET_MAX: ZoneOffset = offsetOfTotalSeconds(MAX_SECONDS)

// ============================================================================
// Parsing
// ============================================================================

function parseNumber(id: string, pos: number, precededByColon: boolean): number | ParseError {
  if (precededByColon && id.charAt(pos - 1) !== ':') {
    return new ParseError(`Invalid ID for ZoneOffset, colon not found when expected: ${id}`, id, pos - 1)
  }
  const pair = id.substring(pos, pos + 2)
  if (!/^\d\d$/.test(pair)) {
    return new ParseError(`Invalid ID for ZoneOffset, non numeric characters found: ${id}`, id, pos)
  }
  return parseInt(pair, 10)
}

/**
 * Parses `Z`, `+h`, `+hh`, `+hh:mm`, `+hhmm`, `+hh:mm:ss` or `+hhmmss`.
 * Text of the right shape whose value is out of range yields the range error.
 */
export function parseOffset(text: string): Result<ZoneOffset, DateTimeError> {
  requireNonNull(text, 'offsetId')
  if (text === 'Z') return Ok(UTC)

  let id = text
  if (id.length === 2) id = id.charAt(0) + '0' + id.charAt(1)

  let parts: (number | ParseError)[]
  switch (id.length) {
    case 3:
      parts = [parseNumber(id, 1, false), 0, 0]
      break
    case 5:
      parts = [parseNumber(id, 1, false), parseNumber(id, 3, false), 0]
      break
    case 6:
      parts = [parseNumber(id, 1, false), parseNumber(id, 4, true), 0]
      break
    case 7:
      parts = [parseNumber(id, 1, false), parseNumber(id, 3, false), parseNumber(id, 5, false)]
      break
    case 9:
      parts = [parseNumber(id, 1, false), parseNumber(id, 4, true), parseNumber(id, 7, true)]
      break
    default:
      return Err(new ParseError(`Invalid ID for ZoneOffset, invalid format: ${text}`, text, 0))
  }

  const sign = id.charAt(0)
  if (sign !== '+' && sign !== '-') {
    return Err(new ParseError(`Invalid ID for ZoneOffset, plus/minus not found when expected: ${text}`, text, 0))
  }
  const numbers: number[] = []
  for (const part of parts) {
    if (part instanceof ParseError) return Err(part)
    numbers.push(sign === '-' ? -part : part)
  }
  const [hours = 0, minutes = 0, seconds = 0] = numbers
  try {
    return Ok(offsetOfHoursMinutesSeconds(hours, minutes, seconds))
  } catch (e) {
    if (e instanceof DateTimeRangeError) return Err(e)
    throw e
  }
}

// ============================================================================
// Queries
// ============================================================================

export function formatOffset(offset: ZoneOffset): string {
  return offset.id
}

export function offsetTotalSeconds(offset: ZoneOffset): number {
  return offset.totalSeconds
}

/**
 * Orders offsets from the largest (furthest ahead of UTC) to the smallest,
 * matching the order in which the same local time occurs on the time-line.
 */
export function compareOffsets(a: ZoneOffset, b: ZoneOffset): number {
  return b.totalSeconds - a.totalSeconds
}

export function offsetEquals(a: ZoneOffset, b: ZoneOffset): boolean {
  return a.totalSeconds === b.totalSeconds
}
