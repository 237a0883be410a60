/**
 * Instant
 *
 * A point on the UTC time-line as epoch seconds plus a nanosecond
 * adjustment in [0, 999,999,999]. The supported range matches the
 * LocalDate year range.
 */

import type { Instant, Duration } from './types'
import { DateTimeRangeError, UnsupportedFieldError, requireNonNull, type ParseError } from './errors'
import { type Result, Err } from './result'
import { checkField, type ChronoField, type ChronoUnit } from './fields'
import {
  addExact, subtractExact, multiplyExact, floorDiv, floorMod, bigToSafe,
  NANOS_PER_SECOND, SECONDS_PER_DAY, SECONDS_PER_HOUR, SECONDS_PER_MINUTE, NANOS_PER_DAY,
} from './internal/math'
import { YEAR_MIN, YEAR_MAX, toEpochDay, fromEpochDay } from './internal/calendar'
import { pad2, formatYear, formatNanoFraction } from './internal/helpers'
import { parseFailure, resolveParsed } from './internal/parse'
import { DATE_PATTERN, dateFromMatch, dateToEpochDay, validYearSign } from './local-date'
import { TIME_PATTERN, timeFromMatch, timeToSecondOfDay } from './local-time'

const MIN_SECOND = toEpochDay(YEAR_MIN, 1, 1) * SECONDS_PER_DAY
const MAX_SECOND = toEpochDay(YEAR_MAX, 12, 31) * SECONDS_PER_DAY + SECONDS_PER_DAY - 1

function create(epochSecond: number, nano: number): Instant {
  if (epochSecond < MIN_SECOND || epochSecond > MAX_SECOND) {
    throw new DateTimeRangeError('Instant exceeds minimum or maximum instant')
  }
  return { kind: 'Instant', epochSecond: epochSecond + 0, nano }
}

export const INSTANT_EPOCH: Instant = create(0, 0)
export const INSTANT_MIN: Instant = create(MIN_SECOND, 0)
export const INSTANT_MAX: Instant = create(MAX_SECOND, 999_999_999)

// ============================================================================
// Construction
// ============================================================================

export function instantOfEpochSecond(epochSecond: number, nanoAdjustment = 0): Instant {
  const secs = addExact(epochSecond, floorDiv(nanoAdjustment, NANOS_PER_SECOND))
  return create(secs, floorMod(nanoAdjustment, NANOS_PER_SECOND))
}

export function instantOfEpochMilli(epochMilli: number): Instant {
  return create(floorDiv(epochMilli, 1_000), floorMod(epochMilli, 1_000) * 1_000_000)
}

// ============================================================================
// Arithmetic
// ============================================================================

function plus(instant: Instant, seconds: number, nanos: number): Instant {
  if (seconds === 0 && nanos === 0) return instant
  let epochSec = addExact(instant.epochSecond, seconds)
  epochSec = addExact(epochSec, floorDiv(nanos, NANOS_PER_SECOND))
  return instantOfEpochSecond(epochSec, instant.nano + floorMod(nanos, NANOS_PER_SECOND))
}

export function instantPlus(instant: Instant, duration: Duration): Instant {
  return plus(instant, duration.seconds, duration.nano)
}

export function instantMinus(instant: Instant, duration: Duration): Instant {
  const seconds = -duration.seconds
  return duration.nano === 0 ? plus(instant, seconds, 0) : plus(instant, seconds - 1, NANOS_PER_SECOND - duration.nano)
}

export function instantPlusSeconds(instant: Instant, seconds: number): Instant {
  return plus(instant, seconds, 0)
}

export function instantPlusMillis(instant: Instant, millis: number): Instant {
  return plus(instant, floorDiv(millis, 1_000), floorMod(millis, 1_000) * 1_000_000)
}

export function instantPlusNanos(instant: Instant, nanos: number): Instant {
  return plus(instant, 0, nanos)
}

export function instantMinusSeconds(instant: Instant, seconds: number): Instant {
  return instantPlusSeconds(instant, -seconds)
}

export function instantMinusMillis(instant: Instant, millis: number): Instant {
  return instantPlusMillis(instant, -millis)
}

export function instantMinusNanos(instant: Instant, nanos: number): Instant {
  return instantPlusNanos(instant, -nanos)
}

/** Adds an amount of a time-based unit, or of days counted as 24 hours. */
export function instantPlusUnit(instant: Instant, amount: number, unit: ChronoUnit): Instant {
  switch (unit) {
    case 'Nanos': return instantPlusNanos(instant, amount)
    case 'Micros': return plus(instant, floorDiv(amount, 1_000_000), floorMod(amount, 1_000_000) * 1_000)
    case 'Millis': return instantPlusMillis(instant, amount)
    case 'Seconds': return instantPlusSeconds(instant, amount)
    case 'Minutes': return instantPlusSeconds(instant, multiplyExact(amount, SECONDS_PER_MINUTE))
    case 'Hours': return instantPlusSeconds(instant, multiplyExact(amount, SECONDS_PER_HOUR))
    case 'HalfDays': return instantPlusSeconds(instant, multiplyExact(amount, SECONDS_PER_DAY / 2))
    case 'Days': return instantPlusSeconds(instant, multiplyExact(amount, SECONDS_PER_DAY))
    default: throw new UnsupportedFieldError(`Unsupported unit: ${unit}`)
  }
}

export function instantMinusUnit(instant: Instant, amount: number, unit: ChronoUnit): Instant {
  return instantPlusUnit(instant, -amount, unit)
}

const TRUNCATION_NANOS: Partial<Record<ChronoUnit, number>> = {
  Micros: 1_000,
  Millis: 1_000_000,
  Seconds: NANOS_PER_SECOND,
  Minutes: 60 * NANOS_PER_SECOND,
  Hours: 3_600 * NANOS_PER_SECOND,
  HalfDays: 43_200 * NANOS_PER_SECOND,
  Days: NANOS_PER_DAY,
}

/** Truncates to a unit no longer than a day that divides the day evenly. */
export function instantTruncatedTo(instant: Instant, unit: ChronoUnit): Instant {
  if (unit === 'Nanos') return instant
  const unitNanos = TRUNCATION_NANOS[unit]
  if (unitNanos === undefined) throw new UnsupportedFieldError('Unit is too large to be used for truncation')
  const nanoOfDay = floorMod(instant.epochSecond, SECONDS_PER_DAY) * NANOS_PER_SECOND + instant.nano
  const truncated = floorDiv(nanoOfDay, unitNanos) * unitNanos
  return instantPlusNanos(instant, truncated - nanoOfDay)
}

/** Whole units from `start` to `end`, negative when `end` is earlier. */
export function instantUntil(start: Instant, end: Instant, unit: ChronoUnit): number {
  switch (unit) {
    case 'Nanos': return bigToSafe(nanosUntil(start, end), 'Nanos between instants')
    case 'Micros': return bigToSafe(nanosUntil(start, end) / 1_000n, 'Micros between instants')
    case 'Millis': return subtractExact(instantToEpochMilli(end), instantToEpochMilli(start))
    case 'Seconds': return secondsUntil(start, end)
    case 'Minutes': return Math.trunc(secondsUntil(start, end) / SECONDS_PER_MINUTE)
    case 'Hours': return Math.trunc(secondsUntil(start, end) / SECONDS_PER_HOUR)
    case 'HalfDays': return Math.trunc(secondsUntil(start, end) / (SECONDS_PER_DAY / 2))
    case 'Days': return Math.trunc(secondsUntil(start, end) / SECONDS_PER_DAY)
    default: throw new UnsupportedFieldError(`Unsupported unit: ${unit}`)
  }
}

function nanosUntil(start: Instant, end: Instant): bigint {
  const secs = BigInt(end.epochSecond) - BigInt(start.epochSecond)
  return secs * BigInt(NANOS_PER_SECOND) + BigInt(end.nano - start.nano)
}

function secondsUntil(start: Instant, end: Instant): number {
  let secs = subtractExact(end.epochSecond, start.epochSecond)
  const nanos = end.nano - start.nano
  if (secs > 0 && nanos < 0) secs--
  else if (secs < 0 && nanos > 0) secs++
  return secs
}

// ============================================================================
// Conversion
// ============================================================================

export function instantToEpochMilli(instant: Instant): number {
  return addExact(multiplyExact(instant.epochSecond, 1_000), Math.floor(instant.nano / 1_000_000))
}

// ============================================================================
// Field Access
// ============================================================================

export function instantIsSupported(field: ChronoField): boolean {
  return field === 'NanoOfSecond' || field === 'MicroOfSecond' || field === 'MilliOfSecond' || field === 'InstantSeconds'
}

export function instantGetLong(instant: Instant, field: ChronoField): number {
  requireNonNull(field, 'field')
  switch (field) {
    case 'NanoOfSecond': return instant.nano
    case 'MicroOfSecond': return Math.floor(instant.nano / 1_000)
    case 'MilliOfSecond': return Math.floor(instant.nano / 1_000_000)
    case 'InstantSeconds': return instant.epochSecond
    default: throw new UnsupportedFieldError(`Unsupported field: ${field}`)
  }
}

export function instantWithField(instant: Instant, field: ChronoField, value: number): Instant {
  requireNonNull(field, 'field')
  if (!instantIsSupported(field)) throw new UnsupportedFieldError(`Unsupported field: ${field}`)
  checkField(field, value)
  switch (field) {
    case 'MilliOfSecond': return create(instant.epochSecond, value * 1_000_000)
    case 'MicroOfSecond': return create(instant.epochSecond, value * 1_000)
    case 'NanoOfSecond': return create(instant.epochSecond, value)
    default: return create(value, instant.nano)
  }
}

// ============================================================================
// Comparison
// ============================================================================

export function compareInstants(a: Instant, b: Instant): number {
  return Math.sign(a.epochSecond - b.epochSecond) || a.nano - b.nano
}

export function isInstantBefore(a: Instant, b: Instant): boolean {
  return compareInstants(a, b) < 0
}

export function isInstantAfter(a: Instant, b: Instant): boolean {
  return compareInstants(a, b) > 0
}

export function instantEquals(a: Instant, b: Instant): boolean {
  return a.epochSecond === b.epochSecond && a.nano === b.nano
}

// ============================================================================
// Formatting & Parsing
// ============================================================================

/** UTC text such as `2008-03-30T01:00:00Z`; seconds are always written. */
export function formatInstant(instant: Instant): string {
  const epochDay = floorDiv(instant.epochSecond, SECONDS_PER_DAY)
  const secondOfDay = floorMod(instant.epochSecond, SECONDS_PER_DAY)
  const { year, month, day } = fromEpochDay(epochDay)
  const hour = Math.floor(secondOfDay / 3_600)
  const minute = Math.floor(secondOfDay / 60) % 60
  const second = secondOfDay % 60
  return formatYear(year) + '-' + pad2(month) + '-' + pad2(day) + 'T' +
    pad2(hour) + ':' + pad2(minute) + ':' + pad2(second) + formatNanoFraction(instant.nano) + 'Z'
}

const INSTANT_RE = new RegExp('^' + DATE_PATTERN.source + 'T' + TIME_PATTERN.source + 'Z$')

export function parseInstant(text: string): Result<Instant, ParseError> {
  requireNonNull(text, 'text')
  const match = INSTANT_RE.exec(text)
  if (!match || !validYearSign(match, 1) || match[8] === undefined) return Err(parseFailure(text))
  return resolveParsed(text, () => {
    const date = dateFromMatch(match, 1)
    const time = timeFromMatch(match, 6)
    return create(dateToEpochDay(date) * SECONDS_PER_DAY + timeToSecondOfDay(time), time.nano)
  })
}
