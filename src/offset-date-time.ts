/**
 * Offset Date-Time
 *
 * A local date-time paired with the fixed offset from UTC it was observed
 * at. Ordering compares the instant first, then the local date-time, so
 * two values at the same instant but with different offsets are distinct
 * but `isOffsetDateTimeEqual`.
 */

import type { Duration, Instant, LocalDate, LocalDateTime, LocalTime, OffsetDateTime, OffsetTime, Period, ZoneOffset } from './types'
import { requireNonNull, type ParseError } from './errors'
import { type Result, Err } from './result'
import { checkField, type ChronoField, type ChronoUnit, type ValueRange, fieldRangeOf } from './fields'
import { parseFailure, resolveParsed } from './internal/parse'
import { offsetOfTotalSeconds, OFFSET_MIN, OFFSET_MAX, parseOffset, offsetEquals } from './zone-offset'
import {
  dateTimeOfEpochSecond, dateTimeToEpochSecond, dateTimeToInstant, dateTimePlus, dateTimePlusSeconds,
  dateTimePlusDuration, dateTimeMinusDuration, dateTimePlusPeriod, dateTimeMinusPeriod,
  dateTimeWithField, dateTimeWith, dateTimeTruncatedTo, dateTimeUntil, dateTimeGetLong, dateTimeIsSupported,
  dateTimeFieldRange, compareDateTimes, dateTimeEquals, formatDateTime, dateTimeFromMatch, DATE_TIME_PATTERN,
  DATE_TIME_MIN, DATE_TIME_MAX,
} from './local-date-time'
import { validYearSign, type DateAdjuster } from './local-date'

function make(dateTime: LocalDateTime, offset: ZoneOffset): OffsetDateTime {
  return { kind: 'OffsetDateTime', dateTime, offset }
}

export const OFFSET_DATE_TIME_MIN: OffsetDateTime = make(DATE_TIME_MIN, OFFSET_MAX)
export const OFFSET_DATE_TIME_MAX: OffsetDateTime = make(DATE_TIME_MAX, OFFSET_MIN)

// ============================================================================
// Construction
// ============================================================================

export function offsetDateTimeOf(dateTime: LocalDateTime, offset: ZoneOffset): OffsetDateTime {
  return make(requireNonNull(dateTime, 'dateTime'), requireNonNull(offset, 'offset'))
}

export function offsetDateTimeOfInstant(instant: Instant, offset: ZoneOffset): OffsetDateTime {
  requireNonNull(instant, 'instant')
  requireNonNull(offset, 'offset')
  return make(dateTimeOfEpochSecond(instant.epochSecond, instant.nano, offset), offset)
}

// ============================================================================
// Conversion
// ============================================================================

export function offsetDateTimeToEpochSecond(odt: OffsetDateTime): number {
  return dateTimeToEpochSecond(odt.dateTime, odt.offset)
}

export function offsetDateTimeToInstant(odt: OffsetDateTime): Instant {
  return dateTimeToInstant(odt.dateTime, odt.offset)
}

export function offsetDateTimeToLocalDate(odt: OffsetDateTime): LocalDate {
  return odt.dateTime.date
}

export function offsetDateTimeToLocalTime(odt: OffsetDateTime): LocalTime {
  return odt.dateTime.time
}

export function offsetDateTimeToOffsetTime(odt: OffsetDateTime): OffsetTime {
  return { kind: 'OffsetTime', time: odt.dateTime.time, offset: odt.offset }
}

/** Same local date-time, different offset; the instant moves. */
export function offsetDateTimeWithOffsetSameLocal(odt: OffsetDateTime, offset: ZoneOffset): OffsetDateTime {
  if (offsetEquals(odt.offset, offset)) return odt
  return make(odt.dateTime, offset)
}

/** Same instant, different offset; the local date-time moves by the offset difference. */
export function offsetDateTimeWithOffsetSameInstant(odt: OffsetDateTime, offset: ZoneOffset): OffsetDateTime {
  if (offsetEquals(odt.offset, offset)) return odt
  const difference = offset.totalSeconds - odt.offset.totalSeconds
  return make(dateTimePlusSeconds(odt.dateTime, difference), offset)
}

// ============================================================================
// Arithmetic and Adjustment
// ============================================================================

function withDateTime(odt: OffsetDateTime, dateTime: LocalDateTime): OffsetDateTime {
  return odt.dateTime === dateTime ? odt : make(dateTime, odt.offset)
}

export function offsetDateTimePlus(odt: OffsetDateTime, amount: number, unit: ChronoUnit): OffsetDateTime {
  return withDateTime(odt, dateTimePlus(odt.dateTime, amount, unit))
}

export function offsetDateTimeMinus(odt: OffsetDateTime, amount: number, unit: ChronoUnit): OffsetDateTime {
  return withDateTime(odt, dateTimePlus(odt.dateTime, -amount, unit))
}

export function offsetDateTimePlusDuration(odt: OffsetDateTime, duration: Duration): OffsetDateTime {
  return withDateTime(odt, dateTimePlusDuration(odt.dateTime, duration))
}

export function offsetDateTimeMinusDuration(odt: OffsetDateTime, duration: Duration): OffsetDateTime {
  return withDateTime(odt, dateTimeMinusDuration(odt.dateTime, duration))
}

export function offsetDateTimePlusPeriod(odt: OffsetDateTime, period: Period): OffsetDateTime {
  return withDateTime(odt, dateTimePlusPeriod(odt.dateTime, period))
}

export function offsetDateTimeMinusPeriod(odt: OffsetDateTime, period: Period): OffsetDateTime {
  return withDateTime(odt, dateTimeMinusPeriod(odt.dateTime, period))
}

/**
 * Sets a field. InstantSeconds keeps the offset and moves the local value;
 * OffsetSeconds keeps the local value and changes the offset.
 */
export function offsetDateTimeWithField(odt: OffsetDateTime, field: ChronoField, value: number): OffsetDateTime {
  requireNonNull(field, 'field')
  switch (field) {
    case 'InstantSeconds':
      return make(dateTimeOfEpochSecond(checkField(field, value), odt.dateTime.time.nano, odt.offset), odt.offset)
    case 'OffsetSeconds':
      return make(odt.dateTime, offsetOfTotalSeconds(checkField(field, value)))
    default:
      return withDateTime(odt, dateTimeWithField(odt.dateTime, field, value))
  }
}

export function offsetDateTimeWith(odt: OffsetDateTime, adjuster: DateAdjuster): OffsetDateTime {
  return withDateTime(odt, dateTimeWith(odt.dateTime, adjuster))
}

export function offsetDateTimeTruncatedTo(odt: OffsetDateTime, unit: ChronoUnit): OffsetDateTime {
  return withDateTime(odt, dateTimeTruncatedTo(odt.dateTime, unit))
}

/** Units between two values, measured after moving `end` to the offset of `start`. */
export function offsetDateTimeUntil(start: OffsetDateTime, end: OffsetDateTime, unit: ChronoUnit): number {
  const aligned = offsetDateTimeWithOffsetSameInstant(end, start.offset)
  return dateTimeUntil(start.dateTime, aligned.dateTime, unit)
}

// ============================================================================
// Field Access
// ============================================================================

export function offsetDateTimeIsSupported(field: ChronoField): boolean {
  return field === 'InstantSeconds' || field === 'OffsetSeconds' || dateTimeIsSupported(field)
}

export function offsetDateTimeGetLong(odt: OffsetDateTime, field: ChronoField): number {
  requireNonNull(field, 'field')
  switch (field) {
    case 'InstantSeconds': return offsetDateTimeToEpochSecond(odt)
    case 'OffsetSeconds': return odt.offset.totalSeconds
    default: return dateTimeGetLong(odt.dateTime, field)
  }
}

export function offsetDateTimeFieldRange(odt: OffsetDateTime, field: ChronoField): ValueRange {
  requireNonNull(field, 'field')
  if (field === 'InstantSeconds' || field === 'OffsetSeconds') return fieldRangeOf(field)
  return dateTimeFieldRange(odt.dateTime, field)
}

// ============================================================================
// Comparison
// ============================================================================

/** Orders by instant, then by local date-time. */
export function compareOffsetDateTimes(a: OffsetDateTime, b: OffsetDateTime): number {
  if (offsetEquals(a.offset, b.offset)) return compareDateTimes(a.dateTime, b.dateTime)
  const bySecond = Math.sign(offsetDateTimeToEpochSecond(a) - offsetDateTimeToEpochSecond(b))
  return bySecond || a.dateTime.time.nano - b.dateTime.time.nano || compareDateTimes(a.dateTime, b.dateTime)
}

/** Same instant, whatever the offsets. */
export function isOffsetDateTimeEqual(a: OffsetDateTime, b: OffsetDateTime): boolean {
  return offsetDateTimeToEpochSecond(a) === offsetDateTimeToEpochSecond(b) &&
    a.dateTime.time.nano === b.dateTime.time.nano
}

export function isOffsetDateTimeBefore(a: OffsetDateTime, b: OffsetDateTime): boolean {
  const sa = offsetDateTimeToEpochSecond(a)
  const sb = offsetDateTimeToEpochSecond(b)
  return sa < sb || (sa === sb && a.dateTime.time.nano < b.dateTime.time.nano)
}

export function isOffsetDateTimeAfter(a: OffsetDateTime, b: OffsetDateTime): boolean {
  return isOffsetDateTimeBefore(b, a)
}

/** Same local date-time and same offset. */
export function offsetDateTimeEquals(a: OffsetDateTime, b: OffsetDateTime): boolean {
  return dateTimeEquals(a.dateTime, b.dateTime) && offsetEquals(a.offset, b.offset)
}

// ============================================================================
// Formatting & Parsing
// ============================================================================

export function formatOffsetDateTime(odt: OffsetDateTime): string {
  return formatDateTime(odt.dateTime) + odt.offset.id
}

/** Offset text as written after a date-time: `Z`, `+HH:MM` or `+HH:MM:SS`. */
export const OFFSET_PATTERN = /(Z|[+-]\d{2}:\d{2}(?::\d{2})?)/

const OFFSET_DATE_TIME_RE = new RegExp('^' + DATE_TIME_PATTERN.source + OFFSET_PATTERN.source + '$')

export function parseOffsetDateTime(text: string): Result<OffsetDateTime, ParseError> {
  requireNonNull(text, 'text')
  const match = OFFSET_DATE_TIME_RE.exec(text)
  if (!match || !validYearSign(match, 1)) return Err(parseFailure(text))
  return resolveParsed(text, () => make(dateTimeFromMatch(match, 1), offsetFromMatch(match[10] ?? '')))
}

/** Resolves matched offset text, raising the range error a parse would carry. */
export function offsetFromMatch(text: string): ZoneOffset {
  const parsed = parseOffset(text)
  if (!parsed.ok) throw parsed.error
  return parsed.value
}
