/**
 * Temporal Field Access
 *
 * Field queries that work on any temporal value, dispatching on `kind` to
 * the module that owns the type.
 */

import type {
  Instant, LocalDate, LocalDateTime, LocalTime, MonthDay, OffsetDateTime, OffsetTime, YearMonth, ZonedDateTime,
} from './types'
import { UnsupportedFieldError, requireNonNull } from './errors'
import { checkValidValue, fieldRangeOf, isIntRange, valueRangeOf, type ChronoField, type ValueRange } from './fields'
import { YEAR_MAX } from './internal/calendar'
import { monthMaxLength, monthOf } from './month'
import { dateFieldRange, dateGetLong, dateIsSupported } from './local-date'
import { timeFieldRange, timeGetLong, timeIsSupported } from './local-time'
import { dateTimeFieldRange, dateTimeGetLong, dateTimeIsSupported } from './local-date-time'
import { instantGetLong, instantIsSupported } from './instant'
import { offsetDateTimeFieldRange, offsetDateTimeGetLong, offsetDateTimeIsSupported } from './offset-date-time'
import { offsetTimeFieldRange, offsetTimeGetLong, offsetTimeIsSupported } from './offset-time'
import { zonedFieldRange, zonedGetLong, zonedIsSupported } from './zoned-date-time'

export type Temporal =
  | LocalDate
  | LocalTime
  | LocalDateTime
  | Instant
  | OffsetDateTime
  | OffsetTime
  | ZonedDateTime
  | YearMonth
  | MonthDay

const YEAR_MONTH_FIELDS: ReadonlySet<ChronoField> = new Set(['MonthOfYear', 'ProlepticMonth', 'YearOfEra', 'Year', 'Era'])
const MONTH_DAY_FIELDS: ReadonlySet<ChronoField> = new Set(['MonthOfYear', 'DayOfMonth'])

function unsupported(field: ChronoField): UnsupportedFieldError {
  return new UnsupportedFieldError(`Unsupported field: ${field}`)
}

export function isSupported(temporal: Temporal, field: ChronoField): boolean {
  switch (temporal.kind) {
    case 'LocalDate': return dateIsSupported(field)
    case 'LocalTime': return timeIsSupported(field)
    case 'LocalDateTime': return dateTimeIsSupported(field)
    case 'Instant': return instantIsSupported(field)
    case 'OffsetDateTime': return offsetDateTimeIsSupported(field)
    case 'OffsetTime': return offsetTimeIsSupported(field)
    case 'ZonedDateTime': return zonedIsSupported(field)
    case 'YearMonth': return YEAR_MONTH_FIELDS.has(field)
    case 'MonthDay': return MONTH_DAY_FIELDS.has(field)
  }
}

export function getLong(temporal: Temporal, field: ChronoField): number {
  requireNonNull(field, 'field')
  switch (temporal.kind) {
    case 'LocalDate': return dateGetLong(temporal, field)
    case 'LocalTime': return timeGetLong(temporal, field)
    case 'LocalDateTime': return dateTimeGetLong(temporal, field)
    case 'Instant': return instantGetLong(temporal, field)
    case 'OffsetDateTime': return offsetDateTimeGetLong(temporal, field)
    case 'OffsetTime': return offsetTimeGetLong(temporal, field)
    case 'ZonedDateTime': return zonedGetLong(temporal, field)
    case 'YearMonth': return yearMonthGetLong(temporal, field)
    case 'MonthDay': return monthDayGetLong(temporal, field)
  }
}

/**
 * Reads a field whose values fit an int. Fields such as EpochDay or
 * InstantSeconds have to be read with `getLong`.
 */
export function getField(temporal: Temporal, field: ChronoField): number {
  requireNonNull(field, 'field')
  const range = fieldRange(temporal, field)
  if (!isIntRange(range)) {
    throw new UnsupportedFieldError(`Invalid field ${field} for get() method, use getLong() instead`)
  }
  return checkValidValue(range, getLong(temporal, field), field)
}

/** Range of a field for this value; unsupported fields raise. */
export function fieldRange(temporal: Temporal, field: ChronoField): ValueRange {
  requireNonNull(field, 'field')
  if (!isSupported(temporal, field)) throw unsupported(field)
  switch (temporal.kind) {
    case 'LocalDate': return dateFieldRange(temporal, field)
    case 'LocalTime': return timeFieldRange(field)
    case 'LocalDateTime': return dateTimeFieldRange(temporal, field)
    case 'OffsetDateTime': return offsetDateTimeFieldRange(temporal, field)
    case 'OffsetTime': return offsetTimeFieldRange(field)
    case 'ZonedDateTime': return zonedFieldRange(temporal, field)
    case 'YearMonth':
      if (field === 'YearOfEra') return valueRangeOf(1, temporal.year <= 0 ? YEAR_MAX + 1 : YEAR_MAX)
      return fieldRangeOf(field)
    case 'MonthDay':
      if (field === 'DayOfMonth') return valueRangeOf(1, monthMaxLength(monthOf(temporal.month)))
      return fieldRangeOf(field)
    case 'Instant':
      return fieldRangeOf(field)
  }
}

function yearMonthGetLong(ym: YearMonth, field: ChronoField): number {
  switch (field) {
    case 'MonthOfYear': return ym.month
    case 'ProlepticMonth': return ym.year * 12 + ym.month - 1
    case 'YearOfEra': return ym.year >= 1 ? ym.year : 1 - ym.year
    case 'Year': return ym.year
    case 'Era': return ym.year >= 1 ? 1 : 0
    default: throw unsupported(field)
  }
}

function monthDayGetLong(md: MonthDay, field: ChronoField): number {
  switch (field) {
    case 'MonthOfYear': return md.month
    case 'DayOfMonth': return md.day
    default: throw unsupported(field)
  }
}

