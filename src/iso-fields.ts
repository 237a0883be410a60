/**
 * ISO Quarter & Week Fields
 *
 * Fields and units of the ISO-8601 quarter and week-based calendars:
 *
 *   QuarterOfYear         1 - 4
 *   DayOfQuarter          1 - 90/92
 *   WeekOfWeekBasedYear   1 - 52/53
 *   WeekBasedYear         the year that owns the week
 *
 * A week-based year starts on the Monday of the week holding January 4th,
 * so the first days of January may belong to the last week of the previous
 * year and the last days of December to week 1 of the next.
 *
 * The fields apply to every value that carries an ISO date: LocalDate,
 * LocalDateTime, OffsetDateTime and ZonedDateTime.
 */

import type { DayOfWeek, LocalDate, LocalDateTime, OffsetDateTime, ZonedDateTime } from './types'
import { DateTimeRangeError, requireNonNull } from './errors'
import { formatValueRange, isValidValue, valueRangeOf, valueRangeOfVariable, type ValueRange } from './fields'
import { addExact, multiplyExact } from './internal/math'
import {
  YEAR_MAX, YEAR_MIN, dayOfWeekOfEpochDay, firstDayOfYearOfMonth, fromEpochDay, isLeapYear, toEpochDay,
} from './internal/calendar'
import {
  dateDayOfWeek, dateDayOfYear, dateOfEpochDay, dateOfYearDay, datePlusDays, datePlusMonths, datePlusWeeks,
  dateToEpochDay, dateUntil, dateWithField, type DateAdjuster,
} from './local-date'
import { dateTimeWith } from './local-date-time'
import { offsetDateTimeWith } from './offset-date-time'
import { zonedWith } from './zoned-date-time'

export type IsoField = 'QuarterOfYear' | 'DayOfQuarter' | 'WeekOfWeekBasedYear' | 'WeekBasedYear'

export type IsoUnit = 'QuarterYears' | 'WeekBasedYears'

/** The values the ISO fields can be read from and applied to. */
export type IsoTemporal = LocalDate | LocalDateTime | OffsetDateTime | ZonedDateTime

export const ISO_FIELDS: readonly IsoField[] = ['QuarterOfYear', 'DayOfQuarter', 'WeekOfWeekBasedYear', 'WeekBasedYear']

const OUTER_RANGES: Record<IsoField, ValueRange> = {
  QuarterOfYear: valueRangeOf(1, 4),
  DayOfQuarter: valueRangeOfVariable(1, 90, 92),
  WeekOfWeekBasedYear: valueRangeOfVariable(1, 52, 53),
  WeekBasedYear: valueRangeOf(YEAR_MIN, YEAR_MAX),
}

export function isIsoField(field: string): field is IsoField {
  return Object.hasOwn(OUTER_RANGES, field)
}

export function isIsoTemporal(temporal: { readonly kind: string }): temporal is IsoTemporal {
  switch (temporal.kind) {
    case 'LocalDate':
    case 'LocalDateTime':
    case 'OffsetDateTime':
    case 'ZonedDateTime':
      return true
    default:
      return false
  }
}

export function isoFieldOuterRange(field: IsoField): ValueRange {
  return OUTER_RANGES[field]
}

export function checkIsoField(field: IsoField, value: number, range: ValueRange = OUTER_RANGES[field]): number {
  if (!Number.isInteger(value) || !isValidValue(range, value)) {
    throw new DateTimeRangeError(`Invalid value for ${field} (valid values ${formatValueRange(range)}): ${value}`)
  }
  return value
}

function dateOfTemporal(temporal: IsoTemporal): LocalDate {
  switch (temporal.kind) {
    case 'LocalDate': return temporal
    case 'LocalDateTime': return temporal.date
    case 'OffsetDateTime':
    case 'ZonedDateTime':
      return temporal.dateTime.date
  }
}

function adjust(temporal: IsoTemporal, adjuster: DateAdjuster): IsoTemporal {
  switch (temporal.kind) {
    case 'LocalDate': return adjuster(temporal)
    case 'LocalDateTime': return dateTimeWith(temporal, adjuster)
    case 'OffsetDateTime': return offsetDateTimeWith(temporal, adjuster)
    case 'ZonedDateTime': return zonedWith(temporal, adjuster)
  }
}

// ============================================================================
// Quarters
// ============================================================================

function quarterOf(date: LocalDate): number {
  return Math.floor((date.month + 2) / 3)
}

function dayOfQuarter(date: LocalDate): number {
  const firstMonth = quarterOf(date) * 3 - 2
  return dateDayOfYear(date) - firstDayOfYearOfMonth(firstMonth, isLeapYear(date.year)) + 1
}

function quarterLength(year: number, quarter: number): number {
  if (quarter === 1) return isLeapYear(year) ? 91 : 90
  return quarter === 2 ? 91 : 92
}

/** The date of a day within a quarter of a year. */
export function isoDateOfQuarter(year: number, quarter: number, day: number): LocalDate {
  checkIsoField('QuarterOfYear', quarter)
  checkIsoField('DayOfQuarter', day, valueRangeOf(1, quarterLength(year, quarter)))
  return dateOfYearDay(year, firstDayOfYearOfMonth(quarter * 3 - 2, isLeapYear(year)) + day - 1)
}

// ============================================================================
// Week-Based Years
// ============================================================================

/** Epoch-day of the Monday that starts week 1 of a week-based year. */
function weekOneStart(weekBasedYear: number): number {
  const jan4 = toEpochDay(weekBasedYear, 1, 4)
  return jan4 - (dayOfWeekOfEpochDay(jan4) - 1)
}

/** A week-based year has 53 weeks when it starts on a Thursday, or on a Wednesday in a leap year. */
export function weeksInWeekBasedYear(weekBasedYear: number): number {
  const jan1 = dayOfWeekOfEpochDay(toEpochDay(weekBasedYear, 1, 1))
  return jan1 === 4 || (jan1 === 3 && isLeapYear(weekBasedYear)) ? 53 : 52
}

/** The week belongs to the year of its Thursday. */
function weekOf(date: LocalDate): { weekBasedYear: number; week: number } {
  const epochDay = dateToEpochDay(date)
  const thursday = fromEpochDay(epochDay + 4 - dayOfWeekOfEpochDay(epochDay))
  const dayOfYear = firstDayOfYearOfMonth(thursday.month, isLeapYear(thursday.year)) + thursday.day - 1
  return { weekBasedYear: thursday.year, week: Math.floor((dayOfYear - 1) / 7) + 1 }
}

/** The date of a day-of-week within a week of a week-based year. */
export function isoDateOfWeek(weekBasedYear: number, week: number, dayOfWeek: number): LocalDate {
  checkIsoField('WeekBasedYear', weekBasedYear)
  checkIsoField('WeekOfWeekBasedYear', week, valueRangeOf(1, weeksInWeekBasedYear(weekBasedYear)))
  if (!Number.isInteger(dayOfWeek) || dayOfWeek < 1 || dayOfWeek > 7) {
    throw new DateTimeRangeError(`Invalid value for DayOfWeek (valid values 1 - 7): ${dayOfWeek}`)
  }
  return dateOfEpochDay(weekOneStart(weekBasedYear) + (week - 1) * 7 + dayOfWeek - 1)
}

/** Moves to another week-based year, keeping the week and day-of-week; week 53 becomes 52 where needed. */
function withWeekBasedYear(date: LocalDate, weekBasedYear: number): LocalDate {
  const week = Math.min(weekOf(date).week, weeksInWeekBasedYear(weekBasedYear))
  return isoDateOfWeek(weekBasedYear, week, dateDayOfWeek(date))
}

// ============================================================================
// Field Access
// ============================================================================

export function isoGetLong(temporal: IsoTemporal, field: IsoField): number {
  requireNonNull(field, 'field')
  const date = dateOfTemporal(temporal)
  switch (field) {
    case 'QuarterOfYear': return quarterOf(date)
    case 'DayOfQuarter': return dayOfQuarter(date)
    case 'WeekOfWeekBasedYear': return weekOf(date).week
    case 'WeekBasedYear': return weekOf(date).weekBasedYear
  }
}

/** Range of a field for this particular value. */
export function isoFieldRange(temporal: IsoTemporal, field: IsoField): ValueRange {
  requireNonNull(field, 'field')
  const date = dateOfTemporal(temporal)
  switch (field) {
    case 'DayOfQuarter': return valueRangeOf(1, quarterLength(date.year, quarterOf(date)))
    case 'WeekOfWeekBasedYear': return valueRangeOf(1, weeksInWeekBasedYear(weekOf(date).weekBasedYear))
    default: return OUTER_RANGES[field]
  }
}

function withField(date: LocalDate, field: IsoField, value: number): LocalDate {
  checkIsoField(field, value)
  switch (field) {
    case 'QuarterOfYear': return dateWithField(date, 'MonthOfYear', date.month + (value - quarterOf(date)) * 3)
    case 'DayOfQuarter': return datePlusDays(date, value - dayOfQuarter(date))
    case 'WeekOfWeekBasedYear': return datePlusWeeks(date, value - weekOf(date).week)
    case 'WeekBasedYear': return withWeekBasedYear(date, value)
  }
}

/**
 * Sets a field, leaving the time and zone alone. DayOfQuarter and
 * WeekOfWeekBasedYear move by days and weeks, so a value past the end of the
 * quarter or year rolls into the next one.
 */
export function isoWithField(temporal: LocalDate, field: IsoField, value: number): LocalDate
export function isoWithField(temporal: LocalDateTime, field: IsoField, value: number): LocalDateTime
export function isoWithField(temporal: OffsetDateTime, field: IsoField, value: number): OffsetDateTime
export function isoWithField(temporal: ZonedDateTime, field: IsoField, value: number): ZonedDateTime
export function isoWithField(temporal: IsoTemporal, field: IsoField, value: number): IsoTemporal
export function isoWithField(temporal: IsoTemporal, field: IsoField, value: number): IsoTemporal {
  requireNonNull(field, 'field')
  const date = withField(dateOfTemporal(temporal), field, value)
  return adjust(temporal, () => date)
}

// ============================================================================
// Units
// ============================================================================

function plusUnit(date: LocalDate, amount: number, unit: IsoUnit): LocalDate {
  switch (unit) {
    case 'QuarterYears': return datePlusMonths(date, multiplyExact(amount, 3))
    case 'WeekBasedYears': return withWeekBasedYear(date, addExact(weekOf(date).weekBasedYear, amount))
  }
}

export function isoPlus(temporal: LocalDate, amount: number, unit: IsoUnit): LocalDate
export function isoPlus(temporal: LocalDateTime, amount: number, unit: IsoUnit): LocalDateTime
export function isoPlus(temporal: OffsetDateTime, amount: number, unit: IsoUnit): OffsetDateTime
export function isoPlus(temporal: ZonedDateTime, amount: number, unit: IsoUnit): ZonedDateTime
export function isoPlus(temporal: IsoTemporal, amount: number, unit: IsoUnit): IsoTemporal
export function isoPlus(temporal: IsoTemporal, amount: number, unit: IsoUnit): IsoTemporal {
  requireNonNull(unit, 'unit')
  if (amount === 0) return temporal
  const date = plusUnit(dateOfTemporal(temporal), amount, unit)
  return adjust(temporal, () => date)
}

/** Whole units from one date to another, negative when `end` is earlier. */
export function isoUntil(start: LocalDate, end: LocalDate, unit: IsoUnit): number {
  requireNonNull(unit, 'unit')
  switch (unit) {
    case 'QuarterYears': return Math.trunc(dateUntil(start, end, 'Months') / 3)
    case 'WeekBasedYears': return weekOf(end).weekBasedYear - weekOf(start).weekBasedYear
  }
}

/** The parts of an ISO week date such as `2009-W01-1`. */
export function isoWeekDate(date: LocalDate): { weekBasedYear: number; week: number; dayOfWeek: DayOfWeek } {
  return { ...weekOf(date), dayOfWeek: dateDayOfWeek(date) }
}
