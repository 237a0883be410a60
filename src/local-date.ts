/**
 * Local Date
 *
 * A date in the proleptic ISO calendar, without time or zone.
 * All arithmetic goes through the epoch-day count, so month lengths and
 * leap years never need special cases in callers.
 */

import type { LocalDate, LocalDateTime, LocalTime, DayOfWeek, Period } from './types'
import { DateTimeRangeError, UnsupportedFieldError, requireNonNull, type ParseError } from './errors'
import { type Result, Err } from './result'
import {
  checkField, fieldRangeOf, isDateBasedField, valueRangeOf,
  type ChronoField, type ChronoUnit, type ValueRange,
} from './fields'
import {
  YEAR_MIN, YEAR_MAX, isLeapYear, daysInMonth, daysInYear,
  toEpochDay, fromEpochDay, dayOfWeekOfEpochDay, firstDayOfYearOfMonth,
} from './internal/calendar'
import { addExact, multiplyExact, floorDiv, floorMod } from './internal/math'
import { pad2, formatYear } from './internal/helpers'
import { parseFailure, resolveParsed, digits } from './internal/parse'
import { MIDNIGHT } from './local-time'
import { dayOfWeekOf } from './day-of-week'
import { monthName, monthOf } from './month'

export { isLeapYear } from './internal/calendar'

function make(year: number, month: number, day: number): LocalDate {
  return { kind: 'LocalDate', year, month, day }
}

// ============================================================================
// Construction
// ============================================================================

export function dateOf(year: number, month: number, day: number): LocalDate {
  checkField('Year', year)
  checkField('MonthOfYear', month)
  checkField('DayOfMonth', day)
  if (day > 28 && day > daysInMonth(year, month)) {
    if (day === 29) {
      throw new DateTimeRangeError(`Invalid date 'February 29' as '${year}' is not a leap year`)
    }
    throw new DateTimeRangeError(`Invalid date '${monthName(monthOf(month))} ${day}'`)
  }
  return make(year, month, day)
}

export function dateOfYearDay(year: number, dayOfYear: number): LocalDate {
  checkField('Year', year)
  checkField('DayOfYear', dayOfYear)
  const leap = isLeapYear(year)
  if (dayOfYear === 366 && !leap) {
    throw new DateTimeRangeError(`Invalid date 'DayOfYear 366' as '${year}' is not a leap year`)
  }
  let month = Math.floor((dayOfYear - 1) / 31) + 1
  const monthEnd = firstDayOfYearOfMonth(month, leap) + daysInMonth(year, month) - 1
  if (dayOfYear > monthEnd) month++
  const day = dayOfYear - firstDayOfYearOfMonth(month, leap) + 1
  return make(year, month, day)
}

export function dateOfEpochDay(epochDay: number): LocalDate {
  checkField('EpochDay', epochDay)
  const { year, month, day } = fromEpochDay(epochDay)
  return make(year, month, day)
}

export const DATE_MIN: LocalDate = make(YEAR_MIN, 1, 1)
export const DATE_MAX: LocalDate = make(YEAR_MAX, 12, 31)
export const EPOCH: LocalDate = make(1970, 1, 1)

/** Builds a date, moving an invalid day-of-month back to the last valid day. */
function resolvePreviousValid(year: number, month: number, day: number): LocalDate {
  return make(year, month, Math.min(day, daysInMonth(year, month)))
}

// ============================================================================
// Derived Values
// ============================================================================

export function dateToEpochDay(date: LocalDate): number {
  return toEpochDay(date.year, date.month, date.day)
}

export function dateDayOfWeek(date: LocalDate): DayOfWeek {
  return dayOfWeekOf(dayOfWeekOfEpochDay(dateToEpochDay(date)))
}

export function dateDayOfYear(date: LocalDate): number {
  return firstDayOfYearOfMonth(date.month, isLeapYear(date.year)) + date.day - 1
}

export function dateLengthOfMonth(date: LocalDate): number {
  return daysInMonth(date.year, date.month)
}

export function dateLengthOfYear(date: LocalDate): number {
  return daysInYear(date.year)
}

export function dateIsLeapYear(date: LocalDate): boolean {
  return isLeapYear(date.year)
}

function prolepticMonth(date: LocalDate): number {
  return date.year * 12 + date.month - 1
}

// ============================================================================
// Arithmetic
// ============================================================================

export function datePlusDays(date: LocalDate, days: number): LocalDate {
  if (days === 0) return date
  return dateOfEpochDay(addExact(dateToEpochDay(date), days))
}

export function datePlusWeeks(date: LocalDate, weeks: number): LocalDate {
  return datePlusDays(date, multiplyExact(weeks, 7))
}

/** Adds months, clamping the day to the end of the resulting month. */
export function datePlusMonths(date: LocalDate, months: number): LocalDate {
  if (months === 0) return date
  const calcMonths = addExact(prolepticMonth(date), months)
  const year = checkField('Year', floorDiv(calcMonths, 12))
  return resolvePreviousValid(year, floorMod(calcMonths, 12) + 1, date.day)
}

/** Adds years, moving February 29 to February 28 when needed. */
export function datePlusYears(date: LocalDate, years: number): LocalDate {
  if (years === 0) return date
  const year = checkField('Year', addExact(date.year, years))
  return resolvePreviousValid(year, date.month, date.day)
}

export function dateMinusDays(date: LocalDate, days: number): LocalDate {
  return datePlusDays(date, -days)
}

export function dateMinusWeeks(date: LocalDate, weeks: number): LocalDate {
  return datePlusWeeks(date, -weeks)
}

export function dateMinusMonths(date: LocalDate, months: number): LocalDate {
  return datePlusMonths(date, -months)
}

export function dateMinusYears(date: LocalDate, years: number): LocalDate {
  return datePlusYears(date, -years)
}

export function datePlus(date: LocalDate, amount: number, unit: ChronoUnit): LocalDate {
  switch (unit) {
    case 'Days': return datePlusDays(date, amount)
    case 'Weeks': return datePlusWeeks(date, amount)
    case 'Months': return datePlusMonths(date, amount)
    case 'Years': return datePlusYears(date, amount)
    case 'Decades': return datePlusYears(date, multiplyExact(amount, 10))
    case 'Centuries': return datePlusYears(date, multiplyExact(amount, 100))
    case 'Millennia': return datePlusYears(date, multiplyExact(amount, 1_000))
    case 'Eras': return dateWithField(date, 'Era', addExact(dateGetLong(date, 'Era'), amount))
    default: throw new UnsupportedFieldError(`Unsupported unit: ${unit}`)
  }
}

export function dateMinus(date: LocalDate, amount: number, unit: ChronoUnit): LocalDate {
  return datePlus(date, -amount, unit)
}

/** Adds the years and months together first, then the days. */
export function datePlusPeriod(date: LocalDate, period: Period): LocalDate {
  let result = date
  if (period.years !== 0 && period.months !== 0) {
    result = datePlusMonths(result, addExact(multiplyExact(period.years, 12), period.months))
  } else {
    result = datePlusYears(result, period.years)
    result = datePlusMonths(result, period.months)
  }
  return datePlusDays(result, period.days)
}

export function dateMinusPeriod(date: LocalDate, period: Period): LocalDate {
  let result = date
  if (period.years !== 0 && period.months !== 0) {
    result = datePlusMonths(result, -addExact(multiplyExact(period.years, 12), period.months))
  } else {
    result = datePlusYears(result, -period.years)
    result = datePlusMonths(result, -period.months)
  }
  return datePlusDays(result, -period.days)
}

// ============================================================================
// Adjustment
// ============================================================================

export function dateWithYear(date: LocalDate, year: number): LocalDate {
  if (date.year === year) return date
  checkField('Year', year)
  return resolvePreviousValid(year, date.month, date.day)
}

export function dateWithMonth(date: LocalDate, month: number): LocalDate {
  if (date.month === month) return date
  checkField('MonthOfYear', month)
  return resolvePreviousValid(date.year, month, date.day)
}

export function dateWithDayOfMonth(date: LocalDate, day: number): LocalDate {
  if (date.day === day) return date
  return dateOf(date.year, date.month, day)
}

export function dateWithDayOfYear(date: LocalDate, dayOfYear: number): LocalDate {
  if (dateDayOfYear(date) === dayOfYear) return date
  return dateOfYearDay(date.year, dayOfYear)
}

export function dateWithField(date: LocalDate, field: ChronoField, value: number): LocalDate {
  requireNonNull(field, 'field')
  if (!isDateBasedField(field)) throw new UnsupportedFieldError(`Unsupported field: ${field}`)
  checkField(field, value)
  switch (field) {
    case 'DayOfWeek': return datePlusDays(date, value - dateDayOfWeek(date))
    case 'AlignedDayOfWeekInMonth':
    case 'AlignedDayOfWeekInYear':
      return datePlusDays(date, value - dateGetLong(date, field))
    case 'DayOfMonth': return dateWithDayOfMonth(date, value)
    case 'DayOfYear': return dateWithDayOfYear(date, value)
    case 'EpochDay': return dateOfEpochDay(value)
    case 'AlignedWeekOfMonth':
    case 'AlignedWeekOfYear':
      return datePlusWeeks(date, value - dateGetLong(date, field))
    case 'MonthOfYear': return dateWithMonth(date, value)
    case 'ProlepticMonth': return datePlusMonths(date, value - prolepticMonth(date))
    case 'YearOfEra': return dateWithYear(date, date.year >= 1 ? value : 1 - value)
    case 'Year': return dateWithYear(date, value)
    case 'Era': return dateGetLong(date, 'Era') === value ? date : dateWithYear(date, 1 - date.year)
    default: throw new UnsupportedFieldError(`Unsupported field: ${field}`)
  }
}

export type DateAdjuster = (date: LocalDate) => LocalDate

export function dateWith(date: LocalDate, adjuster: DateAdjuster): LocalDate {
  return requireNonNull(adjuster, 'adjuster')(date)
}

// ============================================================================
// Combination
// ============================================================================

export function dateAtTime(date: LocalDate, time: LocalTime): LocalDateTime {
  return { kind: 'LocalDateTime', date, time: requireNonNull(time, 'time') }
}

export function dateAtStartOfDay(date: LocalDate): LocalDateTime {
  return dateAtTime(date, MIDNIGHT)
}

// ============================================================================
// Field Access
// ============================================================================

export function dateIsSupported(field: ChronoField): boolean {
  return isDateBasedField(field)
}

export function dateGetLong(date: LocalDate, field: ChronoField): number {
  requireNonNull(field, 'field')
  switch (field) {
    case 'DayOfWeek': return dateDayOfWeek(date)
    case 'AlignedDayOfWeekInMonth': return ((date.day - 1) % 7) + 1
    case 'AlignedDayOfWeekInYear': return ((dateDayOfYear(date) - 1) % 7) + 1
    case 'DayOfMonth': return date.day
    case 'DayOfYear': return dateDayOfYear(date)
    case 'EpochDay': return dateToEpochDay(date)
    case 'AlignedWeekOfMonth': return Math.floor((date.day - 1) / 7) + 1
    case 'AlignedWeekOfYear': return Math.floor((dateDayOfYear(date) - 1) / 7) + 1
    case 'MonthOfYear': return date.month
    case 'ProlepticMonth': return prolepticMonth(date)
    case 'YearOfEra': return date.year >= 1 ? date.year : 1 - date.year
    case 'Year': return date.year
    case 'Era': return date.year >= 1 ? 1 : 0
    default: throw new UnsupportedFieldError(`Unsupported field: ${field}`)
  }
}

/** Range of a field for this particular date, e.g. 1 - 29 for day-of-month in February 2024. */
export function dateFieldRange(date: LocalDate, field: ChronoField): ValueRange {
  requireNonNull(field, 'field')
  if (!isDateBasedField(field)) throw new UnsupportedFieldError(`Unsupported field: ${field}`)
  switch (field) {
    case 'DayOfMonth': return valueRangeOf(1, dateLengthOfMonth(date))
    case 'DayOfYear': return valueRangeOf(1, dateLengthOfYear(date))
    case 'AlignedWeekOfMonth': return valueRangeOf(1, date.month === 2 && !isLeapYear(date.year) ? 4 : 5)
    case 'YearOfEra': return valueRangeOf(1, date.year <= 0 ? YEAR_MAX + 1 : YEAR_MAX)
    default: return fieldRangeOf(field)
  }
}

/** Whole units from `start` to `end`, negative when `end` is earlier. */
export function dateUntil(start: LocalDate, end: LocalDate, unit: ChronoUnit): number {
  switch (unit) {
    case 'Days': return dateToEpochDay(end) - dateToEpochDay(start)
    case 'Weeks': return Math.trunc((dateToEpochDay(end) - dateToEpochDay(start)) / 7)
    case 'Months': return monthsUntil(start, end)
    case 'Years': return Math.trunc(monthsUntil(start, end) / 12)
    case 'Decades': return Math.trunc(monthsUntil(start, end) / 120)
    case 'Centuries': return Math.trunc(monthsUntil(start, end) / 1_200)
    case 'Millennia': return Math.trunc(monthsUntil(start, end) / 12_000)
    case 'Eras': return dateGetLong(end, 'Era') - dateGetLong(start, 'Era')
    default: throw new UnsupportedFieldError(`Unsupported unit: ${unit}`)
  }
}

/** Complete months, where a later day-of-month than the start's completes one. */
export function monthsUntil(start: LocalDate, end: LocalDate): number {
  const packed1 = prolepticMonth(start) * 32 + start.day
  const packed2 = prolepticMonth(end) * 32 + end.day
  return Math.trunc((packed2 - packed1) / 32)
}

// ============================================================================
// Comparison
// ============================================================================

export function compareDates(a: LocalDate, b: LocalDate): number {
  return a.year - b.year || a.month - b.month || a.day - b.day
}

export function isDateBefore(a: LocalDate, b: LocalDate): boolean {
  return compareDates(a, b) < 0
}

export function isDateAfter(a: LocalDate, b: LocalDate): boolean {
  return compareDates(a, b) > 0
}

export function dateEquals(a: LocalDate, b: LocalDate): boolean {
  return compareDates(a, b) === 0
}

// ============================================================================
// Formatting & Parsing
// ============================================================================

export function formatDate(date: LocalDate): string {
  return formatYear(date.year) + '-' + pad2(date.month) + '-' + pad2(date.day)
}

/** Year groups: sign and 5-6 digits, or a minus and 4 digits, or plain 4 digits. */
export const DATE_PATTERN = /(?:([+-])(\d{4,6})|(\d{4}))-(\d{2})-(\d{2})/

const DATE_RE = new RegExp('^' + DATE_PATTERN.source + '$')

export function parseDate(text: string): Result<LocalDate, ParseError> {
  requireNonNull(text, 'text')
  const match = DATE_RE.exec(text)
  if (!match || !validYearSign(match, 1)) return Err(parseFailure(text))
  return resolveParsed(text, () => dateFromMatch(match, 1))
}

/** A leading plus is only written for years beyond four digits. */
export function validYearSign(match: RegExpExecArray, index: number): boolean {
  return !(match[index] === '+' && (match[index + 1] ?? '').length === 4)
}

/** Builds a date from the five groups of DATE_PATTERN starting at `index`. */
export function dateFromMatch(match: RegExpExecArray, index: number): LocalDate {
  const signed = match[index + 1]
  const year = signed === undefined
    ? digits(match[index + 2])
    : (match[index] === '-' ? -1 : 1) * digits(signed)
  return dateOf(year + 0, digits(match[index + 3]), digits(match[index + 4]))
}
