/**
 * Year-Month
 *
 * A month in a particular year, such as `2007-12`.
 */

import type { LocalDate, YearMonth } from './types'
import { requireNonNull, type ParseError } from './errors'
import { type Result, Err } from './result'
import { checkField } from './fields'
import { addExact, multiplyExact, floorDiv, floorMod } from './internal/math'
import { daysInMonth, isLeapYear } from './internal/calendar'
import { pad2, formatYear } from './internal/helpers'
import { parseFailure, resolveParsed, digits } from './internal/parse'
import { dateOf } from './local-date'

function make(year: number, month: number): YearMonth {
  return { kind: 'YearMonth', year, month }
}

export function yearMonthOf(year: number, month: number): YearMonth {
  checkField('Year', year)
  checkField('MonthOfYear', month)
  return make(year, month)
}

export function yearMonthFromDate(date: LocalDate): YearMonth {
  return make(date.year, date.month)
}

export function yearMonthPlusMonths(ym: YearMonth, months: number): YearMonth {
  if (months === 0) return ym
  const calc = addExact(ym.year * 12 + ym.month - 1, months)
  const year = floorDiv(calc, 12)
  return yearMonthOf(year, floorMod(calc, 12) + 1)
}

export function yearMonthPlusYears(ym: YearMonth, years: number): YearMonth {
  if (years === 0) return ym
  return yearMonthOf(addExact(ym.year, years), ym.month)
}

export function yearMonthMinusMonths(ym: YearMonth, months: number): YearMonth {
  return yearMonthPlusMonths(ym, -months)
}

export function yearMonthMinusYears(ym: YearMonth, years: number): YearMonth {
  return yearMonthPlusYears(ym, -years)
}

export function yearMonthIsLeapYear(ym: YearMonth): boolean {
  return isLeapYear(ym.year)
}

export function yearMonthLengthOfMonth(ym: YearMonth): number {
  return daysInMonth(ym.year, ym.month)
}

export function yearMonthIsValidDay(ym: YearMonth, day: number): boolean {
  return day >= 1 && day <= yearMonthLengthOfMonth(ym)
}

export function yearMonthAtDay(ym: YearMonth, day: number): LocalDate {
  return dateOf(ym.year, ym.month, day)
}

export function yearMonthAtEndOfMonth(ym: YearMonth): LocalDate {
  return dateOf(ym.year, ym.month, yearMonthLengthOfMonth(ym))
}

/** Whole months from `start` to `end`. */
export function yearMonthMonthsUntil(start: YearMonth, end: YearMonth): number {
  return multiplyExact(end.year - start.year, 12) + (end.month - start.month)
}

export function compareYearMonths(a: YearMonth, b: YearMonth): number {
  return a.year - b.year || a.month - b.month
}

export function yearMonthEquals(a: YearMonth, b: YearMonth): boolean {
  return a.year === b.year && a.month === b.month
}

export function formatYearMonth(ym: YearMonth): string {
  return formatYear(ym.year) + '-' + pad2(ym.month)
}

const YEAR_MONTH_RE = /^(?:([+-])(\d{4,6})|(\d{4}))-(\d{2})$/

export function parseYearMonth(text: string): Result<YearMonth, ParseError> {
  requireNonNull(text, 'text')
  const match = YEAR_MONTH_RE.exec(text)
  if (!match || (match[1] === '+' && (match[2] ?? '').length === 4)) return Err(parseFailure(text))
  return resolveParsed(text, () => {
    const year = match[2] === undefined ? digits(match[3]) : (match[1] === '-' ? -1 : 1) * digits(match[2])
    return yearMonthOf(year + 0, digits(match[4]))
  })
}
