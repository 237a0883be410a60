/**
 * Month-Day
 *
 * A day in a month with no year. February 29 is a valid month-day; it
 * becomes February 28 when placed in a year that is not a leap year.
 */

import type { LocalDate, MonthDay } from './types'
import { DateTimeRangeError, requireNonNull, type ParseError } from './errors'
import { type Result, Err } from './result'
import { checkField } from './fields'
import { isLeapYear } from './internal/calendar'
import { pad2 } from './internal/helpers'
import { parseFailure, resolveParsed, digits } from './internal/parse'
import { dateOf } from './local-date'
import { monthMaxLength, monthName, monthOf } from './month'

export function monthDayOf(month: number, day: number): MonthDay {
  checkField('MonthOfYear', month)
  checkField('DayOfMonth', day)
  const m = monthOf(month)
  if (day > monthMaxLength(m)) {
    throw new DateTimeRangeError(`Illegal value for DayOfMonth field, value ${day} is not valid for month ${monthName(m)}`)
  }
  return { kind: 'MonthDay', month, day }
}

export function monthDayFromDate(date: LocalDate): MonthDay {
  return { kind: 'MonthDay', month: date.month, day: date.day }
}

export function monthDayIsValidYear(md: MonthDay, year: number): boolean {
  return !(md.day === 29 && md.month === 2 && !isLeapYear(year))
}

export function monthDayAtYear(md: MonthDay, year: number): LocalDate {
  return dateOf(year, md.month, monthDayIsValidYear(md, year) ? md.day : 28)
}

export function monthDayWithMonth(md: MonthDay, month: number): MonthDay {
  checkField('MonthOfYear', month)
  return monthDayOf(month, Math.min(md.day, monthMaxLength(monthOf(month))))
}

export function compareMonthDays(a: MonthDay, b: MonthDay): number {
  return a.month - b.month || a.day - b.day
}

export function monthDayEquals(a: MonthDay, b: MonthDay): boolean {
  return a.month === b.month && a.day === b.day
}

export function formatMonthDay(md: MonthDay): string {
  return '--' + pad2(md.month) + '-' + pad2(md.day)
}

export function parseMonthDay(text: string): Result<MonthDay, ParseError> {
  requireNonNull(text, 'text')
  const match = /^--(\d{2})-(\d{2})$/.exec(text)
  if (!match) return Err(parseFailure(text))
  return resolveParsed(text, () => monthDayOf(digits(match[1]), digits(match[2])))
}
