/**
 * Month-of-Year
 */

import type { Month } from './types'
import { DateTimeRangeError } from './errors'
import { floorMod } from './internal/math'
import { daysInMonth, firstDayOfYearOfMonth } from './internal/calendar'

const MONTH_NAMES = [
  'JANUARY', 'FEBRUARY', 'MARCH', 'APRIL', 'MAY', 'JUNE',
  'JULY', 'AUGUST', 'SEPTEMBER', 'OCTOBER', 'NOVEMBER', 'DECEMBER',
] as const

export type MonthName = (typeof MONTH_NAMES)[number]

const MONTHS: readonly Month[] = [1, 2, 3, 4, 5, 6, 7, 8, 9, 10, 11, 12]

export function isMonth(value: number): value is Month {
  return Number.isInteger(value) && value >= 1 && value <= 12
}

export function monthOf(value: number): Month {
  if (!isMonth(value)) throw new DateTimeRangeError(`Invalid value for MonthOfYear: ${value}`)
  return value
}

export function monthPlus(month: Month, months: number): Month {
  return MONTHS[floorMod(month - 1 + floorMod(months, 12), 12)]!
}

export function monthLength(month: Month, leapYear: boolean): number {
  return daysInMonth(leapYear ? 2000 : 2001, month)
}

export function monthMinLength(month: Month): number {
  return monthLength(month, false)
}

export function monthMaxLength(month: Month): number {
  return monthLength(month, true)
}

export function monthFirstDayOfYear(month: Month, leapYear: boolean): number {
  return firstDayOfYearOfMonth(month, leapYear)
}

/** First month of the quarter containing the month. */
export function firstMonthOfQuarter(month: Month): Month {
  return MONTHS[Math.floor((month - 1) / 3) * 3]!
}

/** Upper-case English name, e.g. 'MARCH'. */
export function monthName(month: Month): MonthName {
  return MONTH_NAMES[month - 1]!
}

/** Matches a full name or a prefix of at least three letters, ignoring case. */
export function monthFromName(text: string): Month | null {
  const upper = text.toUpperCase()
  if (upper.length < 3) return null
  const index = MONTH_NAMES.findIndex((name) => name.startsWith(upper))
  return index < 0 ? null : MONTHS[index]!
}
