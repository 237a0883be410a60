/**
 * Proleptic ISO calendar arithmetic on plain numbers.
 *
 * Epoch-day counts days from 1970-01-01. The conversions use 400-year
 * cycles so they hold for negative years too.
 *
 * Years are limited to -999,999..999,999 so that every epoch-second of the
 * range, and every nanosecond count of a day, stays a safe integer. Durations
 * are limited to safe-integer seconds for the same reason.
 */

import { floorDiv, floorMod } from './math'

export const YEAR_MIN = -999_999
export const YEAR_MAX = 999_999

const DAYS_PER_CYCLE = 146_097
const DAYS_0000_TO_1970 = DAYS_PER_CYCLE * 5 - (30 * 365 + 7)

const MONTH_LENGTHS = [31, 28, 31, 30, 31, 30, 31, 31, 30, 31, 30, 31]

export function isLeapYear(year: number): boolean {
  return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0
}

export function daysInMonth(year: number, month: number): number {
  if (month === 2 && isLeapYear(year)) return 29
  return MONTH_LENGTHS[month - 1]!
}

export function daysInYear(year: number): number {
  return isLeapYear(year) ? 366 : 365
}

/** Day-of-year of the first day of a month. */
export function firstDayOfYearOfMonth(month: number, leap: boolean): number {
  let total = 1
  for (let m = 1; m < month; m++) total += MONTH_LENGTHS[m - 1]! + (m === 2 && leap ? 1 : 0)
  return total
}

export function toEpochDay(year: number, month: number, day: number): number {
  let total = 365 * year
  if (year >= 0) {
    total += Math.trunc((year + 3) / 4) - Math.trunc((year + 99) / 100) + Math.trunc((year + 399) / 400)
  } else {
    total -= Math.trunc(year / -4) - Math.trunc(year / -100) + Math.trunc(year / -400)
  }
  total += Math.trunc((367 * month - 362) / 12)
  total += day - 1
  if (month > 2) {
    total--
    if (!isLeapYear(year)) total--
  }
  return total - DAYS_0000_TO_1970
}

export function fromEpochDay(epochDay: number): { year: number; month: number; day: number } {
  let zeroDay = epochDay + DAYS_0000_TO_1970
  // shift to a year starting 1 March so the leap day is last
  zeroDay -= 60
  let adjust = 0
  if (zeroDay < 0) {
    const adjustCycles = Math.trunc((zeroDay + 1) / DAYS_PER_CYCLE) - 1
    adjust = adjustCycles * 400
    zeroDay += -adjustCycles * DAYS_PER_CYCLE
  }
  let yearEst = Math.trunc((400 * zeroDay + 591) / DAYS_PER_CYCLE)
  let doyEst = zeroDay - (365 * yearEst + Math.trunc(yearEst / 4) - Math.trunc(yearEst / 100) + Math.trunc(yearEst / 400))
  if (doyEst < 0) {
    yearEst--
    doyEst = zeroDay - (365 * yearEst + Math.trunc(yearEst / 4) - Math.trunc(yearEst / 100) + Math.trunc(yearEst / 400))
  }
  yearEst += adjust
  const marchMonth0 = Math.trunc((doyEst * 5 + 2) / 153)
  const month = ((marchMonth0 + 2) % 12) + 1
  const day = doyEst - Math.trunc((marchMonth0 * 306 + 5) / 10) + 1
  yearEst += Math.trunc(marchMonth0 / 10)
  return { year: yearEst, month, day }
}

/** ISO day-of-week (Monday = 1) of an epoch-day; 1970-01-01 was a Thursday. */
export function dayOfWeekOfEpochDay(epochDay: number): number {
  return floorMod(epochDay + 3, 7) + 1
}

export const EPOCH_DAY_MIN = toEpochDay(YEAR_MIN, 1, 1)
export const EPOCH_DAY_MAX = toEpochDay(YEAR_MAX, 12, 31)

export function prolepticMonthToYearMonth(prolepticMonth: number): { year: number; month: number } {
  return { year: floorDiv(prolepticMonth, 12), month: floorMod(prolepticMonth, 12) + 1 }
}
