/**
 * Day-of-Week
 *
 * ISO numbering: Monday = 1 through Sunday = 7.
 */

import type { DayOfWeek } from './types'
import { DateTimeRangeError } from './errors'
import { floorMod } from './internal/math'

export const MONDAY: DayOfWeek = 1
export const TUESDAY: DayOfWeek = 2
export const WEDNESDAY: DayOfWeek = 3
export const THURSDAY: DayOfWeek = 4
export const FRIDAY: DayOfWeek = 5
export const SATURDAY: DayOfWeek = 6
export const SUNDAY: DayOfWeek = 7

const DAY_NAMES = ['MONDAY', 'TUESDAY', 'WEDNESDAY', 'THURSDAY', 'FRIDAY', 'SATURDAY', 'SUNDAY'] as const

export type DayOfWeekName = (typeof DAY_NAMES)[number]

const DAYS: readonly DayOfWeek[] = [1, 2, 3, 4, 5, 6, 7]

export function isDayOfWeek(value: number): value is DayOfWeek {
  return Number.isInteger(value) && value >= 1 && value <= 7
}

export function dayOfWeekOf(value: number): DayOfWeek {
  if (!isDayOfWeek(value)) throw new DateTimeRangeError(`Invalid value for DayOfWeek: ${value}`)
  return value
}

export function dayOfWeekPlus(dow: DayOfWeek, days: number): DayOfWeek {
  return DAYS[floorMod(dow - 1 + floorMod(days, 7), 7)]!
}

export function dayOfWeekMinus(dow: DayOfWeek, days: number): DayOfWeek {
  return dayOfWeekPlus(dow, -floorMod(days, 7))
}

/** Upper-case English name, e.g. 'SUNDAY'. */
export function dayOfWeekName(dow: DayOfWeek): DayOfWeekName {
  return DAY_NAMES[dow - 1]!
}

/** Matches a full name or a prefix of at least three letters, ignoring case. */
export function dayOfWeekFromName(text: string): DayOfWeek | null {
  const upper = text.toUpperCase()
  if (upper.length < 3) return null
  const index = DAY_NAMES.findIndex((name) => name.startsWith(upper))
  return index < 0 ? null : DAYS[index]!
}
