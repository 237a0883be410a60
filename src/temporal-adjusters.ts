/**
 * Temporal Adjusters
 *
 * Common date adjustments, each a function from one LocalDate to another.
 * Pass them to `dateWith`, `dateTimeWith`, `zonedWith` or `chronoWith`.
 */

import type { DayOfWeek } from './types'
import { requireNonNull } from './errors'
import {
  dateOf, dateDayOfWeek, dateLengthOfMonth, datePlusDays, datePlusMonths,
  datePlusYears, type DateAdjuster,
} from './local-date'

export type { DateAdjuster } from './local-date'

// ============================================================================
// Month and Year Boundaries
// ============================================================================

export const firstDayOfMonth: DateAdjuster = date => dateOf(date.year, date.month, 1)

export const lastDayOfMonth: DateAdjuster = date => dateOf(date.year, date.month, dateLengthOfMonth(date))

export const firstDayOfNextMonth: DateAdjuster = date => datePlusMonths(dateOf(date.year, date.month, 1), 1)

export const firstDayOfYear: DateAdjuster = date => dateOf(date.year, 1, 1)

export const lastDayOfYear: DateAdjuster = date => dateOf(date.year, 12, 31)

export const firstDayOfNextYear: DateAdjuster = date => datePlusYears(dateOf(date.year, 1, 1), 1)

// ============================================================================
// Day-of-Week Movers
// ============================================================================

/** The first matching day-of-week in the month. */
export function firstInMonth(dayOfWeek: DayOfWeek): DateAdjuster {
  return dayOfWeekInMonth(1, dayOfWeek)
}

/** The last matching day-of-week in the month. */
export function lastInMonth(dayOfWeek: DayOfWeek): DateAdjuster {
  return dayOfWeekInMonth(-1, dayOfWeek)
}

/**
 * The nth matching day-of-week in the month. Zero means the last match in
 * the previous month; negative values count back from the end of the month.
 * Ordinals beyond the month roll into the next or previous month.
 */
export function dayOfWeekInMonth(ordinal: number, dayOfWeek: DayOfWeek): DateAdjuster {
  requireNonNull(dayOfWeek, 'dayOfWeek')
  if (ordinal >= 0) {
    return date => {
      const first = dateOf(date.year, date.month, 1)
      const diff = (dayOfWeek - dateDayOfWeek(first) + 7) % 7
      return datePlusDays(first, (ordinal - 1) * 7 + diff)
    }
  }
  return date => {
    const last = dateOf(date.year, date.month, dateLengthOfMonth(date))
    let diff = dayOfWeek - dateDayOfWeek(last)
    diff = diff === 0 ? 0 : diff > 0 ? diff - 7 : diff
    return datePlusDays(last, (ordinal + 1) * 7 + diff)
  }
}

/** The next matching day-of-week, strictly after the date. */
export function next(dayOfWeek: DayOfWeek): DateAdjuster {
  requireNonNull(dayOfWeek, 'dayOfWeek')
  return date => {
    const diff = dateDayOfWeek(date) - dayOfWeek
    return datePlusDays(date, diff >= 0 ? 7 - diff : -diff)
  }
}

export function nextOrSame(dayOfWeek: DayOfWeek): DateAdjuster {
  requireNonNull(dayOfWeek, 'dayOfWeek')
  return date => {
    const current = dateDayOfWeek(date)
    if (current === dayOfWeek) return date
    const diff = current - dayOfWeek
    return datePlusDays(date, diff >= 0 ? 7 - diff : -diff)
  }
}

/** The previous matching day-of-week, strictly before the date. */
export function previous(dayOfWeek: DayOfWeek): DateAdjuster {
  requireNonNull(dayOfWeek, 'dayOfWeek')
  return date => {
    const diff = dayOfWeek - dateDayOfWeek(date)
    return datePlusDays(date, -(diff >= 0 ? 7 - diff : -diff))
  }
}

export function previousOrSame(dayOfWeek: DayOfWeek): DateAdjuster {
  requireNonNull(dayOfWeek, 'dayOfWeek')
  return date => {
    const current = dateDayOfWeek(date)
    if (current === dayOfWeek) return date
    const diff = dayOfWeek - current
    return datePlusDays(date, -(diff >= 0 ? 7 - diff : -diff))
  }
}

