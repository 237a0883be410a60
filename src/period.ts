/**
 * Period
 *
 * A date-based amount of years, months and days. The three components are
 * independent signed ints; nothing is carried between them unless
 * `periodNormalized` is asked for.
 */

import type { LocalDate, Period } from './types'
import { DateTimeError, ParseError, requireNonNull } from './errors'
import { type Result, Ok, Err } from './result'
import { addExact, subtractExact, multiplyExact, toIntExact } from './internal/math'
import { dateToEpochDay, datePlusMonths, dateLengthOfMonth } from './local-date'

function create(years: number, months: number, days: number): Period {
  return { kind: 'Period', years: years + 0, months: months + 0, days: days + 0 }
}

export const PERIOD_ZERO: Period = create(0, 0, 0)

// ============================================================================
// Construction
// ============================================================================

export function periodOf(years: number, months: number, days: number): Period {
  return create(toIntExact(years), toIntExact(months), toIntExact(days))
}

export function periodOfYears(years: number): Period {
  return periodOf(years, 0, 0)
}

export function periodOfMonths(months: number): Period {
  return periodOf(0, months, 0)
}

export function periodOfWeeks(weeks: number): Period {
  return periodOf(0, 0, multiplyExact(weeks, 7))
}

export function periodOfDays(days: number): Period {
  return periodOf(0, 0, days)
}

/**
 * The amount between two dates, as complete years and months plus the
 * remaining days. The start date is included and the end date excluded.
 */
export function periodBetween(start: LocalDate, end: LocalDate): Period {
  requireNonNull(start, 'start')
  requireNonNull(end, 'end')
  let totalMonths = prolepticMonth(end) - prolepticMonth(start)
  let days = end.day - start.day
  if (totalMonths > 0 && days < 0) {
    totalMonths--
    days = dateToEpochDay(end) - dateToEpochDay(datePlusMonths(start, totalMonths))
  } else if (totalMonths < 0 && days > 0) {
    totalMonths++
    days -= dateLengthOfMonth(end)
  }
  return periodOf(Math.trunc(totalMonths / 12), totalMonths % 12, days)
}

function prolepticMonth(date: LocalDate): number {
  return date.year * 12 + date.month - 1
}

// ============================================================================
// Arithmetic
// ============================================================================

export function periodPlus(a: Period, b: Period): Period {
  return periodOf(addExact(a.years, b.years), addExact(a.months, b.months), addExact(a.days, b.days))
}

export function periodMinus(a: Period, b: Period): Period {
  return periodOf(subtractExact(a.years, b.years), subtractExact(a.months, b.months), subtractExact(a.days, b.days))
}

export function periodPlusYears(period: Period, years: number): Period {
  return periodOf(addExact(period.years, years), period.months, period.days)
}

export function periodPlusMonths(period: Period, months: number): Period {
  return periodOf(period.years, addExact(period.months, months), period.days)
}

export function periodPlusDays(period: Period, days: number): Period {
  return periodOf(period.years, period.months, addExact(period.days, days))
}

export function periodWithYears(period: Period, years: number): Period {
  return periodOf(years, period.months, period.days)
}

export function periodWithMonths(period: Period, months: number): Period {
  return periodOf(period.years, months, period.days)
}

export function periodWithDays(period: Period, days: number): Period {
  return periodOf(period.years, period.months, days)
}

export function periodMultipliedBy(period: Period, scalar: number): Period {
  if (period === PERIOD_ZERO || scalar === 1) return period
  return periodOf(
    multiplyExact(period.years, scalar),
    multiplyExact(period.months, scalar),
    multiplyExact(period.days, scalar),
  )
}

export function periodNegated(period: Period): Period {
  return periodMultipliedBy(period, -1)
}

/** Moves whole years out of the months; days are left alone. */
export function periodNormalized(period: Period): Period {
  const totalMonths = periodToTotalMonths(period)
  return periodOf(Math.trunc(totalMonths / 12), totalMonths % 12, period.days)
}

// ============================================================================
// Queries
// ============================================================================

export function periodToTotalMonths(period: Period): number {
  return period.years * 12 + period.months
}

export function periodIsZero(period: Period): boolean {
  return period.years === 0 && period.months === 0 && period.days === 0
}

/** True when any component is negative. */
export function periodIsNegative(period: Period): boolean {
  return period.years < 0 || period.months < 0 || period.days < 0
}

export function periodEquals(a: Period, b: Period): boolean {
  return a.years === b.years && a.months === b.months && a.days === b.days
}

// ============================================================================
// Formatting & Parsing
// ============================================================================

export function formatPeriod(period: Period): string {
  if (periodIsZero(period)) return 'P0D'
  let text = 'P'
  if (period.years !== 0) text += period.years + 'Y'
  if (period.months !== 0) text += period.months + 'M'
  if (period.days !== 0) text += period.days + 'D'
  return text
}

const PERIOD_RE = /^([-+]?)P(?:([-+]?[0-9]+)Y)?(?:([-+]?[0-9]+)M)?(?:([-+]?[0-9]+)W)?(?:([-+]?[0-9]+)D)?$/i

/** Parses `PnYnMnWnD`; each component and the whole may carry a sign. Weeks become days. */
export function parsePeriod(text: string): Result<Period, ParseError> {
  requireNonNull(text, 'text')
  const match = PERIOD_RE.exec(text)
  const failure = new ParseError('Text cannot be parsed to a Period', text, 0)
  if (!match) return Err(failure)
  const [, sign, y, m, w, d] = match
  if (y === undefined && m === undefined && w === undefined && d === undefined) return Err(failure)
  const negate = sign === '-' ? -1 : 1
  try {
    const days = addExact(component(d, negate), multiplyExact(component(w, negate), 7))
    return Ok(periodOf(component(y, negate), component(m, negate), days))
  } catch (e) {
    if (e instanceof DateTimeError) return Err(failure)
    throw e
  }
}

function component(text: string | undefined, negate: number): number {
  if (text === undefined) return 0
  return toIntExact(parseInt(text, 10)) * negate
}
