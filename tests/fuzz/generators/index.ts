/**
 * Generators for the value types.
 *
 * Dates are drawn from a year window and the day is clamped to the month,
 * so every generated value is valid.
 */
import * as fc from 'fast-check'
import type { Arbitrary } from 'fast-check'
import type { Instant, LocalDate, LocalDateTime, LocalTime, ZoneOffset } from '../../../src/types'
import { dateOf, dateOfEpochDay } from '../../../src/local-date'
import { timeOf } from '../../../src/local-time'
import { dateTimeOfDateAndTime } from '../../../src/local-date-time'
import { instantOfEpochSecond } from '../../../src/instant'
import { offsetOfTotalSeconds } from '../../../src/zone-offset'
import { EPOCH_DAY_MAX, EPOCH_DAY_MIN, daysInMonth } from '../../../src/internal/calendar'

// ============================================================================
// Local Values
// ============================================================================

export function localDateGen(options?: { minYear?: number; maxYear?: number }): Arbitrary<LocalDate> {
  const minYear = options?.minYear ?? 1900
  const maxYear = options?.maxYear ?? 2100
  return fc
    .tuple(fc.integer({ min: minYear, max: maxYear }), fc.integer({ min: 1, max: 12 }), fc.integer({ min: 1, max: 31 }))
    .map(([year, month, day]) => dateOf(year, month, Math.min(day, daysInMonth(year, month))))
}

/** Dates across the whole supported range, through the epoch-day. */
export function anyDateGen(): Arbitrary<LocalDate> {
  return fc.integer({ min: EPOCH_DAY_MIN, max: EPOCH_DAY_MAX }).map(epochDay => dateOfEpochDay(epochDay))
}

export function localTimeGen(options?: { withNanos?: boolean }): Arbitrary<LocalTime> {
  const nano = options?.withNanos === false ? fc.constant(0) : fc.integer({ min: 0, max: 999_999_999 })
  return fc
    .tuple(fc.integer({ min: 0, max: 23 }), fc.integer({ min: 0, max: 59 }), fc.integer({ min: 0, max: 59 }), nano)
    .map(([hour, minute, second, n]) => timeOf(hour, minute, second, n))
}

export function localDateTimeGen(options?: { minYear?: number; maxYear?: number; withNanos?: boolean }): Arbitrary<LocalDateTime> {
  return fc
    .tuple(localDateGen(options), localTimeGen(options))
    .map(([date, time]) => dateTimeOfDateAndTime(date, time))
}

// ============================================================================
// Instants & Offsets
// ============================================================================

/** Instants between 1900 and 2100, on whole seconds. */
export function instantGen(): Arbitrary<Instant> {
  return fc
    .tuple(fc.integer({ min: -25_567, max: 47_482 }), fc.integer({ min: 0, max: 86_399 }))
    .map(([epochDay, secondOfDay]) => instantOfEpochSecond(epochDay * 86_400 + secondOfDay))
}

export function offsetGen(): Arbitrary<ZoneOffset> {
  return fc.integer({ min: -18 * 3600, max: 18 * 3600 }).map(seconds => offsetOfTotalSeconds(seconds))
}

/** Offsets on a quarter hour, as most zones use. */
export function quarterHourOffsetGen(): Arbitrary<ZoneOffset> {
  return fc.integer({ min: -72, max: 72 }).map(q => offsetOfTotalSeconds(q * 900))
}
