/**
 * Segment 03: Offset Values
 *
 * Date-times and times carrying a fixed offset from UTC.
 */

import { describe, it, expect } from 'vitest'
import {
  offsetDateTimeOf,
  offsetDateTimeOfInstant,
  offsetDateTimeToEpochSecond,
  offsetDateTimeWithOffsetSameInstant,
  offsetDateTimeWithOffsetSameLocal,
  offsetDateTimeUntil,
  offsetDateTimeGetLong,
  compareOffsetDateTimes,
  isOffsetDateTimeEqual,
  isOffsetDateTimeBefore,
  offsetDateTimeEquals,
  formatOffsetDateTime,
  parseOffsetDateTime,
} from '../src/offset-date-time'
import {
  offsetTimeOf,
  offsetTimeOfInstant,
  offsetTimeAtDate,
  offsetTimeWithOffsetSameInstant,
  offsetTimeUntil,
  compareOffsetTimes,
  isOffsetTimeEqual,
  formatOffsetTime,
  parseOffsetTime,
} from '../src/offset-time'
import { dateTimeOf } from '../src/local-date-time'
import { dateOf } from '../src/local-date'
import { timeOf } from '../src/local-time'
import { instantOfEpochSecond } from '../src/instant'
import { UTC, offsetOfHours, offsetOfHoursMinutes } from '../src/zone-offset'
import { unwrap } from '../src/result'

const PLUS_TWO = offsetOfHours(2)
const PLUS_ONE = offsetOfHours(1)

// ============================================================================
// 1. OFFSET DATE-TIME
// ============================================================================

describe('OffsetDateTime', () => {
  const odt = offsetDateTimeOf(dateTimeOf(2024, 3, 15, 10, 0), PLUS_TWO)

  it('maps to the epoch second of the instant', () => {
    expect(offsetDateTimeToEpochSecond(odt)).toBe(1_710_489_600)
    expect(offsetDateTimeGetLong(odt, 'InstantSeconds')).toBe(1_710_489_600)
    expect(offsetDateTimeGetLong(odt, 'OffsetSeconds')).toBe(7_200)
  })

  it('builds from an instant', () => {
    expect(offsetDateTimeOfInstant(instantOfEpochSecond(1_710_489_600), PLUS_TWO)).toEqual(odt)
  })

  it('moves the local time when keeping the instant', () => {
    const moved = offsetDateTimeWithOffsetSameInstant(odt, offsetOfHoursMinutes(5, 30))
    expect(formatOffsetDateTime(moved)).toBe('2024-03-15T13:30+05:30')
    expect(isOffsetDateTimeEqual(moved, odt)).toBe(true)
    expect(offsetDateTimeEquals(moved, odt)).toBe(false)
  })

  it('keeps the local time when asked to', () => {
    const moved = offsetDateTimeWithOffsetSameLocal(odt, UTC)
    expect(formatOffsetDateTime(moved)).toBe('2024-03-15T10:00Z')
    expect(isOffsetDateTimeBefore(odt, moved)).toBe(true)
  })

  it('orders equal instants by local time', () => {
    const sameInstant = offsetDateTimeOf(dateTimeOf(2024, 3, 15, 9, 0), PLUS_ONE)
    expect(isOffsetDateTimeEqual(odt, sameInstant)).toBe(true)
    expect(compareOffsetDateTimes(odt, sameInstant)).toBeGreaterThan(0)
    expect(compareOffsetDateTimes(sameInstant, odt)).toBeLessThan(0)
  })

  it('measures across offsets', () => {
    const later = offsetDateTimeOf(dateTimeOf(2024, 3, 15, 10, 0), PLUS_ONE)
    expect(offsetDateTimeUntil(odt, later, 'Hours')).toBe(1)
    expect(offsetDateTimeUntil(later, odt, 'Minutes')).toBe(-60)
  })

  describe('text', () => {
    it('formats the offset id after the date-time', () => {
      expect(formatOffsetDateTime(odt)).toBe('2024-03-15T10:00+02:00')
    })

    it('parses fractions and offsets', () => {
      const parsed = unwrap(parseOffsetDateTime('2024-03-15T10:00:00.5-05:00'))
      expect(formatOffsetDateTime(parsed)).toBe('2024-03-15T10:00:00.500-05:00')
    })

    it('reports an offset out of range with the cause', () => {
      const result = parseOffsetDateTime('2024-03-15T10:00+19:00')
      expect(result.ok).toBe(false)
      if (!result.ok) {
        expect(result.error.message).toBe(
          "Text '2024-03-15T10:00+19:00' could not be parsed: " +
          'Zone offset hours not in valid range: value 19 is not in the range -18 to 18',
        )
      }
    })

    it('requires an offset', () => {
      const result = parseOffsetDateTime('2024-03-15T10:00')
      expect(result.ok).toBe(false)
      if (!result.ok) expect(result.error.message).toBe("Text '2024-03-15T10:00' could not be parsed at index 0")
    })
  })
})

// ============================================================================
// 2. OFFSET TIME
// ============================================================================

describe('OffsetTime', () => {
  it('prints nanos in full', () => {
    expect(formatOffsetTime(offsetTimeOf(timeOf(0, 0, 0, 500), UTC))).toBe('00:00:00.000000500Z')
  })

  it('wraps when the offset moves past midnight', () => {
    const late = offsetTimeOf(timeOf(23, 30), UTC)
    expect(offsetTimeWithOffsetSameInstant(late, PLUS_ONE)).toEqual(offsetTimeOf(timeOf(0, 30), PLUS_ONE))
  })

  it('takes the time of day of an instant', () => {
    expect(offsetTimeOfInstant(instantOfEpochSecond(1_206_838_800), PLUS_ONE))
      .toEqual(offsetTimeOf(timeOf(2, 0), PLUS_ONE))
  })

  it('orders by the time on the UTC line', () => {
    const a = offsetTimeOf(timeOf(10, 0), PLUS_TWO)
    const b = offsetTimeOf(timeOf(9, 30), UTC)
    expect(compareOffsetTimes(a, b)).toBeLessThan(0)
    expect(isOffsetTimeEqual(a, offsetTimeOf(timeOf(8, 0), UTC))).toBe(true)
    expect(offsetTimeUntil(a, b, 'Minutes')).toBe(90)
  })

  it('combines with a date', () => {
    const ot = unwrap(parseOffsetTime('10:15+01:00'))
    expect(offsetTimeAtDate(ot, dateOf(2024, 3, 15)))
      .toEqual(offsetDateTimeOf(dateTimeOf(2024, 3, 15, 10, 15), PLUS_ONE))
  })
})
