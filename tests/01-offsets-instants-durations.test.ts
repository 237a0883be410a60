/**
 * Segment 01: Offsets, Instants & Durations
 *
 * The time-line primitives: fixed offsets from UTC, points on the UTC
 * time-line and exact amounts of time between them.
 */

import { describe, it, expect } from 'vitest'
import {
  UTC,
  OFFSET_MAX,
  OFFSET_MIN,
  offsetOfTotalSeconds,
  offsetOfHours,
  offsetOfHoursMinutes,
  offsetOfHoursMinutesSeconds,
  parseOffset,
  compareOffsets,
  offsetEquals,
} from '../src/zone-offset'
import {
  INSTANT_EPOCH,
  instantOfEpochSecond,
  instantOfEpochMilli,
  instantPlus,
  instantMinus,
  instantPlusUnit,
  instantTruncatedTo,
  instantUntil,
  instantToEpochMilli,
  formatInstant,
  parseInstant,
  compareInstants,
} from '../src/instant'
import {
  DURATION_ZERO,
  durationOfSeconds,
  durationOfHours,
  durationOfMinutes,
  durationOfMillis,
  durationBetween,
  durationDividedBy,
  durationMultipliedBy,
  durationNegated,
  durationToNanos,
  durationToMillis,
  formatDuration,
  parseDuration,
} from '../src/duration'
import {
  ArithmeticOverflowError,
  DateTimeRangeError,
  ParseError,
  UnsupportedFieldError,
} from '../src/errors'
import { unwrap } from '../src/result'

// ============================================================================
// 1. ZONE OFFSETS
// ============================================================================

describe('Zone offsets', () => {
  describe('parseOffset', () => {
    it('parses hours and minutes', () => {
      const offset = unwrap(parseOffset('+01:00'))
      expect(offset.totalSeconds).toBe(3600)
      expect(offset.id).toBe('+01:00')
    })

    it('parses hours, minutes and seconds', () => {
      const offset = unwrap(parseOffset('+01:02:03'))
      expect(offset.totalSeconds).toBe(3723)
      expect(offset.id).toBe('+01:02:03')
    })

    it('accepts a single hour digit', () => {
      expect(unwrap(parseOffset('+1')).id).toBe('+01:00')
    })

    it('accepts the compact form', () => {
      expect(unwrap(parseOffset('-0130')).totalSeconds).toBe(-5400)
    })

    it('parses Z as UTC', () => {
      expect(unwrap(parseOffset('Z'))).toBe(UTC)
    })

    it('reports a range error for hours beyond 18', () => {
      const result = parseOffset('+19:00')
      expect(result.ok).toBe(false)
      if (!result.ok) {
        expect(result.error).toBeInstanceOf(DateTimeRangeError)
        expect(result.error.message).toBe('Zone offset hours not in valid range: value 19 is not in the range -18 to 18')
      }
    })

    it('rejects a missing sign', () => {
      const result = parseOffset('01:00')
      expect(result.ok).toBe(false)
      if (!result.ok) {
        expect(result.error).toBeInstanceOf(ParseError)
        expect(result.error.message).toBe('Invalid ID for ZoneOffset, plus/minus not found when expected: 01:00')
      }
    })

    it('rejects non-numeric characters', () => {
      const result = parseOffset('+01:0')
      expect(result.ok).toBe(false)
      if (!result.ok) expect(result.error.message).toBe('Invalid ID for ZoneOffset, non numeric characters found: +01:0')
    })

    it('rejects an unknown length', () => {
      const result = parseOffset('+0100000')
      expect(result.ok).toBe(false)
      if (!result.ok) expect(result.error.message).toBe('Invalid ID for ZoneOffset, invalid format: +0100000')
    })
  })

  describe('construction', () => {
    it('interns quarter-hour offsets', () => {
      expect(offsetOfTotalSeconds(3600)).toBe(offsetOfHours(1))
      expect(offsetOfHoursMinutes(5, 30)).toBe(offsetOfTotalSeconds(19800))
    })

    it('writes Z for zero', () => {
      expect(offsetOfTotalSeconds(0).id).toBe('Z')
    })

    it('has the limits at eighteen hours', () => {
      expect(OFFSET_MAX.id).toBe('+18:00')
      expect(OFFSET_MIN.id).toBe('-18:00')
      expect(() => offsetOfTotalSeconds(18 * 3600 + 1)).toThrow('Zone offset not in valid range: -18:00 to +18:00')
    })

    it('requires matching signs', () => {
      expect(() => offsetOfHoursMinutesSeconds(1, -30, 0))
        .toThrow('Zone offset minutes and seconds must be positive because hours is positive')
      expect(() => offsetOfHoursMinutesSeconds(0, 30, -5))
        .toThrow('Zone offset minutes and seconds must have the same sign')
    })

    it('rejects fractional fields', () => {
      expect(() => offsetOfHoursMinutesSeconds(1.5, 0, 0)).toThrow(DateTimeRangeError)
      expect(() => offsetOfHoursMinutesSeconds(1.5, 0, 0)).toThrow('Zone offset fields must be whole numbers: 1.5, 0, 0')
      expect(() => offsetOfHoursMinutesSeconds(0, 0, 0.25)).toThrow(DateTimeRangeError)
    })
  })

  describe('ordering', () => {
    it('sorts the larger offset first', () => {
      expect(compareOffsets(offsetOfHours(2), offsetOfHours(1))).toBeLessThan(0)
      expect(compareOffsets(offsetOfHours(-2), offsetOfHours(1))).toBeGreaterThan(0)
    })

    it('compares by total seconds', () => {
      expect(offsetEquals(offsetOfHoursMinutesSeconds(0, 0, 7), offsetOfTotalSeconds(7))).toBe(true)
    })
  })
})

// ============================================================================
// 2. INSTANTS
// ============================================================================

describe('Instants', () => {
  it('normalizes a negative nano adjustment', () => {
    expect(instantOfEpochSecond(3, -1)).toEqual({ kind: 'Instant', epochSecond: 2, nano: 999_999_999 })
  })

  it('floors negative epoch millis', () => {
    expect(instantOfEpochMilli(-1)).toEqual({ kind: 'Instant', epochSecond: -1, nano: 999_000_000 })
    expect(instantToEpochMilli(instantOfEpochMilli(-1))).toBe(-1)
  })

  it('formats with seconds always present', () => {
    expect(formatInstant(INSTANT_EPOCH)).toBe('1970-01-01T00:00:00Z')
    expect(formatInstant(instantOfEpochSecond(1_206_838_800))).toBe('2008-03-30T01:00:00Z')
    expect(formatInstant(instantOfEpochSecond(0, 500))).toBe('1970-01-01T00:00:00.000000500Z')
  })

  it('parses a fraction', () => {
    expect(unwrap(parseInstant('2008-03-30T01:00:00.5Z'))).toEqual({
      kind: 'Instant', epochSecond: 1_206_838_800, nano: 500_000_000,
    })
  })

  it('requires seconds when parsing', () => {
    const result = parseInstant('2008-03-30T01:00Z')
    expect(result.ok).toBe(false)
    if (!result.ok) expect(result.error.message).toBe("Text '2008-03-30T01:00Z' could not be parsed at index 0")
  })

  it('adds and subtracts durations', () => {
    const start = instantOfEpochSecond(10, 800_000_000)
    expect(instantPlus(start, durationOfMillis(300))).toEqual(instantOfEpochSecond(11, 100_000_000))
    expect(instantMinus(start, durationOfMillis(900))).toEqual(instantOfEpochSecond(9, 900_000_000))
  })

  it('adds days as 24 hours and rejects months', () => {
    expect(instantPlusUnit(INSTANT_EPOCH, 2, 'Days').epochSecond).toBe(172_800)
    expect(() => instantPlusUnit(INSTANT_EPOCH, 1, 'Months')).toThrow(UnsupportedFieldError)
  })

  it('truncates to a unit', () => {
    const instant = instantOfEpochSecond(3_725, 123_456_789)
    expect(instantTruncatedTo(instant, 'Hours')).toEqual(instantOfEpochSecond(3_600))
    expect(instantTruncatedTo(instant, 'Millis')).toEqual(instantOfEpochSecond(3_725, 123_000_000))
    expect(() => instantTruncatedTo(instant, 'Weeks')).toThrow('Unit is too large to be used for truncation')
  })

  it('counts whole units between instants', () => {
    const a = instantOfEpochSecond(0, 500_000_000)
    const b = instantOfEpochSecond(10, 0)
    expect(instantUntil(a, b, 'Seconds')).toBe(9)
    expect(instantUntil(a, b, 'Millis')).toBe(9_500)
    expect(instantUntil(b, a, 'Seconds')).toBe(-9)
  })

  it('orders by seconds then nanos', () => {
    expect(compareInstants(instantOfEpochSecond(1, 5), instantOfEpochSecond(1, 6))).toBeLessThan(0)
    expect(compareInstants(instantOfEpochSecond(2), instantOfEpochSecond(1, 999))).toBeGreaterThan(0)
  })

  it('rejects values beyond the supported range', () => {
    expect(() => instantOfEpochSecond(Number.MAX_SAFE_INTEGER - 1)).toThrow('Instant exceeds minimum or maximum instant')
  })
})

// ============================================================================
// 3. DURATIONS
// ============================================================================

describe('Durations', () => {
  it('parses nine fraction digits', () => {
    const duration = unwrap(parseDuration('PT1.123456789S'))
    expect(duration).toEqual({ kind: 'Duration', seconds: 1, nano: 123_456_789 })
    expect(formatDuration(duration)).toBe('PT1.123456789S')
  })

  it('keeps nanos positive for negative durations', () => {
    const duration = unwrap(parseDuration('PT-1.1S'))
    expect(duration).toEqual({ kind: 'Duration', seconds: -2, nano: 900_000_000 })
    expect(formatDuration(duration)).toBe('PT-1.1S')
  })

  it('formats a negative fraction under one second', () => {
    expect(formatDuration(durationOfSeconds(0, -100_000_000))).toBe('PT-0.1S')
  })

  it('formats hours and minutes', () => {
    expect(formatDuration(durationOfMinutes(90))).toBe('PT1H30M')
    expect(formatDuration(durationOfHours(26))).toBe('PT26H')
    expect(formatDuration(DURATION_ZERO)).toBe('PT0S')
  })

  it('parses days into seconds', () => {
    expect(unwrap(parseDuration('P2DT3H')).seconds).toBe(183_600)
    expect(unwrap(parseDuration('-PT6H3M')).seconds).toBe(-21_780)
  })

  it('rejects a bare T', () => {
    const result = parseDuration('PT')
    expect(result.ok).toBe(false)
    if (!result.ok) expect(result.error.message).toBe('Text cannot be parsed to a Duration')
  })

  it('multiplies, divides and negates', () => {
    const duration = durationOfSeconds(3, 500_000_000)
    expect(durationMultipliedBy(duration, 3)).toEqual(durationOfSeconds(10, 500_000_000))
    expect(durationDividedBy(duration, 2)).toEqual(durationOfSeconds(1, 750_000_000))
    expect(durationNegated(duration)).toEqual({ kind: 'Duration', seconds: -4, nano: 500_000_000 })
  })

  it('refuses to divide by zero', () => {
    expect(() => durationDividedBy(DURATION_ZERO, 0)).toThrow(ArithmeticOverflowError)
  })

  it('only scales by whole numbers', () => {
    const duration = durationOfSeconds(3)
    expect(() => durationMultipliedBy(duration, 1.5)).toThrow(ArithmeticOverflowError)
    expect(() => durationMultipliedBy(duration, 1.5)).toThrow('Duration multiplicand must be a safe integer: 1.5')
    expect(() => durationDividedBy(duration, 0.5)).toThrow('Duration divisor must be a safe integer: 0.5')
    expect(() => durationMultipliedBy(duration, Number.NaN)).toThrow(ArithmeticOverflowError)
  })

  it('converts to nanos and millis', () => {
    const duration = durationOfSeconds(-1, 999_999_999)
    expect(durationToNanos(duration)).toBe(-1n)
    expect(durationToMillis(durationOfMillis(1_234))).toBe(1_234)
  })

  it('measures between instants', () => {
    const start = instantOfEpochSecond(100)
    const end = instantOfEpochSecond(40, 250_000_000)
    expect(durationBetween(start, end)).toEqual({ kind: 'Duration', seconds: -60, nano: 250_000_000 })
  })
})
