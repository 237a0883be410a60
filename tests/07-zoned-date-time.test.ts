/**
 * Segment 07: Zoned Date-Time
 *
 * Resolving local date-times in a zone across gaps and overlaps, moving
 * along the local and instant time-lines, and the bracketed text form.
 */

import { describe, it, expect } from 'vitest'
import {
  zonedOf,
  zonedOfStrict,
  zonedOfInstant,
  zonedWithEarlierOffsetAtOverlap,
  zonedWithLaterOffsetAtOverlap,
  zonedWithZoneSameInstant,
  zonedWithZoneSameLocal,
  zonedWithFixedOffsetZone,
  zonedWithHour,
  zonedPlusHours,
  zonedPlusDays,
  zonedPlusDuration,
  zonedUntil,
  zonedGetLong,
  compareZoned,
  isZonedEqual,
  zonedEquals,
  formatZoned,
  parseZoned,
} from '../src/zoned-date-time'
import { createDefaultRegistry } from '../src/tzdb-provider'
import { zoneIdOf } from '../src/zone-id'
import { dateTimeOf } from '../src/local-date-time'
import { instantOfEpochSecond } from '../src/instant'
import { durationOfMinutes } from '../src/duration'
import { UTC, offsetOfHours } from '../src/zone-offset'
import { ZoneReconciliationError } from '../src/errors'
import { unwrap } from '../src/result'

const registry = createDefaultRegistry()
const LONDON = zoneIdOf(registry, 'Europe/London')
const PARIS = zoneIdOf(registry, 'Europe/Paris')
const BST = offsetOfHours(1)

// ============================================================================
// 1. RESOLUTION
// ============================================================================

describe('Resolving local date-times', () => {
  it('takes the single offset outside transitions', () => {
    const zdt = zonedOf(dateTimeOf(2008, 7, 1, 12, 0), LONDON)
    expect(zdt.offset).toBe(BST)
    expect(formatZoned(zdt)).toBe('2008-07-01T12:00+01:00[Europe/London]')
  })

  it('moves a gap forward by its length', () => {
    const zdt = zonedOf(dateTimeOf(2008, 3, 30, 1, 30), LONDON)
    expect(formatZoned(zdt)).toBe('2008-03-30T02:30+01:00[Europe/London]')
  })

  it('takes the earlier offset in an overlap unless another is preferred', () => {
    const overlap = dateTimeOf(2008, 10, 26, 1, 30)
    expect(zonedOf(overlap, LONDON).offset).toBe(BST)
    expect(zonedOf(overlap, LONDON, UTC).offset).toBe(UTC)
    expect(zonedOf(overlap, LONDON, offsetOfHours(5)).offset).toBe(BST)
  })

  it('switches between the two offsets of an overlap', () => {
    const earlier = zonedOf(dateTimeOf(2008, 10, 26, 1, 30), LONDON)
    const later = zonedWithLaterOffsetAtOverlap(earlier)
    expect(formatZoned(later)).toBe('2008-10-26T01:30Z[Europe/London]')
    expect(zonedWithEarlierOffsetAtOverlap(later)).toEqual(earlier)
    expect(zonedWithLaterOffsetAtOverlap(later)).toBe(later)
  })

  it('uses the zone itself for fixed offsets', () => {
    const zdt = zonedOf(dateTimeOf(2008, 7, 1, 12, 0), offsetOfHours(2))
    expect(formatZoned(zdt)).toBe('2008-07-01T12:00+02:00')
  })

  describe('strict resolution', () => {
    it('refuses a local time inside a gap', () => {
      expect(() => zonedOfStrict(dateTimeOf(2008, 3, 30, 1, 30), UTC, LONDON)).toThrow(
        "LocalDateTime '2008-03-30T01:30' does not exist in zone 'Europe/London' " +
        'due to a gap in the local time-line, typically caused by daylight savings',
      )
    })

    it('refuses an offset the zone does not use then', () => {
      expect(() => zonedOfStrict(dateTimeOf(2008, 7, 1, 12, 0), UTC, LONDON)).toThrow(ZoneReconciliationError)
      expect(() => zonedOfStrict(dateTimeOf(2008, 7, 1, 12, 0), UTC, LONDON))
        .toThrow("ZoneOffset 'Z' is not valid for LocalDateTime '2008-07-01T12:00' in zone 'Europe/London'")
    })

    it('accepts either offset of an overlap', () => {
      expect(zonedOfStrict(dateTimeOf(2008, 10, 26, 1, 30), UTC, LONDON).offset).toBe(UTC)
    })
  })
})

// ============================================================================
// 2. ARITHMETIC
// ============================================================================

describe('Zoned arithmetic', () => {
  it('adds hours on the instant time-line', () => {
    const start = zonedOf(dateTimeOf(2008, 3, 30, 0, 30), LONDON)
    expect(formatZoned(zonedPlusHours(start, 1))).toBe('2008-03-30T02:30+01:00[Europe/London]')
  })

  it('passes through both halves of an overlap', () => {
    const start = zonedOf(dateTimeOf(2008, 10, 26, 0, 30), LONDON)
    expect(formatZoned(zonedPlusHours(start, 1))).toBe('2008-10-26T01:30+01:00[Europe/London]')
    expect(formatZoned(zonedPlusHours(start, 2))).toBe('2008-10-26T01:30Z[Europe/London]')
    expect(formatZoned(zonedPlusDuration(start, durationOfMinutes(150)))).toBe('2008-10-26T02:00Z[Europe/London]')
  })

  it('adds days on the local time-line', () => {
    const start = zonedOf(dateTimeOf(2008, 3, 29, 1, 30), LONDON)
    expect(formatZoned(zonedPlusDays(start, 1))).toBe('2008-03-30T02:30+01:00[Europe/London]')
  })

  it('keeps the offset when a day lands in an overlap', () => {
    const start = zonedOf(dateTimeOf(2008, 10, 25, 1, 30), LONDON)
    expect(zonedPlusDays(start, 1).offset).toBe(BST)
  })

  it('moves a changed field out of a gap', () => {
    const start = zonedOf(dateTimeOf(2008, 3, 30, 0, 15), LONDON)
    expect(formatZoned(zonedWithHour(start, 1))).toBe('2008-03-30T02:15+01:00[Europe/London]')
  })

  it('counts days locally and hours on the instant time-line', () => {
    const start = zonedOf(dateTimeOf(2008, 3, 29, 12, 0), LONDON)
    const end = zonedOf(dateTimeOf(2008, 3, 30, 12, 0), LONDON)
    expect(zonedUntil(start, end, 'Days')).toBe(1)
    expect(zonedUntil(start, end, 'Hours')).toBe(23)
  })
})

// ============================================================================
// 3. ZONES AND INSTANTS
// ============================================================================

describe('Zones and instants', () => {
  const london = zonedOf(dateTimeOf(2008, 7, 1, 12, 0), LONDON)

  it('views the same instant in another zone', () => {
    const paris = zonedWithZoneSameInstant(london, PARIS)
    expect(formatZoned(paris)).toBe('2008-07-01T13:00+02:00[Europe/Paris]')
    expect(isZonedEqual(paris, london)).toBe(true)
    expect(zonedEquals(paris, london)).toBe(false)
    expect(compareZoned(london, paris)).toBe(-1)
  })

  it('keeps the local time in another zone', () => {
    expect(formatZoned(zonedWithZoneSameLocal(london, PARIS))).toBe('2008-07-01T12:00+02:00[Europe/Paris]')
  })

  it('fixes the zone to the offset', () => {
    expect(formatZoned(zonedWithFixedOffsetZone(london))).toBe('2008-07-01T12:00+01:00')
  })

  it('reads the instant and offset fields', () => {
    expect(zonedGetLong(london, 'InstantSeconds')).toBe(1_214_910_000)
    expect(zonedGetLong(london, 'OffsetSeconds')).toBe(3_600)
    expect(zonedOfInstant(instantOfEpochSecond(1_214_910_000), LONDON)).toEqual(london)
  })
})

// ============================================================================
// 4. TEXT
// ============================================================================

describe('Zoned text', () => {
  it('parses a bracketed region', () => {
    const zdt = unwrap(parseZoned('2008-10-26T01:30Z[Europe/London]', registry))
    expect(zdt.offset).toBe(UTC)
    expect(zdt.zone.id).toBe('Europe/London')
  })

  it('uses the offset as the zone without brackets', () => {
    const zdt = unwrap(parseZoned('2008-07-01T12:00+01:00', registry))
    expect(zdt.zone).toBe(BST)
  })

  it('rejects an offset the zone does not accept', () => {
    const result = parseZoned('2008-03-30T01:30Z[Europe/London]', registry)
    expect(result.ok).toBe(false)
    if (!result.ok) {
      expect(result.error.message).toBe(
        "Text '2008-03-30T01:30Z[Europe/London]' could not be parsed: LocalDateTime '2008-03-30T01:30' " +
        "does not exist in zone 'Europe/London' due to a gap in the local time-line, typically caused by daylight savings",
      )
    }
  })

  it('reports an unknown region', () => {
    const result = parseZoned('2008-07-01T12:00+01:00[Mars/Olympus]', registry)
    expect(result.ok).toBe(false)
    if (!result.ok) {
      expect(result.error.message)
        .toBe("Text '2008-07-01T12:00+01:00[Mars/Olympus]' could not be parsed: Unknown time-zone ID: Mars/Olympus")
    }
  })
})
