/**
 * Property tests for zone rules and zoned date-times over bundled regions.
 */
import { describe, it, expect } from 'vitest'
import * as fc from 'fast-check'
import { instantGen, localDateTimeGen } from '../generators'
import { createDefaultRegistry } from '../../../src/tzdb-provider'
import { zoneIdOf, zoneRules } from '../../../src/zone-id'
import {
  rulesIsValidOffset,
  rulesNextTransition,
  rulesOffsetAt,
  rulesPreviousTransition,
  rulesTransitions,
  rulesValidOffsets,
} from '../../../src/zone-rules'
import { dateTimeOfInstant, dateTimeToEpochSecond } from '../../../src/local-date-time'
import { instantOfEpochSecond } from '../../../src/instant'
import { zonedOf, zonedOfInstant, zonedToInstant, zonedToLocalDateTime } from '../../../src/zoned-date-time'
import { decodeZoneRules, encodeZoneRules } from '../../../src/zone-rules-serialization'
import { isGap, transitionDateTimeAfter, transitionDateTimeBefore } from '../../../src/zone-offset-transition'
import type { ZoneOffsetTransition, ZoneRules } from '../../../src/types'

const registry = createDefaultRegistry()

/** The recorded history followed by the transitions generated up to 2040. */
function transitionsOf(rules: ZoneRules): ZoneOffsetTransition[] {
  const all = rulesTransitions(rules)
  let next = rulesNextTransition(rules, instantOfEpochSecond(all[all.length - 1]?.epochSecond ?? 0))
  while (next !== null && next.epochSecond < 2_208_988_800) {
    all.push(next)
    next = rulesNextTransition(rules, instantOfEpochSecond(next.epochSecond))
  }
  return all
}

const REGIONS = ['Europe/London', 'America/New_York', 'Australia/Sydney', 'Europe/Paris'] as const
const regionGen = fc.constantFrom(...REGIONS).map(id => zoneIdOf(registry, id))

describe('Zone rules', () => {
  it('accepts the offset it reports for an instant', () => {
    fc.assert(
      fc.property(regionGen, instantGen(), (zone, instant) => {
        const rules = zoneRules(zone)
        const offset = rulesOffsetAt(rules, instant)
        expect(rulesIsValidOffset(rules, dateTimeOfInstant(instant, offset), offset)).toBe(true)
      })
    )
  })

  it('changes offset exactly at the next transition', () => {
    fc.assert(
      fc.property(regionGen, instantGen(), (zone, instant) => {
        const rules = zoneRules(zone)
        const next = rulesNextTransition(rules, instant)
        if (next === null) return
        expect(next.epochSecond).toBeGreaterThan(instant.epochSecond)
        expect(rulesOffsetAt(rules, instantOfEpochSecond(next.epochSecond - 1))).toEqual(next.offsetBefore)
        expect(rulesOffsetAt(rules, instantOfEpochSecond(next.epochSecond))).toEqual(next.offsetAfter)
      })
    )
  })

  it('finds the next transition again from just before it', () => {
    fc.assert(
      fc.property(regionGen, instantGen(), (zone, instant) => {
        const rules = zoneRules(zone)
        const previous = rulesPreviousTransition(rules, instant)
        if (previous === null) return
        expect(previous.epochSecond).toBeLessThan(instant.epochSecond)
        expect(rulesNextTransition(rules, instantOfEpochSecond(previous.epochSecond - 1))?.epochSecond)
          .toBe(previous.epochSecond)
      })
    )
  })

  it('offers no, one or two offsets for a local date-time', () => {
    fc.assert(
      fc.property(regionGen, localDateTimeGen(), (zone, dateTime) => {
        const offsets = rulesValidOffsets(zoneRules(zone), dateTime)
        expect(offsets.length).toBeLessThanOrEqual(2)
        for (const offset of offsets) {
          const instant = instantOfEpochSecond(dateTimeToEpochSecond(dateTime, offset))
          expect(rulesOffsetAt(zoneRules(zone), instant)).toEqual(offset)
        }
      })
    )
  })

  it('answers the same after a trip through the binary form', () => {
    fc.assert(
      fc.property(regionGen, instantGen(), (zone, instant) => {
        const rules = zoneRules(zone)
        expect(rulesOffsetAt(decodeZoneRules(encodeZoneRules(rules)), instant)).toEqual(rulesOffsetAt(rules, instant))
      })
    )
  })
})

describe('Every bundled transition', () => {
  it('opens a gap with no offsets or an overlap with both', () => {
    for (const id of registry.getAvailableZoneIds()) {
      const rules = registry.getRules(id)
      for (const trans of transitionsOf(rules)) {
        const start = isGap(trans) ? transitionDateTimeBefore(trans) : transitionDateTimeAfter(trans)
        const expected = isGap(trans) ? [] : [trans.offsetBefore, trans.offsetAfter]
        expect(rulesValidOffsets(rules, start)).toEqual(expected)
        expect(rulesOffsetAt(rules, instantOfEpochSecond(trans.epochSecond - 1))).toEqual(trans.offsetBefore)
        expect(rulesOffsetAt(rules, instantOfEpochSecond(trans.epochSecond))).toEqual(trans.offsetAfter)
      }
    }
  })
})

describe('Zoned date-times', () => {
  it('keeps the instant it was built from', () => {
    fc.assert(
      fc.property(regionGen, instantGen(), (zone, instant) => {
        expect(zonedToInstant(zonedOfInstant(instant, zone))).toEqual(instant)
      })
    )
  })

  it('keeps a valid local date-time and moves one in a gap forward', () => {
    fc.assert(
      fc.property(regionGen, localDateTimeGen(), (zone, dateTime) => {
        const zdt = zonedOf(dateTime, zone)
        const offsets = rulesValidOffsets(zoneRules(zone), dateTime)
        if (offsets.length === 0) {
          expect(dateTimeToEpochSecond(zonedToLocalDateTime(zdt), zdt.offset))
            .toBeGreaterThan(dateTimeToEpochSecond(dateTime, zdt.offset))
        } else {
          expect(zonedToLocalDateTime(zdt)).toEqual(dateTime)
          expect(zdt.offset).toEqual(offsets[0])
        }
      })
    )
  })
})
