/**
 * Segment 06: Serialization & Stored Rules
 *
 * The binary rules encoding and the SQLite store built on it.
 */

import { describe, it, expect, afterEach } from 'vitest'
import {
  encodeOffset,
  decodeOffset,
  encodeEpochSecond,
  decodeEpochSecond,
  encodeZoneRules,
  decodeZoneRules,
  encodeTransition,
  decodeTransition,
  encodeTransitionRule,
  decodeTransitionRule,
} from '../src/zone-rules-serialization'
import { createSqliteZoneRulesStore, type SqliteRulesStore } from '../src/sqlite-rules-store'
import { compileTzdb } from '../src/tzdb-compiler'
import { createBundledTzdbProvider } from '../src/tzdb-provider'
import { createZoneRulesRegistry } from '../src/zone-rules-provider'
import { fixedZoneRules, rulesEquals, rulesOffsetAt } from '../src/zone-rules'
import { transitionOf, transitionEquals } from '../src/zone-offset-transition'
import { transitionRuleOf, transitionRuleEquals } from '../src/zone-offset-transition-rule'
import { dateTimeOf } from '../src/local-date-time'
import { timeOf, MIDNIGHT } from '../src/local-time'
import { instantOfEpochSecond } from '../src/instant'
import { UTC, offsetOfHours, offsetOfHoursMinutes, offsetOfHoursMinutesSeconds } from '../src/zone-offset'
import { SATURDAY, SUNDAY } from '../src/day-of-week'
import { CorruptDataError } from '../src/errors'

const TEST_SOURCE = {
  name: 'test.tz',
  text: [
    'Rule Test 2000 max - Mar lastSun 1:00u 1:00 S',
    'Rule Test 2000 max - Oct lastSun 1:00u 0 -',
    'Zone Test/Zone 1:00 - CET 2000',
    '\t1:00 Test CE%sT',
    'Link Test/Zone Test/Alias',
  ].join('\n'),
}

// ============================================================================
// 1. PRIMITIVES
// ============================================================================

describe('Primitive encodings', () => {
  it('writes quarter-hour offsets in one byte', () => {
    expect([...encodeOffset(offsetOfHours(1))]).toEqual([4])
    expect([...encodeOffset(offsetOfHours(-5))]).toEqual([236])
    expect(decodeOffset(Uint8Array.of(236))).toBe(offsetOfHours(-5))
  })

  it('escapes other offsets', () => {
    const odd = offsetOfHoursMinutesSeconds(5, 53, 28)
    expect([...encodeOffset(odd)]).toEqual([127, 0, 0, 82, 216])
    expect(decodeOffset(encodeOffset(odd))).toEqual(odd)
  })

  it('writes quarter-hour epoch seconds in three bytes', () => {
    expect([...encodeEpochSecond(0)]).toEqual([77, 148, 0])
    expect(decodeEpochSecond(Uint8Array.of(77, 148, 0))).toBe(0)
  })

  it('escapes other epoch seconds', () => {
    expect([...encodeEpochSecond(1)]).toEqual([255, 0, 0, 0, 0, 0, 0, 0, 1])
    expect(decodeEpochSecond(encodeEpochSecond(-1))).toBe(-1)
  })

  it('refuses leftover bytes', () => {
    expect(() => decodeOffset(Uint8Array.of(4, 0))).toThrow('Unexpected trailing data')
  })
})

// ============================================================================
// 2. STREAMS
// ============================================================================

describe('Serialized values', () => {
  it('writes fixed rules as a header and an offset', () => {
    expect([...encodeZoneRules(fixedZoneRules(offsetOfHours(1)))]).toEqual([1, 4, 4])
    expect(rulesEquals(decodeZoneRules(Uint8Array.of(1, 4, 4)), fixedZoneRules(offsetOfHours(1)))).toBe(true)
  })

  it('keeps every bundled zone intact', () => {
    const provider = createBundledTzdbProvider()
    for (const id of provider.provideZoneIds()) {
      const rules = provider.provideRules(id, true)
      expect(rulesEquals(decodeZoneRules(encodeZoneRules(rules)), rules)).toBe(true)
    }
  })

  it('keeps a transition', () => {
    const trans = transitionOf(dateTimeOf(2008, 3, 30, 1, 0), UTC, offsetOfHours(1))
    expect(transitionEquals(decodeTransition(encodeTransition(trans)), trans)).toBe(true)
  })

  it('keeps a transition rule with escaped parts', () => {
    const rule = transitionRuleOf({
      month: 10, dayOfMonthIndicator: -8, dayOfWeek: SATURDAY, time: timeOf(1, 30), timeEndOfDay: false,
      timeDefinition: 'STANDARD', standardOffset: offsetOfHoursMinutesSeconds(0, 9, 21),
      offsetBefore: offsetOfHoursMinutes(2, 9), offsetAfter: offsetOfHoursMinutesSeconds(0, 9, 21),
    })
    expect(transitionRuleEquals(decodeTransitionRule(encodeTransitionRule(rule)), rule)).toBe(true)
  })

  it('keeps an end-of-day transition rule', () => {
    const rule = transitionRuleOf({
      month: 3, dayOfMonthIndicator: 8, dayOfWeek: SUNDAY, time: MIDNIGHT, timeEndOfDay: true,
      timeDefinition: 'WALL', standardOffset: offsetOfHours(-5),
      offsetBefore: offsetOfHours(-5), offsetAfter: offsetOfHours(-4),
    })
    const decoded = decodeTransitionRule(encodeTransitionRule(rule))
    expect(decoded.timeEndOfDay).toBe(true)
    expect(transitionRuleEquals(decoded, rule)).toBe(true)
  })

  describe('corrupt input', () => {
    it('rejects an unknown version or type', () => {
      expect(() => decodeZoneRules(Uint8Array.of(2, 1))).toThrow('Unknown serialized version: 2')
      expect(() => decodeZoneRules(Uint8Array.of(1, 9))).toThrow('Unknown serialized type: 9')
    })

    it('rejects truncated data', () => {
      const bytes = encodeZoneRules(createBundledTzdbProvider().provideRules('Europe/London', true))
      expect(() => decodeZoneRules(bytes.slice(0, bytes.length - 1))).toThrow(CorruptDataError)
    })

    it('rejects a value of the wrong kind', () => {
      const bytes = encodeZoneRules(fixedZoneRules(UTC))
      expect(() => decodeTransition(bytes)).toThrow('Expected a transition but found ZoneRules')
    })

    it('wraps invalid values', () => {
      expect(() => decodeZoneRules(Uint8Array.of(1, 4, 127, 0, 1, 0, 0)))
        .toThrow('Invalid serialized data: Zone offset not in valid range: -18:00 to +18:00')
    })
  })
})

// ============================================================================
// 3. SQLITE STORE
// ============================================================================

describe('SQLite rules store', () => {
  let store: SqliteRulesStore

  afterEach(() => {
    store.close()
  })

  function seeded(): SqliteRulesStore {
    store = createSqliteZoneRulesStore(':memory:')
    store.saveCompiled(compileTzdb([TEST_SOURCE], { version: '2024a' }))
    return store
  }

  it('stores every region of a compiled database', () => {
    const s = seeded()
    expect(s.listVersions()).toEqual(['2024a'])
    expect(s.provideZoneIds()).toEqual(new Set(['Test/Alias', 'Test/Zone']))
    expect(rulesOffsetAt(s.provideRules('Test/Zone', true), instantOfEpochSecond(1_206_838_800))).toBe(offsetOfHours(2))
    expect(s.getSchemaVersion()).toBe(1)
  })

  it('answers from the newest version', () => {
    const s = seeded()
    s.saveRules('2024b', 'Test/Zone', fixedZoneRules(offsetOfHours(3)))
    expect(rulesEquals(s.provideRules('Test/Zone', true), fixedZoneRules(offsetOfHours(3)))).toBe(true)
    expect([...s.provideVersions('Test/Zone').keys()]).toEqual(['2024a', '2024b'])
    expect(s.deleteVersion('2024b')).toBe(1)
    expect(s.listVersions()).toEqual(['2024a'])
  })

  it('reports changes once through refresh', () => {
    const s = seeded()
    expect(s.provideRefresh?.()).toBe(true)
    expect(s.provideRefresh?.()).toBe(false)
  })

  it('serves a registry', () => {
    const registry = createZoneRulesRegistry({ providers: [seeded()] })
    expect(registry.getAvailableZoneIds()).toEqual(new Set(['Test/Alias', 'Test/Zone']))
    expect(() => registry.getRules('Other/Zone')).toThrow('Unknown time-zone ID: Other/Zone')
  })

  it('reports an overwrite of the same region as a change', () => {
    const s = seeded()
    s.provideRefresh?.()
    s.saveRules('2024a', 'Test/Zone', fixedZoneRules(offsetOfHours(3)))
    s.saveRules('2024a', 'Test/Zone', fixedZoneRules(offsetOfHours(4)))
    expect(s.provideRefresh?.()).toBe(true)
    expect(s.deleteVersion('2023z')).toBe(0)
    expect(s.provideRefresh?.()).toBe(false)
    expect(s.deleteVersion('2024a')).toBe(2)
    expect(s.provideRefresh?.()).toBe(true)
  })

  it('serves regions saved after registration once the registry refreshes', () => {
    const registry = createZoneRulesRegistry({ providers: [seeded()] })
    store.saveRules('2024a', 'Test/Later', fixedZoneRules(offsetOfHours(5)))
    expect(() => registry.getRules('Test/Later')).toThrow('Unknown time-zone ID: Test/Later')
    expect(registry.refresh()).toBe(true)
    expect(registry.getAvailableZoneIds()).toEqual(new Set(['Test/Alias', 'Test/Later', 'Test/Zone']))
    expect(rulesEquals(registry.getRules('Test/Later'), fixedZoneRules(offsetOfHours(5)))).toBe(true)
  })

  it('drops regions deleted from the store once the registry refreshes', () => {
    const registry = createZoneRulesRegistry({ providers: [seeded()] })
    store.deleteVersion('2024a')
    expect(registry.refresh()).toBe(true)
    expect(registry.getAvailableZoneIds()).toEqual(new Set())
    expect(() => registry.getRules('Test/Zone')).toThrow('Unknown time-zone ID: Test/Zone')
  })

  it('rejects a refreshed region that another provider already serves', () => {
    const registry = createZoneRulesRegistry({ providers: [createBundledTzdbProvider(), seeded()] })
    store.saveRules('2024a', 'Europe/London', fixedZoneRules(UTC))
    expect(() => registry.refresh()).toThrow(
      'Unable to register zone as one already registered with that ID: Europe/London, currently loading from provider: SQLite[:memory:]',
    )
    expect(registry.getAvailableZoneIds().has('Test/Zone')).toBe(true)
    expect(rulesEquals(registry.getRules('Europe/London'), fixedZoneRules(UTC))).toBe(false)
  })

  it('names unknown regions', () => {
    const s = seeded()
    expect(() => s.provideRules('Other/Zone', true)).toThrow('Unknown time-zone ID: Other/Zone')
  })
})
