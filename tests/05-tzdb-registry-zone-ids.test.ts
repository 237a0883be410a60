/**
 * Segment 05: TZDB, Registry & Zone IDs
 *
 * Compiling tzdb source text, serving the compiled rules through providers
 * and the registry, and resolving zone ids against a registry.
 */

import { describe, it, expect, vi } from 'vitest'
import { compileTzdb, type TzdbSource } from '../src/tzdb-compiler'
import {
  createTzdbZoneRulesProvider,
  createBundledTzdbProvider,
  createDefaultRegistry,
} from '../src/tzdb-provider'
import { createZoneRulesRegistry, type ZoneRulesProvider } from '../src/zone-rules-provider'
import { SHORT_IDS, zoneIdOf, zoneIdOfOffset, zoneIdNormalized, zoneIdEquals, zoneRules } from '../src/zone-id'
import { fixedZoneRules, rulesOffsetAt, rulesTransitionRules } from '../src/zone-rules'
import { instantOfEpochSecond } from '../src/instant'
import { UTC, offsetOfHours, offsetOfHoursMinutes } from '../src/zone-offset'
import { InvalidArgumentError, ParseError, ZoneRulesError } from '../src/errors'
import type { ZoneRules } from '../src/types'

const TEST_SOURCE: TzdbSource = {
  name: 'test.tz',
  text: [
    '# Rule NAME FROM TO - IN ON AT SAVE LETTER',
    'Rule\tTest\t2000\tmax\t-\tMar\tlastSun\t1:00u\t1:00\tS',
    'Rule\tTest\t2000\tmax\t-\tOct\tlastSun\t1:00u\t0\t-',
    '',
    'Zone\tTest/Zone\t1:00\t-\tCET\t2000',
    '\t\t\t1:00\tTest\tCE%sT',
    '',
    'Link\tTest/Zone\tTest/Alias',
  ].join('\n'),
}

/** 2008-03-30T01:00Z */
const SPRING_2008 = 1_206_838_800

function at(epochSecond: number) {
  return instantOfEpochSecond(epochSecond)
}

function countingProvider(name: string, ids: string[], rules: ZoneRules) {
  const provideRules = vi.fn((_regionId: string, _forCaching: boolean) => rules)
  const provideRefresh = vi.fn(() => true)
  const provider: ZoneRulesProvider = {
    name,
    provideZoneIds: () => new Set(ids),
    provideRules,
    provideVersions: () => new Map([['v1', rules]]),
    provideRefresh,
  }
  return { provider, provideRules, provideRefresh }
}

// ============================================================================
// 1. COMPILER
// ============================================================================

describe('TZDB compiler', () => {
  const compiled = compileTzdb([TEST_SOURCE], { version: 'test' })

  it('compiles zones and links', () => {
    expect([...compiled.zones.keys()].sort()).toEqual(['Test/Alias', 'Test/Zone'])
    expect(compiled.zones.get('Test/Alias')).toBe(compiled.zones.get('Test/Zone'))
    expect(compiled.version).toBe('test')
  })

  it('applies rules read in UTC', () => {
    const rules = compiled.zones.get('Test/Zone')
    expect(rules).toBeDefined()
    if (!rules) return
    expect(rulesOffsetAt(rules, at(SPRING_2008 - 1))).toBe(offsetOfHours(1))
    expect(rulesOffsetAt(rules, at(SPRING_2008))).toBe(offsetOfHours(2))
    expect(rulesTransitionRules(rules)).toHaveLength(2)
  })

  it('names the file and line of a bad field', () => {
    const bad: TzdbSource = { name: 'bad.tz', text: '# header\nRule Test 2000 max - Foo lastSun 1:00u 1:00 S' }
    expect(() => compileTzdb([bad], { version: 'test' })).toThrow(ParseError)
    expect(() => compileTzdb([bad], { version: 'test' })).toThrow(
      "Failed while processing file 'bad.tz' on line 2 'Rule Test 2000 max - Foo lastSun 1:00u 1:00 S': Unknown month: foo",
    )
  })

  it('rejects lines it does not know', () => {
    const bad: TzdbSource = { name: 'bad.tz', text: 'Leap 2016 Dec 31 23:59:60 + S' }
    expect(() => compileTzdb([bad], { version: 'test' })).toThrow('Unknown line')
  })

  it('reports a missing rule set', () => {
    const bad: TzdbSource = { name: 'bad.tz', text: 'Zone Bad/Zone 1:00 Nope X' }
    expect(() => compileTzdb([bad], { version: 'test' })).toThrow(InvalidArgumentError)
    expect(() => compileTzdb([bad], { version: 'test' })).toThrow('Rule not found: Nope')
  })

  it('reports a dangling link', () => {
    const bad: TzdbSource = { name: 'bad.tz', text: 'Link Nowhere/Zone Some/Alias' }
    expect(() => compileTzdb([bad], { version: '2024a' }))
      .toThrow("Alias 'Some/Alias' links to invalid zone 'Nowhere/Zone' for '2024a'")
  })
})

// ============================================================================
// 2. PROVIDERS
// ============================================================================

describe('TZDB provider', () => {
  const older: TzdbSource = { name: 'older.tz', text: 'Zone Test/Zone 1:00 - CET' }

  it('answers from the newest version', () => {
    const provider = createTzdbZoneRulesProvider([
      { version: '2024b', sources: [TEST_SOURCE] },
      { version: '2024a', sources: [older] },
    ])
    expect(provider.name).toBe('TZDB[2024a,2024b]')
    expect(rulesTransitionRules(provider.provideRules('Test/Zone', true))).toHaveLength(2)
    expect([...provider.provideVersions('Test/Zone').keys()]).toEqual(['2024a', '2024b'])
    expect([...provider.provideVersions('Test/Alias').keys()]).toEqual(['2024b'])
  })

  it('refuses duplicate and missing versions', () => {
    expect(() => createTzdbZoneRulesProvider([
      { version: '2024a', sources: [older] },
      { version: '2024a', sources: [older] },
    ])).toThrow('Duplicate tzdb version: 2024a')
    expect(() => createTzdbZoneRulesProvider([])).toThrow('At least one tzdb version is required')
  })

  it('bundles the common zones without the UTC aliases', () => {
    const ids = createBundledTzdbProvider().provideZoneIds()
    expect(ids.has('Europe/London')).toBe(true)
    expect(ids.has('GB-Eire')).toBe(true)
    expect(ids.has('Etc/UTC')).toBe(true)
    expect(ids.has('UTC')).toBe(false)
    expect(ids.has('GMT')).toBe(false)
  })
})

// ============================================================================
// 3. REGISTRY
// ============================================================================

describe('Zone rules registry', () => {
  const rules = fixedZoneRules(offsetOfHours(3))

  it('caches the rules it hands out', () => {
    const { provider, provideRules } = countingProvider('fake', ['Fake/Zone'], rules)
    const registry = createZoneRulesRegistry({ providers: [provider] })
    registry.getRules('Fake/Zone')
    registry.getRules('Fake/Zone')
    expect(provideRules).toHaveBeenCalledTimes(1)
    expect(provideRules).toHaveBeenCalledWith('Fake/Zone', true)
  })

  it('does not cache when asked not to', () => {
    const { provider, provideRules } = countingProvider('fake', ['Fake/Zone'], rules)
    const registry = createZoneRulesRegistry({ providers: [provider] })
    registry.getRules('Fake/Zone', false)
    registry.getRules('Fake/Zone', false)
    expect(provideRules).toHaveBeenCalledTimes(2)
  })

  it('clears the cache on a refresh that changed something', () => {
    const { provider, provideRules, provideRefresh } = countingProvider('fake', ['Fake/Zone'], rules)
    const registry = createZoneRulesRegistry({ providers: [provider] })
    const refreshed = vi.fn()
    registry.on('refreshed', refreshed)
    registry.getRules('Fake/Zone')
    expect(registry.refresh()).toBe(true)
    registry.getRules('Fake/Zone')
    expect(provideRefresh).toHaveBeenCalledTimes(1)
    expect(provideRules).toHaveBeenCalledTimes(2)
    expect(refreshed).toHaveBeenCalledWith(true)
  })

  it('announces registered providers', () => {
    const registry = createZoneRulesRegistry()
    const registered = vi.fn()
    registry.on('providerRegistered', registered)
    registry.registerProvider(countingProvider('fake', ['Fake/Zone'], rules).provider)
    expect(registered).toHaveBeenCalledWith('fake', ['Fake/Zone'])
    expect(registry.getAvailableZoneIds()).toEqual(new Set(['Fake/Zone']))
  })

  it('refuses a region id registered twice', () => {
    const registry = createZoneRulesRegistry({ providers: [countingProvider('first', ['Fake/Zone'], rules).provider] })
    expect(() => registry.registerProvider(countingProvider('second', ['Other/Zone', 'Fake/Zone'], rules).provider))
      .toThrow('Unable to register zone as one already registered with that ID: Fake/Zone, currently loading from provider: second')
    expect(registry.getAvailableZoneIds()).toEqual(new Set(['Fake/Zone']))
  })

  it('explains a failed lookup', () => {
    expect(() => createZoneRulesRegistry().getRules('Europe/London')).toThrow('No time-zone data files registered')
    const registry = createZoneRulesRegistry({ providers: [countingProvider('fake', ['Fake/Zone'], rules).provider] })
    expect(() => registry.getRules('Mars/Olympus')).toThrow(ZoneRulesError)
    expect(() => registry.getRules('Mars/Olympus')).toThrow('Unknown time-zone ID: Mars/Olympus')
  })

  it('copies the provider versions', () => {
    const registry = createZoneRulesRegistry({ providers: [countingProvider('fake', ['Fake/Zone'], rules).provider] })
    expect(registry.getVersions('Fake/Zone')).toEqual(new Map([['v1', rules]]))
  })
})

// ============================================================================
// 4. ZONE IDS
// ============================================================================

describe('Zone ids', () => {
  const registry = createDefaultRegistry()

  it('reads offsets directly', () => {
    expect(zoneIdOf(registry, 'Z')).toBe(UTC)
    expect(zoneIdOf(registry, '+05:30')).toBe(offsetOfHoursMinutes(5, 30))
  })

  it('normalizes prefixed offsets', () => {
    expect(zoneIdOf(registry, 'GMT+1').id).toBe('GMT+01:00')
    expect(zoneIdOf(registry, 'UT+0130').id).toBe('UT+01:30')
    expect(zoneIdOf(registry, 'UTC+0').id).toBe('UTC')
    expect(zoneIdNormalized(zoneIdOf(registry, 'UTC'))).toBe(UTC)
  })

  it('resolves regions and links', () => {
    const london = zoneIdOf(registry, 'Europe/London')
    const gb = zoneIdOf(registry, 'GB-Eire')
    expect(london.kind).toBe('ZoneRegion')
    expect(gb.id).toBe('GB-Eire')
    expect(zoneRules(gb)).toBe(zoneRules(london))
    expect(zoneIdEquals(gb, london)).toBe(false)
  })

  it('maps short ids through an alias map', () => {
    expect(SHORT_IDS.CST).toBe('America/Chicago')
    expect(zoneIdOf(registry, 'CST', SHORT_IDS).id).toBe('America/Chicago')
    expect(zoneIdOf(registry, 'EST', SHORT_IDS)).toBe(offsetOfHours(-5))
  })

  it('resolves every short id against the bundled data', () => {
    for (const [shortId, target] of Object.entries(SHORT_IDS)) {
      expect(zoneIdOf(registry, shortId, SHORT_IDS).id).toBe(target)
    }
    expect(rulesOffsetAt(zoneRules(zoneIdOf(registry, 'ACT', SHORT_IDS)), at(0))).toBe(offsetOfHoursMinutes(9, 30))
  })

  it('keeps regions with varying rules', () => {
    const tokyo = zoneIdOf(registry, 'Asia/Tokyo')
    expect(zoneIdNormalized(tokyo)).toBe(tokyo)
  })

  it('rejects malformed and unknown ids', () => {
    expect(() => zoneIdOf(registry, 'A')).toThrow('Invalid zone: A')
    expect(() => zoneIdOf(registry, '/bad')).toThrow('Invalid ID for region-based ZoneId, invalid format: /bad')
    expect(() => zoneIdOf(registry, 'Mars/Olympus')).toThrow('Unknown time-zone ID: Mars/Olympus')
  })

  it('wraps an offset in a prefix', () => {
    expect(zoneIdOfOffset('', offsetOfHours(1))).toBe(offsetOfHours(1))
    expect(zoneIdOfOffset('GMT', offsetOfHours(1)).id).toBe('GMT+01:00')
    expect(() => zoneIdOfOffset('XYZ', UTC)).toThrow('Invalid prefix, must be GMT, UTC or UT: XYZ')
  })
})

// ============================================================================
// 5. BUNDLED DATA
// ============================================================================

describe('Bundled rules', () => {
  const registry = createDefaultRegistry()
  const offsetIn = (id: string, epochSecond: number) => rulesOffsetAt(registry.getRules(id), at(epochSecond)).id

  it('has local mean time before standard time', () => {
    expect(offsetIn('Europe/London', -4_000_000_000)).toBe('-00:01:15')
  })

  it('follows British summer time', () => {
    expect(offsetIn('Europe/London', SPRING_2008 - 1)).toBe('Z')
    expect(offsetIn('Europe/London', SPRING_2008)).toBe('+01:00')
  })

  it('follows the US rules since 2007', () => {
    const spring2024 = 1_710_054_000
    expect(offsetIn('America/New_York', spring2024 - 1)).toBe('-05:00')
    expect(offsetIn('America/New_York', spring2024)).toBe('-04:00')
    expect(offsetIn('America/Phoenix', spring2024)).toBe('-07:00')
  })

  it('has southern summers', () => {
    expect(offsetIn('Australia/Sydney', 1_705_276_800)).toBe('+11:00')
    expect(offsetIn('Australia/Sydney', 1_721_001_600)).toBe('+10:00')
  })

  it('has fixed zones', () => {
    expect(offsetIn('Asia/Kolkata', 1_705_276_800)).toBe('+05:30')
    expect(offsetIn('Etc/GMT+5', 0)).toBe('-05:00')
    expect(offsetIn('Etc/GMT-10', 0)).toBe('+10:00')
  })
})

describe('Bundled history since 1970', () => {
  const registry = createDefaultRegistry()
  const offsetIn = (id: string, epochSecond: number) => rulesOffsetAt(registry.getRules(id), at(epochSecond)).id

  /** 1971-11-04T12:00Z */
  const NOV_1971 = 58_104_000

  it('ends British standard time in October 1971', () => {
    expect(offsetIn('Europe/London', NOV_1971)).toBe('Z')
  })

  it('starts summer time in New South Wales in 1971', () => {
    expect(offsetIn('Australia/Sydney', NOV_1971)).toBe('+11:00')
  })

  it('has daylight time in China in 1986', () => {
    expect(offsetIn('Asia/Shanghai', 515_937_600)).toBe('+09:00')
  })

  it('skips a day in Samoa', () => {
    const transition = 1_325_239_200
    expect(offsetIn('Pacific/Apia', transition - 1)).toBe('-10:00')
    expect(offsetIn('Pacific/Apia', transition)).toBe('+14:00')
  })
})

// ============================================================================
// 6. BUNDLED DATA AGAINST THE HOST
// ============================================================================

/** Every bundled zone that is not a link, UTC aliases aside */
const CANONICAL_REGIONS = [
  'Africa/Cairo', 'Africa/Maputo', 'Africa/Nairobi',
  'America/Anchorage', 'America/Argentina/Buenos_Aires', 'America/Chicago', 'America/Indiana/Indianapolis',
  'America/Los_Angeles', 'America/New_York', 'America/Phoenix', 'America/Puerto_Rico', 'America/Sao_Paulo',
  'America/St_Johns',
  'Asia/Dhaka', 'Asia/Ho_Chi_Minh', 'Asia/Karachi', 'Asia/Kolkata', 'Asia/Shanghai', 'Asia/Tokyo', 'Asia/Yerevan',
  'Australia/Darwin', 'Australia/Sydney',
  'Etc/GMT', 'Etc/GMT+5', 'Etc/GMT-10', 'Etc/UTC',
  'Europe/Berlin', 'Europe/London', 'Europe/Paris',
  'Pacific/Apia', 'Pacific/Auckland', 'Pacific/Guadalcanal',
]

/** Thursday 1970-01-01T12:00Z, then weekly up to 2038 */
const FIRST_SAMPLE = 43_200
const END_OF_2037 = 2_145_916_800
const WEEK = 604_800

const OFFSET_NAME_RE = /^GMT(?:([+-])(\d{2}):(\d{2})(?::(\d{2}))?)?$/

function hostOffsetSeconds(formatter: Intl.DateTimeFormat, epochSecond: number): number {
  const name = formatter.formatToParts(new Date(epochSecond * 1000)).find(p => p.type === 'timeZoneName')?.value ?? ''
  const match = OFFSET_NAME_RE.exec(name)
  expect(match, name).not.toBeNull()
  if (!match?.[1]) return 0
  const seconds = Number(match[2]) * 3600 + Number(match[3]) * 60 + Number(match[4] ?? 0)
  return match[1] === '-' ? -seconds : seconds
}

describe('Bundled rules against the host', () => {
  const registry = createDefaultRegistry()

  it('bundles each listed region', () => {
    const ids = registry.getAvailableZoneIds()
    for (const id of CANONICAL_REGIONS) expect(ids.has(id), id).toBe(true)
  })

  it.each(CANONICAL_REGIONS)('%s gives the host offsets from 1970 to 2037', (id) => {
    const rules = registry.getRules(id)
    const formatter = new Intl.DateTimeFormat('en-US', { timeZone: id, timeZoneName: 'longOffset' })
    const mismatches: string[] = []
    for (let t = FIRST_SAMPLE; t < END_OF_2037; t += WEEK) {
      const expected = hostOffsetSeconds(formatter, t)
      const actual = rulesOffsetAt(rules, at(t)).totalSeconds
      if (actual !== expected) mismatches.push(`${new Date(t * 1000).toISOString()}: ${actual} != ${expected}`)
    }
    expect(mismatches).toEqual([])
  })
})
