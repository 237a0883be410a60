/**
 * Segment 12: Intl Provider
 *
 * Zone rules derived from the host's own time-zone data.
 */

import { describe, it, expect } from 'vitest'
import { createIntlZoneRulesProvider, deriveIntlRules } from '../src/intl-provider'
import { createZoneRulesRegistry } from '../src/zone-rules-provider'
import { zoneIdOf, zoneRules } from '../src/zone-id'
import { rulesIsFixedOffset, rulesOffsetAt, rulesStandardOffset } from '../src/zone-rules'
import { instantOfEpochSecond } from '../src/instant'
import { offsetOfHours, offsetOfHoursMinutes } from '../src/zone-offset'
import { InvalidArgumentError } from '../src/errors'

/** 2024-03-10T07:00:00Z, when New York moved to daylight time */
const NEW_YORK_SPRING_2024 = 1_710_054_000

// ============================================================================
// 1. DERIVATION
// ============================================================================

describe('Deriving rules from the host', () => {
  it('finds each change of offset to the second', () => {
    const rules = deriveIntlRules('America/New_York', 2024, 2024)
    expect(rulesOffsetAt(rules, instantOfEpochSecond(NEW_YORK_SPRING_2024 - 1))).toBe(offsetOfHours(-5))
    expect(rulesOffsetAt(rules, instantOfEpochSecond(NEW_YORK_SPRING_2024))).toBe(offsetOfHours(-4))
    expect(rulesStandardOffset(rules, instantOfEpochSecond(NEW_YORK_SPRING_2024))).toBe(offsetOfHours(-5))
  })

  it('returns fixed rules for a zone that never changes', () => {
    const rules = deriveIntlRules('Asia/Kolkata', 2020, 2021)
    expect(rulesIsFixedOffset(rules)).toBe(true)
    expect(rulesOffsetAt(rules, instantOfEpochSecond(0))).toBe(offsetOfHoursMinutes(5, 30))
  })
})

// ============================================================================
// 2. PROVIDER
// ============================================================================

describe('Intl provider', () => {
  it('names itself after its window', () => {
    const provider = createIntlZoneRulesProvider({ zoneIds: ['Asia/Kolkata'], fromYear: 2020, toYear: 2021 })
    expect(provider.name).toBe('Intl[2020-2021]')
    expect(provider.provideZoneIds()).toEqual(new Set(['Asia/Kolkata']))
    expect([...provider.provideVersions('Asia/Kolkata').keys()]).toEqual(['intl-2020-2021'])
  })

  it('caches derived rules', () => {
    const provider = createIntlZoneRulesProvider({ zoneIds: ['Asia/Kolkata'], fromYear: 2020, toYear: 2021 })
    expect(provider.provideRules('Asia/Kolkata', true)).toBe(provider.provideRules('Asia/Kolkata', true))
  })

  it('serves a registry', () => {
    const registry = createZoneRulesRegistry({
      providers: [createIntlZoneRulesProvider({ zoneIds: ['Asia/Kolkata'], fromYear: 2020, toYear: 2021 })],
    })
    const zone = zoneIdOf(registry, 'Asia/Kolkata')
    expect(rulesIsFixedOffset(zoneRules(zone))).toBe(true)
  })

  it('rejects zones the host does not know', () => {
    expect(() => createIntlZoneRulesProvider({ zoneIds: ['Mars/Olympus'] }))
      .toThrow('Time zone not known to the host: Mars/Olympus')
  })

  it('rejects regions it was not given', () => {
    const provider = createIntlZoneRulesProvider({ zoneIds: ['Asia/Kolkata'], fromYear: 2020, toYear: 2021 })
    expect(() => provider.provideRules('Europe/London', true)).toThrow('Unknown time-zone ID: Europe/London')
  })

  it('rejects a window outside the supported years', () => {
    expect(() => createIntlZoneRulesProvider({ zoneIds: [], fromYear: 1800 })).toThrow(InvalidArgumentError)
    expect(() => createIntlZoneRulesProvider({ zoneIds: [], fromYear: 2030, toYear: 2020 }))
      .toThrow('Year window must lie within 1900-2200: 2030-2020')
  })
})
