/**
 * Intl Provider
 *
 * Derives zone rules from the host's `Intl.DateTimeFormat` time-zone data.
 * The host exposes only the total offset at an instant, so the provider scans
 * a window of years a day at a time and narrows each change of offset down to
 * the second. The standard offset of a year is taken as the smaller of its
 * mid-January and mid-July offsets.
 *
 * Outside the scanned window the first and last offsets found stay in force;
 * the derived rules carry no yearly transition rules.
 */

import type { ZoneRules } from './types'
import { InvalidArgumentError, ZoneRulesError } from './errors'
import { offsetOfTotalSeconds } from './zone-offset'
import { fixedZoneRules, standardZoneRulesOfArrays } from './zone-rules'
import type { ZoneRulesProvider } from './zone-rules-provider'

export type IntlProviderConfig = {
  zoneIds: readonly string[]
  /** First year scanned. Defaults to 1970. */
  fromYear?: number
  /** Last year scanned. Defaults to 2037. */
  toYear?: number
}

const SECONDS_PER_DAY = 86_400
const EARLIEST_YEAR = 1900
const LATEST_YEAR = 2200

// ============================================================================
// Host Offsets
// ============================================================================

type OffsetLookup = (epochSecond: number) => number

function createFormatter(zoneId: string): Intl.DateTimeFormat {
  try {
    return new Intl.DateTimeFormat('en-US', {
      timeZone: zoneId,
      year: 'numeric',
      month: '2-digit',
      day: '2-digit',
      hour: '2-digit',
      minute: '2-digit',
      second: '2-digit',
      hour12: false,
    })
  } catch (e) {
    if (e instanceof RangeError) throw new InvalidArgumentError(`Time zone not known to the host: ${zoneId}`)
    throw e
  }
}

/** Offset in seconds of a zone at an epoch second, as the host reports it. */
function offsetLookup(zoneId: string): OffsetLookup {
  const formatter = createFormatter(zoneId)
  return (epochSecond) => {
    const utcMs = epochSecond * 1000
    const parts = formatter.formatToParts(new Date(utcMs))
    const get = (type: string) => {
      const part = parts.find((p) => p.type === type)
      return part ? parseInt(part.value, 10) : 0
    }

    let h = get('hour')
    if (h === 24) h = 0
    const localMs = Date.UTC(get('year'), get('month') - 1, get('day'), h, get('minute'), get('second'))
    return (localMs - utcMs) / 1000
  }
}

function yearStart(year: number): number {
  return Date.UTC(year, 0, 1) / 1000
}

// ============================================================================
// Derivation
// ============================================================================

/** Scans the years for changes of offset and assembles the rules. */
export function deriveIntlRules(zoneId: string, fromYear: number, toYear: number): ZoneRules {
  const offsetAt = offsetLookup(zoneId)
  const start = yearStart(fromYear)
  const end = yearStart(toYear + 1)
  let previous = offsetAt(start)
  const savingsTransitions: number[] = []
  const wallOffsets = [offsetOfTotalSeconds(previous)]
  for (let t = start + SECONDS_PER_DAY; t <= end; t += SECONDS_PER_DAY) {
    const current = offsetAt(t)
    if (current === previous) continue
    let lo = t - SECONDS_PER_DAY
    let hi = t
    while (hi - lo > 1) {
      const mid = Math.floor((lo + hi) / 2)
      if (offsetAt(mid) === previous) lo = mid
      else hi = mid
    }
    savingsTransitions.push(hi)
    wallOffsets.push(offsetOfTotalSeconds(current))
    previous = current
  }

  const standardTransitions: number[] = []
  let standard = standardSecondsOf(offsetAt, fromYear)
  const standardOffsets = [offsetOfTotalSeconds(standard)]
  for (let year = fromYear + 1; year <= toYear; year++) {
    const next = standardSecondsOf(offsetAt, year)
    if (next === standard) continue
    standardTransitions.push(yearStart(year))
    standardOffsets.push(offsetOfTotalSeconds(next))
    standard = next
  }

  if (savingsTransitions.length === 0 && standardTransitions.length === 0 && wallOffsets[0]!.totalSeconds === standard) {
    return fixedZoneRules(wallOffsets[0]!)
  }
  return standardZoneRulesOfArrays(standardTransitions, standardOffsets, savingsTransitions, wallOffsets, [])
}

function standardSecondsOf(offsetAt: OffsetLookup, year: number): number {
  return Math.min(
    offsetAt(Date.UTC(year, 0, 15, 12, 0, 0) / 1000),
    offsetAt(Date.UTC(year, 6, 15, 12, 0, 0) / 1000),
  )
}

// ============================================================================
// Provider
// ============================================================================

export function createIntlZoneRulesProvider(config: IntlProviderConfig): ZoneRulesProvider {
  const fromYear = config.fromYear ?? 1970
  const toYear = config.toYear ?? 2037
  if (!Number.isInteger(fromYear) || !Number.isInteger(toYear) || fromYear < EARLIEST_YEAR || toYear > LATEST_YEAR || fromYear > toYear) {
    throw new InvalidArgumentError(`Year window must lie within ${EARLIEST_YEAR}-${LATEST_YEAR}: ${fromYear}-${toYear}`)
  }
  const ids = new Set<string>()
  for (const id of config.zoneIds) {
    createFormatter(id)
    ids.add(id)
  }
  const cache = new Map<string, ZoneRules>()

  function provideRules(regionId: string): ZoneRules {
    if (!ids.has(regionId)) throw new ZoneRulesError(`Unknown time-zone ID: ${regionId}`)
    const cached = cache.get(regionId)
    if (cached) return cached
    const rules = deriveIntlRules(regionId, fromYear, toYear)
    cache.set(regionId, rules)
    return rules
  }

  return {
    name: `Intl[${fromYear}-${toYear}]`,
    provideZoneIds: () => ids,
    provideRules,
    provideVersions: (regionId) => new Map([[`intl-${fromYear}-${toYear}`, provideRules(regionId)]]),
  }
}
