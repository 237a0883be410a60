/**
 * Zone ID
 *
 * A zone is either a fixed offset or a named region. Region ids are looked up
 * in a registry when the zone is created, so a region value always carries
 * its rules.
 *
 * Accepted ids:
 * - `Z`, `+h`, `+hh:mm`, `-hhmmss`, … → the offset itself
 * - `UTC`, `GMT`, `UT` → a region with fixed UTC rules
 * - `UTC+01:00`, `GMT-5`, `UT+0130`, … → a fixed region, id normalized
 *   (`GMT+01:00`; a zero offset keeps just the prefix)
 * - anything else → a region id known to the registry
 */

import type { ZoneId, ZoneOffset, ZoneRegion, ZoneRules } from './types'
import { InvalidArgumentError, requireNonNull } from './errors'
import { unwrap } from './result'
import { UTC, offsetEquals, parseOffset } from './zone-offset'
import { INSTANT_EPOCH } from './instant'
import { fixedZoneRules, rulesIsFixedOffset, rulesOffsetAt } from './zone-rules'
import type { ZoneRulesRegistry } from './zone-rules-provider'

const REGION_ID_PATTERN = /^[A-Za-z][A-Za-z0-9~/._+-]+$/

/** Three-letter ids kept for compatibility; map them with `zoneIdOf(registry, id, SHORT_IDS)`. */
export const SHORT_IDS: Readonly<Record<string, string>> = Object.freeze({
  ACT: 'Australia/Darwin',
  AET: 'Australia/Sydney',
  AGT: 'America/Argentina/Buenos_Aires',
  ART: 'Africa/Cairo',
  AST: 'America/Anchorage',
  BET: 'America/Sao_Paulo',
  BST: 'Asia/Dhaka',
  CAT: 'Africa/Harare',
  CNT: 'America/St_Johns',
  CST: 'America/Chicago',
  CTT: 'Asia/Shanghai',
  EAT: 'Africa/Addis_Ababa',
  ECT: 'Europe/Paris',
  IET: 'America/Indiana/Indianapolis',
  IST: 'Asia/Kolkata',
  JST: 'Asia/Tokyo',
  MIT: 'Pacific/Apia',
  NET: 'Asia/Yerevan',
  NST: 'Pacific/Auckland',
  PLT: 'Asia/Karachi',
  PNT: 'America/Phoenix',
  PRT: 'America/Puerto_Rico',
  PST: 'America/Los_Angeles',
  SST: 'Pacific/Guadalcanal',
  VST: 'Asia/Ho_Chi_Minh',
  EST: '-05:00',
  MST: '-07:00',
  HST: '-10:00',
})

// ============================================================================
// Construction
// ============================================================================

export function zoneRegionOf(id: string, rules: ZoneRules): ZoneRegion {
  return Object.freeze({ kind: 'ZoneRegion', id, rules })
}

function fixedRegion(prefix: string, offset: ZoneOffset): ZoneRegion {
  const id = offset.totalSeconds === 0 ? prefix : prefix + offset.id
  return zoneRegionOf(id, fixedZoneRules(offset))
}

/**
 * Resolves a zone id. An alias map, such as `SHORT_IDS`, is consulted first.
 * Region ids unknown to the registry raise `ZoneRulesError`; malformed ids
 * raise `InvalidArgumentError` or the offset parse error.
 */
export function zoneIdOf(registry: ZoneRulesRegistry, zoneId: string, aliasMap?: Readonly<Record<string, string>>): ZoneId {
  requireNonNull(zoneId, 'zoneId')
  const id = aliasMap?.[zoneId] ?? zoneId
  if (id === 'Z') return UTC
  if (id.length === 1) throw new InvalidArgumentError(`Invalid zone: ${id}`)
  if (id.startsWith('+') || id.startsWith('-')) return unwrap(parseOffset(id))
  if (id === 'UTC' || id === 'GMT' || id === 'UT') return fixedRegion(id, UTC)
  if (/^(UTC|GMT)[+-]/.test(id)) return fixedRegion(id.substring(0, 3), unwrap(parseOffset(id.substring(3))))
  if (/^UT[+-]/.test(id)) return fixedRegion('UT', unwrap(parseOffset(id.substring(2))))
  return zoneRegionOfId(registry, id)
}

function zoneRegionOfId(registry: ZoneRulesRegistry, id: string): ZoneRegion {
  if (!REGION_ID_PATTERN.test(id)) {
    throw new InvalidArgumentError(`Invalid ID for region-based ZoneId, invalid format: ${id}`)
  }
  return zoneRegionOf(id, registry.getRules(id))
}

/** Wraps an offset with a `GMT`, `UTC` or `UT` prefix; an empty prefix returns the offset. */
export function zoneIdOfOffset(prefix: string, offset: ZoneOffset): ZoneId {
  requireNonNull(prefix, 'prefix')
  requireNonNull(offset, 'offset')
  if (prefix.length === 0) return offset
  if (prefix === 'GMT' || prefix === 'UTC' || prefix === 'UT') return fixedRegion(prefix, offset)
  throw new InvalidArgumentError(`Invalid prefix, must be GMT, UTC or UT: ${prefix}`)
}

/** The host's default zone, resolved through `SHORT_IDS`. */
export function systemDefaultZone(registry: ZoneRulesRegistry): ZoneId {
  return zoneIdOf(registry, Intl.DateTimeFormat().resolvedOptions().timeZone, SHORT_IDS)
}

// ============================================================================
// Queries
// ============================================================================

export function zoneRules(zone: ZoneId): ZoneRules {
  return zone.kind === 'ZoneOffset' ? fixedZoneRules(zone) : zone.rules
}

/** A region whose rules never change normalizes to its offset. */
export function zoneIdNormalized(zone: ZoneId): ZoneId {
  if (zone.kind === 'ZoneOffset') return zone
  return rulesIsFixedOffset(zone.rules) ? rulesOffsetAt(zone.rules, INSTANT_EPOCH) : zone
}

export function zoneIdEquals(a: ZoneId, b: ZoneId): boolean {
  if (a.kind === 'ZoneOffset' && b.kind === 'ZoneOffset') return offsetEquals(a, b)
  return a.kind === b.kind && a.id === b.id
}

export function formatZoneId(zone: ZoneId): string {
  return zone.id
}
