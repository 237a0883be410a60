/**
 * Zone Rules Provider & Registry
 *
 * A provider supplies rules for a set of region ids. The registry gathers
 * providers, answers lookups by region id and caches the rules it hands out.
 *
 * The registry is an explicit service: create one with
 * `createZoneRulesRegistry` and pass it to the operations that resolve
 * region ids.
 */

import type { ZoneRules } from './types'
import { ZoneRulesError, requireNonNull } from './errors'

// ============================================================================
// Types
// ============================================================================

export type ZoneRulesProvider = {
  /** Stable name used in error messages. */
  readonly name: string
  provideZoneIds(): ReadonlySet<string>
  /**
   * Rules for a region id this provider declared. `forCaching` is false when
   * the caller will not keep the result, letting dynamic providers return
   * rules that may later change.
   */
  provideRules(regionId: string, forCaching: boolean): ZoneRules
  /** Every version of the rules for a region id, oldest first. */
  provideVersions(regionId: string): ReadonlyMap<string, ZoneRules>
  /** Reloads the provider's data; returns true when anything changed. */
  provideRefresh?(): boolean
}

export type ZoneRulesRegistryEvent = 'providerRegistered' | 'refreshed'

export type ZoneRulesRegistryConfig = {
  providers?: readonly ZoneRulesProvider[]
}

export type ZoneRulesRegistry = {
  registerProvider(provider: ZoneRulesProvider): void
  getAvailableZoneIds(): Set<string>
  getRules(regionId: string, forCaching?: boolean): ZoneRules
  getVersions(regionId: string): Map<string, ZoneRules>
  refresh(): boolean
  on(event: ZoneRulesRegistryEvent, handler: (...args: unknown[]) => void): void
}

// ============================================================================
// Registry
// ============================================================================

export function createZoneRulesRegistry(config: ZoneRulesRegistryConfig = {}): ZoneRulesRegistry {
  // Replaced wholesale on registration and refresh, never mutated in place
  let zones: ReadonlyMap<string, ZoneRulesProvider> = new Map()
  const ruleCache = new Map<string, ZoneRules>()
  const providers: ZoneRulesProvider[] = []

  const eventHandlers = new Map<ZoneRulesRegistryEvent, ((...args: unknown[]) => void)[]>()

  function emit(event: ZoneRulesRegistryEvent, ...args: unknown[]): boolean {
    const handlers = eventHandlers.get(event) || []
    let hadErrors = false
    for (const handler of handlers) {
      try { handler(...args) } catch (e) { hadErrors = true; console.error(`Event handler error on '${event}':`, e) }
    }
    return !hadErrors
  }

  function on(event: ZoneRulesRegistryEvent, handler: (...args: unknown[]) => void) {
    if (!eventHandlers.has(event)) eventHandlers.set(event, [])
    eventHandlers.get(event)!.push(handler)
  }

  function addZones(into: Map<string, ZoneRulesProvider>, provider: ZoneRulesProvider): string[] {
    const ids = [...provider.provideZoneIds()]
    for (const id of ids) {
      requireNonNull(id, 'zoneId')
      if (into.has(id)) {
        throw new ZoneRulesError(
          `Unable to register zone as one already registered with that ID: ${id}, currently loading from provider: ${provider.name}`,
        )
      }
      into.set(id, provider)
    }
    return ids
  }

  function registerProvider(provider: ZoneRulesProvider): void {
    requireNonNull(provider, 'provider')
    const next = new Map(zones)
    const ids = addZones(next, provider)
    zones = next
    providers.push(provider)
    emit('providerRegistered', provider.name, ids)
  }

  function getProvider(regionId: string): ZoneRulesProvider {
    const provider = zones.get(regionId)
    if (provider) return provider
    if (providers.length === 0) throw new ZoneRulesError('No time-zone data files registered')
    throw new ZoneRulesError(`Unknown time-zone ID: ${regionId}`)
  }

  function getRules(regionId: string, forCaching = true): ZoneRules {
    requireNonNull(regionId, 'zoneId')
    const cached = ruleCache.get(regionId)
    if (cached) return cached
    const rules = getProvider(regionId).provideRules(regionId, forCaching)
    if (forCaching) ruleCache.set(regionId, rules)
    return rules
  }

  function getVersions(regionId: string): Map<string, ZoneRules> {
    requireNonNull(regionId, 'zoneId')
    return new Map(getProvider(regionId).provideVersions(regionId))
  }

  function refresh(): boolean {
    let changed = false
    for (const provider of providers) {
      if (provider.provideRefresh?.()) changed = true
    }
    if (changed) {
      // Providers may have gained or lost regions
      const next = new Map<string, ZoneRulesProvider>()
      for (const provider of providers) addZones(next, provider)
      zones = next
      ruleCache.clear()
    }
    emit('refreshed', changed)
    return changed
  }

  for (const provider of config.providers ?? []) registerProvider(provider)

  return {
    registerProvider,
    getAvailableZoneIds: () => new Set(zones.keys()),
    getRules,
    getVersions,
    refresh,
    on,
  }
}
