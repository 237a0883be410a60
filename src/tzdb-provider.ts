/**
 * TZDB Provider
 *
 * Serves rules compiled from tzdb source text. Several versions of the
 * database may be loaded side by side; lookups answer from the newest
 * version that knows the region.
 */

import { readFileSync, readdirSync } from 'node:fs'
import { fileURLToPath } from 'node:url'
import { join } from 'node:path'
import type { ZoneRules } from './types'
import { InvalidArgumentError, ZoneRulesError } from './errors'
import { compileTzdb, type CompiledTzdb, type TzdbSource } from './tzdb-compiler'
import { createZoneRulesRegistry, type ZoneRulesProvider, type ZoneRulesRegistry } from './zone-rules-provider'

export type TzdbVersionSource = {
  version: string
  sources: readonly TzdbSource[]
}

const BUNDLED_VERSION = 'bundled'
const BUNDLED_DIR = fileURLToPath(new URL('../data/tzdb/', import.meta.url))

// ============================================================================
// Provider
// ============================================================================

/** Creates a provider from one or more versions of tzdb source text. */
export function createTzdbZoneRulesProvider(config: TzdbVersionSource | readonly TzdbVersionSource[]): ZoneRulesProvider {
  const configs: readonly TzdbVersionSource[] = Array.isArray(config) ? config : [config]
  return providerOfCompiled(configs.map(c => compileTzdb(c.sources, { version: c.version })))
}

/** Creates a provider from already compiled databases. */
export function providerOfCompiled(compiled: readonly CompiledTzdb[]): ZoneRulesProvider {
  if (compiled.length === 0) throw new InvalidArgumentError('At least one tzdb version is required')
  const seen = new Set<string>()
  for (const db of compiled) {
    if (seen.has(db.version)) throw new InvalidArgumentError(`Duplicate tzdb version: ${db.version}`)
    seen.add(db.version)
  }
  // Oldest first
  const versions = [...compiled].sort((a, b) => a.version.localeCompare(b.version))
  const ids = new Set<string>()
  for (const db of versions) for (const id of db.zones.keys()) ids.add(id)

  function provideRules(regionId: string): ZoneRules {
    for (let i = versions.length - 1; i >= 0; i--) {
      const rules = versions[i]!.zones.get(regionId)
      if (rules) return rules
    }
    throw new ZoneRulesError(`Unknown time-zone ID: ${regionId}`)
  }

  function provideVersions(regionId: string): ReadonlyMap<string, ZoneRules> {
    const result = new Map<string, ZoneRules>()
    for (const db of versions) {
      const rules = db.zones.get(regionId)
      if (rules) result.set(db.version, rules)
    }
    return result
  }

  return {
    name: `TZDB[${versions.map(v => v.version).join(',')}]`,
    provideZoneIds: () => ids,
    provideRules,
    provideVersions,
  }
}

// ============================================================================
// Bundled Data
// ============================================================================

let bundled: CompiledTzdb | null = null

/** Reads the `.tz` files shipped in `data/tzdb`. */
export function loadBundledSources(dir = BUNDLED_DIR): TzdbSource[] {
  return readdirSync(dir)
    .filter(name => name.endsWith('.tz'))
    .sort()
    .map(name => ({ name, text: readFileSync(join(dir, name), 'utf8') }))
}

/** A provider over the tzdb subset bundled with the library, compiled once per process. */
export function createBundledTzdbProvider(): ZoneRulesProvider {
  if (bundled === null) bundled = compileTzdb(loadBundledSources(), { version: BUNDLED_VERSION })
  return providerOfCompiled([bundled])
}

/** A registry over the bundled tzdb subset. */
export function createDefaultRegistry(): ZoneRulesRegistry {
  return createZoneRulesRegistry({ providers: [createBundledTzdbProvider()] })
}
