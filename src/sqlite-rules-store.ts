/**
 * SQLite Rules Store
 *
 * Persists compiled zone rules per (version, region) in a better-sqlite3
 * database, using the binary rules encoding. The store is itself a provider:
 * lookups answer from the newest stored version of a region.
 *
 * Every write bumps a change counter in `store_meta`; refresh compares the
 * counter with the value it last saw.
 */
import Database from 'better-sqlite3'
import type { ZoneRules } from './types'
import { ZoneRulesError, requireNonNull } from './errors'
import { decodeZoneRules, encodeZoneRules } from './zone-rules-serialization'
import type { CompiledTzdb } from './tzdb-compiler'
import type { ZoneRulesProvider } from './zone-rules-provider'

export type SqliteRulesStore = ZoneRulesProvider & {
  saveRules(version: string, regionId: string, rules: ZoneRules): void
  /** Stores every region of a compiled database in one transaction. */
  saveCompiled(compiled: CompiledTzdb): void
  deleteVersion(version: string): number
  listVersions(): string[]
  getSchemaVersion(): number
  close(): void
}

const SCHEMA_VERSION = 1

// ============================================================================
// Schema DDL
// ============================================================================

const SCHEMA_SQL = `
  CREATE TABLE IF NOT EXISTS zone_rules (
    version TEXT NOT NULL,
    region_id TEXT NOT NULL,
    rules BLOB NOT NULL,
    stored_at TEXT NOT NULL,
    PRIMARY KEY (version, region_id)
  );
  CREATE INDEX IF NOT EXISTS idx_zone_rules_region ON zone_rules(region_id);

  CREATE TABLE IF NOT EXISTS store_meta (
    key TEXT PRIMARY KEY,
    value INTEGER NOT NULL
  );
  INSERT OR IGNORE INTO store_meta (key, value) VALUES ('changes', 0);

  CREATE TABLE IF NOT EXISTS schema_version (
    version INTEGER PRIMARY KEY,
    applied_at TEXT NOT NULL
  );
`

// ============================================================================
// SQL Row Types
// ============================================================================

type RulesRow = {
  version: string
  rules: Buffer
}

type RegionRow = {
  region_id: string
}

type VersionRow = {
  version: string
}

type MetaRow = {
  value: number
}

type SchemaVersionRow = {
  v: number | null
}

// ============================================================================
// Factory
// ============================================================================

export function createSqliteZoneRulesStore(path: string): SqliteRulesStore {
  const db = new Database(path)
  db.exec(SCHEMA_SQL)

  const ver = db.prepare('SELECT MAX(version) as v FROM schema_version').get() as SchemaVersionRow | undefined
  if (ver?.v == null) {
    db.prepare('INSERT INTO schema_version (version, applied_at) VALUES (?, ?)').run(
      SCHEMA_VERSION, new Date().toISOString(),
    )
  }

  const upsert = db.prepare(`
    INSERT INTO zone_rules (version, region_id, rules, stored_at) VALUES (?, ?, ?, ?)
    ON CONFLICT (version, region_id) DO UPDATE SET rules = excluded.rules, stored_at = excluded.stored_at
  `)

  const bump = db.prepare("UPDATE store_meta SET value = value + 1 WHERE key = 'changes'")

  function changeCount(): number {
    const row = db.prepare("SELECT value FROM store_meta WHERE key = 'changes'").get() as MetaRow
    return row.value
  }

  let lastChangeCount = changeCount()

  const saveRules = db.transaction((version: string, regionId: string, rules: ZoneRules) => {
    requireNonNull(version, 'version')
    requireNonNull(regionId, 'regionId')
    upsert.run(version, regionId, Buffer.from(encodeZoneRules(rules)), new Date().toISOString())
    bump.run()
  })

  const deleteVersion = db.transaction((version: string): number => {
    const removed = db.prepare('DELETE FROM zone_rules WHERE version = ?').run(version).changes
    if (removed > 0) bump.run()
    return removed
  })

  const saveAll = db.transaction((compiled: CompiledTzdb) => {
    for (const [regionId, rules] of compiled.zones) saveRules(compiled.version, regionId, rules)
  })

  function provideZoneIds(): ReadonlySet<string> {
    const rows = db.prepare('SELECT DISTINCT region_id FROM zone_rules ORDER BY region_id').all() as RegionRow[]
    return new Set(rows.map(r => r.region_id))
  }

  function provideRules(regionId: string): ZoneRules {
    const row = db.prepare(
      'SELECT version, rules FROM zone_rules WHERE region_id = ? ORDER BY version DESC LIMIT 1',
    ).get(regionId) as RulesRow | undefined
    if (!row) throw new ZoneRulesError(`Unknown time-zone ID: ${regionId}`)
    return decodeZoneRules(new Uint8Array(row.rules))
  }

  function provideVersions(regionId: string): ReadonlyMap<string, ZoneRules> {
    const rows = db.prepare(
      'SELECT version, rules FROM zone_rules WHERE region_id = ? ORDER BY version',
    ).all(regionId) as RulesRow[]
    return new Map(rows.map(r => [r.version, decodeZoneRules(new Uint8Array(r.rules))]))
  }

  return {
    name: `SQLite[${path}]`,
    provideZoneIds,
    provideRules,
    provideVersions,
    provideRefresh() {
      const current = changeCount()
      const changed = current !== lastChangeCount
      lastChangeCount = current
      return changed
    },
    saveRules(version, regionId, rules) {
      saveRules(version, regionId, rules)
    },
    saveCompiled(compiled) {
      saveAll(compiled)
    },
    deleteVersion(version) {
      return deleteVersion(version)
    },
    listVersions() {
      const rows = db.prepare('SELECT DISTINCT version FROM zone_rules ORDER BY version').all() as VersionRow[]
      return rows.map(r => r.version)
    },
    getSchemaVersion() {
      const row = db.prepare('SELECT MAX(version) as v FROM schema_version').get() as SchemaVersionRow | undefined
      return row?.v ?? 0
    },
    close() {
      db.close()
    },
  }
}
