/**
 * SQLite Adapter
 *
 * Production implementation of the ledger adapter using better-sqlite3.
 * Documents are stored as JSON text and re-validated when read back.
 */
import Database from 'better-sqlite3'
import type { ConfigVersion, LedgerAdapter, NewConfigVersion, VersionStamp, VersionSummary } from './adapter'
import type { JsonObject, PlaylistDocument } from './domain-types'
import { DuplicateKeyError, NotFoundError } from './errors'
import { compileDocument } from './document-compiler'
import { isJsonObject } from './internal/helpers'

// ============================================================================
// Extended type for SQLite-specific introspection methods
// ============================================================================

export type SqliteExtras = {
  listTables(): Promise<string[]>
  getSchemaVersion(): Promise<number>
  inTransaction(): Promise<boolean>
}

export type SqliteAdapter = LedgerAdapter & SqliteExtras & { close(): Promise<void> }

export const SCHEMA_VERSION = 1

// ============================================================================
// Schema DDL
// ============================================================================

const SCHEMA_SQL = `
  CREATE TABLE IF NOT EXISTS config_version (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    created_at TEXT NOT NULL,
    actor TEXT NOT NULL,
    summary TEXT NOT NULL,
    config_json TEXT NOT NULL,
    metadata_json TEXT NOT NULL DEFAULT '{}'
  );
  CREATE INDEX IF NOT EXISTS idx_config_version_created ON config_version(created_at);

  CREATE TABLE IF NOT EXISTS schema_version (
    version INTEGER PRIMARY KEY,
    applied_at TEXT NOT NULL
  );
`

// ============================================================================
// Error Mapping
// ============================================================================

function mapError(e: unknown): never {
  const msg = e instanceof Error ? e.message : String(e)
  if (/UNIQUE constraint|PRIMARY KEY constraint/i.test(msg)) throw new DuplicateKeyError(msg)
  throw e
}

function safe<T>(fn: () => T): T {
  try { return fn() }
  catch (e) { mapError(e) }
}

// ============================================================================
// SQL Row Types
// ============================================================================

type VersionRow = {
  id: number
  created_at: string
  actor: string
  summary: string
  config_json: string
  metadata_json: string
}

type SummaryRow = Pick<VersionRow, 'id' | 'created_at' | 'actor' | 'summary'>

type StampRow = Pick<VersionRow, 'id' | 'created_at'>

type SchemaVersionRow = {
  v: number | null
}

// ============================================================================
// Row Mapping
// ============================================================================

function parseDocument(json: string): PlaylistDocument {
  return compileDocument(JSON.parse(json)).source
}

function parseMetadata(json: string): JsonObject {
  const value: unknown = JSON.parse(json)
  return isJsonObject(value) ? value : {}
}

function toSummary(row: SummaryRow): VersionSummary {
  return { id: row.id, createdAt: row.created_at, actor: row.actor, summary: row.summary }
}

function toVersion(row: VersionRow): ConfigVersion {
  return {
    ...toSummary(row),
    document: parseDocument(row.config_json),
    metadata: parseMetadata(row.metadata_json),
  }
}

// ============================================================================
// Factory
// ============================================================================

export async function createSqliteAdapter(path: string): Promise<SqliteAdapter> {
  const db = new Database(path)
  db.exec(SCHEMA_SQL)

  // Seed initial schema version if empty
  const ver = db.prepare<[], SchemaVersionRow>('SELECT MAX(version) as v FROM schema_version').get()
  if (ver?.v == null) {
    db.prepare('INSERT INTO schema_version (version, applied_at) VALUES (?, ?)').run(
      SCHEMA_VERSION, new Date().toISOString(),
    )
  }

  let _inTx = false

  const insertStmt = db.prepare<[string, string, string, string, string]>(
    'INSERT INTO config_version (created_at, actor, summary, config_json, metadata_json) VALUES (?, ?, ?, ?, ?)',
  )
  const getStmt = db.prepare<[number], VersionRow>('SELECT * FROM config_version WHERE id = ?')
  const latestStmt = db.prepare<[], VersionRow>('SELECT * FROM config_version ORDER BY id DESC LIMIT 1')
  const listStmt = db.prepare<[number], SummaryRow>(
    'SELECT id, created_at, actor, summary FROM config_version ORDER BY id DESC LIMIT ?',
  )
  const stampStmt = db.prepare<[], StampRow>('SELECT id, created_at FROM config_version ORDER BY id ASC')
  const existsStmt = db.prepare<[number], { id: number }>('SELECT id FROM config_version WHERE id = ?')
  const deleteStmt = db.prepare<[number]>('DELETE FROM config_version WHERE id = ?')

  const adapter: SqliteAdapter = {
    // ================================================================
    // Transaction
    // ================================================================
    async transaction<T>(fn: () => Promise<T>): Promise<T> {
      if (_inTx) return await fn()
      _inTx = true
      db.exec('BEGIN IMMEDIATE')
      try {
        const result = await fn()
        db.exec('COMMIT')
        return result
      } catch (e) {
        db.exec('ROLLBACK')
        throw e
      } finally {
        _inTx = false
      }
    },

    // ================================================================
    // Versions
    // ================================================================
    async insertVersion(version: NewConfigVersion) {
      const result = safe(() =>
        insertStmt.run(
          version.createdAt,
          version.actor,
          version.summary,
          JSON.stringify(version.document),
          JSON.stringify(version.metadata),
        ),
      )
      return Number(result.lastInsertRowid)
    },

    async getVersion(id: number) {
      const row = getStmt.get(id)
      return row ? toVersion(row) : null
    },

    async getLatestVersion() {
      const row = latestStmt.get()
      return row ? toVersion(row) : null
    },

    async listVersions(limit?: number) {
      // LIMIT -1 is unbounded in SQLite
      return listStmt.all(limit ?? -1).map(toSummary)
    },

    async listVersionStamps(): Promise<VersionStamp[]> {
      return stampStmt.all().map((row) => ({ id: row.id, createdAt: row.created_at }))
    },

    async deleteVersions(ids: readonly number[]) {
      const remove = db.transaction((targets: readonly number[]) => {
        for (const id of targets) {
          if (!existsStmt.get(id)) throw new NotFoundError(`Version ${id} not found`)
          deleteStmt.run(id)
        }
      })
      safe(() => remove(ids))
    },

    // ================================================================
    // Lifecycle
    // ================================================================
    async close() {
      db.close()
    },

    // ================================================================
    // SQLite Extras
    // ================================================================
    async listTables() {
      const rows = db.prepare<[], { name: string }>(
        "SELECT name FROM sqlite_master WHERE type='table' AND name NOT LIKE 'sqlite_%' ORDER BY name",
      ).all()
      return rows.map((r) => r.name)
    },

    async getSchemaVersion() {
      const row = db.prepare<[], SchemaVersionRow>('SELECT MAX(version) as v FROM schema_version').get()
      return row?.v ?? 0
    },

    async inTransaction() {
      return _inTx
    },
  }

  return adapter
}
