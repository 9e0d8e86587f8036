/**
 * Adapter
 *
 * Persistence interface for the version ledger + in-memory mock implementation.
 * All methods are async so a synchronous driver and a networked store can sit
 * behind the same interface.
 */

import type { JsonObject, PlaylistDocument } from './domain-types'
import { DuplicateKeyError, NotFoundError } from './errors'

export { DuplicateKeyError, NotFoundError }

// ============================================================================
// Entity Types
// ============================================================================

export type ConfigVersion = {
  id: number
  /** ISO-8601 instant */
  createdAt: string
  actor: string
  summary: string
  document: PlaylistDocument
  metadata: JsonObject
}

export type NewConfigVersion = Omit<ConfigVersion, 'id'>

export type VersionSummary = Omit<ConfigVersion, 'document' | 'metadata'>

export type VersionStamp = Pick<ConfigVersion, 'id' | 'createdAt'>

// ============================================================================
// Adapter Interface
// ============================================================================

export interface LedgerAdapter {
  transaction<T>(fn: () => Promise<T>): Promise<T>

  /** Appends a version and returns its id; ids are never reused */
  insertVersion(version: NewConfigVersion): Promise<number>
  getVersion(id: number): Promise<ConfigVersion | null>
  getLatestVersion(): Promise<ConfigVersion | null>
  /** Newest first */
  listVersions(limit?: number): Promise<VersionSummary[]>
  /** Oldest first */
  listVersionStamps(): Promise<VersionStamp[]>
  /** Throws NotFoundError when any id is missing; deletes nothing in that case */
  deleteVersions(ids: readonly number[]): Promise<void>

  close?(): Promise<void>
}

// ============================================================================
// Mock Adapter
// ============================================================================

export function createMockAdapter(): LedgerAdapter {
  // ---- State ----
  let state = {
    versions: new Map<number, ConfigVersion>(),
    nextId: 1,
  }

  // ---- Transaction ----
  let txDepth = 0
  let snapshot: typeof state | null = null

  // ---- Helpers ----
  function clone<T>(obj: T): T {
    return structuredClone(obj)
  }

  function summarise(version: ConfigVersion): VersionSummary {
    return { id: version.id, createdAt: version.createdAt, actor: version.actor, summary: version.summary }
  }

  function newestFirst(): ConfigVersion[] {
    return [...state.versions.values()].sort((a, b) => b.id - a.id)
  }

  const adapter: LedgerAdapter = {
    // ================================================================
    // Transaction
    // ================================================================
    async transaction<T>(fn: () => Promise<T>): Promise<T> {
      if (txDepth === 0) snapshot = clone(state)
      txDepth++
      try {
        const result = await fn()
        txDepth--
        if (txDepth === 0) snapshot = null
        return result
      } catch (e) {
        txDepth--
        if (txDepth === 0 && snapshot) {
          state = snapshot
          snapshot = null
        }
        throw e
      }
    },

    // ================================================================
    // Versions
    // ================================================================
    async insertVersion(version) {
      const id = state.nextId
      state.versions.set(id, clone({ ...version, id }))
      state.nextId = id + 1
      return id
    },

    async getVersion(id) {
      const version = state.versions.get(id)
      return version ? clone(version) : null
    },

    async getLatestVersion() {
      const [latest] = newestFirst()
      return latest ? clone(latest) : null
    },

    async listVersions(limit) {
      const rows = newestFirst().map(summarise)
      return limit === undefined ? rows : rows.slice(0, limit)
    },

    async listVersionStamps() {
      return newestFirst().reverse().map((v) => ({ id: v.id, createdAt: v.createdAt }))
    },

    async deleteVersions(ids) {
      for (const id of ids) {
        if (!state.versions.has(id)) throw new NotFoundError(`Version ${id} not found`)
      }
      for (const id of ids) state.versions.delete(id)
    },

    async close() {
      state.versions.clear()
    },
  }

  return adapter
}
