/**
 * Version Ledger
 *
 * Append-only history of saved documents. Every save is validated first,
 * gets a diff summary against the version before it, and triggers retention
 * pruning. Rollback never rewrites history: it appends a copy of the target.
 */

import type { ConfigVersion, LedgerAdapter, VersionSummary } from './adapter'
import type { JsonObject, PlaylistDocument } from './domain-types'
import { ValidationError, VersionNotFoundError } from './errors'
import { loadDocument } from './config-loader'
import { summariseDiff } from './config-diff'
import { type Logger, silentLogger } from './logger'

// ============================================================================
// Types
// ============================================================================

export type RetentionPolicy = {
  /** Keep at most this many versions */
  maxVersions?: number
  /** Drop versions older than this many days */
  maxAgeDays?: number
}

export type VersionLedgerOptions = {
  adapter: LedgerAdapter
  retention?: RetentionPolicy
  knownScreens?: Iterable<string>
  clock?: () => Date
  logger?: Logger
}

export type SaveOptions = {
  summary?: string
  metadata?: JsonObject
}

export type VersionLedger = {
  save(document: unknown, actor: string, options?: SaveOptions): Promise<number>
  listVersions(limit?: number): Promise<VersionSummary[]>
  getVersion(id: number): Promise<ConfigVersion>
  getLatestVersion(): Promise<ConfigVersion | null>
  latestVersionId(): Promise<number | null>
  rollback(versionId: number, actor?: string): Promise<Readonly<PlaylistDocument>>
  /** Apply the retention policy now; returns the deleted ids */
  prune(): Promise<number[]>
}

export const DEFAULT_RETENTION: Required<Pick<RetentionPolicy, 'maxVersions'>> = { maxVersions: 25 }

const DAY_MS = 24 * 60 * 60 * 1000

// ============================================================================
// Factory
// ============================================================================

export function createVersionLedger(options: VersionLedgerOptions): VersionLedger {
  const { adapter } = options
  const retention: RetentionPolicy = options.retention ?? DEFAULT_RETENTION
  const clock = options.clock ?? (() => new Date())
  const logger = options.logger ?? silentLogger
  const knownScreens = options.knownScreens ? [...options.knownScreens] : undefined

  if (retention.maxVersions !== undefined && (!Number.isInteger(retention.maxVersions) || retention.maxVersions < 1)) {
    throw new ValidationError('retention.maxVersions must be a positive integer')
  }
  if (retention.maxAgeDays !== undefined && !(retention.maxAgeDays > 0)) {
    throw new ValidationError('retention.maxAgeDays must be positive')
  }

  // Writes run one at a time so each diff sees the version before it
  let tail: Promise<unknown> = Promise.resolve()

  function serial<T>(task: () => Promise<T>): Promise<T> {
    const run = tail.then(task)
    // A failed write rejects its own caller and must not block the next one
    tail = run.then(
      () => undefined,
      () => undefined,
    )
    return run
  }

  async function pruneNow(): Promise<number[]> {
    const stamps = await adapter.listVersionStamps()
    const latest = stamps[stamps.length - 1]
    if (!latest) return []

    const doomed = new Set<number>()
    if (retention.maxVersions !== undefined && stamps.length > retention.maxVersions) {
      for (const stamp of stamps.slice(0, stamps.length - retention.maxVersions)) doomed.add(stamp.id)
    }
    if (retention.maxAgeDays !== undefined) {
      const cutoff = clock().getTime() - retention.maxAgeDays * DAY_MS
      for (const stamp of stamps) {
        if (Date.parse(stamp.createdAt) < cutoff) doomed.add(stamp.id)
      }
    }
    doomed.delete(latest.id)

    const ids = [...doomed].sort((a, b) => a - b)
    if (ids.length > 0) {
      await adapter.deleteVersions(ids)
      logger.info(`Pruned ${ids.length} old version(s): ${ids.join(', ')}`)
    }
    return ids
  }

  async function saveNow(document: unknown, actor: string, saveOptions: SaveOptions = {}): Promise<number> {
    if (!actor.trim()) throw new ValidationError('actor must be a non-empty string')
    const loaded = loadDocument(document, { knownScreens, logger, source: 'ledger' })
    const next = structuredClone(loaded.document)

    return adapter.transaction(async () => {
      const previous = await adapter.getLatestVersion()
      const summary = saveOptions.summary?.trim() || summariseDiff(previous ? previous.document : null, next)
      const id = await adapter.insertVersion({
        createdAt: clock().toISOString(),
        actor,
        summary,
        document: next,
        metadata: saveOptions.metadata ?? {},
      })
      logger.info(`Saved version ${id} by ${actor}: ${summary}`)
      await pruneNow()
      return id
    })
  }

  async function getVersion(id: number): Promise<ConfigVersion> {
    const version = await adapter.getVersion(id)
    if (!version) throw new VersionNotFoundError(id)
    return version
  }

  async function rollbackNow(versionId: number, actor: string): Promise<Readonly<PlaylistDocument>> {
    const target = await getVersion(versionId)
    await saveNow(target.document, actor, {
      summary: `Rollback to version ${versionId}`,
      metadata: { rollback_of: versionId },
    })
    return loadDocument(target.document, { knownScreens, source: `version ${versionId}` }).document
  }

  return {
    save: (document, actor, saveOptions) => serial(() => saveNow(document, actor, saveOptions)),
    listVersions: (limit) => adapter.listVersions(limit),
    getVersion,
    getLatestVersion: () => adapter.getLatestVersion(),
    async latestVersionId() {
      const latest = await adapter.getLatestVersion()
      return latest ? latest.id : null
    },
    rollback: (versionId, actor = 'system') => serial(() => rollbackNow(versionId, actor)),
    prune: () => serial(() => adapter.transaction(pruneNow)),
  }
}
