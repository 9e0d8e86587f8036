/**
 * Public API Module
 *
 * Consumer-facing interface that ties all components together: the loader,
 * the scheduler that drives the display loop and the version ledger behind
 * the admin surface. A failed load, save or rollback leaves the engine
 * serving the document it had before.
 */

import type { JsonObject, PlaylistDocument, ResolvedScreen, Tick } from './domain-types'
import { ValidationError } from './errors'
import { type LoadResult, loadDocument, loadDocumentFile } from './config-loader'
import { createMockAdapter, type ConfigVersion, type VersionSummary } from './adapter'
import { createScheduler, type Instant, type ReloadOptions, type Scheduler, type SchedulerCheckpoint, type SchedulerEvents } from './scheduler'
import { createVersionLedger, type SaveOptions } from './version-ledger'
import { type EngineConfig, resolveConfig } from './config'
import { createEventHub, type Handler } from './internal/event-hub'

// ============================================================================
// Error Classes
// ============================================================================

export {
  PlaylistEngineError, ConfigError, UnknownPlaylistError, CyclicReferenceError,
  DuplicatePlaylistError, ConfigReadError, MigrationError, ResolutionError,
  DepthExceededError, CorruptRuleStateError, ValidationError, VersionNotFoundError,
} from './errors'

// ============================================================================
// Types
// ============================================================================

export type { EngineConfig } from './config'

export type PlaylistEngineEvents = SchedulerEvents & {
  load: { source: string; migrated: boolean; orphans: readonly string[] }
  saved: { versionId: number; actor: string; summary: string }
}

export type LoadDocumentOptions = ReloadOptions & {
  source?: string
}

export type PlaylistEngine = {
  /** Activate the newest saved version, seeding the default document into an empty history */
  initialize(): Promise<Readonly<PlaylistDocument>>
  load(input: unknown, options?: LoadDocumentOptions): LoadResult
  loadFile(path: string, options?: ReloadOptions): Promise<LoadResult>
  save(document: unknown, actor: string, options?: SaveOptions): Promise<number>
  rollback(versionId: number, actor?: string): Promise<Readonly<PlaylistDocument>>
  listVersions(limit?: number): Promise<VersionSummary[]>
  getVersion(id: number): Promise<ConfigVersion>
  advance(at?: Instant): Tick
  preview(count: number, at?: Instant): ResolvedScreen[]
  getDocument(): Readonly<PlaylistDocument>
  getCatalog(): Readonly<JsonObject>
  getOrphans(): readonly string[]
  getPassCount(): number
  checkpoint(): SchedulerCheckpoint
  restore(checkpoint: SchedulerCheckpoint): void
  on<K extends keyof PlaylistEngineEvents>(event: K, handler: Handler<PlaylistEngineEvents[K]>): () => void
  close(): Promise<void>
}

export const DEFAULT_DOCUMENT: PlaylistDocument = {
  version: 2,
  catalog: { presets: {} },
  metadata: { created: 'auto' },
  playlists: {
    main: { label: 'Default rotation', steps: [{ screen: 'date' }, { screen: 'time' }] },
  },
  sequence: [{ playlist: 'main' }],
}

// Admin edits keep in-progress cycles and the pass count
const EDIT_RELOAD: ReloadOptions = { preservePassCount: true, preserveRuleState: true }

// ============================================================================
// Implementation
// ============================================================================

export function createPlaylistEngine(config: EngineConfig = {}): PlaylistEngine {
  const settings = resolveConfig(config)
  const { logger, timezone } = settings
  const adapter = settings.adapter ?? createMockAdapter()
  const knownScreens = settings.knownScreens

  const ledger = createVersionLedger({
    adapter,
    retention: settings.retention,
    ...(knownScreens ? { knownScreens } : {}),
    clock: settings.clock,
    logger,
  })

  const events = createEventHub<PlaylistEngineEvents>(logger)

  let scheduler: Scheduler | null = null
  let active: LoadResult | null = null

  function requireActive(): { scheduler: Scheduler; active: LoadResult } {
    if (!scheduler || !active) throw new ValidationError('No document loaded; call initialize() or load() first')
    return { scheduler, active }
  }

  function activate(result: LoadResult, source: string, reloadOptions: ReloadOptions): LoadResult {
    if (!scheduler) {
      const created = createScheduler(result.compiled, {
        timezone,
        maxDepth: settings.maxDepth,
        peekPassLimit: settings.peekPassLimit,
        clock: settings.clock,
        isAvailable: settings.isAvailable,
        logger,
      })
      created.on('pass', (payload) => events.emit('pass', payload))
      created.on('idle', (payload) => events.emit('idle', payload))
      created.on('error', (payload) => events.emit('error', payload))
      created.on('reload', (payload) => events.emit('reload', payload))
      scheduler = created
    } else {
      scheduler.reload(result.compiled, reloadOptions)
    }
    active = result
    events.emit('load', { source, migrated: result.migrated, orphans: result.orphans })
    return result
  }

  function loadOptions(source: string) {
    return { source, logger, ...(knownScreens ? { knownScreens } : {}) }
  }

  function fromVersion(version: ConfigVersion): LoadResult {
    const source = `version ${version.id}`
    return activate(loadDocument(version.document, loadOptions(source)), source, EDIT_RELOAD)
  }

  async function initialize(): Promise<Readonly<PlaylistDocument>> {
    const latest = await ledger.getLatestVersion()
    if (latest) return fromVersion(latest).document

    logger.info('Version history is empty; seeding the default document')
    await ledger.save(DEFAULT_DOCUMENT, 'system', { summary: 'Default configuration' })
    const seeded = await ledger.getLatestVersion()
    if (!seeded) throw new ValidationError('Seeded version could not be read back')
    return fromVersion(seeded).document
  }

  function load(input: unknown, options: LoadDocumentOptions = {}): LoadResult {
    const source = options.source ?? 'inline'
    return activate(loadDocument(input, loadOptions(source)), source, options)
  }

  async function loadFile(path: string, options: ReloadOptions = {}): Promise<LoadResult> {
    const result = await loadDocumentFile(path, { ...loadOptions(path), timeoutMs: settings.loadTimeoutMs })
    return activate(result, path, options)
  }

  async function save(document: unknown, actor: string, options: SaveOptions = {}): Promise<number> {
    const versionId = await ledger.save(document, actor, options)
    const version = await ledger.getVersion(versionId)
    fromVersion(version)
    events.emit('saved', { versionId, actor, summary: version.summary })
    return versionId
  }

  async function rollback(versionId: number, actor = 'system'): Promise<Readonly<PlaylistDocument>> {
    await ledger.rollback(versionId, actor)
    const latest = await ledger.getLatestVersion()
    if (!latest) throw new ValidationError('Rollback produced no version')
    events.emit('saved', { versionId: latest.id, actor, summary: latest.summary })
    return fromVersion(latest).document
  }

  return {
    initialize,
    load,
    loadFile,
    save,
    rollback,
    listVersions: (limit) => ledger.listVersions(limit),
    getVersion: (id) => ledger.getVersion(id),
    advance: (at) => requireActive().scheduler.advance(at),
    preview: (count, at) => requireActive().scheduler.peek(count, at),
    getDocument: () => requireActive().active.document,
    getCatalog: () => requireActive().active.document.catalog,
    getOrphans: () => requireActive().active.orphans,
    getPassCount: () => requireActive().scheduler.getPassCount(),
    checkpoint: () => requireActive().scheduler.checkpoint(),
    restore: (snapshot) => requireActive().scheduler.restore(snapshot),
    on: events.on,
    async close() {
      await adapter.close?.()
    },
  }
}
