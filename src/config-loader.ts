/**
 * Config Loader
 *
 * Entry point for every document that reaches the engine: JSON text, bytes,
 * an already-parsed object or a file path. Legacy input is migrated, the
 * result is compiled and frozen, and orphaned playlists are logged.
 */

import { readFile } from 'node:fs/promises'
import type { CompiledDocument, PlaylistDocument } from './domain-types'
import { ConfigError, ConfigReadError } from './errors'
import { assertNesting, compileDocument, type CompileOptions } from './document-compiler'
import { migrateConfig, needsMigration } from './legacy-migration'
import { type Logger, silentLogger } from './logger'
import { type Result, Ok, Err } from './result'
import { deepFreeze, isRecord } from './internal/helpers'

// ============================================================================
// Types
// ============================================================================

export type LoadOptions = CompileOptions & {
  /** Where the document came from; recorded in migrated metadata and log lines */
  source?: string
  logger?: Logger
}

export type LoadFileOptions = LoadOptions & {
  timeoutMs?: number
}

export type LoadResult = {
  document: Readonly<PlaylistDocument>
  compiled: CompiledDocument
  /** Playlist ids reachable from the sequence */
  reachable: ReadonlySet<string>
  orphans: readonly string[]
  migrated: boolean
}

export const DEFAULT_LOAD_TIMEOUT_MS = 5000

// ============================================================================
// Parsing
// ============================================================================

export function parseDocumentText(text: string): Result<unknown, ConfigError> {
  try {
    return Ok(JSON.parse(text))
  } catch (err) {
    const detail = err instanceof Error ? err.message : String(err)
    return Err(new ConfigError('', `Invalid JSON: ${detail}`))
  }
}

function toData(input: unknown, maxNesting: number | undefined): unknown {
  if (typeof input === 'string' || input instanceof Uint8Array) {
    const text = typeof input === 'string' ? input : Buffer.from(input).toString('utf8')
    const parsed = parseDocumentText(text)
    if (!parsed.ok) throw parsed.error
    assertNesting(parsed.value, maxNesting)
    return parsed.value
  }
  // Checked before cloning: structuredClone recurses
  assertNesting(input, maxNesting)
  // Own copy, so freezing never reaches the caller's object
  try {
    return structuredClone(input)
  } catch (err) {
    const detail = err instanceof Error ? err.message : String(err)
    throw new ConfigError('', `document must be plain JSON data: ${detail}`)
  }
}

// ============================================================================
// Loading
// ============================================================================

/**
 * Load a document from JSON text, bytes or a parsed value. Throws ConfigError
 * (or MigrationError for unconvertible legacy input); nothing is returned
 * for a partially valid document.
 */
export function loadDocument(input: unknown, options: LoadOptions = {}): LoadResult {
  const logger = options.logger ?? silentLogger
  const source = options.source ?? 'inline'
  const data = toData(input, options.maxNesting)

  let migrated = false
  let config = data
  if (isRecord(data) && needsMigration(data)) {
    const result = migrateConfig(data, { source })
    config = result.config
    migrated = result.migrated
    if (migrated) logger.info(`Migrated ${source} to schema v2`)
  }

  const compiled = compileDocument(config, options)
  deepFreeze(compiled.source)

  for (const id of compiled.orphans) {
    logger.warn(`Playlist '${id}' is not reachable from the sequence (${source})`)
  }

  return {
    document: compiled.source,
    compiled,
    reachable: compiled.reachable,
    orphans: compiled.orphans,
    migrated,
  }
}

export async function loadDocumentFile(path: string, options: LoadFileOptions = {}): Promise<LoadResult> {
  const timeoutMs = options.timeoutMs ?? DEFAULT_LOAD_TIMEOUT_MS
  let text: string
  try {
    text = await readFile(path, { encoding: 'utf8', signal: AbortSignal.timeout(timeoutMs) })
  } catch (err) {
    const detail = err instanceof Error ? err.message : String(err)
    throw new ConfigReadError(path, detail)
  }
  return loadDocument(text, { ...options, source: options.source ?? path })
}
