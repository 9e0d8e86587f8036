/**
 * Legacy Migration
 *
 * Converts the two pre-v2 configuration shapes into schema v2 documents:
 *
 * - the flat screen map `{screen_id: false | 1 | N}` where N > 1 is a 1-based
 *   slot in a cycle as long as the largest N
 * - the older `{"sequence": [...]}` list of strings, cycles, variants and
 *   `{"every": N, "screen": ...}` entries
 *
 * Every function here is pure. Inputs are never mutated.
 */

import type { JsonObject, JsonValue, LegacyScreenMap, PlaylistDocument } from './domain-types'
import { MigrationError } from './errors'
import { isJsonObject, isRecord, keyPath, indexPath } from './internal/helpers'

// ============================================================================
// Constants
// ============================================================================

export const LEGACY_VERSION = 1
export const TARGET_VERSION = 2

export const MAIN_PLAYLIST_ID = 'main'

const MIGRATED_LABEL = 'Migrated sequence'

// ============================================================================
// Types
// ============================================================================

export type MigrateOptions = {
  /** Recorded as `metadata.source` (a file path, 'inline', 'admin') */
  source?: string
}

export type MigrationResult = {
  config: Record<string, unknown>
  /** False when the input was already v2 and is returned unchanged */
  migrated: boolean
}

// ============================================================================
// Screen Map (v1)
// ============================================================================

function slotOf(value: unknown, path: string): number {
  if (value === false) return 0
  if (value === true) return 1
  if (typeof value === 'number' && Number.isInteger(value) && value >= 0) return value
  throw new MigrationError(path, `expected false or a non-negative integer, got ${JSON.stringify(value) ?? String(value)}`)
}

/**
 * Longest slot number in the map, which becomes the frequency of every
 * phase-gated screen. 1 when no screen has a slot above 1.
 */
export function legacyCycleLength(map: Readonly<Record<string, unknown>>, path = ''): number {
  let length = 1
  for (const [screenId, value] of Object.entries(map)) {
    length = Math.max(length, slotOf(value, keyPath(path, screenId)))
  }
  return length
}

function screenMapSteps(map: Readonly<Record<string, unknown>>, path: string): JsonValue[] {
  const cycleLength = legacyCycleLength(map, path)
  const steps: JsonValue[] = []

  for (const [screenId, value] of Object.entries(map)) {
    const slot = slotOf(value, keyPath(path, screenId))
    if (slot === 0) continue
    if (slot === 1) {
      steps.push({ screen: screenId })
      continue
    }
    steps.push({
      every: { frequency: cycleLength, phase: slot - 1, item: { screen: screenId } },
    })
  }

  return steps
}

function migratedDocument(steps: JsonValue[], metadata: JsonObject): PlaylistDocument {
  return {
    version: TARGET_VERSION,
    catalog: { presets: {} },
    metadata,
    playlists: {
      [MAIN_PLAYLIST_ID]: { label: MIGRATED_LABEL, steps },
    },
    sequence: [{ playlist: MAIN_PLAYLIST_ID }],
  }
}

/**
 * Migrate a flat v1 screen map. `false` and `0` drop the screen, `1` and
 * `true` keep it on every pass, and N > 1 gates it to every L-th pass
 * starting at pass N - 1, where L is the largest N in the map.
 */
export function migrate(map: LegacyScreenMap | Readonly<Record<string, unknown>>, options: MigrateOptions = {}): PlaylistDocument {
  return migrateScreenMap(map, '', options)
}

function migrateScreenMap(map: Readonly<Record<string, unknown>>, path: string, options: MigrateOptions): PlaylistDocument {
  const steps = screenMapSteps(map, path)
  return migratedDocument(steps, {
    migrated_from: LEGACY_VERSION,
    source: options.source ?? 'inline',
  })
}

// ============================================================================
// Legacy Sequence
// ============================================================================

function screenIdOf(entry: unknown, path: string): string {
  if (typeof entry === 'string' && entry.trim()) return entry
  throw new MigrationError(path, 'expected a screen identifier')
}

/** Convert one entry of a legacy `sequence` array into a v2 step */
export function legacyItemToStep(entry: unknown, path: string): JsonValue {
  if (typeof entry === 'string') return { screen: screenIdOf(entry, path) }
  if (!isRecord(entry)) throw new MigrationError(path, 'unsupported legacy entry')

  const keys = Object.keys(entry)
  if (keys.length === 1 && 'screen' in entry) {
    return legacyItemToStep(entry.screen, keyPath(path, 'screen'))
  }

  if ('variants' in entry) {
    const optionsPath = keyPath(path, 'variants')
    const options = entry.variants
    if (!Array.isArray(options) || options.length === 0) {
      throw new MigrationError(optionsPath, 'variants must be a non-empty list')
    }
    return {
      variants: {
        options: options.map((option: unknown, i) => screenIdOf(option, indexPath(optionsPath, i))),
        selection: 'first_available',
      },
    }
  }

  if ('cycle' in entry) {
    const itemsPath = keyPath(path, 'cycle')
    const items = entry.cycle
    if (!Array.isArray(items) || items.length === 0) {
      throw new MigrationError(itemsPath, 'cycle must be a non-empty list')
    }
    return {
      cycle: { items: items.map((item: unknown, i) => legacyItemToStep(item, indexPath(itemsPath, i))) },
    }
  }

  if ('every' in entry) {
    const frequency = entry.every
    if (typeof frequency !== 'number' || !Number.isInteger(frequency) || frequency < 1) {
      throw new MigrationError(keyPath(path, 'every'), 'every requires an integer frequency of at least 1')
    }
    const childKey = entry.screen !== undefined ? 'screen' : 'item'
    const child = entry[childKey]
    if (child === undefined || child === null) {
      throw new MigrationError(path, 'every requires a screen or item')
    }
    return {
      every: { frequency, item: legacyItemToStep(child, keyPath(path, childKey)) },
    }
  }

  throw new MigrationError(path, 'unsupported legacy entry')
}

export function migrateLegacySequence(sequence: readonly unknown[], options: MigrateOptions = {}): PlaylistDocument {
  const steps = sequence.map((entry, i) => legacyItemToStep(entry, indexPath('sequence', i)))
  return migratedDocument(steps, {
    migrated_from: LEGACY_VERSION,
    source: options.source ?? 'inline',
  })
}

// ============================================================================
// Dispatch
// ============================================================================

/** True when `version` is absent or names the legacy schema */
export function needsMigration(data: Readonly<Record<string, unknown>>): boolean {
  return data.version === undefined || data.version === LEGACY_VERSION
}

/**
 * Return a v2 configuration for any supported input. Already-v2 input comes
 * back as-is with `migrated: false`; shape validation is left to the loader.
 */
export function migrateConfig(data: unknown, options: MigrateOptions = {}): MigrationResult {
  if (!isRecord(data)) throw new MigrationError('', 'Configuration must be a JSON object')

  const { version } = data
  if (version === TARGET_VERSION) return { config: data, migrated: false }
  if (version !== undefined && version !== LEGACY_VERSION) {
    throw new MigrationError('version', `Unsupported schema version ${JSON.stringify(version) ?? String(version)}`)
  }

  // Already shaped like v2, only the version marker is missing
  if ('playlists' in data && 'sequence' in data) {
    const metadata = isJsonObject(data.metadata) ? data.metadata : {}
    return {
      config: {
        ...data,
        version: TARGET_VERSION,
        // An existing migrated_from wins
        metadata: { migrated_from: version ?? LEGACY_VERSION, ...metadata },
      },
      migrated: true,
    }
  }

  if (Array.isArray(data.sequence)) {
    return { config: migrateLegacySequence(data.sequence, options), migrated: true }
  }

  if ('screens' in data) {
    if (!isRecord(data.screens)) throw new MigrationError('screens', 'screens must be an object')
    return { config: migrateScreenMap(data.screens, 'screens', options), migrated: true }
  }

  const map: Record<string, unknown> = {}
  for (const [key, value] of Object.entries(data)) {
    if (key !== 'version') map[key] = value
  }
  return { config: migrateScreenMap(map, '', options), migrated: true }
}
