/**
 * Document Compiler
 *
 * Validates a schema v2 document and compiles it into tagged steps. All
 * structural checks happen here, once, so the resolver can walk the result
 * without re-validating: unknown and cyclic playlist references, rule
 * parameters, malformed conditions and unknown step shapes all fail with a
 * ConfigError naming the path of the offending node.
 */

import type {
  CompiledDocument,
  JsonObject,
  JsonValue,
  Playlist,
  PlaylistDocument,
  PlaylistJson,
  PlaylistRef,
  RuleDescriptor,
  Step,
  VariantSelection,
} from './domain-types'
import {
  ConfigError,
  CyclicReferenceError,
  DuplicatePlaylistError,
  UnknownPlaylistError,
} from './errors'
import { parseCondition } from './condition-evaluation'
import { TARGET_VERSION } from './legacy-migration'
import { findTooDeep, isJsonObject, isJsonValue, isNonNegativeInteger, isRecord, keyPath, indexPath } from './internal/helpers'

// ============================================================================
// Types
// ============================================================================

export type CompileOptions = {
  /** When given, screen ids outside this set are rejected */
  knownScreens?: Iterable<string>
  /** Deepest array/object nesting accepted in the JSON */
  maxNesting?: number
}

export const MAX_NESTING = 256

type CompileContext = {
  playlistIds: ReadonlySet<string>
  knownScreens: ReadonlySet<string> | undefined
  rules: Map<string, string>
}

type RawPlaylist = {
  id: string
  path: string
  json: PlaylistJson
}

const STEP_KEYS = ['screen', 'playlist', 'steps', 'cycle', 'every', 'variants', 'rule'] as const

// ============================================================================
// Field Readers
// ============================================================================

function requireList(value: unknown, path: string, what: string): JsonValue[] {
  if (!Array.isArray(value)) throw new ConfigError(path, `${what} must be a list`)
  if (!value.every(isJsonValue)) throw new ConfigError(path, `${what} must contain only JSON values`)
  return value
}

function optionalObject(value: unknown, path: string, what: string): JsonObject {
  if (value === undefined || value === null) return {}
  if (!isJsonObject(value)) throw new ConfigError(path, `${what} must be an object`)
  return value
}

function requireId(value: unknown, path: string, what: string): string {
  if (typeof value !== 'string' || !value.trim()) throw new ConfigError(path, `${what} must be a non-empty string`)
  return value
}

function requireFrequency(value: unknown, path: string): number {
  if (typeof value !== 'number' || !Number.isInteger(value) || value < 1) {
    throw new ConfigError(path, `frequency must be an integer >= 1, got ${JSON.stringify(value) ?? String(value)}`)
  }
  return value
}

function optionalPhase(value: unknown, path: string): number {
  if (value === undefined || value === null) return 0
  if (!isNonNegativeInteger(value)) {
    throw new ConfigError(path, `phase must be an integer >= 0, got ${JSON.stringify(value) ?? String(value)}`)
  }
  return value
}

function optionalSelection(value: unknown, path: string): VariantSelection {
  if (value === undefined || value === null) return 'sequential'
  if (value === 'sequential' || value === 'random' || value === 'first_available') return value
  throw new ConfigError(path, `selection must be 'sequential', 'random' or 'first_available', got ${JSON.stringify(value) ?? String(value)}`)
}

// ============================================================================
// Step Compilation
// ============================================================================

function compileList(raw: unknown, path: string, ctx: CompileContext, what: string, nonEmpty: boolean): Step[] {
  const entries = requireList(raw, path, what)
  if (nonEmpty && entries.length === 0) throw new ConfigError(path, `${what} must not be empty`)
  return entries.map((entry, i) => compileStep(entry, indexPath(path, i), ctx))
}

function checkScreen(screenId: string, idPath: string, ctx: CompileContext): void {
  if (ctx.knownScreens && !ctx.knownScreens.has(screenId)) {
    throw new ConfigError(idPath, `Unknown screen '${screenId}'`)
  }
}

/** `{"cycle": [...]}` or `{"cycle": {"items": [...]}}` */
function compileCycle(raw: unknown, path: string, ctx: CompileContext): RuleDescriptor {
  const itemsPath = isRecord(raw) ? keyPath(path, 'items') : path
  const items = isRecord(raw) ? raw.items : raw
  return { type: 'cycle', items: compileList(items, itemsPath, ctx, 'cycle items', true) }
}

/** `{"variants": [...]}` or `{"variants": {"options": [...], "selection": ...}}` */
function compileVariants(raw: unknown, path: string, ctx: CompileContext): RuleDescriptor {
  if (!isRecord(raw)) {
    return { type: 'variants', options: compileList(raw, path, ctx, 'variants options', true), selection: 'sequential' }
  }
  return {
    type: 'variants',
    options: compileList(raw.options, keyPath(path, 'options'), ctx, 'variants options', true),
    selection: optionalSelection(raw.selection, keyPath(path, 'selection')),
  }
}

/** `{"every": {"frequency", "phase", "item"}}` or the rule-tagged equivalent */
function compileEvery(raw: unknown, path: string, ctx: CompileContext): RuleDescriptor {
  if (!isRecord(raw)) throw new ConfigError(path, 'every must be an object with frequency and item')
  if (raw.item === undefined) throw new ConfigError(keyPath(path, 'item'), 'every requires an item')
  return {
    type: 'every',
    frequency: requireFrequency(raw.frequency, keyPath(path, 'frequency')),
    phase: optionalPhase(raw.phase, keyPath(path, 'phase')),
    item: compileStep(raw.item, keyPath(path, 'item'), ctx),
  }
}

/** `{"every": 3, "phase": 1, "screen": "x"}` */
function compileEveryShorthand(raw: Record<string, unknown>, path: string, ctx: CompileContext): RuleDescriptor {
  const childKey = raw.screen !== undefined ? 'screen' : 'item'
  const child = raw[childKey]
  if (child === undefined) throw new ConfigError(keyPath(path, 'item'), 'every requires a screen or item')
  return {
    type: 'every',
    frequency: requireFrequency(raw.every, keyPath(path, 'every')),
    phase: optionalPhase(raw.phase, keyPath(path, 'phase')),
    item: compileStep(child, keyPath(path, childKey), ctx),
  }
}

/** `{"rule": {"type": "cycle" | "every" | "variants", ...}}` */
function compileTaggedRule(raw: unknown, path: string, ctx: CompileContext): RuleDescriptor {
  if (!isRecord(raw)) throw new ConfigError(path, 'rule must be an object')
  switch (raw.type) {
    case 'cycle':
      return compileCycle(raw, path, ctx)
    case 'variants':
      return compileVariants(raw, path, ctx)
    case 'every':
      return compileEvery(raw, path, ctx)
    default:
      throw new ConfigError(keyPath(path, 'type'), `Unknown rule type ${JSON.stringify(raw.type) ?? String(raw.type)}`)
  }
}

function compileStep(raw: unknown, path: string, ctx: CompileContext): Step {
  if (typeof raw === 'string') {
    const screenId = requireId(raw, path, 'screen id')
    checkScreen(screenId, path, ctx)
    return { kind: 'screen', path, screenId }
  }
  if (!isRecord(raw)) throw new ConfigError(path, 'step must be a screen id or an object')

  const condition = parseCondition(raw.conditions, keyPath(path, 'conditions'))
  const guard = condition ? { condition } : {}

  // `{"every": N, "screen": ...}` pairs two step keys on purpose
  const shorthandEvery = typeof raw.every === 'number'
  const kinds = STEP_KEYS.filter((key) => raw[key] !== undefined && !(shorthandEvery && key === 'screen'))

  if (kinds.length === 0) {
    throw new ConfigError(path, `Unknown step shape; expected one of ${STEP_KEYS.join(', ')}`)
  }
  if (kinds.length > 1) {
    throw new ConfigError(path, `Ambiguous step: found ${kinds.join(', ')}`)
  }

  const rule = (descriptor: RuleDescriptor): Step => {
    const signature = JSON.stringify(raw)
    ctx.rules.set(path, signature)
    return { kind: 'rule', path, rule: descriptor, signature, ...guard }
  }

  switch (kinds[0]) {
    case 'screen': {
      const idPath = keyPath(path, 'screen')
      const screenId = requireId(raw.screen, idPath, 'screen')
      checkScreen(screenId, idPath, ctx)
      if (raw.params === undefined) return { kind: 'screen', path, screenId, ...guard }
      return { kind: 'screen', path, screenId, params: optionalObject(raw.params, keyPath(path, 'params'), 'params'), ...guard }
    }
    case 'playlist': {
      const refPath = keyPath(path, 'playlist')
      const playlistId = requireId(raw.playlist, refPath, 'playlist reference')
      if (!ctx.playlistIds.has(playlistId)) throw new UnknownPlaylistError(refPath, playlistId)
      return { kind: 'playlist', path, playlistId, ...guard }
    }
    case 'steps':
      return { kind: 'block', path, steps: compileList(raw.steps, keyPath(path, 'steps'), ctx, 'steps', false), ...guard }
    case 'cycle':
      return rule(compileCycle(raw.cycle, keyPath(path, 'cycle'), ctx))
    case 'variants':
      return rule(compileVariants(raw.variants, keyPath(path, 'variants'), ctx))
    case 'every':
      return rule(shorthandEvery ? compileEveryShorthand(raw, path, ctx) : compileEvery(raw.every, keyPath(path, 'every'), ctx))
    case 'rule':
      return rule(compileTaggedRule(raw.rule, keyPath(path, 'rule'), ctx))
    default:
      throw new ConfigError(path, 'Unknown step shape')
  }
}

// ============================================================================
// Playlists
// ============================================================================

function readPlaylist(raw: unknown, path: string, id: string): PlaylistJson {
  if (!isRecord(raw)) throw new ConfigError(path, 'playlist must be an object')
  const label = raw.label === undefined ? id : raw.label
  if (typeof label !== 'string') throw new ConfigError(keyPath(path, 'label'), 'label must be a string')
  const steps = requireList(raw.steps, keyPath(path, 'steps'), 'steps')
  const json: PlaylistJson = { id, label, steps }
  if (raw.conditions !== undefined && raw.conditions !== null) {
    json.conditions = optionalObject(raw.conditions, keyPath(path, 'conditions'), 'conditions')
  }
  return json
}

/** Accepts `{id: playlist}` or `[{id, ...}]`; rejects duplicate ids */
function readPlaylists(raw: unknown): RawPlaylist[] {
  const out: RawPlaylist[] = []
  const seen = new Set<string>()

  const add = (id: string, path: string, idPath: string, value: unknown) => {
    if (seen.has(id)) throw new DuplicatePlaylistError(idPath, id)
    seen.add(id)
    out.push({ id, path, json: readPlaylist(value, path, id) })
  }

  if (Array.isArray(raw)) {
    raw.forEach((entry: unknown, i) => {
      const path = indexPath('playlists', i)
      if (!isRecord(entry)) throw new ConfigError(path, 'playlist must be an object')
      add(requireId(entry.id, keyPath(path, 'id'), 'playlist id'), path, keyPath(path, 'id'), entry)
    })
    return out
  }

  if (!isRecord(raw)) throw new ConfigError('playlists', 'playlists must be an object or a list')
  for (const [key, entry] of Object.entries(raw)) {
    const path = keyPath('playlists', key)
    if (isRecord(entry) && entry.id !== undefined && entry.id !== key) {
      const declared = requireId(entry.id, keyPath(path, 'id'), 'playlist id')
      throw new DuplicatePlaylistError(keyPath(path, 'id'), declared)
    }
    add(key, path, path, entry)
  }
  return out
}

// ============================================================================
// Reference Graph
// ============================================================================

export function collectPlaylistRefs(steps: readonly Step[], out: PlaylistRef[] = []): PlaylistRef[] {
  for (const step of steps) {
    switch (step.kind) {
      case 'screen':
        break
      case 'playlist':
        out.push(step)
        break
      case 'block':
        collectPlaylistRefs(step.steps, out)
        break
      case 'rule': {
        const { rule } = step
        if (rule.type === 'cycle') collectPlaylistRefs(rule.items, out)
        else if (rule.type === 'variants') collectPlaylistRefs(rule.options, out)
        else collectPlaylistRefs([rule.item], out)
        break
      }
    }
  }
  return out
}

function detectCycles(playlists: ReadonlyMap<string, Playlist>): void {
  const done = new Set<string>()
  const stack: string[] = []

  const visit = (id: string): void => {
    stack.push(id)
    const playlist = playlists.get(id)
    for (const ref of collectPlaylistRefs(playlist ? playlist.steps : [])) {
      const onStack = stack.indexOf(ref.playlistId)
      if (onStack >= 0) {
        throw new CyclicReferenceError(keyPath(ref.path, 'playlist'), [...stack.slice(onStack), ref.playlistId])
      }
      if (!done.has(ref.playlistId)) visit(ref.playlistId)
    }
    stack.pop()
    done.add(id)
  }

  for (const id of playlists.keys()) {
    if (!done.has(id)) visit(id)
  }
}

function reachableFrom(sequence: readonly Step[], playlists: ReadonlyMap<string, Playlist>): Set<string> {
  const reached = new Set<string>()
  const queue = collectPlaylistRefs(sequence).map((ref) => ref.playlistId)
  while (queue.length > 0) {
    const id = queue.shift()
    if (id === undefined || reached.has(id)) continue
    reached.add(id)
    const playlist = playlists.get(id)
    if (playlist) queue.push(...collectPlaylistRefs(playlist.steps).map((ref) => ref.playlistId))
  }
  return reached
}

// ============================================================================
// Document
// ============================================================================

/**
 * Validate and compile a v2 document. Legacy input must go through
 * migrateConfig first. The returned `source` is normalized: playlists are
 * keyed by id and absent catalog or metadata become empty objects.
 */
export function assertNesting(value: unknown, limit: number = MAX_NESTING): void {
  const path = findTooDeep(value, limit)
  if (path !== null) throw new ConfigError(path, `nesting deeper than ${limit} levels`)
}

export function compileDocument(raw: unknown, options: CompileOptions = {}): CompiledDocument {
  if (!isRecord(raw)) throw new ConfigError('', 'document must be an object')
  assertNesting(raw, options.maxNesting)
  if (raw.version !== TARGET_VERSION) {
    throw new ConfigError('version', `Unsupported schema version ${JSON.stringify(raw.version) ?? String(raw.version)}`)
  }

  const catalog = optionalObject(raw.catalog, 'catalog', 'catalog')
  const metadata = optionalObject(raw.metadata, 'metadata', 'metadata')
  const rawPlaylists = readPlaylists(raw.playlists)
  const sequenceJson = requireList(raw.sequence, 'sequence', 'sequence')

  const ctx: CompileContext = {
    playlistIds: new Set(rawPlaylists.map((p) => p.id)),
    knownScreens: options.knownScreens ? new Set(options.knownScreens) : undefined,
    rules: new Map(),
  }

  const playlists = new Map<string, Playlist>()
  const playlistJson: Record<string, PlaylistJson> = {}
  for (const { id, path, json } of rawPlaylists) {
    const condition = parseCondition(json.conditions, keyPath(path, 'conditions'))
    playlists.set(id, {
      id,
      label: json.label ?? id,
      path,
      steps: json.steps.map((step, i) => compileStep(step, indexPath(keyPath(path, 'steps'), i), ctx)),
      ...(condition ? { condition } : {}),
    })
    playlistJson[id] = json
  }

  const sequence = sequenceJson.map((step, i) => compileStep(step, indexPath('sequence', i), ctx))

  detectCycles(playlists)
  const reachable = reachableFrom(sequence, playlists)
  const orphans = [...playlists.keys()].filter((id) => !reachable.has(id))

  const source: PlaylistDocument = {
    ...raw,
    version: TARGET_VERSION,
    catalog,
    playlists: playlistJson,
    sequence: sequenceJson,
    metadata,
  }

  return { source, playlists, sequence, reachable, orphans, rules: ctx.rules }
}

export function isCompiledDocument(value: unknown): value is CompiledDocument {
  return isRecord(value) && value.playlists instanceof Map && value.rules instanceof Map && Array.isArray(value.sequence)
}
