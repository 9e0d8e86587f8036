/**
 * Canonical Domain Types
 *
 * Two layers live here. The JSON layer (`PlaylistDocument` and friends) is the
 * shape stored on disk and in the version ledger; it is loose on purpose and is
 * only trusted after compilation. The compiled layer (`Step`, `Playlist`,
 * `CompiledDocument`) is what the resolver walks: every node is tagged and
 * carries the dotted path it was compiled from.
 */

import type { Weekday } from './time-date'
import type { ResolutionError } from './errors'

// ============================================================================
// JSON Layer
// ============================================================================

export type JsonPrimitive = string | number | boolean | null
export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue }
export type JsonObject = { [key: string]: JsonValue }

export type PlaylistJson = {
  id?: string
  label?: string
  steps: JsonValue[]
  conditions?: JsonObject
}

/** Schema v2 configuration document. Unknown top-level keys are carried through. */
export type PlaylistDocument = {
  version: 2
  catalog: JsonObject
  playlists: Record<string, PlaylistJson>
  sequence: JsonValue[]
  metadata: JsonObject
  [key: string]: unknown
}

/** Flat v1 map: screen id → false (excluded), 1 (every pass) or N (slot N of the cycle) */
export type LegacyScreenMap = Record<string, boolean | number>

// ============================================================================
// Conditions
// ============================================================================

/** Half-open [start, end) window in seconds since local midnight. start > end wraps midnight. */
export type TimeWindow = {
  start: number
  end: number
}

export type Condition = {
  daysOfWeek?: ReadonlySet<Weekday>
  timeOfDay?: readonly TimeWindow[]
}

// ============================================================================
// Compiled Steps
// ============================================================================

/** first_available: the first option whose screen is available, as legacy variants behaved */
export type VariantSelection = 'sequential' | 'random' | 'first_available'

export type ScreenStep = {
  kind: 'screen'
  path: string
  screenId: string
  params?: Readonly<JsonObject>
  condition?: Condition
}

export type PlaylistRef = {
  kind: 'playlist'
  path: string
  playlistId: string
  condition?: Condition
}

/** Anonymous inline playlist: `{"steps": [...]}` */
export type StepBlock = {
  kind: 'block'
  path: string
  steps: readonly Step[]
  condition?: Condition
}

export type RuleDescriptor =
  | { type: 'cycle'; items: readonly Step[] }
  | { type: 'every'; frequency: number; phase: number; item: Step }
  | { type: 'variants'; options: readonly Step[]; selection: VariantSelection }

export type RuleStep = {
  kind: 'rule'
  path: string
  rule: RuleDescriptor
  /** Fingerprint of the rule's source; a changed signature at the same path resets its state */
  signature: string
  condition?: Condition
}

export type Step = ScreenStep | PlaylistRef | StepBlock | RuleStep

export type Playlist = {
  id: string
  label: string
  path: string
  steps: readonly Step[]
  condition?: Condition
}

export type CompiledDocument = {
  source: Readonly<PlaylistDocument>
  playlists: ReadonlyMap<string, Playlist>
  sequence: readonly Step[]
  /** Playlist ids reachable from the sequence */
  reachable: ReadonlySet<string>
  /** Playlists defined but never reached from the sequence */
  orphans: readonly string[]
  /** Rule path → signature for every rule in the document */
  rules: ReadonlyMap<string, string>
}

// ============================================================================
// Resolution Output
// ============================================================================

export type ResolvedScreen = {
  kind: 'screen'
  screenId: string
  params?: Readonly<JsonObject>
  /** Path of the screen step that produced this entry */
  path: string
  pass: number
}

export type Idle = {
  kind: 'idle'
  pass: number
  error?: ResolutionError
}

export type Tick = ResolvedScreen | Idle
