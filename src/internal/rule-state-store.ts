/**
 * Rule State Store
 *
 * Mutable per-rule counters keyed by structural path. Each entry remembers the
 * signature of the rule that wrote it; a lookup with a different signature
 * misses, so replacing the rule at a path starts it from scratch while edits
 * elsewhere leave it alone.
 */

import type { RuleState } from '../rule-expansion'

export type RuleStateEntry = {
  index: number
  signature: string
}

/** Plain-object form used for checkpoints and previews */
export type RuleStateSnapshot = Record<string, RuleStateEntry>

export type RuleStateStore = {
  get(path: string, signature: string): RuleState | undefined
  set(path: string, signature: string, state: RuleState): void
  clear(): void
  /** Drop entries whose path is gone or whose rule signature changed */
  retain(rules: ReadonlyMap<string, string>): void
  clone(): RuleStateStore
  snapshot(): RuleStateSnapshot
  readonly size: number
}

export function createRuleStateStore(initial?: RuleStateSnapshot): RuleStateStore {
  const entries = new Map<string, RuleStateEntry>()
  if (initial) {
    for (const [path, entry] of Object.entries(initial)) {
      entries.set(path, { index: entry.index, signature: entry.signature })
    }
  }

  const store: RuleStateStore = {
    get(path, signature) {
      const entry = entries.get(path)
      if (!entry || entry.signature !== signature) return undefined
      return { index: entry.index }
    },

    set(path, signature, state) {
      entries.set(path, { index: state.index, signature })
    },

    clear() {
      entries.clear()
    },

    retain(rules) {
      for (const [path, entry] of [...entries]) {
        if (rules.get(path) !== entry.signature) entries.delete(path)
      }
    },

    clone() {
      return createRuleStateStore(store.snapshot())
    },

    snapshot() {
      const out: RuleStateSnapshot = {}
      for (const [path, entry] of entries) out[path] = { ...entry }
      return out
    },

    get size() {
      return entries.size
    },
  }

  return store
}
