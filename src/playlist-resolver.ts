/**
 * Playlist Resolver
 *
 * Depth-first walk from an entry step list to the ordered screens of one
 * pass. Conditions are checked at every node; rules are expanded against the
 * rule-state store handed in, which is the only thing resolution writes to.
 */

import type { CompiledDocument, ResolvedScreen, Step } from './domain-types'
import { DepthExceededError, ResolutionError } from './errors'
import { evaluateCondition } from './condition-evaluation'
import { expandRule } from './rule-expansion'
import type { LocalDateTime } from './time-date'
import type { RuleStateStore } from './internal/rule-state-store'

export const DEFAULT_MAX_DEPTH = 64

export type ResolveContext = {
  pass: number
  now: LocalDateTime
  ruleState: RuleStateStore
  maxDepth?: number
  /** Consulted by first_available variants */
  isAvailable?: (screenId: string) => boolean
}

export function resolve(document: CompiledDocument, entry: readonly Step[], ctx: ResolveContext): ResolvedScreen[] {
  const maxDepth = ctx.maxDepth ?? DEFAULT_MAX_DEPTH
  const out: ResolvedScreen[] = []

  const visit = (step: Step, depth: number): void => {
    if (depth > maxDepth) throw new DepthExceededError(step.path, maxDepth)
    if (!evaluateCondition(step.condition, ctx.now)) return

    switch (step.kind) {
      case 'screen':
        out.push({
          kind: 'screen',
          screenId: step.screenId,
          ...(step.params ? { params: step.params } : {}),
          path: step.path,
          pass: ctx.pass,
        })
        return

      case 'playlist': {
        const playlist = document.playlists.get(step.playlistId)
        if (!playlist) throw new ResolutionError(step.path, `Unknown playlist '${step.playlistId}'`)
        if (!evaluateCondition(playlist.condition, ctx.now)) return
        for (const child of playlist.steps) visit(child, depth + 1)
        return
      }

      case 'block':
        for (const child of step.steps) visit(child, depth + 1)
        return

      case 'rule': {
        const state = ctx.ruleState.get(step.path, step.signature)
        const expansion = expandRule(step.rule, state, { pass: ctx.pass, path: step.path, isAvailable: ctx.isAvailable })
        if (expansion.state) ctx.ruleState.set(step.path, step.signature, expansion.state)
        if (expansion.step) visit(expansion.step, depth + 1)
        return
      }
    }
  }

  for (const step of entry) visit(step, 1)
  return out
}

/** Resolve the document's top-level sequence for one pass */
export function resolvePass(document: CompiledDocument, ctx: ResolveContext): ResolvedScreen[] {
  return resolve(document, document.sequence, ctx)
}
