/**
 * Rule Expansion
 *
 * Turns a rule descriptor plus its per-path state into zero or one concrete
 * step for the current pass. Pure: the next state is returned, never written.
 *
 * - cycle: one item per activation, wrapping
 * - every: fires on passes where (pass - phase) mod frequency == 0, from pass == phase on
 * - variants: sequential behaves like cycle; random draws from a seed derived
 *   from (pass, rule path), so the same pass always picks the same option;
 *   first_available takes the first option whose screen is available
 */

import type { RuleDescriptor, Step } from './domain-types'
import { CorruptRuleStateError } from './errors'
import { seededIndex, simpleHash } from './internal/helpers'

// ============================================================================
// Types
// ============================================================================

export type RuleState = {
  index: number
}

export type ExpansionContext = {
  pass: number
  /** Structural path of the rule; keys its state and seeds random variants */
  path: string
  isAvailable?: (screenId: string) => boolean
}

export type Expansion = {
  step: Step | null
  /** Next state, or undefined when the rule carries none */
  state: RuleState | undefined
}

// ============================================================================
// Helpers
// ============================================================================

export function firesOnPass(pass: number, frequency: number, phase: number): boolean {
  if (pass < phase) return false
  return (pass - phase) % frequency === 0
}

export function randomVariantIndex(path: string, pass: number, count: number): number {
  return seededIndex(simpleHash(`${path}#${pass}`), count)
}

/** Playlist, block and rule options count as available; only screens are checked */
function firstAvailable(options: readonly Step[], isAvailable: (screenId: string) => boolean): Step | null {
  return options.find((option) => option.kind !== 'screen' || isAvailable(option.screenId)) ?? null
}

function currentIndex(state: RuleState | undefined, length: number, path: string): number {
  if (!state) return 0
  const { index } = state
  if (!Number.isInteger(index) || index < 0 || index >= length) {
    throw new CorruptRuleStateError(path, `index ${String(index)} outside 0..${length - 1}`)
  }
  return index
}

function rotate(steps: readonly Step[], state: RuleState | undefined, path: string): Expansion {
  const index = currentIndex(state, steps.length, path)
  return {
    step: steps[index] ?? null,
    state: { index: (index + 1) % steps.length },
  }
}

// ============================================================================
// Expansion
// ============================================================================

export function expandRule(rule: RuleDescriptor, state: RuleState | undefined, ctx: ExpansionContext): Expansion {
  switch (rule.type) {
    case 'cycle':
      return rotate(rule.items, state, ctx.path)
    case 'every':
      return {
        step: firesOnPass(ctx.pass, rule.frequency, rule.phase) ? rule.item : null,
        state: undefined,
      }
    case 'variants':
      if (rule.selection === 'sequential') return rotate(rule.options, state, ctx.path)
      if (rule.selection === 'first_available') {
        return { step: firstAvailable(rule.options, ctx.isAvailable ?? (() => true)), state: undefined }
      }
      return {
        step: rule.options[randomVariantIndex(ctx.path, ctx.pass, rule.options.length)] ?? null,
        state: undefined,
      }
  }
}
