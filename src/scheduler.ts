/**
 * Scheduler
 *
 * Owns the pass counter and rule state, and hands out one screen per
 * advance() call. A pass is resolved on first use and consumed in order; the
 * counter moves on only once the pass is exhausted. An empty pass still
 * counts, so frequency-gated rules keep progressing while nothing is shown.
 *
 * Resolution runs against a scratch copy of the rule state and is committed
 * only when it succeeds. Previews run the same loop on a full copy.
 */

import type { CompiledDocument, Idle, ResolvedScreen, Tick } from './domain-types'
import { ResolutionError, ValidationError } from './errors'
import { isCompiledDocument } from './document-compiler'
import { loadDocument, type LoadOptions } from './config-loader'
import { resolvePass, DEFAULT_MAX_DEPTH } from './playlist-resolver'
import { type LocalDateTime, instantToLocal, isValidTimezone } from './time-date'
import { type Logger, silentLogger } from './logger'
import { createEventHub, type Handler } from './internal/event-hub'
import { createRuleStateStore, type RuleStateSnapshot, type RuleStateStore } from './internal/rule-state-store'
import { isNonNegativeInteger, isRecord } from './internal/helpers'

// ============================================================================
// Types
// ============================================================================

export type Instant = Date | LocalDateTime

export type SchedulerOptions = {
  /** IANA zone used to turn instants into local wall-clock time */
  timezone?: string
  maxDepth?: number
  /** Upper bound on passes a single peek() may resolve */
  peekPassLimit?: number
  clock?: () => Date
  /** Screens reported unavailable are skipped when handed out */
  isAvailable?: (screenId: string) => boolean
  logger?: Logger
  /** Used when reload() receives an uncompiled document */
  load?: Omit<LoadOptions, 'logger'>
}

export type ReloadOptions = {
  preservePassCount?: boolean
  /** Keep state for rules whose path and definition are unchanged */
  preserveRuleState?: boolean
}

export type SchedulerCheckpoint = {
  pass: number
  /** Unconsumed screens of the pass in progress, or null between passes */
  pending: ResolvedScreen[] | null
  ruleState: RuleStateSnapshot
}

export type SchedulerEvents = {
  pass: { pass: number; screens: readonly ResolvedScreen[] }
  idle: Idle
  error: ResolutionError
  reload: { pass: number; preservePassCount: boolean; preserveRuleState: boolean }
}

export type Scheduler = {
  advance(at?: Instant): Tick
  peek(n: number, at?: Instant): ResolvedScreen[]
  reload(document: unknown, options?: ReloadOptions): void
  getPassCount(): number
  getDocument(): CompiledDocument
  checkpoint(): SchedulerCheckpoint
  restore(checkpoint: SchedulerCheckpoint): void
  on<K extends keyof SchedulerEvents>(event: K, handler: Handler<SchedulerEvents[K]>): () => void
}

export const DEFAULT_PEEK_PASS_LIMIT = 1000

type Cursor = {
  pass: number
  pending: ResolvedScreen[] | null
  ruleState: RuleStateStore
}

type StepHooks = {
  onPass?(pass: number, screens: readonly ResolvedScreen[]): void
  onIdle?(idle: Idle): void
  onError?(error: ResolutionError): void
}

// ============================================================================
// Factory
// ============================================================================

export function createScheduler(document: unknown, options: SchedulerOptions = {}): Scheduler {
  const logger = options.logger ?? silentLogger
  const timezone = options.timezone ?? 'UTC'
  const maxDepth = options.maxDepth ?? DEFAULT_MAX_DEPTH
  const peekPassLimit = options.peekPassLimit ?? DEFAULT_PEEK_PASS_LIMIT
  const clock = options.clock ?? (() => new Date())
  const isAvailable = options.isAvailable ?? (() => true)

  if (!isValidTimezone(timezone)) throw new ValidationError(`Invalid timezone: '${timezone}'`)
  if (!Number.isInteger(maxDepth) || maxDepth < 1) throw new ValidationError('maxDepth must be a positive integer')
  if (!Number.isInteger(peekPassLimit) || peekPassLimit < 1) throw new ValidationError('peekPassLimit must be a positive integer')

  const events = createEventHub<SchedulerEvents>(logger)

  function compile(input: unknown): CompiledDocument {
    if (isCompiledDocument(input)) return input
    return loadDocument(input, { ...options.load, logger }).compiled
  }

  let current = compile(document)
  const cursor: Cursor = { pass: 0, pending: null, ruleState: createRuleStateStore() }

  function toLocal(at: Instant | undefined): LocalDateTime {
    if (at === undefined) return instantToLocal(clock(), timezone)
    if (typeof at === 'string') return at
    return instantToLocal(at, timezone)
  }

  function resolveNext(state: Cursor, now: LocalDateTime, hooks: StepHooks): ResolvedScreen[] | Idle {
    const scratch = state.ruleState.clone()
    let screens: ResolvedScreen[]
    try {
      screens = resolvePass(current, { pass: state.pass, now, ruleState: scratch, maxDepth, isAvailable })
    } catch (err) {
      if (!(err instanceof ResolutionError)) throw err
      // Partial rule-state changes die with the scratch copy
      const idle: Idle = { kind: 'idle', pass: state.pass, error: err }
      state.pass += 1
      hooks.onError?.(err)
      hooks.onIdle?.(idle)
      return idle
    }
    state.ruleState = scratch
    hooks.onPass?.(state.pass, screens)
    return screens
  }

  /**
   * One hand-out on the given cursor. Resolves at most one new pass and
   * returns Idle when that pass has nothing available to show.
   */
  function step(state: Cursor, now: LocalDateTime, hooks: StepHooks): Tick {
    for (;;) {
      let pending = state.pending
      let fresh = false
      if (pending === null) {
        const resolved = resolveNext(state, now, hooks)
        if (!Array.isArray(resolved)) return resolved
        pending = resolved
        state.pending = resolved
        fresh = true
      }

      let next = pending.shift()
      while (next && !isAvailable(next.screenId)) next = pending.shift()
      if (next) return next

      // Pass exhausted
      const finished = state.pass
      state.pending = null
      state.pass += 1
      if (fresh) {
        const idle: Idle = { kind: 'idle', pass: finished }
        hooks.onIdle?.(idle)
        return idle
      }
    }
  }

  const liveHooks: StepHooks = {
    onPass(pass, screens) {
      logger.debug(`Pass ${pass} resolved to ${screens.length} screen(s)`)
      events.emit('pass', { pass, screens })
    },
    onIdle(idle) {
      events.emit('idle', idle)
    },
    onError(error) {
      logger.error(`Pass resolution failed: ${error.message}`)
      events.emit('error', error)
    },
  }

  function advance(at?: Instant): Tick {
    return step(cursor, toLocal(at), liveHooks)
  }

  function peek(n: number, at?: Instant): ResolvedScreen[] {
    if (!isNonNegativeInteger(n)) throw new ValidationError(`peek count must be a non-negative integer, got ${n}`)
    const now = toLocal(at)
    const preview: Cursor = {
      pass: cursor.pass,
      // Entries are copied so callers of peek() cannot reach what advance() hands out
      pending: cursor.pending ? cursor.pending.map((screen) => ({ ...screen })) : null,
      ruleState: cursor.ruleState.clone(),
    }
    const stopAt = cursor.pass + peekPassLimit
    const out: ResolvedScreen[] = []
    while (out.length < n && preview.pass < stopAt) {
      const tick = step(preview, now, {})
      if (tick.kind === 'screen') out.push(tick)
    }
    return out
  }

  function reload(input: unknown, reloadOptions: ReloadOptions = {}): void {
    // Compile before touching anything so a bad document changes nothing
    const next = compile(input)
    const preservePassCount = reloadOptions.preservePassCount ?? false
    const preserveRuleState = reloadOptions.preserveRuleState ?? false

    const inProgress = cursor.pending !== null
    current = next
    cursor.pending = null
    if (!preservePassCount) cursor.pass = 0
    else if (inProgress) cursor.pass += 1
    if (preserveRuleState) cursor.ruleState.retain(next.rules)
    else cursor.ruleState.clear()

    logger.info(`Document reloaded; next pass ${cursor.pass}`)
    events.emit('reload', { pass: cursor.pass, preservePassCount, preserveRuleState })
  }

  function checkpoint(): SchedulerCheckpoint {
    return {
      pass: cursor.pass,
      pending: cursor.pending ? structuredClone(cursor.pending) : null,
      ruleState: cursor.ruleState.snapshot(),
    }
  }

  function restore(snapshot: SchedulerCheckpoint): void {
    if (!isNonNegativeInteger(snapshot.pass)) throw new ValidationError('checkpoint pass must be a non-negative integer')
    if (!isRecord(snapshot.ruleState)) throw new ValidationError('checkpoint ruleState must be an object')
    for (const [path, entry] of Object.entries(snapshot.ruleState)) {
      if (!isRecord(entry) || !isNonNegativeInteger(entry.index) || typeof entry.signature !== 'string') {
        throw new ValidationError(`checkpoint rule state for '${path}' is malformed`)
      }
    }

    const ruleState = createRuleStateStore(snapshot.ruleState)
    ruleState.retain(current.rules)
    cursor.pass = snapshot.pass
    cursor.pending = snapshot.pending ? structuredClone(snapshot.pending) : null
    cursor.ruleState = ruleState
  }

  return {
    advance,
    peek,
    reload,
    getPassCount: () => cursor.pass,
    getDocument: () => current,
    checkpoint,
    restore,
    on: events.on,
  }
}
