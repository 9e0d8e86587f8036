/**
 * Engine Configuration
 *
 * Defaults, validation and environment overrides for createPlaylistEngine.
 */

import type { LedgerAdapter } from './adapter'
import { ValidationError } from './errors'
import { type LogLevel, type Logger, createConsoleLogger, isLogLevel } from './logger'
import type { RetentionPolicy } from './version-ledger'
import { isValidTimezone } from './time-date'

export type EngineConfig = {
  /** Version history store; in-memory when omitted */
  adapter?: LedgerAdapter
  timezone?: string
  maxDepth?: number
  peekPassLimit?: number
  retention?: RetentionPolicy
  /** Screen ids the renderer knows; documents naming others are rejected */
  knownScreens?: Iterable<string>
  loadTimeoutMs?: number
  logLevel?: LogLevel
  /** Overrides logLevel */
  logger?: Logger
  clock?: () => Date
  isAvailable?: (screenId: string) => boolean
}

export type ResolvedEngineConfig = {
  adapter: LedgerAdapter | undefined
  timezone: string
  maxDepth: number
  peekPassLimit: number
  retention: RetentionPolicy
  knownScreens: readonly string[] | undefined
  loadTimeoutMs: number
  logger: Logger
  clock: () => Date
  isAvailable: (screenId: string) => boolean
}

export const DEFAULT_CONFIG = {
  timezone: 'UTC',
  maxDepth: 64,
  peekPassLimit: 1000,
  maxVersions: 25,
  loadTimeoutMs: 5000,
  logLevel: 'info',
} as const

function requirePositiveInteger(value: number, name: string): number {
  if (!Number.isInteger(value) || value < 1) throw new ValidationError(`${name} must be a positive integer, got ${value}`)
  return value
}

export function resolveConfig(config: EngineConfig = {}): ResolvedEngineConfig {
  const timezone = config.timezone ?? DEFAULT_CONFIG.timezone
  if (!isValidTimezone(timezone)) throw new ValidationError(`Invalid timezone: ${timezone}`)

  const retention: RetentionPolicy = {
    maxVersions: requirePositiveInteger(config.retention?.maxVersions ?? DEFAULT_CONFIG.maxVersions, 'retention.maxVersions'),
  }
  const maxAgeDays = config.retention?.maxAgeDays
  if (maxAgeDays !== undefined) {
    if (!(maxAgeDays > 0)) throw new ValidationError(`retention.maxAgeDays must be positive, got ${maxAgeDays}`)
    retention.maxAgeDays = maxAgeDays
  }

  return {
    adapter: config.adapter,
    timezone,
    maxDepth: requirePositiveInteger(config.maxDepth ?? DEFAULT_CONFIG.maxDepth, 'maxDepth'),
    peekPassLimit: requirePositiveInteger(config.peekPassLimit ?? DEFAULT_CONFIG.peekPassLimit, 'peekPassLimit'),
    retention,
    knownScreens: config.knownScreens ? [...config.knownScreens] : undefined,
    loadTimeoutMs: requirePositiveInteger(config.loadTimeoutMs ?? DEFAULT_CONFIG.loadTimeoutMs, 'loadTimeoutMs'),
    logger: config.logger ?? createConsoleLogger(config.logLevel ?? DEFAULT_CONFIG.logLevel),
    clock: config.clock ?? (() => new Date()),
    isAvailable: config.isAvailable ?? (() => true),
  }
}

// ============================================================================
// Environment
// ============================================================================

function envInteger(env: NodeJS.ProcessEnv, name: string): number | undefined {
  const raw = env[name]
  if (raw === undefined || raw.trim() === '') return undefined
  if (!/^\d+$/.test(raw.trim())) throw new ValidationError(`${name} must be an integer, got '${raw}'`)
  return parseInt(raw, 10)
}

/**
 * Read PLAYLIST_TIMEZONE, PLAYLIST_MAX_DEPTH, PLAYLIST_RETENTION,
 * PLAYLIST_RETENTION_DAYS and LOG_LEVEL. Unset variables are left out so
 * the result can be spread over explicit settings.
 */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env): EngineConfig {
  const config: EngineConfig = {}

  const timezone = env.PLAYLIST_TIMEZONE?.trim()
  if (timezone) config.timezone = timezone

  const maxDepth = envInteger(env, 'PLAYLIST_MAX_DEPTH')
  if (maxDepth !== undefined) config.maxDepth = maxDepth

  const maxVersions = envInteger(env, 'PLAYLIST_RETENTION')
  const maxAgeDays = envInteger(env, 'PLAYLIST_RETENTION_DAYS')
  if (maxVersions !== undefined || maxAgeDays !== undefined) {
    config.retention = {
      ...(maxVersions !== undefined ? { maxVersions } : {}),
      ...(maxAgeDays !== undefined ? { maxAgeDays } : {}),
    }
  }

  const logLevel = env.LOG_LEVEL?.trim().toLowerCase()
  if (logLevel) {
    if (!isLogLevel(logLevel)) throw new ValidationError(`LOG_LEVEL must be one of debug, info, warn, error, silent; got '${logLevel}'`)
    config.logLevel = logLevel
  }

  return config
}
