/**
 * Consolidated error system for playlist-engine.
 *
 * All error classes extend PlaylistEngineError, which carries a typed error code.
 * Errors raised while walking a document also carry the dotted path of the
 * offending node (e.g. `playlists.main.steps[2].every.frequency`).
 */

// ============================================================================
// Error Codes
// ============================================================================

export const PlaylistEngineErrorCode = {
  // Adapter layer
  DUPLICATE_KEY: 'DUPLICATE_KEY',
  NOT_FOUND: 'NOT_FOUND',

  // Configuration
  VALIDATION: 'VALIDATION',
  INVALID_CONFIG: 'INVALID_CONFIG',
  UNKNOWN_PLAYLIST: 'UNKNOWN_PLAYLIST',
  CYCLE_DETECTED: 'CYCLE_DETECTED',
  DUPLICATE_PLAYLIST: 'DUPLICATE_PLAYLIST',
  READ_FAILED: 'READ_FAILED',

  // Migration
  MIGRATION: 'MIGRATION',

  // Resolution
  RESOLUTION: 'RESOLUTION',
  DEPTH_EXCEEDED: 'DEPTH_EXCEEDED',
  CORRUPT_RULE_STATE: 'CORRUPT_RULE_STATE',

  // Time & date
  PARSE_ERROR: 'PARSE_ERROR',

  // Version ledger
  VERSION_NOT_FOUND: 'VERSION_NOT_FOUND',
} as const

export type PlaylistEngineErrorCode = (typeof PlaylistEngineErrorCode)[keyof typeof PlaylistEngineErrorCode]

// ============================================================================
// Base Class
// ============================================================================

export class PlaylistEngineError extends Error {
  readonly code: PlaylistEngineErrorCode

  constructor(code: PlaylistEngineErrorCode, message: string) {
    super(message)
    this.name = 'PlaylistEngineError'
    this.code = code
  }
}

function withPath(path: string, message: string): string {
  return path ? `${path}: ${message}` : message
}

// ============================================================================
// Adapter Errors
// ============================================================================

export class DuplicateKeyError extends PlaylistEngineError {
  constructor(message: string) {
    super(PlaylistEngineErrorCode.DUPLICATE_KEY, message)
    this.name = 'DuplicateKeyError'
  }
}

export class NotFoundError extends PlaylistEngineError {
  constructor(message: string) {
    super(PlaylistEngineErrorCode.NOT_FOUND, message)
    this.name = 'NotFoundError'
  }
}

// ============================================================================
// Configuration Errors
// ============================================================================

/** Invalid engine settings such as timezone or limits; documents raise ConfigError */
export class ValidationError extends PlaylistEngineError {
  constructor(message: string) {
    super(PlaylistEngineErrorCode.VALIDATION, message)
    this.name = 'ValidationError'
  }
}

/** A document failed to load. Never partially applied. */
export class ConfigError extends PlaylistEngineError {
  readonly path: string
  readonly detail: string

  constructor(path: string, detail: string, code: PlaylistEngineErrorCode = PlaylistEngineErrorCode.INVALID_CONFIG) {
    super(code, withPath(path, detail))
    this.name = 'ConfigError'
    this.path = path
    this.detail = detail
  }
}

export class UnknownPlaylistError extends ConfigError {
  readonly playlistId: string

  constructor(path: string, playlistId: string) {
    super(path, `Unknown playlist '${playlistId}'`, PlaylistEngineErrorCode.UNKNOWN_PLAYLIST)
    this.name = 'UnknownPlaylistError'
    this.playlistId = playlistId
  }
}

export class CyclicReferenceError extends ConfigError {
  readonly chain: readonly string[]

  constructor(path: string, chain: readonly string[]) {
    super(path, `Circular playlist reference detected: ${chain.join(' -> ')}`, PlaylistEngineErrorCode.CYCLE_DETECTED)
    this.name = 'CyclicReferenceError'
    this.chain = chain
  }
}

export class DuplicatePlaylistError extends ConfigError {
  readonly playlistId: string

  constructor(path: string, playlistId: string) {
    super(path, `Duplicate playlist id '${playlistId}'`, PlaylistEngineErrorCode.DUPLICATE_PLAYLIST)
    this.name = 'DuplicatePlaylistError'
    this.playlistId = playlistId
  }
}

export class ConfigReadError extends ConfigError {
  constructor(source: string, detail: string) {
    super('', `Could not read '${source}': ${detail}`, PlaylistEngineErrorCode.READ_FAILED)
    this.name = 'ConfigReadError'
  }
}

// ============================================================================
// Migration Errors
// ============================================================================

export class MigrationError extends PlaylistEngineError {
  readonly path: string

  constructor(path: string, message: string) {
    super(PlaylistEngineErrorCode.MIGRATION, withPath(path, message))
    this.name = 'MigrationError'
    this.path = path
  }
}

// ============================================================================
// Resolution Errors
// ============================================================================

export class ResolutionError extends PlaylistEngineError {
  readonly path: string

  constructor(path: string, message: string, code: PlaylistEngineErrorCode = PlaylistEngineErrorCode.RESOLUTION) {
    super(code, withPath(path, message))
    this.name = 'ResolutionError'
    this.path = path
  }
}

export class DepthExceededError extends ResolutionError {
  readonly maxDepth: number

  constructor(path: string, maxDepth: number) {
    super(path, `Maximum nesting depth ${maxDepth} exceeded`, PlaylistEngineErrorCode.DEPTH_EXCEEDED)
    this.name = 'DepthExceededError'
    this.maxDepth = maxDepth
  }
}

export class CorruptRuleStateError extends ResolutionError {
  constructor(path: string, message: string) {
    super(path, `Rule state corrupted: ${message}`, PlaylistEngineErrorCode.CORRUPT_RULE_STATE)
    this.name = 'CorruptRuleStateError'
  }
}

// ============================================================================
// Time & Date Errors
// ============================================================================

export class ParseError extends PlaylistEngineError {
  constructor(message: string) {
    super(PlaylistEngineErrorCode.PARSE_ERROR, message)
    this.name = 'ParseError'
  }
}

// ============================================================================
// Version Ledger Errors
// ============================================================================

export class VersionNotFoundError extends PlaylistEngineError {
  readonly versionId: number

  constructor(versionId: number) {
    super(PlaylistEngineErrorCode.VERSION_NOT_FOUND, `Unknown version id ${versionId}`)
    this.name = 'VersionNotFoundError'
    this.versionId = versionId
  }
}
