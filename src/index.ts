/**
 * playlist-engine
 *
 * Public API exports
 */

// Error system
export {
  PlaylistEngineError, PlaylistEngineErrorCode,
  DuplicateKeyError, NotFoundError, ValidationError,
  ConfigError, UnknownPlaylistError, CyclicReferenceError, DuplicatePlaylistError, ConfigReadError,
  MigrationError, ResolutionError, DepthExceededError, CorruptRuleStateError,
  ParseError, VersionNotFoundError,
} from './errors'
export type { PlaylistEngineErrorCode as PlaylistEngineErrorCodeType } from './errors'

// Result type
export type { Result } from './result'
export { Ok, Err } from './result'

// Logging
export type { Logger, LogLevel } from './logger'
export { createConsoleLogger, silentLogger, isLogLevel } from './logger'

// Time & Date
export type { LocalDate, LocalTime, LocalDateTime, Weekday } from './time-date'
export {
  parseDate, parseTime, parseDateTime,
  makeDate, makeTime, makeDateTime,
  dateOf, timeOf, dayOfWeek, parseWeekday,
  isValidTimezone, instantToLocal,
} from './time-date'

// Domain model
export type {
  JsonPrimitive, JsonValue, JsonObject,
  PlaylistJson, PlaylistDocument, LegacyScreenMap,
  TimeWindow, Condition, VariantSelection,
  ScreenStep, PlaylistRef, StepBlock, RuleDescriptor, RuleStep, Step,
  Playlist, CompiledDocument,
  ResolvedScreen, Idle, Tick,
} from './domain-types'

// Legacy migration
export type { MigrateOptions, MigrationResult } from './legacy-migration'
export {
  migrate, migrateConfig, migrateLegacySequence, legacyItemToStep, legacyCycleLength, needsMigration,
  LEGACY_VERSION, TARGET_VERSION, MAIN_PLAYLIST_ID,
} from './legacy-migration'

// Conditions
export {
  parseCondition, evaluateCondition, windowContains,
  timeWindow, onDays, during,
} from './condition-evaluation'

// Loading & compilation
export type { CompileOptions } from './document-compiler'
export { compileDocument, collectPlaylistRefs, isCompiledDocument, assertNesting, MAX_NESTING } from './document-compiler'
export type { LoadOptions, LoadFileOptions, LoadResult } from './config-loader'
export { loadDocument, loadDocumentFile, parseDocumentText, DEFAULT_LOAD_TIMEOUT_MS } from './config-loader'

// Rules & resolution
export type { RuleState, ExpansionContext, Expansion } from './rule-expansion'
export { expandRule, firesOnPass, randomVariantIndex } from './rule-expansion'
export type { ResolveContext } from './playlist-resolver'
export { resolve, resolvePass, DEFAULT_MAX_DEPTH } from './playlist-resolver'
export type { RuleStateStore, RuleStateSnapshot, RuleStateEntry } from './internal/rule-state-store'
export { createRuleStateStore } from './internal/rule-state-store'

// Scheduler
export type {
  Scheduler, SchedulerOptions, SchedulerCheckpoint, SchedulerEvents,
  ReloadOptions, Instant,
} from './scheduler'
export { createScheduler, DEFAULT_PEEK_PASS_LIMIT } from './scheduler'

// Adapter (persistence interface + in-memory mock)
export type { LedgerAdapter, ConfigVersion, NewConfigVersion, VersionSummary, VersionStamp } from './adapter'
export { createMockAdapter } from './adapter'

// SQLite adapter
export type { SqliteAdapter } from './sqlite-adapter'
export { createSqliteAdapter } from './sqlite-adapter'

// Version ledger
export type { VersionLedger, VersionLedgerOptions, RetentionPolicy, SaveOptions } from './version-ledger'
export { createVersionLedger, DEFAULT_RETENTION } from './version-ledger'
export { summariseDiff } from './config-diff'

// Configuration
export type { EngineConfig, ResolvedEngineConfig } from './config'
export { resolveConfig, configFromEnv, DEFAULT_CONFIG } from './config'

// Engine facade
export type { PlaylistEngine, PlaylistEngineEvents, LoadDocumentOptions } from './public-api'
export { createPlaylistEngine, DEFAULT_DOCUMENT } from './public-api'

// CLI
export type { CliIo } from './cli'
export { runCli } from './cli'
