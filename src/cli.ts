/**
 * Command-line tool: migrate legacy configs, validate documents and preview
 * upcoming screens.
 *
 *   playlist-engine migrate --input <path> [--output <path>]
 *   playlist-engine validate --input <path> [--screens a,b,c]
 *   playlist-engine preview --input <path> [--count N] [--at <ISO>] [--timezone <tz>]
 */

import { readFile, writeFile } from 'node:fs/promises'
import { resolve as resolvePath } from 'node:path'
import { parseArgs } from 'node:util'
import { PlaylistEngineError } from './errors'
import { assertNesting, compileDocument } from './document-compiler'
import { loadDocumentFile, parseDocumentText } from './config-loader'
import { migrateConfig } from './legacy-migration'
import { createScheduler, type Instant } from './scheduler'
import { configFromEnv } from './config'
import { type Logger, createConsoleLogger } from './logger'
import { parseDateTime } from './time-date'

export type CliIo = {
  stdout(line: string): void
  stderr(line: string): void
  logger?: Logger
}

const USAGE = `Usage:
  playlist-engine migrate --input <path> [--output <path>]
  playlist-engine validate --input <path> [--screens <id,id,...>]
  playlist-engine preview --input <path> [--count <n>] [--at <ISO datetime>] [--timezone <tz>]`

class UsageError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'UsageError'
  }
}

const defaultIo: CliIo = {
  stdout: (line) => process.stdout.write(`${line}\n`),
  stderr: (line) => process.stderr.write(`${line}\n`),
}

function requireInput(input: string | undefined): string {
  if (!input) throw new UsageError('--input is required')
  return input
}

function parseCount(raw: string | undefined): number {
  if (raw === undefined) return 10
  if (!/^\d+$/.test(raw)) throw new UsageError(`--count must be a non-negative integer, got '${raw}'`)
  return parseInt(raw, 10)
}

/** Offset-less values are wall-clock time in --timezone; anything else must parse as an instant */
function parseAt(raw: string | undefined): Instant | undefined {
  if (raw === undefined) return undefined
  const local = parseDateTime(raw)
  if (local.ok) return local.value
  const instant = new Date(raw)
  if (Number.isNaN(instant.getTime())) throw new UsageError(`--at must be an ISO datetime, got '${raw}'`)
  return instant
}

function parseScreens(raw: string | undefined): string[] | undefined {
  if (raw === undefined) return undefined
  return raw.split(',').map((s) => s.trim()).filter((s) => s.length > 0)
}

// ============================================================================
// Commands
// ============================================================================

async function migrateCommand(input: string, output: string | undefined, io: CliIo): Promise<number> {
  if (output !== undefined && resolvePath(output) === resolvePath(input)) {
    throw new UsageError('Refusing to overwrite the input file; choose a different --output')
  }

  const text = await readFile(input, 'utf8')
  const parsed = parseDocumentText(text)
  if (!parsed.ok) throw parsed.error

  assertNesting(parsed.value)
  const result = migrateConfig(parsed.value, { source: input })
  // Fails with the offending path before anything is written
  const { source } = compileDocument(result.config)
  const json = `${JSON.stringify(source, null, 2)}\n`

  if (output === undefined) {
    io.stdout(json.trimEnd())
  } else {
    await writeFile(output, json, 'utf8')
    io.stderr(result.migrated ? `Migrated configuration -> ${output}` : `Configuration already uses schema v2 -> ${output}`)
  }
  return 0
}

async function validateCommand(input: string, screens: string[] | undefined, io: CliIo, logger: Logger): Promise<number> {
  const result = await loadDocumentFile(input, { logger, ...(screens ? { knownScreens: screens } : {}) })
  const playlists = result.compiled.playlists.size
  io.stdout(`OK: ${playlists} playlist(s), ${result.orphans.length} orphaned${result.migrated ? ' (migrated from legacy format)' : ''}`)
  for (const id of result.orphans) io.stdout(`  orphan: ${id}`)
  return 0
}

async function previewCommand(
  input: string,
  opts: { count: number; at: Instant | undefined; timezone: string | undefined },
  io: CliIo,
  logger: Logger,
): Promise<number> {
  const result = await loadDocumentFile(input, { logger })
  const scheduler = createScheduler(result.compiled, {
    ...(opts.timezone ? { timezone: opts.timezone } : {}),
    logger,
  })
  const screens = scheduler.peek(opts.count, opts.at)
  for (const screen of screens) io.stdout(`${screen.pass}\t${screen.screenId}`)
  if (screens.length < opts.count) io.stderr(`Only ${screens.length} of ${opts.count} screen(s) available`)
  return 0
}

// ============================================================================
// Entry
// ============================================================================

export async function runCli(argv: readonly string[], io: CliIo = defaultIo): Promise<number> {
  try {
    const { values, positionals } = parseArgs({
      args: [...argv],
      allowPositionals: true,
      options: {
        input: { type: 'string', short: 'i' },
        output: { type: 'string', short: 'o' },
        count: { type: 'string', short: 'n' },
        at: { type: 'string' },
        timezone: { type: 'string' },
        screens: { type: 'string' },
        help: { type: 'boolean', short: 'h' },
      },
    })

    const [command] = positionals
    if (values.help || command === undefined) {
      io.stdout(USAGE)
      return command === undefined && !values.help ? 2 : 0
    }
    if (positionals.length > 1) throw new UsageError(`Unexpected argument '${positionals[1] ?? ''}'`)

    const logger = io.logger ?? createConsoleLogger(configFromEnv().logLevel ?? 'warn')

    switch (command) {
      case 'migrate':
        return await migrateCommand(requireInput(values.input), values.output, io)
      case 'validate':
        return await validateCommand(requireInput(values.input), parseScreens(values.screens), io, logger)
      case 'preview':
        return await previewCommand(
          requireInput(values.input),
          { count: parseCount(values.count), at: parseAt(values.at), timezone: values.timezone },
          io,
          logger,
        )
      default:
        throw new UsageError(`Unknown command '${command}'`)
    }
  } catch (err) {
    if (err instanceof UsageError) {
      io.stderr(`error: ${err.message}`)
      io.stderr(USAGE)
      return 2
    }
    if (err instanceof PlaylistEngineError) {
      io.stderr(`error: ${err.message}`)
      return 1
    }
    if (err instanceof TypeError && 'code' in err && typeof err.code === 'string' && err.code.startsWith('ERR_PARSE_ARGS')) {
      io.stderr(`error: ${err.message}`)
      io.stderr(USAGE)
      return 2
    }
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
      io.stderr(`error: ${err.message}`)
      return 1
    }
    throw err
  }
}
