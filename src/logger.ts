/**
 * Logger
 *
 * Minimal injectable logging surface. Components take a Logger in their
 * options and fall back to a console-backed one.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent'

export type Logger = {
  debug(message: string, ...args: unknown[]): void
  info(message: string, ...args: unknown[]): void
  warn(message: string, ...args: unknown[]): void
  error(message: string, ...args: unknown[]): void
}

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
}

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVEL_RANK, value)
}

export function createConsoleLogger(level: LogLevel = 'info', prefix = '[playlist-engine]'): Logger {
  const threshold = LEVEL_RANK[level]
  const enabled = (l: LogLevel) => LEVEL_RANK[l] >= threshold

  return {
    debug(message, ...args) {
      if (enabled('debug')) console.debug(`${prefix} ${message}`, ...args)
    },
    info(message, ...args) {
      if (enabled('info')) console.info(`${prefix} ${message}`, ...args)
    },
    warn(message, ...args) {
      if (enabled('warn')) console.warn(`${prefix} ${message}`, ...args)
    },
    error(message, ...args) {
      if (enabled('error')) console.error(`${prefix} ${message}`, ...args)
    },
  }
}

export const silentLogger: Logger = {
  debug() {},
  info() {},
  warn() {},
  error() {},
}
