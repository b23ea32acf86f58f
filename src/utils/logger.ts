/**
 * Logger utility for bloomsift
 *
 * Library code logs through the module-level `logger`, which is a noop
 * until an application (the CLI, the search server) installs another one
 * with `setLogger`.
 *
 * @module utils/logger
 */

/**
 * Logger interface for consistent logging across the codebase
 */
export interface Logger {
  debug(message: string, ...args: unknown[]): void
  info(message: string, ...args: unknown[]): void
  warn(message: string, ...args: unknown[]): void
  error(message: string, error?: unknown, ...args: unknown[]): void
}

export type LogLevel = 'debug' | 'info' | 'warn' | 'error'

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
}

/**
 * Create a console logger that drops messages below `minLevel`
 */
export function createConsoleLogger(minLevel: LogLevel = 'debug'): Logger {
  const enabled = (level: LogLevel): boolean => LEVEL_ORDER[level] >= LEVEL_ORDER[minLevel]

  return {
    debug(message: string, ...args: unknown[]): void {
      if (enabled('debug')) console.debug(`[DEBUG] ${message}`, ...args)
    },
    info(message: string, ...args: unknown[]): void {
      if (enabled('info')) console.info(`[INFO] ${message}`, ...args)
    },
    warn(message: string, ...args: unknown[]): void {
      if (enabled('warn')) console.warn(`[WARN] ${message}`, ...args)
    },
    error(message: string, error?: unknown, ...args: unknown[]): void {
      if (!enabled('error')) return
      if (error !== undefined) {
        console.error(`[ERROR] ${message}`, error, ...args)
      } else {
        console.error(`[ERROR] ${message}`, ...args)
      }
    },
  }
}

/**
 * Console logger with every level enabled
 */
export const consoleLogger: Logger = createConsoleLogger('debug')

/**
 * Noop logger implementation
 * Silently discards all log messages (default)
 */
export const noopLogger: Logger = {
  debug(): void {},
  info(): void {},
  warn(): void {},
  error(): void {},
}

/**
 * Global logger instance
 */
export let logger: Logger = noopLogger

/**
 * Set the global logger instance
 *
 * @example
 * ```typescript
 * import { setLogger, createConsoleLogger } from './utils/logger'
 *
 * setLogger(createConsoleLogger('info'))
 * ```
 */
export function setLogger(l: Logger): void {
  logger = l
}
