/**
 * CLI Types and Utilities
 *
 * Shared types, the argument parser and output helpers for the bloomsift
 * CLI. Commands import from here rather than from the entry point.
 */

import { loadConfig, validateConfig, type BloomsiftConfig } from '../config'
import { createConsoleLogger, setLogger } from '../utils/logger'

// =============================================================================
// Types
// =============================================================================

/**
 * Parsed CLI arguments
 */
export interface ParsedArgs {
  command: string
  args: string[]
  options: {
    help: boolean
    version: boolean
    verbose: boolean
    /** `search`: explain every index locally instead of asking a server */
    explain: boolean
    config?: string | undefined
    // index
    pattern?: string | undefined
    out?: string | undefined
    errorRate?: number | undefined
    threshold?: number | undefined
    concurrency?: number | undefined
    // serve
    host?: string | undefined
    port?: number | undefined
    indexes?: string | undefined
    cacheSize?: number | undefined
    // search / ping
    source?: string | undefined
    files?: string | undefined
    url?: string | undefined
  }
}

// =============================================================================
// Argument Parser
// =============================================================================

/**
 * Parse command line arguments
 *
 * @throws Error for an unknown option or a missing or malformed option value
 */
export function parseArgs(argv: string[]): ParsedArgs {
  const result: ParsedArgs = {
    command: '',
    args: [],
    options: {
      help: false,
      version: false,
      verbose: false,
      explain: false,
    },
  }

  let i = 0
  const value = (flag: string): string => {
    const next = argv[++i]
    if (next === undefined || next.startsWith('--')) {
      throw new Error(`Missing value for ${flag}`)
    }
    return next
  }
  const numberValue = (flag: string): number => {
    const raw = value(flag)
    const parsed = Number(raw)
    if (raw.trim() === '' || Number.isNaN(parsed)) {
      throw new Error(`Invalid number for ${flag}: ${raw}`)
    }
    return parsed
  }

  while (i < argv.length) {
    const arg = argv[i]

    if (!arg) {
      i++
      continue
    }

    if (arg.startsWith('-') && arg !== '-') {
      switch (arg) {
        case '-h':
        case '--help':
          result.options.help = true
          break
        case '-v':
        case '--version':
          result.options.version = true
          break
        case '--verbose':
          result.options.verbose = true
          break
        case '--explain':
          result.options.explain = true
          break
        case '-c':
        case '--config':
          result.options.config = value(arg)
          break
        case '--pattern':
          result.options.pattern = value(arg)
          break
        case '-o':
        case '--out':
          result.options.out = value(arg)
          break
        case '--error-rate':
          result.options.errorRate = numberValue(arg)
          break
        case '--threshold':
          result.options.threshold = numberValue(arg)
          break
        case '--concurrency':
          result.options.concurrency = numberValue(arg)
          break
        case '--host':
          result.options.host = value(arg)
          break
        case '-p':
        case '--port':
          result.options.port = numberValue(arg)
          break
        case '--indexes':
          result.options.indexes = value(arg)
          break
        case '--cache-size':
          result.options.cacheSize = numberValue(arg)
          break
        case '-s':
        case '--source':
          result.options.source = value(arg)
          break
        case '-f':
        case '--files':
          result.options.files = value(arg)
          break
        case '-u':
        case '--url':
          result.options.url = value(arg)
          break
        default:
          throw new Error(`Unknown option: ${arg}`)
      }
    } else if (!result.command) {
      // First non-option is the command
      result.command = arg
    } else {
      result.args.push(arg)
    }
    i++
  }

  return result
}

// =============================================================================
// Configuration
// =============================================================================

/**
 * Load configuration and apply the command-line overrides on top
 */
export async function resolveConfig(parsed: ParsedArgs): Promise<BloomsiftConfig> {
  const config = await loadConfig({ file: parsed.options.config })
  const { options } = parsed

  return validateConfig({
    ...config,
    errorRate: options.errorRate ?? config.errorRate,
    rangeFilterThreshold: options.threshold ?? config.rangeFilterThreshold,
    indexDir: options.out ?? options.indexes ?? config.indexDir,
    host: options.host ?? config.host,
    port: options.port ?? config.port,
    cacheSize: options.cacheSize ?? config.cacheSize,
    concurrency: options.concurrency ?? config.concurrency,
  })
}

/**
 * Install the console logger when `--verbose` (or `force`) asks for it
 */
export function configureLogging(parsed: ParsedArgs, force = false): void {
  if (parsed.options.verbose) {
    setLogger(createConsoleLogger('debug'))
  } else if (force) {
    setLogger(createConsoleLogger('info'))
  }
}

/**
 * Base URL of the server named by `--url`, or the configured host and port
 */
export function serverUrl(parsed: ParsedArgs, config: BloomsiftConfig): string {
  return parsed.options.url ?? `http://${config.host}:${config.port}`
}

// =============================================================================
// Output Utilities
// =============================================================================

/**
 * Print to stdout
 */
export function print(message: string): void {
  process.stdout.write(message + '\n')
}

/**
 * Print to stderr
 */
export function printError(message: string): void {
  process.stderr.write('Error: ' + message + '\n')
}

/**
 * Print a warning to stderr
 */
export function printWarning(message: string): void {
  process.stderr.write('Warning: ' + message + '\n')
}
