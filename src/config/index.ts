/**
 * Configuration
 *
 * Settings are layered, later layers winning:
 *
 * 1. defaults
 * 2. `bloomsift.config.json` in the working directory (or an explicit file)
 * 3. `BLOOMSIFT_*` environment variables
 *
 * and validated once at the end, so a bad value fails with a
 * ConfigurationError before any indexing or serving starts.
 *
 * @example
 * ```json
 * {
 *   "errorRate": 0.01,
 *   "rangeFilterThreshold": 500,
 *   "indexDir": "s3://indexes/daily",
 *   "s3": { "region": "eu-west-1" }
 * }
 * ```
 */

import { readFile } from 'node:fs/promises'
import { isAbsolute, resolve } from 'node:path'
import {
  DEFAULT_CACHE_SIZE,
  DEFAULT_CONCURRENCY,
  DEFAULT_ERROR_RATE,
  DEFAULT_HOST,
  DEFAULT_PORT,
  DEFAULT_RANGE_FILTER_THRESHOLD,
} from '../constants'
import { ConfigurationError, toError } from '../errors'
import { resolveIndexOptions } from '../indexes/builder'
import { hasErrorCode } from '../storage/errors'
import { isRecord, safeJsonParse } from '../utils/json-validation'

// =============================================================================
// Types
// =============================================================================

export interface S3Config {
  region?: string | undefined
  /** Custom endpoint for S3-compatible stores */
  endpoint?: string | undefined
  forcePathStyle?: boolean | undefined
}

export interface BloomsiftConfig {
  /** Target false-positive rate of membership indexes, in (0, 1) */
  errorRate: number
  /** Distinct-value count at which a column switches to a range index */
  rangeFilterThreshold: number
  /** Location of the index files (path, file://, s3:// or memory://) */
  indexDir: string
  host: string
  port: number
  /** Loaded indexes kept by the server */
  cacheSize: number
  /** Files indexed (or indexes loaded) in parallel */
  concurrency: number
  s3?: S3Config | undefined
}

export const CONFIG_FILE_NAME = 'bloomsift.config.json'

export const DEFAULT_CONFIG: Readonly<BloomsiftConfig> = Object.freeze({
  errorRate: DEFAULT_ERROR_RATE,
  rangeFilterThreshold: DEFAULT_RANGE_FILTER_THRESHOLD,
  indexDir: './indexes',
  host: DEFAULT_HOST,
  port: DEFAULT_PORT,
  cacheSize: DEFAULT_CACHE_SIZE,
  concurrency: DEFAULT_CONCURRENCY,
})

export interface LoadConfigOptions {
  /** Explicit config file; it must exist */
  file?: string | undefined
  /** Environment to read `BLOOMSIFT_*` from (default process.env) */
  env?: Record<string, string | undefined> | undefined
  /** Directory holding the default config file (default process.cwd()) */
  cwd?: string | undefined
}

/**
 * Define configuration with type safety
 */
export function defineConfig(config: Partial<BloomsiftConfig>): Partial<BloomsiftConfig> {
  return config
}

// =============================================================================
// Loading
// =============================================================================

/**
 * Load, merge and validate configuration
 *
 * @throws ConfigurationError for an unreadable file or an invalid value
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<BloomsiftConfig> {
  const cwd = options.cwd ?? process.cwd()
  const fromFile = await readConfigFile(options.file ? resolve(cwd, options.file) : resolve(cwd, CONFIG_FILE_NAME), options.file !== undefined)
  const fromEnv = readEnv(options.env ?? process.env)

  const merged: BloomsiftConfig = {
    ...DEFAULT_CONFIG,
    ...fromFile,
    ...fromEnv,
    s3: fromFile.s3 || fromEnv.s3 ? { ...fromFile.s3, ...fromEnv.s3 } : undefined,
  }

  return validateConfig({ ...merged, indexDir: resolveLocalDir(merged.indexDir, cwd) })
}

/**
 * Check every setting, returning the config unchanged when valid
 */
export function validateConfig(config: BloomsiftConfig): BloomsiftConfig {
  resolveIndexOptions(config)

  if (config.indexDir.trim() === '') {
    throw new ConfigurationError('indexDir must not be empty', { configKey: 'indexDir' })
  }
  if (config.host.trim() === '') {
    throw new ConfigurationError('host must not be empty', { configKey: 'host' })
  }
  if (!Number.isInteger(config.port) || config.port < 0 || config.port > 65535) {
    throw new ConfigurationError(`port must be an integer between 0 and 65535, got ${config.port}`, {
      configKey: 'port',
      actualValue: config.port,
    })
  }
  requirePositiveInteger('cacheSize', config.cacheSize)
  requirePositiveInteger('concurrency', config.concurrency)

  return config
}

function requirePositiveInteger(key: string, value: number): void {
  if (!Number.isSafeInteger(value) || value < 1) {
    throw new ConfigurationError(`${key} must be a positive integer, got ${value}`, {
      configKey: key,
      actualValue: value,
    })
  }
}

/**
 * Plain relative paths are taken relative to `cwd`; URLs pass through
 */
function resolveLocalDir(dir: string, cwd: string): string {
  if (/^[a-z][a-z0-9+.-]*:\/\//i.test(dir) || isAbsolute(dir)) {
    return dir
  }
  return resolve(cwd, dir)
}

// =============================================================================
// Config file
// =============================================================================

const NUMBER_KEYS = ['errorRate', 'rangeFilterThreshold', 'port', 'cacheSize', 'concurrency'] as const
const STRING_KEYS = ['indexDir', 'host'] as const

async function readConfigFile(path: string, required: boolean): Promise<Partial<BloomsiftConfig>> {
  let text: string
  try {
    text = await readFile(path, 'utf-8')
  } catch (error: unknown) {
    if (!required && hasErrorCode(error, 'ENOENT')) {
      return {}
    }
    const cause = toError(error)
    throw new ConfigurationError(`Cannot read config file ${path}: ${cause.message}`, { configKey: 'file' }, cause)
  }

  const parsed = safeJsonParse(text)
  if (!parsed.ok) {
    throw new ConfigurationError(`Config file ${path} is not valid JSON`, { configKey: 'file' }, parsed.error)
  }
  if (!isRecord(parsed.value)) {
    throw new ConfigurationError(`Config file ${path} must hold a JSON object`, { configKey: 'file' })
  }
  return fromRecord(parsed.value, path)
}

function fromRecord(record: Record<string, unknown>, path: string): Partial<BloomsiftConfig> {
  const config: Partial<BloomsiftConfig> = {}

  for (const key of NUMBER_KEYS) {
    const value = record[key]
    if (value === undefined) continue
    if (typeof value !== 'number') {
      throw new ConfigurationError(`${key} in ${path} must be a number`, { configKey: key, actualValue: value })
    }
    config[key] = value
  }

  for (const key of STRING_KEYS) {
    const value = record[key]
    if (value === undefined) continue
    if (typeof value !== 'string') {
      throw new ConfigurationError(`${key} in ${path} must be a string`, { configKey: key, actualValue: value })
    }
    config[key] = value
  }

  const s3 = record.s3
  if (s3 !== undefined) {
    if (!isRecord(s3)) {
      throw new ConfigurationError(`s3 in ${path} must be an object`, { configKey: 's3' })
    }
    config.s3 = {
      region: optionalString(s3.region, 's3.region', path),
      endpoint: optionalString(s3.endpoint, 's3.endpoint', path),
      forcePathStyle: typeof s3.forcePathStyle === 'boolean' ? s3.forcePathStyle : undefined,
    }
  }

  return config
}

function optionalString(value: unknown, key: string, path: string): string | undefined {
  if (value === undefined || typeof value === 'string') {
    return value
  }
  throw new ConfigurationError(`${key} in ${path} must be a string`, { configKey: key, actualValue: value })
}

// =============================================================================
// Environment
// =============================================================================

const ENV_NUMBERS = {
  BLOOMSIFT_ERROR_RATE: 'errorRate',
  BLOOMSIFT_RANGE_THRESHOLD: 'rangeFilterThreshold',
  BLOOMSIFT_PORT: 'port',
  BLOOMSIFT_CACHE_SIZE: 'cacheSize',
  BLOOMSIFT_CONCURRENCY: 'concurrency',
} as const

const ENV_STRINGS = {
  BLOOMSIFT_INDEX_DIR: 'indexDir',
  BLOOMSIFT_HOST: 'host',
} as const

function readEnv(env: Record<string, string | undefined>): Partial<BloomsiftConfig> {
  const config: Partial<BloomsiftConfig> = {}

  for (const [name, key] of Object.entries(ENV_NUMBERS)) {
    const raw = env[name]
    if (raw === undefined || raw.trim() === '') continue
    const value = Number(raw)
    if (Number.isNaN(value)) {
      throw new ConfigurationError(`${name} must be a number, got "${raw}"`, { configKey: name, actualValue: raw })
    }
    config[key] = value
  }

  for (const [name, key] of Object.entries(ENV_STRINGS)) {
    const raw = env[name]
    if (raw !== undefined && raw !== '') {
      config[key] = raw
    }
  }

  const region = env.BLOOMSIFT_S3_REGION
  const endpoint = env.BLOOMSIFT_S3_ENDPOINT
  if (region || endpoint) {
    config.s3 = {
      ...(region ? { region } : {}),
      ...(endpoint ? { endpoint, forcePathStyle: true } : {}),
    }
  }

  return config
}
