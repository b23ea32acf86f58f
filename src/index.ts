/**
 * bloomsift - per-column bloom and range indexes over Parquet files
 *
 * Build one index file per source file, then ask a search server which
 * files might contain rows matching an AND/OR rule tree.
 *
 * @example
 * ```typescript
 * import { indexDirectory, SearchServer, SearchClient, and, rule } from 'bloomsift'
 *
 * await indexDirectory('./data', { indexRoot: './indexes/daily' })
 *
 * const server = new SearchServer({ indexRoot: './indexes', port: 0 })
 * const { port } = await server.start()
 *
 * const client = new SearchClient({ url: `http://127.0.0.1:${port}` })
 * const files = await client.send({
 *   indexSource: 'daily',
 *   filePattern: 'APAC_*',
 *   query: and(rule('account_status', 'Inactive')),
 * })
 * ```
 *
 * @packageDocumentation
 */

// =============================================================================
// Indexes
// =============================================================================

export * from './indexes'
export { indexFile, indexDirectory } from './indexer'
export type { IndexOptions, DirectoryIndexOptions, FileIndexReport, DirectoryIndexReport } from './indexer'

// =============================================================================
// Storage and Sources
// =============================================================================

export { IndexStore, type IndexStoreOptions } from './store/IndexStore'
export {
  FsBackend,
  MemoryBackend,
  S3Backend,
  StorageRouter,
  parseLocation,
  formatLocation,
  joinLocation,
  globToRegex,
  NotFoundError,
  InvalidPathError,
  PathTraversalError,
  isNotFoundError,
} from './storage'
export type {
  StorageBackend,
  FileStat,
  ListOptions,
  ListResult,
  S3BackendOptions,
  StorageRouterOptions,
  ParsedLocation,
} from './storage'
export * from './source'

// =============================================================================
// Query, Server and Client
// =============================================================================

export * from './query'
export * from './server'
export * from './client'

// =============================================================================
// Configuration, Errors and Logging
// =============================================================================

export {
  loadConfig,
  defineConfig,
  validateConfig,
  DEFAULT_CONFIG,
  CONFIG_FILE_NAME,
  type BloomsiftConfig,
  type LoadConfigOptions,
  type S3Config,
} from './config'
export * from './errors'
export { Ok, Err, isOk, isErr, type Result } from './types/result'
export {
  logger,
  setLogger,
  consoleLogger,
  noopLogger,
  createConsoleLogger,
  type Logger,
  type LogLevel,
} from './utils/logger'
