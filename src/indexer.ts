/**
 * Index construction entry points
 *
 * - `indexFile` builds and stores the FileIndex of one source table
 * - `indexDirectory` does the same for every matching table under a
 *   directory (or object-store prefix), a few files at a time
 */

import { DEFAULT_CONCURRENCY, DEFAULT_SOURCE_PATTERN } from './constants'
import { isBloomsiftError, type BloomsiftError } from './errors'
import { ColumnIndexBuilder, type ColumnIndexOptions } from './indexes/builder'
import { buildFileIndex, indexLocationFor, type ColumnFailure } from './indexes/file-index'
import { ParquetDataSource } from './source/parquet'
import type { TabularDataSource } from './source/types'
import { IndexStore } from './store/IndexStore'
import { StorageRouter } from './storage/router'
import { Err, Ok, type Result } from './types/result'
import { mapInBatches } from './utils/batch'
import { logger } from './utils/logger'

// =============================================================================
// Types
// =============================================================================

export interface IndexOptions extends Partial<ColumnIndexOptions> {
  /** Directory or prefix receiving the index files */
  indexRoot: string
  /** Router shared by the data source and the store */
  router?: StorageRouter | undefined
  /** Data source (defaults to Parquet over the router) */
  source?: TabularDataSource | undefined
  /** Index store (defaults to one over the router) */
  store?: IndexStore | undefined
}

export interface DirectoryIndexOptions extends IndexOptions {
  /** Glob selecting source files by name (default `*.parquet`) */
  pattern?: string | undefined
  /** Files indexed in parallel (default 4) */
  concurrency?: number | undefined
}

export interface FileIndexReport {
  sourcePath: string
  indexPath: string
  columnCount: number
  rowCount: number
  /** Columns left out of the index */
  failures: ColumnFailure[]
}

export interface DirectoryIndexReport {
  indexed: FileIndexReport[]
  /** Files that could not be indexed at all */
  failed: { sourcePath: string; error: BloomsiftError }[]
}

// =============================================================================
// Entry points
// =============================================================================

/**
 * Build the index of one source table and write it under `indexRoot`
 *
 * @throws DataSourceError when the source cannot be loaded
 * @throws StoreWriteError when the index cannot be written
 */
export async function indexFile(sourceLocation: string, options: IndexOptions): Promise<FileIndexReport> {
  const builder = new ColumnIndexBuilder(options)
  const router = options.router ?? new StorageRouter()
  const source = options.source ?? new ParquetDataSource({ router })
  const store = options.store ?? new IndexStore({ router })

  const table = await source.load(sourceLocation)
  const { index, failures } = buildFileIndex(table, builder)
  const indexPath = indexLocationFor(sourceLocation, options.indexRoot)
  await store.write(index, indexPath)

  logger.info(`Indexed ${sourceLocation} -> ${indexPath} (${index.columns.size} columns)`)
  return {
    sourcePath: sourceLocation,
    indexPath,
    columnCount: index.columns.size,
    rowCount: table.rowCount,
    failures,
  }
}

/**
 * Index every source file directly under `sourceDir` matching the pattern.
 * A file that fails is reported in `failed` and does not stop the others.
 */
export async function indexDirectory(
  sourceDir: string,
  options: DirectoryIndexOptions
): Promise<DirectoryIndexReport> {
  // Validate settings once, before touching any file
  const builder = new ColumnIndexBuilder(options)
  const router = options.router ?? new StorageRouter()
  const shared: IndexOptions = {
    indexRoot: options.indexRoot,
    errorRate: builder.errorRate,
    rangeFilterThreshold: builder.rangeFilterThreshold,
    router,
    source: options.source ?? new ParquetDataSource({ router }),
    store: options.store ?? new IndexStore({ router }),
  }

  const sources = await router.list(sourceDir, options.pattern ?? DEFAULT_SOURCE_PATTERN)
  logger.info(`Indexing ${sources.length} files from ${sourceDir}`)

  const outcomes = await mapInBatches(
    sources,
    options.concurrency ?? DEFAULT_CONCURRENCY,
    async (sourcePath): Promise<Result<FileIndexReport, BloomsiftError>> => {
      try {
        return Ok(await indexFile(sourcePath, shared))
      } catch (error: unknown) {
        if (!isBloomsiftError(error)) {
          throw error
        }
        logger.error(`Failed to index ${sourcePath}`, error)
        return Err(error)
      }
    }
  )

  const report: DirectoryIndexReport = { indexed: [], failed: [] }
  outcomes.forEach((outcome, i) => {
    if (outcome.ok) {
      report.indexed.push(outcome.value)
    } else {
      report.failed.push({ sourcePath: sources[i], error: outcome.error })
    }
  })
  return report
}
