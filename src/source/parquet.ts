/**
 * Parquet data source using hyparquet
 *
 * Reads source tables from any location the StorageRouter understands
 * (local disk, S3, memory). hyparquet pulls byte ranges through an
 * AsyncBuffer adapter over the storage backend, so only the footer and the
 * column chunks are fetched.
 */

import { parquetMetadataAsync, parquetReadObjects, parquetSchema } from 'hyparquet'
import type { AsyncBuffer } from 'hyparquet'
import { compressors } from 'hyparquet-compressors'
import { DataSourceError, isBloomsiftError, toError } from '../errors'
import { StorageRouter } from '../storage/router'
import type { ReadonlyStorageBackend } from '../types/storage'
import { logger } from '../utils/logger'
import { tableFromRows, type TableData, type TabularDataSource } from './types'

// =============================================================================
// AsyncBuffer Adapter
// =============================================================================

/**
 * Create an AsyncBuffer for hyparquet over a storage backend, fetching the
 * file size up front since hyparquet reads `byteLength` synchronously
 */
export async function initializeAsyncBuffer(
  storage: ReadonlyStorageBackend,
  path: string
): Promise<AsyncBuffer | null> {
  const stat = await storage.stat(path)
  if (!stat) {
    return null
  }

  const byteLength = stat.size

  return {
    byteLength,
    async slice(start: number, end?: number): Promise<ArrayBuffer> {
      const data = await storage.readRange(path, start, end ?? byteLength)
      // Copy into a fresh ArrayBuffer; the backend's view may share a larger buffer
      const buffer = new ArrayBuffer(data.byteLength)
      new Uint8Array(buffer).set(data)
      return buffer
    },
  }
}

// =============================================================================
// ParquetDataSource
// =============================================================================

export interface ParquetDataSourceOptions {
  /** Router used to open locations (defaults to a fresh router) */
  router?: StorageRouter | undefined
}

export class ParquetDataSource implements TabularDataSource {
  private readonly router: StorageRouter

  constructor(options: ParquetDataSourceOptions = {}) {
    this.router = options.router ?? new StorageRouter()
  }

  /**
   * Load every column of a Parquet file
   *
   * @throws DataSourceError when the file is missing or cannot be parsed
   */
  async load(location: string): Promise<TableData> {
    try {
      const { backend, path } = this.router.resolve(location)
      const file = await initializeAsyncBuffer(backend, path)
      if (!file) {
        throw new DataSourceError(location, 'file not found')
      }

      const metadata = await parquetMetadataAsync(file)
      const columns = parquetSchema(metadata).children.map(child => child.element.name)
      const rows: Record<string, unknown>[] = await parquetReadObjects({ file, metadata, compressors })

      logger.debug(`Loaded ${location}: ${rows.length} rows, ${columns.length} columns`)
      return tableFromRows(location, columns, rows)
    } catch (error: unknown) {
      if (error instanceof DataSourceError) {
        throw error
      }
      const cause = toError(error)
      const reason = isBloomsiftError(error) ? error.message : `not a readable Parquet file (${cause.message})`
      throw new DataSourceError(location, reason, cause)
    }
  }
}
