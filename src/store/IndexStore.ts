/**
 * IndexStore - persists FileIndexes at storage locations
 *
 * Every location goes through the StorageRouter, so the same store writes
 * to local disk, S3 or memory depending on the location's scheme.
 *
 * @example
 * ```typescript
 * const store = new IndexStore()
 * await store.write(index, '/data/indexes/APAC_AUS_1.bsidx')
 * const loaded = await store.read('/data/indexes/APAC_AUS_1.bsidx')
 * const version = await store.version('/data/indexes/APAC_AUS_1.bsidx')
 * const locations = await store.list('/data/indexes', 'APAC_*')
 * ```
 */

import { INDEX_FILE_EXTENSION } from '../constants'
import { StoreReadError, StoreWriteError, toError } from '../errors'
import { decodeFileIndex, encodeFileIndex } from '../indexes/codec'
import type { FileIndex } from '../indexes/file-index'
import { isNotFoundError } from '../storage/errors'
import { StorageRouter } from '../storage/router'
import { globToRegex, stemName } from '../storage/utils'
import { logger } from '../utils/logger'

export interface IndexStoreOptions {
  /** Router used to open locations (defaults to a fresh router) */
  router?: StorageRouter | undefined
}

export class IndexStore {
  readonly router: StorageRouter

  constructor(options: IndexStoreOptions = {}) {
    this.router = options.router ?? new StorageRouter()
  }

  /**
   * Serialize and write an index
   *
   * @throws StoreWriteError when encoding or writing fails
   */
  async write(index: FileIndex, location: string): Promise<void> {
    try {
      const data = encodeFileIndex(index)
      const { backend, path } = this.router.resolve(location)
      await backend.write(path, data, { contentType: 'application/octet-stream' })
      logger.debug(`Wrote index ${location} (${data.length} bytes, ${index.columns.size} columns)`)
    } catch (error: unknown) {
      const cause = toError(error)
      throw new StoreWriteError(location, cause.message, cause)
    }
  }

  /**
   * Read and decode an index
   *
   * @throws StoreVersionMismatchError when the file has another format version
   * @throws StoreReadError when the location is missing, unreadable or corrupt
   */
  async read(location: string): Promise<FileIndex> {
    let data: Uint8Array
    try {
      const { backend, path } = this.router.resolve(location)
      data = await backend.read(path)
    } catch (error: unknown) {
      const cause = toError(error)
      throw new StoreReadError(location, isNotFoundError(error) ? 'not found' : cause.message, cause)
    }
    return decodeFileIndex(data, location)
  }

  /**
   * Token that changes whenever the file at `location` is rewritten: the
   * backend etag, else modification time and size. Null when it is missing.
   *
   * @throws StoreReadError when the backend cannot stat the location
   */
  async version(location: string): Promise<string | null> {
    try {
      const { backend, path } = this.router.resolve(location)
      const stat = await backend.stat(path)
      if (!stat) {
        return null
      }
      return stat.etag ?? `${stat.mtime.getTime()}-${stat.size}`
    } catch (error: unknown) {
      const cause = toError(error)
      throw new StoreReadError(location, cause.message, cause)
    }
  }

  /**
   * Locations of the indexes directly under `indexSource` whose stem matches
   * the shell-glob `pattern`, sorted by name
   */
  async list(indexSource: string, pattern: string): Promise<string[]> {
    const regex = globToRegex(pattern)
    const locations = await this.router.list(indexSource, '*' + INDEX_FILE_EXTENSION)
    return locations.filter(location => regex.test(stemName(location)))
  }
}
