/**
 * IndexCache - read-through cache of loaded FileIndexes
 *
 * Entries hold the pending read promise, so concurrent lookups of one
 * location share a single read. Every lookup checks the file's version
 * (`IndexStore.version`) and reads it again when the index was rebuilt since
 * it was cached. A read that fails is dropped from the cache and retried by
 * the next lookup. The least recently used entry is evicted once the cache
 * holds `maxEntries` indexes.
 */

import { DEFAULT_CACHE_SIZE } from '../constants'
import type { FileIndex } from '../indexes/file-index'
import type { IndexStore } from '../store/IndexStore'
import { LRUCache, type LRUCacheStats } from '../utils/lru-cache'
import { logger } from '../utils/logger'

export interface IndexCacheOptions {
  /** Maximum number of cached indexes (default 256) */
  maxEntries?: number | undefined
}

interface CachedIndex {
  /** Version of the file the index was read from */
  version: string | null
  index: Promise<FileIndex>
}

export class IndexCache {
  private readonly entries: LRUCache<string, CachedIndex>

  constructor(
    private readonly store: IndexStore,
    options: IndexCacheOptions = {}
  ) {
    this.entries = new LRUCache({
      maxEntries: options.maxEntries ?? DEFAULT_CACHE_SIZE,
      onEvict: location => logger.debug(`Evicted index ${location} from cache`),
    })
  }

  /**
   * Load an index, reading it from the store on first use and whenever its
   * file changed
   */
  async get(location: string): Promise<FileIndex> {
    const version = await this.store.version(location)

    const cached = this.entries.get(location)
    if (cached && cached.version === version) {
      return cached.index
    }
    if (cached) {
      logger.debug(`Index ${location} changed on disk, reloading`)
    }

    const entry: CachedIndex = {
      version,
      index: this.store.read(location).catch((error: unknown) => {
        if (this.entries.peek(location) === entry) {
          this.entries.delete(location)
        }
        throw error
      }),
    }
    this.entries.set(location, entry)
    return entry.index
  }

  get size(): number {
    return this.entries.size
  }

  getStats(): LRUCacheStats {
    return this.entries.getStats()
  }
}
