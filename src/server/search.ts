/**
 * SearchService - answers one search request
 *
 * Stages, in order:
 *
 * 1. ResolveFiles: join `indexSource` onto the index root and list the
 *    index files whose stem matches `filePattern`
 * 2. LoadIndexes: load every resolved index through the cache; an index
 *    that fails to load is excluded from the result and reported in
 *    `skipped`
 * 3. Evaluate: keep the source path of every index the query may match,
 *    in resolution order
 *
 * The caller's abort signal is checked between stages; an aborted request
 * stops with RequestAbortedError.
 */

import { DEFAULT_CONCURRENCY } from '../constants'
import { ProtocolError, RequestAbortedError } from '../errors'
import type { FileIndex } from '../indexes/file-index'
import { evaluate } from '../query/evaluator'
import { IndexStore } from '../store/IndexStore'
import { joinLocation } from '../storage/router'
import { tryCatchAsync, type Result } from '../types/result'
import { mapInBatches } from '../utils/batch'
import { logger } from '../utils/logger'
import { IndexCache } from './cache'
import type { SearchRequest, SearchResult } from './protocol'

export interface SearchServiceOptions {
  /** Location every request's `index_source` is resolved against */
  indexRoot: string
  store?: IndexStore | undefined
  /** Shared cache (defaults to one over `store`) */
  cache?: IndexCache | undefined
  cacheSize?: number | undefined
  /** Indexes loaded in parallel per request */
  concurrency?: number | undefined
}

export interface SkippedIndex {
  location: string
  error: Error
}

export interface SearchOutcome {
  files: SearchResult
  /** Indexes that failed to load and were left out of `files` */
  skipped: SkippedIndex[]
}

export class SearchService {
  readonly indexRoot: string
  readonly store: IndexStore
  readonly cache: IndexCache
  private readonly concurrency: number

  constructor(options: SearchServiceOptions) {
    this.indexRoot = options.indexRoot
    this.store = options.store ?? new IndexStore()
    this.cache = options.cache ?? new IndexCache(this.store, { maxEntries: options.cacheSize })
    this.concurrency = options.concurrency ?? DEFAULT_CONCURRENCY
  }

  async search(request: SearchRequest, signal?: AbortSignal): Promise<SearchOutcome> {
    checkAborted(signal, 'ResolveFiles')
    const locations = await this.resolveFiles(request.indexSource, request.filePattern)
    logger.debug(`Resolved ${locations.length} indexes for ${request.indexSource}/${request.filePattern}`)

    checkAborted(signal, 'LoadIndexes')
    const loaded = await mapInBatches(locations, this.concurrency, location => this.load(location))

    checkAborted(signal, 'Evaluate')
    const files: string[] = []
    const skipped: SkippedIndex[] = []
    loaded.forEach((result, i) => {
      if (!result.ok) {
        skipped.push({ location: locations[i], error: result.error })
      } else if (evaluate(request.query, result.value)) {
        files.push(result.value.sourcePath)
      }
    })

    if (skipped.length > 0) {
      logger.debug(`Skipped ${skipped.length} of ${locations.length} indexes`)
    }
    return { files, skipped }
  }

  /**
   * Index locations under `indexSource` whose stem matches `pattern`
   *
   * @throws ProtocolError when `indexSource` is absolute or escapes the index root
   */
  async resolveFiles(indexSource: string, pattern: string): Promise<string[]> {
    return this.store.list(this.resolveIndexSource(indexSource), pattern)
  }

  resolveIndexSource(indexSource: string): string {
    if (indexSource.startsWith('/') || /^[a-z][a-z0-9+.-]*:/i.test(indexSource)) {
      throw new ProtocolError(`index_source must be relative to the index root: ${indexSource}`, {
        field: 'index_source',
      })
    }
    const segments = indexSource.split(/[\\/]/)
    if (segments.includes('..')) {
      throw new ProtocolError(`index_source must not contain "..": ${indexSource}`, {
        field: 'index_source',
      })
    }
    return joinLocation(this.indexRoot, ...segments)
  }

  private async load(location: string): Promise<Result<FileIndex, Error>> {
    const result = await tryCatchAsync(() => this.cache.get(location))
    if (!result.ok) {
      logger.warn(`Excluding ${location} from results: ${result.error.message}`)
    }
    return result
  }
}

function checkAborted(signal: AbortSignal | undefined, stage: string): void {
  if (signal?.aborted) {
    throw new RequestAbortedError(stage)
  }
}
