/**
 * MemoryBackend - In-memory implementation of StorageBackend
 *
 * Used for tests and for `memory://` locations inside one process.
 */

import type {
  StorageBackend,
  FileStat,
  ListOptions,
  ListResult,
  WriteOptions,
  WriteResult,
} from '../types/storage'
import { NotFoundError } from './errors'
import {
  generateDeterministicEtag,
  globToRegex,
  normalizePath,
  normalizePrefix,
} from './utils'

/** Stored file entry */
interface FileEntry {
  data: Uint8Array
  metadata: FileStat
}

/**
 * In-memory storage backend
 */
export class MemoryBackend implements StorageBackend {
  readonly type = 'memory'

  private files = new Map<string, FileEntry>()

  async read(path: string): Promise<Uint8Array> {
    const entry = this.files.get(normalizePath(path))
    if (!entry) {
      throw new NotFoundError(path)
    }
    // Return a copy to prevent external mutation
    return new Uint8Array(entry.data)
  }

  async readRange(path: string, start: number, end: number): Promise<Uint8Array> {
    if (start < 0 || end < start) {
      throw new RangeError(`Invalid byte range ${start}-${end} for ${path}`)
    }
    const entry = this.files.get(normalizePath(path))
    if (!entry) {
      throw new NotFoundError(path)
    }
    return entry.data.slice(start, Math.min(end, entry.data.length))
  }

  async stat(path: string): Promise<FileStat | null> {
    const entry = this.files.get(normalizePath(path))
    return entry ? { ...entry.metadata } : null
  }

  /**
   * List files directly under `prefix` (no descent into "subdirectories")
   */
  async list(prefix: string, options?: ListOptions): Promise<ListResult> {
    const dir = normalizePrefix(prefix)
    const regex = options?.pattern ? globToRegex(options.pattern) : undefined

    const files: string[] = []
    for (const key of this.files.keys()) {
      if (!key.startsWith(dir)) continue
      const name = key.slice(dir.length)
      if (name.includes('/')) continue
      if (regex && !regex.test(name)) continue
      files.push(key)
    }
    files.sort()

    return { files }
  }

  async write(path: string, data: Uint8Array, _options?: WriteOptions): Promise<WriteResult> {
    const key = normalizePath(path)
    const copy = new Uint8Array(data)
    const etag = generateDeterministicEtag(copy)
    this.files.set(key, {
      data: copy,
      metadata: { path: key, size: copy.length, mtime: new Date(), etag },
    })
    return { etag, size: copy.length }
  }

  /**
   * Number of stored files
   */
  get size(): number {
    return this.files.size
  }
}
