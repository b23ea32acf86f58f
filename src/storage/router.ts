/**
 * StorageRouter - Picks a storage backend from a location string
 *
 * A location names where a file lives independently of the backend:
 *
 * - `/data/indexes/APAC_AUS_0.bsidx` or `./indexes/x.bsidx` - local disk
 * - `file:///data/indexes/APAC_AUS_0.bsidx` - local disk
 * - `s3://bucket/indexes/APAC_AUS_0.bsidx` - S3-compatible object store
 * - `memory://scratch/indexes/APAC_AUS_0.bsidx` - in-process memory
 *
 * @example
 * ```typescript
 * const router = new StorageRouter({ s3: { region: 'eu-west-1' } })
 * const { backend, path } = router.resolve('s3://indexes/daily/a.bsidx')
 * // backend: S3Backend for bucket 'indexes', path: 'daily/a.bsidx'
 * ```
 *
 * @packageDocumentation
 */

import { resolve as resolveLocalPath } from 'node:path'
import type { StorageBackend } from '../types/storage'
import { FsBackend } from './FsBackend'
import { MemoryBackend } from './MemoryBackend'
import { S3Backend, type S3BackendOptions } from './S3Backend'
import { InvalidPathError } from './errors'
import { joinPath, normalizePath } from './utils'

// =============================================================================
// Types
// =============================================================================

export type LocationScheme = 'file' | 's3' | 'memory'

/**
 * A location split into its parts
 */
export interface ParsedLocation {
  scheme: LocationScheme
  /** Bucket for s3, store name for memory, empty for file */
  authority: string
  /** Key inside the backend; absolute path without its leading slash for file */
  path: string
}

/**
 * A location bound to the backend that serves it
 */
export interface ResolvedLocation extends ParsedLocation {
  backend: StorageBackend
}

export interface StorageRouterOptions {
  /** Client settings shared by every S3 bucket the router opens */
  s3?: Omit<S3BackendOptions, 'bucket'> | undefined
}

const SCHEME_PATTERN = /^([a-z][a-z0-9+.-]*):\/\/(.*)$/i

// =============================================================================
// Location helpers
// =============================================================================

/**
 * Split a location string into scheme, authority and path
 */
export function parseLocation(location: string): ParsedLocation {
  if (location.trim() === '') {
    throw new InvalidPathError(location, 'location is empty')
  }

  const match = SCHEME_PATTERN.exec(location)
  if (!match) {
    return { scheme: 'file', authority: '', path: normalizePath(resolveLocalPath(location)) }
  }

  const scheme = (match[1] ?? '').toLowerCase()
  const rest = match[2] ?? ''

  switch (scheme) {
    case 'file':
      // file:///abs/path has an empty authority
      return { scheme: 'file', authority: '', path: normalizePath(resolveLocalPath('/' + normalizePath(rest))) }
    case 's3':
    case 'memory': {
      const slash = rest.indexOf('/')
      const authority = slash === -1 ? rest : rest.slice(0, slash)
      const path = slash === -1 ? '' : normalizePath(rest.slice(slash + 1))
      if (authority === '') {
        throw new InvalidPathError(location, `${scheme} location needs a ${scheme === 's3' ? 'bucket' : 'store name'}`)
      }
      return { scheme: scheme === 's3' ? 's3' : 'memory', authority, path }
    }
    default:
      throw new InvalidPathError(location, `unsupported scheme "${scheme}"`)
  }
}

/**
 * Render parsed parts back into a location string.
 * Local files render as plain absolute paths.
 */
export function formatLocation(location: ParsedLocation): string {
  if (location.scheme === 'file') {
    return '/' + location.path
  }
  return `${location.scheme}://${location.authority}/${location.path}`
}

/**
 * Append path segments to a location
 */
export function joinLocation(location: string, ...segments: string[]): string {
  const parsed = parseLocation(location)
  return formatLocation({ ...parsed, path: joinPath(parsed.path, ...segments) })
}

// =============================================================================
// StorageRouter
// =============================================================================

export class StorageRouter {
  private readonly s3Options: Omit<S3BackendOptions, 'bucket'>
  private fsBackend: FsBackend | undefined
  private readonly buckets = new Map<string, S3Backend>()
  private readonly memoryStores = new Map<string, MemoryBackend>()

  constructor(options: StorageRouterOptions = {}) {
    this.s3Options = options.s3 ?? {}
  }

  /**
   * Resolve a location to its backend and backend-relative path
   */
  resolve(location: string): ResolvedLocation {
    const parsed = parseLocation(location)
    return { ...parsed, backend: this.backendFor(parsed) }
  }

  /**
   * List files directly under a location whose name matches `pattern`,
   * returned as locations in sorted order
   */
  async list(location: string, pattern?: string): Promise<string[]> {
    const resolved = this.resolve(location)
    const result = await resolved.backend.list(resolved.path, { pattern })
    return result.files.map(file => formatLocation({ ...resolved, path: file }))
  }

  /**
   * Get (creating on first use) the memory store behind `memory://<name>`
   */
  memoryStore(name: string): MemoryBackend {
    let store = this.memoryStores.get(name)
    if (!store) {
      store = new MemoryBackend()
      this.memoryStores.set(name, store)
    }
    return store
  }

  private backendFor(parsed: ParsedLocation): StorageBackend {
    switch (parsed.scheme) {
      case 'file':
        this.fsBackend ??= new FsBackend('/')
        return this.fsBackend
      case 's3': {
        let bucket = this.buckets.get(parsed.authority)
        if (!bucket) {
          bucket = new S3Backend({ ...this.s3Options, bucket: parsed.authority })
          this.buckets.set(parsed.authority, bucket)
        }
        return bucket
      }
      case 'memory':
        return this.memoryStore(parsed.authority)
    }
  }
}
