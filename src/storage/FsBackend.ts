/**
 * FsBackend - Node.js filesystem implementation of StorageBackend
 *
 * Uses node:fs/promises for file operations with support for:
 * - Atomic writes (write to .tmp then rename), so an index is replaced whole
 * - Byte range reads (for Parquet partial file access)
 * - Path traversal prevention
 */

import { promises as fs } from 'node:fs'
import type { Stats } from 'node:fs'
import { dirname, normalize, resolve, sep } from 'node:path'
import { logger } from '../utils/logger'
import type {
  StorageBackend,
  FileStat,
  ListOptions,
  ListResult,
  WriteOptions,
  WriteResult,
} from '../types/storage'
import { NotFoundError, PathTraversalError, PermissionDeniedError, hasErrorCode } from './errors'
import { globToRegex, joinPath, normalizePath } from './utils'

/**
 * Node.js filesystem storage backend
 */
export class FsBackend implements StorageBackend {
  readonly type = 'fs'
  private readonly resolvedRootPath: string

  /**
   * Create a new FsBackend
   * @param rootPath - The root directory for all operations
   */
  constructor(public readonly rootPath: string) {
    this.resolvedRootPath = resolve(rootPath)
  }

  /**
   * Resolve and validate a path, preventing path traversal
   */
  private resolvePath(path: string): string {
    if (path.includes('\x00') || path.split('/').includes('..')) {
      throw new PathTraversalError(path)
    }

    const fullPath = resolve(this.resolvedRootPath, normalize(normalizePath(path) || '.'))
    const root = this.resolvedRootPath.endsWith(sep) ? this.resolvedRootPath : this.resolvedRootPath + sep

    if (!fullPath.startsWith(root) && fullPath !== this.resolvedRootPath) {
      throw new PathTraversalError(path)
    }

    return fullPath
  }

  /**
   * Map fs error codes onto storage errors
   */
  private translateError(error: unknown, path: string, operation: string): unknown {
    if (hasErrorCode(error, 'ENOENT')) {
      return new NotFoundError(path)
    }
    if (hasErrorCode(error, 'EACCES') || hasErrorCode(error, 'EPERM')) {
      return new PermissionDeniedError(path, operation, error instanceof Error ? error : undefined)
    }
    return error
  }

  private generateEtag(stat: Stats): string {
    return `"${stat.mtimeMs.toString(36)}-${stat.size.toString(36)}"`
  }

  async read(path: string): Promise<Uint8Array> {
    const fullPath = this.resolvePath(path)
    try {
      const buffer = await fs.readFile(fullPath)
      return new Uint8Array(buffer)
    } catch (error: unknown) {
      throw this.translateError(error, path, 'read')
    }
  }

  async readRange(path: string, start: number, end: number): Promise<Uint8Array> {
    if (start < 0 || end < start) {
      throw new RangeError(`Invalid byte range ${start}-${end} for ${path}`)
    }

    const fullPath = this.resolvePath(path)

    let handle: import('node:fs/promises').FileHandle | undefined
    try {
      handle = await fs.open(fullPath, 'r')
      const fileStat = await handle.stat()

      // Adjust end if it exceeds file size
      const length = Math.min(end, fileStat.size) - start
      if (length <= 0) {
        return new Uint8Array(0)
      }

      const buffer = Buffer.alloc(length)
      await handle.read(buffer, 0, length, start)
      return new Uint8Array(buffer)
    } catch (error: unknown) {
      throw this.translateError(error, path, 'read')
    } finally {
      if (handle) {
        await handle.close()
      }
    }
  }

  async stat(path: string): Promise<FileStat | null> {
    const fullPath = this.resolvePath(path)
    try {
      const stat = await fs.stat(fullPath)
      return {
        path,
        size: stat.size,
        mtime: stat.mtime,
        etag: this.generateEtag(stat),
      }
    } catch (error: unknown) {
      if (hasErrorCode(error, 'ENOENT')) {
        return null
      }
      throw this.translateError(error, path, 'stat')
    }
  }

  /**
   * List regular files directly inside the `prefix` directory
   */
  async list(prefix: string, options?: ListOptions): Promise<ListResult> {
    const fullPath = this.resolvePath(prefix)
    const regex = options?.pattern ? globToRegex(options.pattern) : undefined

    let entries: import('node:fs').Dirent[]
    try {
      entries = await fs.readdir(fullPath, { withFileTypes: true })
    } catch (error: unknown) {
      if (hasErrorCode(error, 'ENOENT') || hasErrorCode(error, 'ENOTDIR')) {
        logger.debug(`Nothing to list under ${prefix}`)
        return { files: [] }
      }
      throw this.translateError(error, prefix, 'list')
    }

    const files = entries
      .filter(entry => entry.isFile() && (regex === undefined || regex.test(entry.name)))
      .map(entry => joinPath(prefix, entry.name))
      .sort()

    return { files }
  }

  /**
   * Write a file atomically: write to a temp file, then rename over the target
   */
  async write(path: string, data: Uint8Array, _options?: WriteOptions): Promise<WriteResult> {
    const fullPath = this.resolvePath(path)
    const tempPath = `${fullPath}.tmp.${Date.now()}.${Math.random().toString(36).slice(2, 10)}`

    try {
      await fs.mkdir(dirname(fullPath), { recursive: true })
      await fs.writeFile(tempPath, data)
      await fs.rename(tempPath, fullPath)

      const stat = await fs.stat(fullPath)
      return {
        etag: this.generateEtag(stat),
        size: data.length,
      }
    } catch (error: unknown) {
      try {
        await fs.unlink(tempPath)
      } catch (cleanupError) {
        // temp file may never have been created
        logger.debug(`Failed to clean up temp file ${tempPath}`, cleanupError)
      }
      throw this.translateError(error, path, 'write')
    }
  }
}
