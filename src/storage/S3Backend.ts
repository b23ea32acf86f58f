/**
 * S3Backend - S3-compatible object store implementation of StorageBackend
 *
 * Backs `s3://bucket/key` locations. Works against AWS S3 and any
 * S3-compatible endpoint (R2, MinIO) through @aws-sdk/client-s3.
 *
 * @example
 * ```typescript
 * const backend = new S3Backend({ bucket: 'indexes', region: 'eu-west-1' })
 * const bytes = await backend.read('daily/APAC_AUS_0.bsidx')
 * ```
 */

import {
  GetObjectCommand,
  HeadObjectCommand,
  ListObjectsV2Command,
  PutObjectCommand,
  S3Client,
} from '@aws-sdk/client-s3'
import type {
  StorageBackend,
  FileStat,
  ListOptions,
  ListResult,
  WriteOptions,
  WriteResult,
} from '../types/storage'
import { NetworkError, NotFoundError, PermissionDeniedError } from './errors'
import { globToRegex, normalizePath, normalizePrefix } from './utils'

// =============================================================================
// Types
// =============================================================================

export interface S3BackendOptions {
  /** Bucket holding the objects */
  bucket: string

  /** AWS region (defaults to the SDK's own resolution) */
  region?: string | undefined

  /** Custom endpoint for S3-compatible stores */
  endpoint?: string | undefined

  /** Use path-style addressing (needed by most self-hosted stores) */
  forcePathStyle?: boolean | undefined

  /** Pre-configured client */
  client?: S3Client | undefined
}

// =============================================================================
// S3Backend Implementation
// =============================================================================

export class S3Backend implements StorageBackend {
  readonly type = 's3'
  readonly bucket: string
  private readonly client: S3Client

  constructor(options: S3BackendOptions) {
    this.bucket = options.bucket
    this.client = options.client ?? new S3Client({
      region: options.region,
      endpoint: options.endpoint,
      forcePathStyle: options.forcePathStyle,
    })
  }

  async read(path: string): Promise<Uint8Array> {
    const key = normalizePath(path)
    try {
      const response = await this.client.send(new GetObjectCommand({ Bucket: this.bucket, Key: key }))
      if (!response.Body) {
        return new Uint8Array(0)
      }
      return await response.Body.transformToByteArray()
    } catch (error: unknown) {
      throw this.translateError(error, path, 'read')
    }
  }

  /**
   * Read a byte range; HTTP ranges are inclusive, ours exclusive
   */
  async readRange(path: string, start: number, end: number): Promise<Uint8Array> {
    if (start < 0 || end < start) {
      throw new RangeError(`Invalid byte range ${start}-${end} for ${path}`)
    }
    if (start === end) {
      return new Uint8Array(0)
    }

    const key = normalizePath(path)
    try {
      const response = await this.client.send(new GetObjectCommand({
        Bucket: this.bucket,
        Key: key,
        Range: `bytes=${start}-${end - 1}`,
      }))
      if (!response.Body) {
        return new Uint8Array(0)
      }
      return await response.Body.transformToByteArray()
    } catch (error: unknown) {
      throw this.translateError(error, path, 'read')
    }
  }

  async stat(path: string): Promise<FileStat | null> {
    const key = normalizePath(path)
    try {
      const response = await this.client.send(new HeadObjectCommand({ Bucket: this.bucket, Key: key }))
      return {
        path,
        size: response.ContentLength ?? 0,
        mtime: response.LastModified ?? new Date(0),
        etag: response.ETag,
      }
    } catch (error: unknown) {
      const translated = this.translateError(error, path, 'stat')
      if (translated instanceof NotFoundError) {
        return null
      }
      throw translated
    }
  }

  /**
   * List objects directly under a prefix, following continuation tokens
   */
  async list(prefix: string, options?: ListOptions): Promise<ListResult> {
    const dir = normalizePrefix(prefix)
    const regex = options?.pattern ? globToRegex(options.pattern) : undefined
    const files: string[] = []

    let continuationToken: string | undefined
    try {
      do {
        const response = await this.client.send(new ListObjectsV2Command({
          Bucket: this.bucket,
          Prefix: dir,
          Delimiter: '/',
          ContinuationToken: continuationToken,
        }))

        for (const object of response.Contents ?? []) {
          if (!object.Key) continue
          const name = object.Key.slice(dir.length)
          if (name === '' || (regex && !regex.test(name))) continue
          files.push(object.Key)
        }

        continuationToken = response.IsTruncated ? response.NextContinuationToken : undefined
      } while (continuationToken)
    } catch (error: unknown) {
      throw this.translateError(error, prefix, 'list')
    }

    files.sort()
    return { files }
  }

  async write(path: string, data: Uint8Array, options?: WriteOptions): Promise<WriteResult> {
    const key = normalizePath(path)
    try {
      const response = await this.client.send(new PutObjectCommand({
        Bucket: this.bucket,
        Key: key,
        Body: data,
        ContentType: options?.contentType ?? 'application/octet-stream',
      }))
      return { etag: response.ETag ?? '', size: data.length }
    } catch (error: unknown) {
      throw this.translateError(error, path, 'write')
    }
  }

  /**
   * Map SDK errors onto storage errors
   */
  private translateError(error: unknown, path: string, operation: string): Error {
    const cause = error instanceof Error ? error : new Error(String(error))
    const name = cause.name
    const status = readHttpStatus(error)

    if (name === 'NoSuchKey' || name === 'NotFound' || status === 404) {
      return new NotFoundError(path, cause)
    }
    if (name === 'AccessDenied' || status === 403) {
      return new PermissionDeniedError(path, operation, cause)
    }
    return new NetworkError(`S3 ${operation} failed for s3://${this.bucket}/${normalizePath(path)}: ${cause.message}`, path, cause)
  }
}

/**
 * Pull `$metadata.httpStatusCode` off an SDK service exception
 */
function readHttpStatus(error: unknown): number | undefined {
  if (typeof error !== 'object' || error === null || !('$metadata' in error)) {
    return undefined
  }
  const metadata = error.$metadata
  if (typeof metadata !== 'object' || metadata === null || !('httpStatusCode' in metadata)) {
    return undefined
  }
  return typeof metadata.httpStatusCode === 'number' ? metadata.httpStatusCode : undefined
}
