/**
 * bloomsift Storage Module
 *
 * Storage backends shared by the index store and the Parquet data source.
 *
 * Implementations:
 * - FsBackend: Node.js filesystem
 * - S3Backend: S3-compatible object stores
 * - MemoryBackend: In-memory storage for tests and scratch use
 */

export type {
  StorageBackend,
  ReadonlyStorageBackend,
  FileStat,
  ListOptions,
  ListResult,
  WriteOptions,
  WriteResult,
} from '../types/storage'

export {
  StorageError,
  NotFoundError,
  PermissionDeniedError,
  NetworkError,
  InvalidPathError,
  PathTraversalError,
  isNotFoundError,
} from './errors'

export { FsBackend } from './FsBackend'
export { MemoryBackend } from './MemoryBackend'
export { S3Backend, type S3BackendOptions } from './S3Backend'
export {
  StorageRouter,
  parseLocation,
  formatLocation,
  joinLocation,
  type LocationScheme,
  type ParsedLocation,
  type ResolvedLocation,
  type StorageRouterOptions,
} from './router'
export { globToRegex, baseName, stemName } from './utils'
