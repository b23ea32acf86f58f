/**
 * Storage backend interface for bloomsift
 * Abstracts the local filesystem, S3-compatible object stores and memory
 */

// =============================================================================
// Core Storage Interface
// =============================================================================

/**
 * Read-only storage backend interface
 *
 * The search server and the Parquet data source only need this half.
 */
export interface ReadonlyStorageBackend {
  /** Backend type identifier */
  readonly type: string

  /**
   * Read entire file
   */
  read(path: string): Promise<Uint8Array>

  /**
   * Read byte range from file (for Parquet partial reads)
   *
   * Uses EXCLUSIVE end position semantics (like Array.slice):
   * - readRange(path, 0, 5) reads bytes 0,1,2,3,4 (5 bytes)
   * - readRange(path, 5, 5) returns empty array (zero-length range)
   *
   * If end exceeds file size, returns bytes up to end of file.
   */
  readRange(path: string, start: number, end: number): Promise<Uint8Array>

  /**
   * Get file metadata, or null when the file does not exist
   */
  stat(path: string): Promise<FileStat | null>

  /**
   * List files directly under a prefix, sorted by path
   */
  list(prefix: string, options?: ListOptions): Promise<ListResult>
}

/**
 * Storage backend interface
 * Implementations: FsBackend, S3Backend, MemoryBackend
 */
export interface StorageBackend extends ReadonlyStorageBackend {
  /**
   * Write file (overwrite if exists)
   */
  write(path: string, data: Uint8Array, options?: WriteOptions): Promise<WriteResult>
}

// =============================================================================
// File Metadata
// =============================================================================

/** File statistics */
export interface FileStat {
  /** File path */
  path: string

  /** File size in bytes */
  size: number

  /** Last modified time */
  mtime: Date

  /** ETag/version */
  etag?: string | undefined
}

// =============================================================================
// List Operations
// =============================================================================

/** Options for list operation */
export interface ListOptions {
  /** Only include files whose base name matches this glob pattern */
  pattern?: string | undefined
}

/** Result of list operation */
export interface ListResult {
  /** File paths (or keys), sorted */
  files: string[]
}

// =============================================================================
// Write Operations
// =============================================================================

/** Options for write operation */
export interface WriteOptions {
  /** Content type (MIME) */
  contentType?: string | undefined
}

/** Result of write operation */
export interface WriteResult {
  /** ETag/version of written file */
  etag: string

  /** Bytes written */
  size: number
}
