/**
 * Bloomsift Error Handling Module
 *
 * Provides a standardized error hierarchy for the whole codebase.
 * All errors extend from BloomsiftError which provides:
 * - Error codes for programmatic handling
 * - Serialization support for the wire protocol
 * - Cause chaining for debugging
 * - Type guards for error checking
 *
 * Error Hierarchy:
 * - BloomsiftError (base class)
 *   - ConfigurationError (invalid error rate, threshold or config file)
 *   - InvalidColumnError (column unsuitable for its index kind)
 *   - DataSourceError (source table could not be opened or parsed)
 *   - StoreReadError (index location absent, unreadable or corrupt)
 *     - StoreVersionMismatchError (index written by another format version)
 *   - StoreWriteError (index could not be written)
 *   - StorageError (storage backend failures, see storage/errors)
 *   - ConnectionError (client transport failure)
 *   - ProtocolError (malformed request or response)
 *   - RemoteError (server answered with an error payload)
 *   - RequestAbortedError (caller went away mid-request)
 *
 * @module errors
 */

// =============================================================================
// Error Codes
// =============================================================================

/**
 * Error codes for bloomsift operations.
 * These codes are stable and travel over the wire as the error `kind`.
 */
export enum ErrorCode {
  // General errors
  UNKNOWN = 'UNKNOWN',
  INTERNAL = 'INTERNAL',

  // Build-time errors
  CONFIGURATION_ERROR = 'CONFIGURATION_ERROR',
  INVALID_COLUMN = 'INVALID_COLUMN',
  DATA_SOURCE_ERROR = 'DATA_SOURCE_ERROR',

  // Index store errors
  STORE_READ_ERROR = 'STORE_READ_ERROR',
  STORE_WRITE_ERROR = 'STORE_WRITE_ERROR',
  STORE_VERSION_MISMATCH = 'STORE_VERSION_MISMATCH',

  // Storage backend errors
  STORAGE_ERROR = 'STORAGE_ERROR',
  FILE_NOT_FOUND = 'FILE_NOT_FOUND',
  PERMISSION_DENIED = 'PERMISSION_DENIED',
  PATH_TRAVERSAL = 'PATH_TRAVERSAL',
  INVALID_PATH = 'INVALID_PATH',
  NETWORK_ERROR = 'NETWORK_ERROR',

  // Protocol errors
  CONNECTION_ERROR = 'CONNECTION_ERROR',
  PROTOCOL_ERROR = 'PROTOCOL_ERROR',
  REMOTE_ERROR = 'REMOTE_ERROR',
  REQUEST_ABORTED = 'REQUEST_ABORTED',
}

const ERROR_CODES: ReadonlySet<string> = new Set(Object.values(ErrorCode))

/**
 * Check if a string is a known error code
 */
export function isErrorCode(value: unknown): value is ErrorCode {
  return typeof value === 'string' && ERROR_CODES.has(value)
}

// =============================================================================
// Serialized Error Format
// =============================================================================

/**
 * Serializable error format
 */
export interface SerializedError {
  /** Error class name */
  name: string
  /** Error code for programmatic handling */
  code: ErrorCode
  /** Human-readable error message */
  message: string
  /** Stack trace (included outside production) */
  stack?: string | undefined
  /** Additional context data */
  context?: Record<string, unknown> | undefined
  /** Serialized cause (if error chaining) */
  cause?: SerializedError | undefined
}

// =============================================================================
// Base Error Class
// =============================================================================

/**
 * Base error class for all bloomsift errors.
 *
 * @example
 * ```typescript
 * throw new BloomsiftError('Operation failed', ErrorCode.INTERNAL, {
 *   operation: 'search',
 * })
 * ```
 */
export class BloomsiftError extends Error {
  override readonly name: string = 'BloomsiftError'
  readonly code: ErrorCode
  readonly context: Record<string, unknown>
  override readonly cause?: Error | undefined

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.UNKNOWN,
    context?: Record<string, unknown>,
    cause?: Error
  ) {
    super(message)
    this.code = code
    this.context = context ?? {}
    this.cause = cause
    Object.setPrototypeOf(this, new.target.prototype)
  }

  /**
   * Serialize error for transmission
   */
  toJSON(): SerializedError {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      stack: process.env.NODE_ENV !== 'production' ? this.stack : undefined,
      context: Object.keys(this.context).length > 0 ? this.context : undefined,
      cause: this.cause instanceof BloomsiftError ? this.cause.toJSON() : undefined,
    }
  }

  /**
   * Check if error matches a specific code
   */
  is(code: ErrorCode): boolean {
    return this.code === code
  }
}

// =============================================================================
// Build-time Errors
// =============================================================================

/**
 * Error thrown when configuration is invalid.
 * Raised before any indexing or serving starts.
 */
export class ConfigurationError extends BloomsiftError {
  override readonly name = 'ConfigurationError'
  readonly configKey: string | undefined

  constructor(
    message: string,
    context?: {
      configKey?: string
      actualValue?: unknown
    },
    cause?: Error
  ) {
    super(message, ErrorCode.CONFIGURATION_ERROR, context, cause)
    this.configKey = context?.configKey
    Object.setPrototypeOf(this, ConfigurationError.prototype)
  }
}

/**
 * Error thrown when a column cannot be indexed with the kind selected for it,
 * e.g. a range-indexed column holding values that have no common ordering.
 */
export class InvalidColumnError extends BloomsiftError {
  override readonly name = 'InvalidColumnError'
  readonly column: string | undefined

  constructor(message: string, column?: string, cause?: Error) {
    super(message, ErrorCode.INVALID_COLUMN, { column }, cause)
    this.column = column
    Object.setPrototypeOf(this, InvalidColumnError.prototype)
  }

  /**
   * Copy of this error attributed to a column
   */
  forColumn(column: string): InvalidColumnError {
    return new InvalidColumnError(`Column "${column}": ${this.message}`, column, this.cause)
  }
}

/**
 * Error thrown when a source table cannot be opened or parsed.
 */
export class DataSourceError extends BloomsiftError {
  override readonly name = 'DataSourceError'
  readonly location: string

  constructor(location: string, message: string, cause?: Error) {
    super(`Cannot load ${location}: ${message}`, ErrorCode.DATA_SOURCE_ERROR, { location }, cause)
    this.location = location
    Object.setPrototypeOf(this, DataSourceError.prototype)
  }
}

// =============================================================================
// Index Store Errors
// =============================================================================

/**
 * Error thrown when an index cannot be read back: the location is missing,
 * unreadable, or holds bytes that do not decode.
 */
export class StoreReadError extends BloomsiftError {
  override readonly name: string = 'StoreReadError'
  readonly location: string

  constructor(
    location: string,
    message: string,
    cause?: Error,
    code: ErrorCode = ErrorCode.STORE_READ_ERROR
  ) {
    super(`Cannot read index ${location}: ${message}`, code, { location }, cause)
    this.location = location
    Object.setPrototypeOf(this, new.target.prototype)
  }
}

/**
 * Error thrown when an index was written by an incompatible format version.
 */
export class StoreVersionMismatchError extends StoreReadError {
  override readonly name = 'StoreVersionMismatchError'
  readonly expectedVersion: number
  readonly actualVersion: number

  constructor(location: string, expectedVersion: number, actualVersion: number) {
    super(
      location,
      `format version ${actualVersion} is not supported (expected ${expectedVersion})`,
      undefined,
      ErrorCode.STORE_VERSION_MISMATCH
    )
    this.expectedVersion = expectedVersion
    this.actualVersion = actualVersion
    Object.setPrototypeOf(this, StoreVersionMismatchError.prototype)
  }
}

/**
 * Error thrown when an index cannot be serialized or written.
 */
export class StoreWriteError extends BloomsiftError {
  override readonly name = 'StoreWriteError'
  readonly location: string

  constructor(location: string, message: string, cause?: Error) {
    super(`Cannot write index ${location}: ${message}`, ErrorCode.STORE_WRITE_ERROR, { location }, cause)
    this.location = location
    Object.setPrototypeOf(this, StoreWriteError.prototype)
  }
}

// =============================================================================
// Storage Errors
// =============================================================================

/**
 * Error thrown when a storage operation fails.
 */
export class StorageError extends BloomsiftError {
  override readonly name: string = 'StorageError'
  readonly path: string | undefined

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.STORAGE_ERROR,
    path?: string,
    cause?: Error
  ) {
    super(message, code, { path }, cause)
    this.path = path
    Object.setPrototypeOf(this, new.target.prototype)
  }
}

// =============================================================================
// Protocol Errors
// =============================================================================

/**
 * Error thrown when the client cannot reach the server or the transfer fails.
 */
export class ConnectionError extends BloomsiftError {
  override readonly name = 'ConnectionError'
  readonly url: string

  constructor(url: string, message: string, cause?: Error) {
    super(`Connection to ${url} failed: ${message}`, ErrorCode.CONNECTION_ERROR, { url }, cause)
    this.url = url
    Object.setPrototypeOf(this, ConnectionError.prototype)
  }
}

/**
 * Error thrown when a request or response does not follow the protocol.
 */
export class ProtocolError extends BloomsiftError {
  override readonly name = 'ProtocolError'

  constructor(message: string, context?: Record<string, unknown>, cause?: Error) {
    super(message, ErrorCode.PROTOCOL_ERROR, context, cause)
    Object.setPrototypeOf(this, ProtocolError.prototype)
  }
}

/**
 * Error reported by the server in an error payload.
 */
export class RemoteError extends BloomsiftError {
  override readonly name = 'RemoteError'
  /** Error kind reported by the server */
  readonly kind: ErrorCode

  constructor(kind: ErrorCode, message: string) {
    super(message, ErrorCode.REMOTE_ERROR, { kind })
    this.kind = kind
    Object.setPrototypeOf(this, RemoteError.prototype)
  }
}

/**
 * Error thrown when the caller abandoned a request before it completed.
 */
export class RequestAbortedError extends BloomsiftError {
  override readonly name = 'RequestAbortedError'

  constructor(stage: string) {
    super(`Request aborted during ${stage}`, ErrorCode.REQUEST_ABORTED, { stage })
    Object.setPrototypeOf(this, RequestAbortedError.prototype)
  }
}

// =============================================================================
// Type Guards
// =============================================================================

/**
 * Check if an error is a BloomsiftError
 */
export function isBloomsiftError(error: unknown): error is BloomsiftError {
  return error instanceof BloomsiftError
}

/**
 * Check if an error is a StoreReadError (including version mismatches)
 */
export function isStoreReadError(error: unknown): error is StoreReadError {
  return error instanceof StoreReadError
}

export function isInvalidColumnError(error: unknown): error is InvalidColumnError {
  return error instanceof InvalidColumnError
}

/**
 * Check if an error is a StorageError (or any subclass)
 */
export function isStorageError(error: unknown): error is StorageError {
  return error instanceof StorageError
}

// =============================================================================
// Error Factory Functions
// =============================================================================

/**
 * Safely convert an unknown thrown value to an Error instance
 */
export function toError(error: unknown): Error {
  if (error instanceof Error) {
    return error
  }
  return new Error(String(error))
}

/**
 * Wrap an unknown error in a BloomsiftError
 */
export function wrapError(error: unknown, context?: Record<string, unknown>): BloomsiftError {
  if (error instanceof BloomsiftError) {
    return error
  }

  if (error instanceof Error) {
    return new BloomsiftError(error.message, ErrorCode.INTERNAL, context, error)
  }

  return new BloomsiftError(String(error), ErrorCode.UNKNOWN, context)
}
