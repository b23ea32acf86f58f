/**
 * Shared error classes for storage backends
 *
 * Error Hierarchy (extends BloomsiftError via StorageError):
 * - StorageError (base class)
 *   - NotFoundError (file/object not found)
 *   - PermissionDeniedError (access denied)
 *   - NetworkError (connection/timeout issues with a remote store)
 *   - InvalidPathError (malformed path or location)
 *   - PathTraversalError (path escapes the backend root)
 *
 * @module storage/errors
 */

import { ErrorCode, StorageError } from '../errors'

export { StorageError }

/**
 * Error thrown when a file or object does not exist
 */
export class NotFoundError extends StorageError {
  override readonly name = 'NotFoundError'

  constructor(path: string, cause?: Error) {
    super(`File not found: ${path}`, ErrorCode.FILE_NOT_FOUND, path, cause)
    Object.setPrototypeOf(this, NotFoundError.prototype)
  }
}

/**
 * Error thrown when the backend refuses access
 */
export class PermissionDeniedError extends StorageError {
  override readonly name = 'PermissionDeniedError'

  constructor(path: string, operation?: string, cause?: Error) {
    const operationPart = operation ? ` (${operation})` : ''
    super(`Permission denied: ${path}${operationPart}`, ErrorCode.PERMISSION_DENIED, path, cause)
    Object.setPrototypeOf(this, PermissionDeniedError.prototype)
  }
}

/**
 * Error thrown for network-related failures of a remote store
 */
export class NetworkError extends StorageError {
  override readonly name = 'NetworkError'

  constructor(message: string, path?: string, cause?: Error) {
    super(message, ErrorCode.NETWORK_ERROR, path, cause)
    Object.setPrototypeOf(this, NetworkError.prototype)
  }
}

/**
 * Error thrown when a path or location is malformed
 */
export class InvalidPathError extends StorageError {
  override readonly name = 'InvalidPathError'

  constructor(path: string, reason?: string, cause?: Error) {
    const reasonPart = reason ? `: ${reason}` : ''
    super(`Invalid path: ${path}${reasonPart}`, ErrorCode.INVALID_PATH, path, cause)
    Object.setPrototypeOf(this, InvalidPathError.prototype)
  }
}

/**
 * Error thrown when a path traversal attempt is detected
 */
export class PathTraversalError extends StorageError {
  override readonly name = 'PathTraversalError'

  constructor(path: string, cause?: Error) {
    super(`Path traversal attempt detected: ${path}`, ErrorCode.PATH_TRAVERSAL, path, cause)
    Object.setPrototypeOf(this, PathTraversalError.prototype)
  }
}

// =============================================================================
// Type Guards
// =============================================================================

export function isNotFoundError(error: unknown): error is NotFoundError {
  return error instanceof NotFoundError
}

/**
 * Check if a thrown value is a Node.js system error with the given code
 */
export function hasErrorCode(error: unknown, code: string): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === code
}
