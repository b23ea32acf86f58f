/**
 * Search protocol
 *
 * One request per connection, JSON over HTTP:
 *
 * - request: `{ index_source, file_pattern, query }` where `query` is a wire
 *   rule tree (see query/types)
 * - success: JSON array of candidate source-file paths, in resolution order
 * - failure: `{ error: { kind, message } }` where `kind` is an ErrorCode
 *
 * Both sides of the protocol live here so the server and the client parse
 * exactly the same shapes.
 */

import { ErrorCode, ProtocolError, RemoteError, isBloomsiftError, isErrorCode } from '../errors'
import { parseQuery, toWireQuery } from '../query/parser'
import type { Query, WireQuery } from '../query/types'
import { Err, Ok, type Result } from '../types/result'
import { isRecord, isStringArray } from '../utils/json-validation'

// =============================================================================
// Types
// =============================================================================

export interface SearchRequest {
  /** Index directory or prefix, relative to the server's index root */
  indexSource: string
  /** Shell-glob matched against index file stems */
  filePattern: string
  query: Query
}

export interface WireSearchRequest {
  index_source: string
  file_pattern: string
  query: WireQuery
}

export type SearchResult = string[]

export interface ErrorPayload {
  error: {
    kind: ErrorCode
    message: string
  }
}

export interface HealthPayload {
  status: 'alive'
}

// =============================================================================
// Requests
// =============================================================================

/**
 * Validate an untrusted request body
 */
export function parseSearchRequest(raw: unknown): Result<SearchRequest, ProtocolError> {
  if (!isRecord(raw)) {
    return Err(new ProtocolError('request must be a JSON object'))
  }
  if (typeof raw.index_source !== 'string') {
    return Err(new ProtocolError('index_source must be a string', { field: 'index_source' }))
  }
  if (typeof raw.file_pattern !== 'string' || raw.file_pattern === '') {
    return Err(new ProtocolError('file_pattern must be a non-empty string', { field: 'file_pattern' }))
  }
  if (!('query' in raw)) {
    return Err(new ProtocolError('query is missing', { field: 'query' }))
  }

  const query = parseQuery(raw.query)
  if (!query.ok) {
    return query
  }
  return Ok({ indexSource: raw.index_source, filePattern: raw.file_pattern, query: query.value })
}

export function toWireRequest(request: SearchRequest): WireSearchRequest {
  return {
    index_source: request.indexSource,
    file_pattern: request.filePattern,
    query: toWireQuery(request.query),
  }
}

// =============================================================================
// Responses
// =============================================================================

/**
 * Error payload for any thrown value; unknown errors report as INTERNAL
 */
export function toErrorPayload(error: unknown): ErrorPayload {
  if (isBloomsiftError(error)) {
    return { error: { kind: error.code, message: error.message } }
  }
  const message = error instanceof Error ? error.message : String(error)
  return { error: { kind: ErrorCode.INTERNAL, message } }
}

/**
 * HTTP status for an error: 400 for malformed requests, 500 otherwise
 */
export function statusFor(error: unknown): 400 | 500 {
  return isBloomsiftError(error) && error.code === ErrorCode.PROTOCOL_ERROR ? 400 : 500
}

export function isErrorPayload(value: unknown): value is ErrorPayload {
  return (
    isRecord(value) &&
    isRecord(value.error) &&
    isErrorCode(value.error.kind) &&
    typeof value.error.message === 'string'
  )
}

/**
 * Interpret a response body
 *
 * @throws RemoteError when the body is an error payload
 * @throws ProtocolError when the body is neither a result nor an error payload
 */
export function parseSearchResponse(body: unknown): SearchResult {
  if (isStringArray(body)) {
    return body
  }
  if (isErrorPayload(body)) {
    throw new RemoteError(body.error.kind, body.error.message)
  }
  throw new ProtocolError('response is neither a list of file paths nor an error payload')
}
