/**
 * JSON Validation Utilities
 *
 * Type-safe JSON parsing with runtime validation, used for untrusted JSON:
 * request bodies, server responses and config files.
 *
 * @module utils/json-validation
 */

import { Err, Ok, type Result } from '../types/result'

// =============================================================================
// Type Guards
// =============================================================================

/**
 * Check if a value is a plain object (not null, array, or other types)
 */
export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

export function isString(value: unknown): value is string {
  return typeof value === 'string'
}

/**
 * Check if a value is an array of strings
 */
export function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every(isString)
}

/**
 * Any value JSON can carry
 */
export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue }

/**
 * Check if a value is JSON data: scalars with finite numbers, arrays and
 * plain objects of the same
 */
export function isJsonValue(value: unknown): value is JsonValue {
  if (value === null || typeof value === 'string' || typeof value === 'boolean') {
    return true
  }
  if (typeof value === 'number') {
    return Number.isFinite(value)
  }
  if (Array.isArray(value)) {
    return value.every(isJsonValue)
  }
  return isRecord(value) && Object.values(value).every(isJsonValue)
}

// =============================================================================
// Parsing
// =============================================================================

/**
 * Error returned when JSON text does not parse
 */
export class JsonParseError extends Error {
  override readonly name = 'JsonParseError'

  constructor(
    message: string,
    readonly input: string,
    override readonly cause?: Error
  ) {
    super(message)
  }
}

/**
 * Parse JSON without throwing
 *
 * @example
 * ```typescript
 * const result = safeJsonParse(text)
 * if (!result.ok) {
 *   throw new ProtocolError(result.error.message)
 * }
 * ```
 */
export function safeJsonParse(json: string): Result<unknown, JsonParseError> {
  try {
    const value: unknown = JSON.parse(json)
    return Ok(value)
  } catch (error: unknown) {
    const cause = error instanceof Error ? error : new Error(String(error))
    const preview = json.length > 80 ? json.slice(0, 80) + '...' : json
    return Err(new JsonParseError(`Invalid JSON: ${cause.message} (input: ${preview})`, json, cause))
  }
}
