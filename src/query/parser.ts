/**
 * Query parser
 *
 * Validates an untrusted rule tree and converts it into the Query union.
 * Wire groups are `{ condition, rules }` and wire leaves `{ column, value }`.
 * The condition is matched case-insensitively.
 */

import { ProtocolError } from '../errors'
import { Err, Ok, type Result } from '../types/result'
import { isJsonValue, isRecord } from '../utils/json-validation'
import type { GroupCondition, Query, WireQuery } from './types'

/**
 * Deepest group nesting accepted from the wire. Parsing and evaluation
 * recurse once per group, so this bounds the call stack.
 */
export const MAX_QUERY_DEPTH = 1000

/**
 * Parse an untrusted rule tree
 */
export function parseQuery(raw: unknown): Result<Query, ProtocolError> {
  try {
    return Ok(parseNode(raw, 'query', 0))
  } catch (error: unknown) {
    if (error instanceof ProtocolError) {
      return Err(error)
    }
    throw error
  }
}

/**
 * Convert a parsed query back to its wire shape
 */
export function toWireQuery(query: Query): WireQuery {
  if (query.type === 'rule') {
    return { column: query.column, value: query.value }
  }
  return { condition: query.condition, rules: query.rules.map(toWireQuery) }
}

function parseNode(raw: unknown, path: string, depth: number): Query {
  if (!isRecord(raw)) {
    throw new ProtocolError(`${path} must be an object`, { path })
  }

  if ('condition' in raw || 'rules' in raw) {
    if (depth >= MAX_QUERY_DEPTH) {
      throw new ProtocolError(`${path} nests deeper than ${MAX_QUERY_DEPTH} groups`, { path })
    }
    const condition = parseCondition(raw.condition, path)
    if (!Array.isArray(raw.rules)) {
      throw new ProtocolError(`${path}.rules must be an array`, { path })
    }
    const rules = raw.rules.map((child: unknown, i: number) => parseNode(child, `${path}.rules[${i}]`, depth + 1))
    return { type: 'group', condition, rules }
  }

  if (typeof raw.column !== 'string' || raw.column === '') {
    throw new ProtocolError(`${path}.column must be a non-empty string`, { path })
  }
  if (!('value' in raw)) {
    throw new ProtocolError(`${path}.value is missing`, { path })
  }
  const value = raw.value
  if (!isJsonValue(value)) {
    throw new ProtocolError(`${path}.value must be a JSON value`, { path })
  }
  return { type: 'rule', column: raw.column, value }
}

function parseCondition(raw: unknown, path: string): GroupCondition {
  const condition = typeof raw === 'string' ? raw.toUpperCase() : raw
  if (condition === 'AND' || condition === 'OR') {
    return condition
  }
  throw new ProtocolError(`${path}.condition must be "AND" or "OR"`, { path, condition: raw })
}
