/**
 * Query model
 *
 * A query is a tree of rules combined with AND / OR groups. Rule trees
 * arrive as JSON and are parsed once into these types at ingress, so the
 * evaluator only ever sees well-formed trees.
 *
 * @example
 * ```typescript
 * const query: Query = {
 *   type: 'group',
 *   condition: 'AND',
 *   rules: [
 *     { type: 'rule', column: 'account_status', value: 'Active' },
 *     { type: 'group', condition: 'OR', rules: [
 *       { type: 'rule', column: 'region', value: 'APAC' },
 *       { type: 'rule', column: 'region', value: 'EMEA' },
 *     ] },
 *   ],
 * }
 * ```
 */

import type { JsonValue } from '../utils/json-validation'

/**
 * Value a rule looks for. Arrays and objects match a membership index built
 * over list or struct columns; range indexes never contain them.
 */
export type QueryValue = JsonValue

export type GroupCondition = 'AND' | 'OR'

/**
 * Leaf: "column may contain value"
 */
export interface QueryRule {
  type: 'rule'
  column: string
  value: QueryValue
}

/**
 * Inner node combining its children. Empty AND is true, empty OR is false.
 */
export interface QueryGroup {
  type: 'group'
  condition: GroupCondition
  rules: Query[]
}

export type Query = QueryRule | QueryGroup

// =============================================================================
// Wire shapes
// =============================================================================

export interface WireRule {
  column: string
  value: QueryValue
}

export interface WireGroup {
  condition: GroupCondition
  rules: WireQuery[]
}

/**
 * Query as it travels in a request body
 */
export type WireQuery = WireRule | WireGroup

// =============================================================================
// Builders
// =============================================================================

export function rule(column: string, value: QueryValue): QueryRule {
  return { type: 'rule', column, value }
}

export function and(...rules: Query[]): QueryGroup {
  return { type: 'group', condition: 'AND', rules }
}

export function or(...rules: Query[]): QueryGroup {
  return { type: 'group', condition: 'OR', rules }
}
