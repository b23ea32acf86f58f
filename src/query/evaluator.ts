/**
 * QueryEvaluator - decides whether a file may match a query
 *
 * Rules probe the file's column indexes; groups combine their children
 * left to right with short-circuiting:
 *
 * - rule: false when the column is not indexed, else `column.contains(value)`
 * - AND: every child true (an empty AND is true)
 * - OR: some child true (an empty OR is false)
 *
 * Indexes never give false negatives, so `false` means the file certainly
 * holds no matching row while `true` means it might.
 */

import type { FileIndex } from '../indexes/file-index'
import type { ColumnIndexKind } from '../indexes/column-index'
import type { GroupCondition, Query, QueryValue } from './types'

export function evaluate(query: Query, index: FileIndex): boolean {
  if (query.type === 'rule') {
    const column = index.columns.get(query.column)
    return column !== undefined && column.contains(query.value)
  }

  if (query.condition === 'AND') {
    return query.rules.every(child => evaluate(child, index))
  }
  return query.rules.some(child => evaluate(child, index))
}

// =============================================================================
// Explain
// =============================================================================

export type Explanation =
  | {
      type: 'rule'
      column: string
      value: QueryValue
      /** Kind of index probed; absent when the column is not indexed */
      index?: ColumnIndexKind | undefined
      result: boolean
    }
  | {
      type: 'group'
      condition: GroupCondition
      children: Explanation[]
      result: boolean
    }

/**
 * Evaluate every node (without short-circuiting) and report each verdict
 */
export function explain(query: Query, index: FileIndex): Explanation {
  if (query.type === 'rule') {
    const column = index.columns.get(query.column)
    return {
      type: 'rule',
      column: query.column,
      value: query.value,
      index: column?.kind,
      result: column !== undefined && column.contains(query.value),
    }
  }

  const children = query.rules.map(child => explain(child, index))
  const result = query.condition === 'AND'
    ? children.every(child => child.result)
    : children.some(child => child.result)
  return { type: 'group', condition: query.condition, children, result }
}

/**
 * Render an explanation as indented lines
 */
export function formatExplanation(explanation: Explanation, indent = ''): string[] {
  const verdict = explanation.result ? 'maybe' : 'no'
  if (explanation.type === 'rule') {
    const probe = explanation.index ?? 'not indexed'
    return [`${indent}${explanation.column} = ${JSON.stringify(explanation.value)} [${probe}] -> ${verdict}`]
  }
  return [
    `${indent}${explanation.condition} -> ${verdict}`,
    ...explanation.children.flatMap(child => formatExplanation(child, indent + '  ')),
  ]
}
