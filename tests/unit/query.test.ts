/**
 * Query parser and evaluator Test Suite
 */

import { describe, it, expect } from 'vitest'
import { MAX_QUERY_DEPTH, parseQuery, toWireQuery } from '../../src/query/parser'
import { evaluate, explain, formatExplanation } from '../../src/query/evaluator'
import { and, or, rule, type Query } from '../../src/query/types'
import { ColumnIndexBuilder } from '../../src/indexes/builder'
import { createFileIndex, type FileIndex } from '../../src/indexes/file-index'
import { ProtocolError } from '../../src/errors'

function parse(raw: unknown): Query {
  const result = parseQuery(raw)
  if (!result.ok) {
    throw result.error
  }
  return result.value
}

function parseError(raw: unknown): ProtocolError {
  const result = parseQuery(raw)
  if (result.ok) {
    throw new Error('expected the query to be rejected')
  }
  return result.error
}

function nested(depth: number): unknown {
  let node: unknown = { column: 'a', value: 1 }
  for (let i = 0; i < depth; i++) {
    node = { condition: 'AND', rules: [node] }
  }
  return node
}

// =============================================================================
// Parser
// =============================================================================

describe('parseQuery', () => {
  it('should parse groups and rules recursively', () => {
    expect(
      parse({
        condition: 'AND',
        rules: [
          { column: 'account_status', value: 'Inactive' },
          { condition: 'OR', rules: [{ column: 'region', value: 'APAC' }, { column: 'tier', value: 2 }] },
        ],
      })
    ).toEqual(and(rule('account_status', 'Inactive'), or(rule('region', 'APAC'), rule('tier', 2))))
  })

  it('should accept a bare rule', () => {
    expect(parse({ column: 'active', value: true })).toEqual(rule('active', true))
  })

  it('should match the condition case-insensitively', () => {
    expect(parse({ condition: 'or', rules: [] })).toEqual(or())
  })

  it('should accept null values', () => {
    expect(parse({ column: 'deleted_at', value: null })).toEqual(rule('deleted_at', null))
  })

  it('should reject an unknown condition', () => {
    expect(parseError({ condition: 'XOR', rules: [] }).message).toBe('query.condition must be "AND" or "OR"')
  })

  it('should reject rules that are not an array', () => {
    expect(parseError({ condition: 'AND', rules: {} }).message).toBe('query.rules must be an array')
  })

  it('should point at the offending node', () => {
    const error = parseError({ condition: 'AND', rules: [{ column: 'a', value: 1 }, { column: '', value: 1 }] })
    expect(error.message).toBe('query.rules[1].column must be a non-empty string')
    expect(error.context).toEqual({ path: 'query.rules[1]' })
  })

  it('should reject a rule without a value', () => {
    expect(parseError({ column: 'a' }).message).toBe('query.value is missing')
  })

  it('should accept array and object values', () => {
    expect(parse({ column: 'tags', value: ['a', 'b'] })).toEqual(rule('tags', ['a', 'b']))
    expect(parse({ column: 'point', value: { x: 1, y: [2, null] } })).toEqual(rule('point', { x: 1, y: [2, null] }))
  })

  it('should reject values JSON cannot carry', () => {
    expect(parseError({ column: 'a', value: undefined }).message).toBe('query.value must be a JSON value')
    expect(parseError({ column: 'a', value: [1, Number.NaN] }).message).toBe('query.value must be a JSON value')
    expect(parseError({ column: 'a', value: { b: () => 1 } })).toBeInstanceOf(ProtocolError)
  })

  it('should reject non-objects', () => {
    expect(parseError('AND').message).toBe('query must be an object')
    expect(parseError(null)).toBeInstanceOf(ProtocolError)
  })

  it('should limit nesting depth', () => {
    expect(MAX_QUERY_DEPTH).toBe(1000)
    expect(parseQuery(nested(MAX_QUERY_DEPTH)).ok).toBe(true)
    expect(parseError(nested(MAX_QUERY_DEPTH + 1)).message).toBe(
      `query${'.rules[0]'.repeat(MAX_QUERY_DEPTH)} nests deeper than ${MAX_QUERY_DEPTH} groups`
    )
  })

  it('should parse and evaluate a query of several hundred groups', () => {
    const file = createFileIndex({
      sourcePath: 'f',
      errorRate: 0.01,
      rangeFilterThreshold: 3,
      columns: [['a', new ColumnIndexBuilder({ rangeFilterThreshold: 3 }).build([1])]],
    })
    expect(evaluate(parse(nested(500)), file)).toBe(true)
  })

  it('should convert back to the wire shape', () => {
    const wire = { condition: 'AND', rules: [{ column: 'a', value: 1 }, { condition: 'OR', rules: [] }] }
    expect(toWireQuery(parse(wire))).toEqual(wire)
  })
})

// =============================================================================
// Evaluator
// =============================================================================

describe('evaluate', () => {
  const builder = new ColumnIndexBuilder({ errorRate: 0.01, rangeFilterThreshold: 3 })

  function fileWith(columns: Record<string, unknown[]>): FileIndex {
    return createFileIndex({
      sourcePath: 'memory://data/f.parquet',
      errorRate: builder.errorRate,
      rangeFilterThreshold: builder.rangeFilterThreshold,
      columns: Object.entries(columns).map(([name, values]) => [name, builder.build(values)] as const),
    })
  }

  const file = fileWith({
    account_status: ['Active', 'Inactive'],
    amount: [5, 10, 20],
  })

  it('should probe membership indexes', () => {
    expect(evaluate(rule('account_status', 'Inactive'), file)).toBe(true)
    expect(evaluate(rule('account_status', 'Closed'), file)).toBe(false)
  })

  it('should probe range indexes', () => {
    expect(evaluate(rule('amount', 7), file)).toBe(true)
    expect(evaluate(rule('amount', 21), file)).toBe(false)
  })

  it('should match array values against a membership index of lists', () => {
    const lists = fileWith({ tags: [['red', 'blue'], ['green']], ids: [[1n, 2n]] })
    expect(evaluate(rule('tags', ['red', 'blue']), lists)).toBe(true)
    expect(evaluate(rule('ids', [1, 2]), lists)).toBe(true)
  })

  it('should not find array values in a range index', () => {
    expect(evaluate(rule('amount', [5, 10]), file)).toBe(false)
  })

  it('should treat an unindexed column as no match', () => {
    expect(evaluate(rule('region', 'APAC'), file)).toBe(false)
  })

  it('should combine AND and OR groups', () => {
    expect(evaluate(and(rule('account_status', 'Active'), rule('amount', 7)), file)).toBe(true)
    expect(evaluate(and(rule('account_status', 'Active'), rule('amount', 21)), file)).toBe(false)
    expect(evaluate(or(rule('amount', 21), rule('account_status', 'Active')), file)).toBe(true)
    expect(evaluate(or(rule('amount', 21), rule('region', 'x')), file)).toBe(false)
  })

  it('should treat an empty AND as true and an empty OR as false', () => {
    expect(evaluate(and(), file)).toBe(true)
    expect(evaluate(or(), file)).toBe(false)
    expect(evaluate(and(or()), file)).toBe(false)
  })

  it('should evaluate nested groups', () => {
    const query = or(and(rule('amount', 100), rule('account_status', 'Active')), and(rule('amount', 10), or(rule('account_status', 'Inactive'))))
    expect(evaluate(query, file)).toBe(true)
  })
})

describe('explain', () => {
  const builder = new ColumnIndexBuilder({ errorRate: 0.01, rangeFilterThreshold: 3 })
  const file = createFileIndex({
    sourcePath: 'f',
    errorRate: 0.01,
    rangeFilterThreshold: 3,
    columns: [
      ['status', builder.build(['Active'])],
      ['amount', builder.build([5, 10, 20])],
    ],
  })

  it('should report every rule without short-circuiting', () => {
    const explanation = explain(and(rule('amount', 99), rule('status', 'Active'), rule('region', 'EU')), file)
    expect(explanation).toEqual({
      type: 'group',
      condition: 'AND',
      result: false,
      children: [
        { type: 'rule', column: 'amount', value: 99, index: 'range', result: false },
        { type: 'rule', column: 'status', value: 'Active', index: 'membership', result: true },
        { type: 'rule', column: 'region', value: 'EU', index: undefined, result: false },
      ],
    })
  })

  it('should agree with evaluate', () => {
    const query = or(rule('amount', 10), rule('status', 'Closed'))
    expect(explain(query, file).result).toBe(evaluate(query, file))
  })

  it('should format as indented lines', () => {
    const lines = formatExplanation(explain(or(rule('amount', 10), rule('region', 'EU')), file))
    expect(lines).toEqual([
      'OR -> maybe',
      '  amount = 10 [range] -> maybe',
      '  region = "EU" [not indexed] -> no',
    ])
  })
})
