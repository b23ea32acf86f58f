/**
 * Query Module for bloomsift
 *
 * Rule trees, their parser, and the evaluator that checks a tree against
 * one file's column indexes.
 */

export {
  rule,
  and,
  or,
  type Query,
  type QueryRule,
  type QueryGroup,
  type QueryValue,
  type GroupCondition,
  type WireQuery,
  type WireRule,
  type WireGroup,
} from './types'
export { parseQuery, toWireQuery, MAX_QUERY_DEPTH } from './parser'
export { evaluate, explain, formatExplanation, type Explanation } from './evaluator'
