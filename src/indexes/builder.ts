/**
 * ColumnIndexBuilder - turns a column's values into a ColumnIndex
 *
 * Kind selection follows the column's distinct-value count:
 *
 * - `distinct < rangeFilterThreshold`: MembershipIndex sized for `distinct`
 *   keys at `errorRate`, holding every distinct value
 * - otherwise: RangeIndex over the min/max of the values
 *
 * An empty column has zero distinct values and yields an empty
 * MembershipIndex that contains nothing.
 *
 * @example
 * ```typescript
 * const builder = new ColumnIndexBuilder({ errorRate: 0.01, rangeFilterThreshold: 3 })
 * builder.build(['Active', 'Inactive']).kind // 'membership'
 * builder.build([5, 10, 20]).kind            // 'range'
 * ```
 */

import { DEFAULT_ERROR_RATE, DEFAULT_RANGE_FILTER_THRESHOLD } from '../constants'
import { ConfigurationError, InvalidColumnError } from '../errors'
import { MembershipIndex, RangeIndex, type ColumnIndex } from './column-index'
import {
  compareOrderKeys,
  describeValue,
  hashKey,
  isNullValue,
  orderKey,
  type OrderKey,
} from './values'

// =============================================================================
// Options
// =============================================================================

export interface ColumnIndexOptions {
  /** Target false-positive rate of membership indexes, in (0, 1) */
  errorRate: number
  /** Distinct-value count at which a column switches to a range index */
  rangeFilterThreshold: number
}

/**
 * Fill in defaults and reject out-of-range settings
 */
export function resolveIndexOptions(options: Partial<ColumnIndexOptions> = {}): ColumnIndexOptions {
  const errorRate = options.errorRate ?? DEFAULT_ERROR_RATE
  const rangeFilterThreshold = options.rangeFilterThreshold ?? DEFAULT_RANGE_FILTER_THRESHOLD

  if (!Number.isFinite(errorRate) || errorRate <= 0 || errorRate >= 1) {
    throw new ConfigurationError(`errorRate must be between 0 and 1 (exclusive), got ${errorRate}`, {
      configKey: 'errorRate',
      actualValue: errorRate,
    })
  }
  if (!Number.isSafeInteger(rangeFilterThreshold) || rangeFilterThreshold < 1) {
    throw new ConfigurationError(
      `rangeFilterThreshold must be a positive integer, got ${rangeFilterThreshold}`,
      { configKey: 'rangeFilterThreshold', actualValue: rangeFilterThreshold }
    )
  }

  return { errorRate, rangeFilterThreshold }
}

// =============================================================================
// ColumnIndexBuilder
// =============================================================================

export class ColumnIndexBuilder {
  readonly errorRate: number
  readonly rangeFilterThreshold: number

  constructor(options: Partial<ColumnIndexOptions> = {}) {
    const resolved = resolveIndexOptions(options)
    this.errorRate = resolved.errorRate
    this.rangeFilterThreshold = resolved.rangeFilterThreshold
  }

  /**
   * Build the index for one column's values
   *
   * @throws InvalidColumnError when a range index is selected for values
   *   without a common ordering
   */
  build(values: Iterable<unknown>): ColumnIndex {
    const distinct = new Map<string, unknown>()
    for (const value of values) {
      const key = hashKey(value)
      if (!distinct.has(key)) {
        distinct.set(key, value)
      }
    }

    if (distinct.size < this.rangeFilterThreshold) {
      return MembershipIndex.of(distinct.values(), distinct.size, this.errorRate)
    }
    return buildRange(distinct.values())
  }
}

function buildRange(values: Iterable<unknown>): RangeIndex {
  let hasNulls = false
  let min: OrderKey | undefined
  let max: OrderKey | undefined

  for (const value of values) {
    if (isNullValue(value)) {
      hasNulls = true
      continue
    }

    const key = orderKey(value)
    if (!key) {
      throw new InvalidColumnError(`${describeValue(value)} values have no ordering for a range index`)
    }
    if (min && min.family !== key.family) {
      throw new InvalidColumnError(`column mixes ${min.family} and ${key.family} values`)
    }

    if (!min || compareOrderKeys(key, min) < 0) min = key
    if (!max || compareOrderKeys(key, max) > 0) max = key
  }

  return new RangeIndex(min && max ? { min: min.value, max: max.value } : null, hasNulls)
}
