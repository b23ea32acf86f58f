/**
 * Column indexes
 *
 * Every indexed column carries exactly one of two structures:
 *
 * - MembershipIndex: a bloom filter over the column's distinct values,
 *   used for low-cardinality columns
 * - RangeIndex: the inclusive min/max of the column's values, used once the
 *   distinct count reaches the range filter threshold
 *
 * Both answer `contains(value)` with no false negatives.
 */

import { BloomFilter } from './bloom/bloom-filter'
import {
  boundKey,
  compareOrderKeys,
  familyOf,
  hashKey,
  isNullValue,
  orderKey,
  type OrderedValue,
} from './values'

// =============================================================================
// MembershipIndex
// =============================================================================

export class MembershipIndex {
  readonly kind = 'membership' as const

  constructor(
    readonly filter: BloomFilter,
    /** Number of distinct values inserted at build time */
    readonly insertedCount: number
  ) {}

  /**
   * Build a filter sized for `values` at `errorRate` holding every value
   */
  static of(values: Iterable<unknown>, count: number, errorRate: number): MembershipIndex {
    const filter = BloomFilter.forCapacity(count, errorRate)
    let inserted = 0
    for (const value of values) {
      filter.add(hashKey(value))
      inserted++
    }
    return new MembershipIndex(filter, inserted)
  }

  contains(value: unknown): boolean {
    if (this.insertedCount === 0) {
      return false
    }
    return this.filter.mightContain(hashKey(value))
  }
}

// =============================================================================
// RangeIndex
// =============================================================================

export interface RangeBounds {
  min: OrderedValue
  max: OrderedValue
}

export class RangeIndex {
  readonly kind = 'range' as const

  constructor(
    /** Inclusive bounds of the non-null values; null when the column held only nulls */
    readonly bounds: RangeBounds | null,
    readonly hasNulls: boolean
  ) {
    if (bounds && familyOf(bounds.min) !== familyOf(bounds.max)) {
      throw new TypeError('Range bounds must belong to the same family')
    }
  }

  /**
   * True iff the value lies within [min, max] under the column's ordering,
   * or is null and the column held nulls
   */
  contains(value: unknown): boolean {
    if (isNullValue(value)) {
      return this.hasNulls
    }
    if (!this.bounds) {
      return false
    }

    const key = orderKey(value)
    if (!key || key.family !== familyOf(this.bounds.min)) {
      return false
    }

    return (
      compareOrderKeys(boundKey(this.bounds.min), key) <= 0 &&
      compareOrderKeys(key, boundKey(this.bounds.max)) <= 0
    )
  }
}

// =============================================================================
// ColumnIndex
// =============================================================================

export type ColumnIndex = MembershipIndex | RangeIndex

export type ColumnIndexKind = ColumnIndex['kind']
