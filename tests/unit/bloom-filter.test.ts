/**
 * BloomFilter Test Suite
 */

import { describe, it, expect } from 'vitest'
import {
  BloomFilter,
  calculateOptimalParams,
  estimateFalsePositiveRate,
  murmurHash3,
} from '../../src/indexes/bloom'

describe('murmurHash3', () => {
  it('should return the reference hash of the empty key', () => {
    expect(murmurHash3(new Uint8Array(0), 0)).toBe(0)
    expect(murmurHash3(new Uint8Array(0), 1)).toBe(0x514e28b7)
  })

  it('should return unsigned 32-bit values', () => {
    const hash = murmurHash3(new TextEncoder().encode('account_status'), 0)
    expect(hash).toBeGreaterThanOrEqual(0)
    expect(hash).toBeLessThan(2 ** 32)
  })

  it('should depend on the seed', () => {
    const key = new TextEncoder().encode('APAC')
    expect(murmurHash3(key, 0)).not.toBe(murmurHash3(key, 42))
  })
})

describe('calculateOptimalParams', () => {
  it('should never allocate fewer than 64 bits', () => {
    expect(calculateOptimalParams(3, 0.01)).toEqual({ sizeBytes: 8, numHashFunctions: 7 })
    expect(calculateOptimalParams(0, 0.1)).toEqual({ sizeBytes: 8, numHashFunctions: 3 })
  })

  it('should grow with the number of items', () => {
    expect(calculateOptimalParams(1000, 0.01)).toEqual({ sizeBytes: 1199, numHashFunctions: 7 })
  })

  it('should use at least one hash function', () => {
    expect(calculateOptimalParams(10, 0.9).numHashFunctions).toBe(1)
  })
})

describe('estimateFalsePositiveRate', () => {
  it('should be zero for an empty filter', () => {
    expect(estimateFalsePositiveRate(8, 3, 0)).toBe(0)
  })

  it('should approach the sizing target', () => {
    const { sizeBytes, numHashFunctions } = calculateOptimalParams(1000, 0.01)
    const rate = estimateFalsePositiveRate(sizeBytes, numHashFunctions, 1000)
    expect(rate).toBeGreaterThan(0.005)
    expect(rate).toBeLessThan(0.015)
  })
})

describe('BloomFilter', () => {
  it('should reject non-positive sizes and hash counts', () => {
    expect(() => new BloomFilter(0, 3)).toThrow(RangeError)
    expect(() => new BloomFilter(8, 0)).toThrow(RangeError)
  })

  it('should report an empty filter as containing nothing', () => {
    const filter = BloomFilter.forCapacity(10, 0.01)
    expect(filter.mightContain('Active')).toBe(false)
  })

  it('should never give a false negative', () => {
    const filter = BloomFilter.forCapacity(500, 0.01)
    const keys = Array.from({ length: 500 }, (_, i) => `user-${i}`)
    keys.forEach(key => filter.add(key))

    for (const key of keys) {
      expect(filter.mightContain(key)).toBe(true)
    }
  })

  it('should keep false positives near the error rate', () => {
    const filter = BloomFilter.forCapacity(1000, 0.01)
    for (let i = 0; i < 1000; i++) {
      filter.add(`present-${i}`)
    }

    let falsePositives = 0
    for (let i = 0; i < 10000; i++) {
      if (filter.mightContain(`absent-${i}`)) falsePositives++
    }
    expect(falsePositives / 10000).toBeLessThan(0.03)
  })

  it('should survive a trip through its bit array', () => {
    const filter = BloomFilter.forCapacity(3, 0.01)
    filter.add('Active')
    filter.add('Inactive')

    const copy = BloomFilter.fromBuffer(filter.toBuffer(), filter.numHashFunctions)
    expect(copy.sizeBytes).toBe(8)
    expect(copy.numHashFunctions).toBe(7)
    expect(copy.mightContain('Active')).toBe(true)
    expect(copy.mightContain('Inactive')).toBe(true)
  })

  it('should hand out a copy of its bits', () => {
    const filter = new BloomFilter(8, 2)
    filter.toBuffer().fill(0xff)
    expect(filter.mightContain('anything')).toBe(false)
  })
})
