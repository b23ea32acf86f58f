/**
 * Bloom Filter Exports for bloomsift
 */

export {
  BloomFilter,
  murmurHash3,
  calculateOptimalParams,
  estimateFalsePositiveRate,
} from './bloom-filter'
