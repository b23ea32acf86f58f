/**
 * Bloom Filter Implementation for bloomsift
 *
 * A space-efficient probabilistic set: `mightContain` never answers false for
 * an added key, and answers true for an absent key with a probability bounded
 * by the error rate the filter was sized for. Hashing is MurmurHash3 (32-bit)
 * with double hashing.
 *
 * The filter itself is a plain bit array; its wire layout is owned by the
 * index codec, which stores the bit count implicitly as `sizeBytes * 8`
 * alongside the hash count.
 */

import { MIN_BLOOM_BITS } from '../../constants'

// =============================================================================
// MurmurHash3 Implementation
// =============================================================================

/**
 * MurmurHash3 32-bit implementation
 */
export function murmurHash3(key: Uint8Array, seed: number): number {
  const c1 = 0xcc9e2d51
  const c2 = 0x1b873593
  const r1 = 15
  const r2 = 13
  const m = 5
  const n = 0xe6546b64

  let hash = seed
  const len = key.length
  const numBlocks = Math.floor(len / 4)

  // Process 4-byte blocks
  for (let i = 0; i < numBlocks; i++) {
    let k =
      key[i * 4] |
      (key[i * 4 + 1] << 8) |
      (key[i * 4 + 2] << 16) |
      (key[i * 4 + 3] << 24)

    k = Math.imul(k, c1)
    k = (k << r1) | (k >>> (32 - r1))
    k = Math.imul(k, c2)

    hash ^= k
    hash = (hash << r2) | (hash >>> (32 - r2))
    hash = Math.imul(hash, m) + n
  }

  // Tail bytes
  const tail = len - numBlocks * 4
  let k1 = 0
  if (tail >= 3) {
    k1 ^= key[numBlocks * 4 + 2] << 16
  }
  if (tail >= 2) {
    k1 ^= key[numBlocks * 4 + 1] << 8
  }
  if (tail >= 1) {
    k1 ^= key[numBlocks * 4]
    k1 = Math.imul(k1, c1)
    k1 = (k1 << r1) | (k1 >>> (32 - r1))
    k1 = Math.imul(k1, c2)
    hash ^= k1
  }

  // Finalization
  hash ^= len
  hash ^= hash >>> 16
  hash = Math.imul(hash, 0x85ebca6b)
  hash ^= hash >>> 13
  hash = Math.imul(hash, 0xc2b2ae35)
  hash ^= hash >>> 16

  return hash >>> 0
}

/**
 * Bit positions for a key using double hashing: h(i) = h1 + i * h2
 */
function getHashes(key: Uint8Array, numHashes: number, filterBits: number): number[] {
  const h1 = murmurHash3(key, 0)
  const h2 = murmurHash3(key, h1)

  const hashes: number[] = []
  for (let i = 0; i < numHashes; i++) {
    hashes.push(((h1 + Math.imul(i, h2)) >>> 0) % filterBits)
  }
  return hashes
}

const textEncoder = new TextEncoder()

// =============================================================================
// Optimal Parameters Calculator
// =============================================================================

/**
 * Bloom filter parameters for `expectedItems` keys at `falsePositiveRate`.
 *
 * Bits: m = max(64, ceil(n * ln(1/p) / ln(2)^2)), rounded up to whole bytes.
 * Hash functions: k = max(1, round(log2(1/p))).
 */
export function calculateOptimalParams(
  expectedItems: number,
  falsePositiveRate: number
): { sizeBytes: number; numHashFunctions: number } {
  const n = Math.max(0, expectedItems)
  const m = Math.max(
    MIN_BLOOM_BITS,
    Math.ceil((n * Math.log(1 / falsePositiveRate)) / Math.pow(Math.log(2), 2))
  )
  const k = Math.round(Math.log2(1 / falsePositiveRate))

  return {
    sizeBytes: Math.ceil(m / 8),
    numHashFunctions: Math.max(1, k),
  }
}

/**
 * Estimate false positive rate for given parameters
 */
export function estimateFalsePositiveRate(
  sizeBytes: number,
  numHashFunctions: number,
  expectedItems: number
): number {
  const m = sizeBytes * 8
  const k = numHashFunctions
  const n = expectedItems

  // FPR = (1 - e^(-kn/m))^k
  return Math.pow(1 - Math.exp((-k * n) / m), k)
}

// =============================================================================
// BloomFilter Class
// =============================================================================

export class BloomFilter {
  private readonly bits: Uint8Array
  private readonly hashCount: number
  private readonly numBits: number

  constructor(sizeBytes: number, numHashFunctions: number) {
    if (!Number.isInteger(sizeBytes) || sizeBytes <= 0) {
      throw new RangeError(`Bloom filter size must be a positive number of bytes, got ${sizeBytes}`)
    }
    if (!Number.isInteger(numHashFunctions) || numHashFunctions <= 0) {
      throw new RangeError(`Bloom filter needs at least one hash function, got ${numHashFunctions}`)
    }
    this.bits = new Uint8Array(sizeBytes)
    this.hashCount = numHashFunctions
    this.numBits = sizeBytes * 8
  }

  /**
   * Create a filter sized for `capacity` keys at `errorRate`
   */
  static forCapacity(capacity: number, errorRate: number): BloomFilter {
    const { sizeBytes, numHashFunctions } = calculateOptimalParams(capacity, errorRate)
    return new BloomFilter(sizeBytes, numHashFunctions)
  }

  /**
   * Create a bloom filter from an existing bit array
   */
  static fromBuffer(buffer: Uint8Array, numHashFunctions: number): BloomFilter {
    const filter = new BloomFilter(buffer.length, numHashFunctions)
    filter.bits.set(buffer)
    return filter
  }

  /**
   * Add a string key
   */
  add(key: string): void {
    for (const hash of getHashes(textEncoder.encode(key), this.hashCount, this.numBits)) {
      this.bits[hash >>> 3] |= 1 << (hash & 7)
    }
  }

  /**
   * Check if a string key might be in the filter
   * @returns true if the key might exist, false if it definitely does not
   */
  mightContain(key: string): boolean {
    for (const hash of getHashes(textEncoder.encode(key), this.hashCount, this.numBits)) {
      if ((this.bits[hash >>> 3] & (1 << (hash & 7))) === 0) {
        return false
      }
    }
    return true
  }

  /**
   * Copy of the underlying bit array
   */
  toBuffer(): Uint8Array {
    return new Uint8Array(this.bits)
  }

  get sizeBytes(): number {
    return this.bits.length
  }

  get numHashFunctions(): number {
    return this.hashCount
  }
}
