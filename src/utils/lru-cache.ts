/**
 * LRU Cache with an entry limit
 *
 * O(1) get/set/delete using a Map for lookup and a doubly-linked list for
 * recency order. Keeps hit/miss/eviction counters for diagnostics.
 *
 * @example
 * ```typescript
 * const cache = new LRUCache<string, FileIndex>({ maxEntries: 256 })
 * cache.set('/indexes/APAC_AUS_0.bsidx', index)
 * const hit = cache.get('/indexes/APAC_AUS_0.bsidx')
 * ```
 */

/**
 * Entry in the LRU cache with linked list pointers
 */
interface CacheEntry<K, V> {
  key: K
  value: V
  prev: CacheEntry<K, V> | null
  next: CacheEntry<K, V> | null
}

export interface LRUCacheOptions<K, V> {
  /** Maximum number of entries (0 or undefined = unlimited) */
  maxEntries?: number | undefined
  /** Callback when an entry is evicted due to the entry limit */
  onEvict?: ((key: K, value: V) => void) | undefined
}

export interface LRUCacheStats {
  hits: number
  misses: number
  /** Entries evicted due to the entry limit */
  evictions: number
  size: number
  /** Maximum entries allowed (0 = unlimited) */
  maxEntries: number
  /** hits / total accesses */
  hitRate: number
}

export class LRUCache<K, V> {
  private cache = new Map<K, CacheEntry<K, V>>()
  private head: CacheEntry<K, V> | null = null // Most recently used
  private tail: CacheEntry<K, V> | null = null // Least recently used

  private readonly maxEntries: number
  private readonly onEvict: ((key: K, value: V) => void) | undefined

  private hits = 0
  private misses = 0
  private evictions = 0

  constructor(options: LRUCacheOptions<K, V> = {}) {
    this.maxEntries = options.maxEntries ?? 0
    this.onEvict = options.onEvict
  }

  /**
   * Get a value, marking it as recently used
   */
  get(key: K): V | undefined {
    const entry = this.cache.get(key)
    if (!entry) {
      this.misses++
      return undefined
    }

    this.moveToHead(entry)
    this.hits++
    return entry.value
  }

  /**
   * Get a value without touching LRU order or stats
   */
  peek(key: K): V | undefined {
    return this.cache.get(key)?.value
  }

  /**
   * Set a value, evicting least recently used entries past the limit
   */
  set(key: K, value: V): this {
    const existing = this.cache.get(key)

    if (existing) {
      existing.value = value
      this.moveToHead(existing)
    } else {
      const entry: CacheEntry<K, V> = { key, value, prev: null, next: this.head }
      if (this.head) {
        this.head.prev = entry
      }
      this.head = entry
      if (!this.tail) {
        this.tail = entry
      }
      this.cache.set(key, entry)
    }

    this.evictIfNeeded()
    return this
  }

  delete(key: K): boolean {
    const entry = this.cache.get(key)
    if (!entry) {
      return false
    }
    this.removeEntry(entry)
    return true
  }

  get size(): number {
    return this.cache.size
  }

  getStats(): LRUCacheStats {
    const totalAccesses = this.hits + this.misses
    return {
      hits: this.hits,
      misses: this.misses,
      evictions: this.evictions,
      size: this.cache.size,
      maxEntries: this.maxEntries,
      hitRate: totalAccesses > 0 ? this.hits / totalAccesses : 0,
    }
  }

  /**
   * Iterate over keys, most recently used first
   */
  *keys(): IterableIterator<K> {
    let current = this.head
    while (current) {
      yield current.key
      current = current.next
    }
  }

  // ===========================================================================
  // Private helpers
  // ===========================================================================

  private moveToHead(entry: CacheEntry<K, V>): void {
    if (entry === this.head) {
      return
    }

    this.removeFromList(entry)

    entry.prev = null
    entry.next = this.head
    if (this.head) {
      this.head.prev = entry
    }
    this.head = entry

    if (!this.tail) {
      this.tail = entry
    }
  }

  /**
   * Remove entry from the linked list (but not from the Map)
   */
  private removeFromList(entry: CacheEntry<K, V>): void {
    if (entry.prev) {
      entry.prev.next = entry.next
    } else {
      this.head = entry.next
    }

    if (entry.next) {
      entry.next.prev = entry.prev
    } else {
      this.tail = entry.prev
    }

    entry.prev = null
    entry.next = null
  }

  private removeEntry(entry: CacheEntry<K, V>): void {
    this.removeFromList(entry)
    this.cache.delete(entry.key)
  }

  private evictIfNeeded(): void {
    while (this.tail && this.maxEntries > 0 && this.cache.size > this.maxEntries) {
      const evicted = this.tail
      this.removeEntry(evicted)
      this.evictions++
      this.onEvict?.(evicted.key, evicted.value)
    }
  }
}
