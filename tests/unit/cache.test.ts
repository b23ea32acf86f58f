/**
 * LRUCache and IndexCache Test Suite
 */

import { describe, it, expect, vi } from 'vitest'
import { LRUCache } from '../../src/utils/lru-cache'
import { IndexCache } from '../../src/server/cache'
import { IndexStore } from '../../src/store/IndexStore'
import { createFileIndex, type FileIndex } from '../../src/indexes/file-index'
import { StoreReadError } from '../../src/errors'

describe('LRUCache', () => {
  it('should evict the least recently used entry', () => {
    const evicted: string[] = []
    const cache = new LRUCache<string, number>({ maxEntries: 2, onEvict: key => evicted.push(key) })
    cache.set('a', 1)
    cache.set('b', 2)
    cache.get('a')
    cache.set('c', 3)

    expect(evicted).toEqual(['b'])
    expect([...cache.keys()]).toEqual(['c', 'a'])
    expect(cache.peek('b')).toBeUndefined()
  })

  it('should update values in place', () => {
    const cache = new LRUCache<string, number>({ maxEntries: 2 })
    cache.set('a', 1).set('a', 5)
    expect(cache.size).toBe(1)
    expect(cache.peek('a')).toBe(5)
  })

  it('should not count peeks as accesses', () => {
    const cache = new LRUCache<string, number>()
    cache.set('a', 1)
    cache.peek('a')
    cache.get('a')
    cache.get('missing')
    expect(cache.getStats()).toEqual({ hits: 1, misses: 1, evictions: 0, size: 1, maxEntries: 0, hitRate: 0.5 })
  })

  it('should delete entries', () => {
    const cache = new LRUCache<string, number>()
    cache.set('a', 1).set('b', 2)
    expect(cache.delete('a')).toBe(true)
    expect(cache.delete('a')).toBe(false)
    expect([...cache.keys()]).toEqual(['b'])
    expect(cache.size).toBe(1)
  })
})

function fakeIndex(sourcePath: string): FileIndex {
  return createFileIndex({ sourcePath, columns: [], errorRate: 0.1, rangeFilterThreshold: 1000 })
}

describe('IndexCache', () => {
  function storeAt(version: string | null = 'v1'): IndexStore {
    const store = new IndexStore()
    vi.spyOn(store, 'version').mockResolvedValue(version)
    return store
  }

  it('should share one read between concurrent lookups', async () => {
    const store = storeAt()
    const read = vi.spyOn(store, 'read').mockImplementation(async location => fakeIndex(location))
    const cache = new IndexCache(store)

    const [a, b] = await Promise.all([cache.get('memory://i/a.bsidx'), cache.get('memory://i/a.bsidx')])
    expect(a).toBe(b)
    expect(read).toHaveBeenCalledTimes(1)

    await cache.get('memory://i/a.bsidx')
    expect(read).toHaveBeenCalledTimes(1)
    expect(cache.getStats().hits).toBe(2)
  })

  it('should drop failed reads so they are retried', async () => {
    const store = storeAt()
    const read = vi
      .spyOn(store, 'read')
      .mockRejectedValueOnce(new StoreReadError('memory://i/a.bsidx', 'not found'))
      .mockImplementation(async location => fakeIndex(location))
    const cache = new IndexCache(store)

    await expect(cache.get('memory://i/a.bsidx')).rejects.toBeInstanceOf(StoreReadError)
    expect(cache.size).toBe(0)

    const index = await cache.get('memory://i/a.bsidx')
    expect(index.sourcePath).toBe('memory://i/a.bsidx')
    expect(read).toHaveBeenCalledTimes(2)
  })

  it('should keep at most maxEntries indexes', async () => {
    const store = storeAt()
    vi.spyOn(store, 'read').mockImplementation(async location => fakeIndex(location))
    const cache = new IndexCache(store, { maxEntries: 2 })

    await cache.get('a')
    await cache.get('b')
    await cache.get('c')
    expect(cache.size).toBe(2)
    expect(cache.getStats().evictions).toBe(1)
  })

  it('should read the index again once its file changed', async () => {
    const store = new IndexStore()
    const version = vi.spyOn(store, 'version').mockResolvedValueOnce('v1').mockResolvedValueOnce('v1').mockResolvedValue('v2')
    const read = vi.spyOn(store, 'read').mockImplementation(async location => fakeIndex(location))
    const cache = new IndexCache(store)

    const first = await cache.get('a')
    expect(await cache.get('a')).toBe(first)
    const rebuilt = await cache.get('a')

    expect(rebuilt).not.toBe(first)
    expect(read).toHaveBeenCalledTimes(2)
    expect(version).toHaveBeenCalledTimes(3)
    expect(cache.size).toBe(1)
  })

  it('should surface version failures', async () => {
    const store = new IndexStore()
    vi.spyOn(store, 'version').mockRejectedValue(new StoreReadError('a', 'access denied'))
    const read = vi.spyOn(store, 'read')
    const cache = new IndexCache(store)

    await expect(cache.get('a')).rejects.toThrow('Cannot read index a: access denied')
    expect(read).not.toHaveBeenCalled()
  })
})
