/**
 * IndexStore Test Suite
 */

import { describe, it, expect, beforeEach } from 'vitest'
import { IndexStore } from '../../src/store/IndexStore'
import { StorageRouter } from '../../src/storage/router'
import { ColumnIndexBuilder } from '../../src/indexes/builder'
import { createFileIndex, type FileIndex } from '../../src/indexes/file-index'
import { ErrorCode, StoreReadError, StoreWriteError } from '../../src/errors'

function indexOf(sourcePath: string, statuses: string[]): FileIndex {
  const builder = new ColumnIndexBuilder({ errorRate: 0.01 })
  return createFileIndex({
    sourcePath,
    errorRate: builder.errorRate,
    rangeFilterThreshold: builder.rangeFilterThreshold,
    columns: [['account_status', builder.build(statuses)]],
  })
}

describe('IndexStore', () => {
  let router: StorageRouter
  let store: IndexStore

  beforeEach(() => {
    router = new StorageRouter()
    store = new IndexStore({ router })
  })

  it('should write and read back an index', async () => {
    const original = indexOf('/data/APAC_AUS_1.parquet', ['Active'])
    await store.write(original, 'memory://idx/daily/APAC_AUS_1.bsidx')

    const loaded = await store.read('memory://idx/daily/APAC_AUS_1.bsidx')
    expect(loaded.sourcePath).toBe('/data/APAC_AUS_1.parquet')
    expect(loaded.createdAt.getTime()).toBe(original.createdAt.getTime())
    expect(loaded.columns.get('account_status')?.contains('Active')).toBe(true)
  })

  it('should raise StoreReadError for a missing location', async () => {
    const error = await store.read('memory://idx/missing.bsidx').catch((e: unknown) => e)
    expect(error).toBeInstanceOf(StoreReadError)
    expect(error instanceof StoreReadError && error.message).toBe('Cannot read index memory://idx/missing.bsidx: not found')
  })

  it('should raise StoreReadError for bytes that are not an index', async () => {
    await router.memoryStore('idx').write('junk.bsidx', new TextEncoder().encode('garbage bytes'))
    const error = await store.read('memory://idx/junk.bsidx').catch((e: unknown) => e)
    expect(error instanceof StoreReadError && error.code).toBe(ErrorCode.STORE_READ_ERROR)
  })

  it('should raise StoreWriteError for an invalid location', async () => {
    await expect(store.write(indexOf('a', []), 'memory:///a.bsidx')).rejects.toBeInstanceOf(StoreWriteError)
  })

  it('should list index files whose stem matches the pattern', async () => {
    for (const name of ['EMEA_GBR_0', 'APAC_AUS_1', 'APAC_AUS_0', 'APAC_JPN_0']) {
      await store.write(indexOf(`/data/${name}.parquet`, ['x']), `memory://idx/daily/${name}.bsidx`)
    }
    await router.memoryStore('idx').write('daily/APAC_notes.txt', new Uint8Array([1]))

    expect(await store.list('memory://idx/daily', 'APAC_AUS_*')).toEqual([
      'memory://idx/daily/APAC_AUS_0.bsidx',
      'memory://idx/daily/APAC_AUS_1.bsidx',
    ])
    expect(await store.list('memory://idx/daily', '*')).toHaveLength(4)
    expect(await store.list('memory://idx/daily', 'LATAM_*')).toEqual([])
    expect(await store.list('memory://idx/other', '*')).toEqual([])
  })

  it('should list with bracket classes in the pattern', async () => {
    for (const name of ['A_1', 'A_2', 'A_3']) {
      await store.write(indexOf(`/data/${name}.parquet`, ['x']), `memory://idx/${name}.bsidx`)
    }

    expect(await store.list('memory://idx', 'A_[12]')).toEqual(['memory://idx/A_1.bsidx', 'memory://idx/A_2.bsidx'])
    expect(await store.list('memory://idx', 'A_[!12]')).toEqual(['memory://idx/A_3.bsidx'])
  })

  it('should change the version when an index is rewritten', async () => {
    const location = 'memory://idx/daily/APAC_AUS_1.bsidx'
    expect(await store.version(location)).toBeNull()

    await store.write(indexOf('/data/APAC_AUS_1.parquet', ['Active']), location)
    const first = await store.version(location)
    expect(first).toEqual(expect.any(String))
    expect(await store.version(location)).toBe(first)

    await store.write(indexOf('/data/APAC_AUS_1.parquet', ['Inactive']), location)
    expect(await store.version(location)).not.toBe(first)
  })
})
