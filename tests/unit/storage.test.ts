/**
 * Storage backends and location router Test Suite
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { mkdtemp, mkdir, rm, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { FsBackend } from '../../src/storage/FsBackend'
import { MemoryBackend } from '../../src/storage/MemoryBackend'
import { S3Backend } from '../../src/storage/S3Backend'
import {
  StorageRouter,
  formatLocation,
  joinLocation,
  parseLocation,
} from '../../src/storage/router'
import { InvalidPathError, NotFoundError, PathTraversalError } from '../../src/storage/errors'
import { baseName, globToRegex, joinPath, stemName } from '../../src/storage/utils'

function bytes(content: string): Uint8Array {
  return new TextEncoder().encode(content)
}

function text(data: Uint8Array): string {
  return new TextDecoder().decode(data)
}

// =============================================================================
// Path utilities
// =============================================================================

describe('storage utils', () => {
  it('should match shell globs on whole names', () => {
    expect(globToRegex('APAC_*').test('APAC_AUS_0')).toBe(true)
    expect(globToRegex('APAC_*').test('EMEA_GBR_0')).toBe(false)
    expect(globToRegex('data?').test('data1')).toBe(true)
    expect(globToRegex('data?').test('data10')).toBe(false)
    expect(globToRegex('a.b').test('aXb')).toBe(false)
  })

  it.each([
    ['A_[12]', 'A_1', true],
    ['A_[12]', 'A_3', false],
    ['A_[!12]', 'A_2', false],
    ['A_[!12]', 'A_3', true],
    ['day_[0-3]', 'day_2', true],
    ['day_[0-3]', 'day_4', false],
    ['x[]]', 'x]', true],
    ['x[!]]', 'x]', false],
    ['x[a-]', 'x-', true],
    ['x[^]', 'x^', true],
    ['x[z-a]', 'xb', false],
    ['file[1', 'file[1', true],
    ['(a|b)+', '(a|b)+', true],
    ['(a|b)+', 'a', false],
  ])('should match %s against %s -> %s', (pattern, name, expected) => {
    expect(globToRegex(pattern).test(name)).toBe(expected)
  })

  it('should split names out of paths', () => {
    expect(baseName('a/b/APAC_AUS_1.parquet')).toBe('APAC_AUS_1.parquet')
    expect(stemName('a/b/APAC_AUS_1.parquet')).toBe('APAC_AUS_1')
    expect(stemName('s3://bucket/x/archive.tar.gz')).toBe('archive.tar')
    expect(stemName('.hidden')).toBe('.hidden')
  })

  it('should join segments without empty parts', () => {
    expect(joinPath('/data', 'daily/', './x.bsidx')).toBe('/data/daily/x.bsidx')
    expect(joinPath('data', '', 'x')).toBe('data/x')
  })
})

// =============================================================================
// MemoryBackend
// =============================================================================

describe('MemoryBackend', () => {
  let backend: MemoryBackend

  beforeEach(() => {
    backend = new MemoryBackend()
  })

  it('should write and read a file', async () => {
    await backend.write('indexes/a.bsidx', bytes('hello'))
    expect(text(await backend.read('indexes/a.bsidx'))).toBe('hello')
    expect(text(await backend.read('/indexes/a.bsidx'))).toBe('hello')
  })

  it('should return copies of stored data', async () => {
    const data = bytes('abc')
    await backend.write('x', data)
    data[0] = 0x7a
    const read = await backend.read('x')
    read[1] = 0x7a
    expect(text(await backend.read('x'))).toBe('abc')
  })

  it('should raise NotFoundError for missing files', async () => {
    await expect(backend.read('missing')).rejects.toBeInstanceOf(NotFoundError)
    expect(await backend.stat('missing')).toBeNull()
  })

  it('should read byte ranges with an exclusive end', async () => {
    await backend.write('r', bytes('0123456789'))
    expect(text(await backend.readRange('r', 2, 5))).toBe('234')
    expect(text(await backend.readRange('r', 8, 100))).toBe('89')
    await expect(backend.readRange('r', 5, 2)).rejects.toBeInstanceOf(RangeError)
  })

  it('should list files directly under a prefix, sorted and filtered', async () => {
    await backend.write('idx/b.bsidx', bytes('b'))
    await backend.write('idx/a.bsidx', bytes('a'))
    await backend.write('idx/notes.txt', bytes('n'))
    await backend.write('idx/nested/c.bsidx', bytes('c'))

    expect((await backend.list('idx')).files).toEqual(['idx/a.bsidx', 'idx/b.bsidx', 'idx/notes.txt'])
    expect((await backend.list('idx/', { pattern: '*.bsidx' })).files).toEqual(['idx/a.bsidx', 'idx/b.bsidx'])
  })

  it('should report size and stat', async () => {
    await backend.write('s', bytes('four'))
    expect(backend.size).toBe(1)
    expect((await backend.stat('s'))?.size).toBe(4)
    backend.clear()
    expect(backend.size).toBe(0)
  })
})

// =============================================================================
// FsBackend
// =============================================================================

describe('FsBackend', () => {
  let root: string
  let backend: FsBackend

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), 'bloomsift-fs-'))
    backend = new FsBackend(root)
  })

  afterEach(async () => {
    await rm(root, { recursive: true, force: true })
  })

  it('should write files, creating parent directories', async () => {
    await backend.write('daily/a.bsidx', bytes('index'))
    expect(text(await backend.read('daily/a.bsidx'))).toBe('index')
    expect((await backend.stat('daily/a.bsidx'))?.size).toBe(5)
  })

  it('should leave no temp files behind', async () => {
    await backend.write('w.bin', bytes('x'))
    expect((await backend.list('')).files).toEqual(['w.bin'])
  })

  it('should raise NotFoundError for missing files', async () => {
    await expect(backend.read('nope.bsidx')).rejects.toBeInstanceOf(NotFoundError)
    expect(await backend.stat('nope.bsidx')).toBeNull()
  })

  it('should list regular files only', async () => {
    await mkdir(join(root, 'idx', 'sub'), { recursive: true })
    await writeFile(join(root, 'idx', 'b.bsidx'), 'b')
    await writeFile(join(root, 'idx', 'a.bsidx'), 'a')
    await writeFile(join(root, 'idx', 'readme.md'), 'r')

    expect((await backend.list('idx', { pattern: '*.bsidx' })).files).toEqual(['idx/a.bsidx', 'idx/b.bsidx'])
    expect((await backend.list('idx')).files).toEqual(['idx/a.bsidx', 'idx/b.bsidx', 'idx/readme.md'])
  })

  it('should list a missing directory as empty', async () => {
    expect(await backend.list('does-not-exist')).toEqual({ files: [] })
  })

  it('should refuse paths that escape the root', async () => {
    await expect(backend.read('../etc/passwd')).rejects.toBeInstanceOf(PathTraversalError)
    await expect(backend.write('a/../../x', bytes('x'))).rejects.toBeInstanceOf(PathTraversalError)
  })

  it('should read byte ranges', async () => {
    await backend.write('r.bin', bytes('0123456789'))
    expect(text(await backend.readRange('r.bin', 3, 6))).toBe('345')
    expect((await backend.readRange('r.bin', 20, 30)).length).toBe(0)
  })
})

// =============================================================================
// Locations and StorageRouter
// =============================================================================

describe('parseLocation', () => {
  it('should treat plain paths as local files', () => {
    expect(parseLocation('/data/indexes/a.bsidx')).toEqual({ scheme: 'file', authority: '', path: 'data/indexes/a.bsidx' })
    expect(parseLocation('file:///data/x.parquet')).toEqual({ scheme: 'file', authority: '', path: 'data/x.parquet' })
  })

  it('should resolve relative paths against the working directory', () => {
    expect(formatLocation(parseLocation('indexes'))).toBe(join(process.cwd(), 'indexes'))
  })

  it('should split bucket and key of s3 locations', () => {
    expect(parseLocation('s3://my-bucket/indexes/daily/a.bsidx')).toEqual({
      scheme: 's3',
      authority: 'my-bucket',
      path: 'indexes/daily/a.bsidx',
    })
    expect(parseLocation('S3://bucket')).toEqual({ scheme: 's3', authority: 'bucket', path: '' })
  })

  it('should reject empty, unknown and incomplete locations', () => {
    expect(() => parseLocation('')).toThrow(InvalidPathError)
    expect(() => parseLocation('ftp://host/file')).toThrow('unsupported scheme "ftp"')
    expect(() => parseLocation('s3:///key')).toThrow('s3 location needs a bucket')
  })
})

describe('joinLocation', () => {
  it('should append segments under any scheme', () => {
    expect(joinLocation('s3://bucket/indexes', 'daily', 'a.bsidx')).toBe('s3://bucket/indexes/daily/a.bsidx')
    expect(joinLocation('memory://scratch', 'a.bsidx')).toBe('memory://scratch/a.bsidx')
    expect(joinLocation('/data/indexes/', '', 'a.bsidx')).toBe('/data/indexes/a.bsidx')
  })
})

describe('StorageRouter', () => {
  it('should share one memory store per name', async () => {
    const router = new StorageRouter()
    await router.resolve('memory://scratch/a.bin').backend.write('a.bin', bytes('a'))
    expect(router.memoryStore('scratch').size).toBe(1)
    expect(router.memoryStore('other').size).toBe(0)
  })

  it('should open one S3 backend per bucket', () => {
    const router = new StorageRouter({ s3: { region: 'us-east-1' } })
    const first = router.resolve('s3://bucket-a/x').backend
    const again = router.resolve('s3://bucket-a/y').backend
    const other = router.resolve('s3://bucket-b/x').backend

    expect(first).toBeInstanceOf(S3Backend)
    expect(first).toBe(again)
    expect(other).not.toBe(first)
    expect(first instanceof S3Backend && first.bucket).toBe('bucket-a')
  })

  it('should use the filesystem for local paths', () => {
    const resolved = new StorageRouter().resolve('/tmp/a.bsidx')
    expect(resolved.backend).toBeInstanceOf(FsBackend)
    expect(resolved.path).toBe('tmp/a.bsidx')
  })

  it('should list matching files as locations', async () => {
    const router = new StorageRouter()
    const store = router.memoryStore('data')
    await store.write('daily/APAC_1.parquet', bytes('1'))
    await store.write('daily/APAC_0.parquet', bytes('0'))
    await store.write('daily/EMEA_0.csv', bytes('e'))

    expect(await router.list('memory://data/daily', '*.parquet')).toEqual([
      'memory://data/daily/APAC_0.parquet',
      'memory://data/daily/APAC_1.parquet',
    ])
  })
})
