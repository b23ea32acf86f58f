/**
 * SearchClient Integration Tests
 *
 * The client talks to the Hono app through an injected fetch, and to a real
 * SearchServer listening on a free local port.
 */

import { describe, it, expect, beforeAll, afterAll, vi } from 'vitest'
import { SearchClient } from '../../src/client/SearchClient'
import { createSearchApp } from '../../src/server/app'
import { SearchService } from '../../src/server/search'
import { SearchServer } from '../../src/server/server'
import { IndexStore } from '../../src/store/IndexStore'
import { StorageRouter } from '../../src/storage/router'
import { indexDirectory } from '../../src/indexer'
import { and, rule } from '../../src/query/types'
import { ConnectionError, ErrorCode, ProtocolError, RemoteError, StoreReadError } from '../../src/errors'
import { writeParquet } from '../helpers/parquet'

const URL_BASE = 'http://search.test'

async function indexedRouter(): Promise<StorageRouter> {
  const router = new StorageRouter()
  await writeParquet(router, 'memory://data/daily/APAC_AUS_0.parquet', { account_status: ['Active'] })
  await writeParquet(router, 'memory://data/daily/APAC_AUS_1.parquet', { account_status: ['Inactive'] })
  await indexDirectory('memory://data/daily', { indexRoot: 'memory://idx/daily', router })
  return router
}

function clientFor(service: SearchService, timeout?: number): SearchClient {
  const app = createSearchApp(service)
  return new SearchClient({
    url: URL_BASE + '/',
    timeout,
    fetch: async (input, init) => app.fetch(new Request(input, init)),
  })
}

const inactive = { indexSource: 'daily', filePattern: '*', query: and(rule('account_status', 'Inactive')) }

async function caught(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise
  } catch (error) {
    return error
  }
  throw new Error('expected the promise to reject')
}

// =============================================================================
// Against the app
// =============================================================================

describe('SearchClient', () => {
  let router: StorageRouter

  beforeAll(async () => {
    router = await indexedRouter()
  })

  it('should strip trailing slashes from the url', () => {
    expect(new SearchClient({ url: 'http://h:1//' }).url).toBe('http://h:1')
  })

  it('should return the matching files', async () => {
    const client = clientFor(new SearchService({ indexRoot: 'memory://idx', store: new IndexStore({ router }) }))
    expect(await client.send(inactive)).toEqual(['memory://data/daily/APAC_AUS_1.parquet'])
  })

  it('should report skipped indexes', async () => {
    const local = await indexedRouter()
    await local.memoryStore('idx').write('daily/broken.bsidx', new Uint8Array([1, 2, 3]))
    const client = clientFor(new SearchService({ indexRoot: 'memory://idx', store: new IndexStore({ router: local }) }))

    expect(await client.sendDetailed(inactive)).toEqual({
      files: ['memory://data/daily/APAC_AUS_1.parquet'],
      skipped: ['memory://idx/daily/broken.bsidx'],
    })
  })

  it('should raise RemoteError for a rejected request', async () => {
    const client = clientFor(new SearchService({ indexRoot: 'memory://idx', store: new IndexStore({ router }) }))
    const error = await caught(client.send({ ...inactive, indexSource: '../up' }))

    expect(error).toBeInstanceOf(RemoteError)
    expect(error instanceof RemoteError && error.kind).toBe(ErrorCode.PROTOCOL_ERROR)
    expect(error instanceof RemoteError && error.message).toBe('index_source must not contain "..": ../up')
  })

  it('should carry the server-side error kind', async () => {
    const store = new IndexStore({ router })
    vi.spyOn(store, 'list').mockRejectedValue(new StoreReadError('memory://idx/daily', 'listing failed'))
    const client = clientFor(new SearchService({ indexRoot: 'memory://idx', store }))

    const error = await caught(client.send(inactive))
    expect(error instanceof RemoteError && error.kind).toBe(ErrorCode.STORE_READ_ERROR)
    expect(error instanceof RemoteError && error.message).toBe('Cannot read index memory://idx/daily: listing failed')
  })

  it('should raise ProtocolError for a body that is not JSON', async () => {
    const client = new SearchClient({
      url: URL_BASE,
      fetch: async () => new Response('<html>bad gateway</html>', { status: 502 }),
    })

    const error = await caught(client.send(inactive))
    expect(error).toBeInstanceOf(ProtocolError)
    expect(error instanceof ProtocolError && error.message).toBe('Malformed response from http://search.test (HTTP 502)')
  })

  it('should raise ProtocolError for a body of the wrong shape', async () => {
    const client = new SearchClient({
      url: URL_BASE,
      fetch: async () => Response.json({ files: [] }),
    })
    await expect(client.send(inactive)).rejects.toThrow('response is neither a list of file paths nor an error payload')
  })

  it('should raise ConnectionError when the server cannot be reached', async () => {
    const client = new SearchClient({
      url: URL_BASE,
      fetch: async () => {
        throw new TypeError('fetch failed')
      },
    })

    const error = await caught(client.send(inactive))
    expect(error).toBeInstanceOf(ConnectionError)
    expect(error instanceof ConnectionError && error.message).toBe('Connection to http://search.test failed: fetch failed')
  })

  it('should raise ConnectionError once the timeout elapses', async () => {
    const client = new SearchClient({
      url: URL_BASE,
      timeout: 20,
      fetch: (_input, init) =>
        new Promise<Response>((_resolve, reject) => {
          init?.signal?.addEventListener('abort', () => reject(new Error('aborted')))
        }),
    })

    await expect(client.send(inactive)).rejects.toThrow(
      'Connection to http://search.test failed: request timeout after 20ms'
    )
  })

  it('should ping', async () => {
    const alive = clientFor(new SearchService({ indexRoot: 'memory://idx' }))
    expect(await alive.ping()).toBe(true)

    const down = new SearchClient({
      url: URL_BASE,
      fetch: async () => {
        throw new TypeError('fetch failed')
      },
    })
    expect(await down.ping()).toBe(false)
  })
})

// =============================================================================
// Against a listening server
// =============================================================================

describe('SearchServer', () => {
  let server: SearchServer
  let client: SearchClient

  beforeAll(async () => {
    const router = await indexedRouter()
    server = new SearchServer({ indexRoot: 'memory://idx', store: new IndexStore({ router }), host: '127.0.0.1', port: 0 })
    const { port } = await server.start()
    client = new SearchClient({ url: `http://127.0.0.1:${port}`, timeout: 5000 })
  })

  afterAll(async () => {
    await server.stop()
  })

  it('should answer over HTTP', async () => {
    expect(server.running).toBe(true)
    expect(await client.ping()).toBe(true)
    expect(await client.send(inactive)).toEqual(['memory://data/daily/APAC_AUS_1.parquet'])
  })

  it('should refuse to start twice', async () => {
    await expect(server.start()).rejects.toThrow('SearchServer is already running')
  })
})
