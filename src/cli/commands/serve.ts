/**
 * Serve Command
 *
 * Run the search server until SIGINT or SIGTERM.
 *
 * Usage:
 *   bloomsift serve [--host h] [--port n] [--indexes <dir>] [--cache-size n]
 */

import { IndexStore } from '../../store/IndexStore'
import { StorageRouter } from '../../storage/router'
import { SearchServer } from '../../server/server'
import type { ParsedArgs } from '../types'
import { configureLogging, print, resolveConfig } from '../types'

export async function serveCommand(parsed: ParsedArgs): Promise<number> {
  configureLogging(parsed, true)
  const config = await resolveConfig(parsed)

  const server = new SearchServer({
    indexRoot: config.indexDir,
    store: new IndexStore({ router: new StorageRouter({ s3: config.s3 }) }),
    cacheSize: config.cacheSize,
    concurrency: config.concurrency,
    host: config.host,
    port: config.port,
  })

  const address = await server.start()
  print(`bloomsift listening on http://${address.address}:${address.port} (indexes: ${config.indexDir})`)

  await new Promise<void>(resolve => {
    process.once('SIGINT', () => resolve())
    process.once('SIGTERM', () => resolve())
  })

  await server.stop()
  return 0
}
