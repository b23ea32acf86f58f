/**
 * SearchServer - serves the search routes over HTTP on Node.js
 *
 * @example
 * ```typescript
 * const server = new SearchServer({ indexRoot: './indexes', port: 8888 })
 * const { port } = await server.start()
 * // ...
 * await server.stop()
 * ```
 */

import { serve, type ServerType } from '@hono/node-server'
import type { Hono } from 'hono'
import type { AddressInfo } from 'node:net'
import { DEFAULT_HOST, DEFAULT_PORT } from '../constants'
import { logger } from '../utils/logger'
import { createSearchApp } from './app'
import { SearchService, type SearchServiceOptions } from './search'

export interface SearchServerOptions extends SearchServiceOptions {
  host?: string | undefined
  /** Port to listen on; 0 picks a free port */
  port?: number | undefined
}

export class SearchServer {
  readonly service: SearchService
  readonly app: Hono
  private readonly host: string
  private readonly port: number
  private server: ServerType | undefined

  constructor(options: SearchServerOptions) {
    this.service = new SearchService(options)
    this.app = createSearchApp(this.service)
    this.host = options.host ?? DEFAULT_HOST
    this.port = options.port ?? DEFAULT_PORT
  }

  /**
   * Start listening; resolves with the bound address
   */
  start(): Promise<AddressInfo> {
    if (this.server) {
      return Promise.reject(new Error('SearchServer is already running'))
    }

    return new Promise((resolve, reject) => {
      const server = serve({ fetch: this.app.fetch, hostname: this.host, port: this.port }, info => {
        logger.info(`Serving ${this.service.indexRoot} on http://${info.address}:${info.port}`)
        resolve(info)
      })
      server.once('error', reject)
      this.server = server
    })
  }

  /**
   * Stop accepting connections and wait for open ones to finish
   */
  stop(): Promise<void> {
    const server = this.server
    if (!server) {
      return Promise.resolve()
    }
    this.server = undefined

    return new Promise((resolve, reject) => {
      server.close(error => {
        if (error) {
          reject(error)
          return
        }
        logger.info('Search server stopped')
        resolve()
      })
    })
  }

  get running(): boolean {
    return this.server !== undefined
  }
}
