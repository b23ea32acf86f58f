/**
 * Search HTTP routes
 *
 * - POST /search - run a search request, answer the file list or an error payload
 * - GET /health  - liveness probe, answers `{ "status": "alive" }`
 *
 * Every response carries `Connection: close`: one request per connection.
 *
 * @example
 * ```typescript
 * const app = createSearchApp(new SearchService({ indexRoot: './indexes' }))
 * const res = await app.request('/search', {
 *   method: 'POST',
 *   body: JSON.stringify({ index_source: 'daily', file_pattern: 'APAC_*', query }),
 * })
 * ```
 */

import { Hono } from 'hono'
import { SKIPPED_HEADER } from '../constants'
import { ProtocolError } from '../errors'
import { safeJsonParse } from '../utils/json-validation'
import { logger } from '../utils/logger'
import {
  parseSearchRequest,
  statusFor,
  toErrorPayload,
  type HealthPayload,
  type SearchResult,
} from './protocol'
import type { SearchService } from './search'

export function createSearchApp(service: SearchService): Hono {
  const app = new Hono()

  app.use('*', async (c, next) => {
    await next()
    c.res.headers.set('Connection', 'close')
  })

  app.get('/health', c => c.json({ status: 'alive' } satisfies HealthPayload))

  app.post('/search', async c => {
    const started = Date.now()
    try {
      const body = safeJsonParse(await c.req.text())
      if (!body.ok) {
        throw new ProtocolError('request body is not valid JSON', undefined, body.error)
      }
      const request = parseSearchRequest(body.value)
      if (!request.ok) {
        throw request.error
      }

      const { files, skipped } = await service.search(request.value, c.req.raw.signal)
      if (skipped.length > 0) {
        c.header(SKIPPED_HEADER, skipped.map(entry => entry.location).join(','))
      }

      logger.info(`search ${request.value.indexSource}/${request.value.filePattern}: ${files.length} files in ${Date.now() - started}ms`)
      return c.json(files satisfies SearchResult)
    } catch (error: unknown) {
      const status = statusFor(error)
      if (status === 500) {
        logger.error('search failed', error)
      } else {
        logger.warn(`rejected search request: ${error instanceof Error ? error.message : String(error)}`)
      }
      return c.json(toErrorPayload(error), status)
    }
  })

  app.notFound(c => c.json(toErrorPayload(new ProtocolError(`no route for ${c.req.method} ${c.req.path}`)), 404))

  app.onError((error, c) => {
    logger.error('unhandled server error', error)
    return c.json(toErrorPayload(error), 500)
  })

  return app
}
