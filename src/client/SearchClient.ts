/**
 * SearchClient - submits search requests to a SearchServer
 *
 * One HTTP request per call, no retries. Failures surface as:
 *
 * - ConnectionError: the server could not be reached, the transfer failed or
 *   the timeout elapsed
 * - ProtocolError: the response is not valid JSON or has an unexpected shape
 * - RemoteError: the server answered with an error payload (its `kind` is
 *   the server-side ErrorCode)
 *
 * @example
 * ```typescript
 * const client = new SearchClient({ url: 'http://127.0.0.1:8888' })
 * const files = await client.send({
 *   indexSource: 'daily',
 *   filePattern: 'APAC_*',
 *   query: and(rule('account_status', 'Inactive')),
 * })
 * ```
 */

import { DEFAULT_CLIENT_TIMEOUT, SKIPPED_HEADER } from '../constants'
import { ConnectionError, ProtocolError, toError } from '../errors'
import { parseSearchResponse, toWireRequest, type SearchRequest, type SearchResult } from '../server/protocol'
import { isRecord, safeJsonParse } from '../utils/json-validation'
import { logger } from '../utils/logger'

// =============================================================================
// Types
// =============================================================================

export interface SearchClientOptions {
  /** Server base URL, e.g. 'http://127.0.0.1:8888' */
  url: string

  /** Timeout in milliseconds for the whole exchange (default: 30000) */
  timeout?: number | undefined

  /** Custom headers */
  headers?: Record<string, string> | undefined

  /** Custom fetch implementation (for testing) */
  fetch?: typeof globalThis.fetch | undefined
}

export interface SearchResponse {
  files: SearchResult
  /** Index locations the server could not load */
  skipped: string[]
}

interface ExchangeInit {
  method: 'GET' | 'POST'
  headers?: Record<string, string> | undefined
  body?: string | undefined
}

interface RawResponse {
  status: number
  headers: Headers
  body: string
}

// =============================================================================
// SearchClient Implementation
// =============================================================================

export class SearchClient {
  readonly url: string
  private readonly timeout: number
  private readonly headers: Record<string, string>
  private readonly fetch: typeof globalThis.fetch

  constructor(options: SearchClientOptions) {
    // Ensure url doesn't end with slash
    this.url = options.url.replace(/\/+$/, '')
    this.timeout = options.timeout ?? DEFAULT_CLIENT_TIMEOUT
    this.headers = options.headers ?? {}
    this.fetch = options.fetch ?? globalThis.fetch
  }

  /**
   * Submit a search and return the candidate source files
   */
  async send(request: SearchRequest): Promise<SearchResult> {
    return (await this.sendDetailed(request)).files
  }

  /**
   * Submit a search and also report the indexes the server skipped
   */
  async sendDetailed(request: SearchRequest): Promise<SearchResponse> {
    const response = await this.exchange('/search', {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify(toWireRequest(request)),
    })

    const parsed = safeJsonParse(response.body)
    if (!parsed.ok) {
      throw new ProtocolError(`Malformed response from ${this.url} (HTTP ${response.status})`, undefined, parsed.error)
    }

    const files = parseSearchResponse(parsed.value)
    if (response.status < 200 || response.status >= 300) {
      throw new ProtocolError(`Unexpected HTTP ${response.status} from ${this.url} with a result body`)
    }

    const skippedHeader = response.headers.get(SKIPPED_HEADER)
    const skipped = skippedHeader ? skippedHeader.split(',').filter(Boolean) : []
    return { files, skipped }
  }

  /**
   * Check that the server is up and answering
   */
  async ping(): Promise<boolean> {
    try {
      const response = await this.exchange('/health', { method: 'GET' })
      const parsed = safeJsonParse(response.body)
      return response.status === 200 && parsed.ok && isRecord(parsed.value) && parsed.value.status === 'alive'
    } catch (error: unknown) {
      logger.debug(`Ping to ${this.url} failed: ${toError(error).message}`)
      return false
    }
  }

  /**
   * Perform one request, reading the whole body within the timeout
   */
  private async exchange(path: string, init: ExchangeInit): Promise<RawResponse> {
    const controller = new AbortController()
    let timedOut = false
    const timeoutId = setTimeout(() => {
      timedOut = true
      controller.abort()
    }, this.timeout)

    try {
      const response = await this.fetch(this.url + path, {
        method: init.method,
        headers: { ...this.headers, ...init.headers },
        body: init.body,
        signal: controller.signal,
      })
      const body = await response.text()
      return { status: response.status, headers: response.headers, body }
    } catch (error: unknown) {
      if (timedOut) {
        throw new ConnectionError(this.url, `request timeout after ${this.timeout}ms`, toError(error))
      }
      const cause = toError(error)
      throw new ConnectionError(this.url, cause.message, cause)
    } finally {
      clearTimeout(timeoutId)
    }
  }
}
