/**
 * Search Command
 *
 * Ask a search server which files may match a query, one file per line.
 * With `--explain`, read the indexes directly and print every rule's
 * verdict for each file instead.
 *
 * Usage:
 *   bloomsift search <query-json> [--source s] [--files pattern] [--url u]
 *   bloomsift search <query-json> --explain [--source s] [--files pattern] [--indexes <dir>]
 *
 * Examples:
 *   bloomsift search '{"condition":"AND","rules":[{"column":"account_status","value":"Inactive"}]}' --files 'APAC_*'
 */

import { SearchClient } from '../../client/SearchClient'
import { ProtocolError, toError } from '../../errors'
import { explain, formatExplanation } from '../../query/evaluator'
import { parseQuery } from '../../query/parser'
import type { Query } from '../../query/types'
import { SearchService } from '../../server/search'
import { IndexStore } from '../../store/IndexStore'
import { StorageRouter } from '../../storage/router'
import type { BloomsiftConfig } from '../../config'
import { safeJsonParse } from '../../utils/json-validation'
import type { ParsedArgs } from '../types'
import { configureLogging, print, printError, printWarning, resolveConfig, serverUrl } from '../types'

export async function searchCommand(parsed: ParsedArgs): Promise<number> {
  const text = parsed.args[0]
  if (!text) {
    printError('Missing query')
    print("Usage: bloomsift search '<query-json>' [--source s] [--files pattern] [--url u]")
    return 1
  }

  configureLogging(parsed)
  const config = await resolveConfig(parsed)
  const query = readQuery(text)
  const indexSource = parsed.options.source ?? ''
  const filePattern = parsed.options.files ?? '*'

  if (parsed.options.explain) {
    return explainLocally(config, indexSource, filePattern, query)
  }

  const client = new SearchClient({ url: serverUrl(parsed, config) })
  const { files, skipped } = await client.sendDetailed({ indexSource, filePattern, query })
  for (const location of skipped) {
    printWarning(`server skipped ${location}`)
  }
  for (const file of files) {
    print(file)
  }
  return 0
}

/**
 * Parse the query argument into a validated tree
 *
 * @throws ProtocolError when it is not JSON or not a valid rule tree
 */
export function readQuery(text: string): Query {
  const json = safeJsonParse(text)
  if (!json.ok) {
    throw new ProtocolError('query is not valid JSON', undefined, json.error)
  }
  const query = parseQuery(json.value)
  if (!query.ok) {
    throw query.error
  }
  return query.value
}

async function explainLocally(
  config: BloomsiftConfig,
  indexSource: string,
  filePattern: string,
  query: Query
): Promise<number> {
  const store = new IndexStore({ router: new StorageRouter({ s3: config.s3 }) })
  const service = new SearchService({ indexRoot: config.indexDir, store })
  const locations = await service.resolveFiles(indexSource, filePattern)

  if (locations.length === 0) {
    print(`No indexes match ${filePattern}`)
    return 0
  }

  let failed = 0
  for (const location of locations) {
    try {
      const index = await store.read(location)
      print(`${index.sourcePath} (${location})`)
      for (const line of formatExplanation(explain(query, index), '  ')) {
        print(line)
      }
    } catch (error: unknown) {
      failed++
      printError(`${location}: ${toError(error).message}`)
    }
  }
  return failed > 0 ? 1 : 0
}
