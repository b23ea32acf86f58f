/**
 * Ping Command
 *
 * Usage:
 *   bloomsift ping [--url u]
 */

import { SearchClient } from '../../client/SearchClient'
import type { ParsedArgs } from '../types'
import { configureLogging, print, printError, resolveConfig, serverUrl } from '../types'

export async function pingCommand(parsed: ParsedArgs): Promise<number> {
  configureLogging(parsed)
  const config = await resolveConfig(parsed)
  const url = serverUrl(parsed, config)

  if (await new SearchClient({ url }).ping()) {
    print(`${url} is alive`)
    return 0
  }
  printError(`${url} is not responding`)
  return 1
}
