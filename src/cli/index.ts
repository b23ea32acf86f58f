/**
 * bloomsift CLI
 *
 * Commands:
 *   index           Build index files for a directory of Parquet files
 *   serve           Run the search server
 *   search          Ask which files may match a query
 *   ping            Check that a search server is alive
 */

import { fileURLToPath } from 'node:url'
import { indexCommand } from './commands/index-files'
import { pingCommand } from './commands/ping'
import { searchCommand } from './commands/search'
import { serveCommand } from './commands/serve'
import { parseArgs, print, printError } from './types'

// =============================================================================
// Constants
// =============================================================================

export const VERSION = '0.1.0'

const HELP_TEXT = `
bloomsift v${VERSION}

Per-column bloom and range indexes over Parquet files, and a server that
answers "which files might match" queries.

USAGE:
  bloomsift <command> [options]

COMMANDS:
  index <source-dir>            Build one index file per source file
  serve                         Run the search server
  search <query-json>           Ask which files may match a query
  ping                          Check that a search server is alive

OPTIONS:
  -h, --help                    Show this help message
  -v, --version                 Show version number
  -c, --config <file>           Config file (default: ./bloomsift.config.json)
  --verbose                     Log debug output to the console

INDEX OPTIONS:
  --pattern <glob>              Source files to index (default: *.parquet)
  -o, --out <dir>               Index directory (default: config indexDir)
  --error-rate <p>              Bloom filter false-positive rate (default: 0.1)
  --threshold <n>               Distinct values before a range index (default: 1000)
  --concurrency <n>             Files indexed in parallel (default: 4)

SERVE OPTIONS:
  --host <host>                 Bind address (default: 127.0.0.1)
  -p, --port <port>             Port (default: 8888)
  --indexes <dir>               Index root (default: config indexDir)
  --cache-size <n>              Loaded indexes kept in memory (default: 256)

SEARCH / PING OPTIONS:
  -s, --source <dir>            Index directory below the server's root
  -f, --files <glob>            Index file names to search (default: *)
  -u, --url <url>               Server URL (default: http://<host>:<port>)
  --explain                     Read indexes locally and explain every rule

EXAMPLES:
  bloomsift index ./data --out ./indexes
  bloomsift serve --indexes ./indexes --port 8888
  bloomsift search '{"condition":"OR","rules":[{"column":"region","value":"APAC"}]}' --files 'sales_*'
`

// =============================================================================
// Main Entry Point
// =============================================================================

/**
 * Main CLI entry point
 */
export async function main(argv: string[] = process.argv.slice(2)): Promise<number> {
  try {
    const parsed = parseArgs(argv)

    if (parsed.options.help) {
      print(HELP_TEXT)
      return 0
    }

    if (parsed.options.version) {
      print(`bloomsift v${VERSION}`)
      return 0
    }

    if (!parsed.command) {
      print(HELP_TEXT)
      return 0
    }

    switch (parsed.command) {
      case 'index':
        return await indexCommand(parsed)
      case 'serve':
        return await serveCommand(parsed)
      case 'search':
        return await searchCommand(parsed)
      case 'ping':
        return await pingCommand(parsed)
      case 'help':
        print(HELP_TEXT)
        return 0
      default:
        printError(`Unknown command: ${parsed.command}`)
        print('\nRun "bloomsift --help" for usage.')
        return 1
    }
  } catch (error: unknown) {
    const message = error instanceof Error ? error.message : String(error)
    printError(message)
    return 1
  }
}

// Run CLI if this is the main module
if (process.argv[1] === fileURLToPath(import.meta.url)) {
  main().then(
    code => process.exit(code),
    (error: unknown) => {
      printError(error instanceof Error ? error.message : String(error))
      process.exit(1)
    }
  )
}
