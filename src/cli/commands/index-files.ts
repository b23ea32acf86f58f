/**
 * Index Command
 *
 * Build one index file per source file in a directory.
 *
 * Usage:
 *   bloomsift index <source-dir> [--pattern *.parquet] [--out <index-dir>]
 *                   [--error-rate p] [--threshold n] [--concurrency n]
 *
 * Exits 1 when any file could not be indexed. Columns left out of an index
 * are reported as warnings.
 */

import { DEFAULT_SOURCE_PATTERN } from '../../constants'
import { indexDirectory } from '../../indexer'
import { StorageRouter } from '../../storage/router'
import type { ParsedArgs } from '../types'
import { configureLogging, print, printError, printWarning, resolveConfig } from '../types'

export async function indexCommand(parsed: ParsedArgs): Promise<number> {
  const sourceDir = parsed.args[0]
  if (!sourceDir) {
    printError('Missing source directory')
    print('Usage: bloomsift index <source-dir> [--pattern *.parquet] [--out <index-dir>]')
    return 1
  }

  configureLogging(parsed)
  const config = await resolveConfig(parsed)

  const report = await indexDirectory(sourceDir, {
    indexRoot: config.indexDir,
    router: new StorageRouter({ s3: config.s3 }),
    errorRate: config.errorRate,
    rangeFilterThreshold: config.rangeFilterThreshold,
    pattern: parsed.options.pattern ?? DEFAULT_SOURCE_PATTERN,
    concurrency: config.concurrency,
  })

  for (const entry of report.indexed) {
    print(`${entry.sourcePath} -> ${entry.indexPath} (${entry.columnCount} columns, ${entry.rowCount} rows)`)
    for (const failure of entry.failures) {
      printWarning(`${entry.sourcePath}: column ${failure.column} not indexed: ${failure.error.message}`)
    }
  }
  for (const failure of report.failed) {
    printError(`${failure.sourcePath}: ${failure.error.message}`)
  }

  print(`Indexed ${report.indexed.length} of ${report.indexed.length + report.failed.length} files into ${config.indexDir}`)
  return report.failed.length > 0 ? 1 : 0
}
