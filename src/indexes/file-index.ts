/**
 * FileIndex - the per-source-file bundle of column indexes
 *
 * A FileIndex maps each indexable column of one source table to its
 * ColumnIndex, together with the settings it was built with. It is built
 * once, persisted as one unit and never mutated afterwards.
 */

import { INDEX_FILE_EXTENSION } from '../constants'
import { InvalidColumnError } from '../errors'
import type { TableData } from '../source/types'
import { joinLocation } from '../storage/router'
import { stemName } from '../storage/utils'
import { logger } from '../utils/logger'
import type { ColumnIndexBuilder } from './builder'
import type { ColumnIndex } from './column-index'

// =============================================================================
// Types
// =============================================================================

export interface FileIndex {
  /** Location of the source table the index was built from */
  readonly sourcePath: string
  /** Column name -> index */
  readonly columns: ReadonlyMap<string, ColumnIndex>
  readonly errorRate: number
  readonly rangeFilterThreshold: number
  readonly createdAt: Date
}

export interface FileIndexInit {
  sourcePath: string
  columns: Iterable<readonly [string, ColumnIndex]>
  errorRate: number
  rangeFilterThreshold: number
  createdAt?: Date | undefined
}

/**
 * A column left out of a FileIndex because it could not be indexed
 */
export interface ColumnFailure {
  column: string
  error: InvalidColumnError
}

export interface FileIndexBuild {
  index: FileIndex
  failures: ColumnFailure[]
}

// =============================================================================
// Construction
// =============================================================================

/**
 * Seal column indexes into a FileIndex
 */
export function createFileIndex(init: FileIndexInit): FileIndex {
  const columns = new Map<string, ColumnIndex>()
  for (const [name, index] of init.columns) {
    columns.set(name, index)
  }

  return Object.freeze({
    sourcePath: init.sourcePath,
    columns,
    errorRate: init.errorRate,
    rangeFilterThreshold: init.rangeFilterThreshold,
    createdAt: init.createdAt ? new Date(init.createdAt.getTime()) : new Date(),
  })
}

/**
 * Build a FileIndex over every column of a table.
 *
 * Columns are independent: a column that raises InvalidColumnError is left
 * out and reported in `failures` while the rest are still indexed.
 */
export function buildFileIndex(table: TableData, builder: ColumnIndexBuilder): FileIndexBuild {
  const columns: [string, ColumnIndex][] = []
  const failures: ColumnFailure[] = []

  for (const column of table.columns) {
    try {
      columns.push([column, builder.build(table.values(column))])
    } catch (error: unknown) {
      if (!(error instanceof InvalidColumnError)) {
        throw error
      }
      const failure = error.forColumn(column)
      logger.warn(`Skipping column in ${table.sourcePath}: ${failure.message}`)
      failures.push({ column, error: failure })
    }
  }

  const index = createFileIndex({
    sourcePath: table.sourcePath,
    columns,
    errorRate: builder.errorRate,
    rangeFilterThreshold: builder.rangeFilterThreshold,
  })
  return { index, failures }
}

/**
 * Location of the index for a source file: `<indexRoot>/<source stem>.bsidx`
 *
 * @example
 * ```typescript
 * indexLocationFor('/data/APAC_AUS_1.parquet', 's3://indexes/daily')
 * // 's3://indexes/daily/APAC_AUS_1.bsidx'
 * ```
 */
export function indexLocationFor(sourceLocation: string, indexRoot: string): string {
  return joinLocation(indexRoot, stemName(sourceLocation) + INDEX_FILE_EXTENSION)
}
