/**
 * Tabular data source types
 *
 * A data source opens one source file and exposes it column by column.
 * Index construction only needs column names and each column's values.
 */

/**
 * One loaded source table
 */
export interface TableData {
  /** Location the table was loaded from */
  readonly sourcePath: string
  /** Column names in schema order */
  readonly columns: readonly string[]
  /** Number of rows */
  readonly rowCount: number
  /** Values of one column in row order; empty for an unknown column */
  values(column: string): unknown[]
}

/**
 * Anything that can load a table from a location
 */
export interface TabularDataSource {
  load(location: string): Promise<TableData>
}

/**
 * Build a TableData from row objects
 */
export function tableFromRows(
  sourcePath: string,
  columns: readonly string[],
  rows: readonly Record<string, unknown>[]
): TableData {
  return {
    sourcePath,
    columns,
    rowCount: rows.length,
    values(column: string): unknown[] {
      if (!columns.includes(column)) {
        return []
      }
      return rows.map(row => row[column])
    },
  }
}
