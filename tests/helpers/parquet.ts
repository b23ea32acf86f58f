/**
 * Parquet fixtures written with hyparquet-writer
 */

import { StorageRouter } from '../../src/storage/router'

/**
 * Encode columns of plain values as a Parquet file
 */
export async function parquetBytes(columns: Record<string, unknown[]>): Promise<Uint8Array> {
  const { parquetWriteBuffer } = await import('hyparquet-writer')
  const columnData = Object.entries(columns).map(([name, data]) => ({ name, data }))
  return new Uint8Array(parquetWriteBuffer({ columnData }))
}

/**
 * Write a Parquet file to any location the router understands
 */
export async function writeParquet(
  router: StorageRouter,
  location: string,
  columns: Record<string, unknown[]>
): Promise<void> {
  const { backend, path } = router.resolve(location)
  await backend.write(path, await parquetBytes(columns))
}
