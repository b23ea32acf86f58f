export type { TableData, TabularDataSource } from './types'
export { tableFromRows } from './types'
export { ParquetDataSource, initializeAsyncBuffer, type ParquetDataSourceOptions } from './parquet'
