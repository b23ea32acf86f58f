/**
 * bloomsift Index Module
 *
 * Per-column approximate-membership indexes and the per-file bundle that
 * holds them:
 * - ColumnIndexBuilder picks a MembershipIndex (bloom filter) or a
 *   RangeIndex (min/max) per column
 * - FileIndex groups one source file's column indexes
 * - encodeFileIndex / decodeFileIndex read and write the `.bsidx` format
 */

export * from './bloom'
export {
  MembershipIndex,
  RangeIndex,
  type ColumnIndex,
  type ColumnIndexKind,
  type RangeBounds,
} from './column-index'
export {
  ColumnIndexBuilder,
  resolveIndexOptions,
  type ColumnIndexOptions,
} from './builder'
export {
  createFileIndex,
  buildFileIndex,
  indexLocationFor,
  type FileIndex,
  type FileIndexInit,
  type FileIndexBuild,
  type ColumnFailure,
} from './file-index'
export { encodeFileIndex, decodeFileIndex } from './codec'
export {
  hashKey,
  orderKey,
  isNullValue,
  compareNumeric,
  type OrderedValue,
  type OrderKey,
  type ValueFamily,
} from './values'
