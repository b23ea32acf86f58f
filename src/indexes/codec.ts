/**
 * Index file serialization
 *
 * Encodes a FileIndex to the versioned `.bsidx` binary format and back.
 *
 * File format (big-endian):
 *   Header:
 *     - magic: "BSIX" (4 bytes)
 *     - version: 1 (2 bytes)
 *     - reserved (2 bytes)
 *     - errorRate: f64
 *     - rangeFilterThreshold: u32
 *     - createdAt: f64 epoch milliseconds
 *     - sourcePath: str
 *     - columnCount: u32
 *   Per column:
 *     - name: str
 *     - kind: u8 (1 membership, 2 range)
 *     - membership: insertedCount u32 | hashCount u16 | byteLength u32 | bits
 *     - range: flags u8 (bit0 hasNulls, bit1 hasBounds) | [min bound | max bound]
 *   Bound: tag u8 (1 number f64, 2 bigint as str, 3 string str, 4 boolean u8) | payload
 *   str: byteLength u32 | UTF-8 bytes
 */

import { INDEX_FORMAT_VERSION, INDEX_MAGIC } from '../constants'
import { StoreReadError, StoreVersionMismatchError } from '../errors'
import { BloomFilter } from './bloom/bloom-filter'
import { MembershipIndex, RangeIndex, type ColumnIndex } from './column-index'
import { createFileIndex, type FileIndex } from './file-index'
import type { OrderedValue } from './values'

const KIND_MEMBERSHIP = 1
const KIND_RANGE = 2

const FLAG_HAS_NULLS = 0x01
const FLAG_HAS_BOUNDS = 0x02

const TAG_NUMBER = 1
const TAG_BIGINT = 2
const TAG_STRING = 3
const TAG_BOOLEAN = 4

const HEADER_SIZE = 4 + 2 + 2

// =============================================================================
// Writer
// =============================================================================

/**
 * Append-only big-endian byte writer
 */
class BinaryWriter {
  private buffer = new Uint8Array(256)
  private view = new DataView(this.buffer.buffer)
  private offset = 0
  private readonly encoder = new TextEncoder()

  private reserve(size: number): void {
    if (this.offset + size <= this.buffer.length) return
    let capacity = this.buffer.length * 2
    while (capacity < this.offset + size) capacity *= 2
    const next = new Uint8Array(capacity)
    next.set(this.buffer.subarray(0, this.offset))
    this.buffer = next
    this.view = new DataView(next.buffer)
  }

  u8(value: number): void {
    this.reserve(1)
    this.view.setUint8(this.offset, value)
    this.offset += 1
  }

  u16(value: number): void {
    this.reserve(2)
    this.view.setUint16(this.offset, value, false)
    this.offset += 2
  }

  u32(value: number): void {
    this.reserve(4)
    this.view.setUint32(this.offset, value, false)
    this.offset += 4
  }

  f64(value: number): void {
    this.reserve(8)
    this.view.setFloat64(this.offset, value, false)
    this.offset += 8
  }

  bytes(data: Uint8Array): void {
    this.reserve(data.length)
    this.buffer.set(data, this.offset)
    this.offset += data.length
  }

  str(value: string): void {
    const data = this.encoder.encode(value)
    this.u32(data.length)
    this.bytes(data)
  }

  finish(): Uint8Array {
    return this.buffer.slice(0, this.offset)
  }
}

// =============================================================================
// Reader
// =============================================================================

/**
 * Bounds-checked big-endian byte reader. Reading past the end raises
 * RangeError, which decoding reports as a corrupt file.
 */
class BinaryReader {
  private readonly view: DataView
  private offset = 0
  private readonly decoder = new TextDecoder('utf-8', { fatal: true })

  constructor(private readonly data: Uint8Array) {
    this.view = new DataView(data.buffer, data.byteOffset, data.byteLength)
  }

  get remaining(): number {
    return this.data.length - this.offset
  }

  private take(size: number): number {
    if (this.offset + size > this.data.length) {
      throw new RangeError(`unexpected end of data at byte ${this.offset} (needed ${size} more)`)
    }
    const start = this.offset
    this.offset += size
    return start
  }

  u8(): number {
    return this.view.getUint8(this.take(1))
  }

  u16(): number {
    return this.view.getUint16(this.take(2), false)
  }

  u32(): number {
    return this.view.getUint32(this.take(4), false)
  }

  f64(): number {
    return this.view.getFloat64(this.take(8), false)
  }

  bytes(size: number): Uint8Array {
    const start = this.take(size)
    return this.data.slice(start, start + size)
  }

  str(): string {
    const size = this.u32()
    const start = this.take(size)
    return this.decoder.decode(this.data.subarray(start, start + size))
  }
}

// =============================================================================
// Encoding
// =============================================================================

/**
 * Serialize a FileIndex to `.bsidx` bytes
 */
export function encodeFileIndex(index: FileIndex): Uint8Array {
  const writer = new BinaryWriter()

  writer.bytes(INDEX_MAGIC)
  writer.u16(INDEX_FORMAT_VERSION)
  writer.u16(0) // reserved
  writer.f64(index.errorRate)
  writer.u32(index.rangeFilterThreshold)
  writer.f64(index.createdAt.getTime())
  writer.str(index.sourcePath)
  writer.u32(index.columns.size)

  for (const [name, column] of index.columns) {
    writer.str(name)
    writeColumn(writer, column)
  }

  return writer.finish()
}

function writeColumn(writer: BinaryWriter, column: ColumnIndex): void {
  if (column.kind === 'membership') {
    const bits = column.filter.toBuffer()
    writer.u8(KIND_MEMBERSHIP)
    writer.u32(column.insertedCount)
    writer.u16(column.filter.numHashFunctions)
    writer.u32(bits.length)
    writer.bytes(bits)
    return
  }

  writer.u8(KIND_RANGE)
  let flags = 0
  if (column.hasNulls) flags |= FLAG_HAS_NULLS
  if (column.bounds) flags |= FLAG_HAS_BOUNDS
  writer.u8(flags)
  if (column.bounds) {
    writeBound(writer, column.bounds.min)
    writeBound(writer, column.bounds.max)
  }
}

function writeBound(writer: BinaryWriter, value: OrderedValue): void {
  if (typeof value === 'number') {
    writer.u8(TAG_NUMBER)
    writer.f64(value)
  } else if (typeof value === 'bigint') {
    writer.u8(TAG_BIGINT)
    writer.str(value.toString())
  } else if (typeof value === 'string') {
    writer.u8(TAG_STRING)
    writer.str(value)
  } else {
    writer.u8(TAG_BOOLEAN)
    writer.u8(value ? 1 : 0)
  }
}

// =============================================================================
// Decoding
// =============================================================================

/**
 * Parse `.bsidx` bytes back into a FileIndex
 *
 * @param location - Where the bytes came from, for error messages
 * @throws StoreVersionMismatchError when the file has another format version
 * @throws StoreReadError when the bytes are not a valid index file
 */
export function decodeFileIndex(data: Uint8Array, location: string): FileIndex {
  if (data.length < HEADER_SIZE || !INDEX_MAGIC.every((byte, i) => data[i] === byte)) {
    throw new StoreReadError(location, 'not an index file (bad magic)')
  }

  const reader = new BinaryReader(data)
  try {
    reader.bytes(INDEX_MAGIC.length)
    const version = reader.u16()
    if (version !== INDEX_FORMAT_VERSION) {
      throw new StoreVersionMismatchError(location, INDEX_FORMAT_VERSION, version)
    }
    reader.u16() // reserved

    const errorRate = reader.f64()
    const rangeFilterThreshold = reader.u32()
    const createdAt = new Date(reader.f64())
    const sourcePath = reader.str()
    const columnCount = reader.u32()

    const columns: [string, ColumnIndex][] = []
    for (let i = 0; i < columnCount; i++) {
      const name = reader.str()
      columns.push([name, readColumn(reader, name)])
    }

    if (reader.remaining !== 0) {
      throw new RangeError(`${reader.remaining} trailing bytes after the last column`)
    }

    return createFileIndex({ sourcePath, columns, errorRate, rangeFilterThreshold, createdAt })
  } catch (error: unknown) {
    if (error instanceof StoreReadError) {
      throw error
    }
    const cause = error instanceof Error ? error : new Error(String(error))
    throw new StoreReadError(location, `corrupt index file: ${cause.message}`, cause)
  }
}

function readColumn(reader: BinaryReader, name: string): ColumnIndex {
  const kind = reader.u8()

  switch (kind) {
    case KIND_MEMBERSHIP: {
      const insertedCount = reader.u32()
      const hashCount = reader.u16()
      const bits = reader.bytes(reader.u32())
      return new MembershipIndex(BloomFilter.fromBuffer(bits, hashCount), insertedCount)
    }
    case KIND_RANGE: {
      const flags = reader.u8()
      const hasNulls = (flags & FLAG_HAS_NULLS) !== 0
      if ((flags & FLAG_HAS_BOUNDS) === 0) {
        return new RangeIndex(null, hasNulls)
      }
      const min = readBound(reader)
      const max = readBound(reader)
      return new RangeIndex({ min, max }, hasNulls)
    }
    default:
      throw new RangeError(`unknown index kind ${kind} for column "${name}"`)
  }
}

function readBound(reader: BinaryReader): OrderedValue {
  const tag = reader.u8()
  switch (tag) {
    case TAG_NUMBER:
      return reader.f64()
    case TAG_BIGINT:
      return BigInt(reader.str())
    case TAG_STRING:
      return reader.str()
    case TAG_BOOLEAN:
      return reader.u8() !== 0
    default:
      throw new RangeError(`unknown bound tag ${tag}`)
  }
}
