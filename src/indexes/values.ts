/**
 * Value normalisation shared by index construction and probing
 *
 * Column values arrive from Parquet readers (numbers, bigints, strings,
 * booleans, Dates, byte arrays, nested objects) and probe values arrive from
 * JSON requests. Both sides go through the same functions so that a value
 * inserted at build time is found again at query time:
 *
 * - `hashKey` gives the membership key hashed into a bloom filter
 * - `orderKey` places a value in an ordering family for range indexes
 *
 * Families: numeric (number and bigint, so `5` and `5n` are the same value),
 * string (Dates join it as ISO-8601 strings) and boolean (`false < true`).
 * `null`, `undefined` and `NaN` are the null value.
 */

// =============================================================================
// Types
// =============================================================================

export type ValueFamily = 'number' | 'string' | 'boolean'

/**
 * A value that can bound a range index
 */
export type OrderedValue = number | bigint | string | boolean

export type OrderKey =
  | { family: 'number'; value: number | bigint }
  | { family: 'string'; value: string }
  | { family: 'boolean'; value: boolean }

// =============================================================================
// Classification
// =============================================================================

/**
 * Check for the null value (missing cell)
 */
export function isNullValue(value: unknown): value is null | undefined {
  return value === null || value === undefined || (typeof value === 'number' && Number.isNaN(value))
}

/**
 * Family of a range bound
 */
export function familyOf(value: OrderedValue): ValueFamily {
  if (typeof value === 'string') return 'string'
  if (typeof value === 'boolean') return 'boolean'
  return 'number'
}

/**
 * Place a non-null value in its ordering family, or return null when the
 * value has no natural ordering (byte arrays, objects, invalid dates)
 */
export function orderKey(value: unknown): OrderKey | null {
  if (typeof value === 'number') {
    return Number.isNaN(value) ? null : { family: 'number', value }
  }
  if (typeof value === 'bigint') {
    return { family: 'number', value }
  }
  if (typeof value === 'string') {
    return { family: 'string', value }
  }
  if (typeof value === 'boolean') {
    return { family: 'boolean', value }
  }
  if (value instanceof Date && !Number.isNaN(value.getTime())) {
    return { family: 'string', value: value.toISOString() }
  }
  return null
}

/**
 * Human-readable type name used in error messages
 */
export function describeValue(value: unknown): string {
  if (value === null) return 'null'
  if (value instanceof Date) return 'Date'
  if (value instanceof Uint8Array) return 'bytes'
  if (Array.isArray(value)) return 'array'
  return typeof value
}

// =============================================================================
// Membership Keys
// =============================================================================

const NULL_KEY = 'z:'

/**
 * Membership key of a value. Each family has its own prefix so that the
 * string "5" and the number 5 never share a key.
 */
export function hashKey(value: unknown): string {
  if (isNullValue(value)) {
    return NULL_KEY
  }

  const key = orderKey(value)
  if (key) {
    switch (key.family) {
      case 'number':
        return 'n:' + numericKey(key.value)
      case 'string':
        return 's:' + key.value
      case 'boolean':
        return key.value ? 'b:1' : 'b:0'
    }
  }

  if (value instanceof Uint8Array) {
    return 'x:' + toHex(value)
  }
  return 'j:' + canonicalJson(value)
}

/**
 * Integral numbers render through BigInt so `5`, `5.0` and `5n` agree
 */
function numericKey(value: number | bigint): string {
  if (typeof value === 'bigint') {
    return value.toString()
  }
  if (Number.isInteger(value)) {
    return BigInt(value).toString()
  }
  return String(value)
}

function toHex(bytes: Uint8Array): string {
  let hex = ''
  for (let i = 0; i < bytes.length; i++) {
    hex += bytes[i].toString(16).padStart(2, '0')
  }
  return hex
}

/**
 * JSON with sorted object keys. Bigints in the safe integer range render as
 * numbers, larger ones as strings.
 */
function canonicalJson(value: unknown): string {
  return JSON.stringify(value, (_key, inner: unknown) => {
    if (typeof inner === 'bigint') {
      const asNumber = Number(inner)
      return Number.isSafeInteger(asNumber) ? asNumber : inner.toString()
    }
    if (inner instanceof Uint8Array) {
      return toHex(inner)
    }
    if (inner !== null && typeof inner === 'object' && !Array.isArray(inner)) {
      const sorted: Record<string, unknown> = {}
      for (const [k, v] of Object.entries(inner).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))) {
        sorted[k] = v
      }
      return sorted
    }
    return inner
  }) ?? 'undefined'
}

// =============================================================================
// Ordering
// =============================================================================

/**
 * Compare two keys of the same family
 */
export function compareOrderKeys(a: OrderKey, b: OrderKey): number {
  if (a.family === 'number' && b.family === 'number') {
    return compareNumeric(a.value, b.value)
  }
  if (a.family === 'string' && b.family === 'string') {
    return a.value < b.value ? -1 : a.value > b.value ? 1 : 0
  }
  if (a.family === 'boolean' && b.family === 'boolean') {
    return Number(a.value) - Number(b.value)
  }
  throw new TypeError(`Cannot compare ${a.family} with ${b.family}`)
}

/**
 * Order key of a stored range bound
 */
export function boundKey(value: OrderedValue): OrderKey {
  if (typeof value === 'string') return { family: 'string', value }
  if (typeof value === 'boolean') return { family: 'boolean', value }
  return { family: 'number', value }
}

/**
 * Exact comparison across number and bigint
 */
export function compareNumeric(a: number | bigint, b: number | bigint): number {
  if (typeof a === 'bigint') {
    if (typeof b === 'bigint') {
      return a < b ? -1 : a > b ? 1 : 0
    }
    return -compareNumberToBigint(b, a)
  }
  if (typeof b === 'number') {
    return a < b ? -1 : a > b ? 1 : 0
  }
  return compareNumberToBigint(a, b)
}

function compareNumberToBigint(n: number, b: bigint): number {
  if (n === Infinity) return 1
  if (n === -Infinity) return -1
  const floor = Math.floor(n)
  const whole = BigInt(floor)
  if (whole < b) return -1
  if (whole > b) return 1
  return n > floor ? 1 : 0
}
