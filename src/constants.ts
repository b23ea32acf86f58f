/**
 * bloomsift Constants
 *
 * Centralized defaults and format constants.
 */

// =============================================================================
// Index Construction
// =============================================================================

/**
 * Default target false-positive rate of membership indexes
 */
export const DEFAULT_ERROR_RATE = 0.1

/**
 * Default distinct-value count at which a column switches to a range index
 */
export const DEFAULT_RANGE_FILTER_THRESHOLD = 1000

/**
 * Smallest bloom filter allocated, in bits
 */
export const MIN_BLOOM_BITS = 64

// =============================================================================
// Index Files
// =============================================================================

/**
 * Extension of serialized file indexes
 */
export const INDEX_FILE_EXTENSION = '.bsidx'

/**
 * Magic bytes at the start of every index file ("BSIX")
 */
export const INDEX_MAGIC = new Uint8Array([0x42, 0x53, 0x49, 0x58])

/**
 * Current index file format version
 */
export const INDEX_FORMAT_VERSION = 1

/**
 * Default glob selecting source files when indexing a directory
 */
export const DEFAULT_SOURCE_PATTERN = '*.parquet'

// =============================================================================
// Server
// =============================================================================

export const DEFAULT_HOST = '127.0.0.1'

export const DEFAULT_PORT = 8888

/**
 * Default number of loaded file indexes kept in the server cache
 */
export const DEFAULT_CACHE_SIZE = 256

/**
 * Default client request timeout (30 seconds)
 */
export const DEFAULT_CLIENT_TIMEOUT = 30_000

/**
 * Response header listing index locations that failed to load
 */
export const SKIPPED_HEADER = 'X-Bloomsift-Skipped'

// =============================================================================
// Concurrency
// =============================================================================

/**
 * Default number of files indexed in parallel
 */
export const DEFAULT_CONCURRENCY = 4
