/**
 * Shared utility functions for storage backends
 */

/**
 * Convert a shell-style glob pattern to a regular expression
 *
 * - `*` matches zero or more characters
 * - `?` matches exactly one character
 * - `[seq]` matches one character in seq, `[!seq]` one character not in it;
 *   `a-z` inside a class is a range and a leading `]` is literal
 * - a `[` without a closing `]` is literal, as is every other character
 *
 * @example
 * ```typescript
 * globToRegex('APAC_*').test('APAC_AUS_0')   // true
 * globToRegex('data?').test('data1')         // true
 * globToRegex('A_[12]').test('A_2')          // true
 * globToRegex('A_[!12]').test('A_2')         // false
 * ```
 */
export function globToRegex(pattern: string): RegExp {
  let source = ''
  let i = 0

  while (i < pattern.length) {
    const char = pattern[i]
    i++

    if (char === '*') {
      source += '.*'
    } else if (char === '?') {
      source += '.'
    } else if (char === '[') {
      const end = classEnd(pattern, i)
      if (end === -1) {
        source += '\\['
      } else {
        source += classToRegex(pattern.slice(i, end))
        i = end + 1
      }
    } else {
      source += escapeRegex(char)
    }
  }

  return new RegExp(`^${source}$`, 's')
}

/**
 * Index of the `]` closing a class whose body starts at `start`, or -1
 */
function classEnd(pattern: string, start: number): number {
  let j = start
  if (pattern[j] === '!') j++
  if (pattern[j] === ']') j++
  return pattern.indexOf(']', j)
}

function classToRegex(body: string): string {
  const negate = body.startsWith('!')
  const chars = negate ? body.slice(1) : body

  let members = ''
  for (let k = 0; k < chars.length; k++) {
    const from = chars[k]
    if (chars[k + 1] === '-' && k + 2 < chars.length) {
      const to = chars[k + 2]
      k += 2
      // Reversed ranges match nothing
      if (from <= to) {
        members += `${escapeClassChar(from)}-${escapeClassChar(to)}`
      }
    } else {
      members += escapeClassChar(from)
    }
  }

  if (members === '') {
    return negate ? '.' : '(?!)'
  }
  return `[${negate ? '^' : ''}${members}]`
}

function escapeRegex(char: string): string {
  return /[.*+?^${}()|[\]\\/]/.test(char) ? '\\' + char : char
}

function escapeClassChar(char: string): string {
  return /[\\\]^-]/.test(char) ? '\\' + char : char
}

/**
 * Last segment of a slash-separated path
 */
export function baseName(path: string): string {
  const trimmed = path.endsWith('/') ? path.slice(0, -1) : path
  const index = trimmed.lastIndexOf('/')
  return index === -1 ? trimmed : trimmed.slice(index + 1)
}

/**
 * Base name without its last extension (`a/b/APAC_AUS_1.parquet` -> `APAC_AUS_1`)
 */
export function stemName(path: string): string {
  const name = baseName(path)
  const dot = name.lastIndexOf('.')
  return dot > 0 ? name.slice(0, dot) : name
}

/**
 * Normalize a storage path by removing leading slashes
 *
 * @example
 * ```typescript
 * normalizePath('/foo/bar')  // 'foo/bar'
 * normalizePath('foo/bar')   // 'foo/bar'
 * ```
 */
export function normalizePath(path: string): string {
  return path.replace(/^\/+/, '')
}

/**
 * Normalize a prefix to ensure it ends with '/' if non-empty
 */
export function normalizePrefix(prefix: string | undefined): string {
  const raw = normalizePath(prefix ?? '')
  if (raw && !raw.endsWith('/')) {
    return raw + '/'
  }
  return raw
}

/**
 * Join slash-separated path segments, dropping empty and `.` segments
 */
export function joinPath(...segments: string[]): string {
  const absolute = segments[0]?.startsWith('/') ?? false
  const joined = segments
    .flatMap(segment => segment.split('/'))
    .filter(part => part !== '' && part !== '.')
    .join('/')
  return absolute ? '/' + joined : joined
}

/**
 * Generate a deterministic ETag from data content using FNV-1a
 */
export function generateDeterministicEtag(data: Uint8Array): string {
  let hash = 2166136261
  for (let i = 0; i < data.length; i++) {
    hash ^= data[i] ?? 0
    hash = Math.imul(hash, 16777619) >>> 0
  }
  return `${hash.toString(16)}-${data.length.toString(36)}`
}
