/**
 * Result Type for Type-Safe Error Handling
 *
 * Operations whose failure is an expected outcome (a malformed request
 * tree, a column that cannot be indexed, an index file that fails to load
 * during a multi-file search) return a Result instead of throwing, so the
 * caller decides whether the failure is isolated or fatal.
 *
 * @example
 * ```typescript
 * const parsed = parseQuery(body.query)
 * if (isErr(parsed)) {
 *   return respondError(parsed.error)
 * }
 * evaluate(parsed.value, index)
 * ```
 */

// =============================================================================
// Core Result Type
// =============================================================================

/**
 * A discriminated union representing either a successful result (Ok) or a failure (Err).
 *
 * @typeParam T - The type of the success value
 * @typeParam E - The type of the error (defaults to Error)
 */
export type Result<T, E = Error> =
  | { ok: true; value: T }
  | { ok: false; error: E }

// =============================================================================
// Constructors
// =============================================================================

export const Ok = <T>(value: T): Result<T, never> => ({ ok: true, value })

export const Err = <E>(error: E): Result<never, E> => ({ ok: false, error })

// =============================================================================
// Type Guards
// =============================================================================

/**
 * Type guard to check if a Result is in the Ok (success) state.
 */
export function isOk<T, E>(result: Result<T, E>): result is { ok: true; value: T } {
  return result.ok === true
}

/**
 * Type guard to check if a Result is in the Err (failure) state.
 */
export function isErr<T, E>(result: Result<T, E>): result is { ok: false; error: E } {
  return result.ok === false
}

// =============================================================================
// Utility Functions
// =============================================================================

/**
 * Runs an async function and captures a rejection as an Err.
 * Non-Error rejections are wrapped in an Error.
 */
export async function tryCatchAsync<T>(fn: () => Promise<T>): Promise<Result<T, Error>> {
  try {
    return Ok(await fn())
  } catch (error: unknown) {
    return Err(error instanceof Error ? error : new Error(String(error)))
  }
}
