/**
 * tagkit/result (internal)
 *
 * Minimal Result primitives for the non-throwing entry points.
 */

// =============================================================================
// Core Result Types
// =============================================================================

/**
 * Represents a successful result.
 * Use `ok(value)` to create instances.
 */
export type Ok<T> = { ok: true; value: T };

/**
 * Represents a failed result.
 * Use `err(error)` to create instances.
 */
export type Err<E> = { ok: false; error: E };

/**
 * Represents a successful computation or a failed one.
 */
export type Result<T, E = unknown> = Ok<T> | Err<E>;

// =============================================================================
// Result Constructors
// =============================================================================

/**
 * Creates a successful Result.
 */
export const ok = <T>(value: T): Ok<T> => ({ ok: true, value });

/**
 * Creates a failed Result.
 */
export const err = <E>(error: E): Err<E> => ({ ok: false, error });

// =============================================================================
// Type Guards
// =============================================================================

/**
 * Checks if a Result is successful.
 */
export const isOk = <T, E>(r: Result<T, E>): r is Ok<T> => r.ok;

/**
 * Checks if a Result is a failure.
 */
export const isErr = <T, E>(r: Result<T, E>): r is Err<E> => !r.ok;

// =============================================================================
// Interop
// =============================================================================

/**
 * Run a throwing function and capture its outcome as a Result.
 *
 * @example
 * ```typescript
 * const parsed = from(() => JSON.parse(text), (cause) => ({ type: 'PARSE_ERROR', cause }));
 * ```
 */
export function from<T>(fn: () => T): Result<T, unknown>;
export function from<T, E>(fn: () => T, onError: (cause: unknown) => E): Result<T, E>;
export function from<T, E>(fn: () => T, onError?: (cause: unknown) => E): Result<T, unknown> {
  try {
    return ok(fn());
  } catch (cause) {
    return err(onError ? onError(cause) : cause);
  }
}
