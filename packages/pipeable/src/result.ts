/**
 * pipeable/result
 *
 * Minimal Result primitives. A Result is the non-throwing error channel of
 * the library: `attempt()` and `PipeChain.toResult()` report a failed stage
 * as `err(PipeFailure)` instead of throwing it.
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
// Unwrap Utilities
// =============================================================================

/**
 * Error thrown when attempting to unwrap an Err result.
 */
export class UnwrapError<E = unknown> extends Error {
  constructor(public readonly error: E) {
    super(`Unwrap called on an error result: ${String(error)}`, { cause: error });
    this.name = "UnwrapError";
  }
}

/**
 * Extracts the value from an Ok result, or throws UnwrapError if it's an Err.
 *
 * @example
 * ```typescript
 * unwrap(ok(5)); // 5
 * unwrap(err("boom")); // throws UnwrapError
 * ```
 */
export const unwrap = <T, E>(r: Result<T, E>): T => {
  if (r.ok) return r.value;
  throw new UnwrapError<E>(r.error);
};

/**
 * Extracts the value from an Ok result, or returns a default value if it's an Err.
 */
export const unwrapOr = <T, E>(r: Result<T, E>, defaultValue: T): T =>
  r.ok ? r.value : defaultValue;

/**
 * Extracts the value from an Ok result, or computes a default from the error.
 */
export const unwrapOrElse = <T, E>(r: Result<T, E>, fn: (error: E) => T): T =>
  r.ok ? r.value : fn(r.error);
