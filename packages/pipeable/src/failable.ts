/**
 * pipeable/failable
 *
 * Conversion of a unary function that may throw anything into one whose only
 * failure channel is `PipeFailure`.
 */

import { PipeFailure } from "./errors";
import { ok, err, type Result } from "./result";

// =============================================================================
// Types
// =============================================================================

/**
 * A unary function that may throw.
 */
export type FailableFn<In, Out> = (input: In) => Out;

// =============================================================================
// Normalization
// =============================================================================

/**
 * Normalizes a thrown value into a PipeFailure.
 *
 * A PipeFailure is returned unchanged, so a failure crossing several nested
 * pipes keeps a single level of wrapping with the original cause.
 */
export function wrapFailure(thrown: unknown, operator?: string): PipeFailure {
  if (thrown instanceof PipeFailure) {
    return thrown;
  }
  return new PipeFailure({ thrown, operator });
}

// =============================================================================
// Graceful Conversion
// =============================================================================

/**
 * Make a function graceful: anything it throws surfaces as a PipeFailure.
 *
 * @example
 * ```typescript
 * const parse = gracefully((text: string) => JSON.parse(text) as unknown);
 *
 * try {
 *   parse("{");
 * } catch (failure) {
 *   // failure instanceof PipeFailure, failure.cause instanceof SyntaxError
 * }
 * ```
 */
export function gracefully<In, Out>(fn: FailableFn<In, Out>, name?: string): FailableFn<In, Out> {
  const operatorName = name ?? (fn.name || undefined);
  return (input: In): Out => {
    try {
      return fn(input);
    } catch (thrown) {
      throw wrapFailure(thrown, operatorName);
    }
  };
}

/**
 * Result form of `gracefully`: the returned function never throws.
 *
 * @example
 * ```typescript
 * const parse = attempt((text: string) => JSON.parse(text) as unknown);
 * parse("[1]"); // { ok: true, value: [1] }
 * parse("{"); // { ok: false, error: PipeFailure }
 * ```
 */
export function attempt<In, Out>(
  fn: FailableFn<In, Out>,
  name?: string
): (input: In) => Result<Out, PipeFailure> {
  const graceful = gracefully(fn, name);
  return (input: In) => {
    try {
      return ok(graceful(input));
    } catch (thrown) {
      return err(wrapFailure(thrown));
    }
  };
}
