/**
 * pipeable/errors
 *
 * Error types raised by pipes. Every failure thrown by a stage reaches the
 * caller (or the catch handler) as a single `PipeFailure` whose `cause` is
 * the original thrown value.
 *
 * @example
 * ```typescript
 * import { PipeFailure, isPipeFailure } from "pipeable/errors";
 *
 * try {
 *   pipe(user).next(loadProfile).result();
 * } catch (error) {
 *   if (isPipeFailure(error)) {
 *     console.log(error.cause); // whatever loadProfile threw
 *   }
 * }
 * ```
 */

import { TaggedError } from "./tagged-error";

// =============================================================================
// Helpers
// =============================================================================

/**
 * Renders a thrown value the way `Error.prototype.toString` does, falling
 * back to `String()` for non-errors.
 */
export function describeThrown(thrown: unknown): string {
  if (thrown instanceof Error) {
    return thrown.toString();
  }
  return String(thrown);
}

// =============================================================================
// Error Types
// =============================================================================

/**
 * The uniform envelope for a failure raised by any pipe stage.
 *
 * The message is the rendered cause, so `String(failure)` reads
 * `PipeFailure: Error: burned` for a stage that threw `new Error("burned")`.
 */
export class PipeFailure extends TaggedError("PipeFailure", {
  message: (p: {
    /** The value the stage threw */
    thrown: unknown;
    /** Name of the operator that threw, when it has one */
    operator?: string;
  }) => describeThrown(p.thrown),
}) {
  constructor(props: { thrown: unknown; operator?: string }) {
    super(props, { cause: props.thrown });
  }
}

/**
 * Raised when a pipe stage is neither a function nor an operator.
 */
export class InvalidOperatorError extends TaggedError("InvalidOperatorError", {
  message: (p: {
    /** `typeof` of the rejected stage */
    received: string;
  }) => `InvalidOperatorError: expected a function or operator, received ${p.received}`,
}) {}

// =============================================================================
// Type Guards
// =============================================================================

/**
 * Check if an error is a PipeFailure.
 */
export function isPipeFailure(error: unknown): error is PipeFailure {
  return error instanceof PipeFailure;
}

/**
 * Check if an error is an InvalidOperatorError.
 */
export function isInvalidOperatorError(error: unknown): error is InvalidOperatorError {
  return error instanceof InvalidOperatorError;
}
