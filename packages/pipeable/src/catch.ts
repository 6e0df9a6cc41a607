/**
 * pipeable/catch
 *
 * Catch handlers end a pipe: when a stage fails, the handler turns the
 * `PipeFailure` into the chain's result, rethrows, or performs a side
 * effect and returns null.
 *
 * @example
 * ```typescript
 * pipe(person).next(burn).result(Catch.thenReturn("fallback")); // "fallback"
 * pipe(person).next(burn).result(Catch.thenThrow()); // throws burn's own error
 * ```
 */

import type { PipeFailure } from "./errors";
import type { Nullable } from "./pipe";

// =============================================================================
// Types
// =============================================================================

/**
 * A function turning an intercepted failure into a result. It may throw,
 * in which case the error propagates to the chain's caller.
 */
export type CatchFn<R> = (failure: PipeFailure) => R;

/**
 * Where `thenPrintStackTrace` writes. `process.stderr` and `process.stdout`
 * both qualify.
 */
export interface StackTraceDestination {
  write(chunk: string): unknown;
}

// =============================================================================
// Stack Trace Formatting
// =============================================================================

function framesOf(error: Error): string[] {
  return (error.stack ?? "").split("\n").filter((line) => line.trimStart().startsWith("at "));
}

/**
 * Renders a failure with its frames, followed by each cause in turn. A cause
 * chain that loops back is cut at the first repeat.
 */
export function formatStackTrace(failure: Error): string {
  const lines = [String(failure), ...framesOf(failure)];
  const seen = new Set<unknown>([failure]);
  let cause: unknown = failure.cause;
  while (cause !== undefined) {
    if (seen.has(cause)) {
      lines.push(`Caused by: [CIRCULAR REFERENCE: ${String(cause)}]`);
      break;
    }
    seen.add(cause);
    if (cause instanceof Error) {
      lines.push(`Caused by: ${String(cause)}`, ...framesOf(cause));
      cause = cause.cause;
    } else {
      lines.push(`Caused by: ${String(cause)}`);
      cause = undefined;
    }
  }
  return `${lines.join("\n")}\n`;
}

// =============================================================================
// Catch
// =============================================================================

/**
 * A terminal failure handler. A handler built with no function returns null.
 */
export class Catch<R> {
  constructor(private readonly handler: CatchFn<R> | null) {}

  /** Convert the failure into the chain's result. */
  handle(failure: PipeFailure): R | null {
    if (this.handler === null) {
      return null;
    }
    return this.handler(failure);
  }

  /**
   * General handler; `fn` may return a value or throw a different error.
   *
   * @example
   * ```typescript
   * Catch.then((failure) => {
   *   throw new ProfileUnavailable({ cause: failure.cause });
   * });
   * ```
   */
  static then<R>(fn: CatchFn<R>): Catch<R> {
    return new Catch(fn);
  }

  /** Returns a fixed value whatever the failure was. */
  static thenReturn<R>(value: R): Catch<R> {
    return new Catch(() => value);
  }

  /** Returns a freshly computed value; a missing supplier yields null. */
  static thenGet<R>(supplier: Nullable<() => R>): Catch<R> {
    if (supplier == null) {
      return new Catch<R>(null);
    }
    const get = supplier;
    return new Catch(() => get());
  }

  /** Returns a value computed from the failure. */
  static thenApply<R>(fn: CatchFn<R>): Catch<R> {
    return new Catch(fn);
  }

  /**
   * Unwraps the failure and throws the original error, so the caller sees
   * exactly what the failing stage threw.
   */
  static thenThrow(): Catch<never> {
    return new Catch((failure) => {
      throw failure.cause;
    });
  }

  /** Swallows the failure; the chain yields null. */
  static thenIgnore(): Catch<never> {
    return new Catch<never>(null);
  }

  /**
   * Writes the failure and its causes to `destination` (stderr by default),
   * then yields null.
   */
  static thenPrintStackTrace(destination: StackTraceDestination = process.stderr): Catch<null> {
    return new Catch<null>((failure) => {
      destination.write(formatStackTrace(failure));
      return null;
    });
  }
}
