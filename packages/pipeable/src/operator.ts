/**
 * pipeable/operator
 *
 * Operators are the stages of a pipe. An operator is a tagged unary
 * function: its `kind` tells the binding rule whether it still runs when
 * the incoming value is null.
 *
 * - `"operator"`: skipped on a null input; the stage yields `null`.
 * - `"null-safe"`: always runs, receiving `null`/`undefined` as is.
 *
 * The tag changes nothing about what `apply` does.
 */

import { InvalidOperatorError } from "./errors";
import type { Nullable } from "./pipe";

// =============================================================================
// Types
// =============================================================================

export type OperatorKind = "operator" | "null-safe";

/**
 * An operator that only ever sees present values. `In` is the carried type,
 * which may itself include null; `apply` receives it without null.
 */
export interface PlainOperator<In, Out> {
  readonly kind: "operator";
  readonly name?: string;
  apply(input: NonNullable<In>): Out;
}

/**
 * An operator that runs even when the incoming value is absent.
 */
export interface NullSafeOperator<In, Out> {
  readonly kind: "null-safe";
  readonly name?: string;
  apply(input: Nullable<In>): Out;
}

export type Operator<In, Out> = PlainOperator<In, Out> | NullSafeOperator<In, Out>;

/**
 * Anything accepted where a stage is expected: a plain function (treated as
 * an ordinary operator) or an `Operator`.
 */
export type OperatorLike<In, Out> = ((input: NonNullable<In>) => Out) | Operator<In, Out>;

/** An operator with its types erased, as stored in a chain or pipeline. */
export type AnyOperator = Operator<unknown, unknown>;

// =============================================================================
// Constructors
// =============================================================================

/**
 * Create an ordinary operator from a function.
 *
 * @example
 * ```typescript
 * const length = operator((s: string) => s.length, "length");
 * ```
 */
export function operator<In, Out>(
  fn: (input: NonNullable<In>) => Out,
  name?: string
): PlainOperator<In, Out> {
  return {
    kind: "operator",
    name: name ?? (fn.name || undefined),
    apply: (input: NonNullable<In>) => fn(input),
  };
}

/**
 * Create a null-safe operator. It runs on absent input too.
 *
 * @example
 * ```typescript
 * const orDefault = nullSafe((s: string | null | undefined) => s ?? "default");
 *
 * pipe<string>(null).next(orDefault).next((s) => s.length).result(); // 7
 * ```
 */
export function nullSafe<In, Out>(
  fn: (input: Nullable<In>) => Out,
  name?: string
): NullSafeOperator<In, Out> {
  return {
    kind: "null-safe",
    name: name ?? (fn.name || undefined),
    apply: (input: Nullable<In>) => fn(input),
  };
}

// =============================================================================
// Type Guards
// =============================================================================

/**
 * Checks if a value is an Operator (including a built Pipeline).
 */
export function isOperator(value: unknown): value is AnyOperator {
  return (
    typeof value === "object" &&
    value !== null &&
    "kind" in value &&
    (value.kind === "operator" || value.kind === "null-safe") &&
    "apply" in value &&
    typeof value.apply === "function"
  );
}

/**
 * Checks if an operator is tagged null-safe.
 */
export const isNullSafe = <In, Out>(op: Operator<In, Out>): op is NullSafeOperator<In, Out> =>
  op.kind === "null-safe";

/**
 * Normalizes a stage into an Operator. Plain functions become ordinary
 * operators named after the function.
 *
 * @throws {InvalidOperatorError} when the stage is neither a function nor an operator
 */
export function toOperator<In, Out>(like: OperatorLike<In, Out>): Operator<In, Out> {
  if (typeof like === "function") {
    return operator<In, Out>(like);
  }
  const candidate: unknown = like;
  if (!isOperator(candidate)) {
    throw new InvalidOperatorError({ received: candidate === null ? "null" : typeof candidate });
  }
  return like;
}
