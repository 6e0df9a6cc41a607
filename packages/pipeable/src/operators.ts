/**
 * pipeable/operators
 *
 * Ready-made operators. `or`, `orGet`, `otherwise` and `otherwiseGet` are
 * null-safe: they are the usual way to put a value back into a pipe after a
 * stage yielded null.
 *
 * @example
 * ```typescript
 * pipe(user)
 *   .next((u) => u.nickname)
 *   .next(or("anonymous"))
 *   .next(toStr())
 *   .result();
 * ```
 */

import { nullSafe, operator, type NullSafeOperator, type PlainOperator } from "./operator";
import type { Nullable } from "./pipe";

/**
 * Wraps a function as an ordinary operator. Useful only where it reads
 * better than passing the function itself.
 */
export function to<In, Out>(fn: (input: NonNullable<In>) => Out): PlainOperator<In, Out> {
  return operator<In, Out>(fn, fn.name || "to");
}

/** Converts a present value to its string form. */
export function toStr<T>(): PlainOperator<T, string> {
  return operator<T, string>((input) => String(input), "toStr");
}

/** Replaces an absent value with `defaultValue`. */
export function or<T>(defaultValue: T): NullSafeOperator<T, T> {
  return nullSafe<T, T>((input: Nullable<T>) => input ?? defaultValue, "or");
}

/** Replaces an absent value with the supplier's result. */
export function orGet<T>(supplier: () => T): NullSafeOperator<T, T> {
  return nullSafe<T, T>((input: Nullable<T>) => input ?? supplier(), "orGet");
}

/** Same as `or`. */
export function otherwise<T>(defaultValue: T): NullSafeOperator<T, T> {
  return nullSafe<T, T>((input: Nullable<T>) => input ?? defaultValue, "otherwise");
}

/** Same as `orGet`. */
export function otherwiseGet<T>(supplier: () => T): NullSafeOperator<T, T> {
  return nullSafe<T, T>((input: Nullable<T>) => input ?? supplier(), "otherwiseGet");
}

/**
 * Runs a side effect on a present value and passes the value on.
 */
export function tap<T>(fn: (input: NonNullable<T>) => void): PlainOperator<T, NonNullable<T>> {
  return operator<T, NonNullable<T>>((input) => {
    fn(input);
    return input;
  }, "tap");
}
