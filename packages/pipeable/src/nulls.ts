/**
 * pipeable/nulls
 *
 * Null coalescing helpers. `null` and `undefined` are both treated as absent.
 */

import type { Nullable } from "./pipe";

/**
 * The value, or `fallback` when it is absent.
 *
 * @example
 * ```typescript
 * orElse(null, "guest"); // "guest"
 * orElse("", "guest"); // ""
 * ```
 */
export function orElse<T>(value: Nullable<T>, fallback: T): T {
  return value ?? fallback;
}

/**
 * The value, or the supplier's result when it is absent. The supplier only
 * runs when needed.
 */
export function orElseGet<T>(value: Nullable<T>, supplier: () => T): T {
  return value ?? supplier();
}

/**
 * Applies `fn` to a present value; an absent value maps to null.
 */
export function mapTo<T, R>(value: Nullable<T>, fn: (value: NonNullable<T>) => R): R | null {
  return value != null ? fn(value) : null;
}

/**
 * The value when it is present and passes `test`, otherwise null.
 */
export function when<T>(value: Nullable<T>, test: (value: NonNullable<T>) => boolean): NonNullable<T> | null {
  return value != null && test(value) ? value : null;
}

/**
 * Runs `action` with the value when it is present.
 */
export function whenNotNull<T>(value: Nullable<T>, action: (value: NonNullable<T>) => void): void {
  if (value != null) {
    action(value);
  }
}
