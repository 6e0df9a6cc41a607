/**
 * pipeable/strings
 *
 * String predicates and trimming, plus their operator forms.
 */

import { nullSafe, operator, type NullSafeOperator, type PlainOperator } from "./operator";
import type { Nullable } from "./pipe";

export function isNullOrEmpty(value: Nullable<string>): boolean {
  return value == null || value.length === 0;
}

export function isNullOrBlank(value: Nullable<string>): boolean {
  return value == null || value.trim().length === 0;
}

/**
 * Trims the string; an absent or blank string becomes null.
 *
 * @example
 * ```typescript
 * trimToNull("  a  "); // "a"
 * trimToNull("   "); // null
 * ```
 */
export function trimToNull(value: Nullable<string>): string | null {
  if (value == null) {
    return null;
  }
  const trimmed = value.trim();
  return trimmed.length === 0 ? null : trimmed;
}

/**
 * Trims the string; an absent string becomes "".
 */
export function trimToEmpty(value: Nullable<string>): string {
  return value == null ? "" : value.trim();
}

// =============================================================================
// Operators
// =============================================================================

/**
 * Null-safe operator mapping absent and blank strings to null and trimming
 * everything else.
 *
 * @example
 * ```typescript
 * pipe("   ").next(blankToNull()).next(or("n/a")).result(); // "n/a"
 * ```
 */
export function blankToNull(): NullSafeOperator<string, string | null> {
  return nullSafe(trimToNull, "blankToNull");
}

/** Trims a present string. */
export function trimmed(): PlainOperator<string, string> {
  return operator((value: string) => value.trim(), "trimmed");
}
