/**
 * pipeable/tagged-error
 *
 * Tagged error classes: errors with a `_tag` discriminant and typed props.
 *
 * @example
 * ```typescript
 * import { TaggedError } from "pipeable/tagged-error";
 *
 * class QuotaExceeded extends TaggedError("QuotaExceeded", {
 *   message: (p: { limit: number }) => `Quota of ${p.limit} exceeded`,
 * }) {}
 *
 * const error = new QuotaExceeded({ limit: 10 });
 * error._tag; // "QuotaExceeded"
 * error.limit; // 10
 * ```
 */

export {
  // Factory function
  TaggedError,

  // Types
  type TaggedErrorBase,
  type TaggedErrorOptions,
  type TaggedErrorCreateOptions,
  type TaggedErrorConstructor,

  // Type utilities
  type TagOf,
} from "./tagged-error";
