/**
 * pipeable
 *
 * Null-aware value pipes: thread a value through a chain of unary operators,
 * skip the rest of the chain when it becomes null, and handle every stage's
 * failure in one place.
 *
 * ## Quick Start
 *
 * ```typescript
 * import { pipe, Catch, Operators } from "pipeable";
 *
 * const city = pipe(order)
 *   .next((o) => o.customer)
 *   .next((c) => c.address)
 *   .next((a) => a.city)
 *   .next(Operators.or("unknown"))
 *   .result(Catch.thenReturn("unavailable"));
 * ```
 *
 * ## Entry Points
 *
 * - `pipeable` - everything below
 * - `pipeable/result` - Result types only
 * - `pipeable/errors` - PipeFailure and InvalidOperatorError
 * - `pipeable/tagged-error` - the TaggedError class factory
 * - `pipeable/operators` - ready-made operators
 * - `pipeable/strings` - string and null helpers
 */

import { to, toStr, or, orGet, otherwise, otherwiseGet, tap } from "./operators";
import { blankToNull, trimmed } from "./strings";

// =============================================================================
// Operators namespace
// =============================================================================

const Operators = {
  to,
  toStr,
  or,
  orGet,
  otherwise,
  otherwiseGet,
  tap,
  blankToNull,
  trimmed,
} as const;

export { Operators };

// =============================================================================
// Named value exports (tree-shake friendly)
// =============================================================================

export { pipe, evaluate, PipeChain } from "./chain";
export { Pipeline, PipelineBuilder } from "./pipeline";
export { Pipe, SelfPipe, PIPE_DATA, isPipeable, toPipe, dataOf } from "./pipe";
export { operator, nullSafe, toOperator, isOperator, isNullSafe } from "./operator";
export { defaultBinding, observeBinding, operateToResult, operateToPipe } from "./binding";
export { Catch, formatStackTrace } from "./catch";
export { gracefully, attempt, wrapFailure } from "./failable";
export { PipeFailure, InvalidOperatorError, isPipeFailure, isInvalidOperatorError, describeThrown } from "./errors";
export { TaggedError } from "./tagged-error";
export { to, toStr, or, orGet, otherwise, otherwiseGet, tap } from "./operators";
export { orElse, orElseGet, mapTo, when, whenNotNull } from "./nulls";
export {
  isNullOrEmpty,
  isNullOrBlank,
  trimToNull,
  trimToEmpty,
  blankToNull,
  trimmed,
} from "./strings";
export { ok, err, isOk, isErr, UnwrapError, unwrap, unwrapOr, unwrapOrElse } from "./result";

// =============================================================================
// Type exports (cannot live on runtime object)
// =============================================================================

export type { PipeOptions, EvaluateOptions } from "./chain";
export type { Pipeable, Nullable } from "./pipe";
export type {
  Operator,
  OperatorKind,
  OperatorLike,
  PlainOperator,
  NullSafeOperator,
  AnyOperator,
} from "./operator";
export type { BindingRule, PipeEvent, ObserveBindingOptions } from "./binding";
export type { CatchFn, StackTraceDestination } from "./catch";
export type { FailableFn } from "./failable";
export type { Ok, Err, Result } from "./result";
export type {
  TaggedErrorBase,
  TaggedErrorOptions,
  TaggedErrorCreateOptions,
  TaggedErrorConstructor,
  TagOf,
} from "./tagged-error";
