/**
 * pipeable/operators entry point
 *
 * Ready-made operators, without the pipe evaluator.
 */
export { to, toStr, or, orGet, otherwise, otherwiseGet, tap } from "./operators";
export { operator, nullSafe, type Operator, type OperatorLike } from "./operator";
