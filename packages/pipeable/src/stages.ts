/**
 * pipeable/stages (internal)
 *
 * The evaluation protocol shared by `pipe()` chains and built pipelines: an
 * ordered, immutable list of operators where every stage but the last is
 * lifted into a pipe for the next one, and the last yields the raw result.
 */

import type { BindingRule } from "./binding";
import type { Catch } from "./catch";
import { wrapFailure } from "./failable";
import type { AnyOperator, Operator } from "./operator";
import { Pipe, type Nullable, type Pipeable } from "./pipe";

export interface Stages<In, Out> {
  /** The operators in evaluation order. Never mutated. */
  readonly operators: readonly AnyOperator[];
  /** Run every stage, lifting the last result into a pipe. */
  feed(binding: BindingRule, pipe: Nullable<Pipeable<In>>): Pipeable<Out>;
  /** Run every stage, returning the last stage's raw result. */
  finish(binding: BindingRule, pipe: Nullable<Pipeable<In>>): Out | null;
}

/**
 * No stages: feeding passes the pipe through, finishing yields null.
 */
export function emptyStages<T>(): Stages<T, T> {
  return {
    operators: Object.freeze([]),
    feed: (_binding, pipe) => pipe ?? Pipe.empty<T>(),
    finish: () => null,
  };
}

/**
 * Extends a stage list by one operator. The previous list is copied, never
 * appended to, so earlier builders and chains keep their own operators.
 */
export function appendStage<In, Mid, Out>(
  stages: Stages<In, Mid>,
  op: Operator<Mid, Out>
): Stages<In, Out> {
  const operators: readonly AnyOperator[] = Object.freeze([...stages.operators, op]);
  return {
    operators,
    feed: (binding, pipe) => binding.operateToPipe(op, stages.feed(binding, pipe)),
    finish: (binding, pipe) => binding.operate(op, stages.feed(binding, pipe)),
  };
}

/**
 * Evaluates the stages inside one failure boundary. A failure goes to the
 * catcher when there is one and propagates as a `PipeFailure` otherwise.
 */
export function runStages<In, Out, R = never>(
  stages: Stages<In, Out>,
  pipe: Nullable<Pipeable<In>>,
  binding: BindingRule,
  catcher?: Catch<R>
): Out | R | null {
  try {
    return stages.finish(binding, pipe);
  } catch (thrown) {
    const failure = wrapFailure(thrown);
    if (catcher === undefined) {
      throw failure;
    }
    return catcher.handle(failure);
  }
}
