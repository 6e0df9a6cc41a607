/**
 * pipeable/chain
 *
 * `pipe(value)` starts a chain; each `.next(op)` adds a stage and
 * `.result()` evaluates the whole chain left to right. `evaluate()` runs an
 * untyped list of stages the same way.
 *
 * Evaluation is deferred until `result()`/`toResult()`, so a single catch
 * handler covers every stage. Chains are immutable: `.next()` returns a new
 * chain and the previous one stays usable.
 */

import { defaultBinding, type BindingRule } from "./binding";
import type { Catch } from "./catch";
import type { PipeFailure } from "./errors";
import { wrapFailure } from "./failable";
import { toOperator, type AnyOperator, type OperatorLike } from "./operator";
import { toPipe, type Nullable, type Pipeable } from "./pipe";
import { ok, err, type Result } from "./result";
import { appendStage, emptyStages, runStages, type Stages } from "./stages";

// =============================================================================
// Options
// =============================================================================

export interface PipeOptions {
  /** Binding rule applied at every stage. Defaults to `defaultBinding`. */
  binding?: BindingRule;
}

export interface EvaluateOptions<R> extends PipeOptions {
  /** Receives the failure of any stage; its return value becomes the result. */
  catcher?: Catch<R>;
}

// =============================================================================
// PipeChain
// =============================================================================

/**
 * A source value plus an ordered list of stages. `T` is the type carried
 * after the last stage, `S` the source type.
 */
export class PipeChain<T, S = unknown> {
  private constructor(
    private readonly source: Pipeable<S>,
    private readonly stages: Stages<S, T>,
    private readonly binding: BindingRule
  ) {}

  /** @internal */
  static start<S>(source: Pipeable<S>, options: PipeOptions = {}): PipeChain<S, S> {
    return new PipeChain(source, emptyStages<S>(), options.binding ?? defaultBinding);
  }

  /** The stages added so far, in evaluation order. */
  get operators(): readonly AnyOperator[] {
    return this.stages.operators;
  }

  /**
   * Add a stage. Plain functions are ordinary operators: they are skipped,
   * and the stage yields null, when the incoming value is null.
   */
  next<R>(op: OperatorLike<T, R>): PipeChain<R, S> {
    return new PipeChain(this.source, appendStage(this.stages, toOperator(op)), this.binding);
  }

  /** The same chain evaluated with different options. */
  with(options: PipeOptions): PipeChain<T, S> {
    return new PipeChain(this.source, this.stages, options.binding ?? this.binding);
  }

  /**
   * Evaluate the chain.
   *
   * Without a catcher a failing stage throws a `PipeFailure`; with one, the
   * catcher's return value becomes the result. A chain with no stages
   * yields null.
   *
   * @example
   * ```typescript
   * pipe("Hello")
   *   .next((s) => s.length)
   *   .next((n) => n * 2)
   *   .next((n) => String(n))
   *   .result(); // "10"
   * ```
   */
  result<R = never>(catcher?: Catch<R>): T | R | null {
    return runStages(this.stages, this.source, this.binding, catcher);
  }

  /**
   * Evaluate the chain without throwing.
   *
   * @example
   * ```typescript
   * const outcome = pipe(text).next(JSON.parse).toResult();
   * if (!outcome.ok) console.log(outcome.error.cause);
   * ```
   */
  toResult(): Result<T | null, PipeFailure> {
    try {
      return ok(runStages(this.stages, this.source, this.binding));
    } catch (thrown) {
      return err(wrapFailure(thrown));
    }
  }
}

// =============================================================================
// Entry Point
// =============================================================================

/**
 * Start a chain from a value. Pipeable values (a `Pipe`, a `SelfPipe`
 * subclass) are used as they are; anything else, null included, is wrapped.
 *
 * @example
 * ```typescript
 * pipe(new Person(null))
 *   .next((p) => p.name)
 *   .next((name) => name.length) // not called
 *   .result(); // null
 * ```
 */
export function pipe<T>(source: Pipeable<T>, options?: PipeOptions): PipeChain<T, T>;
export function pipe<T>(source: Nullable<T>, options?: PipeOptions): PipeChain<T, T>;
export function pipe<T>(source: Pipeable<T> | Nullable<T>, options?: PipeOptions): PipeChain<T, T> {
  return PipeChain.start(toPipe<T>(source), options);
}

/**
 * Evaluate a list of stages against a source. Every stage but the last is
 * lifted into a pipe for the next one; the last stage's raw result is
 * returned. An empty list yields null.
 *
 * @example
 * ```typescript
 * evaluate("Hello", [(s: string) => s.length, (n: number) => n * 2]); // 10
 * evaluate(null, [(s: string) => s.length], { catcher: Catch.thenReturn(0) }); // null
 * ```
 */
export function evaluate<R = never>(
  source: unknown,
  operators: readonly OperatorLike<never, unknown>[],
  options: EvaluateOptions<R> = {}
): unknown {
  const stages = operators.reduce<Stages<unknown, unknown>>((built, like) => {
    const stage: AnyOperator = toOperator(like);
    return appendStage(built, stage);
  }, emptyStages<unknown>());
  return runStages(stages, toPipe<unknown>(source), options.binding ?? defaultBinding, options.catcher);
}
