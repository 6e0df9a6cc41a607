/**
 * pipeable/pipeline
 *
 * Reusable pipelines: a fixed list of stages, built once and applied to many
 * inputs. A built pipeline is itself an ordinary operator, so it can be a
 * stage of a pipe or of another pipeline.
 *
 * @example
 * ```typescript
 * const shout = Pipeline.startingWith((s: string) => s.trim())
 *   .next((s) => s.toUpperCase())
 *   .next((s) => `${s}!`)
 *   .build();
 *
 * shout.apply(" hi "); // "HI!"
 * pipe(" hey ").next(shout).result(); // "HEY!"
 * ```
 */

import { defaultBinding, type BindingRule } from "./binding";
import type { Catch } from "./catch";
import type { PipeOptions } from "./chain";
import { toOperator, type AnyOperator, type OperatorLike, type PlainOperator } from "./operator";
import { toPipe, type Nullable, type Pipeable } from "./pipe";
import { appendStage, emptyStages, runStages, type Stages } from "./stages";

// =============================================================================
// Types
// =============================================================================

type Evaluation<In, Out> = (pipe: Pipeable<In>) => Out | null;

// =============================================================================
// Pipeline
// =============================================================================

/**
 * A built, immutable pipeline. Applying it to a null input is skipped like
 * any ordinary operator; `run()` evaluates it on a null input anyway.
 */
export class Pipeline<In, Out> implements PlainOperator<In, Out | null> {
  readonly kind = "operator" as const;

  private constructor(
    private readonly stages: readonly AnyOperator[],
    private readonly evaluation: Evaluation<In, Out>,
    readonly name?: string
  ) {}

  /** @internal */
  static assemble<In, Out>(
    operators: readonly AnyOperator[],
    evaluation: Evaluation<In, Out>,
    name?: string
  ): Pipeline<In, Out> {
    return new Pipeline(operators, evaluation, name);
  }

  /** Start building a pipeline from its first stage. */
  static startingWith<In, Out>(op: OperatorLike<In, Out>, options: PipeOptions = {}): PipelineBuilder<In, Out> {
    return PipelineBuilder.start<In>(options.binding ?? defaultBinding).next(op);
  }

  /** A pipeline with no stages. It yields null for every input. */
  static empty<T>(): Pipeline<T, never> {
    return new Pipeline<T, never>(Object.freeze([]), () => null);
  }

  /** The stages, in evaluation order. */
  get operators(): readonly AnyOperator[] {
    return this.stages;
  }

  get size(): number {
    return this.stages.length;
  }

  apply(input: NonNullable<In>): Out | null {
    return this.evaluation(toPipe<In>(input));
  }

  /** Evaluate on any input, null included, or on a pipe. */
  run(input: Pipeable<In> | Nullable<In>): Out | null {
    return this.evaluation(toPipe<In>(input));
  }
}

// =============================================================================
// Builder
// =============================================================================

/**
 * Accumulates stages. Every method returns a new builder; earlier builders
 * keep their own stage lists and can be extended or built independently.
 */
export class PipelineBuilder<In, Out> {
  private constructor(
    private readonly stages: Stages<In, Out>,
    private readonly binding: BindingRule,
    private readonly label?: string
  ) {}

  /** @internal */
  static start<T>(binding: BindingRule): PipelineBuilder<T, T> {
    return new PipelineBuilder(emptyStages<T>(), binding);
  }

  get operators(): readonly AnyOperator[] {
    return this.stages.operators;
  }

  next<R>(op: OperatorLike<Out, R>): PipelineBuilder<In, R> {
    return new PipelineBuilder(appendStage(this.stages, toOperator(op)), this.binding, this.label);
  }

  with(options: PipeOptions): PipelineBuilder<In, Out> {
    return new PipelineBuilder(this.stages, options.binding ?? this.binding, this.label);
  }

  /** Name reported for the built pipeline when it runs as a stage. */
  named(name: string): PipelineBuilder<In, Out> {
    return new PipelineBuilder(this.stages, this.binding, name);
  }

  /** Build a pipeline that propagates stage failures as `PipeFailure`. */
  build(): Pipeline<In, Out> {
    const { stages, binding } = this;
    return Pipeline.assemble(stages.operators, (pipe) => runStages(stages, pipe, binding), this.label);
  }

  /**
   * Build a pipeline whose stage failures go to `catcher`.
   *
   * @example
   * ```typescript
   * const parse = Pipeline.startingWith((text: string) => JSON.parse(text) as unknown)
   *   .buildWith(Catch.thenReturn(undefined));
   * ```
   */
  buildWith<R>(catcher: Catch<R>): Pipeline<In, Out | R> {
    const { stages, binding } = this;
    return Pipeline.assemble<In, Out | R>(
      stages.operators,
      (pipe) => runStages(stages, pipe, binding, catcher),
      this.label
    );
  }
}
