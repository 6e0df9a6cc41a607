/**
 * pipeable/binding
 *
 * A binding rule decides, for every stage of a pipe, whether the operator
 * runs and how its raw result is lifted into the pipe fed to the next stage.
 *
 * The default binding:
 * 1. reads the carried value of the incoming pipe (an absent pipe carries null);
 * 2. skips ordinary operators when that value is null or undefined, yielding null;
 * 3. otherwise runs the operator gracefully, so whatever it throws surfaces
 *    as a `PipeFailure`.
 *
 * Results that are already pipeable are passed on as is; anything else is
 * wrapped in a fresh `Pipe`.
 */

import type { PipeFailure } from "./errors";
import { gracefully, wrapFailure } from "./failable";
import type { Operator } from "./operator";
import { dataOf, toPipe, type Nullable, type Pipeable } from "./pipe";

// =============================================================================
// Types
// =============================================================================

/**
 * Strategy consulted by the evaluator at every stage boundary.
 */
export interface BindingRule {
  /** Apply the operator to the pipe's value, producing the raw result. */
  operate<In, Out>(op: Operator<In, Out>, pipe: Nullable<Pipeable<In>>): Out | null;
  /** Apply the operator and lift its result into the next stage's pipe. */
  operateToPipe<In, Out>(op: Operator<In, Out>, pipe: Nullable<Pipeable<In>>): Pipeable<Out>;
}

// =============================================================================
// Default Binding
// =============================================================================

function operateByDefault<In, Out>(op: Operator<In, Out>, pipe: Nullable<Pipeable<In>>): Out | null {
  const raw = dataOf(pipe);
  if (op.kind === "null-safe") {
    const nullSafeOp = op;
    return gracefully((input: Nullable<In>) => nullSafeOp.apply(input), op.name)(raw);
  }
  if (raw == null) {
    return null;
  }
  const plainOp = op;
  return gracefully((input: NonNullable<In>) => plainOp.apply(input), op.name)(raw);
}

/**
 * The built-in binding rule. Stateless and shared by every pipe that is not
 * given another one.
 */
export const defaultBinding: BindingRule = Object.freeze({
  operate: operateByDefault,
  operateToPipe<In, Out>(op: Operator<In, Out>, pipe: Nullable<Pipeable<In>>): Pipeable<Out> {
    return toPipe(operateByDefault(op, pipe));
  },
});

// =============================================================================
// Evaluation Primitives
// =============================================================================

/**
 * Apply an operator to a pipe and return its raw result.
 *
 * @example
 * ```typescript
 * operateToResult((s: string) => s.length, Pipe.of("Hello")); // 5
 * operateToResult((s: string) => s.length, Pipe.empty()); // null, not called
 * ```
 */
export function operateToResult<In, Out>(
  op: Operator<In, Out>,
  pipe: Nullable<Pipeable<In>>,
  binding: BindingRule = defaultBinding
): Out | null {
  return binding.operate(op, pipe);
}

/**
 * Apply an operator to a pipe and lift the result into the next pipe.
 */
export function operateToPipe<In, Out>(
  op: Operator<In, Out>,
  pipe: Nullable<Pipeable<In>>,
  binding: BindingRule = defaultBinding
): Pipeable<Out> {
  return binding.operateToPipe(op, pipe);
}

// =============================================================================
// Observed Binding
// =============================================================================

/**
 * Lifecycle events emitted by `observeBinding` for every stage.
 */
export type PipeEvent =
  | { type: "stage_start"; operator: string; nullSafe: boolean; ts: number }
  | { type: "stage_skipped"; operator: string; ts: number }
  | { type: "stage_success"; operator: string; ts: number; durationMs: number }
  | { type: "stage_error"; operator: string; ts: number; durationMs: number; error: PipeFailure };

export interface ObserveBindingOptions {
  /** Binding rule doing the actual work. Defaults to `defaultBinding`. */
  base?: BindingRule;
  /** Receives a typed event for every stage. */
  onEvent?: (event: PipeEvent) => void;
  /** Receives a formatted line for every stage. */
  logger?: (message: string) => void;
}

const ANONYMOUS = "anonymous";

function instrument<In, Out>(op: Operator<In, Out>, onApply: () => void): Operator<In, Out> {
  if (op.kind === "null-safe") {
    const nullSafeOp = op;
    return {
      kind: "null-safe",
      name: op.name,
      apply: (input: Nullable<In>) => {
        onApply();
        return nullSafeOp.apply(input);
      },
    };
  }
  const plainOp = op;
  return {
    kind: "operator",
    name: op.name,
    apply: (input: NonNullable<In>) => {
      onApply();
      return plainOp.apply(input);
    },
  };
}

/**
 * A binding rule that reports every stage through `onEvent` and `logger`,
 * then delegates to `base`. Whether a stage was skipped is decided by `base`.
 *
 * @example
 * ```typescript
 * const lines: string[] = [];
 * const binding = observeBinding({ logger: (line) => lines.push(line) });
 *
 * pipe(" hi ", { binding }).next(trim).next(upper).result();
 * // lines: ["[pipeable] apply trim", "[pipeable] done trim", ...]
 * ```
 */
export function observeBinding(options: ObserveBindingOptions = {}): BindingRule {
  const base = options.base ?? defaultBinding;
  const { onEvent, logger } = options;

  const operate = <In, Out>(op: Operator<In, Out>, pipe: Nullable<Pipeable<In>>): Out | null => {
    const name = op.name ?? ANONYMOUS;
    const startedAt = performance.now();
    let applied = false;

    const instrumented = instrument(op, () => {
      applied = true;
      onEvent?.({ type: "stage_start", operator: name, nullSafe: op.kind === "null-safe", ts: Date.now() });
      logger?.(`[pipeable] apply ${name}`);
    });

    try {
      const result = base.operate(instrumented, pipe);
      if (applied) {
        onEvent?.({
          type: "stage_success",
          operator: name,
          ts: Date.now(),
          durationMs: performance.now() - startedAt,
        });
        logger?.(`[pipeable] done ${name}`);
      } else {
        onEvent?.({ type: "stage_skipped", operator: name, ts: Date.now() });
        logger?.(`[pipeable] skip ${name}: null input`);
      }
      return result;
    } catch (thrown) {
      const failure = wrapFailure(thrown, op.name);
      onEvent?.({
        type: "stage_error",
        operator: name,
        ts: Date.now(),
        durationMs: performance.now() - startedAt,
        error: failure,
      });
      logger?.(`[pipeable] fail ${name}: ${failure.message}`);
      throw failure;
    }
  };

  return {
    operate,
    operateToPipe: <In, Out>(op: Operator<In, Out>, pipe: Nullable<Pipeable<In>>): Pipeable<Out> =>
      toPipe(operate(op, pipe)),
  };
}
