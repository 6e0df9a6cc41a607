/**
 * pipeable-stream - Stream Operations
 *
 * Operators over synchronous iterables. Each is an ordinary operator, so a
 * null iterable short-circuits the rest of the pipe like any other value.
 *
 * Intermediate operations (`map`, `flatMap`, `spread`, `filter`, `peek`) are
 * lazy: they return a generator that does nothing until a terminal operation
 * (`anyMatch`, `allMatch`, `reduce`, `collect`, `collectToList`) or the
 * caller iterates it. Like any generator, the result can be iterated once.
 * A callback that throws while a later stage drains the generator still
 * surfaces as a `PipeFailure` naming the operation it was given to.
 */

import { operator, wrapFailure, type PlainOperator } from "pipeable";
import type { Collector } from "./collectors";

// =============================================================================
// Types
// =============================================================================

/**
 * A transform function applied to each item.
 */
export type TransformFn<T, U> = (item: T, index: number) => U;

/**
 * A predicate applied to each item.
 */
export type PredicateFn<T> = (item: T, index: number) => boolean;

// =============================================================================
// Generators
// =============================================================================

function stageCallback<A extends unknown[], R>(fn: (...args: A) => R, stage: string): (...args: A) => R {
  return (...args) => {
    try {
      return fn(...args);
    } catch (thrown) {
      throw wrapFailure(thrown, stage);
    }
  };
}

function* mapItems<T, U>(source: Iterable<T>, fn: TransformFn<T, U>): Generator<U> {
  let index = 0;
  for (const item of source) {
    yield fn(item, index++);
  }
}

function* flatMapItems<T, U>(source: Iterable<T>, fn: TransformFn<T, Iterable<U>>): Generator<U> {
  let index = 0;
  for (const item of source) {
    yield* fn(item, index++);
  }
}

function* filterItems<T>(source: Iterable<T>, predicate: PredicateFn<T>): Generator<T> {
  let index = 0;
  for (const item of source) {
    if (predicate(item, index++)) {
      yield item;
    }
  }
}

function* peekItems<T>(source: Iterable<T>, fn: (item: T, index: number) => void): Generator<T> {
  let index = 0;
  for (const item of source) {
    fn(item, index++);
    yield item;
  }
}

// =============================================================================
// Source
// =============================================================================

/**
 * Turn the carried value into a one-item stream.
 *
 * @example
 * ```typescript
 * pipe(order).next(stream()).next(map((o) => o.id)).next(collectToList()).result(); // [order.id]
 * ```
 */
export function stream<T>(): PlainOperator<T, Iterable<NonNullable<T>>> {
  return operator<T, Iterable<NonNullable<T>>>((value) => [value], "stream");
}

// =============================================================================
// Intermediate operations
// =============================================================================

/**
 * Transform each item.
 */
export function map<T, U>(fn: TransformFn<T, U>): PlainOperator<Iterable<T>, Iterable<U>> {
  return operator<Iterable<T>, Iterable<U>>((items) => mapItems(items, stageCallback(fn, "map")), "map");
}

/**
 * Transform each item into an iterable and flatten the results.
 */
export function flatMap<T, U>(fn: TransformFn<T, Iterable<U>>): PlainOperator<Iterable<T>, Iterable<U>> {
  return operator<Iterable<T>, Iterable<U>>((items) => flatMapItems(items, stageCallback(fn, "flatMap")), "flatMap");
}

/**
 * Spread an array: map each element to an iterable and flatten the results.
 *
 * @example
 * ```typescript
 * pipe(company)
 *   .next((c) => c.departments)
 *   .next(spread((d) => d.members))
 *   .next(map((p) => p.name))
 *   .next(collectToList())
 *   .result();
 * ```
 */
export function spread<T, U>(fn: TransformFn<T, Iterable<U>>): PlainOperator<readonly T[], Iterable<U>> {
  return operator<readonly T[], Iterable<U>>((items) => flatMapItems(items, stageCallback(fn, "spread")), "spread");
}

/**
 * Keep the items matching a predicate.
 */
export function filter<T>(predicate: PredicateFn<T>): PlainOperator<Iterable<T>, Iterable<T>> {
  return operator<Iterable<T>, Iterable<T>>((items) => filterItems(items, stageCallback(predicate, "filter")), "filter");
}

/**
 * Run a side effect on each item as it passes.
 */
export function peek<T>(fn: (item: T, index: number) => void): PlainOperator<Iterable<T>, Iterable<T>> {
  return operator<Iterable<T>, Iterable<T>>((items) => peekItems(items, stageCallback(fn, "peek")), "peek");
}

// =============================================================================
// Terminal operations
// =============================================================================

/**
 * Whether any item matches. Stops at the first match.
 */
export function anyMatch<T>(predicate: PredicateFn<T>): PlainOperator<Iterable<T>, boolean> {
  return operator<Iterable<T>, boolean>((items) => {
    let index = 0;
    for (const item of items) {
      if (predicate(item, index++)) {
        return true;
      }
    }
    return false;
  }, "anyMatch");
}

/**
 * Whether every item matches. Stops at the first mismatch; an empty stream
 * matches.
 */
export function allMatch<T>(predicate: PredicateFn<T>): PlainOperator<Iterable<T>, boolean> {
  return operator<Iterable<T>, boolean>((items) => {
    let index = 0;
    for (const item of items) {
      if (!predicate(item, index++)) {
        return false;
      }
    }
    return true;
  }, "allMatch");
}

/**
 * Fold the items pairwise from the left. An empty stream reduces to null.
 *
 * @example
 * ```typescript
 * pipe([1, 2, 3]).next(reduce((a, b) => a + b)).result(); // 6
 * pipe<number[]>([]).next(reduce((a, b) => a + b)).result(); // null
 * ```
 */
export function reduce<T>(accumulator: (left: T, right: T) => T): PlainOperator<Iterable<T>, T | null> {
  return operator<Iterable<T>, T | null>((items) => {
    const iterator = items[Symbol.iterator]();
    const first = iterator.next();
    if (first.done) {
      return null;
    }
    let acc: T = first.value;
    let next = iterator.next();
    while (!next.done) {
      acc = accumulator(acc, next.value);
      next = iterator.next();
    }
    return acc;
  }, "reduce");
}

/**
 * Feed every item to a collector and return what it finishes with.
 */
export function collect<T, A, R>(collector: Collector<T, A, R>): PlainOperator<Iterable<T>, R> {
  return operator<Iterable<T>, R>((items) => {
    const container = collector.supply();
    for (const item of items) {
      collector.accumulate(container, item);
    }
    return collector.finish(container);
  }, "collect");
}

/**
 * Collect the items into a new array.
 */
export function collectToList<T>(): PlainOperator<Iterable<T>, T[]> {
  return operator<Iterable<T>, T[]>((items) => Array.from(items), "collectToList");
}
