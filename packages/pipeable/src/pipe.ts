/**
 * pipeable/pipe
 *
 * The pipe container: anything exposing a carried value (possibly null)
 * under the `PIPE_DATA` key can be threaded through a chain.
 */

// =============================================================================
// Types
// =============================================================================

/** Key of the method returning a pipe's carried value. */
export const PIPE_DATA: unique symbol = Symbol.for("pipeable.data");

/** A value that may be absent. Both `null` and `undefined` count as absent. */
export type Nullable<T> = T | null | undefined;

/**
 * A value wrapper exposing its carried payload.
 */
export interface Pipeable<T> {
  [PIPE_DATA](): Nullable<T>;
}

// =============================================================================
// Type Guards
// =============================================================================

/**
 * Checks if a value exposes a carried value.
 */
export function isPipeable(value: unknown): value is Pipeable<unknown> {
  return (
    (typeof value === "object" || typeof value === "function") &&
    value !== null &&
    PIPE_DATA in value &&
    typeof value[PIPE_DATA] === "function"
  );
}

function carriesPipe<T>(value: Pipeable<T> | Nullable<T>): value is Pipeable<T> {
  return isPipeable(value);
}

// =============================================================================
// Pipe
// =============================================================================

/**
 * The minimal pipe: holds a value by reference.
 *
 * @example
 * ```typescript
 * const name = Pipe.of("Alice");
 * name.value; // "Alice"
 *
 * const now = Pipe.from(() => Date.now()); // supplier runs immediately
 * ```
 */
export class Pipe<T> implements Pipeable<T> {
  private constructor(private readonly data: Nullable<T>) {}

  [PIPE_DATA](): Nullable<T> {
    return this.data;
  }

  /** The carried value. */
  get value(): Nullable<T> {
    return this.data;
  }

  toString(): string {
    return `Pipe(${String(this.data)})`;
  }

  /** Wraps a value by reference. A value that is already pipeable is returned as is. */
  static of<T>(value: Pipeable<T>): Pipeable<T>;
  static of<T>(value: Nullable<T>): Pipe<T>;
  static of<T>(value: Pipeable<T> | Nullable<T>): Pipeable<T>;
  static of<T>(value: Pipeable<T> | Nullable<T>): Pipeable<T> {
    if (carriesPipe(value)) {
      return value;
    }
    return new Pipe<T>(value);
  }

  /** Calls the supplier once, now, and wraps what it returns. */
  static from<T>(supplier: () => Nullable<T>): Pipe<T> {
    return new Pipe<T>(supplier());
  }

  /** A pipe carrying `null`. */
  static empty<T>(): Pipe<T> {
    return new Pipe<T>(null);
  }
}

// =============================================================================
// Self-carrying values
// =============================================================================

/**
 * Base class for domain objects that are their own carried value.
 *
 * @example
 * ```typescript
 * class Person extends SelfPipe {
 *   constructor(readonly name: string | null) { super(); }
 * }
 *
 * pipe(new Person("Alice")).next((p) => p.name).result(); // "Alice"
 * ```
 */
export abstract class SelfPipe implements Pipeable<SelfPipe> {
  [PIPE_DATA](): this {
    return this;
  }
}

// =============================================================================
// Adapters
// =============================================================================

/**
 * Adapts any source into a pipe, the function form of `Pipe.of`.
 */
export function toPipe<T>(source: Pipeable<T>): Pipeable<T>;
export function toPipe<T>(source: Nullable<T>): Pipeable<T>;
export function toPipe<T>(source: Pipeable<T> | Nullable<T>): Pipeable<T>;
export function toPipe<T>(source: Pipeable<T> | Nullable<T>): Pipeable<T> {
  return Pipe.of<T>(source);
}

/**
 * Reads the carried value of a pipe; an absent pipe carries `null`.
 */
export function dataOf<T>(pipe: Nullable<Pipeable<T>>): Nullable<T> {
  return pipe != null ? pipe[PIPE_DATA]() : null;
}
