/**
 * pipeable-stream - Collectors
 *
 * Mutable reductions used by `collect()`: a collector supplies a container,
 * accumulates each item into it, then finishes it into the result.
 */

// =============================================================================
// Types
// =============================================================================

export interface Collector<T, A, R> {
  supply(): A;
  accumulate(container: A, item: T): void;
  finish(container: A): R;
}

// =============================================================================
// Collectors
// =============================================================================

export function toList<T>(): Collector<T, T[], T[]> {
  return {
    supply: () => [],
    accumulate: (list, item) => {
      list.push(item);
    },
    finish: (list) => list,
  };
}

export function toSet<T>(): Collector<T, Set<T>, Set<T>> {
  return {
    supply: () => new Set<T>(),
    accumulate: (set, item) => {
      set.add(item);
    },
    finish: (set) => set,
  };
}

/**
 * Join the string form of every item.
 *
 * @example
 * ```typescript
 * pipe(["a", "b"]).next(collect(joining(", ", "[", "]"))).result(); // "[a, b]"
 * ```
 */
export function joining(separator = "", prefix = "", suffix = ""): Collector<unknown, string[], string> {
  return {
    supply: () => [],
    accumulate: (parts, item) => {
      parts.push(String(item));
    },
    finish: (parts) => `${prefix}${parts.join(separator)}${suffix}`,
  };
}

export function counting(): Collector<unknown, { count: number }, number> {
  return {
    supply: () => ({ count: 0 }),
    accumulate: (counter) => {
      counter.count += 1;
    },
    finish: (counter) => counter.count,
  };
}

/**
 * Group items by key, keeping first-seen key order and item order within
 * each group.
 */
export function groupingBy<T, K>(keyOf: (item: T) => K): Collector<T, Map<K, T[]>, Map<K, T[]>> {
  return {
    supply: () => new Map<K, T[]>(),
    accumulate: (groups, item) => {
      const key = keyOf(item);
      const group = groups.get(key);
      if (group === undefined) {
        groups.set(key, [item]);
      } else {
        group.push(item);
      }
    },
    finish: (groups) => groups,
  };
}

/**
 * All collectors under one name.
 */
export const Collectors = {
  toList,
  toSet,
  joining,
  counting,
  groupingBy,
} as const;
