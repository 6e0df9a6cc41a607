/**
 * pipeable-stream
 *
 * Iterable operators and collectors for pipeable pipes.
 *
 * @example
 * ```typescript
 * import { pipe } from "pipeable";
 * import { spread, map, collect, Collectors } from "pipeable-stream";
 *
 * pipe(team)
 *   .next((t) => t.squads)
 *   .next(spread((s) => s.members))
 *   .next(map((m) => m.handle))
 *   .next(collect(Collectors.joining(", ")))
 *   .result();
 * ```
 */

export {
  stream,
  map,
  flatMap,
  spread,
  filter,
  peek,
  anyMatch,
  allMatch,
  reduce,
  collect,
  collectToList,
  type TransformFn,
  type PredicateFn,
} from "./operations";

export {
  Collectors,
  toList,
  toSet,
  joining,
  counting,
  groupingBy,
  type Collector,
} from "./collectors";
