/**
 * Tests for pipeable-stream collectors
 */
import { describe, it, expect } from "vitest";
import { pipe } from "pipeable";
import { collect, filter } from "./operations";
import { Collectors, counting, groupingBy, joining, toList, toSet } from "./collectors";

describe("Collectors", () => {
  it("toList keeps order and duplicates", () => {
    expect(pipe([3, 1, 3]).next(collect(toList<number>())).result()).toEqual([3, 1, 3]);
  });

  it("toSet drops duplicates", () => {
    const result = pipe(["b", "a", "b"]).next(collect(toSet<string>())).result();
    expect(result === null ? [] : [...result]).toEqual(["b", "a"]);
  });

  it("joining takes a separator, prefix and suffix", () => {
    expect(pipe(["x", "y"]).next(collect(joining(", ", "[", "]"))).result()).toBe("[x, y]");
    expect(pipe([1, 2, 3]).next(collect(joining())).result()).toBe("123");
    expect(pipe<string[]>([]).next(collect(joining(", ", "[", "]"))).result()).toBe("[]");
  });

  it("counting counts what reaches it", () => {
    expect(
      pipe([1, 2, 3, 4, 5])
        .next(filter((n: number) => n > 2))
        .next(collect(counting()))
        .result()
    ).toBe(3);
  });

  it("groupingBy groups in first-seen order", () => {
    const groups = pipe(["apple", "avocado", "banana", "blueberry", "cherry"])
      .next(collect(groupingBy((fruit: string) => fruit[0])))
      .result();

    expect(groups === null ? [] : [...groups.entries()]).toEqual([
      ["a", ["apple", "avocado"]],
      ["b", ["banana", "blueberry"]],
      ["c", ["cherry"]],
    ]);
  });

  it("are also grouped under one name", () => {
    expect(Collectors.joining).toBe(joining);
    expect(Collectors.counting).toBe(counting);
  });
});
