/**
 * Tests for catch.ts - catch handlers
 */
import { describe, it, expect, vi } from "vitest";
import { Catch, formatStackTrace } from "./catch";
import { PipeFailure } from "./errors";

function thrownBy(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error("expected a throw");
}

function failureOf(thrown: unknown): PipeFailure {
  return new PipeFailure({ thrown });
}

describe("Catch", () => {
  it("handles with the given function", () => {
    const handler = Catch.then((failure) => `handled ${failure.message}`);
    expect(handler.handle(failureOf(new Error("burned")))).toBe("handled Error: burned");
  });

  it("returns null without a handler function", () => {
    expect(new Catch<string>(null).handle(failureOf("x"))).toBeNull();
  });

  describe("thenReturn", () => {
    it("returns the same value for every failure", () => {
      const handler = Catch.thenReturn("X");

      expect(handler.handle(failureOf(new Error("one")))).toBe("X");
      expect(handler.handle(failureOf(new TypeError("two")))).toBe("X");
    });
  });

  describe("thenGet", () => {
    it("calls the supplier only when handling", () => {
      const supplier = vi.fn(() => "fresh");
      const handler = Catch.thenGet(supplier);

      expect(supplier).not.toHaveBeenCalled();
      expect(handler.handle(failureOf("x"))).toBe("fresh");
      expect(supplier).toHaveBeenCalledTimes(1);
    });

    it("yields null for a missing supplier", () => {
      expect(Catch.thenGet<string>(null).handle(failureOf("x"))).toBeNull();
    });
  });

  describe("thenApply", () => {
    it("computes the value from the failure", () => {
      const handler = Catch.thenApply((failure) => failure.cause);
      const cause = new Error("burned");

      expect(handler.handle(failureOf(cause))).toBe(cause);
    });
  });

  describe("thenThrow", () => {
    it("throws the original cause", () => {
      const cause = new RangeError("out of range");
      const thrown = thrownBy(() => Catch.thenThrow().handle(failureOf(cause)));

      expect(thrown).toBe(cause);
    });
  });

  describe("thenIgnore", () => {
    it("yields null", () => {
      expect(Catch.thenIgnore().handle(failureOf(new Error("ignored")))).toBeNull();
    });
  });

  describe("thenPrintStackTrace", () => {
    it("writes the failure followed by its cause and yields null", () => {
      const chunks: string[] = [];
      const handler = Catch.thenPrintStackTrace({ write: (chunk: string) => chunks.push(chunk) });

      const result = handler.handle(failureOf(new Error("burned")));
      const lines = chunks.join("").split("\n");

      expect(result).toBeNull();
      expect(chunks).toHaveLength(1);
      expect(lines[0]).toBe("PipeFailure: Error: burned");
      expect(lines).toContain("Caused by: Error: burned");
    });
  });
});

describe("formatStackTrace", () => {
  it("ends with a newline", () => {
    expect(formatStackTrace(failureOf("plain")).endsWith("\n")).toBe(true);
  });

  it("renders a non-error cause on one line", () => {
    const lines = formatStackTrace(failureOf("plain")).split("\n");

    expect(lines[0]).toBe("PipeFailure: plain");
    expect(lines[lines.length - 2]).toBe("Caused by: plain");
  });

  it("follows nested causes", () => {
    const root = new Error("root");
    const middle = new Error("middle", { cause: root });
    const lines = formatStackTrace(failureOf(middle)).split("\n");

    const middleAt = lines.indexOf("Caused by: Error: middle");
    const rootAt = lines.indexOf("Caused by: Error: root");
    expect(middleAt).toBeGreaterThan(0);
    expect(rootAt).toBeGreaterThan(middleAt);
  });

  it("stops at a cause chain that loops back", () => {
    const first = new Error("first");
    const second = new Error("second", { cause: first });
    first.cause = second;

    const lines = formatStackTrace(failureOf(first)).split("\n");

    expect(lines[0]).toBe("PipeFailure: Error: first");
    expect(lines.filter((line) => line.startsWith("Caused by:"))).toEqual([
      "Caused by: Error: first",
      "Caused by: Error: second",
      "Caused by: [CIRCULAR REFERENCE: Error: first]",
    ]);
  });
});
