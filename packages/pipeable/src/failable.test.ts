/**
 * Tests for failable.ts - graceful conversion
 */
import { describe, it, expect } from "vitest";
import { attempt, gracefully, wrapFailure } from "./failable";
import { PipeFailure } from "./errors";

function thrownBy(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error("expected a throw");
}

const burn = (_value: string): string => {
  throw new Error("burned");
};

describe("gracefully", () => {
  it("returns the function's value", () => {
    const length = gracefully((s: string) => s.length);
    expect(length("Hello")).toBe(5);
  });

  it("wraps a thrown error with the error as cause", () => {
    const thrown = thrownBy(() => gracefully(burn)("a"));

    expect(thrown).toBeInstanceOf(PipeFailure);
    if (!(thrown instanceof PipeFailure)) return;
    expect(thrown.cause).toBeInstanceOf(Error);
    expect(thrown.message).toBe("Error: burned");
    expect(thrown.operator).toBe("burn");
  });

  it("prefers an explicit name", () => {
    const thrown = thrownBy(() => gracefully(burn, "ignite")("a"));
    expect(thrown instanceof PipeFailure && thrown.operator).toBe("ignite");
  });

  it("wraps thrown non-errors", () => {
    const thrown = thrownBy(() =>
      gracefully(() => {
        throw "plain text";
      })(undefined)
    );

    expect(thrown).toBeInstanceOf(PipeFailure);
    if (!(thrown instanceof PipeFailure)) return;
    expect(thrown.cause).toBe("plain text");
    expect(thrown.message).toBe("plain text");
  });

  it("rethrows a PipeFailure as is", () => {
    const inner = new PipeFailure({ thrown: new Error("inner") });
    const thrown = thrownBy(() =>
      gracefully(() => {
        throw inner;
      })(undefined)
    );

    expect(thrown).toBe(inner);
  });
});

describe("wrapFailure", () => {
  it("keeps a single level of wrapping", () => {
    const cause = new Error("burned");
    const once = wrapFailure(cause, "burn");
    const twice = wrapFailure(once, "outer");

    expect(twice).toBe(once);
    expect(twice.cause).toBe(cause);
    expect(twice.operator).toBe("burn");
  });
});

describe("attempt", () => {
  it("returns ok for a value", () => {
    const parse = attempt((text: string) => Number.parseInt(text, 10));
    expect(parse("42")).toEqual({ ok: true, value: 42 });
  });

  it("returns err with a PipeFailure instead of throwing", () => {
    const result = attempt(burn)("a");

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error).toBeInstanceOf(PipeFailure);
    expect(result.error.message).toBe("Error: burned");
  });
});
