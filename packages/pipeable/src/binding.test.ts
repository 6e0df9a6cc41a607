/**
 * Tests for binding.ts - default and observed binding rules
 */
import { describe, it, expect, vi } from "vitest";
import {
  defaultBinding,
  observeBinding,
  operateToPipe,
  operateToResult,
  type BindingRule,
  type PipeEvent,
} from "./binding";
import { PipeFailure } from "./errors";
import { nullSafe, operator } from "./operator";
import { Pipe, dataOf, type Nullable } from "./pipe";
import { pipe } from "./chain";
import { trimmed } from "./strings";

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

describe("defaultBinding", () => {
  it("applies an ordinary operator to a present value", () => {
    expect(operateToResult(operator((s: string) => s.length), Pipe.of("Hello"))).toBe(5);
  });

  it("skips an ordinary operator on a null or undefined value", () => {
    const length = vi.fn((s: string) => s.length);
    const op = operator(length);

    expect(operateToResult(op, Pipe.empty<string>())).toBeNull();
    expect(operateToResult(op, Pipe.of<string>(undefined))).toBeNull();
    expect(operateToResult(op, null)).toBeNull();
    expect(length).not.toHaveBeenCalled();
  });

  it("runs a null-safe operator on a null value", () => {
    const presence = nullSafe((s: Nullable<string>) => (s == null ? "absent" : "present"));

    expect(operateToResult(presence, Pipe.empty<string>())).toBe("absent");
    expect(operateToResult(presence, null)).toBe("absent");
    expect(operateToResult(presence, Pipe.of("x"))).toBe("present");
  });

  it("wraps what an operator throws", () => {
    const thrown = thrownBy(() => operateToResult(operator(burn), Pipe.of("a")));

    expect(thrown).toBeInstanceOf(PipeFailure);
    if (!(thrown instanceof PipeFailure)) return;
    expect(thrown.cause).toBeInstanceOf(Error);
    expect(thrown.operator).toBe("burn");
  });

  it("passes a pipeable result on as is", () => {
    const next = Pipe.of(10);
    expect(operateToPipe(operator((_s: string) => next), Pipe.of("a"))).toBe(next);
  });

  it("wraps a plain result in a new pipe", () => {
    const lifted = operateToPipe(operator((s: string) => s.length), Pipe.of("abc"));

    expect(lifted).toBeInstanceOf(Pipe);
    expect(dataOf(lifted)).toBe(3);
  });

  it("lifts a skipped stage into an empty pipe", () => {
    const lifted = operateToPipe(operator((s: string) => s.length), Pipe.empty<string>());
    expect(dataOf(lifted)).toBeNull();
  });

  it("is a frozen singleton", () => {
    expect(Object.isFrozen(defaultBinding)).toBe(true);
  });
});

describe("observeBinding", () => {
  const upper = operator((s: string) => s.toUpperCase(), "upper");

  it("logs every applied stage", () => {
    const lines: string[] = [];
    const binding = observeBinding({ logger: (line) => lines.push(line) });

    const result = pipe(" hi ", { binding }).next(trimmed()).next(upper).result();

    expect(result).toBe("HI");
    expect(lines).toEqual([
      "[pipeable] apply trimmed",
      "[pipeable] done trimmed",
      "[pipeable] apply upper",
      "[pipeable] done upper",
    ]);
  });

  it("reports skipped stages", () => {
    const lines: string[] = [];
    const events: PipeEvent[] = [];
    const binding = observeBinding({
      logger: (line) => lines.push(line),
      onEvent: (event) => events.push(event),
    });

    expect(pipe<string>(null, { binding }).next(upper).result()).toBeNull();
    expect(lines).toEqual(["[pipeable] skip upper: null input"]);
    expect(events.map((event) => event.type)).toEqual(["stage_skipped"]);
  });

  it("reports failing stages and rethrows", () => {
    const lines: string[] = [];
    const events: PipeEvent[] = [];
    const binding = observeBinding({
      logger: (line) => lines.push(line),
      onEvent: (event) => events.push(event),
    });

    const thrown = thrownBy(() => pipe("a", { binding }).next(burn).result());

    expect(thrown).toBeInstanceOf(PipeFailure);
    expect(lines).toEqual(["[pipeable] apply burn", "[pipeable] fail burn: Error: burned"]);
    expect(events.map((event) => event.type)).toEqual(["stage_start", "stage_error"]);
    const last = events[events.length - 1];
    expect(last?.type === "stage_error" && last.error).toBe(thrown);
  });

  it("marks null-safe stages in start events", () => {
    const events: PipeEvent[] = [];
    const binding = observeBinding({ onEvent: (event) => events.push(event) });
    const fallback = nullSafe((s: Nullable<string>) => s ?? "none", "fallback");

    pipe<string>(null, { binding }).next(fallback).result();

    expect(events[0]).toMatchObject({ type: "stage_start", operator: "fallback", nullSafe: true });
    expect(events[1]).toMatchObject({ type: "stage_success", operator: "fallback" });
  });

  it("names anonymous stages", () => {
    const lines: string[] = [];
    const binding = observeBinding({ logger: (line) => lines.push(line) });

    pipe(2, { binding })
      .next((n) => n + 1)
      .result();

    expect(lines).toEqual(["[pipeable] apply anonymous", "[pipeable] done anonymous"]);
  });

  it("delegates to the base rule", () => {
    let calls = 0;
    const base: BindingRule = {
      operate: (op, source) => {
        calls += 1;
        return defaultBinding.operate(op, source);
      },
      operateToPipe: (op, source) => defaultBinding.operateToPipe(op, source),
    };
    const binding = observeBinding({ base });

    expect(pipe("abc", { binding }).next((s) => s.length).result()).toBe(3);
    expect(calls).toBe(1);
  });
});
