/**
 * Plan applier tests
 */

import { describe, it, expect } from "vitest";
import { applyPlan, remapPlan } from "./applier.js";
import { OverlapError, SpanOutOfBoundsError } from "./errors.js";
import type { PlanEntry } from "./types.js";

function entry(start: number, end: number, replacement: string): PlanEntry {
  return { start, end, replacement, label: "OTHER", entityId: null, spanId: null, meta: {} };
}

describe("applyPlan", () => {
  it("splices entries by their original offsets", () => {
    const { text, applied } = applyPlan("AAAA BBBB CCCC", [entry(5, 9, "X"), entry(0, 4, "YY")]);
    expect(text).toBe("YY X CCCC");
    expect(applied.map((e) => [e.start, e.meta.applied_index])).toEqual([
      [0, 1],
      [5, 2],
    ]);
  });

  it("allows touching entries", () => {
    expect(applyPlan("abcdef", [entry(0, 3, "1"), entry(3, 6, "22")]).text).toBe("122");
  });

  it("returns the text unchanged for an empty plan", () => {
    expect(applyPlan("unchanged", [])).toEqual({ text: "unchanged", applied: [] });
  });

  it("rejects overlaps, bad bounds and fractional offsets", () => {
    expect(() => applyPlan("abcdef", [entry(0, 4, "x"), entry(3, 5, "y")])).toThrow(OverlapError);
    expect(() => applyPlan("abc", [entry(1, 9, "x")])).toThrow(SpanOutOfBoundsError);
    expect(() => applyPlan("abc", [entry(-1, 1, "x")])).toThrow(SpanOutOfBoundsError);
    expect(() => applyPlan("abc", [entry(0.5, 2, "x")])).toThrow(TypeError);
  });

  it("rejects an empty entry before checking overlaps", () => {
    expect(() => applyPlan("abcdef", [entry(0, 4, "x"), entry(2, 2, "y")])).toThrow("plan entry [2, 2) is empty");
  });

  it("does not mutate the caller's plan", () => {
    const plan = [entry(5, 9, "X"), entry(0, 4, "YY")];
    applyPlan("AAAA BBBB CCCC", plan);
    expect(plan[0].start).toBe(5);
    expect(plan[0].meta.applied_index).toBeUndefined();
  });
});

describe("remapPlan", () => {
  it("addresses the replacements in the redacted text", () => {
    const { text, applied } = applyPlan("AAAA BBBB CCCC", [entry(5, 9, "X"), entry(0, 4, "YY")]);
    const remapped = remapPlan(applied);
    expect(remapped.map((e) => [e.start, e.end])).toEqual([
      [0, 2],
      [3, 4],
    ]);
    expect(remapped.map((e) => text.slice(e.start, e.end))).toEqual(["YY", "X"]);
  });

  it("makes re-application a no-op", () => {
    const source = "Call Jane at 555-0100 or write to jane@corp.test today.";
    const plan = [entry(5, 9, "Marisol"), entry(13, 21, "555-0199"), entry(34, 48, "q2x@example.org")];
    const first = applyPlan(source, plan);
    const second = applyPlan(first.text, remapPlan(first.applied));
    expect(second.text).toBe(first.text);
  });
});
