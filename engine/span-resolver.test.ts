/**
 * Span conflict resolver tests
 */

import { describe, it, expect } from "vitest";
import { resolveSpans, UNRANKED, precedenceRank } from "./span-resolver.js";
import { createSpan, overlaps } from "./span.js";
import type { EntityLabel, EntitySpan } from "./types.js";
import { SeededRng } from "./rng.js";
import { createMemoryLogger } from "../logger.js";

const PRECEDENCE: EntityLabel[] = ["ACCOUNT_ID", "EMAIL", "PHONE", "ADDRESS_BLOCK", "PERSON", "ORG"];

function span(start: number, end: number, label: EntityLabel, confidence = 0.9, source = "test"): EntitySpan {
  return createSpan({ start, end, label, confidence, source, text: "x".repeat(end - start) });
}

function pairwiseDisjoint(spans: EntitySpan[]): boolean {
  for (let i = 0; i < spans.length; i++) {
    for (let j = i + 1; j < spans.length; j++) {
      if (overlaps(spans[i], spans[j])) return false;
    }
  }
  return true;
}

describe("resolveSpans", () => {
  it("prefers the higher-precedence label over an equal-length span", () => {
    const out = resolveSpans([span(0, 10, "PERSON"), span(0, 10, "EMAIL")], PRECEDENCE);
    expect(out.map((s) => s.label)).toEqual(["EMAIL"]);
  });

  it("keeps a whole address block over its lines", () => {
    const block = span(0, 40, "ADDRESS_BLOCK");
    const out = resolveSpans([span(0, 15, "ADDRESS_BLOCK"), block, span(16, 40, "ADDRESS_BLOCK")], PRECEDENCE);
    expect(out).toEqual([block]);
  });

  it("ranks unlisted labels last", () => {
    expect(precedenceRank(PRECEDENCE)("DOB")).toBe(UNRANKED);
    const out = resolveSpans([span(0, 20, "DOB"), span(5, 8, "ORG")], PRECEDENCE);
    expect(out.map((s) => s.label)).toEqual(["ORG"]);
  });

  it("collapses duplicates by confidence and then by source", () => {
    const low = span(0, 4, "PERSON", 0.7, "a");
    const high = span(0, 4, "PERSON", 0.95, "z");
    expect(resolveSpans([low, high], PRECEDENCE)).toEqual([high]);

    const b = span(0, 4, "PERSON", 0.9, "beta");
    const a = span(0, 4, "PERSON", 0.9, "alpha");
    expect(resolveSpans([b, a], PRECEDENCE)).toEqual([a]);
  });

  it("keeps touching spans and returns them by start", () => {
    const out = resolveSpans([span(5, 9, "ORG"), span(0, 5, "PERSON")], PRECEDENCE);
    expect(out.map((s) => [s.start, s.end])).toEqual([
      [0, 5],
      [5, 9],
    ]);
  });

  it("drops structurally invalid spans", () => {
    const logger = createMemoryLogger();
    const bogus = { ...span(0, 4, "PERSON"), start: 4, end: 2 };
    const out = resolveSpans([bogus, span(5, 7, "ORG")], PRECEDENCE, logger);
    expect(out.map((s) => s.start)).toEqual([5]);
    expect(logger.lines).toEqual(["debug dropping invalid span label=PERSON [4, 2)"]);
  });

  it("never returns overlapping spans and is order independent", () => {
    const rng = new SeededRng(new Uint8Array(16).fill(42));
    const labels: EntityLabel[] = ["PERSON", "ORG", "EMAIL", "DOB", "PHONE"];
    for (let round = 0; round < 200; round++) {
      const spans = Array.from({ length: 12 }, () => {
        const start = rng.int(0, 60);
        return span(start, start + rng.int(1, 15), rng.pick(labels), rng.int(50, 100) / 100, rng.pick(["a", "b"]));
      });
      const out = resolveSpans(spans, PRECEDENCE);
      expect(pairwiseDisjoint(out)).toBe(true);
      expect(resolveSpans(rng.shuffle(spans), PRECEDENCE)).toEqual(out);
    }
  });
});
