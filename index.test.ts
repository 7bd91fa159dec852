/**
 * End-to-end tests for the public API
 */

import { describe, it, expect } from "vitest";
import {
  applyPlan,
  buildDetectors,
  redactDocument,
  remapPlan,
  resolveConfig,
  resolveWeights,
  scanText,
} from "./index.js";

const SECRET = "test-secret";

const CONTRACT = [
  'This agreement is made between John Doe (the "Buyer") and Acme Widgets LLC.',
  "Buyer may be reached at john.doe@example.com or (212) 555-7890.",
  "Mail notices to:",
  "42 Harbor Road",
  "Dover, DE 19901",
  "",
].join("\n");

// =============================================================================
// Whole documents
// =============================================================================

describe("redactDocument", () => {
  it("removes every detected value from a contract", () => {
    const result = redactDocument(CONTRACT, { secret: SECRET });
    for (const value of ["John Doe", "Acme Widgets", "john.doe@example.com", "555-7890", "42 Harbor Road", "19901"]) {
      expect(result.redactedText).not.toContain(value);
    }
    expect(result.redactedText.split("\n")).toHaveLength(CONTRACT.split("\n").length);
  });

  it("is idempotent when the remapped plan is applied again", () => {
    const result = redactDocument(CONTRACT, { secret: SECRET });
    const again = applyPlan(result.redactedText, remapPlan(result.applied));
    expect(again.text).toBe(result.redactedText);
  });

  it("keeps the plan sorted and disjoint", () => {
    const { applied } = redactDocument(CONTRACT, { secret: SECRET });
    for (let i = 1; i < applied.length; i++) {
      expect(applied[i].start).toBeGreaterThanOrEqual(applied[i - 1].end);
    }
    expect(applied.map((e) => e.meta.applied_index)).toEqual(applied.map((_, i) => i + 1));
  });

  it("maps one name to one surrogate across documents only when configured", () => {
    const shared = resolveConfig({ pseudonyms: { cross_doc_consistency: true } });
    const a = redactDocument("John Doe signed.\n", { secret: SECRET, config: shared });
    const b = redactDocument("Later, John Doe paid.\n", { secret: SECRET, config: shared });
    expect(a.plan.map((e) => [e.start, e.end, e.label])).toEqual([[0, 8, "PERSON"]]);
    expect(b.plan.map((e) => [e.start, e.end, e.label])).toEqual([[7, 15, "PERSON"]]);
    expect(b.plan[0].replacement).toBe(a.plan[0].replacement);
  });
});

// =============================================================================
// Scoring
// =============================================================================

describe("scanText", () => {
  it("adds the PERSON weight for each further unexplained name", () => {
    const config = resolveConfig();
    const detectors = buildDetectors(config);
    const one = scanText("John Doe signed.", config, { detectors });
    const two = scanText("John Doe and Mary Major signed.", config, { detectors });
    expect(one.countsByLabel).toEqual({ PERSON: 1 });
    expect(two.countsByLabel).toEqual({ PERSON: 2 });
    expect(two.score - one.score).toBe(resolveWeights(config).PERSON);
  });
});
