import { describe, it, expect } from "vitest";
import {
  assignCorefEntityIds,
  computeCoref,
  regexBackend,
  selectCorefBackend,
  unifyWithAliasClusters,
  winkBackend,
  COREF_SOURCE,
} from "./coref.js";
import { createSpan } from "./span.js";
import { Seeder } from "./seed.js";
import type { EntitySpan, SpanAttrs } from "./types.js";
import { createMemoryLogger } from "../logger.js";

const seeder = new Seeder({ secret: "test-secret", scope: Buffer.from("coref-test") });

function person(text: string, surface: string, attrs: SpanAttrs = {}, from = 0): EntitySpan {
  const start = text.indexOf(surface, from);
  return createSpan({
    start,
    end: start + surface.length,
    text: surface,
    label: "PERSON",
    source: "names_person",
    confidence: 0.9,
    attrs,
  });
}

// =============================================================================
// Linking
// =============================================================================

describe("computeCoref", () => {
  it("links honorific surnames and pronouns to the full name", () => {
    const text = "John Doe signed. Later Mr. Doe paid. He left.";
    const spans = [person(text, "John Doe"), person(text, "Mr. Doe", { surname_only: true })];
    const result = computeCoref(text, spans, regexBackend);

    expect(result.backend).toBe("regex");
    expect(result.chains).toHaveLength(1);
    expect(result.chains[0].head).toEqual({ start: 0, end: 8, kind: "name", text: "John Doe" });
    expect(result.chains[0].mentions).toEqual([
      { start: 0, end: 8, kind: "name" },
      { start: 23, end: 30, kind: "surname" },
      { start: 37, end: 39, kind: "pronoun" },
    ]);
    expect(result.added).toEqual([]);
  });

  it("turns a bare surname repeat into a PERSON span", () => {
    const text = "Jane Roe arrived. Roe signed.";
    const result = computeCoref(text, [person(text, "Jane Roe")], regexBackend);
    expect(result.added.map((s) => [s.start, s.end, s.label, s.source])).toEqual([[18, 21, "PERSON", COREF_SOURCE]]);
    expect(result.added[0].attrs.surname_only).toBe(true);
  });

  it("does not reach pronouns more than one sentence away", () => {
    const text = "Jane Roe left. It rained. Then it snowed. She returned.";
    const result = computeCoref(text, [person(text, "Jane Roe")], regexBackend);
    expect(result.chains[0].mentions.map((m) => m.kind)).toEqual(["name"]);
  });

  it("merges repeated full names into one chain", () => {
    const text = "Jane Roe signed. JANE ROE initialled.";
    const result = computeCoref(text, [person(text, "Jane Roe"), person(text, "JANE ROE")], regexBackend);
    expect(result.chains).toHaveLength(1);
    expect(result.chains[0].mentions).toHaveLength(2);
  });

  it("merges different people who share a surname", () => {
    const text = "John Doe sold the farm. Mrs. Doe bought it.";
    const spans = [person(text, "John Doe"), person(text, "Mrs. Doe", { surname_only: true })];
    const linked = assignCorefEntityIds(spans, unifyWithAliasClusters(computeCoref(text, spans, regexBackend), spans, seeder));
    expect(linked[0].entityId).toBe(seeder.token("ENTITY_CLUSTER", "John Doe", 20));
    expect(linked[1].entityId).toBe(linked[0].entityId);
  });
});

// =============================================================================
// Ids
// =============================================================================

describe("entity ids", () => {
  it("adopts an alias cluster id carried by a member span", () => {
    const text = "John Doe signed. Later Mr. Doe paid.";
    const spans = [
      createSpan({ ...person(text, "John Doe"), attrs: {}, entityId: "cluster-x" }),
      person(text, "Mr. Doe", { surname_only: true }),
    ];
    const unified = unifyWithAliasClusters(computeCoref(text, spans, regexBackend), spans, seeder);
    expect(unified.chains.map((c) => c.id)).toEqual(["cluster-x"]);

    const linked = assignCorefEntityIds(spans, unified);
    expect(linked.map((s) => s.entityId)).toEqual(["cluster-x", "cluster-x"]);
  });

  it("ids surname repeats and leaves pronouns without spans", () => {
    const text = "Jane Roe arrived. Roe signed. She left.";
    const spans = [person(text, "Jane Roe")];
    const linked = assignCorefEntityIds(spans, unifyWithAliasClusters(computeCoref(text, spans, regexBackend), spans, seeder));
    const id = seeder.token("ENTITY_CLUSTER", "Jane Roe", 20);
    expect(linked.map((s) => [s.text, s.entityId])).toEqual([
      ["Jane Roe", id],
      ["Roe", id],
    ]);
  });
});

// =============================================================================
// Backends
// =============================================================================

describe("backends", () => {
  it("returns the regex backend on request", () => {
    expect(selectCorefBackend("regex")).toBe(regexBackend);
  });

  it("finds pronouns with wink", () => {
    const wink = winkBackend();
    expect(wink.available).toBe(true);
    if (!wink.available) return;
    expect(wink.handle.candidates("She met him.").pronouns).toEqual([
      [0, 3],
      [8, 11],
    ]);
  });

  it("prefers wink under auto without warnings", () => {
    const logger = createMemoryLogger();
    expect(selectCorefBackend("auto", { logger }).name).toBe("wink");
    expect(logger.lines).toEqual([]);
  });
});
