import { describe, it, expect } from "vitest";
import { classifyNameToken, createPersonDetector, scorePersonName } from "./person.js";

const detector = createPersonDetector();

function found(text: string) {
  return detector.detect(text).map((s) => [s.start, s.end, s.text]);
}

// =============================================================================
// Scoring
// =============================================================================

describe("scorePersonName", () => {
  it("puts two name tokens exactly at the threshold", () => {
    expect(scorePersonName(["John", "Doe"])).toBe(0.6);
  });

  it("rewards initials, particles and suffixes", () => {
    expect(scorePersonName(["John", "Q.", "Public"])).toBe(0.75);
    expect(scorePersonName(["Mary", "Ann", "de", "Souza"])).toBe(0.85);
    expect(scorePersonName(["Jane", "Q.", "Public", "Jr."])).toBe(0.8);
  });

  it("grows with each added name token", () => {
    const scores = [["John"], ["John", "Doe"], ["John", "Adams", "Doe"], ["John", "Quincy", "Adams", "Doe"]].map(
      scorePersonName,
    );
    expect(scores).toEqual([0, 0.6, 0.75, 0.9]);
  });

  it("penalizes capitalized boilerplate, digits and roles", () => {
    expect(scorePersonName(["JOHN", "DOE", "OF"])).toBe(0.4);
    expect(scorePersonName(["John", "Doe2"])).toBe(0);
    expect(scorePersonName(["Buyer"])).toBe(0);
  });

  it("classifies tokens", () => {
    expect(["Dr.", "Jr.", "Q.", "van", "Smith", "Seller", "LLC", "However"].map(classifyNameToken)).toEqual([
      "honorific",
      "suffix",
      "initial",
      "particle",
      "core",
      "role",
      "other",
      "other",
    ]);
  });
});

// =============================================================================
// Detector
// =============================================================================

describe("person detector", () => {
  it("finds only the full name in an alias sentence", () => {
    const spans = detector.detect('John Doe, hereinafter "Morgan". Later Morgan met Buyer.');
    expect(spans.map((s) => [s.start, s.end, s.text])).toEqual([[0, 8, "John Doe"]]);
    expect(spans[0].confidence).toBe(0.6);
    expect(spans[0].attrs).toEqual({ surname_only: false, honorific: null, suffix: null, score: 0.6 });
  });

  it("keeps honorifics, initials and suffixes in the span", () => {
    const [span] = detector.detect("Dr. Jane Q. Public, Jr. signed.");
    expect([span.start, span.end, span.confidence]).toEqual([0, 23, 0.8]);
    expect(span.attrs).toEqual({ surname_only: false, honorific: "Dr.", suffix: "Jr.", score: 0.8 });
  });

  it("reads an honorific and surname as a surname-only mention", () => {
    const [span] = detector.detect("Mr. Doe will attend.");
    expect([span.start, span.end, span.text, span.confidence]).toEqual([0, 7, "Mr. Doe", 0.85]);
    expect(span.attrs.surname_only).toBe(true);
  });

  it("skips organization and place names", () => {
    expect(found("Acme Widgets LLC signed.")).toEqual([]);
    expect(found("Acme Widgets L.L.C. signed.")).toEqual([]);
    expect(found("Moved to New York last year.")).toEqual([]);
  });

  it("skips headings and boilerplate", () => {
    expect(found("# John Smith")).toEqual([]);
    expect(found("This Purchase Agreement is effective.")).toEqual([]);
  });

  it("skips banking keywords ahead of a country code", () => {
    expect(classifyNameToken("IBAN")).toBe("other");
    expect(found("Pay to IBAN DE89 3704 0044 0532 0130 00 today.")).toEqual([]);
    expect(found("Wire via SWIFT to Jane Roe.")).toEqual([[18, 26, "Jane Roe"]]);
  });

  it("does not join names across a line break", () => {
    expect(found("Signed by John\nSmith")).toEqual([]);
  });
});
