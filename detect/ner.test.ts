import { describe, it, expect } from "vitest";
import { createNerDetector } from "./ner.js";

const detector = createNerDetector({ required: true });

describe("ner detector", () => {
  it("reports gazetteer places as GPE", () => {
    const places = detector
      .detect("Offices in Springfield and Texas.")
      .filter((s) => s.label === "GPE")
      .map((s) => [s.start, s.end, s.text, s.confidence]);
    expect(places).toEqual([
      [11, 22, "Springfield", 0.9],
      [27, 32, "Texas", 0.9],
    ]);
  });

  it("prefers the longest place name", () => {
    const [span] = detector.detect("Flights to New York tonight").filter((s) => s.label === "GPE");
    expect(span.text).toBe("New York");
  });

  it("scores proper-noun runs as names", () => {
    const people = detector.detect("Maria Gonzalez signed the lease.").filter((s) => s.label === "PERSON");
    expect(people.map((s) => [s.start, s.end, s.source])).toEqual([[0, 14, "ner"]]);
  });
});
