import { describe, it, expect } from "vitest";
import { createAliasDetector } from "./aliases.js";

const detector = createAliasDetector();

describe("alias detector", () => {
  it("reads a hereinafter nickname with its subject", () => {
    const spans = detector.detect('John Doe, hereinafter "Morgan". Later Morgan met Buyer.');
    expect(spans).toHaveLength(1);
    const [span] = spans;
    expect([span.start, span.end, span.label, span.source, span.confidence]).toEqual([
      23,
      29,
      "ALIAS_LABEL",
      "aliases",
      0.99,
    ]);
    expect(span.attrs).toEqual({
      alias: "Morgan",
      alias_kind: "nickname",
      role_flag: false,
      quote_style: "double",
      trigger: "hereinafter",
      scope_hint: "definition",
      subject_text: "John Doe",
      subject_span: [0, 8],
    });
  });

  it("reads parenthetical role definitions", () => {
    const spans = detector.detect('Acme Widgets LLC (the "Company") and Jane Roe (the "Buyer").');
    expect(spans.map((s) => [s.start, s.end, s.attrs.subject_text, s.attrs.alias_kind, s.attrs.trigger])).toEqual([
      [23, 30, "Acme Widgets LLC", "role", "paren"],
      [52, 57, "Jane Roe", "role", "paren"],
    ]);
    expect(spans[0].attrs.role_flag).toBe(true);
  });

  it("reads party roles in both hereinafter and parenthetical form", () => {
    const spans = detector.detect('John Q. Public (hereinafter "Buyer") and Acme Widgets, LLC (the "Seller") agree.');
    expect(spans.map((s) => [s.text, s.attrs.alias_kind, s.attrs.role_flag, s.attrs.subject_text])).toEqual([
      ["Buyer", "role", true, "John Q. Public"],
      ["Seller", "role", true, "Acme Widgets, LLC"],
    ]);
  });

  it("guesses the subject from the previous line", () => {
    const [span] = detector.detect('Jane Roe\n(the "Seller")');
    expect([span.start, span.end, span.confidence]).toEqual([15, 21, 0.97]);
    expect(span.attrs).toMatchObject({ subject_guess: "Jane Roe", subject_guess_line: 0 });
    expect(span.attrs.subject_span).toBeUndefined();
  });

  it("reads unquoted a/k/a names", () => {
    const [span] = detector.detect("Robert Smith a/k/a Bobby Smith signed.");
    expect([span.start, span.end, span.text]).toEqual([19, 30, "Bobby Smith"]);
    expect(span.attrs).toMatchObject({
      trigger: "aka",
      quote_style: "none",
      scope_hint: "other_name",
      subject_text: "Robert Smith",
      subject_span: [0, 12],
    });
  });

  it("ignores lowercase phrases and boilerplate terms", () => {
    expect(detector.detect("hereinafter called the seller")).toEqual([]);
    expect(detector.detect('This lease (the "Agreement") binds.')).toEqual([]);
  });
});
