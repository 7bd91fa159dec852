import { describe, it, expect } from "vitest";
import { normalizeText } from "./normalizer.js";

describe("normalizeText", () => {
  it("maps no-break spaces to spaces", () => {
    expect(normalizeText("A\u00a0B")).toEqual({ text: "A B", charMap: [0, 1, 2], changed: true });
  });

  it("composes to NFC and keeps the group's start offset", () => {
    expect(normalizeText("e\u0301x")).toEqual({ text: "\u00e9x", charMap: [0, 2], changed: true });
  });

  it("drops zero-width characters and soft hyphens", () => {
    const out = normalizeText("a\u200bb\u00adc\ufeff");
    expect(out.text).toBe("abc");
    expect(out.charMap).toEqual([0, 2, 4]);
  });

  it("straightens curly quotes", () => {
    expect(normalizeText("\u201cBuyer\u201d\u2019s").text).toBe("\"Buyer\"'s");
  });

  it("joins line-wrap hyphenation between letters", () => {
    const out = normalizeText("agree-\nment and co-\r\nop");
    expect(out.text).toBe("agreement and coop");
    expect(out.charMap.slice(4, 7)).toEqual([4, 7, 8]);
  });

  it("keeps real hyphens and line breaks", () => {
    const out = normalizeText("self-made\n42-\nx");
    expect(out.text).toBe("self-made\n42-\nx");
    expect(out.changed).toBe(false);
  });
});
