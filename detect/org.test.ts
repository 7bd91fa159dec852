import { describe, it, expect } from "vitest";
import { createBankOrgDetector, createOrgDetector } from "./org.js";

const orgs = createOrgDetector();
const banks = createBankOrgDetector();

describe("org detector", () => {
  const text = "This Agreement is between Acme Widgets, LLC and Harbor Trust Company.";

  it("extends a legal suffix left over the capitalized name", () => {
    const spans = orgs.detect(text);
    expect(spans.map((s) => [s.start, s.end, s.text, s.label])).toEqual([[26, 43, "Acme Widgets, LLC", "ORG"]]);
    expect(spans[0].confidence).toBe(0.92);
    expect(spans[0].attrs).toEqual({ base: "Acme Widgets", legal_suffix: "LLC" });
  });

  it("ignores a defined term in quotes", () => {
    const spans = orgs.detect('Acme Widgets LLC (the "Company") agrees.');
    expect(spans.map((s) => s.text)).toEqual(["Acme Widgets LLC"]);
  });

  it("needs a name before the suffix", () => {
    expect(orgs.detect("the Company shall pay")).toEqual([]);
    expect(orgs.detect("Seller Company shall pay")).toEqual([]);
  });
});

describe("bank detector", () => {
  it("finds banks named before and after the keyword", () => {
    const spans = banks.detect("Wire to First Harbor Savings Bank or Pay to Bank of Lakeside, N.A. today");
    expect(spans.map((s) => [s.start, s.end, s.text])).toEqual([
      [8, 33, "First Harbor Savings Bank"],
      [44, 66, "Bank of Lakeside, N.A."],
    ]);
    expect(spans[0].attrs).toEqual({ keyword: "Savings Bank", national_association: false });
    expect(spans[1].attrs).toEqual({ keyword: "Bank", national_association: true });
    expect(spans[1].confidence).toBe(0.93);
  });

  it("leaves trust companies to the bank detector", () => {
    const text = "This Agreement is between Acme Widgets, LLC and Harbor Trust Company.";
    expect(banks.detect(text).map((s) => [s.start, s.end, s.label])).toEqual([[48, 68, "BANK_ORG"]]);
  });

  it("skips a bare keyword", () => {
    expect(banks.detect("the Bank shall notify")).toEqual([]);
  });
});
