import { describe, it, expect } from "vitest";
import { buildDetectors } from "./index.js";
import { resolveConfig } from "../config/config.js";

describe("buildDetectors", () => {
  it("returns the detectors in run order", () => {
    const detectors = buildDetectors(resolveConfig());
    expect(detectors.map((d) => d.name())).toEqual([
      "email",
      "phone",
      "account_ids",
      "address",
      "date_generic",
      "date_dob",
      "person",
      "org",
      "bank_org",
      "aliases",
    ]);
    expect(Object.isFrozen(detectors)).toBe(true);
  });

  it("appends the NER detector when enabled", () => {
    const detectors = buildDetectors(resolveConfig({ detectors: { ner: { enabled: true, required: false } } }));
    expect(detectors.map((d) => d.name()).at(-1)).toBe("ner");
  });

  it("passes the generic account toggle through", () => {
    const [, , accounts] = buildDetectors(resolveConfig({ detectors: { account_ids: { generic: false } } }));
    expect(accounts.detect("Account No. 00123-4567-89")).toEqual([]);
  });
});
