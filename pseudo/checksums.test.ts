import { describe, it, expect } from "vitest";
import {
  abaCheckDigit,
  ibanCheckDigits,
  isLuhnValid,
  isValidBic,
  isValidEin,
  isValidIban,
  isValidRoutingNumber,
  isValidSsn,
  luhnCheckDigit,
} from "./checksums.js";

describe("checksums", () => {
  it("validates Luhn numbers and computes check digits", () => {
    expect(isLuhnValid("4111111111111111")).toBe(true);
    expect(isLuhnValid("4111111111111112")).toBe(false);
    expect(luhnCheckDigit("411111111111111")).toBe("1");
  });

  it("validates ABA routing numbers", () => {
    expect(isValidRoutingNumber("011000015")).toBe(true);
    expect(isValidRoutingNumber("011000016")).toBe(false);
    // Prefix 50 is not an assigned range
    expect(isValidRoutingNumber("500000005")).toBe(false);
    expect(abaCheckDigit("01100001")).toBe("5");
  });

  it("validates IBANs with mod-97", () => {
    expect(isValidIban("GB82 WEST 1234 5698 7654 32")).toBe(true);
    expect(isValidIban("GB83 WEST 1234 5698 7654 32")).toBe(false);
    expect(ibanCheckDigits("GB", "WEST12345698765432")).toBe("82");
  });

  it("rejects reserved SSN ranges", () => {
    expect(isValidSsn("123-45-6789")).toBe(true);
    expect(isValidSsn("000-12-3456")).toBe(false);
    expect(isValidSsn("666-12-3456")).toBe(false);
    expect(isValidSsn("912-34-5678")).toBe(false);
    expect(isValidSsn("123-00-4567")).toBe(false);
    expect(isValidSsn("123-45-0000")).toBe(false);
  });

  it("checks EIN prefixes and BIC shape", () => {
    expect(isValidEin("12-3456789")).toBe(true);
    expect(isValidEin("07-3456789")).toBe(false);
    expect(isValidBic("DEUTDEFF")).toBe(true);
    expect(isValidBic("DEUTDEFF500")).toBe(true);
    expect(isValidBic("DEUT1EFF")).toBe(false);
  });
});
