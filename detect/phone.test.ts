import { describe, it, expect } from "vitest";
import { createPhoneDetector } from "./phone.js";

const detector = createPhoneDetector();

describe("phone detector", () => {
  it("finds a grouped North American number", () => {
    const [span, ...rest] = detector.detect("Call (415) 555-2671 today.");
    expect(rest).toEqual([]);
    expect([span.start, span.end, span.text]).toEqual([5, 19, "(415) 555-2671"]);
    expect(span.confidence).toBe(0.99);
    expect(span.attrs).toEqual({
      e164: "+14155552671",
      national: "4155552671",
      country_code: 1,
      region_code: "US",
      had_plus: false,
      extension: null,
    });
  });

  it("keeps the trunk prefix and extension", () => {
    const [span] = detector.detect("Tel: +1 212.555.0199 ext. 12");
    expect([span.start, span.end]).toEqual([5, 28]);
    expect(span.attrs).toMatchObject({ e164: "+12125550199", had_plus: true, extension: "12" });
  });

  it("scores bare digit runs lower", () => {
    const [span] = detector.detect("ph 4155552671");
    expect([span.start, span.end, span.confidence]).toEqual([3, 13, 0.9]);
  });

  it("finds international numbers", () => {
    const [span] = detector.detect("Office: +44 20 7946 0958.");
    expect([span.start, span.end]).toEqual([8, 24]);
    expect(span.attrs).toEqual({
      e164: "+442079460958",
      national: "2079460958",
      country_code: 44,
      region_code: null,
      had_plus: true,
      extension: null,
    });
  });

  it("skips statute references and docket numbers", () => {
    expect(detector.detect("See § 212-555-0100.")).toEqual([]);
    expect(detector.detect("Case No. 415-555-0134")).toEqual([]);
  });
});
