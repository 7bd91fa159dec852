/**
 * Seed derivation and RNG tests
 */

import { describe, it, expect } from "vitest";
import {
  Seeder,
  base32,
  canonicalizeKey,
  docHash,
  docHashB32,
  docScope,
  rngFor,
  stableId,
} from "./seed.js";
import { SeededRng } from "./rng.js";

const SECRET = "test-secret";

function draws(rng: SeededRng, n: number): number[] {
  return Array.from({ length: n }, () => rng.nextUint32());
}

// =============================================================================
// Canonicalization & encoding
// =============================================================================

describe("canonicalizeKey", () => {
  it("trims, collapses whitespace and lower-cases", () => {
    expect(canonicalizeKey("  John \t\n DOE ")).toBe("john doe");
  });

  it("normalizes to NFC", () => {
    expect(canonicalizeKey("Jose\u0301")).toBe("jos\u00e9");
  });
});

describe("base32", () => {
  it("encodes RFC 4648 vectors without padding", () => {
    expect(base32(Buffer.from(""))).toBe("");
    expect(base32(Buffer.from("f"))).toBe("my");
    expect(base32(Buffer.from("foobar"))).toBe("mzxw6ytboi");
  });

  it("renders the document hash in 52 characters", () => {
    expect(docHashB32("hello")).toHaveLength(52);
    expect(docHashB32("hello")).toMatch(/^[a-z2-7]+$/);
  });
});

// =============================================================================
// Scope
// =============================================================================

describe("docScope", () => {
  it("uses the bare document digest when there is no secret", () => {
    expect(docScope({ crossDocConsistency: false }, "abc").equals(docHash("abc"))).toBe(true);
  });

  it("is per document unless cross-document consistency is on", () => {
    const a = docScope({ secret: SECRET, crossDocConsistency: false }, "doc one");
    const b = docScope({ secret: SECRET, crossDocConsistency: false }, "doc two");
    expect(a.equals(b)).toBe(false);

    const g1 = docScope({ secret: SECRET, crossDocConsistency: true }, "doc one");
    const g2 = docScope({ secret: SECRET, crossDocConsistency: true }, "doc two");
    expect(g1.equals(g2)).toBe(true);
  });

  it("keys the cross-document constant by the secret", () => {
    const a = docScope({ secret: SECRET, crossDocConsistency: true }, "x");
    const b = docScope({ secret: "other-secret", crossDocConsistency: true }, "x");
    expect(a.equals(b)).toBe(false);
  });
});

// =============================================================================
// Derivation
// =============================================================================

describe("stableId", () => {
  const scope = docScope({ secret: SECRET, crossDocConsistency: false }, "document");

  it("is deterministic and canonicalizes the key", () => {
    const a = stableId("PERSON", "John Doe", { secret: SECRET, scope });
    const b = stableId("PERSON", "  john   doe ", { secret: SECRET, scope });
    expect(a).toBe(b);
    expect(a).toHaveLength(20);
    expect(a).toMatch(/^[a-z2-7]{20}$/);
  });

  it("separates kinds, keys and secrets", () => {
    const base = stableId("PERSON", "John Doe", { secret: SECRET, scope });
    expect(stableId("ORG", "John Doe", { secret: SECRET, scope })).not.toBe(base);
    expect(stableId("PERSON", "Jane Doe", { secret: SECRET, scope })).not.toBe(base);
    expect(stableId("PERSON", "John Doe", { secret: "other-secret", scope })).not.toBe(base);
    expect(stableId("PERSON", "John Doe", { scope })).not.toBe(base);
  });

  it("honours the length bounds", () => {
    expect(stableId("K", "k", { scope, length: 8 })).toHaveLength(8);
    expect(stableId("K", "k", { scope, length: 52 })).toHaveLength(52);
    expect(() => stableId("K", "k", { scope, length: 7 })).toThrow(RangeError);
    expect(() => stableId("K", "k", { scope, length: 53 })).toThrow(RangeError);
  });
});

describe("rngFor", () => {
  const scope = docScope({ secret: SECRET, crossDocConsistency: false }, "document");

  it("replays the same stream for the same inputs", () => {
    const a = rngFor("PERSON", "John Doe", { secret: SECRET, scope });
    const b = rngFor("PERSON", "john doe", { secret: SECRET, scope });
    expect(draws(a, 32)).toEqual(draws(b, 32));
  });

  it("diverges for different keys", () => {
    const a = rngFor("PERSON", "John Doe", { secret: SECRET, scope });
    const b = rngFor("PERSON", "Jane Doe", { secret: SECRET, scope });
    expect(draws(a, 8)).not.toEqual(draws(b, 8));
  });
});

// =============================================================================
// Seeder
// =============================================================================

describe("Seeder", () => {
  it("reports whether a secret is present", () => {
    expect(Seeder.forDocument({ secret: SECRET, crossDocConsistency: false }, "t").seedPresent).toBe(true);
    expect(Seeder.forDocument({ crossDocConsistency: false }, "t").seedPresent).toBe(false);
    expect(Seeder.forDocument({ secret: "", crossDocConsistency: false }, "t").seedPresent).toBe(false);
  });

  it("does not expose the secret", () => {
    const seeder = Seeder.forDocument({ secret: SECRET, crossDocConsistency: false }, "t");
    expect(JSON.stringify(seeder)).not.toContain(SECRET);
    expect(Object.values(seeder)).not.toContain(SECRET);
  });

  it("matches the free functions", () => {
    const scope = docScope({ secret: SECRET, crossDocConsistency: false }, "t");
    const seeder = new Seeder({ secret: SECRET, scope });
    expect(seeder.token("EMAIL", "a@b.c", 12)).toBe(stableId("EMAIL", "a@b.c", { secret: SECRET, scope, length: 12 }));
    expect(draws(seeder.rng("X", "k"), 4)).toEqual(draws(rngFor("X", "k", { secret: SECRET, scope }), 4));
  });
});

// =============================================================================
// SeededRng
// =============================================================================

describe("SeededRng", () => {
  it("rejects short seeds", () => {
    expect(() => new SeededRng(new Uint8Array(8))).toThrow(RangeError);
  });

  it("keeps int() within inclusive bounds", () => {
    const rng = new SeededRng(new Uint8Array(16).fill(3));
    for (let i = 0; i < 500; i++) {
      const n = rng.int(-2, 2);
      expect(n).toBeGreaterThanOrEqual(-2);
      expect(n).toBeLessThanOrEqual(2);
    }
    expect(() => rng.int(3, 2)).toThrow(RangeError);
  });

  it("shuffles into a permutation without touching the input", () => {
    const rng = new SeededRng(new Uint8Array(16).fill(9));
    const items = [1, 2, 3, 4, 5, 6];
    const out = rng.shuffle(items);
    expect(items).toEqual([1, 2, 3, 4, 5, 6]);
    expect([...out].sort((a, b) => a - b)).toEqual(items);
  });

  it("produces digits and upper-case letters", () => {
    const rng = new SeededRng(new Uint8Array(16).fill(1));
    for (let i = 0; i < 100; i++) {
      expect(rng.digit()).toMatch(/^\d$/);
      expect(rng.upperLetter()).toMatch(/^[A-Z]$/);
    }
  });
});
