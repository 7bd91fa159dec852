/**
 * Number surrogates: card, routing, IBAN, SSN, EIN, BIC and generic digit
 * strings. Every generator keeps the source's separators and digit/letter
 * layout and produces a value that passes the domain's validity rule.
 */

import type { SeededRng } from "../engine/rng.js";
import type { SeedSource } from "../engine/seed.js";
import {
  ABA_VALID_PREFIXES,
  EIN_PREFIXES,
  abaCheckDigit,
  ibanCheckDigits,
  isValidSsn,
  luhnCheckDigit,
} from "./checksums.js";

// =============================================================================
// Layout helpers
// =============================================================================

/** Write `digits` into the digit positions of `source`, in order. */
export function mirrorDigits(source: string, digits: string): string {
  let i = 0;
  let out = "";
  for (const ch of source) {
    if (/\d/.test(ch) && i < digits.length) {
      out += digits[i++];
    } else {
      out += ch;
    }
  }
  return out;
}

/** Write `chars` into the alphanumeric positions of `source`, mirroring letter case. */
export function mirrorAlnum(source: string, chars: string): string {
  let i = 0;
  let out = "";
  for (const ch of source) {
    if (/[A-Za-z0-9]/.test(ch) && i < chars.length) {
      const next = chars[i++];
      out += /[a-z]/.test(ch) ? next.toLowerCase() : next.toUpperCase();
    } else {
      out += ch;
    }
  }
  return out;
}

export function randomDigits(rng: SeededRng, count: number): string {
  let out = "";
  for (let i = 0; i < count; i++) out += rng.digit();
  return out;
}

/**
 * Replace every ASCII letter and digit with a random one of the same class and
 * case. At least one character differs from the source.
 */
export function mutateAlnum(source: string, rng: SeededRng, options: { letters?: boolean } = {}): string {
  const mutateLetters = options.letters ?? true;
  const chars = [...source];
  const positions: number[] = [];
  const out = chars.map((ch, i) => {
    if (/\d/.test(ch)) {
      positions.push(i);
      return rng.digit();
    }
    if (mutateLetters && /[A-Za-z]/.test(ch)) {
      positions.push(i);
      const letter = rng.upperLetter();
      return /[a-z]/.test(ch) ? letter.toLowerCase() : letter;
    }
    return ch;
  });
  if (positions.length > 0 && out.join("") === source) {
    const pos = positions[positions.length - 1];
    const ch = chars[pos];
    if (/\d/.test(ch)) {
      out[pos] = String((Number(ch) + rng.int(1, 9)) % 10);
    } else {
      const base = /[a-z]/.test(ch) ? 97 : 65;
      out[pos] = String.fromCharCode(base + ((ch.charCodeAt(0) - base + rng.int(1, 25)) % 26));
    }
  }
  return out.join("");
}

/** Digits only; letters and separators stay. */
export function mutateDigits(source: string, rng: SeededRng): string {
  return mutateAlnum(source, rng, { letters: false });
}

// =============================================================================
// Generators
// =============================================================================

export function ccLike(source: string, key: string, seeds: SeedSource): string {
  const rng = seeds.rng("ACCOUNT_CC", key);
  const n = source.replace(/\D/g, "").length;
  if (n < 2) return mutateAlnum(source, rng);
  // Keep the scheme digit so the number still reads as the same card brand
  const first = source.replace(/\D/g, "")[0];
  const payload = first + randomDigits(rng, n - 2);
  return mirrorDigits(source, payload + luhnCheckDigit(payload));
}

export function routingLike(source: string, key: string, seeds: SeedSource): string {
  const rng = seeds.rng("ACCOUNT_ROUTING", key);
  const eight = rng.pick(ABA_VALID_PREFIXES) + randomDigits(rng, 6);
  return mirrorDigits(source, eight + abaCheckDigit(eight));
}

export function ibanLike(source: string, key: string, seeds: SeedSource): string {
  const rng = seeds.rng("ACCOUNT_IBAN", key);
  const compact = source.replace(/[^A-Za-z0-9]/g, "").toUpperCase();
  if (!/^[A-Z]{2}\d{2}/.test(compact)) return mutateAlnum(source, rng);
  const country = compact.slice(0, 2);
  let bban = "";
  for (const ch of compact.slice(4)) {
    bban += /\d/.test(ch) ? rng.digit() : rng.upperLetter();
  }
  return mirrorAlnum(source, country + ibanCheckDigits(country, bban) + bban);
}

export function ssnLike(source: string, key: string, seeds: SeedSource): string {
  const rng = seeds.rng("ACCOUNT_SSN", key);
  let digits = "";
  do {
    const area = String(rng.int(1, 899)).padStart(3, "0");
    const group = String(rng.int(1, 99)).padStart(2, "0");
    const serial = String(rng.int(1, 9999)).padStart(4, "0");
    digits = area + group + serial;
  } while (!isValidSsn(digits));
  return mirrorDigits(source, digits);
}

export function einLike(source: string, key: string, seeds: SeedSource): string {
  const rng = seeds.rng("ACCOUNT_EIN", key);
  return mirrorDigits(source, rng.pick(EIN_PREFIXES) + randomDigits(rng, 7));
}

export function bicLike(source: string, key: string, seeds: SeedSource): string {
  const rng = seeds.rng("ACCOUNT_BIC", key);
  const chars = [...source];
  // Positions 5-6 carry the ISO country code; keep them
  const out = chars.map((ch, i) => {
    if (i === 4 || i === 5) return ch;
    if (/\d/.test(ch)) return rng.digit();
    if (/[A-Za-z]/.test(ch)) return /[a-z]/.test(ch) ? rng.upperLetter().toLowerCase() : rng.upperLetter();
    return ch;
  });
  return out.join("");
}

export function genericDigitsLike(source: string, key: string, seeds: SeedSource): string {
  return mutateAlnum(source, seeds.rng("ACCOUNT_GENERIC", key));
}
