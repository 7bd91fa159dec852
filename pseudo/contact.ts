/**
 * Email and phone surrogates. Both land in a reserved namespace
 * (`example.org`, the 555 exchange) that the verification scanner discounts.
 */

import type { SeedSource } from "../engine/seed.js";
import { MAX_ID_LENGTH, MIN_ID_LENGTH } from "../engine/seed.js";
import { formatLike } from "./case-preserver.js";
import { mirrorDigits, randomDigits } from "./numbers.js";

export const SAFE_EMAIL_DOMAIN = "example.org";
const SAFE_EMAIL_DOMAINS = new Set(["example.org", "example.com", "example.net"]);

// =============================================================================
// Email
// =============================================================================

export function emailLike(source: string, key: string, seeds: SeedSource): string {
  const at = source.lastIndexOf("@");
  const local = at >= 0 ? source.slice(0, at) : source;
  const plus = local.indexOf("+");
  const base = plus >= 0 ? local.slice(0, plus) : local;
  const tag = plus >= 0 ? local.slice(plus) : "";

  const alnumCount = [...base].filter((ch) => /[\p{L}\p{N}]/u.test(ch)).length || 1;
  const tokenLength = Math.min(MAX_ID_LENGTH, Math.max(MIN_ID_LENGTH, alnumCount));
  const token = seeds.token("EMAIL", key, tokenLength).slice(0, alnumCount);
  const shaped = base ? formatLike(base, token) : token;
  return `${shaped}${tag}@${SAFE_EMAIL_DOMAIN}`;
}

export function isSafeEmailDomain(domain: string): boolean {
  return SAFE_EMAIL_DOMAINS.has(domain.toLowerCase());
}

/** Domain part of an email address, lower-cased. */
export function emailDomain(email: string): string {
  const at = email.lastIndexOf("@");
  return at >= 0 ? email.slice(at + 1).toLowerCase() : "";
}

// =============================================================================
// Phone
// =============================================================================

/**
 * Phone number with the source's separators and digit count. NANP numbers get
 * a fresh area code and the 555 exchange; a leading country code `1` is kept.
 */
export function phoneLike(source: string, key: string, seeds: SeedSource): string {
  const rng = seeds.rng("PHONE", key);
  const digits = source.replace(/\D/g, "");
  const area = String(rng.int(2, 9)) + randomDigits(rng, 2);
  const line = randomDigits(rng, 4);

  if (digits.length === 10) return mirrorDigits(source, `${area}555${line}`);
  if (digits.length === 11 && digits[0] === "1") return mirrorDigits(source, `1${area}555${line}`);
  if (digits.length < 7) return mirrorDigits(source, randomDigits(rng, digits.length));
  // Other international shapes: country digits redrawn, 555 after the first three
  return mirrorDigits(source, `${area}555${randomDigits(rng, digits.length - 6)}`);
}

/** True for numbers in the reserved 555 exchange. */
export function isSafePhone(text: string): boolean {
  let digits = text.replace(/\D/g, "");
  if (/^1555\d{7}$/.test(digits)) return true;
  if (digits.length === 11 && digits[0] === "1") digits = digits.slice(1);
  return digits.length === 10 && /^[2-9]/.test(digits) && digits.slice(3, 6) === "555";
}
