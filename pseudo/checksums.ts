/**
 * Check-digit rules shared by the account-number detector and generators
 */

export function digitsOf(text: string): string {
  return text.replace(/\D/g, "");
}

// =============================================================================
// Luhn (card numbers)
// =============================================================================

export function isLuhnValid(digits: string): boolean {
  if (!/^\d+$/.test(digits)) return false;
  let total = 0;
  for (let i = 0; i < digits.length; i++) {
    let d = Number(digits[digits.length - 1 - i]);
    if (i % 2 === 1) {
      d *= 2;
      if (d > 9) d -= 9;
    }
    total += d;
  }
  return total % 10 === 0;
}

/** Check digit to append to `payload` so the whole passes Luhn. */
export function luhnCheckDigit(payload: string): string {
  for (let d = 0; d <= 9; d++) {
    if (isLuhnValid(payload + d)) return String(d);
  }
  throw new Error(`no Luhn check digit for ${payload.length}-digit payload`);
}

// =============================================================================
// ABA routing numbers
// =============================================================================

const ABA_WEIGHTS = [3, 7, 1, 3, 7, 1, 3, 7, 1];

// First two digits: Federal Reserve districts, thrift and electronic ranges
export const ABA_VALID_PREFIXES = [
  ...range(0, 12),
  ...range(21, 32),
  ...range(61, 72),
  80,
].map((n) => String(n).padStart(2, "0"));

function range(lo: number, hi: number): number[] {
  const out: number[] = [];
  for (let n = lo; n <= hi; n++) out.push(n);
  return out;
}

export function isValidRoutingNumber(num: string): boolean {
  if (!/^\d{9}$/.test(num)) return false;
  if (!ABA_VALID_PREFIXES.includes(num.slice(0, 2))) return false;
  let total = 0;
  for (let i = 0; i < 9; i++) total += Number(num[i]) * ABA_WEIGHTS[i];
  return total % 10 === 0;
}

export function abaCheckDigit(eight: string): string {
  let total = 0;
  for (let i = 0; i < 8; i++) total += Number(eight[i]) * ABA_WEIGHTS[i];
  return String((10 - (total % 10)) % 10);
}

// =============================================================================
// IBAN (ISO 13616 mod-97)
// =============================================================================

/** Per-country IBAN lengths for the countries we validate strictly. */
export const IBAN_LENGTHS: Record<string, number> = {
  AD: 24, AT: 20, BE: 16, BG: 22, CH: 21, CY: 28, CZ: 24, DE: 22, DK: 18, EE: 20,
  ES: 24, FI: 18, FR: 27, GB: 22, GR: 27, HR: 21, HU: 28, IE: 22, IS: 26, IT: 27,
  LI: 21, LT: 20, LU: 20, LV: 21, MC: 27, MT: 31, NL: 18, NO: 15, PL: 28, PT: 25,
  RO: 24, SE: 24, SI: 19, SK: 24, SM: 27,
};

function mod97(numeric: string): number {
  let remainder = 0;
  for (const ch of numeric) {
    remainder = (remainder * 10 + Number(ch)) % 97;
  }
  return remainder;
}

function ibanNumeric(rearranged: string): string {
  let out = "";
  for (const ch of rearranged) {
    out += /[A-Z]/.test(ch) ? String(ch.charCodeAt(0) - 55) : ch;
  }
  return out;
}

export function compactIban(text: string): string {
  return text.replace(/[\s-]/g, "").toUpperCase();
}

export function isValidIban(text: string): boolean {
  const iban = compactIban(text);
  if (!/^[A-Z]{2}\d{2}[A-Z0-9]{8,30}$/.test(iban)) return false;
  const expected = IBAN_LENGTHS[iban.slice(0, 2)];
  if (expected !== undefined && expected !== iban.length) return false;
  return mod97(ibanNumeric(iban.slice(4) + iban.slice(0, 4))) === 1;
}

/** Two check digits for `country` + `bban`. */
export function ibanCheckDigits(country: string, bban: string): string {
  const remainder = mod97(ibanNumeric(bban.toUpperCase() + country.toUpperCase() + "00"));
  return String(98 - remainder).padStart(2, "0");
}

// =============================================================================
// US SSN / EIN
// =============================================================================

export function isValidSsn(text: string): boolean {
  const digits = digitsOf(text);
  if (digits.length !== 9) return false;
  const area = digits.slice(0, 3);
  const group = digits.slice(3, 5);
  const serial = digits.slice(5);
  if (area === "000" || area === "666" || area[0] === "9") return false;
  if (group === "00" || serial === "0000") return false;
  // Advertising/test numbers
  if (digits === "078051120" || digits === "219099999") return false;
  return true;
}

export const EIN_PREFIXES = [
  "01", "02", "03", "04", "05", "06", "10", "11", "12", "13", "14", "15", "16",
  "20", "21", "22", "23", "24", "25", "26", "27", "30", "31", "32", "33", "34",
  "35", "36", "37", "38", "39", "40", "41", "42", "43", "44", "45", "46", "47",
  "48", "50", "51", "52", "53", "54", "55", "56", "57", "58", "59", "60", "61",
  "62", "63", "64", "65", "66", "67", "68", "71", "72", "73", "74", "75", "76",
  "77", "80", "81", "82", "83", "84", "85", "86", "87", "88", "90", "91", "92",
  "93", "94", "95", "98", "99",
];

export function isValidEin(text: string): boolean {
  const digits = digitsOf(text);
  return digits.length === 9 && EIN_PREFIXES.includes(digits.slice(0, 2));
}

// =============================================================================
// SWIFT / BIC
// =============================================================================

export function isValidBic(text: string): boolean {
  return /^[A-Z]{4}[A-Z]{2}[A-Z0-9]{2}(?:[A-Z0-9]{3})?$/.test(text);
}
