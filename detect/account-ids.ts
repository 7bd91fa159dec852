/**
 * Account and identifier detector
 *
 * Each subtype has its own candidate pattern and validator. Overlapping
 * candidates are settled by subtype precedence:
 *
 *   iban > swift_bic > routing_aba > cc > ssn > ein > generic
 *
 * SWIFT/BIC codes and routing numbers must follow a keyword on the same line;
 * generic account numbers must follow an account keyword.
 */

import { overlaps, spanFromText } from "../engine/span.js";
import type { AccountSubtype, Detector, EntitySpan, SpanAttrs } from "../engine/types.js";
import {
  compactIban,
  digitsOf,
  isLuhnValid,
  isValidBic,
  isValidEin,
  isValidIban,
  isValidRoutingNumber,
  isValidSsn,
} from "../pseudo/checksums.js";
import { detectorLexicon } from "./lexicon.js";
import { rtrimIndex } from "./patterns.js";

export const ACCOUNT_CONFIDENCE = 0.99;
export const GENERIC_ACCOUNT_CONFIDENCE = 0.9;

const KEYWORD_WINDOW = 40;

const IBAN_RX = /\b[A-Z]{2}\d{2}(?: ?[A-Z0-9]{1,4}){2,8}\b/g;
const BIC_RX = /\b[A-Za-z]{6}[A-Za-z0-9]{2}(?:[A-Za-z0-9]{3})?\b/g;
const ABA_RX = /\b\d{9}\b/g;
const CC_RX = /\b\d(?:[ -]?\d){12,18}\b/g;
const SSN_RX = /\b(?:\d{3}-\d{2}-\d{4}|\d{9})\b/g;
const EIN_RX = /\b\d{2}-\d{7}\b/g;
const GENERIC_RX =
  /\b(?:acct|account|a\/c|sort\s+code|ref|reference|policy|loan)(?:\s*(?:no\.?|number|#))?[\s:#.]+([A-Za-z0-9]+(?:-[A-Za-z0-9]+)*(?: [A-Za-z0-9]*\d[A-Za-z0-9]*)*)/gi;
const ACCOUNT_KEYWORD_RX = /\b(?:acct|account|a\/c|ref|reference|policy|loan|routing|aba)\b/i;

const BIC_KEYWORD_RX = /\b(?:swift|bic)\b/i;
const ROUTING_KEYWORD_RX = /\b(?:routing|aba|rtn)\b/i;

const SCHEMES: ReadonlyArray<[string, RegExp]> = [
  ["visa", /^4/],
  ["mastercard", /^(?:5[1-5]|222[1-9]|22[3-9]\d|2[3-6]\d{2}|27[01]\d|2720)/],
  ["amex", /^3[47]/],
  ["discover", /^(?:6011|65|64[4-9])/],
  ["jcb", /^35/],
  ["diners", /^3[068]/],
];

const PRIORITY: Record<AccountSubtype, number> = {
  iban: 7,
  swift_bic: 6,
  routing_aba: 5,
  cc: 4,
  ssn: 3,
  ein: 2,
  generic: 1,
};

type Candidate = { start: number; end: number; subtype: AccountSubtype; attrs: SpanAttrs; confidence: number };

export type AccountIdOptions = {
  /** Keyword-anchored generic numbers; on by default. */
  generic?: boolean;
};

// =============================================================================
// Helpers
// =============================================================================

/** Text from `start - window` (not crossing a line break) up to `start`. */
function leftContext(text: string, start: number, window = KEYWORD_WINDOW): string {
  const lineStart = text.lastIndexOf("\n", start - 1) + 1;
  return text.slice(Math.max(lineStart, start - window), start);
}

function schemeOf(digits: string): string | undefined {
  return SCHEMES.find(([, rx]) => rx.test(digits))?.[0];
}

function groupsOf(digits: string, size = 4): string {
  return digits.match(new RegExp(`.{1,${size}}`, "g"))?.join(" ") ?? digits;
}

// =============================================================================
// Candidates per subtype
// =============================================================================

function ibanCandidates(text: string): Candidate[] {
  const out: Candidate[] = [];
  for (const m of text.matchAll(IBAN_RX)) {
    const start = m.index ?? 0;
    // Greedy grouping can swallow a trailing upper-case word; retry shorter
    const groups = m[0].split(" ");
    for (let n = groups.length; n >= 1; n--) {
      const raw = groups.slice(0, n).join(" ");
      if (!isValidIban(raw)) continue;
      const normalized = compactIban(raw);
      out.push({
        start,
        end: start + raw.length,
        subtype: "iban",
        confidence: ACCOUNT_CONFIDENCE,
        attrs: {
          subtype: "iban",
          normalized,
          display: groupsOf(normalized),
          issuer_or_country: normalized.slice(0, 2),
          length: normalized.length,
        },
      });
      break;
    }
  }
  return out;
}

function bicCandidates(text: string): Candidate[] {
  const out: Candidate[] = [];
  const { countries } = detectorLexicon();
  for (const m of text.matchAll(BIC_RX)) {
    const start = m.index ?? 0;
    const raw = m[0];
    if (raw !== raw.toUpperCase() || !isValidBic(raw)) continue;
    if (!countries.has(raw.slice(4, 6))) continue;
    if (!BIC_KEYWORD_RX.test(leftContext(text, start))) continue;
    out.push({
      start,
      end: start + raw.length,
      subtype: "swift_bic",
      confidence: ACCOUNT_CONFIDENCE,
      attrs: { subtype: "swift_bic", normalized: raw, display: raw, issuer_or_country: raw.slice(4, 6), length: raw.length },
    });
  }
  return out;
}

function routingCandidates(text: string): Candidate[] {
  const out: Candidate[] = [];
  for (const m of text.matchAll(ABA_RX)) {
    const start = m.index ?? 0;
    const raw = m[0];
    if (!ROUTING_KEYWORD_RX.test(leftContext(text, start)) || !isValidRoutingNumber(raw)) continue;
    out.push({
      start,
      end: start + raw.length,
      subtype: "routing_aba",
      confidence: ACCOUNT_CONFIDENCE,
      attrs: { subtype: "routing_aba", normalized: raw, display: raw, issuer_or_country: "US", length: 9 },
    });
  }
  return out;
}

function cardCandidates(text: string): Candidate[] {
  const out: Candidate[] = [];
  for (const m of text.matchAll(CC_RX)) {
    const start = m.index ?? 0;
    const digits = digitsOf(m[0]);
    if (digits.length < 13 || digits.length > 19 || !isLuhnValid(digits)) continue;
    const scheme = schemeOf(digits);
    if (!scheme) continue;
    out.push({
      start,
      end: start + m[0].length,
      subtype: "cc",
      confidence: ACCOUNT_CONFIDENCE,
      attrs: { subtype: "cc", normalized: digits, display: groupsOf(digits), scheme, length: digits.length },
    });
  }
  return out;
}

function ssnCandidates(text: string): Candidate[] {
  const out: Candidate[] = [];
  for (const m of text.matchAll(SSN_RX)) {
    const start = m.index ?? 0;
    if (text.slice(Math.max(0, start - 3), start).includes("§")) continue;
    const digits = digitsOf(m[0]);
    if (!isValidSsn(digits)) continue;
    // An undashed nine-digit run after an account keyword is an account number
    if (!m[0].includes("-") && ACCOUNT_KEYWORD_RX.test(leftContext(text, start))) continue;
    out.push({
      start,
      end: start + m[0].length,
      subtype: "ssn",
      confidence: ACCOUNT_CONFIDENCE,
      attrs: {
        subtype: "ssn",
        normalized: digits,
        display: `${digits.slice(0, 3)}-${digits.slice(3, 5)}-${digits.slice(5)}`,
        issuer_or_country: "US",
        length: 9,
      },
    });
  }
  return out;
}

function einCandidates(text: string): Candidate[] {
  const out: Candidate[] = [];
  for (const m of text.matchAll(EIN_RX)) {
    const start = m.index ?? 0;
    const digits = digitsOf(m[0]);
    if (!isValidEin(digits)) continue;
    out.push({
      start,
      end: start + m[0].length,
      subtype: "ein",
      confidence: ACCOUNT_CONFIDENCE,
      attrs: {
        subtype: "ein",
        normalized: digits,
        display: `${digits.slice(0, 2)}-${digits.slice(2)}`,
        issuer_or_country: "US",
        length: 9,
      },
    });
  }
  return out;
}

function genericCandidates(text: string): Candidate[] {
  const out: Candidate[] = [];
  for (const m of text.matchAll(GENERIC_RX)) {
    const raw = m[1];
    const start = (m.index ?? 0) + m[0].length - raw.length;
    const end = rtrimIndex(text, start + raw.length, start);
    const compact = text.slice(start, end).replace(/[ -]/g, "").toUpperCase();
    if (!/\d/.test(raw.split(" ")[0])) continue;
    if (digitsOf(compact).length < 6 || compact.length > 34) continue;
    out.push({
      start,
      end,
      subtype: "generic",
      confidence: GENERIC_ACCOUNT_CONFIDENCE,
      attrs: { subtype: "generic", normalized: compact, display: text.slice(start, end), length: compact.length },
    });
  }
  return out;
}

// =============================================================================
// Detector
// =============================================================================

export function createAccountIdDetector(options: AccountIdOptions = {}): Detector {
  const includeGeneric = options.generic ?? true;
  return {
    name: () => "account_ids",
    detect(text) {
      const candidates = [
        ...ibanCandidates(text),
        ...bicCandidates(text),
        ...routingCandidates(text),
        ...cardCandidates(text),
        ...ssnCandidates(text),
        ...einCandidates(text),
        ...(includeGeneric ? genericCandidates(text) : []),
      ].sort((a, b) => PRIORITY[b.subtype] - PRIORITY[a.subtype] || a.start - b.start || a.end - b.end);

      const kept: Candidate[] = [];
      for (const cand of candidates) {
        if (kept.some((k) => overlaps(k, cand))) continue;
        kept.push(cand);
      }
      return kept
        .sort((a, b) => a.start - b.start)
        .map(
          (c): EntitySpan =>
            spanFromText(text, c.start, c.end, {
              label: "ACCOUNT_ID",
              source: "account_ids",
              confidence: c.confidence,
              attrs: c.attrs,
            }),
        );
    },
  };
}
