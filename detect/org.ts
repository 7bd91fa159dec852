/**
 * Organization and bank detectors
 *
 * Organizations are anchored on a legal suffix ("LLC", "Inc.", "Corporation")
 * and extend left over the capitalized name before it. Banks are anchored on a
 * banking keyword ("Bank", "Credit Union", "Trust Company") and may extend in
 * both directions: "First Harbor Savings Bank", "Bank of Lakeside, N.A.".
 */

import { spanFromText } from "../engine/span.js";
import type { Detector, EntityLabel, EntitySpan } from "../engine/types.js";
import { detectorLexicon, isRoleWord } from "./lexicon.js";

export const ORG_CONFIDENCE = 0.92;
export const BANK_CONFIDENCE = 0.93;

const MAX_NAME_TOKENS = 6;
const MAX_BANK_PREFIX_TOKENS = 4;

const LEGAL_SUFFIX_RX =
  /(,?[ \t]+)(L\.L\.C\.|LLC|L\.L\.P\.|LLP|LP|PLC|P\.C\.|Inc\.|Inc|Incorporated|Corp\.|Corp|Corporation|Company|Co\.|Ltd\.|Ltd|Limited|GmbH|Holdings|Partners)(?![A-Za-z])/g;
const BANK_KEYWORD_RX = /\b(?:Savings Bank|Credit Union|Trust Company|Bancorp|Bank)\b/g;
const BANK_OF_RX = /^[ \t]+of[ \t]+(?:the[ \t]+)?[A-Z][A-Za-z'-]*(?:[ \t]+[A-Z][A-Za-z'-]*){0,2}/;
const NATIONAL_ASSOCIATION_RX = /^,?[ \t]+(?:N\.A\.|National Association)/;
const BANK_WORD_RX = /\b(?:Bank|Bancorp|Credit Union|Savings|Trust Company)\b/;

const SUFFIX_WORD_RX =
  /^(?:L\.L\.C\.|LLC|L\.L\.P\.|LLP|LP|PLC|P\.C\.|Inc\.?|Incorporated|Corp\.?|Corporation|Company|Co\.|Ltd\.?|Limited|GmbH|N\.A\.)$/;
const CONNECTORS = new Set(["of", "and", "the", "&"]);
const NAME_TOKEN_RX = /^(?:[A-Z0-9][A-Za-z0-9'’.-]*|&)$/;

type WordToken = { start: number; end: number; text: string };

/** Words on the current line ending at `end`, nearest first. */
function wordsBefore(text: string, end: number): WordToken[] {
  const lineStart = text.lastIndexOf("\n", end - 1) + 1;
  const out: WordToken[] = [];
  for (const m of text.slice(lineStart, end).matchAll(/\S+/g)) {
    const start = lineStart + (m.index ?? 0);
    out.push({ start, end: start + m[0].length, text: m[0] });
  }
  return out.reverse();
}

/**
 * Start offset of the name before `end`, or null when no capitalized word
 * precedes it. Walks left over capitalized words and connectors.
 */
function nameStartBefore(text: string, end: number, maxTokens: number): number | null {
  const { functionWords } = detectorLexicon();
  const taken: WordToken[] = [];
  let cursor = end;
  for (const word of wordsBefore(text, end)) {
    // Only single spaces or tabs may separate name words
    if (!/^[ \t]*$/.test(text.slice(word.end, cursor))) break;
    const bare = word.text.replace(/,$/, "");
    if (bare !== word.text && taken.length > 0) break;
    if (!CONNECTORS.has(bare) && !NAME_TOKEN_RX.test(bare)) break;
    // Another entity's suffix ends this name
    if (functionWords.has(bare) || isRoleWord(bare) || SUFFIX_WORD_RX.test(bare)) break;
    taken.push(word);
    cursor = word.start;
    if (taken.length >= maxTokens) break;
  }
  while (taken.length > 0 && CONNECTORS.has(taken[taken.length - 1].text.toLowerCase())) taken.pop();
  return taken.length > 0 ? taken[taken.length - 1].start : null;
}

function orgSpan(text: string, start: number, end: number, label: EntityLabel, confidence: number, attrs: Record<string, unknown>): EntitySpan {
  return spanFromText(text, start, end, { label, source: label === "ORG" ? "org" : "bank_org", confidence, attrs });
}

// =============================================================================
// Organizations
// =============================================================================

export function createOrgDetector(): Detector {
  return {
    name: () => "org",
    detect(text) {
      const spans: EntitySpan[] = [];
      let lastEnd = 0;
      for (const m of text.matchAll(LEGAL_SUFFIX_RX)) {
        const sepStart = m.index ?? 0;
        const [, sep, suffix] = m;
        const start = nameStartBefore(text, sepStart, MAX_NAME_TOKENS);
        if (start === null || start < lastEnd) continue;
        const end = sepStart + sep.length + suffix.length;
        const name = text.slice(start, end);
        if (BANK_WORD_RX.test(name)) continue;
        spans.push(
          orgSpan(text, start, end, "ORG", ORG_CONFIDENCE, {
            base: text.slice(start, sepStart),
            legal_suffix: suffix,
          }),
        );
        lastEnd = end;
      }
      return spans;
    },
  };
}

// =============================================================================
// Banks
// =============================================================================

export function createBankOrgDetector(): Detector {
  return {
    name: () => "bank_org",
    detect(text) {
      const spans: EntitySpan[] = [];
      let lastEnd = 0;
      for (const m of text.matchAll(BANK_KEYWORD_RX)) {
        const keywordStart = m.index ?? 0;
        let end = keywordStart + m[0].length;
        if (keywordStart < lastEnd) continue;

        const start = nameStartBefore(text, keywordStart, MAX_BANK_PREFIX_TOKENS) ?? keywordStart;
        const ofPart = BANK_OF_RX.exec(text.slice(end));
        if (ofPart) end += ofPart[0].length;
        // A bare keyword ("the Bank") names no institution
        if (start === keywordStart && !ofPart) continue;

        const na = NATIONAL_ASSOCIATION_RX.exec(text.slice(end));
        if (na) end += na[0].length;

        spans.push(
          orgSpan(text, start, end, "BANK_ORG", BANK_CONFIDENCE, {
            keyword: m[0],
            national_association: na !== null,
          }),
        );
        lastEnd = end;
      }
      return spans;
    },
  };
}
