/**
 * Address line and address block surrogates
 *
 * Lines are synthesized one at a time from their role (street, unit,
 * city/state/zip, PO box). The source's spacing, commas, directionals and
 * unit keywords are kept; names and numbers are redrawn.
 */

import type { SeedSource } from "../engine/seed.js";
import type { AddressLineKind } from "../engine/types.js";
import {
  CITY_STATE_ZIP_RX,
  PO_BOX_RX,
  STREET_LINE_RX,
  UNIT_LINE_RX,
  UNIT_TAIL_RX,
  parseAddressLine,
  splitLinesKeepEnds,
} from "../detect/patterns.js";
import { formatLike, matchCase } from "./case-preserver.js";
import { placeLexicon } from "./lexicon.js";
import { mutateAlnum, mutateDigits, randomDigits } from "./numbers.js";

type Padded = { lead: string; body: string; trail: string };

function unpad(line: string): Padded {
  const lead = /^\s*/.exec(line)?.[0] ?? "";
  const trail = /\s*$/.exec(line.slice(lead.length))?.[0] ?? "";
  return { lead, body: line.slice(lead.length, line.length - trail.length), trail };
}

/** A house number with the source's digit count where that fits 100-9999. */
function houseNumber(source: string, draw: (lo: number, hi: number) => number): string {
  const n = source.replace(/\D/g, "").length;
  if (n >= 3 && n <= 4) return String(draw(10 ** (n - 1), 10 ** n - 1));
  return String(draw(100, 9999));
}

// =============================================================================
// Line generators
// =============================================================================

export function streetLineLike(source: string, key: string, seeds: SeedSource): string {
  const rng = seeds.rng("ADDRESS_STREET", key);
  const lex = placeLexicon();
  const { lead, body, trail } = unpad(source);

  let main = body;
  let unitTail = "";
  const unit = UNIT_TAIL_RX.exec(body);
  if (unit) {
    main = body.slice(0, unit.index);
    unitTail = unit[1] + unit[2] + mutateAlnum(unit[3], rng);
  }

  const m = STREET_LINE_RX.exec(main);
  if (!m) {
    const number = houseNumber(main, (lo, hi) => rng.int(lo, hi));
    const candidate = `${number} ${rng.pick(lex.streets)} ${rng.pick(lex.suffixes)}`;
    return lead + matchCase(main, candidate) + unitTail + trail;
  }

  const [, number, gap, preDir, name, suffix, postDir] = m;
  const numbered = /^(\d+)(st|nd|rd|th)$/i.exec(name.trim());
  let street: string;
  if (numbered) {
    // Numbered streets ("5th") stay numbered
    const n = rng.int(2, 99);
    street = `${n}${formatLike(numbered[2], ordinalSuffix(n))}`;
  } else {
    const words = rng.shuffle(lex.streets).slice(0, name.trim().split(/\s+/).length);
    street = formatLike(name, words.join(" "), { rng });
  }

  let suffixOut = "";
  if (suffix.trim()) {
    const ws = /^\s*/.exec(suffix)?.[0] ?? " ";
    const word = suffix.trim();
    const pool = word.replace(/\.$/, "").length > 4 ? lex.longSuffixes : lex.suffixes;
    suffixOut = ws + formatLike(word, rng.pick(pool));
  }

  const out = houseNumber(number, (lo, hi) => rng.int(lo, hi)) + gap + preDir + street + suffixOut + postDir;
  return lead + out + unitTail + trail;
}

function ordinalSuffix(n: number): string {
  if (n % 100 >= 11 && n % 100 <= 13) return "th";
  return ["th", "st", "nd", "rd"][n % 10] ?? "th";
}

export function unitLineLike(source: string, key: string, seeds: SeedSource): string {
  const rng = seeds.rng("ADDRESS_UNIT", key);
  const { lead, body, trail } = unpad(source);
  const m = UNIT_LINE_RX.exec(body);
  if (!m) return lead + mutateAlnum(body, rng) + trail;
  return lead + m[1] + mutateAlnum(m[2], rng) + trail;
}

export function cityStateZipLike(source: string, key: string, seeds: SeedSource): string {
  const rng = seeds.rng("ADDRESS_CSZ", key);
  const { lead, body, trail } = unpad(source);
  const entry = rng.pick(placeLexicon().cities);
  const zip5 = randomDigits(rng, 5);

  const m = CITY_STATE_ZIP_RX.exec(body);
  if (!m) return `${lead}${entry.city}, ${entry.state} ${zip5}${trail}`;

  const [, city, sep, , ws, , plus4] = m;
  const zip = plus4 ? `${zip5}-${randomDigits(rng, 4)}` : zip5;
  return lead + matchCase(city, entry.city) + sep + entry.state + ws + zip + trail;
}

export function poBoxLike(source: string, key: string, seeds: SeedSource): string {
  const rng = seeds.rng("ADDRESS_PO", key);
  const { lead, body, trail } = unpad(source);
  const m = PO_BOX_RX.exec(body);
  if (!m) return lead + formatLike(body, `PO Box ${rng.int(100, 99999)}`, { rng }) + trail;
  return lead + m[1] + m[2] + mutateDigits(m[3], rng) + trail;
}

export function addressLineLike(
  source: string,
  key: string,
  seeds: SeedSource,
  kind?: AddressLineKind,
): string {
  const lineKind = kind ?? parseAddressLine(source)?.kind ?? "street";
  switch (lineKind) {
    case "street":
      return streetLineLike(source, key, seeds);
    case "unit":
      return unitLineLike(source, key, seeds);
    case "city_state_zip":
      return cityStateZipLike(source, key, seeds);
    case "po_box":
      return poBoxLike(source, key, seeds);
  }
}

// =============================================================================
// Blocks
// =============================================================================

/**
 * Replace every non-blank line of `block`. Line `i` (counting non-blank lines)
 * is keyed `${key}:${i}` and generated as `lineKinds[i]`, or by its own shape
 * when no kind is given. Terminators and blank lines are kept as they are.
 */
export function addressBlockLike(
  block: string,
  key: string,
  seeds: SeedSource,
  lineKinds: readonly AddressLineKind[] = [],
): string {
  let idx = 0;
  return splitLinesKeepEnds(block)
    .map(({ body, eol }) => {
      if (!body.trim()) return body + eol;
      const line = addressLineLike(body, `${key}:${idx}`, seeds, lineKinds[idx]);
      idx++;
      return line + eol;
    })
    .join("");
}
