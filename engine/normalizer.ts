/**
 * Text normalization
 *
 * Conservative clean-up applied before detection: NFC, no-break spaces to
 * plain spaces, zero-width characters and soft hyphens dropped, curly quotes
 * straightened, and line-wrap hyphenation joined. Everything else, including
 * line breaks and runs of spaces, is kept.
 *
 * `charMap[i]` is the index in the input of the character that produced output
 * position `i` (UTF-16 code units); it is strictly increasing.
 */

export type NormalizationResult = {
  text: string;
  charMap: number[];
  changed: boolean;
};

const NBSP = new Set(["\u00a0", "\u202f", "\u2007"]);
const ZERO_WIDTH = new Set(["\u200b", "\u200c", "\u200d", "\ufeff"]);
const SOFT_HYPHEN = "\u00ad";
const QUOTES: Record<string, string> = {
  "\u201c": '"',
  "\u201d": '"',
  "\u2018": "'",
  "\u2019": "'",
};
const COMBINING = /^\p{M}$/u;
const ASCII_LETTER = /^[A-Za-z]$/;

type Mapped = { chars: string[]; map: number[] };

/** NFC per base character plus its combining marks, keeping the group's start index. */
function nfcWithMap(text: string): Mapped {
  const chars: string[] = [];
  const map: number[] = [];
  const points = [...text];
  let offset = 0;
  let i = 0;
  while (i < points.length) {
    const start = offset;
    let cluster = points[i];
    offset += points[i].length;
    i++;
    while (i < points.length && COMBINING.test(points[i])) {
      cluster += points[i];
      offset += points[i].length;
      i++;
    }
    for (const unit of cluster.normalize("NFC").split("")) {
      chars.push(unit);
      map.push(start);
    }
  }
  return { chars, map };
}

function cleanCharacters({ chars, map }: Mapped): Mapped {
  const out: Mapped = { chars: [], map: [] };
  chars.forEach((ch, i) => {
    if (ZERO_WIDTH.has(ch) || ch === SOFT_HYPHEN) return;
    out.chars.push(NBSP.has(ch) ? " " : (QUOTES[ch] ?? ch));
    out.map.push(map[i]);
  });
  return out;
}

/** `x-\ny` and `x-\r\ny` between ASCII letters become `xy`. */
function joinWrappedHyphens({ chars, map }: Mapped): Mapped {
  const out: Mapped = { chars: [], map: [] };
  let i = 0;
  while (i < chars.length) {
    const ch = chars[i];
    if (ASCII_LETTER.test(ch) && chars[i + 1] === "-") {
      let next = -1;
      if (chars[i + 2] === "\r" && chars[i + 3] === "\n") next = i + 4;
      else if (chars[i + 2] === "\n") next = i + 3;
      if (next > 0 && next < chars.length && ASCII_LETTER.test(chars[next])) {
        out.chars.push(ch, chars[next]);
        out.map.push(map[i], map[next]);
        i = next + 1;
        continue;
      }
    }
    out.chars.push(ch);
    out.map.push(map[i]);
    i++;
  }
  return out;
}

export function normalizeText(text: string): NormalizationResult {
  const result = joinWrappedHyphens(cleanCharacters(nfcWithMap(text)));
  const normalized = result.chars.join("");
  return { text: normalized, charMap: result.map, changed: normalized !== text };
}
