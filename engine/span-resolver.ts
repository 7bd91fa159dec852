/**
 * Span conflict resolution
 *
 * Picks a non-overlapping subset of detector spans. Stronger labels win first,
 * then longer spans, then more confident ones; spans are never split or
 * trimmed.
 */

import crypto from "node:crypto";
import type { Logger } from "../logger.js";
import { silentLogger } from "../logger.js";
import { overlaps, compareByStart } from "./span.js";
import type { EntityLabel, EntitySpan } from "./types.js";

export const UNRANKED = 10_000;

type Candidate = {
  span: EntitySpan;
  index: number; // position in the caller's input
};

type SortKey = [number, number, number, number, string, string, string];

function contentHash(span: EntitySpan): string {
  const material = `${span.start}:${span.end}:${span.label}:${span.source}:${span.text.slice(0, 16)}`;
  return crypto.createHash("sha1").update(material, "utf8").digest("hex");
}

function roundConfidence(value: number): number {
  return Math.round(value * 1e6) / 1e6;
}

function compareKeys(a: SortKey, b: SortKey): number {
  for (let i = 0; i < a.length; i++) {
    const x = a[i];
    const y = b[i];
    if (typeof x === "number" && typeof y === "number") {
      if (x !== y) return x - y;
    } else if (x !== y) {
      return String(x) < String(y) ? -1 : 1;
    }
  }
  return 0;
}

export function precedenceRank(precedence: readonly EntityLabel[]): (label: EntityLabel) => number {
  const ranks = new Map<EntityLabel, number>();
  precedence.forEach((label, i) => {
    if (!ranks.has(label)) ranks.set(label, i);
  });
  return (label) => ranks.get(label) ?? UNRANKED;
}

/**
 * Collapse exact `[start, end, label]` duplicates: higher confidence, then the
 * smaller source name, then the earlier input position.
 */
function dedupe(candidates: Candidate[]): Candidate[] {
  const best = new Map<string, Candidate>();
  for (const c of candidates) {
    const key = `${c.span.start}:${c.span.end}:${c.span.label}`;
    const current = best.get(key);
    if (!current) {
      best.set(key, c);
      continue;
    }
    const a = roundConfidence(c.span.confidence);
    const b = roundConfidence(current.span.confidence);
    if (
      a > b ||
      (a === b && c.span.source < current.span.source) ||
      (a === b && c.span.source === current.span.source && c.index < current.index)
    ) {
      best.set(key, c);
    }
  }
  return [...best.values()];
}

/**
 * Select a conflict-free subset of `spans`, returned in document order.
 * Labels missing from `precedence` rank below every listed label.
 */
export function resolveSpans(
  spans: readonly EntitySpan[],
  precedence: readonly EntityLabel[],
  logger: Logger = silentLogger,
): EntitySpan[] {
  const rank = precedenceRank(precedence);

  const valid: Candidate[] = [];
  spans.forEach((span, index) => {
    if (!Number.isInteger(span.start) || !Number.isInteger(span.end) || span.start < 0 || span.end <= span.start) {
      logger.debug?.(`dropping invalid span label=${span.label} [${span.start}, ${span.end})`);
      return;
    }
    valid.push({ span, index });
  });

  const keyed = dedupe(valid).map((c) => {
    const s = c.span;
    const key: SortKey = [
      rank(s.label),
      -(s.end - s.start),
      -roundConfidence(s.confidence),
      s.start,
      s.label,
      s.source,
      s.spanId ?? contentHash(s),
    ];
    return { span: s, key };
  });
  keyed.sort((a, b) => compareKeys(a.key, b.key));

  const kept: EntitySpan[] = [];
  for (const { span } of keyed) {
    if (kept.some((k) => overlaps(k, span))) continue;
    kept.push(span);
  }
  return kept.sort(compareByStart);
}
