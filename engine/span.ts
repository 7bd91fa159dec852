/**
 * EntitySpan construction and helpers
 *
 * Spans are half-open `[start, end)` ranges into one reference text. They are
 * frozen on construction; every update returns a new span.
 */

import { SpanOutOfBoundsError } from "./errors.js";
import type { EntityLabel, EntitySpan, OffsetPair, SpanAttrs } from "./types.js";

export type SpanInput = {
  start: number;
  end: number;
  text: string;
  label: EntityLabel;
  source: string;
  confidence: number;
  attrs?: SpanAttrs;
  entityId?: string;
  spanId?: string;
};

export function createSpan(input: SpanInput): EntitySpan {
  const { start, end, confidence } = input;
  if (!Number.isInteger(start) || !Number.isInteger(end) || start < 0 || end <= start) {
    throw new SpanOutOfBoundsError(`invalid span [${start}, ${end})`);
  }
  if (!(confidence >= 0 && confidence <= 1)) {
    throw new RangeError(`confidence must be within [0, 1], got ${confidence}`);
  }

  const span: EntitySpan = {
    start,
    end,
    text: input.text,
    label: input.label,
    source: input.source,
    confidence,
    attrs: Object.freeze({ ...(input.attrs ?? {}) }),
    ...(input.entityId !== undefined ? { entityId: input.entityId } : {}),
    ...(input.spanId !== undefined ? { spanId: input.spanId } : {}),
  };
  return Object.freeze(span);
}

/**
 * Create a span whose text is sliced from `text`, validating bounds against it.
 */
export function spanFromText(
  text: string,
  start: number,
  end: number,
  rest: Omit<SpanInput, "start" | "end" | "text">,
): EntitySpan {
  if (end > text.length) {
    throw new SpanOutOfBoundsError(`span [${start}, ${end}) exceeds text length ${text.length}`);
  }
  return createSpan({ ...rest, start, end, text: text.slice(start, end) });
}

export function withEntityId(span: EntitySpan, entityId: string): EntitySpan {
  return createSpan({ ...span, attrs: { ...span.attrs }, entityId });
}

export function withAttrs(span: EntitySpan, attrs: SpanAttrs): EntitySpan {
  return createSpan({ ...span, attrs: { ...span.attrs, ...attrs } });
}

/** Half-open overlap; touching ranges do not overlap. */
export function overlaps(
  a: { start: number; end: number },
  b: { start: number; end: number },
): boolean {
  return a.start < b.end && b.start < a.end;
}

export function compareByStart(
  a: { start: number; end: number },
  b: { start: number; end: number },
): number {
  return a.start - b.start || a.end - b.end;
}

// =============================================================================
// Attribute accessors
// =============================================================================

export function attrString(attrs: Readonly<SpanAttrs>, key: string): string | undefined {
  const value = attrs[key];
  return typeof value === "string" ? value : undefined;
}

export function attrBool(attrs: Readonly<SpanAttrs>, key: string): boolean {
  return attrs[key] === true;
}

export function attrNumber(attrs: Readonly<SpanAttrs>, key: string): number | undefined {
  const value = attrs[key];
  return typeof value === "number" && Number.isFinite(value) ? value : undefined;
}

export function attrStringArray(attrs: Readonly<SpanAttrs>, key: string): string[] | undefined {
  const value = attrs[key];
  if (!Array.isArray(value)) return undefined;
  const out: string[] = [];
  for (const item of value) {
    if (typeof item !== "string") return undefined;
    out.push(item);
  }
  return out;
}

/** Reads a `[start, end]` pair stored in attrs. */
export function attrOffsetPair(attrs: Readonly<SpanAttrs>, key: string): OffsetPair | undefined {
  const value = attrs[key];
  if (!Array.isArray(value) || value.length !== 2) return undefined;
  const [start, end] = value;
  if (!Number.isInteger(start) || !Number.isInteger(end)) return undefined;
  return [Number(start), Number(end)];
}
