/**
 * Plan application
 *
 * A plan is spliced into its text right to left, so earlier offsets stay valid
 * while later ranges are rewritten.
 */

import { OverlapError, SpanOutOfBoundsError } from "./errors.js";
import type { PlanEntry } from "./types.js";

export type ApplyResult = {
  text: string;
  applied: PlanEntry[];
};

function byStartEnd(a: PlanEntry, b: PlanEntry): number {
  return a.start - b.start || a.end - b.end;
}

/**
 * Check integrality, bounds, non-emptiness and pairwise non-overlap; touching
 * entries are allowed. Returns the entries sorted by `(start, end)`.
 */
export function validatePlan(text: string, plan: readonly PlanEntry[]): PlanEntry[] {
  for (const entry of plan) {
    if (!Number.isInteger(entry.start) || !Number.isInteger(entry.end)) {
      throw new TypeError(`plan offsets must be integers, got [${entry.start}, ${entry.end})`);
    }
    if (entry.start < 0 || entry.end < entry.start || entry.end > text.length) {
      throw new SpanOutOfBoundsError(
        `plan entry [${entry.start}, ${entry.end}) outside text of length ${text.length}`,
      );
    }
    if (entry.end === entry.start) {
      throw new SpanOutOfBoundsError(`plan entry [${entry.start}, ${entry.end}) is empty`);
    }
  }
  const sorted = [...plan].sort(byStartEnd);
  for (let i = 1; i < sorted.length; i++) {
    const prev = sorted[i - 1];
    const cur = sorted[i];
    if (cur.start < prev.end) {
      throw new OverlapError(`plan entries [${prev.start}, ${prev.end}) and [${cur.start}, ${cur.end}) overlap`);
    }
  }
  return sorted;
}

export function applyPlan(text: string, plan: readonly PlanEntry[]): ApplyResult {
  const sorted = validatePlan(text, plan);

  let out = text;
  for (let i = sorted.length - 1; i >= 0; i--) {
    const { start, end, replacement } = sorted[i];
    out = out.slice(0, start) + replacement + out.slice(end);
  }

  const delta = sorted.reduce((sum, e) => sum + e.replacement.length - (e.end - e.start), 0);
  if (out.length !== text.length + delta) {
    throw new SpanOutOfBoundsError(`applied text length ${out.length} != expected ${text.length + delta}`);
  }

  const applied = sorted.map((entry, i) => ({
    ...entry,
    meta: { ...entry.meta, applied_index: i + 1 },
  }));
  return { text: out, applied };
}

/**
 * Shift each applied entry onto the range its replacement occupies in the
 * redacted text. Re-applying the result to that text changes nothing.
 */
export function remapPlan(applied: readonly PlanEntry[]): PlanEntry[] {
  let shift = 0;
  return [...applied].sort(byStartEnd).map((entry) => {
    const start = entry.start + shift;
    const end = start + entry.replacement.length;
    shift += entry.replacement.length - (entry.end - entry.start);
    return { ...entry, start, end };
  });
}
