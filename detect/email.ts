/**
 * Email address detector
 */

import { spanFromText } from "../engine/span.js";
import type { Detector, EntitySpan } from "../engine/types.js";

export const EMAIL_CONFIDENCE = 0.99;

// Local part: no leading or trailing dot. Domain: labels plus an alphabetic TLD.
const EMAIL_RX =
  /(?<![A-Za-z0-9._%+-])([A-Za-z0-9_%+-](?:[A-Za-z0-9._%+-]*[A-Za-z0-9_%+-])?)@((?:[A-Za-z0-9](?:[A-Za-z0-9-]*[A-Za-z0-9])?\.)+[A-Za-z]{2,})(?![A-Za-z0-9-])/g;

export function createEmailDetector(): Detector {
  return {
    name: () => "email",
    detect(text) {
      const spans: EntitySpan[] = [];
      for (const m of text.matchAll(EMAIL_RX)) {
        const start = m.index ?? 0;
        const [whole, local, domain] = m;
        const plus = local.indexOf("+");
        spans.push(
          spanFromText(text, start, start + whole.length, {
            label: "EMAIL",
            source: "email",
            confidence: EMAIL_CONFIDENCE,
            attrs: {
              base_local: plus >= 0 ? local.slice(0, plus) : local,
              tag: plus >= 0 ? local.slice(plus + 1) : null,
              domain: domain.toLowerCase(),
            },
          }),
        );
      }
      return spans;
    },
  };
}
