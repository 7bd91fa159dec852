import { describe, it, expect } from "vitest";
import { escapeHtml, renderDiffBody, renderDiffHtml } from "./diff.js";
import type { PlanEntry } from "../engine/types.js";

const entry: PlanEntry = {
  start: 3,
  end: 10,
  replacement: "X <Y>",
  label: "PERSON",
  entityId: null,
  spanId: null,
  meta: { applied_index: 1 },
};

describe("escapeHtml", () => {
  it("escapes markup and quotes", () => {
    expect(escapeHtml(`<a href="x">'&'</a>`)).toBe("&lt;a href=&quot;x&quot;&gt;&#39;&amp;&#39;&lt;/a&gt;");
  });
});

describe("renderDiffBody", () => {
  it("wraps each replacement in an escaped del/ins pair", () => {
    expect(renderDiffBody("Hi Jo & Al!", [entry])).toBe(
      'Hi <del id="r0001" data-label="PERSON">Jo &amp; Al</del><ins data-id="r0001">X &lt;Y&gt;</ins>!',
    );
  });

  it("numbers entries by position when no applied index is set", () => {
    const second: PlanEntry = { ...entry, start: 0, end: 2, replacement: "Yo", meta: {} };
    expect(renderDiffBody("Hi", [second])).toBe('<del id="r0001" data-label="PERSON">Hi</del><ins data-id="r0001">Yo</ins>');
  });

  it("returns the escaped text when nothing was replaced", () => {
    expect(renderDiffBody("a < b", [])).toBe("a &lt; b");
  });
});

describe("renderDiffHtml", () => {
  it("renders an index row and the inline diff", () => {
    const html = renderDiffHtml("Hi Jo & Al!", [entry]);
    expect(html.startsWith("<!DOCTYPE html>\n")).toBe(true);
    expect(html).toContain('<tr><td><a href="#r0001">r0001</a></td><td>PERSON</td><td>X &lt;Y&gt;</td><td>3..10</td></tr>');
    expect(html).toContain("<pre>Hi <del");
  });
});
