/**
 * HTML diff of a redaction run
 *
 * One page: an index table of replacements, then the original text with each
 * replaced range shown as a `<del>`/`<ins>` pair. Offsets in the table refer
 * to the text before redaction.
 */

import type { PlanEntry } from "../engine/types.js";

const HTML_ESCAPES: Record<string, string> = {
  "&": "&amp;",
  "<": "&lt;",
  ">": "&gt;",
  '"': "&quot;",
  "'": "&#39;",
};

export function escapeHtml(text: string): string {
  return text.replace(/[&<>"']/g, (ch) => HTML_ESCAPES[ch] ?? ch);
}

export function entryId(entry: PlanEntry, index: number): string {
  const n = entry.meta.applied_index ?? index + 1;
  return `r${String(n).padStart(4, "0")}`;
}

const STYLE = [
  "body{font-family:sans-serif;}",
  "table{border-collapse:collapse;margin-bottom:1em;}",
  "th,td{border:1px solid #ccc;padding:4px;}",
  "pre{white-space:pre-wrap;}",
  "del{background:#fdd;}",
  "ins{background:#dfd;text-decoration:none;}",
].join("");

/** Inline `<del>`/`<ins>` markup for `original` with `applied` spliced in. */
export function renderDiffBody(original: string, applied: readonly PlanEntry[]): string {
  const sorted = [...applied].sort((a, b) => a.start - b.start || a.end - b.end);
  let out = "";
  let last = 0;
  sorted.forEach((entry, i) => {
    const id = entryId(entry, i);
    out += escapeHtml(original.slice(last, entry.start));
    out += `<del id="${id}" data-label="${entry.label}">${escapeHtml(original.slice(entry.start, entry.end))}</del>`;
    out += `<ins data-id="${id}">${escapeHtml(entry.replacement)}</ins>`;
    last = entry.end;
  });
  return out + escapeHtml(original.slice(last));
}

function indexRow(entry: PlanEntry, i: number): string {
  const id = entryId(entry, i);
  return (
    "<tr>" +
    `<td><a href="#${id}">${id}</a></td>` +
    `<td>${entry.label}</td>` +
    `<td>${escapeHtml(entry.replacement)}</td>` +
    `<td>${entry.start}..${entry.end}</td>` +
    "</tr>"
  );
}

export function renderDiffHtml(original: string, applied: readonly PlanEntry[]): string {
  const rows = applied.map(indexRow).join("");
  return (
    "<!DOCTYPE html>\n" +
    `<html><head><meta charset="utf-8"><title>Redaction diff</title><style>${STYLE}</style></head><body>` +
    "<table><thead><tr><th>ID</th><th>Label</th><th>Replacement</th><th>Start..End</th></tr></thead>" +
    `<tbody>${rows}</tbody></table>` +
    `<pre>${renderDiffBody(original, applied)}</pre>` +
    "</body></html>\n"
  );
}
