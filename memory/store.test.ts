import { describe, it, expect, afterEach } from "vitest";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { RunStore, type RunRecord } from "./store.js";

const run: RunRecord = {
  inputPath: "in/contract.txt",
  docHashB32: "abcdefgh",
  entries: 4,
  countsByLabel: { PERSON: 3, EMAIL: 1 },
  residualCount: 0,
  score: 0,
  strict: true,
  passed: true,
  durationMs: 12,
};

describe("RunStore", () => {
  let store: RunStore | null = null;
  let dir: string | null = null;

  afterEach(() => {
    store?.close();
    store = null;
    if (dir) fs.rmSync(dir, { recursive: true, force: true });
    dir = null;
  });

  it("records runs and lists them newest first", () => {
    store = new RunStore(":memory:");
    const first = store.recordRun(run);
    const second = store.recordRun({ ...run, inputPath: "in/other.md", residualCount: 2, score: 7, passed: false, durationMs: 20 });
    expect(second).toBe(first + 1);

    const runs = store.getRecentRuns();
    expect(runs.map((r) => [r.id, r.inputPath, r.passed])).toEqual([
      [second, "in/other.md", false],
      [first, "in/contract.txt", true],
    ]);
    expect(runs[1].countsByLabel).toEqual({ PERSON: 3, EMAIL: 1 });
    expect(runs[1].strict).toBe(true);
    expect(store.getRecentRuns(1)).toHaveLength(1);
  });

  it("aggregates stats", () => {
    store = new RunStore(":memory:");
    expect(store.getStats()).toEqual({ totalRuns: 0, failedRuns: 0, avgScore: 0, avgDurationMs: 0 });
    store.recordRun(run);
    store.recordRun({ ...run, score: 7, passed: false, durationMs: 20 });
    expect(store.getStats()).toEqual({ totalRuns: 2, failedRuns: 1, avgScore: 3.5, avgDurationMs: 16 });
  });

  it("creates the directory of an on-disk store", () => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "docredact-store-"));
    const dbPath = path.join(dir, "nested", "runs.db");
    store = new RunStore(dbPath);
    store.recordRun(run);
    expect(fs.existsSync(dbPath)).toBe(true);
    expect(store.getStats().totalRuns).toBe(1);
  });
});
