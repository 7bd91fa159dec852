/**
 * SQLite run log
 * (Counts and hashes only - never document text or replacements)
 */

import Database from "better-sqlite3";
import fs from "node:fs";
import path from "node:path";
import { isEntityLabel, type EntityLabel } from "../engine/types.js";
import { silentLogger, type Logger } from "../logger.js";

// =============================================================================
// Schema
// =============================================================================

const SCHEMA_SQL = `
CREATE TABLE IF NOT EXISTS redaction_runs (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  timestamp TEXT DEFAULT (datetime('now')),
  input_path TEXT NOT NULL,
  doc_hash_b32 TEXT NOT NULL,
  entries INTEGER NOT NULL,
  counts_by_label TEXT NOT NULL DEFAULT '{}',
  residual_count INTEGER NOT NULL,
  score REAL NOT NULL,
  strict INTEGER NOT NULL DEFAULT 0,
  passed INTEGER NOT NULL DEFAULT 1,
  duration_ms INTEGER NOT NULL
);

CREATE INDEX IF NOT EXISTS idx_redaction_runs_timestamp ON redaction_runs(timestamp DESC);
CREATE INDEX IF NOT EXISTS idx_redaction_runs_passed ON redaction_runs(passed);
`;

// =============================================================================
// Types
// =============================================================================

export type RunRecord = {
  inputPath: string;
  docHashB32: string;
  entries: number;
  countsByLabel?: Partial<Record<EntityLabel, number>>;
  residualCount: number;
  score: number;
  strict: boolean;
  passed: boolean;
  durationMs: number;
};

export type RunLogEntry = Required<RunRecord> & {
  id: number;
  timestamp: string;
};

export type RunStats = {
  totalRuns: number;
  failedRuns: number;
  avgScore: number;
  avgDurationMs: number;
};

type DbRun = {
  id: number;
  timestamp: string;
  input_path: string;
  doc_hash_b32: string;
  entries: number;
  counts_by_label: string;
  residual_count: number;
  score: number;
  strict: number;
  passed: number;
  duration_ms: number;
};

function parseCounts(raw: string): Partial<Record<EntityLabel, number>> {
  const out: Partial<Record<EntityLabel, number>> = {};
  const parsed: unknown = JSON.parse(raw);
  if (parsed === null || typeof parsed !== "object") return out;
  for (const [label, count] of Object.entries(parsed)) {
    if (isEntityLabel(label) && typeof count === "number") out[label] = count;
  }
  return out;
}

// =============================================================================
// Store Class
// =============================================================================

export class RunStore {
  private db: Database.Database;
  private log: Logger;

  /** `":memory:"` opens a private in-memory database. */
  constructor(dbPath: string, log: Logger = silentLogger) {
    this.log = log;
    const inMemory = dbPath === ":memory:";

    if (!inMemory) {
      const dir = path.dirname(dbPath);
      if (!fs.existsSync(dir)) {
        fs.mkdirSync(dir, { recursive: true });
      }
    }

    this.db = new Database(dbPath);
    if (!inMemory) this.db.pragma("journal_mode = WAL");
    this.db.exec(SCHEMA_SQL);

    this.log.debug?.(`run store initialized at ${dbPath}`);
  }

  recordRun(run: RunRecord): number {
    const result = this.db
      .prepare(
        `
        INSERT INTO redaction_runs
          (input_path, doc_hash_b32, entries, counts_by_label, residual_count, score, strict, passed, duration_ms)
        VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)
      `,
      )
      .run(
        run.inputPath,
        run.docHashB32,
        run.entries,
        JSON.stringify(run.countsByLabel ?? {}),
        run.residualCount,
        run.score,
        run.strict ? 1 : 0,
        run.passed ? 1 : 0,
        run.durationMs,
      );

    return Number(result.lastInsertRowid);
  }

  /** Newest first. */
  getRecentRuns(limit: number = 20): RunLogEntry[] {
    const rows = this.db
      .prepare<[number], DbRun>(
        `
        SELECT * FROM redaction_runs
        ORDER BY id DESC
        LIMIT ?
      `,
      )
      .all(limit);

    return rows.map((row) => ({
      id: row.id,
      timestamp: row.timestamp,
      inputPath: row.input_path,
      docHashB32: row.doc_hash_b32,
      entries: row.entries,
      countsByLabel: parseCounts(row.counts_by_label),
      residualCount: row.residual_count,
      score: row.score,
      strict: row.strict === 1,
      passed: row.passed === 1,
      durationMs: row.duration_ms,
    }));
  }

  getStats(): RunStats {
    const row = this.db
      .prepare<[], { total: number; failed: number | null; avg_score: number | null; avg_duration: number | null }>(
        `
        SELECT
          COUNT(*) AS total,
          SUM(CASE WHEN passed = 0 THEN 1 ELSE 0 END) AS failed,
          AVG(score) AS avg_score,
          AVG(duration_ms) AS avg_duration
        FROM redaction_runs
      `,
      )
      .get();

    return {
      totalRuns: row?.total ?? 0,
      failedRuns: row?.failed ?? 0,
      avgScore: row?.avg_score ?? 0,
      avgDurationMs: Math.round(row?.avg_duration ?? 0),
    };
  }

  close(): void {
    this.db.close();
  }
}
