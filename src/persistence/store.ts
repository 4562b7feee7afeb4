import Database from "better-sqlite3";
import { mkdirSync } from "node:fs";
import { dirname } from "node:path";
import { getConfig } from "../config.js";
import { SessionSummarySchema } from "../schemas.js";
import type { OverallStatus, SessionSummary } from "../session/aggregator.js";

export type SessionRecord = {
  sessionId: string;
  target: string[];
  overallStatus: OverallStatus;
  startedAt: string;
  durationSeconds: number;
  succeeded: number;
  failed: number;
  timedOut: number;
};

/** SQLite history of past session summaries. Pass ":memory:" for a throwaway store. */
export class SessionStore {
  private db: Database.Database;

  constructor(dbPath?: string) {
    const path = dbPath ?? getConfig().history.dbPath;
    if (path !== ":memory:") {
      mkdirSync(dirname(path), { recursive: true });
    }
    this.db = new Database(path);
    this.db.pragma("journal_mode = WAL");
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS sessions (
        session_id       TEXT PRIMARY KEY,
        target           TEXT NOT NULL,
        overall_status   TEXT NOT NULL,
        started_at       TEXT NOT NULL,
        duration_seconds REAL NOT NULL,
        succeeded        INTEGER NOT NULL,
        failed           INTEGER NOT NULL,
        timed_out        INTEGER NOT NULL,
        summary          TEXT NOT NULL
      );
      CREATE INDEX IF NOT EXISTS idx_sessions_started ON sessions(started_at DESC);
    `);
  }

  insert(summary: SessionSummary): void {
    this.db.prepare(`
      INSERT OR REPLACE INTO sessions
        (session_id, target, overall_status, started_at, duration_seconds, succeeded, failed, timed_out, summary)
      VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)
    `).run(
      summary.sessionId,
      JSON.stringify(summary.target),
      summary.overallStatus,
      summary.startedAt,
      summary.durationSeconds,
      summary.counts.succeeded,
      summary.counts.failed,
      summary.counts.timedOut,
      JSON.stringify(summary),
    );
  }

  get(sessionId: string): SessionSummary | undefined {
    const row = this.db.prepare("SELECT summary FROM sessions WHERE session_id = ?").get(sessionId) as
      | { summary: string }
      | undefined;
    return row ? SessionSummarySchema.parse(JSON.parse(row.summary)) : undefined;
  }

  list(limit = 50): SessionRecord[] {
    const rows = this.db
      .prepare("SELECT * FROM sessions ORDER BY started_at DESC LIMIT ?")
      .all(limit) as SessionRow[];
    return rows.map(rowToRecord);
  }

  /** Delete a specific session. Returns true if deleted. */
  delete(sessionId: string): boolean {
    const result = this.db.prepare("DELETE FROM sessions WHERE session_id = ?").run(sessionId);
    return result.changes > 0;
  }

  /** Delete sessions started before an ISO timestamp. */
  deleteOlderThan(isoTimestamp: string): number {
    const result = this.db.prepare("DELETE FROM sessions WHERE started_at < ?").run(isoTimestamp);
    return result.changes;
  }

  close(): void {
    this.db.close();
  }
}

type SessionRow = {
  session_id: string;
  target: string;
  overall_status: string;
  started_at: string;
  duration_seconds: number;
  succeeded: number;
  failed: number;
  timed_out: number;
};

const OverallStatusSchema = SessionSummarySchema.shape.overallStatus;
const TargetSchema = SessionSummarySchema.shape.target;

function rowToRecord(row: SessionRow): SessionRecord {
  return {
    sessionId: row.session_id,
    target: TargetSchema.parse(JSON.parse(row.target)),
    overallStatus: OverallStatusSchema.parse(row.overall_status),
    startedAt: row.started_at,
    durationSeconds: row.duration_seconds,
    succeeded: row.succeeded,
    failed: row.failed,
    timedOut: row.timed_out,
  };
}
