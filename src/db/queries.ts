import type Database from "better-sqlite3";
import { inTransaction, openDb } from "./index.js";
import { createLogger } from "../shared/logger.js";
import type {
  FindingRow,
  ResearchResult,
  SessionRow,
} from "../shared/types.js";

const log = createLogger("queries");

export interface SessionDetail {
  session: SessionRow;
  findings: FindingRow[];
}

/**
 * Finished research sessions, newest first. Backed by SQLite; the default
 * in-memory database forgets everything when the process exits.
 */
export class HistoryStore {
  private readonly db: Database.Database;

  constructor(db: Database.Database) {
    this.db = db;
  }

  static open(dbPath: string): HistoryStore {
    return new HistoryStore(openDb(dbPath));
  }

  recordSession(result: ResearchResult): void {
    inTransaction(this.db, (db) => {
      db.prepare(
        `INSERT INTO research_sessions (
           id, query, report, total_subtasks, failed_subtasks, model,
           research_model, used_fallback, cost_usd, elapsed_ms
         ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`
      ).run(
        result.sessionId,
        result.query,
        result.report,
        result.totalSubtasks,
        result.failedSubtasks,
        result.modelUsed,
        result.researchModel,
        result.usedFallback ? 1 : 0,
        result.costUsd,
        result.elapsedMs
      );

      const insertFinding = db.prepare(
        `INSERT INTO session_findings (
           session_id, idx, subtask, findings, status, model, elapsed_ms
         ) VALUES (?, ?, ?, ?, ?, ?, ?)`
      );
      for (const f of result.findings) {
        insertFinding.run(
          result.sessionId,
          f.index,
          f.subtask,
          f.findings,
          f.status,
          f.model,
          f.elapsedMs
        );
      }
    });
    log.debug("Recorded session", {
      sessionId: result.sessionId,
      findings: result.findings.length,
    });
  }

  listSessions(limit = 10): SessionRow[] {
    return this.db
      .prepare<[number], SessionRow>(
        `SELECT * FROM research_sessions
         ORDER BY created_at DESC, rowid DESC
         LIMIT ?`
      )
      .all(limit);
  }

  getSession(id: string): SessionDetail | undefined {
    const session = this.db
      .prepare<[string], SessionRow>(`SELECT * FROM research_sessions WHERE id = ?`)
      .get(id);
    if (!session) return undefined;

    const findings = this.db
      .prepare<[string], FindingRow>(
        `SELECT * FROM session_findings WHERE session_id = ? ORDER BY idx`
      )
      .all(id);
    return { session, findings };
  }

  countSessions(): number {
    const row = this.db
      .prepare<[], { n: number }>(`SELECT COUNT(*) AS n FROM research_sessions`)
      .get();
    return row?.n ?? 0;
  }

  close(): void {
    this.db.close();
    log.info("Database closed");
  }
}
