import type Database from "better-sqlite3";
import { createLogger } from "../shared/logger.js";

const log = createLogger("schema");

/** Current schema version — bump when adding migrations */
export const SCHEMA_VERSION = 1;

const SCHEMA_V1 = `
CREATE TABLE IF NOT EXISTS research_sessions (
  id               TEXT PRIMARY KEY,
  query            TEXT NOT NULL,
  report           TEXT NOT NULL,
  total_subtasks   INTEGER NOT NULL,
  failed_subtasks  INTEGER NOT NULL DEFAULT 0,
  model            TEXT NOT NULL,
  research_model   TEXT NOT NULL,
  used_fallback    INTEGER NOT NULL DEFAULT 0,
  cost_usd         REAL NOT NULL DEFAULT 0,
  elapsed_ms       INTEGER NOT NULL,
  created_at       TEXT NOT NULL DEFAULT (datetime('now'))
);

CREATE TABLE IF NOT EXISTS session_findings (
  session_id  TEXT NOT NULL REFERENCES research_sessions(id) ON DELETE CASCADE,
  idx         INTEGER NOT NULL,
  subtask     TEXT NOT NULL,
  findings    TEXT NOT NULL,
  status      TEXT NOT NULL,
  model       TEXT NOT NULL,
  elapsed_ms  INTEGER NOT NULL,
  PRIMARY KEY (session_id, idx)
);

CREATE TABLE IF NOT EXISTS schema_version (
  version     INTEGER NOT NULL
);

CREATE INDEX IF NOT EXISTS idx_research_sessions_created ON research_sessions(created_at DESC);
`;

export function applySchema(db: Database.Database): void {
  const hasVersion = db
    .prepare<[], { name: string }>(
      `SELECT name FROM sqlite_master WHERE type='table' AND name='schema_version'`
    )
    .get();

  if (!hasVersion) {
    // Fresh database — apply full schema
    db.exec(SCHEMA_V1);
    db.prepare(`INSERT INTO schema_version (version) VALUES (?)`).run(
      SCHEMA_VERSION
    );
    log.info("Applied fresh schema", { version: SCHEMA_VERSION });
    return;
  }

  const row = db
    .prepare<[], { version: number }>(`SELECT version FROM schema_version LIMIT 1`)
    .get();
  const currentVersion = row?.version ?? 0;

  if (currentVersion > SCHEMA_VERSION) {
    throw new Error(
      `History database schema v${currentVersion} is newer than supported v${SCHEMA_VERSION}`
    );
  }
}
