import Database from "better-sqlite3";
import { mkdirSync } from "node:fs";
import { dirname } from "node:path";
import { applySchema } from "./schema.js";
import { createLogger } from "../shared/logger.js";

const log = createLogger("db");

export const IN_MEMORY = ":memory:";

/**
 * Open (and migrate) a history database. ":memory:" gives a throwaway
 * database that lives as long as the process.
 */
export function openDb(dbPath: string): Database.Database {
  if (dbPath !== IN_MEMORY) {
    mkdirSync(dirname(dbPath), { recursive: true });
  }

  log.info("Opening database", { path: dbPath });

  const db = new Database(dbPath);
  if (dbPath !== IN_MEMORY) {
    db.pragma("journal_mode = WAL");
    db.pragma("busy_timeout = 5000");
  }
  db.pragma("foreign_keys = ON");

  applySchema(db);

  return db;
}

/**
 * Run a function inside a SQLite transaction.
 * Automatically commits on success, rolls back on error.
 */
export function inTransaction<T>(
  db: Database.Database,
  fn: (db: Database.Database) => T
): T {
  const txn = db.transaction(() => fn(db));
  return txn();
}
