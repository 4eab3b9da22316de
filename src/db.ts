/**
 * db.ts — SQLite connection layer.
 *
 * One better-sqlite3 handle per run. Every statement is synchronous, so a
 * transaction is a plain function call: it commits when the callback
 * returns and rolls back when it throws.
 *
 * Pattern:
 *   const db = openDatabase(dbPath);
 *   initSchema(db, [...statements]);
 *   withTransaction(db, () => { ...writes... });
 *   db.close();
 */

import Database from "better-sqlite3";
import * as fs from "node:fs";
import * as path from "node:path";

export const MEMORY_DB = ":memory:";

/**
 * Open (creating if needed) a SQLite database file.
 * The parent directory is created for file-backed databases.
 */
export function openDatabase(dbPath: string): Database.Database {
  if (dbPath !== MEMORY_DB) {
    const dir = path.dirname(dbPath);
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }
  }

  const db = new Database(dbPath);
  if (dbPath !== MEMORY_DB) {
    db.pragma("journal_mode = WAL");
  }
  db.pragma("foreign_keys = ON");
  return db;
}

/**
 * Run a sequence of DDL statements inside a single transaction.
 */
export function initSchema(db: Database.Database, statements: string[]): void {
  withTransaction(db, () => {
    for (const stmt of statements) {
      db.exec(stmt);
    }
  });
}

/**
 * Execute a callback inside a write transaction.
 * Commits on return, rolls back on throw. The write lock is taken up front.
 */
export function withTransaction<T>(db: Database.Database, fn: () => T): T {
  return db.transaction(fn).immediate();
}
