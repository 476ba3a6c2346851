/**
 * Ghostline — src/db/db.ts
 * WHAT: SQLite connection bootstrap and schema creation.
 * WHY: Centralizes better-sqlite3 setup and PRAGMAs so stores can just import `db`.
 * FLOWS:
 *  - Open DB → set PRAGMAs → optional statement tracing → ensureCoreSchema → closeDatabase on shutdown
 * DOCS:
 *  - better-sqlite3 API: https://github.com/WiseLibs/better-sqlite3/blob/master/docs/api.md
 *  - SQLite PRAGMA: https://sqlite.org/pragma.html
 *
 * NOTE: better-sqlite3 is synchronous by design; keep statements small and quick.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import Database from "better-sqlite3";
import fs from "node:fs";
import path from "node:path";
import { env } from "../lib/env.js";
import { logger } from "../lib/logger.js";
import { ensureCoreSchema } from "./schema.js";

const DB_BUSY_TIMEOUT_MS = 5000;

const dbPath = env.DB_PATH;
const inMemory = dbPath === ":memory:";
if (!inMemory) {
  fs.mkdirSync(path.dirname(dbPath), { recursive: true });
}

const dbTraceEnabled = process.env.DB_TRACE === "1";

export const db = new Database(dbPath, {
  fileMustExist: false,
  // DB_TRACE=1 logs every executed statement at debug level
  verbose: dbTraceEnabled
    ? (message?: unknown) => logger.debug({ evt: "db_call", sql: String(message) }, "db call")
    : undefined,
});

// WAL improves reader/writer concurrency; NORMAL sync is safe under WAL.
if (!inMemory) {
  db.pragma("journal_mode = WAL");
}
db.pragma("synchronous = NORMAL");
db.pragma("foreign_keys = ON");
db.pragma(`busy_timeout = ${DB_BUSY_TIMEOUT_MS}`);
logger.info({ dbPath, dbTraceEnabled }, "SQLite opened");

ensureCoreSchema(db);

let closed = false;

/**
 * Checkpoint WAL and close. Safe to call more than once.
 */
export function closeDatabase(): void {
  if (closed) return;
  closed = true;
  try {
    if (!inMemory) {
      db.pragma("wal_checkpoint(TRUNCATE)");
    }
    db.close();
    logger.info("Database closed successfully");
  } catch (err) {
    logger.error({ err }, "Error closing database");
  }
}
