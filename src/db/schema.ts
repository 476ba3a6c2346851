/**
 * Ghostline — src/db/schema.ts
 * WHAT: Idempotent DDL for every table the bot uses.
 * WHY: One function both the bot and `npm run db:init` call; tests run it against :memory:.
 * DOCS:
 *  - SQLite CREATE TABLE: https://sqlite.org/lang_createtable.html
 *
 * NOTE: Only the current table shapes are created. There are no migrations beyond
 * adding destiny.verified in place; other column changes need a rebuilt database.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import type Database from "better-sqlite3";

export const CORE_TABLES = ["destiny", "mutes", "notes", "kv_store"] as const;

export function ensureCoreSchema(db: Database.Database): void {
  // destiny: one linked Bungie account per Discord user
  db.prepare(
    `
    CREATE TABLE IF NOT EXISTS destiny (
      ctx_id TEXT PRIMARY KEY,
      membership_id TEXT NOT NULL UNIQUE,
      name TEXT NOT NULL,
      code INTEGER NOT NULL CHECK (code > 1),
      membership_type TEXT NOT NULL,
      verified INTEGER NOT NULL DEFAULT 0 CHECK (verified IN (0, 1))
    )
  `
  ).run();

  // verified arrived after the first release; older files get it added in place
  const destinyCols = db.prepare(`PRAGMA table_info(destiny)`).all();
  if (!destinyCols.some((col) => typeof col === "object" && col !== null && "name" in col && col.name === "verified")) {
    db.prepare(`ALTER TABLE destiny ADD COLUMN verified INTEGER NOT NULL DEFAULT 0`).run();
  }

  // mutes: at most one active mute per member
  db.prepare(
    `
    CREATE TABLE IF NOT EXISTS mutes (
      member_id TEXT PRIMARY KEY,
      guild_id TEXT NOT NULL,
      author_id TEXT NOT NULL,
      muted_at INTEGER NOT NULL,
      why TEXT,
      duration INTEGER
    )
  `
  ).run();

  db.prepare(`CREATE INDEX IF NOT EXISTS idx_mutes_guild ON mutes(guild_id)`).run();

  db.prepare(
    `
    CREATE TABLE IF NOT EXISTS notes (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      name TEXT NOT NULL UNIQUE,
      content TEXT NOT NULL,
      author_id TEXT NOT NULL,
      guild_id TEXT,
      created_at INTEGER NOT NULL
    )
  `
  ).run();

  db.prepare(`CREATE INDEX IF NOT EXISTS idx_notes_author ON notes(author_id)`).run();

  // kv_store: guild prefixes, mute roles and Bungie OAuth2 tokens, keyed by namespace
  db.prepare(
    `
    CREATE TABLE IF NOT EXISTS kv_store (
      namespace TEXT NOT NULL,
      key TEXT NOT NULL,
      value TEXT NOT NULL,
      expires_at INTEGER,
      updated_at INTEGER NOT NULL,
      PRIMARY KEY (namespace, key)
    )
  `
  ).run();
}

/**
 * Names of the user tables that currently exist, sorted.
 */
export function listTables(db: Database.Database): string[] {
  const rows = db
    .prepare(
      `SELECT name FROM sqlite_master WHERE type = 'table' AND name NOT LIKE 'sqlite_%' ORDER BY name`
    )
    .pluck()
    .all();
  return rows.filter((name): name is string => typeof name === "string");
}
