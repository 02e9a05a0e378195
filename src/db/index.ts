// pattern: Imperative Shell
import { mkdirSync } from "node:fs";
import { dirname } from "node:path";
import Database from "better-sqlite3";
import { sql } from "drizzle-orm";
import { drizzle } from "drizzle-orm/better-sqlite3";
import type { BetterSQLite3Database } from "drizzle-orm/better-sqlite3";
import * as schema from "./schema";

export function createDatabase(
  dbPath: string,
): { readonly db: AppDatabase; readonly close: () => void } {
  if (dbPath !== ":memory:") {
    mkdirSync(dirname(dbPath), { recursive: true });
  }

  const sqlite = new Database(dbPath);
  sqlite.pragma("journal_mode = WAL");
  sqlite.pragma("foreign_keys = ON");

  const db = drizzle(sqlite, { schema });

  return { db, close: () => sqlite.close() };
}

/**
 * Creates the tables if they do not exist yet. Mirrors ./schema.ts; safe to
 * run on every start.
 */
export function ensureSchema(db: AppDatabase): void {
  db.run(sql`
    CREATE TABLE IF NOT EXISTS seen_items (
      item_id TEXT PRIMARY KEY NOT NULL,
      kind TEXT NOT NULL,
      title TEXT NOT NULL,
      fingerprint TEXT NOT NULL,
      disposition TEXT NOT NULL DEFAULT 'announced',
      committed_at INTEGER NOT NULL DEFAULT (unixepoch())
    )
  `);
  db.run(sql`
    CREATE INDEX IF NOT EXISTS seen_items_committed_at_idx
      ON seen_items (committed_at)
  `);
  db.run(sql`
    CREATE TABLE IF NOT EXISTS store_meta (
      key TEXT PRIMARY KEY NOT NULL,
      value TEXT NOT NULL,
      updated_at INTEGER NOT NULL DEFAULT (unixepoch())
    )
  `);
  db.run(sql`
    CREATE TABLE IF NOT EXISTS cycles (
      id INTEGER PRIMARY KEY AUTOINCREMENT NOT NULL,
      started_at INTEGER NOT NULL,
      finished_at INTEGER NOT NULL,
      outcome TEXT NOT NULL,
      failed_phase TEXT,
      new_count INTEGER NOT NULL DEFAULT 0,
      sent_count INTEGER NOT NULL DEFAULT 0,
      failed_count INTEGER NOT NULL DEFAULT 0,
      error TEXT
    )
  `);
}

export type AppDatabase = BetterSQLite3Database<typeof schema>;
