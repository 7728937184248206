import { mkdirSync } from "node:fs";
import { dirname } from "node:path";
import Database from "better-sqlite3";

export type SqliteDatabase = Database.Database;

/**
 * Open (creating parent directories when needed) a better-sqlite3
 * database with WAL journaling and foreign keys on. ":memory:" is
 * passed through untouched.
 */
export const openSqlite = (path: string): SqliteDatabase => {
  if (path !== ":memory:") {
    mkdirSync(dirname(path), { recursive: true });
  }
  const db = new Database(path);
  db.pragma("journal_mode = WAL");
  db.pragma("foreign_keys = ON");
  return db;
};

/** Detect SQLite UNIQUE constraint violations */
export const isUniqueViolation = (e: unknown): boolean =>
  e instanceof Error && e.message.includes("UNIQUE");
