import type { SqliteDatabase } from "../sqlite.js";

/**
 * Migration 001: users and their role memberships
 */
export const up = (db: SqliteDatabase): void => {
  db.exec(`
    CREATE TABLE IF NOT EXISTS users (
      id              TEXT PRIMARY KEY,
      user_name       TEXT NOT NULL COLLATE NOCASE UNIQUE,
      first_name      TEXT NOT NULL,
      last_name       TEXT NOT NULL,
      email           TEXT NOT NULL COLLATE NOCASE UNIQUE,
      phone_number    TEXT,
      password_hash   TEXT,
      account_status  INTEGER NOT NULL DEFAULT 0,
      created_at      INTEGER NOT NULL,
      updated_at      INTEGER NOT NULL
    )
  `);
  db.exec("CREATE INDEX IF NOT EXISTS idx_users_created ON users(created_at, id)");

  db.exec(`
    CREATE TABLE IF NOT EXISTS user_roles (
      user_id  TEXT NOT NULL REFERENCES users(id) ON DELETE CASCADE,
      role     TEXT NOT NULL,
      PRIMARY KEY (user_id, role)
    )
  `);
};

export const down = (db: SqliteDatabase): void => {
  db.exec("DROP TABLE IF EXISTS user_roles");
  db.exec("DROP INDEX IF EXISTS idx_users_created");
  db.exec("DROP TABLE IF EXISTS users");
};
