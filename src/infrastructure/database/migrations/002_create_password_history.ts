import type { SqliteDatabase } from "../sqlite.js";

/**
 * Migration 002: password_history
 * No foreign key to users: removal is explicit, done by the history
 * cleanup when an account is deleted.
 */
export const up = (db: SqliteDatabase): void => {
  db.exec(`
    CREATE TABLE IF NOT EXISTS password_history (
      id              INTEGER PRIMARY KEY AUTOINCREMENT,
      user_id         TEXT NOT NULL,
      password_hash   TEXT NOT NULL,
      created_at      INTEGER NOT NULL
    )
  `);
  db.exec("CREATE INDEX IF NOT EXISTS idx_password_history_user ON password_history(user_id, id)");
};

export const down = (db: SqliteDatabase): void => {
  db.exec("DROP INDEX IF EXISTS idx_password_history_user");
  db.exec("DROP TABLE IF EXISTS password_history");
};
