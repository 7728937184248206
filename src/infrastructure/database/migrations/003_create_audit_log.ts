import type { SqliteDatabase } from "../sqlite.js";

/**
 * Migration 003: audit_log
 */
export const up = (db: SqliteDatabase): void => {
  db.exec(`
    CREATE TABLE IF NOT EXISTS audit_log (
      id          TEXT PRIMARY KEY,
      user_id     TEXT,
      action      TEXT NOT NULL,
      resource    TEXT NOT NULL,
      resource_id TEXT,
      detail      TEXT,
      ip          TEXT NOT NULL,
      timestamp   INTEGER NOT NULL
    )
  `);

  db.exec("CREATE INDEX IF NOT EXISTS idx_audit_log_user ON audit_log(user_id)");
  db.exec("CREATE INDEX IF NOT EXISTS idx_audit_log_action ON audit_log(action)");
  db.exec("CREATE INDEX IF NOT EXISTS idx_audit_log_timestamp ON audit_log(timestamp)");
};

export const down = (db: SqliteDatabase): void => {
  db.exec("DROP INDEX IF EXISTS idx_audit_log_timestamp");
  db.exec("DROP INDEX IF EXISTS idx_audit_log_action");
  db.exec("DROP INDEX IF EXISTS idx_audit_log_user");
  db.exec("DROP TABLE IF EXISTS audit_log");
};
