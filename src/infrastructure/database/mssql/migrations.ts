/**
 * SQL Server migration runner on the `mssql` driver.
 * Same versions as the SQLite set, written in T-SQL. Each migration
 * runs in its own transaction.
 */

import type { ConnectionPool } from "mssql";
import type { Logger } from "../../../core/ports/logger.js";

interface MssqlMigration {
  readonly version: string;
  readonly name: string;
  readonly up: string; // T-SQL DDL, statements separated by ';'
  readonly down: string;
}

/**
 * NVARCHAR for text, BIGINT for millisecond timestamps, TINYINT for
 * the account status flag.
 */
const migrations: readonly MssqlMigration[] = [
  {
    version: "001",
    name: "create_users",
    up: `
      IF NOT EXISTS (SELECT * FROM sys.tables WHERE name = 'users')
      CREATE TABLE users (
        id              NVARCHAR(36)  NOT NULL PRIMARY KEY,
        user_name       NVARCHAR(256) NOT NULL UNIQUE,
        first_name      NVARCHAR(100) NOT NULL,
        last_name       NVARCHAR(100) NOT NULL,
        email           NVARCHAR(256) NOT NULL UNIQUE,
        phone_number    NVARCHAR(32)  NULL,
        password_hash   NVARCHAR(512) NULL,
        account_status  TINYINT       NOT NULL DEFAULT 0,
        created_at      BIGINT        NOT NULL,
        updated_at      BIGINT        NOT NULL
      );

      IF NOT EXISTS (SELECT * FROM sys.indexes WHERE name = 'idx_users_created')
      CREATE INDEX idx_users_created ON users(created_at, id);

      IF NOT EXISTS (SELECT * FROM sys.tables WHERE name = 'user_roles')
      CREATE TABLE user_roles (
        user_id  NVARCHAR(36) NOT NULL REFERENCES users(id) ON DELETE CASCADE,
        role     NVARCHAR(32) NOT NULL,
        PRIMARY KEY (user_id, role)
      );
    `,
    down: `
      IF EXISTS (SELECT * FROM sys.tables WHERE name = 'user_roles') DROP TABLE user_roles;
      DROP INDEX IF EXISTS idx_users_created ON users;
      IF EXISTS (SELECT * FROM sys.tables WHERE name = 'users') DROP TABLE users;
    `,
  },
  {
    version: "002",
    name: "create_password_history",
    up: `
      IF NOT EXISTS (SELECT * FROM sys.tables WHERE name = 'password_history')
      CREATE TABLE password_history (
        id              BIGINT IDENTITY(1,1) NOT NULL PRIMARY KEY,
        user_id         NVARCHAR(36)  NOT NULL,
        password_hash   NVARCHAR(512) NOT NULL,
        created_at      BIGINT        NOT NULL
      );

      IF NOT EXISTS (SELECT * FROM sys.indexes WHERE name = 'idx_password_history_user')
      CREATE INDEX idx_password_history_user ON password_history(user_id, id);
    `,
    down: `
      DROP INDEX IF EXISTS idx_password_history_user ON password_history;
      IF EXISTS (SELECT * FROM sys.tables WHERE name = 'password_history') DROP TABLE password_history;
    `,
  },
  {
    version: "003",
    name: "create_audit_log",
    up: `
      IF NOT EXISTS (SELECT * FROM sys.tables WHERE name = 'audit_log')
      CREATE TABLE audit_log (
        id          NVARCHAR(36)   NOT NULL PRIMARY KEY,
        user_id     NVARCHAR(36)   NULL,
        action      NVARCHAR(50)   NOT NULL,
        resource    NVARCHAR(100)  NOT NULL,
        resource_id NVARCHAR(64)   NULL,
        detail      NVARCHAR(MAX)  NULL,
        ip          NVARCHAR(45)   NOT NULL,
        timestamp   BIGINT         NOT NULL
      );

      IF NOT EXISTS (SELECT * FROM sys.indexes WHERE name = 'idx_audit_log_user')
      CREATE INDEX idx_audit_log_user ON audit_log(user_id);

      IF NOT EXISTS (SELECT * FROM sys.indexes WHERE name = 'idx_audit_log_timestamp')
      CREATE INDEX idx_audit_log_timestamp ON audit_log(timestamp);
    `,
    down: `
      DROP INDEX IF EXISTS idx_audit_log_timestamp ON audit_log;
      DROP INDEX IF EXISTS idx_audit_log_user ON audit_log;
      IF EXISTS (SELECT * FROM sys.tables WHERE name = 'audit_log') DROP TABLE audit_log;
    `,
  },
];

const ensureMigrationsTable = async (pool: ConnectionPool): Promise<void> => {
  await pool.request().query(`
    IF NOT EXISTS (SELECT * FROM sys.tables WHERE name = '_migrations')
    CREATE TABLE _migrations (
      version     NVARCHAR(10) NOT NULL PRIMARY KEY,
      name        NVARCHAR(100) NOT NULL,
      applied_at  BIGINT NOT NULL
    )
  `);
};

const getAppliedVersions = async (pool: ConnectionPool): Promise<Set<string>> => {
  const result = await pool
    .request()
    .query<{ version: string }>("SELECT version FROM _migrations ORDER BY version");
  return new Set(result.recordset.map((r) => r.version));
};

const statements = (script: string): string[] =>
  script
    .split(";")
    .map((s) => s.trim())
    .filter((s) => s.length > 0);

export const mssqlMigrateUp = async (pool: ConnectionPool, logger: Logger): Promise<number> => {
  await ensureMigrationsTable(pool);
  const applied = await getAppliedVersions(pool);
  let count = 0;

  for (const migration of migrations) {
    if (applied.has(migration.version)) continue;

    const tx = pool.transaction();
    await tx.begin();

    try {
      for (const stmt of statements(migration.up)) {
        await tx.request().query(stmt);
      }

      await tx
        .request()
        .input("version", migration.version)
        .input("name", migration.name)
        .input("appliedAt", Date.now())
        .query(
          "INSERT INTO _migrations (version, name, applied_at) VALUES (@version, @name, @appliedAt)",
        );

      await tx.commit();
    } catch (e) {
      await tx.rollback();
      throw e;
    }

    logger.info("Migration applied", { version: migration.version, name: migration.name });
    count++;
  }

  if (count > 0) {
    logger.info("SQL Server migrations complete", { applied: count });
  }
  return count;
};

export const mssqlMigrateDown = async (
  pool: ConnectionPool,
  logger: Logger,
): Promise<string | null> => {
  await ensureMigrationsTable(pool);
  const applied = await getAppliedVersions(pool);

  for (const migration of [...migrations].reverse()) {
    if (!applied.has(migration.version)) continue;

    const tx = pool.transaction();
    await tx.begin();

    try {
      for (const stmt of statements(migration.down)) {
        await tx.request().query(stmt);
      }
      await tx
        .request()
        .input("version", migration.version)
        .query("DELETE FROM _migrations WHERE version = @version");
      await tx.commit();
    } catch (e) {
      await tx.rollback();
      throw e;
    }

    logger.info("Migration rolled back", { version: migration.version, name: migration.name });
    return migration.version;
  }

  return null;
};
