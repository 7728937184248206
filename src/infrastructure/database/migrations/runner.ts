import type { Logger } from "../../../core/ports/logger.js";
import type { SqliteDatabase } from "../sqlite.js";
import * as createUsers from "./001_create_users.js";
import * as createPasswordHistory from "./002_create_password_history.js";
import * as createAuditLog from "./003_create_audit_log.js";

type Step = (db: SqliteDatabase) => void;

interface Migration {
  readonly version: string;
  readonly name: string;
  readonly up: Step;
  readonly down: Step;
}

/** Ordered by version; append only. */
const MIGRATIONS: readonly Migration[] = [
  { version: "001", name: "create_users", ...createUsers },
  { version: "002", name: "create_password_history", ...createPasswordHistory },
  { version: "003", name: "create_audit_log", ...createAuditLog },
];

const LEDGER_DDL = `
  CREATE TABLE IF NOT EXISTS _migrations (
    version     TEXT PRIMARY KEY,
    name        TEXT NOT NULL,
    applied_at  INTEGER NOT NULL
  )
`;

const appliedVersions = (db: SqliteDatabase): string[] => {
  db.exec(LEDGER_DDL);
  return db
    .prepare<[], { version: string }>("SELECT version FROM _migrations ORDER BY version")
    .all()
    .map((row) => row.version);
};

/**
 * Applies every pending migration, each in its own transaction, and
 * returns how many ran.
 */
export const migrateUp = (db: SqliteDatabase, logger: Logger): number => {
  const applied = new Set(appliedVersions(db));
  const pending = MIGRATIONS.filter((m) => !applied.has(m.version));
  const record = db.prepare("INSERT INTO _migrations (version, name, applied_at) VALUES (?, ?, ?)");

  for (const m of pending) {
    logger.info("Applying migration", { version: m.version, name: m.name });
    db.transaction(() => {
      m.up(db);
      record.run(m.version, m.name, Date.now());
    })();
  }

  if (pending.length > 0) logger.info("Schema up to date", { applied: pending.length });
  return pending.length;
};

/**
 * Reverts the most recent migration. Returns its version, or null when
 * the ledger is empty.
 */
export const migrateDown = (db: SqliteDatabase, logger: Logger): string | null => {
  const latest = appliedVersions(db).at(-1);
  if (latest === undefined) return null;

  const m = MIGRATIONS.find((candidate) => candidate.version === latest);
  if (!m) {
    logger.error("Applied migration has no definition", { version: latest });
    return null;
  }

  logger.info("Reverting migration", { version: m.version, name: m.name });
  db.transaction(() => {
    m.down(db);
    db.prepare("DELETE FROM _migrations WHERE version = ?").run(m.version);
  })();
  return m.version;
};
