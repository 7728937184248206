import { type AppError, internal } from "../../core/errors/app-error.js";
import {
  type AuditEntry,
  type AuditLog,
  type AuditQueryOptions,
  type NewAuditEntry,
  isAuditAction,
} from "../../core/ports/audit-log.js";
import { type Result, err, ok } from "../../core/types/result.js";
import { generateId } from "../../shared/utils/id.js";
import type { SqliteDatabase } from "./sqlite.js";

/**
 * SQLite audit log. Query by user, action and time range, newest first.
 */

interface AuditRow {
  id: string;
  user_id: string | null;
  action: string;
  resource: string;
  resource_id: string | null;
  detail: string | null;
  ip: string;
  timestamp: number;
}

/** Rows with an action this build no longer knows are skipped */
const rowToEntry = (row: AuditRow): AuditEntry | null =>
  isAuditAction(row.action)
    ? {
        id: row.id,
        userId: row.user_id,
        action: row.action,
        resource: row.resource,
        resourceId: row.resource_id,
        detail: row.detail,
        ip: row.ip,
        timestamp: row.timestamp,
      }
    : null;

export const createSqliteAuditLog = (db: SqliteDatabase): AuditLog => {
  const insertStmt = db.prepare(
    "INSERT INTO audit_log (id, user_id, action, resource, resource_id, detail, ip, timestamp) VALUES (?, ?, ?, ?, ?, ?, ?, ?)",
  );
  const deleteStmt = db.prepare<[string]>("DELETE FROM audit_log WHERE id = ?");

  return {
    async append(entry: NewAuditEntry): Promise<Result<AuditEntry, AppError>> {
      try {
        const stored: AuditEntry = { ...entry, id: generateId(), timestamp: Date.now() };
        insertStmt.run(
          stored.id,
          stored.userId,
          stored.action,
          stored.resource,
          stored.resourceId,
          stored.detail,
          stored.ip,
          stored.timestamp,
        );
        return ok(stored);
      } catch (e: unknown) {
        return err(internal("Failed to append audit entry", e));
      }
    },

    async query(options: AuditQueryOptions): Promise<Result<readonly AuditEntry[], AppError>> {
      try {
        const conditions: string[] = [];
        const params: unknown[] = [];

        if (options.userId !== undefined) {
          conditions.push("user_id = ?");
          params.push(options.userId);
        }
        if (options.action !== undefined) {
          conditions.push("action = ?");
          params.push(options.action);
        }
        if (options.since !== undefined) {
          conditions.push("timestamp >= ?");
          params.push(options.since);
        }

        const where = conditions.length > 0 ? `WHERE ${conditions.join(" AND ")}` : "";
        params.push(options.limit ?? 50);

        const rows = db
          .prepare<unknown[], AuditRow>(
            `SELECT * FROM audit_log ${where} ORDER BY timestamp DESC, rowid DESC LIMIT ?`,
          )
          .all(...params);
        return ok(rows.flatMap((row) => rowToEntry(row) ?? []));
      } catch (e: unknown) {
        return err(internal("Failed to query audit log", e));
      }
    },

    async delete(id: string): Promise<Result<boolean, AppError>> {
      try {
        return ok(deleteStmt.run(id).changes > 0);
      } catch (e: unknown) {
        return err(internal("Failed to delete audit entry", e));
      }
    },
  };
};
