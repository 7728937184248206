/**
 * SQL Server audit log adapter.
 */

import type { ConnectionPool } from "mssql";
import { type AppError, internal } from "../../../core/errors/app-error.js";
import {
  type AuditEntry,
  type AuditLog,
  type AuditQueryOptions,
  type NewAuditEntry,
  isAuditAction,
} from "../../../core/ports/audit-log.js";
import { type Result, err, ok } from "../../../core/types/result.js";
import { generateId } from "../../../shared/utils/id.js";
import { toNumber } from "./shared.js";

interface AuditRow {
  id: string;
  user_id: string | null;
  action: string;
  resource: string;
  resource_id: string | null;
  detail: string | null;
  ip: string;
  timestamp: number | string;
}

export const createMssqlAuditLog = (pool: ConnectionPool): AuditLog => ({
  async append(entry: NewAuditEntry): Promise<Result<AuditEntry, AppError>> {
    try {
      const stored: AuditEntry = { ...entry, id: generateId(), timestamp: Date.now() };
      await pool
        .request()
        .input("id", stored.id)
        .input("userId", stored.userId)
        .input("action", stored.action)
        .input("resource", stored.resource)
        .input("resourceId", stored.resourceId)
        .input("detail", stored.detail)
        .input("ip", stored.ip)
        .input("timestamp", stored.timestamp)
        .query(`
          INSERT INTO audit_log (id, user_id, action, resource, resource_id, detail, ip, timestamp)
          VALUES (@id, @userId, @action, @resource, @resourceId, @detail, @ip, @timestamp)
        `);
      return ok(stored);
    } catch (e: unknown) {
      return err(internal("Database error", e));
    }
  },

  async query(options: AuditQueryOptions): Promise<Result<readonly AuditEntry[], AppError>> {
    try {
      const conditions: string[] = [];
      const req = pool.request();

      if (options.userId !== undefined) {
        conditions.push("user_id = @userId");
        req.input("userId", options.userId);
      }
      if (options.action !== undefined) {
        conditions.push("action = @action");
        req.input("action", options.action);
      }
      if (options.since !== undefined) {
        conditions.push("timestamp >= @since");
        req.input("since", options.since);
      }

      const where = conditions.length > 0 ? `WHERE ${conditions.join(" AND ")}` : "";
      req.input("take", options.limit ?? 50);

      const result = await req.query<AuditRow>(
        `SELECT TOP (@take) * FROM audit_log ${where} ORDER BY timestamp DESC`,
      );

      return ok(
        result.recordset.flatMap((r): AuditEntry[] => {
          const action = r.action;
          if (!isAuditAction(action)) return [];
          return [
            {
              id: r.id,
              userId: r.user_id,
              action,
              resource: r.resource,
              resourceId: r.resource_id,
              detail: r.detail,
              ip: r.ip,
              timestamp: toNumber(r.timestamp),
            },
          ];
        }),
      );
    } catch (e: unknown) {
      return err(internal("Database error", e));
    }
  },

  async delete(id: string): Promise<Result<boolean, AppError>> {
    try {
      const result = await pool.request().input("id", id).query("DELETE FROM audit_log WHERE id = @id");
      return ok((result.rowsAffected[0] ?? 0) > 0);
    } catch (e: unknown) {
      return err(internal("Database error", e));
    }
  },
});
