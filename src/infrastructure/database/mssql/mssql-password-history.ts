/**
 * SQL Server password history adapter. IDENTITY ids give insertion order.
 */

import type { ConnectionPool } from "mssql";
import { type AppError, internal } from "../../../core/errors/app-error.js";
import type {
  PasswordHistoryEntry,
  PasswordHistoryStore,
} from "../../../core/ports/password-history.js";
import { type UserId, toUserId } from "../../../core/types/brand.js";
import { type Result, err, ok } from "../../../core/types/result.js";
import { toNumber } from "./shared.js";

interface HistoryRow {
  id: number | string;
  user_id: string;
  password_hash: string;
  created_at: number | string;
}

export const createMssqlPasswordHistory = (pool: ConnectionPool): PasswordHistoryStore => ({
  async add(
    userId: UserId,
    passwordHash: string,
    createdAt: number,
  ): Promise<Result<PasswordHistoryEntry, AppError>> {
    try {
      const result = await pool
        .request()
        .input("userId", userId)
        .input("passwordHash", passwordHash)
        .input("createdAt", createdAt)
        .query<{ id: number | string }>(`
          INSERT INTO password_history (user_id, password_hash, created_at)
          OUTPUT INSERTED.id
          VALUES (@userId, @passwordHash, @createdAt)
        `);
      const row = result.recordset[0];
      if (!row) return err(internal("Insert returned no id"));
      return ok({ id: toNumber(row.id), userId, passwordHash, createdAt });
    } catch (e: unknown) {
      return err(internal("Database error", e));
    }
  },

  async listByUser(userId: UserId): Promise<Result<readonly PasswordHistoryEntry[], AppError>> {
    try {
      const result = await pool
        .request()
        .input("userId", userId)
        .query<HistoryRow>("SELECT * FROM password_history WHERE user_id = @userId ORDER BY id ASC");
      return ok(
        result.recordset.map((r) => ({
          id: toNumber(r.id),
          userId: toUserId(r.user_id),
          passwordHash: r.password_hash,
          createdAt: toNumber(r.created_at),
        })),
      );
    } catch (e: unknown) {
      return err(internal("Database error", e));
    }
  },

  async deleteByIds(ids: readonly number[]): Promise<Result<number, AppError>> {
    if (ids.length === 0) return ok(0);
    try {
      const req = pool.request();
      const names = ids.map((id, i) => {
        req.input(`id${i}`, id);
        return `@id${i}`;
      });
      const result = await req.query(`DELETE FROM password_history WHERE id IN (${names.join(", ")})`);
      return ok(result.rowsAffected[0] ?? 0);
    } catch (e: unknown) {
      return err(internal("Database error", e));
    }
  },

  async deleteByUser(userId: UserId): Promise<Result<number, AppError>> {
    try {
      const result = await pool
        .request()
        .input("userId", userId)
        .query("DELETE FROM password_history WHERE user_id = @userId");
      return ok(result.rowsAffected[0] ?? 0);
    } catch (e: unknown) {
      return err(internal("Database error", e));
    }
  },
});
