import { type AppError, internal } from "../../core/errors/app-error.js";
import type { PasswordHistoryEntry, PasswordHistoryStore } from "../../core/ports/password-history.js";
import { type UserId, toUserId } from "../../core/types/brand.js";
import { type Result, err, ok } from "../../core/types/result.js";
import type { SqliteDatabase } from "./sqlite.js";

/**
 * SQLite-backed password history. AUTOINCREMENT ids never repeat, so
 * ordering by id is insertion order.
 */

interface HistoryRow {
  id: number;
  user_id: string;
  password_hash: string;
  created_at: number;
}

const rowToEntry = (row: HistoryRow): PasswordHistoryEntry => ({
  id: row.id,
  userId: toUserId(row.user_id),
  passwordHash: row.password_hash,
  createdAt: row.created_at,
});

export const createSqlitePasswordHistory = (db: SqliteDatabase): PasswordHistoryStore => {
  const insertStmt = db.prepare<[string, string, number]>(
    "INSERT INTO password_history (user_id, password_hash, created_at) VALUES (?, ?, ?)",
  );
  const listStmt = db.prepare<[string], HistoryRow>(
    "SELECT * FROM password_history WHERE user_id = ? ORDER BY id ASC",
  );
  const deleteOneStmt = db.prepare<[number]>("DELETE FROM password_history WHERE id = ?");
  const deleteUserStmt = db.prepare<[string]>("DELETE FROM password_history WHERE user_id = ?");

  const deleteMany = db.transaction((ids: readonly number[]): number => {
    let removed = 0;
    for (const id of ids) {
      removed += deleteOneStmt.run(id).changes;
    }
    return removed;
  });

  return {
    async add(
      userId: UserId,
      passwordHash: string,
      createdAt: number,
    ): Promise<Result<PasswordHistoryEntry, AppError>> {
      try {
        const info = insertStmt.run(userId, passwordHash, createdAt);
        return ok({ id: Number(info.lastInsertRowid), userId, passwordHash, createdAt });
      } catch (e: unknown) {
        return err(internal("Failed to add password history", e));
      }
    },

    async listByUser(userId: UserId): Promise<Result<readonly PasswordHistoryEntry[], AppError>> {
      try {
        return ok(listStmt.all(userId).map(rowToEntry));
      } catch (e: unknown) {
        return err(internal("Failed to read password history", e));
      }
    },

    async deleteByIds(ids: readonly number[]): Promise<Result<number, AppError>> {
      if (ids.length === 0) return ok(0);
      try {
        return ok(deleteMany(ids));
      } catch (e: unknown) {
        return err(internal("Failed to prune password history", e));
      }
    },

    async deleteByUser(userId: UserId): Promise<Result<number, AppError>> {
      try {
        return ok(deleteUserStmt.run(userId).changes);
      } catch (e: unknown) {
        return err(internal("Failed to delete password history", e));
      }
    },
  };
};
