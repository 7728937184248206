import type { AppError } from "../../core/errors/app-error.js";
import type { PasswordHistoryEntry, PasswordHistoryStore } from "../../core/ports/password-history.js";
import type { UserId } from "../../core/types/brand.js";
import { type Result, ok } from "../../core/types/result.js";

/**
 * In-memory password history with a monotonically increasing id.
 */
export const createInMemoryPasswordHistory = (): PasswordHistoryStore => {
  const rows: PasswordHistoryEntry[] = [];
  let nextId = 1;

  return {
    async add(
      userId: UserId,
      passwordHash: string,
      createdAt: number,
    ): Promise<Result<PasswordHistoryEntry, AppError>> {
      const entry: PasswordHistoryEntry = { id: nextId++, userId, passwordHash, createdAt };
      rows.push(entry);
      return ok(entry);
    },

    async listByUser(userId: UserId): Promise<Result<readonly PasswordHistoryEntry[], AppError>> {
      return ok(rows.filter((r) => r.userId === userId).sort((a, b) => a.id - b.id));
    },

    async deleteByIds(ids: readonly number[]): Promise<Result<number, AppError>> {
      const doomed = new Set(ids);
      let removed = 0;
      for (let i = rows.length - 1; i >= 0; i--) {
        const row = rows[i];
        if (row !== undefined && doomed.has(row.id)) {
          rows.splice(i, 1);
          removed++;
        }
      }
      return ok(removed);
    },

    async deleteByUser(userId: UserId): Promise<Result<number, AppError>> {
      const before = rows.length;
      for (let i = rows.length - 1; i >= 0; i--) {
        if (rows[i]?.userId === userId) rows.splice(i, 1);
      }
      return ok(before - rows.length);
    },
  };
};
