import type { AppError } from "../../core/errors/app-error.js";
import { ensureNotBlank } from "../../core/errors/argument-error.js";
import type { Logger } from "../../core/ports/logger.js";
import type { PasswordHistoryStore } from "../../core/ports/password-history.js";
import { toUserId } from "../../core/types/brand.js";
import { type Result, ok } from "../../core/types/result.js";

export const DEFAULT_HISTORY_SIZE = 5;

/**
 * Retention window enforcement and full erasure of a user's password
 * history. Both resolve to the number of rows removed; zero is normal.
 * A blank user id throws ArgumentError synchronously.
 */
export interface PasswordHistoryCleanupService {
  removeOldPasswords(userId: string | null | undefined): Promise<Result<number, AppError>>;
  deletePasswordHistory(userId: string | null | undefined): Promise<Result<number, AppError>>;
}

interface Deps {
  readonly historyStore: PasswordHistoryStore;
  readonly logger: Logger;
  readonly historySize?: number | undefined;
}

export const createPasswordHistoryCleanupService = (deps: Deps): PasswordHistoryCleanupService => {
  const { historyStore, logger } = deps;
  const keep = Math.max(1, deps.historySize ?? DEFAULT_HISTORY_SIZE);

  const prune = async (userId: string): Promise<Result<number, AppError>> => {
    const rows = await historyStore.listByUser(toUserId(userId));
    if (!rows.ok) return rows;
    if (rows.value.length <= keep) return ok(0);

    // listByUser is oldest first
    const stale = rows.value.slice(0, rows.value.length - keep).map((r) => r.id);
    const removed = await historyStore.deleteByIds(stale);
    if (removed.ok) {
      logger.debug("Pruned password history", { userId, removed: removed.value, kept: keep });
    }
    return removed;
  };

  const erase = async (userId: string): Promise<Result<number, AppError>> => {
    const removed = await historyStore.deleteByUser(toUserId(userId));
    if (removed.ok && removed.value > 0) {
      logger.info("Deleted password history", { userId, removed: removed.value });
    }
    return removed;
  };

  return {
    removeOldPasswords(userId) {
      ensureNotBlank(userId, "userId");
      return prune(userId);
    },

    deletePasswordHistory(userId) {
      ensureNotBlank(userId, "userId");
      return erase(userId);
    },
  };
};
