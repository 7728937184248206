import type { AppError } from "../../core/errors/app-error.js";
import { ensureDefined, ensureNotBlank } from "../../core/errors/argument-error.js";
import type { Logger } from "../../core/ports/logger.js";
import type { PasswordHasher } from "../../core/ports/password-hasher.js";
import type {
  PasswordHistoryEntry,
  PasswordHistoryStore,
} from "../../core/ports/password-history.js";
import { toUserId } from "../../core/types/brand.js";
import { type Result, ok } from "../../core/types/result.js";
import type { PasswordHistoryCleanupService } from "./password-history-cleanup.service.js";

export interface AddPasswordHistoryRequest {
  readonly userId: string | null | undefined;
  readonly passwordHash: string | null | undefined;
}

export interface FindPasswordHashRequest {
  readonly userId: string | null | undefined;
  readonly password: string | null | undefined;
}

export interface PasswordHistoryService {
  /**
   * Insert the hash, then prune the user's history to the window. A failed
   * prune is logged and leaves the insert standing; the next insert prunes
   * again.
   */
  addPasswordHistory(
    request: AddPasswordHistoryRequest | null | undefined,
  ): Promise<Result<PasswordHistoryEntry, AppError>>;
  /** true when the plaintext verifies against any stored hash */
  findPasswordHash(
    request: FindPasswordHashRequest | null | undefined,
  ): Promise<Result<boolean, AppError>>;
}

interface Deps {
  readonly historyStore: PasswordHistoryStore;
  readonly cleanup: PasswordHistoryCleanupService;
  readonly passwordHasher: PasswordHasher;
  readonly logger: Logger;
  readonly now?: (() => number) | undefined;
}

export const createPasswordHistoryService = (deps: Deps): PasswordHistoryService => {
  const { historyStore, cleanup, passwordHasher, logger } = deps;
  const now = deps.now ?? Date.now;

  return {
    addPasswordHistory(request) {
      ensureDefined(request, "request");
      const { userId, passwordHash } = request;
      ensureNotBlank(userId, "userId");
      ensureNotBlank(passwordHash, "passwordHash");

      return (async () => {
        const added = await historyStore.add(toUserId(userId), passwordHash, now());
        if (!added.ok) return added;

        const pruned = await cleanup.removeOldPasswords(userId);
        if (!pruned.ok) {
          logger.warn("Password history prune failed", { userId, error: pruned.error.message });
        }
        return ok(added.value);
      })();
    },

    findPasswordHash(request) {
      ensureDefined(request, "request");
      const { userId, password } = request;
      ensureNotBlank(userId, "userId");
      ensureNotBlank(password, "password");

      return (async () => {
        const rows = await historyStore.listByUser(toUserId(userId));
        if (!rows.ok) return rows;

        for (const row of rows.value) {
          const matches = await passwordHasher.verify(password, row.passwordHash);
          if (!matches.ok) return matches;
          if (matches.value) return ok(true);
        }
        return ok(false);
      })();
    },
  };
};
