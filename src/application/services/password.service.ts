import { type CredentialedUser, hasPassword } from "../../core/entities/user.entity.js";
import {
  type AppError,
  cannotReuse,
  invalidCredentials,
  passwordAlreadySet,
  passwordMismatch,
} from "../../core/errors/app-error.js";
import { ensureDefined, ensureNotBlank } from "../../core/errors/argument-error.js";
import { AuditAction } from "../../core/ports/audit-log.js";
import type { Logger } from "../../core/ports/logger.js";
import type { UserRepository } from "../../core/ports/user.repository.js";
import { toUserId } from "../../core/types/brand.js";
import { type Result, err, ok } from "../../core/types/result.js";
import type { KeyedLock } from "../../shared/utils/keyed-lock.js";
import type { AuditService } from "./audit.service.js";
import type { Caller } from "./caller.js";
import type { CredentialService } from "./credential.service.js";
import type { GuardedMutationRunner } from "./guarded-mutation.js";
import type { PasswordHistoryService } from "./password-history.service.js";

export interface SetPasswordRequest {
  readonly password?: string | null | undefined;
  readonly passwordConfirmed?: string | null | undefined;
}

export interface UpdatePasswordRequest {
  readonly currentPassword?: string | null | undefined;
  readonly newPassword?: string | null | undefined;
}

/**
 * The two password mutations. Both write exactly one history row on
 * success and none on failure, and both hold the per-user lock for the
 * whole read, verify, write and history sequence.
 */
export interface PasswordService {
  /** First password for an account that has none. No permission check. */
  setPassword(
    id: string | null | undefined,
    request: SetPasswordRequest | null | undefined,
    ip?: string,
  ): Promise<Result<void, AppError>>;
  /** Rotation by the owner or a higher-ranked actor */
  updatePassword(
    caller: Caller,
    id: string | null | undefined,
    request: UpdatePasswordRequest | null | undefined,
  ): Promise<Result<void, AppError>>;
}

interface Deps {
  readonly userRepo: UserRepository;
  readonly credentials: CredentialService;
  readonly history: PasswordHistoryService;
  readonly guarded: GuardedMutationRunner;
  readonly audit: AuditService;
  readonly lock: KeyedLock;
  readonly logger: Logger;
}

export const createPasswordService = (deps: Deps): PasswordService => {
  const { userRepo, credentials, history, guarded, audit, lock, logger } = deps;

  const recordHistory = async (user: CredentialedUser): Promise<Result<void, AppError>> => {
    const added = await history.addPasswordHistory({
      userId: user.id,
      passwordHash: user.passwordHash,
    });
    if (!added.ok) {
      logger.error("Password stored but history write failed", {
        userId: user.id,
        error: added.error.message,
      });
      return added;
    }
    return ok(undefined);
  };

  return {
    setPassword(id, request, ip = "unknown") {
      ensureNotBlank(id, "id");
      ensureDefined(request, "request");
      const { password, passwordConfirmed } = request;
      ensureNotBlank(password, "password");
      ensureNotBlank(passwordConfirmed, "passwordConfirmed");

      return lock.run(id, async (): Promise<Result<void, AppError>> => {
        if (password !== passwordConfirmed) return err(passwordMismatch());

        const found = await userRepo.findById(toUserId(id));
        if (!found.ok) return found;
        if (hasPassword(found.value)) return err(passwordAlreadySet());

        const stored = await credentials.setPassword(found.value, password);
        if (!stored.ok) return stored;

        const recorded = await recordHistory(stored.value);
        if (!recorded.ok) return recorded;

        const userId = found.value.id;
        logger.info("Password set", { userId });
        await audit.record({
          userId,
          action: AuditAction.PASSWORD_SET,
          resource: "user",
          resourceId: userId,
          detail: null,
          ip,
        });
        return ok(undefined);
      });
    },

    updatePassword(caller, id, request) {
      ensureNotBlank(id, "id");
      ensureDefined(request, "request");
      const { currentPassword, newPassword } = request;
      ensureNotBlank(currentPassword, "currentPassword");
      ensureNotBlank(newPassword, "newPassword");

      return lock.run(id, () =>
        guarded<void>(caller, id, {
          name: "updatePassword",
          // not-found and no-password answer alike
          onMissing: invalidCredentials,
          precondition: (user) => (hasPassword(user) ? null : invalidCredentials()),
          mutate: async (user): Promise<Result<void, AppError>> => {
            const verified = await credentials.checkPassword(user, currentPassword);
            if (!verified.ok) return verified;
            if (!verified.value) return err(invalidCredentials());

            const reused = await history.findPasswordHash({ userId: user.id, password: newPassword });
            if (!reused.ok) return reused;
            if (reused.value) return err(cannotReuse());

            const changed = await credentials.changePassword(user, currentPassword, newPassword);
            if (!changed.ok) return changed;

            const recorded = await recordHistory(changed.value);
            if (!recorded.ok) return recorded;

            logger.info("Password updated", { userId: user.id, actorId: caller.principal?.id });
            await audit.record({
              userId: caller.principal?.id ?? null,
              action: AuditAction.PASSWORD_UPDATED,
              resource: "user",
              resourceId: user.id,
              detail: null,
              ip: caller.ip,
            });
            return ok(undefined);
          },
        }),
      );
    },
  };
};
