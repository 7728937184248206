import { ALL_ROLES, type Role, parseRole } from "../../core/entities/role.js";
import { AccountStatus } from "../../core/entities/user.entity.js";
import {
  type AppError,
  ErrorCode,
  asStoreFailure,
  inactiveUser,
  invalidRole,
  missingRole,
  roleAlreadyHeld,
} from "../../core/errors/app-error.js";
import { ensureNotBlank } from "../../core/errors/argument-error.js";
import { AuditAction } from "../../core/ports/audit-log.js";
import type { Logger } from "../../core/ports/logger.js";
import type { UserRepository } from "../../core/ports/user.repository.js";
import { type Result, err, ok } from "../../core/types/result.js";
import type { AuditService } from "./audit.service.js";
import type { Caller } from "./caller.js";
import type { GuardedMutationRunner } from "./guarded-mutation.js";

export interface RoleService {
  /** Every role, ordered by name */
  listRoles(): readonly Role[];
  /** A user holds at most one role, and only an active user may get one */
  assignRole(caller: Caller, id: string, roleName: string): Promise<Result<void, AppError>>;
  removeRole(caller: Caller, id: string, roleName: string): Promise<Result<void, AppError>>;
}

interface Deps {
  readonly userRepo: UserRepository;
  readonly guarded: GuardedMutationRunner;
  readonly audit: AuditService;
  readonly logger: Logger;
}

export const createRoleService = (deps: Deps): RoleService => {
  const { userRepo, guarded, audit, logger } = deps;

  const recordChange = (caller: Caller, userId: string, action: AuditAction, role: Role) =>
    audit.record({
      userId: caller.principal?.id ?? null,
      action,
      resource: "user",
      resourceId: userId,
      detail: role,
      ip: caller.ip,
    });

  return {
    listRoles() {
      return ALL_ROLES;
    },

    assignRole(caller, id, roleName) {
      ensureNotBlank(roleName, "roleName");
      const role = parseRole(roleName);

      return guarded<void>(caller, id, {
        name: "assignRole",
        precondition: async (user) => {
          if (user.accountStatus !== AccountStatus.ACTIVE) return inactiveUser();
          if (role === null) return invalidRole();

          const held = await userRepo.getRoles(user.id);
          if (!held.ok) return held.error;
          return held.value.length > 0 ? roleAlreadyHeld() : null;
        },
        mutate: async (user) => {
          if (role === null) return err(invalidRole());

          const added = await userRepo.addRole(user.id, role);
          if (!added.ok) {
            return err(added.error.code === ErrorCode.INTERNAL ? added.error : asStoreFailure(added.error));
          }

          logger.info("Role assigned", { userId: user.id, role, actorId: caller.principal?.id });
          await recordChange(caller, user.id, AuditAction.ROLE_ASSIGNED, role);
          return ok(undefined);
        },
      });
    },

    removeRole(caller, id, roleName) {
      ensureNotBlank(roleName, "roleName");
      const role = parseRole(roleName);

      return guarded<void>(caller, id, {
        name: "removeRole",
        precondition: async (user) => {
          if (role === null) return invalidRole();

          const held = await userRepo.getRoles(user.id);
          if (!held.ok) return held.error;
          return held.value.includes(role) ? null : missingRole();
        },
        mutate: async (user) => {
          if (role === null) return err(invalidRole());

          const removed = await userRepo.removeRole(user.id, role);
          if (!removed.ok) {
            return err(
              removed.error.code === ErrorCode.INTERNAL ? removed.error : asStoreFailure(removed.error),
            );
          }

          logger.info("Role removed", { userId: user.id, role, actorId: caller.principal?.id });
          await recordChange(caller, user.id, AuditAction.ROLE_REMOVED, role);
          return ok(undefined);
        },
      });
    },
  };
};
