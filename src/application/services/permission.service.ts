import type { Principal } from "../../core/entities/principal.js";
import { ROLE_RANK, Role, highestRole } from "../../core/entities/role.js";
import { type AppError, forbidden } from "../../core/errors/app-error.js";
import { isBlank } from "../../core/errors/argument-error.js";
import { ErrorMessages } from "../../core/errors/messages.js";
import { AuditAction } from "../../core/ports/audit-log.js";
import type { Logger } from "../../core/ports/logger.js";
import type { UserRepository } from "../../core/ports/user.repository.js";
import { toUserId } from "../../core/types/brand.js";
import { type Result, err, ok } from "../../core/types/result.js";
import type { AuditService } from "./audit.service.js";
import type { Caller } from "./caller.js";

export interface PermissionDecision {
  readonly allowed: boolean;
  readonly errors: readonly string[];
}

/**
 * Decides whether an acting principal may operate on a target user.
 *
 * Self-access is always allowed. Otherwise the actor's highest role must
 * outrank the target's highest role (a role-less target ranks as User),
 * except that SuperAdmin may act on anyone, other SuperAdmins included.
 * Every failure path is a denial; nothing here throws.
 */
export interface PermissionService {
  evaluate(
    actor: Principal | null,
    targetUserId: string | null | undefined,
  ): Promise<PermissionDecision>;
  /** evaluate + FORBIDDEN on denial, with the denial logged and audited */
  authorize(caller: Caller, targetUserId: string): Promise<Result<void, AppError>>;
}

interface Deps {
  readonly userRepo: UserRepository;
  readonly audit: AuditService;
  readonly logger: Logger;
}

const ALLOW: PermissionDecision = { allowed: true, errors: [] };
const DENY: PermissionDecision = { allowed: false, errors: [ErrorMessages.FORBIDDEN] };

const sameId = (a: string, b: string): boolean => toUserId(a) === toUserId(b);

export const createPermissionService = (deps: Deps): PermissionService => {
  const { userRepo, audit, logger } = deps;

  const evaluate = async (
    actor: Principal | null,
    targetUserId: string | null | undefined,
  ): Promise<PermissionDecision> => {
    if (actor === null || isBlank(actor.id)) return DENY;
    if (targetUserId === null || targetUserId === undefined || isBlank(targetUserId)) return DENY;

    const actingRole = highestRole(actor.roles);

    if (sameId(actor.id, targetUserId)) return ALLOW;

    const targetId = toUserId(targetUserId);
    const target = await userRepo.findById(targetId);
    if (!target.ok) return DENY;

    const targetRoles = await userRepo.getRoles(targetId);
    if (!targetRoles.ok) return DENY;

    if (actingRole === null) return DENY;
    if (actingRole === Role.SUPER_ADMIN) return ALLOW;

    const targetRole = highestRole(targetRoles.value) ?? Role.USER;
    return ROLE_RANK[actingRole] > ROLE_RANK[targetRole] ? ALLOW : DENY;
  };

  return {
    evaluate,

    async authorize(caller, targetUserId) {
      const decision = await evaluate(caller.principal, targetUserId);
      if (decision.allowed) return ok(undefined);

      const actorId = caller.principal?.id ?? null;
      logger.warn("Permission denied", { actorId, targetUserId });
      await audit.record({
        userId: actorId,
        action: AuditAction.AUTHORIZATION_DENIED,
        resource: "user",
        resourceId: targetUserId,
        detail: null,
        ip: caller.ip,
      });
      return err(forbidden(decision.errors[0]));
    },
  };
};
