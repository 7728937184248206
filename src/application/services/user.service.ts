import { highestRole } from "../../core/entities/role.js";
import { AccountStatus, type User, hasPassword } from "../../core/entities/user.entity.js";
import {
  type AppError,
  ErrorCode,
  alreadyActivated,
  asStoreFailure,
  notActivated,
} from "../../core/errors/app-error.js";
import { ensureDefined } from "../../core/errors/argument-error.js";
import { AuditAction } from "../../core/ports/audit-log.js";
import type { Logger } from "../../core/ports/logger.js";
import type { UserRepository } from "../../core/ports/user.repository.js";
import type { PaginatedResult } from "../../core/types/pagination.js";
import { type Result, err, ok } from "../../core/types/result.js";
import type { CreateUserDto, ListUsersDto, UpdateUserDto } from "../dtos/user.dto.js";
import type { AuditService } from "./audit.service.js";
import type { Caller } from "./caller.js";
import type { GuardedMutationRunner } from "./guarded-mutation.js";
import type { PasswordHistoryCleanupService } from "./password-history-cleanup.service.js";

/** Safe user projection; never carries the hash */
export interface UserView {
  readonly id: string;
  readonly userName: string;
  readonly firstName: string;
  readonly lastName: string;
  readonly email: string;
  readonly phoneNumber: string | null;
  readonly accountStatus: AccountStatus;
  readonly hasPassword: boolean;
  readonly role: string | null;
  readonly createdAt: number;
  readonly updatedAt: number;
}

export interface UserStateMetrics {
  readonly totalCount: number;
  readonly activatedUsers: number;
  readonly deactivatedUsers: number;
}

export const toView = (u: User, roles: readonly string[] = []): UserView => ({
  id: u.id,
  userName: u.userName,
  firstName: u.firstName,
  lastName: u.lastName,
  email: u.email,
  phoneNumber: u.phoneNumber,
  accountStatus: u.accountStatus,
  hasPassword: hasPassword(u),
  role: highestRole(roles) ?? roles[0] ?? null,
  createdAt: u.createdAt,
  updatedAt: u.updatedAt,
});

export interface UserService {
  /** Anonymous registration; the account starts inactive and without a password */
  createUser(dto: CreateUserDto, ip?: string): Promise<Result<UserView, AppError>>;
  getUser(caller: Caller, id: string): Promise<Result<UserView, AppError>>;
  listUsers(dto: ListUsersDto): Promise<Result<PaginatedResult<UserView>, AppError>>;
  getStateMetrics(): Promise<Result<UserStateMetrics, AppError>>;
  updateUser(caller: Caller, id: string, dto: UpdateUserDto): Promise<Result<UserView, AppError>>;
  /** Removes the account, then all of its password history */
  deleteUser(caller: Caller, id: string): Promise<Result<void, AppError>>;
  activateUser(caller: Caller, id: string): Promise<Result<void, AppError>>;
  deactivateUser(caller: Caller, id: string): Promise<Result<void, AppError>>;
}

interface Deps {
  readonly userRepo: UserRepository;
  readonly guarded: GuardedMutationRunner;
  readonly cleanup: PasswordHistoryCleanupService;
  readonly audit: AuditService;
  readonly logger: Logger;
}

/** Refusals from the store on a mutation surface as STORE_FAILURE */
const refused = (error: AppError): AppError =>
  error.code === ErrorCode.INTERNAL ? error : asStoreFailure(error);

export const createUserService = (deps: Deps): UserService => {
  const { userRepo, guarded, cleanup, audit, logger } = deps;

  const withRoles = async (user: User): Promise<Result<UserView, AppError>> => {
    const roles = await userRepo.getRoles(user.id);
    if (!roles.ok) return roles;
    return ok(toView(user, roles.value));
  };

  const setStatus = (caller: Caller, id: string, status: AccountStatus) =>
    guarded<void>(caller, id, {
      name: status === AccountStatus.ACTIVE ? "activateUser" : "deactivateUser",
      precondition: (user) => {
        if (status === AccountStatus.ACTIVE) {
          return user.accountStatus === AccountStatus.ACTIVE ? alreadyActivated() : null;
        }
        return user.accountStatus === AccountStatus.INACTIVE ? notActivated() : null;
      },
      mutate: async (user) => {
        const updated = await userRepo.update(user.id, { accountStatus: status });
        if (!updated.ok) return err(refused(updated.error));

        const activated = status === AccountStatus.ACTIVE;
        logger.info(activated ? "User activated" : "User deactivated", {
          userId: user.id,
          actorId: caller.principal?.id,
        });
        await audit.record({
          userId: caller.principal?.id ?? null,
          action: activated ? AuditAction.USER_ACTIVATED : AuditAction.USER_DEACTIVATED,
          resource: "user",
          resourceId: user.id,
          detail: null,
          ip: caller.ip,
        });
        return ok(undefined);
      },
    });

  return {
    async createUser(dto, ip = "unknown") {
      ensureDefined(dto, "dto");
      logger.info("Creating user", { userName: dto.userName });

      const created = await userRepo.create({
        userName: dto.userName,
        firstName: dto.firstName,
        lastName: dto.lastName,
        email: dto.email,
        phoneNumber: dto.phoneNumber ?? null,
        passwordHash: null,
        accountStatus: AccountStatus.INACTIVE,
      });
      if (!created.ok) {
        logger.warn("User creation failed", { userName: dto.userName, code: created.error.code });
        return created;
      }

      await audit.record({
        userId: created.value.id,
        action: AuditAction.USER_CREATED,
        resource: "user",
        resourceId: created.value.id,
        detail: null,
        ip,
      });
      return ok(toView(created.value));
    },

    getUser(caller, id) {
      return guarded(caller, id, { name: "getUser", mutate: withRoles });
    },

    async listUsers(dto) {
      logger.debug("Listing users", { accountStatus: dto.accountStatus, limit: dto.limit });

      const result = await userRepo.list({
        cursor: dto.cursor,
        limit: dto.limit,
        accountStatus: dto.accountStatus,
      });
      if (!result.ok) return result;

      const items: UserView[] = [];
      for (const user of result.value.items) {
        const view = await withRoles(user);
        if (!view.ok) return view;
        items.push(view.value);
      }

      return ok({ items, nextCursor: result.value.nextCursor, hasMore: result.value.hasMore });
    },

    async getStateMetrics() {
      const counts = await userRepo.countByStatus();
      if (!counts.ok) return counts;
      return ok({
        totalCount: counts.value.total,
        activatedUsers: counts.value.active,
        deactivatedUsers: counts.value.inactive,
      });
    },

    updateUser(caller, id, dto) {
      ensureDefined(dto, "dto");
      return guarded(caller, id, {
        name: "updateUser",
        mutate: async (user) => {
          const updated = await userRepo.update(user.id, {
            userName: dto.userName,
            firstName: dto.firstName,
            lastName: dto.lastName,
            email: dto.email,
            phoneNumber: dto.phoneNumber ?? null,
          });
          if (!updated.ok) return err(refused(updated.error));

          logger.info("User updated", { userId: user.id, actorId: caller.principal?.id });
          await audit.record({
            userId: caller.principal?.id ?? null,
            action: AuditAction.USER_UPDATED,
            resource: "user",
            resourceId: user.id,
            detail: null,
            ip: caller.ip,
          });
          return withRoles(updated.value);
        },
      });
    },

    deleteUser(caller, id) {
      return guarded<void>(caller, id, {
        name: "deleteUser",
        mutate: async (user) => {
          const removed = await userRepo.delete(user.id);
          if (!removed.ok) return err(refused(removed.error));

          const erased = await cleanup.deletePasswordHistory(user.id);
          if (!erased.ok) {
            logger.error("User deleted but password history remains", {
              userId: user.id,
              error: erased.error.message,
            });
            return err(erased.error);
          }

          logger.info("User deleted", { userId: user.id, actorId: caller.principal?.id });
          await audit.record({
            userId: caller.principal?.id ?? null,
            action: AuditAction.USER_DELETED,
            resource: "user",
            resourceId: user.id,
            detail: null,
            ip: caller.ip,
          });
          return ok(undefined);
        },
      });
    },

    activateUser(caller, id) {
      return setStatus(caller, id, AccountStatus.ACTIVE);
    },

    deactivateUser(caller, id) {
      return setStatus(caller, id, AccountStatus.INACTIVE);
    },
  };
};
