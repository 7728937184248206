import { AccountStatus, type User } from "../../core/entities/user.entity.js";
import { type AppError, conflict, userNotFound } from "../../core/errors/app-error.js";
import { ErrorMessages } from "../../core/errors/messages.js";
import type {
  CreateUserData,
  UpdateUserData,
  UserListOptions,
  UserRepository,
} from "../../core/ports/user.repository.js";
import { type UserId, toTimestamp, toUserId } from "../../core/types/brand.js";
import { decodeCursor, encodeCursor } from "../../core/types/pagination.js";
import { type Result, err, ok } from "../../core/types/result.js";
import { generateId } from "../../shared/utils/id.js";

const sameText = (a: string, b: string): boolean => a.toLowerCase() === b.toLowerCase();

/** Newest first; id breaks ties between rows created in the same millisecond */
const byNewest = (a: User, b: User): number =>
  b.createdAt - a.createdAt || (a.id < b.id ? 1 : a.id > b.id ? -1 : 0);

const cursorOf = (user: User): string => encodeCursor(`${user.createdAt}|${user.id}`);

const isAfterCursor = (user: User, cursor: string): boolean => {
  const decoded = decodeCursor(cursor);
  if (decoded === null) return true;
  const [ts, id] = decoded.split("|");
  const createdAt = Number(ts);
  if (Number.isNaN(createdAt) || id === undefined) return true;
  return user.createdAt < createdAt || (user.createdAt === createdAt && user.id < id);
};

/**
 * In-memory user repository for tests and throwaway runs.
 * Same contract as the SQL adapters, including case-insensitive
 * uniqueness of user name and email.
 */
export const createInMemoryUserRepository = (): UserRepository => {
  const store = new Map<string, User>();
  const roles = new Map<string, Set<string>>();

  const findConflict = (
    userName: string | undefined,
    email: string | undefined,
    exceptId?: string,
  ): AppError | null => {
    for (const user of store.values()) {
      if (user.id === exceptId) continue;
      if (userName !== undefined && sameText(user.userName, userName)) {
        return conflict(ErrorMessages.USER_NAME_TAKEN);
      }
      if (email !== undefined && sameText(user.email, email)) {
        return conflict(ErrorMessages.EMAIL_TAKEN);
      }
    }
    return null;
  };

  return {
    async findById(id: UserId): Promise<Result<User, AppError>> {
      const user = store.get(id);
      return user ? ok(user) : err(userNotFound());
    },

    async findByUserName(userName: string): Promise<Result<User, AppError>> {
      for (const user of store.values()) {
        if (sameText(user.userName, userName)) return ok(user);
      }
      return err(userNotFound());
    },

    async findByEmail(email: string): Promise<Result<User, AppError>> {
      for (const user of store.values()) {
        if (sameText(user.email, email)) return ok(user);
      }
      return err(userNotFound());
    },

    async create(data: CreateUserData): Promise<Result<User, AppError>> {
      const clash = findConflict(data.userName, data.email);
      if (clash) return err(clash);

      const now = toTimestamp(Date.now());
      const user: User = {
        id: toUserId(generateId()),
        userName: data.userName,
        firstName: data.firstName,
        lastName: data.lastName,
        email: data.email,
        phoneNumber: data.phoneNumber ?? null,
        passwordHash: data.passwordHash ?? null,
        accountStatus: data.accountStatus ?? AccountStatus.INACTIVE,
        createdAt: now,
        updatedAt: now,
      };

      store.set(user.id, user);
      return ok(user);
    },

    async update(id: UserId, data: UpdateUserData): Promise<Result<User, AppError>> {
      const existing = store.get(id);
      if (!existing) return err(userNotFound());

      const clash = findConflict(data.userName, data.email, id);
      if (clash) return err(clash);

      const updated: User = {
        ...existing,
        ...(data.userName !== undefined ? { userName: data.userName } : {}),
        ...(data.firstName !== undefined ? { firstName: data.firstName } : {}),
        ...(data.lastName !== undefined ? { lastName: data.lastName } : {}),
        ...(data.email !== undefined ? { email: data.email } : {}),
        ...(data.phoneNumber !== undefined ? { phoneNumber: data.phoneNumber } : {}),
        ...(data.passwordHash !== undefined ? { passwordHash: data.passwordHash } : {}),
        ...(data.accountStatus !== undefined ? { accountStatus: data.accountStatus } : {}),
        updatedAt: toTimestamp(Date.now()),
      };

      store.set(id, updated);
      return ok(updated);
    },

    async delete(id: UserId): Promise<Result<void, AppError>> {
      if (!store.has(id)) return err(userNotFound());
      store.delete(id);
      roles.delete(id);
      return ok(undefined);
    },

    async list(options: UserListOptions) {
      let users = Array.from(store.values()).sort(byNewest);

      if (options.accountStatus !== undefined) {
        users = users.filter((u) => u.accountStatus === options.accountStatus);
      }

      const { cursor } = options;
      if (cursor !== undefined) {
        users = users.filter((u) => isAfterCursor(u, cursor));
      }

      const limit = Math.min(options.limit, 100);
      const hasMore = users.length > limit;
      const items = users.slice(0, limit);
      const lastItem = items[items.length - 1];
      const nextCursor = hasMore && lastItem !== undefined ? cursorOf(lastItem) : null;

      return ok({ items, nextCursor, hasMore });
    },

    async countByStatus() {
      let active = 0;
      for (const user of store.values()) {
        if (user.accountStatus === AccountStatus.ACTIVE) active++;
      }
      return ok({ total: store.size, active, inactive: store.size - active });
    },

    async getRoles(id: UserId): Promise<Result<readonly string[], AppError>> {
      if (!store.has(id)) return err(userNotFound());
      return ok([...(roles.get(id) ?? [])].sort());
    },

    async addRole(id: UserId, role: string): Promise<Result<void, AppError>> {
      if (!store.has(id)) return err(userNotFound());
      const held = roles.get(id) ?? new Set<string>();
      held.add(role);
      roles.set(id, held);
      return ok(undefined);
    },

    async removeRole(id: UserId, role: string): Promise<Result<void, AppError>> {
      if (!store.has(id)) return err(userNotFound());
      roles.get(id)?.delete(role);
      return ok(undefined);
    },
  };
};
