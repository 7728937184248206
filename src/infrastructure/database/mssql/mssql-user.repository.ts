/**
 * SQL Server user repository on the `mssql` driver.
 * Same UserRepository port as the SQLite adapter; every query is
 * parameterised.
 */

import type { ConnectionPool } from "mssql";
import { AccountStatus, type User, isAccountStatus } from "../../../core/entities/user.entity.js";
import { type AppError, conflict, internal, userNotFound } from "../../../core/errors/app-error.js";
import { ErrorMessages } from "../../../core/errors/messages.js";
import type {
  CreateUserData,
  UpdateUserData,
  UserListOptions,
  UserRepository,
} from "../../../core/ports/user.repository.js";
import { type UserId, toTimestamp, toUserId } from "../../../core/types/brand.js";
import { decodeCursor, encodeCursor } from "../../../core/types/pagination.js";
import { type Result, err, ok } from "../../../core/types/result.js";
import { generateId } from "../../../shared/utils/id.js";
import { isUniqueViolation, toNumber } from "./shared.js";

interface UserRow {
  id: string;
  user_name: string;
  first_name: string;
  last_name: string;
  email: string;
  phone_number: string | null;
  password_hash: string | null;
  account_status: number;
  created_at: number | string;
  updated_at: number | string;
}

const rowToUser = (row: UserRow): User => ({
  id: toUserId(row.id),
  userName: row.user_name,
  firstName: row.first_name,
  lastName: row.last_name,
  email: row.email,
  phoneNumber: row.phone_number,
  passwordHash: row.password_hash,
  accountStatus: isAccountStatus(row.account_status) ? row.account_status : AccountStatus.INACTIVE,
  createdAt: toTimestamp(toNumber(row.created_at)),
  updatedAt: toTimestamp(toNumber(row.updated_at)),
});

const uniqueConflict = (e: unknown): AppError =>
  conflict(
    e instanceof Error && e.message.includes("email")
      ? ErrorMessages.EMAIL_TAKEN
      : ErrorMessages.USER_NAME_TAKEN,
  );

/** UpdateUserData field → column */
const UPDATE_FIELD_MAP: ReadonlyArray<[keyof UpdateUserData, string]> = [
  ["userName", "user_name"],
  ["firstName", "first_name"],
  ["lastName", "last_name"],
  ["email", "email"],
  ["phoneNumber", "phone_number"],
  ["passwordHash", "password_hash"],
  ["accountStatus", "account_status"],
];

export const createMssqlUserRepository = (pool: ConnectionPool): UserRepository => {
  const selectOne = async (column: "id" | "user_name" | "email", value: string) => {
    const result = await pool
      .request()
      .input("value", value)
      .query<UserRow>(`SELECT * FROM users WHERE ${column} = @value`);
    const row = result.recordset[0];
    return row ? ok(rowToUser(row)) : err(userNotFound());
  };

  const exists = async (id: UserId): Promise<boolean> => {
    const result = await pool
      .request()
      .input("id", id)
      .query<{ id: string }>("SELECT id FROM users WHERE id = @id");
    return result.recordset.length > 0;
  };

  return {
    async findById(id: UserId): Promise<Result<User, AppError>> {
      try {
        return await selectOne("id", id);
      } catch (e: unknown) {
        return err(internal("Database error", e));
      }
    },

    async findByUserName(userName: string): Promise<Result<User, AppError>> {
      try {
        return await selectOne("user_name", userName);
      } catch (e: unknown) {
        return err(internal("Database error", e));
      }
    },

    async findByEmail(email: string): Promise<Result<User, AppError>> {
      try {
        return await selectOne("email", email);
      } catch (e: unknown) {
        return err(internal("Database error", e));
      }
    },

    async create(data: CreateUserData): Promise<Result<User, AppError>> {
      const now = Date.now();
      const user: User = {
        id: toUserId(generateId()),
        userName: data.userName,
        firstName: data.firstName,
        lastName: data.lastName,
        email: data.email,
        phoneNumber: data.phoneNumber ?? null,
        passwordHash: data.passwordHash ?? null,
        accountStatus: data.accountStatus ?? AccountStatus.INACTIVE,
        createdAt: toTimestamp(now),
        updatedAt: toTimestamp(now),
      };

      try {
        await pool
          .request()
          .input("id", user.id)
          .input("userName", user.userName)
          .input("firstName", user.firstName)
          .input("lastName", user.lastName)
          .input("email", user.email)
          .input("phoneNumber", user.phoneNumber)
          .input("passwordHash", user.passwordHash)
          .input("accountStatus", user.accountStatus)
          .input("now", now)
          .query(`
            INSERT INTO users (id, user_name, first_name, last_name, email, phone_number, password_hash, account_status, created_at, updated_at)
            VALUES (@id, @userName, @firstName, @lastName, @email, @phoneNumber, @passwordHash, @accountStatus, @now, @now)
          `);
        return ok(user);
      } catch (e: unknown) {
        if (isUniqueViolation(e)) return err(uniqueConflict(e));
        return err(internal("Database error", e));
      }
    },

    async update(id: UserId, data: UpdateUserData): Promise<Result<User, AppError>> {
      try {
        const sets: string[] = [];
        const req = pool.request();
        let paramIdx = 0;

        for (const [field, column] of UPDATE_FIELD_MAP) {
          const value = data[field];
          if (value !== undefined) {
            const paramName = `p${paramIdx++}`;
            sets.push(`${column} = @${paramName}`);
            req.input(paramName, value);
          }
        }

        sets.push("updated_at = @updatedAt");
        req.input("updatedAt", Date.now());
        req.input("updateId", id);

        const result = await req.query(`UPDATE users SET ${sets.join(", ")} WHERE id = @updateId`);
        if ((result.rowsAffected[0] ?? 0) === 0) return err(userNotFound());

        return await selectOne("id", id);
      } catch (e: unknown) {
        if (isUniqueViolation(e)) return err(uniqueConflict(e));
        return err(internal("Database error", e));
      }
    },

    async delete(id: UserId): Promise<Result<void, AppError>> {
      try {
        const result = await pool.request().input("id", id).query("DELETE FROM users WHERE id = @id");
        return (result.rowsAffected[0] ?? 0) === 0 ? err(userNotFound()) : ok(undefined);
      } catch (e: unknown) {
        return err(internal("Database error", e));
      }
    },

    async list(options: UserListOptions) {
      try {
        const conditions: string[] = [];
        const req = pool.request();

        if (options.cursor !== undefined) {
          const [ts, cursorId] = decodeCursor(options.cursor)?.split("|") ?? [];
          if (ts !== undefined && cursorId !== undefined && !Number.isNaN(Number(ts))) {
            conditions.push("(created_at < @cursorTs OR (created_at = @cursorTs AND id < @cursorId))");
            req.input("cursorTs", Number(ts));
            req.input("cursorId", cursorId);
          }
        }

        if (options.accountStatus !== undefined) {
          conditions.push("account_status = @status");
          req.input("status", options.accountStatus);
        }

        const where = conditions.length > 0 ? `WHERE ${conditions.join(" AND ")}` : "";
        const limit = Math.min(options.limit, 100);
        req.input("take", limit + 1);

        const result = await req.query<UserRow>(
          `SELECT TOP (@take) * FROM users ${where} ORDER BY created_at DESC, id DESC`,
        );
        const rows = result.recordset;

        const hasMore = rows.length > limit;
        const items = (hasMore ? rows.slice(0, limit) : rows).map(rowToUser);
        const lastItem = items[items.length - 1];
        const nextCursor =
          hasMore && lastItem !== undefined
            ? encodeCursor(`${lastItem.createdAt}|${lastItem.id}`)
            : null;

        return ok({ items, nextCursor, hasMore });
      } catch (e: unknown) {
        return err(internal("Database error", e));
      }
    },

    async countByStatus() {
      try {
        const result = await pool.request().query<{ total: number; active: number | null }>(
          "SELECT COUNT(*) AS total, SUM(CASE WHEN account_status = 1 THEN 1 ELSE 0 END) AS active FROM users",
        );
        const row = result.recordset[0];
        const total = Number(row?.total ?? 0);
        const active = Number(row?.active ?? 0);
        return ok({ total, active, inactive: total - active });
      } catch (e: unknown) {
        return err(internal("Database error", e));
      }
    },

    async getRoles(id: UserId): Promise<Result<readonly string[], AppError>> {
      try {
        if (!(await exists(id))) return err(userNotFound());
        const result = await pool
          .request()
          .input("id", id)
          .query<{ role: string }>("SELECT role FROM user_roles WHERE user_id = @id ORDER BY role");
        return ok(result.recordset.map((r) => r.role));
      } catch (e: unknown) {
        return err(internal("Database error", e));
      }
    },

    async addRole(id: UserId, role: string): Promise<Result<void, AppError>> {
      try {
        if (!(await exists(id))) return err(userNotFound());
        await pool.request().input("id", id).input("role", role).query(`
          IF NOT EXISTS (SELECT 1 FROM user_roles WHERE user_id = @id AND role = @role)
          INSERT INTO user_roles (user_id, role) VALUES (@id, @role)
        `);
        return ok(undefined);
      } catch (e: unknown) {
        return err(internal("Database error", e));
      }
    },

    async removeRole(id: UserId, role: string): Promise<Result<void, AppError>> {
      try {
        if (!(await exists(id))) return err(userNotFound());
        await pool
          .request()
          .input("id", id)
          .input("role", role)
          .query("DELETE FROM user_roles WHERE user_id = @id AND role = @role");
        return ok(undefined);
      } catch (e: unknown) {
        return err(internal("Database error", e));
      }
    },
  };
};
