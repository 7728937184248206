import { AccountStatus, type User, isAccountStatus } from "../../core/entities/user.entity.js";
import { type AppError, conflict, internal, userNotFound } from "../../core/errors/app-error.js";
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
import { type SqliteDatabase, isUniqueViolation } from "./sqlite.js";

/**
 * SQLite user repository (better-sqlite3). Swaps cleanly for the
 * in-memory adapter.
 */

interface UserRow {
  id: string;
  user_name: string;
  first_name: string;
  last_name: string;
  email: string;
  phone_number: string | null;
  password_hash: string | null;
  account_status: number;
  created_at: number;
  updated_at: number;
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
  createdAt: toTimestamp(row.created_at),
  updatedAt: toTimestamp(row.updated_at),
});

/** Build SET clause entries from partial update data */
const buildUpdateFields = (data: UpdateUserData, now: number): [string, unknown][] => {
  const fields: [string, unknown][] = [];
  if (data.userName !== undefined) fields.push(["user_name = ?", data.userName]);
  if (data.firstName !== undefined) fields.push(["first_name = ?", data.firstName]);
  if (data.lastName !== undefined) fields.push(["last_name = ?", data.lastName]);
  if (data.email !== undefined) fields.push(["email = ?", data.email]);
  if (data.phoneNumber !== undefined) fields.push(["phone_number = ?", data.phoneNumber]);
  if (data.passwordHash !== undefined) fields.push(["password_hash = ?", data.passwordHash]);
  if (data.accountStatus !== undefined) fields.push(["account_status = ?", data.accountStatus]);
  fields.push(["updated_at = ?", now]);
  return fields;
};

const uniqueConflict = (e: unknown): AppError =>
  conflict(
    e instanceof Error && e.message.includes("email")
      ? ErrorMessages.EMAIL_TAKEN
      : ErrorMessages.USER_NAME_TAKEN,
  );

export const createSqliteUserRepository = (db: SqliteDatabase): UserRepository => {
  const findByIdStmt = db.prepare<[string], UserRow>("SELECT * FROM users WHERE id = ?");
  const findByUserNameStmt = db.prepare<[string], UserRow>(
    "SELECT * FROM users WHERE user_name = ?",
  );
  const findByEmailStmt = db.prepare<[string], UserRow>("SELECT * FROM users WHERE email = ?");
  const insertStmt = db.prepare(
    `INSERT INTO users (id, user_name, first_name, last_name, email, phone_number, password_hash, account_status, created_at, updated_at)
     VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
  );
  const deleteStmt = db.prepare("DELETE FROM users WHERE id = ?");
  const countStmt = db.prepare<[], { total: number; active: number | null }>(
    "SELECT COUNT(*) AS total, SUM(CASE WHEN account_status = 1 THEN 1 ELSE 0 END) AS active FROM users",
  );
  const rolesStmt = db.prepare<[string], { role: string }>(
    "SELECT role FROM user_roles WHERE user_id = ? ORDER BY role",
  );
  const addRoleStmt = db.prepare("INSERT OR IGNORE INTO user_roles (user_id, role) VALUES (?, ?)");
  const removeRoleStmt = db.prepare("DELETE FROM user_roles WHERE user_id = ? AND role = ?");

  const lookup = (row: UserRow | undefined): Result<User, AppError> =>
    row ? ok(rowToUser(row)) : err(userNotFound());

  return {
    async findById(id: UserId): Promise<Result<User, AppError>> {
      try {
        return lookup(findByIdStmt.get(id));
      } catch (e: unknown) {
        return err(internal("Database error", e));
      }
    },

    async findByUserName(userName: string): Promise<Result<User, AppError>> {
      try {
        return lookup(findByUserNameStmt.get(userName));
      } catch (e: unknown) {
        return err(internal("Database error", e));
      }
    },

    async findByEmail(email: string): Promise<Result<User, AppError>> {
      try {
        return lookup(findByEmailStmt.get(email));
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
        insertStmt.run(
          user.id,
          user.userName,
          user.firstName,
          user.lastName,
          user.email,
          user.phoneNumber,
          user.passwordHash,
          user.accountStatus,
          now,
          now,
        );
        return ok(user);
      } catch (e: unknown) {
        if (isUniqueViolation(e)) return err(uniqueConflict(e));
        return err(internal("Database error", e));
      }
    },

    async update(id: UserId, data: UpdateUserData): Promise<Result<User, AppError>> {
      try {
        const fieldMap = buildUpdateFields(data, Date.now());
        const sql = `UPDATE users SET ${fieldMap.map(([f]) => f).join(", ")} WHERE id = ?`;
        const info = db.prepare<unknown[]>(sql).run(...fieldMap.map(([, v]) => v), id);
        if (info.changes === 0) return err(userNotFound());

        return lookup(findByIdStmt.get(id));
      } catch (e: unknown) {
        if (isUniqueViolation(e)) return err(uniqueConflict(e));
        return err(internal("Database error", e));
      }
    },

    async delete(id: UserId): Promise<Result<void, AppError>> {
      try {
        const info = deleteStmt.run(id);
        return info.changes === 0 ? err(userNotFound()) : ok(undefined);
      } catch (e: unknown) {
        return err(internal("Database error", e));
      }
    },

    async list(options: UserListOptions) {
      try {
        const conditions: string[] = [];
        const params: unknown[] = [];

        // cursor encodes "created_at|id" of the last row returned
        if (options.cursor !== undefined) {
          const decoded = decodeCursor(options.cursor);
          const [ts, id] = decoded?.split("|") ?? [];
          if (ts !== undefined && id !== undefined && !Number.isNaN(Number(ts))) {
            conditions.push("(created_at < ? OR (created_at = ? AND id < ?))");
            params.push(Number(ts), Number(ts), id);
          }
        }

        if (options.accountStatus !== undefined) {
          conditions.push("account_status = ?");
          params.push(options.accountStatus);
        }

        const where = conditions.length > 0 ? `WHERE ${conditions.join(" AND ")}` : "";
        const limit = Math.min(options.limit, 100);

        // one extra row tells us whether there is a next page
        const sql = `SELECT * FROM users ${where} ORDER BY created_at DESC, id DESC LIMIT ?`;
        params.push(limit + 1);

        const rows = db.prepare<unknown[], UserRow>(sql).all(...params);

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
        const row = countStmt.get();
        const total = row?.total ?? 0;
        const active = row?.active ?? 0;
        return ok({ total, active, inactive: total - active });
      } catch (e: unknown) {
        return err(internal("Database error", e));
      }
    },

    async getRoles(id: UserId): Promise<Result<readonly string[], AppError>> {
      try {
        if (!findByIdStmt.get(id)) return err(userNotFound());
        return ok(rolesStmt.all(id).map((r) => r.role));
      } catch (e: unknown) {
        return err(internal("Database error", e));
      }
    },

    async addRole(id: UserId, role: string): Promise<Result<void, AppError>> {
      try {
        if (!findByIdStmt.get(id)) return err(userNotFound());
        addRoleStmt.run(id, role);
        return ok(undefined);
      } catch (e: unknown) {
        return err(internal("Database error", e));
      }
    },

    async removeRole(id: UserId, role: string): Promise<Result<void, AppError>> {
      try {
        if (!findByIdStmt.get(id)) return err(userNotFound());
        removeRoleStmt.run(id, role);
        return ok(undefined);
      } catch (e: unknown) {
        return err(internal("Database error", e));
      }
    },
  };
};
