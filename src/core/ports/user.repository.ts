import type { AccountStatus, User } from "../entities/user.entity.js";
import type { AppError } from "../errors/app-error.js";
import type { UserId } from "../types/brand.js";
import type { CursorParams, PaginatedResult } from "../types/pagination.js";
import type { Result } from "../types/result.js";

/**
 * Port: User Repository
 * Owns user rows and the role-membership relation.
 * `findById` / `findByUserName` answer NOT_FOUND (reason USER_NOT_FOUND)
 * when no row matches.
 */
export interface UserRepository {
  findById(id: UserId): Promise<Result<User, AppError>>;
  findByUserName(userName: string): Promise<Result<User, AppError>>;
  findByEmail(email: string): Promise<Result<User, AppError>>;
  create(data: CreateUserData): Promise<Result<User, AppError>>;
  update(id: UserId, data: UpdateUserData): Promise<Result<User, AppError>>;
  delete(id: UserId): Promise<Result<void, AppError>>;
  list(options: UserListOptions): Promise<Result<PaginatedResult<User>, AppError>>;
  countByStatus(): Promise<Result<UserStatusCounts, AppError>>;
  getRoles(id: UserId): Promise<Result<readonly string[], AppError>>;
  addRole(id: UserId, role: string): Promise<Result<void, AppError>>;
  removeRole(id: UserId, role: string): Promise<Result<void, AppError>>;
}

export interface CreateUserData {
  readonly userName: string;
  readonly firstName: string;
  readonly lastName: string;
  readonly email: string;
  readonly phoneNumber?: string | null | undefined;
  readonly passwordHash?: string | null | undefined;
  readonly accountStatus?: AccountStatus | undefined;
}

export interface UpdateUserData {
  readonly userName?: string | undefined;
  readonly firstName?: string | undefined;
  readonly lastName?: string | undefined;
  readonly email?: string | undefined;
  readonly phoneNumber?: string | null | undefined;
  readonly passwordHash?: string | undefined;
  readonly accountStatus?: AccountStatus | undefined;
}

export interface UserListOptions extends CursorParams {
  readonly accountStatus?: AccountStatus | undefined;
}

export interface UserStatusCounts {
  readonly total: number;
  readonly active: number;
  readonly inactive: number;
}
