import type { AppError } from "../errors/app-error.js";
import type { UserId } from "../types/brand.js";
import type { Result } from "../types/result.js";

/**
 * Port: Password History Store
 * Append-only per-user ledger of past hashes. `id` is assigned on insert
 * and increases monotonically, so it gives a total insertion order.
 */
export interface PasswordHistoryEntry {
  readonly id: number;
  readonly userId: UserId;
  readonly passwordHash: string;
  readonly createdAt: number;
}

export interface PasswordHistoryStore {
  add(userId: UserId, passwordHash: string, createdAt: number): Promise<Result<PasswordHistoryEntry, AppError>>;
  /** Oldest first, ordered by id */
  listByUser(userId: UserId): Promise<Result<readonly PasswordHistoryEntry[], AppError>>;
  deleteByIds(ids: readonly number[]): Promise<Result<number, AppError>>;
  deleteByUser(userId: UserId): Promise<Result<number, AppError>>;
}
