import type { AppError } from "../errors/app-error.js";
import type { Result } from "../types/result.js";

/**
 * Port: Audit Log. Append-only ledger of significant events.
 * Records who did what, to which resource, when, and from where.
 */

export interface AuditEntry {
  readonly id: string;
  readonly userId: string | null;
  readonly action: AuditAction;
  readonly resource: string;
  readonly resourceId: string | null;
  readonly detail: string | null;
  readonly ip: string;
  readonly timestamp: number;
}

export const AuditAction = {
  USER_CREATED: "USER_CREATED",
  USER_UPDATED: "USER_UPDATED",
  USER_DELETED: "USER_DELETED",
  USER_ACTIVATED: "USER_ACTIVATED",
  USER_DEACTIVATED: "USER_DEACTIVATED",
  USER_LOGGED_IN: "USER_LOGGED_IN",
  USER_LOGIN_FAILED: "USER_LOGIN_FAILED",
  PASSWORD_SET: "PASSWORD_SET",
  PASSWORD_UPDATED: "PASSWORD_UPDATED",
  ROLE_ASSIGNED: "ROLE_ASSIGNED",
  ROLE_REMOVED: "ROLE_REMOVED",
  AUTHORIZATION_DENIED: "AUTHORIZATION_DENIED",
} as const;

export type AuditAction = (typeof AuditAction)[keyof typeof AuditAction];

export const isAuditAction = (value: string): value is AuditAction =>
  Object.values<string>(AuditAction).includes(value);

export type NewAuditEntry = Omit<AuditEntry, "id" | "timestamp">;

export interface AuditLog {
  append(entry: NewAuditEntry): Promise<Result<AuditEntry, AppError>>;
  query(options: AuditQueryOptions): Promise<Result<readonly AuditEntry[], AppError>>;
  /** false when no entry has the id */
  delete(id: string): Promise<Result<boolean, AppError>>;
}

export interface AuditQueryOptions {
  readonly userId?: string | undefined;
  readonly action?: AuditAction | undefined;
  readonly limit?: number | undefined;
  readonly since?: number | undefined;
}
