/**
 * Canonical application error. Every failure in the system is expressed
 * as an AppError so HTTP, logging, and audit layers have a single shape.
 */
import { ErrorMessages } from "./messages.js";

export const ErrorCode = {
  // Client errors
  BAD_REQUEST: "BAD_REQUEST",
  UNAUTHORIZED: "UNAUTHORIZED",
  FORBIDDEN: "FORBIDDEN",
  NOT_FOUND: "NOT_FOUND",
  CONFLICT: "CONFLICT",
  VALIDATION: "VALIDATION",
  // Server errors
  INTERNAL: "INTERNAL",
} as const;

export type ErrorCode = (typeof ErrorCode)[keyof typeof ErrorCode];

/** Named business outcomes, finer grained than the transport code */
export const FailureReason = {
  USER_NOT_FOUND: "USER_NOT_FOUND",
  FORBIDDEN: "FORBIDDEN",
  PASSWORD_MISMATCH: "PASSWORD_MISMATCH",
  PASSWORD_ALREADY_SET: "PASSWORD_ALREADY_SET",
  INVALID_CREDENTIALS: "INVALID_CREDENTIALS",
  CANNOT_REUSE: "CANNOT_REUSE",
  ALREADY_ACTIVATED: "ALREADY_ACTIVATED",
  NOT_ACTIVATED: "NOT_ACTIVATED",
  INACTIVE_USER: "INACTIVE_USER",
  INVALID_ROLE: "INVALID_ROLE",
  ROLE_ALREADY_HELD: "ROLE_ALREADY_HELD",
  MISSING_ROLE: "MISSING_ROLE",
  STORE_FAILURE: "STORE_FAILURE",
  AUDIT_LOG_NOT_FOUND: "AUDIT_LOG_NOT_FOUND",
} as const;

export type FailureReason = (typeof FailureReason)[keyof typeof FailureReason];

export interface AppError {
  readonly code: ErrorCode;
  readonly message: string;
  readonly reason?: FailureReason | undefined;
  /** Human-readable error list; non-empty on every business failure */
  readonly errors?: readonly string[] | undefined;
  readonly details?: Record<string, unknown> | undefined;
  readonly cause?: unknown;
}

const STATUS_MAP: Record<ErrorCode, number> = {
  BAD_REQUEST: 400,
  UNAUTHORIZED: 401,
  FORBIDDEN: 403,
  NOT_FOUND: 404,
  CONFLICT: 409,
  VALIDATION: 422,
  INTERNAL: 500,
};

export const httpStatus = (code: ErrorCode): number => STATUS_MAP[code];

/** Factory helpers */
export const appError = (
  code: ErrorCode,
  message: string,
  details?: Record<string, unknown>,
  cause?: unknown,
): AppError => {
  const error: AppError = { code, message };
  if (details !== undefined) {
    return { ...error, details, cause };
  }
  if (cause !== undefined) {
    return { ...error, cause };
  }
  return error;
};

const failure = (code: ErrorCode, reason: FailureReason, message: string): AppError => ({
  code,
  message,
  reason,
  errors: [message],
});

export const badRequest = (msg: string, details?: Record<string, unknown>): AppError =>
  appError(ErrorCode.BAD_REQUEST, msg, details);

export const unauthorized = (msg = "Unauthorized"): AppError =>
  appError(ErrorCode.UNAUTHORIZED, msg);

export const forbidden = (msg: string = ErrorMessages.FORBIDDEN): AppError =>
  failure(ErrorCode.FORBIDDEN, FailureReason.FORBIDDEN, msg);

export const notFound = (resource: string): AppError =>
  appError(ErrorCode.NOT_FOUND, `${resource} not found`);

export const conflict = (msg: string): AppError => ({
  code: ErrorCode.CONFLICT,
  message: msg,
  errors: [msg],
});

export const validation = (details: Record<string, unknown>): AppError =>
  appError(ErrorCode.VALIDATION, "Validation failed", details);

export const internal = (msg = "Internal server error", cause?: unknown): AppError =>
  appError(ErrorCode.INTERNAL, msg, undefined, cause);

// ── Business outcomes ──────────────────────────────────────────────────

export const userNotFound = (): AppError =>
  failure(ErrorCode.NOT_FOUND, FailureReason.USER_NOT_FOUND, ErrorMessages.USER_NOT_FOUND);

export const passwordMismatch = (): AppError =>
  failure(ErrorCode.BAD_REQUEST, FailureReason.PASSWORD_MISMATCH, ErrorMessages.PASSWORD_MISMATCH);

export const passwordAlreadySet = (): AppError =>
  failure(
    ErrorCode.BAD_REQUEST,
    FailureReason.PASSWORD_ALREADY_SET,
    ErrorMessages.PASSWORD_ALREADY_SET,
  );

/** 400 on password rotation, 401 on login */
export const invalidCredentials = (code: ErrorCode = ErrorCode.BAD_REQUEST): AppError =>
  failure(code, FailureReason.INVALID_CREDENTIALS, ErrorMessages.INVALID_CREDENTIALS);

export const cannotReuse = (): AppError =>
  failure(ErrorCode.BAD_REQUEST, FailureReason.CANNOT_REUSE, ErrorMessages.CANNOT_REUSE);

export const alreadyActivated = (): AppError =>
  failure(ErrorCode.BAD_REQUEST, FailureReason.ALREADY_ACTIVATED, ErrorMessages.ALREADY_ACTIVATED);

/** 400 on deactivation, 403 on login */
export const notActivated = (code: ErrorCode = ErrorCode.BAD_REQUEST): AppError =>
  failure(code, FailureReason.NOT_ACTIVATED, ErrorMessages.NOT_ACTIVATED);

export const inactiveUser = (): AppError =>
  failure(ErrorCode.BAD_REQUEST, FailureReason.INACTIVE_USER, ErrorMessages.INACTIVE_USER);

export const invalidRole = (): AppError =>
  failure(ErrorCode.BAD_REQUEST, FailureReason.INVALID_ROLE, ErrorMessages.INVALID_ROLE);

export const roleAlreadyHeld = (): AppError =>
  failure(ErrorCode.BAD_REQUEST, FailureReason.ROLE_ALREADY_HELD, ErrorMessages.ROLE_ALREADY_HELD);

export const missingRole = (): AppError =>
  failure(ErrorCode.BAD_REQUEST, FailureReason.MISSING_ROLE, ErrorMessages.MISSING_ROLE);

export const auditLogNotFound = (): AppError =>
  failure(
    ErrorCode.NOT_FOUND,
    FailureReason.AUDIT_LOG_NOT_FOUND,
    ErrorMessages.AUDIT_LOG_NOT_FOUND,
  );

/**
 * A credential or user-store write was refused. The store's own
 * descriptions are forwarded unchanged.
 */
export const storeFailure = (errors: readonly string[], cause?: unknown): AppError => {
  const list = errors.length > 0 ? [...errors] : ["The operation could not be completed."];
  const error: AppError = {
    code: ErrorCode.BAD_REQUEST,
    message: list.join(" "),
    reason: FailureReason.STORE_FAILURE,
    errors: list,
  };
  return cause === undefined ? error : { ...error, cause };
};

/** Lift any store-side AppError into a STORE_FAILURE carrying its texts */
export const asStoreFailure = (error: AppError): AppError =>
  error.reason === FailureReason.STORE_FAILURE
    ? error
    : storeFailure(error.errors ?? [error.message], error.cause);
