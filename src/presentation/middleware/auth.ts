import type { Principal } from "../../core/entities/principal.js";
import { ALL_ROLES, type Role } from "../../core/entities/role.js";
import type { AppError } from "../../core/errors/app-error.js";
import { forbidden, unauthorized } from "../../core/errors/app-error.js";
import type { TokenService } from "../../core/ports/token-service.js";
import { type Result, err, ok } from "../../core/types/result.js";

/** Any recognised role; the permission evaluator decides the rest */
export const ANY_ROLE: readonly Role[] = ALL_ROLES;

/**
 * Extracts and verifies the Bearer token from the Authorization header.
 */
export const authenticate = async (
  req: Request,
  tokenService: TokenService,
): Promise<Result<Principal, AppError>> => {
  const header = req.headers.get("authorization");
  if (!header) return err(unauthorized("Missing Authorization header"));

  const parts = header.split(" ");
  if (parts.length !== 2 || parts[0] !== "Bearer") {
    return err(unauthorized("Invalid Authorization header format"));
  }

  const token = parts[1];
  if (!token) return err(unauthorized("Missing token"));

  return tokenService.verify(token);
};

/**
 * Role guard, called after authentication. The principal passes when it
 * carries at least one of the allowed roles.
 */
export const authorise = (
  principal: Principal,
  allowedRoles: readonly Role[],
): Result<Principal, AppError> => {
  const permitted = principal.roles.some((r) => allowedRoles.some((allowed) => allowed === r));
  if (!permitted) {
    return err(forbidden("Insufficient permissions"));
  }
  return ok(principal);
};

/** authenticate + authorise */
export const requireRoles = async (
  req: Request,
  tokenService: TokenService,
  allowedRoles: readonly Role[],
): Promise<Result<Principal, AppError>> => {
  const authResult = await authenticate(req, tokenService);
  if (!authResult.ok) return authResult;
  return authorise(authResult.value, allowedRoles);
};
