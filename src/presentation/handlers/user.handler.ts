import { createUserDto, listUsersDto, updateUserDto } from "../../application/dtos/user.dto.js";
import type { UserService } from "../../application/services/user.service.js";
import { Role } from "../../core/entities/role.js";
import type { AppError } from "../../core/errors/app-error.js";
import type { Logger } from "../../core/ports/logger.js";
import type { TokenService } from "../../core/ports/token-service.js";
import { type RequestContext, callerOf } from "../context.js";
import { ANY_ROLE, requireRoles } from "../middleware/auth.js";
import { validateBody } from "../middleware/validate.js";
import {
  createdResponse,
  errorResponse,
  extractQuery,
  jsonResponse,
  noContentResponse,
  readJson,
} from "./response.js";

const ADMINS = [Role.ADMIN, Role.SUPER_ADMIN] as const;

export const userHandlers = (
  userService: UserService,
  tokenService: TokenService,
  logger: Logger,
) => {
  const fail = (op: string, ctx: RequestContext, error: AppError): Response => {
    logger.warn(`${op} failed`, {
      requestId: ctx.requestId,
      code: error.code,
      reason: error.reason,
    });
    return errorResponse(error, ctx.requestId);
  };

  return {
    create: async (req: Request, ctx: RequestContext): Promise<Response> => {
      const validated = validateBody(createUserDto, await readJson(req));
      if (!validated.ok) return fail("createUser", ctx, validated.error);

      const result = await userService.createUser(validated.value, ctx.ip);
      if (!result.ok) return fail("createUser", ctx, result.error);

      return createdResponse(result.value);
    },

    list: async (req: Request, ctx: RequestContext): Promise<Response> => {
      const auth = await requireRoles(req, tokenService, ADMINS);
      if (!auth.ok) return fail("listUsers", ctx, auth.error);

      const query = extractQuery(req.url);
      const parsed = validateBody(listUsersDto, {
        cursor: query.get("cursor") ?? undefined,
        limit: query.get("limit") ?? undefined,
        accountStatus: query.get("accountStatus") ?? undefined,
      });
      if (!parsed.ok) return fail("listUsers", ctx, parsed.error);

      const result = await userService.listUsers(parsed.value);
      if (!result.ok) return fail("listUsers", ctx, result.error);

      return jsonResponse(result.value);
    },

    stateMetrics: async (req: Request, ctx: RequestContext): Promise<Response> => {
      const auth = await requireRoles(req, tokenService, ADMINS);
      if (!auth.ok) return fail("stateMetrics", ctx, auth.error);

      const result = await userService.getStateMetrics();
      if (!result.ok) return fail("stateMetrics", ctx, result.error);

      return jsonResponse(result.value);
    },

    get: async (req: Request, ctx: RequestContext, userId: string): Promise<Response> => {
      const auth = await requireRoles(req, tokenService, ANY_ROLE);
      if (!auth.ok) return fail("getUser", ctx, auth.error);

      const result = await userService.getUser(callerOf(ctx, auth.value), userId);
      if (!result.ok) return fail("getUser", ctx, result.error);

      return jsonResponse(result.value);
    },

    update: async (req: Request, ctx: RequestContext, userId: string): Promise<Response> => {
      const auth = await requireRoles(req, tokenService, ANY_ROLE);
      if (!auth.ok) return fail("updateUser", ctx, auth.error);

      const validated = validateBody(updateUserDto, await readJson(req));
      if (!validated.ok) return fail("updateUser", ctx, validated.error);

      const result = await userService.updateUser(callerOf(ctx, auth.value), userId, validated.value);
      if (!result.ok) return fail("updateUser", ctx, result.error);

      return noContentResponse();
    },

    remove: async (req: Request, ctx: RequestContext, userId: string): Promise<Response> => {
      const auth = await requireRoles(req, tokenService, ANY_ROLE);
      if (!auth.ok) return fail("deleteUser", ctx, auth.error);

      const result = await userService.deleteUser(callerOf(ctx, auth.value), userId);
      if (!result.ok) return fail("deleteUser", ctx, result.error);

      return noContentResponse();
    },

    activate: async (req: Request, ctx: RequestContext, userId: string): Promise<Response> => {
      const auth = await requireRoles(req, tokenService, ADMINS);
      if (!auth.ok) return fail("activateUser", ctx, auth.error);

      const result = await userService.activateUser(callerOf(ctx, auth.value), userId);
      if (!result.ok) return fail("activateUser", ctx, result.error);

      return noContentResponse();
    },

    deactivate: async (req: Request, ctx: RequestContext, userId: string): Promise<Response> => {
      const auth = await requireRoles(req, tokenService, ADMINS);
      if (!auth.ok) return fail("deactivateUser", ctx, auth.error);

      const result = await userService.deactivateUser(callerOf(ctx, auth.value), userId);
      if (!result.ok) return fail("deactivateUser", ctx, result.error);

      return noContentResponse();
    },
  };
};
