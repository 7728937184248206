import { assignRoleDto } from "../../application/dtos/role.dto.js";
import type { RoleService } from "../../application/services/role.service.js";
import { Role } from "../../core/entities/role.js";
import type { Logger } from "../../core/ports/logger.js";
import type { TokenService } from "../../core/ports/token-service.js";
import { type RequestContext, callerOf } from "../context.js";
import { requireRoles } from "../middleware/auth.js";
import { validateBody } from "../middleware/validate.js";
import { errorResponse, jsonResponse, noContentResponse, readJson } from "./response.js";

const SUPER_ADMIN_ONLY = [Role.SUPER_ADMIN] as const;

export const roleHandlers = (roleService: RoleService, tokenService: TokenService, logger: Logger) => ({
  list: async (req: Request, ctx: RequestContext): Promise<Response> => {
    const auth = await requireRoles(req, tokenService, SUPER_ADMIN_ONLY);
    if (!auth.ok) return errorResponse(auth.error, ctx.requestId);

    return jsonResponse(roleService.listRoles());
  },

  assign: async (req: Request, ctx: RequestContext, userId: string): Promise<Response> => {
    const auth = await requireRoles(req, tokenService, SUPER_ADMIN_ONLY);
    if (!auth.ok) return errorResponse(auth.error, ctx.requestId);

    const validated = validateBody(assignRoleDto, await readJson(req));
    if (!validated.ok) return errorResponse(validated.error, ctx.requestId);

    const result = await roleService.assignRole(
      callerOf(ctx, auth.value),
      userId,
      validated.value.roleName,
    );
    if (!result.ok) {
      logger.warn("assignRole failed", { requestId: ctx.requestId, reason: result.error.reason });
      return errorResponse(result.error, ctx.requestId);
    }

    return noContentResponse();
  },

  remove: async (
    req: Request,
    ctx: RequestContext,
    userId: string,
    roleName: string,
  ): Promise<Response> => {
    const auth = await requireRoles(req, tokenService, SUPER_ADMIN_ONLY);
    if (!auth.ok) return errorResponse(auth.error, ctx.requestId);

    const result = await roleService.removeRole(callerOf(ctx, auth.value), userId, roleName);
    if (!result.ok) {
      logger.warn("removeRole failed", { requestId: ctx.requestId, reason: result.error.reason });
      return errorResponse(result.error, ctx.requestId);
    }

    return noContentResponse();
  },
});
