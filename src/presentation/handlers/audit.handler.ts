import { auditQueryDto } from "../../application/dtos/audit.dto.js";
import type { AuditService } from "../../application/services/audit.service.js";
import { Role } from "../../core/entities/role.js";
import type { Logger } from "../../core/ports/logger.js";
import type { TokenService } from "../../core/ports/token-service.js";
import type { RequestContext } from "../context.js";
import { requireRoles } from "../middleware/auth.js";
import { validateBody } from "../middleware/validate.js";
import { errorResponse, extractQuery, jsonResponse, noContentResponse } from "./response.js";

const SUPER_ADMIN_ONLY = [Role.SUPER_ADMIN] as const;

export const auditHandlers = (auditService: AuditService, tokenService: TokenService, logger: Logger) => ({
  list: async (req: Request, ctx: RequestContext): Promise<Response> => {
    const auth = await requireRoles(req, tokenService, SUPER_ADMIN_ONLY);
    if (!auth.ok) return errorResponse(auth.error, ctx.requestId);

    const query = extractQuery(req.url);
    const parsed = validateBody(auditQueryDto, {
      userId: query.get("userId") ?? undefined,
      action: query.get("action") ?? undefined,
      since: query.get("since") ?? undefined,
      limit: query.get("limit") ?? undefined,
    });
    if (!parsed.ok) return errorResponse(parsed.error, ctx.requestId);

    const result = await auditService.list(parsed.value);
    if (!result.ok) return errorResponse(result.error, ctx.requestId);

    return jsonResponse(result.value);
  },

  remove: async (req: Request, ctx: RequestContext, auditId: string): Promise<Response> => {
    const auth = await requireRoles(req, tokenService, SUPER_ADMIN_ONLY);
    if (!auth.ok) return errorResponse(auth.error, ctx.requestId);

    const result = await auditService.remove(auditId);
    if (!result.ok) {
      logger.warn("Audit delete failed", { requestId: ctx.requestId, auditId });
      return errorResponse(result.error, ctx.requestId);
    }

    return noContentResponse();
  },
});
