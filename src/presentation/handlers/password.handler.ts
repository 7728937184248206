import { setPasswordDto, updatePasswordDto } from "../../application/dtos/password.dto.js";
import type { PasswordService } from "../../application/services/password.service.js";
import type { Logger } from "../../core/ports/logger.js";
import type { TokenService } from "../../core/ports/token-service.js";
import { type RequestContext, callerOf } from "../context.js";
import { ANY_ROLE, requireRoles } from "../middleware/auth.js";
import { validateBody } from "../middleware/validate.js";
import { errorResponse, noContentResponse, readJson } from "./response.js";

export const passwordHandlers = (
  passwordService: PasswordService,
  tokenService: TokenService,
  logger: Logger,
) => ({
  /** First password; anonymous, the account is identified by the path */
  set: async (req: Request, ctx: RequestContext, userId: string): Promise<Response> => {
    const validated = validateBody(setPasswordDto, await readJson(req));
    if (!validated.ok) return errorResponse(validated.error, ctx.requestId);

    const result = await passwordService.setPassword(userId, validated.value, ctx.ip);
    if (!result.ok) {
      logger.warn("setPassword failed", {
        requestId: ctx.requestId,
        userId,
        reason: result.error.reason,
      });
      return errorResponse(result.error, ctx.requestId);
    }

    return noContentResponse();
  },

  update: async (req: Request, ctx: RequestContext, userId: string): Promise<Response> => {
    const auth = await requireRoles(req, tokenService, ANY_ROLE);
    if (!auth.ok) return errorResponse(auth.error, ctx.requestId);

    const validated = validateBody(updatePasswordDto, await readJson(req));
    if (!validated.ok) return errorResponse(validated.error, ctx.requestId);

    const result = await passwordService.updatePassword(
      callerOf(ctx, auth.value),
      userId,
      validated.value,
    );
    if (!result.ok) {
      logger.warn("updatePassword failed", {
        requestId: ctx.requestId,
        userId,
        reason: result.error.reason,
      });
      return errorResponse(result.error, ctx.requestId);
    }

    return noContentResponse();
  },
});
