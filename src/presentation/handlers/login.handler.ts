import { loginDto } from "../../application/dtos/login.dto.js";
import type { LoginService } from "../../application/services/login.service.js";
import type { Logger } from "../../core/ports/logger.js";
import type { RequestContext } from "../context.js";
import { validateBody } from "../middleware/validate.js";
import { errorResponse, jsonResponse, readJson } from "./response.js";

export const loginHandlers = (loginService: LoginService, logger: Logger) => ({
  issueToken: async (req: Request, ctx: RequestContext): Promise<Response> => {
    const validated = validateBody(loginDto, await readJson(req));
    if (!validated.ok) {
      logger.warn("Login validation failed", { requestId: ctx.requestId });
      return errorResponse(validated.error, ctx.requestId);
    }

    const result = await loginService.login(validated.value, ctx.ip);
    if (!result.ok) return errorResponse(result.error, ctx.requestId);

    return jsonResponse({ token: result.value.token, expiresAt: result.value.expiresAt });
  },
});
