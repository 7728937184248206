import type { AuditService } from "../../application/services/audit.service.js";
import type { HealthService } from "../../application/services/health.service.js";
import type { LoginService } from "../../application/services/login.service.js";
import type { PasswordService } from "../../application/services/password.service.js";
import type { RoleService } from "../../application/services/role.service.js";
import type { UserService } from "../../application/services/user.service.js";
import type { Logger } from "../../core/ports/logger.js";
import type { TokenService } from "../../core/ports/token-service.js";
import type { RequestContext } from "../context.js";
import { auditHandlers } from "../handlers/audit.handler.js";
import { healthHandler } from "../handlers/health.handler.js";
import { loginHandlers } from "../handlers/login.handler.js";
import { passwordHandlers } from "../handlers/password.handler.js";
import { roleHandlers } from "../handlers/role.handler.js";
import { userHandlers } from "../handlers/user.handler.js";

/**
 * Static routes use O(1) map lookup.
 * Parametric routes (users/:id, audit-logs/:id) use prefix matching.
 */
type RouteHandler = (req: Request, ctx: RequestContext) => Promise<Response>;

export interface RouterDeps {
  readonly userService: UserService;
  readonly passwordService: PasswordService;
  readonly roleService: RoleService;
  readonly loginService: LoginService;
  readonly auditService: AuditService;
  readonly healthService: HealthService;
  readonly tokenService: TokenService;
  readonly logger: Logger;
}

const USERS_PREFIX = "/api/v1/users/";
const AUDIT_PREFIX = "/api/v1/audit-logs/";

/** Path segments arrive percent-encoded */
const segment = (raw: string): string | null => {
  if (raw.length === 0) return null;
  try {
    return decodeURIComponent(raw);
  } catch (e: unknown) {
    if (e instanceof URIError) return null;
    throw e;
  }
};

export const createRouter = (deps: RouterDeps) => {
  const { logger, tokenService } = deps;
  const handlerLogger = (handler: string) => logger.child({ layer: "handler", handler });

  const health = healthHandler(deps.healthService);
  const login = loginHandlers(deps.loginService, handlerLogger("login"));
  const users = userHandlers(deps.userService, tokenService, handlerLogger("user"));
  const passwords = passwordHandlers(deps.passwordService, tokenService, handlerLogger("password"));
  const roles = roleHandlers(deps.roleService, tokenService, handlerLogger("role"));
  const audit = auditHandlers(deps.auditService, tokenService, handlerLogger("audit"));

  const notFound404 = (method: string, path: string): Response => {
    logger.debug("Route not found", { method, path });
    return Response.json(
      { error: { code: "NOT_FOUND", message: `${method} ${path} not found` } },
      { status: 404 },
    );
  };

  /** Static route table */
  const routes = new Map<string, RouteHandler>([
    ["GET /health", async () => health.shallowCheck()],
    ["GET /readiness", () => health.deepCheck()],

    ["POST /api/v1/login/tokens", login.issueToken],

    ["POST /api/v1/users", users.create],
    ["GET /api/v1/users", users.list],
    ["GET /api/v1/users/state-metrics", users.stateMetrics],

    ["GET /api/v1/roles", roles.list],
    ["GET /api/v1/audit-logs", audit.list],
  ]);

  /**
   * /api/v1/users/:id
   * /api/v1/users/:id/{activate,deactivate,password,roles}
   * /api/v1/users/:id/roles/:roleName
   */
  const matchUsers = (method: string, path: string): RouteHandler | null => {
    if (!path.startsWith(USERS_PREFIX)) return null;

    const parts = path.substring(USERS_PREFIX.length).split("/");
    const userId = segment(parts[0] ?? "");
    if (userId === null) return null;

    if (parts.length === 1) {
      if (method === "GET") return (req, ctx) => users.get(req, ctx, userId);
      if (method === "PUT") return (req, ctx) => users.update(req, ctx, userId);
      if (method === "DELETE") return (req, ctx) => users.remove(req, ctx, userId);
      return null;
    }

    const action = parts[1];

    if (parts.length === 2) {
      if (method === "PATCH" && action === "activate") {
        return (req, ctx) => users.activate(req, ctx, userId);
      }
      if (method === "PATCH" && action === "deactivate") {
        return (req, ctx) => users.deactivate(req, ctx, userId);
      }
      if (action === "password") {
        if (method === "PUT") return (req, ctx) => passwords.set(req, ctx, userId);
        if (method === "PATCH") return (req, ctx) => passwords.update(req, ctx, userId);
      }
      if (method === "POST" && action === "roles") {
        return (req, ctx) => roles.assign(req, ctx, userId);
      }
      return null;
    }

    if (parts.length === 3 && method === "DELETE" && action === "roles") {
      const roleName = segment(parts[2] ?? "");
      if (roleName === null) return null;
      return (req, ctx) => roles.remove(req, ctx, userId, roleName);
    }

    return null;
  };

  const matchAudit = (method: string, path: string): RouteHandler | null => {
    if (method !== "DELETE" || !path.startsWith(AUDIT_PREFIX)) return null;
    const rest = path.substring(AUDIT_PREFIX.length);
    if (rest.includes("/")) return null;
    const auditId = segment(rest);
    return auditId === null ? null : (req, ctx) => audit.remove(req, ctx, auditId);
  };

  return {
    handle(req: Request, ctx: RequestContext, path: string): Promise<Response> {
      const handler = routes.get(`${req.method} ${path}`);
      if (handler) return handler(req, ctx);

      const parametric = matchUsers(req.method, path) ?? matchAudit(req.method, path);
      if (parametric) return parametric(req, ctx);

      return Promise.resolve(notFound404(req.method, path));
    },
  };
};

export type Router = ReturnType<typeof createRouter>;
