import type { Caller } from "../application/services/caller.js";
import type { Principal } from "../core/entities/principal.js";
import type { Logger } from "../core/ports/logger.js";
import type { RequestId } from "../core/types/brand.js";

/**
 * Typed request context threaded through the handlers.
 * Immutable; created once per request by the server.
 */
export interface RequestContext {
  readonly requestId: RequestId;
  readonly startTime: number;
  readonly ip: string;
  readonly method: string;
  readonly path: string;
  /** Request-scoped logger with requestId pre-bound */
  readonly logger: Logger;
}

export const callerOf = (ctx: RequestContext, principal: Principal | null = null): Caller => ({
  principal,
  ip: ctx.ip,
});
