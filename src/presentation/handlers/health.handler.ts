import type { HealthService } from "../../application/services/health.service.js";
import { jsonResponse } from "./response.js";

/**
 * `/health` answers from the process alone, for load balancer probes.
 * `/readiness` runs every dependency probe and answers 503 when one is down.
 */
export const healthHandler = (healthService: HealthService) => ({
  shallowCheck: (): Response => jsonResponse({ status: "ok", uptime: process.uptime() }),

  deepCheck: async (): Promise<Response> => {
    const status = await healthService.check();
    return jsonResponse(status, status.status === "ok" ? 200 : 503);
  },
});
