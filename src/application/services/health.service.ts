import type { AppError } from "../../core/errors/app-error.js";
import type { Logger } from "../../core/ports/logger.js";
import type { Result } from "../../core/types/result.js";

export type HealthState = "ok" | "down";

export interface HealthStatus {
  readonly status: HealthState;
  readonly version: string;
  readonly uptime: number;
  readonly timestamp: string;
  readonly checks: Record<string, ComponentHealth>;
}

export interface ComponentHealth {
  readonly status: HealthState;
  readonly latencyMs?: number | undefined;
  readonly details?: string | undefined;
}

export interface HealthService {
  check(): Promise<HealthStatus>;
}

/** A named dependency probe, e.g. a `SELECT 1` against the store */
export interface HealthProbe {
  readonly name: string;
  run(): Promise<Result<void, AppError>>;
}

interface Deps {
  readonly logger: Logger;
  readonly version: string;
  readonly probes?: readonly HealthProbe[] | undefined;
  readonly now?: (() => Date) | undefined;
}

const elapsed = (start: number): number => Math.round((performance.now() - start) * 100) / 100;

export const createHealthService = (deps: Deps): HealthService => {
  const { logger, version } = deps;
  const probes = deps.probes ?? [];
  const now = deps.now ?? (() => new Date());

  return {
    async check(): Promise<HealthStatus> {
      logger.debug("Running health check");
      const checks: Record<string, ComponentHealth> = {};

      for (const probe of probes) {
        const start = performance.now();
        const result = await probe.run();
        checks[probe.name] = result.ok
          ? { status: "ok", latencyMs: elapsed(start) }
          : { status: "down", latencyMs: elapsed(start), details: result.error.message };
      }

      const failed = Object.entries(checks)
        .filter(([, c]) => c.status === "down")
        .map(([name]) => name);

      if (failed.length > 0) {
        logger.warn("Health check failed", { failedComponents: failed });
      }

      return {
        status: failed.length > 0 ? "down" : "ok",
        version,
        uptime: process.uptime(),
        timestamp: now().toISOString(),
        checks,
      };
    },
  };
};
