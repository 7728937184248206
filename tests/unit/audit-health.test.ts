import { describe, expect, it } from "vitest";
import { createAuditService } from "../../src/application/services/audit.service.js";
import { createHealthService } from "../../src/application/services/health.service.js";
import { internal } from "../../src/core/errors/app-error.js";
import { ArgumentError } from "../../src/core/errors/argument-error.js";
import type { AuditLog } from "../../src/core/ports/audit-log.js";
import { err, ok } from "../../src/core/types/result.js";
import { createInMemoryAuditLog } from "../../src/infrastructure/database/in-memory-audit-log.js";
import { createSilentLogger } from "../../src/infrastructure/logging/logger.js";

const entry = (userId: string, action: "USER_CREATED" | "USER_DELETED") => ({
  userId,
  action,
  resource: "user",
  resourceId: userId,
  detail: null,
  ip: "-",
});

describe("AuditService", () => {
  it("queries newest first with filters", async () => {
    let clock = 1000;
    const audit = createAuditService({
      auditLog: createInMemoryAuditLog(() => clock++),
      logger: createSilentLogger(),
    });
    await audit.record(entry("a", "USER_CREATED"));
    await audit.record(entry("b", "USER_CREATED"));
    await audit.record(entry("a", "USER_DELETED"));

    const all = await audit.list({});
    expect(all.ok && all.value.map((e) => e.timestamp)).toEqual([1002, 1001, 1000]);

    const forA = await audit.list({ userId: "a", since: 1001 });
    expect(forA.ok && forA.value.map((e) => e.action)).toEqual(["USER_DELETED"]);

    const limited = await audit.list({ limit: 1 });
    expect(limited.ok && limited.value.map((e) => e.userId)).toEqual(["a"]);
  });

  it("removes an entry and answers AUDIT_LOG_NOT_FOUND the second time", async () => {
    const auditLog = createInMemoryAuditLog();
    const audit = createAuditService({ auditLog, logger: createSilentLogger() });
    const appended = await auditLog.append(entry("a", "USER_CREATED"));
    const id = appended.ok ? appended.value.id : "";

    expect(await audit.remove(id)).toEqual({ ok: true, value: undefined });
    const again = await audit.remove(id);
    expect(!again.ok && again.error.reason).toBe("AUDIT_LOG_NOT_FOUND");
    expect(() => audit.remove("")).toThrow(ArgumentError);
  });

  it("does not fail the caller when the append is refused", async () => {
    const broken: AuditLog = {
      append: async () => err(internal("disk full")),
      query: async () => ok([]),
      delete: async () => ok(false),
    };
    const audit = createAuditService({ auditLog: broken, logger: createSilentLogger() });
    await expect(audit.record(entry("a", "USER_CREATED"))).resolves.toBeUndefined();
  });
});

describe("HealthService", () => {
  const fixed = () => new Date("2026-01-02T03:04:05.000Z");

  it("is ok with no probes", async () => {
    const health = createHealthService({ logger: createSilentLogger(), version: "9.9.9", now: fixed });
    const status = await health.check();
    expect(status).toMatchObject({
      status: "ok",
      version: "9.9.9",
      timestamp: "2026-01-02T03:04:05.000Z",
      checks: {},
    });
  });

  it("is down when any probe fails", async () => {
    const health = createHealthService({
      logger: createSilentLogger(),
      version: "1.0.0",
      now: fixed,
      probes: [
        { name: "cache", run: async () => ok(undefined) },
        { name: "database", run: async () => err(internal("connection refused")) },
      ],
    });
    const status = await health.check();
    expect(status.status).toBe("down");
    expect(status.checks.cache?.status).toBe("ok");
    expect(status.checks.database).toMatchObject({ status: "down", details: "connection refused" });
  });
});
