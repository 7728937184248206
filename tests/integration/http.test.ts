import { beforeEach, describe, expect, it } from "vitest";
import { z } from "zod";
import { Role } from "../../src/core/entities/role.js";
import type { User } from "../../src/core/entities/user.entity.js";
import { ErrorMessages } from "../../src/core/errors/messages.js";
import { createLogger } from "../../src/infrastructure/logging/logger.js";
import { type AppServer, createServer } from "../../src/presentation/server.js";
import { type TestApp, buildTestApp, seedUser } from "../support/fixtures.js";

const BASE = "http://localhost";

const envelope = z.object({ data: z.unknown() });

/** Response bodies are untyped JSON; parse what the assertions reach into */
const read = async <T>(res: Response, schema: z.ZodType<T>): Promise<T> =>
  schema.parse(envelope.parse(await res.json()).data);

const errorOf = async (res: Response) =>
  z
    .object({
      error: z.object({
        code: z.string(),
        message: z.string(),
        reason: z.string().optional(),
        errors: z.array(z.string()).optional(),
        details: z.record(z.unknown()).optional(),
      }),
    })
    .parse(await res.json()).error;

describe("HTTP API", () => {
  let app: TestApp;
  let server: AppServer;
  let root: User;
  let rootToken: string;

  const tokenFor = async (user: User, ...roles: string[]): Promise<string> => {
    const issued = await app.tokenService.sign({ sub: user.id, name: user.userName, roles });
    if (!issued.ok) throw new Error("sign failed");
    return issued.value.token;
  };

  const call = (
    method: string,
    path: string,
    options: { token?: string; body?: unknown; raw?: string; headers?: Record<string, string> } = {},
  ): Promise<Response> => {
    const headers = new Headers(options.headers);
    if (options.token !== undefined) headers.set("authorization", `Bearer ${options.token}`);
    let body: string | undefined;
    if (options.raw !== undefined) {
      body = options.raw;
    } else if (options.body !== undefined) {
      body = JSON.stringify(options.body);
      headers.set("content-type", "application/json");
    }
    return server.handle(new Request(`${BASE}${path}`, { method, headers, body }), "127.0.0.1");
  };

  const register = async (userName: string): Promise<string> => {
    const res = await call("POST", "/api/v1/users", {
      body: {
        userName,
        firstName: "Reg",
        lastName: "Istered",
        email: `${userName}@Example.test`,
      },
    });
    expect(res.status).toBe(201);
    return (await read(res, z.object({ id: z.string() }))).id;
  };

  beforeEach(async () => {
    app = buildTestApp();
    server = createServer({
      config: { host: "127.0.0.1", port: 0, env: "test", log: { level: "fatal", format: "json" } },
      logger: app.logger,
      router: app.router,
    });
    root = await seedUser(app.userRepo, { userName: "root", role: Role.SUPER_ADMIN });
    rootToken = await tokenFor(root, Role.SUPER_ADMIN);
  });

  describe("plumbing", () => {
    it("answers /health with security headers and the caller's request id", async () => {
      const res = await call("GET", "/health", { headers: { "x-request-id": "req-123" } });
      expect(res.status).toBe(200);
      expect(res.headers.get("X-Request-Id")).toBe("req-123");
      expect(res.headers.get("X-Content-Type-Options")).toBe("nosniff");
      expect(res.headers.get("Cache-Control")).toBe("no-store");
      expect(await read(res, z.object({ status: z.string() }))).toMatchObject({ status: "ok" });
    });

    it("answers /readiness with the deep check", async () => {
      const res = await call("GET", "/readiness");
      expect(res.status).toBe(200);
      expect(await res.json()).toMatchObject({
        data: { status: "ok", version: "1.0.0", checks: {} },
      });
    });

    it("answers unknown routes with 404", async () => {
      const res = await call("GET", "/api/v1/nothing");
      expect(res.status).toBe(404);
      expect(await res.json()).toEqual({
        error: { code: "NOT_FOUND", message: "GET /api/v1/nothing not found" },
      });
    });

    it("answers a method the path does not take with 404", async () => {
      const res = await call("POST", "/api/v1/users/abc");
      expect(res.status).toBe(404);
    });
  });

  describe("registration and first password", () => {
    it("creates an inactive user with a normalised email", async () => {
      const res = await call("POST", "/api/v1/users", {
        body: { userName: "dora", firstName: "Dora", lastName: "Explorer", email: "Dora@Example.TEST" },
      });
      expect(res.status).toBe(201);
      expect(await res.json()).toMatchObject({
        data: { userName: "dora", email: "dora@example.test", accountStatus: 0, hasPassword: false },
      });
    });

    it("rejects an invalid body with 422 and field errors", async () => {
      const res = await call("POST", "/api/v1/users", {
        body: { userName: "x", firstName: "A", lastName: "B", email: "not-an-email" },
      });
      expect(res.status).toBe(422);
      const error = await errorOf(res);
      expect(error.code).toBe("VALIDATION");
      const fields = z.record(z.unknown()).parse(error.details?.fieldErrors);
      expect(Object.keys(fields).sort()).toEqual(["email", "userName"]);
    });

    it("answers 409 for a taken user name", async () => {
      await register("erin");
      const res = await call("POST", "/api/v1/users", {
        body: { userName: "ERIN", firstName: "E", lastName: "R", email: "erin2@example.test" },
      });
      expect(res.status).toBe(409);
    });

    it("sets the first password anonymously, once", async () => {
      const id = await register("fred");
      const body = { password: "Passw0rd!", passwordConfirmed: "Passw0rd!" };

      expect((await call("PUT", `/api/v1/users/${id}/password`, { body })).status).toBe(204);

      const again = await call("PUT", `/api/v1/users/${id}/password`, { body });
      expect(again.status).toBe(400);
      const error = await errorOf(again);
      expect(error.reason).toBe("PASSWORD_ALREADY_SET");
      expect(error.errors).toEqual([ErrorMessages.PASSWORD_ALREADY_SET]);
    });

    it("answers 400 for a mismatched confirmation", async () => {
      const id = await register("gina");
      const res = await call("PUT", `/api/v1/users/${id}/password`, {
        body: { password: "Passw0rd!", passwordConfirmed: "Passw0rd?" },
      });
      expect(res.status).toBe(400);
      expect((await errorOf(res)).reason).toBe("PASSWORD_MISMATCH");
    });

    it("answers 400 naming the missing field", async () => {
      const id = await register("hank");
      const res = await call("PUT", `/api/v1/users/${id}/password`, {
        body: { passwordConfirmed: "Passw0rd!" },
      });
      expect(res.status).toBe(400);
      const error = await errorOf(res);
      expect(error.code).toBe("BAD_REQUEST");
      expect(error.details).toEqual({ param: "password" });
    });

    it("answers 404 for an unknown user", async () => {
      const res = await call("PUT", "/api/v1/users/nobody/password", {
        body: { password: "Passw0rd!", passwordConfirmed: "Passw0rd!" },
      });
      expect(res.status).toBe(404);
      expect((await errorOf(res)).reason).toBe("USER_NOT_FOUND");
    });
  });

  describe("login and rotation", () => {
    const login = (userName: string, password: string) =>
      call("POST", "/api/v1/login/tokens", { body: { userName, password } });

    it("walks a user from registration to a rotated password", async () => {
      const id = await register("ivy");
      await call("PUT", `/api/v1/users/${id}/password`, {
        body: { password: "Passw0rd!", passwordConfirmed: "Passw0rd!" },
      });

      const early = await login("ivy", "Passw0rd!");
      expect(early.status).toBe(403);
      expect((await errorOf(early)).reason).toBe("NOT_ACTIVATED");

      expect((await call("PATCH", `/api/v1/users/${id}/activate`, { token: rootToken })).status).toBe(
        204,
      );
      expect(
        (await call("POST", `/api/v1/users/${id}/roles`, { token: rootToken, body: { roleName: "User" } }))
          .status,
      ).toBe(204);

      const issued = await login("ivy", "Passw0rd!");
      expect(issued.status).toBe(200);
      const { token } = await read(issued, z.object({ token: z.string(), expiresAt: z.number() }));

      const rotated = await call("PATCH", `/api/v1/users/${id}/password`, {
        token,
        body: { currentPassword: "Passw0rd!", newPassword: "N3wPassw0rd!" },
      });
      expect(rotated.status).toBe(204);

      const reuse = await call("PATCH", `/api/v1/users/${id}/password`, {
        token,
        body: { currentPassword: "N3wPassw0rd!", newPassword: "Passw0rd!" },
      });
      expect(reuse.status).toBe(400);
      expect((await errorOf(reuse)).reason).toBe("CANNOT_REUSE");

      expect((await login("ivy", "N3wPassw0rd!")).status).toBe(200);
    });

    it("answers 401 for bad credentials", async () => {
      const res = await login("nobody", "Passw0rd!");
      expect(res.status).toBe(401);
      expect((await errorOf(res)).reason).toBe("INVALID_CREDENTIALS");
    });

    it("answers 422 for a malformed body", async () => {
      const res = await call("POST", "/api/v1/login/tokens", {
        raw: "{not json",
        headers: { "content-type": "application/json" },
      });
      expect(res.status).toBe(422);
    });
  });

  describe("authorization", () => {
    it("requires a bearer token", async () => {
      const res = await call("GET", "/api/v1/users");
      expect(res.status).toBe(401);
      expect((await errorOf(res)).message).toBe("Missing Authorization header");
    });

    it("rejects a forged token", async () => {
      const res = await call("GET", "/api/v1/users", { token: `${rootToken}x` });
      expect(res.status).toBe(401);
    });

    it("keeps admin routes from plain users", async () => {
      const member = await seedUser(app.userRepo, { role: Role.USER });
      const token = await tokenFor(member, Role.USER);

      const res = await call("GET", "/api/v1/users", { token });
      expect(res.status).toBe(403);
      expect((await errorOf(res)).message).toBe("Insufficient permissions");
    });

    it("answers 403 before 404 for a user reaching past themselves", async () => {
      const member = await seedUser(app.userRepo, { role: Role.USER });
      const token = await tokenFor(member, Role.USER);

      const res = await call("GET", "/api/v1/users/does-not-exist", { token });
      expect(res.status).toBe(403);
      expect((await errorOf(res)).errors).toEqual([ErrorMessages.FORBIDDEN]);
    });

    it("lets an admin read, list and count users", async () => {
      const admin = await seedUser(app.userRepo, { role: Role.ADMIN });
      const member = await seedUser(app.userRepo, { role: Role.USER });
      const token = await tokenFor(admin, Role.ADMIN);

      const one = await call("GET", `/api/v1/users/${member.id}`, { token });
      expect(one.status).toBe(200);
      expect(await one.json()).toMatchObject({ data: { id: member.id, role: "User" } });

      const list = await call("GET", "/api/v1/users?limit=2", { token });
      const page = await read(list, z.object({ items: z.array(z.unknown()), hasMore: z.boolean() }));
      expect(page.items).toHaveLength(2);
      expect(page.hasMore).toBe(true);

      const metrics = await call("GET", "/api/v1/users/state-metrics", { token });
      expect(await metrics.json()).toEqual({
        data: { totalCount: 3, activatedUsers: 3, deactivatedUsers: 0 },
      });
    });

    it("rejects a bad list filter with 422", async () => {
      const res = await call("GET", "/api/v1/users?accountStatus=7", { token: rootToken });
      expect(res.status).toBe(422);
    });
  });

  describe("roles and audit", () => {
    it("lists roles for SuperAdmin only", async () => {
      const res = await call("GET", "/api/v1/roles", { token: rootToken });
      expect(await res.json()).toEqual({ data: ["Admin", "SuperAdmin", "User"] });

      const admin = await seedUser(app.userRepo, { role: Role.ADMIN });
      const denied = await call("GET", "/api/v1/roles", { token: await tokenFor(admin, Role.ADMIN) });
      expect(denied.status).toBe(403);
    });

    it("removes a role through its encoded name", async () => {
      const admin = await seedUser(app.userRepo, { role: Role.ADMIN });
      const res = await call("DELETE", `/api/v1/users/${admin.id}/roles/Admin`, { token: rootToken });
      expect(res.status).toBe(204);

      const missing = await call("DELETE", `/api/v1/users/${admin.id}/roles/Super%41dmin`, {
        token: rootToken,
      });
      expect(missing.status).toBe(400);
      expect((await errorOf(missing)).reason).toBe("MISSING_ROLE");
    });

    it("lists and deletes audit entries", async () => {
      await register("jack");

      const res = await call("GET", "/api/v1/audit-logs?action=USER_CREATED", { token: rootToken });
      expect(res.status).toBe(200);
      const entries = await read(res, z.array(z.object({ id: z.string(), action: z.string() })));
      expect(entries.map((e) => e.action)).toEqual(["USER_CREATED"]);

      const id = entries[0]?.id ?? "";
      expect((await call("DELETE", `/api/v1/audit-logs/${id}`, { token: rootToken })).status).toBe(204);
      expect((await call("DELETE", `/api/v1/audit-logs/${id}`, { token: rootToken })).status).toBe(404);
    });

    it("deletes a user, after which even SuperAdmin is refused", async () => {
      const member = await seedUser(app.userRepo, { role: Role.USER });
      expect((await call("DELETE", `/api/v1/users/${member.id}`, { token: rootToken })).status).toBe(204);
      // a missing target never passes the permission check
      expect((await call("GET", `/api/v1/users/${member.id}`, { token: rootToken })).status).toBe(403);
    });
  });
});

describe("HTTP server lifecycle", () => {
  it("logs server errors raised after it started listening", async () => {
    const lines: string[] = [];
    const logger = createLogger({ level: "error", format: "json", sink: (line) => lines.push(line) });
    const server = createServer({
      config: { host: "127.0.0.1", port: 0, env: "test", log: { level: "fatal", format: "json" } },
      logger,
      router: buildTestApp().router,
    });

    const http = await server.start();
    http.emit("error", new Error("socket exploded"));
    await server.stop();

    const entries = lines.map((line) =>
      z.object({ level: z.string(), msg: z.string() }).parse(JSON.parse(line)),
    );
    expect(entries).toEqual([{ level: "error", msg: "HTTP server error" }]);
  });
});
