import { beforeEach, describe, expect, it } from "vitest";
import { Role } from "../../src/core/entities/role.js";
import { AccountStatus } from "../../src/core/entities/user.entity.js";
import { type TestApp, buildTestApp, seedUser } from "../support/fixtures.js";

describe("LoginService", () => {
  let app: TestApp;

  beforeEach(async () => {
    app = buildTestApp();
    await seedUser(app.userRepo, {
      userName: "alice",
      role: Role.ADMIN,
      passwordHash: "hashed:Passw0rd!",
    });
  });

  it("issues a token carrying the user's id, name and roles", async () => {
    const issued = await app.loginService.login({ userName: "ALICE", password: "Passw0rd!" }, "10.0.0.4");
    expect(issued.ok).toBe(true);
    if (!issued.ok) return;

    const found = await app.userRepo.findByUserName("alice");
    const verified = await app.tokenService.verify(issued.value.token);
    expect(verified.ok && verified.value).toEqual({
      id: found.ok ? found.value.id : "",
      userName: "alice",
      roles: ["Admin"],
    });

    const audit = await app.auditLog.query({ action: "USER_LOGGED_IN" });
    expect(audit.ok && audit.value.map((e) => e.ip)).toEqual(["10.0.0.4"]);
  });

  it("answers UNAUTHORIZED for an unknown user and audits the attempt", async () => {
    const result = await app.loginService.login({ userName: "mallory", password: "Passw0rd!" });
    expect(!result.ok && [result.error.code, result.error.reason]).toEqual([
      "UNAUTHORIZED",
      "INVALID_CREDENTIALS",
    ]);

    const audit = await app.auditLog.query({ action: "USER_LOGIN_FAILED" });
    expect(audit.ok && audit.value.map((e) => [e.userId, e.resource, e.detail])).toEqual([
      [null, "session", "mallory"],
    ]);
  });

  it("answers UNAUTHORIZED for a wrong password", async () => {
    const result = await app.loginService.login({ userName: "alice", password: "Wrong0ne!" });
    expect(!result.ok && result.error.code).toBe("UNAUTHORIZED");
  });

  it("answers UNAUTHORIZED for an account without a password", async () => {
    await seedUser(app.userRepo, { userName: "bob" });
    const result = await app.loginService.login({ userName: "bob", password: "Passw0rd!" });
    expect(!result.ok && result.error.reason).toBe("INVALID_CREDENTIALS");
  });

  it("answers FORBIDDEN for an inactive account with the right password", async () => {
    await seedUser(app.userRepo, {
      userName: "carol",
      passwordHash: "hashed:Passw0rd!",
      accountStatus: AccountStatus.INACTIVE,
    });
    const result = await app.loginService.login({ userName: "carol", password: "Passw0rd!" });
    expect(!result.ok && [result.error.code, result.error.reason]).toEqual([
      "FORBIDDEN",
      "NOT_ACTIVATED",
    ]);
  });
});
