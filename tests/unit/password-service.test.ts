import { beforeEach, describe, expect, it, vi } from "vitest";
import { Role } from "../../src/core/entities/role.js";
import type { User } from "../../src/core/entities/user.entity.js";
import { ErrorMessages } from "../../src/core/errors/messages.js";
import { internal } from "../../src/core/errors/app-error.js";
import { ArgumentError } from "../../src/core/errors/argument-error.js";
import { toUserId } from "../../src/core/types/brand.js";
import { err } from "../../src/core/types/result.js";
import { createInMemoryPasswordHistory } from "../../src/infrastructure/database/in-memory-password-history.js";
import { type TestApp, buildTestApp, principal, seedUser } from "../support/fixtures.js";

const historyOf = async (app: TestApp, id: string) => {
  const rows = await app.historyStore.listByUser(toUserId(id));
  return rows.ok ? rows.value.map((r) => r.passwordHash) : [];
};

const hashOf = async (app: TestApp, id: string) => {
  const found = await app.userRepo.findById(toUserId(id));
  return found.ok ? found.value.passwordHash : undefined;
};

describe("PasswordService.setPassword", () => {
  let app: TestApp;
  let fresh: User;

  beforeEach(async () => {
    app = buildTestApp();
    fresh = await seedUser(app.userRepo);
  });

  it("stores the hash and writes exactly one history row", async () => {
    const result = await app.passwordService.setPassword(fresh.id, {
      password: "Passw0rd!",
      passwordConfirmed: "Passw0rd!",
    });

    expect(result).toEqual({ ok: true, value: undefined });
    expect(await hashOf(app, fresh.id)).toBe("hashed:Passw0rd!");
    expect(await historyOf(app, fresh.id)).toEqual(["hashed:Passw0rd!"]);
  });

  it("rejects a confirmation that does not match", async () => {
    const result = await app.passwordService.setPassword(fresh.id, {
      password: "Passw0rd!",
      passwordConfirmed: "Passw0rd?",
    });

    expect(!result.ok && result.error.reason).toBe("PASSWORD_MISMATCH");
    expect(!result.ok && result.error.errors).toEqual([ErrorMessages.PASSWORD_MISMATCH]);
    expect(await historyOf(app, fresh.id)).toEqual([]);
  });

  it("refuses a second set once a password exists", async () => {
    const withPassword = await seedUser(app.userRepo, { passwordHash: "hashed:Existing1!" });
    const result = await app.passwordService.setPassword(withPassword.id, {
      password: "Passw0rd!",
      passwordConfirmed: "Passw0rd!",
    });

    expect(!result.ok && result.error.reason).toBe("PASSWORD_ALREADY_SET");
    expect(await hashOf(app, withPassword.id)).toBe("hashed:Existing1!");
  });

  it("answers USER_NOT_FOUND for an unknown id", async () => {
    const result = await app.passwordService.setPassword("missing", {
      password: "Passw0rd!",
      passwordConfirmed: "Passw0rd!",
    });
    expect(!result.ok && result.error.code).toBe("NOT_FOUND");
    expect(!result.ok && result.error.reason).toBe("USER_NOT_FOUND");
  });

  it("forwards complexity violations as a STORE_FAILURE", async () => {
    const result = await app.passwordService.setPassword(fresh.id, {
      password: "short",
      passwordConfirmed: "short",
    });

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.reason).toBe("STORE_FAILURE");
    expect(result.error.errors).toEqual([
      "Passwords must be at least 8 characters.",
      "Passwords must have at least one uppercase ('A'-'Z').",
      "Passwords must have at least one digit ('0'-'9').",
      "Passwords must have at least one non alphanumeric character.",
    ]);
    expect(await historyOf(app, fresh.id)).toEqual([]);
  });

  it("throws synchronously on blank arguments", () => {
    const set = app.passwordService.setPassword;
    expect(() => set("", { password: "a", passwordConfirmed: "a" })).toThrow(ArgumentError);
    expect(() => set(fresh.id, null)).toThrow(ArgumentError);
    expect(() => set(fresh.id, { password: " ", passwordConfirmed: "a" })).toThrow(ArgumentError);
    expect(() => set(fresh.id, { password: "a", passwordConfirmed: undefined })).toThrow(
      ArgumentError,
    );
  });

  it("accepts the id in any letter case", async () => {
    const result = await app.passwordService.setPassword(fresh.id.toUpperCase(), {
      password: "Passw0rd!",
      passwordConfirmed: "Passw0rd!",
    });

    expect(result.ok).toBe(true);
    expect(await hashOf(app, fresh.id)).toBe("hashed:Passw0rd!");
    expect(await historyOf(app, fresh.id)).toEqual(["hashed:Passw0rd!"]);
  });

  it("lets only one of two concurrent sets succeed", async () => {
    const request = { password: "Passw0rd!", passwordConfirmed: "Passw0rd!" };
    const results = await Promise.all([
      app.passwordService.setPassword(fresh.id, request),
      app.passwordService.setPassword(fresh.id.toUpperCase(), request),
      app.passwordService.setPassword(fresh.id, request),
    ]);

    const succeeded = results.filter((r) => r.ok);
    expect(succeeded).toHaveLength(1);
    expect(await historyOf(app, fresh.id)).toEqual(["hashed:Passw0rd!"]);
  });
});

describe("PasswordService.updatePassword", () => {
  let app: TestApp;
  let owner: User;

  beforeEach(async () => {
    app = buildTestApp(3);
    owner = await seedUser(app.userRepo, { role: Role.USER });
    const set = await app.passwordService.setPassword(owner.id, {
      password: "Original1!",
      passwordConfirmed: "Original1!",
    });
    expect(set.ok).toBe(true);
  });

  const self = () => ({ principal: principal(owner.id, Role.USER), ip: "10.0.0.2" });

  it("rotates the password and appends one history row", async () => {
    const result = await app.passwordService.updatePassword(self(), owner.id, {
      currentPassword: "Original1!",
      newPassword: "Rotated22!",
    });

    expect(result).toEqual({ ok: true, value: undefined });
    expect(await hashOf(app, owner.id)).toBe("hashed:Rotated22!");
    expect(await historyOf(app, owner.id)).toEqual(["hashed:Original1!", "hashed:Rotated22!"]);

    const audit = await app.auditLog.query({ action: "PASSWORD_UPDATED" });
    expect(audit.ok && audit.value.map((e) => [e.userId, e.resourceId, e.ip])).toEqual([
      [owner.id, owner.id, "10.0.0.2"],
    ]);
  });

  it("rejects a wrong current password", async () => {
    const result = await app.passwordService.updatePassword(self(), owner.id, {
      currentPassword: "Wrong0ne!",
      newPassword: "Rotated22!",
    });
    expect(!result.ok && result.error.reason).toBe("INVALID_CREDENTIALS");
    expect(await hashOf(app, owner.id)).toBe("hashed:Original1!");
  });

  it("refuses a password still inside the history window", async () => {
    const result = await app.passwordService.updatePassword(self(), owner.id, {
      currentPassword: "Original1!",
      newPassword: "Original1!",
    });
    expect(!result.ok && result.error.reason).toBe("CANNOT_REUSE");
    expect(await historyOf(app, owner.id)).toEqual(["hashed:Original1!"]);
  });

  it("allows reuse once the password has left the window", async () => {
    const rotate = (from: string, to: string) =>
      app.passwordService.updatePassword(self(), owner.id, {
        currentPassword: from,
        newPassword: to,
      });

    expect((await rotate("Original1!", "Second22!")).ok).toBe(true);
    expect((await rotate("Second22!", "Third333!")).ok).toBe(true);
    expect((await rotate("Third333!", "Fourth44!")).ok).toBe(true);
    expect(await historyOf(app, owner.id)).toEqual([
      "hashed:Second22!",
      "hashed:Third333!",
      "hashed:Fourth44!",
    ]);
    expect((await rotate("Fourth44!", "Original1!")).ok).toBe(true);
  });

  it("treats an account without a password as invalid credentials", async () => {
    const bare = await seedUser(app.userRepo);
    const result = await app.passwordService.updatePassword(
      { principal: principal(bare.id), ip: "-" },
      bare.id,
      { currentPassword: "Anything1!", newPassword: "Rotated22!" },
    );
    expect(!result.ok && result.error.reason).toBe("INVALID_CREDENTIALS");
  });

  it("denies an equal-ranked actor before looking at the password", async () => {
    const peer = await seedUser(app.userRepo, { role: Role.USER });
    const result = await app.passwordService.updatePassword(
      { principal: principal(peer.id, Role.USER), ip: "-" },
      owner.id,
      { currentPassword: "Original1!", newPassword: "Rotated22!" },
    );
    expect(!result.ok && result.error.code).toBe("FORBIDDEN");
    expect(await hashOf(app, owner.id)).toBe("hashed:Original1!");
  });

  it("lets an Admin rotate a User's password with the current one", async () => {
    const admin = await seedUser(app.userRepo, { role: Role.ADMIN });
    const result = await app.passwordService.updatePassword(
      { principal: principal(admin.id, Role.ADMIN), ip: "-" },
      owner.id,
      { currentPassword: "Original1!", newPassword: "Rotated22!" },
    );
    expect(result.ok).toBe(true);
  });

  it("answers INVALID_CREDENTIALS when acting on a missing self", async () => {
    const result = await app.passwordService.updatePassword(
      { principal: principal("ghost-user", Role.USER), ip: "-" },
      "ghost-user",
      { currentPassword: "Original1!", newPassword: "Rotated22!" },
    );
    expect(!result.ok && result.error.reason).toBe("INVALID_CREDENTIALS");
    expect(await historyOf(app, "ghost-user")).toEqual([]);
  });

  it("denies an Admin acting on another Admin without reading passwords", async () => {
    const actor = await seedUser(app.userRepo, { role: Role.ADMIN });
    const target = await seedUser(app.userRepo, {
      role: Role.ADMIN,
      passwordHash: "hashed:Admin0ne!",
    });
    const lookups = vi.spyOn(app.historyStore, "listByUser");

    const result = await app.passwordService.updatePassword(
      { principal: principal(actor.id, Role.ADMIN), ip: "-" },
      target.id,
      { currentPassword: "Admin0ne!", newPassword: "Rotated22!" },
    );

    expect(!result.ok && result.error.code).toBe("FORBIDDEN");
    expect(lookups).not.toHaveBeenCalled();
    expect(await hashOf(app, target.id)).toBe("hashed:Admin0ne!");
  });

  it("throws synchronously on blank arguments", () => {
    const update = app.passwordService.updatePassword;
    expect(() => update(self(), owner.id, { currentPassword: "", newPassword: "x" })).toThrow(
      ArgumentError,
    );
    expect(() => update(self(), null, { currentPassword: "x", newPassword: "y" })).toThrow(
      ArgumentError,
    );
    expect(() => update(self(), owner.id, undefined)).toThrow(ArgumentError);
  });
});

describe("PasswordService history retention", () => {
  it("keeps the five newest hashes by default", async () => {
    const app = buildTestApp();
    const owner = await seedUser(app.userRepo, { role: Role.USER });
    const self = { principal: principal(owner.id, Role.USER), ip: "-" };

    const set = await app.passwordService.setPassword(owner.id, {
      password: "Pass0rd!0",
      passwordConfirmed: "Pass0rd!0",
    });
    expect(set.ok).toBe(true);
    for (let i = 1; i <= 6; i++) {
      const rotated = await app.passwordService.updatePassword(self, owner.id, {
        currentPassword: `Pass0rd!${i - 1}`,
        newPassword: `Pass0rd!${i}`,
      });
      expect(rotated.ok).toBe(true);
    }

    expect(await historyOf(app, owner.id)).toEqual([
      "hashed:Pass0rd!2",
      "hashed:Pass0rd!3",
      "hashed:Pass0rd!4",
      "hashed:Pass0rd!5",
      "hashed:Pass0rd!6",
    ]);
  });

  it("reports success when only the prune fails", async () => {
    const inner = createInMemoryPasswordHistory();
    const app = buildTestApp(1, { ...inner, deleteByIds: async () => err(internal("disk full")) });
    const owner = await seedUser(app.userRepo, { role: Role.USER });
    const self = { principal: principal(owner.id, Role.USER), ip: "-" };

    await app.passwordService.setPassword(owner.id, {
      password: "Pass0rd!0",
      passwordConfirmed: "Pass0rd!0",
    });
    const result = await app.passwordService.updatePassword(self, owner.id, {
      currentPassword: "Pass0rd!0",
      newPassword: "Pass0rd!1",
    });

    expect(result).toEqual({ ok: true, value: undefined });
    expect(await hashOf(app, owner.id)).toBe("hashed:Pass0rd!1");
    expect(await historyOf(app, owner.id)).toEqual(["hashed:Pass0rd!0", "hashed:Pass0rd!1"]);
  });
});
