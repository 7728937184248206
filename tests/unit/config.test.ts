import { describe, expect, it } from "vitest";
import { durationToSeconds, parseConfig } from "../../src/infrastructure/config/config.js";

const SECRET = "test-secret-test-secret-test-secret";

describe("parseConfig", () => {
  it("applies defaults", () => {
    const result = parseConfig({ JWT_SECRET: SECRET });
    expect(result.success).toBe(true);
    if (!result.success) return;

    const config = result.data;
    expect(config.port).toBe(3000);
    expect(config.host).toBe("0.0.0.0");
    expect(config.jwt.expiresIn).toBe("1h");
    expect(config.jwt.issuer).toBe("identity-service");
    expect(config.log).toEqual({ level: "info", format: "pretty" });
    expect(config.database).toEqual({ url: undefined, path: "data/identity.sqlite" });
    expect(config.passwordPolicy).toEqual({
      minLength: 8,
      requireUppercase: true,
      requireLowercase: true,
      requireDigit: true,
      requireSpecial: true,
      historySize: 5,
    });
    expect(config.seed).toBeUndefined();
  });

  it("requires a JWT secret of at least 32 characters", () => {
    expect(parseConfig({}).success).toBe(false);
    expect(parseConfig({ JWT_SECRET: "short" }).success).toBe(false);
  });

  it("treats empty strings as unset", () => {
    const result = parseConfig({ JWT_SECRET: SECRET, PORT: "", PASSWORD_HISTORY_SIZE: "" });
    expect(result.success && result.data.port).toBe(3000);
    expect(result.success && result.data.passwordPolicy.historySize).toBe(5);
  });

  it("reads policy flags and history size", () => {
    const result = parseConfig({
      JWT_SECRET: SECRET,
      PASSWORD_REQUIRE_SPECIAL: "false",
      PASSWORD_HISTORY_SIZE: "3",
    });
    expect(result.success).toBe(true);
    if (!result.success) return;
    expect(result.data.passwordPolicy.requireSpecial).toBe(false);
    expect(result.data.passwordPolicy.historySize).toBe(3);
  });

  it("rejects a history size below one", () => {
    expect(parseConfig({ JWT_SECRET: SECRET, PASSWORD_HISTORY_SIZE: "0" }).success).toBe(false);
  });

  it("accepts only mssql:// database URLs", () => {
    expect(parseConfig({ JWT_SECRET: SECRET, DATABASE_URL: "mssql://sa:pw@db/identity" }).success).toBe(
      true,
    );
    expect(parseConfig({ JWT_SECRET: SECRET, DATABASE_URL: "postgres://db/identity" }).success).toBe(
      false,
    );
  });

  it("builds the seed account only when a user name is given", () => {
    const result = parseConfig({
      JWT_SECRET: SECRET,
      SEED_SUPER_ADMIN_USERNAME: "root",
      SEED_SUPER_ADMIN_PASSWORD: "Str0ng!pass",
    });
    expect(result.success && result.data.seed).toEqual({ userName: "root", password: "Str0ng!pass" });
  });
});

describe("durationToSeconds", () => {
  it("converts unit suffixes", () => {
    expect(durationToSeconds("30s")).toBe(30);
    expect(durationToSeconds("15m")).toBe(900);
    expect(durationToSeconds("1h")).toBe(3600);
    expect(durationToSeconds("7d")).toBe(604_800);
  });
});
