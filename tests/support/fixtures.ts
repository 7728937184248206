import { createApp } from "../../src/app.js";
import type { Principal } from "../../src/core/entities/principal.js";
import type { Role } from "../../src/core/entities/role.js";
import { AccountStatus, type User } from "../../src/core/entities/user.entity.js";
import type { PasswordHasher } from "../../src/core/ports/password-hasher.js";
import type { PasswordHistoryStore } from "../../src/core/ports/password-history.js";
import type { PasswordPolicyConfig } from "../../src/core/ports/password-policy.js";
import type { UserRepository } from "../../src/core/ports/user.repository.js";
import { ok } from "../../src/core/types/result.js";
import { createInMemoryAuditLog } from "../../src/infrastructure/database/in-memory-audit-log.js";
import { createInMemoryPasswordHistory } from "../../src/infrastructure/database/in-memory-password-history.js";
import { createInMemoryUserRepository } from "../../src/infrastructure/database/in-memory-user.repository.js";
import { createSilentLogger } from "../../src/infrastructure/logging/logger.js";
import { createTokenService } from "../../src/infrastructure/security/token-service.js";

export const TEST_SECRET = "test-secret-test-secret-test-secret";

/** Deterministic stand-in for argon2 */
export const fakeHasher: PasswordHasher = {
  async hash(plain) {
    return ok(`hashed:${plain}`);
  },
  async verify(plain, hash) {
    return ok(hash === `hashed:${plain}`);
  },
};

export const defaultPolicy: PasswordPolicyConfig = {
  minLength: 8,
  requireUppercase: true,
  requireLowercase: true,
  requireDigit: true,
  requireSpecial: true,
};

export const principal = (id: string, ...roles: string[]): Principal => ({ id, roles });

let counter = 0;

export interface SeedOptions {
  readonly userName?: string;
  readonly role?: Role;
  readonly passwordHash?: string | null;
  readonly accountStatus?: AccountStatus;
}

/** Create a user row directly in the repository, optionally with a role */
export const seedUser = async (repo: UserRepository, options: SeedOptions = {}): Promise<User> => {
  counter++;
  const userName = options.userName ?? `user${counter}`;
  const created = await repo.create({
    userName,
    firstName: "Test",
    lastName: `User${counter}`,
    email: `${userName}@example.test`,
    passwordHash: options.passwordHash ?? null,
    accountStatus: options.accountStatus ?? AccountStatus.ACTIVE,
  });
  if (!created.ok) throw new Error(`seedUser failed: ${created.error.message}`);
  if (options.role !== undefined) {
    const added = await repo.addRole(created.value.id, options.role);
    if (!added.ok) throw new Error(`addRole failed: ${added.error.message}`);
  }
  return created.value;
};

/** Full application graph over in-memory adapters */
export const buildTestApp = (
  historySize = 5,
  historyStore: PasswordHistoryStore = createInMemoryPasswordHistory(),
) => {
  const userRepo = createInMemoryUserRepository();
  const auditLog = createInMemoryAuditLog();
  const tokenService = createTokenService({
    secret: TEST_SECRET,
    expiresInSeconds: 3600,
    issuer: "identity-service",
    audience: "identity-service-clients",
  });
  const logger = createSilentLogger();
  const app = createApp({
    userRepo,
    historyStore,
    auditLog,
    passwordHasher: fakeHasher,
    tokenService,
    passwordPolicy: defaultPolicy,
    historySize,
    logger,
  });
  return { ...app, userRepo, historyStore, auditLog, tokenService, logger };
};

export type TestApp = ReturnType<typeof buildTestApp>;
