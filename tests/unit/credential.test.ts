import { describe, expect, it } from "vitest";
import {
  CredentialMessages,
  createCredentialService,
} from "../../src/application/services/credential.service.js";
import { toUserId } from "../../src/core/types/brand.js";
import { createInMemoryUserRepository } from "../../src/infrastructure/database/in-memory-user.repository.js";
import { createSilentLogger } from "../../src/infrastructure/logging/logger.js";
import { createPasswordPolicy } from "../../src/infrastructure/security/password-policy.js";
import { defaultPolicy, fakeHasher, seedUser } from "../support/fixtures.js";

const setup = () => {
  const userRepo = createInMemoryUserRepository();
  const credentials = createCredentialService({
    userRepo,
    passwordHasher: fakeHasher,
    passwordPolicy: createPasswordPolicy(defaultPolicy),
    logger: createSilentLogger(),
  });
  return { userRepo, credentials };
};

describe("CredentialService", () => {
  it("hashes and persists a first password", async () => {
    const { userRepo, credentials } = setup();
    const user = await seedUser(userRepo);

    const stored = await credentials.setPassword(user, "Passw0rd!");
    expect(stored.ok && stored.value.passwordHash).toBe("hashed:Passw0rd!");

    const reloaded = await userRepo.findById(toUserId(user.id));
    expect(reloaded.ok && reloaded.value.passwordHash).toBe("hashed:Passw0rd!");
  });

  it("refuses to set over an existing password", async () => {
    const { userRepo, credentials } = setup();
    const user = await seedUser(userRepo, { passwordHash: "hashed:Old0ne!!" });

    const result = await credentials.setPassword(user, "Passw0rd!");
    expect(!result.ok && result.error.errors).toEqual([CredentialMessages.ALREADY_HAS_PASSWORD]);
  });

  it("changes a password only with the right current one", async () => {
    const { userRepo, credentials } = setup();
    const user = await seedUser(userRepo, { passwordHash: "hashed:Old0ne!!" });

    const wrong = await credentials.changePassword(user, "Nope0ne!!", "Passw0rd!");
    expect(!wrong.ok && wrong.error.errors).toEqual([CredentialMessages.INCORRECT_PASSWORD]);

    const right = await credentials.changePassword(user, "Old0ne!!", "Passw0rd!");
    expect(right.ok && right.value.passwordHash).toBe("hashed:Passw0rd!");
  });

  it("names the failure when the store drops the hash", async () => {
    const userRepo = createInMemoryUserRepository();
    const credentials = createCredentialService({
      userRepo: { ...userRepo, update: (id) => userRepo.findById(id) },
      passwordHasher: fakeHasher,
      passwordPolicy: createPasswordPolicy(defaultPolicy),
      logger: createSilentLogger(),
    });
    const user = await seedUser(userRepo);

    const result = await credentials.setPassword(user, "Passw0rd!");
    expect(!result.ok && result.error.reason).toBe("STORE_FAILURE");
    expect(!result.ok && result.error.errors).toEqual([CredentialMessages.PASSWORD_NOT_SAVED]);
  });

  it("reports false when checking a user without a password", async () => {
    const { userRepo, credentials } = setup();
    const user = await seedUser(userRepo);
    expect(await credentials.checkPassword(user, "anything")).toEqual({ ok: true, value: false });
  });
});
