import { type CredentialedUser, type User, hasPassword } from "../../core/entities/user.entity.js";
import { type AppError, asStoreFailure, storeFailure } from "../../core/errors/app-error.js";
import type { Logger } from "../../core/ports/logger.js";
import type { PasswordHasher } from "../../core/ports/password-hasher.js";
import type { PasswordPolicy } from "../../core/ports/password-policy.js";
import type { UserRepository } from "../../core/ports/user.repository.js";
import { type Result, err, ok } from "../../core/types/result.js";

/**
 * Credential primitives on a user row: complexity policy, hashing and
 * persistence. Every refusal is a STORE_FAILURE whose `errors` are the
 * underlying descriptions.
 */
export interface CredentialService {
  setPassword(user: User, plaintext: string): Promise<Result<CredentialedUser, AppError>>;
  changePassword(
    user: User,
    currentPassword: string,
    newPassword: string,
  ): Promise<Result<CredentialedUser, AppError>>;
  checkPassword(user: User, plaintext: string): Promise<Result<boolean, AppError>>;
}

interface Deps {
  readonly userRepo: UserRepository;
  readonly passwordHasher: PasswordHasher;
  readonly passwordPolicy: PasswordPolicy;
  readonly logger: Logger;
}

export const CredentialMessages = {
  ALREADY_HAS_PASSWORD: "User already has a password set.",
  INCORRECT_PASSWORD: "Incorrect password.",
  PASSWORD_NOT_SAVED: "The password could not be saved.",
} as const;

export const createCredentialService = (deps: Deps): CredentialService => {
  const { userRepo, passwordHasher, passwordPolicy, logger } = deps;

  const checkPassword = async (user: User, plaintext: string): Promise<Result<boolean, AppError>> => {
    if (!hasPassword(user)) return ok(false);
    return passwordHasher.verify(plaintext, user.passwordHash);
  };

  const store = async (user: User, plaintext: string): Promise<Result<CredentialedUser, AppError>> => {
    const policy = passwordPolicy.validate(plaintext);
    if (!policy.valid) return err(storeFailure(policy.violations));

    const hashed = await passwordHasher.hash(plaintext);
    if (!hashed.ok) return err(asStoreFailure(hashed.error));

    const updated = await userRepo.update(user.id, { passwordHash: hashed.value });
    if (!updated.ok) {
      logger.error("Password write failed", { userId: user.id, error: updated.error.message });
      return err(asStoreFailure(updated.error));
    }

    const saved = updated.value;
    if (!hasPassword(saved)) return err(storeFailure([CredentialMessages.PASSWORD_NOT_SAVED]));
    return ok(saved);
  };

  return {
    async setPassword(user, plaintext) {
      if (hasPassword(user)) return err(storeFailure([CredentialMessages.ALREADY_HAS_PASSWORD]));
      return store(user, plaintext);
    },

    async changePassword(user, currentPassword, newPassword) {
      const matches = await checkPassword(user, currentPassword);
      if (!matches.ok) return err(asStoreFailure(matches.error));
      if (!matches.value) return err(storeFailure([CredentialMessages.INCORRECT_PASSWORD]));
      return store(user, newPassword);
    },

    checkPassword,
  };
};
