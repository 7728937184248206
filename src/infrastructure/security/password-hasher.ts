import * as argon2 from "argon2";
import { type AppError, internal } from "../../core/errors/app-error.js";
import type { PasswordHasher } from "../../core/ports/password-hasher.js";
import { type Result, err, ok } from "../../core/types/result.js";

export interface Argon2Options {
  readonly memoryCost: number;
  readonly timeCost: number;
}

const DEFAULTS: Argon2Options = {
  memoryCost: 65536, // 64 MiB
  timeCost: 3,
};

/**
 * Argon2id hasher. Hashes are self-describing PHC strings, so verify
 * needs no parameters.
 */
export const createPasswordHasher = (options: Argon2Options = DEFAULTS): PasswordHasher => ({
  async hash(plain: string): Promise<Result<string, AppError>> {
    try {
      const hashed = await argon2.hash(plain, {
        type: argon2.argon2id,
        memoryCost: options.memoryCost,
        timeCost: options.timeCost,
      });
      return ok(hashed);
    } catch (e: unknown) {
      return err(internal("Failed to hash password", e));
    }
  },

  async verify(plain: string, hash: string): Promise<Result<boolean, AppError>> {
    try {
      return ok(await argon2.verify(hash, plain));
    } catch (e: unknown) {
      return err(internal("Failed to verify password", e));
    }
  },
});
