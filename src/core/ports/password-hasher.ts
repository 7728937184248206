import type { AppError } from "../errors/app-error.js";
import type { Result } from "../types/result.js";

/**
 * Port: Password Hasher. One-way hash plus verify. Hashes are opaque.
 */
export interface PasswordHasher {
  hash(plain: string): Promise<Result<string, AppError>>;
  verify(plain: string, hash: string): Promise<Result<boolean, AppError>>;
}
