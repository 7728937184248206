import type { Principal } from "../entities/principal.js";
import type { AppError } from "../errors/app-error.js";
import type { Result } from "../types/result.js";

/**
 * Port: Token Service (signed bearer tokens)
 */
export interface TokenClaims {
  readonly sub: string;
  readonly name: string;
  readonly roles: readonly string[];
}

export interface IssuedToken {
  readonly token: string;
  readonly expiresAt: number;
}

export interface TokenService {
  sign(claims: TokenClaims): Promise<Result<IssuedToken, AppError>>;
  verify(token: string): Promise<Result<Principal, AppError>>;
}
