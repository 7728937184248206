import { createHmac, timingSafeEqual } from "node:crypto";
import { z } from "zod";
import type { Principal } from "../../core/entities/principal.js";
import { type AppError, internal, unauthorized } from "../../core/errors/app-error.js";
import type { IssuedToken, TokenClaims, TokenService } from "../../core/ports/token-service.js";
import { type Result, err, ok } from "../../core/types/result.js";

/**
 * Compact JWT service, HMAC-SHA256 via node:crypto.
 */

interface JwtConfig {
  readonly secret: string;
  readonly expiresInSeconds: number;
  readonly issuer: string;
  readonly audience: string;
  /** seconds since epoch; overridable for tests */
  readonly now?: (() => number) | undefined;
}

const HEADER = Buffer.from(JSON.stringify({ alg: "HS256", typ: "JWT" })).toString("base64url");

const payloadSchema = z.object({
  sub: z.string().min(1),
  name: z.string(),
  roles: z.array(z.string()),
  iss: z.string(),
  aud: z.string(),
  iat: z.number(),
  exp: z.number(),
});

const signature = (data: string, secret: string): Buffer =>
  createHmac("sha256", secret).update(data).digest();

const parseJson = (text: string): unknown => {
  try {
    return JSON.parse(text);
  } catch {
    return null;
  }
};

export const createTokenService = (config: JwtConfig): TokenService => {
  const now = config.now ?? (() => Math.floor(Date.now() / 1000));

  return {
    async sign(claims: TokenClaims): Promise<Result<IssuedToken, AppError>> {
      try {
        const iat = now();
        const exp = iat + config.expiresInSeconds;
        const body = Buffer.from(
          JSON.stringify({
            sub: claims.sub,
            name: claims.name,
            roles: claims.roles,
            iss: config.issuer,
            aud: config.audience,
            iat,
            exp,
          }),
        ).toString("base64url");
        const data = `${HEADER}.${body}`;
        return ok({
          token: `${data}.${signature(data, config.secret).toString("base64url")}`,
          expiresAt: exp,
        });
      } catch (e: unknown) {
        return err(internal("Failed to sign token", e));
      }
    },

    async verify(token: string): Promise<Result<Principal, AppError>> {
      const parts = token.split(".");
      if (parts.length !== 3) return err(unauthorized("Malformed token"));
      const [header, body, sig] = parts;
      if (header === undefined || body === undefined || sig === undefined) {
        return err(unauthorized("Malformed token"));
      }

      const expected = signature(`${header}.${body}`, config.secret);
      const given = Buffer.from(sig, "base64url");
      if (given.length !== expected.length || !timingSafeEqual(given, expected)) {
        return err(unauthorized("Invalid token signature"));
      }

      const parsed = payloadSchema.safeParse(parseJson(Buffer.from(body, "base64url").toString("utf8")));
      if (!parsed.success) return err(unauthorized("Invalid token payload"));

      const payload = parsed.data;
      if (payload.exp <= now()) return err(unauthorized("Token expired"));
      if (payload.iss !== config.issuer || payload.aud !== config.audience) {
        return err(unauthorized("Token not issued for this service"));
      }

      return ok({ id: payload.sub, userName: payload.name, roles: payload.roles });
    },
  };
};
