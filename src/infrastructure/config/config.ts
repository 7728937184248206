import { z } from "zod";
import { printConfigError } from "../../shared/cli.js";

/**
 * Application config, validated at boot with zod.
 * Fails fast with clear messages if env vars are missing.
 */
const flag = (fallback: "true" | "false") =>
  z
    .enum(["true", "false"])
    .default(fallback)
    .transform((v) => v === "true");

const configSchema = z.object({
  env: z.enum(["development", "production", "test"]).default("development"),
  port: z.coerce.number().int().min(1).max(65535).default(3000),
  host: z.string().min(1).default("0.0.0.0"),

  jwt: z.object({
    secret: z.string().min(32),
    expiresIn: z
      .string()
      .regex(/^\d+[smhd]$/, "must look like 30s, 15m, 1h or 7d")
      .default("1h"),
    issuer: z.string().min(1).default("identity-service"),
    audience: z.string().min(1).default("identity-service-clients"),
  }),

  log: z.object({
    level: z.enum(["debug", "info", "warn", "error", "fatal"]).default("info"),
    format: z.enum(["pretty", "json"]).default("pretty"),
  }),

  database: z.object({
    url: z
      .string()
      .regex(/^mssql:\/\//, "only mssql:// URLs are supported")
      .optional(),
    path: z.string().min(1).default("data/identity.sqlite"),
  }),

  passwordPolicy: z.object({
    minLength: z.coerce.number().int().positive().default(8),
    requireUppercase: flag("true"),
    requireLowercase: flag("true"),
    requireDigit: flag("true"),
    requireSpecial: flag("true"),
    historySize: z.coerce.number().int().min(1).default(5),
  }),

  seed: z
    .object({
      userName: z.string().min(1),
      password: z.string().min(1),
    })
    .optional(),
});

export type AppConfig = z.infer<typeof configSchema>;

export type Env = Readonly<Record<string, string | undefined>>;

/** Empty strings count as unset so defaults apply */
const read = (env: Env, key: string): string | undefined => {
  const value = env[key];
  return value === undefined || value === "" ? undefined : value;
};

export const parseConfig = (env: Env) =>
  configSchema.safeParse({
    env: read(env, "NODE_ENV"),
    port: read(env, "PORT"),
    host: read(env, "HOST"),
    jwt: {
      secret: read(env, "JWT_SECRET"),
      expiresIn: read(env, "JWT_EXPIRES_IN"),
      issuer: read(env, "JWT_ISSUER"),
      audience: read(env, "JWT_AUDIENCE"),
    },
    log: {
      level: read(env, "LOG_LEVEL"),
      format: read(env, "LOG_FORMAT"),
    },
    database: {
      url: read(env, "DATABASE_URL"),
      path: read(env, "DATABASE_PATH"),
    },
    passwordPolicy: {
      minLength: read(env, "PASSWORD_MIN_LENGTH"),
      requireUppercase: read(env, "PASSWORD_REQUIRE_UPPERCASE"),
      requireLowercase: read(env, "PASSWORD_REQUIRE_LOWERCASE"),
      requireDigit: read(env, "PASSWORD_REQUIRE_DIGIT"),
      requireSpecial: read(env, "PASSWORD_REQUIRE_SPECIAL"),
      historySize: read(env, "PASSWORD_HISTORY_SIZE"),
    },
    seed:
      read(env, "SEED_SUPER_ADMIN_USERNAME") !== undefined
        ? {
            userName: read(env, "SEED_SUPER_ADMIN_USERNAME"),
            password: read(env, "SEED_SUPER_ADMIN_PASSWORD"),
          }
        : undefined,
  });

export const loadConfig = (env: Env = process.env): AppConfig => {
  const result = parseConfig(env);

  if (!result.success) {
    const fieldErrors: Record<string, string[]> = {};
    for (const issue of result.error.issues) {
      const field = issue.path.join(".");
      fieldErrors[field] = [...(fieldErrors[field] ?? []), issue.message];
    }
    printConfigError(fieldErrors);
    process.exit(1);
  }

  return result.data;
};

/** "1h" → 3600 */
export const durationToSeconds = (value: string): number => {
  const match = /^(\d+)([smhd])$/.exec(value);
  if (match === null) return 3600;
  const amount = Number(match[1]);
  switch (match[2]) {
    case "s":
      return amount;
    case "m":
      return amount * 60;
    case "h":
      return amount * 3600;
    default:
      return amount * 86_400;
  }
};
