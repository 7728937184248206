import { type SeedAccount, createApp, seedSuperAdmin } from "./app.js";
import type { HealthProbe } from "./application/services/health.service.js";
import { internal } from "./core/errors/app-error.js";
import type { AuditLog } from "./core/ports/audit-log.js";
import type { Logger } from "./core/ports/logger.js";
import type { PasswordHistoryStore } from "./core/ports/password-history.js";
import type { UserRepository } from "./core/ports/user.repository.js";
import { err, ok, tryCatch, tryCatchAsync } from "./core/types/result.js";
import { type AppConfig, durationToSeconds, loadConfig } from "./infrastructure/config/config.js";
import {
  connectMssql,
  createMssqlAuditLog,
  createMssqlPasswordHistory,
  createMssqlUserRepository,
  mssqlMigrateUp,
} from "./infrastructure/database/mssql/index.js";
import { migrateUp } from "./infrastructure/database/migrations/runner.js";
import { createSqliteAuditLog } from "./infrastructure/database/sqlite-audit-log.js";
import { createSqlitePasswordHistory } from "./infrastructure/database/sqlite-password-history.js";
import { createSqliteUserRepository } from "./infrastructure/database/sqlite-user.repository.js";
import { openSqlite } from "./infrastructure/database/sqlite.js";
import { createLogger } from "./infrastructure/logging/logger.js";
import { createPasswordHasher } from "./infrastructure/security/password-hasher.js";
import { createTokenService } from "./infrastructure/security/token-service.js";
import { createServer } from "./presentation/server.js";
import { printShutdown, printStartupBanner } from "./shared/cli.js";

interface Store {
  readonly kind: "sqlite" | "mssql";
  readonly userRepo: UserRepository;
  readonly historyStore: PasswordHistoryStore;
  readonly auditLog: AuditLog;
  readonly probe: HealthProbe;
  close(): Promise<void>;
}

const openStore = async (config: AppConfig, logger: Logger): Promise<Store> => {
  const url = config.database.url;

  if (url !== undefined) {
    const pool = await connectMssql(url);
    logger.info("SQL Server pool connected");
    await mssqlMigrateUp(pool, logger);
    return {
      kind: "mssql",
      userRepo: createMssqlUserRepository(pool),
      historyStore: createMssqlPasswordHistory(pool),
      auditLog: createMssqlAuditLog(pool),
      probe: {
        name: "database",
        run: async () => {
          const result = await tryCatchAsync(() => pool.request().query("SELECT 1 AS ok"));
          return result.ok ? ok(undefined) : err(internal("SQL Server unreachable", result.error));
        },
      },
      close: () => pool.close(),
    };
  }

  const db = openSqlite(config.database.path);
  logger.info("SQLite database opened", { path: config.database.path });
  migrateUp(db, logger);
  return {
    kind: "sqlite",
    userRepo: createSqliteUserRepository(db),
    historyStore: createSqlitePasswordHistory(db),
    auditLog: createSqliteAuditLog(db),
    probe: {
      name: "database",
      run: async () => {
        const result = tryCatch(() => db.prepare("SELECT 1").get());
        return result.ok ? ok(undefined) : err(internal("SQLite unavailable", result.error));
      },
    },
    close: async () => {
      db.close();
    },
  };
};

/**
 * Bootstrap: compose the dependency graph, then start the server.
 * Single entry point, fail-fast on misconfiguration.
 */
const bootstrap = async () => {
  const bootStart = performance.now();

  // 1. Config (validated, fails fast)
  const config = loadConfig();

  // 2. Infrastructure
  const logger = createLogger({ level: config.log.level, format: config.log.format });
  const passwordHasher = createPasswordHasher();
  const tokenService = createTokenService({
    secret: config.jwt.secret,
    expiresInSeconds: durationToSeconds(config.jwt.expiresIn),
    issuer: config.jwt.issuer,
    audience: config.jwt.audience,
  });

  // 3. Persistence + migrations
  const store = await openStore(config, logger);

  // 4. Application graph
  const { passwordPolicy } = config;
  const app = createApp({
    userRepo: store.userRepo,
    historyStore: store.historyStore,
    auditLog: store.auditLog,
    passwordHasher,
    tokenService,
    passwordPolicy,
    historySize: passwordPolicy.historySize,
    logger,
    probes: [store.probe],
  });

  // 5. Optional bootstrap account
  if (config.seed !== undefined) {
    const account: SeedAccount = config.seed;
    const seedLogger = logger.child({ service: "seed" });
    const seeded = await seedSuperAdmin(app, store.userRepo, account, seedLogger);
    if (!seeded.ok) {
      seedLogger.error("Seeding SuperAdmin failed", {
        error: seeded.error.message,
        errors: seeded.error.errors,
      });
    }
  }

  // 6. Start
  const server = createServer({ config, logger, router: app.router });
  await server.start();

  printStartupBanner({
    config,
    bootTimeMs: performance.now() - bootStart,
    databaseKind: store.kind,
  });

  // 7. Graceful shutdown
  let stopping = false;
  const shutdown = async (signal: string): Promise<void> => {
    if (stopping) return;
    stopping = true;
    printShutdown(signal);
    await server.stop();
    await store.close();
    process.exit(0);
  };

  const onSignal = (signal: string) => {
    shutdown(signal).catch((e: unknown) => {
      logger.fatal("Shutdown failed", { error: e instanceof Error ? e : String(e) });
      process.exit(1);
    });
  };
  process.on("SIGINT", () => onSignal("SIGINT"));
  process.on("SIGTERM", () => onSignal("SIGTERM"));

  // 8. Unhandled rejection safety net
  process.on("unhandledRejection", (reason) => {
    logger.fatal("Unhandled promise rejection", {
      error: reason instanceof Error ? reason.message : String(reason),
      stack: reason instanceof Error ? reason.stack : undefined,
    });
  });
};

bootstrap().catch((e: unknown) => {
  const detail = e instanceof Error ? (e.stack ?? e.message) : String(e);
  process.stderr.write(`Failed to start: ${detail}\n`);
  process.exit(1);
});
