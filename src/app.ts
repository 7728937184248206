import { createAuditService } from "./application/services/audit.service.js";
import { createCredentialService } from "./application/services/credential.service.js";
import { createGuardedMutationRunner } from "./application/services/guarded-mutation.js";
import { type HealthProbe, createHealthService } from "./application/services/health.service.js";
import { createLoginService } from "./application/services/login.service.js";
import { createPasswordHistoryCleanupService } from "./application/services/password-history-cleanup.service.js";
import { createPasswordHistoryService } from "./application/services/password-history.service.js";
import { createPasswordService } from "./application/services/password.service.js";
import { createPermissionService } from "./application/services/permission.service.js";
import { createRoleService } from "./application/services/role.service.js";
import { createUserService } from "./application/services/user.service.js";
import { Role } from "./core/entities/role.js";
import { AccountStatus } from "./core/entities/user.entity.js";
import { type AppError, ErrorCode } from "./core/errors/app-error.js";
import type { AuditLog } from "./core/ports/audit-log.js";
import type { Logger } from "./core/ports/logger.js";
import type { PasswordHasher } from "./core/ports/password-hasher.js";
import type { PasswordHistoryStore } from "./core/ports/password-history.js";
import type { PasswordPolicyConfig } from "./core/ports/password-policy.js";
import type { TokenService } from "./core/ports/token-service.js";
import type { UserRepository } from "./core/ports/user.repository.js";
import { type Result, err, ok } from "./core/types/result.js";
import { createPasswordPolicy } from "./infrastructure/security/password-policy.js";
import { createRouter } from "./presentation/routes/router.js";
import { createKeyedLock } from "./shared/utils/keyed-lock.js";

export const VERSION = "1.0.0";

export interface AppDeps {
  readonly userRepo: UserRepository;
  readonly historyStore: PasswordHistoryStore;
  readonly auditLog: AuditLog;
  readonly passwordHasher: PasswordHasher;
  readonly tokenService: TokenService;
  readonly passwordPolicy: PasswordPolicyConfig;
  readonly historySize: number;
  readonly logger: Logger;
  readonly probes?: readonly HealthProbe[] | undefined;
}

/**
 * Compose the application graph over a set of adapters. Shared by the
 * process entry point and the HTTP tests.
 */
export const createApp = (deps: AppDeps) => {
  const { userRepo, historyStore, passwordHasher, tokenService, logger } = deps;
  const service = (name: string) => logger.child({ service: name });

  const audit = createAuditService({ auditLog: deps.auditLog, logger: service("audit") });
  const permissions = createPermissionService({ userRepo, audit, logger: service("permission") });
  const guarded = createGuardedMutationRunner({
    permissions,
    userRepo,
    logger: service("guarded-mutation"),
  });

  const cleanup = createPasswordHistoryCleanupService({
    historyStore,
    historySize: deps.historySize,
    logger: service("password-history-cleanup"),
  });
  const history = createPasswordHistoryService({
    historyStore,
    cleanup,
    passwordHasher,
    logger: service("password-history"),
  });
  const credentials = createCredentialService({
    userRepo,
    passwordHasher,
    passwordPolicy: createPasswordPolicy(deps.passwordPolicy),
    logger: service("credential"),
  });

  const passwordService = createPasswordService({
    userRepo,
    credentials,
    history,
    guarded,
    audit,
    // ids compare case-insensitively everywhere else
    lock: createKeyedLock((id) => id.toLowerCase()),
    logger: service("password"),
  });
  const userService = createUserService({
    userRepo,
    guarded,
    cleanup,
    audit,
    logger: service("user"),
  });
  const roleService = createRoleService({ userRepo, guarded, audit, logger: service("role") });
  const loginService = createLoginService({
    userRepo,
    passwordHasher,
    tokenService,
    audit,
    logger: service("login"),
  });
  const healthService = createHealthService({
    logger: service("health"),
    version: VERSION,
    probes: deps.probes,
  });

  const router = createRouter({
    userService,
    passwordService,
    roleService,
    loginService,
    auditService: audit,
    healthService,
    tokenService,
    logger,
  });

  return {
    router,
    permissions,
    passwordService,
    userService,
    roleService,
    loginService,
    auditService: audit,
    healthService,
  };
};

export type App = ReturnType<typeof createApp>;

export interface SeedAccount {
  readonly userName: string;
  readonly password: string;
}

/**
 * Create an active SuperAdmin with a password unless the user name is
 * already taken. Resolves to true when an account was created.
 */
export const seedSuperAdmin = async (
  app: App,
  userRepo: UserRepository,
  account: SeedAccount,
  logger: Logger,
): Promise<Result<boolean, AppError>> => {
  const existing = await userRepo.findByUserName(account.userName);
  if (existing.ok) {
    logger.debug("Seed account already present", { userName: account.userName });
    return ok(false);
  }
  if (existing.error.code !== ErrorCode.NOT_FOUND) return existing;

  const created = await userRepo.create({
    userName: account.userName,
    firstName: "Super",
    lastName: "Admin",
    email: `${account.userName.toLowerCase()}@localhost`,
    accountStatus: AccountStatus.ACTIVE,
  });
  if (!created.ok) return created;

  const id = created.value.id;
  const password = await app.passwordService.setPassword(
    id,
    { password: account.password, passwordConfirmed: account.password },
    "bootstrap",
  );
  if (!password.ok) {
    // leave no half-made account behind
    const removed = await userRepo.delete(id);
    if (!removed.ok) return err(removed.error);
    return password;
  }

  const role = await userRepo.addRole(id, Role.SUPER_ADMIN);
  if (!role.ok) return role;

  logger.info("Seeded SuperAdmin account", { userId: id, userName: account.userName });
  return ok(true);
};
