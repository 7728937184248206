import { AccountStatus, hasPassword } from "../../core/entities/user.entity.js";
import {
  type AppError,
  ErrorCode,
  invalidCredentials,
  notActivated,
} from "../../core/errors/app-error.js";
import { AuditAction } from "../../core/ports/audit-log.js";
import type { Logger } from "../../core/ports/logger.js";
import type { PasswordHasher } from "../../core/ports/password-hasher.js";
import type { IssuedToken, TokenService } from "../../core/ports/token-service.js";
import type { UserRepository } from "../../core/ports/user.repository.js";
import { type Result, err, ok } from "../../core/types/result.js";
import type { LoginDto } from "../dtos/login.dto.js";
import type { AuditService } from "./audit.service.js";

export interface LoginService {
  login(dto: LoginDto, ip?: string): Promise<Result<IssuedToken, AppError>>;
}

interface Deps {
  readonly userRepo: UserRepository;
  readonly passwordHasher: PasswordHasher;
  readonly tokenService: TokenService;
  readonly audit: AuditService;
  readonly logger: Logger;
}

export const createLoginService = (deps: Deps): LoginService => {
  const { userRepo, passwordHasher, tokenService, audit, logger } = deps;

  const rejected = async (
    userName: string,
    userId: string | null,
    ip: string,
    error: AppError,
  ): Promise<Result<IssuedToken, AppError>> => {
    await audit.record({
      userId,
      action: AuditAction.USER_LOGIN_FAILED,
      resource: "session",
      resourceId: userId,
      detail: userName,
      ip,
    });
    return err(error);
  };

  return {
    async login(dto, ip = "unknown") {
      logger.info("Login attempt", { userName: dto.userName });

      const found = await userRepo.findByUserName(dto.userName);
      if (!found.ok) {
        if (found.error.code !== ErrorCode.NOT_FOUND) return found;
        logger.warn("Login failed: user not found", { userName: dto.userName });
        return rejected(dto.userName, null, ip, invalidCredentials(ErrorCode.UNAUTHORIZED));
      }

      const user = found.value;
      if (!hasPassword(user)) {
        logger.warn("Login failed: no password set", { userId: user.id });
        return rejected(dto.userName, user.id, ip, invalidCredentials(ErrorCode.UNAUTHORIZED));
      }

      const verified = await passwordHasher.verify(dto.password, user.passwordHash);
      if (!verified.ok) return verified;
      if (!verified.value) {
        logger.warn("Login failed: invalid password", { userId: user.id });
        return rejected(dto.userName, user.id, ip, invalidCredentials(ErrorCode.UNAUTHORIZED));
      }

      if (user.accountStatus !== AccountStatus.ACTIVE) {
        logger.warn("Login blocked: account not activated", { userId: user.id });
        return rejected(dto.userName, user.id, ip, notActivated(ErrorCode.FORBIDDEN));
      }

      const roles = await userRepo.getRoles(user.id);
      if (!roles.ok) return roles;

      const issued = await tokenService.sign({ sub: user.id, name: user.userName, roles: roles.value });
      if (!issued.ok) return issued;

      logger.info("User logged in", { userId: user.id });
      await audit.record({
        userId: user.id,
        action: AuditAction.USER_LOGGED_IN,
        resource: "session",
        resourceId: user.id,
        detail: null,
        ip,
      });
      return ok(issued.value);
    },
  };
};
