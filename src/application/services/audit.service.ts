import { type AppError, auditLogNotFound } from "../../core/errors/app-error.js";
import { ensureNotBlank } from "../../core/errors/argument-error.js";
import type {
  AuditEntry,
  AuditLog,
  AuditQueryOptions,
  NewAuditEntry,
} from "../../core/ports/audit-log.js";
import type { Logger } from "../../core/ports/logger.js";
import { type Result, err, ok } from "../../core/types/result.js";

export interface AuditService {
  /**
   * Append an entry. A failed append is logged and does not fail the
   * operation being audited.
   */
  record(entry: NewAuditEntry): Promise<void>;
  list(query: AuditQueryOptions): Promise<Result<readonly AuditEntry[], AppError>>;
  remove(id: string): Promise<Result<void, AppError>>;
}

interface Deps {
  readonly auditLog: AuditLog;
  readonly logger: Logger;
}

export const createAuditService = (deps: Deps): AuditService => {
  const { auditLog, logger } = deps;

  return {
    async record(entry) {
      const result = await auditLog.append(entry);
      if (!result.ok) {
        logger.warn("Audit append failed", {
          action: entry.action,
          resourceId: entry.resourceId,
          error: result.error.message,
        });
      }
    },

    list(query) {
      return auditLog.query(query);
    },

    remove(id) {
      ensureNotBlank(id, "id");
      return auditLog.delete(id).then((result) => {
        if (!result.ok) return result;
        if (!result.value) return err(auditLogNotFound());
        logger.info("Audit entry deleted", { auditId: id });
        return ok(undefined);
      });
    },
  };
};
