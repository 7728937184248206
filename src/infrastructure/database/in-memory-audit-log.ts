import type { AppError } from "../../core/errors/app-error.js";
import type {
  AuditEntry,
  AuditLog,
  AuditQueryOptions,
  NewAuditEntry,
} from "../../core/ports/audit-log.js";
import { type Result, ok } from "../../core/types/result.js";
import { generateId } from "../../shared/utils/id.js";

export const createInMemoryAuditLog = (now: () => number = Date.now): AuditLog => {
  const entries: AuditEntry[] = [];

  return {
    async append(entry: NewAuditEntry): Promise<Result<AuditEntry, AppError>> {
      const stored: AuditEntry = { ...entry, id: generateId(), timestamp: now() };
      entries.push(stored);
      return ok(stored);
    },

    async query(options: AuditQueryOptions): Promise<Result<readonly AuditEntry[], AppError>> {
      const matching = entries.filter(
        (e) =>
          (options.userId === undefined || e.userId === options.userId) &&
          (options.action === undefined || e.action === options.action) &&
          (options.since === undefined || e.timestamp >= options.since),
      );
      // newest first; insertion order breaks ties
      return ok(matching.reverse().slice(0, options.limit ?? 50));
    },

    async delete(id: string): Promise<Result<boolean, AppError>> {
      const index = entries.findIndex((e) => e.id === id);
      if (index === -1) return ok(false);
      entries.splice(index, 1);
      return ok(true);
    },
  };
};
