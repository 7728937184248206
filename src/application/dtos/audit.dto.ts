import { z } from "zod";
import { AuditAction } from "../../core/ports/audit-log.js";

const actions = Object.values(AuditAction);

export const auditQueryDto = z.object({
  userId: z.string().min(1).optional(),
  action: z
    .string()
    .refine((v): v is AuditAction => actions.some((a) => a === v), { message: "Unknown action" })
    .optional(),
  since: z.coerce.number().int().nonnegative().optional(),
  limit: z.coerce.number().int().min(1).max(500).default(50),
});

export type AuditQueryDto = z.infer<typeof auditQueryDto>;
