import { z } from "zod";

/** The role name is checked against the role set by the service */
export const assignRoleDto = z.object({
  roleName: z.string().trim().min(1).max(32),
});

export type AssignRoleDto = z.infer<typeof assignRoleDto>;
