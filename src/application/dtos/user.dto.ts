import { z } from "zod";
import { AccountStatus } from "../../core/entities/user.entity.js";

const name = z.string().trim().min(1).max(100);

export const createUserDto = z.object({
  userName: z
    .string()
    .trim()
    .min(3)
    .max(256)
    .regex(/^[A-Za-z0-9._@+-]+$/, "May only contain letters, digits and ._@+-"),
  firstName: name,
  lastName: name,
  email: z.string().trim().toLowerCase().email().max(256),
  phoneNumber: z.string().trim().max(32).optional(),
});

/** Full replacement of the profile fields */
export const updateUserDto = createUserDto.extend({
  phoneNumber: z.string().trim().max(32).nullable().optional(),
});

export const listUsersDto = z.object({
  cursor: z.string().optional(),
  limit: z.coerce.number().int().min(1).max(100).default(20),
  accountStatus: z.coerce
    .number()
    .int()
    .refine((v): v is AccountStatus => v === AccountStatus.INACTIVE || v === AccountStatus.ACTIVE, {
      message: "Must be 0 (inactive) or 1 (active)",
    })
    .optional(),
});

export type CreateUserDto = z.infer<typeof createUserDto>;
export type UpdateUserDto = z.infer<typeof updateUserDto>;
export type ListUsersDto = z.infer<typeof listUsersDto>;
