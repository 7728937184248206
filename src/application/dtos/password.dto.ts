import { z } from "zod";

/**
 * Password bodies only check shape here. Missing or blank fields reach
 * the service, which rejects them as argument errors (400).
 */
const secret = z.string().max(128).nullish();

export const setPasswordDto = z.object({
  password: secret,
  passwordConfirmed: secret,
});

export const updatePasswordDto = z.object({
  currentPassword: secret,
  newPassword: secret,
});

export type SetPasswordDto = z.infer<typeof setPasswordDto>;
export type UpdatePasswordDto = z.infer<typeof updatePasswordDto>;
