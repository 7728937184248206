import { z } from "zod";

/** Credentials for a bearer token; the user name matches case-insensitively */
export const loginDto = z.object({
  userName: z.string().trim().min(1).max(256),
  password: z.string().min(1).max(128),
});

export type LoginDto = z.infer<typeof loginDto>;
