import type { ZodType, ZodTypeDef } from "zod";
import { type AppError, validation } from "../../core/errors/app-error.js";
import { type Result, err, ok } from "../../core/types/result.js";

/**
 * Validate an unknown body against a Zod schema.
 * Returns a typed Result. Never throws.
 */
export const validateBody = <T>(
  schema: ZodType<T, ZodTypeDef, unknown>,
  body: unknown,
): Result<T, AppError> => {
  const result = schema.safeParse(body);
  if (!result.success) {
    const issues = result.error.flatten();
    return err(validation({ formErrors: issues.formErrors, fieldErrors: issues.fieldErrors }));
  }
  return ok(result.data);
};
