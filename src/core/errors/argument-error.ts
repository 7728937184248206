/**
 * Thrown for contract violations: a required argument is missing or
 * blank. Never used for business outcomes, which travel as Result.
 */
export class ArgumentError extends Error {
  readonly paramName: string;

  constructor(paramName: string, message?: string) {
    super(message ?? `Value cannot be null or empty. (Parameter '${paramName}')`);
    this.name = "ArgumentError";
    this.paramName = paramName;
  }
}

export const isBlank = (value: string | null | undefined): boolean =>
  value === null || value === undefined || value.trim().length === 0;

export function ensureNotBlank(
  value: string | null | undefined,
  paramName: string,
): asserts value is string {
  if (isBlank(value)) {
    throw new ArgumentError(paramName);
  }
}

export function ensureDefined<T>(
  value: T | null | undefined,
  paramName: string,
): asserts value is T {
  if (value === null || value === undefined) {
    throw new ArgumentError(paramName, `Value cannot be null. (Parameter '${paramName}')`);
  }
}
