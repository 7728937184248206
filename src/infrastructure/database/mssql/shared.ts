/** SQL Server returns BIGINT columns as strings */
export const toNumber = (value: number | string): number =>
  typeof value === "number" ? value : Number(value);

export const isUniqueViolation = (e: unknown): boolean =>
  e instanceof Error &&
  (e.message.includes("duplicate key") || e.message.includes("Violation of UNIQUE KEY"));
