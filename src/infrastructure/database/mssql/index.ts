/**
 * SQL Server (mssql) adapters: barrel export.
 */
import sql from "mssql";

export { createMssqlUserRepository } from "./mssql-user.repository.js";
export { createMssqlAuditLog } from "./mssql-audit-log.js";
export { createMssqlPasswordHistory } from "./mssql-password-history.js";
export { mssqlMigrateUp, mssqlMigrateDown } from "./migrations.js";

/** Connect a pool from an mssql:// URL */
export const connectMssql = async (url: string): Promise<sql.ConnectionPool> => {
  const pool = new sql.ConnectionPool(url);
  return pool.connect();
};
