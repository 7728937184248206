import type { AppConfig } from "../../infrastructure/config/config.js";

const BASE_HEADERS: Readonly<Record<string, string>> = {
  "X-Content-Type-Options": "nosniff",
  "X-Frame-Options": "DENY",
  "X-XSS-Protection": "0",
  "Content-Security-Policy": "default-src 'none'; frame-ancestors 'none'",
  "Referrer-Policy": "no-referrer",
  // responses carry account data and tokens
  "Cache-Control": "no-store",
  Pragma: "no-cache",
};

/**
 * Headers set on every response. HSTS is only sent in production, where
 * the service sits behind TLS.
 */
export const securityHeaders = (env: AppConfig["env"]): Record<string, string> =>
  env === "production"
    ? { ...BASE_HEADERS, "Strict-Transport-Security": "max-age=63072000; includeSubDomains" }
    : { ...BASE_HEADERS };
