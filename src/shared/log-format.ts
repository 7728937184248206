import type { LogLevel } from "../core/ports/logger.js";
import {
  bgCyan,
  bgGreen,
  bgRed,
  bgYellow,
  bold,
  cyan,
  dim,
  gray,
  green,
  red,
  white,
  yellow,
} from "./ansi.js";

const clock = (d: Date = new Date()): string => {
  const two = (n: number) => String(n).padStart(2, "0");
  return `${two(d.getHours())}:${two(d.getMinutes())}:${two(d.getSeconds())}.${String(
    d.getMilliseconds(),
  ).padStart(3, "0")}`;
};

const LEVEL_BADGES: Record<LogLevel, string> = {
  debug: gray("DBG"),
  info: green("INF"),
  warn: yellow("WRN"),
  error: red("ERR"),
  fatal: bgRed("FTL"),
};

const METHOD_BADGES: Record<string, string> = {
  GET: bgGreen("GET"),
  POST: bgCyan("POST"),
  PUT: bgYellow("PUT"),
  PATCH: bgYellow("PATCH"),
  DELETE: bgRed("DEL"),
};

const statusText = (status: number): string => {
  const text = bold(String(status));
  if (status >= 500) return red(text);
  if (status >= 400) return yellow(text);
  if (status >= 300) return cyan(text);
  return green(text);
};

const durationText = (ms: number): string => {
  const text = `${ms}ms`;
  if (ms >= 200) return red(text);
  return ms >= 50 ? yellow(text) : green(text);
};

const metaValue = (v: unknown): string =>
  typeof v === "object" && v !== null ? JSON.stringify(v) : String(v);

const formatMeta = (meta: Record<string, unknown>): string => {
  const parts: string[] = [];
  for (const [k, v] of Object.entries(meta)) {
    if (v === undefined) continue;
    parts.push(`${dim(`${k}=`)}${white(metaValue(v))}`);
  }
  return parts.length === 0 ? "" : ` ${parts.join(" ")}`;
};

/**
 * One pretty log line:
 *
 *   INF 12:34:56.789 Password updated userId=3f2a… service=password
 */
export const formatLogEntry = (
  level: LogLevel,
  msg: string,
  meta: Record<string, unknown>,
): string => `  ${LEVEL_BADGES[level]} ${dim(gray(clock()))} ${white(msg)}${formatMeta(meta)}\n`;

export interface AccessLogEntry {
  readonly method: string;
  readonly path: string;
  readonly status: number;
  readonly durationMs: number;
  readonly ip: string;
  readonly requestId: string;
}

/** Pretty access line; json mode logs the same fields through the logger */
export const formatAccessLog = (entry: AccessLogEntry): string => {
  const method = METHOD_BADGES[entry.method] ?? white(entry.method);
  const trailer = dim(gray(`ip=${entry.ip} rid=${entry.requestId.slice(0, 8)}`));
  return `  ${dim("←")} ${dim(gray(clock()))} ${method} ${statusText(entry.status)} ${white(entry.path)} ${durationText(entry.durationMs)}  ${trailer}\n`;
};
