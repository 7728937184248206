export type LogLevel = "debug" | "info" | "warn" | "error" | "fatal";

/**
 * Port: Logger. `child` returns a logger whose entries carry the given
 * bindings in addition to their own meta.
 */
export interface Logger {
  debug(msg: string, meta?: Record<string, unknown>): void;
  info(msg: string, meta?: Record<string, unknown>): void;
  warn(msg: string, meta?: Record<string, unknown>): void;
  error(msg: string, meta?: Record<string, unknown>): void;
  fatal(msg: string, meta?: Record<string, unknown>): void;
  child(bindings: Record<string, unknown>): Logger;
}
