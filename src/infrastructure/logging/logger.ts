import type { LogLevel, Logger } from "../../core/ports/logger.js";
import { formatLogEntry } from "../../shared/log-format.js";

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  fatal: 4,
};

export type LogFormat = "pretty" | "json";

/** Where formatted lines go. `isError` is true for warn and above. */
export type LogSink = (line: string, isError: boolean) => void;

const processSink: LogSink = (line, isError) => {
  if (isError) {
    process.stderr.write(line);
  } else {
    process.stdout.write(line);
  }
};

/** Errors are not enumerable; pull out the useful parts. */
const serialise = (meta: Record<string, unknown>): Record<string, unknown> => {
  const out: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(meta)) {
    out[key] = value instanceof Error ? { name: value.name, message: value.message } : value;
  }
  return out;
};

/**
 * One JSON object per line, for log aggregators.
 */
const formatJsonEntry = (level: LogLevel, msg: string, meta: Record<string, unknown>): string => {
  const entry: Record<string, unknown> = {
    level,
    msg,
    time: new Date().toISOString(),
    ...serialise(meta),
  };
  return `${JSON.stringify(entry)}\n`;
};

export interface LoggerOptions {
  readonly level?: LogLevel | undefined;
  readonly format?: LogFormat | undefined;
  readonly bindings?: Record<string, unknown> | undefined;
  readonly sink?: LogSink | undefined;
}

/**
 * Pretty or JSON line logger writing to stdout.
 * - "pretty": ANSI-coloured human-readable output (development)
 * - "json": structured JSON lines (production)
 */
export const createLogger = (options: LoggerOptions = {}): Logger => {
  const minLevel = options.level ?? "info";
  const format = options.format ?? "pretty";
  const bindings = options.bindings ?? {};
  const sink = options.sink ?? processSink;
  const minPriority = LEVEL_PRIORITY[minLevel];

  const formatter =
    format === "json"
      ? formatJsonEntry
      : (level: LogLevel, msg: string, meta: Record<string, unknown>) =>
          formatLogEntry(level, msg, serialise(meta));

  const write = (level: LogLevel, msg: string, meta?: Record<string, unknown>): void => {
    if (LEVEL_PRIORITY[level] < minPriority) return;
    sink(formatter(level, msg, { ...bindings, ...meta }), LEVEL_PRIORITY[level] >= LEVEL_PRIORITY.warn);
  };

  return {
    debug: (msg, meta) => write("debug", msg, meta),
    info: (msg, meta) => write("info", msg, meta),
    warn: (msg, meta) => write("warn", msg, meta),
    error: (msg, meta) => write("error", msg, meta),
    fatal: (msg, meta) => write("fatal", msg, meta),
    child: (extra) =>
      createLogger({ level: minLevel, format, sink, bindings: { ...bindings, ...extra } }),
  };
};

/** Swallows everything; handy in tests */
export const createSilentLogger = (): Logger => createLogger({ level: "fatal", sink: () => undefined });
