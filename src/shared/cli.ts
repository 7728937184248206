import { networkInterfaces } from "node:os";
import type { AppConfig } from "../infrastructure/config/config.js";
import {
  bgCyan,
  bgGreen,
  bgMagenta,
  bgYellow,
  bold,
  cyan,
  dim,
  gray,
  green,
  magenta,
  red,
  white,
  yellow,
} from "./ansi.js";

// ── Helpers ─────────────────────────────────────────────────────────────

const pad = (s: string, len: number): string => s.padEnd(len);

const formatUptime = (ms: number): string => {
  if (ms < 1000) return `${Math.round(ms)}ms`;
  return `${(ms / 1000).toFixed(2)}s`;
};

const envBadge = (env: AppConfig["env"]): string => {
  switch (env) {
    case "production":
      return bgGreen("PRODUCTION");
    case "development":
      return bgCyan("DEVELOPMENT");
    case "test":
      return bgYellow("TEST");
  }
};

const methodColor = (method: string): string => {
  switch (method) {
    case "GET":
      return green(bold(pad(method, 7)));
    case "POST":
      return cyan(bold(pad(method, 7)));
    case "PATCH":
    case "PUT":
      return yellow(bold(pad(method, 7)));
    case "DELETE":
      return red(bold(pad(method, 7)));
    default:
      return white(bold(pad(method, 7)));
  }
};

// ── Route table ─────────────────────────────────────────────────────────

interface RouteInfo {
  readonly method: string;
  readonly path: string;
  readonly auth: boolean;
  readonly description: string;
}

const routes: readonly RouteInfo[] = [
  { method: "GET", path: "/health", auth: false, description: "Health check" },
  { method: "GET", path: "/readiness", auth: false, description: "Readiness with store probe" },
  { method: "POST", path: "/api/v1/login/tokens", auth: false, description: "Issue token" },
  { method: "POST", path: "/api/v1/users", auth: false, description: "Create user" },
  { method: "GET", path: "/api/v1/users", auth: true, description: "List users" },
  { method: "GET", path: "/api/v1/users/state-metrics", auth: true, description: "Account counts" },
  { method: "GET", path: "/api/v1/users/:id", auth: true, description: "Get user" },
  { method: "PUT", path: "/api/v1/users/:id", auth: true, description: "Update user" },
  { method: "DELETE", path: "/api/v1/users/:id", auth: true, description: "Delete user" },
  { method: "PATCH", path: "/api/v1/users/:id/activate", auth: true, description: "Activate" },
  { method: "PATCH", path: "/api/v1/users/:id/deactivate", auth: true, description: "Deactivate" },
  { method: "PUT", path: "/api/v1/users/:id/password", auth: false, description: "Set first password" },
  { method: "PATCH", path: "/api/v1/users/:id/password", auth: true, description: "Change password" },
  { method: "POST", path: "/api/v1/users/:id/roles", auth: true, description: "Assign role" },
  { method: "DELETE", path: "/api/v1/users/:id/roles/:role", auth: true, description: "Remove role" },
  { method: "GET", path: "/api/v1/roles", auth: true, description: "List roles" },
  { method: "GET", path: "/api/v1/audit-logs", auth: true, description: "Audit trail" },
  { method: "DELETE", path: "/api/v1/audit-logs/:id", auth: true, description: "Delete audit entry" },
];

const logo = (): string => {
  const lines = [
    `${bold(cyan("  ┌─────────────────────────────────────────┐"))}`,
    `${bold(cyan("  │"))}   ${bold(white("identity-service"))}  ${dim(gray("v1.0.0"))}               ${bold(cyan("│"))}`,
    `${bold(cyan("  │"))}   ${dim(gray("Users, roles and password lifecycle"))}   ${bold(cyan("│"))}`,
    `${bold(cyan("  └─────────────────────────────────────────┘"))}`,
  ];
  return lines.join("\n");
};

const getLocalIp = (): string => {
  const nets = networkInterfaces();
  for (const entries of Object.values(nets)) {
    for (const net of entries ?? []) {
      if (net.family === "IPv4" && !net.internal) {
        return net.address;
      }
    }
  }
  return "0.0.0.0";
};

// ── Public API ──────────────────────────────────────────────────────────

interface StartupInfo {
  readonly config: AppConfig;
  readonly bootTimeMs: number;
  readonly databaseKind: "sqlite" | "mssql";
}

/** Printed once the listener is bound. */
export const printStartupBanner = (info: StartupInfo): void => {
  const { config, bootTimeMs } = info;

  const localUrl = `http://localhost:${config.port}`;
  const lines: string[] = [];

  lines.push("");
  lines.push(logo());
  lines.push("");
  lines.push(`  ${envBadge(config.env)}  ${dim("booted in")} ${bold(green(formatUptime(bootTimeMs)))}`);
  lines.push("");
  lines.push(`  ${bold(white("→"))} ${dim("Local:")}    ${bold(cyan(localUrl))}`);
  if (config.host === "0.0.0.0") {
    lines.push(`  ${bold(white("→"))} ${dim("Network:")}  ${bold(cyan(`http://${getLocalIp()}:${config.port}`))}`);
  }
  lines.push("");
  lines.push(`  ${gray("├─")} ${dim("PID")}           ${white(String(process.pid))}`);
  lines.push(`  ${gray("├─")} ${dim("Runtime")}       ${magenta(`Node.js ${process.version}`)}`);
  lines.push(`  ${gray("├─")} ${dim("Database")}      ${white(info.databaseKind)}`);
  lines.push(`  ${gray("├─")} ${dim("History")}       ${white(`${config.passwordPolicy.historySize} hashes/user`)}`);
  lines.push(`  ${gray("└─")} ${dim("Log level")}     ${white(config.log.level)}`);
  lines.push("");

  lines.push(`  ${bold(white("Routes"))} ${dim(`(${routes.length})`)}`);
  lines.push(`  ${gray("─".repeat(70))}`);
  for (const route of routes) {
    const lock = route.auth ? yellow("🔒") : green("  ");
    lines.push(`  ${lock} ${methodColor(route.method)} ${pad(route.path, 36)} ${dim(gray(route.description))}`);
  }
  lines.push(`  ${gray("─".repeat(70))}`);
  lines.push("");
  lines.push(`  ${dim("press")} ${bold(white("Ctrl+C"))} ${dim("to stop")}`);
  lines.push("");

  process.stdout.write(`${lines.join("\n")}\n`);
};

export const printShutdown = (signal: string): void => {
  process.stdout.write(
    `\n  ${yellow("⏻")} ${dim("Received")} ${bold(white(signal))}${dim(", shutting down…")}\n\n`,
  );
};

/** One line per offending field, written to stderr. */
export const printConfigError = (errors: Record<string, readonly string[]>): void => {
  const lines: string[] = [];

  lines.push("");
  lines.push(`  ${bgMagenta("CONFIG ERROR")}  ${dim("Invalid configuration detected")}`);
  lines.push("");

  for (const [field, messages] of Object.entries(errors)) {
    for (const msg of messages) {
      lines.push(`  ${red("✗")} ${bold(white(field))} ${dim("→")} ${red(msg)}`);
    }
  }

  lines.push("");
  lines.push(`  ${dim("Hint: JWT_SECRET is required and must be at least 32 characters.")}`);
  lines.push("");

  process.stderr.write(`${lines.join("\n")}\n`);
};
