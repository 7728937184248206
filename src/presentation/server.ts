import {
  type IncomingMessage,
  type Server,
  type ServerResponse,
  createServer as createHttpServer,
} from "node:http";
import { badRequest, internal } from "../core/errors/app-error.js";
import { ArgumentError } from "../core/errors/argument-error.js";
import type { Logger } from "../core/ports/logger.js";
import { brand } from "../core/types/brand.js";
import type { AppConfig } from "../infrastructure/config/config.js";
import { formatAccessLog } from "../shared/log-format.js";
import { generateId } from "../shared/utils/id.js";
import type { RequestContext } from "./context.js";
import { errorResponse } from "./handlers/response.js";
import { securityHeaders } from "./middleware/security-headers.js";
import type { Router } from "./routes/router.js";

interface ServerDeps {
  readonly config: Pick<AppConfig, "host" | "port" | "log" | "env">;
  readonly logger: Logger;
  readonly router: Router;
  /** Where pretty access-log lines go; stdout by default */
  readonly accessLog?: ((line: string) => void) | undefined;
}

const MAX_BODY_BYTES = 1_048_576; // 1 MiB

/**
 * Extract pathname from a full URL string WITHOUT allocating a URL object.
 */
const extractPath = (url: string): string => {
  // url format: "http://host:port/path?query"
  const start = url.indexOf("/", url.indexOf("//") + 2);
  if (start === -1) return "/";
  const qIdx = url.indexOf("?", start);
  return qIdx === -1 ? url.substring(start) : url.substring(start, qIdx);
};

class PayloadTooLargeError extends Error {
  constructor() {
    super("Request body too large");
    this.name = "PayloadTooLargeError";
  }
}

const readBody = async (incoming: IncomingMessage): Promise<Buffer> => {
  const chunks: Buffer[] = [];
  let size = 0;
  for await (const chunk of incoming) {
    const buf = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk));
    size += buf.length;
    if (size > MAX_BODY_BYTES) throw new PayloadTooLargeError();
    chunks.push(buf);
  }
  return Buffer.concat(chunks);
};

/** node:http request → fetch Request */
const toRequest = async (incoming: IncomingMessage): Promise<Request> => {
  const headers = new Headers();
  for (const [key, value] of Object.entries(incoming.headers)) {
    if (value === undefined) continue;
    if (Array.isArray(value)) {
      for (const v of value) headers.append(key, v);
    } else {
      headers.set(key, value);
    }
  }

  const method = incoming.method ?? "GET";
  const url = `http://${incoming.headers.host ?? "localhost"}${incoming.url ?? "/"}`;
  if (method === "GET" || method === "HEAD") {
    return new Request(url, { method, headers });
  }
  return new Request(url, { method, headers, body: await readBody(incoming) });
};

const writeResponse = async (res: ServerResponse, response: Response): Promise<void> => {
  res.statusCode = response.status;
  response.headers.forEach((value, key) => {
    res.setHeader(key, value);
  });
  const body = response.body === null ? null : Buffer.from(await response.arrayBuffer());
  if (body === null) {
    res.end();
  } else {
    res.end(body);
  }
};

export const createServer = (deps: ServerDeps) => {
  const { config, logger, router } = deps;
  const accessLog = deps.accessLog ?? ((line: string) => process.stdout.write(line));

  const secHeaderEntries: ReadonlyArray<readonly [string, string]> = Object.entries(
    securityHeaders(config.env),
  );

  const shouldLog = config.log.level !== "fatal"; // "fatal" = effectively no access log

  const finish = (response: Response, requestId: string): Response => {
    const resHeaders = response.headers;
    resHeaders.set("X-Request-Id", requestId);
    for (const [k, v] of secHeaderEntries) resHeaders.set(k, v);
    return response;
  };

  const logAccess = (ctx: RequestContext, status: number): void => {
    if (!shouldLog) return;
    const durationMs = Math.round((performance.now() - ctx.startTime) * 100) / 100;
    if (config.log.format === "json") {
      ctx.logger.info("request", {
        method: ctx.method,
        path: ctx.path,
        status,
        durationMs,
        ip: ctx.ip,
      });
    } else {
      accessLog(
        formatAccessLog({
          method: ctx.method,
          path: ctx.path,
          status,
          durationMs,
          ip: ctx.ip,
          requestId: ctx.requestId,
        }),
      );
    }
  };

  /**
   * Route one request. Escaped argument errors become 400, anything else
   * thrown becomes 500.
   */
  const handle = async (req: Request, ip: string): Promise<Response> => {
    const method = req.method;
    const path = extractPath(req.url);
    const requestId = req.headers.get("x-request-id") ?? generateId();

    const ctx: RequestContext = {
      requestId: brand<string, "RequestId">(requestId),
      startTime: performance.now(),
      ip,
      method,
      path,
      logger: logger.child({ requestId }),
    };

    let response: Response;
    try {
      response = await router.handle(req, ctx, path);
    } catch (e: unknown) {
      if (e instanceof ArgumentError) {
        ctx.logger.warn("Rejected argument", { param: e.paramName });
        response = errorResponse(badRequest(e.message, { param: e.paramName }), requestId);
      } else {
        ctx.logger.error("Unhandled error", { error: e instanceof Error ? e : String(e) });
        response = errorResponse(internal(), requestId);
      }
    }

    logAccess(ctx, response.status);
    return finish(response, requestId);
  };

  /** Bridge from node:http into `handle` */
  const onRequest = async (incoming: IncomingMessage, res: ServerResponse): Promise<void> => {
    const ip = incoming.socket.remoteAddress ?? "0";
    let request: Request;
    try {
      request = await toRequest(incoming);
    } catch (e: unknown) {
      if (!(e instanceof PayloadTooLargeError)) throw e;
      const requestId = generateId();
      const tooLarge = Response.json(
        { error: { code: "PAYLOAD_TOO_LARGE", message: e.message }, requestId },
        { status: 413 },
      );
      await writeResponse(res, finish(tooLarge, requestId));
      return;
    }
    await writeResponse(res, await handle(request, ip));
  };

  let server: Server | null = null;

  return {
    handle,

    start(): Promise<Server> {
      const http = createHttpServer((incoming, res) => {
        onRequest(incoming, res).catch((e: unknown) => {
          logger.error("Request bridge failed", { error: e instanceof Error ? e : String(e) });
          if (!res.headersSent) res.statusCode = 500;
          res.end();
        });
      });
      http.keepAliveTimeout = 30_000;
      server = http;

      return new Promise((resolve, reject) => {
        http.once("error", reject);
        http.listen(config.port, config.host, () => {
          http.off("error", reject);
          http.on("error", (e) => logger.error("HTTP server error", { error: e }));
          resolve(http);
        });
      });
    },

    stop(): Promise<void> {
      const running = server;
      server = null;
      if (running === null) return Promise.resolve();
      return new Promise((resolve, reject) => {
        running.close((e) => (e ? reject(e) : resolve()));
        running.closeAllConnections();
      });
    },
  };
};

export type AppServer = ReturnType<typeof createServer>;
