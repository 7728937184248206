import type { AppError } from "../../core/errors/app-error.js";
import { httpStatus } from "../../core/errors/app-error.js";

interface ErrorBody {
  readonly code: AppError["code"];
  readonly message: string;
  readonly reason?: AppError["reason"];
  readonly errors?: AppError["errors"];
  readonly details?: AppError["details"];
}

const toErrorBody = ({ code, message, reason, errors, details }: AppError): ErrorBody => ({
  code,
  message,
  ...(reason ? { reason } : {}),
  ...(errors ? { errors } : {}),
  ...(details ? { details } : {}),
});

/** `{ error, requestId }` with the status mapped from the error code. */
export const errorResponse = (error: AppError, requestId: string): Response =>
  Response.json({ error: toErrorBody(error), requestId }, { status: httpStatus(error.code) });

export const jsonResponse = <T>(data: T, status = 200): Response =>
  Response.json({ data }, { status });

export const createdResponse = <T>(data: T): Response => jsonResponse(data, 201);

export const noContentResponse = (): Response => new Response(null, { status: 204 });

/** Malformed JSON reads as null so the schema check reports it. */
export const readJson = (req: Request): Promise<unknown> =>
  req.json().catch((): null => null);

export const extractQuery = (url: string): URLSearchParams => new URL(url).searchParams;
