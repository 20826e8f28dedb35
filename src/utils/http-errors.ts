import type { Response } from "express";

/**
 * Base error carrying the HTTP status the client should receive.
 * `details` is only populated for upstream HTTP failures (raw upstream body).
 */
export class HttpError extends Error {
  status: number;
  details?: string;

  constructor(
    message: string,
    status: number,
    options?: { details?: string; cause?: unknown },
  ) {
    super(
      message,
      options?.cause !== undefined ? { cause: options.cause } : undefined,
    );
    this.name = "HttpError";
    this.status = status;
    if (options?.details !== undefined) {
      this.details = options.details;
    }
  }
}

/** 400: missing/empty field, bad number, unsupported value */
export class ClientInputError extends HttpError {
  constructor(message: string) {
    super(message, 400);
    this.name = "ClientInputError";
  }
}

export class NotFoundError extends HttpError {
  constructor(message = "Requested endpoint was not found.") {
    super(message, 404);
    this.name = "NotFoundError";
  }
}

export class ServiceNotConfiguredError extends HttpError {
  constructor(message = "API key is not configured on the server.") {
    super(message, 500);
    this.name = "ServiceNotConfiguredError";
  }
}

/** Upstream answered with a non-2xx status; status and raw body are forwarded. */
export class UpstreamHttpError extends HttpError {
  constructor(status: number, rawBody: string) {
    super("An error occurred with the AI service.", status, {
      details: rawBody,
    });
    this.name = "UpstreamHttpError";
  }
}

/** Upstream could not be reached at all (DNS, socket, TLS). */
export class UpstreamUnavailableError extends HttpError {
  constructor(cause?: unknown) {
    super("Could not reach the AI service.", 502, { cause });
    this.name = "UpstreamUnavailableError";
  }
}

export class InvalidUpstreamResponseError extends HttpError {
  constructor() {
    super("Received an invalid response from the AI service.", 500);
    this.name = "InvalidUpstreamResponseError";
  }
}

export class ModelJsonParseError extends HttpError {
  constructor(cause?: unknown) {
    super("Failed to parse LLM JSON response", 500, { cause });
    this.name = "ModelJsonParseError";
  }
}

export interface ErrorBody {
  error: string;
  details?: string;
}

export function toErrorBody(error: HttpError): ErrorBody {
  const body: ErrorBody = { error: error.message };
  if (error.details !== undefined) body.details = error.details;
  return body;
}

/**
 * Write exactly one JSON error response. Anything that is not an HttpError is
 * logged and reported as a generic 500.
 */
export function sendError(res: Response, error: unknown, requestId?: string) {
  const tag = requestId ? `[homework-ai] [${requestId}]` : "[homework-ai]";

  if (error instanceof HttpError) {
    if (error.status >= 500 || error instanceof UpstreamHttpError) {
      console.error(`${tag} ${error.name}: ${error.message}`);
    }
    return res.status(error.status).json(toErrorBody(error));
  }

  console.error(`${tag} Unexpected error`, error);
  return res
    .status(500)
    .json({ error: "An internal server error occurred." } satisfies ErrorBody);
}
