import type { Request, Response, NextFunction } from "express";
import { logger } from "../config/logger.js";
import type { ErrorResponse } from "../types/common.js";

export class AppError extends Error {
  constructor(
    message: string,
    public statusCode: number,
    public code: string,
  ) {
    super(message);
    this.name = "AppError";
  }
}

/** Caller fault; rejected before anything is sent upstream. */
export class InvalidRequestError extends AppError {
  constructor(message: string) {
    super(message, 400, "invalid_request");
    this.name = "InvalidRequest";
  }
}

/** Transient; the caller may retry. */
export class UpstreamTimeoutError extends AppError {
  constructor(public readonly timeoutMs: number) {
    super(`Upstream provider did not respond within ${timeoutMs}ms`, 504, "upstream_timeout");
    this.name = "UpstreamTimeout";
  }
}

export class UpstreamRejectedError extends AppError {
  constructor(
    message: string,
    code: "upstream_rejected" | "upstream_unreachable" = "upstream_rejected",
    public readonly upstreamStatus?: number,
  ) {
    super(message, 502, code);
    this.name = "UpstreamRejected";
  }
}

export class RequestCancelledError extends AppError {
  constructor() {
    super("Request was cancelled by the client", 499, "request_cancelled");
    this.name = "RequestCancelled";
  }
}

// body-parser attaches `status` and `type` to the errors it raises
function bodyParserFailure(err: Error): { status: number; code: string } | null {
  if (!("type" in err) || typeof err.type !== "string") return null;
  switch (err.type) {
    case "entity.parse.failed":
    case "encoding.unsupported":
    case "charset.unsupported":
      return { status: 400, code: "invalid_request" };
    case "entity.too.large":
      return { status: 413, code: "payload_too_large" };
    default:
      return clientStatus(err);
  }
}

// Other body-parser failures (e.g. request.aborted) carry their own status.
function clientStatus(err: Error): { status: number; code: string } | null {
  const status = "status" in err ? err.status : "statusCode" in err ? err.statusCode : undefined;
  if (typeof status !== "number" || status < 400 || status > 499) return null;
  return { status, code: status === 413 ? "payload_too_large" : "invalid_request" };
}

/**
 * Maps any thrown value to the status and body sent to the caller.
 * Also used for webhook payloads of background completions.
 */
export function describeError(
  err: unknown,
  requestId: string,
): { status: number; body: ErrorResponse } {
  if (err instanceof AppError) {
    return {
      status: err.statusCode,
      body: {
        error: { message: err.message, type: err.name, code: err.code, requestId },
      },
    };
  }

  if (err instanceof Error) {
    const parserFailure = bodyParserFailure(err);
    if (parserFailure) {
      return {
        status: parserFailure.status,
        body: {
          error: {
            message: err.message,
            type: "InvalidRequest",
            code: parserFailure.code,
            requestId,
          },
        },
      };
    }
  }

  return {
    status: 500,
    body: {
      error: {
        message: "Internal server error",
        type: "internal_error",
        code: "internal_error",
        requestId,
      },
    },
  };
}

export function errorHandler(
  err: unknown,
  req: Request,
  res: Response,
  _next: NextFunction,
): void {
  const requestId = req.context?.requestId ?? "unknown";
  const { status, body } = describeError(err, requestId);

  if (status >= 500 && !(err instanceof AppError)) {
    logger.error({
      action: "unhandled_error",
      requestId,
      error: err instanceof Error ? err.message : String(err),
      stack: err instanceof Error ? err.stack : undefined,
    });
  } else {
    logger.warn({
      action: "request_error",
      requestId,
      error: body.error.message,
      code: body.error.code,
      statusCode: status,
    });
  }

  if (res.headersSent) {
    res.end();
    return;
  }
  res.status(status).json(body);
}
