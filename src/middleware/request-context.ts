import type { Request, Response, NextFunction } from "express";
import { v4 as uuidv4 } from "uuid";

const REQUEST_ID_PATTERN = /^[A-Za-z0-9._:-]{1,128}$/;

function incomingRequestId(req: Request): string | undefined {
  const header = req.headers["x-request-id"];
  const value = Array.isArray(header) ? header[0] : header;
  return value && REQUEST_ID_PATTERN.test(value) ? value : undefined;
}

export function requestContext(
  req: Request,
  res: Response,
  next: NextFunction,
): void {
  const requestId = incomingRequestId(req) ?? uuidv4();
  req.context = {
    requestId,
    startTime: Date.now(),
  };
  res.setHeader("X-Request-Id", requestId);
  next();
}
