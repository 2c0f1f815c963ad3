import type { Request, Response, NextFunction } from "express";
import { logger } from "../config/logger.js";

/**
 * Exposes an AbortSignal on the request context that fires when the client
 * goes away before the response has been fully written.
 */
export function clientDisconnect(
  req: Request,
  res: Response,
  next: NextFunction,
): void {
  const controller = new AbortController();

  res.on("close", () => {
    if (res.writableFinished) return;
    logger.info({
      action: "client_disconnected",
      requestId: req.context.requestId,
      path: req.path,
    });
    controller.abort();
  });

  req.context.signal = controller.signal;
  next();
}
