import type { Request, Response, NextFunction } from "express";
import { logger } from "../config/logger.js";

export function requestLogger(
  req: Request,
  res: Response,
  next: NextFunction,
): void {
  const { requestId } = req.context;

  logger.info({
    action: "request_received",
    requestId,
    method: req.method,
    path: req.path,
  });

  res.on("finish", () => {
    const duration = Date.now() - req.context.startTime;
    logger.info({
      action: "request_completed",
      requestId,
      method: req.method,
      path: req.path,
      statusCode: res.statusCode,
      duration,
    });
  });

  next();
}
